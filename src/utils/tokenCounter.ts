import { encode } from 'gpt-tokenizer';
import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.context.assembler);

/**
 * Strategy used by the context assembler to measure text. Budgets are
 * expressed in whatever unit the estimator returns.
 */
export interface TokenEstimator {
  estimate(text: string): number;
}

export interface HeuristicWeights {
  /** Weight of one CJK ideograph. */
  cjk: number;
  /** Weight of one run of ASCII letters. */
  word: number;
  /** Weight of any other code point (punctuation, digits, whitespace, ...). */
  other: number;
}

export const DEFAULT_HEURISTIC_WEIGHTS: HeuristicWeights = {
  cjk: 1.5,
  word: 1.3,
  other: 0.5
};

const CJK_PATTERN = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/;
const ASCII_LETTER_PATTERN = /[A-Za-z]/;

/**
 * Language-mixed estimate: ideographs, English words and everything else are
 * counted separately and weighted. Appending text never lowers the result.
 */
export class HeuristicTokenEstimator implements TokenEstimator {
  private readonly weights: HeuristicWeights;

  constructor(weights: Partial<HeuristicWeights> = {}) {
    this.weights = { ...DEFAULT_HEURISTIC_WEIGHTS, ...weights };
  }

  estimate(text: string): number {
    if (!text) return 0;

    let cjk = 0;
    let words = 0;
    let other = 0;
    let inWord = false;

    for (const ch of text) {
      if (ASCII_LETTER_PATTERN.test(ch)) {
        if (!inWord) words += 1;
        inWord = true;
        continue;
      }
      inWord = false;
      if (CJK_PATTERN.test(ch)) {
        cjk += 1;
      } else {
        other += 1;
      }
    }

    const tokens = Math.floor(
      cjk * this.weights.cjk + words * this.weights.word + other * this.weights.other
    );
    return Math.max(tokens, 1);
  }
}

/**
 * Exact count using the GPT tokenizer. Falls back to the heuristic if
 * tokenization fails.
 */
export class GptTokenEstimator implements TokenEstimator {
  private readonly fallback = new HeuristicTokenEstimator();

  estimate(text: string): number {
    if (!text) return 0;

    try {
      return encode(text).length;
    } catch (error) {
      log('Tokenization failed, using heuristic estimate: %o', error);
      return this.fallback.estimate(text);
    }
  }
}

export const defaultTokenEstimator: TokenEstimator = new HeuristicTokenEstimator();

export function countTokens(text: string): number {
  return defaultTokenEstimator.estimate(text);
}

/**
 * Estimate tokens for multiple texts
 */
export function countTokensBatch(texts: string[], estimator: TokenEstimator = defaultTokenEstimator): number {
  return texts.reduce((total, text) => total + estimator.estimate(text), 0);
}
