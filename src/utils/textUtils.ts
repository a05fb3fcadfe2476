export interface SentenceSpan {
  /** Trimmed sentence text, without its terminator. */
  text: string;
  /** Offset just past the terminator run that closes the sentence. */
  end: number;
}

// Runs of CJK/ASCII terminators and newlines; a period only counts when
// followed by whitespace or the end of the text.
const SENTENCE_TERMINATOR = /(?:[。！？!?\n]|\.(?=\s|$))+/g;

const KEYWORD_STOPWORDS = new Set([
  '的', '了', '在', '是', '我', '有', '和', '就', '不', '人', '都', '一',
  '一个', '上', '也', '很', '到', '说', '要', '去', '你', '会', '着', '没有',
  '看', '好', '自己', '这', '那', '他', '她', '们', '吗', '吧', '啊', '呢'
]);

export function sentenceSpans(text: string): SentenceSpan[] {
  if (!text) return [];

  const spans: SentenceSpan[] = [];
  let start = 0;
  for (const match of text.matchAll(SENTENCE_TERMINATOR)) {
    const index = match.index ?? 0;
    const segment = text.slice(start, index).trim();
    const end = index + match[0].length;
    if (segment) spans.push({ text: segment, end });
    start = end;
  }

  const tail = text.slice(start).trim();
  if (tail) spans.push({ text: tail, end: text.length });
  return spans;
}

export function splitIntoSentences(text: string): string[] {
  return sentenceSpans(text).map((span) => span.text);
}

/**
 * Naive keyword extraction: most frequent 2-4 character CJK chunks that are
 * not stop words.
 */
export function extractKeywords(text: string, topN: number = 10): string[] {
  if (!text) return [];

  const frequency = new Map<string, number>();
  for (const length of [4, 3, 2]) {
    const pattern = new RegExp(`[\\u4e00-\\u9fff]{${length}}`, 'g');
    for (const match of text.matchAll(pattern)) {
      const word = match[0];
      if (KEYWORD_STOPWORDS.has(word)) continue;
      frequency.set(word, (frequency.get(word) ?? 0) + 1);
    }
  }

  return Array.from(frequency.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(0, topN))
    .map(([word]) => word);
}

export function truncateText(text: string, maxLength: number, suffix: string = '...'): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, Math.max(0, maxLength - suffix.length)) + suffix;
}

export function countCharacters(text: string): number {
  return Array.from(text ?? '').length;
}
