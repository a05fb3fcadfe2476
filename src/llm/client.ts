import OpenAI from 'openai';
import type { LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ChatCompletionOptions, ChatMessage, RetryPolicy } from './types.js';

export type { ChatMessage } from './types.js';

const log = createLogger(NAMESPACES.llm.client);

const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialBackoffMs: 1000,
  backoffMultiplier: 2
};

const DEFAULT_MODEL = 'gpt-4o-mini';

// Retryable error codes (network, rate limit, temporary server errors)
const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT'];

function readField(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  return Reflect.get(value, key);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  // Network errors, either on the error itself or on the cause the SDK wraps
  for (const candidate of [error, readField(error, 'cause')]) {
    const code = readField(candidate, 'code');
    if (typeof code === 'string' && RETRYABLE_NETWORK_CODES.includes(code)) return true;
  }

  const status = readField(error, 'status');
  return typeof status === 'number' && RETRYABLE_STATUS_CODES.includes(status);
}

export function calculateBackoff(retryCount: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  return policy.initialBackoffMs * Math.pow(policy.backoffMultiplier, retryCount);
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a chat completion against `profile`, retrying retryable failures with
 * exponential backoff, then moving on to each fallback profile.
 */
export async function chatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: ChatCompletionOptions = {}
): Promise<string> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  const profilesToTry: LLMProfile[] = [profile, ...(options.fallbackProfiles ?? [])];
  let lastError: unknown = null;

  for (let profileIndex = 0; profileIndex < profilesToTry.length; profileIndex++) {
    const currentProfile = profilesToTry[profileIndex];

    for (let retryCount = 0; retryCount < policy.maxRetries; retryCount++) {
      try {
        log('attempt %d/%d on profile %s', retryCount + 1, policy.maxRetries, currentProfile.baseURL);
        const result = await attemptChatCompletion(currentProfile, messages);
        if (retryCount > 0) {
          log('retry succeeded on attempt %d', retryCount + 1);
        }
        return result;
      } catch (error) {
        lastError = error;

        if (!isRetryableError(error)) {
          log('non-retryable error: %s', errorMessage(error));
          break;
        }

        if (retryCount < policy.maxRetries - 1) {
          const backoffMs = calculateBackoff(retryCount, policy);
          log('retryable error, waiting %dms before retry: %s', backoffMs, errorMessage(error));
          await sleep(backoffMs);
        } else {
          log('max retries (%d) reached on this profile', policy.maxRetries);
        }
      }
    }

    if (profileIndex < profilesToTry.length - 1) {
      log('profile %s failed, trying fallback profile', currentProfile.baseURL);
    }
  }

  const errorMsg = `All LLM profiles failed. Last error: ${lastError ? errorMessage(lastError) : 'Unknown error'}`;
  log(errorMsg);
  throw new Error(errorMsg);
}

async function attemptChatCompletion(profile: LLMProfile, messages: ChatMessage[]): Promise<string> {
  const client = new OpenAI({
    apiKey: profile.apiKey || 'dummy',
    baseURL: profile.baseURL
  });

  const model = profile.model || DEFAULT_MODEL;
  const sampler = profile.sampler ?? {};

  log('calling %s at %s with %d messages', model, profile.baseURL, messages.length);
  const response = await client.chat.completions.create({
    model,
    messages,
    temperature: sampler.temperature,
    top_p: sampler.topP,
    max_tokens: sampler.maxTokens,
    frequency_penalty: sampler.frequencyPenalty,
    presence_penalty: sampler.presencePenalty,
    stop: sampler.stop,
    ...(profile.format === 'json' ? { response_format: { type: 'json_object' as const } } : {})
  });
  return response.choices[0]?.message?.content ?? '';
}
