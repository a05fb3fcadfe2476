import type { LLMProfile } from '../configManager.js';

/**
 * Chat message format for LLM APIs
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface RetryPolicy {
  maxRetries: number;
  initialBackoffMs: number;
  backoffMultiplier: number;
}

export interface ChatCompletionOptions {
  /** Profiles tried in order once the main profile is exhausted. */
  fallbackProfiles?: LLMProfile[];
  retry?: Partial<RetryPolicy>;
}
