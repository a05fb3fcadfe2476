import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';
import type { ValidateFunction } from 'ajv';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { chatCompletion } from '../llm/client.js';
import type { ChatMessage } from '../llm/types.js';
import type { ConfigManager, LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { validateJson, type JsonValidationResult } from './context/jsonValidation.js';

const PROMPT_DIR = path.join(dirname(fileURLToPath(import.meta.url)), '..', 'prompts');

export type AgentName = 'writer' | 'summarize' | 'analysis';

/** Template environment shared by the agents. Prompts are plain text, so nothing is escaped. */
export function createPromptEnvironment(): Environment {
  const env = new nunjucks.Environment(null, { autoescape: false, trimBlocks: true, lstripBlocks: true });
  env.addFilter('json', (value: unknown) => JSON.stringify(value, null, 2));
  return env;
}

export abstract class BaseAgent {
  protected readonly log: ReturnType<typeof createLogger>;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(
    protected readonly agentName: AgentName,
    protected readonly configManager: ConfigManager,
    protected readonly env: Environment = createPromptEnvironment()
  ) {
    this.log = createLogger(NAMESPACES.agents[agentName]);
  }

  /** Agent profile; JSON agents also ask the API for a JSON object. */
  protected getProfile(): LLMProfile {
    const profile = this.configManager.getAgentProfile(this.agentName);
    if (this.configManager.getAgentConfig(this.agentName)?.expectsJson) {
      return { ...profile, format: 'json' };
    }
    return profile;
  }

  protected renderTemplate(templateName: string, context: object): string {
    const templatePath = path.join(PROMPT_DIR, `${templateName}.njk`);
    const template = fs.readFileSync(templatePath, 'utf-8');
    const result = this.env.renderString(template, context);
    const preview = result.substring(0, 500) + (result.length > 500 ? '...' : '');
    this.baseAgentLog('Rendered template for %s: %s', templateName, preview);
    return result;
  }

  protected buildMessages(systemPrompt: string, userMessage: string): ChatMessage[] {
    const messages: ChatMessage[] = [{ role: 'system', content: systemPrompt }];
    if (userMessage.trim()) messages.push({ role: 'user', content: userMessage });
    return messages;
  }

  /** One completion through the agent's profile and its fallbacks. Errors propagate. */
  protected async callLLM(systemPrompt: string, userMessage: string): Promise<string> {
    const profile = this.getProfile();
    const raw = await chatCompletion(profile, this.buildMessages(systemPrompt, userMessage), {
      fallbackProfiles: this.configManager.getFallbackProfiles(profile)
    });
    return this.cleanResponse(raw);
  }

  /**
   * Completion whose reply must validate against `validate`. Invalid replies
   * are retried with the validation errors appended to the system prompt.
   */
  protected async callLLMForJson<T>(
    systemPrompt: string,
    userMessage: string,
    validate: ValidateFunction<T>
  ): Promise<JsonValidationResult<T>> {
    const maxValidationRetries = Math.max(0, this.configManager.getJsonValidationMaxRetries());

    let result = validateJson(validate, await this.callLLM(systemPrompt, userMessage));
    for (let attempt = 1; attempt <= maxValidationRetries; attempt++) {
      if (result.valid) return result;
      this.baseAgentLog('[JSON VALIDATION] agent=%s attempt=%d errors=%o', this.agentName, attempt, result.errors);
      const retryPrompt = this.buildValidationRetryPrompt(systemPrompt, result.errors);
      result = validateJson(validate, await this.callLLM(retryPrompt, userMessage));
    }

    if (!result.valid) {
      this.baseAgentLog(
        '[JSON VALIDATION] agent=%s failed after %d attempts errors=%o',
        this.agentName,
        maxValidationRetries + 1,
        result.errors
      );
    }
    return result;
  }

  private buildValidationRetryPrompt(basePrompt: string, errors: string[]): string {
    const errorText = errors.length > 0 ? errors.join('; ') : 'invalid JSON output';
    return `${basePrompt}\n\n[VALIDATION RETRY]\nPrevious response had invalid JSON (${errorText}). Return valid JSON only, matching the expected schema/object. No commentary.`;
  }

  protected cleanResponse(response: string): string {
    let cleaned = response;

    // Remove <thinking>/<think> blocks some models emit before the answer
    cleaned = cleaned.replace(/<(thinking|think)>[\s\S]*?<\/\1>/gi, '');

    // Remove a markdown code block wrapping the whole reply (e.g., ```json ... ```)
    cleaned = cleaned.trim().replace(/^```(?:json|markdown)?\s*\n?/i, '').replace(/\n?```\s*$/i, '');

    return cleaned.trim();
  }
}
