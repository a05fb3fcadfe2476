import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { compileSchema, formatValidationErrors } from './agents/context/jsonValidation.js';
import { DEFAULT_CONTEXT_SETTINGS, type ContextSettings, type ContextSettingsOverrides } from './agents/context/types.js';
import { configureLogging, createLogger, NAMESPACES, type LoggingSettings } from './logging.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const log = createLogger(NAMESPACES.config);

export interface SamplerSettings {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
}

export type DebugSettings = LoggingSettings;

export interface LLMProfile {
  apiKey?: string;
  baseURL: string;
  model?: string;
  sampler?: SamplerSettings;
  format?: 'text' | 'json'; // 'json' asks the API for a JSON object response
  fallbackProfiles?: string[]; // Profile names to try if this one fails
}

export interface AgentConfig {
  llmProfile?: string;
  model?: string;
  sampler?: SamplerSettings;
  expectsJson?: boolean;
}

export interface FeatureSettings {
  jsonValidationMaxRetries?: number;
}

export interface Config {
  defaultProfile: string;
  profiles: Record<string, LLMProfile>;
  agents?: Record<string, AgentConfig>;
  context?: ContextSettingsOverrides;
  features?: FeatureSettings;
  debug?: DebugSettings;
}

export const DEFAULT_JSON_VALIDATION_RETRIES = 2;

const validateConfig = compileSchema<Config>('config');

export const DEFAULT_CONFIG_PATH = path.join(__dirname, '..', 'localConfig', 'config.json');

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig(configPath);
    configureLogging(this.config.debug);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      const dummyConfig: Config = {
        defaultProfile: 'openai',
        profiles: {
          openai: {
            apiKey: 'replace-me',
            baseURL: 'https://api.openai.com/v1',
            model: 'gpt-4o-mini'
          }
        },
        context: { ...DEFAULT_CONTEXT_SETTINGS },
        features: {
          jsonValidationMaxRetries: DEFAULT_JSON_VALIDATION_RETRIES
        },
        debug: {
          enabledNamespaces: 'chapterwise:llm:*'
        }
      };
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(dummyConfig, null, 2));
      log('wrote default config to %s', configPath);
      return dummyConfig;
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (!validateConfig(parsed)) {
      throw new Error(`Invalid config ${configPath}: ${formatValidationErrors(validateConfig.errors).join('; ')}`);
    }
    this.warnOnUnknownProfiles(parsed);
    return parsed;
  }

  private warnOnUnknownProfiles(config: Config): void {
    for (const [name, agent] of Object.entries(config.agents ?? {})) {
      if (agent.llmProfile && !config.profiles[agent.llmProfile]) {
        log('agent %s refers to unknown profile %s', name, agent.llmProfile);
      }
    }
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new Error(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getDefaultProfile(): LLMProfile {
    return this.getProfile();
  }

  getAgentConfig(agentName: string): AgentConfig | undefined {
    return this.config.agents?.[agentName];
  }

  /** The agent's profile with its model and sampler overrides applied. */
  getAgentProfile(agentName: string): LLMProfile {
    const agent = this.getAgentConfig(agentName);
    const base = this.getProfile(agent?.llmProfile);
    return {
      ...base,
      model: agent?.model ?? base.model,
      sampler: { ...base.sampler, ...agent?.sampler }
    };
  }

  getFallbackProfiles(profile: LLMProfile): LLMProfile[] {
    const fallbacks: LLMProfile[] = [];
    for (const name of profile.fallbackProfiles ?? []) {
      const fallback = this.config.profiles[name];
      if (fallback) {
        fallbacks.push(fallback);
      } else {
        log('fallback profile %s not found, skipping', name);
      }
    }
    return fallbacks;
  }

  getContextSettings(): ContextSettings {
    const overrides = this.config.context ?? {};
    return {
      ...DEFAULT_CONTEXT_SETTINGS,
      ...overrides,
      allocations: { ...DEFAULT_CONTEXT_SETTINGS.allocations, ...overrides.allocations }
    };
  }

  getJsonValidationMaxRetries(): number {
    return this.config.features?.jsonValidationMaxRetries ?? DEFAULT_JSON_VALIDATION_RETRIES;
  }

  getConfig(): Config {
    return { ...this.config };
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
    configureLogging(this.config.debug);
  }

  updateDebugSettings(updates: Partial<DebugSettings>): Config {
    const nextDebug: DebugSettings = {
      ...this.config.debug,
      ...updates
    };
    this.config = {
      ...this.config,
      debug: nextDebug
    };
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2));
    configureLogging(nextDebug);
    return this.getConfig();
  }
}

export default ConfigManager;
