export { ContextAssembler } from './agents/context/ContextAssembler.js';
export type { ContextAssemblerOptions } from './agents/context/ContextAssembler.js';
export {
  BASE_INFO_HEADER,
  CHARACTER_HEADER,
  PLOT_POINTS_HEADER,
  HISTORY_HEADER,
  RECENT_HEADER,
  TRUNCATION_MARKER,
  EMPTY_CHAPTER_SUMMARY
} from './agents/context/ContextAssembler.js';
export { DEFAULT_CONTEXT_SETTINGS, DEFAULT_ALLOCATIONS } from './agents/context/types.js';
export type {
  ContextAllocation,
  ContextLayers,
  ContextSettings,
  ContextSettingsOverrides,
  ContextUsageReport,
  WritingContextOptions
} from './agents/context/types.js';

export { CharacterStateStore } from './stores/CharacterStateStore.js';
export type { CharacterStateStoreOptions } from './stores/CharacterStateStore.js';
export { clampPercent, DEFAULT_INTIMACY, DEFAULT_TRAIT_INTENSITY } from './stores/characterRecords.js';
export type { Clock } from './stores/characterRecords.js';
export * from './types/characterState.js';
export type * from './types/project.js';
export { emptyAnalysis } from './types/analysis.js';
export type * from './types/analysis.js';

export {
  HeuristicTokenEstimator,
  GptTokenEstimator,
  DEFAULT_HEURISTIC_WEIGHTS,
  defaultTokenEstimator,
  countTokens,
  countTokensBatch
} from './utils/tokenCounter.js';
export type { TokenEstimator, HeuristicWeights } from './utils/tokenCounter.js';
export { splitIntoSentences, sentenceSpans, extractKeywords, truncateText, countCharacters } from './utils/textUtils.js';
export type { SentenceSpan } from './utils/textUtils.js';
export * from './utils/projectHelpers.js';

export { CharacterTrackingService } from './services/CharacterTrackingService.js';
export type { ChapterAnalyzer } from './services/CharacterTrackingService.js';
export { createProjectService } from './services/ProjectService.js';
export type { ProjectService, ProjectSummary } from './services/ProjectService.js';
export { createDatabase } from './database.js';

export { ConfigManager } from './configManager.js';
export type { Config, LLMProfile, AgentConfig, SamplerSettings, FeatureSettings } from './configManager.js';
export { configureLogging, createLogger, NAMESPACES } from './logging.js';

export { chatCompletion } from './llm/client.js';
export type { ChatMessage, ChatCompletionOptions, RetryPolicy } from './llm/types.js';
export { WriterAgent } from './agents/WriterAgent.js';
export type { ChapterRequest } from './agents/WriterAgent.js';
export { SummarizeAgent } from './agents/SummarizeAgent.js';
export { AnalysisAgent } from './agents/AnalysisAgent.js';
export { createPromptEnvironment } from './agents/BaseAgent.js';
