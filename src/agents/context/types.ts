/** Share of the total budget targeted by each context layer. */
export interface ContextAllocation {
  baseInfo: number;
  recentContent: number;
  historySummary: number;
}

export interface ContextSettings {
  maxTokens: number;
  allocations: ContextAllocation;
  /** Chapters included verbatim. */
  recentChapterCount: number;
  /** Older chapters considered for the recap. */
  summaryChapterCount: number;
  /** Character cap of the rule-based chapter summary. */
  fallbackSummaryLength: number;
  /** Most recent plot points listed in the base info. */
  plotPointLimit: number;
}

/** Partial settings as they appear in configuration. */
export interface ContextSettingsOverrides extends Partial<Omit<ContextSettings, 'allocations'>> {
  allocations?: Partial<ContextAllocation>;
}

export const DEFAULT_ALLOCATIONS: ContextAllocation = {
  baseInfo: 0.3,
  recentContent: 0.5,
  historySummary: 0.2
};

export const DEFAULT_CONTEXT_SETTINGS: ContextSettings = {
  maxTokens: 20000,
  allocations: DEFAULT_ALLOCATIONS,
  recentChapterCount: 2,
  summaryChapterCount: 5,
  fallbackSummaryLength: 200,
  plotPointLimit: 5
};

export interface ContextLayers {
  baseInfo: string;
  historySummary: string;
  recentContent: string;
  /** Sub-budgets the two truncatable layers were built against. */
  budgets: {
    historySummary: number;
    recentContent: number;
  };
}

export interface ContextUsageReport {
  maxTokens: number;
  totalUsed: number;
  remaining: number;
  usagePercent: number;
  breakdown: {
    baseInfo: number;
    historySummary: number;
    recentContent: number;
  };
  budgets: ContextLayers['budgets'];
}

export interface WritingContextOptions {
  /** Condensed roster (first three characters) and no plot points. */
  simplified?: boolean;
}
