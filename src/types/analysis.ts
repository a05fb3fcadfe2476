/**
 * Chapter analysis as the model returns it. Keys stay snake_case, matching
 * the prompt and `src/schemas/chapterAnalysis.schema.json`.
 */
export interface AnalyzedExperience {
  character: string;
  event_type: string;
  description: string;
  impact?: 'positive' | 'negative' | 'neutral';
  related_characters?: string[];
  context?: string;
  emotional_state?: string;
  consequence?: string;
  location?: string;
  key_dialogue?: string;
}

export interface AnalyzedRelationship {
  character: string;
  target: string;
  type?: string;
  intimacy_change?: number;
  description?: string;
  reason?: string;
}

export interface AnalyzedPersonalityChange {
  character: string;
  trait: string;
  intensity_change?: number;
  reason?: string;
}

export interface ChapterAnalysis {
  experiences: AnalyzedExperience[];
  relationships: AnalyzedRelationship[];
  personality_changes: AnalyzedPersonalityChange[];
}

export interface AliasAssignment {
  character: string;
  alias: string;
}

export interface AliasResponse {
  aliases: AliasAssignment[];
}

export interface AnalysisApplyResult {
  experiences: number;
  relationships: number;
  personalityChanges: number;
}

export const emptyAnalysis = (): ChapterAnalysis => ({
  experiences: [],
  relationships: [],
  personality_changes: []
});
