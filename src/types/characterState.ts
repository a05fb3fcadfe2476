export const EVENT_TYPES = ['achievement', 'conflict', 'relationship', 'growth', 'trauma'] as const;
export const IMPACTS = ['positive', 'negative', 'neutral'] as const;
export const RELATIONSHIP_TYPES = ['friend', 'enemy', 'family', 'lover', 'mentor', 'rival', 'neutral'] as const;

export type KnownEventType = typeof EVENT_TYPES[number];
export type KnownImpact = typeof IMPACTS[number];
export type KnownRelationshipType = typeof RELATIONSHIP_TYPES[number];

// Analysis output is not policed, so unknown labels are kept as-is.
export type EventType = KnownEventType | (string & {});
export type RelationshipType = KnownRelationshipType | (string & {});
export type Impact = KnownImpact | (string & {});

export interface Experience {
  readonly chapterNumber: number;
  readonly eventType: EventType;
  readonly description: string;
  readonly impact: Impact;
  readonly relatedCharacters: readonly string[];
  /** Background or cause of the event. */
  readonly context: string;
  readonly emotionalState: string;
  readonly consequence: string;
  readonly location: string;
  readonly keyDialogue: string;
  readonly timestamp: string;
}

export interface RelationshipChange {
  chapter: number | null;
  timestamp: string;
  oldType: RelationshipType;
  newType: RelationshipType;
  oldIntimacy: number;
  newIntimacy: number;
  reason: string;
}

export interface Relationship {
  targetCharacter: string;
  relationshipType: RelationshipType;
  /** 0-100 */
  intimacyLevel: number;
  description: string;
  firstMetChapter: number | null;
  evolutionHistory: RelationshipChange[];
}

export interface PersonalityTrait {
  traitName: string;
  /** 0-100 */
  intensity: number;
  description: string;
}

export interface PersonalityEvolution {
  readonly chapterNumber: number;
  readonly traitName: string;
  readonly oldIntensity: number;
  readonly newIntensity: number;
  readonly reason: string;
  readonly timestamp: string;
}

export interface ExperienceInput {
  chapterNumber: number;
  eventType: EventType;
  description: string;
  impact?: Impact;
  relatedCharacters?: readonly string[];
  context?: string;
  emotionalState?: string;
  consequence?: string;
  location?: string;
  keyDialogue?: string;
}

export interface RelationshipOptions {
  intimacyLevel?: number;
  description?: string;
  firstMetChapter?: number | null;
}

export interface RelationshipUpdate {
  newType?: RelationshipType;
  intimacyChange?: number;
  description?: string;
  reason?: string;
  chapter?: number | null;
}

export interface PersonalityTraitInput {
  traitName: string;
  intensity: number;
  description?: string;
}

export interface ExperienceFilter {
  eventType?: EventType;
  /** Inclusive [start, end] chapter range. */
  chapterRange?: readonly [number, number];
}

export interface GrowthReport {
  totalExperiences: number;
  experienceBreakdown: Record<string, number>;
  positiveEvents: number;
  negativeEvents: number;
  personalityChanges: number;
  mostChangedTrait: string | null;
}

interface TimelineItemBase {
  chapter: number;
  content: string;
  timestamp: string;
}

export interface ExperienceTimelineItem extends TimelineItemBase {
  kind: 'experience';
  eventType: EventType;
  impact: Impact;
}

export interface RelationshipTimelineItem extends TimelineItemBase {
  kind: 'relationship';
  target: string;
  reason: string;
}

export interface PersonalityTimelineItem extends TimelineItemBase {
  kind: 'personality';
  trait: string;
  reason: string;
}

export type TimelineItem = ExperienceTimelineItem | RelationshipTimelineItem | PersonalityTimelineItem;

export interface RelationshipEdge {
  target: string;
  type: RelationshipType;
  intimacy: number;
  description: string;
}

/** Serialized form of the store, as saved with the owning project. */
export interface CharacterStateData {
  experiences: Record<string, Experience[]>;
  relationships: Record<string, Relationship[]>;
  personality_traits: Record<string, PersonalityTrait[]>;
  personality_evolution: Record<string, PersonalityEvolution[]>;
}
