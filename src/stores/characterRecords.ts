import type {
  Experience,
  ExperienceInput,
  PersonalityEvolution,
  PersonalityTrait,
  PersonalityTraitInput,
  Relationship,
  RelationshipChange,
  RelationshipType
} from '../types/characterState.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const DEFAULT_INTIMACY = 50;
export const DEFAULT_TRAIT_INTENSITY = 50;

/**
 * Round and clamp into [0, 100]. Non-finite input becomes `fallback`.
 */
export function clampPercent(value: number, fallback: number = 0): number {
  if (!Number.isFinite(value)) return clampPercent(fallback);
  return Math.min(100, Math.max(0, Math.round(value)));
}

function toChapterNumber(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.trunc(value));
}

function toOptionalChapter(value: number | null | undefined): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  return Math.max(0, Math.trunc(value));
}

export function uniqueNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    if (typeof name !== 'string' || seen.has(name)) continue;
    seen.add(name);
    result.push(name);
  }
  return result;
}

export function createExperience(input: ExperienceInput, timestamp: string): Experience {
  return {
    chapterNumber: toChapterNumber(input.chapterNumber),
    eventType: input.eventType,
    description: input.description,
    impact: input.impact ?? 'neutral',
    relatedCharacters: (input.relatedCharacters ?? []).filter((name) => typeof name === 'string'),
    context: input.context ?? '',
    emotionalState: input.emotionalState ?? '',
    consequence: input.consequence ?? '',
    location: input.location ?? '',
    keyDialogue: input.keyDialogue ?? '',
    timestamp
  };
}

export function createRelationship(
  targetCharacter: string,
  relationshipType: RelationshipType,
  options: { intimacyLevel?: number; description?: string; firstMetChapter?: number | null } = {}
): Relationship {
  return {
    targetCharacter,
    relationshipType,
    intimacyLevel: clampPercent(options.intimacyLevel ?? DEFAULT_INTIMACY, DEFAULT_INTIMACY),
    description: options.description ?? '',
    firstMetChapter: toOptionalChapter(options.firstMetChapter),
    evolutionHistory: []
  };
}

export function createPersonalityTrait(input: PersonalityTraitInput): PersonalityTrait {
  return {
    traitName: input.traitName,
    intensity: clampPercent(input.intensity, DEFAULT_TRAIT_INTENSITY),
    description: input.description ?? ''
  };
}

export function createPersonalityEvolution(
  input: Omit<PersonalityEvolution, 'timestamp' | 'chapterNumber'> & { chapterNumber?: number | null },
  timestamp: string
): PersonalityEvolution {
  return {
    chapterNumber: toChapterNumber(input.chapterNumber),
    traitName: input.traitName,
    oldIntensity: input.oldIntensity,
    newIntensity: input.newIntensity,
    reason: input.reason,
    timestamp
  };
}

export function cloneRelationship(relationship: Relationship): Relationship {
  return {
    ...relationship,
    evolutionHistory: relationship.evolutionHistory.map((change) => ({ ...change }))
  };
}

// ---------------------------------------------------------------------------
// Readers for persisted or externally produced records. Older project files
// use snake_case keys, so every field is looked up under both spellings.

export type LooseRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is LooseRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(record: LooseRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined) return record[key];
  }
  return undefined;
}

export function readString(record: LooseRecord, keys: readonly string[], fallback: string = ''): string {
  const value = pick(record, keys);
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return fallback;
}

export function readNumber(record: LooseRecord, keys: readonly string[]): number | null {
  const value = pick(record, keys);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function readStringList(record: LooseRecord, keys: readonly string[]): string[] {
  const value = pick(record, keys);
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

export function experienceFromRecord(raw: unknown, fallbackTimestamp: string): Experience | null {
  if (!isRecord(raw)) return null;
  return createExperience(
    {
      chapterNumber: readNumber(raw, ['chapterNumber', 'chapter_number']) ?? 0,
      eventType: readString(raw, ['eventType', 'event_type'], 'unknown'),
      description: readString(raw, ['description']),
      impact: readString(raw, ['impact'], 'neutral'),
      relatedCharacters: readStringList(raw, ['relatedCharacters', 'related_characters']),
      context: readString(raw, ['context']),
      emotionalState: readString(raw, ['emotionalState', 'emotional_state']),
      consequence: readString(raw, ['consequence']),
      location: readString(raw, ['location']),
      keyDialogue: readString(raw, ['keyDialogue', 'key_dialogue'])
    },
    readString(raw, ['timestamp'], fallbackTimestamp)
  );
}

export function relationshipChangeFromRecord(raw: unknown, fallbackTimestamp: string): RelationshipChange | null {
  if (!isRecord(raw)) return null;
  const oldIntimacy = clampPercent(readNumber(raw, ['oldIntimacy', 'old_intimacy']) ?? DEFAULT_INTIMACY);
  return {
    chapter: toOptionalChapter(readNumber(raw, ['chapter'])),
    timestamp: readString(raw, ['timestamp'], fallbackTimestamp),
    oldType: readString(raw, ['oldType', 'old_type'], 'neutral'),
    newType: readString(raw, ['newType', 'new_type'], 'neutral'),
    oldIntimacy,
    newIntimacy: clampPercent(readNumber(raw, ['newIntimacy', 'new_intimacy']) ?? oldIntimacy),
    reason: readString(raw, ['reason'])
  };
}

export function relationshipFromRecord(raw: unknown, fallbackTimestamp: string): Relationship | null {
  if (!isRecord(raw)) return null;
  const target = readString(raw, ['targetCharacter', 'target_character']);
  if (!target) return null;

  const relationship = createRelationship(
    target,
    readString(raw, ['relationshipType', 'relationship_type'], 'neutral'),
    {
      intimacyLevel: readNumber(raw, ['intimacyLevel', 'intimacy_level']) ?? DEFAULT_INTIMACY,
      description: readString(raw, ['description']),
      firstMetChapter: readNumber(raw, ['firstMetChapter', 'first_met_chapter'])
    }
  );

  const history = pick(raw, ['evolutionHistory', 'evolution_history']);
  if (Array.isArray(history)) {
    for (const entry of history) {
      const change = relationshipChangeFromRecord(entry, fallbackTimestamp);
      if (change) relationship.evolutionHistory.push(change);
    }
  }
  return relationship;
}

export function traitFromRecord(raw: unknown): PersonalityTrait | null {
  if (!isRecord(raw)) return null;
  const traitName = readString(raw, ['traitName', 'trait_name']);
  if (!traitName) return null;
  return createPersonalityTrait({
    traitName,
    intensity: readNumber(raw, ['intensity']) ?? DEFAULT_TRAIT_INTENSITY,
    description: readString(raw, ['description'])
  });
}

export function evolutionFromRecord(raw: unknown, fallbackTimestamp: string): PersonalityEvolution | null {
  if (!isRecord(raw)) return null;
  const traitName = readString(raw, ['traitName', 'trait_name']);
  if (!traitName) return null;
  return createPersonalityEvolution(
    {
      chapterNumber: readNumber(raw, ['chapterNumber', 'chapter_number']),
      traitName,
      oldIntensity: clampPercent(readNumber(raw, ['oldIntensity', 'old_intensity']) ?? DEFAULT_TRAIT_INTENSITY),
      newIntensity: clampPercent(readNumber(raw, ['newIntensity', 'new_intensity']) ?? DEFAULT_TRAIT_INTENSITY),
      reason: readString(raw, ['reason'])
    },
    readString(raw, ['timestamp'], fallbackTimestamp)
  );
}
