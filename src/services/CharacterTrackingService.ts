import { compileSchema, formatValidationErrors, parseJsonLoose } from '../agents/context/jsonValidation.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { isRecord, uniqueNames } from '../stores/characterRecords.js';
import type { CharacterStateStore } from '../stores/CharacterStateStore.js';
import {
  emptyAnalysis,
  type AliasAssignment,
  type AnalysisApplyResult,
  type ChapterAnalysis
} from '../types/analysis.js';
import type { Chapter, CharacterProfile, NovelProject } from '../types/project.js';
import { addAlias, findCanonicalName } from '../utils/projectHelpers.js';

const log = createLogger(NAMESPACES.services.tracking);

const validateAnalysis = compileSchema<ChapterAnalysis>('chapterAnalysis');

const LIST_KEYS = ['experiences', 'relationships', 'personality_changes'] as const;
type ListKey = typeof LIST_KEYS[number];

const ITEM_ERROR_PATH = /^\/(experiences|relationships|personality_changes)(?:\/(\d+))?/;

/** What the tracking pipeline needs from the analysis agent. */
export interface ChapterAnalyzer {
  identifyAliases(content: string, knownNames: string[]): Promise<AliasAssignment[]>;
  analyzeChapter(project: NovelProject, chapter: Chapter): Promise<ChapterAnalysis>;
}

/**
 * Parse and validate the analysis returned by the model. Items that break the
 * schema are dropped one by one; anything unusable yields an empty analysis.
 */
export function parseChapterAnalysis(raw: string): ChapterAnalysis {
  const parsed = parseJsonLoose(raw);
  if (!parsed || !isRecord(parsed.value)) {
    log('analysis is not a JSON object, ignoring it');
    return emptyAnalysis();
  }

  const candidate: Record<string, unknown> = { ...parsed.value };
  if (validateAnalysis(candidate)) return candidate;

  const invalidLists = new Set<ListKey>();
  const invalidItems = new Map<ListKey, Set<number>>();
  for (const error of validateAnalysis.errors ?? []) {
    const match = ITEM_ERROR_PATH.exec(error.instancePath);
    const key = LIST_KEYS.find((k) => k === match?.[1]);
    if (!match || !key) {
      log('analysis rejected: %o', formatValidationErrors(validateAnalysis.errors));
      return emptyAnalysis();
    }
    if (match[2] === undefined) {
      invalidLists.add(key);
    } else {
      const indexes = invalidItems.get(key) ?? new Set<number>();
      indexes.add(Number(match[2]));
      invalidItems.set(key, indexes);
    }
  }

  for (const key of LIST_KEYS) {
    const value = candidate[key];
    if (invalidLists.has(key)) {
      log('dropping malformed %s list', key);
      delete candidate[key];
    } else if (Array.isArray(value)) {
      const dropped = invalidItems.get(key) ?? new Set<number>();
      if (dropped.size > 0) log('dropping %d invalid %s item(s)', dropped.size, key);
      candidate[key] = value.filter((_, index) => !dropped.has(index));
    }
  }

  if (validateAnalysis(candidate)) return candidate;
  log('analysis still invalid after dropping items: %o', formatValidationErrors(validateAnalysis.errors));
  return emptyAnalysis();
}

/** Rewrites every character reference in the analysis to its canonical name. */
export function normalizeAnalysisNames(analysis: ChapterAnalysis, characters: readonly CharacterProfile[]): ChapterAnalysis {
  const canonical = (name: string) => findCanonicalName(characters, name) ?? name.trim();
  const relatedNames = (names: readonly string[]) => uniqueNames(names.map(canonical).filter((name) => name !== ''));

  return {
    experiences: analysis.experiences.map((experience) => ({
      ...experience,
      character: canonical(experience.character),
      ...(experience.related_characters
        ? { related_characters: relatedNames(experience.related_characters) }
        : {})
    })),
    relationships: analysis.relationships.map((relationship) => ({
      ...relationship,
      character: canonical(relationship.character),
      target: canonical(relationship.target)
    })),
    personality_changes: analysis.personality_changes.map((change) => ({
      ...change,
      character: canonical(change.character)
    }))
  };
}

export function applyChapterAnalysis(
  store: CharacterStateStore,
  analysis: ChapterAnalysis,
  chapterNumber: number
): AnalysisApplyResult {
  const result: AnalysisApplyResult = { experiences: 0, relationships: 0, personalityChanges: 0 };

  for (const experience of analysis.experiences) {
    store.addExperience(experience.character, {
      chapterNumber,
      eventType: experience.event_type,
      description: experience.description,
      impact: experience.impact ?? 'neutral',
      relatedCharacters: experience.related_characters ?? [],
      context: experience.context,
      emotionalState: experience.emotional_state,
      consequence: experience.consequence,
      location: experience.location,
      keyDialogue: experience.key_dialogue
    });
    result.experiences += 1;
  }

  for (const relationship of analysis.relationships) {
    const { character, target } = relationship;
    if (character === target) {
      log('skipping relationship of %s with itself', character);
      continue;
    }
    if (!store.getRelationship(character, target)) {
      store.addRelationship(character, target, relationship.type || 'neutral', {
        description: relationship.description,
        firstMetChapter: chapterNumber
      });
    }
    store.updateRelationship(character, target, {
      newType: relationship.type,
      intimacyChange: relationship.intimacy_change ?? 0,
      description: relationship.description,
      reason: relationship.reason,
      chapter: chapterNumber
    });
    result.relationships += 1;
  }

  for (const change of analysis.personality_changes) {
    const traits = store.getPersonalityTraits(change.character);
    let current = traits.find((t) => t.traitName === change.trait);
    if (!current) {
      current = { traitName: change.trait, intensity: 50, description: '' };
      store.setPersonalityTraits(change.character, [...traits, current]);
    }
    store.updatePersonalityTrait(
      change.character,
      change.trait,
      current.intensity + (change.intensity_change ?? 0),
      change.reason ?? '',
      chapterNumber
    );
    result.personalityChanges += 1;
  }

  log(
    'chapter %d applied: %d experiences, %d relationships, %d personality changes',
    chapterNumber,
    result.experiences,
    result.relationships,
    result.personalityChanges
  );
  return result;
}

/**
 * Adds the aliases the model found to their profiles. State already tracked
 * under a newly registered alias is merged into the canonical character.
 */
export function registerAliases(project: NovelProject, aliases: readonly AliasAssignment[]): AliasAssignment[] {
  const added: AliasAssignment[] = [];
  for (const assignment of aliases) {
    const character = findCanonicalName(project.characters, assignment.character);
    const alias = assignment.alias.trim();
    if (!character || !addAlias(project, character, alias)) continue;

    added.push({ character, alias });
    if (project.characterState.hasCharacter(alias)) {
      log('merging state tracked under alias %s into %s', alias, character);
      project.characterState.mergeCharacterData(alias, character);
    }
  }
  return added;
}

/** Alias detection, analysis, name normalization and application for one chapter. */
export async function autoUpdateCharacterState(
  project: NovelProject,
  chapter: Chapter,
  analyzer: ChapterAnalyzer
): Promise<AnalysisApplyResult> {
  const aliases = await analyzer.identifyAliases(chapter.content, project.characters.map((c) => c.name));
  const added = registerAliases(project, aliases);
  if (added.length > 0) log('registered %d alias(es) from chapter %d', added.length, chapter.chapterNumber);

  const analysis = await analyzer.analyzeChapter(project, chapter);
  const normalized = normalizeAnalysisNames(analysis, project.characters);
  const result = applyChapterAnalysis(project.characterState, normalized, chapter.chapterNumber);
  project.updatedAt = new Date().toISOString();
  return result;
}

export const CharacterTrackingService = {
  parseChapterAnalysis,
  normalizeAnalysisNames,
  applyChapterAnalysis,
  registerAliases,
  autoUpdateCharacterState
};

export default CharacterTrackingService;
