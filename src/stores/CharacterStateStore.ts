import { createLogger, NAMESPACES } from '../logging.js';
import {
  clampPercent,
  cloneRelationship,
  createExperience,
  createPersonalityEvolution,
  createPersonalityTrait,
  createRelationship,
  evolutionFromRecord,
  experienceFromRecord,
  isRecord,
  relationshipFromRecord,
  systemClock,
  traitFromRecord,
  uniqueNames,
  type Clock
} from './characterRecords.js';
import type {
  CharacterStateData,
  Experience,
  ExperienceFilter,
  ExperienceInput,
  GrowthReport,
  PersonalityEvolution,
  PersonalityTrait,
  PersonalityTraitInput,
  Relationship,
  RelationshipEdge,
  RelationshipOptions,
  RelationshipType,
  RelationshipUpdate,
  TimelineItem
} from '../types/characterState.js';

const log = createLogger(NAMESPACES.stores.character);

export interface CharacterStateStoreOptions {
  /** Source of record timestamps; injectable for tests. */
  clock?: Clock;
}

function byChapterNumber<T extends { chapterNumber: number }>(a: T, b: T): number {
  return a.chapterNumber - b.chapterNumber;
}

function moveKey<T>(map: Map<string, T>, from: string, to: string): void {
  const value = map.get(from);
  if (value === undefined) return;
  map.set(to, value);
  map.delete(from);
}

/**
 * Event-sourced state of every tracked character: experiences, directional
 * relationships, personality traits and the log of trait changes. Unknown
 * names are never an error; reads return empty results and updates do nothing.
 */
export class CharacterStateStore {
  private experiences = new Map<string, Experience[]>();
  private relationships = new Map<string, Relationship[]>();
  private personalityTraits = new Map<string, PersonalityTrait[]>();
  private personalityEvolution = new Map<string, PersonalityEvolution[]>();
  private readonly clock: Clock;

  constructor(options: CharacterStateStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // ---- experiences ----

  addExperience(characterName: string, input: ExperienceInput): Experience {
    const experience = createExperience(input, this.now());
    const list = this.experiences.get(characterName) ?? [];
    list.push(experience);
    this.experiences.set(characterName, list);
    return experience;
  }

  getCharacterExperiences(characterName: string, filter: ExperienceFilter = {}): Experience[] {
    let experiences = [...(this.experiences.get(characterName) ?? [])];

    if (filter.eventType) {
      experiences = experiences.filter((e) => e.eventType === filter.eventType);
    }
    if (filter.chapterRange) {
      const [start, end] = filter.chapterRange;
      experiences = experiences.filter((e) => e.chapterNumber >= start && e.chapterNumber <= end);
    }

    // Array.prototype.sort is stable, so ties keep insertion order.
    return experiences.sort(byChapterNumber);
  }

  // ---- relationships ----

  private findRelationship(characterName: string, targetCharacter: string): Relationship | undefined {
    return this.relationships.get(characterName)?.find((r) => r.targetCharacter === targetCharacter);
  }

  /**
   * Create the relationship, or overwrite type, intimacy and description of an
   * existing one. Never writes to the evolution history.
   */
  addRelationship(
    characterName: string,
    targetCharacter: string,
    relationshipType: RelationshipType,
    options: RelationshipOptions = {}
  ): Relationship {
    const existing = this.findRelationship(characterName, targetCharacter);
    if (existing) {
      existing.relationshipType = relationshipType;
      existing.intimacyLevel = clampPercent(options.intimacyLevel ?? 50, 50);
      existing.description = options.description ?? '';
      return cloneRelationship(existing);
    }

    const relationship = createRelationship(targetCharacter, relationshipType, options);
    const list = this.relationships.get(characterName) ?? [];
    list.push(relationship);
    this.relationships.set(characterName, list);
    return cloneRelationship(relationship);
  }

  /**
   * Adjust an existing relationship. An evolution entry is appended only when
   * the type changed or a non-zero intimacy change was requested.
   */
  updateRelationship(
    characterName: string,
    targetCharacter: string,
    update: RelationshipUpdate = {}
  ): Relationship | undefined {
    const relationship = this.findRelationship(characterName, targetCharacter);
    if (!relationship) return undefined;

    const intimacyChange = Number.isFinite(update.intimacyChange) ? Math.round(update.intimacyChange ?? 0) : 0;
    const oldType = relationship.relationshipType;
    const oldIntimacy = relationship.intimacyLevel;

    if (update.description) {
      relationship.description = update.description;
    }
    if (update.newType) {
      relationship.relationshipType = update.newType;
    }
    relationship.intimacyLevel = clampPercent(relationship.intimacyLevel + intimacyChange, oldIntimacy);

    if (oldType !== relationship.relationshipType || intimacyChange !== 0) {
      relationship.evolutionHistory.push({
        chapter: update.chapter ?? null,
        timestamp: this.now(),
        oldType,
        newType: relationship.relationshipType,
        oldIntimacy,
        newIntimacy: relationship.intimacyLevel,
        reason: update.reason ?? ''
      });
    }
    return cloneRelationship(relationship);
  }

  getRelationship(characterName: string, targetCharacter: string): Relationship | undefined {
    const relationship = this.findRelationship(characterName, targetCharacter);
    return relationship ? cloneRelationship(relationship) : undefined;
  }

  getAllRelationships(characterName: string): Relationship[] {
    return (this.relationships.get(characterName) ?? []).map(cloneRelationship);
  }

  getRelationshipNetwork(): Record<string, RelationshipEdge[]> {
    const network: Record<string, RelationshipEdge[]> = {};
    for (const [owner, relationships] of this.relationships) {
      network[owner] = relationships.map((r) => ({
        target: r.targetCharacter,
        type: r.relationshipType,
        intimacy: r.intimacyLevel,
        description: r.description
      }));
    }
    return network;
  }

  // ---- personality ----

  /** Replaces the whole trait list of the character. */
  setPersonalityTraits(characterName: string, traits: readonly PersonalityTraitInput[]): void {
    const byName = new Map<string, PersonalityTrait>();
    for (const input of traits) {
      byName.set(input.traitName, createPersonalityTrait(input));
    }
    this.personalityTraits.set(characterName, Array.from(byName.values()));
  }

  updatePersonalityTrait(
    characterName: string,
    traitName: string,
    newIntensity: number,
    reason: string = '',
    chapterNumber?: number | null
  ): PersonalityTrait | undefined {
    const trait = this.personalityTraits.get(characterName)?.find((t) => t.traitName === traitName);
    if (!trait) return undefined;

    const oldIntensity = trait.intensity;
    trait.intensity = clampPercent(newIntensity, oldIntensity);

    const evolution = this.personalityEvolution.get(characterName) ?? [];
    evolution.push(createPersonalityEvolution(
      { chapterNumber, traitName, oldIntensity, newIntensity: trait.intensity, reason },
      this.now()
    ));
    this.personalityEvolution.set(characterName, evolution);
    return { ...trait };
  }

  getPersonalityTraits(characterName: string): PersonalityTrait[] {
    return (this.personalityTraits.get(characterName) ?? []).map((t) => ({ ...t }));
  }

  getPersonalityEvolution(characterName: string): PersonalityEvolution[] {
    return [...(this.personalityEvolution.get(characterName) ?? [])];
  }

  // ---- analysis ----

  analyzeCharacterGrowth(characterName: string): GrowthReport {
    const experiences = this.getCharacterExperiences(characterName);
    const evolution = this.getPersonalityEvolution(characterName);

    const experienceBreakdown: Record<string, number> = {};
    for (const e of experiences) {
      experienceBreakdown[e.eventType] = (experienceBreakdown[e.eventType] ?? 0) + 1;
    }

    return {
      totalExperiences: experiences.length,
      experienceBreakdown,
      positiveEvents: experiences.filter((e) => e.impact === 'positive').length,
      negativeEvents: experiences.filter((e) => e.impact === 'negative').length,
      personalityChanges: evolution.length,
      mostChangedTrait: this.mostChangedTrait(evolution)
    };
  }

  private mostChangedTrait(evolution: readonly PersonalityEvolution[]): string | null {
    const totals = new Map<string, number>();
    for (const entry of evolution) {
      totals.set(entry.traitName, (totals.get(entry.traitName) ?? 0) + Math.abs(entry.newIntensity - entry.oldIntensity));
    }

    let best: string | null = null;
    let bestTotal = -1;
    for (const [traitName, total] of totals) {
      if (total > bestTotal) {
        best = traitName;
        bestTotal = total;
      }
    }
    return best;
  }

  getCharacterTimeline(characterName: string): TimelineItem[] {
    const timeline: TimelineItem[] = [];

    for (const e of this.getCharacterExperiences(characterName)) {
      timeline.push({
        kind: 'experience',
        chapter: e.chapterNumber,
        eventType: e.eventType,
        content: e.description,
        impact: e.impact,
        timestamp: e.timestamp
      });
    }

    for (const r of this.relationships.get(characterName) ?? []) {
      for (const change of r.evolutionHistory) {
        timeline.push({
          kind: 'relationship',
          chapter: change.chapter ?? 0,
          target: r.targetCharacter,
          content: `与${r.targetCharacter}的关系：${change.oldType} → ${change.newType}（亲密度 ${change.oldIntimacy} → ${change.newIntimacy}）`,
          reason: change.reason,
          timestamp: change.timestamp
        });
      }
    }

    for (const evo of this.personalityEvolution.get(characterName) ?? []) {
      timeline.push({
        kind: 'personality',
        chapter: evo.chapterNumber,
        trait: evo.traitName,
        content: `${evo.traitName}：${evo.oldIntensity} → ${evo.newIntensity}`,
        reason: evo.reason,
        timestamp: evo.timestamp
      });
    }

    return timeline.sort((a, b) => {
      if (a.chapter !== b.chapter) return a.chapter - b.chapter;
      if (a.timestamp === b.timestamp) return 0;
      return a.timestamp < b.timestamp ? -1 : 1;
    });
  }

  // ---- identity reconciliation ----

  /**
   * Fold everything recorded under `source` into `target` and drop `source`.
   * On collisions (same relationship target, same trait name) the entry
   * already held by `target` wins.
   */
  mergeCharacterData(source: string, target: string): void {
    if (source === target) return;

    const sourceExperiences = this.experiences.get(source);
    if (sourceExperiences) {
      const merged = [...(this.experiences.get(target) ?? []), ...sourceExperiences].sort(byChapterNumber);
      this.experiences.set(target, merged);
      this.experiences.delete(source);
    }

    const sourceRelationships = this.relationships.get(source);
    if (sourceRelationships) {
      const targetRelationships = this.relationships.get(target) ?? [];
      const taken = new Set(targetRelationships.map((r) => r.targetCharacter));
      for (const r of sourceRelationships) {
        if (taken.has(r.targetCharacter)) continue;
        targetRelationships.push(r);
        taken.add(r.targetCharacter);
      }
      this.relationships.set(target, targetRelationships);
      this.relationships.delete(source);
    }

    const sourceTraits = this.personalityTraits.get(source);
    if (sourceTraits) {
      const targetTraits = this.personalityTraits.get(target) ?? [];
      const names = new Set(targetTraits.map((t) => t.traitName));
      for (const t of sourceTraits) {
        if (!names.has(t.traitName)) targetTraits.push(t);
      }
      this.personalityTraits.set(target, targetTraits);
      this.personalityTraits.delete(source);
    }

    const sourceEvolution = this.personalityEvolution.get(source);
    if (sourceEvolution) {
      const merged = [...(this.personalityEvolution.get(target) ?? []), ...sourceEvolution].sort(byChapterNumber);
      this.personalityEvolution.set(target, merged);
      this.personalityEvolution.delete(source);
    }

    this.retargetReferences(source, target, 'keep-existing');
    log('merged character %s into %s', source, target);
  }

  /**
   * Move every record of `oldName` to `newName`. Unlike a merge, data already
   * stored under `newName` is replaced, not combined.
   */
  renameCharacter(oldName: string, newName: string): void {
    if (oldName === newName) return;

    moveKey(this.experiences, oldName, newName);
    moveKey(this.relationships, oldName, newName);
    moveKey(this.personalityTraits, oldName, newName);
    moveKey(this.personalityEvolution, oldName, newName);

    this.retargetReferences(oldName, newName, 'replace-existing');
    log('renamed character %s to %s', oldName, newName);
  }

  /**
   * Point relationships and related-character lists that mention `from` at
   * `to`. When an owner already has a relationship to `to`, `collision`
   * decides which of the two survives. Self-relationships produced by the
   * rewrite are dropped.
   */
  private retargetReferences(from: string, to: string, collision: 'keep-existing' | 'replace-existing'): void {
    for (const [owner, relationships] of this.relationships) {
      const pointsAtFrom = relationships.some((r) => r.targetCharacter === from);
      if (!pointsAtFrom && owner !== to) continue;

      const hasTo = relationships.some((r) => r.targetCharacter === to);
      const rewritten: Relationship[] = [];
      for (const r of relationships) {
        if (r.targetCharacter === from) {
          if (hasTo && collision === 'keep-existing') continue;
          r.targetCharacter = to;
        } else if (r.targetCharacter === to && pointsAtFrom && collision === 'replace-existing') {
          continue;
        }
        if (r.targetCharacter === owner) continue;
        rewritten.push(r);
      }

      if (rewritten.length > 0) {
        this.relationships.set(owner, rewritten);
      } else {
        this.relationships.delete(owner);
      }
    }

    for (const [owner, experiences] of this.experiences) {
      if (!experiences.some((e) => e.relatedCharacters.includes(from))) continue;
      this.experiences.set(owner, experiences.map((e) => {
        if (!e.relatedCharacters.includes(from)) return e;
        return {
          ...e,
          relatedCharacters: uniqueNames(e.relatedCharacters.map((name) => (name === from ? to : name)))
        };
      }));
    }
  }

  // ---- bookkeeping ----

  hasCharacter(characterName: string): boolean {
    return this.experiences.has(characterName)
      || this.relationships.has(characterName)
      || this.personalityTraits.has(characterName)
      || this.personalityEvolution.has(characterName);
  }

  getTrackedCharacters(): string[] {
    return uniqueNames([
      ...this.experiences.keys(),
      ...this.relationships.keys(),
      ...this.personalityTraits.keys(),
      ...this.personalityEvolution.keys()
    ]);
  }

  toJSON(): CharacterStateData {
    const toObject = <T, R>(map: Map<string, T[]>, copy: (item: T) => R): Record<string, R[]> => {
      const out: Record<string, R[]> = {};
      for (const [name, items] of map) out[name] = items.map(copy);
      return out;
    };
    return {
      experiences: toObject(this.experiences, (e) => ({ ...e, relatedCharacters: [...e.relatedCharacters] })),
      relationships: toObject(this.relationships, cloneRelationship),
      personality_traits: toObject(this.personalityTraits, (t) => ({ ...t })),
      personality_evolution: toObject(this.personalityEvolution, (e) => ({ ...e }))
    };
  }

  static fromJSON(data: unknown, options: CharacterStateStoreOptions = {}): CharacterStateStore {
    const store = new CharacterStateStore(options);
    if (!isRecord(data)) return store;

    const fallbackTimestamp = store.now();
    const section = (...keys: string[]): Array<[string, unknown[]]> => {
      const value = keys.map((key) => data[key]).find((candidate) => candidate !== undefined);
      if (!isRecord(value)) return [];
      return Object.entries(value).filter((entry): entry is [string, unknown[]] => Array.isArray(entry[1]));
    };
    const load = <T>(
      target: Map<string, T[]>,
      entries: Array<[string, unknown[]]>,
      read: (raw: unknown) => T | null,
      uniqueKey?: (item: T) => string
    ) => {
      for (const [name, rawItems] of entries) {
        const items = rawItems.map(read).filter((item): item is T => item !== null);
        if (!uniqueKey) {
          target.set(name, items);
          continue;
        }
        // later duplicates replace earlier ones in place
        const byKey = new Map<string, T>();
        for (const item of items) byKey.set(uniqueKey(item), item);
        target.set(name, Array.from(byKey.values()));
      }
    };

    load(store.experiences, section('experiences'), (raw) => experienceFromRecord(raw, fallbackTimestamp));
    load(
      store.relationships,
      section('relationships'),
      (raw) => relationshipFromRecord(raw, fallbackTimestamp),
      (r) => r.targetCharacter
    );
    load(store.personalityTraits, section('personality_traits', 'personalityTraits'), traitFromRecord, (t) => t.traitName);
    load(store.personalityEvolution, section('personality_evolution', 'personalityEvolution'), (raw) => evolutionFromRecord(raw, fallbackTimestamp));
    return store;
  }
}
