import type Database from 'better-sqlite3';
import { createLogger, NAMESPACES } from '../logging.js';
import { isRecord, readNumber, readString, readStringList, type LooseRecord } from '../stores/characterRecords.js';
import { CharacterStateStore, type CharacterStateStoreOptions } from '../stores/CharacterStateStore.js';
import type { Chapter, ChapterOutline, CharacterProfile, NovelProject, OutlineStatus } from '../types/project.js';
import { createCharacterProfile, createProject } from '../utils/projectHelpers.js';
import { countCharacters } from '../utils/textUtils.js';

const log = createLogger(NAMESPACES.services.project);

interface ProjectRow {
  title: string;
  data: string;
  characterState: string;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectSummary {
  title: string;
  chapterCount: number;
  createdAt: string;
  updatedAt: string;
}

const OUTLINE_STATUSES: readonly OutlineStatus[] = ['planned', 'generated', 'completed'];

function recordList(value: unknown): LooseRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function chapterFromRecord(raw: LooseRecord, index: number, fallbackTimestamp: string): Chapter {
  const content = readString(raw, ['content']);
  return {
    chapterNumber: readNumber(raw, ['chapterNumber', 'chapter_number']) ?? index + 1,
    title: readString(raw, ['title']),
    content,
    summary: readString(raw, ['summary']),
    wordCount: readNumber(raw, ['wordCount', 'word_count']) ?? countCharacters(content),
    createdAt: readString(raw, ['createdAt', 'created_at'], fallbackTimestamp),
    updatedAt: readString(raw, ['updatedAt', 'updated_at'], fallbackTimestamp)
  };
}

function characterFromRecord(raw: LooseRecord): CharacterProfile | null {
  const name = readString(raw, ['name']);
  if (!name) return null;
  return createCharacterProfile(name, {
    description: readString(raw, ['description']),
    personality: readString(raw, ['personality']),
    background: readString(raw, ['background']),
    aliases: readStringList(raw, ['aliases'])
  });
}

function outlineFromRecord(raw: LooseRecord, index: number): ChapterOutline {
  const status = readString(raw, ['status'], 'planned');
  return {
    chapterNumber: readNumber(raw, ['chapterNumber', 'chapter_number']) ?? index + 1,
    title: readString(raw, ['title']),
    summary: readString(raw, ['summary']),
    keyEvents: readStringList(raw, ['keyEvents', 'key_events']),
    involvedCharacters: readStringList(raw, ['involvedCharacters', 'involved_characters']),
    targetLength: readNumber(raw, ['targetLength', 'target_length']) ?? 0,
    status: OUTLINE_STATUSES.find((s) => s === status) ?? 'planned',
    notes: readString(raw, ['notes'])
  };
}

/** Project snapshot without its character state, which has its own column. */
export function serializeProject(project: NovelProject): string {
  const { characterState: _characterState, ...data } = project;
  return JSON.stringify(data);
}

export function deserializeProject(row: ProjectRow, options: CharacterStateStoreOptions = {}): NovelProject {
  const data: unknown = JSON.parse(row.data);
  const state: unknown = JSON.parse(row.characterState);
  const raw: LooseRecord = isRecord(data) ? data : {};

  const characters = recordList(raw.characters)
    .map(characterFromRecord)
    .filter((c): c is CharacterProfile => c !== null);

  return createProject(row.title, {
    genre: readString(raw, ['genre']),
    background: readString(raw, ['background']),
    plotOutline: readString(raw, ['plotOutline', 'plot_outline']),
    writingStyle: readString(raw, ['writingStyle', 'writing_style']),
    targetAudience: readString(raw, ['targetAudience', 'target_audience']),
    storyGoal: readString(raw, ['storyGoal', 'story_goal']),
    characters,
    chapters: recordList(raw.chapters).map((c, i) => chapterFromRecord(c, i, row.updatedAt)),
    plotPoints: readStringList(raw, ['plotPoints', 'plot_points']),
    chapterOutlines: recordList(raw.chapterOutlines ?? raw.chapter_outlines).map(outlineFromRecord),
    characterState: CharacterStateStore.fromJSON(state, options),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt
  });
}

/** Repository of novel projects, keyed by title. */
export function createProjectService(db: Database.Database, options: CharacterStateStoreOptions = {}) {
  return {
    save(project: NovelProject): void {
      db.prepare(
        `INSERT INTO Projects (title, data, characterState, createdAt, updatedAt)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(title) DO UPDATE SET
           data = excluded.data,
           characterState = excluded.characterState,
           updatedAt = excluded.updatedAt`
      ).run(
        project.title,
        serializeProject(project),
        JSON.stringify(project.characterState.toJSON()),
        project.createdAt,
        project.updatedAt
      );
      log('saved project "%s" (%d chapters)', project.title, project.chapters.length);
    },

    load(title: string): NovelProject | null {
      const row = db
        .prepare<[string], ProjectRow>('SELECT title, data, characterState, createdAt, updatedAt FROM Projects WHERE title = ?')
        .get(title);
      if (!row) {
        log('no project titled "%s"', title);
        return null;
      }
      return deserializeProject(row, options);
    },

    list(): ProjectSummary[] {
      return db
        .prepare<[], ProjectSummary>(
          `SELECT title, COALESCE(json_array_length(data, '$.chapters'), 0) AS chapterCount, createdAt, updatedAt
           FROM Projects ORDER BY updatedAt DESC, title ASC`
        )
        .all();
    },

    delete(title: string): boolean {
      const result = db.prepare('DELETE FROM Projects WHERE title = ?').run(title);
      return result.changes > 0;
    },

    exists(title: string): boolean {
      return db.prepare<[string], { found: number }>('SELECT 1 AS found FROM Projects WHERE title = ?').get(title) !== undefined;
    }
  };
}

export type ProjectService = ReturnType<typeof createProjectService>;
