import { CharacterStateStore } from '../stores/CharacterStateStore.js';
import type {
  Chapter,
  ChapterOutline,
  CharacterProfile,
  NovelProject,
  OutlineStatus,
  ProjectStatus
} from '../types/project.js';
import { countCharacters } from './textUtils.js';

const nowIso = () => new Date().toISOString();

export function createProject(title: string, fields: Partial<Omit<NovelProject, 'title'>> = {}): NovelProject {
  const timestamp = nowIso();
  return {
    genre: '',
    background: '',
    plotOutline: '',
    writingStyle: '',
    targetAudience: '',
    storyGoal: '',
    characters: [],
    chapters: [],
    plotPoints: [],
    chapterOutlines: [],
    characterState: new CharacterStateStore(),
    createdAt: timestamp,
    updatedAt: timestamp,
    ...fields,
    title
  };
}

export function createCharacterProfile(name: string, fields: Partial<Omit<CharacterProfile, 'name'>> = {}): CharacterProfile {
  return {
    description: '',
    personality: '',
    background: '',
    ...fields,
    aliases: [...(fields.aliases ?? [])],
    name
  };
}

// ---- chapters ----

/** Appends a chapter numbered after the current last one. */
export function addChapter(project: NovelProject, input: { title: string; content: string; summary?: string }): Chapter {
  const timestamp = nowIso();
  const chapter: Chapter = {
    chapterNumber: project.chapters.length + 1,
    title: input.title,
    content: input.content,
    summary: input.summary ?? '',
    wordCount: countCharacters(input.content),
    createdAt: timestamp,
    updatedAt: timestamp
  };
  project.chapters.push(chapter);
  project.updatedAt = timestamp;
  return chapter;
}

export function getChapter(project: NovelProject, chapterNumber: number): Chapter | undefined {
  if (chapterNumber < 1 || chapterNumber > project.chapters.length) return undefined;
  return project.chapters[chapterNumber - 1];
}

export function getLatestChapter(project: NovelProject): Chapter | undefined {
  return project.chapters[project.chapters.length - 1];
}

export function getRecentChapters(project: NovelProject, count: number): Chapter[] {
  if (count <= 0) return [];
  return project.chapters.slice(-count);
}

export function updateChapterContent(project: NovelProject, chapterNumber: number, content: string): boolean {
  const chapter = getChapter(project, chapterNumber);
  if (!chapter) return false;
  chapter.content = content;
  chapter.wordCount = countCharacters(content);
  chapter.updatedAt = nowIso();
  project.updatedAt = chapter.updatedAt;
  return true;
}

export function getTotalWordCount(project: NovelProject): number {
  return project.chapters.reduce((total, chapter) => total + chapter.wordCount, 0);
}

// ---- plot ----

export function addPlotPoint(project: NovelProject, plotPoint: string): void {
  project.plotPoints.push(plotPoint);
  project.updatedAt = nowIso();
}

// ---- outlines ----

export type ChapterOutlineInput = Pick<ChapterOutline, 'chapterNumber' | 'title'> &
  Partial<Omit<ChapterOutline, 'chapterNumber' | 'title'>>;

const OUTLINE_STATUS_ICONS: Record<OutlineStatus, string> = {
  planned: '📝',
  generated: '⏳',
  completed: '✅'
};

export function addChapterOutline(project: NovelProject, input: ChapterOutlineInput): ChapterOutline {
  const outline: ChapterOutline = {
    summary: '',
    targetLength: 3000,
    status: 'planned',
    notes: '',
    ...input,
    keyEvents: [...(input.keyEvents ?? [])],
    involvedCharacters: [...(input.involvedCharacters ?? [])]
  };
  project.chapterOutlines.push(outline);
  project.updatedAt = nowIso();
  return outline;
}

export function getChapterOutline(project: NovelProject, chapterNumber: number): ChapterOutline | undefined {
  return project.chapterOutlines.find((outline) => outline.chapterNumber === chapterNumber);
}

/** Updates the outline of a chapter in place. False when that chapter has none. */
export function updateChapterOutline(
  project: NovelProject,
  chapterNumber: number,
  changes: Partial<Omit<ChapterOutline, 'chapterNumber'>>
): boolean {
  const outline = getChapterOutline(project, chapterNumber);
  if (!outline) return false;
  Object.assign(outline, changes);
  project.updatedAt = nowIso();
  return true;
}

export function getNextPlannedOutline(project: NovelProject): ChapterOutline | undefined {
  return project.chapterOutlines.find((outline) => outline.status === 'planned');
}

/** One line per outline: status icon, chapter, title and the first 30 characters of the summary. */
export function getOutlineSummary(project: NovelProject): string {
  if (project.chapterOutlines.length === 0) return '暂无章节大纲';
  return project.chapterOutlines
    .map(
      (outline) =>
        `${OUTLINE_STATUS_ICONS[outline.status]} 第${outline.chapterNumber}章: ${outline.title} - ${Array.from(outline.summary).slice(0, 30).join('')}...`
    )
    .join('\n');
}

// ---- characters and aliases ----

export function addCharacter(project: NovelProject, profile: CharacterProfile): void {
  project.characters.push(profile);
  project.updatedAt = nowIso();
}

export function getCharacterByExactName(project: NovelProject, name: string): CharacterProfile | undefined {
  return project.characters.find((c) => c.name === name);
}

/**
 * Canonical name for a name or alias, or undefined when nobody answers to it.
 */
export function findCanonicalName(characters: readonly CharacterProfile[], name: string): string | undefined {
  const trimmed = name.trim();
  if (!trimmed) return undefined;
  const exact = characters.find((c) => c.name === trimmed);
  if (exact) return exact.name;
  return characters.find((c) => c.aliases.includes(trimmed))?.name;
}

/**
 * Adds an alias to a profile. Refused when it is empty, already a canonical
 * name, or already claimed by any profile.
 */
export function addAlias(project: NovelProject, characterName: string, alias: string): boolean {
  const profile = getCharacterByExactName(project, characterName);
  const trimmed = alias.trim();
  if (!profile || !trimmed) return false;
  const claimed = project.characters.some((c) => c.name === trimmed || c.aliases.includes(trimmed));
  if (claimed) return false;
  profile.aliases.push(trimmed);
  project.updatedAt = nowIso();
  return true;
}

export function getProjectStatus(project: NovelProject): ProjectStatus {
  return {
    title: project.title,
    genre: project.genre,
    chapterCount: project.chapters.length,
    characterCount: project.characters.length,
    totalWords: getTotalWordCount(project),
    createdAt: project.createdAt,
    updatedAt: project.updatedAt
  };
}
