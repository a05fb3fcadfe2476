import type { CharacterStateStore } from '../stores/CharacterStateStore.js';

export interface Chapter {
  chapterNumber: number;
  title: string;
  content: string;
  summary: string;
  wordCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface CharacterProfile {
  name: string;
  description: string;
  personality: string;
  background: string;
  aliases: string[];
}

export type OutlineStatus = 'planned' | 'generated' | 'completed';

export interface ChapterOutline {
  chapterNumber: number;
  title: string;
  summary: string;
  keyEvents: string[];
  involvedCharacters: string[];
  targetLength: number;
  status: OutlineStatus;
  notes: string;
}

export interface NovelProject {
  title: string;
  genre: string;
  background: string;
  plotOutline: string;
  writingStyle: string;
  targetAudience: string;
  storyGoal: string;
  characters: CharacterProfile[];
  chapters: Chapter[];
  plotPoints: string[];
  chapterOutlines: ChapterOutline[];
  characterState: CharacterStateStore;
  createdAt: string;
  updatedAt: string;
}

export interface ProjectStatus {
  title: string;
  genre: string;
  chapterCount: number;
  characterCount: number;
  totalWords: number;
  createdAt: string;
  updatedAt: string;
}
