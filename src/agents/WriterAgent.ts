import type { Environment } from 'nunjucks';
import type { ConfigManager } from '../configManager.js';
import type { Chapter, ChapterOutline, NovelProject } from '../types/project.js';
import { getChapterOutline } from '../utils/projectHelpers.js';
import { BaseAgent } from './BaseAgent.js';
import { ContextAssembler } from './context/ContextAssembler.js';

export interface ChapterRequest {
  /** Extra direction from the author for this chapter. */
  instructions?: string;
  /** Defaults to the planned outline of the next chapter, if any. */
  outline?: ChapterOutline;
  recentChapterCount?: number;
  summaryChapterCount?: number;
  simplified?: boolean;
  targetLength?: number;
}

export class WriterAgent extends BaseAgent {
  constructor(
    configManager: ConfigManager,
    private readonly assembler: ContextAssembler = ContextAssembler.fromConfig(configManager),
    env?: Environment
  ) {
    super('writer', configManager, env);
  }

  async generateChapter(project: NovelProject, request: ChapterRequest = {}): Promise<string> {
    const chapterNumber = project.chapters.length + 1;
    const planned = getChapterOutline(project, chapterNumber);
    const outline = request.outline ?? (planned?.status === 'planned' ? planned : undefined);

    const systemPrompt = this.renderTemplate('writer', {
      chapterNumber,
      context: this.assembler.buildWritingContext(
        project,
        request.recentChapterCount,
        request.summaryChapterCount,
        { simplified: request.simplified }
      ),
      characterState: this.assembler.buildCharacterStateContext(project),
      happenedEvents: this.assembler.buildHappenedEventsSummary(project),
      outline,
      targetLength: request.targetLength ?? outline?.targetLength
    });
    const userMessage = request.instructions?.trim() || `请创作第${chapterNumber}章。`;

    const content = await this.callLLM(systemPrompt, userMessage);
    if (!content) {
      throw new Error(`Writer returned no content for chapter ${chapterNumber}`);
    }
    if (outline && outline.status === 'planned') {
      outline.status = 'generated';
    }
    this.log('generated chapter %d (%d chars)', chapterNumber, content.length);
    return content;
  }

  async improveChapter(chapter: Chapter, project: NovelProject, focusArea: string = ''): Promise<string> {
    const systemPrompt = this.renderTemplate('improve', {
      context: this.assembler.buildImprovementContext(chapter, project, focusArea)
    });
    const content = await this.callLLM(systemPrompt, focusArea || '请在不改变情节的前提下改进这一章的文笔。');
    if (!content) {
      throw new Error(`Writer returned no content when improving chapter ${chapter.chapterNumber}`);
    }
    return content;
  }
}

export default WriterAgent;
