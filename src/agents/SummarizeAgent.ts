import type { Environment } from 'nunjucks';
import type { ConfigManager } from '../configManager.js';
import type { Chapter } from '../types/project.js';
import { BaseAgent } from './BaseAgent.js';
import { ContextAssembler } from './context/ContextAssembler.js';

export class SummarizeAgent extends BaseAgent {
  constructor(
    configManager: ConfigManager,
    private readonly assembler: ContextAssembler = ContextAssembler.fromConfig(configManager),
    env?: Environment
  ) {
    super('summarize', configManager, env);
  }

  /** Model summary of the chapter, or the rule-based one when the call fails. */
  async summarizeChapter(chapter: Chapter, maxLength: number = this.assembler.settings.fallbackSummaryLength): Promise<string> {
    if (!chapter.content.trim()) return this.assembler.generateSimpleSummary(chapter, maxLength);

    try {
      const systemPrompt = this.renderTemplate('summarize', { chapter, maxLength });
      const summary = await this.callLLM(systemPrompt, chapter.content);
      if (summary) return summary;
      this.log('empty summary for chapter %d, using rule summary', chapter.chapterNumber);
    } catch (error) {
      this.log(
        'summary failed for chapter %d, using rule summary: %s',
        chapter.chapterNumber,
        error instanceof Error ? error.message : String(error)
      );
    }
    return this.assembler.generateSimpleSummary(chapter, maxLength);
  }
}

export default SummarizeAgent;
