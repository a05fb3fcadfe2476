import type { Environment } from 'nunjucks';
import type { ConfigManager } from '../configManager.js';
import { parseChapterAnalysis, type ChapterAnalyzer } from '../services/CharacterTrackingService.js';
import { emptyAnalysis, type AliasAssignment, type AliasResponse, type ChapterAnalysis } from '../types/analysis.js';
import type { Chapter, NovelProject } from '../types/project.js';
import { BaseAgent } from './BaseAgent.js';
import { compileSchema } from './context/jsonValidation.js';

const validateAliases = compileSchema<AliasResponse>('aliases');

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

export class AnalysisAgent extends BaseAgent implements ChapterAnalyzer {
  constructor(configManager: ConfigManager, env?: Environment) {
    super('analysis', configManager, env);
  }

  /** Structured analysis of the chapter; empty when the model cannot be reached. */
  async analyzeChapter(project: NovelProject, chapter: Chapter): Promise<ChapterAnalysis> {
    const systemPrompt = this.renderTemplate('chapterAnalysis', {
      chapterNumber: chapter.chapterNumber,
      title: chapter.title,
      characters: project.characters
    });

    try {
      const raw = await this.callLLM(systemPrompt, chapter.content);
      return parseChapterAnalysis(raw);
    } catch (error) {
      this.log('analysis of chapter %d failed: %s', chapter.chapterNumber, describeError(error));
      return emptyAnalysis();
    }
  }

  async identifyAliases(content: string, knownNames: string[]): Promise<AliasAssignment[]> {
    if (knownNames.length === 0 || !content.trim()) return [];

    try {
      const result = await this.callLLMForJson(this.renderTemplate('aliases', { knownNames }), content, validateAliases);
      if (result.valid) return result.value.aliases;
      this.log('alias reply rejected: %o', result.errors);
    } catch (error) {
      this.log('alias identification failed: %s', describeError(error));
    }
    return [];
  }
}

export default AnalysisAgent;
