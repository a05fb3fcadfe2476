import type { ConfigManager } from '../../configManager.js';
import { createLogger, NAMESPACES } from '../../logging.js';
import type { Chapter, NovelProject } from '../../types/project.js';
import { getRecentChapters } from '../../utils/projectHelpers.js';
import { extractKeywords, sentenceSpans, splitIntoSentences } from '../../utils/textUtils.js';
import { defaultTokenEstimator, type TokenEstimator } from '../../utils/tokenCounter.js';
import {
  DEFAULT_CONTEXT_SETTINGS,
  type ContextLayers,
  type ContextSettings,
  type ContextSettingsOverrides,
  type ContextUsageReport,
  type WritingContextOptions
} from './types.js';

const log = createLogger(NAMESPACES.context.assembler);

export const BASE_INFO_HEADER = '【小说基本信息】';
export const CHARACTER_HEADER = '【角色设定】';
export const PLOT_POINTS_HEADER = '【重要情节】';
export const HISTORY_HEADER = '【前情提要】';
export const RECENT_HEADER = '【最近章节】';
export const TRUNCATION_MARKER = '\n[内容过长，已截断]';
export const EMPTY_CHAPTER_SUMMARY = '本章暂无内容';

const SIMPLIFIED_ROSTER_SIZE = 3;
const STATE_EXPERIENCE_LIMIT = 5;
const STATE_LIST_LIMIT = 3;
const HAPPENED_EVENTS_LIMIT = 10;

export interface ContextAssemblerOptions extends ContextSettingsOverrides {
  estimator?: TokenEstimator;
}

const recentChapterHeading = (chapter: Chapter) => `## 第${chapter.chapterNumber}章：${chapter.title}`;

/**
 * Builds the prompt context for chapter generation out of three layers:
 * fixed base info, a recap of older chapters and the most recent chapters
 * verbatim. The recap and recent layers are cut to fit the token budget.
 */
export class ContextAssembler {
  readonly settings: ContextSettings;
  private readonly estimator: TokenEstimator;

  constructor(options: ContextAssemblerOptions = {}) {
    const { estimator, allocations, ...rest } = options;
    this.settings = {
      ...DEFAULT_CONTEXT_SETTINGS,
      ...rest,
      allocations: { ...DEFAULT_CONTEXT_SETTINGS.allocations, ...allocations }
    };
    this.estimator = estimator ?? defaultTokenEstimator;
  }

  static fromConfig(configManager: ConfigManager, estimator?: TokenEstimator): ContextAssembler {
    return new ContextAssembler({ ...configManager.getContextSettings(), estimator });
  }

  get maxTokens(): number {
    return this.settings.maxTokens;
  }

  countTokens(text: string): number {
    return this.estimator.estimate(text);
  }

  buildWritingContext(
    project: NovelProject,
    recentChapterCount: number = this.settings.recentChapterCount,
    summaryChapterCount: number = this.settings.summaryChapterCount,
    options: WritingContextOptions = {}
  ): string {
    const layers = this.buildLayers(project, recentChapterCount, summaryChapterCount, options);
    const sections = [layers.baseInfo];
    if (layers.historySummary) sections.push(`${HISTORY_HEADER}\n${layers.historySummary}`);
    if (layers.recentContent) sections.push(`${RECENT_HEADER}\n${layers.recentContent}`);

    const context = sections.join('\n\n');
    log(
      'writing context for "%s": base=%d history=%d recent=%d total=%d/%d',
      project.title,
      this.countTokens(layers.baseInfo),
      this.countTokens(layers.historySummary),
      this.countTokens(layers.recentContent),
      this.countTokens(context),
      this.settings.maxTokens
    );
    return context;
  }

  buildImprovementContext(chapter: Chapter, project: NovelProject, focusArea: string = ''): string {
    const parts = ['【小说信息】', `标题：${project.title}`];
    if (project.genre) parts.push(`类型：${project.genre}`);
    if (project.writingStyle) parts.push(`写作风格：${project.writingStyle}`);
    if (project.characters.length > 0) {
      parts.push(`主要角色：${project.characters.map((c) => c.name).join('、')}`);
    }

    parts.push('\n【待改进章节】', `## ${chapter.title}`, chapter.content);
    if (focusArea) parts.push(`\n【改进重点】\n${focusArea}`);
    return parts.join('\n');
  }

  analyzeContextUsage(
    project: NovelProject,
    recentChapterCount: number = this.settings.recentChapterCount,
    summaryChapterCount: number = this.settings.summaryChapterCount
  ): ContextUsageReport {
    const layers = this.buildLayers(project, recentChapterCount, summaryChapterCount, {});
    const breakdown = {
      baseInfo: this.countTokens(layers.baseInfo),
      historySummary: this.countTokens(layers.historySummary),
      recentContent: this.countTokens(layers.recentContent)
    };
    const totalUsed = breakdown.baseInfo + breakdown.historySummary + breakdown.recentContent;
    const { maxTokens } = this.settings;

    return {
      maxTokens,
      totalUsed,
      remaining: maxTokens - totalUsed,
      usagePercent: maxTokens > 0 ? Math.round((totalUsed / maxTokens) * 10000) / 100 : 0,
      breakdown,
      budgets: layers.budgets
    };
  }

  buildLayers(
    project: NovelProject,
    recentChapterCount: number,
    summaryChapterCount: number,
    options: WritingContextOptions
  ): ContextLayers {
    const baseInfo = this.buildBaseInfo(project, options.simplified ?? false);
    const historyBudget = Math.floor(this.settings.maxTokens * this.settings.allocations.historySummary);
    const historySummary = this.buildHistorySummary(project, recentChapterCount, summaryChapterCount, historyBudget);

    const recentBudget = Math.max(0, this.settings.maxTokens - this.countTokens(baseInfo) - this.countTokens(historySummary));
    const recentContent = this.buildRecentContent(project, recentChapterCount, recentBudget);

    return {
      baseInfo,
      historySummary,
      recentContent,
      budgets: { historySummary: historyBudget, recentContent: recentBudget }
    };
  }

  buildBaseInfo(project: NovelProject, simplified: boolean = false): string {
    const parts = [BASE_INFO_HEADER, `标题：${project.title}`];
    if (project.genre) parts.push(`类型：${project.genre}`);
    if (project.background) parts.push(`背景设定：${project.background}`);
    if (project.plotOutline) parts.push(`故事大纲：${project.plotOutline}`);
    if (project.writingStyle) parts.push(`写作风格：${project.writingStyle}`);

    if (simplified) {
      if (project.characters.length > 0) {
        const roster = project.characters
          .slice(0, SIMPLIFIED_ROSTER_SIZE)
          .map((c) => `${c.name}（${c.description}）`)
          .join('、');
        parts.push(`主要角色：${roster}`);
      }
      return parts.join('\n');
    }

    if (project.characters.length > 0) {
      parts.push(`\n${CHARACTER_HEADER}`);
      for (const character of project.characters) {
        parts.push(`- ${character.name}：${character.description}`);
        if (character.personality) parts.push(`  性格：${character.personality}`);
      }
    }

    const plotPoints = this.settings.plotPointLimit > 0 ? project.plotPoints.slice(-this.settings.plotPointLimit) : [];
    if (plotPoints.length > 0) {
      parts.push(`\n${PLOT_POINTS_HEADER}`);
      plotPoints.forEach((point, index) => parts.push(`${index + 1}. ${point}`));
    }

    return parts.join('\n');
  }

  /**
   * One line per older chapter, newest lines kept first when the budget runs
   * out. Chapters without a stored summary get the rule-based one.
   */
  buildHistorySummary(
    project: NovelProject,
    excludeRecent: number,
    maxCount: number,
    tokenBudget: number
  ): string {
    const skip = Math.max(0, excludeRecent);
    if (project.chapters.length <= skip || maxCount <= 0) return '';

    const older = skip > 0 ? project.chapters.slice(0, -skip) : project.chapters;
    const candidates = older.slice(-maxCount);

    let accepted: string[] = [];
    for (let i = candidates.length - 1; i >= 0; i -= 1) {
      const chapter = candidates[i];
      const summary = chapter.summary.trim() ? chapter.summary : this.generateSimpleSummary(chapter);
      const next = [`第${chapter.chapterNumber}章《${chapter.title}》：${summary}`, ...accepted];
      if (this.countTokens(next.join('\n')) > tokenBudget) break;
      accepted = next;
    }
    return accepted.join('\n');
  }

  /**
   * Recent chapters in ascending order. The first chapter that does not fit
   * whole is cut at a sentence boundary and becomes the last one included.
   */
  buildRecentContent(project: NovelProject, count: number, tokenBudget: number): string {
    const parts: string[] = [];
    for (const chapter of getRecentChapters(project, count)) {
      const full = `${recentChapterHeading(chapter)}\n${chapter.content}`;
      if (this.fits([...parts, full], tokenBudget)) {
        parts.push(full);
        continue;
      }

      const truncated = this.truncateChapterToFit(chapter, parts, tokenBudget);
      if (truncated !== null) {
        parts.push(truncated);
      } else {
        log('chapter %d skipped: not even its heading fits %d tokens', chapter.chapterNumber, tokenBudget);
      }
      break;
    }
    return parts.join('\n\n');
  }

  /**
   * Longest whole-sentence prefix of `text` whose estimate, with the
   * truncation marker, stays within `maxTokens`.
   */
  truncateToTokenLimit(text: string, maxTokens: number): string {
    if (this.countTokens(text) <= maxTokens) return text;
    const prefix = this.longestFittingPrefix(text, (content) => `${content}${TRUNCATION_MARKER}`, maxTokens);
    return prefix ? `${prefix}${TRUNCATION_MARKER}` : '';
  }

  generateSimpleSummary(chapter: Chapter, maxLength: number = this.settings.fallbackSummaryLength): string {
    const sentences = splitIntoSentences(chapter.content);
    if (sentences.length === 0) return EMPTY_CHAPTER_SUMMARY;

    const picked = sentences.length > 3 ? [...sentences.slice(0, 3), sentences[sentences.length - 1]] : sentences;
    const summary = picked.join('。');
    return summary.length > maxLength ? `${summary.slice(0, maxLength)}...` : summary;
  }

  /** Rule summary followed by a keyword line when any keywords are found. */
  generateChapterSummary(chapter: Chapter, maxLength: number = 300): string {
    const summary = this.generateSimpleSummary(chapter, maxLength);
    const keywords = extractKeywords(chapter.content, 5);
    return keywords.length > 0 ? `${summary}\n关键词：${keywords.join('、')}` : summary;
  }

  getContextPreview(project: NovelProject, maxDisplay: number = 500): string {
    const context = this.buildWritingContext(project);
    if (context.length <= maxDisplay) return context;
    return `${context.slice(0, maxDisplay)}\n\n... (还有${context.length - maxDisplay}个字符) ...`;
  }

  /** Tracked state per character: recent experiences, relationships, traits. */
  buildCharacterStateContext(project: NovelProject): string {
    const store = project.characterState;
    const blocks: string[] = [];

    for (const character of project.characters) {
      const lines = [`【${character.name}】`];
      if (character.personality) lines.push(`性格：${character.personality}`);

      const experiences = store.getCharacterExperiences(character.name).slice(-STATE_EXPERIENCE_LIMIT);
      if (experiences.length > 0) {
        lines.push(`最近经历：${experiences.map((e) => e.description.slice(0, 50)).join('；')}`);
      }

      const relationships = store.getAllRelationships(character.name).slice(0, STATE_LIST_LIMIT);
      if (relationships.length > 0) {
        const described = relationships.map(
          (r) => `${r.targetCharacter}(${r.relationshipType},亲密度${r.intimacyLevel})`
        );
        lines.push(`关系：${described.join('，')}`);
      }

      const traits = store.getPersonalityTraits(character.name).slice(0, STATE_LIST_LIMIT);
      if (traits.length > 0) {
        lines.push(`特质：${traits.map((t) => `${t.traitName}(${t.intensity})`).join('，')}`);
      }

      blocks.push(lines.join('\n'));
    }
    return blocks.join('\n\n');
  }

  /**
   * For each rostered character, the first recorded experience of every
   * chapter, so the writer does not repeat events that already happened.
   * Lines run in roster order, ascending by chapter within a character.
   */
  buildHappenedEventsSummary(project: NovelProject): string {
    if (project.characters.length === 0 || project.chapters.length === 0) return '';

    const lines: string[] = [];
    for (const character of project.characters) {
      const byChapter = new Map<number, string>();
      for (const experience of project.characterState.getCharacterExperiences(character.name)) {
        if (!byChapter.has(experience.chapterNumber)) {
          byChapter.set(experience.chapterNumber, experience.description.slice(0, 60));
        }
      }
      const chapters = Array.from(byChapter.keys()).sort((a, b) => a - b);
      for (const chapterNumber of chapters) {
        lines.push(`第${chapterNumber}章：${byChapter.get(chapterNumber) ?? ''}`);
      }
    }

    return lines.slice(-HAPPENED_EVENTS_LIMIT).join('\n');
  }

  private fits(parts: readonly string[], tokenBudget: number): boolean {
    return this.countTokens(parts.join('\n\n')) <= tokenBudget;
  }

  private truncateChapterToFit(chapter: Chapter, parts: readonly string[], tokenBudget: number): string | null {
    const heading = recentChapterHeading(chapter);
    const render = (content: string) =>
      content ? `${heading}\n${content}${TRUNCATION_MARKER}` : `${heading}${TRUNCATION_MARKER}`;
    const prefix = this.longestFittingPrefix(
      chapter.content,
      (content) => [...parts, render(content)].join('\n\n'),
      tokenBudget
    );
    return prefix === null ? null : render(prefix);
  }

  /**
   * Binary search over sentence boundaries. Estimates never drop as content
   * grows, so the fitting prefixes form a contiguous range starting at zero
   * sentences. Returns null when even the empty prefix does not fit.
   */
  private longestFittingPrefix(
    text: string,
    render: (content: string) => string,
    tokenBudget: number
  ): string | null {
    const spans = sentenceSpans(text);
    const prefixAt = (count: number) => (count === 0 ? '' : text.slice(0, spans[count - 1].end).trimEnd());
    const fitsAt = (count: number) => this.countTokens(render(prefixAt(count))) <= tokenBudget;

    if (!fitsAt(0)) return null;
    let low = 0;
    let high = spans.length;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (fitsAt(mid)) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return prefixAt(low);
  }
}
