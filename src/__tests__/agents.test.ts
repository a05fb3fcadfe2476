import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigManager, type Config } from '../configManager.js';
import { chatCompletion } from '../llm/client.js';
import { ContextAssembler } from '../agents/context/ContextAssembler.js';
import { WriterAgent } from '../agents/WriterAgent.js';
import { SummarizeAgent } from '../agents/SummarizeAgent.js';
import { AnalysisAgent } from '../agents/AnalysisAgent.js';
import { emptyAnalysis } from '../types/analysis.js';
import type { NovelProject } from '../types/project.js';
import { addChapter, addChapterOutline, createCharacterProfile, createProject } from '../utils/projectHelpers.js';

vi.mock('../llm/client.js', () => ({
  chatCompletion: vi.fn()
}));

const chatMock = vi.mocked(chatCompletion);

const config: Config = {
  defaultProfile: 'main',
  profiles: {
    main: { apiKey: 'test-key', baseURL: 'http://localhost:1', model: 'main-model' }
  },
  agents: {
    analysis: { expectsJson: true }
  },
  features: { jsonValidationMaxRetries: 1 }
};

function sampleProject(): NovelProject {
  const project = createProject('星河', {
    genre: '科幻',
    characters: [createCharacterProfile('李明', { description: '舰长' })]
  });
  addChapter(project, { title: '启程', content: '舰队离开了港口。李明站在舰桥上。' });
  addChapter(project, { title: '风暴', content: '离子风暴来袭。' });
  return project;
}

function lastCall() {
  const call = chatMock.mock.calls[chatMock.mock.calls.length - 1];
  if (!call) throw new Error('chatCompletion was not called');
  const [profile, messages, options] = call;
  return { profile, messages, options };
}

describe('agents', () => {
  let tmpDir: string;
  let manager: ConfigManager;

  beforeEach(() => {
    chatMock.mockReset();
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chapterwise-agents-'));
    const configPath = path.join(tmpDir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify(config));
    manager = new ConfigManager(configPath);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('WriterAgent', () => {
    it('writes the next chapter from the assembled context', async () => {
      chatMock.mockResolvedValueOnce('```markdown\n第三章 归途\n正文\n```');
      const assembler = new ContextAssembler();
      const project = sampleProject();

      const content = await new WriterAgent(manager, assembler).generateChapter(project);

      expect(content).toBe('第三章 归途\n正文');
      const { profile, messages, options } = lastCall();
      expect(profile.model).toBe('main-model');
      expect(profile.format).toBeUndefined();
      expect(options).toEqual({ fallbackProfiles: [] });
      expect(messages[1]).toEqual({ role: 'user', content: '请创作第3章。' });
      expect(messages[0]?.role).toBe('system');
      expect(messages[0]?.content).toContain('请根据下面的资料创作第3章。');
      expect(messages[0]?.content).toContain(assembler.buildWritingContext(project));
    });

    it('includes the planned outline and author instructions', async () => {
      chatMock.mockResolvedValueOnce('正文');
      const project = sampleProject();
      project.chapterOutlines.push({
        chapterNumber: 3,
        title: '归途',
        summary: '',
        keyEvents: ['相遇', '离别'],
        involvedCharacters: [],
        targetLength: 3000,
        status: 'planned',
        notes: ''
      });

      await new WriterAgent(manager).generateChapter(project, { instructions: '写一场雨夜' });

      const { messages } = lastCall();
      expect(messages[0]?.content).toContain('【本章大纲】\n标题：归途\n关键事件：相遇；离别\n');
      expect(messages[0]?.content).toContain('- 篇幅约3000字。');
      expect(messages[1]?.content).toBe('写一场雨夜');
      expect(project.chapterOutlines[0]?.status).toBe('generated');
    });

    it('leaves the outline planned when generation fails', async () => {
      chatMock.mockRejectedValueOnce(new Error('offline'));
      const project = sampleProject();
      const outline = addChapterOutline(project, { chapterNumber: 3, title: '归途' });

      await expect(new WriterAgent(manager).generateChapter(project)).rejects.toThrow('offline');
      expect(outline.status).toBe('planned');
    });

    it('ignores an outline that was already generated', async () => {
      chatMock.mockResolvedValueOnce('正文');
      const project = sampleProject();
      addChapterOutline(project, { chapterNumber: 3, title: '归途', status: 'generated' });

      await new WriterAgent(manager).generateChapter(project);

      expect(lastCall().messages[0]?.content).not.toContain('【本章大纲】');
    });

    it('propagates model failures', async () => {
      chatMock.mockRejectedValueOnce(new Error('offline'));
      await expect(new WriterAgent(manager).generateChapter(sampleProject())).rejects.toThrow('offline');
    });

    it('rejects an empty reply', async () => {
      chatMock.mockResolvedValueOnce('  ');
      await expect(new WriterAgent(manager).generateChapter(createProject('空'))).rejects.toThrow(
        'Writer returned no content for chapter 1'
      );
    });

    it('asks for a style pass when improving without a focus area', async () => {
      chatMock.mockResolvedValueOnce('改进后的正文');
      const project = sampleProject();
      const chapter = project.chapters[0];
      if (!chapter) throw new Error('missing chapter');

      await expect(new WriterAgent(manager).improveChapter(chapter, project)).resolves.toBe('改进后的正文');
      expect(lastCall().messages[1]?.content).toBe('请在不改变情节的前提下改进这一章的文笔。');
    });
  });

  describe('SummarizeAgent', () => {
    const chapter = {
      chapterNumber: 4,
      title: '归途',
      content: '甲。乙。丙。丁。戊。',
      summary: '',
      wordCount: 10,
      createdAt: 'c',
      updatedAt: 'u'
    };

    it('strips reasoning blocks from the summary', async () => {
      chatMock.mockResolvedValueOnce('<think>先想想</think>\n本章讲述了归途。');
      await expect(new SummarizeAgent(manager).summarizeChapter(chapter)).resolves.toBe('本章讲述了归途。');
      expect(lastCall().messages[1]?.content).toBe('甲。乙。丙。丁。戊。');
    });

    it('falls back to the rule summary when the model fails', async () => {
      chatMock.mockRejectedValueOnce(new Error('offline'));
      await expect(new SummarizeAgent(manager).summarizeChapter(chapter)).resolves.toBe('甲。乙。丙。戊');
    });

    it('does not call the model for an empty chapter', async () => {
      await expect(new SummarizeAgent(manager).summarizeChapter({ ...chapter, content: ' ' })).resolves.toBe('本章暂无内容');
      expect(chatMock).not.toHaveBeenCalled();
    });
  });

  describe('AnalysisAgent', () => {
    it('requests JSON and parses the analysis', async () => {
      chatMock.mockResolvedValueOnce('{"experiences":[{"character":"李明","event_type":"conflict","description":"遭遇风暴"}]}');
      const project = sampleProject();
      const chapter = project.chapters[1];
      if (!chapter) throw new Error('missing chapter');

      const analysis = await new AnalysisAgent(manager).analyzeChapter(project, chapter);

      expect(analysis).toEqual({
        experiences: [{ character: '李明', event_type: 'conflict', description: '遭遇风暴' }],
        relationships: [],
        personality_changes: []
      });
      const { profile, messages } = lastCall();
      expect(profile.format).toBe('json');
      expect(messages[1]?.content).toBe('离子风暴来袭。');
    });

    it('returns an empty analysis when the model fails', async () => {
      chatMock.mockRejectedValueOnce(new Error('offline'));
      const project = sampleProject();
      const chapter = project.chapters[0];
      if (!chapter) throw new Error('missing chapter');

      await expect(new AnalysisAgent(manager).analyzeChapter(project, chapter)).resolves.toEqual(emptyAnalysis());
    });

    it('retries alias detection with the validation errors', async () => {
      chatMock
        .mockResolvedValueOnce('{"aliases": "none"}')
        .mockResolvedValueOnce('{"aliases": [{"character": "李明", "alias": "老李"}]}');

      const aliases = await new AnalysisAgent(manager).identifyAliases('老李回来了。', ['李明']);

      expect(aliases).toEqual([{ character: '李明', alias: '老李' }]);
      expect(chatMock).toHaveBeenCalledTimes(2);
      expect(lastCall().messages[0]?.content).toContain('[VALIDATION RETRY]');
    });

    it('gives up on aliases once the retries are spent', async () => {
      chatMock.mockResolvedValue('{"aliases": "none"}');
      await expect(new AnalysisAgent(manager).identifyAliases('老李回来了。', ['李明'])).resolves.toEqual([]);
      expect(chatMock).toHaveBeenCalledTimes(2);
    });

    it('skips the model when there is nothing to match', async () => {
      const agent = new AnalysisAgent(manager);
      await expect(agent.identifyAliases('老李回来了。', [])).resolves.toEqual([]);
      await expect(agent.identifyAliases('  ', ['李明'])).resolves.toEqual([]);
      expect(chatMock).not.toHaveBeenCalled();
    });
  });
});
