import { describe, it, expect } from 'vitest';
import { ContextAssembler, TRUNCATION_MARKER } from '../agents/context/ContextAssembler.js';
import type { NovelProject } from '../types/project.js';
import type { TokenEstimator } from '../utils/tokenCounter.js';
import { sentenceSpans } from '../utils/textUtils.js';
import { addChapter, addPlotPoint, createCharacterProfile, createProject } from '../utils/projectHelpers.js';

// One unit per code point keeps expected budgets easy to trace.
const charEstimator: TokenEstimator = {
  estimate: (text) => Array.from(text).length
};

function projectWithChapters(count: number): NovelProject {
  const project = createProject('星河');
  for (let n = 1; n <= count; n++) {
    addChapter(project, { title: `标题${n}`, content: `内容${n}。`, summary: `摘要${n}` });
  }
  return project;
}

const SAMPLE_CONTENT = '一二三。四五六。七八九。';
// three sentences of 11 units each
const LONG_CONTENT = '甲乙丙丁戊己庚辛壬癸。子丑寅卯辰巳午未申酉。天地玄黄宇宙洪荒日月。';

describe('ContextAssembler.buildWritingContext', () => {
  it('assembles base info, history and recent chapters for a 12-chapter project', () => {
    const assembler = new ContextAssembler();
    const context = assembler.buildWritingContext(projectWithChapters(12), 2, 5);

    const history = [6, 7, 8, 9, 10].map((n) => `第${n}章《标题${n}》：摘要${n}`).join('\n');
    expect(context).toBe(
      '【小说基本信息】\n标题：星河\n\n' +
      `【前情提要】\n${history}\n\n` +
      '【最近章节】\n## 第11章：标题11\n内容11。\n\n## 第12章：标题12\n内容12。'
    );
  });

  it('uses the configured counts by default', () => {
    const assembler = new ContextAssembler({ recentChapterCount: 1, summaryChapterCount: 1 });
    expect(assembler.buildWritingContext(projectWithChapters(3))).toBe(
      '【小说基本信息】\n标题：星河\n\n【前情提要】\n第2章《标题2》：摘要2\n\n【最近章节】\n## 第3章：标题3\n内容3。'
    );
  });

  it('treats counts of zero or less as no chapters', () => {
    const assembler = new ContextAssembler();
    const project = projectWithChapters(12);
    expect(assembler.buildWritingContext(project, 0, 0)).toBe('【小说基本信息】\n标题：星河');
    expect(assembler.buildWritingContext(project, -1, -3)).toBe('【小说基本信息】\n标题：星河');

    const historyOnly = assembler.buildWritingContext(project, 0, 2);
    expect(historyOnly).toBe(
      '【小说基本信息】\n标题：星河\n\n【前情提要】\n第11章《标题11》：摘要11\n第12章《标题12》：摘要12'
    );
  });

  it('has no history when every chapter is recent', () => {
    const assembler = new ContextAssembler();
    expect(assembler.buildWritingContext(projectWithChapters(1))).toBe(
      '【小说基本信息】\n标题：星河\n\n【最近章节】\n## 第1章：标题1\n内容1。'
    );
  });

  it('falls back to the rule summary for chapters without one', () => {
    const project = createProject('星河');
    addChapter(project, { title: '序', content: '甲。乙。丙。丁。戊。' });
    addChapter(project, { title: '终', content: '结束。' });

    const context = new ContextAssembler().buildWritingContext(project, 1, 5);
    expect(context).toContain('【前情提要】\n第1章《序》：甲。乙。丙。戊\n\n');
  });
});

describe('ContextAssembler.buildBaseInfo', () => {
  const project = createProject('星河', {
    genre: '科幻',
    writingStyle: '冷峻',
    characters: [
      createCharacterProfile('林', { description: '舰长', personality: '沉稳' }),
      createCharacterProfile('张', { description: '工程师' })
    ]
  });
  for (const point of ['p1', 'p2', 'p3', 'p4', 'p5', 'p6']) addPlotPoint(project, point);

  it('lists characters and the last five plot points', () => {
    expect(new ContextAssembler().buildBaseInfo(project)).toBe(
      [
        '【小说基本信息】',
        '标题：星河',
        '类型：科幻',
        '写作风格：冷峻',
        '',
        '【角色设定】',
        '- 林：舰长',
        '  性格：沉稳',
        '- 张：工程师',
        '',
        '【重要情节】',
        '1. p2',
        '2. p3',
        '3. p4',
        '4. p5',
        '5. p6'
      ].join('\n')
    );
  });

  it('condenses the roster and drops plot points when simplified', () => {
    expect(new ContextAssembler().buildBaseInfo(project, true)).toBe(
      '【小说基本信息】\n标题：星河\n类型：科幻\n写作风格：冷峻\n主要角色：林（舰长）、张（工程师）'
    );
  });

  it('honours the plot point limit', () => {
    const info = new ContextAssembler({ plotPointLimit: 2 }).buildBaseInfo(project);
    expect(info.endsWith('【重要情节】\n1. p5\n2. p6')).toBe(true);
  });
});

describe('ContextAssembler.buildHistorySummary', () => {
  function lettered(): NovelProject {
    const project = createProject('t');
    for (const title of ['A', 'B', 'C', 'D']) {
      addChapter(project, { title, content: '正文。', summary: 'sss' });
    }
    return project;
  }

  it('keeps the newest lines when the budget runs out', () => {
    const assembler = new ContextAssembler({ estimator: charEstimator });
    // each line is 10 units; two lines joined are 21
    expect(assembler.buildHistorySummary(lettered(), 1, 5, 20)).toBe('第3章《C》：sss');
    expect(assembler.buildHistorySummary(lettered(), 1, 5, 21)).toBe('第2章《B》：sss\n第3章《C》：sss');
  });

  it('returns nothing when the newest line does not fit', () => {
    const assembler = new ContextAssembler({ estimator: charEstimator });
    expect(assembler.buildHistorySummary(lettered(), 1, 5, 9)).toBe('');
  });
});

describe('ContextAssembler.buildRecentContent', () => {
  const assembler = new ContextAssembler({ estimator: charEstimator });

  function sampleProject(titles: string[], content: string = LONG_CONTENT): NovelProject {
    const project = createProject('t');
    for (const title of titles) addChapter(project, { title, content });
    return project;
  }

  it('includes a chapter whole when it fits', () => {
    // heading (8) + newline + content (12)
    expect(assembler.buildRecentContent(sampleProject(['T'], SAMPLE_CONTENT), 1, 21)).toBe(`## 第1章：T\n${SAMPLE_CONTENT}`);
    expect(assembler.buildRecentContent(sampleProject(['T']), 1, 42)).toBe(`## 第1章：T\n${LONG_CONTENT}`);
  });

  it('cuts an oversized chapter at a sentence boundary', () => {
    // heading, newline and marker take 20 units; each sentence 11
    expect(assembler.buildRecentContent(sampleProject(['T']), 1, 41)).toBe(
      '## 第1章：T\n甲乙丙丁戊己庚辛壬癸。\n[内容过长，已截断]'
    );
    expect(assembler.buildRecentContent(sampleProject(['T']), 1, 30)).toBe('## 第1章：T\n[内容过长，已截断]');
  });

  it('skips a chapter when not even heading and marker fit', () => {
    expect(assembler.buildRecentContent(sampleProject(['T']), 1, 18)).toBe('');
  });

  it('truncates the first chapter that does not fit and stops there', () => {
    const project = sampleProject(['T', 'U', 'V']);
    const first = `## 第1章：T\n${LONG_CONTENT}`;
    const second = `## 第2章：U\n${LONG_CONTENT}`;

    expect(assembler.buildRecentContent(project, 3, 120)).toBe(
      `${first}\n\n${second}\n\n## 第3章：V\n甲乙丙丁戊己庚辛壬癸。\n[内容过长，已截断]`
    );
    expect(assembler.buildRecentContent(project, 3, 75)).toBe(
      `${first}\n\n## 第2章：U\n甲乙丙丁戊己庚辛壬癸。\n[内容过长，已截断]`
    );
    expect(assembler.buildRecentContent(project, 3, 70)).toBe(`${first}\n\n## 第2章：U\n[内容过长，已截断]`);
    expect(assembler.buildRecentContent(project, 3, 62)).toBe(first);
  });

  it('only ever truncates to whole sentences', () => {
    const content = 'The gate opened. 风从北方吹来！他没有回头。Nobody spoke?\n夜深了。';
    const project = createProject('t');
    addChapter(project, { title: '夜', content });
    const heading = '## 第1章：夜';
    const boundaries = sentenceSpans(content).map((span) => content.slice(0, span.end).trimEnd());
    const heuristic = new ContextAssembler();

    for (let budget = 0; budget <= heuristic.countTokens(`${heading}\n${content}`); budget++) {
      const recent = heuristic.buildRecentContent(project, 1, budget);
      expect(heuristic.countTokens(recent)).toBeLessThanOrEqual(budget);
      if (!recent.endsWith(TRUNCATION_MARKER)) continue;

      const body = recent.slice(heading.length, -TRUNCATION_MARKER.length);
      if (body === '') continue;
      expect(body.startsWith('\n')).toBe(true);
      expect(boundaries).toContain(body.slice(1));
    }
  });
});

describe('ContextAssembler budgets', () => {
  function longProject(): NovelProject {
    const project = createProject('星河', { genre: '科幻' });
    for (let n = 1; n <= 12; n++) {
      addChapter(project, {
        title: `第${n}夜`,
        content: `舰队在第${n}个星系停泊。警报响起！Captain Lin ordered silence. 所有人屏住呼吸。`,
        summary: n % 3 === 0 ? '' : `舰队抵达第${n}个星系。`
      });
    }
    return project;
  }

  it('keeps history and recent layers within their sub-budgets', () => {
    for (const maxTokens of [10, 40, 80, 150, 300, 1000, 20000]) {
      const assembler = new ContextAssembler({ maxTokens });
      for (const [recent, summary] of [[2, 5], [4, 8], [1, 0], [12, 12]]) {
        const usage = assembler.analyzeContextUsage(longProject(), recent, summary);
        expect(usage.breakdown.historySummary).toBeLessThanOrEqual(usage.budgets.historySummary);
        expect(usage.breakdown.recentContent).toBeLessThanOrEqual(usage.budgets.recentContent);
        expect(usage.budgets.historySummary).toBe(Math.floor(maxTokens * 0.2));
      }
    }
  });
});

describe('ContextAssembler.analyzeContextUsage', () => {
  it('reports tokens per layer', () => {
    const project = createProject('星河');
    addChapter(project, { title: 'T', content: SAMPLE_CONTENT });
    const assembler = new ContextAssembler({ maxTokens: 100, estimator: charEstimator });

    expect(assembler.analyzeContextUsage(project)).toEqual({
      maxTokens: 100,
      totalUsed: 35,
      remaining: 65,
      usagePercent: 35,
      breakdown: { baseInfo: 14, historySummary: 0, recentContent: 21 },
      budgets: { historySummary: 20, recentContent: 86 }
    });
  });

  it('rounds the usage percentage to two decimals', () => {
    const project = createProject('星河');
    const usage = new ContextAssembler({ maxTokens: 3000, estimator: charEstimator }).analyzeContextUsage(project);
    // 14 / 3000 = 0.4666...%
    expect(usage.usagePercent).toBe(0.47);
  });
});

describe('ContextAssembler summaries', () => {
  const assembler = new ContextAssembler();
  const chapter = (content: string) => {
    const project = createProject('t');
    return addChapter(project, { title: 't', content });
  };

  it('takes the first three sentences and the last one', () => {
    expect(assembler.generateSimpleSummary(chapter('甲。乙。丙。丁。戊。'))).toBe('甲。乙。丙。戊');
    expect(assembler.generateSimpleSummary(chapter('一。二。'))).toBe('一。二');
  });

  it('handles empty chapters', () => {
    expect(assembler.generateSimpleSummary(chapter(''))).toBe('本章暂无内容');
  });

  it('caps the summary length', () => {
    expect(assembler.generateSimpleSummary(chapter(`${'a'.repeat(300)}。`))).toBe(`${'a'.repeat(200)}...`);
    expect(assembler.generateSimpleSummary(chapter('一二三四五。'), 3)).toBe('一二三...');
  });

  it('appends keywords to the chapter summary', () => {
    expect(assembler.generateChapterSummary(chapter('青云剑法，青云剑法。'))).toBe(
      '青云剑法，青云剑法\n关键词：青云剑法、青云剑、青云、剑法'
    );
    expect(assembler.generateChapterSummary(chapter('Hello there.'))).toBe('Hello there');
  });
});

describe('ContextAssembler.buildImprovementContext', () => {
  it('describes the novel and the chapter to improve', () => {
    const project = createProject('星河', {
      genre: '科幻',
      characters: [createCharacterProfile('林'), createCharacterProfile('张')]
    });
    const chapter = addChapter(project, { title: '风暴', content: '雨下了。' });

    expect(new ContextAssembler().buildImprovementContext(chapter, project, '节奏')).toBe(
      '【小说信息】\n标题：星河\n类型：科幻\n主要角色：林、张\n\n【待改进章节】\n## 风暴\n雨下了。\n\n【改进重点】\n节奏'
    );
    expect(new ContextAssembler().buildImprovementContext(chapter, project)).toBe(
      '【小说信息】\n标题：星河\n类型：科幻\n主要角色：林、张\n\n【待改进章节】\n## 风暴\n雨下了。'
    );
  });
});

describe('ContextAssembler.getContextPreview', () => {
  it('returns short contexts unchanged and cuts long ones', () => {
    const project = createProject('星河');
    addChapter(project, { title: 'T', content: SAMPLE_CONTENT });
    const assembler = new ContextAssembler();

    const full = assembler.buildWritingContext(project);
    expect(full.length).toBe(44);
    expect(assembler.getContextPreview(project)).toBe(full);
    expect(assembler.getContextPreview(project, 10)).toBe('【小说基本信息】\n标\n\n... (还有34个字符) ...');
  });
});

describe('ContextAssembler character state', () => {
  function trackedProject(): NovelProject {
    const project = createProject('星河', {
      characters: [
        createCharacterProfile('林', { personality: '沉稳' }),
        createCharacterProfile('张')
      ]
    });
    addChapter(project, { title: '一', content: '开始。' });
    const store = project.characterState;
    store.addExperience('林', { chapterNumber: 2, eventType: 'conflict', description: 'B事件' });
    store.addExperience('林', { chapterNumber: 1, eventType: 'achievement', description: '击退海盗' });
    store.addExperience('张', { chapterNumber: 1, eventType: 'growth', description: 'C事件' });
    store.addRelationship('林', '张', 'friend', { intimacyLevel: 70 });
    store.setPersonalityTraits('林', [{ traitName: '勇敢', intensity: 60 }]);
    return project;
  }

  it('renders tracked state per rostered character', () => {
    expect(new ContextAssembler().buildCharacterStateContext(trackedProject())).toBe(
      '【林】\n性格：沉稳\n最近经历：击退海盗；B事件\n关系：张(friend,亲密度70)\n特质：勇敢(60)\n\n【张】\n最近经历：C事件'
    );
  });

  it('lists the first event of each chapter for every character', () => {
    expect(new ContextAssembler().buildHappenedEventsSummary(trackedProject())).toBe(
      '第1章：击退海盗\n第2章：B事件\n第1章：C事件'
    );
  });

  it('keeps only the last ten event lines', () => {
    const project = createProject('长篇', {
      characters: [createCharacterProfile('林'), createCharacterProfile('张')]
    });
    addChapter(project, { title: '一', content: '开始。' });
    for (let chapter = 1; chapter <= 6; chapter++) {
      project.characterState.addExperience('林', { chapterNumber: chapter, eventType: 'growth', description: `林${chapter}` });
      project.characterState.addExperience('林', { chapterNumber: chapter, eventType: 'conflict', description: `林${chapter}次要` });
      project.characterState.addExperience('张', { chapterNumber: chapter, eventType: 'growth', description: `张${chapter}` });
    }

    const lines = new ContextAssembler().buildHappenedEventsSummary(project).split('\n');

    expect(lines).toEqual([
      '第3章：林3',
      '第4章：林4',
      '第5章：林5',
      '第6章：林6',
      '第1章：张1',
      '第2章：张2',
      '第3章：张3',
      '第4章：张4',
      '第5章：张5',
      '第6章：张6'
    ]);
  });

  it('is empty without chapters', () => {
    const project = createProject('空', { characters: [createCharacterProfile('林')] });
    project.characterState.addExperience('林', { chapterNumber: 1, eventType: 'growth', description: 'x' });
    expect(new ContextAssembler().buildHappenedEventsSummary(project)).toBe('');
  });
});

describe('ContextAssembler.truncateToTokenLimit', () => {
  const assembler = new ContextAssembler({ estimator: charEstimator });

  it('returns fitting text unchanged', () => {
    expect(assembler.truncateToTokenLimit('一二。三四。', 6)).toBe('一二。三四。');
  });

  it('keeps whole sentences and appends the marker', () => {
    expect(assembler.truncateToTokenLimit('一二。三四。', 14)).toBe('一二。\n[内容过长，已截断]');
    expect(assembler.truncateToTokenLimit('一二。三四。', 5)).toBe('');
  });
});
