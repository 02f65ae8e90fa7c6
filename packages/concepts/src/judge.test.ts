import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PipelineError, brandBriefSchema, readJsonArtifact, type Logger, type TextOracle } from '@adreel/shared';
import { ConceptJudge, buildJudgePrompt, selectBestConcept } from './judge.js';
import { evaluationSetSchema, type Concept, type ConceptEvaluation } from './schemas.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

const brief = brandBriefSchema.parse({
  brandName: 'Lumen Tea',
  productDescription: 'Sparkling green tea in a glass bottle',
});

const concepts: Concept[] = [
  { ad_style: 'Humor - Playful', model: 'test/writer', text: 'SCENE 1: A kettle sings.' },
  { ad_style: 'Adventure - Epic', model: 'test/writer', text: 'SCENE 1: A bottle crosses the sea.' },
  { ad_style: 'Reversal - Clever', model: 'test/writer', text: 'SCENE 1: The tea drinks you.' },
];

function evaluation(style: string, score: number, model = 'test/writer'): ConceptEvaluation {
  return { ad_style: style, model, score, explanation: '', strengths: [], weaknesses: [] };
}

describe('buildJudgePrompt', () => {
  it('states the style, its description and the concept', () => {
    const prompt = buildJudgePrompt(concepts[1], brief);
    expect(prompt).toContain('**AD STYLE**: Adventure - Epic');
    expect(prompt).toContain('**STYLE DESCRIPTION**: Grand scale, cinematic, larger-than-life adventure.');
    expect(prompt).toContain('SCENE 1: A bottle crosses the sea.');
    expect(prompt).toContain('5 coherent and connected scenes');
  });
});

describe('selectBestConcept', () => {
  it('picks the highest score', () => {
    expect(selectBestConcept([evaluation('a', 71), evaluation('b', 88), evaluation('c', 80)]).ad_style).toBe('b');
  });

  it('keeps the earlier evaluation on a tie', () => {
    expect(selectBestConcept([evaluation('a', 90), evaluation('b', 90)]).ad_style).toBe('a');
  });

  it('fails fatally with nothing to choose from', () => {
    expect(() => selectBestConcept([])).toThrow(PipelineError);
    expect(() => selectBestConcept([])).toThrow('No concept evaluations to choose from');
  });
});

describe('ConceptJudge', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'judge-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('scores concepts in brief order and reports unparseable verdicts', async () => {
    const oracle: TextOracle = {
      modelId: 'test/judge',
      complete: vi.fn((prompt: string) => {
        if (prompt.includes('**AD STYLE**: Humor - Playful')) {
          return Promise.resolve('```json\n{"score": "72", "explanation": "Fun.", "strengths": ["light"],}\n```');
        }
        if (prompt.includes('**AD STYLE**: Adventure - Epic')) {
          return Promise.resolve('I cannot score this.');
        }
        return Promise.resolve('{"score": 91, "explanation": "Sharp twist.", "weaknesses": ["abstract"]}');
      }),
    };
    const debugDir = join(dir, 'debug');
    const judge = new ConceptJudge(oracle, mockLogger, { concurrency: 3, debugDir });

    const { evaluations, evaluationsPath, report } = await judge.judge(concepts, brief, dir);

    expect(evaluations.judge_model).toBe('test/judge');
    expect(evaluations.evaluations).toEqual([
      {
        ad_style: 'Humor - Playful',
        model: 'test/writer',
        score: 72,
        explanation: 'Fun.',
        strengths: ['light'],
        weaknesses: [],
      },
      {
        ad_style: 'Reversal - Clever',
        model: 'test/writer',
        score: 91,
        explanation: 'Sharp twist.',
        strengths: [],
        weaknesses: ['abstract'],
      },
    ]);
    expect(report.stage).toBe('judge-concepts');
    expect(report.expected).toBe(3);
    expect(report.produced).toBe(2);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].key).toBe('Adventure - Epic [test/writer]');
    expect(report.failures[0].error).toMatch(/^Failed to parse judge Adventure - Epic \[test\/writer\] \(syntax\)/);

    const failedPath = join(debugDir, 'judge_adventure_epic_testwriter_failed_response.txt');
    expect(existsSync(failedPath)).toBe(true);
    expect(await readFile(failedPath, 'utf-8')).toContain('I cannot score this.');

    const onDisk = await readJsonArtifact(evaluationsPath, evaluationSetSchema);
    expect(selectBestConcept(onDisk.evaluations).ad_style).toBe('Reversal - Clever');
  });

  it('rejects scores outside 0-100', async () => {
    const oracle: TextOracle = { modelId: 'test/judge', complete: vi.fn().mockResolvedValue('{"score": 140}') };
    const judge = new ConceptJudge(oracle, mockLogger, { concurrency: 1, debugDir: join(dir, 'debug') });

    const { report } = await judge.judge([concepts[0]], brief, dir);

    expect(report.produced).toBe(0);
    expect(report.failures[0].error).toMatch(/^Failed to parse judge Humor - Playful \[test\/writer\] \(schema\)/);
  });

  it('judges the same style from two writers separately', async () => {
    const oracle: TextOracle = {
      modelId: 'test/judge',
      complete: vi.fn((prompt: string) =>
        Promise.resolve(prompt.includes('A kettle sings.') ? '{"score": 64}' : '{"score": 83}'),
      ),
    };
    const judge = new ConceptJudge(oracle, mockLogger, { concurrency: 2, debugDir: join(dir, 'debug') });
    const pair: Concept[] = [
      concepts[0],
      { ad_style: 'Humor - Playful', model: 'test/other', text: 'SCENE 1: A teapot tells a joke.' },
    ];

    const { evaluations, report } = await judge.judge(pair, brief, dir);

    expect(report).toEqual({ stage: 'judge-concepts', expected: 2, produced: 2, failures: [] });
    expect(evaluations.evaluations.map((e) => [e.model, e.score])).toEqual([
      ['test/writer', 64],
      ['test/other', 83],
    ]);
    expect(selectBestConcept(evaluations.evaluations)).toMatchObject({ ad_style: 'Humor - Playful', model: 'test/other' });
  });
});
