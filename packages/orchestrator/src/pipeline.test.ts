import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { conceptSetSchema } from '@adreel/concepts';
import { MockImageProvider, MockVideoProvider, type CommandRunner } from '@adreel/media';
import {
  ConfigError,
  MissingInputError,
  brandBriefSchema,
  loadConfig,
  readJsonArtifact,
  universeRecordSchema,
  writeTextArtifact,
  type CompletionOptions,
  type Logger,
  type TextOracle,
} from '@adreel/shared';
import { scriptLayout } from './layout.js';
import { Pipeline, type PipelineProviders } from './pipeline.js';

/** End-to-end pipeline test with in-process providers and a fake ffmpeg. */

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

const brief = brandBriefSchema.parse({
  brandName: 'Lumen Tea',
  productDescription: 'Sparkling green tea in a glass bottle',
  adStyles: ['Humor - Playful', 'Adventure - Epic'],
  scenesCount: 2,
  totalDurationSec: 12,
  style: 'warm film grain',
});

const UNIVERSE = JSON.stringify({
  characters: [{ name: 'Mia', scenes_used: [1, 2], canonical_state: 'Girl in a yellow raincoat', image_generation_prompt: 'Portrait of Mia' }],
  universe: {
    props: [{ name: 'Tea Bottle', scenes_used: [2], canonical_state: 'Green glass', image_generation_prompt: 'Bottle' }],
    locations: [{ name: 'Harbor', scenes_used: [1, 2], canonical_state: 'Stone pier at dawn', image_generation_prompt: 'Harbor at dawn' }],
  },
});

function planScene(n: number, firstFrame: string, elements: string[]) {
  return {
    scene_number: n,
    duration_seconds: 6,
    video_summary: `Scene ${n}`,
    first_frame_image_prompt: firstFrame,
    video_prompt: `Action ${n}`,
    elements_used: elements,
  };
}

const SCENE_PLAN = JSON.stringify({
  scenes: [
    planScene(1, 'Mia pours tea at dawn on the pier', ['Mia', 'Harbor']),
    planScene(2, 'Mia raises the bottle', ['Mia']),
  ],
});

/** Answers each prompt the way the matching stage expects. */
function scriptedOracle(): TextOracle {
  return {
    modelId: 'test/oracle',
    complete: vi.fn((prompt: string) => {
      if (prompt.includes('Write ONE ad concept')) {
        return Promise.resolve('TITLE: Morning\nSCENE 1: Mia pours tea.\nSCENE 2: Mia raises the bottle.');
      }
      if (prompt.includes('Expand the high-level ad concept')) {
        return Promise.resolve('TITLE: Garden Line\nSCENE 1: Mia boards a grey train.\nSCENE 2: The carriage blooms.');
      }
      if (prompt.includes('expert advertising judge')) {
        const score = prompt.includes('**AD STYLE**: Adventure - Epic') ? 88 : 70;
        return Promise.resolve(JSON.stringify({ score, explanation: 'ok', strengths: [], weaknesses: ['pace'] }));
      }
      if (prompt.includes('Revise this')) {
        return Promise.resolve('SCENE 1: Mia on the pier.\nSCENE 2: Mia and the bottle.');
      }
      if (prompt.includes('video production designer')) return Promise.resolve(UNIVERSE);
      if (prompt.includes('commercial director')) return Promise.resolve(SCENE_PLAN);
      return Promise.reject(new Error(`Unexpected prompt: ${prompt.slice(0, 40)}`));
    }),
  };
}

function fakeFfmpeg() {
  const calls: { command: string; args: readonly string[] }[] = [];
  const runner: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    return command === 'ffmpeg'
      ? { exitCode: 0, stdout: '', stderr: '' }
      : { exitCode: 0, stdout: '12.0\n', stderr: '' };
  };
  return { runner, calls };
}

describe('Pipeline', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipeline-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(oracle: TextOracle = scriptedOracle(), conceptWriters: readonly TextOracle[] = [oracle]) {
    const config = loadConfig({
      IMAGE_PROVIDER: 'mock',
      VIDEO_PROVIDER: 'mock',
      VIDEO_MODEL: 'google/veo-3-fast',
      OUTPUT_DIR: dir,
    });
    const images = new MockImageProvider();
    const video = new MockVideoProvider('google/veo-3-fast');
    const providers: PipelineProviders = {
      writer: () => oracle,
      conceptWriters: () => conceptWriters,
      judge: () => oracle,
      images: () => images,
      video: () => video,
    };
    const ffmpeg = fakeFfmpeg();
    const pipeline = new Pipeline(config, providers, mockLogger, { runner: ffmpeg.runner });
    return { pipeline, oracle, images, video, ffmpeg };
  }

  it('runs every stage from brief to final video', async () => {
    const { pipeline, oracle, images, video, ffmpeg } = setup();

    const result = await pipeline.run(brief, { id: 'lumen' });
    const layout = scriptLayout(dir, 'lumen');

    expect(result.scriptDir).toBe(join(dir, 'lumen'));
    expect(result.stages.map((s) => [s.stage, s.produced, s.expected])).toEqual([
      ['generate-concepts', 2, 2],
      ['judge-concepts', 2, 2],
      ['revise-script', 1, 1],
      ['extract-universe', 1, 1],
      ['generate-references', 2, 2],
      ['plan-scenes', 1, 1],
      ['generate-first-frames', 2, 2],
      ['generate-clips', 2, 2],
      ['merge-clips', 2, 2],
    ]);
    expect(result.finalVideo).toBe(join(dir, 'lumen', 'lumen_final_veo3.mp4'));

    // The higher-scoring style is the one revised
    const revisionPrompt = vi.mocked(oracle.complete).mock.calls.find(([p]) => p.includes('Revise this'))?.[0];
    expect(revisionPrompt).toContain('- Ad style: Adventure - Epic');
    expect(await readFile(layout.script, 'utf-8')).toBe('SCENE 1: Mia on the pier.\nSCENE 2: Mia and the bottle.\n');

    // Single-scene entities are filtered before reference images
    const universe = await readJsonArtifact(layout.universe, universeRecordSchema);
    expect(universe.universe.props).toEqual([]);

    // First frames carry the canonical references, characters first
    const frameRequest = images.requests.find((r) => r.prompt.includes('Mia pours tea at dawn on the pier'));
    expect(frameRequest?.referenceImages).toEqual([
      join(layout.referencesDir, 'characters', 'mia', 'mia_canonical.png'),
      join(layout.referencesDir, 'locations', 'harbor', 'harbor_canonical.png'),
    ]);

    // Clips animate the generated first frames
    expect(video.requests.map((r) => r.firstFrame)).toEqual(
      expect.arrayContaining([
        join(layout.framesDir, 'lumen_p1_first_frame.png'),
        join(layout.framesDir, 'lumen_p2_first_frame.png'),
      ]),
    );

    const concat = ffmpeg.calls.find((c) => c.command === 'ffmpeg');
    expect(concat?.args[concat.args.length - 1]).toBe(result.finalVideo);
  });

  it('reruns a single stage from artifacts on disk', async () => {
    const { pipeline, ffmpeg } = setup();
    const layout = scriptLayout(dir, 'partial');

    await writeTextArtifact(layout.scenePlan, SCENE_PLAN);
    await mkdir(layout.clipsDir, { recursive: true });
    await writeFile(join(layout.clipsDir, 'partial_p1_veo3.mp4'), 'clip');

    const report = await pipeline.runStage('merge-clips', brief, 'partial');

    expect(report).toEqual({
      stage: 'merge-clips',
      expected: 2,
      produced: 1,
      failures: [{ key: '2', error: 'Clip not found' }],
    });
    expect(ffmpeg.calls.map((c) => c.command)).toEqual(['ffmpeg', 'ffprobe']);
  });

  it('fails fast when a stage input is missing', async () => {
    const { pipeline } = setup();
    await expect(pipeline.run(brief, { id: 'empty', from: 'plan-scenes' })).rejects.toThrow(MissingInputError);
  });

  it('requires an id to resume mid-pipeline', async () => {
    const { pipeline } = setup();
    await expect(pipeline.run(brief, { from: 'judge-concepts' })).rejects.toThrow(ConfigError);
  });

  it('stops when no concept could be judged', async () => {
    const oracle: TextOracle = { modelId: 'test/oracle', complete: vi.fn().mockRejectedValue(new Error('overloaded')) };
    const { pipeline } = setup(oracle);

    await expect(pipeline.run(brief, { id: 'down', to: 'revise-script' })).rejects.toThrow(
      'No concept evaluations to choose from',
    );
    expect(oracle.complete).toHaveBeenCalledTimes(2);
  });

  it('drafts each style with every concept writer and revises the best pair', async () => {
    const scripted = scriptedOracle();
    const oracle: TextOracle = {
      modelId: 'test/oracle',
      complete: vi.fn((prompt: string, options?: CompletionOptions) =>
        prompt.includes('expert advertising judge') && prompt.includes('SCENE 1: Mia dives.')
          ? Promise.resolve('{"score": 95}')
          : scripted.complete(prompt, options),
      ),
    };
    const second: TextOracle = {
      modelId: 'test/second',
      complete: vi.fn().mockResolvedValue('TITLE: Deep\nSCENE 1: Mia dives.\nSCENE 2: Mia surfaces.'),
    };
    const { pipeline } = setup(oracle, [oracle, second]);

    const result = await pipeline.run(brief, { id: 'fanout', to: 'revise-script' });

    expect(result.stages.map((s) => [s.stage, s.produced, s.expected])).toEqual([
      ['generate-concepts', 4, 4],
      ['judge-concepts', 4, 4],
      ['revise-script', 1, 1],
    ]);
    expect(second.complete).toHaveBeenCalledTimes(2);

    const revisionPrompt = vi.mocked(oracle.complete).mock.calls.find(([p]) => p.includes('Revise this'))?.[0];
    expect(revisionPrompt).toContain('- Ad style: Humor - Playful');
    expect(revisionPrompt).toContain('SCENE 1: Mia dives.');
    expect(mockLogger.info).toHaveBeenCalledWith(
      { concept: 'Humor - Playful [test/second]', score: 95 },
      'Best concept selected',
    );
  });

  it('expands the brief concept instead of drafting one per style', async () => {
    const unused: TextOracle = { modelId: 'test/unused', complete: vi.fn().mockRejectedValue(new Error('not expected')) };
    const { pipeline, oracle } = setup(scriptedOracle(), [unused]);
    const seeded = { ...brief, concept: 'A grey commuter train turns into a tea garden.' };

    const result = await pipeline.run(seeded, { id: 'seeded', to: 'revise-script' });

    expect(result.stages.map((s) => [s.stage, s.produced, s.expected])).toEqual([
      ['generate-concepts', 1, 1],
      ['judge-concepts', 1, 1],
      ['revise-script', 1, 1],
    ]);
    expect(unused.complete).not.toHaveBeenCalled();

    const concepts = await readJsonArtifact(scriptLayout(dir, 'seeded').concepts, conceptSetSchema);
    expect(concepts.seed).toBe('A grey commuter train turns into a tea garden.');
    expect(concepts.concepts.map((c) => [c.ad_style, c.model])).toEqual([['Humor - Playful', 'test/oracle']]);

    const revisionPrompt = vi.mocked(oracle.complete).mock.calls.find(([p]) => p.includes('Revise this'))?.[0];
    expect(revisionPrompt).toContain('SCENE 1: Mia boards a grey train.');
  });
});
