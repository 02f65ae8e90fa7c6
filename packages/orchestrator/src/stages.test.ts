import { describe, it, expect } from 'vitest';
import { CONCEPTS_STAGE, JUDGE_STAGE, REVISE_STAGE } from '@adreel/concepts';
import { CLIPS_STAGE, FIRST_FRAMES_STAGE, REFERENCES_STAGE } from '@adreel/media';
import { ConfigError } from '@adreel/shared';
import { PIPELINE_STAGES, STAGE_DESCRIPTIONS, isStageName, parseStageName, stageRange } from './stages.js';

describe('PIPELINE_STAGES', () => {
  it('defines correct pipeline order', () => {
    expect(PIPELINE_STAGES).toEqual([
      'generate-concepts',
      'judge-concepts',
      'revise-script',
      'extract-universe',
      'generate-references',
      'plan-scenes',
      'generate-first-frames',
      'generate-clips',
      'merge-clips',
    ]);
  });

  it('uses the stage names the packages write into their reports', () => {
    for (const stage of [CONCEPTS_STAGE, JUDGE_STAGE, REVISE_STAGE, REFERENCES_STAGE, FIRST_FRAMES_STAGE, CLIPS_STAGE]) {
      expect(isStageName(stage)).toBe(true);
    }
  });

  it('references come before scene planning, frames before clips', () => {
    expect(PIPELINE_STAGES.indexOf('generate-references')).toBeLessThan(PIPELINE_STAGES.indexOf('plan-scenes'));
    expect(PIPELINE_STAGES.indexOf('generate-first-frames')).toBeLessThan(PIPELINE_STAGES.indexOf('generate-clips'));
  });

  it('describes every stage', () => {
    expect(Object.keys(STAGE_DESCRIPTIONS)).toEqual([...PIPELINE_STAGES]);
  });
});

describe('stageRange', () => {
  it('defaults to the whole pipeline', () => {
    expect(stageRange()).toEqual([...PIPELINE_STAGES]);
  });

  it('slices inclusively', () => {
    expect(stageRange('plan-scenes', 'generate-clips')).toEqual([
      'plan-scenes',
      'generate-first-frames',
      'generate-clips',
    ]);
    expect(stageRange('merge-clips')).toEqual(['merge-clips']);
  });

  it('rejects a reversed range', () => {
    expect(() => stageRange('generate-clips', 'plan-scenes')).toThrow(ConfigError);
  });
});

describe('parseStageName', () => {
  it('accepts known stages and rejects others', () => {
    expect(parseStageName('merge-clips')).toBe('merge-clips');
    expect(() => parseStageName('publish')).toThrow('Unknown stage "publish"');
  });
});
