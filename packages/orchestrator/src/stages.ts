import { ConfigError } from '@adreel/shared';

/** Pipeline stage definitions, in execution order */

export const PIPELINE_STAGES = [
  'generate-concepts',
  'judge-concepts',
  'revise-script',
  'extract-universe',
  'generate-references',
  'plan-scenes',
  'generate-first-frames',
  'generate-clips',
  'merge-clips',
] as const;

export type StageName = (typeof PIPELINE_STAGES)[number];

export const STAGE_DESCRIPTIONS: Record<StageName, string> = {
  'generate-concepts': 'One ad concept per requested style',
  'judge-concepts': 'Score every concept out of 100',
  'revise-script': 'Rewrite the best concept as a video script',
  'extract-universe': 'Recurring characters, props and locations',
  'generate-references': 'One canonical reference image per element',
  'plan-scenes': 'Per-clip image and video prompts',
  'generate-first-frames': 'Opening still for each scene',
  'generate-clips': 'One video clip per scene',
  'merge-clips': 'Concatenate clips into the final video',
};

export function isStageName(value: string): value is StageName {
  return PIPELINE_STAGES.some((stage) => stage === value);
}

export function parseStageName(value: string): StageName {
  if (!isStageName(value)) {
    throw new ConfigError(`Unknown stage "${value}". Stages: ${PIPELINE_STAGES.join(', ')}`);
  }
  return value;
}

/** Inclusive slice of the pipeline between two stages. */
export function stageRange(from: StageName = PIPELINE_STAGES[0], to: StageName = 'merge-clips'): StageName[] {
  const start = PIPELINE_STAGES.indexOf(from);
  const end = PIPELINE_STAGES.indexOf(to);
  if (start > end) throw new ConfigError(`Stage ${from} comes after ${to}`);
  return PIPELINE_STAGES.slice(start, end + 1);
}
