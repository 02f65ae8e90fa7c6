import { join } from 'path';
import { CONCEPTS_FILE, EVALUATIONS_FILE, REVISED_SCRIPT_FILE } from '@adreel/concepts';
import { FIRST_FRAMES_SUMMARY_FILE, IMAGE_MANIFEST_FILE, slugify } from '@adreel/shared';

/** Where each stage of one script reads and writes, under `{outputDir}/{scriptId}/`. */
export interface ScriptLayout {
  scriptId: string;
  root: string;
  debugDir: string;
  brief: string;
  concepts: string;
  evaluations: string;
  script: string;
  universe: string;
  referencesDir: string;
  manifest: string;
  scenePlan: string;
  framesDir: string;
  framesSummary: string;
  clipsDir: string;
}

export function scriptLayout(outputDir: string, scriptId: string): ScriptLayout {
  const root = join(outputDir, scriptId);
  const referencesDir = join(root, 'reference_images');
  const framesDir = join(root, 'first_frames');

  return {
    scriptId,
    root,
    debugDir: join(root, 'debug'),
    brief: join(root, 'brief.json'),
    concepts: join(root, CONCEPTS_FILE),
    evaluations: join(root, EVALUATIONS_FILE),
    script: join(root, REVISED_SCRIPT_FILE),
    universe: join(root, 'universe.json'),
    referencesDir,
    manifest: join(referencesDir, IMAGE_MANIFEST_FILE),
    scenePlan: join(root, `${scriptId}_scene_prompts.json`),
    framesDir,
    framesSummary: join(framesDir, FIRST_FRAMES_SUMMARY_FILE),
    clipsDir: join(root, 'video_clips'),
  };
}

export function finalVideoPath(layout: ScriptLayout, suffix: string): string {
  return join(layout.root, `${layout.scriptId}_final_${suffix}.mp4`);
}

/** "lumen_tea_20261019_142501": brand slug plus a UTC timestamp. */
export function defaultScriptId(brandName: string, now = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
  return `${slugify(brandName) || 'ad'}_${stamp}`;
}
