import { existsSync } from 'fs';
import { join } from 'path';
import { snapClipDuration, type ReferenceResolver, type ScenePromptAssembler } from '@adreel/continuity';
import {
  runPool,
  slugify,
  writeStageReport,
  type Logger,
  type Resolution,
  type Scene,
  type ScenePlan,
  type StageReport,
} from '@adreel/shared';
import { persistMedia } from './persist.js';
import type { VideoProvider } from './types.js';

export const CLIPS_STAGE = 'generate-clips';

/** "google/veo-3-fast" → "veo3", "openai/sora-2" → "sora2". */
export function clipSuffix(model: string): string {
  const lower = model.toLowerCase();
  if (lower.includes('sora-2') || lower.includes('sora2')) return 'sora2';
  if (lower.includes('veo-3') || lower.includes('veo3')) return 'veo3';
  return slugify(lower.split('/').pop() ?? lower) || 'clip';
}

export function clipFileName(baseName: string, sceneNumber: number, suffix: string): string {
  return `${baseName}_p${sceneNumber}_${suffix}.mp4`;
}

export interface ClipOptions {
  concurrency: number;
  resolution: Resolution;
  style: string;
  fileExists?: (path: string) => boolean;
}

export interface ClipJob {
  plan: ScenePlan;
  /** Scene number → first frame path; a scene without one is generated from text alone. */
  firstFrames: ReadonlyMap<number, string>;
  resolver: ReferenceResolver | null;
  baseName: string;
  outputDir: string;
}

export interface ClipResult {
  report: StageReport;
  suffix: string;
  /** Scene number → clip path. */
  clips: Map<number, string>;
}

export class ClipGenerator {
  private fileExists: (path: string) => boolean;

  constructor(
    private video: VideoProvider,
    private assembler: ScenePromptAssembler,
    private logger: Logger,
    private options: ClipOptions,
  ) {
    this.fileExists = options.fileExists ?? existsSync;
  }

  async generateAll(job: ClipJob): Promise<ClipResult> {
    const suffix = clipSuffix(this.video.model);
    this.logger.info(
      { scenes: job.plan.scenes.length, model: this.video.model, concurrency: this.options.concurrency },
      'Generating video clips',
    );

    const outcomes = await runPool(
      job.plan.scenes.map((scene) => ({
        key: scene.scene_number,
        run: () => this.generateOne(scene, job, suffix),
      })),
      this.options.concurrency,
      (outcome) => {
        if (outcome.ok) this.logger.info({ scene: outcome.key }, 'Clip saved');
        else this.logger.error({ scene: outcome.key, err: outcome.error.message }, 'Clip failed');
      },
    );

    const clips = new Map<number, string>();
    const failures: StageReport['failures'] = [];
    for (const outcome of [...outcomes].sort((a, b) => a.key - b.key)) {
      if (outcome.ok) clips.set(outcome.key, outcome.value);
      else failures.push({ key: String(outcome.key), error: outcome.error.message });
    }

    const report: StageReport = {
      stage: CLIPS_STAGE,
      expected: job.plan.scenes.length,
      produced: clips.size,
      failures,
    };
    await writeStageReport(job.outputDir, report);

    return { report, suffix, clips };
  }

  private async generateOne(scene: Scene, job: ClipJob, suffix: string): Promise<string> {
    const n = scene.scene_number;
    const frame = job.firstFrames.get(n);
    const hasFrame = frame !== undefined && this.fileExists(frame);
    if (!hasFrame) {
      this.logger.warn({ scene: n }, 'No first frame, generating clip from text only');
    }

    const durationSec = snapClipDuration(scene.duration_seconds, this.video.model);
    if (durationSec !== scene.duration_seconds) {
      this.logger.debug({ scene: n, requested: scene.duration_seconds, snapped: durationSec }, 'Clip duration snapped');
    }

    const references = job.resolver?.resolveScene(scene).references ?? [];
    const prompt = this.assembler.assemble(scene, references, this.options.style);

    const media = await this.video.generate({
      prompt: prompt.videoPrompt,
      ...(hasFrame ? { firstFrame: frame } : {}),
      durationSec,
      resolution: this.options.resolution,
      aspectRatio: '16:9',
    });
    const path = join(job.outputDir, clipFileName(job.baseName, n, suffix));
    await persistMedia(media, path);
    return path;
  }
}
