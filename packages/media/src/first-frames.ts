import { join } from 'path';
import type { ReferenceResolver, ScenePromptAssembler } from '@adreel/continuity';
import {
  FIRST_FRAMES_SUMMARY_FILE,
  MediaGenerationError,
  runPool,
  writeJsonArtifact,
  writeStageReport,
  type FirstFramesSummary,
  type Logger,
  type Resolution,
  type Scene,
  type ScenePlan,
  type StageReport,
} from '@adreel/shared';
import { persistMedia } from './persist.js';
import type { ImageProvider } from './types.js';

export const FIRST_FRAMES_STAGE = 'generate-first-frames';

export interface FirstFrameOptions {
  concurrency: number;
  resolution: Resolution;
  style: string;
}

export interface FirstFrameJob {
  plan: ScenePlan;
  /** Absent when no reference images were generated. */
  resolver: ReferenceResolver | null;
  baseName: string;
  outputDir: string;
}

export interface FirstFrameResult {
  summary: FirstFramesSummary;
  summaryPath: string;
  report: StageReport;
  /** Scene number → absolute frame path. */
  frames: Map<number, string>;
}

export function firstFrameFileName(baseName: string, sceneNumber: number): string {
  return `${baseName}_p${sceneNumber}_first_frame.png`;
}

/** Frame paths listed in a summary, resolved against the summary's directory. */
export function firstFramePaths(summary: FirstFramesSummary, dir: string): Map<number, string> {
  const frames = new Map<number, string>();
  for (const [scene, file] of Object.entries(summary.first_frames)) {
    frames.set(Number(scene), join(dir, file));
  }
  return frames;
}

export class FirstFrameGenerator {
  constructor(
    private images: ImageProvider,
    private assembler: ScenePromptAssembler,
    private logger: Logger,
    private options: FirstFrameOptions,
  ) {}

  async generateAll(job: FirstFrameJob): Promise<FirstFrameResult> {
    const { plan, outputDir } = job;
    this.logger.info(
      { scenes: plan.scenes.length, withReferences: job.resolver !== null },
      'Generating first frames',
    );

    const outcomes = await runPool(
      plan.scenes.map((scene) => ({ key: scene.scene_number, run: () => this.generateOne(scene, job) })),
      this.options.concurrency,
      (outcome) => {
        if (outcome.ok) this.logger.info({ scene: outcome.key }, 'First frame saved');
        else this.logger.error({ scene: outcome.key, err: outcome.error.message }, 'First frame failed');
      },
    );

    const frames = new Map<number, string>();
    const failures: StageReport['failures'] = [];
    for (const outcome of [...outcomes].sort((a, b) => a.key - b.key)) {
      if (outcome.ok) frames.set(outcome.key, outcome.value);
      else failures.push({ key: String(outcome.key), error: outcome.error.message });
    }

    const summary: FirstFramesSummary = {
      resolution: this.options.resolution,
      aspect_ratio: '16:9',
      total_scenes: plan.scenes.length,
      generated_frames: frames.size,
      first_frames: Object.fromEntries(
        [...frames.keys()].map((n) => [String(n), firstFrameFileName(job.baseName, n)]),
      ),
    };
    const summaryPath = await writeJsonArtifact(join(outputDir, FIRST_FRAMES_SUMMARY_FILE), summary);

    const report: StageReport = {
      stage: FIRST_FRAMES_STAGE,
      expected: plan.scenes.length,
      produced: frames.size,
      failures,
    };
    await writeStageReport(outputDir, report);

    return { summary, summaryPath, report, frames };
  }

  private async generateOne(scene: Scene, job: FirstFrameJob): Promise<string> {
    if (!scene.first_frame_image_prompt.trim()) {
      throw new MediaGenerationError(`Scene ${scene.scene_number} has no first_frame_image_prompt`);
    }

    const references = job.resolver?.resolveScene(scene).references ?? [];
    const prompt = this.assembler.assemble(scene, references, this.options.style);
    this.logger.debug(
      { scene: scene.scene_number, references: references.map((r) => r.manifestName) },
      'Assembled first frame prompt',
    );

    const media = await this.images.generate({
      prompt: prompt.imagePrompt,
      referenceImages: prompt.imagePaths,
      resolution: this.options.resolution,
      aspectRatio: '16:9',
    });
    const path = join(job.outputDir, firstFrameFileName(job.baseName, scene.scene_number));
    await persistMedia(media, path);
    return path;
  }
}
