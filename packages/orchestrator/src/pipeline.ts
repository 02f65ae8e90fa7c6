import { existsSync } from 'fs';
import {
  ConceptExpander,
  ConceptGenerator,
  ConceptJudge,
  ScriptReviser,
  conceptKey,
  conceptSetSchema,
  evaluationSetSchema,
  selectBestConcept,
} from '@adreel/concepts';
import { ReferenceResolver, ScenePlanner, ScenePromptAssembler, UniverseExtractor } from '@adreel/continuity';
import {
  ClipGenerator,
  ClipSequencer,
  FirstFrameGenerator,
  ReferenceImageAssigner,
  clipSuffix,
  createImageProvider,
  createVideoProvider,
  firstFramePaths,
  type CommandRunner,
  type ImageProvider,
  type VideoProvider,
} from '@adreel/media';
import {
  ConfigError,
  PipelineError,
  createTextOracle,
  firstFramesSummarySchema,
  imageManifestSchema,
  readJsonArtifact,
  readTextArtifact,
  scenePlanSchema,
  universeRecordSchema,
  writeJsonArtifact,
  writeStageReport,
  writeTextArtifact,
  type BrandBrief,
  type ImageManifest,
  type Logger,
  type PipelineConfig,
  type ScenePlan,
  type StageReport,
  type TextOracle,
  type UniverseRecord,
} from '@adreel/shared';
import { defaultScriptId, finalVideoPath, scriptLayout, type ScriptLayout } from './layout.js';
import { PIPELINE_STAGES, stageRange, type StageName } from './stages.js';

/** Providers are built on first use, so a stage only needs the keys it calls. */
export interface PipelineProviders {
  writer(): TextOracle;
  /** One oracle per concept model; every style is drafted by each. */
  conceptWriters(): readonly TextOracle[];
  judge(): TextOracle;
  images(): ImageProvider;
  video(): VideoProvider;
}

export interface PipelineOptions {
  /** Runs ffmpeg and ffprobe; defaults to spawning the real binaries. */
  runner?: CommandRunner;
}

export interface RunOptions {
  id?: string;
  from?: StageName;
  to?: StageName;
}

export interface PipelineRunResult {
  scriptId: string;
  scriptDir: string;
  stages: StageReport[];
  finalVideo: string | null;
}

function memo<T>(create: () => T): () => T {
  let value: T | undefined;
  return () => (value ??= create());
}

/** Report for a stage that produces one artifact. */
function singleOutput(stage: StageName): StageReport {
  return { stage, expected: 1, produced: 1, failures: [] };
}

export class Pipeline {
  private assembler = new ScenePromptAssembler();

  constructor(
    private config: PipelineConfig,
    private providers: PipelineProviders,
    private logger: Logger,
    private options: PipelineOptions = {},
  ) {}

  layout(scriptId: string): ScriptLayout {
    return scriptLayout(this.config.outputDir, scriptId);
  }

  async run(brief: BrandBrief, options: RunOptions = {}): Promise<PipelineRunResult> {
    const stages = stageRange(options.from, options.to);
    if (!options.id && stages[0] !== PIPELINE_STAGES[0]) {
      throw new ConfigError(`--id is required to start at ${stages[0]}`);
    }

    const scriptId = options.id ?? defaultScriptId(brief.brandName);
    const layout = this.layout(scriptId);
    await writeJsonArtifact(layout.brief, brief);

    this.logger.info({ scriptId, stages: stages.length, from: stages[0] }, 'Pipeline started');

    const reports: StageReport[] = [];
    for (const stage of stages) {
      reports.push(await this.runStage(stage, brief, scriptId));
    }

    const finalVideo = stages.includes('merge-clips')
      ? finalVideoPath(layout, clipSuffix(this.config.videoModel))
      : null;
    const degraded = reports.filter((r) => r.failures.length > 0).map((r) => r.stage);
    this.logger.info({ scriptId, degraded, finalVideo }, 'Pipeline finished');

    return { scriptId, scriptDir: layout.root, stages: reports, finalVideo };
  }

  /** Runs one stage from the artifacts already on disk. */
  async runStage(stage: StageName, brief: BrandBrief, scriptId: string): Promise<StageReport> {
    const layout = this.layout(scriptId);
    const started = Date.now();
    this.logger.info({ stage, scriptId }, 'Stage started');

    const report = await this.execute(stage, brief, layout);

    const log = { stage, produced: report.produced, expected: report.expected, ms: Date.now() - started };
    if (report.failures.length > 0) {
      this.logger.warn({ ...log, failures: report.failures.length }, 'Stage finished with failures');
    } else {
      this.logger.info(log, 'Stage finished');
    }
    return report;
  }

  private execute(stage: StageName, brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    switch (stage) {
      case 'generate-concepts':
        return this.generateConcepts(brief, layout);
      case 'judge-concepts':
        return this.judgeConcepts(brief, layout);
      case 'revise-script':
        return this.reviseScript(brief, layout);
      case 'extract-universe':
        return this.extractUniverse(brief, layout);
      case 'generate-references':
        return this.generateReferences(layout);
      case 'plan-scenes':
        return this.planScenes(brief, layout);
      case 'generate-first-frames':
        return this.generateFirstFrames(brief, layout);
      case 'generate-clips':
        return this.generateClips(brief, layout);
      case 'merge-clips':
        return this.mergeClips(layout);
    }
  }

  // ─── Concepts ───

  private async generateConcepts(brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    if (brief.concept) {
      const { report } = await new ConceptExpander(this.providers.writer(), this.logger).expand(
        brief.concept,
        brief,
        layout.root,
      );
      return report;
    }

    const generator = new ConceptGenerator(this.providers.conceptWriters(), this.logger, {
      concurrency: this.config.oracleConcurrency,
    });
    const { report } = await generator.generate(brief, layout.root);
    return report;
  }

  private async judgeConcepts(brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    const { concepts } = await readJsonArtifact(layout.concepts, conceptSetSchema, 'concepts');
    const judge = new ConceptJudge(this.providers.judge(), this.logger, {
      concurrency: this.config.oracleConcurrency,
      debugDir: layout.debugDir,
    });
    const { report } = await judge.judge(concepts, brief, layout.root);
    return report;
  }

  private async reviseScript(brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    const { concepts } = await readJsonArtifact(layout.concepts, conceptSetSchema, 'concepts');
    const { evaluations } = await readJsonArtifact(layout.evaluations, evaluationSetSchema, 'evaluations');

    const best = selectBestConcept(evaluations);
    const key = conceptKey(best);
    const concept = concepts.find((c) => conceptKey(c) === key);
    if (!concept) {
      throw new PipelineError(`Best-scoring concept ${key} is missing from ${layout.concepts}`, { fatal: true });
    }
    this.logger.info({ concept: key, score: best.score }, 'Best concept selected');

    const script = await new ScriptReviser(this.providers.writer(), this.logger).revise(concept, best, brief);
    await writeTextArtifact(layout.script, script + '\n');

    const report = singleOutput('revise-script');
    await writeStageReport(layout.root, report);
    return report;
  }

  // ─── Continuity ───

  private async extractUniverse(brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    const script = await readTextArtifact(layout.script, 'revised script');
    const universe = await new UniverseExtractor(this.providers.writer(), this.logger).extract(script, brief, {
      debugDir: layout.debugDir,
    });
    await writeJsonArtifact(layout.universe, universe);

    const report = singleOutput('extract-universe');
    await writeStageReport(layout.root, report);
    return report;
  }

  private async generateReferences(layout: ScriptLayout): Promise<StageReport> {
    const universe = await this.readUniverse(layout);
    const assigner = new ReferenceImageAssigner(this.providers.images(), this.logger, {
      concurrency: this.config.imageConcurrency,
      resolution: this.config.resolution,
    });
    const { report } = await assigner.assign(universe, layout.scriptId, layout.referencesDir);
    return report;
  }

  private async planScenes(brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    const script = await readTextArtifact(layout.script, 'revised script');
    const universe = await this.readUniverse(layout);
    const manifest = await this.readManifest(layout);

    const plan = await new ScenePlanner(this.providers.writer(), this.logger).plan(script, universe, manifest, brief, {
      videoModel: this.config.videoModel,
      debugDir: layout.debugDir,
    });
    await writeJsonArtifact(layout.scenePlan, plan);

    const report = singleOutput('plan-scenes');
    await writeStageReport(layout.root, report);
    return report;
  }

  // ─── Media ───

  private async generateFirstFrames(brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    const plan = await this.readScenePlan(layout);
    const generator = new FirstFrameGenerator(this.providers.images(), this.assembler, this.logger, {
      concurrency: this.config.imageConcurrency,
      resolution: this.config.resolution,
      style: brief.style,
    });
    const { report } = await generator.generateAll({
      plan,
      resolver: await this.createResolver(layout),
      baseName: layout.scriptId,
      outputDir: layout.framesDir,
    });
    return report;
  }

  private async generateClips(brief: BrandBrief, layout: ScriptLayout): Promise<StageReport> {
    const plan = await this.readScenePlan(layout);

    let firstFrames = new Map<number, string>();
    if (existsSync(layout.framesSummary)) {
      const summary = await readJsonArtifact(layout.framesSummary, firstFramesSummarySchema, 'first frames summary');
      firstFrames = firstFramePaths(summary, layout.framesDir);
    } else {
      this.logger.warn({ path: layout.framesSummary }, 'No first frames found, clips will be generated from text');
    }

    const generator = new ClipGenerator(this.providers.video(), this.assembler, this.logger, {
      concurrency: this.config.videoConcurrency,
      resolution: this.config.resolution,
      style: brief.style,
    });
    const { report } = await generator.generateAll({
      plan,
      firstFrames,
      resolver: await this.createResolver(layout),
      baseName: layout.scriptId,
      outputDir: layout.clipsDir,
    });
    return report;
  }

  private async mergeClips(layout: ScriptLayout): Promise<StageReport> {
    const plan = await this.readScenePlan(layout);
    const suffix = clipSuffix(this.config.videoModel);

    const sequencer = new ClipSequencer(this.logger, {
      ffmpegPath: this.config.ffmpegPath,
      ...(this.options.runner ? { runner: this.options.runner } : {}),
    });
    const result = await sequencer.concatenate({
      baseName: layout.scriptId,
      videoDir: layout.clipsDir,
      sceneNumbers: plan.scenes.map((s) => s.scene_number),
      suffix,
      outputPath: finalVideoPath(layout, suffix),
    });

    const report: StageReport = {
      stage: 'merge-clips',
      expected: plan.scenes.length,
      produced: result.included.length,
      failures: result.missing.map((n) => ({ key: String(n), error: 'Clip not found' })),
    };
    await writeStageReport(layout.root, report);
    return report;
  }

  // ─── Inputs ───

  private readUniverse(layout: ScriptLayout): Promise<UniverseRecord> {
    return readJsonArtifact(layout.universe, universeRecordSchema, 'universe record');
  }

  private readScenePlan(layout: ScriptLayout): Promise<ScenePlan> {
    return readJsonArtifact(layout.scenePlan, scenePlanSchema, 'scene plan');
  }

  /** Reference images are optional downstream; without them scenes render from text. */
  private async readManifest(layout: ScriptLayout): Promise<ImageManifest | null> {
    if (!existsSync(layout.manifest)) {
      this.logger.warn({ path: layout.manifest }, 'No reference image manifest, continuing without references');
      return null;
    }
    return readJsonArtifact(layout.manifest, imageManifestSchema, 'image manifest');
  }

  private async createResolver(layout: ScriptLayout): Promise<ReferenceResolver | null> {
    const manifest = await this.readManifest(layout);
    if (!manifest) return null;
    return new ReferenceResolver(await this.readUniverse(layout), manifest, layout.referencesDir, this.logger, {
      maxReferences: this.config.maxReferenceImages,
    });
  }
}

export function createPipeline(config: PipelineConfig, logger: Logger, options: PipelineOptions = {}): Pipeline {
  const providers: PipelineProviders = {
    writer: memo(() => createTextOracle(config.textModel, config, logger)),
    conceptWriters: memo(() => config.conceptModels.map((model) => createTextOracle(model, config, logger))),
    judge: memo(() => createTextOracle(config.judgeModel, config, logger)),
    images: memo(() => createImageProvider(config, logger)),
    video: memo(() => createVideoProvider(config, logger)),
  };
  return new Pipeline(config, providers, logger, options);
}
