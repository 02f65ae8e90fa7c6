import { existsSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { ClipSequencer, clipSuffix } from '@adreel/media';
import {
  brandBriefSchema,
  createLogger,
  errorMessage,
  loadConfig,
  readJsonArtifact,
  readTextArtifact,
  scenePlanSchema,
  type BrandBrief,
  type StageReport,
} from '@adreel/shared';
import { createPipeline } from './pipeline.js';
import { PIPELINE_STAGES, STAGE_DESCRIPTIONS, parseStageName } from './stages.js';

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    process.exit(0);
  }

  const chalk = (await import('chalk')).default;
  const Table = (await import('cli-table3')).default;

  const print = {
    header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
    success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
    warn: (text: string) => console.log(chalk.yellow(`  ⚠ ${text}`)),
    error: (text: string) => console.log(chalk.red(`  ✗ ${text}`)),
    dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
  };

  const printReports = (reports: StageReport[]) => {
    const table = new Table({
      head: [chalk.cyan('Stage'), chalk.cyan('Produced'), chalk.cyan('Failures')],
      colWidths: [24, 12, 10],
    });
    for (const report of reports) {
      const produced = `${report.produced}/${report.expected}`;
      table.push([
        report.stage,
        report.produced === report.expected ? chalk.green(produced) : chalk.yellow(produced),
        report.failures.length > 0 ? chalk.red(report.failures.length.toString()) : '0',
      ]);
    }
    console.log(table.toString());

    const degraded = reports.filter((r) => r.failures.length > 0);
    if (degraded.length === 0) return;

    print.warn(`${degraded.length} stage(s) finished with failures`);
    const failures = new Table({
      head: [chalk.cyan('Stage'), chalk.cyan('Item'), chalk.cyan('Error')],
      colWidths: [24, 28, 50],
      wordWrap: true,
    });
    for (const report of degraded) {
      for (const failure of report.failures) {
        failures.push([report.stage, failure.key, failure.error.slice(0, 200)]);
      }
    }
    console.log(failures.toString());
  };

  try {
    switch (command) {
      case 'stages': {
        print.header('Pipeline Stages');
        const table = new Table({
          head: [chalk.cyan('#'), chalk.cyan('Stage'), chalk.cyan('Output')],
          colWidths: [5, 24, 48],
        });
        PIPELINE_STAGES.forEach((stage, i) => {
          table.push([(i + 1).toString(), stage, STAGE_DESCRIPTIONS[stage]]);
        });
        console.log(table.toString());
        break;
      }

      case 'run': {
        const briefPath = args[1];
        if (!briefPath) {
          print.error('Usage: adreel run <brief.json> [--from stage] [--to stage] [--id id] [--concept text|file]');
          process.exit(1);
        }
        const config = loadConfig();
        const logger = createLogger('adreel', config.logLevel);
        const brief = await readBrief(briefPath, getFlag(args, '--concept'));
        const from = getFlag(args, '--from');
        const to = getFlag(args, '--to');
        const id = getFlag(args, '--id');

        print.header(`Pipeline: ${brief.brandName}`);
        const result = await createPipeline(config, logger).run(brief, {
          ...(id ? { id } : {}),
          ...(from ? { from: parseStageName(from) } : {}),
          ...(to ? { to: parseStageName(to) } : {}),
        });

        printReports(result.stages);
        print.success(`Script ${chalk.bold(result.scriptId)} complete`);
        print.dim(`Artifacts: ${result.scriptDir}`);
        if (result.finalVideo) print.dim(`Final video: ${result.finalVideo}`);
        break;
      }

      case 'expand': {
        const briefPath = args[1];
        const concept = getFlag(args, '--concept');
        if (!briefPath || !concept) {
          print.error('Usage: adreel expand <brief.json> --concept <text|file> [--id id]');
          process.exit(1);
        }
        const config = loadConfig();
        const logger = createLogger('adreel', config.logLevel);
        const brief = await readBrief(briefPath, concept);
        const id = getFlag(args, '--id');

        print.header(`Expand Concept: ${brief.brandName}`);
        const result = await createPipeline(config, logger).run(brief, {
          ...(id ? { id } : {}),
          to: 'revise-script',
        });

        printReports(result.stages);
        print.success(`Revised script ready in ${chalk.bold(result.scriptDir)}`);
        print.dim(`Continue with: adreel run ${briefPath} --id ${result.scriptId} --from extract-universe`);
        break;
      }

      case 'stage': {
        const name = args[1];
        const briefPath = args[2];
        const id = getFlag(args, '--id');
        if (!name || !briefPath || !id) {
          print.error('Usage: adreel stage <name> <brief.json> --id <id>');
          process.exit(1);
        }
        const stage = parseStageName(name);
        const config = loadConfig();
        const logger = createLogger('adreel', config.logLevel);
        const brief = await readBrief(briefPath);

        print.header(`Stage: ${stage}`);
        const report = await createPipeline(config, logger).runStage(stage, brief, id);
        printReports([report]);
        break;
      }

      case 'merge': {
        const planPath = args[1];
        if (!planPath) {
          print.error('Usage: adreel merge <scene_prompts.json> [--video-dir d] [--suffix s] [--output f]');
          process.exit(1);
        }
        const config = loadConfig();
        const logger = createLogger('adreel', config.logLevel);
        const plan = await readJsonArtifact(planPath, scenePlanSchema, 'scene plan');

        const baseName = getFlag(args, '--base') ?? basename(planPath).replace(/_scene_prompts\.json$/, '');
        const videoDir = resolve(getFlag(args, '--video-dir') ?? join(dirname(planPath), 'video_clips'));
        const suffix = getFlag(args, '--suffix') ?? clipSuffix(config.videoModel);
        const output = getFlag(args, '--output');

        print.header('Merge Clips');
        const result = await new ClipSequencer(logger, { ffmpegPath: config.ffmpegPath }).concatenate({
          baseName,
          videoDir,
          sceneNumbers: plan.scenes.map((s) => s.scene_number),
          suffix,
          ...(output ? { outputPath: resolve(output) } : {}),
        });

        print.success(`Merged ${result.included.length} clip(s) into ${chalk.bold(result.outputPath)}`);
        if (result.durationSec !== undefined) print.dim(`Duration: ${result.durationSec.toFixed(1)}s`);
        if (result.missing.length > 0) print.warn(`Missing scenes: ${result.missing.join(', ')}`);
        break;
      }

      default:
        print.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err) {
    console.error(chalk.red(`\n  ✗ Error: ${errorMessage(err)}`));
    process.exit(1);
  }
}

/** `concept` is the idea itself or a file holding it; it overrides the brief's own. */
async function readBrief(path: string, concept?: string): Promise<BrandBrief> {
  const brief = await readJsonArtifact(path, brandBriefSchema, 'brand brief');
  if (!concept) return brief;
  const text = existsSync(concept) ? await readTextArtifact(concept, 'concept') : concept;
  return brandBriefSchema.parse({ ...brief, concept: text });
}

function printHelp() {
  console.log(`
  adreel: ad video generation with consistent characters across scenes

  Usage:
    npm run pipeline <command> [options]

  Commands:
    run <brief.json>           Run the pipeline for a brand brief
      --from <stage>           First stage to run (requires --id)
      --to <stage>             Last stage to run
      --id <id>                Script id; reuses outputs/<id>/
      --concept <text|file>    Expand this idea instead of drafting per style

    expand <brief.json>        Expand, judge and revise an idea of your own
      --concept <text|file>    The idea, inline or in a text file (required)
      --id <id>                Script id

    stage <name> <brief.json>  Re-run a single stage
      --id <id>                Script id (required)

    merge <scene_prompts.json> Concatenate generated clips with ffmpeg
      --video-dir <dir>        Clip directory (default: video_clips beside the plan)
      --suffix <s>             Clip suffix, e.g. veo3 or sora2
      --base <name>            Clip base name (default: from the plan file name)
      --output <file>          Output video path

    stages                     List pipeline stages
  `);
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
