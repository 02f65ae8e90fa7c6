import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import { MediaToolError, NoClipsError, errorMessage, type Logger } from '@adreel/shared';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

/** Runs a command to completion, collecting its output. Spawn failures reject. */
export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolvePromise, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on('error', reject);
    child.on('close', (exitCode) => resolvePromise({ exitCode, stdout, stderr }));
  });

export interface ConcatRequest {
  baseName: string;
  videoDir: string;
  sceneNumbers: readonly number[];
  suffix: string;
  /** Defaults to `{videoDir}/{baseName}_final_{suffix}.mp4`. */
  outputPath?: string;
}

export interface ConcatResult {
  outputPath: string;
  /** Clip paths in playback order. */
  included: string[];
  missing: number[];
  durationSec?: number;
}

export interface SequencerOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  runner?: CommandRunner;
  fileExists?: (path: string) => boolean;
}

/** One line of an ffmpeg concat list, with single quotes escaped for its quoting rules. */
export function concatListLine(path: string): string {
  return `file '${resolve(path).replace(/'/g, "'\\''")}'`;
}

/** Joins per-scene clips into one video with ffmpeg's concat demuxer, without re-encoding. */
export class ClipSequencer {
  private ffmpegPath: string;
  private ffprobePath: string;
  private run: CommandRunner;
  private fileExists: (path: string) => boolean;

  constructor(
    private logger: Logger,
    options: SequencerOptions = {},
  ) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.run = options.runner ?? spawnCommand;
    this.fileExists = options.fileExists ?? existsSync;
  }

  /** `{base}_p{n}_{suffix}.mp4`, else `{base}_p{n}.mp4`. */
  locateClip(videoDir: string, baseName: string, sceneNumber: number, suffix: string): string | null {
    const candidates = [
      join(videoDir, `${baseName}_p${sceneNumber}_${suffix}.mp4`),
      join(videoDir, `${baseName}_p${sceneNumber}.mp4`),
    ];
    return candidates.find((path) => this.fileExists(path)) ?? null;
  }

  async concatenate(request: ConcatRequest): Promise<ConcatResult> {
    const { baseName, videoDir, suffix } = request;
    const outputPath = request.outputPath ?? join(videoDir, `${baseName}_final_${suffix}.mp4`);

    const included: string[] = [];
    const missing: number[] = [];
    for (const n of [...new Set(request.sceneNumbers)].sort((a, b) => a - b)) {
      const clip = this.locateClip(videoDir, baseName, n, suffix);
      if (clip) included.push(clip);
      else missing.push(n);
    }

    if (included.length === 0) throw new NoClipsError(videoDir);
    if (missing.length > 0) {
      this.logger.warn({ missing }, 'Scenes without a clip are left out of the final video');
    }

    await mkdir(dirname(resolve(outputPath)), { recursive: true });

    const tempDir = await mkdtemp(join(tmpdir(), 'adreel-concat-'));
    try {
      const listPath = join(tempDir, 'concat_list.txt');
      await writeFile(listPath, included.map(concatListLine).join('\n') + '\n', 'utf-8');

      const args = ['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-y', outputPath];
      this.logger.info({ clips: included.length, output: outputPath }, 'Merging clips');
      const result = await this.run(this.ffmpegPath, args).catch((err: unknown) => {
        throw new MediaToolError(this.ffmpegPath, null, errorMessage(err));
      });
      if (result.exitCode !== 0) {
        throw new MediaToolError(this.ffmpegPath, result.exitCode, result.stderr);
      }
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }

    const durationSec = await this.readDuration(outputPath);
    this.logger.info({ output: outputPath, durationSec }, 'Final video saved');
    return { outputPath, included, missing, ...(durationSec !== undefined ? { durationSec } : {}) };
  }

  /** Best effort: the merge has already succeeded when this runs. */
  private async readDuration(path: string): Promise<number | undefined> {
    try {
      const result = await this.run(this.ffprobePath, [
        '-v',
        'error',
        '-show_entries',
        'format=duration',
        '-of',
        'default=noprint_wrappers=1:nokey=1',
        path,
      ]);
      const duration = Number.parseFloat(result.stdout.trim());
      return result.exitCode === 0 && Number.isFinite(duration) ? duration : undefined;
    } catch (err) {
      this.logger.debug({ err: errorMessage(err) }, 'ffprobe unavailable, duration unknown');
      return undefined;
    }
  }
}
