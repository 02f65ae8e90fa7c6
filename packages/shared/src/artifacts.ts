import { writeFile, readFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { MissingInputError, PipelineError, type OracleParseError } from './errors.js';
import type { StageReport } from './schemas.js';
import { slugify } from './slug.js';
import { formatZodIssues } from './json-repair.js';

/** Stage artifacts are plain JSON/text files so any stage can be re-run alone. */

export async function readTextArtifact(path: string, what?: string): Promise<string> {
  if (!existsSync(path)) throw new MissingInputError(path, what);
  return readFile(path, 'utf-8');
}

export async function readJsonArtifact<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  what?: string,
): Promise<T> {
  const text = await readTextArtifact(path, what);

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new PipelineError(`Invalid JSON in ${path}`, { fatal: true, cause: err });
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new PipelineError(`Invalid ${what ?? 'artifact'} ${path}: ${formatZodIssues(result.error)}`, {
      fatal: true,
      cause: result.error,
    });
  }
  return result.data;
}

export async function writeTextArtifact(path: string, text: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, text, 'utf-8');
  return path;
}

export async function writeJsonArtifact(path: string, data: unknown): Promise<string> {
  return writeTextArtifact(path, JSON.stringify(data, null, 2) + '\n');
}

export function stageReportPath(dir: string, stage: string): string {
  return join(dir, `${stage}_report.json`);
}

/** Failure detail lives beside the stage output, never inside it. */
export async function writeStageReport(dir: string, report: StageReport): Promise<string> {
  return writeJsonArtifact(stageReportPath(dir, report.stage), report);
}

/** Keep an unparseable oracle response for offline inspection. */
export async function persistFailedResponse(
  debugDir: string,
  error: OracleParseError,
): Promise<string> {
  const path = join(debugDir, `${slugify(error.label)}_failed_response.txt`);
  const body = [
    '=== ORIGINAL RESPONSE ===',
    error.raw,
    '',
    '=== EXTRACTED JSON TEXT ===',
    error.extracted,
    '',
    '=== ERROR ===',
    error.message,
    '',
  ].join('\n');
  return writeTextArtifact(path, body);
}
