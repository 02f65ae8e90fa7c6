import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  readJsonArtifact,
  readTextArtifact,
  writeJsonArtifact,
  writeStageReport,
  persistFailedResponse,
} from './artifacts.js';
import { MissingInputError, OracleParseError } from './errors.js';
import { stageReportSchema } from './schemas.js';

describe('artifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'artifacts-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('raises MissingInputError for absent files', async () => {
    await expect(readTextArtifact(join(dir, 'nope.txt'), 'revised script')).rejects.toThrow(MissingInputError);
    await expect(readTextArtifact(join(dir, 'nope.txt'), 'revised script')).rejects.toThrow(
      `Required revised script not found: ${join(dir, 'nope.txt')}`,
    );
  });

  it('writes nested JSON and reads it back through a schema', async () => {
    const path = join(dir, 'a', 'b', 'report.json');
    await writeJsonArtifact(path, { stage: 'x', expected: 2, produced: 1, failures: [] });
    await expect(readJsonArtifact(path, stageReportSchema)).resolves.toEqual({
      stage: 'x',
      expected: 2,
      produced: 1,
      failures: [],
    });
  });

  it('rejects a document of the wrong shape as fatal', async () => {
    const path = join(dir, 'bad.json');
    await writeFile(path, '{"stage": 1}');
    await expect(readJsonArtifact(path, stageReportSchema, 'stage report')).rejects.toMatchObject({ fatal: true });
  });

  it('names the stage report after the stage', async () => {
    const path = await writeStageReport(dir, {
      stage: 'generate-clips',
      expected: 3,
      produced: 2,
      failures: [{ key: '2', error: 'timed out' }],
    });
    expect(path).toBe(join(dir, 'generate-clips_report.json'));
  });

  it('persists raw and extracted text of a failed response', async () => {
    const error = new OracleParseError('universe record', 'syntax', 'raw {text', '{text', 'Unexpected token');
    const path = await persistFailedResponse(dir, error);

    expect(path).toBe(join(dir, 'universe_record_failed_response.txt'));
    const body = await readFile(path, 'utf-8');
    expect(body).toContain('=== ORIGINAL RESPONSE ===\nraw {text\n');
    expect(body).toContain('=== EXTRACTED JSON TEXT ===\n{text\n');
  });
});
