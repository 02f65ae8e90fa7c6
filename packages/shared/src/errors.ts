/** Error taxonomy for pipeline stages.
 * Fatal errors abort the run; everything else is recorded as a degraded outcome. */

export class PipelineError extends Error {
  readonly fatal: boolean;

  constructor(message: string, options?: { fatal?: boolean; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.fatal = options?.fatal ?? false;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, { fatal: true });
    this.name = 'ConfigError';
  }
}

export class MissingInputError extends PipelineError {
  constructor(readonly path: string, what = 'input file') {
    super(`Required ${what} not found: ${path}`, { fatal: true });
    this.name = 'MissingInputError';
  }
}

export type OracleParseFailure = 'syntax' | 'schema';

/** Oracle output that could not be turned into the expected document, even after repair. */
export class OracleParseError extends PipelineError {
  constructor(
    readonly label: string,
    readonly reason: OracleParseFailure,
    readonly raw: string,
    readonly extracted: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Failed to parse ${label} (${reason}): ${detail}`, { fatal: true, cause });
    this.name = 'OracleParseError';
  }
}

export class OracleRequestError extends PipelineError {
  constructor(
    readonly provider: string,
    readonly status: number,
    body: string,
  ) {
    super(`${provider} API error ${status}: ${body}`);
    this.name = 'OracleRequestError';
  }
}

export class MediaGenerationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MediaGenerationError';
  }
}

export class NoClipsError extends PipelineError {
  constructor(readonly videoDir: string) {
    super(`No video clips found to merge in ${videoDir}`, { fatal: true });
    this.name = 'NoClipsError';
  }
}

/** External command exited non-zero. `stderr` is kept verbatim. */
export class MediaToolError extends PipelineError {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(`${command} exited with code ${exitCode ?? 'null'}:\n${stderr}`, { fatal: true });
    this.name = 'MediaToolError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
