import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { ConfigError } from './errors.js';

export const RESOLUTIONS = ['480p', '720p', '1080p'] as const;
export type Resolution = (typeof RESOLUTIONS)[number];

export const IMAGE_PROVIDERS = ['replicate', 'gemini', 'mock'] as const;
export type ImageProviderName = (typeof IMAGE_PROVIDERS)[number];

export const VIDEO_PROVIDERS = ['replicate', 'veo', 'mock'] as const;
export type VideoProviderName = (typeof VIDEO_PROVIDERS)[number];

const DEFAULT_TEXT_MODEL = 'anthropic/claude-sonnet-4-5-20250929';

const configSchema = z.object({
  // Text generation
  anthropicApiKey: z.string().default(''),
  openaiApiKey: z.string().default(''),
  googleApiKey: z.string().default(''),
  textModel: z.string().min(1).default(DEFAULT_TEXT_MODEL),
  judgeModel: z.string().optional(),
  /** Writers that each draft a concept for every ad style; empty means textModel alone. */
  conceptModels: z.array(z.string().min(1)).default([]),

  // Media generation
  replicateApiToken: z.string().default(''),
  imageProvider: z.enum(IMAGE_PROVIDERS).default('replicate'),
  imageModel: z.string().min(1).default('google/nano-banana-pro'),
  videoProvider: z.enum(VIDEO_PROVIDERS).default('replicate'),
  videoModel: z.string().min(1).default('google/veo-3-fast'),
  resolution: z.enum(RESOLUTIONS).default('480p'),
  maxReferenceImages: z.coerce.number().int().min(1).max(5).default(5),

  // Worker pools
  oracleConcurrency: z.coerce.number().int().min(1).default(4),
  imageConcurrency: z.coerce.number().int().min(1).default(5),
  videoConcurrency: z.coerce.number().int().min(1).default(3),
  oracleMaxAttempts: z.coerce.number().int().min(1).default(3),

  // Filesystem / tools
  outputDir: z.string().min(1).default('outputs'),
  ffmpegPath: z.string().min(1).default('ffmpeg'),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type PipelineConfig = Omit<z.infer<typeof configSchema>, 'judgeModel'> & { judgeModel: string };

type Env = Record<string, string | undefined>;

/** Empty strings in .env files mean "unset" so schema defaults apply. */
function read(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') return value.trim();
  }
  return undefined;
}

/**
 * Build the configuration for one pipeline run.
 * Nothing is cached: callers construct it once and pass it to each component.
 */
export function loadConfig(env: Env = loadDotenv()): PipelineConfig {
  const result = configSchema.safeParse({
    anthropicApiKey: read(env, 'ANTHROPIC_API_KEY'),
    openaiApiKey: read(env, 'OPENAI_API_KEY'),
    googleApiKey: read(env, 'GOOGLE_API_KEY', 'GEMINI_API_KEY'),
    textModel: read(env, 'TEXT_MODEL'),
    judgeModel: read(env, 'JUDGE_MODEL'),
    conceptModels: read(env, 'CONCEPT_MODELS')
      ?.split(',')
      .map((model) => model.trim())
      .filter((model) => model.length > 0),
    replicateApiToken: read(env, 'REPLICATE_API_TOKEN', 'REPLICATE_API_KEY'),
    imageProvider: read(env, 'IMAGE_PROVIDER'),
    imageModel: read(env, 'IMAGE_MODEL'),
    videoProvider: read(env, 'VIDEO_PROVIDER'),
    videoModel: read(env, 'VIDEO_MODEL'),
    resolution: read(env, 'RESOLUTION'),
    maxReferenceImages: read(env, 'MAX_REFERENCE_IMAGES'),
    oracleConcurrency: read(env, 'ORACLE_CONCURRENCY'),
    imageConcurrency: read(env, 'IMAGE_CONCURRENCY'),
    videoConcurrency: read(env, 'VIDEO_CONCURRENCY'),
    oracleMaxAttempts: read(env, 'ORACLE_MAX_ATTEMPTS'),
    outputDir: read(env, 'OUTPUT_DIR'),
    ffmpegPath: read(env, 'FFMPEG_PATH'),
    logLevel: read(env, 'LOG_LEVEL'),
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const invalid = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${invalid}`);
  }

  const { judgeModel, conceptModels, ...rest } = result.data;
  return {
    ...rest,
    judgeModel: judgeModel ?? rest.textModel,
    conceptModels: conceptModels.length > 0 ? [...new Set(conceptModels)] : [rest.textModel],
  };
}

function loadDotenv(): Env {
  dotenvConfig({ path: resolve(process.cwd(), '.env') });
  return process.env;
}

// ─── Brand brief ───

export const brandBriefSchema = z.object({
  brandName: z.string().min(1),
  productDescription: z.string().min(1),
  creativeDirection: z.string().default(''),
  adStyles: z.array(z.string().min(1)).min(1).default(['Achievement - Inspirational']),
  scenesCount: z.number().int().min(1).max(12).default(5),
  totalDurationSec: z.number().positive().default(30),
  clipDurationSec: z.number().positive().optional(),
  /** A concept of the user's own, expanded into a full concept instead of drafting one per style. */
  concept: z.string().trim().min(1).optional(),
  style: z
    .string()
    .default('Hyper-realistic cinematic photography, natural lighting, shallow depth of field'),
});

export type BrandBrief = z.infer<typeof brandBriefSchema>;
