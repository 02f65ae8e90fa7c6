import { GoogleGenAI } from '@google/genai';
import { snapClipDuration } from '@adreel/continuity';
import { ConfigError, MediaGenerationError, sleep, type Logger, type PipelineConfig } from '@adreel/shared';
import { readMediaInput, toUploadable } from '../persist.js';
import type { GeneratedMedia, VideoProvider, VideoRequest } from '../types.js';
import { ReplicateClient, firstOutputUrl } from './replicate.js';

export function isSoraModel(model: string): boolean {
  return model.toLowerCase().includes('sora-2');
}

// ─── Replicate (Veo family and Sora 2) ───

/** Image-to-video through Replicate. Veo and Sora 2 take differently shaped inputs. */
export class ReplicateVideoProvider implements VideoProvider {
  readonly name = 'replicate';

  constructor(
    private client: ReplicateClient,
    readonly model = 'google/veo-3-fast',
  ) {}

  async generate(request: VideoRequest): Promise<GeneratedMedia> {
    const duration = snapClipDuration(request.durationSec, this.model);
    const frame = request.firstFrame ? await toUploadable(request.firstFrame) : undefined;

    const input: Record<string, unknown> = isSoraModel(this.model)
      ? {
          prompt: request.prompt,
          seconds: duration,
          aspect_ratio: request.aspectRatio === '16:9' ? 'landscape' : 'portrait',
          ...(frame ? { input_reference: frame } : {}),
        }
      : {
          prompt: request.prompt,
          duration,
          resolution: request.resolution === '1080p' ? '1080p' : '720p',
          aspect_ratio: request.aspectRatio,
          generate_audio: true,
          ...(frame ? { image: frame } : {}),
        };

    const output = await this.client.run(this.model, input);
    return { kind: 'url', url: firstOutputUrl(output) };
  }
}

// ─── Google Veo via the Gemini API ───

export interface VeoOptions {
  apiKey: string;
  model?: string;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
}

/** Veo through @google/genai. Generates 4-8 second clips with native audio. */
export class VeoVideoProvider implements VideoProvider {
  readonly name = 'veo';
  readonly model: string;
  private client: GoogleGenAI;
  private apiKey: string;
  private pollIntervalMs: number;
  private maxPollAttempts: number;

  constructor(options: VeoOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.apiKey = options.apiKey;
    this.model = options.model ?? 'veo-3.1-fast-generate-preview';
    this.pollIntervalMs = options.pollIntervalMs ?? 10_000;
    this.maxPollAttempts = options.maxPollAttempts ?? 36; // 6 minutes
  }

  async generate(request: VideoRequest): Promise<GeneratedMedia> {
    const frame = request.firstFrame ? await readMediaInput(request.firstFrame) : undefined;

    let operation = await this.client.models.generateVideos({
      model: this.model,
      prompt: request.prompt,
      ...(frame ? { image: { imageBytes: frame.data.toString('base64'), mimeType: frame.mimeType } } : {}),
      config: {
        aspectRatio: request.aspectRatio,
        resolution: request.resolution === '1080p' ? '1080p' : '720p',
        durationSeconds: snapClipDuration(request.durationSec, this.model),
      },
    });

    let attempts = 0;
    while (!operation.done) {
      if (attempts++ >= this.maxPollAttempts) {
        throw new MediaGenerationError(`Veo generation timed out after ${attempts - 1} poll attempts`);
      }
      await sleep(this.pollIntervalMs);
      operation = await this.client.operations.getVideosOperation({ operation });
    }

    if (operation.error) {
      throw new MediaGenerationError(`Veo generation failed: ${JSON.stringify(operation.error)}`);
    }

    const video = operation.response?.generatedVideos?.[0]?.video;
    if (!video) {
      throw new MediaGenerationError('Veo returned no generated videos');
    }
    if (video.videoBytes) {
      return { kind: 'bytes', data: Buffer.from(video.videoBytes, 'base64'), mimeType: video.mimeType ?? 'video/mp4' };
    }
    if (video.uri) {
      return { kind: 'url', url: video.uri, headers: { 'x-goog-api-key': this.apiKey } };
    }
    throw new MediaGenerationError('Veo video has neither bytes nor a URI');
  }
}

// ─── Mock ───

export class MockVideoProvider implements VideoProvider {
  readonly name = 'mock';
  readonly requests: VideoRequest[] = [];

  constructor(readonly model = 'mock/veo-3') {}

  async generate(request: VideoRequest): Promise<GeneratedMedia> {
    this.requests.push(request);
    return { kind: 'bytes', data: Buffer.from(`mock video\n${request.prompt}`), mimeType: 'video/mp4' };
  }
}

// ─── Factory ───

export function createVideoProvider(config: PipelineConfig, logger: Logger): VideoProvider {
  switch (config.videoProvider) {
    case 'replicate':
      if (!config.replicateApiToken) {
        throw new ConfigError('REPLICATE_API_TOKEN is required for the replicate video provider');
      }
      return new ReplicateVideoProvider(
        new ReplicateClient({ apiToken: config.replicateApiToken }, logger),
        config.videoModel,
      );
    case 'veo':
      if (!config.googleApiKey) {
        throw new ConfigError('GOOGLE_API_KEY is required for the veo video provider');
      }
      return new VeoVideoProvider({
        apiKey: config.googleApiKey,
        ...(config.videoModel.startsWith('veo') ? { model: config.videoModel } : {}),
      });
    case 'mock':
      return new MockVideoProvider(config.videoModel);
  }
}
