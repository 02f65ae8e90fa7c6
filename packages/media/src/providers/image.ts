import { GoogleGenAI, Modality } from '@google/genai';
import {
  ConfigError,
  MAX_REFERENCE_IMAGES,
  MediaGenerationError,
  type Logger,
  type PipelineConfig,
  type Resolution,
} from '@adreel/shared';
import { readMediaInput, toUploadable } from '../persist.js';
import type { GeneratedMedia, ImageProvider, ImageRequest } from '../types.js';
import { ReplicateClient, firstOutputUrl } from './replicate.js';

function assertReferenceLimit(request: ImageRequest): void {
  if (request.referenceImages.length > MAX_REFERENCE_IMAGES) {
    throw new MediaGenerationError(
      `At most ${MAX_REFERENCE_IMAGES} reference images are supported, got ${request.referenceImages.length}`,
    );
  }
}

// ─── Replicate (nano-banana-pro, primary) ───

/** nano-banana-pro renders at 1K or 2K. */
export function nanoBananaResolution(resolution: Resolution): '1K' | '2K' {
  return resolution === '480p' ? '1K' : '2K';
}

export class ReplicateImageProvider implements ImageProvider {
  readonly name = 'replicate';

  constructor(
    private client: ReplicateClient,
    private model = 'google/nano-banana-pro',
  ) {}

  async generate(request: ImageRequest): Promise<GeneratedMedia> {
    assertReferenceLimit(request);

    const hasReferences = request.referenceImages.length > 0;
    const output = await this.client.run(this.model, {
      prompt: request.prompt,
      resolution: nanoBananaResolution(request.resolution),
      aspect_ratio: hasReferences ? 'match_input_image' : request.aspectRatio,
      output_format: 'png',
      safety_filter_level: 'block_only_high',
      image_input: await Promise.all(request.referenceImages.map(toUploadable)),
    });

    return { kind: 'url', url: firstOutputUrl(output) };
  }
}

// ─── Gemini image model (alternate) ───

export interface GeminiImageOptions {
  apiKey: string;
  model?: string;
}

/** Gemini native image generation; reference images travel as inline parts. */
export class GeminiImageProvider implements ImageProvider {
  readonly name = 'gemini';
  private client: GoogleGenAI;
  private model: string;

  constructor(options: GeminiImageOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'gemini-2.5-flash-image';
  }

  async generate(request: ImageRequest): Promise<GeneratedMedia> {
    assertReferenceLimit(request);

    const references = await Promise.all(request.referenceImages.map(readMediaInput));
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: [
        {
          role: 'user',
          parts: [
            ...references.map((ref) => ({
              inlineData: { data: ref.data.toString('base64'), mimeType: ref.mimeType },
            })),
            { text: `${request.prompt}\n\nAspect ratio: ${request.aspectRatio}.` },
          ],
        },
      ],
      config: { responseModalities: [Modality.IMAGE] },
    });

    const parts = response.candidates?.[0]?.content?.parts ?? [];
    const image = parts.find((p) => p.inlineData?.data);
    if (!image?.inlineData?.data) {
      throw new MediaGenerationError(`${this.model} returned no image data`);
    }

    return {
      kind: 'bytes',
      data: Buffer.from(image.inlineData.data, 'base64'),
      mimeType: image.inlineData.mimeType ?? 'image/png',
    };
  }
}

// ─── Mock ───

/** Offline provider: returns a placeholder PNG and records each request. */
export class MockImageProvider implements ImageProvider {
  readonly name = 'mock';
  readonly requests: ImageRequest[] = [];

  async generate(request: ImageRequest): Promise<GeneratedMedia> {
    assertReferenceLimit(request);
    this.requests.push(request);
    return { kind: 'bytes', data: Buffer.from(`mock image\n${request.prompt}`), mimeType: 'image/png' };
  }
}

// ─── Factory ───

export function createImageProvider(config: PipelineConfig, logger: Logger): ImageProvider {
  switch (config.imageProvider) {
    case 'replicate':
      if (!config.replicateApiToken) {
        throw new ConfigError('REPLICATE_API_TOKEN is required for the replicate image provider');
      }
      return new ReplicateImageProvider(
        new ReplicateClient({ apiToken: config.replicateApiToken }, logger),
        config.imageModel,
      );
    case 'gemini':
      if (!config.googleApiKey) {
        throw new ConfigError('GOOGLE_API_KEY is required for the gemini image provider');
      }
      return new GeminiImageProvider({
        apiKey: config.googleApiKey,
        ...(config.imageModel.startsWith('gemini') ? { model: config.imageModel } : {}),
      });
    case 'mock':
      return new MockImageProvider();
  }
}
