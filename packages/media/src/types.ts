import type { Resolution } from '@adreel/shared';

/** Provider output: inline bytes, or a URL still to be downloaded. */
export type GeneratedMedia =
  | { kind: 'bytes'; data: Buffer; mimeType: string }
  | { kind: 'url'; url: string; headers?: Record<string, string> };

export type AspectRatio = '16:9' | '9:16';

export interface ImageRequest {
  prompt: string;
  /** Local file paths or http(s) URLs, at most five. */
  referenceImages: readonly string[];
  resolution: Resolution;
  aspectRatio: AspectRatio;
}

export interface ImageProvider {
  readonly name: string;
  generate(request: ImageRequest): Promise<GeneratedMedia>;
}

export interface VideoRequest {
  prompt: string;
  /** Local path of the still the clip starts from; text-to-video when absent. */
  firstFrame?: string;
  durationSec: number;
  resolution: Resolution;
  aspectRatio: AspectRatio;
}

export interface VideoProvider {
  readonly name: string;
  /** Model id, used for duration snapping and clip file suffixes. */
  readonly model: string;
  generate(request: VideoRequest): Promise<GeneratedMedia>;
}
