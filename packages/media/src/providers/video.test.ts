import { describe, it, expect, vi, beforeEach } from 'vitest';
import { loadConfig, type Logger } from '@adreel/shared';
import type { VideoRequest } from '../types.js';
import { ReplicateClient } from './replicate.js';
import {
  MockVideoProvider,
  ReplicateVideoProvider,
  VeoVideoProvider,
  createVideoProvider,
  isSoraModel,
} from './video.js';

const genai = vi.hoisted(() => ({ generateVideos: vi.fn(), getVideosOperation: vi.fn() }));

vi.mock('@google/genai', () => ({
  GoogleGenAI: vi.fn().mockImplementation(() => ({
    models: { generateVideos: genai.generateVideos },
    operations: { getVideosOperation: genai.getVideosOperation },
  })),
}));

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

function request(overrides: Partial<VideoRequest> = {}): VideoRequest {
  return { prompt: 'Kite lifts off', durationSec: 6, resolution: '480p', aspectRatio: '16:9', ...overrides };
}

describe('ReplicateVideoProvider', () => {
  it('sends the Veo input shape with the first frame as image', async () => {
    const client = new ReplicateClient({ apiToken: 'test-token' });
    const run = vi.spyOn(client, 'run').mockResolvedValue('https://replicate.delivery/clip.mp4');

    const media = await new ReplicateVideoProvider(client, 'google/veo-3-fast').generate(
      request({ durationSec: 5, firstFrame: 'https://example.com/frame.png' }),
    );

    expect(media).toEqual({ kind: 'url', url: 'https://replicate.delivery/clip.mp4' });
    expect(run).toHaveBeenCalledWith('google/veo-3-fast', {
      prompt: 'Kite lifts off',
      duration: 4,
      resolution: '720p',
      aspect_ratio: '16:9',
      generate_audio: true,
      image: 'https://example.com/frame.png',
    });
  });

  it('sends the Sora 2 input shape', async () => {
    const client = new ReplicateClient({ apiToken: 'test-token' });
    const run = vi.spyOn(client, 'run').mockResolvedValue(['https://replicate.delivery/clip.mp4']);

    await new ReplicateVideoProvider(client, 'openai/sora-2').generate(
      request({ durationSec: 10, firstFrame: 'https://example.com/frame.png' }),
    );

    expect(run).toHaveBeenCalledWith('openai/sora-2', {
      prompt: 'Kite lifts off',
      seconds: 8,
      aspect_ratio: 'landscape',
      input_reference: 'https://example.com/frame.png',
    });
  });

  it('leaves the image out for text-to-video', async () => {
    const client = new ReplicateClient({ apiToken: 'test-token' });
    const run = vi.spyOn(client, 'run').mockResolvedValue('https://replicate.delivery/clip.mp4');

    await new ReplicateVideoProvider(client).generate(request({ resolution: '1080p' }));

    expect(run.mock.calls[0][1]).not.toHaveProperty('image');
    expect(run.mock.calls[0][1]).toMatchObject({ resolution: '1080p', duration: 6 });
  });
});

describe('VeoVideoProvider', () => {
  beforeEach(() => {
    genai.generateVideos.mockReset();
    genai.getVideosOperation.mockReset();
  });

  it('returns the video URI with the API key header', async () => {
    genai.generateVideos.mockResolvedValue({
      done: true,
      response: { generatedVideos: [{ video: { uri: 'https://generativelanguage.googleapis.com/files/abc' } }] },
    });

    const media = await new VeoVideoProvider({ apiKey: 'test-key' }).generate(request({ durationSec: 7 }));

    expect(media).toEqual({
      kind: 'url',
      url: 'https://generativelanguage.googleapis.com/files/abc',
      headers: { 'x-goog-api-key': 'test-key' },
    });
    expect(genai.generateVideos).toHaveBeenCalledWith({
      model: 'veo-3.1-fast-generate-preview',
      prompt: 'Kite lifts off',
      config: { aspectRatio: '16:9', resolution: '720p', durationSeconds: 6 },
    });
  });

  it('polls until the operation is done and prefers inline bytes', async () => {
    genai.generateVideos.mockResolvedValue({ done: false });
    genai.getVideosOperation.mockResolvedValue({
      done: true,
      response: { generatedVideos: [{ video: { videoBytes: Buffer.from('mp4').toString('base64') } }] },
    });

    const media = await new VeoVideoProvider({ apiKey: 'test-key', pollIntervalMs: 1 }).generate(request());

    expect(genai.getVideosOperation).toHaveBeenCalledTimes(1);
    expect(media).toEqual({ kind: 'bytes', data: Buffer.from('mp4'), mimeType: 'video/mp4' });
  });

  it('throws on timeout', async () => {
    genai.generateVideos.mockResolvedValue({ done: false });
    genai.getVideosOperation.mockResolvedValue({ done: false });

    const provider = new VeoVideoProvider({ apiKey: 'test-key', pollIntervalMs: 1, maxPollAttempts: 2 });
    await expect(provider.generate(request())).rejects.toThrow('Veo generation timed out after 2 poll attempts');
  });

  it('throws when no videos are returned', async () => {
    genai.generateVideos.mockResolvedValue({ done: true, response: { generatedVideos: [] } });

    await expect(new VeoVideoProvider({ apiKey: 'test-key' }).generate(request())).rejects.toThrow(
      'Veo returned no generated videos',
    );
  });
});

describe('video providers', () => {
  it('recognises Sora 2 models', () => {
    expect(isSoraModel('openai/sora-2')).toBe(true);
    expect(isSoraModel('google/veo-3-fast')).toBe(false);
  });

  it('records mock requests', async () => {
    const provider = new MockVideoProvider();
    await provider.generate(request());
    expect(provider.requests).toHaveLength(1);
    expect(provider.model).toBe('mock/veo-3');
  });

  it('builds the configured provider', () => {
    expect(createVideoProvider(loadConfig({ VIDEO_PROVIDER: 'mock' }), mockLogger)).toBeInstanceOf(MockVideoProvider);
    expect(createVideoProvider(loadConfig({ VIDEO_PROVIDER: 'veo', GOOGLE_API_KEY: 'test-key' }), mockLogger)).toBeInstanceOf(
      VeoVideoProvider,
    );
    expect(() => createVideoProvider(loadConfig({}), mockLogger)).toThrow(
      'REPLICATE_API_TOKEN is required for the replicate video provider',
    );
  });
});
