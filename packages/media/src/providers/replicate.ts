import { z } from 'zod';
import { MediaGenerationError, sleep, type Logger } from '@adreel/shared';

export interface ReplicateOptions {
  apiToken: string;
  baseUrl?: string;
  /** Seconds the create call may block waiting for the result. */
  waitSeconds?: number;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
}

const predictionSchema = z.object({
  id: z.string(),
  status: z.enum(['starting', 'processing', 'succeeded', 'failed', 'canceled', 'aborted']),
  output: z.unknown().optional(),
  error: z.unknown().optional(),
  urls: z.object({ get: z.string().optional() }).partial().optional(),
});

type Prediction = z.infer<typeof predictionSchema>;

const TERMINAL = new Set<Prediction['status']>(['succeeded', 'failed', 'canceled', 'aborted']);

/** Replicate predictions API: create with `Prefer: wait`, then poll until terminal. */
export class ReplicateClient {
  private apiToken: string;
  private baseUrl: string;
  private waitSeconds: number;
  private pollIntervalMs: number;
  private maxPollAttempts: number;

  constructor(
    options: ReplicateOptions,
    private logger?: Logger,
  ) {
    this.apiToken = options.apiToken;
    this.baseUrl = options.baseUrl ?? 'https://api.replicate.com/v1';
    this.waitSeconds = options.waitSeconds ?? 60;
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.maxPollAttempts = options.maxPollAttempts ?? 120; // 10 minutes
  }

  /** Runs `model` ("owner/name") to completion and returns its raw output. */
  async run(model: string, input: Record<string, unknown>): Promise<unknown> {
    let prediction = await this.request(`${this.baseUrl}/models/${model}/predictions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiToken}`,
        Prefer: `wait=${this.waitSeconds}`,
      },
      body: JSON.stringify({ input }),
    });

    let attempts = 0;
    while (!TERMINAL.has(prediction.status)) {
      if (attempts++ >= this.maxPollAttempts) {
        throw new MediaGenerationError(
          `Replicate prediction ${prediction.id} timed out after ${attempts - 1} poll attempts`,
        );
      }
      this.logger?.debug({ model, id: prediction.id, status: prediction.status }, 'Waiting for prediction');
      await sleep(this.pollIntervalMs);
      prediction = await this.request(prediction.urls?.get ?? `${this.baseUrl}/predictions/${prediction.id}`, {
        headers: { Authorization: `Bearer ${this.apiToken}` },
      });
    }

    if (prediction.status !== 'succeeded') {
      const reason = prediction.error ? String(prediction.error) : 'no error given';
      throw new MediaGenerationError(`Replicate prediction ${prediction.id} ${prediction.status}: ${reason}`);
    }
    return prediction.output;
  }

  private async request(url: string, init: RequestInit): Promise<Prediction> {
    const response = await fetch(url, init);
    if (!response.ok) {
      const body = await response.text();
      throw new MediaGenerationError(`Replicate API error ${response.status}: ${body}`);
    }

    const parsed = predictionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new MediaGenerationError('Unexpected Replicate prediction payload', parsed.error);
    }
    return parsed.data;
  }
}

/** A model's output is a URL or a list of URLs; the first one is the result. */
export function firstOutputUrl(output: unknown): string {
  const first: unknown = Array.isArray(output) ? output[0] : output;
  if (typeof first === 'string' && first.length > 0) return first;
  throw new MediaGenerationError(`Replicate output has no URL: ${JSON.stringify(output)}`);
}
