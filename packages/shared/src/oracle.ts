import { GoogleGenAI } from '@google/genai';
import { z } from 'zod';
import type { PipelineConfig } from './config.js';
import { ConfigError, OracleRequestError, PipelineError } from './errors.js';
import type { Logger } from './logger.js';
import { withRetry } from './retry.js';

/** Text-generation oracles addressed by "{provider}/{model}" identifiers. */

export interface CompletionOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TextOracle {
  readonly modelId: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export const TEXT_PROVIDERS = ['anthropic', 'openai', 'gemini'] as const;
export type TextProvider = (typeof TEXT_PROVIDERS)[number];

const DEFAULT_MAX_TOKENS = 8192;

/** A bare model name means Anthropic; "google/..." is accepted for Gemini. */
export function parseModelId(modelId: string): { provider: TextProvider; model: string } {
  const slash = modelId.indexOf('/');
  if (slash === -1) return { provider: 'anthropic', model: modelId };

  const prefix = modelId.slice(0, slash).toLowerCase();
  const model = modelId.slice(slash + 1);
  if (prefix === 'google') return { provider: 'gemini', model };
  if (prefix === 'anthropic' || prefix === 'openai' || prefix === 'gemini') {
    return { provider: prefix, model };
  }
  throw new ConfigError(`Unknown text provider "${prefix}" in model id ${modelId}`);
}

export interface OracleClientOptions {
  apiKey: string;
  model: string;
  maxAttempts?: number;
  baseUrl?: string;
}

// ─── Anthropic ───

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/** Claude Messages API. Thinking blocks are skipped; text blocks are joined. */
export class AnthropicTextOracle implements TextOracle {
  readonly modelId: string;
  private baseUrl: string;

  constructor(
    private options: OracleClientOptions,
    private logger: Logger,
  ) {
    this.modelId = `anthropic/${options.model}`;
    this.baseUrl = options.baseUrl ?? 'https://api.anthropic.com/v1';
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    return withRetry(() => this.request(prompt, options), this.logger, this.modelId, {
      maxAttempts: this.options.maxAttempts,
    });
  }

  private async request(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await fetch(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.options.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.options.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        ...(options.system ? { system: options.system } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        messages: [{ role: 'user', content: prompt }],
      }),
    });

    if (!response.ok) {
      throw new OracleRequestError('anthropic', response.status, await response.text());
    }

    const data = anthropicResponseSchema.parse(await response.json());
    const text = data.content
      .filter((block) => block.type === 'text' && block.text)
      .map((block) => block.text)
      .join('\n');

    if (!text) throw new PipelineError(`${this.modelId} returned no text content`);
    return text;
  }
}

// ─── OpenAI ───

const openaiResponseSchema = z.object({
  choices: z.array(
    z.object({ message: z.object({ content: z.string().nullable().optional() }) }),
  ),
});

export class OpenAITextOracle implements TextOracle {
  readonly modelId: string;
  private baseUrl: string;

  constructor(
    private options: OracleClientOptions,
    private logger: Logger,
  ) {
    this.modelId = `openai/${options.model}`;
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    return withRetry(() => this.request(prompt, options), this.logger, this.modelId, {
      maxAttempts: this.options.maxAttempts,
    });
  }

  private async request(prompt: string, options: CompletionOptions): Promise<string> {
    const messages = [
      ...(options.system ? [{ role: 'system', content: options.system }] : []),
      { role: 'user', content: prompt },
    ];

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify({
        model: this.options.model,
        messages,
        max_completion_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      }),
    });

    if (!response.ok) {
      throw new OracleRequestError('openai', response.status, await response.text());
    }

    const data = openaiResponseSchema.parse(await response.json());
    const text = data.choices[0]?.message.content ?? '';
    if (!text) throw new PipelineError(`${this.modelId} returned no text content`);
    return text;
  }
}

// ─── Gemini ───

export class GeminiTextOracle implements TextOracle {
  readonly modelId: string;
  private client: GoogleGenAI;

  constructor(
    private options: OracleClientOptions,
    private logger: Logger,
  ) {
    this.modelId = `gemini/${options.model}`;
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    return withRetry(() => this.request(prompt, options), this.logger, this.modelId, {
      maxAttempts: this.options.maxAttempts,
    });
  }

  private async request(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.options.model,
      contents: prompt,
      config: {
        ...(options.system ? { systemInstruction: options.system } : {}),
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        maxOutputTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      },
    });

    const text = response.text ?? '';
    if (!text) throw new PipelineError(`${this.modelId} returned no text content`);
    return text;
  }
}

// ─── Factory ───

export function createTextOracle(
  modelId: string,
  config: PipelineConfig,
  logger: Logger,
): TextOracle {
  const { provider, model } = parseModelId(modelId);
  const maxAttempts = config.oracleMaxAttempts;

  switch (provider) {
    case 'anthropic':
      if (!config.anthropicApiKey) throw new ConfigError(`ANTHROPIC_API_KEY is required for ${modelId}`);
      return new AnthropicTextOracle({ apiKey: config.anthropicApiKey, model, maxAttempts }, logger);
    case 'openai':
      if (!config.openaiApiKey) throw new ConfigError(`OPENAI_API_KEY is required for ${modelId}`);
      return new OpenAITextOracle({ apiKey: config.openaiApiKey, model, maxAttempts }, logger);
    case 'gemini':
      if (!config.googleApiKey) throw new ConfigError(`GOOGLE_API_KEY is required for ${modelId}`);
      return new GeminiTextOracle({ apiKey: config.googleApiKey, model, maxAttempts }, logger);
  }
}
