import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AnthropicTextOracle,
  OpenAITextOracle,
  createTextOracle,
  parseModelId,
} from './oracle.js';
import { loadConfig } from './config.js';
import { ConfigError, OracleRequestError } from './errors.js';
import type { Logger } from './logger.js';

const mockLogger: Logger = {
  info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
} as unknown as Logger;

describe('parseModelId', () => {
  it('splits provider and model', () => {
    expect(parseModelId('openai/gpt-5')).toEqual({ provider: 'openai', model: 'gpt-5' });
    expect(parseModelId('anthropic/claude-sonnet-4-5-20250929')).toEqual({
      provider: 'anthropic',
      model: 'claude-sonnet-4-5-20250929',
    });
  });

  it('treats a bare model as anthropic and google as gemini', () => {
    expect(parseModelId('claude-opus-4-1')).toEqual({ provider: 'anthropic', model: 'claude-opus-4-1' });
    expect(parseModelId('google/gemini-2.5-pro')).toEqual({ provider: 'gemini', model: 'gemini-2.5-pro' });
  });

  it('rejects unknown providers', () => {
    expect(() => parseModelId('mistral/large')).toThrow(ConfigError);
  });
});

describe('AnthropicTextOracle', () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('joins text blocks and skips thinking blocks', async () => {
    mockFetch.mockResolvedValue({
      ok: true,
      json: () => Promise.resolve({
        content: [
          { type: 'thinking', thinking: 'hmm' },
          { type: 'text', text: 'first' },
          { type: 'text', text: 'second' },
        ],
      }),
    });

    const oracle = new AnthropicTextOracle({ apiKey: 'test-key', model: 'claude-test' }, mockLogger);
    await expect(oracle.complete('hello', { system: 'be brief', maxTokens: 100 })).resolves.toBe('first\nsecond');

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(init.headers['x-api-key']).toBe('test-key');
    expect(JSON.parse(init.body)).toEqual({
      model: 'claude-test',
      max_tokens: 100,
      system: 'be brief',
      messages: [{ role: 'user', content: 'hello' }],
    });
  });

  it('raises OracleRequestError without retrying client errors', async () => {
    mockFetch.mockResolvedValue({ ok: false, status: 400, text: () => Promise.resolve('bad request') });

    const oracle = new AnthropicTextOracle({ apiKey: 'test-key', model: 'claude-test' }, mockLogger);
    const err = await oracle.complete('hello').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OracleRequestError);
    expect(err).toMatchObject({ status: 400, message: 'anthropic API error 400: bad request' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('fails when the response has no text', async () => {
    mockFetch.mockResolvedValue({
      ok: true,
      json: () => Promise.resolve({ content: [{ type: 'thinking' }] }),
    });

    const oracle = new AnthropicTextOracle({ apiKey: 'test-key', model: 'claude-test' }, mockLogger);
    await expect(oracle.complete('hello')).rejects.toThrow('anthropic/claude-test returned no text content');
  });
});

describe('OpenAITextOracle', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends a system message and returns the first choice', async () => {
    const mockFetch = vi.fn().mockResolvedValue({
      ok: true,
      json: () => Promise.resolve({ choices: [{ message: { content: '{"ok": true}' } }] }),
    });
    vi.stubGlobal('fetch', mockFetch);

    const oracle = new OpenAITextOracle({ apiKey: 'test-key', model: 'gpt-test' }, mockLogger);
    await expect(oracle.complete('judge this', { system: 'you are a judge' })).resolves.toBe('{"ok": true}');

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init.headers.Authorization).toBe('Bearer test-key');
    expect(JSON.parse(init.body).messages).toEqual([
      { role: 'system', content: 'you are a judge' },
      { role: 'user', content: 'judge this' },
    ]);
  });
});

describe('createTextOracle', () => {
  it('builds the oracle for the model provider', () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: 'test-key', OPENAI_API_KEY: 'test-key' });
    expect(createTextOracle('openai/gpt-test', config, mockLogger).modelId).toBe('openai/gpt-test');
    expect(createTextOracle('claude-test', config, mockLogger).modelId).toBe('anthropic/claude-test');
  });

  it('requires the provider key', () => {
    const config = loadConfig({});
    expect(() => createTextOracle('gemini/gemini-test', config, mockLogger)).toThrow(
      'GOOGLE_API_KEY is required for gemini/gemini-test',
    );
  });
});
