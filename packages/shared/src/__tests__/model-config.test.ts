import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../logger.js', () => ({
  logger: {
    child: vi.fn().mockReturnValue({
      info: vi.fn(),
      warn: vi.fn(),
      debug: vi.fn(),
    }),
  },
}));

import {
  loadModelClientConfig,
  resolveApiBaseURL,
  DEFAULT_MODEL,
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from '../model-config.js';

// ---------------------------------------------------------------------------
// Environment helpers
// ---------------------------------------------------------------------------

const savedEnv: Record<string, string | undefined> = {};

function setEnv(key: string, value: string | undefined) {
  if (!(key in savedEnv)) {
    savedEnv[key] = process.env[key];
  }
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

function restoreEnv() {
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  for (const key of Object.keys(savedEnv)) {
    delete savedEnv[key];
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('model-config', () => {
  describe('loadModelClientConfig() from process.env', () => {
    beforeEach(() => {
      setEnv('OLLAMA_BASE_URL', undefined);
      setEnv('OPENAI_BASE_URL', undefined);
      setEnv('OPENAI_API_KEY', undefined);
      setEnv('CHAT_MODEL', undefined);
      setEnv('COMPLETION_TIMEOUT_MS', undefined);
    });

    afterEach(() => {
      restoreEnv();
    });

    it('defaults to a local Ollama server and the built-in model', () => {
      const config = loadModelClientConfig();
      expect(config).toEqual({
        provider: { provider: 'ollama', baseURL: 'http://localhost:11434' },
        modelName: 'gemma3:12b',
        timeoutMs: 120_000,
      });
    });

    it('reads OLLAMA_BASE_URL', () => {
      setEnv('OLLAMA_BASE_URL', 'http://custom-server:8080');
      const config = loadModelClientConfig();
      expect(config.provider).toEqual({ provider: 'ollama', baseURL: 'http://custom-server:8080' });
    });
  });

  describe('loadModelClientConfig() with an explicit env', () => {
    it('exposes the defaults as constants', () => {
      expect(DEFAULT_OLLAMA_BASE_URL).toBe('http://localhost:11434');
      expect(DEFAULT_MODEL).toBe('gemma3:12b');
      expect(DEFAULT_TIMEOUT_MS).toBe(120_000);
    });

    it('treats blank values as unset', () => {
      const config = loadModelClientConfig({ OLLAMA_BASE_URL: '   ', CHAT_MODEL: '' });
      expect(config.provider.baseURL).toBe('http://localhost:11434');
      expect(config.modelName).toBe('gemma3:12b');
    });

    it('CHAT_MODEL overrides the model', () => {
      const config = loadModelClientConfig({ CHAT_MODEL: 'llama3.1:8b' });
      expect(config.modelName).toBe('llama3.1:8b');
    });

    it('switches to an OpenAI-compatible server when OPENAI_BASE_URL is set', () => {
      const config = loadModelClientConfig({
        OLLAMA_BASE_URL: 'http://ignored:11434',
        OPENAI_BASE_URL: 'http://llm.internal:8000/v1',
        OPENAI_API_KEY: 'test-secret',
      });
      expect(config.provider).toEqual({
        provider: 'openai-compatible',
        baseURL: 'http://llm.internal:8000/v1',
        apiKey: 'test-secret',
      });
    });

    it('leaves the api key undefined when OPENAI_API_KEY is unset', () => {
      const config = loadModelClientConfig({ OPENAI_BASE_URL: 'http://llm.internal:8000/v1' });
      expect(config.provider).toEqual({
        provider: 'openai-compatible',
        baseURL: 'http://llm.internal:8000/v1',
        apiKey: undefined,
      });
    });

    it('throws on an invalid base URL', () => {
      expect(() => loadModelClientConfig({ OLLAMA_BASE_URL: 'not a url' })).toThrow(
        "model-config: OLLAMA_BASE_URL is not a valid URL: 'not a url'",
      );
    });

    it('reads COMPLETION_TIMEOUT_MS', () => {
      const config = loadModelClientConfig({ COMPLETION_TIMEOUT_MS: '30000' });
      expect(config.timeoutMs).toBe(30_000);
    });

    it.each(['abc', '0', '-5', '1.5'])('falls back to the default timeout for %s', (raw) => {
      const config = loadModelClientConfig({ COMPLETION_TIMEOUT_MS: raw });
      expect(config.timeoutMs).toBe(120_000);
    });
  });

  describe('resolveApiBaseURL()', () => {
    it('appends /v1 for Ollama', () => {
      expect(resolveApiBaseURL({ provider: 'ollama', baseURL: 'http://localhost:11434' })).toBe(
        'http://localhost:11434/v1',
      );
    });

    it('strips trailing slashes before appending', () => {
      expect(resolveApiBaseURL({ provider: 'ollama', baseURL: 'http://localhost:11434/' })).toBe(
        'http://localhost:11434/v1',
      );
    });

    it('does not double the /v1 suffix', () => {
      expect(resolveApiBaseURL({ provider: 'ollama', baseURL: 'http://localhost:11434/v1/' })).toBe(
        'http://localhost:11434/v1',
      );
    });

    it('uses OpenAI-compatible URLs as given', () => {
      expect(
        resolveApiBaseURL({ provider: 'openai-compatible', baseURL: 'http://llm.internal:8000/api' }),
      ).toBe('http://llm.internal:8000/api');
    });
  });
});
