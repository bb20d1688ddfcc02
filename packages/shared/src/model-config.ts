/**
 * Model client configuration loader.
 *
 * Resolution:
 *   1. OPENAI_BASE_URL set → OpenAI-compatible server (OPENAI_API_KEY optional)
 *   2. Otherwise Ollama at OLLAMA_BASE_URL (default http://localhost:11434)
 *   3. CHAT_MODEL overrides the built-in model, COMPLETION_TIMEOUT_MS the timeout
 */

import { logger } from './logger.js';
import type { ModelClientConfig, ProviderConfig } from './model-types.js';

const log = logger.child({ module: 'model-config' });

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_MODEL = 'gemma3:12b';
export const DEFAULT_TIMEOUT_MS = 120_000;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function validateBaseURL(value: string, variable: string): string {
  try {
    new URL(value);
  } catch {
    throw new Error(`model-config: ${variable} is not a valid URL: '${value}'`);
  }
  return value;
}

function resolveProvider(env: Env): ProviderConfig {
  const openAIBaseURL = readEnv(env, 'OPENAI_BASE_URL');
  if (openAIBaseURL) {
    return {
      provider: 'openai-compatible',
      baseURL: validateBaseURL(openAIBaseURL, 'OPENAI_BASE_URL'),
      apiKey: readEnv(env, 'OPENAI_API_KEY'),
    };
  }

  return {
    provider: 'ollama',
    baseURL: validateBaseURL(readEnv(env, 'OLLAMA_BASE_URL') ?? DEFAULT_OLLAMA_BASE_URL, 'OLLAMA_BASE_URL'),
  };
}

function resolveTimeout(env: Env): number {
  const raw = readEnv(env, 'COMPLETION_TIMEOUT_MS');
  if (!raw) return DEFAULT_TIMEOUT_MS;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    log.warn({ configured: raw, using: DEFAULT_TIMEOUT_MS }, 'invalid COMPLETION_TIMEOUT_MS, using default');
    return DEFAULT_TIMEOUT_MS;
  }
  return parsed;
}

/**
 * The URL the OpenAI SDK should talk to. Ollama serves its OpenAI-compatible
 * API under /v1.
 */
export function resolveApiBaseURL(provider: ProviderConfig): string {
  const trimmed = provider.baseURL.replace(/\/+$/, '');
  if (provider.provider === 'ollama' && !trimmed.endsWith('/v1')) {
    return `${trimmed}/v1`;
  }
  return trimmed;
}

export function loadModelClientConfig(env: Env = process.env): ModelClientConfig {
  const config: ModelClientConfig = {
    provider: resolveProvider(env),
    modelName: readEnv(env, 'CHAT_MODEL') ?? DEFAULT_MODEL,
    timeoutMs: resolveTimeout(env),
  };

  log.info(
    {
      provider: config.provider.provider,
      baseURL: config.provider.baseURL,
      model: config.modelName,
      timeoutMs: config.timeoutMs,
    },
    'model client config loaded',
  );

  return config;
}
