export * from './model-types.js';
export { logger } from './logger.js';
export { withSpan } from './tracing.js';
export {
  loadModelClientConfig,
  resolveApiBaseURL,
  DEFAULT_MODEL,
  DEFAULT_OLLAMA_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './model-config.js';
export {
  ModelClient,
  createModelClient,
  toOpenAIMessages,
  toOpenAITools,
  decodeArguments,
} from './model-client.js';
