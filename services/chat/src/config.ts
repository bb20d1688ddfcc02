import { loadModelClientConfig, logger } from '@taskchat/shared';
import type { ModelClientConfig } from '@taskchat/shared';

const log = logger.child({ module: 'config' });

export interface ChatConfig {
  client: ModelClientConfig;
  /** Max output tokens per chat completion */
  maxTokens: number;
  temperature: number;
  /** Skip the startup connectivity and tool-calling check */
  skipProbe: boolean;
  showHelp: boolean;
}

const KNOWN_FLAGS = new Set(['--skip-probe', '--help', '-h']);

export const USAGE = `Usage: taskchat [--skip-probe] [--help]

Chat with a local model that can manage a task list through tool calls.

Options:
  --skip-probe   Start chatting without the startup connection check
  -h, --help     Show this help

Environment:
  OLLAMA_BASE_URL         Ollama server address (default: http://localhost:11434)
  OPENAI_BASE_URL         Use an OpenAI-compatible server instead of Ollama
  OPENAI_API_KEY          API key for that server
  CHAT_MODEL              Model identifier (default: gemma3:12b)
  COMPLETION_TIMEOUT_MS   Per-request timeout (default: 120000)
  LOG_LEVEL               Log level for stderr output (default: warn)`;

export function loadChatConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
): ChatConfig {
  for (const arg of argv) {
    if (!KNOWN_FLAGS.has(arg)) {
      log.warn({ arg }, 'ignoring unknown argument');
    }
  }

  return {
    client: loadModelClientConfig(env),
    maxTokens: 500,
    temperature: 0.7,
    skipProbe: argv.includes('--skip-probe'),
    showHelp: argv.includes('--help') || argv.includes('-h'),
  };
}
