import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockLog } = vi.hoisted(() => ({
  mockLog: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

vi.mock('@taskchat/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@taskchat/shared')>()),
  logger: { child: vi.fn().mockReturnValue(mockLog) },
}));

import { USAGE, loadChatConfig } from '../config.js';

describe('loadChatConfig()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('defaults to probing a local Ollama server', () => {
    expect(loadChatConfig([], {})).toEqual({
      client: {
        provider: { provider: 'ollama', baseURL: 'http://localhost:11434' },
        modelName: 'gemma3:12b',
        timeoutMs: 120_000,
      },
      maxTokens: 500,
      temperature: 0.7,
      skipProbe: false,
      showHelp: false,
    });
  });

  it('reads the model client settings from the given env', () => {
    const config = loadChatConfig([], { OLLAMA_BASE_URL: 'http://gpu-box:11434', CHAT_MODEL: 'qwen2.5:7b' });
    expect(config.client.provider).toEqual({ provider: 'ollama', baseURL: 'http://gpu-box:11434' });
    expect(config.client.modelName).toBe('qwen2.5:7b');
  });

  it('honours --skip-probe', () => {
    expect(loadChatConfig(['--skip-probe'], {}).skipProbe).toBe(true);
  });

  it.each([['--help'], ['-h']])('honours %s', (flag) => {
    expect(loadChatConfig([flag], {}).showHelp).toBe(true);
  });

  it('warns about unknown arguments', () => {
    const config = loadChatConfig(['--verbose', '--skip-probe'], {});

    expect(config.skipProbe).toBe(true);
    expect(mockLog.warn).toHaveBeenCalledTimes(1);
    expect(mockLog.warn).toHaveBeenCalledWith({ arg: '--verbose' }, 'ignoring unknown argument');
  });

  it('documents every flag and variable', () => {
    for (const word of ['--skip-probe', '--help', 'OLLAMA_BASE_URL', 'OPENAI_BASE_URL', 'CHAT_MODEL', 'LOG_LEVEL']) {
      expect(USAGE).toContain(word);
    }
  });
});
