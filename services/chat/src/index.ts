#!/usr/bin/env -S npx tsx
import { createModelClient, logger } from '@taskchat/shared';
import { loadChatConfig, USAGE } from './config.js';
import { ConversationLoop } from './conversation.js';
import { confirmContinue, reportProbe, runProbe } from './probe.js';
import { TaskStore } from './task-store.js';
import { createTerminal } from './terminal.js';
import { createTaskRegistry } from './tools/index.js';

const log = logger.child({ module: 'taskchat' });

async function main(): Promise<number> {
  const config = loadChatConfig();
  if (config.showHelp) {
    console.log(USAGE);
    return 0;
  }

  const client = createModelClient(config.client);
  const model = config.client.modelName;
  const terminal = createTerminal({ assistantLabel: model });

  try {
    terminal.success('Inference client configured');
    terminal.notice(`API base URL: ${client.baseURL}`);
    terminal.notice(`Model: ${model}`);

    if (!config.skipProbe) {
      const probe = await runProbe(client, model);
      reportProbe(terminal, probe, { baseURL: client.baseURL, model });
      if (!(await confirmContinue(terminal, probe))) {
        terminal.notice('Exiting...');
        return 1;
      }
    }

    const store = new TaskStore();
    const loop = new ConversationLoop({
      client,
      registry: createTaskRegistry(store),
      terminal,
      model,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    });

    const reason = await loop.run();
    log.info({ reason, tasks: store.size, messages: loop.messages.length }, 'session finished');
    return 0;
  } finally {
    terminal.close();
  }
}

main()
  .then((code) => {
    // keep-alive sockets from the HTTP client would otherwise hold the process open
    process.exit(code);
  })
  .catch((err) => {
    log.error({ err }, 'fatal startup error');
    console.error('Fatal error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
