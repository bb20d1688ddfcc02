/**
 * Session bootstrap probe.
 *
 * Before the chat starts, check that the server answers at all and that the
 * model can drive a tool-calling round. The outcome is advisory: when it
 * fails the operator decides whether to continue.
 */

import { logger } from '@taskchat/shared';
import type { CompletionClient } from '@taskchat/shared';
import { TaskStore } from './task-store.js';
import { createTaskRegistry } from './tools/index.js';
import { InputInterruptedError, type Terminal } from './terminal.js';

const log = logger.child({ module: 'probe' });

export const CONNECTION_PROMPT = 'Say hello!';
export const TOOL_PROMPT =
  "Please add a task called 'integration_test' with description 'Testing tool calling integration' " +
  "and then tell me if task 'validate' exists.";

const PROBE_TEMPERATURE = 0.7;

export interface ProbeResult {
  ok: boolean;
  connection: { ok: boolean; reply?: string; error?: string };
  toolCalling: { ok: boolean; detail: string; calls: string[] };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function probeToolCalling(client: CompletionClient, model: string): Promise<ProbeResult['toolCalling']> {
  // Scratch store: the probe must not leave tasks behind in the real session
  const store = new TaskStore();
  store.add('validate', 'Tool calling validation test');
  const registry = createTaskRegistry(store);

  const turn = await client.complete({
    model,
    messages: [{ role: 'user', content: TOOL_PROMPT }],
    tools: registry.definitions(),
    maxTokens: 200,
    temperature: PROBE_TEMPERATURE,
  });

  if (turn.toolCalls.length === 0) {
    return { ok: false, detail: 'model did not request any tool calls', calls: [] };
  }

  const calls: string[] = [];
  for (const call of turn.toolCalls) {
    const result = await registry.execute(call.name, call.arguments);
    calls.push(`${call.name}: ${result}`);
  }

  if (!store.has('integration_test')) {
    return { ok: false, detail: "model made tool calls but task 'integration_test' was not added", calls };
  }
  return { ok: true, detail: `model made ${calls.length} tool call(s)`, calls };
}

export async function runProbe(client: CompletionClient, model: string): Promise<ProbeResult> {
  let reply: string;
  try {
    const turn = await client.complete({
      model,
      messages: [{ role: 'user', content: CONNECTION_PROMPT }],
      maxTokens: 50,
      temperature: PROBE_TEMPERATURE,
    });
    reply = turn.text;
  } catch (err) {
    log.warn({ err }, 'connection probe failed');
    return {
      ok: false,
      connection: { ok: false, error: errorMessage(err) },
      toolCalling: { ok: false, detail: 'skipped: no connection', calls: [] },
    };
  }

  let toolCalling: ProbeResult['toolCalling'];
  try {
    toolCalling = await probeToolCalling(client, model);
  } catch (err) {
    log.warn({ err }, 'tool-calling probe failed');
    toolCalling = { ok: false, detail: `tool calling request failed: ${errorMessage(err)}`, calls: [] };
  }

  log.info({ toolCalling: toolCalling.ok }, 'probe finished');
  return { ok: toolCalling.ok, connection: { ok: true, reply }, toolCalling };
}

export function reportProbe(terminal: Terminal, result: ProbeResult, context: { baseURL: string; model: string }): void {
  if (result.connection.ok) {
    terminal.success('Connection to the inference server successful!');
    terminal.notice(`Test response: ${result.connection.reply ?? ''}`);
  } else {
    terminal.error(`Failed to connect to the inference server: ${result.connection.error ?? 'unknown error'}`);
  }

  for (const call of result.toolCalling.calls) {
    terminal.notice(`Probe tool call ${call}`);
  }
  if (result.toolCalling.ok) {
    terminal.success(`Tool calling works: ${result.toolCalling.detail}`);
  } else if (result.connection.ok) {
    terminal.warn(`Tool calling check failed: ${result.toolCalling.detail}`);
  }

  if (!result.ok) {
    terminal.notice('Troubleshooting:');
    terminal.notice(`1. Ensure the inference server is running at ${context.baseURL}`);
    terminal.notice(`2. Verify that the '${context.model}' model is available and supports tool calling`);
    terminal.notice('3. Check network connectivity');
    terminal.notice('4. Set OLLAMA_BASE_URL if the server runs at a custom address');
  }
}

/**
 * Decide whether to start the chat. A passing probe proceeds; otherwise the
 * operator is asked, and only "y" or "yes" proceeds.
 */
export async function confirmContinue(terminal: Terminal, result: ProbeResult): Promise<boolean> {
  if (result.ok) return true;

  terminal.warn('The startup check failed. The chat may not work properly.');
  let answer: string;
  try {
    answer = await terminal.readLine('Do you want to continue anyway? (y/n): ');
  } catch (err) {
    if (err instanceof InputInterruptedError) return false;
    throw err;
  }
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}
