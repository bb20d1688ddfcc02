import { logger } from '@taskchat/shared';
import type { AssistantTurn, ChatMessage, CompletionClient } from '@taskchat/shared';
import { ConversationStateMachine } from './state-machine.js';
import { InputInterruptedError, type Terminal } from './terminal.js';
import type { ToolRegistry } from './tool-registry.js';
import type { ConversationState, ExitReason, TurnResult } from './types.js';

const log = logger.child({ module: 'conversation' });

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(['quit', 'exit', 'bye', 'q']);

export const USER_PROMPT = 'you> ';

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.has(input.trim().toLowerCase());
}

/** The part of a ToolRegistry a conversation needs */
export type ToolDispatcher = Pick<ToolRegistry, 'definitions' | 'execute'>;

export interface ConversationOptions {
  client: CompletionClient;
  registry: ToolDispatcher;
  terminal: Terminal;
  model: string;
  /** Max output tokens per completion (default: 500) */
  maxTokens?: number;
  /** Sampling temperature (default: 0.7) */
  temperature?: number;
}

/**
 * One interactive chat session.
 *
 * Owns the transcript. Each user turn is resolved completely, including a
 * tool-calling round and its follow-up completion, before the next line is
 * read. Messages produced during a turn are staged and only appended once
 * the turn succeeds, so a failed completion leaves the transcript as it was.
 */
export class ConversationLoop {
  private readonly transcript: ChatMessage[] = [];
  private readonly machine = new ConversationStateMachine();
  private readonly client: CompletionClient;
  private readonly registry: ToolDispatcher;
  private readonly terminal: Terminal;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private started = false;

  constructor(opts: ConversationOptions) {
    this.client = opts.client;
    this.registry = opts.registry;
    this.terminal = opts.terminal;
    this.model = opts.model;
    this.maxTokens = opts.maxTokens ?? 500;
    this.temperature = opts.temperature ?? 0.7;
  }

  get messages(): readonly ChatMessage[] {
    return this.transcript;
  }

  get state(): ConversationState {
    return this.machine.state;
  }

  /** Subscribe to state transitions */
  onTransition(listener: (state: ConversationState) => void): void {
    this.machine.on('transition', listener);
  }

  /** Read and answer user input until an exit command or an interruption */
  async run(): Promise<ExitReason> {
    if (this.started) {
      throw new Error('conversation: run() may only be called once per session');
    }
    this.started = true;

    this.terminal.notice(`Starting chat with ${this.model}...`);
    this.terminal.notice("Type 'quit', 'exit', or 'bye' to end the conversation");

    for (;;) {
      let input: string;
      try {
        input = (await this.terminal.readLine(USER_PROMPT)).trim();
      } catch (err) {
        if (!(err instanceof InputInterruptedError)) throw err;
        this.terminal.notice('Chat interrupted. Goodbye!');
        this.machine.transition('terminated');
        log.info({ messages: this.transcript.length }, 'chat interrupted');
        return 'interrupted';
      }

      if (isExitCommand(input)) {
        this.terminal.notice('Goodbye!');
        this.machine.transition('terminated');
        log.info({ messages: this.transcript.length }, 'chat ended');
        return 'quit';
      }

      if (!input) {
        this.terminal.notice("Please enter a message or type 'quit' to exit.");
        continue;
      }

      await this.handleTurn(input);
    }
  }

  /** Resolve one user message, including any tool-calling round */
  async handleTurn(text: string): Promise<TurnResult> {
    const staged: ChatMessage[] = [{ role: 'user', content: text }];
    this.machine.transition('requesting_completion');

    try {
      const turn = await this.complete(staged);

      if (turn.toolCalls.length === 0) {
        this.machine.transition('direct_reply');
        staged.push({ role: 'assistant', content: turn.text });
        this.commit(staged);
        this.terminal.assistant(turn.text || '(no response)');
        this.machine.transition('awaiting_input');
        return { kind: 'reply', text: turn.text };
      }

      this.machine.transition('tool_calling_round');
      const reply = await this.runToolRound(turn, staged);
      this.commit(staged);
      this.terminal.assistant(reply || '(no response)');
      this.machine.transition('awaiting_input');
      return { kind: 'tool_round', text: reply, toolCalls: turn.toolCalls.length };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ err, state: this.machine.state }, 'chat turn failed');
      this.terminal.error(`Error during chat: ${message}`);
      this.terminal.notice("Continuing chat... (type 'quit' to exit)");
      this.machine.transition('awaiting_input');
      return { kind: 'failed', error: message };
    }
  }

  /**
   * Execute every requested invocation in order, stage the results, and ask
   * the model to answer from them. Returns the final reply text.
   */
  private async runToolRound(turn: AssistantTurn, staged: ChatMessage[]): Promise<string> {
    // Raw invocation metadata stays in the transcript so results can be correlated by id
    staged.push({ role: 'assistant', content: turn.text, toolCalls: turn.toolCalls });

    for (const call of turn.toolCalls) {
      const result = await this.registry.execute(call.name, call.arguments);
      this.terminal.toolCall(call.name, call.arguments, result);
      staged.push({ role: 'tool', content: result, toolCallId: call.id, name: call.name });
    }

    const synthesis = await this.complete(staged);
    if (synthesis.toolCalls.length > 0) {
      log.warn(
        { tools: synthesis.toolCalls.map((c) => c.name) },
        'ignoring tool calls requested after a tool-calling round',
      );
    }

    staged.push({ role: 'assistant', content: synthesis.text });
    return synthesis.text;
  }

  private complete(staged: readonly ChatMessage[]): Promise<AssistantTurn> {
    return this.client.complete({
      model: this.model,
      messages: [...this.transcript, ...staged],
      tools: this.registry.definitions(),
      maxTokens: this.maxTokens,
      temperature: this.temperature,
    });
  }

  private commit(staged: readonly ChatMessage[]): void {
    this.transcript.push(...staged);
    log.debug({ added: staged.length, total: this.transcript.length }, 'transcript updated');
  }
}
