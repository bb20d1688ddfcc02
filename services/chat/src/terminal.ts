import * as readline from 'node:readline';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

export type InterruptReason = 'interrupted' | 'closed';

/** Raised by readLine when the user presses Ctrl+C or input ends */
export class InputInterruptedError extends Error {
  readonly reason: InterruptReason;

  constructor(reason: InterruptReason) {
    super(`input ${reason}`);
    this.name = 'InputInterruptedError';
    this.reason = reason;
  }
}

export interface Terminal {
  /** Resolve with one line of user input; reject with InputInterruptedError */
  readLine(prompt: string): Promise<string>;
  assistant(text: string): void;
  toolCall(name: string, args: Record<string, unknown>, result: string): void;
  notice(text: string): void;
  success(text: string): void;
  warn(text: string): void;
  error(text: string): void;
  close(): void;
}

export interface ReadlineTerminalOptions {
  /** Shown before each assistant reply */
  assistantLabel: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Treat the streams as a TTY (default: output.isTTY) */
  terminal?: boolean;
}

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

/**
 * Terminal over node:readline.
 *
 * Lines are read from a single 'line' listener and queued until asked for, so
 * input typed during a completion, or piped in ahead, is kept. Queued lines
 * are still handed out after input ends; Ctrl+C rejects straight away. Once
 * interrupted or closed, every later prompt rejects too.
 */
export function createTerminal(opts: ReadlineTerminalOptions): Terminal {
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  const rl = readline.createInterface({ input, output, terminal: opts.terminal });

  const queued: string[] = [];
  let waiting: { resolve: (line: string) => void; reject: (err: Error) => void } | undefined;
  let interruption: InputInterruptedError | undefined;

  function interrupt(reason: InterruptReason): void {
    interruption ??= new InputInterruptedError(reason);
    const pending = waiting;
    waiting = undefined;
    pending?.reject(interruption);
  }

  rl.on('line', (line) => {
    const pending = waiting;
    if (pending) {
      waiting = undefined;
      pending.resolve(line);
    } else {
      queued.push(line);
    }
  });
  rl.on('SIGINT', () => interrupt('interrupted'));
  rl.on('close', () => interrupt('closed'));

  function writeLine(line: string): void {
    output.write(`${line}\n`);
  }

  return {
    readLine(prompt: string): Promise<string> {
      if (interruption?.reason === 'interrupted') return Promise.reject(interruption);

      const next = queued.shift();
      if (next !== undefined) {
        output.write(`${CYAN}${prompt}${RESET}`);
        return Promise.resolve(next);
      }
      if (interruption) return Promise.reject(interruption);

      return new Promise((resolve, reject) => {
        waiting = { resolve, reject };
        rl.setPrompt(`${CYAN}${prompt}${RESET}`);
        rl.prompt();
      });
    },

    assistant(text: string): void {
      writeLine(`${BOLD}${opts.assistantLabel}:${RESET} ${text}`);
    },

    toolCall(name: string, args: Record<string, unknown>, result: string): void {
      writeLine(`${DIM}[tool] ${name} ${JSON.stringify(args)}${RESET}`);
      writeLine(`${DIM}${indent(result, '  → ')}${RESET}`);
    },

    notice(text: string): void {
      writeLine(`${DIM}${text}${RESET}`);
    },

    success(text: string): void {
      writeLine(`${GREEN}${text}${RESET}`);
    },

    warn(text: string): void {
      writeLine(`${YELLOW}${text}${RESET}`);
    },

    error(text: string): void {
      writeLine(`${RED}${text}${RESET}`);
    },

    close(): void {
      rl.close();
    },
  };
}
