import { clearScreenDown, createInterface, cursorTo, type CompleterResult, type Interface } from 'node:readline';

/** What the REPL needs from a line editor. */
export interface LineReader {
  /** Resolves the next line, or `null` once input has ended. */
  read(prompt: string): Promise<string | null>;
  suspend<T>(task: () => Promise<T>): Promise<T>;
  clearScreen(): void;
  close(): void;
}

/** A readable stream that may be a TTY, as `process.stdin` is. */
export type LineInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type ReadlineOptions = {
  input: LineInput;
  output: NodeJS.WritableStream;
  /** Oldest first, as stored on disk. */
  history: string[];
  historySize: number;
  complete: (line: string) => Promise<CompleterResult>;
};

/** readline keeps its history newest first; nothing is dropped. */
export function readlineHistory(entries: string[]): string[] {
  return [...entries].reverse();
}

/**
 * `node:readline` behind the LineReader interface. Lines are queued as they
 * arrive so piped input is not lost while a command is still running.
 */
export class ReadlineLineReader implements LineReader {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(private readonly options: ReadlineOptions) {
    this.rl = createInterface({
      input: options.input,
      output: options.output,
      terminal: Boolean(options.input.isTTY),
      history: readlineHistory(options.history),
      historySize: options.historySize,
      removeHistoryDuplicates: false,
      completer: (line: string, callback: (err?: null | Error, result?: CompleterResult) => void) => {
        options.complete(line).then(
          (result) => callback(null, result),
          (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
        );
      }
    });

    this.rl.on('line', (line) => this.deliver(line));
    this.rl.on('close', () => {
      this.closed = true;
      this.deliver(null);
    });
    // Ctrl-C at the prompt leaves the terminal, like end of input
    this.rl.on('SIGINT', () => {
      options.output.write('\n');
      this.rl.close();
    });
  }

  read(prompt: string): Promise<string | null> {
    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);

    this.rl.setPrompt(prompt);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  async suspend<T>(task: () => Promise<T>): Promise<T> {
    const { input } = this.options;
    const raw = Boolean(input.isTTY && input.isRaw);
    this.rl.pause();
    if (raw) input.setRawMode?.(false);
    try {
      return await task();
    } finally {
      if (raw) input.setRawMode?.(true);
      if (!this.closed) this.rl.resume();
    }
  }

  clearScreen(): void {
    cursorTo(this.options.output, 0, 0);
    clearScreenDown(this.options.output);
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }

  private deliver(line: string | null): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(line);
      return;
    }
    if (line !== null) this.queued.push(line);
  }
}
