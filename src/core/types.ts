import type { TerminalSession } from './session.js';

export type ToolOutput =
  | { kind: 'text'; title?: string; text: string }
  | { kind: 'table'; title?: string; columns: string[]; rows: Array<Array<string | number | null>> }
  | { kind: 'status'; command: string; code: number }
  | { kind: 'error'; message: string };

/** Where handlers stream output that cannot wait for the command to finish. */
export interface TerminalIO {
  write(text: string): void;
  writeError(text: string): void;
  clearScreen(): void;
  /** Hands the terminal to a child process for the duration of `task`. */
  suspend<T>(task: () => Promise<T>): Promise<T>;
}

export interface CommandContext {
  now: Date;
  env: NodeJS.ProcessEnv;
  session: TerminalSession;
  io: TerminalIO;
}

export type CommandHandler = (args: string[], ctx: CommandContext) => Promise<ToolOutput[]>;

export interface CommandSpec {
  name: string;
  description: string;
  usage: string;
  handler: CommandHandler;
}

/** Runs input that matched no registered command. */
export type FallbackHandler = (command: string, args: string[], ctx: CommandContext) => Promise<ToolOutput[]>;
