import { spawn } from 'node:child_process';
import { constants } from 'node:os';

import type { CommandContext, TerminalIO, ToolOutput } from '../core/types.js';
import { errorCode, errorMessage } from '../core/errors.js';

export type ExternalResult = {
  exitCode: number;
  signal: NodeJS.Signals | null;
};

export type SignalSource = {
  on(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
};

export type ExternalOptions = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  io: Pick<TerminalIO, 'write' | 'writeError'>;
  /** Where interrupts arrive while the child runs; defaults to `process`. */
  signals?: SignalSource;
};

function signalExitCode(signal: NodeJS.Signals): number {
  const number = constants.signals[signal];
  return typeof number === 'number' ? 128 + number : 1;
}

/**
 * Runs `command` with `args`, relaying its output as it arrives.
 * Rejects with the spawn error when the process cannot be started.
 */
export function runExternal(command: string, args: string[], options: ExternalOptions): Promise<ExternalResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['inherit', 'pipe', 'pipe']
    });

    // the interrupt belongs to the child, not to the terminal
    const signals: SignalSource = options.signals ?? process;
    const interrupt = () => {
      child.kill('SIGINT');
    };
    signals.on('SIGINT', interrupt);

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => options.io.write(chunk));
    child.stderr.on('data', (chunk: string) => options.io.writeError(chunk));

    child.once('error', (error) => {
      signals.off('SIGINT', interrupt);
      reject(error);
    });
    child.once('close', (code, signal) => {
      signals.off('SIGINT', interrupt);
      if (code !== null) {
        resolve({ exitCode: code, signal: null });
      } else if (signal !== null) {
        resolve({ exitCode: signalExitCode(signal), signal });
      } else {
        resolve({ exitCode: 1, signal: null });
      }
    });
  });
}

function describeSpawnFailure(command: string, error: unknown): { message: string; status: number } {
  const code = errorCode(error);
  if (code === 'ENOENT') return { message: `${command}: command not found`, status: 127 };
  if (code === 'EACCES') return { message: `${command}: permission denied`, status: 126 };
  return { message: `${command}: ${errorMessage(error)}`, status: 1 };
}

/** Dispatcher fallback: hands unrecognised input to the operating system. */
export async function shellFallback(command: string, args: string[], ctx: CommandContext): Promise<ToolOutput[]> {
  const options: ExternalOptions = { cwd: ctx.session.getCwd(), env: ctx.env, io: ctx.io };

  try {
    const result = await ctx.io.suspend(() => runExternal(command, args, options));
    ctx.session.lastStatus = result.exitCode;
    if (result.exitCode === 0) return [];
    return [{ kind: 'status', command, code: result.exitCode }];
  } catch (error) {
    const failure = describeSpawnFailure(command, error);
    ctx.session.lastStatus = failure.status;
    return [{ kind: 'error', message: failure.message }];
  }
}
