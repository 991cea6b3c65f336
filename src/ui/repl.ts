import type { TerminalCore } from '../core/terminal-core.js';
import type { TerminalSession } from '../core/session.js';
import type { CommandContext, TerminalIO } from '../core/types.js';
import type { HistoryStore } from '../history/store.js';
import type { LineReader } from './line-reader.js';
import { renderOutputs } from './render.js';

export type ReplDeps = {
  core: TerminalCore;
  session: TerminalSession;
  history: HistoryStore;
  reader: LineReader;
  env: NodeJS.ProcessEnv;
  write: (text: string) => void;
  writeError: (text: string) => void;
};

export function promptFor(session: TerminalSession): string {
  return `termlet:${session.getCwd()}$ `;
}

export function buildIO(deps: Pick<ReplDeps, 'reader' | 'write' | 'writeError'>): TerminalIO {
  return {
    write: deps.write,
    writeError: deps.writeError,
    clearScreen: () => deps.reader.clearScreen(),
    suspend: (task) => deps.reader.suspend(task)
  };
}

export function buildContext(session: TerminalSession, io: TerminalIO, env: NodeJS.ProcessEnv): CommandContext {
  return {
    now: new Date(),
    env,
    session,
    io
  };
}

/** Reads, records, executes and renders lines until exit or end of input. */
export async function runRepl(deps: ReplDeps): Promise<void> {
  const { core, session, history, reader } = deps;
  const io = buildIO(deps);

  while (!session.shouldExit) {
    const line = await reader.read(promptFor(session));
    if (line === null) {
      deps.write('\n');
      break;
    }
    if (!line.trim()) continue;

    await history.append(line);
    const outputs = await core.execute(line, buildContext(session, io, deps.env));
    if (outputs.length > 0) {
      deps.write(renderOutputs(outputs) + '\n');
    }
  }
}
