import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { contextFor, makeTempDir, recordingIO, removeDir } from '../../__tests__/helpers.js';
import { TerminalSession } from '../../core/session.js';
import type { CommandSpec } from '../../core/types.js';
import { HistoryStore } from '../../history/store.js';
import { clearCommand, helpCommand, historyCommand, sessionCommands } from '../session.js';

describe('session commands', () => {
  let root: string;
  let session: TerminalSession;
  let history: HistoryStore;

  beforeEach(async () => {
    root = await makeTempDir();
    session = new TerminalSession({ cwd: root, home: root });
    history = new HistoryStore(join(root, 'history'));
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('help tabulates every command by name', async () => {
    const commands: CommandSpec[] = [
      { name: 'pwd', description: 'Print the working directory', usage: 'pwd', handler: async () => [] },
      { name: 'cd', description: 'Change the working directory', usage: 'cd [dir]', handler: async () => [] }
    ];
    expect(await helpCommand(() => commands).handler([], contextFor(session))).toEqual([
      {
        kind: 'table',
        title: 'Built-in commands',
        columns: ['command', 'usage', 'description'],
        rows: [
          ['cd', 'cd [dir]', 'Change the working directory'],
          ['pwd', 'pwd', 'Print the working directory']
        ]
      },
      { kind: 'text', text: 'Any other input runs as a system command (e.g. git status).' }
    ]);
  });

  it('history says so when empty', async () => {
    expect(await historyCommand(history).handler([], contextFor(session))).toEqual([
      { kind: 'text', text: '(no history)' }
    ]);
  });

  it('history numbers every entry, repeats included', async () => {
    await history.append('ls');
    await history.append('pwd');
    await history.append('ls');
    expect(await historyCommand(history).handler([], contextFor(session))).toEqual([
      { kind: 'text', text: '1: ls\n2: pwd\n3: ls' }
    ]);
  });

  it('history N shows the last N entries with their original numbers', async () => {
    await history.append('ls');
    await history.append('pwd');
    await history.append('cd /');
    expect(await historyCommand(history).handler(['2'], contextFor(session))).toEqual([
      { kind: 'text', text: '2: pwd\n3: cd /' }
    ]);
  });

  it('clear asks the terminal to clear', async () => {
    const io = recordingIO();
    expect(await clearCommand().handler([], contextFor(session, io))).toEqual([]);
    expect(io.cleared).toBe(1);
  });

  it.each(['exit', 'quit'])('%s ends the session', async (name) => {
    const commands = sessionCommands(history, () => []);
    const leave = commands.find((c) => c.name === name);
    expect(leave).toBeDefined();
    await leave?.handler([], contextFor(session));
    expect(session.shouldExit).toBe(true);
  });
});
