import type { CommandSpec } from '../core/types.js';
import type { HistoryStore } from '../history/store.js';
import { pickInt } from '../utils.js';

export function helpCommand(getCommands: () => CommandSpec[]): CommandSpec {
  return {
    name: 'help',
    description: 'Show help',
    usage: 'help',
    handler: async () => {
      const commands = [...getCommands()].sort((a, b) => a.name.localeCompare(b.name));
      return [
        {
          kind: 'table',
          title: 'Built-in commands',
          columns: ['command', 'usage', 'description'],
          rows: commands.map((c) => [c.name, c.usage, c.description])
        },
        { kind: 'text', text: 'Any other input runs as a system command (e.g. git status).' }
      ];
    }
  };
}

export function historyCommand(history: HistoryStore): CommandSpec {
  return {
    name: 'history',
    description: 'Show command history',
    usage: 'history [count]',
    handler: async (args) => {
      const entries = history.list();
      if (!entries.length) return [{ kind: 'text', text: '(no history)' }];

      const count = args[0] === undefined ? entries.length : pickInt(args[0], entries.length, { min: 0 });
      const start = Math.max(0, entries.length - count);
      const lines = entries.slice(start).map((line, i) => `${start + i + 1}: ${line}`);
      return lines.length ? [{ kind: 'text', text: lines.join('\n') }] : [];
    }
  };
}

export function clearCommand(): CommandSpec {
  return {
    name: 'clear',
    description: 'Clear the screen',
    usage: 'clear',
    handler: async (_args, ctx) => {
      ctx.io.clearScreen();
      return [];
    }
  };
}

function leaveCommand(name: 'exit' | 'quit'): CommandSpec {
  return {
    name,
    description: 'Exit the terminal',
    usage: name,
    handler: async (_args, ctx) => {
      ctx.session.requestExit();
      return [];
    }
  };
}

export function sessionCommands(history: HistoryStore, getCommands: () => CommandSpec[]): CommandSpec[] {
  return [helpCommand(getCommands), historyCommand(history), clearCommand(), leaveCommand('exit'), leaveCommand('quit')];
}
