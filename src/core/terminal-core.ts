import { errorMessage } from './errors.js';
import { parseCommandLine } from './parse.js';
import type { CommandContext, CommandSpec, FallbackHandler, ToolOutput } from './types.js';

export class TerminalCore {
  private readonly commandsByName: Map<string, CommandSpec>;
  private readonly fallback: FallbackHandler;

  constructor(commands: CommandSpec[], fallback: FallbackHandler) {
    this.commandsByName = new Map();
    for (const command of commands) {
      this.commandsByName.set(command.name, command);
    }
    this.fallback = fallback;
  }

  listCommands(): CommandSpec[] {
    return [...this.commandsByName.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async execute(input: string, ctx: CommandContext): Promise<ToolOutput[]> {
    const trimmed = input.trim();
    if (!trimmed) return [];

    let parts: string[];
    try {
      parts = parseCommandLine(trimmed);
    } catch (error) {
      ctx.session.lastStatus = 2;
      return [{ kind: 'error', message: errorMessage(error) }];
    }
    if (parts.length === 0) return [];

    const [commandName, ...args] = parts;
    const command = this.commandsByName.get(commandName);

    if (!command) {
      // the fallback owns lastStatus, since only it knows the child's exit code
      return this.fallback(commandName, args, ctx);
    }

    let outputs: ToolOutput[];
    try {
      outputs = await command.handler(args, ctx);
    } catch (error) {
      outputs = [{ kind: 'error', message: `${commandName}: error: ${errorMessage(error)}` }];
    }

    ctx.session.lastStatus = outputs.some((o) => o.kind === 'error') ? 1 : 0;
    return outputs;
  }
}
