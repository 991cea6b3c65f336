import { readdir } from 'node:fs/promises';
import { delimiter } from 'node:path';
import fg from 'fast-glob';

import type { TerminalSession } from '../core/session.js';

export type CompleterResult = [string[], string];

export type CompleterOptions = {
  session: TerminalSession;
  commandNames: () => string[];
  /** `PATH` value to scan for executables. */
  pathEnv: () => string | undefined;
};

/**
 * Tab completion for the line reader: command names for the first token,
 * filesystem paths for everything after it.
 */
export class Completer {
  constructor(private readonly options: CompleterOptions) {}

  async complete(line: string): Promise<CompleterResult> {
    const leading = line.replace(/^\s+/, '');
    const tokens = leading.split(/\s+/);
    const current = tokens[tokens.length - 1] ?? '';

    if (tokens.length <= 1) {
      return [await this.commandCandidates(current), current];
    }
    return [await this.pathCandidates(current), current];
  }

  async commandCandidates(prefix: string): Promise<string[]> {
    const builtins = this.options.commandNames().filter((name) => name.startsWith(prefix)).sort();
    const seen = new Set(builtins);
    const external: string[] = [];

    for (const dir of (this.options.pathEnv() ?? '').split(delimiter)) {
      if (!dir) continue;
      let names: string[];
      try {
        names = await readdir(dir);
      } catch {
        continue;
      }
      for (const name of names) {
        if (name.startsWith(prefix) && !seen.has(name)) {
          seen.add(name);
          external.push(name);
        }
      }
    }

    return [...builtins, ...external.sort()];
  }

  async pathCandidates(partial: string): Promise<string[]> {
    const slash = partial.lastIndexOf('/');
    const dirPart = slash === -1 ? '' : partial.slice(0, slash + 1);
    const prefix = partial.slice(slash + 1);
    const dir = this.options.session.resolvePath(dirPart || '.');

    let matches: string[];
    try {
      matches = await fg(`${fg.escapePath(prefix)}*`, {
        cwd: dir,
        onlyFiles: false,
        markDirectories: true,
        dot: prefix.startsWith('.'),
        deep: 1,
        suppressErrors: true
      });
    } catch {
      return [];
    }

    return matches.sort().map((match) => dirPart + match);
  }
}
