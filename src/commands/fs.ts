import type { Dirent, Stats } from 'node:fs';
import { copyFile, cp, lstat, mkdir, readFile, readdir, rename, rm, rmdir, stat, utimes, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { describeFsError, errorCode } from '../core/errors.js';
import type { CommandContext, CommandSpec, ToolOutput } from '../core/types.js';
import type { TerminalSession } from '../core/session.js';

type FlagSplit = { flags: Set<string>; operands: string[] };

/** Separates leading single-dash flags (`-r`, `-rf`) from operands; `--` ends flags. */
function splitFlags(args: string[]): FlagSplit {
  const flags = new Set<string>();
  const operands: string[] = [];
  let flagsDone = false;
  for (const arg of args) {
    if (!flagsDone && arg === '--') {
      flagsDone = true;
      continue;
    }
    if (!flagsDone && arg.length > 1 && arg.startsWith('-')) {
      for (const ch of arg.slice(1)) flags.add(ch);
      continue;
    }
    operands.push(arg);
  }
  return { flags, operands };
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return null;
    throw error;
  }
}

function missingOperand(name: string): ToolOutput[] {
  return [{ kind: 'error', message: `${name}: missing operand` }];
}

function textLines(lines: string[]): ToolOutput[] {
  return lines.length ? [{ kind: 'text', text: lines.join('\n') }] : [];
}

async function entrySuffix(dir: string, entry: Dirent): Promise<string> {
  if (entry.isDirectory()) return '/';
  if (!entry.isSymbolicLink()) return '';
  const target = await statOrNull(join(dir, entry.name)).catch(() => null);
  return target?.isDirectory() ? '/' : '@';
}

function formatMtime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

async function longRow(dir: string, entry: Dirent, suffix: string): Promise<Array<string | number>> {
  const info = await lstat(join(dir, entry.name));
  const type = info.isSymbolicLink() ? 'l' : info.isDirectory() ? 'd' : '-';
  return [type, info.size, formatMtime(info.mtime), entry.name + suffix];
}

/** Code-point order, matching a plain sort of the names. */
function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export async function listDirectory(session: TerminalSession, path: string, long = false): Promise<ToolOutput[]> {
  const dir = session.resolvePath(path);
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    return [{ kind: 'error', message: `ls: cannot access '${path}': ${describeFsError(error)}` }];
  }

  entries.sort(byName);
  if (!long) {
    const names: string[] = [];
    for (const entry of entries) names.push(entry.name + (await entrySuffix(dir, entry)));
    return textLines(names);
  }

  const rows: Array<Array<string | number>> = [];
  for (const entry of entries) {
    rows.push(await longRow(dir, entry, await entrySuffix(dir, entry)));
  }
  if (!rows.length) return [];
  return [{ kind: 'table', columns: ['type', 'size', 'modified', 'name'], rows }];
}

async function removeOne(path: string, operand: string, recursive: boolean): Promise<string | null> {
  let info: Stats;
  try {
    info = await lstat(path);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return `rm: cannot remove '${operand}': No such file or directory`;
    return `rm: ${operand}: ${describeFsError(error)}`;
  }

  try {
    if (info.isDirectory()) {
      if (recursive) await rm(path, { recursive: true });
      else await rmdir(path);
    } else {
      await rm(path);
    }
    return null;
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOTEMPTY' || code === 'EEXIST') return `rm: cannot remove '${operand}': Directory not empty`;
    return `rm: ${operand}: ${describeFsError(error)}`;
  }
}

async function touchOne(path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const now = new Date();
  if (await statOrNull(path)) {
    await utimes(path, now, now);
  } else {
    await writeFile(path, '', 'utf-8');
  }
}

async function moveOne(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') throw error;
    await cp(source, target, { recursive: true, preserveTimestamps: true, errorOnExist: true, force: false });
    await rm(source, { recursive: true });
  }
}

async function copyOne(source: string, target: string): Promise<void> {
  const info = await stat(source);
  if (info.isDirectory()) {
    await cp(source, target, { recursive: true, preserveTimestamps: true, errorOnExist: true, force: false });
    return;
  }
  await copyFile(source, target);
  await utimes(target, info.atime, info.mtime);
}

type Transfer = (source: string, target: string) => Promise<void>;

/**
 * Shared shape of `mv` and `cp`: one source may be renamed or dropped into
 * an existing directory; several sources always go into `DEST`, which is
 * created if needed.
 */
async function transfer(name: string, args: string[], session: TerminalSession, op: Transfer): Promise<ToolOutput[]> {
  const { operands } = splitFlags(args);
  if (operands.length < 2) return missingOperand(name);

  const sources = operands.slice(0, -1);
  const destOperand = operands[operands.length - 1];
  const dest = session.resolvePath(destOperand);
  const outputs: ToolOutput[] = [];

  if (sources.length > 1) {
    try {
      await mkdir(dest, { recursive: true });
    } catch (error) {
      return [{ kind: 'error', message: `${name}: ${destOperand}: ${describeFsError(error)}` }];
    }
  }

  const destIsDir = sources.length > 1 || Boolean((await statOrNull(dest).catch(() => null))?.isDirectory());

  for (const operand of sources) {
    const source = session.resolvePath(operand);
    const target = destIsDir ? join(dest, basename(source)) : dest;
    try {
      await op(source, target);
    } catch (error) {
      outputs.push({ kind: 'error', message: `${name}: ${operand}: ${describeFsError(error)}` });
    }
  }
  return outputs;
}

export function lsCommand(): CommandSpec {
  return {
    name: 'ls',
    description: 'List directory contents',
    usage: 'ls [-l] [path]',
    handler: async (args, ctx) => {
      const { flags, operands } = splitFlags(args);
      return listDirectory(ctx.session, operands[0] ?? '.', flags.has('l'));
    }
  };
}

export function cdCommand(): CommandSpec {
  return {
    name: 'cd',
    description: 'Change the working directory',
    usage: 'cd [dir | -]',
    handler: async (args, ctx) => {
      const target = args[0] ?? '~';

      if (target === '-') {
        const previous = ctx.session.getPreviousCwd();
        if (!previous) return [{ kind: 'error', message: 'cd: OLDPWD not set' }];
        return changeTo(ctx, previous, target, true);
      }
      return changeTo(ctx, target, target, false);
    }
  };
}

async function changeTo(ctx: CommandContext, target: string, shown: string, echo: boolean): Promise<ToolOutput[]> {
  try {
    const next = await ctx.session.changeDirectory(target);
    return echo ? [{ kind: 'text', text: next }] : [];
  } catch (error) {
    return [{ kind: 'error', message: `cd: ${shown}: ${describeFsError(error)}` }];
  }
}

export function pwdCommand(): CommandSpec {
  return {
    name: 'pwd',
    description: 'Print the working directory',
    usage: 'pwd',
    handler: async (_args, ctx) => [{ kind: 'text', text: ctx.session.getCwd() }]
  };
}

export function mkdirCommand(): CommandSpec {
  return {
    name: 'mkdir',
    description: 'Create directories, including missing parents',
    usage: 'mkdir NAME...',
    handler: async (args, ctx) => {
      // parents are always created, so -p is accepted and ignored
      const { operands } = splitFlags(args);
      if (!operands.length) return missingOperand('mkdir');
      const outputs: ToolOutput[] = [];
      for (const operand of operands) {
        const path = ctx.session.resolvePath(operand);
        try {
          if (await statOrNull(path)) {
            outputs.push({ kind: 'error', message: `mkdir: cannot create directory '${operand}': File exists` });
            continue;
          }
          await mkdir(path, { recursive: true });
        } catch (error) {
          outputs.push({ kind: 'error', message: `mkdir: ${operand}: ${describeFsError(error)}` });
        }
      }
      return outputs;
    }
  };
}

export function rmCommand(): CommandSpec {
  return {
    name: 'rm',
    description: 'Remove files (directories only when empty, or with -r)',
    usage: 'rm [-r] NAME...',
    handler: async (args, ctx) => {
      const { flags, operands } = splitFlags(args);
      if (!operands.length) return missingOperand('rm');
      const recursive = flags.has('r') || flags.has('R');
      const outputs: ToolOutput[] = [];
      for (const operand of operands) {
        const failure = await removeOne(ctx.session.resolvePath(operand), operand, recursive);
        if (failure) outputs.push({ kind: 'error', message: failure });
      }
      return outputs;
    }
  };
}

export function rmdirCommand(): CommandSpec {
  return {
    name: 'rmdir',
    description: 'Remove empty directories',
    usage: 'rmdir NAME...',
    handler: async (args, ctx) => {
      if (!args.length) return missingOperand('rmdir');
      const outputs: ToolOutput[] = [];
      for (const operand of args) {
        try {
          await rmdir(ctx.session.resolvePath(operand));
        } catch (error) {
          outputs.push({ kind: 'error', message: `rmdir: ${operand}: ${describeFsError(error)}` });
        }
      }
      return outputs;
    }
  };
}

export function touchCommand(): CommandSpec {
  return {
    name: 'touch',
    description: 'Create empty files or update their timestamps',
    usage: 'touch FILE...',
    handler: async (args, ctx) => {
      if (!args.length) return missingOperand('touch');
      const outputs: ToolOutput[] = [];
      for (const operand of args) {
        try {
          await touchOne(ctx.session.resolvePath(operand));
        } catch (error) {
          outputs.push({ kind: 'error', message: `touch: ${operand}: ${describeFsError(error)}` });
        }
      }
      return outputs;
    }
  };
}

export function catCommand(): CommandSpec {
  return {
    name: 'cat',
    description: 'Print file contents',
    usage: 'cat FILE...',
    handler: async (args, ctx) => {
      if (!args.length) return missingOperand('cat');
      const outputs: ToolOutput[] = [];
      for (const operand of args) {
        try {
          const content = await readFile(ctx.session.resolvePath(operand), 'utf-8');
          const text = content.endsWith('\n') ? content.slice(0, -1) : content;
          if (content.length) outputs.push({ kind: 'text', text });
        } catch (error) {
          outputs.push({ kind: 'error', message: `cat: ${operand}: ${describeFsError(error)}` });
        }
      }
      return outputs;
    }
  };
}

export function mvCommand(): CommandSpec {
  return {
    name: 'mv',
    description: 'Move or rename files and directories',
    usage: 'mv SRC... DEST',
    handler: async (args, ctx) => transfer('mv', args, ctx.session, moveOne)
  };
}

export function cpCommand(): CommandSpec {
  return {
    name: 'cp',
    description: 'Copy files and directories',
    usage: 'cp SRC... DEST',
    handler: async (args, ctx) => transfer('cp', args, ctx.session, copyOne)
  };
}

export function filesystemCommands(): CommandSpec[] {
  return [
    lsCommand(),
    cdCommand(),
    pwdCommand(),
    mkdirCommand(),
    rmCommand(),
    rmdirCommand(),
    touchCommand(),
    catCommand(),
    mvCommand(),
    cpCommand()
  ];
}
