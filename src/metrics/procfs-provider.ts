import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { freemem, platform, totalmem } from 'node:os';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { promisify } from 'node:util';

import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { percent, pickNumber } from '../utils.js';
import type { MemoryUsage, MetricsProvider, ProcessInfo } from './types.js';

const execFileAsync = promisify(execFile);

export type CpuTimes = { idle: number; total: number };

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export type ProcfsOptions = {
  procRoot?: string;
  sampleIntervalMs?: number;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  logger?: Logger;
};

/** Aggregate `cpu` line of /proc/stat; idle includes iowait. */
export function parseCpuTimes(stat: string): CpuTimes | null {
  const line = stat.split('\n').find((l) => /^cpu\s/.test(l));
  if (!line) return null;

  const fields = line.trim().split(/\s+/).slice(1).map(Number);
  if (fields.length < 4 || fields.some((n) => !Number.isFinite(n))) return null;

  const idle = fields[3] + (fields[4] ?? 0);
  const total = fields.reduce((sum, n) => sum + n, 0);
  return { idle, total };
}

export function cpuPercentBetween(before: CpuTimes, after: CpuTimes): number {
  const total = after.total - before.total;
  const idle = after.idle - before.idle;
  if (total <= 0) return 0;
  return Math.round((1 - idle / total) * 1000) / 10;
}

/** `MemTotal` and `MemAvailable` (kB in the file) as bytes. */
export function parseMeminfo(meminfo: string): MemoryUsage | null {
  const values = new Map<string, number>();
  for (const line of meminfo.split('\n')) {
    const match = /^(\w+):\s+(\d+)/.exec(line);
    if (match) values.set(match[1], Number(match[2]) * 1024);
  }

  const total = values.get('MemTotal');
  const available = values.get('MemAvailable') ?? values.get('MemFree');
  if (total === undefined || available === undefined) return null;

  const used = total - available;
  return { total, used, percent: percent(used, total) };
}

/** Output of `ps -eo pid=,user=,pcpu=,pmem=,args=`. */
export function parsePsOutput(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of output.split('\n')) {
    const match = /^\s*(\d+)\s+(\S+)\s+([\d.]+)\s+([\d.]+)\s+(.*)$/.exec(line);
    if (!match) continue;
    processes.push({
      pid: Number(match[1]),
      user: match[2],
      cpu: pickNumber(match[3]) ?? 0,
      mem: pickNumber(match[4]) ?? 0,
      command: match[5].trim()
    });
  }
  return processes;
}

function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  for (const match of line.matchAll(/"((?:[^"]|"")*)"/g)) {
    cells.push(match[1].replace(/""/g, '"'));
  }
  return cells;
}

/** Output of `tasklist /fo csv /nh`; no CPU figure is reported there. */
export function parseTasklistOutput(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of output.split(/\r?\n/)) {
    const [name, pid] = splitCsvLine(line);
    const pidNumber = pickNumber(pid);
    if (!name || pidNumber === null) continue;
    processes.push({ pid: pidNumber, user: '', cpu: 0, mem: 0, command: name });
  }
  return processes;
}

async function runCommand(command: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync(command, args, { maxBuffer: 16 * 1024 * 1024 });
  return stdout;
}

/**
 * Metrics read from operating-system text sources: /proc pseudo-files for
 * CPU and memory, `ps` (or `tasklist`) for the process table.
 */
export class ProcfsProvider implements MetricsProvider {
  readonly name = 'procfs';
  private readonly procRoot: string;
  private readonly sampleIntervalMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(options: ProcfsOptions = {}) {
    this.procRoot = options.procRoot ?? '/proc';
    this.sampleIntervalMs = options.sampleIntervalMs ?? 500;
    this.platform = options.platform ?? platform();
    this.run = options.run ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  async cpuPercent(): Promise<number | null> {
    try {
      const before = parseCpuTimes(await readFile(join(this.procRoot, 'stat'), 'utf-8'));
      await sleep(this.sampleIntervalMs);
      const after = parseCpuTimes(await readFile(join(this.procRoot, 'stat'), 'utf-8'));
      if (!before || !after) return null;
      return cpuPercentBetween(before, after);
    } catch (error) {
      this.logger.debug(`cpu sample failed: ${errorMessage(error)}`);
      return null;
    }
  }

  async memory(): Promise<MemoryUsage | null> {
    try {
      const parsed = parseMeminfo(await readFile(join(this.procRoot, 'meminfo'), 'utf-8'));
      if (parsed) return parsed;
    } catch (error) {
      this.logger.debug(`meminfo read failed: ${errorMessage(error)}`);
    }

    const total = totalmem();
    if (total <= 0) return null;
    const used = total - freemem();
    return { total, used, percent: percent(used, total) };
  }

  async processes(): Promise<ProcessInfo[] | null> {
    try {
      if (this.platform === 'win32') {
        return parseTasklistOutput(await this.run('tasklist', ['/fo', 'csv', '/nh']));
      }
      return parsePsOutput(await this.run('ps', ['-eo', 'pid=,user=,pcpu=,pmem=,args=']));
    } catch (error) {
      this.logger.debug(`process listing failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
