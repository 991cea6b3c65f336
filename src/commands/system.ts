import { statfs } from 'node:fs/promises';
import { arch, loadavg, release, type } from 'node:os';

import type { CommandSpec, ToolOutput } from '../core/types.js';
import type { MetricsProvider, ProcessInfo } from '../metrics/types.js';
import { humanBytes, pickInt } from '../utils.js';

async function diskLine(path: string): Promise<string | null> {
  try {
    const fs = await statfs(path);
    const total = fs.blocks * fs.bsize;
    const free = fs.bavail * fs.bsize;
    const used = total - fs.bfree * fs.bsize;
    return `Disk: total=${humanBytes(total)} used=${humanBytes(used)} free=${humanBytes(free)}`;
  } catch {
    return null;
  }
}

export function sysinfoCommand(metrics: MetricsProvider): CommandSpec {
  return {
    name: 'sysinfo',
    description: 'Show system information and resource usage',
    usage: 'sysinfo',
    handler: async (_args, ctx) => {
      const cwd = ctx.session.getCwd();
      const lines = [`Platform: ${type()} ${release()} (${arch()})`, `Node: ${process.version}`, `CWD: ${cwd}`];

      const disk = await diskLine(cwd);
      if (disk) lines.push(disk);

      const cpu = await metrics.cpuPercent();
      lines.push(cpu === null ? 'CPU: unavailable' : `CPU: ${cpu.toFixed(1)}%`);

      const mem = await metrics.memory();
      lines.push(
        mem === null
          ? 'Memory: unavailable'
          : `Memory: ${mem.percent.toFixed(1)}% (${humanBytes(mem.used)} / ${humanBytes(mem.total)})`
      );

      const [load1, load5, load15] = loadavg();
      lines.push(`Load Average (1m/5m/15m): ${load1.toFixed(2)} ${load5.toFixed(2)} ${load15.toFixed(2)}`);
      lines.push(`Metrics: ${metrics.name}`);

      return [{ kind: 'text', text: lines.join('\n') }];
    }
  };
}

function unavailable(name: string): ToolOutput[] {
  return [{ kind: 'error', message: `${name}: process list unavailable` }];
}

export function psCommand(metrics: MetricsProvider): CommandSpec {
  return {
    name: 'ps',
    description: 'List running processes',
    usage: 'ps',
    handler: async () => {
      const processes = await metrics.processes();
      if (processes === null) return unavailable('ps');

      const sorted = [...processes].sort((a, b) => a.pid - b.pid);
      return [
        {
          kind: 'table',
          columns: ['PID', 'USER', 'CPU%', 'MEM%', 'CMD'],
          rows: sorted.map((p) => [p.pid, p.user, p.cpu.toFixed(1), p.mem.toFixed(1), p.command])
        }
      ];
    }
  };
}

export function topProcesses(processes: ProcessInfo[], count: number): ProcessInfo[] {
  return [...processes].sort((a, b) => b.cpu - a.cpu || a.pid - b.pid).slice(0, count);
}

export function topCommand(metrics: MetricsProvider): CommandSpec {
  return {
    name: 'top',
    description: 'Show the processes using the most CPU',
    usage: 'top [count]',
    handler: async (args) => {
      const count = pickInt(args[0], 10, { min: 1, max: 100 });
      const processes = await metrics.processes();
      if (processes === null) return unavailable('top');

      return [
        {
          kind: 'table',
          columns: ['PID', 'CPU%', 'MEM%', 'CMD'],
          rows: topProcesses(processes, count).map((p) => [p.pid, p.cpu.toFixed(1), p.mem.toFixed(1), p.command])
        }
      ];
    }
  };
}

export function systemCommands(metrics: MetricsProvider): CommandSpec[] {
  return [sysinfoCommand(metrics), psCommand(metrics), topCommand(metrics)];
}
