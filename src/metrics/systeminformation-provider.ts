import { silentLogger, type Logger } from '../logger.js';
import { errorMessage } from '../core/errors.js';
import { percent, pickNumber, pickString } from '../utils.js';
import type { MemoryUsage, MetricsProvider, ProcessInfo } from './types.js';

/** The slice of the `systeminformation` module this provider calls. */
export interface SystemInformationApi {
  currentLoad(): Promise<{ currentLoad: number }>;
  mem(): Promise<{ total: number; available: number }>;
  processes(): Promise<{
    list: Array<{ pid: number; name: string; cpu: number; mem: number; user?: string; command?: string; params?: string }>;
  }>;
}

export class SystemInformationProvider implements MetricsProvider {
  readonly name = 'systeminformation';

  constructor(
    private readonly si: SystemInformationApi,
    private readonly logger: Logger = silentLogger
  ) {}

  async cpuPercent(): Promise<number | null> {
    try {
      const load = await this.si.currentLoad();
      return pickNumber(load.currentLoad);
    } catch (error) {
      this.logger.debug(`systeminformation currentLoad failed: ${errorMessage(error)}`);
      return null;
    }
  }

  async memory(): Promise<MemoryUsage | null> {
    try {
      const mem = await this.si.mem();
      const used = mem.total - mem.available;
      return { total: mem.total, used, percent: percent(used, mem.total) };
    } catch (error) {
      this.logger.debug(`systeminformation mem failed: ${errorMessage(error)}`);
      return null;
    }
  }

  async processes(): Promise<ProcessInfo[] | null> {
    try {
      const { list } = await this.si.processes();
      return list.map((p) => {
        const command = [pickString(p.command), pickString(p.params)].filter(Boolean).join(' ');
        return {
          pid: p.pid,
          user: pickString(p.user),
          cpu: pickNumber(p.cpu) ?? 0,
          mem: pickNumber(p.mem) ?? 0,
          command: command || p.name
        };
      });
    } catch (error) {
      this.logger.debug(`systeminformation processes failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
