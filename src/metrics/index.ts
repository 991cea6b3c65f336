import type { MetricsMode } from '../config.js';
import { errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ProcfsProvider } from './procfs-provider.js';
import { SystemInformationProvider, type SystemInformationApi } from './systeminformation-provider.js';
import type { MetricsProvider } from './types.js';

export { ProcfsProvider } from './procfs-provider.js';
export { SystemInformationProvider } from './systeminformation-provider.js';
export type { SystemInformationApi } from './systeminformation-provider.js';
export type { MemoryUsage, MetricsProvider, ProcessInfo } from './types.js';

export type MetricsSelection = {
  mode: MetricsMode;
  cpuSampleMs: number;
  logger?: Logger;
  /** Override for the library loader. */
  loadLibrary?: () => Promise<SystemInformationApi>;
};

async function importSystemInformation(): Promise<SystemInformationApi> {
  const mod = await import('systeminformation');
  return mod.default;
}

/**
 * Picks the metrics source once at startup. `auto` prefers the
 * systeminformation library and falls back to /proc and `ps` when the
 * library cannot be loaded.
 */
export async function selectMetricsProvider(selection: MetricsSelection): Promise<MetricsProvider> {
  const logger = selection.logger ?? silentLogger;
  const procfs = () => new ProcfsProvider({ sampleIntervalMs: selection.cpuSampleMs, logger });

  if (selection.mode === 'procfs') return procfs();

  const load = selection.loadLibrary ?? importSystemInformation;
  try {
    return new SystemInformationProvider(await load(), logger);
  } catch (error) {
    if (selection.mode === 'systeminformation') {
      throw new Error(`systeminformation could not be loaded: ${errorMessage(error)}`);
    }
    logger.info(`systeminformation unavailable, using procfs metrics (${errorMessage(error)})`);
    return procfs();
  }
}
