export type MemoryUsage = {
  total: number;
  used: number;
  percent: number;
};

export type ProcessInfo = {
  pid: number;
  user: string;
  cpu: number;
  mem: number;
  command: string;
};

/**
 * Source of CPU, memory and process data. Every query resolves `null` when
 * the figure cannot be obtained; callers print "unavailable".
 */
export interface MetricsProvider {
  readonly name: string;
  cpuPercent(): Promise<number | null>;
  memory(): Promise<MemoryUsage | null>;
  processes(): Promise<ProcessInfo[] | null>;
}
