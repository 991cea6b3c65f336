import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const METRICS_MODES = ['auto', 'systeminformation', 'procfs'] as const;
export type MetricsMode = (typeof METRICS_MODES)[number];

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const envSchema = z.object({
  TERMLET_HISTORY_FILE: z.preprocess(blankToUndefined, z.string().optional()),
  TERMLET_HISTORY_SIZE: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(1000)),
  TERMLET_METRICS: z.preprocess(blankToUndefined, z.enum(METRICS_MODES).default('auto')),
  TERMLET_CPU_SAMPLE_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(500)),
  TERMLET_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('warn'))
});

export type TermletConfig = {
  home: string;
  historyFile: string;
  historySize: number;
  metrics: MetricsMode;
  cpuSampleMs: number;
  logLevel: LogLevel;
};

export function defaultHome(env: NodeJS.ProcessEnv): string {
  const envHome = env.HOME || env.USERPROFILE;
  return envHome && envHome.trim().length > 0 ? envHome : homedir();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TermletConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const home = defaultHome(env);
  const vars = parsed.data;
  return {
    home,
    historyFile: vars.TERMLET_HISTORY_FILE ?? join(home, '.termlet_history'),
    historySize: vars.TERMLET_HISTORY_SIZE,
    metrics: vars.TERMLET_METRICS,
    cpuSampleMs: vars.TERMLET_CPU_SAMPLE_MS,
    logLevel: vars.TERMLET_LOG_LEVEL
  };
}
