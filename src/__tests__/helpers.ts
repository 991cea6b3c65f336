import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { TerminalSession } from '../core/session.js';
import type { CommandContext, TerminalIO } from '../core/types.js';
import type { Logger } from '../logger.js';

export type RecordingIO = TerminalIO & { out: string[]; err: string[]; cleared: number; suspended: number };

export function recordingIO(): RecordingIO {
  const io: RecordingIO = {
    out: [],
    err: [],
    cleared: 0,
    suspended: 0,
    write: (text) => {
      io.out.push(text);
    },
    writeError: (text) => {
      io.err.push(text);
    },
    clearScreen: () => {
      io.cleared++;
    },
    suspend: (task) => {
      io.suspended++;
      return task();
    }
  };
  return io;
}

export function contextFor(session: TerminalSession, io: TerminalIO = recordingIO()): CommandContext {
  return { now: new Date(), env: process.env, session, io };
}

export type RecordingLogger = Logger & { lines: Array<{ level: string; message: string }> };

export function recordingLogger(): RecordingLogger {
  const lines: Array<{ level: string; message: string }> = [];
  return {
    lines,
    debug: (message) => lines.push({ level: 'debug', message }),
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message })
  };
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'termlet-'));
}

export function removeDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}
