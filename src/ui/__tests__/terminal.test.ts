import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeTempDir, removeDir } from '../../__tests__/helpers.js';

const node = process.execPath;
const projectRoot = fileURLToPath(new URL('../../../', import.meta.url));
const entry = fileURLToPath(new URL('../terminal.ts', import.meta.url));

function startTerminal(historyFile: string): { child: ChildProcessWithoutNullStreams; output: () => string } {
  const env: NodeJS.ProcessEnv = {
    ...process.env,
    TERMLET_METRICS: 'procfs',
    TERMLET_HISTORY_FILE: historyFile,
    TERMLET_LOG_LEVEL: 'silent'
  };
  delete env.FORCE_COLOR;

  const child = spawn(node, ['--import', 'tsx', entry], { cwd: projectRoot, env, stdio: 'pipe' });
  let text = '';
  child.stdout.setEncoding('utf8');
  child.stdout.on('data', (chunk: string) => {
    text += chunk;
  });
  return { child, output: () => text };
}

function waitForOutput(child: ChildProcessWithoutNullStreams, output: () => string, expected: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const check = () => {
      if (!output().includes(expected)) return;
      child.stdout.off('data', check);
      child.off('close', closed);
      resolve();
    };
    const closed = () => reject(new Error(`terminal closed before printing ${JSON.stringify(expected)}`));
    child.stdout.on('data', check);
    child.once('close', closed);
    check();
  });
}

function waitForExit(child: ChildProcessWithoutNullStreams): Promise<{ code: number | null; signal: NodeJS.Signals | null }> {
  return new Promise((resolve) => {
    child.once('close', (code, signal) => resolve({ code, signal }));
  });
}

describe.skipIf(process.platform === 'win32')('termlet entry point', () => {
  let root: string;
  let child: ChildProcessWithoutNullStreams | null = null;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    if (child && child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
    child = null;
    await removeDir(root);
  });

  it('interrupts a running command and keeps the session alive', async () => {
    const started = startTerminal(join(root, 'history'));
    child = started.child;
    const { output } = started;
    const exited = waitForExit(started.child);

    await waitForOutput(started.child, output, 'Metrics: procfs');
    started.child.stdin.write(`'${node}' -e "process.stdout.write('started'); setInterval(() => {}, 1000)"\n`);
    await waitForOutput(started.child, output, 'started');

    started.child.kill('SIGINT');
    await waitForOutput(started.child, output, 'exited with status 130');

    started.child.stdin.end('exit\n');
    expect(await exited).toEqual({ code: 0, signal: null });
    expect(output()).toContain('bye\n');
  }, 30_000);
});
