#!/usr/bin/env node
import 'dotenv/config';
import { stdin as input, stdout as output, stderr } from 'node:process';

import { builtinCommands } from '../commands/index.js';
import { Completer } from '../completion/completer.js';
import { loadConfig, type TermletConfig } from '../config.js';
import { TerminalCore, TerminalSession, errorMessage } from '../core/index.js';
import type { TerminalIO } from '../core/types.js';
import { HistoryStore } from '../history/store.js';
import { createLogger } from '../logger.js';
import { selectMetricsProvider, type MetricsProvider } from '../metrics/index.js';
import { shellFallback } from '../shell/external.js';
import { ReadlineLineReader } from './line-reader.js';
import { renderOutputs } from './render.js';
import { buildContext, runRepl } from './repl.js';

function buildCore(history: HistoryStore, metrics: MetricsProvider): TerminalCore {
  return new TerminalCore(builtinCommands({ history, metrics }), shellFallback);
}

async function runOnce(core: TerminalCore, session: TerminalSession, line: string): Promise<void> {
  const io: TerminalIO = {
    write: (text) => output.write(text),
    writeError: (text) => stderr.write(text),
    clearScreen: () => {},
    suspend: (task) => task()
  };
  const outputs = await core.execute(line, buildContext(session, io, process.env));
  if (outputs.length > 0) {
    output.write(renderOutputs(outputs) + '\n');
  }
  process.exitCode = session.lastStatus;
}

async function runInteractive(
  core: TerminalCore,
  session: TerminalSession,
  history: HistoryStore,
  config: TermletConfig,
  metrics: MetricsProvider
): Promise<void> {
  const completer = new Completer({
    session,
    commandNames: () => core.listCommands().map((c) => c.name),
    pathEnv: () => process.env.PATH
  });
  const reader = new ReadlineLineReader({
    input,
    output,
    history: history.list(),
    historySize: config.historySize,
    complete: (line) => completer.complete(line)
  });

  output.write("termlet: type 'help' for commands, 'exit' to quit\n");
  output.write(`History file: ${history.filePath}\nMetrics: ${metrics.name}\n`);

  try {
    await runRepl({
      core,
      session,
      history,
      reader,
      env: process.env,
      write: (text) => output.write(text),
      writeError: (text) => stderr.write(text)
    });
  } finally {
    reader.close();
  }
  output.write('bye\n');
}

function printCliHelp(): void {
  output.write(
    [
      'Usage:',
      '  termlet',
      '  termlet --eval "<command>"',
      '',
      'Examples:',
      '  termlet --eval "ls -l"',
      '  termlet --eval "sysinfo"',
      '  npm run term'
    ].join('\n') + '\n'
  );
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.includes('--help') || argv.includes('-h')) {
    printCliHelp();
    return;
  }

  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const history = new HistoryStore(config.historyFile, logger);
  await history.load();
  const metrics = await selectMetricsProvider({ mode: config.metrics, cpuSampleMs: config.cpuSampleMs, logger });
  const core = buildCore(history, metrics);
  const session = new TerminalSession({ cwd: process.cwd(), home: config.home });

  const evalIndex = argv.indexOf('--eval');
  if (evalIndex !== -1) {
    const command = argv.slice(evalIndex + 1).join(' ').trim();
    if (!command) {
      printCliHelp();
      process.exitCode = 2;
      return;
    }
    await runOnce(core, session, command);
    return;
  }

  await runInteractive(core, session, history, config, metrics);
}

main().catch((error) => {
  output.write(`Fatal: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
