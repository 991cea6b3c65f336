import type { CommandSpec } from '../core/types.js';
import type { HistoryStore } from '../history/store.js';
import type { MetricsProvider } from '../metrics/types.js';
import { filesystemCommands } from './fs.js';
import { sessionCommands } from './session.js';
import { systemCommands } from './system.js';

export { filesystemCommands, listDirectory } from './fs.js';
export { systemCommands, topProcesses } from './system.js';
export { sessionCommands } from './session.js';

export type BuiltinDeps = {
  history: HistoryStore;
  metrics: MetricsProvider;
};

export function builtinCommands(deps: BuiltinDeps): CommandSpec[] {
  const commands: CommandSpec[] = [];
  commands.push(...filesystemCommands());
  commands.push(...systemCommands(deps.metrics));
  commands.push(...sessionCommands(deps.history, () => commands));
  return commands;
}
