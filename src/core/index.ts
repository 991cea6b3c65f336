export { TerminalCore } from './terminal-core.js';
export { TerminalSession } from './session.js';
export { parseCommandLine } from './parse.js';
export { describeFsError, errorCode, errorMessage } from './errors.js';
export type { SessionOptions } from './session.js';
export type {
  CommandContext,
  CommandHandler,
  CommandSpec,
  FallbackHandler,
  TerminalIO,
  ToolOutput
} from './types.js';
