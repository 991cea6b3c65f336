import { stat } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';

export type SessionOptions = {
  cwd: string;
  home: string;
};

/**
 * Mutable state of one terminal session.
 *
 * The working directory lives here rather than in `process.cwd()`, so every
 * path-relative command, the completer and spawned children all resolve
 * against the same value.
 */
export class TerminalSession {
  readonly home: string;
  lastStatus = 0;
  private cwd: string;
  private previousCwd: string | null = null;
  private exitRequested = false;

  constructor(options: SessionOptions) {
    this.home = resolve(options.home);
    this.cwd = resolve(options.cwd);
  }

  getCwd(): string {
    return this.cwd;
  }

  getPreviousCwd(): string | null {
    return this.previousCwd;
  }

  /** Expands `~` and resolves `input` against the working directory. */
  resolvePath(input: string): string {
    if (input === '~') return this.home;
    if (input.startsWith('~/')) return resolve(this.home, input.slice(2));
    if (isAbsolute(input)) return resolve(input);
    return resolve(this.cwd, input);
  }

  /**
   * Moves the working directory to `target`.
   * Rejects with the underlying fs error (ENOENT, ENOTDIR, EACCES) and leaves
   * the directory unchanged.
   */
  async changeDirectory(target: string): Promise<string> {
    const next = this.resolvePath(target);
    const stats = await stat(next);
    if (!stats.isDirectory()) {
      throw Object.assign(new Error(`ENOTDIR: not a directory, chdir '${next}'`), { code: 'ENOTDIR' });
    }
    this.previousCwd = this.cwd;
    this.cwd = next;
    return next;
  }

  requestExit(): void {
    this.exitRequested = true;
  }

  get shouldExit(): boolean {
    return this.exitRequested;
  }
}
