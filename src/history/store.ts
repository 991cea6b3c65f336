import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { errorCode, errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../logger.js';

/**
 * Append-only command history persisted as one line per entry.
 * Entries are never deduplicated, trimmed or rotated.
 */
export class HistoryStore {
  private entries: string[] = [];

  constructor(
    readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  /** Reads prior sessions' entries; a missing file is an empty history. */
  async load(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.warn(`Could not read history file ${this.filePath}: ${errorMessage(error)}`);
      }
      this.entries = [];
      return [];
    }

    this.entries = content.split(/\r?\n/).filter((line) => line.trim().length > 0);
    return this.list();
  }

  async append(line: string): Promise<void> {
    if (!line.trim()) return;
    this.entries.push(line);

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, line + '\n', 'utf-8');
    } catch (error) {
      this.logger.warn(`Could not write history file ${this.filePath}: ${errorMessage(error)}`);
    }
  }

  /** Oldest first. */
  list(): string[] {
    return this.entries.slice();
  }
}
