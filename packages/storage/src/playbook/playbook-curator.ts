/**
 * Playbook Curator
 *
 * Persists playbook snapshots as a rolling history capped at `maxHistory`
 * entries. The file is `{ history: [...], latest: {...} }` and is replaced
 * atomically on every save.
 */

import { promises as fs } from 'node:fs';
import { PlaybookSnapshotSchema, type PlaybookSnapshot } from '@racelab/core';
import { PersistenceError, createLogger, errorMessage, type Logger } from '@racelab/utils';
import { writeFileAtomic } from '../fs/atomic-write.js';

export const DEFAULT_PLAYBOOK_PATH = 'artifacts/playbook/playbook.json';
export const PLAYBOOK_TEMP_PREFIX = '.playbook_';

/**
 * Anything that can render itself as a playbook snapshot
 */
export interface PlaybookSource {
  toSnapshot(): PlaybookSnapshot;
}

export interface PlaybookCuratorOptions {
  outputPath?: string;
  maxHistory?: number;
  logger?: Logger;
}

export class PlaybookCurator {
  readonly outputPath: string;
  readonly maxHistory: number;
  private readonly logger: Logger;

  constructor(options: PlaybookCuratorOptions = {}) {
    this.outputPath = options.outputPath ?? DEFAULT_PLAYBOOK_PATH;
    this.maxHistory = options.maxHistory ?? 10;
    if (!Number.isInteger(this.maxHistory) || this.maxHistory < 1) {
      throw new PersistenceError(
        `maxHistory must be a positive integer, got ${this.maxHistory}`,
        'configure'
      );
    }
    this.logger = options.logger ?? createLogger('@racelab/storage');
  }

  /**
   * Append a snapshot to the history and replace the playbook file
   */
  async save(playbook: PlaybookSource): Promise<string> {
    const snapshot = playbook.toSnapshot();
    const history = [...(await this.loadHistory()), snapshot].slice(-this.maxHistory);
    const payload = { history, latest: snapshot };

    try {
      await writeFileAtomic(this.outputPath, `${JSON.stringify(payload, null, 2)}\n`, {
        tempPrefix: PLAYBOOK_TEMP_PREFIX,
      });
    } catch (error) {
      throw new PersistenceError(
        `Failed to write playbook to ${this.outputPath}: ${errorMessage(error)}`,
        'savePlaybook',
        { path: this.outputPath }
      );
    }

    this.logger.info('Playbook saved', {
      path: this.outputPath,
      historyLength: history.length,
    });
    return this.outputPath;
  }

  /**
   * Snapshots on file, oldest first. A missing or unreadable file is an empty history.
   */
  async loadHistory(): Promise<PlaybookSnapshot[]> {
    let text: string;
    try {
      text = await fs.readFile(this.outputPath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn('Playbook file unreadable, starting a new history', {
          path: this.outputPath,
          error: errorMessage(error),
        });
      }
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      this.logger.warn('Playbook file is not valid JSON, starting a new history', {
        path: this.outputPath,
        error: errorMessage(error),
      });
      return [];
    }

    if (typeof data !== 'object' || data === null || !('history' in data)) {
      this.logger.warn('Playbook file has no history, starting a new one', {
        path: this.outputPath,
      });
      return [];
    }
    const { history } = data;
    if (!Array.isArray(history)) {
      this.logger.warn('Playbook history is not a list, starting a new one', {
        path: this.outputPath,
      });
      return [];
    }

    const snapshots: PlaybookSnapshot[] = [];
    history.forEach((entry: unknown, index: number) => {
      const parsed = PlaybookSnapshotSchema.safeParse(entry);
      if (parsed.success) {
        snapshots.push(parsed.data);
      } else {
        this.logger.warn('Skipping malformed playbook snapshot', {
          path: this.outputPath,
          index,
        });
      }
    });
    return snapshots;
  }

  async loadLatest(): Promise<PlaybookSnapshot | null> {
    const history = await this.loadHistory();
    return history[history.length - 1] ?? null;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
