/**
 * Report Store
 *
 * Persists each submitted report as a plain text file named after the
 * current local time (second resolution). Writes go through a per-call
 * temporary file and a rename, so concurrent saves never interleave bytes.
 *
 * Two saves within the same second resolve to the same filename and the
 * later rename replaces the earlier file. This is a known limitation.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { EmptyContentError, StorageError } from '../../errors';
import { createLogger, errorMessage } from '../../utils/logger';
import type { Report } from '../../types/report';

const logger = createLogger('reportStore');

export interface ReportStoreOptions {
  /** Directory the report files are written to. */
  dir: string;
  /** Filename prefix; defaults to `weekly_report`. */
  prefix?: string;
  clock?: () => Date;
}

export class ReportStore {
  readonly dir: string;
  private readonly prefix: string;
  private readonly clock: () => Date;

  constructor(options: ReportStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.prefix = options.prefix ?? 'weekly_report';
    this.clock = options.clock ?? (() => new Date());
  }

  async ensureDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw new StorageError(err);
    }
  }

  async save(content: string | null | undefined): Promise<Report> {
    if (!content) {
      throw new EmptyContentError();
    }

    const createdAt = this.clock();
    const id = `${this.prefix}_${formatTimestamp(createdAt)}`;
    const filename = `${id}.txt`;
    const filepath = path.join(this.dir, filename);
    const tmpPath = `${filepath}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmpPath, content, 'utf8');
      await fs.rename(tmpPath, filepath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn({ tmpPath, error: errorMessage(cleanupErr) }, 'Failed to remove temporary report file');
      });
      logger.error({ filename, error: errorMessage(err) }, 'Error saving report');
      throw new StorageError(err);
    }

    logger.info({ reportId: id, filename }, 'Successfully saved report');
    return { id, filename, filepath, content, createdAt };
  }
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
