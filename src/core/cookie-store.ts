import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import type { Logger } from 'winston';
import { z } from 'zod';
import { CookieRecord } from '../types/index.js';
import { CookieRecordNotFoundError, PersistenceError } from '../utils/errors.js';

export const cookieRecordSchema = z.object({
  cookieSet: z.record(
    z.object({
      value: z.string(),
      domain: z.string(),
      expiresAt: z.string().optional(),
    })
  ),
  source: z.enum(['Automated', 'Manual']),
  savedAt: z.string(),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Holds the single current cookie record in one JSON file. Saves are
 * serialized and land through write-to-temp-then-rename, so a reader sees
 * either the old file or the new one.
 */
export class CookieStore {
  private readonly writer = pLimit(1);

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  getFilePath(): string {
    return this.filePath;
  }

  async save(record: CookieRecord): Promise<void> {
    await this.writer(() => this.write(record));
    this.logger.info('Cookie record saved', {
      source: record.source,
      savedAt: record.savedAt,
      names: Object.keys(record.cookieSet),
    });
  }

  async load(): Promise<CookieRecord> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new CookieRecordNotFoundError(this.filePath);
      }
      throw new PersistenceError(`Failed to read cookie record: ${errorMessage(error)}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Cookie record is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = cookieRecordSchema.safeParse(data);
    if (!parsed.success) {
      throw new PersistenceError(`Cookie record has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  private async write(record: CookieRecord): Promise<void> {
    const dir = path.dirname(this.filePath);
    const suffix = crypto.randomBytes(6).toString('hex');
    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${suffix}.tmp`);

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      const handle = await fs.promises.open(tempPath, 'w', 0o600);
      try {
        await handle.writeFile(JSON.stringify(record, null, 2), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug('Temporary cookie file not removed', { file: tempPath, error: errorMessage(cleanupError) });
      });
      this.logger.error('Cookie record save failed', { file: this.filePath, error: errorMessage(error) });
      throw new PersistenceError(`Failed to save cookie record: ${errorMessage(error)}`);
    }
  }
}
