import type { Logger } from '@nestjs/common';
import { mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { errorMessage } from '../errors/error-message';

export function errnoCode(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code;
  return null;
}

/**
 * A single JSON document on disk, validated on read.
 * Writes go to a temp file first and are renamed into place, so readers never see a half-written file.
 */
export class JsonFile<T> {
  constructor(
    readonly path: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly logger: Logger,
  ) {}

  /**
   * Null when the file is missing, unparsable, or fails validation. I/O errors propagate.
   * An unparsable or invalid file is renamed to `<path>.corrupt-<ms>` first, so the next write cannot clobber it.
   */
  async read(): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
    if (!raw.trim()) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      await this.quarantine(`not valid JSON: ${errorMessage(err)}`);
      return null;
    }
    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      await this.quarantine(`failed validation: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
      return null;
    }
    return parsed.data;
  }

  private async quarantine(reason: string): Promise<void> {
    const aside = `${this.path}.corrupt-${Date.now()}`;
    try {
      await rename(this.path, aside);
    } catch (err) {
      // Another reader already moved it.
      if (errnoCode(err) === 'ENOENT') return;
      throw err;
    }
    this.logger.warn(`[store] ${this.path} ${reason}; moved to ${aside}`);
  }

  async write(value: T): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(value, null, 2), 'utf8');
      await rename(tmp, this.path);
    } catch (err) {
      await unlink(tmp).catch(() => undefined);
      throw err;
    }
  }

  async remove(): Promise<void> {
    try {
      await unlink(this.path);
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') throw err;
    }
  }
}
