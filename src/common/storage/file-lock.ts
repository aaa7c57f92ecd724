import { link, mkdir, open, readFile, rename, stat, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as crypto from 'node:crypto';
import { z } from 'zod';
import { errnoCode } from './json-file';

const lockFileSchema = z.object({
  token: z.string(),
  expiresAtMs: z.number(),
});

export type FileLockOptions = { ttlMs: number; waitMs?: number; retryDelayMs?: number };

async function readLock(path: string): Promise<z.infer<typeof lockFileSchema> | null> {
  try {
    const parsed = lockFileSchema.safeParse(JSON.parse(await readFile(path, 'utf8')));
    return parsed.success ? parsed.data : null;
  } catch {
    // Missing, or caught mid-write by another process.
    return null;
  }
}

async function tryAcquire(path: string, token: string, ttlMs: number): Promise<boolean> {
  await mkdir(dirname(path), { recursive: true });
  try {
    const handle = await open(path, 'wx');
    try {
      await handle.writeFile(JSON.stringify({ token, expiresAtMs: Date.now() + ttlMs }), 'utf8');
    } finally {
      await handle.close();
    }
    return true;
  } catch (err) {
    if (errnoCode(err) !== 'EEXIST') throw err;
  }

  // Held by someone else: clear it only once it has expired, so a crashed holder can't wedge the day.
  const current = await readLock(path);
  if (current) {
    if (current.expiresAtMs > Date.now()) return false;
  } else {
    const info = await stat(path).catch(() => null);
    if (info && Date.now() - info.mtimeMs <= ttlMs) return false;
  }
  await clearStaleLock(path, current?.token ?? null);
  return false;
}

/**
 * Removes a lock observed as expired. The rename is atomic, so only one waiter moves the file;
 * if what it moved is no longer the lock it judged stale, that lock goes back in place.
 */
export async function clearStaleLock(path: string, staleToken: string | null): Promise<void> {
  const aside = `${path}.${crypto.randomUUID()}.stale`;
  try {
    await rename(path, aside);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return;
    throw err;
  }
  try {
    const moved = await readLock(aside);
    if ((moved?.token ?? null) === staleToken) return;
    await link(aside, path);
  } catch (err) {
    // EEXIST: a newer holder already took the path.
    if (errnoCode(err) !== 'EEXIST') throw err;
  } finally {
    await unlink(aside).catch(() => undefined);
  }
}

async function release(path: string, token: string): Promise<void> {
  const current = await readLock(path);
  // Release only if token matches (avoids deleting someone else's lock if TTL expired and was reacquired).
  if (current?.token !== token) return;
  await unlink(path).catch(() => undefined);
}

/**
 * Best-effort cross-process lock backed by an exclusively created file.
 * Returns null if the lock could not be acquired within `waitMs`.
 */
export async function withFileLock<T>(path: string, opts: FileLockOptions, fn: () => Promise<T>): Promise<T | null> {
  const ttlMs = Math.max(1, Math.floor(opts.ttlMs));
  const waitMs = Math.max(0, Math.floor(opts.waitMs ?? 0));
  const retryDelayMs = Math.max(5, Math.floor(opts.retryDelayMs ?? 25));

  const token = crypto.randomUUID();
  const deadline = Date.now() + waitMs;
  let attempt = 0;

  while (true) {
    if (await tryAcquire(path, token, ttlMs)) break;
    if (Date.now() >= deadline) return null;
    // Backoff + jitter; the cap keeps a waiting request responsive once the holder finishes.
    const exp = Math.min(8, attempt++);
    const base = Math.min(500, retryDelayMs * Math.pow(2, exp));
    const jitter = 0.7 + Math.random() * 0.6;
    const delay = Math.max(5, Math.floor(base * jitter));
    await new Promise((r) => setTimeout(r, delay));
  }

  try {
    return await fn();
  } finally {
    await release(path, token);
  }
}
