/**
 * Crash-safe file replacement.
 *
 * Data goes to a temp file in the target's directory, is flushed and given
 * its final permissions, and only then renamed over the target. A reader
 * sees either the old bytes or the new bytes, never a mix.
 */

import { randomBytes } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SandboxError, errnoCode } from './errors.js';

/** Mode for files that did not exist before */
export const DEFAULT_FILE_MODE = 0o644;

export interface AtomicWriteOptions {
  /** Permission bits for the result; defaults to the existing file's, else 0o644 */
  mode?: number | undefined;
  /** Called after the temp file is flushed, just before the rename */
  beforeRename?: ((tempPath: string) => Promise<void>) | undefined;
}

export interface AtomicWriteResult {
  bytes: number;
  mode: number;
}

export function tempPathFor(target: string): string {
  const suffix = randomBytes(6).toString('hex');
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

async function existingMode(target: string): Promise<number | undefined> {
  try {
    const stat = await fs.stat(target);
    return stat.mode & 0o7777;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return undefined;
    throw err;
  }
}

/**
 * Atomically replace `target` with `data`.
 *
 * @throws SandboxError `IntegrityError` if the renamed file's size differs
 *   from the bytes written
 */
export async function writeAtomic(
  target: string,
  data: string | Uint8Array,
  options: AtomicWriteOptions = {}
): Promise<AtomicWriteResult> {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  const mode = options.mode ?? (await existingMode(target)) ?? DEFAULT_FILE_MODE;
  const tempPath = tempPathFor(target);

  let renamed = false;
  try {
    const handle = await fs.open(tempPath, 'wx', mode);
    try {
      await handle.writeFile(bytes);
      // open() is subject to the umask
      await handle.chmod(mode);
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (options.beforeRename) {
      await options.beforeRename(tempPath);
    }

    await fs.rename(tempPath, target);
    renamed = true;
  } finally {
    if (!renamed) {
      await fs.rm(tempPath, { force: true });
    }
  }

  const written = await fs.stat(target);
  if (written.size !== bytes.length) {
    throw new SandboxError(
      'IntegrityError',
      `Integrity check failed: expected ${String(bytes.length)} bytes, found ${String(written.size)}`
    );
  }

  return { bytes: bytes.length, mode };
}
