import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { SandboxError, type SandboxErrorCode } from '../errors.js';

/** Validation function for `assert.rejects` / `assert.throws` */
export function sandboxCode(code: SandboxErrorCode, message?: RegExp) {
  return (err: unknown): true => {
    assert.ok(err instanceof SandboxError, `expected a SandboxError, got ${String(err)}`);
    assert.strictEqual(err.code, code);
    if (message) assert.match(err.message, message);
    return true;
  };
}

/** A fresh temp directory, canonicalized (macOS puts tmp behind a symlink) */
export async function makeTempDir(prefix: string): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}
