/**
 * Per-session state consumed by the workspace: the canonical project root
 * and the record of what the session has read.
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SandboxError, errnoCode } from './errors.js';
import type { FileReadRecord, ReadEvidence } from './types.js';

/**
 * Read tracking for one agent session. Keys are canonical paths.
 */
export interface SessionContext {
  /** Canonical, absolute project root; fixed for the session's lifetime */
  readonly projectRoot: string;
  markRead(canonicalPath: string, evidence: ReadEvidence): void;
  wasRead(canonicalPath: string): boolean;
  getReadRecord(canonicalPath: string): FileReadRecord | undefined;
}

export class InMemorySessionContext implements SessionContext {
  private readonly reads = new Map<string, FileReadRecord>();

  constructor(
    readonly projectRoot: string,
    private readonly now: () => number = Date.now
  ) {}

  markRead(canonicalPath: string, evidence: ReadEvidence): void {
    this.reads.set(canonicalPath, { ...evidence, readAt: this.now() });
  }

  wasRead(canonicalPath: string): boolean {
    return this.reads.has(canonicalPath);
  }

  getReadRecord(canonicalPath: string): FileReadRecord | undefined {
    return this.reads.get(canonicalPath);
  }

  /** Number of files with read evidence */
  get size(): number {
    return this.reads.size;
  }
}

/**
 * Canonical form of a project root.
 *
 * @throws SandboxError `NotFound` if the root is missing or not a directory
 */
export async function resolveProjectRoot(projectRoot: string): Promise<string> {
  let root: string;
  try {
    root = await fs.realpath(path.resolve(projectRoot));
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new SandboxError('NotFound', `Project root does not exist: ${projectRoot}`);
    }
    throw err;
  }

  const stat = await fs.stat(root);
  if (!stat.isDirectory()) {
    throw new SandboxError('NotFound', `Project root is not a directory: ${projectRoot}`);
  }
  return root;
}

/** Open a session on the canonical form of `projectRoot`. */
export async function createSessionContext(projectRoot: string): Promise<InMemorySessionContext> {
  return new InMemorySessionContext(await resolveProjectRoot(projectRoot));
}

export function hashBytes(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export function evidenceFor(bytes: Uint8Array, mtimeMs: number): ReadEvidence {
  return { hash: hashBytes(bytes), mtimeMs, size: bytes.length };
}

/**
 * A record is fresh while the bytes on disk hash the same. A bare mtime
 * change (`touch`) does not invalidate it.
 */
export function isFresh(record: ReadEvidence, current: ReadEvidence): boolean {
  return record.size === current.size && record.hash === current.hash;
}
