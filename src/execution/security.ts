/**
 * Security utilities for the sandbox.
 *
 * Provides allowlist evaluation for commands and the path validator every
 * file operation goes through before touching the disk.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SandboxError, errnoCode } from './errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ name: 'paths' });

/** Dangling-link hops followed before a chain is treated as a loop */
export const MAX_SYMLINK_HOPS = 40;

/**
 * Match a text string against a simple glob pattern.
 * Supports `*` as a wildcard that matches any sequence of characters.
 */
export function matchGlob(text: string, pattern: string): boolean {
  // Escape regex special chars except *, then convert * to .*
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
  const regexStr = `^${escaped.replace(/\*/g, '.*')}$`;
  return new RegExp(regexStr).test(text);
}

/**
 * Evaluate a command name against an allowlist of glob patterns
 * (e.g. `git`, `npm`, `python*`, `*`).
 */
export function evaluateAllowlist(command: string, patterns: readonly string[]): boolean {
  const trimmed = command.trim();
  return patterns.some((pattern) => matchGlob(trimmed, pattern));
}

/**
 * Check whether a resolved path stays within a restriction directory.
 */
export function isWithinRestriction(resolvedPath: string, restriction: string): boolean {
  const base = path.resolve(restriction);
  if (base === path.parse(base).root) {
    return resolvedPath.startsWith(base);
  }
  return resolvedPath === base || resolvedPath.startsWith(base + path.sep);
}

/**
 * Whether a canonical path lies inside a repository's `.git` directory (or is
 * a `.git` file). Hooks and config there run code on the next git command.
 */
export function isInGitMetadata(canonicalPath: string, root: string): boolean {
  return path.relative(root, canonicalPath).split(path.sep).includes('.git');
}

/**
 * Lexical check only: throws if `filePath` resolves outside `restriction`.
 * Does not consult the filesystem, so symlinks are not followed.
 */
export function assertSafePath(filePath: string, restriction: string): void {
  const base = path.resolve(restriction);
  const resolved = path.resolve(base, filePath);

  if (!isWithinRestriction(resolved, base)) {
    throw traversal(filePath);
  }
}

/**
 * Resolve `rawPath` against `projectRoot` and return its canonical absolute
 * form, following every symlink along the way.
 *
 * - `PathTraversal` when the path is empty, contains a NUL byte, or resolves
 *   lexically outside the root (`../..`, absolute paths elsewhere).
 * - `SymlinkEscape` when any link in the chain lands outside the canonical
 *   root, or the chain loops.
 *
 * Paths that do not exist yet are accepted: the deepest existing ancestor is
 * canonicalized and the remaining components are appended to it.
 */
export async function validatePath(rawPath: string, projectRoot: string): Promise<string> {
  if (rawPath.length === 0 || rawPath.includes('\0')) {
    log.warn('Rejected malformed path', { path: rawPath.replace(/\0/g, '\\0') });
    throw traversal(rawPath);
  }

  const lexicalRoot = path.resolve(projectRoot);
  const root = await fs.realpath(lexicalRoot);
  const lexical = path.resolve(lexicalRoot, rawPath);

  if (!isWithinRestriction(lexical, lexicalRoot) && !isWithinRestriction(lexical, root)) {
    log.warn('Path escapes project boundary', { path: rawPath });
    throw traversal(rawPath);
  }

  let canonical: string;
  try {
    canonical = await canonicalize(lexical);
  } catch (err) {
    if (err instanceof SymlinkLoop) {
      log.warn('Symlink loop', { path: rawPath });
      throw symlinkEscape(rawPath);
    }
    throw err;
  }

  if (!isWithinRestriction(canonical, root)) {
    log.warn('Symlink escapes project boundary', { path: rawPath });
    throw symlinkEscape(rawPath);
  }

  return canonical;
}

// ── internals ────────────────────────────────────────────────────────

class SymlinkLoop extends Error {}

function traversal(rawPath: string): SandboxError {
  return new SandboxError(
    'PathTraversal',
    `Security error: path escapes project boundary: ${rawPath}`
  );
}

function symlinkEscape(rawPath: string): SandboxError {
  return new SandboxError(
    'SymlinkEscape',
    `Security error: symlink escapes project boundary: ${rawPath}`
  );
}

async function danglingLinkTarget(candidate: string): Promise<string | null> {
  try {
    const stat = await fs.lstat(candidate);
    if (!stat.isSymbolicLink()) return null;
    return await fs.readlink(candidate);
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') return null;
    throw err;
  }
}

async function canonicalize(target: string): Promise<string> {
  let current = target;
  const missing: string[] = [];
  let hops = 0;

  for (;;) {
    try {
      const real = await fs.realpath(current);
      return path.join(real, ...[...missing].reverse());
    } catch (err) {
      const code = errnoCode(err);
      if (code === 'ELOOP') throw new SymlinkLoop();
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw err;
    }

    const link = await danglingLinkTarget(current);
    if (link !== null) {
      hops++;
      if (hops > MAX_SYMLINK_HOPS) throw new SymlinkLoop();
      current = path.resolve(path.dirname(current), link);
      continue;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return path.join(current, ...[...missing].reverse());
    }
    missing.push(path.basename(current));
    current = parent;
  }
}
