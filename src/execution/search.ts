/**
 * File discovery and content search inside the project.
 *
 * Walks never follow symlinks. Searches skip hidden entries; listings show
 * them. Result paths are `/`-separated.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SandboxError } from './errors.js';
import { decodeText } from './output.js';
import type { DirectoryEntry, EntryType, GrepMatch } from './types.js';

export const DEFAULT_MAX_RESULTS = 100;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** `/`-separated path of `target` relative to `root` */
export function relativeTo(root: string, target: string): string {
  return path.relative(root, target).split(path.sep).join('/');
}

/**
 * Anchored regular expression for a glob. `**` spans directories, `*` and
 * `?` stay within one path segment, `{a,b}` lists literal alternatives.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i] ?? '';
    if (ch === '*' && pattern[i + 1] === '*') {
      i++;
      if (pattern[i + 1] === '/') {
        i++;
        source += '(?:.*/)?';
      } else {
        source += '.*';
      }
    } else if (ch === '*') {
      source += '[^/]*';
    } else if (ch === '?') {
      source += '[^/]';
    } else if (ch === '{' && pattern.indexOf('}', i) !== -1) {
      const close = pattern.indexOf('}', i);
      const alternatives = pattern.slice(i + 1, close).split(',').map(escapeRegExp);
      source += `(?:${alternatives.join('|')})`;
      i = close;
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * Compile a caller-supplied regular expression.
 *
 * @throws SandboxError `InvalidPattern`
 */
export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new SandboxError('InvalidPattern', `Invalid regular expression: ${pattern}`);
    }
    throw err;
  }
}

interface TypedEntry {
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

export function entryType(entry: TypedEntry): EntryType {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  return 'other';
}

/**
 * Entries of `dir` sorted by name. Recursive listings name nested entries
 * relative to `dir` and do not descend into symlinked directories.
 */
export async function listDirectoryEntries(dir: string, recursive: boolean): Promise<DirectoryEntry[]> {
  const result: DirectoryEntry[] = [];
  const visit = async (current: string, prefix: string): Promise<void> => {
    for (const entry of await fs.readdir(current, { withFileTypes: true })) {
      const name = prefix + entry.name;
      const type = entryType(entry);
      result.push({ name, type });
      if (recursive && type === 'directory') {
        await visit(path.join(current, entry.name), `${name}/`);
      }
    }
  };
  await visit(dir, '');
  return result.sort((a, b) => byName(a.name, b.name));
}

/**
 * Regular files under `dir` in name order, depth first.
 */
export async function listFiles(dir: string, recursive: boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => byName(a.name, b.name));

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const absolute = path.join(dir, entry.name);
    if (entry.isFile()) {
      files.push(absolute);
    } else if (recursive && entry.isDirectory()) {
      files.push(...(await listFiles(absolute, true)));
    }
  }
  return files;
}

export interface GlobFilesOptions {
  /** Directory the pattern is relative to */
  base: string;
  /** Root that result paths are relative to */
  root: string;
  maxResults: number;
}

/**
 * Files under `base` matching `pattern`. A pattern without `/` matches file
 * names at any depth.
 */
export async function globFiles(pattern: string, options: GlobFilesOptions): Promise<string[]> {
  const matcher = globToRegExp(pattern.includes('/') ? pattern : `**/${pattern}`);
  const files = await listFiles(options.base, true);

  return files
    .filter((file) => matcher.test(relativeTo(options.base, file)))
    .map((file) => relativeTo(options.root, file))
    .sort(byName)
    .slice(0, options.maxResults);
}

export interface GrepFilesOptions {
  root: string;
  maxResults: number;
  /** Files larger than this are skipped */
  maxFileBytes: number;
  /** File name globs; empty means every file */
  include?: readonly string[] | undefined;
}

/**
 * Lines of `files` matching `regex`, in file order. Binary files and files
 * over the size cap are skipped.
 */
export async function grepFiles(
  files: readonly string[],
  regex: RegExp,
  options: GrepFilesOptions
): Promise<GrepMatch[]> {
  const include = (options.include ?? []).map(globToRegExp);
  const matches: GrepMatch[] = [];

  for (const file of files) {
    if (include.length > 0 && !include.some((glob) => glob.test(path.basename(file)))) continue;

    const stat = await fs.stat(file);
    if (stat.size > options.maxFileBytes) continue;
    const text = decodeText(await fs.readFile(file));
    if (text === null) continue;

    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    for (let i = 0; i < lines.length; i++) {
      const line = (lines[i] ?? '').replace(/\r$/, '');
      if (!regex.test(line)) continue;
      matches.push({ path: relativeTo(options.root, file), line: i + 1, text: line });
      if (matches.length >= options.maxResults) return matches;
    }
  }
  return matches;
}
