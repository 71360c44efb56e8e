/**
 * Workspace: the file and command operations of one agent session.
 *
 * Every path goes through the validator, every overwrite needs fresh read
 * evidence, and every commit is a single atomic write. Mutating operations
 * of one workspace run one at a time. Nothing but git writes inside `.git`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { writeAtomic } from './atomic-writer.js';
import { CommandSandbox } from './command-sandbox.js';
import { resolveSettings, type SandboxSettings, type SandboxSettingsInput } from './config.js';
import { applyEdit, applyEdits } from './edit-engine.js';
import { SandboxError, errnoCode, errorMessage, isSandboxError } from './errors.js';
import { decodeText } from './output.js';
import {
  DEFAULT_MAX_RESULTS,
  compilePattern,
  entryType,
  globFiles,
  grepFiles,
  listDirectoryEntries,
  listFiles,
} from './search.js';
import { isInGitMetadata, validatePath } from './security.js';
import { evidenceFor, isFresh, resolveProjectRoot, type SessionContext } from './session.js';
import type {
  AppliedEdit,
  CommandRequest,
  DirectoryEntry,
  EditLimits,
  EditOutcome,
  EditRequest,
  ExecResult,
  FileInfo,
  GrepMatch,
} from './types.js';
import { Mutex, type Semaphore } from '../utils/concurrency.js';
import { logger, type Logger } from '../utils/logger.js';

export interface WorkspaceOptions {
  /** Session whose read records gate writes; omit only for legacy callers */
  session?: SessionContext | undefined;
  /** Project root for legacy callers without a session */
  projectRoot?: string | undefined;
  settings?: SandboxSettingsInput | undefined;
  /** Command pool; defaults to the process-wide one */
  pool?: Semaphore | undefined;
  logger?: Logger | undefined;
}

export interface ReadFileOptions {
  /** Line offset to start from (0-based) */
  offset?: number | undefined;
  /** Maximum number of lines to return */
  limit?: number | undefined;
}

export interface ReadFileResult {
  content: string;
  /** Lines in the whole file */
  totalLines: number;
}

export interface WriteFileResult {
  bytes: number;
  /** False when an existing file was replaced */
  created: boolean;
}

export interface EditFileResult {
  applied: AppliedEdit[];
  /** Total regions replaced across all edits */
  replacements: number;
}

export interface ListDirectoryOptions {
  /** Include nested entries, named relative to the listed directory */
  recursive?: boolean | undefined;
}

export interface DeleteFileOptions {
  /** Must be true; deletion is never implied */
  confirm?: boolean | undefined;
}

export interface GrepOptions {
  /** File or directory to search; defaults to the project root */
  path?: string | undefined;
  /** File name globs to search, e.g. `*.ts` */
  include?: readonly string[] | undefined;
  /** Descend into subdirectories (default true) */
  recursive?: boolean | undefined;
  maxResults?: number | undefined;
}

export interface GlobOptions {
  /** Directory the pattern is relative to; defaults to the project root */
  path?: string | undefined;
  maxResults?: number | undefined;
}

interface FileSnapshot {
  bytes: Buffer;
  text: string;
  mtimeMs: number;
}

export class Workspace {
  readonly commands: CommandSandbox;
  private readonly mutex = new Mutex();
  private readonly log: Logger;

  private constructor(
    readonly projectRoot: string,
    readonly session: SessionContext | undefined,
    readonly settings: SandboxSettings,
    pool: Semaphore | undefined,
    log: Logger
  ) {
    this.log = log;
    this.commands = new CommandSandbox({ projectRoot, settings, pool, logger: log });
  }

  /**
   * Open a workspace on a session (or, for legacy callers, a bare project
   * root).
   *
   * @throws SandboxError `NotFound` when neither is given or the root is not
   *   a directory
   * @throws SettingsValidationError when `settings` are invalid
   */
  static async open(options: WorkspaceOptions): Promise<Workspace> {
    const settings = resolveSettings(options.settings);
    const log = (options.logger ?? logger).child({ name: 'workspace' });

    let root: string;
    if (options.session) {
      root = options.session.projectRoot;
    } else if (options.projectRoot !== undefined) {
      root = await resolveProjectRoot(options.projectRoot);
      log.warn('Workspace opened without a session context', { legacyMode: settings.legacyMode });
    } else {
      throw new SandboxError('NotFound', 'A session or project root is required');
    }

    return new Workspace(root, options.session, settings, options.pool, log);
  }

  /** Canonical path for a caller-supplied path inside the project */
  resolve(rawPath: string): Promise<string> {
    return validatePath(rawPath, this.projectRoot);
  }

  /**
   * Read a text file and record read evidence for it.
   *
   * @throws SandboxError `NotFound`, `NotText`, `CapExceeded` or a path error
   */
  async readFile(rawPath: string, options: ReadFileOptions = {}): Promise<ReadFileResult> {
    const canonical = await this.resolve(rawPath);
    const snapshot = await this.snapshot(canonical, rawPath);
    this.session?.markRead(canonical, evidenceFor(snapshot.bytes, snapshot.mtimeMs));

    const lines = snapshot.text.split('\n');
    if (options.offset === undefined && options.limit === undefined) {
      return { content: snapshot.text, totalLines: lines.length };
    }
    const start = options.offset ?? 0;
    const end = options.limit !== undefined ? start + options.limit : lines.length;
    return { content: lines.slice(start, end).join('\n'), totalLines: lines.length };
  }

  /**
   * Create or replace a file. Replacing needs fresh read evidence.
   *
   * @throws SandboxError `ReadBeforeWriteRequired`, `CapExceeded`,
   *   `IntegrityError` or a path error
   */
  writeFile(rawPath: string, content: string): Promise<WriteFileResult> {
    return this.mutex.run(async () => {
      const canonical = await this.resolveWritable(rawPath);
      const bytes = Buffer.from(content, 'utf8');
      if (bytes.length > this.settings.maxFileBytes) {
        throw new SandboxError(
          'CapExceeded',
          `Content is ${String(bytes.length)} bytes; the limit is ${String(this.settings.maxFileBytes)}`
        );
      }

      const existing = await this.statIfExists(canonical);
      if (existing?.isDirectory()) {
        throw new SandboxError('NotFound', `Not a file: ${rawPath}`);
      }
      if (existing) {
        const current = await fs.readFile(canonical);
        this.requireFreshRead(canonical, rawPath, current, existing.mtimeMs);
      } else {
        await fs.mkdir(path.dirname(canonical), { recursive: true });
      }

      await this.commit(canonical, rawPath, bytes);
      return { bytes: bytes.length, created: !existing };
    });
  }

  /**
   * Apply one edit to a file the session has read.
   *
   * @throws SandboxError `NoMatch`, `AmbiguousMatch`, `NoOpEdit`,
   *   `ReadBeforeWriteRequired` and the errors of {@link readFile}
   */
  editFile(rawPath: string, edit: EditRequest): Promise<EditFileResult> {
    return this.modify(rawPath, (text, label) =>
      applyEdit(text, edit, { limits: this.editLimits(), label })
    );
  }

  /**
   * Apply a batch of edits to a file the session has read. The file is
   * written once, after every edit succeeded in memory; on failure it is
   * left byte-identical.
   *
   * @throws BatchFailedError naming the first failing edit
   */
  multiEditFile(rawPath: string, edits: readonly EditRequest[]): Promise<EditFileResult> {
    return this.modify(rawPath, (text, label) =>
      applyEdits(text, edits, { limits: this.editLimits(), label })
    );
  }

  /**
   * List a directory without following symlinks.
   *
   * @throws SandboxError `NotFound` or a path error
   */
  async listDirectory(rawPath = '.', options: ListDirectoryOptions = {}): Promise<DirectoryEntry[]> {
    const canonical = await this.resolve(rawPath);
    await this.requireDirectory(canonical, rawPath);
    return listDirectoryEntries(canonical, options.recursive ?? false);
  }

  /**
   * Size, type, permissions and modification time of a path.
   *
   * @throws SandboxError `NotFound` or a path error
   */
  async fileInfo(rawPath: string): Promise<FileInfo> {
    const canonical = await this.resolve(rawPath);
    const stat = await this.statIfExists(canonical);
    if (!stat) {
      throw new SandboxError('NotFound', `Path not found: ${rawPath}`);
    }
    return {
      path: rawPath,
      size: stat.size,
      type: entryType(stat),
      mode: (stat.mode & 0o777).toString(8),
      modified: stat.mtime.toISOString(),
    };
  }

  /**
   * Create a directory and any missing parents.
   *
   * @returns whether the directory was created
   * @throws SandboxError `NotFound` when a file is in the way, or a path error
   */
  createDirectory(rawPath: string): Promise<{ created: boolean }> {
    return this.mutex.run(async () => {
      const canonical = await this.resolveWritable(rawPath);
      const existing = await this.statIfExists(canonical);
      if (existing && !existing.isDirectory()) {
        throw new SandboxError('NotFound', `Not a directory: ${rawPath}`);
      }
      await fs.mkdir(canonical, { recursive: true });
      return { created: !existing };
    });
  }

  /**
   * Delete one file. A symlink is removed itself, never its target.
   *
   * @throws SandboxError `Disallowed` without `confirm`, `NotFound` for a
   *   missing path or a directory, or a path error
   */
  async deleteFile(rawPath: string, options: DeleteFileOptions = {}): Promise<void> {
    if (options.confirm !== true) {
      throw new SandboxError('Disallowed', 'Delete operation requires confirm=true');
    }
    return this.mutex.run(async () => {
      await this.resolve(rawPath);
      const lexical = path.resolve(this.projectRoot, rawPath);
      const parent = await this.resolve(path.dirname(lexical));
      const target = path.join(parent, path.basename(lexical));
      this.assertOutsideGitMetadata(target, rawPath);

      const stat = await this.statIfExists(target, { followLinks: false });
      if (!stat) {
        throw new SandboxError('NotFound', `File not found: ${rawPath}`);
      }
      if (stat.isDirectory()) {
        throw new SandboxError('NotFound', `Not a file: ${rawPath}`);
      }

      await fs.unlink(target);
      this.log.info('Deleted file', { path: rawPath });
    });
  }

  /**
   * Search file contents with a regular expression. Binary files, hidden
   * entries and files over the size cap are skipped.
   *
   * @throws SandboxError `InvalidPattern`, `NotFound` or a path error
   */
  async grep(pattern: string, options: GrepOptions = {}): Promise<GrepMatch[]> {
    const regex = compilePattern(pattern);
    const rawPath = options.path ?? '.';
    const canonical = await this.resolve(rawPath);
    const stat = await this.statIfExists(canonical);
    if (!stat) {
      throw new SandboxError('NotFound', `Path not found: ${rawPath}`);
    }

    const files = stat.isDirectory() ? await listFiles(canonical, options.recursive ?? true) : [canonical];
    return grepFiles(files, regex, {
      root: this.projectRoot,
      maxResults: options.maxResults ?? DEFAULT_MAX_RESULTS,
      maxFileBytes: this.settings.maxFileBytes,
      include: options.include,
    });
  }

  /**
   * Find files by glob, relative to the project root.
   *
   * @throws SandboxError `NotFound` or a path error
   */
  async glob(pattern: string, options: GlobOptions = {}): Promise<string[]> {
    const rawPath = options.path ?? '.';
    const canonical = await this.resolve(rawPath);
    await this.requireDirectory(canonical, rawPath);
    return globFiles(pattern, {
      base: canonical,
      root: this.projectRoot,
      maxResults: options.maxResults ?? DEFAULT_MAX_RESULTS,
    });
  }

  /**
   * Run a command in the project root.
   */
  runCommand(request: CommandRequest): Promise<ExecResult> {
    return this.mutex.run(() => this.commands.execute(request));
  }

  // ── internals ──────────────────────────────────────────────────────

  private async resolveWritable(rawPath: string): Promise<string> {
    const canonical = await this.resolve(rawPath);
    this.assertOutsideGitMetadata(canonical, rawPath);
    return canonical;
  }

  private assertOutsideGitMetadata(canonical: string, rawPath: string): void {
    if (isInGitMetadata(canonical, this.projectRoot)) {
      this.log.warn('Refused write inside .git', { path: rawPath });
      throw new SandboxError('Disallowed', `Writes inside .git are not allowed: ${rawPath}`);
    }
  }

  private async requireDirectory(canonical: string, rawPath: string): Promise<void> {
    const stat = await this.statIfExists(canonical);
    if (!stat) {
      throw new SandboxError('NotFound', `Directory not found: ${rawPath}`);
    }
    if (!stat.isDirectory()) {
      throw new SandboxError('NotFound', `Not a directory: ${rawPath}`);
    }
  }

  private editLimits(): EditLimits {
    return {
      maxEdits: this.settings.maxEditsPerBatch,
      maxStringLength: this.settings.maxEditStringLength,
    };
  }

  private modify(
    rawPath: string,
    apply: (text: string, label: string) => EditOutcome
  ): Promise<EditFileResult> {
    return this.mutex.run(async () => {
      const canonical = await this.resolveWritable(rawPath);
      const snapshot = await this.snapshot(canonical, rawPath);
      this.requireFreshRead(canonical, rawPath, snapshot.bytes, snapshot.mtimeMs);

      const outcome = apply(snapshot.text, rawPath);
      await this.commit(canonical, rawPath, Buffer.from(outcome.content, 'utf8'));

      return {
        applied: outcome.applied,
        replacements: outcome.applied.reduce((sum, edit) => sum + edit.replacements, 0),
      };
    });
  }

  private async statIfExists(canonical: string, options: { followLinks: boolean } = { followLinks: true }) {
    try {
      return await (options.followLinks ? fs.stat(canonical) : fs.lstat(canonical));
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return undefined;
      throw err;
    }
  }

  private async snapshot(canonical: string, rawPath: string): Promise<FileSnapshot> {
    const stat = await this.statIfExists(canonical);
    if (!stat) {
      throw new SandboxError('NotFound', `File not found: ${rawPath}`);
    }
    if (!stat.isFile()) {
      throw new SandboxError('NotFound', `Not a file: ${rawPath}`);
    }
    if (stat.size > this.settings.maxFileBytes) {
      throw new SandboxError(
        'CapExceeded',
        `File is ${String(stat.size)} bytes; the limit is ${String(this.settings.maxFileBytes)}`
      );
    }

    const bytes = await fs.readFile(canonical);
    const text = decodeText(bytes);
    if (text === null) {
      throw new SandboxError('NotText', `File is binary or not valid UTF-8: ${rawPath}`);
    }
    return { bytes, text, mtimeMs: stat.mtimeMs };
  }

  private requireFreshRead(
    canonical: string,
    rawPath: string,
    current: Uint8Array,
    mtimeMs: number
  ): void {
    if (!this.session) {
      if (this.settings.legacyMode === 'warn') {
        this.log.warn('Skipping read-before-write check without a session', { path: rawPath });
        return;
      }
      throw new SandboxError(
        'ReadBeforeWriteRequired',
        `No session context; read-before-write cannot be verified: ${rawPath}`
      );
    }

    const record = this.session.getReadRecord(canonical);
    if (!record) {
      throw new SandboxError(
        'ReadBeforeWriteRequired',
        `File must be read before overwriting: ${rawPath}`
      );
    }
    if (!isFresh(record, evidenceFor(current, mtimeMs))) {
      throw new SandboxError(
        'ReadBeforeWriteRequired',
        `File changed since it was last read: ${rawPath}`
      );
    }
  }

  private async commit(canonical: string, rawPath: string, bytes: Buffer): Promise<void> {
    try {
      // Links may have changed since validation
      await this.resolve(rawPath);
      await writeAtomic(canonical, bytes);
      const stat = await fs.stat(canonical);
      this.session?.markRead(canonical, evidenceFor(bytes, stat.mtimeMs));
    } catch (err) {
      if (isSandboxError(err)) throw err;
      this.log.error('Commit failed', { path: rawPath, error: errorMessage(err) });
      throw new SandboxError('IntegrityError', `Failed to write file: ${rawPath}`);
    }
  }
}
