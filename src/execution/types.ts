/**
 * Shared types for the sandbox.
 *
 * Defines the request and result shapes of every operation, and the read
 * evidence the session keeps for read-before-write.
 */

// ── Edits ────────────────────────────────────────────────────────────

/**
 * One search-and-replace request.
 */
export interface EditRequest {
  /** Text to locate; matched with the strategy chain */
  oldString: string;
  /** Replacement text */
  newString: string;
  /** Replace every occurrence instead of requiring a unique match */
  replaceAll?: boolean | undefined;
}

/** Name of a matching strategy, in chain order */
export type MatchStrategy =
  | 'exact'
  | 'line-trimmed'
  | 'whitespace-normalized'
  | 'indentation-flexible'
  | 'fuzzy';

/**
 * A located occurrence. Offsets count grapheme clusters, not code units.
 */
export interface MatchResult {
  strategy: MatchStrategy;
  /** Grapheme offset of the first matched character */
  start: number;
  /** Grapheme length of the matched region */
  length: number;
}

/**
 * Outcome of one applied edit.
 */
export interface AppliedEdit {
  strategy: MatchStrategy;
  /** Number of regions replaced */
  replacements: number;
}

/**
 * Outcome of an edit or batch applied in memory.
 */
export interface EditOutcome {
  content: string;
  applied: AppliedEdit[];
}

/**
 * Caps checked before any matching starts.
 */
export interface EditLimits {
  /** Maximum edits in one batch (default: 50) */
  maxEdits: number;
  /** Maximum length of any old or new string, in characters (default: 200000) */
  maxStringLength: number;
}

// ── Read tracking ────────────────────────────────────────────────────

/**
 * What a session observed when it last read (or wrote) a file.
 */
export interface ReadEvidence {
  /** sha256 of the file bytes, hex */
  hash: string;
  /** Modification time at observation */
  mtimeMs: number;
  /** Size in bytes at observation */
  size: number;
}

export interface FileReadRecord extends ReadEvidence {
  /** Epoch milliseconds when the record was made */
  readAt: number;
}

// ── Commands ─────────────────────────────────────────────────────────

/**
 * A command to run inside the project root. No shell is involved: `command`
 * is the executable and `args` reach it verbatim.
 */
export interface CommandRequest {
  command: string;
  args?: readonly string[] | undefined;
  /** Permit git operations classified as destructive */
  allowDestructive?: boolean | undefined;
  /** Timeout in milliseconds; capped by the configured maximum */
  timeoutMs?: number | undefined;
}

/**
 * Result of a command execution.
 */
export interface ExecResult {
  /** Process exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Execution duration in milliseconds */
  durationMs: number;
  /** Whether output was truncated due to size limits */
  truncated: boolean;
}

/** Safety class of a git invocation */
export type GitSafetyClass = 'read-only' | 'modifying' | 'destructive';

/**
 * Git arguments reduced to canonical form.
 */
export interface GitArgSpec {
  subcommand: string;
  /** Canonical flags: `=` values split off, short clusters expanded */
  flags: ReadonlySet<string>;
  /** Values attached to flags, by flag */
  flagValues: ReadonlyMap<string, readonly string[]>;
  /** Non-flag arguments, including everything after `--` */
  positionals: readonly string[];
  /** Arguments after `--` */
  pathspecs: readonly string[];
}

// ── Files ────────────────────────────────────────────────────────────

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

/**
 * One entry of a directory listing.
 */
export interface DirectoryEntry {
  /** Name relative to the listed directory, `/`-separated */
  name: string;
  type: EntryType;
}

export interface FileInfo {
  /** Path as the caller gave it */
  path: string;
  size: number;
  type: EntryType;
  /** Permission bits in octal, e.g. `644` */
  mode: string;
  /** Last modification, ISO 8601 */
  modified: string;
}

/**
 * A line matching a content search.
 */
export interface GrepMatch {
  /** File path relative to the project root */
  path: string;
  /** 1-based line number */
  line: number;
  /** The matching line, without its terminator */
  text: string;
}
