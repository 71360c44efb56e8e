/**
 * Sandboxed file and command execution.
 */

// Types
export type {
  EditRequest,
  MatchStrategy,
  MatchResult,
  AppliedEdit,
  EditOutcome,
  EditLimits,
  ReadEvidence,
  FileReadRecord,
  CommandRequest,
  ExecResult,
  GitSafetyClass,
  GitArgSpec,
  EntryType,
  DirectoryEntry,
  FileInfo,
  GrepMatch,
} from './types.js';

// Errors
export {
  SandboxError,
  AmbiguousMatchError,
  BatchFailedError,
  isSandboxError,
  type SandboxErrorCode,
} from './errors.js';

// Settings
export {
  sandboxSettingsSchema,
  resolveSettings,
  SettingsValidationError,
  DEFAULT_ALLOWED_COMMANDS,
  DEFAULT_ENV_ALLOWLIST,
  type SandboxSettings,
  type SandboxSettingsInput,
  type LegacyMode,
} from './config.js';

// Paths
export {
  validatePath,
  assertSafePath,
  isWithinRestriction,
  matchGlob,
  evaluateAllowlist,
  isInGitMetadata,
  MAX_SYMLINK_HOPS,
} from './security.js';

// Writes
export { writeAtomic, DEFAULT_FILE_MODE, type AtomicWriteOptions, type AtomicWriteResult } from './atomic-writer.js';

// Matching and editing
export { findMatches, locate, GraphemeIndex, STRATEGIES, type Span, type Strategy } from './text-matcher.js';
export { applyEdit, applyEdits, DEFAULT_EDIT_LIMITS, type ApplyOptions } from './edit-engine.js';

// Search
export { globToRegExp, compilePattern, DEFAULT_MAX_RESULTS } from './search.js';

// Git
export {
  normalizeGitArgs,
  classifyGitCommand,
  classifyGitSpec,
  findDestructiveRule,
  isGitSubcommandAllowed,
  assertGitInvocationAllowed,
  gitPathArguments,
  DESTRUCTIVE_RULES,
  READ_ONLY_SUBCOMMANDS,
  MODIFYING_SUBCOMMANDS,
  type DestructiveRule,
} from './git-safety.js';

// Commands
export {
  CommandSandbox,
  sharedCommandPool,
  SHELL_INTERPRETERS,
  SAFE_DEVICE_PATHS,
  type CommandSandboxOptions,
  type PreparedCommand,
} from './command-sandbox.js';

// Output
export { truncateOutput, isBinary, decodeText, stripAnsi } from './output.js';

// Sessions
export {
  InMemorySessionContext,
  createSessionContext,
  resolveProjectRoot,
  evidenceFor,
  isFresh,
  type SessionContext,
} from './session.js';

// Workspace
export {
  Workspace,
  type WorkspaceOptions,
  type ReadFileOptions,
  type ReadFileResult,
  type WriteFileResult,
  type EditFileResult,
  type ListDirectoryOptions,
  type DeleteFileOptions,
  type GrepOptions,
  type GlobOptions,
} from './workspace.js';

// Tools
export * from './tools/index.js';
