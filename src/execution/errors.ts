/**
 * Error taxonomy for sandboxed file and command operations.
 *
 * Messages are safe to show to the agent: they name the path the caller
 * supplied, an edit index or an offending flag, and never a canonical host
 * path or environment contents.
 */

export type SandboxErrorCode =
  | 'PathTraversal'
  | 'SymlinkEscape'
  | 'NotFound'
  | 'ReadBeforeWriteRequired'
  | 'NoOpEdit'
  | 'NoMatch'
  | 'AmbiguousMatch'
  | 'IntegrityError'
  | 'BatchFailed'
  | 'Disallowed'
  | 'DestructiveRefused'
  | 'TimedOut'
  | 'NotText'
  | 'CapExceeded'
  | 'InvalidPattern';

/**
 * Base error for every refusal or failure raised by the sandbox.
 */
export class SandboxError extends Error {
  constructor(
    public readonly code: SandboxErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'SandboxError';
  }
}

/**
 * The search string occurs more than once and `replace_all` was not set.
 */
export class AmbiguousMatchError extends SandboxError {
  constructor(
    public readonly count: number,
    label?: string
  ) {
    const where = label ? ` in ${label}` : '';
    super(
      'AmbiguousMatch',
      `Found ${String(count)} occurrences of the string${where}. Use replace_all: true to replace all, or provide a more specific string.`
    );
    this.name = 'AmbiguousMatchError';
  }
}

/**
 * An edit inside a multi-edit batch failed; nothing was written.
 */
export class BatchFailedError extends SandboxError {
  constructor(
    /** 1-based position of the failing edit */
    public readonly index: number,
    public readonly inner: SandboxError
  ) {
    super('BatchFailed', `Edit ${String(index)} failed: ${inner.message}`);
    this.name = 'BatchFailedError';
  }
}

export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The `code` of a Node.js system error, if any */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
