/**
 * Applies search-and-replace edits to an in-memory buffer.
 *
 * Single edits and batches share the same strategy chain. A batch is a
 * transaction: limits are checked before any matching, edits run in order
 * against the evolving buffer, and the first failure aborts the whole batch.
 * Nothing here touches the disk.
 */

import { BatchFailedError, SandboxError, isSandboxError } from './errors.js';
import { locate } from './text-matcher.js';
import type { EditLimits, EditOutcome, EditRequest, AppliedEdit } from './types.js';

export const DEFAULT_EDIT_LIMITS: EditLimits = {
  maxEdits: 50,
  maxStringLength: 200_000,
};

export interface ApplyOptions {
  limits?: Partial<EditLimits> | undefined;
  /** Path shown in error messages */
  label?: string | undefined;
}

function resolveLimits(limits: Partial<EditLimits> | undefined): EditLimits {
  return { ...DEFAULT_EDIT_LIMITS, ...limits };
}

function checkStringLengths(edit: EditRequest, limits: EditLimits): void {
  for (const [field, value] of [
    ['old_string', edit.oldString],
    ['new_string', edit.newString],
  ] as const) {
    if (value.length > limits.maxStringLength) {
      throw new SandboxError(
        'CapExceeded',
        `${field} is ${String(value.length)} characters; the limit is ${String(limits.maxStringLength)}`
      );
    }
  }
}

function replaceOnce(
  content: string,
  edit: EditRequest,
  label: string | undefined
): { content: string; applied: AppliedEdit } {
  if (edit.oldString === edit.newString) {
    throw new SandboxError('NoOpEdit', 'old_string and new_string are identical');
  }

  const { strategy, spans } = locate(content, edit.oldString, {
    replaceAll: edit.replaceAll,
    label,
  });

  let result = content;
  // Right to left so earlier spans keep their offsets
  for (const span of [...spans].reverse()) {
    const matched = result.slice(span.start, span.end);
    const replacement = strategy.reshape
      ? strategy.reshape(edit.newString, matched, edit.oldString)
      : edit.newString;
    result = result.slice(0, span.start) + replacement + result.slice(span.end);
  }

  return { content: result, applied: { strategy: strategy.name, replacements: spans.length } };
}

/**
 * Apply one edit.
 *
 * @throws SandboxError `NoOpEdit`, `CapExceeded`, `NoMatch` or `AmbiguousMatch`
 */
export function applyEdit(
  content: string,
  edit: EditRequest,
  options: ApplyOptions = {}
): EditOutcome {
  checkStringLengths(edit, resolveLimits(options.limits));
  const { content: next, applied } = replaceOnce(content, edit, options.label);
  return { content: next, applied: [applied] };
}

/**
 * Apply edits in order; either all succeed or none take effect.
 *
 * @throws SandboxError `NoOpEdit` for an empty batch, `CapExceeded` when the
 *   batch has too many edits
 * @throws BatchFailedError naming the 1-based index of the first failing edit
 */
export function applyEdits(
  content: string,
  edits: readonly EditRequest[],
  options: ApplyOptions = {}
): EditOutcome {
  const limits = resolveLimits(options.limits);

  if (edits.length === 0) {
    throw new SandboxError('NoOpEdit', 'No edits provided');
  }
  if (edits.length > limits.maxEdits) {
    throw new SandboxError(
      'CapExceeded',
      `Batch has ${String(edits.length)} edits; the limit is ${String(limits.maxEdits)}`
    );
  }
  edits.forEach((edit, i) => {
    try {
      checkStringLengths(edit, limits);
    } catch (err) {
      throw wrap(i, err);
    }
  });

  let buffer = content;
  const applied: AppliedEdit[] = [];
  edits.forEach((edit, i) => {
    try {
      const step = replaceOnce(buffer, edit, options.label);
      buffer = step.content;
      applied.push(step.applied);
    } catch (err) {
      throw wrap(i, err);
    }
  });

  return { content: buffer, applied };
}

function wrap(zeroBasedIndex: number, err: unknown): unknown {
  return isSandboxError(err) ? new BatchFailedError(zeroBasedIndex + 1, err) : err;
}
