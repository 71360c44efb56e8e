/**
 * Output utilities: truncation of large command output, binary detection
 * and ANSI stripping.
 */

/** Default maximum output characters */
export const DEFAULT_MAX_OUTPUT_CHARS = 100_000;

/** Head portion of truncated output (20% of max) */
const HEAD_RATIO = 0.2;

/**
 * Truncate output that exceeds the maximum character limit.
 *
 * Keeps the first 20% (head) and the last 80% (tail) of the allowance, with
 * a truncation marker in between.
 */
export function truncateOutput(
  output: string,
  maxChars?: number
): { text: string; truncated: boolean } {
  const max = maxChars ?? DEFAULT_MAX_OUTPUT_CHARS;
  if (output.length <= max) {
    return { text: output, truncated: false };
  }

  const headSize = Math.floor(max * HEAD_RATIO);
  const tailSize = max - headSize;
  const omitted = output.length - headSize - tailSize;

  const head = output.slice(0, headSize);
  const tail = tailSize > 0 ? output.slice(-tailSize) : '';
  const text = `${head}\n\n--- truncated ${String(omitted)} characters ---\n\n${tail}`;

  return { text, truncated: true };
}

/**
 * Detect binary content by checking for null bytes in the first 8KB.
 */
export function isBinary(buffer: Uint8Array): boolean {
  const checkLength = Math.min(buffer.length, 8192);
  for (let i = 0; i < checkLength; i++) {
    if (buffer[i] === 0) {
      return true;
    }
  }
  return false;
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode bytes as UTF-8 text, or return null when they are binary or not
 * valid UTF-8.
 */
export function decodeText(buffer: Uint8Array): string | null {
  if (isBinary(buffer)) return null;
  try {
    return strictUtf8.decode(buffer);
  } catch {
    return null;
  }
}

/**
 * Strip ANSI escape codes from text.
 */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '');
}
