/**
 * Locates an edit's search string in file content.
 *
 * Strategies run in order from strictest to loosest and the first one that
 * finds anything wins. Every strategy has the same shape: content and target
 * in, code-unit spans out. Spans that would split a grapheme cluster are
 * discarded, and public offsets are reported in grapheme clusters.
 */

import { AmbiguousMatchError, SandboxError } from './errors.js';
import type { MatchResult, MatchStrategy } from './types.js';

/** Half-open code-unit range `[start, end)` */
export interface Span {
  start: number;
  end: number;
}

export interface Strategy {
  readonly name: MatchStrategy;
  find(content: string, target: string): Span[];
  /**
   * Adapt the replacement to the matched region's indentation and line
   * endings. Exact matches take the replacement as given.
   */
  reshape?(replacement: string, matched: string, target: string): string;
}

export interface Located {
  strategy: Strategy;
  spans: Span[];
}

export interface FindOptions {
  replaceAll?: boolean | undefined;
  /** Path or name used in error messages */
  label?: string | undefined;
}

// ── Line model ───────────────────────────────────────────────────────

interface Line {
  text: string;
  /** Offset of the first character */
  start: number;
  /** Offset just past the text, before any `\r\n` or `\n` */
  end: number;
}

function splitLines(content: string): Line[] {
  const lines: Line[] = [];
  let start = 0;
  for (;;) {
    const nl = content.indexOf('\n', start);
    const rawEnd = nl === -1 ? content.length : nl;
    const end = nl !== -1 && rawEnd > start && content[rawEnd - 1] === '\r' ? rawEnd - 1 : rawEnd;
    lines.push({ text: content.slice(start, end), start, end });
    if (nl === -1) return lines;
    start = nl + 1;
  }
}

function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? '';
}

function isBlank(line: string): boolean {
  return line.trim() === '';
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Drop blank lines at both ends */
function trimBlankEdges(lines: string[]): string[] {
  let first = 0;
  let last = lines.length;
  while (first < last && isBlank(lines[first] ?? '')) first++;
  while (last > first && isBlank(lines[last - 1] ?? '')) last--;
  return lines.slice(first, last);
}

function minIndent(lines: readonly string[]): number {
  let min = Infinity;
  for (const line of lines) {
    if (isBlank(line)) continue;
    min = Math.min(min, leadingWhitespace(line).length);
  }
  return min === Infinity ? 0 : min;
}

function lineEnding(text: string): string {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Re-indent `replacement` onto the matched lines. Non-blank lines pair up in
 * order across target, matched region and replacement: each replacement line
 * keeps its indent relative to the target line at the same position, anchored
 * on the indent that line actually has in the file.
 */
function reindent(replacement: string, matched: string, target: string): string {
  const targetLines = target.split(/\r?\n/).filter((line) => !isBlank(line));
  const targetBase = minIndent(targetLines);
  const matchedIndents = matched
    .split(/\r?\n/)
    .filter((line) => !isBlank(line))
    .map(leadingWhitespace);

  const newLines = replacement.split(/\r?\n/);
  const newBase = minIndent(newLines);

  let k = -1;
  return newLines
    .map((line) => {
      if (isBlank(line)) return line.replace(/^[ \t]+/, '');
      k = Math.min(k + 1, matchedIndents.length - 1);
      const anchor = matchedIndents[k] ?? '';
      const expected = leadingWhitespace(targetLines[k] ?? '').length - targetBase;
      const actual = leadingWhitespace(line).length - newBase;
      const delta = actual - expected;
      const indent =
        delta >= 0
          ? anchor + ' '.repeat(delta)
          : anchor.slice(0, Math.max(0, anchor.length + delta));
      return indent + line.trimStart();
    })
    .join(lineEnding(matched));
}

/**
 * Slide a window of `size` lines over `lines`, collecting non-overlapping
 * windows accepted by `accept`.
 */
function scanLineWindows(
  lines: readonly Line[],
  size: number,
  accept: (first: number) => Span | null
): Span[] {
  const spans: Span[] = [];
  let i = 0;
  while (i + size <= lines.length) {
    const span = accept(i);
    if (span) {
      spans.push(span);
      i += size;
    } else {
      i++;
    }
  }
  return spans;
}

// ── Strategies ───────────────────────────────────────────────────────

const exact: Strategy = {
  name: 'exact',
  find(content, target) {
    const spans: Span[] = [];
    let from = 0;
    for (;;) {
      const at = content.indexOf(target, from);
      if (at === -1) return spans;
      spans.push({ start: at, end: at + target.length });
      from = at + target.length;
    }
  },
};

/**
 * Trailing whitespace is ignored on every line. The first line also ignores
 * its indent; later lines keep theirs, so a block whose nesting differs is
 * left to the indentation-flexible strategy.
 */
const lineTrimmed: Strategy = {
  name: 'line-trimmed',
  find(content, target) {
    const wanted = target
      .trim()
      .split(/\r?\n/)
      .map((line) => line.trimEnd());
    const lines = splitLines(content);

    return scanLineWindows(lines, wanted.length, (i) => {
      for (let j = 0; j < wanted.length; j++) {
        const line = lines[i + j];
        if (!line) return null;
        const text = j === 0 ? line.text.trim() : line.text.trimEnd();
        if (text !== wanted[j]) return null;
      }
      const first = lines[i];
      const last = lines[i + wanted.length - 1];
      if (!first || !last) return null;
      return { start: first.start, end: last.start + last.text.trimEnd().length };
    });
  },

  reshape: reindent,
};

const whitespaceNormalized: Strategy = {
  name: 'whitespace-normalized',
  find(content, target) {
    const pattern = target
      .trim()
      .split(/\r?\n/)
      .map((line, j) => {
        const tokens = line.trim().split(/[ \t]+/).filter(Boolean);
        if (tokens.length === 0) return '';
        const indent = j === 0 ? '' : escapeRegExp(leadingWhitespace(line));
        return indent + tokens.map(escapeRegExp).join('[ \\t]+');
      })
      .join('[ \\t]*\\r?\\n');

    const spans: Span[] = [];
    const re = new RegExp(pattern, 'g');
    for (let m = re.exec(content); m !== null; m = re.exec(content)) {
      spans.push({ start: m.index, end: m.index + m[0].length });
    }
    return spans;
  },

  // The span starts after the target's own indent
  reshape(replacement, matched, target) {
    const indent = leadingWhitespace(trimBlankEdges(target.split(/\r?\n/))[0] ?? '');
    const lines = replacement.split(/\r?\n/);
    const first = lines[0] ?? '';
    if (indent.length > 0 && first.startsWith(indent)) {
      lines[0] = first.slice(indent.length);
    }
    return lines.join(lineEnding(matched));
  },
};

const indentationFlexible: Strategy = {
  name: 'indentation-flexible',
  find(content, target) {
    const wanted = trimBlankEdges(target.split(/\r?\n/)).map((line) => line.trim());
    const lines = splitLines(content);

    return scanLineWindows(lines, wanted.length, (i) => {
      for (let j = 0; j < wanted.length; j++) {
        const line = lines[i + j];
        if (!line || line.text.trim() !== wanted[j]) return null;
      }
      const first = lines[i];
      const last = lines[i + wanted.length - 1];
      if (!first || !last) return null;
      return { start: first.start, end: last.end };
    });
  },

  reshape: reindent,
};

function normalizeLine(line: string): string {
  return line.trim().replace(/\s+/g, ' ');
}

const fuzzy: Strategy = {
  name: 'fuzzy',
  find(content, target) {
    const wanted = target
      .split(/\r?\n/)
      .filter((line) => !isBlank(line))
      .map(normalizeLine);
    if (wanted.length === 0) return [];

    const lines = splitLines(content).filter((line) => !isBlank(line.text));

    return scanLineWindows(lines, wanted.length, (i) => {
      for (let j = 0; j < wanted.length; j++) {
        const line = lines[i + j];
        if (!line || normalizeLine(line.text) !== wanted[j]) return null;
      }
      const first = lines[i];
      const last = lines[i + wanted.length - 1];
      if (!first || !last) return null;
      return { start: first.start, end: last.start + last.text.trimEnd().length };
    });
  },

  reshape: reindent,
};

/** The strategy chain, strictest first */
export const STRATEGIES: readonly Strategy[] = [
  exact,
  lineTrimmed,
  whitespaceNormalized,
  indentationFlexible,
  fuzzy,
];

// ── Grapheme offsets ─────────────────────────────────────────────────

/**
 * Maps code-unit offsets to grapheme-cluster offsets for one string.
 */
export class GraphemeIndex {
  /** Code-unit offsets of every cluster boundary, ascending; null for plain ASCII */
  private readonly boundaries: number[] | null;

  constructor(private readonly text: string) {
    // Without `\r` every ASCII character is its own cluster
    if (/^[\x00-\x0c\x0e-\x7f]*$/.test(text)) {
      this.boundaries = null;
      return;
    }
    const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });
    const boundaries: number[] = [];
    for (const { index } of segmenter.segment(text)) {
      boundaries.push(index);
    }
    boundaries.push(text.length);
    this.boundaries = boundaries;
  }

  /** Number of grapheme clusters in the text */
  get length(): number {
    return this.boundaries ? this.boundaries.length - 1 : this.text.length;
  }

  /** Cluster offset of a code-unit offset, or -1 if it splits a cluster */
  toGrapheme(offset: number): number {
    if (!this.boundaries) {
      return offset >= 0 && offset <= this.text.length ? offset : -1;
    }
    let lo = 0;
    let hi = this.boundaries.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const value = this.boundaries[mid] ?? 0;
      if (value === offset) return mid;
      if (value < offset) lo = mid + 1;
      else hi = mid - 1;
    }
    return -1;
  }

  isBoundary(offset: number): boolean {
    return this.toGrapheme(offset) !== -1;
  }
}

// ── Public API ───────────────────────────────────────────────────────

/** Extend a span over the line terminator that follows it */
function absorbTerminator(content: string, span: Span): Span {
  const rest = /^[ \t]*\r?\n/.exec(content.slice(span.end, span.end + 256));
  return rest ? { start: span.start, end: span.end + rest[0].length } : span;
}

/**
 * Find the spans `target` occupies in `content`, trying each strategy in
 * turn.
 *
 * @throws SandboxError `NoMatch` when nothing matches or `target` is empty
 * @throws AmbiguousMatchError when several spans match and `replaceAll` is off
 */
export function locate(content: string, target: string, options: FindOptions = {}): Located {
  const where = options.label ? `: ${options.label}` : '';
  if (target.length === 0) {
    throw new SandboxError('NoMatch', `old_string must not be empty${where}`);
  }

  const index = new GraphemeIndex(content);
  const endsWithNewline = /\r?\n$/.test(target);
  const whitespaceOnly = target.trim() === '';

  for (const strategy of STRATEGIES) {
    // Only an exact match can locate pure whitespace
    if (whitespaceOnly && strategy.name !== 'exact') break;
    const spans = strategy
      .find(content, target)
      .map((span) =>
        strategy.name !== 'exact' && endsWithNewline ? absorbTerminator(content, span) : span
      )
      .filter((span) => index.isBoundary(span.start) && index.isBoundary(span.end));

    if (spans.length === 0) continue;
    if (spans.length > 1 && !options.replaceAll) {
      throw new AmbiguousMatchError(spans.length, options.label);
    }
    return { strategy, spans };
  }

  throw new SandboxError('NoMatch', `String not found in file${where}`);
}

/**
 * Grapheme-offset view of {@link locate}.
 */
export function findMatches(
  content: string,
  target: string,
  options: FindOptions = {}
): MatchResult[] {
  const { strategy, spans } = locate(content, target, options);
  const index = new GraphemeIndex(content);
  return spans.map((span) => {
    const start = index.toGrapheme(span.start);
    return { strategy: strategy.name, start, length: index.toGrapheme(span.end) - start };
  });
}
