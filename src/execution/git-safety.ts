/**
 * Git argument normalization and safety classification.
 *
 * Raw argument vectors are reduced to a canonical flag set first (`=` values
 * split off, short clusters expanded, `--` honoured, push refspec prefixes
 * mapped to the flags they imply), and only that canonical form is matched
 * against the rule table. Argument order and spelling therefore cannot hide
 * a destructive operation.
 */

import { SandboxError } from './errors.js';
import type { GitArgSpec, GitSafetyClass } from './types.js';

// ── Rule data ────────────────────────────────────────────────────────

export const READ_ONLY_SUBCOMMANDS: ReadonlySet<string> = new Set([
  'status',
  'diff',
  'log',
  'show',
  'branch',
  'remote',
  'tag',
  'rev-parse',
  'blame',
  'reflog',
  'ls-files',
  'describe',
  'shortlog',
]);

export const MODIFYING_SUBCOMMANDS: ReadonlySet<string> = new Set([
  'add',
  'commit',
  'checkout',
  'switch',
  'restore',
  'merge',
  'rebase',
  'cherry-pick',
  'stash',
  'push',
  'pull',
  'fetch',
  'reset',
  'revert',
  'rm',
  'mv',
  'clean',
  'init',
]);

/** Flags that make git run an arbitrary program */
export const DISALLOWED_FLAGS: ReadonlySet<string> = new Set([
  '--upload-pack',
  '--receive-pack',
  '--exec',
  '--open-files-in-pager',
  '--ext-diff',
]);

/** Flags whose value names a file or directory */
export const PATH_VALUED_FLAGS: ReadonlySet<string> = new Set([
  '-o',
  '--output',
  '--output-directory',
  '-F',
  '--file',
  '--template',
  '--git-dir',
  '--work-tree',
  '--pathspec-from-file',
]);

/** Flags that take a non-path value as the next argument */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '-m',
  '--message',
  '--max-count',
  '--author',
  '--since',
  '--until',
  '--date',
  '--format',
  '--pretty',
  '--grep',
  '-b',
]);

/**
 * A git invocation is destructive when every condition of some rule holds.
 */
export interface DestructiveRule {
  subcommand: string;
  /** Canonical flags that must all be present */
  flags?: readonly string[] | undefined;
  /** Required first positional (e.g. `stash drop`) */
  action?: string | undefined;
  /** Flags whose presence exempts the invocation */
  unless?: readonly string[] | undefined;
  /** Requires at least one pathspec after `--` */
  pathspec?: boolean | undefined;
}

export const DESTRUCTIVE_RULES: readonly DestructiveRule[] = [
  { subcommand: 'push', flags: ['--force'] },
  { subcommand: 'push', flags: ['-f'] },
  { subcommand: 'push', flags: ['--force-with-lease'] },
  { subcommand: 'push', flags: ['--force-if-includes'] },
  { subcommand: 'push', flags: ['--delete'] },
  { subcommand: 'push', flags: ['-d'] },
  { subcommand: 'push', flags: ['--mirror'] },
  { subcommand: 'push', flags: ['--prune'] },

  { subcommand: 'reset', flags: ['--hard'] },
  { subcommand: 'reset', flags: ['--merge'] },

  { subcommand: 'clean', flags: ['-f'] },
  { subcommand: 'clean', flags: ['--force'] },

  { subcommand: 'branch', flags: ['-D'] },
  { subcommand: 'branch', flags: ['-M'] },
  { subcommand: 'branch', flags: ['-C'] },
  { subcommand: 'branch', flags: ['--delete', '--force'] },
  { subcommand: 'branch', flags: ['--delete', '-f'] },
  { subcommand: 'branch', flags: ['-d', '--force'] },
  { subcommand: 'branch', flags: ['-d', '-f'] },
  { subcommand: 'branch', flags: ['--move', '--force'] },
  { subcommand: 'branch', flags: ['-m', '-f'] },

  { subcommand: 'checkout', flags: ['-f'] },
  { subcommand: 'checkout', flags: ['--force'] },
  { subcommand: 'checkout', flags: ['-B'] },
  { subcommand: 'checkout', action: '.' },
  { subcommand: 'checkout', pathspec: true },

  { subcommand: 'switch', flags: ['-f'] },
  { subcommand: 'switch', flags: ['--force'] },
  { subcommand: 'switch', flags: ['--discard-changes'] },
  { subcommand: 'switch', flags: ['-C'] },

  { subcommand: 'restore', unless: ['--staged', '-S'] },
  { subcommand: 'restore', flags: ['--worktree'] },
  { subcommand: 'restore', flags: ['-W'] },

  { subcommand: 'tag', flags: ['-f'] },
  { subcommand: 'tag', flags: ['--force'] },

  { subcommand: 'rm', flags: ['-f'] },
  { subcommand: 'rm', flags: ['--force'] },

  { subcommand: 'stash', action: 'clear' },
  { subcommand: 'stash', action: 'drop' },

  { subcommand: 'reflog', action: 'expire' },
  { subcommand: 'reflog', action: 'delete' },
];

/** Flags under which `git branch` / `git tag` only list */
const BRANCH_LIST_FLAGS = new Set([
  '-l', '--list', '-a', '--all', '-r', '--remotes', '-v', '-vv', '--verbose',
  '--show-current', '--contains', '--no-contains', '--merged', '--no-merged',
  '--sort', '--format', '--points-at', '--color', '--no-color', '--column', '--no-column',
]);
const TAG_LIST_FLAGS = new Set([
  '-l', '--list', '-n', '--contains', '--no-contains', '--merged', '--no-merged',
  '--points-at', '--sort', '--format', '--column', '--no-column', '-v', '--verify',
]);
const REMOTE_READ_ACTIONS = new Set(['show', 'get-url']);
const STASH_READ_ACTIONS = new Set(['list', 'show']);

// ── Normalization ────────────────────────────────────────────────────

const longFlagCache = new Map<string, readonly string[]>();

/** Long options the tables above know for `subcommand` */
function knownLongFlags(subcommand: string): readonly string[] {
  const cached = longFlagCache.get(subcommand);
  if (cached) return cached;

  const known = new Set<string>([...VALUE_FLAGS, ...PATH_VALUED_FLAGS, ...DISALLOWED_FLAGS]);
  for (const rule of DESTRUCTIVE_RULES) {
    if (rule.subcommand !== subcommand) continue;
    for (const flag of [...(rule.flags ?? []), ...(rule.unless ?? [])]) known.add(flag);
  }
  if (subcommand === 'branch') BRANCH_LIST_FLAGS.forEach((flag) => known.add(flag));
  if (subcommand === 'tag') TAG_LIST_FLAGS.forEach((flag) => known.add(flag));

  const result = [...known].filter((flag) => flag.startsWith('--'));
  longFlagCache.set(subcommand, result);
  return result;
}

/**
 * Git accepts any unambiguous prefix of a long option (`--har` runs as
 * `--hard`). A prefix of known options stands for every option it could
 * abbreviate, so an ambiguous prefix still carries the destructive reading.
 */
function expandLongFlag(subcommand: string, written: string): string[] {
  if (written.length <= 2) return [written];
  const known = knownLongFlags(subcommand);
  if (known.includes(written)) return [written];
  const candidates = known.filter((flag) => flag.startsWith(written));
  return candidates.length > 0 ? candidates : [written];
}

/**
 * Reduce raw arguments to canonical form.
 *
 * `--flag=value` becomes `--flag` plus a value, `-fdx` becomes `-f -d -x`,
 * abbreviated long options are expanded, arguments after `--` are positional, path-valued flags consume the next
 * argument, and for `push` a `+ref` refspec implies `--force` and `:ref`
 * implies `--delete`.
 */
export function normalizeGitArgs(subcommand: string, rawArgs: readonly string[]): GitArgSpec {
  const flags = new Set<string>();
  const flagValues = new Map<string, string[]>();
  const positionals: string[] = [];
  const pathspecs: string[] = [];

  const addValue = (flag: string, value: string) => {
    const list = flagValues.get(flag) ?? [];
    list.push(value);
    flagValues.set(flag, list);
  };
  const takesValue = (flag: string) => PATH_VALUED_FLAGS.has(flag) || VALUE_FLAGS.has(flag);
  // A following flag is never swallowed as a value
  const hasValueAt = (i: number) => i < rawArgs.length && !(rawArgs[i] ?? '-').startsWith('-');

  let afterSeparator = false;
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i] ?? '';

    if (afterSeparator) {
      positionals.push(arg);
      pathspecs.push(arg);
      continue;
    }
    if (arg === '--') {
      afterSeparator = true;
      continue;
    }
    if (arg === '-' || !arg.startsWith('-')) {
      positionals.push(arg);
      continue;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const names = expandLongFlag(subcommand, eq === -1 ? arg : arg.slice(0, eq));
      for (const name of names) flags.add(name);
      if (eq !== -1) {
        for (const name of names) addValue(name, arg.slice(eq + 1));
      } else {
        const valued = names.filter(takesValue);
        if (valued.length > 0 && hasValueAt(i + 1)) {
          const value = rawArgs[++i] ?? '';
          for (const name of valued) addValue(name, value);
        }
      }
      continue;
    }

    const cluster = arg.slice(1);
    for (let k = 0; k < cluster.length; k++) {
      const flag = `-${cluster.charAt(k)}`;
      flags.add(flag);
      if (takesValue(flag)) {
        const attached = cluster.slice(k + 1);
        if (attached) {
          addValue(flag, attached);
          // `-mf` may be a value or two flags; keep both readings
          for (const ch of attached) flags.add(`-${ch}`);
        } else if (hasValueAt(i + 1)) {
          addValue(flag, rawArgs[++i] ?? '');
        }
        break;
      }
    }
  }

  if (subcommand === 'push') {
    for (const refspec of positionals) {
      if (refspec.startsWith('+')) flags.add('--force');
      if (refspec.startsWith(':')) flags.add('--delete');
    }
  }

  return { subcommand, flags, flagValues, positionals, pathspecs };
}

// ── Classification ───────────────────────────────────────────────────

export function isGitSubcommandAllowed(subcommand: string): boolean {
  return READ_ONLY_SUBCOMMANDS.has(subcommand) || MODIFYING_SUBCOMMANDS.has(subcommand);
}

function ruleMatches(rule: DestructiveRule, spec: GitArgSpec): boolean {
  if (rule.subcommand !== spec.subcommand) return false;
  if (rule.flags && !rule.flags.every((flag) => spec.flags.has(flag))) return false;
  if (rule.unless?.some((flag) => spec.flags.has(flag))) return false;
  if (rule.action !== undefined && spec.positionals[0] !== rule.action) return false;
  if (rule.pathspec && spec.pathspecs.length === 0) return false;
  return true;
}

/** The first destructive rule the invocation satisfies, if any */
export function findDestructiveRule(spec: GitArgSpec): DestructiveRule | undefined {
  return DESTRUCTIVE_RULES.find((rule) => ruleMatches(rule, spec));
}

function onlyListing(spec: GitArgSpec, listFlags: ReadonlySet<string>): boolean {
  for (const flag of spec.flags) {
    if (!listFlags.has(flag)) return false;
  }
  return spec.positionals.length === 0 || spec.flags.has('--list') || spec.flags.has('-l');
}

/**
 * Classify a normalized invocation. Pure: depends only on the canonical
 * flag set, positionals and subcommand.
 */
export function classifyGitSpec(spec: GitArgSpec): GitSafetyClass {
  if (findDestructiveRule(spec)) return 'destructive';

  switch (spec.subcommand) {
    case 'branch':
      return onlyListing(spec, BRANCH_LIST_FLAGS) ? 'read-only' : 'modifying';
    case 'tag':
      return onlyListing(spec, TAG_LIST_FLAGS) ? 'read-only' : 'modifying';
    case 'remote': {
      const action = spec.positionals[0];
      return action === undefined || REMOTE_READ_ACTIONS.has(action) ? 'read-only' : 'modifying';
    }
    case 'stash': {
      const action = spec.positionals[0];
      return action !== undefined && STASH_READ_ACTIONS.has(action) ? 'read-only' : 'modifying';
    }
    case 'reflog': {
      const action = spec.positionals[0];
      return action === undefined || action === 'show' ? 'read-only' : 'modifying';
    }
  }

  return READ_ONLY_SUBCOMMANDS.has(spec.subcommand) ? 'read-only' : 'modifying';
}

/**
 * Normalize and classify in one step.
 */
export function classifyGitCommand(
  subcommand: string,
  rawArgs: readonly string[]
): GitSafetyClass {
  return classifyGitSpec(normalizeGitArgs(subcommand, rawArgs));
}

/**
 * Reject invocations the sandbox never runs: unknown subcommands and flags
 * that execute programs.
 *
 * @throws SandboxError `Disallowed`
 */
export function assertGitInvocationAllowed(spec: GitArgSpec): void {
  if (!isGitSubcommandAllowed(spec.subcommand)) {
    throw new SandboxError('Disallowed', `git subcommand '${spec.subcommand}' is not allowed`);
  }
  for (const flag of spec.flags) {
    if (DISALLOWED_FLAGS.has(flag)) {
      throw new SandboxError('Disallowed', `git flag '${flag}' is not allowed`);
    }
  }
}

/**
 * Arguments that name filesystem locations and must stay inside the
 * project: values of path-valued flags, every pathspec after `--`, and
 * positionals that look like paths.
 */
export function gitPathArguments(spec: GitArgSpec): string[] {
  const paths: string[] = [];
  for (const [flag, values] of spec.flagValues) {
    if (PATH_VALUED_FLAGS.has(flag)) paths.push(...values);
  }
  paths.push(...spec.pathspecs);
  for (const positional of spec.positionals) {
    if (spec.pathspecs.includes(positional)) continue;
    if (looksLikePath(positional)) paths.push(positional);
  }
  return paths;
}

/** Heuristic for arguments that are probably filesystem paths */
export function looksLikePath(arg: string): boolean {
  return arg.startsWith('/') || arg.startsWith('.') || arg.startsWith('~') || arg.includes('/');
}
