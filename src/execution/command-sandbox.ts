/**
 * Runs allowlisted executables inside the project root.
 *
 * No shell is involved: the executable is spawned directly with its argument
 * vector, a cleared environment and the project root as cwd. Git invocations
 * are classified before anything is spawned, and every path-like argument
 * goes through the path validator.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import * as path from 'node:path';
import { resolveSettings, type SandboxSettings } from './config.js';
import { SandboxError, errnoCode } from './errors.js';
import {
  assertGitInvocationAllowed,
  classifyGitSpec,
  gitPathArguments,
  looksLikePath,
  normalizeGitArgs,
} from './git-safety.js';
import { stripAnsi, truncateOutput } from './output.js';
import { evaluateAllowlist, isInGitMetadata, validatePath } from './security.js';
import type { CommandRequest, ExecResult, GitSafetyClass } from './types.js';
import { Semaphore } from '../utils/concurrency.js';
import { logger, type Logger } from '../utils/logger.js';

export const SHELL_INTERPRETERS: ReadonlySet<string> = new Set([
  'bash', 'sh', 'zsh', 'fish', 'dash', 'ksh', 'csh', 'tcsh', 'ash',
]);

/** Absolute paths any command may name */
export const SAFE_DEVICE_PATHS: ReadonlySet<string> = new Set([
  '/dev/null',
  '/dev/zero',
  '/dev/urandom',
  '/dev/random',
  '/dev/stdin',
  '/dev/stdout',
  '/dev/stderr',
]);

/** Arguments that turn an otherwise harmless command into a program runner or deleter */
export const FORBIDDEN_ARGUMENTS: Readonly<Record<string, ReadonlySet<string>>> = {
  find: new Set(['-exec', '-execdir', '-ok', '-okdir', '-delete', '-fprint', '-fprintf', '-fls']),
  sort: new Set(['--compress-program']),
};

/** Always set for git so it never prompts, pages or reads system or user config */
const GIT_ENV: Readonly<Record<string, string>> = {
  GIT_TERMINAL_PROMPT: '0',
  GIT_PAGER: 'cat',
  PAGER: 'cat',
  GIT_CONFIG_NOSYSTEM: '1',
  GIT_CONFIG_GLOBAL: '/dev/null',
};

/**
 * A request that passed every check and is ready to spawn.
 */
export interface PreparedCommand {
  command: string;
  args: string[];
  env: Record<string, string>;
  timeoutMs: number;
  /** Set for git invocations */
  gitClass?: GitSafetyClass | undefined;
}

export interface CommandSandboxOptions {
  /** Canonical project root */
  projectRoot: string;
  settings?: SandboxSettings | undefined;
  /** Concurrency pool; defaults to one shared by every sandbox in the process */
  pool?: Semaphore | undefined;
  logger?: Logger | undefined;
}

let sharedPool: Semaphore | undefined;

/**
 * The process-wide command pool. Its size is fixed by the first caller.
 */
export function sharedCommandPool(capacity: number): Semaphore {
  sharedPool ??= new Semaphore(capacity);
  return sharedPool;
}

interface SpawnOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

function killGroup(proc: ChildProcess): void {
  if (proc.pid === undefined) return;
  try {
    // Negative pid: the whole group, including grandchildren holding our pipes
    process.kill(-proc.pid, 'SIGKILL');
  } catch (err) {
    if (errnoCode(err) !== 'ESRCH') {
      proc.kill('SIGKILL');
    }
  }
}

/**
 * Spawn without a shell and wait for the `close` event, killing the process
 * group on timeout.
 * @internal
 */
function spawnSandboxed(
  command: string,
  args: string[],
  options: { cwd: string; env: Record<string, string>; timeoutMs: number }
): Promise<SpawnOutcome> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (!settled) {
        settled = true;
        fn();
      }
    };

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
      detached: true,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');
    proc.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
    });

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup(proc);
    }, options.timeoutMs);

    proc.on('close', (code) => {
      clearTimeout(timer);
      settle(() => {
        resolve({ exitCode: code ?? 1, stdout, stderr, timedOut });
      });
    });

    proc.on('error', (err) => {
      clearTimeout(timer);
      settle(() => {
        reject(err);
      });
    });
  });
}

/**
 * Validates and runs commands for one project root.
 */
export class CommandSandbox {
  readonly projectRoot: string;
  private readonly settings: SandboxSettings;
  private readonly pool: Semaphore;
  private readonly log: Logger;

  constructor(options: CommandSandboxOptions) {
    this.projectRoot = options.projectRoot;
    this.settings = options.settings ?? resolveSettings();
    this.pool = options.pool ?? sharedCommandPool(this.settings.maxConcurrentCommands);
    this.log = (options.logger ?? logger).child({ name: 'commands' });
  }

  /**
   * Run every check without spawning anything.
   *
   * @throws SandboxError `Disallowed`, `DestructiveRefused`, `PathTraversal`
   *   or `SymlinkEscape`
   */
  async prepare(request: CommandRequest): Promise<PreparedCommand> {
    const command = request.command;
    const args = [...(request.args ?? [])];

    if (command.trim() === '') {
      throw this.refuse('Disallowed', 'command is required');
    }
    if (command.includes('/') || command.includes('\\')) {
      throw this.refuse('Disallowed', `Command must be a bare executable name: ${command}`);
    }
    if (SHELL_INTERPRETERS.has(command)) {
      throw this.refuse('Disallowed', `Shell interpreters are not allowed: ${command}`);
    }
    if (!evaluateAllowlist(command, this.settings.allowedCommands)) {
      throw this.refuse('Disallowed', `Command not allowed: ${command}`);
    }

    const forbidden = FORBIDDEN_ARGUMENTS[command];
    const offending = forbidden ? args.find((arg) => forbidden.has(arg.split('=')[0] ?? arg)) : undefined;
    if (offending !== undefined) {
      throw this.refuse('Disallowed', `Argument '${offending}' is not allowed for ${command}`);
    }

    let gitClass: GitSafetyClass | undefined;
    if (command === 'git') {
      gitClass = await this.checkGit(args, request.allowDestructive ?? false);
    } else {
      await this.checkPathArguments(args);
    }

    const requested = request.timeoutMs ?? this.settings.defaultTimeoutMs;
    const timeoutMs = Math.max(1, Math.min(requested, this.settings.maxTimeoutMs));

    return {
      command,
      args,
      env: this.buildEnv(command === 'git'),
      timeoutMs,
      gitClass,
    };
  }

  /**
   * Validate, wait for a pool slot, run, and collect output.
   *
   * @throws SandboxError `TimedOut` after the process group has been killed
   *   and reaped, `NotFound` when the executable does not exist, or any
   *   refusal from {@link prepare}
   */
  async execute(request: CommandRequest): Promise<ExecResult> {
    const prepared = await this.prepare(request);
    return this.pool.run(() => this.run(prepared));
  }

  private async run(prepared: PreparedCommand): Promise<ExecResult> {
    const { command, args, env, timeoutMs } = prepared;
    this.log.debug('Running command', { command, argc: args.length, timeoutMs });

    const started = Date.now();
    let outcome: SpawnOutcome;
    try {
      outcome = await spawnSandboxed(command, args, { cwd: this.projectRoot, env, timeoutMs });
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new SandboxError('NotFound', `Command not found: ${command}`);
      }
      throw err;
    }
    const durationMs = Date.now() - started;

    if (outcome.timedOut) {
      this.log.warn('Command timed out', { command, timeoutMs });
      throw new SandboxError('TimedOut', `Command timed out after ${String(timeoutMs)}ms`);
    }

    const stdout = truncateOutput(stripAnsi(outcome.stdout), this.settings.maxOutputChars);
    const stderr = truncateOutput(stripAnsi(outcome.stderr), this.settings.maxOutputChars);
    this.log.debug('Command finished', { command, exitCode: outcome.exitCode, durationMs });

    return {
      exitCode: outcome.exitCode,
      stdout: stdout.text,
      stderr: stderr.text,
      durationMs,
      truncated: stdout.truncated || stderr.truncated,
    };
  }

  private async checkGit(args: string[], allowDestructive: boolean): Promise<GitSafetyClass> {
    const subcommand = args[0];
    if (subcommand === undefined || subcommand === '') {
      throw this.refuse('Disallowed', 'subcommand is required');
    }
    if (subcommand.startsWith('-')) {
      throw this.refuse('Disallowed', `git options before the subcommand are not allowed: ${subcommand}`);
    }

    const spec = normalizeGitArgs(subcommand, args.slice(1));
    try {
      assertGitInvocationAllowed(spec);
    } catch (err) {
      this.log.warn('Refused git invocation', { subcommand });
      throw err;
    }

    const gitClass = classifyGitSpec(spec);
    if (gitClass === 'destructive' && !allowDestructive) {
      throw this.refuse(
        'DestructiveRefused',
        `destructive operation blocked: 'git ${args.join(' ')}' requires allow_destructive: true`
      );
    }

    for (const candidate of gitPathArguments(spec)) {
      if (!SAFE_DEVICE_PATHS.has(candidate)) {
        await validatePath(candidate, this.projectRoot);
      }
    }
    return gitClass;
  }

  private async checkPathArguments(args: string[]): Promise<void> {
    for (const arg of args) {
      const candidates = [arg];
      const eq = arg.indexOf('=');
      if (eq !== -1) candidates.push(arg.slice(eq + 1));
      // Short option with an attached value, e.g. `-o../out`
      if (/^-[A-Za-z]./.test(arg)) candidates.push(arg.slice(2));
      for (const candidate of candidates) {
        if (candidate.startsWith('-') || !looksLikePath(candidate)) continue;
        if (SAFE_DEVICE_PATHS.has(candidate)) continue;
        const canonical = await validatePath(candidate, this.projectRoot);
        if (isInGitMetadata(canonical, this.projectRoot)) {
          throw this.refuse('Disallowed', `Paths inside .git are only reachable through git: ${candidate}`);
        }
      }
    }
  }

  private buildEnv(forGit: boolean): Record<string, string> {
    const env: Record<string, string> = {};
    for (const name of this.settings.envAllowlist) {
      const value = process.env[name];
      if (value !== undefined) env[name] = value;
    }
    if (forGit) {
      Object.assign(env, GIT_ENV);
      // Never discover a repository above the project root
      env['GIT_CEILING_DIRECTORIES'] = path.dirname(this.projectRoot);
    }
    return env;
  }

  private refuse(code: 'Disallowed' | 'DestructiveRefused', message: string): SandboxError {
    this.log.warn('Refused command', { code, reason: message });
    return new SandboxError(code, message);
  }
}
