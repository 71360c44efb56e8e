/**
 * Sandbox settings.
 *
 * Defaults live in the zod schema; environment variables are layered under
 * explicit overrides by {@link resolveSettings}.
 */

import { z } from 'zod';

/** Executables the command sandbox runs unless configured otherwise */
export const DEFAULT_ALLOWED_COMMANDS: readonly string[] = [
  'git',
  'npm', 'npx', 'yarn', 'pnpm', 'node', 'tsc',
  'cargo', 'rustc', 'go',
  'python', 'python3', 'pip', 'pip3',
  'ls', 'cat', 'head', 'tail', 'grep', 'find', 'wc', 'diff', 'sort', 'uniq',
  'test', 'true', 'false', 'echo', 'printf', 'pwd',
  'mkdir', 'rmdir', 'cp', 'mv', 'ln', 'touch', 'rm',
  'date', 'sleep',
  'make', 'cmake',
];

/** Environment variables passed through to commands by default */
export const DEFAULT_ENV_ALLOWLIST: readonly string[] = ['PATH', 'LANG', 'LC_ALL', 'TZ'];

export const sandboxSettingsSchema = z.object({
  /** Behaviour when an operation arrives without a session context */
  legacyMode: z.enum(['reject', 'warn']).default('reject'),
  maxEditsPerBatch: z.number().int().positive().default(50),
  maxEditStringLength: z.number().int().positive().default(200_000),
  /** Largest file read or written, in bytes */
  maxFileBytes: z
    .number()
    .int()
    .positive()
    .default(10 * 1024 * 1024),
  allowedCommands: z.array(z.string().min(1)).default([...DEFAULT_ALLOWED_COMMANDS]),
  envAllowlist: z.array(z.string().min(1)).default([...DEFAULT_ENV_ALLOWLIST]),
  defaultTimeoutMs: z.number().int().positive().default(25_000),
  maxTimeoutMs: z.number().int().positive().default(300_000),
  maxOutputChars: z.number().int().positive().default(100_000),
  maxConcurrentCommands: z.number().int().positive().default(4),
});

export type SandboxSettings = z.output<typeof sandboxSettingsSchema>;
export type SandboxSettingsInput = z.input<typeof sandboxSettingsSchema>;
export type LegacyMode = SandboxSettings['legacyMode'];

export interface SettingsIssue {
  path: readonly PropertyKey[];
  message: string;
}

/**
 * Error thrown when settings fail validation.
 */
export class SettingsValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly SettingsIssue[]
  ) {
    const details = issues
      .map((issue) => {
        const where = issue.path.map(String).join('.');
        return where ? `${where}: ${issue.message}` : issue.message;
      })
      .join('; ');
    super(details ? `${message}: ${details}` : message);
    this.name = 'SettingsValidationError';
  }
}

const ENV_KEYS = {
  AGENT_SANDBOX_LEGACY_MODE: 'legacyMode',
  AGENT_SANDBOX_MAX_CONCURRENT_COMMANDS: 'maxConcurrentCommands',
  AGENT_SANDBOX_COMMAND_TIMEOUT_MS: 'defaultTimeoutMs',
} as const;

function settingsFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const raw = env[variable];
    if (raw === undefined || raw === '') continue;
    result[key] = key === 'legacyMode' ? raw : Number(raw);
  }
  return result;
}

/**
 * Build settings from defaults, then environment variables, then `overrides`.
 *
 * @throws SettingsValidationError when the merged values are invalid
 */
export function resolveSettings(
  overrides: SandboxSettingsInput = {},
  env: NodeJS.ProcessEnv = process.env
): SandboxSettings {
  const parsed = sandboxSettingsSchema.safeParse({ ...settingsFromEnv(env), ...overrides });
  if (!parsed.success) {
    throw new SettingsValidationError('Invalid sandbox settings', parsed.error.issues);
  }
  if (parsed.data.defaultTimeoutMs > parsed.data.maxTimeoutMs) {
    throw new SettingsValidationError('Invalid sandbox settings', [
      { path: ['defaultTimeoutMs'], message: 'must not exceed maxTimeoutMs' },
    ]);
  }
  return parsed.data;
}
