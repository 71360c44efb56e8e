/**
 * run_command and git_command: run allowlisted programs in the project root.
 *
 * `invokeGitCommand` is the structured boundary used by callers that want
 * `{ exit_code, stdout, stderr }` or a coded error instead of tool text.
 */

import { z } from 'zod';
import { isSandboxError, type SandboxErrorCode } from '../errors.js';
import type { ExecResult } from '../types.js';
import type { Workspace } from '../workspace.js';
import { defineWorkspaceTool, type WorkspaceTool } from './workspace-tool.js';

export type CommandInvocationResult =
  | { exit_code: number; stdout: string; stderr: string }
  | { error: { code: SandboxErrorCode; message: string } };

const runCommandSchema = z.object({
  command: z.string().describe('Executable name, e.g. "npm" or "ls"; no shell syntax'),
  args: z.array(z.string()).default([]).describe('Arguments, passed verbatim'),
  timeout_ms: z.number().int().positive().optional().describe('Timeout in milliseconds'),
});

const gitCommandSchema = z.object({
  subcommand: z.string().describe('Git subcommand, e.g. "status" or "commit"'),
  args: z.array(z.string()).default([]).describe('Arguments after the subcommand'),
  allow_destructive: z
    .boolean()
    .default(false)
    .describe('Permit operations that discard work or rewrite history'),
  timeout_ms: z.number().int().positive().optional().describe('Timeout in milliseconds'),
});

export type GitCommandInput = z.input<typeof gitCommandSchema>;

function formatResult(result: ExecResult): string {
  return JSON.stringify({
    exit_code: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    ...(result.truncated ? { truncated: true } : {}),
  });
}

function runGit(workspace: Workspace, input: z.output<typeof gitCommandSchema>): Promise<ExecResult> {
  return workspace.runCommand({
    command: 'git',
    args: [input.subcommand, ...input.args],
    allowDestructive: input.allow_destructive,
    timeoutMs: input.timeout_ms,
  });
}

export function createRunCommandTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'run_command',
      description:
        'Run an allowlisted program in the project root without a shell. Returns JSON with ' +
        'exit_code, stdout and stderr. Pipes, redirects and shell interpreters are not available.',
      inputSchema: runCommandSchema,
    },
    async (workspace, input) =>
      formatResult(
        await workspace.runCommand({
          command: input.command,
          args: input.args,
          timeoutMs: input.timeout_ms,
        })
      )
  );
}

export function createGitCommandTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'git_command',
      description:
        'Run a git subcommand in the project root. Destructive operations (force push, ' +
        'reset --hard, clean -f, branch -D, ...) are refused unless allow_destructive is true.',
      inputSchema: gitCommandSchema,
    },
    async (workspace, input) => formatResult(await runGit(workspace, input))
  );
}

/**
 * Run git and report the outcome as data.
 *
 * Sandbox refusals and failures (`Disallowed`, `DestructiveRefused`,
 * `TimedOut`, path errors, ...) come back as `{ error }`; anything else is
 * rethrown.
 */
export async function invokeGitCommand(
  workspace: Workspace,
  input: GitCommandInput
): Promise<CommandInvocationResult> {
  const parsed = gitCommandSchema.safeParse(input);
  if (!parsed.success) {
    return {
      error: { code: 'Disallowed', message: parsed.error.issues.map((i) => i.message).join('; ') },
    };
  }

  try {
    const result = await runGit(workspace, parsed.data);
    return { exit_code: result.exitCode, stdout: result.stdout, stderr: result.stderr };
  } catch (err) {
    if (isSandboxError(err)) {
      return { error: { code: err.code, message: err.message } };
    }
    throw err;
  }
}
