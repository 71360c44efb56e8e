/**
 * Tool definition and creation.
 *
 * Provides the defineTool function for creating typed tools that an LLM can
 * call. A tool validates its raw arguments against a zod schema, runs its
 * handler, and reports either `{ ok }` or `{ error }`; it never throws.
 */

import { type ZodType, toJSONSchema } from 'zod';
import { errorMessage, isSandboxError } from '../execution/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ name: 'tools' });

// ── Results ──────────────────────────────────────────────────────────

/** What a tool call returns to the agent */
export type ToolResult = { ok: string } | { error: string };

// ── LLM tool definition ──────────────────────────────────────────────

/**
 * LLM tool definition format (OpenAI/Anthropic compatible).
 */
export interface LlmToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

// ── DefineToolConfig ─────────────────────────────────────────────────

/**
 * Configuration for defineTool().
 */
export interface DefineToolConfig<TInput> {
  /** Unique tool identifier, also the operation name at the dispatch boundary */
  id: string;
  /** Tool description shown to LLMs */
  description: string;
  /** Zod schema for input validation */
  inputSchema: ZodType<TInput>;
}

// ── Tool ─────────────────────────────────────────────────────────────

/**
 * A tool bound to a context type (for sandbox tools, the workspace).
 */
export interface Tool<TContext> {
  readonly id: string;
  /** Tool description shown to LLMs */
  readonly toolDescription: string;
  /** JSON schema for tool parameters */
  readonly toolParameters: Record<string, unknown>;
  /** Generate an LLM-compatible tool definition */
  toLlmToolDefinition(): LlmToolDefinition;
  /** Validate `rawInput` and run the tool */
  invoke(ctx: TContext, rawInput: unknown): Promise<ToolResult>;
}

function describeIssues(issues: readonly { path: readonly PropertyKey[]; message: string }[]) {
  return issues
    .map((issue) => {
      const where = issue.path.map(String).join('.');
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

// ── defineTool ───────────────────────────────────────────────────────

/**
 * Define a tool.
 *
 * Sandbox errors become `{ error }` with their own message. Anything else is
 * logged and reported with a generic message, so stacks and host paths never
 * reach the agent.
 *
 * @example
 * ```typescript
 * const readTool = defineTool({
 *   id: 'read_file',
 *   description: 'Read a file',
 *   inputSchema: z.object({ path: z.string().describe('Path to the file') }),
 * }, async (workspace: Workspace, input) => {
 *   const { content } = await workspace.readFile(input.path);
 *   return content;
 * });
 *
 * const def = readTool.toLlmToolDefinition();
 * const result = await readTool.invoke(workspace, { path: 'src/index.ts' });
 * ```
 */
export function defineTool<TContext, TInput>(
  config: DefineToolConfig<TInput>,
  handler: (ctx: TContext, input: TInput) => Promise<string>
): Tool<TContext> {
  // Derive JSON schema parameters from inputSchema
  const { $schema: _, ...toolParameters } = toJSONSchema(config.inputSchema) as Record<
    string,
    unknown
  >;

  return {
    id: config.id,
    toolDescription: config.description,
    toolParameters,

    toLlmToolDefinition(): LlmToolDefinition {
      return {
        type: 'function' as const,
        function: {
          name: config.id,
          description: config.description,
          parameters: toolParameters,
        },
      };
    },

    async invoke(ctx, rawInput) {
      const parsed = config.inputSchema.safeParse(rawInput);
      if (!parsed.success) {
        return {
          error: `Invalid arguments for ${config.id}: ${describeIssues(parsed.error.issues)}`,
        };
      }

      try {
        return { ok: await handler(ctx, parsed.data) };
      } catch (err) {
        if (isSandboxError(err)) {
          return { error: err.message };
        }
        log.error('Tool failed unexpectedly', { tool: config.id, error: errorMessage(err) });
        return { error: `${config.id} failed with an internal error` };
      }
    },
  };
}
