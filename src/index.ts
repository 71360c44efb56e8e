/**
 * agent-sandbox
 *
 * Sandboxed file editing and command execution for coding agents.
 *
 * @packageDocumentation
 */

export * from './execution/index.js';
export {
  defineTool,
  type Tool,
  type ToolResult,
  type LlmToolDefinition,
  type DefineToolConfig,
} from './core/tool.js';
export * from './utils/index.js';
