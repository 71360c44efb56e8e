/**
 * Routes `{ operation, arguments }` calls to the sandbox tools.
 */

import type { LlmToolDefinition, ToolResult } from '../../core/tool.js';
import type { Workspace } from '../workspace.js';
import { createGitCommandTool, createRunCommandTool } from './command.js';
import { createEditFileTool, createMultiEditFileTool } from './edit.js';
import {
  createCreateDirectoryTool,
  createDeleteFileTool,
  createFileInfoTool,
  createListDirectoryTool,
} from './files.js';
import { createReadFileTool } from './read.js';
import { createGlobTool, createGrepTool } from './search.js';
import type { WorkspaceTool } from './workspace-tool.js';
import { createWriteFileTool } from './write.js';

export interface ToolCall {
  operation: string;
  arguments?: unknown;
}

export interface ToolDispatcher {
  readonly tools: readonly WorkspaceTool[];
  dispatch(call: ToolCall): Promise<ToolResult>;
  definitions(): LlmToolDefinition[];
}

/**
 * Every sandbox tool, in a stable order.
 */
export function sandboxTools(): WorkspaceTool[] {
  return [
    createReadFileTool(),
    createWriteFileTool(),
    createEditFileTool(),
    createMultiEditFileTool(),
    createListDirectoryTool(),
    createFileInfoTool(),
    createCreateDirectoryTool(),
    createDeleteFileTool(),
    createGrepTool(),
    createGlobTool(),
    createRunCommandTool(),
    createGitCommandTool(),
  ];
}

export function createToolDispatcher(
  workspace: Workspace,
  tools: readonly WorkspaceTool[] = sandboxTools()
): ToolDispatcher {
  const byId = new Map(tools.map((tool) => [tool.id, tool]));

  return {
    tools,

    async dispatch(call) {
      const tool = byId.get(call.operation);
      if (!tool) {
        return { error: `Unknown operation: ${call.operation}` };
      }
      return tool.invoke(workspace, call.arguments ?? {});
    },

    definitions() {
      return tools.map((tool) => tool.toLlmToolDefinition());
    },
  };
}
