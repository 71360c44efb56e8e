export { defineWorkspaceTool, type WorkspaceTool } from './workspace-tool.js';
export { createReadFileTool } from './read.js';
export { createWriteFileTool } from './write.js';
export { createEditFileTool, createMultiEditFileTool } from './edit.js';
export {
  createListDirectoryTool,
  createFileInfoTool,
  createCreateDirectoryTool,
  createDeleteFileTool,
} from './files.js';
export { createGrepTool, createGlobTool } from './search.js';
export {
  createRunCommandTool,
  createGitCommandTool,
  invokeGitCommand,
  type CommandInvocationResult,
  type GitCommandInput,
} from './command.js';
export { createToolDispatcher, sandboxTools, type ToolCall, type ToolDispatcher } from './dispatcher.js';
