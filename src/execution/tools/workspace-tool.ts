import { defineTool, type DefineToolConfig, type Tool } from '../../core/tool.js';
import type { Workspace } from '../workspace.js';

export type WorkspaceTool = Tool<Workspace>;

/** {@link defineTool} with the context fixed to a workspace. */
export function defineWorkspaceTool<TInput>(
  config: DefineToolConfig<TInput>,
  handler: (workspace: Workspace, input: TInput) => Promise<string>
): WorkspaceTool {
  return defineTool<Workspace, TInput>(config, handler);
}
