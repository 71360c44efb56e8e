/**
 * write_file: create a file, or replace one the session has read.
 */

import { z } from 'zod';
import { defineWorkspaceTool, type WorkspaceTool } from './workspace-tool.js';

export function createWriteFileTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'write_file',
      description:
        'Write content to a file, creating parent directories as needed. ' +
        'Overwriting an existing file requires reading it first.',
      inputSchema: z.object({
        path: z.string().describe('Path to the file, relative to the project root'),
        content: z.string().describe('Full content to write'),
      }),
    },
    async (workspace, input) => {
      const { created } = await workspace.writeFile(input.path, input.content);
      return created
        ? `File written successfully: ${input.path}`
        : `File updated successfully: ${input.path}`;
    }
  );
}
