/**
 * read_file: read a text file inside the project and record that the
 * session has seen it.
 */

import { z } from 'zod';
import { defineWorkspaceTool, type WorkspaceTool } from './workspace-tool.js';

export function createReadFileTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'read_file',
      description:
        'Read the contents of a file. Returns the file content as text. ' +
        'Optionally specify offset (line number to start from, 0-based) and limit (number of lines). ' +
        'A file must be read before it can be edited or overwritten.',
      inputSchema: z.object({
        path: z.string().describe('Path to the file, relative to the project root'),
        offset: z.number().int().min(0).optional().describe('Line offset to start reading from (0-based)'),
        limit: z.number().int().positive().optional().describe('Maximum number of lines to return'),
      }),
    },
    async (workspace, input) => {
      const { content } = await workspace.readFile(input.path, {
        offset: input.offset,
        limit: input.limit,
      });
      return content;
    }
  );
}
