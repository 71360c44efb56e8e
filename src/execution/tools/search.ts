/**
 * grep and glob: search file contents and find files by name.
 */

import { z } from 'zod';
import { defineWorkspaceTool, type WorkspaceTool } from './workspace-tool.js';

export function createGrepTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'grep',
      description:
        'Search file contents for a regular expression. Returns matching lines with file paths ' +
        'and line numbers. Binary and hidden files are skipped.',
      inputSchema: z.object({
        pattern: z.string().describe('Regular expression to search for'),
        path: z.string().optional().describe('File or directory to search (default: project root)'),
        include: z
          .array(z.string())
          .optional()
          .describe('File name patterns to include (e.g., ["*.ts", "*.js"])'),
        recursive: z.boolean().default(true).describe('Search subdirectories'),
        max_results: z
          .number()
          .int()
          .positive()
          .optional()
          .describe('Maximum number of matches to return (default: 100)'),
      }),
    },
    async (workspace, input) => {
      const matches = await workspace.grep(input.pattern, {
        path: input.path,
        include: input.include,
        recursive: input.recursive,
        maxResults: input.max_results,
      });
      return JSON.stringify({ matches });
    }
  );
}

export function createGlobTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'glob',
      description:
        'Find files matching a glob pattern. Returns paths relative to the project root. ' +
        'A pattern without "/" matches file names at any depth.',
      inputSchema: z.object({
        pattern: z.string().describe('Glob pattern to match (e.g., "*.ts", "src/**/*.js")'),
        path: z.string().optional().describe('Directory to search in (default: project root)'),
        max_results: z
          .number()
          .int()
          .positive()
          .optional()
          .describe('Maximum number of files to return (default: 100)'),
      }),
    },
    async (workspace, input) => {
      const files = await workspace.glob(input.pattern, {
        path: input.path,
        maxResults: input.max_results,
      });
      return JSON.stringify({ files });
    }
  );
}
