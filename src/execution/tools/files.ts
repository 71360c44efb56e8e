/**
 * list_directory, file_info, create_directory and delete_file.
 */

import { z } from 'zod';
import { defineWorkspaceTool, type WorkspaceTool } from './workspace-tool.js';

export function createListDirectoryTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'list_directory',
      description:
        'List the entries of a directory as JSON, each with a name and a type ' +
        '(file, directory, symlink or other). Symlinks are not followed.',
      inputSchema: z.object({
        path: z.string().default('.').describe('Directory, relative to the project root'),
        recursive: z.boolean().default(false).describe('Include nested entries'),
      }),
    },
    async (workspace, input) => {
      const entries = await workspace.listDirectory(input.path, { recursive: input.recursive });
      return JSON.stringify({ entries });
    }
  );
}

export function createFileInfoTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'file_info',
      description: 'Get the size, type, permissions and modification time of a file or directory.',
      inputSchema: z.object({
        path: z.string().describe('Path, relative to the project root'),
      }),
    },
    async (workspace, input) => JSON.stringify(await workspace.fileInfo(input.path))
  );
}

export function createCreateDirectoryTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'create_directory',
      description: 'Create a directory and any missing parent directories.',
      inputSchema: z.object({
        path: z.string().describe('Directory to create, relative to the project root'),
      }),
    },
    async (workspace, input) => {
      const { created } = await workspace.createDirectory(input.path);
      return created
        ? `Directory created successfully: ${input.path}`
        : `Directory already exists: ${input.path}`;
    }
  );
}

export function createDeleteFileTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'delete_file',
      description:
        'Delete a single file. Requires confirm: true. Directories are never deleted; ' +
        'a symlink is removed itself, not its target.',
      inputSchema: z.object({
        path: z.string().describe('File to delete, relative to the project root'),
        confirm: z.boolean().default(false).describe('Must be true to delete'),
      }),
    },
    async (workspace, input) => {
      await workspace.deleteFile(input.path, { confirm: input.confirm });
      return `File deleted successfully: ${input.path}`;
    }
  );
}
