/**
 * edit_file and multi_edit_file: search-and-replace in a file the session
 * has read.
 */

import { z } from 'zod';
import type { EditRequest } from '../types.js';
import { defineWorkspaceTool, type WorkspaceTool } from './workspace-tool.js';

const editSchema = z.object({
  old_string: z.string().describe('Text to find; whitespace and indentation differences are tolerated'),
  new_string: z.string().describe('Replacement text'),
  replace_all: z
    .boolean()
    .optional()
    .describe('Replace every occurrence (default: false, which requires a unique match)'),
});

type EditInput = z.infer<typeof editSchema>;

function toEditRequest(input: EditInput): EditRequest {
  return {
    oldString: input.old_string,
    newString: input.new_string,
    replaceAll: input.replace_all ?? false,
  };
}

export function createEditFileTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'edit_file',
      description:
        'Edit a file by replacing old_string with new_string. The match must be unique ' +
        'unless replace_all is set. The file must have been read first.',
      inputSchema: editSchema.extend({
        path: z.string().describe('Path to the file, relative to the project root'),
      }),
    },
    async (workspace, input) => {
      const { replacements } = await workspace.editFile(input.path, toEditRequest(input));
      return `Successfully replaced ${String(replacements)} occurrence(s) in ${input.path}`;
    }
  );
}

export function createMultiEditFileTool(): WorkspaceTool {
  return defineWorkspaceTool(
    {
      id: 'multi_edit_file',
      description:
        'Apply several edits to one file in order, atomically: if any edit fails, ' +
        'the file is left unchanged. Each edit sees the result of the previous ones.',
      inputSchema: z.object({
        path: z.string().describe('Path to the file, relative to the project root'),
        edits: z.array(editSchema).describe('Edits to apply, in order'),
      }),
    },
    async (workspace, input) => {
      const { applied, replacements } = await workspace.multiEditFile(
        input.path,
        input.edits.map(toEditRequest)
      );
      return `Successfully applied ${String(applied.length)} edit(s) to ${input.path} (${String(replacements)} replacement(s))`;
    }
  );
}
