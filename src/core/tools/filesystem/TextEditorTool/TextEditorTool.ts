import { z } from 'zod';
import type { RegisteredTool, ToolCallContext } from '../../interfaces/Tool';

export const TEXT_EDITOR_TOOL_NAME = 'str_replace_editor';
export const TEXT_EDITOR_TOOL_TYPE = 'text_editor_20250124';

const path = z.string().describe('Absolute path to the file or directory');

export const textEditorInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('view'),
    path,
    view_range: z.tuple([z.number().int(), z.number().int()]).optional(),
  }).passthrough(),
  z.object({
    command: z.literal('create'),
    path,
    file_text: z.string(),
  }).passthrough(),
  z.object({
    command: z.literal('str_replace'),
    path,
    old_str: z.string(),
    new_str: z.string().optional(),
  }).passthrough(),
  z.object({
    command: z.literal('insert'),
    path,
    insert_line: z.number().int().nonnegative(),
    new_str: z.string(),
  }).passthrough(),
  z.object({
    command: z.literal('undo_edit'),
    path,
  }).passthrough(),
]);

export type TextEditorInput = z.infer<typeof textEditorInputSchema>;
export type TextEditorCommand = TextEditorInput['command'];

/**
 * Performs the editor command; whatever it returns becomes the tool result
 */
export type TextEditorCallback = (input: TextEditorInput, context: ToolCallContext) => unknown;

/**
 * Wrap a text editor callback as the Anthropic-defined text editor tool
 */
export function createTextEditorTool(callback: TextEditorCallback): RegisteredTool {
  return {
    name: TEXT_EDITOR_TOOL_NAME,
    kind: 'text_editor',
    definition: { type: TEXT_EDITOR_TOOL_TYPE, name: TEXT_EDITOR_TOOL_NAME },
    inputSchema: textEditorInputSchema,
    async invoke(input, context) {
      return callback(textEditorInputSchema.parse(input), context);
    },
  };
}
