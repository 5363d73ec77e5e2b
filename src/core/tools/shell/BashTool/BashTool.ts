import { z } from 'zod';
import type { RegisteredTool, ToolCallContext } from '../../interfaces/Tool';

export const BASH_TOOL_NAME = 'bash';
export const BASH_TOOL_TYPE = 'bash_20250124';

export const bashInputSchema = z.object({
  command: z.string().optional().describe('The bash command to run'),
  restart: z.boolean().optional().describe('Restart the shell session'),
}).passthrough();

export type BashToolInput = z.infer<typeof bashInputSchema>;

/**
 * Runs the model's shell requests; whatever it returns becomes the tool result
 */
export type BashToolCallback = (input: BashToolInput, context: ToolCallContext) => unknown;

/**
 * Wrap a bash callback as the Anthropic-defined bash tool
 */
export function createBashTool(callback: BashToolCallback): RegisteredTool {
  return {
    name: BASH_TOOL_NAME,
    kind: 'bash',
    definition: { type: BASH_TOOL_TYPE, name: BASH_TOOL_NAME },
    inputSchema: bashInputSchema,
    async invoke(input, context) {
      return callback(bashInputSchema.parse(input), context);
    },
  };
}
