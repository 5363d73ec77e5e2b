/**
 * Tool interface definition
 * This defines the contract for the callbacks the model can invoke
 */

import type { z } from 'zod';
import type { ToolDefinition } from '../../providers/ILLMProvider';

/**
 * Context object passed to tool calls
 */
export interface ToolCallContext {
  toolName: string;
  toolUseId: string;
  /** Text the model produced before requesting the tool */
  preamble: string;
  signal?: AbortSignal;
}

/**
 * A user-supplied tool
 *
 * `inputSchema` validates the model's arguments and, unless
 * `inputJSONSchema` is given, is also sent to the API as the tool's schema.
 */
export interface AgentTool<TSchema extends z.AnyZodObject = z.AnyZodObject> {
  name: string;
  description: string;
  inputSchema: TSchema;
  inputJSONSchema?: Record<string, unknown>;

  /**
   * Run the tool. May return a promise; strings are sent back as-is, objects
   * and arrays as JSON, anything else through `String()`.
   */
  call(input: z.infer<TSchema>, context: ToolCallContext): unknown;
}

/**
 * A tool as the registry stores it: its wire definition plus a validated entry point
 */
export interface RegisteredTool {
  name: string;
  kind: 'custom' | 'bash' | 'text_editor';
  definition: ToolDefinition;
  inputSchema: z.ZodType<Record<string, unknown>>;
  invoke(input: Record<string, unknown>, context: ToolCallContext): Promise<unknown>;
}

/**
 * Helper that keeps the schema and the callback's input type in step
 */
export function defineTool<TSchema extends z.AnyZodObject>(tool: AgentTool<TSchema>): AgentTool<TSchema> {
  return tool;
}
