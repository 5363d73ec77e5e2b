/**
 * Tool Registry for the tools one agent exposes to the model
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import type Anthropic from '@anthropic-ai/sdk';
import type { z } from 'zod';
import { ConfigurationError } from '../../utils/errors';
import type { ToolDefinition } from '../providers/ILLMProvider';
import type { AgentTool, RegisteredTool } from './interfaces/Tool';
import { createBashTool, type BashToolCallback } from './shell/BashTool/BashTool';
import {
  createTextEditorTool,
  type TextEditorCallback,
} from './filesystem/TextEditorTool/TextEditorTool';

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

/**
 * JSON schema for a zod object, in the shape the Messages API takes
 */
export function toInputSchema(schema: z.AnyZodObject): Anthropic.Messages.Tool.InputSchema {
  const jsonSchema: Record<string, unknown> = { ...zodToJsonSchema(schema, { $refStrategy: 'none' }) };
  delete jsonSchema.$schema;
  return { ...jsonSchema, type: 'object' };
}

export function toToolDefinition(tool: AgentTool): Anthropic.Messages.Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: tool.inputJSONSchema
      ? { ...tool.inputJSONSchema, type: 'object' }
      : toInputSchema(tool.inputSchema),
  };
}

export function createCustomTool(tool: AgentTool): RegisteredTool {
  if (!TOOL_NAME_PATTERN.test(tool.name)) {
    throw new ConfigurationError(
      `Invalid tool name "${tool.name}": use 1-64 letters, digits, underscores or hyphens`,
    );
  }
  return {
    name: tool.name,
    kind: 'custom',
    definition: toToolDefinition(tool),
    // Keys the zod schema does not list still reach the callback
    inputSchema: tool.inputSchema.passthrough(),
    async invoke(input, context) {
      return tool.call(input, context);
    },
  };
}

export interface SpecialToolCallbacks {
  bashTool?: BashToolCallback;
  textEditorTool?: TextEditorCallback;
}

/**
 * Custom tools are fixed at construction; only the bash and text editor
 * slots can be filled or cleared afterwards.
 */
export class ToolRegistry {
  private readonly customTools = new Map<string, RegisteredTool>();
  private bashTool: RegisteredTool | undefined;
  private textEditorTool: RegisteredTool | undefined;

  constructor(tools: AgentTool[] = [], special: SpecialToolCallbacks = {}) {
    for (const tool of tools) {
      this.register(tool);
    }
    this.setBashTool(special.bashTool);
    this.setTextEditorTool(special.textEditorTool);
  }

  register(tool: AgentTool): void {
    if (this.has(tool.name)) {
      throw new ConfigurationError(`Tool with name "${tool.name}" is already registered`);
    }
    this.customTools.set(tool.name, createCustomTool(tool));
  }

  private assertSlotFree(name: string): void {
    if (this.customTools.has(name)) {
      throw new ConfigurationError(
        `Tool name "${name}" is reserved for the built-in tool of the same name`,
      );
    }
  }

  setBashTool(callback: BashToolCallback | undefined): void {
    if (!callback) {
      this.bashTool = undefined;
      return;
    }
    const tool = createBashTool(callback);
    this.assertSlotFree(tool.name);
    this.bashTool = tool;
  }

  setTextEditorTool(callback: TextEditorCallback | undefined): void {
    if (!callback) {
      this.textEditorTool = undefined;
      return;
    }
    const tool = createTextEditorTool(callback);
    this.assertSlotFree(tool.name);
    this.textEditorTool = tool;
  }

  getAll(): RegisteredTool[] {
    const tools = [...this.customTools.values()];
    if (this.bashTool) tools.push(this.bashTool);
    if (this.textEditorTool) tools.push(this.textEditorTool);
    return tools;
  }

  get(name: string): RegisteredTool | undefined {
    return this.getAll().find(tool => tool.name === name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  names(): string[] {
    return this.getAll().map(tool => tool.name);
  }

  getToolDefinitions(): ToolDefinition[] {
    return this.getAll().map(tool => tool.definition);
  }

  get size(): number {
    return this.getAll().length;
  }
}
