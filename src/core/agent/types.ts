/**
 * Core agent option and result types
 */

import type { AgentConfigInput } from '../config';
import type { MessagesClient } from '../providers/ILLMProvider';
import type { AgentTool } from '../tools/interfaces/Tool';
import type { ToolInterceptors } from '../tools/interceptors';
import type { BashToolCallback } from '../tools/shell/BashTool/BashTool';
import type { TextEditorCallback } from '../tools/filesystem/TextEditorTool/TextEditorTool';

export type {
  MessageParam as ConversationMessage,
  ToolUseRequest,
} from '../providers/ILLMProvider';

export interface AgentOptions extends AgentConfigInput {
  /** System prompt for every call */
  instructions?: string;
  tools?: AgentTool[];
  bashTool?: BashToolCallback;
  textEditorTool?: TextEditorCallback;
  toolInterceptors?: ToolInterceptors;
  /** Replaces the SDK client; no API key is required when set */
  client?: MessagesClient;
  /** Environment to read configuration from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ProcessPromptOptions {
  signal?: AbortSignal;
}

/**
 * Which tool, if any, a Messages API call was made on behalf of
 */
export interface ToolAttribution {
  isToolRelated: boolean;
  toolName?: string;
}
