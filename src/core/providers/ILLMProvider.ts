import type Anthropic from '@anthropic-ai/sdk';
import type { TokenCounts } from '../costs/TokenTracker';

export type MessageParam = Anthropic.Messages.MessageParam;
export type ContentBlockParam = Anthropic.Messages.ContentBlockParam;
export type ToolResultBlockParam = Anthropic.Messages.ToolResultBlockParam;
export type MessageCreateParams = Anthropic.Messages.MessageCreateParamsNonStreaming;

/**
 * Any tool entry the Messages API accepts: client tools with a JSON schema
 * and the Anthropic-defined bash and text editor tools
 */
export type ToolDefinition = NonNullable<MessageCreateParams['tools']>[number];

/**
 * The parts of a Messages API response the agent reads
 * The SDK's `Message` type satisfies this shape.
 */
export interface ModelResponse {
  id: string;
  model?: string;
  stop_reason: string | null;
  content: ReadonlyArray<ResponseContentBlock>;
  usage: ResponseUsage;
}

export interface ResponseContentBlock {
  type: string;
}

export interface ResponseTextBlock extends ResponseContentBlock {
  type: 'text';
  text: string;
}

export interface ResponseToolUseBlock extends ResponseContentBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: unknown;
}

export interface ResponseUsage {
  input_tokens: number;
  output_tokens: number;
  cache_creation_input_tokens?: number | null;
  cache_read_input_tokens?: number | null;
}

/**
 * Seam over `anthropic.messages.create`; tests plug in a scripted client here
 */
export interface MessagesClient {
  create(params: MessageCreateParams, options?: { signal?: AbortSignal }): Promise<ModelResponse>;
}

export interface ToolUseRequest {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * A response normalized for the tool loop
 */
export interface ProviderResponse {
  id: string;
  stopReason: string | null;
  /** Content to store as the assistant turn (text and tool_use blocks) */
  content: ContentBlockParam[];
  /** Concatenated text blocks */
  text: string;
  toolUses: ToolUseRequest[];
  usage: TokenCounts;
  durationMs: number;
}

export interface ProviderQueryOptions {
  system?: string;
  tools: ToolDefinition[];
  signal?: AbortSignal;
}

/**
 * Interface for the model backend driving the tool loop
 */
export interface ILLMProvider {
  /**
   * Send the conversation and return the normalized response
   *
   * @throws ApiError when the API call fails, AbortError when it is aborted
   */
  query(messages: MessageParam[], options: ProviderQueryOptions): Promise<ProviderResponse>;

  setModel(model: string): void;
}
