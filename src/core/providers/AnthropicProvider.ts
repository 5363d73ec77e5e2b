import Anthropic, { APIError, APIUserAbortError } from '@anthropic-ai/sdk';
import type { AgentConfig } from '../config';
import { API_ERROR_MESSAGE_PREFIX } from '../constants/providerErrors';
import { AbortError, ApiError, formatError } from '../../utils/errors';
import type { ComponentLogger } from '../../utils/log';
import {
  extractTextContent,
  extractToolUses,
  generateMessageId,
  normalizeContentFromAPI,
} from '../../utils/messages';
import type {
  ContentBlockParam,
  ILLMProvider,
  MessageCreateParams,
  MessageParam,
  MessagesClient,
  ModelResponse,
  ProviderQueryOptions,
  ProviderResponse,
  ToolDefinition,
} from './ILLMProvider';

const EPHEMERAL_CACHE_CONTROL = { type: 'ephemeral' } as const;

export type ProviderSettings = Pick<
  AgentConfig,
  'model' | 'maxTokens' | 'temperature' | 'disableParallelToolUse' | 'promptCaching'
>;

/**
 * Default MessagesClient backed by the official SDK
 */
export function createAnthropicClient(
  config: Pick<AgentConfig, 'apiKey' | 'baseURL' | 'maxRetries'>,
): MessagesClient {
  const anthropic = new Anthropic({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    maxRetries: config.maxRetries,
  });
  return {
    create: (params, options) => anthropic.messages.create(params, options),
  };
}

function withCacheControl(block: ContentBlockParam): ContentBlockParam {
  switch (block.type) {
    // Thinking blocks cannot carry a cache breakpoint
    case 'thinking':
    case 'redacted_thinking':
      return block;
    default:
      return { ...block, cache_control: EPHEMERAL_CACHE_CONTROL };
  }
}

/**
 * Copy of `message` whose last content block is a cache breakpoint
 */
export function addCacheBreakpoint(message: MessageParam): MessageParam {
  if (typeof message.content === 'string') {
    return {
      role: message.role,
      content: [{ type: 'text', text: message.content, cache_control: EPHEMERAL_CACHE_CONTROL }],
    };
  }
  const lastIndex = message.content.length - 1;
  return {
    role: message.role,
    content: message.content.map((block, i) => (i === lastIndex ? withCacheControl(block) : block)),
  };
}

/**
 * Mark the final two messages so the next call can read the prefix back from the cache
 */
export function addCacheBreakpoints(messages: MessageParam[]): MessageParam[] {
  return messages.map((message, index) =>
    index > messages.length - 3 ? addCacheBreakpoint(message) : message,
  );
}

/**
 * Implementation of the tool-loop backend on the Anthropic Messages API
 */
export class AnthropicProvider implements ILLMProvider {
  private settings: ProviderSettings;

  constructor(
    private readonly client: MessagesClient,
    settings: ProviderSettings,
    private readonly logger: ComponentLogger,
  ) {
    this.settings = { ...settings };
  }

  getModel(): string {
    return this.settings.model;
  }

  setModel(model: string): void {
    this.settings = { ...this.settings, model };
  }

  buildRequest(messages: MessageParam[], options: Omit<ProviderQueryOptions, 'signal'>): MessageCreateParams {
    const { promptCaching } = this.settings;
    const request: MessageCreateParams = {
      model: this.settings.model,
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
      messages: promptCaching ? addCacheBreakpoints(messages) : messages,
    };

    if (options.system) {
      request.system = [
        {
          type: 'text',
          text: options.system,
          ...(promptCaching ? { cache_control: EPHEMERAL_CACHE_CONTROL } : {}),
        },
      ];
    }

    if (options.tools.length > 0) {
      request.tools = promptCaching ? this.cacheLastTool(options.tools) : options.tools;
      request.tool_choice = {
        type: 'auto',
        disable_parallel_tool_use: this.settings.disableParallelToolUse,
      };
    }

    return request;
  }

  private cacheLastTool(tools: ToolDefinition[]): ToolDefinition[] {
    const lastIndex = tools.length - 1;
    return tools.map((tool, i) =>
      i === lastIndex ? { ...tool, cache_control: EPHEMERAL_CACHE_CONTROL } : tool,
    );
  }

  async query(messages: MessageParam[], options: ProviderQueryOptions): Promise<ProviderResponse> {
    const request = this.buildRequest(messages, options);
    this.logger.debug(
      `Calling Messages API: model=${request.model} messages=${request.messages.length} ` +
        `tools=[${(request.tools ?? []).map(tool => tool.name).join(', ')}] caching=${this.settings.promptCaching}`,
    );

    const start = Date.now();
    let response: ModelResponse;
    try {
      response = await this.client.create(request, options.signal ? { signal: options.signal } : undefined);
    } catch (error) {
      throw this.toAgentError(error, options.signal);
    }
    const durationMs = Date.now() - start;

    const usage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      cacheCreationInputTokens: response.usage.cache_creation_input_tokens ?? 0,
      cacheReadInputTokens: response.usage.cache_read_input_tokens ?? 0,
    };

    this.logger.debug(
      `Response ${response.id}: stop_reason=${response.stop_reason} input=${usage.inputTokens} ` +
        `output=${usage.outputTokens} cache_write=${usage.cacheCreationInputTokens} ` +
        `cache_read=${usage.cacheReadInputTokens} (${durationMs}ms)`,
    );

    return {
      id: response.id || generateMessageId(),
      stopReason: response.stop_reason,
      content: normalizeContentFromAPI(response.content),
      text: extractTextContent(response.content),
      toolUses: extractToolUses(response.content),
      usage,
      durationMs,
    };
  }

  private toAgentError(error: unknown, signal: AbortSignal | undefined): Error {
    if (error instanceof APIUserAbortError || signal?.aborted) {
      return new AbortError('Messages API request was aborted', { cause: error });
    }
    if (error instanceof APIError) {
      this.logger.error(`${API_ERROR_MESSAGE_PREFIX} (${error.status ?? 'no status'}): ${error.message}`);
      return new ApiError(`${API_ERROR_MESSAGE_PREFIX}: ${error.message}`, error.status, { cause: error });
    }
    this.logger.error(`${API_ERROR_MESSAGE_PREFIX}: ${formatError(error)}`);
    return new ApiError(`${API_ERROR_MESSAGE_PREFIX}: ${formatError(error)}`, undefined, { cause: error });
  }
}
