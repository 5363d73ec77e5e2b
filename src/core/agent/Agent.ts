/**
 * Conversation agent
 *
 * Sends the conversation to the Messages API, runs the tools the model asks
 * for, feeds their results back and repeats until the model answers in text.
 */

import { cloneDeep, omit } from 'lodash-es';
import {
  loadEnvironment,
  resolveAgentConfig,
  type AgentConfig,
  type AgentConfigInput,
} from '../config';
import { TokenTracker, type CostReport, type TokenUsageInfo } from '../costs/TokenTracker';
import { AnthropicProvider, createAnthropicClient } from '../providers/AnthropicProvider';
import type { MessageParam, ToolResultBlockParam } from '../providers/ILLMProvider';
import type {
  PostToolInterceptor,
  PreToolInterceptor,
  ToolInterceptors,
} from '../tools/interceptors';
import { ToolRegistry } from '../tools/registry';
import type { BashToolCallback } from '../tools/shell/BashTool/BashTool';
import type { TextEditorCallback } from '../tools/filesystem/TextEditorTool/TextEditorTool';
import { AbortError, AgentError, ConfigurationError, ErrorCodes } from '../../utils/errors';
import { createComponentLogger, truncateForLog, type ComponentLogger } from '../../utils/log';
import { createAssistantMessage, createUserMessage } from '../../utils/messages';
import { runToolsSerially } from './ToolExecutor';
import type { AgentOptions, ProcessPromptOptions } from './types';
import { getToolAttribution } from './utils';

export class Agent {
  private readonly config: AgentConfig;
  private readonly instructions: string | undefined;
  private readonly registry: ToolRegistry;
  private readonly provider: AnthropicProvider;
  private readonly tracker: TokenTracker;
  private readonly logger: ComponentLogger;
  private readonly executorLogger: ComponentLogger;
  private interceptors: ToolInterceptors;
  private messages: MessageParam[] = [];
  private processing = false;

  constructor(options: AgentOptions = {}) {
    const {
      instructions,
      tools,
      bashTool,
      textEditorTool,
      toolInterceptors,
      client,
      env,
      ...configInput
    } = options;

    // An explicit env replaces process.env, so .env is not loaded into it
    if (!env) {
      loadEnvironment();
    }
    this.config = resolveAgentConfig(configInput satisfies AgentConfigInput, env ?? process.env, {
      requireApiKey: !client,
    });

    const { verbose } = this.config;
    this.logger = createComponentLogger('Agent', { verbose });
    this.executorLogger = createComponentLogger('ToolExecutor', { verbose });

    this.instructions = instructions;
    this.interceptors = { ...toolInterceptors };
    this.registry = new ToolRegistry(tools, { bashTool, textEditorTool });
    this.provider = new AnthropicProvider(
      client ?? createAnthropicClient(this.config),
      this.config,
      createComponentLogger('AnthropicProvider', { verbose }),
    );
    this.tracker = new TokenTracker(this.config.model);

    this.logger.debug(
      `Agent ready: model=${this.config.model} tools=[${this.registry.names().join(', ')}]`,
    );
  }

  /**
   * Send a prompt and run tool rounds until the model answers in text
   *
   * @returns the text of the final assistant response
   * @throws ApiError, AbortError or ToolExecutionError; the conversation is
   * then left as it was before the call
   * @throws AgentError with code PROMPT_IN_PROGRESS while another call is running
   */
  async processPrompt(prompt: string, { signal }: ProcessPromptOptions = {}): Promise<string> {
    if (this.processing) {
      throw new AgentError(
        'A prompt is already being processed; wait for it to finish',
        ErrorCodes.PROMPT_IN_PROGRESS,
      );
    }
    this.processing = true;

    const historyLength = this.messages.length;
    this.messages.push(createUserMessage(prompt));
    this.logger.debug(`Processing prompt: ${truncateForLog(prompt)}`);

    try {
      return await this.runRounds(signal);
    } catch (error) {
      this.messages.length = historyLength;
      throw error;
    } finally {
      this.processing = false;
    }
  }

  private async runRounds(signal: AbortSignal | undefined): Promise<string> {
    for (let round = 0; ; round++) {
      if (signal?.aborted) {
        throw new AbortError('Prompt processing was aborted');
      }

      const attribution = getToolAttribution(this.messages);
      const response = await this.provider.query(this.messages, {
        system: this.instructions,
        tools: this.registry.getToolDefinitions(),
        signal,
      });
      this.tracker.addMessage({ messageId: response.id, ...attribution, ...response.usage });

      const wantsTools = response.stopReason === 'tool_use' && response.toolUses.length > 0;
      if (!wantsTools) {
        this.messages.push(createAssistantMessage(response.text));
        return response.text;
      }

      if (round >= this.config.maxRounds) {
        this.logger.warn(
          `Stopped after ${this.config.maxRounds} tool rounds; the model still requested ` +
            response.toolUses.map(toolUse => toolUse.name).join(', '),
        );
        this.messages.push(createAssistantMessage(response.text));
        return response.text;
      }

      this.messages.push(createAssistantMessage(response.content));

      const toolResults: ToolResultBlockParam[] = [];
      for await (const result of runToolsSerially(response.toolUses, {
        registry: this.registry,
        interceptors: this.interceptors,
        logger: this.executorLogger,
        preamble: response.text,
        signal,
      })) {
        toolResults.push(result);
      }
      this.messages.push(createUserMessage(toolResults));
    }
  }

  getTokenUsage(): TokenUsageInfo {
    return this.tracker.getTokenUsage();
  }

  getCost(): CostReport {
    return this.tracker.getCost();
  }

  getMessages(): MessageParam[] {
    return cloneDeep(this.messages);
  }

  /**
   * Replace the conversation history. Recorded usage is kept.
   */
  setMessages(messages: MessageParam[]): void {
    this.messages = cloneDeep(messages);
  }

  /**
   * Start a new conversation: clears the history and the recorded usage
   */
  reset(): void {
    this.messages = [];
    this.tracker.reset();
  }

  getModel(): string {
    return this.provider.getModel();
  }

  /**
   * Switch model for subsequent calls. Costs are priced at the current model.
   */
  setModel(model: string): void {
    if (!model.trim()) {
      throw new ConfigurationError('Model name must not be empty');
    }
    this.provider.setModel(model);
    this.tracker.setModel(model);
    this.logger.debug(`Model set to ${model}`);
  }

  getConfig(): Readonly<Omit<AgentConfig, 'apiKey'>> {
    return { ...omit(this.config, 'apiKey'), model: this.getModel() };
  }

  setToolInterceptors(pre?: PreToolInterceptor, post?: PostToolInterceptor): void {
    this.interceptors = { pre, post };
  }

  setBashTool(callback: BashToolCallback | undefined): void {
    this.registry.setBashTool(callback);
  }

  setTextEditorTool(callback: TextEditorCallback | undefined): void {
    this.registry.setTextEditorTool(callback);
  }

  getToolNames(): string[] {
    return this.registry.names();
  }
}
