export { Agent } from './core/agent';
export type {
  AgentOptions,
  ConversationMessage,
  ProcessPromptOptions,
  ToolAttribution,
  ToolUseRequest,
} from './core/agent';

export {
  DEFAULT_MODEL,
  agentConfigSchema,
  configFromEnv,
  defaultConfig,
  resolveAgentConfig,
  type AgentConfig,
  type AgentConfigInput,
} from './core/config';

export {
  AnthropicProvider,
  addCacheBreakpoints,
  createAnthropicClient,
  type MessagesClient,
  type ModelResponse,
} from './core/providers';

export {
  TokenTracker,
  calculateCost,
  type CostInfo,
  type CostReport,
  type MessageUsageRecord,
  type TokenUsage,
  type TokenUsageInfo,
} from './core/costs/TokenTracker';
export { MODEL_PRICING, getModelPricing, type ModelPricing } from './core/costs/pricing';

export {
  BASH_TOOL_NAME,
  TEXT_EDITOR_TOOL_NAME,
  ToolRegistry,
  createLoggingInterceptors,
  defineTool,
  type AgentTool,
  type BashToolCallback,
  type BashToolInput,
  type PostToolInterceptor,
  type PreToolInterceptor,
  type TextEditorCallback,
  type TextEditorInput,
  type ToolCallContext,
  type ToolCallInfo,
  type ToolCallOutcome,
  type ToolInterceptors,
} from './core/tools';

export {
  AbortError,
  AgentError,
  ApiError,
  ConfigurationError,
  ErrorCodes,
  ToolExecutionError,
  type ErrorCode,
} from './utils/errors';
export { createComponentLogger, type ComponentLogger } from './utils/log';
