/**
 * Tool execution logic for the agent
 */

import type { ToolResultBlockParam, ToolUseRequest } from '../providers/ILLMProvider';
import type { ToolRegistry } from '../tools/registry';
import type { ToolCallInfo, ToolInterceptors } from '../tools/interceptors';
import { INPUT_VALIDATION_ERROR_PREFIX, noSuchToolMessage } from '../constants/providerErrors';
import { ToolExecutionError, formatError } from '../../utils/errors';
import type { ComponentLogger } from '../../utils/log';
import { truncateForLog } from '../../utils/log';
import { createToolResultBlock, stringifyToolResult } from '../../utils/messages';

export interface ToolExecutionContext {
  registry: ToolRegistry;
  interceptors: ToolInterceptors;
  logger: ComponentLogger;
  /** Text of the assistant turn that requested the tools */
  preamble: string;
  signal?: AbortSignal;
}

/**
 * Run tools in serial sequence, yielding one tool_result per request in order
 */
export async function* runToolsSerially(
  toolUses: ToolUseRequest[],
  context: ToolExecutionContext,
): AsyncGenerator<ToolResultBlockParam, void> {
  for (const toolUse of toolUses) {
    yield await runToolUse(toolUse, context);
  }
}

/**
 * Execute a single tool request
 *
 * Unknown tools and invalid input are reported back to the model as error
 * results before any interceptor runs. A callback that throws is surfaced as
 * a ToolExecutionError unless the post-interceptor returns a replacement
 * result.
 */
export async function runToolUse(
  toolUse: ToolUseRequest,
  { registry, interceptors, logger, preamble, signal }: ToolExecutionContext,
): Promise<ToolResultBlockParam> {
  const tool = registry.get(toolUse.name);
  if (!tool) {
    logger.warn(`Model requested unknown tool "${toolUse.name}"`);
    return createToolResultBlock(toolUse.id, noSuchToolMessage(toolUse.name), true);
  }

  const parsed = tool.inputSchema.safeParse(toolUse.input);
  if (!parsed.success) {
    logger.warn(`Invalid input for ${tool.name}: ${parsed.error.message}`);
    return createToolResultBlock(
      toolUse.id,
      `${INPUT_VALIDATION_ERROR_PREFIX}: ${parsed.error.message}`,
      true,
    );
  }

  let call: ToolCallInfo = {
    toolName: tool.name,
    toolUseId: toolUse.id,
    input: parsed.data,
    preamble,
  };

  if (interceptors.pre) {
    const replacement = await interceptors.pre(call);
    if (replacement) {
      // A hook that rewrites the input must still satisfy the tool's schema
      const reparsed = tool.inputSchema.safeParse(replacement);
      if (!reparsed.success) {
        throw new ToolExecutionError(
          `Pre-interceptor returned invalid input for tool '${tool.name}': ${reparsed.error.message}`,
          tool.name,
          toolUse.id,
          { cause: reparsed.error },
        );
      }
      call = { ...call, input: reparsed.data };
    }
  }

  logger.debug(`Executing ${tool.name} (${toolUse.id}) with ${truncateForLog(call.input)}`);

  let result: unknown;
  let error: unknown;
  let failed = false;
  try {
    result = await tool.invoke(call.input, {
      toolName: tool.name,
      toolUseId: toolUse.id,
      preamble,
      signal,
    });
  } catch (e) {
    failed = true;
    error = e;
  }

  if (interceptors.post) {
    const replacement = await interceptors.post(call, failed ? { error } : { result });
    if (replacement !== undefined) {
      result = replacement;
      failed = false;
    }
  }

  if (failed) {
    logger.error(`Tool ${tool.name} failed: ${formatError(error)}`);
    throw new ToolExecutionError(
      `Error executing tool '${tool.name}': ${formatError(error)}`,
      tool.name,
      toolUse.id,
      { cause: error },
    );
  }

  const content = stringifyToolResult(result);
  logger.debug(`Tool ${tool.name} returned ${truncateForLog(content)}`);
  return createToolResultBlock(toolUse.id, content);
}
