/**
 * Hooks around every tool call
 */

import { createComponentLogger, truncateForLog, type ComponentLogger } from '../../utils/log';
import { formatError } from '../../utils/errors';

export interface ToolCallInfo {
  toolName: string;
  toolUseId: string;
  input: Record<string, unknown>;
  /** Text the model produced before requesting the tool */
  preamble: string;
}

export interface ToolCallOutcome {
  result?: unknown;
  /** Set when the callback threw */
  error?: unknown;
}

/**
 * Runs before the callback. Returning an object replaces the input; returning
 * nothing keeps it.
 */
export type PreToolInterceptor = (
  call: ToolCallInfo,
) => Record<string, unknown> | void | Promise<Record<string, unknown> | void>;

/**
 * Runs after the callback, also when it threw. Returning a value other than
 * `undefined` replaces the result, and recovers a thrown error.
 */
export type PostToolInterceptor = (call: ToolCallInfo, outcome: ToolCallOutcome) => unknown;

export interface ToolInterceptors {
  pre?: PreToolInterceptor;
  post?: PostToolInterceptor;
}

/**
 * Interceptors that log each call, its input and its result or error
 */
export function createLoggingInterceptors(
  prefix = 'Tool',
  logger: ComponentLogger = createComponentLogger(prefix, { verbose: true }),
): Required<ToolInterceptors> {
  return {
    pre(call) {
      logger.info(`Executing: ${call.toolName}`);
      logger.info(`Input: ${truncateForLog(call.input)}`);
      if (call.preamble.trim()) {
        logger.info(`Preamble: ${truncateForLog(call.preamble.trim())}`);
      }
    },
    post(call, outcome) {
      if (outcome.error !== undefined) {
        logger.error(`${call.toolName} failed: ${formatError(outcome.error)}`);
        return undefined;
      }
      logger.info(`Result: ${truncateForLog(outcome.result)}`);
      return outcome.result;
    },
  };
}
