import { describe, expect, it, vi } from 'vitest';
import { createLoggingInterceptors, type ToolCallInfo } from '../core/tools/interceptors';
import type { ComponentLogger } from '../utils/log';

function recordingLogger(): ComponentLogger & { lines: string[] } {
  const lines: string[] = [];
  const record = (message: string) => {
    lines.push(message);
  };
  return {
    component: 'Test',
    verbose: true,
    lines,
    debug: record,
    info: record,
    warn: record,
    error: record,
  };
}

const call: ToolCallInfo = {
  toolName: 'get_weather',
  toolUseId: 'toolu_1',
  input: { city: 'Paris' },
  preamble: 'Let me check. ',
};

describe('createLoggingInterceptors', () => {
  it('logs the call before it runs and keeps the input', () => {
    const logger = recordingLogger();
    const { pre } = createLoggingInterceptors('Weather', logger);

    expect(pre(call)).toBeUndefined();
    expect(logger.lines).toEqual([
      'Executing: get_weather',
      'Input: {"city":"Paris"}',
      'Preamble: Let me check.',
    ]);
  });

  it('passes the result through', () => {
    const logger = recordingLogger();
    const { post } = createLoggingInterceptors('Weather', logger);

    expect(post(call, { result: 'Sunny' })).toBe('Sunny');
    expect(logger.lines).toEqual(['Result: Sunny']);
  });

  it('logs failures without recovering them', () => {
    const logger = recordingLogger();
    const error = vi.spyOn(logger, 'error');
    const { post } = createLoggingInterceptors('Weather', logger);

    expect(post(call, { error: new Error('service down') })).toBeUndefined();
    expect(error).toHaveBeenCalledWith('get_weather failed: service down');
  });
});
