import { describe, expect, it } from 'vitest';
import { DEFAULT_MODEL, configFromEnv, resolveAgentConfig } from '../core/config';
import { ConfigurationError } from '../utils/errors';

describe('resolveAgentConfig', () => {
  const env = { ANTHROPIC_API_KEY: 'test-secret' };

  it('fills in defaults', () => {
    expect(resolveAgentConfig({}, env)).toEqual({
      apiKey: 'test-secret',
      model: DEFAULT_MODEL,
      maxTokens: 1024,
      temperature: 0.7,
      maxRounds: 30,
      disableParallelToolUse: true,
      promptCaching: true,
      verbose: false,
      maxRetries: 2,
    });
  });

  it('prefers explicit options over the environment', () => {
    const config = resolveAgentConfig(
      { model: 'claude-3-5-haiku-20241022', apiKey: 'option-secret' },
      { ...env, ANTHROPIC_MODEL: 'claude-3-opus-20240229' },
    );
    expect(config.model).toBe('claude-3-5-haiku-20241022');
    expect(config.apiKey).toBe('option-secret');
  });

  it('ignores undefined options', () => {
    const config = resolveAgentConfig({ maxTokens: undefined }, env);
    expect(config.maxTokens).toBe(1024);
  });

  it('reads the model from the environment', () => {
    const config = resolveAgentConfig({}, { ...env, ANTHROPIC_MODEL: 'claude-3-opus-20240229' });
    expect(config.model).toBe('claude-3-opus-20240229');
  });

  it('turns prompt caching off through DISABLE_PROMPT_CACHING', () => {
    expect(resolveAgentConfig({}, { ...env, DISABLE_PROMPT_CACHING: '1' }).promptCaching).toBe(false);
    expect(resolveAgentConfig({}, { ...env, DISABLE_PROMPT_CACHING: 'false' }).promptCaching).toBe(true);
  });

  it('requires an API key by default', () => {
    expect(() => resolveAgentConfig({}, {})).toThrow(ConfigurationError);
    expect(() => resolveAgentConfig({}, {})).toThrow(
      'An Anthropic API key is required: pass apiKey or set ANTHROPIC_API_KEY',
    );
  });

  it('does not require a key when the caller brings a client', () => {
    expect(resolveAgentConfig({}, {}, { requireApiKey: false }).apiKey).toBeUndefined();
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveAgentConfig({ temperature: 2 }, env)).toThrow(
      'Invalid agent configuration: temperature:',
    );
    expect(() => resolveAgentConfig({ maxRounds: -1 }, env)).toThrow(ConfigurationError);
  });
});

describe('configFromEnv', () => {
  it('omits variables that are not set', () => {
    expect(configFromEnv({ ANTHROPIC_API_KEY: '' })).toEqual({});
  });

  it('enables verbose output through AGENT_VERBOSE', () => {
    expect(configFromEnv({ AGENT_VERBOSE: 'true' })).toEqual({ verbose: true });
  });
});
