/**
 * Agent configuration
 * Explicit options win over environment variables, which win over defaults.
 */

import { config as loadDotenv } from 'dotenv';
import { isUndefined, omitBy } from 'lodash-es';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const DEFAULT_MODEL = 'claude-3-7-sonnet-20250219';

export const agentConfigSchema = z.object({
  apiKey: z.string().optional(),
  baseURL: z.string().url().optional(),
  model: z.string().min(1),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(1),
  maxRounds: z.number().int().nonnegative(),
  disableParallelToolUse: z.boolean(),
  promptCaching: z.boolean(),
  verbose: z.boolean(),
  maxRetries: z.number().int().nonnegative(),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;

export type AgentConfigInput = Partial<AgentConfig>;

export const defaultConfig = {
  model: DEFAULT_MODEL,
  maxTokens: 1024,
  temperature: 0.7,
  maxRounds: 30,
  disableParallelToolUse: true,
  promptCaching: true,
  verbose: false,
  maxRetries: 2,
} satisfies Omit<AgentConfig, 'apiKey' | 'baseURL'>;

let dotenvLoaded = false;

/**
 * Load `.env` into process.env once per process
 */
export function loadEnvironment(): void {
  if (dotenvLoaded) return;
  loadDotenv();
  dotenvLoaded = true;
}

function isTruthyFlag(value: string | undefined): boolean {
  return value !== undefined && value !== '' && value !== '0' && value.toLowerCase() !== 'false';
}

/**
 * Read the configuration values carried by environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): AgentConfigInput {
  const fromEnv: AgentConfigInput = {
    apiKey: env.ANTHROPIC_API_KEY || undefined,
    baseURL: env.ANTHROPIC_BASE_URL || undefined,
    model: env.ANTHROPIC_MODEL || undefined,
  };
  if (isTruthyFlag(env.DISABLE_PROMPT_CACHING)) {
    fromEnv.promptCaching = false;
  }
  if (isTruthyFlag(env.AGENT_VERBOSE)) {
    fromEnv.verbose = true;
  }
  return omitBy(fromEnv, isUndefined);
}

/**
 * Merge and validate the configuration for one agent
 *
 * @param requireApiKey false when the caller injects its own API client
 * @throws ConfigurationError when a value is invalid or the API key is missing
 */
export function resolveAgentConfig(
  input: AgentConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
  { requireApiKey = true }: { requireApiKey?: boolean } = {},
): AgentConfig {
  const merged = {
    ...defaultConfig,
    ...configFromEnv(env),
    ...omitBy(input, isUndefined),
  };

  const parsed = agentConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid agent configuration: ${details}`);
  }

  if (requireApiKey && !parsed.data.apiKey) {
    throw new ConfigurationError(
      'An Anthropic API key is required: pass apiKey or set ANTHROPIC_API_KEY',
    );
  }

  return parsed.data;
}
