/**
 * Per-model token pricing
 * @see https://docs.anthropic.com/en/docs/about-claude/pricing
 */

export interface ModelPricing {
  /** USD per million uncached input tokens */
  input: number;
  /** USD per million output tokens */
  output: number;
  /** USD per million tokens written to the prompt cache */
  cacheWrite: number;
  /** USD per million tokens read from the prompt cache */
  cacheRead: number;
  unit: 'USD';
}

const SONNET_PRICING: ModelPricing = {
  input: 3,
  output: 15,
  cacheWrite: 3.75,
  cacheRead: 0.3,
  unit: 'USD',
};

const HAIKU_PRICING: ModelPricing = {
  input: 0.8,
  output: 4,
  cacheWrite: 1,
  cacheRead: 0.08,
  unit: 'USD',
};

const HAIKU_3_PRICING: ModelPricing = {
  input: 0.25,
  output: 1.25,
  cacheWrite: 0.3,
  cacheRead: 0.03,
  unit: 'USD',
};

const OPUS_PRICING: ModelPricing = {
  input: 15,
  output: 75,
  cacheWrite: 18.75,
  cacheRead: 1.5,
  unit: 'USD',
};

export const DEFAULT_PRICING = SONNET_PRICING;

export const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  'claude-3-7-sonnet-20250219': SONNET_PRICING,
  'claude-3-5-sonnet-20241022': SONNET_PRICING,
  'claude-3-5-sonnet-20240620': SONNET_PRICING,
  'claude-sonnet-4-20250514': SONNET_PRICING,
  'claude-3-5-haiku-20241022': HAIKU_PRICING,
  'claude-3-haiku-20240307': HAIKU_3_PRICING,
  'claude-3-opus-20240229': OPUS_PRICING,
  'claude-opus-4-20250514': OPUS_PRICING,
};

const FAMILY_PRICING: ReadonlyArray<[family: string, pricing: ModelPricing]> = [
  ['opus', OPUS_PRICING],
  ['haiku', HAIKU_PRICING],
  ['sonnet', SONNET_PRICING],
];

export type PricingMatch = 'exact' | 'family' | 'default';

/**
 * Pricing for a model id: exact id, then model family, then the default
 */
export function getModelPricing(model: string): { pricing: ModelPricing; match: PricingMatch } {
  const exact = MODEL_PRICING[model];
  if (exact) {
    return { pricing: exact, match: 'exact' };
  }
  const family = FAMILY_PRICING.find(([name]) => model.includes(name));
  if (family) {
    return { pricing: family[1], match: 'family' };
  }
  return { pricing: DEFAULT_PRICING, match: 'default' };
}
