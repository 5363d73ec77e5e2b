import { describe, expect, it } from 'vitest';
import { TokenTracker, calculateCost, toTokenUsage } from '../core/costs/TokenTracker';
import { MODEL_PRICING, getModelPricing } from '../core/costs/pricing';

const SONNET = 'claude-3-7-sonnet-20250219';

describe('getModelPricing', () => {
  it('matches known model ids exactly', () => {
    expect(getModelPricing(SONNET)).toEqual({ pricing: MODEL_PRICING[SONNET], match: 'exact' });
  });

  it('falls back to the model family', () => {
    const { pricing, match } = getModelPricing('claude-opus-9');
    expect(match).toBe('family');
    expect(pricing.input).toBe(15);
    expect(pricing.output).toBe(75);
  });

  it('uses Sonnet pricing for unknown models', () => {
    const { pricing, match } = getModelPricing('my-proxy-model');
    expect(match).toBe('default');
    expect(pricing.input).toBe(3);
  });
});

describe('calculateCost', () => {
  it('prices each counter per million tokens', () => {
    const cost = calculateCost(
      {
        inputTokens: 1_000_000,
        outputTokens: 1_000_000,
        cacheCreationInputTokens: 1_000_000,
        cacheReadInputTokens: 1_000_000,
      },
      getModelPricing(SONNET).pricing,
    );
    expect(cost.inputCost).toBe(3);
    expect(cost.outputCost).toBe(15);
    expect(cost.cacheCreationCost).toBe(3.75);
    expect(cost.cacheReadCost).toBeCloseTo(0.3, 10);
    expect(cost.totalCost).toBeCloseTo(22.05, 10);
    expect(cost.unit).toBe('USD');
  });

  it('is zero for no usage', () => {
    expect(calculateCost(toTokenUsage({
      inputTokens: 0,
      outputTokens: 0,
      cacheCreationInputTokens: 0,
      cacheReadInputTokens: 0,
    }), getModelPricing(SONNET).pricing).totalCost).toBe(0);
  });
});

describe('TokenTracker', () => {
  function trackerWithCalls(): TokenTracker {
    const tracker = new TokenTracker(SONNET);
    tracker.addMessage({
      messageId: 'msg_1',
      isToolRelated: false,
      inputTokens: 100,
      outputTokens: 20,
      cacheCreationInputTokens: 50,
      cacheReadInputTokens: 0,
    });
    tracker.addMessage({
      messageId: 'msg_2',
      isToolRelated: true,
      toolName: 'get_weather',
      inputTokens: 200,
      outputTokens: 10,
      cacheCreationInputTokens: 0,
      cacheReadInputTokens: 50,
    });
    tracker.addMessage({
      messageId: 'msg_3',
      isToolRelated: true,
      toolName: 'bash',
      inputTokens: 300,
      outputTokens: 30,
      cacheCreationInputTokens: 0,
      cacheReadInputTokens: 100,
    });
    return tracker;
  }

  it('splits usage into text, tools and per-tool buckets', () => {
    const usage = trackerWithCalls().getTokenUsage();
    expect(usage.text).toEqual({
      inputTokens: 100,
      outputTokens: 20,
      cacheCreationInputTokens: 50,
      cacheReadInputTokens: 0,
      totalTokens: 170,
    });
    expect(usage.tools).toEqual({
      inputTokens: 500,
      outputTokens: 40,
      cacheCreationInputTokens: 0,
      cacheReadInputTokens: 150,
      totalTokens: 690,
    });
    expect(Object.keys(usage.byTool)).toEqual(['get_weather', 'bash']);
    expect(usage.byTool.bash.totalTokens).toBe(430);
    expect(usage.total.totalTokens).toBe(860);
  });

  it('reports usage for a single call', () => {
    const tracker = trackerWithCalls();
    expect(tracker.getMessageUsage('msg_2')?.totalTokens).toBe(260);
    expect(tracker.getMessageUsage('msg_missing')).toBeUndefined();
  });

  it('prices every bucket at the current model', () => {
    const tracker = trackerWithCalls();
    const report = tracker.getCost();
    expect(report.model).toBe(SONNET);
    expect(report.text.inputCost).toBeCloseTo(0.0003, 10);
    expect(report.total.inputCost).toBeCloseTo(0.0018, 10);
    expect(report.byTool.get_weather.outputCost).toBeCloseTo(0.00015, 10);

    tracker.setModel('claude-3-opus-20240229');
    expect(tracker.getCost().total.inputCost).toBeCloseTo(0.009, 10);
  });

  it('clears all records on reset', () => {
    const tracker = trackerWithCalls();
    tracker.reset();
    expect(tracker.getRecords()).toEqual([]);
    expect(tracker.getTokenUsage().total.totalTokens).toBe(0);
    expect(tracker.getTokenUsage().byTool).toEqual({});
  });
});
