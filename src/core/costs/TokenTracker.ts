/**
 * Token and cost accounting across every Messages API call of a conversation
 */

import { sumBy } from 'lodash-es';
import { getModelPricing, type ModelPricing } from './pricing';

export interface TokenCounts {
  inputTokens: number;
  outputTokens: number;
  cacheCreationInputTokens: number;
  cacheReadInputTokens: number;
}

export interface TokenUsage extends TokenCounts {
  /** Sum of the four counters */
  totalTokens: number;
}

export interface MessageUsageRecord extends TokenCounts {
  messageId: string;
  /** True when the call was answering tool results */
  isToolRelated: boolean;
  toolName?: string;
}

export interface TokenUsageInfo {
  /** Calls made directly for a prompt */
  text: TokenUsage;
  /** Calls made to continue after tool results */
  tools: TokenUsage;
  byTool: Record<string, TokenUsage>;
  total: TokenUsage;
}

export interface CostInfo {
  inputCost: number;
  outputCost: number;
  cacheCreationCost: number;
  cacheReadCost: number;
  totalCost: number;
  unit: ModelPricing['unit'];
}

export interface CostReport {
  model: string;
  text: CostInfo;
  tools: CostInfo;
  byTool: Record<string, CostInfo>;
  total: CostInfo;
}

export const EMPTY_TOKEN_COUNTS: Readonly<TokenCounts> = {
  inputTokens: 0,
  outputTokens: 0,
  cacheCreationInputTokens: 0,
  cacheReadInputTokens: 0,
};

export function toTokenUsage(counts: TokenCounts): TokenUsage {
  return {
    inputTokens: counts.inputTokens,
    outputTokens: counts.outputTokens,
    cacheCreationInputTokens: counts.cacheCreationInputTokens,
    cacheReadInputTokens: counts.cacheReadInputTokens,
    totalTokens:
      counts.inputTokens +
      counts.outputTokens +
      counts.cacheCreationInputTokens +
      counts.cacheReadInputTokens,
  };
}

function sumCounts(records: TokenCounts[]): TokenUsage {
  return toTokenUsage({
    inputTokens: sumBy(records, 'inputTokens'),
    outputTokens: sumBy(records, 'outputTokens'),
    cacheCreationInputTokens: sumBy(records, 'cacheCreationInputTokens'),
    cacheReadInputTokens: sumBy(records, 'cacheReadInputTokens'),
  });
}

export function calculateCost(usage: TokenCounts, pricing: ModelPricing): CostInfo {
  const inputCost = (usage.inputTokens / 1_000_000) * pricing.input;
  const outputCost = (usage.outputTokens / 1_000_000) * pricing.output;
  const cacheCreationCost = (usage.cacheCreationInputTokens / 1_000_000) * pricing.cacheWrite;
  const cacheReadCost = (usage.cacheReadInputTokens / 1_000_000) * pricing.cacheRead;
  return {
    inputCost,
    outputCost,
    cacheCreationCost,
    cacheReadCost,
    totalCost: inputCost + outputCost + cacheCreationCost + cacheReadCost,
    unit: pricing.unit,
  };
}

export class TokenTracker {
  private records: MessageUsageRecord[] = [];
  private model: string;

  constructor(model: string) {
    this.model = model;
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Costs are always priced at the current model's rates
   */
  setModel(model: string): void {
    this.model = model;
  }

  addMessage(record: MessageUsageRecord): void {
    this.records.push({ ...record });
  }

  getRecords(): MessageUsageRecord[] {
    return this.records.map(record => ({ ...record }));
  }

  getMessageUsage(messageId: string): TokenUsage | undefined {
    const record = this.records.find(r => r.messageId === messageId);
    return record ? toTokenUsage(record) : undefined;
  }

  getTokenUsage(): TokenUsageInfo {
    const toolRecords = this.records.filter(r => r.isToolRelated);
    const textRecords = this.records.filter(r => !r.isToolRelated);

    const byToolRecords = new Map<string, MessageUsageRecord[]>();
    for (const record of toolRecords) {
      if (!record.toolName) continue;
      const bucket = byToolRecords.get(record.toolName) ?? [];
      bucket.push(record);
      byToolRecords.set(record.toolName, bucket);
    }

    const byTool: Record<string, TokenUsage> = {};
    for (const [toolName, records] of byToolRecords) {
      byTool[toolName] = sumCounts(records);
    }

    return {
      text: sumCounts(textRecords),
      tools: sumCounts(toolRecords),
      byTool,
      total: sumCounts(this.records),
    };
  }

  getMessageCost(messageId: string): CostInfo | undefined {
    const usage = this.getMessageUsage(messageId);
    return usage ? calculateCost(usage, getModelPricing(this.model).pricing) : undefined;
  }

  getCost(): CostReport {
    const { pricing } = getModelPricing(this.model);
    const usage = this.getTokenUsage();

    const byTool: Record<string, CostInfo> = {};
    for (const [toolName, toolUsage] of Object.entries(usage.byTool)) {
      byTool[toolName] = calculateCost(toolUsage, pricing);
    }

    return {
      model: this.model,
      text: calculateCost(usage.text, pricing),
      tools: calculateCost(usage.tools, pricing),
      byTool,
      total: calculateCost(usage.total, pricing),
    };
  }

  reset(): void {
    this.records = [];
  }
}
