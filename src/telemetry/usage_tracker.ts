/**
 * @fileoverview Token usage and cost accounting
 *
 * One tracker per process (or per evaluation run), handed to every
 * model-backed capability. Call `reset()` between runs.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export type CallType = 'routing' | 'generation' | 'search' | 'safety';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  model: string;
  callType: CallType;
}

/** USD per million tokens, plus USD per thousand requests */
export interface ModelPrice {
  input: number;
  output: number;
  request: number;
}

export type PricingTable = Record<string, ModelPrice>;

export interface CallTypeSummary {
  calls: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

export interface UsageSummary {
  totalCalls: number;
  totalTokens: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCostUsd: number;
  byType: Partial<Record<CallType, CallTypeSummary>>;
}

const PricingTableSchema = z.record(
  z.object({
    input: z.number().nonnegative(),
    output: z.number().nonnegative(),
    request: z.number().nonnegative(),
  })
);

export const MODEL_PRICING_PATH = path.join(path.dirname(fileURLToPath(import.meta.url)), 'model_pricing.json');

export function loadPricingTable(filePath: string = MODEL_PRICING_PATH): PricingTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return PricingTableSchema.parse(raw);
}

const round6 = (value: number): number => Math.round(value * 1e6) / 1e6;

export class UsageTracker {
  private calls: TokenUsage[] = [];
  private readonly pricing: PricingTable;

  constructor(pricing: PricingTable = loadPricingTable()) {
    this.pricing = pricing;
  }

  record(usage: TokenUsage): TokenUsage {
    this.calls.push(usage);
    return usage;
  }

  /** Unknown models cost nothing rather than failing the call that used them. */
  costOf(usage: TokenUsage): number {
    const price = this.pricing[usage.model];
    if (!price) return 0;
    return (
      (usage.inputTokens / 1_000_000) * price.input +
      (usage.outputTokens / 1_000_000) * price.output +
      price.request / 1_000
    );
  }

  get callCount(): number {
    return this.calls.length;
  }

  history(): readonly TokenUsage[] {
    return this.calls;
  }

  summary(): UsageSummary {
    const byType: Partial<Record<CallType, CallTypeSummary>> = {};
    let totalInputTokens = 0;
    let totalOutputTokens = 0;
    let totalCost = 0;

    for (const call of this.calls) {
      const cost = this.costOf(call);
      const bucket = byType[call.callType] ?? { calls: 0, inputTokens: 0, outputTokens: 0, costUsd: 0 };
      bucket.calls += 1;
      bucket.inputTokens += call.inputTokens;
      bucket.outputTokens += call.outputTokens;
      bucket.costUsd += cost;
      byType[call.callType] = bucket;
      totalInputTokens += call.inputTokens;
      totalOutputTokens += call.outputTokens;
      totalCost += cost;
    }

    for (const bucket of Object.values(byType)) {
      if (bucket) bucket.costUsd = round6(bucket.costUsd);
    }

    return {
      totalCalls: this.calls.length,
      totalTokens: totalInputTokens + totalOutputTokens,
      totalInputTokens,
      totalOutputTokens,
      totalCostUsd: round6(totalCost),
      byType,
    };
  }

  reset(): void {
    this.calls = [];
  }
}

export function formatUsageSummary(summary: UsageSummary): string {
  const lines = [
    `Total calls: ${summary.totalCalls}`,
    `Total tokens: ${summary.totalTokens} (input ${summary.totalInputTokens}, output ${summary.totalOutputTokens})`,
    `Total cost: $${summary.totalCostUsd.toFixed(4)}`,
  ];
  for (const [callType, bucket] of Object.entries(summary.byType)) {
    if (!bucket) continue;
    lines.push(
      `  ${callType}: ${bucket.calls} calls, ${bucket.inputTokens + bucket.outputTokens} tokens, $${bucket.costUsd.toFixed(4)}`
    );
  }
  return lines.join('\n');
}
