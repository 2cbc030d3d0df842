import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import { getPricingForModel } from '@/config/pricing';

export type CostBreakdownEntry = {
  model: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
};

export type CostSummary = {
  total_cost_usd: number;
  total_input_tokens: number;
  total_output_tokens: number;
  total_tokens: number;
  limit_usd: number;
  breakdown: CostBreakdownEntry[];
};

export type TokenUsage = {
  input_tokens?: number | null;
  output_tokens?: number | null;
  prompt_tokens?: number | null;
  completion_tokens?: number | null;
  total_tokens?: number | null;
};

type CostState = {
  totalCostUsd: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  breakdown: CostBreakdownEntry[];
  limitUsd: number;
  runId: string;
};

const storage = new AsyncLocalStorage<CostState>();
let callCounter = 0;
let cumulativeCostUsd = 0;

export class CostLimitError extends Error {
  readonly code = 'COST_LIMIT_EXCEEDED';

  constructor(message: string) {
    super(message);
    this.name = 'CostLimitError';
  }
}

export function resolveCostLimit(env: Record<string, string | undefined> = process.env): number {
  const raw = env.OPENAI_MAX_COST_USD;
  const parsed = raw === undefined || raw.trim() === '' ? Number.NaN : Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : Number.POSITIVE_INFINITY;
}

export async function runWithCostTracking<T>(
  fn: () => Promise<T> | T,
  options: { limitUsd?: number } = {}
): Promise<{ value: T; cost: CostSummary }> {
  const state: CostState = {
    totalCostUsd: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    breakdown: [],
    limitUsd: options.limitUsd ?? resolveCostLimit(),
    runId: randomUUID().slice(0, 8)
  };

  return storage.run(state, async () => {
    const value = await fn();
    return { value, cost: summarize(state) };
  });
}

export function recordUsage(model: string, usage: TokenUsage | null | undefined) {
  const state = storage.getStore();
  if (!state || !usage) return;

  const pricing = getPricingForModel(model);
  const inputTokens = normalizeTokens(usage.input_tokens ?? usage.prompt_tokens);
  const outputTokens = normalizeTokens(usage.output_tokens ?? usage.completion_tokens);
  const totalTokens = normalizeTokens(usage.total_tokens);

  const inputTok = inputTokens ?? (totalTokens !== null ? Math.max(totalTokens - (outputTokens ?? 0), 0) : 0);
  const outputTok = outputTokens ?? (totalTokens !== null ? Math.max(totalTokens - inputTok, 0) : 0);

  const costUsd = (inputTok / 1000) * pricing.input + (outputTok / 1000) * pricing.output;

  state.totalInputTokens += inputTok;
  state.totalOutputTokens += outputTok;
  state.totalCostUsd += costUsd;
  state.breakdown.push({
    model,
    input_tokens: inputTok,
    output_tokens: outputTok,
    cost_usd: costUsd
  });

  cumulativeCostUsd += costUsd;
  callCounter += 1;
  const fmt = (n: number) => n.toFixed(6);
  console.info(
    `[cost][run=${state.runId}][#${callCounter}] cost=$${fmt(costUsd)} run_total=$${fmt(state.totalCostUsd)} cum=$${fmt(
      cumulativeCostUsd
    )} tokens(in=${inputTok}, out=${outputTok}) model=${model}`
  );

  if (state.totalCostUsd > state.limitUsd) {
    throw new CostLimitError(
      `Model cost limit exceeded: $${state.totalCostUsd.toFixed(4)} > $${state.limitUsd.toFixed(4)}`
    );
  }
}

function summarize(state: CostState): CostSummary {
  return {
    total_cost_usd: state.totalCostUsd,
    total_input_tokens: state.totalInputTokens,
    total_output_tokens: state.totalOutputTokens,
    total_tokens: state.totalInputTokens + state.totalOutputTokens,
    limit_usd: state.limitUsd,
    breakdown: [...state.breakdown]
  };
}

function normalizeTokens(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return null;
}

export function isCostLimitError(error: unknown): error is CostLimitError {
  return error instanceof CostLimitError;
}
