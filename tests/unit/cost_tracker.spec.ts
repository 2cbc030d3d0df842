import { describe, expect, it } from 'vitest';
import { getPricingForModel } from '@/config/pricing';
import { isCostLimitError, recordUsage, resolveCostLimit, runWithCostTracking } from '@/lib/cost-tracker';

describe('getPricingForModel', () => {
  it('matches exact names case-insensitively', () => {
    expect(getPricingForModel('GPT-4o')).toEqual({ input: 0.0025, output: 0.01 });
  });

  it('picks the longest matching prefix for dated snapshots', () => {
    expect(getPricingForModel('gpt-4o-mini-2024-07-18')).toEqual({ input: 0.00015, output: 0.0006 });
  });

  it('falls back to default pricing', () => {
    expect(getPricingForModel('unknown-model')).toEqual({ input: 0.0025, output: 0.01 });
    expect(getPricingForModel(undefined)).toEqual({ input: 0.0025, output: 0.01 });
  });
});

describe('runWithCostTracking', () => {
  it('totals usage recorded inside the run', async () => {
    const { value, cost } = await runWithCostTracking(
      () => {
        recordUsage('gpt-4o-mini', { prompt_tokens: 1000, completion_tokens: 500 });
        recordUsage('gpt-4o', { total_tokens: 300, completion_tokens: 100 });
        return 'done';
      },
      { limitUsd: 1 }
    );
    expect(value).toBe('done');
    expect(cost.total_input_tokens).toBe(1200);
    expect(cost.total_output_tokens).toBe(600);
    expect(cost.total_tokens).toBe(1800);
    expect(cost.breakdown.map((entry) => [entry.model, entry.input_tokens, entry.output_tokens])).toEqual([
      ['gpt-4o-mini', 1000, 500],
      ['gpt-4o', 200, 100]
    ]);
    expect(cost.total_cost_usd).toBeCloseTo(0.00045 + 0.0015, 10);
  });

  it('ignores usage recorded outside a run', () => {
    expect(() => recordUsage('gpt-4o', { prompt_tokens: 10 })).not.toThrow();
  });

  it('throws once the run crosses its limit', async () => {
    const caught = await runWithCostTracking(
      () => {
        recordUsage('gpt-4o', { input_tokens: 1000, output_tokens: 1000 });
      },
      { limitUsd: 0.01 }
    ).catch((err: unknown) => err);
    expect(isCostLimitError(caught)).toBe(true);
    expect(caught).toMatchObject({ message: 'Model cost limit exceeded: $0.0125 > $0.0100' });
  });
});

describe('resolveCostLimit', () => {
  it('reads a non-negative limit from the environment', () => {
    expect(resolveCostLimit({ OPENAI_MAX_COST_USD: '0.5' })).toBe(0.5);
    expect(resolveCostLimit({ OPENAI_MAX_COST_USD: '0' })).toBe(0);
  });

  it('treats missing or invalid values as unlimited', () => {
    expect(resolveCostLimit({})).toBe(Number.POSITIVE_INFINITY);
    expect(resolveCostLimit({ OPENAI_MAX_COST_USD: '-1' })).toBe(Number.POSITIVE_INFINITY);
    expect(resolveCostLimit({ OPENAI_MAX_COST_USD: 'lots' })).toBe(Number.POSITIVE_INFINITY);
  });
});
