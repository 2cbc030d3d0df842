export type Pricing = {
  input: number; // USD per 1K input tokens
  output: number; // USD per 1K output tokens
};

const DEFAULT_PRICING: Pricing = { input: 0.0025, output: 0.01 };

const MODEL_PRICING: Record<string, Pricing> = {
  'gpt-4o': { input: 0.0025, output: 0.01 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
  'gpt-4.1': { input: 0.002, output: 0.008 },
  'gpt-4.1-mini': { input: 0.0004, output: 0.0016 },
  'gpt-4o-mini-tts': { input: 0.0006, output: 0.012 }
};

function normalizeKey(model: string): string {
  return model.trim().toLowerCase();
}

export function getPricingForModel(model: string | undefined): Pricing {
  if (!model) return DEFAULT_PRICING;
  const key = normalizeKey(model);
  const exact = MODEL_PRICING[key];
  if (exact) {
    return exact;
  }
  // longest prefix wins, so gpt-4o-mini-2024-07-18 maps to gpt-4o-mini rather than gpt-4o
  const match = Object.entries(MODEL_PRICING)
    .filter(([name]) => key.startsWith(name))
    .sort((a, b) => b[0].length - a[0].length)[0];
  return match ? match[1] : DEFAULT_PRICING;
}
