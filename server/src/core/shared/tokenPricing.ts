export interface ModelPricing {
  /** USD per one million prompt tokens. */
  input: number;
  /** USD per one million completion tokens. */
  output: number;
  /** USD per one million prompt tokens served from the provider cache. */
  cachedInput: number;
}

export interface CostBreakdown {
  inputCostUsd: number;
  outputCostUsd: number;
  totalCostUsd: number;
}

const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  'deterministic-mock-v1': { input: 0, output: 0, cachedInput: 0 },
  'gpt-4o-mini': { input: 0.15, output: 0.6, cachedInput: 0.075 },
  'gpt-4o': { input: 2.5, output: 10, cachedInput: 1.25 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6, cachedInput: 0.1 },
  'gpt-4.1': { input: 2, output: 8, cachedInput: 0.5 },
  'gpt-5-mini': { input: 0.25, output: 2, cachedInput: 0.025 },
};

const DEFAULT_PRICING_MODEL = 'gpt-4o-mini';

const roundUsd = (value: number): number => Math.round(value * 1_000_000) / 1_000_000;

/**
 * Resolves pricing by exact name first, then by the longest known prefix so dated
 * snapshots such as `gpt-4o-mini-2024-07-18` price like their family.
 */
export const resolveModelPricing = (model: string): ModelPricing => {
  const exact = MODEL_PRICING[model];
  if (exact) {
    return exact;
  }

  const prefix = Object.keys(MODEL_PRICING)
    .filter((known) => model.startsWith(known))
    .sort((left, right) => right.length - left.length)[0];

  return (prefix ? MODEL_PRICING[prefix] : undefined) ?? MODEL_PRICING[DEFAULT_PRICING_MODEL] ?? {
    input: 0,
    output: 0,
    cachedInput: 0,
  };
};

export const calculateCost = (
  model: string,
  inputTokens: number,
  outputTokens: number,
  cachedTokens = 0,
): CostBreakdown => {
  const pricing = resolveModelPricing(model);
  const regularInputTokens = Math.max(0, inputTokens - cachedTokens);

  const inputCost =
    (regularInputTokens / 1_000_000) * pricing.input +
    (cachedTokens / 1_000_000) * pricing.cachedInput;
  const outputCost = (outputTokens / 1_000_000) * pricing.output;

  return {
    inputCostUsd: roundUsd(inputCost),
    outputCostUsd: roundUsd(outputCost),
    totalCostUsd: roundUsd(inputCost + outputCost),
  };
};
