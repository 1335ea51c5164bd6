/**
 * Model Pricing
 *
 * USD per million tokens. Provider model ids often carry a date suffix
 * (gpt-4o-mini-2024-07-18), so lookup takes the longest matching prefix.
 */

import type { BackendUsage } from '../types';

export interface ModelPrice {
  inputPerMillion: number;
  outputPerMillion: number;
}

export const MODEL_PRICING: Record<string, ModelPrice> = {
  'gpt-4o-mini': { inputPerMillion: 0.15, outputPerMillion: 0.6 },
  'gpt-4o': { inputPerMillion: 2.5, outputPerMillion: 10 },
  'gpt-4-turbo': { inputPerMillion: 10, outputPerMillion: 30 },
  'gpt-3.5-turbo': { inputPerMillion: 0.5, outputPerMillion: 1.5 },
  'claude-3-5-sonnet': { inputPerMillion: 3, outputPerMillion: 15 },
  'claude-sonnet-4': { inputPerMillion: 3, outputPerMillion: 15 },
  'claude-3-haiku': { inputPerMillion: 0.25, outputPerMillion: 1.25 },
  'claude-3-opus': { inputPerMillion: 15, outputPerMillion: 75 },
  'llama-3.1-8b': { inputPerMillion: 0.05, outputPerMillion: 0.08 },
  'llama-3.1-70b': { inputPerMillion: 0.59, outputPerMillion: 0.79 },
  'gemini-1.5-flash': { inputPerMillion: 0.075, outputPerMillion: 0.3 },
  'gemini-1.5-pro': { inputPerMillion: 1.25, outputPerMillion: 5 },
  'gemini-2.0-flash': { inputPerMillion: 0.1, outputPerMillion: 0.4 },
};

export function getModelPrice(model: string): ModelPrice | null {
  const matches = Object.keys(MODEL_PRICING)
    .filter((prefix) => model.startsWith(prefix))
    .sort((a, b) => b.length - a.length);
  return matches.length > 0 ? MODEL_PRICING[matches[0]] : null;
}

/**
 * Cost of one call in USD, or null when the model is not priced or usage
 * was not reported.
 */
export function estimateCostUsd(model: string | null, usage: BackendUsage | null): number | null {
  if (!model || !usage) return null;
  const price = getModelPrice(model);
  if (!price) return null;
  return (usage.input_tokens * price.inputPerMillion + usage.output_tokens * price.outputPerMillion) / 1_000_000;
}
