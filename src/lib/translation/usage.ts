import type { ModelConfig } from './types.js';

export interface UsageBreakdown {
  total?: number;
  breakdown?: Record<string, number>;
}

/** Normalized usage by category, e.g. `{ tokens: { total: 30, breakdown: { prompt: 10, completion: 20 } } }`. */
export type UsageResult = Record<string, UsageBreakdown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(source: Record<string, unknown>, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
  }
  return 0;
}

/**
 * Map a vendor usage payload onto the categories declared in the model's
 * `usage` section. Paths are dot-separated (`usage.input_tokens`); anything
 * missing or non-numeric counts as 0, fractions are truncated.
 */
export function extractUsage(model: Pick<ModelConfig, 'usage'>, rawUsage: Record<string, unknown> | null): UsageResult {
  const categories = model.usage;
  if (!categories || !rawUsage) {
    return {};
  }

  const result: UsageResult = {};
  for (const [category, paths] of Object.entries(categories)) {
    const entry: UsageBreakdown = {};
    if (paths.total !== undefined) {
      entry.total = toNumber(lookup(rawUsage, paths.total));
    }
    if (paths.breakdown) {
      entry.breakdown = Object.fromEntries(
        Object.entries(paths.breakdown).map(([label, path]) => [label, toNumber(lookup(rawUsage, path))]),
      );
    }
    result[category] = entry;
  }
  return result;
}
