import { describe, expect, it } from 'vitest';
import { extractUsage } from '../src/lib/translation/usage.js';

describe('extractUsage', () => {
  const model = {
    usage: {
      tokens: {
        total: 'total_tokens',
        breakdown: {
          prompt: 'prompt_tokens',
          completion: 'completion_tokens',
          cached: 'prompt_tokens_details.cached_tokens',
        },
      },
    },
  };

  it('resolves dot paths into numbers', () => {
    const raw = {
      total_tokens: 30,
      prompt_tokens: 10,
      completion_tokens: '20',
      prompt_tokens_details: { cached_tokens: 4 },
    };
    expect(extractUsage(model, raw)).toEqual({
      tokens: { total: 30, breakdown: { prompt: 10, completion: 20, cached: 4 } },
    });
  });

  it('uses 0 for missing or non-numeric values', () => {
    expect(extractUsage(model, { total_tokens: 'many', prompt_tokens_details: 3 })).toEqual({
      tokens: { total: 0, breakdown: { prompt: 0, completion: 0, cached: 0 } },
    });
  });

  it('truncates fractional values to integers', () => {
    expect(extractUsage(model, { total_tokens: '12.7', prompt_tokens: 3.9, completion_tokens: 8 })).toEqual({
      tokens: { total: 12, breakdown: { prompt: 3, completion: 8, cached: 0 } },
    });
  });

  it('returns an empty result without a map or raw usage', () => {
    expect(extractUsage({}, { total_tokens: 1 })).toEqual({});
    expect(extractUsage(model, null)).toEqual({});
  });

  it('omits parts the map does not declare', () => {
    expect(extractUsage({ usage: { chars: { total: 'billed' } } }, { billed: 120 })).toEqual({
      chars: { total: 120 },
    });
  });
});
