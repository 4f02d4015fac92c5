import type { PlaceholderCounter } from './placeholder-counter.js';

export interface FilterStats {
  filter: string;
  count: number;
}

/**
 * A reversible masking step. `apply` swaps protected spans for tokens issued by
 * the shared counter; `restore` swaps back only the tokens this instance issued.
 */
export interface Filter {
  readonly name: string;
  apply(text: string, counter: PlaceholderCounter): string;
  restore(text: string): string;
  getStats(): FilterStats;
}
