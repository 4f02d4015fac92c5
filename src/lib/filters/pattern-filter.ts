import type { PlaceholderCounter } from './placeholder-counter.js';
import type { Filter, FilterStats } from './types.js';

/**
 * Base for filters that protect every match of a single global regex.
 */
export abstract class PatternFilter implements Filter {
  abstract readonly name: string;

  /** token => original span */
  private readonly map = new Map<string, string>();

  protected abstract pattern(): RegExp;

  apply(text: string, counter: PlaceholderCounter): string {
    try {
      return text.replace(this.pattern(), (match) => {
        const token = counter.next();
        this.map.set(token, match);
        return token;
      });
    } catch {
      // Match failure: text stays unprotected.
      return text;
    }
  }

  restore(text: string): string {
    let restored = text;
    for (const [token, original] of this.map) {
      restored = restored.split(token).join(original);
    }
    return restored;
  }

  getStats(): FilterStats {
    return { filter: this.name, count: this.map.size };
  }
}
