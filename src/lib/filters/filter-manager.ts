import { HtmlTagFilter } from './html-tag-filter.js';
import { PlaceholderCounter } from './placeholder-counter.js';
import type { Filter, FilterStats } from './types.js';
import { UrlFilter } from './url-filter.js';

const HTML_TAG_PREFIX = 'html_';

function createFilter(name: string): Filter | undefined {
  if (name === 'url') {
    return new UrlFilter();
  }
  if (name.startsWith(HTML_TAG_PREFIX) && name.length > HTML_TAG_PREFIX.length) {
    return new HtmlTagFilter(name.slice(HTML_TAG_PREFIX.length));
  }
  return undefined;
}

/**
 * Ordered chain of filters sharing one placeholder counter.
 *
 * Filters apply in list order and restore in reverse, so a later filter that
 * swallowed an earlier filter's token hands it back before that earlier filter
 * restores it. Unknown identifiers are skipped.
 *
 * @example
 * ```ts
 * const manager = new FilterManager(['url', 'html_a']);
 * const masked = manager.apply('See <a href="https://example.com">docs</a>');
 * // masked === 'See @@1@@'
 * manager.restore(masked); // original text
 * ```
 */
export class FilterManager {
  private readonly filters: Filter[] = [];
  private readonly counter = new PlaceholderCounter();

  constructor(filterNames: readonly string[]) {
    for (const raw of filterNames) {
      const filter = createFilter(raw.trim());
      if (filter) {
        this.filters.push(filter);
      }
    }
  }

  apply(text: string): string {
    return this.filters.reduce((current, filter) => filter.apply(current, this.counter), text);
  }

  restore(text: string): string {
    return this.filters.reduceRight((current, filter) => filter.restore(current), text);
  }

  getStats(): FilterStats[] {
    return this.filters.map((filter) => filter.getStats());
  }

  names(): string[] {
    return this.filters.map((filter) => filter.name);
  }

  get size(): number {
    return this.filters.length;
  }

  get placeholdersIssued(): number {
    return this.counter.current();
  }
}
