import { PatternFilter } from './pattern-filter.js';

/**
 * Masks whole `<tag ...>...</tag>` blocks, case-insensitive and across lines.
 *
 * Matching is non-greedy and flat: with nested same-name tags the outer block
 * ends at the first closing tag. Vendor-side tag preservation assumes the same
 * flat masking.
 */
export class HtmlTagFilter extends PatternFilter {
  readonly name: string;
  private readonly tag: string;

  constructor(tag: string) {
    super();
    this.tag = tag;
    this.name = `html_${tag}`;
  }

  protected pattern(): RegExp {
    const tag = escapeRegExp(this.tag);
    return new RegExp(`<${tag}.*?>.*?<\\/${tag}>`, 'gis');
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
