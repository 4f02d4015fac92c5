export { FilterManager } from './filter-manager.js';
export { HtmlTagFilter } from './html-tag-filter.js';
export { PatternFilter } from './pattern-filter.js';
export { containsPlaceholderSyntax, PLACEHOLDER_PATTERN, PlaceholderCounter } from './placeholder-counter.js';
export type { Filter, FilterStats } from './types.js';
export { UrlFilter } from './url-filter.js';
