import { PatternFilter } from './pattern-filter.js';

/**
 * Masks http(s), ftp and mailto URIs. A URI ends at whitespace or at one of `"<>()`.
 */
export class UrlFilter extends PatternFilter {
  readonly name = 'url';

  protected pattern(): RegExp {
    return /\b(?:https?|ftp|mailto):\/\/[^\s"<>()]+/gi;
  }
}
