export const PLACEHOLDER_PATTERN = /@@\d+@@/;

/**
 * Issues `@@N@@` tokens for one pipeline run. N starts at 0 and grows by one per
 * call, shared by every filter in the run so tokens never collide.
 */
export class PlaceholderCounter {
  private index = 0;

  next(): string {
    const token = `@@${this.index}@@`;
    this.index += 1;
    return token;
  }

  /** Number of tokens issued so far. */
  current(): number {
    return this.index;
  }
}

export function containsPlaceholderSyntax(text: string): boolean {
  return PLACEHOLDER_PATTERN.test(text);
}
