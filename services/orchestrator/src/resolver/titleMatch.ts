/**
 * Token overlap scoring for title search
 */

const SEPARATORS = /[\s.,!?]+/;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(SEPARATORS)
    .filter((token) => token.length > 0);
}

/**
 * Fraction of query tokens that occur inside at least one title token.
 * 0 when the query has no tokens.
 */
export function scoreTitle(queryTokens: readonly string[], title: string): number {
  if (queryTokens.length === 0) return 0;

  const titleTokens = tokenize(title);
  let matched = 0;
  for (const queryToken of queryTokens) {
    if (titleTokens.some((titleToken) => titleToken.includes(queryToken))) {
      matched++;
    }
  }
  return matched / queryTokens.length;
}
