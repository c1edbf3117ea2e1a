/**
 * Return the keywords found in `text`, case-insensitively, in list order.
 * Each keyword appears at most once.
 */
export function matchKeywords(
  text: string | null | undefined,
  keywords: readonly string[]
): string[] {
  if (!text) return [];
  const lower = text.toLowerCase();
  const matched: string[] = [];
  for (const kw of keywords) {
    if (lower.includes(kw.toLowerCase()) && !matched.includes(kw)) {
      matched.push(kw);
    }
  }
  return matched;
}

export function containsExcluded(
  text: string | null | undefined,
  excludeKeywords: readonly string[]
): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return excludeKeywords.some((kw) => lower.includes(kw.toLowerCase()));
}

/** Concatenate keyword lists, keeping the first occurrence of each entry. */
export function mergeKeywords(...lists: ReadonlyArray<readonly string[]>): string[] {
  const merged: string[] = [];
  for (const list of lists) {
    for (const kw of list) {
      if (!merged.includes(kw)) merged.push(kw);
    }
  }
  return merged;
}
