/**
 * Near-duplicate heuristic for memory content.
 *
 * similarity = max(normalised Levenshtein ratio, prefix containment), where
 * containment only counts when the shorter text has at least two tokens and
 * opens the longer one ("likes coffee" / "likes coffee in the morning").
 */

export function normalizeContent(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .normalize('NFKC')
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  return normalizeContent(text)
    .split(' ')
    .filter((w) => w.length >= 2);
}

function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

export function levenshteinRatio(a: string, b: string): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;
  return 1 - levenshtein(a, b) / maxLen;
}

/**
 * 1 when the shorter text (two or more tokens) opens the longer one, i.e. the
 * longer text restates it with qualifiers appended; 0 otherwise. Shared words
 * in another order or behind a new subject ("wife works in Osaka") don't count.
 */
export function prefixContainment(a: string, b: string): number {
  const ta = tokenize(a);
  const tb = tokenize(b);
  const [short, long] = ta.length <= tb.length ? [ta, tb] : [tb, ta];
  if (short.length < 2) return 0;
  return short.every((token, i) => long[i] === token) ? 1 : 0;
}

export function contentSimilarity(a: string, b: string): number {
  const na = normalizeContent(a);
  const nb = normalizeContent(b);
  if (na === nb) return 1;
  return Math.max(levenshteinRatio(na, nb), prefixContainment(na, nb));
}
