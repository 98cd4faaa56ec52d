/**
 * Name Suggestion
 *
 * Nearest-match lookup used by not-found diagnostics.
 */

/**
 * Edit distance with unit-cost insert, delete and substitute.
 * Keeps a single rolling vector of length `a.length`.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;

  const charsA = Array.from(a);
  const charsB = Array.from(b);

  if (charsA.length === 0) return charsB.length;
  if (charsB.length === 0) return charsA.length;

  const cache = charsA.map((_, index) => index + 1);
  let result = 0;

  charsB.forEach((codeB, indexB) => {
    result = indexB;
    let distanceA = indexB;

    charsA.forEach((codeA, indexA) => {
      const distanceB = codeA === codeB ? distanceA : distanceA + 1;
      distanceA = cache[indexA] ?? 0;

      if (distanceA > result) {
        result = distanceB > result ? result + 1 : distanceB;
      } else {
        result = distanceB > distanceA ? distanceA + 1 : distanceB;
      }

      cache[indexA] = result;
    });
  });

  return result;
}

/**
 * Candidate with the smallest edit distance to `attempted`.
 *
 * Candidates are stably sorted by (distance, name); the first one wins.
 * Returns undefined when there are no candidates.
 */
export function didYouMean(
  candidates: readonly string[],
  attempted: string
): string | undefined {
  const ranked = candidates.map((name) => ({
    name,
    distance: levenshteinDistance(name, attempted),
  }));

  ranked.sort((a, b) => {
    if (a.distance !== b.distance) return a.distance - b.distance;
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
  });

  return ranked[0]?.name;
}
