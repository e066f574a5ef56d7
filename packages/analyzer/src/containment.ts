import type { GraphPath } from "@servicemap/schemas";

/** True when `needle` occurs in `haystack` as a contiguous run of nodes. */
export function containsRun(haystack: GraphPath, needle: GraphPath): boolean {
  if (needle.length === 0) return true;
  const last = haystack.length - needle.length;
  for (let start = 0; start <= last; start++) {
    if (needle.every((label, k) => haystack[start + k] === label)) return true;
  }
  return false;
}

/**
 * Keep the candidate paths that no LATER candidate contains.
 *
 * Candidate k is compared only with candidates k+1..n-1, stopping at the
 * first one that contains it. A path is never discarded because an earlier
 * path contains it, so the outcome depends on discovery order: [AB, ABC]
 * keeps only ABC while [ABC, AB] keeps both.
 */
export function filterRootCausePaths(candidates: readonly GraphPath[]): GraphPath[] {
  if (candidates.length === 1) return [...candidates];
  const kept: GraphPath[] = [];
  candidates.forEach((path, k) => {
    let containedLater = false;
    for (let m = k + 1; m < candidates.length; m++) {
      const later = candidates[m];
      if (later && containsRun(later, path)) {
        containedLater = true;
        break;
      }
    }
    if (!containedLater) kept.push(path);
  });
  return kept;
}
