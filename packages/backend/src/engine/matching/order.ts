/** Plain string ordering, used for every "by id ascending" tie-break. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Smallest difference two scores may have and still be treated as distinct. */
export const SCORE_EPSILON = 1e-12;
