import type { CrossReferenceTable } from "../cross-reference";
import { foldMpn } from "../mpn";

/**
 * Official-replacement policies. Each takes two trimmed, non-blank,
 * upper-cased MPNs (a replaces b). Handlers compose them with anyOf().
 */
export type ReplacementPolicy = (a: string, b: string) => boolean;

export const identical: ReplacementPolicy = (a, b) => a === b;

/**
 * Same non-empty base key; only the package differs. With
 * `packagesCompatible`, the two packages must also pass it.
 */
export function packageOnlyDifference(
  baseKeyOf: (mpn: string) => string,
  packagesCompatible?: (a: string, b: string) => boolean
): ReplacementPolicy {
  return (a, b) => {
    const keyA = baseKeyOf(a);
    if (!keyA || keyA !== baseKeyOf(b)) return false;
    return packagesCompatible ? packagesCompatible(a, b) : true;
  };
}

/**
 * `a` replaces `b` when both ratings are known and a's is at least b's.
 * Not symmetric: a 1000 V part replaces a 400 V part, never the reverse.
 */
export function ratingDominates(
  ratingOf: (mpn: string) => number | undefined
): ReplacementPolicy {
  return (a, b) => {
    const ratingA = ratingOf(a);
    const ratingB = ratingOf(b);
    if (ratingA === undefined || ratingB === undefined) return false;
    return ratingA >= ratingB;
  };
}

export function crossReferenced(table: CrossReferenceTable): ReplacementPolicy {
  return (a, b) => table.areCrossReferenced(a, b);
}

export function anyOf(...policies: ReplacementPolicy[]): ReplacementPolicy {
  return (a, b) => policies.some((policy) => policy(a, b));
}

/** Fold both sides and apply the policy; blank on either side → false */
export function applyPolicy(
  policy: ReplacementPolicy,
  a: string | null | undefined,
  b: string | null | undefined
): boolean {
  const foldedA = foldMpn(a);
  const foldedB = foldMpn(b);
  if (!foldedA || !foldedB) return false;
  return policy(foldedA, foldedB);
}
