/**
 * Manufacturer-agnostic MPN normalization: the suffix grammar vendors use to
 * append ordering/packaging metadata to a base part number, search variations,
 * and suffix-insensitive equivalence.
 */

/**
 * Ordering codes that may follow "#", longest first. They concatenate freely
 * ("#TRPBF" is TR + PBF) and are removed as one unit.
 */
const HASH_ORDERING_CODES = ["TRPBF", "NOPB", "PBF", "TRM", "TR", "ND", "E3", "W", "G"];

/**
 * Delimiter-anchored suffix grammar, tried in order; the first hit wins.
 * "/" is tested before "," because slash tails may themselves contain commas
 * ("/CM,118").
 */
const SUFFIX_GRAMMAR: { name: string; pattern: RegExp }[] = [
  { name: "hash", pattern: new RegExp(`#(?:${HASH_ORDERING_CODES.join("|")})+$`, "i") },
  { name: "slash", pattern: /\/[A-Z0-9]+(?:,[A-Z0-9]+)*$/i },
  { name: "comma", pattern: /,[A-Z0-9]+$/i },
  { name: "plus", pattern: /\+T?$/i },
];

export interface SuffixSplit {
  base: string;
  suffix: string | undefined;
}

/** Split a trimmed MPN into base and package suffix. Never strips to nothing. */
export function splitPackageSuffix(mpn: string | null | undefined): SuffixSplit {
  const trimmed = (mpn ?? "").trim();
  if (!trimmed) return { base: "", suffix: undefined };

  for (const { pattern } of SUFFIX_GRAMMAR) {
    const match = pattern.exec(trimmed);
    if (match && match.index > 0) {
      return { base: trimmed.slice(0, match.index), suffix: match[0] };
    }
  }
  return { base: trimmed, suffix: undefined };
}

/** Strip one trailing ordering/packaging marker; blank input → "" */
export function stripPackageSuffix(mpn: string | null | undefined): string {
  return splitPackageSuffix(mpn).base;
}

/** The delimiter + payload removed by stripPackageSuffix, if any */
export function getPackageSuffix(mpn: string | null | undefined): string | undefined {
  return splitPackageSuffix(mpn).suffix;
}

/** Which grammar rule recognized the suffix ("hash", "slash", "comma", "plus") */
export function getSuffixDelimiter(mpn: string | null | undefined): string | undefined {
  const suffix = getPackageSuffix(mpn);
  if (suffix === undefined) return undefined;
  return SUFFIX_GRAMMAR.find(({ pattern }) => pattern.test(suffix))?.name;
}

/**
 * Strings to try when looking an MPN up elsewhere: the literal input first,
 * then the suffix-stripped base when it differs.
 */
export function getSearchVariations(mpn: string | null | undefined): string[] {
  const trimmed = (mpn ?? "").trim();
  if (!trimmed) return [];

  const { base, suffix } = splitPackageSuffix(trimmed);
  if (suffix === undefined || base === trimmed) return [trimmed];
  return [trimmed, base];
}

/** Same base part once ordering suffixes are removed (case-insensitive) */
export function isEquivalentMPN(
  a: string | null | undefined,
  b: string | null | undefined
): boolean {
  const baseA = stripPackageSuffix(a);
  const baseB = stripPackageSuffix(b);
  if (!baseA || !baseB) return false;
  return baseA.toUpperCase() === baseB.toUpperCase();
}

/** Upper-case and drop everything that isn't a letter or digit */
export function normalizeMpn(mpn: string | null | undefined): string {
  const trimmed = (mpn ?? "").trim();
  if (!trimmed) return "";
  return trimmed.toUpperCase().replace(/[^A-Z0-9]/g, "");
}

/** Case-folded, trimmed form used by every matcher */
export function foldMpn(mpn: string | null | undefined): string {
  return (mpn ?? "").trim().toUpperCase();
}
