import packageData from "./data/package-codes.json";

// ===== Package suffix codes shared across manufacturers =====
// Suffix code (upper-case) → package name, plus package groupings used to
// decide whether two packages are interchangeable.

const PACKAGE_CODES = new Map<string, string>(
  Object.entries(packageData.codes).map(([code, name]) => [code.toUpperCase(), name])
);

function upperSet(names: string[]): ReadonlySet<string> {
  return new Set(names.map((n) => n.toUpperCase()));
}

const POWER_PACKAGES = upperSet(packageData.groups.power);
const THROUGH_HOLE_PACKAGES = upperSet(packageData.groups.throughHole);
const SMD_PACKAGES = upperSet(packageData.groups.surfaceMount);
const SMALL_OUTLINE_PACKAGES = upperSet(packageData.groups.smallOutline);

function key(value: string | null | undefined): string {
  return (value ?? "").trim().toUpperCase();
}

/**
 * Resolve a suffix code ("N", "PW", "DBV") to a package name. Unknown codes
 * come back upper-cased and otherwise unchanged; blank → "".
 */
export function resolvePackageCode(code: string | null | undefined): string {
  const k = key(code);
  if (!k) return "";
  return PACKAGE_CODES.get(k) ?? k;
}

export function isKnownPackageCode(code: string | null | undefined): boolean {
  const k = key(code);
  return k !== "" && PACKAGE_CODES.has(k);
}

/** Resolve only if known; "" otherwise */
export function lookupPackageCode(code: string | null | undefined): string {
  return isKnownPackageCode(code) ? resolvePackageCode(code) : "";
}

export function isPowerPackage(name: string | null | undefined): boolean {
  return POWER_PACKAGES.has(key(name));
}

export function isThroughHole(name: string | null | undefined): boolean {
  return THROUGH_HOLE_PACKAGES.has(key(name));
}

export function isSurfaceMount(name: string | null | undefined): boolean {
  return SMD_PACKAGES.has(key(name));
}

/**
 * Packages are compatible when identical, when both are power packages, or
 * when both are small-outline IC packages (DIP/SOIC/TSSOP/MSOP).
 */
export function arePackagesCompatible(
  a: string | null | undefined,
  b: string | null | undefined
): boolean {
  const p1 = key(a);
  const p2 = key(b);
  if (!p1 || !p2) return false;
  if (p1 === p2) return true;
  if (POWER_PACKAGES.has(p1) && POWER_PACKAGES.has(p2)) return true;
  return SMALL_OUTLINE_PACKAGES.has(p1) && SMALL_OUTLINE_PACKAGES.has(p2);
}
