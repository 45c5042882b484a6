export { ComponentClassifier } from "./lib/classifier";
export type { ClassifierOptions } from "./lib/classifier";
export { ComponentKind, KindHierarchy, kindHierarchy, isVendorKind } from "./lib/component-kind";
export { config } from "./lib/config";
export { CrossReferenceTable, LINEAR_REGULATOR_XREF, SMALL_SIGNAL_TRANSISTOR_XREF } from "./lib/cross-reference";
export type { CrossReferenceGroup, CrossReferenceHit, Polarity } from "./lib/cross-reference";
export {
  MpnClassifierError,
  ImmutableCollectionError,
  RegistrySealedError,
  KindHierarchyError,
} from "./lib/errors";
export { FrozenSet, readonlySet } from "./lib/frozen-set";
export {
  stripPackageSuffix,
  getPackageSuffix,
  getSuffixDelimiter,
  getSearchVariations,
  isEquivalentMPN,
  normalizeMpn,
  foldMpn,
  splitPackageSuffix,
} from "./lib/mpn";
export type { SuffixSplit } from "./lib/mpn";
export { MpnIdentifier } from "./lib/mpn-identifier";
export {
  resolvePackageCode,
  isKnownPackageCode,
  lookupPackageCode,
  isPowerPackage,
  isThroughHole,
  isSurfaceMount,
  arePackagesCompatible,
} from "./lib/package-codes";
export { PatternRegistry, compileMatcher } from "./lib/pattern-registry";
export type { PatternEntry } from "./lib/pattern-registry";

export { BaseHandler } from "./lib/manufacturers/base";
export { InfineonHandler } from "./lib/manufacturers/infineon";
export { OnsemiHandler } from "./lib/manufacturers/onsemi";
export { StHandler } from "./lib/manufacturers/st";
export { MaximHandler } from "./lib/manufacturers/maxim";
export { TiHandler } from "./lib/manufacturers/ti";
export { NxpHandler } from "./lib/manufacturers/nxp";
export { createHandlers, createPatternRegistry, getAllHandlerNames } from "./lib/manufacturers/registry";
export {
  identical,
  packageOnlyDifference,
  ratingDominates,
  crossReferenced,
  anyOf,
} from "./lib/manufacturers/replacement";
export type { ReplacementPolicy } from "./lib/manufacturers/replacement";
export { SeriesTable } from "./lib/manufacturers/series";
export type {
  HandlerDefinition,
  ManufacturerHandler,
  PatternRule,
  SeriesRule,
} from "./lib/manufacturers/types";
