import type { ComponentKind } from "../component-kind";
import type { PatternRegistry } from "../pattern-registry";

/** One matcher a family contributes to the registry. */
export interface PatternRule {
  kind: ComponentKind;
  pattern: string | RegExp;
}

/**
 * Series prefix. Without `pattern`, an MPN belongs to the series when it
 * starts with `series`; with one, when the pattern matches the folded MPN,
 * and the first capture group (if any) becomes the reported series.
 */
export interface SeriesRule {
  series: string;
  pattern?: RegExp;
  kind?: ComponentKind;
}

/** Static rule tables for one manufacturer family. */
export interface HandlerDefinition {
  name: string;
  patterns: readonly PatternRule[];
  series: readonly SeriesRule[];
  /** Kinds supported without patterns of their own */
  extraKinds?: readonly ComponentKind[];
}

/**
 * Capability bundle implemented once per manufacturer family. Stateless:
 * everything it knows is in its HandlerDefinition.
 */
export interface ManufacturerHandler {
  readonly name: string;
  registerPatterns(registry: PatternRegistry): void;
  match(
    mpn: string | null | undefined,
    kind: ComponentKind | null | undefined,
    registry: PatternRegistry
  ): boolean;
  extractPackageCode(mpn: string | null | undefined): string;
  extractSeries(mpn: string | null | undefined): string;
  isOfficialReplacement(a: string | null | undefined, b: string | null | undefined): boolean;
  getSupportedTypes(): ReadonlySet<ComponentKind>;
}
