import { ComponentKind, kindHierarchy } from "../component-kind";
import { readonlySet } from "../frozen-set";
import { foldMpn, getSearchVariations, stripPackageSuffix } from "../mpn";
import { lookupPackageCode } from "../package-codes";
import type { PatternRegistry } from "../pattern-registry";
import {
  applyPolicy,
  anyOf,
  identical,
  packageOnlyDifference,
  type ReplacementPolicy,
} from "./replacement";
import { SeriesTable, afterLastHyphen, numberAfter, trailingLetters } from "./series";
import type { HandlerDefinition, ManufacturerHandler } from "./types";

const MOSFET_PART = /^[A-Z]+\d+[NP][A-Z]*\d+/;

/**
 * Shared handler plumbing. Subclasses pass a static HandlerDefinition and
 * override the extraction and replacement hooks they need.
 */
export abstract class BaseHandler implements ManufacturerHandler {
  readonly name: string;
  protected readonly definition: HandlerDefinition;
  protected readonly seriesTable: SeriesTable;
  private readonly supported: ReadonlySet<ComponentKind>;
  private readonly specializations: ReadonlyMap<ComponentKind, readonly ComponentKind[]>;
  private _policy?: ReplacementPolicy;

  constructor(definition: HandlerDefinition) {
    this.definition = definition;
    this.name = definition.name;
    this.seriesTable = new SeriesTable(definition.series);

    const kinds = new Set<ComponentKind>();
    const declared = [...definition.patterns.map((p) => p.kind), ...(definition.extraKinds ?? [])];
    for (const kind of declared) {
      kinds.add(kind);
      for (const ancestor of kindHierarchy.ancestorsOf(kind)) kinds.add(ancestor);
    }
    this.supported = readonlySet(kinds);

    const specializations = new Map<ComponentKind, ComponentKind[]>();
    for (const kind of kinds) {
      const narrower = [...kinds].filter((k) => kindHierarchy.specializes(k, kind));
      if (narrower.length > 0) specializations.set(kind, narrower);
    }
    this.specializations = specializations;
  }

  registerPatterns(registry: PatternRegistry): void {
    for (const rule of this.definition.patterns) {
      registry.register(rule.kind, rule.pattern, this.name);
    }
  }

  match(
    mpn: string | null | undefined,
    kind: ComponentKind | null | undefined,
    registry: PatternRegistry
  ): boolean {
    if (!kind || !this.supported.has(kind)) return false;

    const narrower = this.specializations.get(kind) ?? [];
    for (const variant of getSearchVariations(mpn)) {
      if (registry.matchesOwned(variant, kind, this.name)) return true;
      if (narrower.some((k) => registry.matchesOwned(variant, k, this.name))) return true;
    }
    return false;
  }

  /** Hyphen tail, then letters after the last digit, through the shared code table */
  extractPackageCode(mpn: string | null | undefined): string {
    const base = this.baseOf(mpn);
    if (!base) return "";
    return lookupPackageCode(afterLastHyphen(base)) || lookupPackageCode(trailingLetters(base));
  }

  extractSeries(mpn: string | null | undefined): string {
    return this.seriesTable.resolve(mpn);
  }

  isOfficialReplacement(a: string | null | undefined, b: string | null | undefined): boolean {
    const policy = (this._policy ??= this.replacementPolicy());
    return applyPolicy(policy, a, b);
  }

  getSupportedTypes(): ReadonlySet<ComponentKind> {
    return this.supported;
  }

  /** Default: identical, or same series and part number in another package */
  protected replacementPolicy(): ReplacementPolicy {
    return anyOf(
      identical,
      packageOnlyDifference((mpn) => this.seriesNumberKey(mpn))
    );
  }

  /** Folded MPN with any ordering suffix removed */
  protected baseOf(mpn: string | null | undefined): string {
    return foldMpn(stripPackageSuffix(mpn));
  }

  /** Series plus the digits that follow it ("IRF540N" → "IRF540"); "" if either is missing */
  protected seriesNumberKey(mpn: string): string {
    const base = this.baseOf(mpn);
    const series = this.extractSeries(base);
    if (!series) return "";
    const number = numberAfter(base, series);
    return number ? series + number : "";
  }

  /**
   * MOSFET part without its package letters: series, current rating, channel
   * letter and voltage code ("STD10NF10T4" → "STD10NF10", "NTD20P06L" →
   * "NTD20P06"). Parts without a channel letter fall back to seriesNumberKey.
   */
  protected mosfetPartKey(mpn: string): string {
    const base = this.baseOf(mpn);
    return MOSFET_PART.exec(base)?.[0] ?? this.seriesNumberKey(base);
  }
}
