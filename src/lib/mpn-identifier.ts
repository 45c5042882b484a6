import { getSearchVariations, normalizeMpn, splitPackageSuffix } from "./mpn";

/**
 * Immutable view over a raw MPN string. All derived properties are
 * lazy-computed and cached.
 *
 * Usage:
 *   const id = new MpnIdentifier(" TJA1050T/CM,118 ");
 *   id.base     // "TJA1050T"
 *   id.suffix   // "/CM,118"
 */
export class MpnIdentifier {
  readonly raw: string;

  private _trimmed?: string;
  private _split?: { base: string; suffix: string | undefined };
  private _variations?: readonly string[];
  private _normalized?: string;

  constructor(raw: string) {
    this.raw = raw;
  }

  /**
   * Identifier for the first candidate that is a non-blank string. BOM rows
   * often carry the part number in one of several columns ("MPN", "Mfr PN",
   * "Part Number"); pass them in preference order.
   */
  static from(...candidates: unknown[]): MpnIdentifier | undefined {
    const mpn = candidates.find((c): c is string => typeof c === "string" && c.trim() !== "");
    return mpn === undefined ? undefined : new MpnIdentifier(mpn);
  }

  get trimmed(): string {
    return (this._trimmed ??= this.raw.trim());
  }

  /** Base part number with the ordering/packaging suffix removed */
  get base(): string {
    return this.split.base;
  }

  /** Delimiter + payload, e.g. "#PBF" or "/CM,118" */
  get suffix(): string | undefined {
    return this.split.suffix;
  }

  get hasSuffix(): boolean {
    return this.split.suffix !== undefined;
  }

  /** Original first, then base when it differs */
  get variations(): readonly string[] {
    return (this._variations ??= Object.freeze(getSearchVariations(this.raw)));
  }

  /** Upper-case alphanumerics only */
  get normalized(): string {
    return (this._normalized ??= normalizeMpn(this.raw));
  }

  /** Suffix-insensitive, case-insensitive comparison */
  isEquivalentTo(other: MpnIdentifier | string): boolean {
    const that = typeof other === "string" ? new MpnIdentifier(other) : other;
    if (!this.base || !that.base) return false;
    return this.base.toUpperCase() === that.base.toUpperCase();
  }

  private get split(): { base: string; suffix: string | undefined } {
    return (this._split ??= splitPackageSuffix(this.raw));
  }
}
