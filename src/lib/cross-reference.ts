import { foldMpn, stripPackageSuffix } from "./mpn";

export type Polarity = "positive" | "negative" | "npn" | "pnp";

/**
 * One second-source group: part numbers from different vendors that are
 * drop-in equivalents when the captured value code matches.
 * `pattern` must capture the value code (output voltage, device number) in
 * its first group.
 */
export interface CrossReferenceGroup {
  name: string;
  /**
   * Descriptive only; matching never reads it. Opposite polarities stay
   * apart because each polarity is its own group.
   */
  polarity?: Polarity;
  pattern: RegExp;
}

export interface CrossReferenceHit {
  group: CrossReferenceGroup;
  code: string;
}

/**
 * Explicit vendor-to-vendor allow-list. Two MPNs are cross-referenced only
 * when they resolve to the same group with the same value code; there is no
 * inference beyond the listed groups.
 */
export class CrossReferenceTable {
  readonly groups: readonly CrossReferenceGroup[];

  constructor(groups: CrossReferenceGroup[]) {
    this.groups = Object.freeze([...groups]);
  }

  resolve(mpn: string | null | undefined): CrossReferenceHit | undefined {
    const base = foldMpn(stripPackageSuffix(mpn));
    if (!base) return undefined;
    for (const group of this.groups) {
      const match = group.pattern.exec(base);
      if (match?.[1]) return { group, code: match[1] };
    }
    return undefined;
  }

  areCrossReferenced(a: string | null | undefined, b: string | null | undefined): boolean {
    const hitA = this.resolve(a);
    const hitB = this.resolve(b);
    if (!hitA || !hitB) return false;
    return hitA.group === hitB.group && hitA.code === hitB.code;
  }
}

export const LINEAR_REGULATOR_XREF = new CrossReferenceTable([
  {
    name: "78xx fixed positive regulator",
    polarity: "positive",
    pattern: /^(?:LM|MC|UA|KA|L)78(?:M|L)?(\d{2})/,
  },
  {
    name: "79xx fixed negative regulator",
    polarity: "negative",
    pattern: /^(?:LM|MC|UA|KA|L)79(?:M|L)?(\d{2})/,
  },
  {
    name: "317 adjustable positive regulator",
    polarity: "positive",
    pattern: /^(?:LM|MC|L)(317)(?!\d)/,
  },
  {
    name: "337 adjustable negative regulator",
    polarity: "negative",
    pattern: /^(?:LM|MC|L)(337)(?!\d)/,
  },
]);

export const SMALL_SIGNAL_TRANSISTOR_XREF = new CrossReferenceTable([
  { name: "NPN general purpose", polarity: "npn", pattern: /^(?:2N|MMBT|PN)(2222|3904|4401|5551)/ },
  { name: "PNP general purpose", polarity: "pnp", pattern: /^(?:2N|MMBT|PN)(2907|3906|4403|5401)/ },
]);
