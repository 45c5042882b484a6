import { ComponentKind } from "../component-kind";
import { BaseHandler } from "./base";
import { anyOf, identical, packageOnlyDifference, type ReplacementPolicy } from "./replacement";
import type { HandlerDefinition } from "./types";

const NXP: HandlerDefinition = {
  name: "nxp",
  patterns: [
    { kind: ComponentKind.INTERFACE_IC_NXP, pattern: /TJA1\d{3}[A-Z0-9]*/ },
    { kind: ComponentKind.INTERFACE_IC_NXP, pattern: /PCA9[56]\d{2}[A-Z0-9]*/ },
    { kind: ComponentKind.MICROCONTROLLER_NXP, pattern: /LPC\d{2,4}[A-Z0-9]*/ },
  ],
  series: [
    { series: "TJA", pattern: /^(TJA1\d{3})/ },
    { series: "PCA", pattern: /^(PCA9[56]\d{2})/ },
    { series: "LPC", pattern: /^(LPC\d+(?:[A-Z]\d+)?)/ },
  ],
};

const INTERFACE_PACKAGES: Record<string, string> = {
  T: "SO-8",
  TK: "HVSON-8",
  D: "SOIC",
  PW: "TSSOP",
  BS: "HVQFN",
};

const LPC_PACKAGES: Record<string, string> = {
  FBD: "LQFP",
  JBD: "LQFP",
  FHN: "HVQFN",
  JHN: "HVQFN",
  FET: "TFBGA",
};

/** LPC part: digits, optional letter+digits sub-family (LPC11U24), then the package letters */
const LPC_ORDERING = /^LPC\d+(?:[A-Z]\d+)?([A-Z]+)/;

export class NxpHandler extends BaseHandler {
  constructor() {
    super(NXP);
  }

  override extractPackageCode(mpn: string | null | undefined): string {
    const base = this.baseOf(mpn);
    if (!base) return "";

    if (base.startsWith("LPC")) {
      const ordering = LPC_ORDERING.exec(base);
      return ordering ? (LPC_PACKAGES[ordering[1]] ?? "") : "";
    }
    const series = this.extractSeries(base);
    if (!series) return "";
    return INTERFACE_PACKAGES[base.slice(series.length)] ?? "";
  }

  protected override replacementPolicy(): ReplacementPolicy {
    return anyOf(
      identical,
      packageOnlyDifference((mpn) => this.extractSeries(mpn))
    );
  }
}
