import { ComponentKind } from "../component-kind";
import { LINEAR_REGULATOR_XREF } from "../cross-reference";
import { lookupPackageCode } from "../package-codes";
import { BaseHandler } from "./base";
import {
  anyOf,
  crossReferenced,
  identical,
  packageOnlyDifference,
  type ReplacementPolicy,
} from "./replacement";
import { trailingLetters } from "./series";
import type { HandlerDefinition } from "./types";

const TI: HandlerDefinition = {
  name: "ti",
  patterns: [
    { kind: ComponentKind.VOLTAGE_REGULATOR_TI, pattern: /(?:LM|UA)78[LM]?\d{2}[A-Z0-9]*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_TI, pattern: /(?:LM|UA)79[LM]?\d{2}[A-Z0-9]*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_TI, pattern: /LM317[A-Z0-9]*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_TI, pattern: /TPS7[A-Z]?\d+[A-Z0-9]*/ },
    { kind: ComponentKind.OPAMP_TI, pattern: /LM358[A-Z0-9]*/ },
    { kind: ComponentKind.OPAMP_TI, pattern: /LM324[A-Z0-9]*/ },
    { kind: ComponentKind.OPAMP_TI, pattern: /TL07[1-4][A-Z0-9]*/ },
    { kind: ComponentKind.OPAMP_TI, pattern: /OPA\d+[A-Z0-9]*/ },
    { kind: ComponentKind.MICROCONTROLLER_TI, pattern: /MSP430[A-Z0-9]+/ },
  ],
  series: [
    { series: "LM78", pattern: /^(LM78[LM]?\d{2})/, kind: ComponentKind.VOLTAGE_REGULATOR_TI },
    { series: "LM79", pattern: /^(LM79[LM]?\d{2})/, kind: ComponentKind.VOLTAGE_REGULATOR_TI },
    { series: "UA78", pattern: /^(UA78[LM]?\d{2})/, kind: ComponentKind.VOLTAGE_REGULATOR_TI },
    { series: "UA79", pattern: /^(UA79[LM]?\d{2})/, kind: ComponentKind.VOLTAGE_REGULATOR_TI },
    { series: "LM317", kind: ComponentKind.VOLTAGE_REGULATOR_TI },
    { series: "TPS7", pattern: /^(TPS7[A-Z]?\d+)/, kind: ComponentKind.VOLTAGE_REGULATOR_TI },
    { series: "LM358", kind: ComponentKind.OPAMP_TI },
    { series: "LM324", kind: ComponentKind.OPAMP_TI },
    { series: "TL07", pattern: /^(TL07[1-4])/, kind: ComponentKind.OPAMP_TI },
    { series: "OPA", pattern: /^(OPA\d+)/, kind: ComponentKind.OPAMP_TI },
    { series: "MSP430", pattern: /^(MSP430[A-Z]+\d+)/, kind: ComponentKind.MICROCONTROLLER_TI },
  ],
};

/** Regulator suffixes that differ from the shared code table ("DT" is SOT-223 here, not TSSOP) */
const REGULATOR_PACKAGES: Record<string, string> = {
  CT: "TO-220",
  T: "TO-220",
  DT: "SOT-223",
  MP: "SOT-223",
  KC: "TO-252",
  KV: "TO-252",
};

const INTERCHANGEABLE_REGULATOR_PACKAGES = new Set(["TO-220", "TO-252", "SOT-223"]);
const INTERCHANGEABLE_OPAMP_PACKAGES = new Set(["DIP", "SOIC"]);

/** MSP430 ordering code: temperature letter, package code, pin count, optional reel R */
const MSP430_ORDERING = /[IT]([A-Z]{1,3})\d+R?$/;

/**
 * Texas Instruments. Package codes follow the shared table, with a trailing
 * reel "R" (DGKR, DCYR) ignored.
 */
export class TiHandler extends BaseHandler {
  constructor() {
    super(TI);
  }

  override extractPackageCode(mpn: string | null | undefined): string {
    const base = this.baseOf(mpn);
    if (!base) return "";

    const kind = this.seriesTable.kindOf(base);
    if (kind === ComponentKind.MICROCONTROLLER_TI) {
      const ordering = MSP430_ORDERING.exec(base);
      return ordering ? lookupPackageCode(ordering[1]) : "";
    }

    const letters = trailingLetters(base);
    if (!letters) return "";
    if (kind === ComponentKind.VOLTAGE_REGULATOR_TI && REGULATOR_PACKAGES[letters]) {
      return REGULATOR_PACKAGES[letters];
    }
    // Full suffix, then without reel R, then without a leading grade letter
    const candidates = [letters, dropReel(letters), letters.slice(1), dropReel(letters.slice(1))];
    for (const candidate of candidates) {
      const pkg = lookupPackageCode(candidate);
      if (pkg) return pkg;
    }
    return "";
  }

  protected override replacementPolicy(): ReplacementPolicy {
    return anyOf(
      identical,
      crossReferenced(LINEAR_REGULATOR_XREF),
      packageOnlyDifference(
        (mpn) => this.extractSeries(mpn),
        (a, b) => this.packagesInterchangeable(a, b)
      )
    );
  }

  private packagesInterchangeable(a: string, b: string): boolean {
    const pkgA = this.extractPackageCode(a);
    const pkgB = this.extractPackageCode(b);
    if (pkgA === pkgB) return true;

    switch (this.seriesTable.kindOf(a)) {
      case ComponentKind.VOLTAGE_REGULATOR_TI:
        return INTERCHANGEABLE_REGULATOR_PACKAGES.has(pkgA) && INTERCHANGEABLE_REGULATOR_PACKAGES.has(pkgB);
      case ComponentKind.OPAMP_TI:
        return INTERCHANGEABLE_OPAMP_PACKAGES.has(pkgA) && INTERCHANGEABLE_OPAMP_PACKAGES.has(pkgB);
      default:
        return false;
    }
  }
}

function dropReel(letters: string): string {
  return letters.length > 1 && letters.endsWith("R") ? letters.slice(0, -1) : letters;
}
