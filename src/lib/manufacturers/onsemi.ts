import { ComponentKind } from "../component-kind";
import { LINEAR_REGULATOR_XREF, SMALL_SIGNAL_TRANSISTOR_XREF } from "../cross-reference";
import { lookupPackageCode } from "../package-codes";
import { BaseHandler } from "./base";
import {
  anyOf,
  crossReferenced,
  identical,
  packageOnlyDifference,
  ratingDominates,
  type ReplacementPolicy,
} from "./replacement";
import { trailingLetters } from "./series";
import type { HandlerDefinition } from "./types";

const ONSEMI: HandlerDefinition = {
  name: "onsemi",
  patterns: [
    { kind: ComponentKind.DIODE_ONSEMI, pattern: /RL20[1-7].*/ },
    { kind: ComponentKind.DIODE_ONSEMI, pattern: /MUR\d+.*/ },
    { kind: ComponentKind.DIODE_ONSEMI, pattern: /MBRS\d+.*/ },
    { kind: ComponentKind.DIODE_ONSEMI, pattern: /MBR\d+.*/ },
    { kind: ComponentKind.DIODE_ONSEMI, pattern: /1N47\d{2}.*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_ONSEMI, pattern: /MC78[LM]?\d{2}.*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_ONSEMI, pattern: /MC79[LM]?\d{2}.*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_ONSEMI, pattern: /NCP\d{3,4}.*/ },
    { kind: ComponentKind.MOSFET_ONSEMI, pattern: /NTD\d+.*/ },
    { kind: ComponentKind.MOSFET_ONSEMI, pattern: /NTP\d+.*/ },
    { kind: ComponentKind.MOSFET_ONSEMI, pattern: /FQP\d+.*/ },
    { kind: ComponentKind.MOSFET_ONSEMI, pattern: /FDP\d+.*/ },
    // Small-signal BJTs have no vendor-specific kind
    { kind: ComponentKind.TRANSISTOR, pattern: /2N\d{4}.*/ },
    { kind: ComponentKind.TRANSISTOR, pattern: /MMBT\d{4}.*/ },
  ],
  series: [
    { series: "RL20", pattern: /^RL20[1-7]/ },
    { series: "MUR" },
    { series: "MBRS" },
    { series: "MBR" },
    { series: "1N47", pattern: /^1N47\d{2}/ },
    { series: "MC78" },
    { series: "MC79" },
    { series: "NCP" },
    { series: "NTD" },
    { series: "NTP" },
    { series: "FQP" },
    { series: "FDP" },
    { series: "2N", pattern: /^2N\d{4}/ },
    { series: "MMBT" },
  ],
};

/** RL20x general-purpose rectifiers: last digit → reverse voltage */
const RL20X_VOLTAGE: Record<string, number> = {
  "1": 50,
  "2": 100,
  "3": 200,
  "4": 400,
  "5": 600,
  "6": 800,
  "7": 1000,
};

const MOSFET_SERIES = /^(?:NTD|NTP|FQP|FDP)/;

/** Package fixed by series */
const SERIES_PACKAGES: [prefix: string, pkg: string][] = [
  ["RL20", "DO-41"],
  ["MBRS", "SMB"],
  ["NTD", "DPAK"],
  ["NTP", "TO-220"],
  ["FQP", "TO-220"],
  ["FDP", "TO-220"],
  ["MMBT", "SOT-23"],
  ["2N", "TO-92"],
];

/**
 * onsemi (including the Fairchild MOSFET lines).
 *
 * RL20x rectifiers are replaced upward only: a higher-voltage part stands in
 * for a lower one.
 */
export class OnsemiHandler extends BaseHandler {
  constructor() {
    super(ONSEMI);
  }

  override extractPackageCode(mpn: string | null | undefined): string {
    const base = this.baseOf(mpn);
    if (!base) return "";

    // Axial MUR/MBR parts; a trailing T marks the TO-220 variant
    if (base.startsWith("MUR") || (base.startsWith("MBR") && !base.startsWith("MBRS"))) {
      return base.endsWith("T") ? "TO-220" : "DO-41";
    }
    const fixed = SERIES_PACKAGES.find(([prefix]) => base.startsWith(prefix));
    if (fixed) return fixed[1];

    if (/^MC7[89]/.test(base)) {
      // trailing G marks the Pb-free version
      const letters = trailingLetters(base);
      return lookupPackageCode(letters) || lookupPackageCode(letters.replace(/(?<=.)G$/, ""));
    }
    return "";
  }

  protected override replacementPolicy(): ReplacementPolicy {
    return anyOf(
      ratingDominates(rl20xVoltage),
      identical,
      packageOnlyDifference((mpn) => this.partKey(mpn)),
      crossReferenced(LINEAR_REGULATOR_XREF),
      crossReferenced(SMALL_SIGNAL_TRANSISTOR_XREF)
    );
  }

  /** RL20x parts are compared by rating only; MOSFETs keep their channel letter */
  private partKey(mpn: string): string {
    if (rl20xVoltage(mpn) !== undefined) return "";
    return MOSFET_SERIES.test(mpn) ? this.mosfetPartKey(mpn) : this.seriesNumberKey(mpn);
  }
}

function rl20xVoltage(mpn: string): number | undefined {
  const match = /^RL20([1-7])(?!\d)/.exec(mpn);
  return match ? RL20X_VOLTAGE[match[1]] : undefined;
}
