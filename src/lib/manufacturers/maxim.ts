import { ComponentKind } from "../component-kind";
import { BaseHandler } from "./base";
import { anyOf, identical, packageOnlyDifference, type ReplacementPolicy } from "./replacement";
import { trailingLetters } from "./series";
import type { HandlerDefinition } from "./types";

const MAXIM: HandlerDefinition = {
  name: "maxim",
  patterns: [
    { kind: ComponentKind.TEMPERATURE_SENSOR_MAXIM, pattern: /DS18[A-Z0-9]+(?:-[A-Z0-9]+)*/ },
    { kind: ComponentKind.TEMPERATURE_SENSOR_MAXIM, pattern: /MAX6\d{3}[A-Z0-9-]*/ },
    { kind: ComponentKind.INTERFACE_IC_MAXIM, pattern: /MAX232.*/ },
    { kind: ComponentKind.INTERFACE_IC_MAXIM, pattern: /MAX485.*/ },
    { kind: ComponentKind.INTERFACE_IC_MAXIM, pattern: /MAX3\d{3}.*/ },
    // MAX17xx regulators vs MAX17xxx fuel gauges/chargers
    { kind: ComponentKind.VOLTAGE_REGULATOR_MAXIM, pattern: /MAX17\d{2}(?:[A-Z].*)?/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_MAXIM, pattern: /MAX8\d{3}.*/ },
    { kind: ComponentKind.BATTERY_MANAGEMENT_MAXIM, pattern: /MAX17\d{3}.*/ },
  ],
  series: [
    { series: "DS18B20" },
    { series: "DS18", pattern: /^(DS18[A-Z]\d+)/ },
    { series: "MAX17", pattern: /^(MAX17\d{3})/ },
    { series: "MAX", pattern: /^(MAX\d{3,4})/ },
  ],
};

/** Two-letter package field at the end of the ordering code (after pin count/temperature letter) */
const MAXIM_PACKAGES: Record<string, string> = {
  SA: "SOIC",
  SE: "SOIC",
  WE: "SOIC-Wide",
  PA: "PDIP",
  PE: "PDIP",
  UA: "uMAX",
  UB: "uMAX",
  EE: "QSOP",
  UT: "SOT-23",
  UK: "SOT-23",
  ZK: "SOT-23",
  TA: "TDFN",
  TT: "TDFN",
  TE: "TQFN",
};

const DS18_PACKAGES: [suffix: string, pkg: string][] = [
  ["PAR", "TO-92"],
  ["SMD", "SOIC"],
  ["Z", "SO-8"],
];

/**
 * Maxim Integrated (now part of Analog Devices). Ordering codes end in a
 * temperature-range letter and a two-letter package field, optionally
 * followed by "+" (lead-free) or "#"/"-T" (reel).
 */
export class MaximHandler extends BaseHandler {
  constructor() {
    super(MAXIM);
  }

  override extractPackageCode(mpn: string | null | undefined): string {
    const base = this.baseOf(mpn).replace(/-T$/, "");
    if (!base) return "";

    if (base.startsWith("DS18")) {
      return DS18_PACKAGES.find(([suffix]) => base.endsWith(suffix))?.[1] ?? "";
    }
    const letters = trailingLetters(base);
    if (letters.length < 3) return "";
    return MAXIM_PACKAGES[letters.slice(-2)] ?? "";
  }

  protected override replacementPolicy(): ReplacementPolicy {
    return anyOf(
      identical,
      packageOnlyDifference((mpn) => this.extractSeries(mpn))
    );
  }
}
