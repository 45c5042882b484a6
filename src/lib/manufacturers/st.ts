import { ComponentKind } from "../component-kind";
import { LINEAR_REGULATOR_XREF } from "../cross-reference";
import { BaseHandler } from "./base";
import {
  anyOf,
  crossReferenced,
  identical,
  packageOnlyDifference,
  type ReplacementPolicy,
} from "./replacement";
import type { HandlerDefinition } from "./types";

const ST: HandlerDefinition = {
  name: "st",
  patterns: [
    { kind: ComponentKind.MICROCONTROLLER_ST, pattern: /STM32[A-Z]\d+[A-Z0-9]*/ },
    { kind: ComponentKind.MICROCONTROLLER_ST, pattern: /STM8[A-Z][A-Z0-9]*/ },
    { kind: ComponentKind.MOSFET_ST, pattern: /ST[FPDB]\d+[A-Z0-9]*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_ST, pattern: /L7[89][LM]?\d{2}[A-Z0-9-]*/ },
  ],
  series: [
    { series: "STM32", pattern: /^(STM32[A-Z]\d+)/, kind: ComponentKind.MICROCONTROLLER_ST },
    { series: "STM8", pattern: /^(STM8[A-Z])/, kind: ComponentKind.MICROCONTROLLER_ST },
    { series: "STF", kind: ComponentKind.MOSFET_ST },
    { series: "STP", kind: ComponentKind.MOSFET_ST },
    { series: "STD", kind: ComponentKind.MOSFET_ST },
    { series: "STB", kind: ComponentKind.MOSFET_ST },
    { series: "L78", kind: ComponentKind.VOLTAGE_REGULATOR_ST },
    { series: "L79", kind: ComponentKind.VOLTAGE_REGULATOR_ST },
  ],
};

/** STM32/STM8: second-to-last character of the ordering code */
const MCU_PACKAGES: Record<string, string> = {
  T: "LQFP",
  H: "BGA",
  U: "VFQFPN",
  Y: "WLCSP",
  P: "TSSOP",
};

const MOSFET_PACKAGES: Record<string, string> = {
  STF: "TO-220FP",
  STP: "TO-220",
  STD: "DPAK",
  STB: "D2PAK",
};

const REGULATOR_PACKAGES: Record<string, string> = {
  CV: "TO-220",
  V: "TO-220",
  CP: "TO-220FP",
  P: "TO-220FP",
  CT: "TO-220",
  T: "TO-220",
  CD2T: "D2PAK",
  D2T: "D2PAK",
  CDT: "DPAK",
  DT: "DPAK",
};

const REGULATOR_HEAD = /^L7[89][LM]?\d{2}/;

export class StHandler extends BaseHandler {
  constructor() {
    super(ST);
  }

  override extractPackageCode(mpn: string | null | undefined): string {
    const base = this.baseOf(mpn);
    if (!base) return "";

    switch (this.seriesTable.kindOf(base)) {
      case ComponentKind.MICROCONTROLLER_ST:
        return base.length >= 2 ? (MCU_PACKAGES[base.charAt(base.length - 2)] ?? "") : "";
      case ComponentKind.MOSFET_ST:
        return MOSFET_PACKAGES[base.slice(0, 3)] ?? "";
      case ComponentKind.VOLTAGE_REGULATOR_ST:
        return regulatorPackage(base);
      default:
        return "";
    }
  }

  protected override replacementPolicy(): ReplacementPolicy {
    return anyOf(
      identical,
      packageOnlyDifference((mpn) => this.partKey(mpn)),
      crossReferenced(LINEAR_REGULATOR_XREF)
    );
  }

  /**
   * The part without its package: MCUs drop the package and temperature
   * characters, MOSFETs keep rating and channel, regulators keep the
   * voltage code.
   */
  private partKey(mpn: string): string {
    const base = this.baseOf(mpn);
    switch (this.seriesTable.kindOf(base)) {
      case ComponentKind.MICROCONTROLLER_ST:
        return base.length > this.extractSeries(base).length + 2 ? base.slice(0, -2) : "";
      case ComponentKind.MOSFET_ST:
        return this.mosfetPartKey(base);
      case ComponentKind.VOLTAGE_REGULATOR_ST:
        return REGULATOR_HEAD.exec(base)?.[0] ?? "";
      default:
        return "";
    }
  }
}

function regulatorPackage(base: string): string {
  const head = REGULATOR_HEAD.exec(base);
  if (!head) return "";
  const suffix = base.slice(head[0].length).split("-")[0];
  if (!suffix) return "";
  return REGULATOR_PACKAGES[suffix] ?? REGULATOR_PACKAGES[suffix.replace(/^[A-C]{1,2}/, "")] ?? "";
}
