import { ComponentKind } from "../component-kind";
import { BaseHandler } from "./base";
import { anyOf, identical, packageOnlyDifference, type ReplacementPolicy } from "./replacement";
import type { HandlerDefinition } from "./types";

const INFINEON: HandlerDefinition = {
  name: "infineon",
  patterns: [
    // HEXFET (legacy International Rectifier naming)
    { kind: ComponentKind.MOSFET_INFINEON, pattern: /IRF[A-Z]?\d.*/ },
    { kind: ComponentKind.MOSFET_INFINEON, pattern: /IRL[A-Z]?\d.*/ },
    // OptiMOS
    { kind: ComponentKind.MOSFET_INFINEON, pattern: /IPP\d.*/ },
    { kind: ComponentKind.MOSFET_INFINEON, pattern: /BSC\d.*/ },
    { kind: ComponentKind.IGBT_INFINEON, pattern: /IK[PW]\d.*/ },
    { kind: ComponentKind.VOLTAGE_REGULATOR_INFINEON, pattern: /IFX\d.*/ },
    { kind: ComponentKind.MICROCONTROLLER_INFINEON, pattern: /XMC\d.*/ },
  ],
  // Declared shortest-first on purpose; the table sorts by specificity.
  series: [
    { series: "IRF" },
    { series: "IRL" },
    { series: "IRFZ" },
    { series: "IRFP" },
    { series: "IRFB" },
    { series: "IPP" },
    { series: "BSC" },
    { series: "IKP" },
    { series: "IKW" },
    { series: "IFX" },
    { series: "XMC", pattern: /^(XMC\d{4})/ },
  ],
};

const HEXFET_PACKAGES: Record<string, string> = {
  N: "TO-220",
  L: "TO-262",
  S: "D2PAK",
  U: "IPAK",
  P: "TO-247",
  B: "TO-263",
  E: "TO-220AB",
};

const IGBT_PACKAGES: Record<string, string> = {
  N: "TO-220",
  P: "TO-247",
  H: "TO-247HV",
  S: "D2PAK",
};

const XMC_PACKAGES: Record<string, string> = {
  T: "TSSOP",
  Q: "TQFP",
  F: "LQFP",
  V: "VQFN",
};

/** Series whose trailing letter is a package code */
const LETTER_CODED = /^(?:IRF|IRL|IKP|IKW)/;

/**
 * Infineon (including the International Rectifier HEXFET line).
 *
 * HEXFET and IGBT parts end in a package letter. Letters outside the known
 * map are returned as-is rather than dropped.
 */
export class InfineonHandler extends BaseHandler {
  constructor() {
    super(INFINEON);
  }

  override extractPackageCode(mpn: string | null | undefined): string {
    const base = this.baseOf(mpn);
    if (!base) return "";

    if (base.startsWith("IRF") || base.startsWith("IRL")) {
      return lastLetterPackage(base, HEXFET_PACKAGES);
    }
    if (base.startsWith("IKP") || base.startsWith("IKW")) {
      return lastLetterPackage(base, IGBT_PACKAGES);
    }
    if (base.startsWith("XMC")) {
      // XMC1202-T028X0064: package letter opens the ordering block
      const block = base.split("-")[1] ?? "";
      return XMC_PACKAGES[block.charAt(0)] ?? "";
    }
    return "";
  }

  protected override replacementPolicy(): ReplacementPolicy {
    return anyOf(
      identical,
      packageOnlyDifference((mpn) =>
        LETTER_CODED.test(this.baseOf(mpn)) ? this.seriesNumberKey(mpn) : ""
      )
    );
  }
}

function lastLetterPackage(base: string, packages: Record<string, string>): string {
  const last = base.charAt(base.length - 1);
  if (!/[A-Z]/.test(last)) return "";
  return packages[last] ?? last;
}
