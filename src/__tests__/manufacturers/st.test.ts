import { describe, it, expect } from "vitest";
import { ComponentKind } from "../../lib/component-kind";
import { createPatternRegistry } from "../../lib/manufacturers/registry";
import { StHandler } from "../../lib/manufacturers/st";

const handler = new StHandler();
const registry = createPatternRegistry([handler]);

describe("StHandler", () => {
  describe("match", () => {
    it("matches an STM32 part under the generic microcontroller kind", () => {
      expect(handler.match("STM32F103C8T6", ComponentKind.MICROCONTROLLER, registry)).toBe(true);
      expect(handler.match("STM32F103C8T6", ComponentKind.MICROCONTROLLER_ST, registry)).toBe(true);
    });

    it.each([
      ["STM8S003F3P6", ComponentKind.MICROCONTROLLER],
      ["STP55NF06L", ComponentKind.MOSFET_ST],
      ["STF13NM60N", ComponentKind.MOSFET],
      ["STD20NF06LT4", ComponentKind.TRANSISTOR],
      ["L7805CV", ComponentKind.VOLTAGE_REGULATOR_ST],
      ["L78M05CDT", ComponentKind.VOLTAGE_REGULATOR],
      ["L7805CD2T-TR", ComponentKind.VOLTAGE_REGULATOR],
    ])("%s matches %s", (mpn, kind) => {
      expect(handler.match(mpn, kind, registry)).toBe(true);
    });

    it("is case-insensitive", () => {
      expect(handler.match("stm32f103c8t6", ComponentKind.MICROCONTROLLER, registry)).toBe(true);
      expect(handler.match("Stm32F103c8T6", ComponentKind.MICROCONTROLLER_ST, registry)).toBe(true);
    });

    it("keeps kinds apart", () => {
      expect(handler.match("STM32F103C8T6", ComponentKind.MOSFET, registry)).toBe(false);
      expect(handler.match("L7805CV", ComponentKind.MICROCONTROLLER, registry)).toBe(false);
      expect(handler.match("LM7805CT", ComponentKind.VOLTAGE_REGULATOR, registry)).toBe(false);
    });
  });

  describe("extractSeries", () => {
    it.each([
      ["STM32F103C8T6", "STM32F103"],
      ["STM32L011F4U6", "STM32L011"],
      ["STM8S003F3P6", "STM8S"],
      ["STP55NF06L", "STP"],
      ["STB80NF55-08T4", "STB"],
      ["L7805CV", "L78"],
      ["L7912CV", "L79"],
    ])("%s → %s", (mpn, series) => {
      expect(handler.extractSeries(mpn)).toBe(series);
    });
  });

  describe("extractPackageCode", () => {
    it.each([
      ["STM32F103C8T6", "LQFP"],
      ["STM32F407VGH6", "BGA"],
      ["STM32L011F4U6", "VFQFPN"],
      ["STM32L011D4Y6", "WLCSP"],
      ["STM8S003F3P6", "TSSOP"],
      ["STP55NF06L", "TO-220"],
      ["STF13NM60N", "TO-220FP"],
      ["STD20NF06LT4", "DPAK"],
      ["STB80NF55-08T4", "D2PAK"],
      ["L7805CV", "TO-220"],
      ["L7805ABV", "TO-220"],
      ["L7812CP", "TO-220FP"],
      ["L7805CD2T-TR", "D2PAK"],
      ["L78M05CDT", "DPAK"],
    ])("%s → %s", (mpn, pkg) => {
      expect(handler.extractPackageCode(mpn)).toBe(pkg);
    });

    it("returns empty string for unknown codes", () => {
      expect(handler.extractPackageCode("STM32F103C8")).toBe("");
      expect(handler.extractPackageCode("L7805")).toBe("");
      expect(handler.extractPackageCode("L7805XX")).toBe("");
      expect(handler.extractPackageCode("LM358N")).toBe("");
    });
  });

  describe("isOfficialReplacement", () => {
    it("accepts an MCU with another temperature grade or package", () => {
      expect(handler.isOfficialReplacement("STM32F103C8T6", "STM32F103C8T7")).toBe(true);
      expect(handler.isOfficialReplacement("STM32F103C8T6", "STM32F103C8H6")).toBe(true);
    });

    it("rejects an MCU with a different memory size", () => {
      expect(handler.isOfficialReplacement("STM32F103C8T6", "STM32F103CBT6")).toBe(false);
    });

    it("matches MOSFETs on series and rating", () => {
      expect(handler.isOfficialReplacement("STP55NF06L", "STP55NF06")).toBe(true);
      expect(handler.isOfficialReplacement("STP55NF06L", "STF55NF06")).toBe(false);
    });

    it("keeps the channel and voltage code in the MOSFET key", () => {
      expect(handler.isOfficialReplacement("STD10NF10", "STD10NF10T4")).toBe(true);
      expect(handler.isOfficialReplacement("STD10NF10", "STD10PF06")).toBe(false);
      expect(handler.isOfficialReplacement("STD10PF06", "STD10NF06")).toBe(false);
      expect(handler.isOfficialReplacement("STP55NF06", "STP55NF10")).toBe(false);
    });

    it("matches regulators on voltage, across packages and vendors", () => {
      expect(handler.isOfficialReplacement("L7805CV", "L7805CD2T")).toBe(true);
      expect(handler.isOfficialReplacement("L7805CV", "LM7805CT")).toBe(true);
      expect(handler.isOfficialReplacement("L7805CV", "L7812CV")).toBe(false);
      expect(handler.isOfficialReplacement("L7805CV", "L7905CV")).toBe(false);
    });

    it("is reflexive for recognized parts", () => {
      for (const mpn of ["STM32F103C8T6", "STP55NF06L", "L7805CV"]) {
        expect(handler.isOfficialReplacement(mpn, mpn)).toBe(true);
      }
    });
  });
});
