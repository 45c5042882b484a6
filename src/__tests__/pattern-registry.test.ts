import { describe, it, expect } from "vitest";
import { ComponentKind, kindHierarchy } from "../lib/component-kind";
import { RegistrySealedError } from "../lib/errors";
import { PatternRegistry, compileMatcher } from "../lib/pattern-registry";

function registry(): PatternRegistry {
  const reg = new PatternRegistry();
  reg.register(ComponentKind.MOSFET_INFINEON, /IRF\d.*/, "first");
  reg.register(ComponentKind.MOSFET_INFINEON, /IPP\d.*/, "second");
  reg.register(ComponentKind.OPAMP_TI, "LM358[A-Z]*", "second");
  return reg;
}

describe("compileMatcher", () => {
  it("anchors the whole string", () => {
    const m = compileMatcher("LM358");
    expect(m.test("LM358")).toBe(true);
    expect(m.test("XLM358")).toBe(false);
    expect(m.test("LM3580")).toBe(false);
  });

  it("is case-insensitive and drops global/sticky flags", () => {
    const m = compileMatcher(/abc\d/gy);
    expect(m.flags).toBe("i");
    expect(m.test("ABC1")).toBe(true);
    expect(m.test("ABC1")).toBe(true);
  });

  it("keeps alternation inside the anchors", () => {
    const m = compileMatcher("LM358|LM324");
    expect(m.test("LM324")).toBe(true);
    expect(m.test("LM324N")).toBe(false);
  });
});

describe("PatternRegistry", () => {
  describe("matches", () => {
    it("tests every matcher registered for the kind", () => {
      const reg = registry();
      expect(reg.matches("IRF540N", ComponentKind.MOSFET_INFINEON)).toBe(true);
      expect(reg.matches("IPP60R099C6", ComponentKind.MOSFET_INFINEON)).toBe(true);
    });

    it("folds case and surrounding whitespace", () => {
      expect(registry().matches("  irf540n ", ComponentKind.MOSFET_INFINEON)).toBe(true);
    });

    it("is false for absent, blank or unregistered input", () => {
      const reg = registry();
      expect(reg.matches(null, ComponentKind.MOSFET_INFINEON)).toBe(false);
      expect(reg.matches("", ComponentKind.MOSFET_INFINEON)).toBe(false);
      expect(reg.matches("   ", ComponentKind.MOSFET_INFINEON)).toBe(false);
      expect(reg.matches("IRF540N", null)).toBe(false);
      expect(reg.matches("IRF540N", ComponentKind.DIODE)).toBe(false);
    });

    it("does not consult other kinds", () => {
      expect(registry().matches("LM358N", ComponentKind.MOSFET_INFINEON)).toBe(false);
    });
  });

  describe("matchesOwned", () => {
    it("only tests the owner's matchers", () => {
      const reg = registry();
      expect(reg.matchesOwned("IRF540N", ComponentKind.MOSFET_INFINEON, "first")).toBe(true);
      expect(reg.matchesOwned("IRF540N", ComponentKind.MOSFET_INFINEON, "second")).toBe(false);
      expect(reg.matchesOwned("IPP60R099C6", ComponentKind.MOSFET_INFINEON, "second")).toBe(true);
    });
  });

  describe("matchesWithSpecializations", () => {
    it("falls back to registered kinds that specialize the requested one", () => {
      const reg = registry();
      expect(reg.matchesWithSpecializations("IRF540N", ComponentKind.MOSFET, kindHierarchy)).toBe(true);
      expect(reg.matchesWithSpecializations("IRF540N", ComponentKind.TRANSISTOR, kindHierarchy)).toBe(true);
      expect(reg.matchesWithSpecializations("LM358N", ComponentKind.OPAMP, kindHierarchy)).toBe(true);
    });

    it("never widens to unrelated kinds", () => {
      expect(registry().matchesWithSpecializations("IRF540N", ComponentKind.IC, kindHierarchy)).toBe(false);
    });
  });

  describe("firstPattern", () => {
    it("returns only the first-registered matcher for a kind", () => {
      const reg = registry();
      const first = reg.firstPattern(ComponentKind.MOSFET_INFINEON);
      expect(first?.source).toBe("^(?:IRF\\d.*)$");
      // the second contributor is invisible through this accessor
      expect(first?.test("IPP60R099C6")).toBe(false);
      expect(reg.matches("IPP60R099C6", ComponentKind.MOSFET_INFINEON)).toBe(true);
    });

    it("is undefined for unknown or absent kinds", () => {
      expect(registry().firstPattern(ComponentKind.DIODE)).toBeUndefined();
      expect(registry().firstPattern(undefined)).toBeUndefined();
    });
  });

  describe("introspection", () => {
    it("reports entries in registration order", () => {
      const reg = registry();
      expect(reg.size).toBe(3);
      expect(reg.patternsFor(ComponentKind.MOSFET_INFINEON).map((e) => e.order)).toEqual([0, 1]);
      expect(reg.patternsFor(ComponentKind.MOSFET_INFINEON, "second").map((e) => e.owner)).toEqual([
        "second",
      ]);
      expect(reg.registeredKinds()).toEqual([ComponentKind.MOSFET_INFINEON, ComponentKind.OPAMP_TI]);
      expect(reg.ownersOf(ComponentKind.MOSFET_INFINEON)).toEqual(["first", "second"]);
      expect(reg.hasPattern(ComponentKind.OPAMP_TI)).toBe(true);
      expect(reg.hasPattern(ComponentKind.DIODE)).toBe(false);
    });

    it("defaults the owner to anonymous", () => {
      const reg = new PatternRegistry();
      expect(reg.register(ComponentKind.DIODE, "1N4148").owner).toBe("anonymous");
    });

    it("returns frozen entries", () => {
      const entry = registry().patternsFor(ComponentKind.OPAMP_TI)[0];
      expect(Object.isFrozen(entry)).toBe(true);
    });
  });

  describe("seal", () => {
    it("rejects registration once sealed", () => {
      const reg = registry().seal();
      expect(reg.isSealed).toBe(true);
      expect(() => reg.register(ComponentKind.DIODE, "1N4148", "late")).toThrow(RegistrySealedError);
      expect(reg.size).toBe(3);
    });

    it("keeps answering queries after sealing", () => {
      const reg = registry().seal();
      expect(reg.matches("LM358N", ComponentKind.OPAMP_TI)).toBe(true);
    });
  });

  it("keeps independently built registries separate", () => {
    const a = registry();
    const b = new PatternRegistry();
    b.register(ComponentKind.DIODE, "1N4148");
    expect(a.matches("1N4148", ComponentKind.DIODE)).toBe(false);
    expect(b.matches("IRF540N", ComponentKind.MOSFET_INFINEON)).toBe(false);
    expect(b.matches("1N4148", ComponentKind.DIODE)).toBe(true);
  });
});
