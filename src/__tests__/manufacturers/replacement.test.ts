import { describe, it, expect, vi } from "vitest";
import { LINEAR_REGULATOR_XREF } from "../../lib/cross-reference";
import {
  anyOf,
  applyPolicy,
  crossReferenced,
  identical,
  packageOnlyDifference,
  ratingDominates,
} from "../../lib/manufacturers/replacement";

// =============================================================================
// Base policies
// =============================================================================

describe("identical", () => {
  it("compares exactly", () => {
    expect(identical("LM358N", "LM358N")).toBe(true);
    expect(identical("LM358N", "LM358DR")).toBe(false);
  });
});

describe("packageOnlyDifference", () => {
  const byFirstFive = (mpn: string) => mpn.slice(0, 5);

  it("accepts parts with the same non-empty key", () => {
    expect(packageOnlyDifference(byFirstFive)("LM358N", "LM358DR")).toBe(true);
    expect(packageOnlyDifference(byFirstFive)("LM358N", "LM324N")).toBe(false);
  });

  it("rejects an empty key even when both sides agree", () => {
    expect(packageOnlyDifference(() => "")("LM358N", "LM358DR")).toBe(false);
  });

  it("asks the package check only once the keys agree", () => {
    const packagesCompatible = vi.fn((_a: string, _b: string) => false);
    const policy = packageOnlyDifference(byFirstFive, packagesCompatible);

    expect(policy("LM358N", "LM324N")).toBe(false);
    expect(packagesCompatible).not.toHaveBeenCalled();

    expect(policy("LM358N", "LM358PW")).toBe(false);
    expect(packagesCompatible).toHaveBeenCalledWith("LM358N", "LM358PW");
  });

  it("accepts when the package check passes", () => {
    const policy = packageOnlyDifference(byFirstFive, () => true);
    expect(policy("LM358N", "LM358DR")).toBe(true);
  });
});

describe("ratingDominates", () => {
  const ratings: Record<string, number> = { A400: 400, A1000: 1000 };
  const policy = ratingDominates((mpn) => ratings[mpn]);

  it("lets a higher or equal rating replace a lower one", () => {
    expect(policy("A1000", "A400")).toBe(true);
    expect(policy("A400", "A400")).toBe(true);
  });

  it("never replaces downward", () => {
    expect(policy("A400", "A1000")).toBe(false);
  });

  it("is false when either rating is unknown", () => {
    expect(policy("A1000", "B200")).toBe(false);
    expect(policy("B200", "A400")).toBe(false);
  });
});

describe("crossReferenced", () => {
  it("delegates to the table", () => {
    const policy = crossReferenced(LINEAR_REGULATOR_XREF);
    expect(policy("LM7805CT", "L7805CV")).toBe(true);
    expect(policy("LM7805CT", "LM7905CT")).toBe(false);
  });
});

// =============================================================================
// Composition
// =============================================================================

describe("anyOf", () => {
  it("stops at the first policy that accepts", () => {
    const first = vi.fn((_a: string, _b: string) => true);
    const second = vi.fn((_a: string, _b: string) => true);

    expect(anyOf(first, second)("A", "B")).toBe(true);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).not.toHaveBeenCalled();
  });

  it("tries every policy before rejecting", () => {
    const first = vi.fn((_a: string, _b: string) => false);
    const second = vi.fn((_a: string, _b: string) => false);

    expect(anyOf(first, second)("A", "B")).toBe(false);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("rejects with no policies", () => {
    expect(anyOf()("A", "A")).toBe(false);
  });
});

describe("applyPolicy", () => {
  it("trims and upper-cases both sides before asking the policy", () => {
    const policy = vi.fn((_a: string, _b: string) => true);
    expect(applyPolicy(policy, " lm358n ", "lm358dr")).toBe(true);
    expect(policy).toHaveBeenCalledWith("LM358N", "LM358DR");
  });

  it("rejects blank input without asking the policy", () => {
    const policy = vi.fn((_a: string, _b: string) => true);
    expect(applyPolicy(policy, "   ", "LM358N")).toBe(false);
    expect(applyPolicy(policy, "LM358N", null)).toBe(false);
    expect(applyPolicy(policy, undefined, undefined)).toBe(false);
    expect(policy).not.toHaveBeenCalled();
  });
});
