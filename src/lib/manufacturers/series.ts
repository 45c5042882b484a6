import type { ComponentKind } from "../component-kind";
import { foldMpn } from "../mpn";
import type { SeriesRule } from "./types";

export interface SeriesMatch {
  rule: SeriesRule;
  series: string;
}

/**
 * Series lookup with specificity fixed at construction: rules are sorted by
 * series length, longest first, so "IRFP" is always tried before "IRF".
 * Ties keep declaration order.
 */
export class SeriesTable {
  readonly rules: readonly SeriesRule[];

  constructor(rules: readonly SeriesRule[]) {
    this.rules = Object.freeze(
      rules
        .map((rule, index) => ({ rule, index }))
        .sort((a, b) => b.rule.series.length - a.rule.series.length || a.index - b.index)
        .map(({ rule }) => rule)
    );
  }

  match(mpn: string | null | undefined): SeriesMatch | undefined {
    const folded = foldMpn(mpn);
    if (!folded) return undefined;

    for (const rule of this.rules) {
      if (!rule.pattern) {
        if (folded.startsWith(rule.series)) return { rule, series: rule.series };
        continue;
      }
      const hit = rule.pattern.exec(folded);
      if (hit) return { rule, series: hit[1] ?? rule.series };
    }
    return undefined;
  }

  /** Matching series, or "" */
  resolve(mpn: string | null | undefined): string {
    return this.match(mpn)?.series ?? "";
  }

  kindOf(mpn: string | null | undefined): ComponentKind | undefined {
    return this.match(mpn)?.rule.kind;
  }
}

/** Digits immediately following `prefix` ("IRF540N", "IRF" → "540") */
export function numberAfter(mpn: string, prefix: string): string {
  const match = /^\d+/.exec(mpn.slice(prefix.length));
  return match ? match[0] : "";
}

/** Letters after the last digit ("LM7805CT" → "CT") */
export function trailingLetters(mpn: string): string {
  const match = /\d([A-Z]+)$/.exec(mpn);
  return match ? match[1] : "";
}

/** Text after the last hyphen, if any */
export function afterLastHyphen(mpn: string): string {
  const idx = mpn.lastIndexOf("-");
  return idx > 0 && idx < mpn.length - 1 ? mpn.slice(idx + 1) : "";
}
