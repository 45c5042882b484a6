import { type ComponentKind, isVendorKind, kindHierarchy } from "./component-kind";
import { config } from "./config";
import { foldMpn } from "./mpn";
import type { PatternRegistry } from "./pattern-registry";
import { createHandlers, createPatternRegistry } from "./manufacturers/registry";
import type { ManufacturerHandler } from "./manufacturers/types";

export interface ClassifierOptions {
  /** Defaults to a fresh instance of every shipped handler */
  handlers?: ManufacturerHandler[];
  /** Log dispatch decisions; defaults to MPN_DEBUG */
  debug?: boolean;
}

// Labels that wrap an MPN in BOM cells and free text ("MPN:LM358N", "REF-X")
const WORD_PREFIXES = ["IC-", "PART-", "MPN-", "MPN:", "PN:", "P/N:", "REF:", "REF-", "ITEM:", "ITEM-"];
const WORD_SUFFIXES = ["-SMD", "-THT", "-ROHS"];

/**
 * Cross-handler facade over one sealed registry.
 *
 * Usage:
 *   const classifier = new ComponentClassifier();
 *   classifier.detectKind("IRF540N")          // ComponentKind.MOSFET_INFINEON
 *   classifier.detectManufacturer("LM358N")   // "ti"
 */
export class ComponentClassifier {
  readonly handlers: readonly ManufacturerHandler[];
  readonly registry: PatternRegistry;
  private readonly debug: boolean;

  constructor(options: ClassifierOptions = {}) {
    this.handlers = Object.freeze([...(options.handlers ?? createHandlers())]);
    this.registry = createPatternRegistry(this.handlers);
    this.debug = options.debug ?? config.debugMatching;
  }

  matchesKind(mpn: string | null | undefined, kind: ComponentKind | null | undefined): boolean {
    return this.handlers.some((h) => h.match(mpn, kind, this.registry));
  }

  /** Every matching kind, most specialized first, alphabetical within a level */
  detectKinds(mpn: string | null | undefined): ComponentKind[] {
    if (!foldMpn(mpn)) return [];

    const kinds = new Set<ComponentKind>();
    for (const handler of this.handlers) {
      for (const kind of handler.getSupportedTypes()) {
        if (!kinds.has(kind) && handler.match(mpn, kind, this.registry)) kinds.add(kind);
      }
    }
    return [...kinds].sort(bySpecificity);
  }

  detectKind(mpn: string | null | undefined): ComponentKind | undefined {
    return this.detectKinds(mpn)[0];
  }

  /**
   * First handler (list order) that claims the MPN under a vendor kind; failing
   * that, the first that matches it under any kind it supports.
   */
  findHandler(mpn: string | null | undefined): ManufacturerHandler | undefined {
    if (!foldMpn(mpn)) return undefined;

    const handler =
      this.handlers.find((h) => this.claims(h, mpn, isVendorKind)) ??
      this.handlers.find((h) => this.claims(h, mpn, () => true));

    if (this.debug) {
      console.debug(`${config.logTag("classifier")} ${foldMpn(mpn)} → ${handler?.name ?? "no handler"}`);
    }
    return handler;
  }

  detectManufacturer(mpn: string | null | undefined): string | undefined {
    return this.findHandler(mpn)?.name;
  }

  handlersForKind(kind: ComponentKind): ManufacturerHandler[] {
    return this.handlers.filter((h) => h.getSupportedTypes().has(kind));
  }

  getPackageCode(mpn: string | null | undefined): string {
    return this.findHandler(mpn)?.extractPackageCode(mpn) ?? "";
  }

  getSeries(mpn: string | null | undefined): string {
    return this.findHandler(mpn)?.extractSeries(mpn) ?? "";
  }

  /** Can `a` replace `b`? Decided by the handler that recognizes `a` */
  isOfficialReplacement(a: string | null | undefined, b: string | null | undefined): boolean {
    const handler = this.findHandler(a);
    if (!handler) return false;
    return handler.isOfficialReplacement(a, b);
  }

  /**
   * First word of free text (a BOM description, a "P/N: ..." cell) that some
   * handler recognizes, upper-cased with labels stripped.
   */
  findMpnInText(text: string | null | undefined): string | undefined {
    const trimmed = (text ?? "").trim();
    if (!trimmed) return undefined;

    for (const raw of trimmed.split(/\s+|[;,|]/)) {
      const word = cleanWord(raw);
      if (word && this.findHandler(word)) return word;
    }
    if (this.debug) {
      console.debug(`${config.logTag("classifier")} no MPN in "${trimmed}"`);
    }
    return undefined;
  }

  private claims(
    handler: ManufacturerHandler,
    mpn: string | null | undefined,
    accept: (kind: ComponentKind) => boolean
  ): boolean {
    for (const kind of handler.getSupportedTypes()) {
      if (accept(kind) && handler.match(mpn, kind, this.registry)) return true;
    }
    return false;
  }
}

function cleanWord(raw: string): string {
  let word = raw.trim().toUpperCase();

  const eq = word.indexOf("=");
  if (eq >= 0) word = word.slice(eq + 1);

  for (const prefix of WORD_PREFIXES) {
    if (word.startsWith(prefix)) word = word.slice(prefix.length);
  }
  for (const suffix of WORD_SUFFIXES) {
    if (word.endsWith(suffix)) word = word.slice(0, -suffix.length);
  }
  return word.trim();
}

function depth(kind: ComponentKind): number {
  return kindHierarchy.ancestorsOf(kind).length;
}

function bySpecificity(a: ComponentKind, b: ComponentKind): number {
  return depth(b) - depth(a) || (a < b ? -1 : a > b ? 1 : 0);
}
