import type { ComponentKind, KindHierarchy } from "./component-kind";
import { RegistrySealedError } from "./errors";
import { foldMpn } from "./mpn";

export interface PatternEntry {
  readonly kind: ComponentKind;
  readonly matcher: RegExp;
  /** Registry-wide registration counter */
  readonly order: number;
  /** Name of the handler that contributed the entry */
  readonly owner: string;
}

const ANONYMOUS_OWNER = "anonymous";

/**
 * Compile a pattern for full-string, case-insensitive matching. Global and
 * sticky flags are dropped so that `test` never carries lastIndex state.
 */
export function compileMatcher(pattern: string | RegExp): RegExp {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const flags = typeof pattern === "string" ? "" : pattern.flags.replace(/[gyi]/g, "");
  return new RegExp(`^(?:${source})$`, `${flags}i`);
}

/**
 * Kind → ordered matchers, contributed by one or more handlers.
 *
 * Built once (each handler's registerPatterns), then sealed and read-only.
 * Precedence within a kind is registration order, not specificity.
 */
export class PatternRegistry {
  private readonly entries = new Map<ComponentKind, PatternEntry[]>();
  private counter = 0;
  private sealed = false;

  register(kind: ComponentKind, pattern: string | RegExp, owner: string = ANONYMOUS_OWNER): PatternEntry {
    if (this.sealed) throw new RegistrySealedError(kind, owner);

    const entry: PatternEntry = Object.freeze({
      kind,
      matcher: compileMatcher(pattern),
      order: this.counter++,
      owner,
    });
    const list = this.entries.get(kind);
    if (list) {
      list.push(entry);
    } else {
      this.entries.set(kind, [entry]);
    }
    return entry;
  }

  /** Freeze the registry; later register() calls throw */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** Total number of registered entries */
  get size(): number {
    return this.counter;
  }

  /**
   * Canonical classification query: true if ANY matcher registered for the
   * kind (any owner, in registration order) matches the case-folded text.
   */
  matches(text: string | null | undefined, kind: ComponentKind | null | undefined): boolean {
    if (!text || !kind) return false;
    const folded = foldMpn(text);
    if (!folded) return false;
    return (this.entries.get(kind) ?? []).some((e) => e.matcher.test(folded));
  }

  /** Like matches(), restricted to one owner's entries */
  matchesOwned(
    text: string | null | undefined,
    kind: ComponentKind | null | undefined,
    owner: string
  ): boolean {
    if (!text || !kind) return false;
    const folded = foldMpn(text);
    if (!folded) return false;
    return (this.entries.get(kind) ?? []).some((e) => e.owner === owner && e.matcher.test(folded));
  }

  /**
   * matches() on the kind itself, falling back to every registered kind that
   * specializes it.
   */
  matchesWithSpecializations(
    text: string | null | undefined,
    kind: ComponentKind | null | undefined,
    hierarchy: KindHierarchy<ComponentKind>
  ): boolean {
    if (!kind) return false;
    if (this.matches(text, kind)) return true;
    for (const registered of this.entries.keys()) {
      if (hierarchy.specializes(registered, kind) && this.matches(text, registered)) {
        return true;
      }
    }
    return false;
  }

  /**
   * The first-registered matcher for a kind, for introspection only.
   * Later contributors are not reachable through this accessor, so it must
   * not be used for classification; use matches().
   */
  firstPattern(kind: ComponentKind | null | undefined): RegExp | undefined {
    if (!kind) return undefined;
    return this.entries.get(kind)?.[0]?.matcher;
  }

  patternsFor(kind: ComponentKind, owner?: string): readonly PatternEntry[] {
    const list = this.entries.get(kind) ?? [];
    return owner === undefined ? [...list] : list.filter((e) => e.owner === owner);
  }

  hasPattern(kind: ComponentKind): boolean {
    return (this.entries.get(kind)?.length ?? 0) > 0;
  }

  /** Kinds in first-registration order */
  registeredKinds(): ComponentKind[] {
    return [...this.entries.keys()];
  }

  /** Owners that contributed to a kind, in first-registration order */
  ownersOf(kind: ComponentKind): string[] {
    const owners = new Set<string>();
    for (const e of this.entries.get(kind) ?? []) owners.add(e.owner);
    return [...owners];
  }
}
