import { ImmutableCollectionError } from "./errors";

/**
 * A Set whose contents are fixed at construction. The mutators throw, so a
 * caller that casts away `ReadonlySet` still cannot change it.
 */
export class FrozenSet<T> extends Set<T> {
  constructor(items: Iterable<T> = []) {
    super();
    for (const item of items) super.add(item);
  }

  override add(_value: T): this {
    throw new ImmutableCollectionError("add");
  }

  override delete(_value: T): boolean {
    throw new ImmutableCollectionError("delete");
  }

  override clear(): void {
    throw new ImmutableCollectionError("clear");
  }
}

/** The one way supported-kind sets are built. */
export function readonlySet<T>(items: Iterable<T>): ReadonlySet<T> {
  return new FrozenSet(items);
}
