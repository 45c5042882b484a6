/**
 * Errors raised for programming mistakes only. Expected conditions (blank
 * input, unknown part numbers) never throw; they degrade to "", false or [].
 */
export class MpnClassifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Thrown when a caller tries to mutate a collection handed out as read-only */
export class ImmutableCollectionError extends MpnClassifierError {
  constructor(operation: string) {
    super(`Cannot ${operation} on a read-only collection`);
  }
}

/** Thrown when a pattern is registered after the registry was sealed */
export class RegistrySealedError extends MpnClassifierError {
  constructor(kind: string, owner: string) {
    super(`Pattern registry is sealed; ${owner} cannot register ${kind}`);
  }
}

/** Thrown when a kind hierarchy definition is cyclic or lists a kind twice */
export class KindHierarchyError extends MpnClassifierError {}
