import { config } from "../config";
import { PatternRegistry } from "../pattern-registry";
import { InfineonHandler } from "./infineon";
import { MaximHandler } from "./maxim";
import { NxpHandler } from "./nxp";
import { OnsemiHandler } from "./onsemi";
import { StHandler } from "./st";
import { TiHandler } from "./ti";
import type { ManufacturerHandler } from "./types";

const HANDLER_FACTORIES: (() => ManufacturerHandler)[] = [
  () => new InfineonHandler(),
  () => new OnsemiHandler(),
  () => new StHandler(),
  () => new MaximHandler(),
  () => new TiHandler(),
  () => new NxpHandler(),
];

/** Fresh handler instances, optionally limited to the given names (case-insensitive) */
export function createHandlers(names?: string[]): ManufacturerHandler[] {
  const all = HANDLER_FACTORIES.map((create) => create());
  if (!names || names.length === 0) return all;

  const lower = new Set(names.map((n) => n.toLowerCase()));
  return all.filter((h) => lower.has(h.name.toLowerCase()));
}

export function getAllHandlerNames(): string[] {
  return createHandlers().map((h) => h.name);
}

/**
 * Register every handler's patterns (in list order) into a new registry and
 * seal it.
 */
export function createPatternRegistry(handlers: readonly ManufacturerHandler[]): PatternRegistry {
  const registry = new PatternRegistry();
  const seen = new Set<string>();

  for (const handler of handlers) {
    if (seen.has(handler.name)) {
      console.warn(
        `${config.logTag("registry")} Duplicate handler name "${handler.name}"; owner-scoped matching will merge their patterns`
      );
    }
    seen.add(handler.name);
    handler.registerPatterns(registry);
  }

  return registry.seal();
}
