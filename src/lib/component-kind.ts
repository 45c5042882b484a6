import { KindHierarchyError } from "./errors";

// ===== Kinds =====
// Generic kinds are bare names; vendor-specialized kinds are "GENERIC:VENDOR".

export enum ComponentKind {
  IC = "IC",
  DIODE = "DIODE",
  TRANSISTOR = "TRANSISTOR",
  MOSFET = "MOSFET",
  IGBT = "IGBT",
  VOLTAGE_REGULATOR = "VOLTAGE_REGULATOR",
  OPAMP = "OPAMP",
  MICROCONTROLLER = "MICROCONTROLLER",
  INTERFACE_IC = "INTERFACE_IC",
  SENSOR = "SENSOR",
  TEMPERATURE_SENSOR = "TEMPERATURE_SENSOR",
  BATTERY_MANAGEMENT = "BATTERY_MANAGEMENT",

  // Infineon
  MOSFET_INFINEON = "MOSFET:INFINEON",
  IGBT_INFINEON = "IGBT:INFINEON",
  VOLTAGE_REGULATOR_INFINEON = "VOLTAGE_REGULATOR:INFINEON",
  MICROCONTROLLER_INFINEON = "MICROCONTROLLER:INFINEON",

  // onsemi
  DIODE_ONSEMI = "DIODE:ONSEMI",
  MOSFET_ONSEMI = "MOSFET:ONSEMI",
  VOLTAGE_REGULATOR_ONSEMI = "VOLTAGE_REGULATOR:ONSEMI",

  // STMicroelectronics
  MICROCONTROLLER_ST = "MICROCONTROLLER:ST",
  MOSFET_ST = "MOSFET:ST",
  VOLTAGE_REGULATOR_ST = "VOLTAGE_REGULATOR:ST",

  // Maxim
  INTERFACE_IC_MAXIM = "INTERFACE_IC:MAXIM",
  TEMPERATURE_SENSOR_MAXIM = "TEMPERATURE_SENSOR:MAXIM",
  VOLTAGE_REGULATOR_MAXIM = "VOLTAGE_REGULATOR:MAXIM",
  BATTERY_MANAGEMENT_MAXIM = "BATTERY_MANAGEMENT:MAXIM",

  // Texas Instruments
  VOLTAGE_REGULATOR_TI = "VOLTAGE_REGULATOR:TI",
  OPAMP_TI = "OPAMP:TI",
  MICROCONTROLLER_TI = "MICROCONTROLLER:TI",

  // NXP
  INTERFACE_IC_NXP = "INTERFACE_IC:NXP",
  MICROCONTROLLER_NXP = "MICROCONTROLLER:NXP",
}

// ===== Hierarchy =====
// child → parent. Fixed at startup; every specialized kind has exactly one parent.

const KIND_PARENTS: [ComponentKind, ComponentKind][] = [
  [ComponentKind.MOSFET, ComponentKind.TRANSISTOR],
  [ComponentKind.IGBT, ComponentKind.TRANSISTOR],
  [ComponentKind.OPAMP, ComponentKind.IC],
  [ComponentKind.INTERFACE_IC, ComponentKind.IC],
  [ComponentKind.BATTERY_MANAGEMENT, ComponentKind.IC],
  [ComponentKind.TEMPERATURE_SENSOR, ComponentKind.SENSOR],

  [ComponentKind.MOSFET_INFINEON, ComponentKind.MOSFET],
  [ComponentKind.IGBT_INFINEON, ComponentKind.IGBT],
  [ComponentKind.VOLTAGE_REGULATOR_INFINEON, ComponentKind.VOLTAGE_REGULATOR],
  [ComponentKind.MICROCONTROLLER_INFINEON, ComponentKind.MICROCONTROLLER],

  [ComponentKind.DIODE_ONSEMI, ComponentKind.DIODE],
  [ComponentKind.MOSFET_ONSEMI, ComponentKind.MOSFET],
  [ComponentKind.VOLTAGE_REGULATOR_ONSEMI, ComponentKind.VOLTAGE_REGULATOR],

  [ComponentKind.MICROCONTROLLER_ST, ComponentKind.MICROCONTROLLER],
  [ComponentKind.MOSFET_ST, ComponentKind.MOSFET],
  [ComponentKind.VOLTAGE_REGULATOR_ST, ComponentKind.VOLTAGE_REGULATOR],

  [ComponentKind.INTERFACE_IC_MAXIM, ComponentKind.INTERFACE_IC],
  [ComponentKind.TEMPERATURE_SENSOR_MAXIM, ComponentKind.TEMPERATURE_SENSOR],
  [ComponentKind.VOLTAGE_REGULATOR_MAXIM, ComponentKind.VOLTAGE_REGULATOR],
  [ComponentKind.BATTERY_MANAGEMENT_MAXIM, ComponentKind.BATTERY_MANAGEMENT],

  [ComponentKind.VOLTAGE_REGULATOR_TI, ComponentKind.VOLTAGE_REGULATOR],
  [ComponentKind.OPAMP_TI, ComponentKind.OPAMP],
  [ComponentKind.MICROCONTROLLER_TI, ComponentKind.MICROCONTROLLER],

  [ComponentKind.INTERFACE_IC_NXP, ComponentKind.INTERFACE_IC],
  [ComponentKind.MICROCONTROLLER_NXP, ComponentKind.MICROCONTROLLER],
];

/**
 * Parent-pointer view of the kind taxonomy.
 *
 * Construction validates the edge list: a kind may appear as a child only
 * once, and following parents from any kind must terminate.
 */
export class KindHierarchy<K extends string = ComponentKind> {
  private readonly parents: ReadonlyMap<K, K>;
  private readonly children = new Map<K, K[]>();

  constructor(edges: Iterable<readonly [K, K]>) {
    const parents = new Map<K, K>();
    for (const [child, parent] of edges) {
      if (parents.has(child)) {
        throw new KindHierarchyError(`Kind ${child} has more than one parent`);
      }
      parents.set(child, parent);
    }
    this.parents = parents;

    for (const child of parents.keys()) {
      const seen = new Set<K>([child]);
      let current = parents.get(child);
      while (current !== undefined) {
        if (seen.has(current)) {
          throw new KindHierarchyError(`Kind hierarchy has a cycle through ${child}`);
        }
        seen.add(current);
        current = parents.get(current);
      }
    }

    for (const [child, parent] of parents) {
      const list = this.children.get(parent) ?? [];
      list.push(child);
      this.children.set(parent, list);
    }
  }

  parentOf(kind: K): K | undefined {
    return this.parents.get(kind);
  }

  /** Ancestors nearest first, not including the kind itself */
  ancestorsOf(kind: K): K[] {
    const result: K[] = [];
    let current = this.parents.get(kind);
    while (current !== undefined) {
      result.push(current);
      current = this.parents.get(current);
    }
    return result;
  }

  /** Topmost ancestor, or the kind itself when it has no parent */
  rootOf(kind: K): K {
    const ancestors = this.ancestorsOf(kind);
    return ancestors.length > 0 ? ancestors[ancestors.length - 1] : kind;
  }

  /** True when `kind` is a strict descendant of `ancestor` */
  specializes(kind: K, ancestor: K): boolean {
    return this.ancestorsOf(kind).includes(ancestor);
  }

  /** Direct children only */
  childrenOf(kind: K): readonly K[] {
    return this.children.get(kind) ?? [];
  }

  /** A kind is generic when something specializes it */
  isGeneric(kind: K): boolean {
    return this.children.has(kind);
  }

  /** A kind is specialized when it has a parent */
  isSpecialized(kind: K): boolean {
    return this.parents.has(kind);
  }
}

export const kindHierarchy = new KindHierarchy<ComponentKind>(KIND_PARENTS);

/** Vendor-specialized kinds carry a ":VENDOR" qualifier */
export function isVendorKind(kind: ComponentKind): boolean {
  return kind.includes(":");
}
