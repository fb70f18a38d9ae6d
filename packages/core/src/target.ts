// Capability interface for objects that commands are bound against.
//
// Binding never reflects over arbitrary objects: a device or interface object
// exposes its members through a CommandTarget, which answers "which callable
// is called X" and "which property is called X".

/**
 * A callable member. Declared through a method signature so that functions
 * with concrete parameter types (e.g. `(speed: number) => void`) can be
 * registered; arguments arrive already mapped from the request.
 */
export type Method = { bivarianceHack(...args: unknown[]): unknown }["bivarianceHack"];

/** Accessor pair for a property exposed to property commands. */
export interface PropertyAccessor {
  get(): unknown;
  /** Omitted for read-only properties. */
  set?(value: unknown): void;
}

/** Lookup-by-name contract consumed by the command binder. */
export interface CommandTarget {
  /** Return the callable member with this name, or undefined when absent. */
  resolveMethod(name: string): Method | undefined;
  /** Return the property accessor with this name, or undefined when absent. */
  resolveProperty(name: string): PropertyAccessor | undefined;
}

/** Explicit member maps for {@link defineTarget}. */
export interface TargetDefinition {
  methods?: Readonly<Record<string, Method>>;
  properties?: Readonly<Record<string, PropertyAccessor>>;
}

/**
 * Build a CommandTarget from explicit method and property maps.
 *
 * @example
 * ```typescript
 * const device = { speed: 0 };
 * const target = defineTarget({
 *   methods: { reset: () => { device.speed = 0; } },
 *   properties: {
 *     speed: { get: () => device.speed, set: (v) => { device.speed = Number(v); } },
 *   },
 * });
 * ```
 */
export function defineTarget(definition: TargetDefinition): CommandTarget {
  const methods = new Map(Object.entries(definition.methods ?? {}));
  const properties = new Map(Object.entries(definition.properties ?? {}));

  return {
    resolveMethod: (name) => methods.get(name),
    resolveProperty: (name) => properties.get(name),
  };
}
