// Declarative command specs.
//
// A spec maps a request pattern to a device or interface member. Specs are
// plain data until the binder resolves them against a CommandTarget.

import type { Method } from "./target.ts";

/** Pattern accepted by specs: regex source text or a RegExp. */
export type PatternSource = string | RegExp;

/** Converts one captured group into the value passed to the member. */
export type ArgumentMapping = (raw: string) => unknown;

/** How the member's result becomes the reply text (null means no reply). */
export type ReturnMapping =
  | { kind: "identity" }
  | { kind: "constant"; value: string | null }
  | { kind: "function"; map: (value: unknown) => string | null };

/** Pass the result through unchanged; it must already be a string or null. */
export function mapIdentity(): ReturnMapping {
  return { kind: "identity" };
}

/** Always reply with the same value, whatever the member returned. */
export function mapConstant(value: string | null): ReturnMapping {
  return { kind: "constant", value };
}

/** Transform the result with a function. */
export function mapWith(map: (value: unknown) => string | null): ReturnMapping {
  return { kind: "function", map };
}

/** Default mapping: null/undefined produce no reply, anything else its string form. */
export function mapToString(): ReturnMapping {
  return mapWith((value) => (value === null || value === undefined ? null : String(value)));
}

/** A pattern bound to a callable, or to a member resolved at binding time. */
export interface CommandSpec {
  readonly kind: "command";
  readonly target: string | Method;
  readonly pattern: PatternSource;
  readonly argumentMappings?: readonly ArgumentMapping[];
  readonly returnMapping: ReturnMapping;
  readonly doc?: string;
}

/** Read and/or write access to a named property. */
export interface PropertyCommandSpec {
  readonly kind: "property";
  readonly member: string;
  readonly readPattern?: PatternSource;
  readonly writePattern?: PatternSource;
  /** Mappings for the write pattern's capture groups. */
  readonly argumentMappings?: readonly ArgumentMapping[];
  readonly returnMapping: ReturnMapping;
  readonly doc?: string;
}

export type CommandDefinition = CommandSpec | PropertyCommandSpec;

export interface CommandOptions {
  argumentMappings?: readonly ArgumentMapping[];
  /** Defaults to {@link mapToString}. */
  returnMapping?: ReturnMapping;
  doc?: string;
}

export interface PropertyOptions extends CommandOptions {
  read?: PatternSource;
  write?: PatternSource;
}

/**
 * Define a command.
 *
 * @example
 * ```typescript
 * const commands = [
 *   cmd("set_speed", /^S=([0-9]+)$/, { argumentMappings: [Number] }),
 *   cmd("get_speed", /^S\?$/),
 * ];
 * ```
 */
export function cmd(
  target: string | Method,
  pattern: PatternSource,
  options: CommandOptions = {},
): CommandSpec {
  return {
    kind: "command",
    target,
    pattern,
    argumentMappings: options.argumentMappings,
    returnMapping: options.returnMapping ?? mapToString(),
    doc: options.doc,
  };
}

/**
 * Define read and/or write commands for a property.
 *
 * @example
 * ```typescript
 * prop("speed", { read: /^V\?$/, write: /^V=([0-9]+)$/, argumentMappings: [Number] });
 * ```
 */
export function prop(member: string, options: PropertyOptions): PropertyCommandSpec {
  return {
    kind: "property",
    member,
    readPattern: options.read,
    writePattern: options.write,
    argumentMappings: options.argumentMappings,
    returnMapping: options.returnMapping ?? mapToString(),
    doc: options.doc,
  };
}

/** Apply a return mapping to a member's result. */
export function applyReturnMapping(mapping: ReturnMapping, value: unknown): string | null {
  switch (mapping.kind) {
    case "identity":
      if (value === undefined || value === null) return null;
      if (typeof value === "string") return value;
      throw new TypeError(`identity return mapping expects a string or null, got ${typeof value}`);
    case "constant":
      return mapping.value;
    case "function":
      return mapping.map(value);
  }
}
