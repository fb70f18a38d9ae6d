// Command binder.
//
// Resolves command specs against a primary target (usually the protocol
// interface) and a fallback target (the device), producing an immutable,
// ordered binding table. Binding is all-or-nothing: any failure throws and
// no table is returned.

import {
  applyReturnMapping,
  type ArgumentMapping,
  type CommandDefinition,
  type CommandSpec,
  type PatternSource,
  type PropertyCommandSpec,
  type ReturnMapping,
} from "./commands.ts";
import { BindingError, DispatchError, toError } from "./errors.ts";
import type { CommandTarget, Method, PropertyAccessor } from "./target.ts";

/**
 * How a pattern is matched against a request.
 *
 * - `full`: the pattern has to cover the entire request.
 * - `prefix`: the pattern only has to match at the start of the request.
 */
export type MatchMode = "full" | "prefix";

/** A compiled pattern with its value-comparable identity. */
export interface CompiledPattern {
  readonly regex: RegExp;
  /** `/<source>/<flags>` of the compiled regex, used for deduplication. */
  readonly key: string;
  /** Number of capture groups. */
  readonly groups: number;
}

/**
 * Compile a pattern. `g` and `y` are dropped so matching carries no
 * lastIndex state between requests.
 *
 * @throws BindingError when the source is not a valid regular expression
 */
export function compilePattern(pattern: PatternSource): CompiledPattern {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const flags = typeof pattern === "string" ? "" : pattern.flags.replace(/[gy]/g, "");
  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (e) {
    throw BindingError.invalidPattern(source, toError(e).message);
  }
  return {
    regex,
    key: `/${regex.source}/${regex.flags}`,
    groups: countGroups(regex),
  };
}

function countGroups(regex: RegExp): number {
  // An alternation with the empty string always matches, exposing every group.
  const match = new RegExp(`${regex.source}|`, regex.flags).exec("");
  return match === null ? 0 : match.length - 1;
}

// `m` would let the anchors match at line breaks inside the request.
function anchored(compiled: CompiledPattern, mode: MatchMode): RegExp {
  const body = `(?:${compiled.regex.source})`;
  const flags = compiled.regex.flags.replace("m", "");
  return new RegExp(mode === "full" ? `^${body}$` : `^${body}`, flags);
}

/** A pattern paired with a concrete callable, ready to process requests. */
export class BoundCommand {
  readonly pattern: CompiledPattern;
  private readonly matcher: RegExp;

  constructor(
    pattern: PatternSource,
    private readonly invoke: Method,
    readonly argumentMappings: readonly ArgumentMapping[] | undefined,
    readonly returnMapping: ReturnMapping,
    readonly doc: string | undefined,
    readonly match: MatchMode = "full",
  ) {
    this.pattern = compilePattern(pattern);

    if (argumentMappings !== undefined && argumentMappings.length !== this.pattern.groups) {
      throw BindingError.argumentArity(
        this.pattern.key,
        this.pattern.groups,
        argumentMappings.length,
      );
    }

    this.matcher = anchored(this.pattern, match);
  }

  /** Whether this command accepts the request. */
  canProcess(request: string): boolean {
    return this.matcher.test(request);
  }

  /**
   * Invoke the bound member for a request and map its result.
   *
   * Failures while mapping arguments, invoking or mapping the result are
   * raised as an invocation DispatchError.
   */
  process(request: string): string | null {
    const match = this.matcher.exec(request);
    if (match === null) {
      throw DispatchError.unmatched();
    }

    try {
      const args = this.mapArguments(match.slice(1));
      return applyReturnMapping(this.returnMapping, this.invoke(...args));
    } catch (e) {
      throw DispatchError.invocation(this.pattern.key, toError(e));
    }
  }

  /**
   * Map captured groups to member arguments. Groups without a mapping are
   * passed as raw strings; groups that did not participate stay undefined.
   */
  mapArguments(captured: readonly (string | undefined)[]): unknown[] {
    return captured.map((raw, i) => {
      const mapping = this.argumentMappings?.[i];
      if (raw === undefined || mapping === undefined) return raw;
      return mapping(raw);
    });
  }
}

/** Ordered, read-only list of bound commands. First match wins. */
export class BindingTable {
  readonly commands: readonly BoundCommand[];

  constructor(commands: BoundCommand[]) {
    this.commands = Object.freeze([...commands]);
  }

  /** First command that accepts the request, if any. */
  find(request: string): BoundCommand | undefined {
    return this.commands.find((command) => command.canProcess(request));
  }

  get size(): number {
    return this.commands.length;
  }
}

/** Targets consulted during binding, in lookup order. */
export interface BindTargets {
  primary: CommandTarget;
  fallback?: CommandTarget;
}

export interface BindOptions {
  /** Defaults to `full`. */
  match?: MatchMode;
}

/**
 * Bind command specs into a table.
 *
 * Member names are looked up on `primary` first and `fallback` second.
 * Throws BindingError for missing members, argument mapping arity
 * mismatches and duplicate patterns.
 */
export function bindCommands(
  specs: readonly CommandDefinition[],
  targets: BindTargets,
  options: BindOptions = {},
): BindingTable {
  const match = options.match ?? "full";
  const seen = new Set<string>();
  const bound: BoundCommand[] = [];

  for (const spec of specs) {
    const commands =
      spec.kind === "command"
        ? [bindCommand(spec, targets, match)]
        : bindProperty(spec, targets, match);

    for (const command of commands) {
      if (seen.has(command.pattern.key)) {
        throw BindingError.duplicatePattern(command.pattern.key);
      }
      seen.add(command.pattern.key);
      bound.push(command);
    }
  }

  return new BindingTable(bound);
}

function bindCommand(spec: CommandSpec, targets: BindTargets, match: MatchMode): BoundCommand {
  const invoke =
    typeof spec.target === "function"
      ? spec.target
      : (targets.primary.resolveMethod(spec.target) ??
        targets.fallback?.resolveMethod(spec.target));

  if (invoke === undefined) {
    throw BindingError.missingMember(typeof spec.target === "string" ? spec.target : "<function>");
  }

  return new BoundCommand(
    spec.pattern,
    invoke,
    spec.argumentMappings,
    spec.returnMapping,
    spec.doc,
    match,
  );
}

function bindProperty(
  spec: PropertyCommandSpec,
  targets: BindTargets,
  match: MatchMode,
): BoundCommand[] {
  const accessor: PropertyAccessor | undefined =
    targets.primary.resolveProperty(spec.member) ??
    targets.fallback?.resolveProperty(spec.member);

  if (accessor === undefined) {
    throw BindingError.missingMember(spec.member);
  }
  if (spec.readPattern === undefined && spec.writePattern === undefined) {
    throw BindingError.emptyProperty(spec.member);
  }

  const commands: BoundCommand[] = [];

  if (spec.readPattern !== undefined) {
    commands.push(
      new BoundCommand(
        spec.readPattern,
        () => accessor.get(),
        undefined,
        spec.returnMapping,
        spec.doc,
        match,
      ),
    );
  }

  if (spec.writePattern !== undefined) {
    const set = accessor.set;
    if (set === undefined) {
      throw BindingError.readOnlyProperty(spec.member);
    }
    // One capture group sets the value itself, several set them as a list.
    const setter = new BoundCommand(
      spec.writePattern,
      (...values: unknown[]) => set.call(accessor, values.length === 1 ? values[0] : values),
      spec.argumentMappings,
      spec.returnMapping,
      spec.doc,
      match,
    );
    if (setter.pattern.groups === 0) {
      throw BindingError.writeWithoutValue(spec.member, setter.pattern.key);
    }
    commands.push(setter);
  }

  return commands;
}
