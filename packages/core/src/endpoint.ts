// Protocol endpoint contract.
//
// An endpoint is one protocol's listener plus whatever it needs to serve
// requests. The scheduler only starts, stops and time-slices endpoints; how
// an endpoint spends its slice is up to the implementation.

import type { z } from "zod";
import { ConfigurationError } from "./errors.ts";

/** Resolved endpoint options, keyed by option name. */
export type EndpointOptions = Readonly<Record<string, unknown>>;

/** One protocol exposed by a device, driven cooperatively. */
export interface ProtocolEndpoint {
  /** Protocol identifier, e.g. "stream". */
  readonly protocol: string;

  /** Options after defaults were applied. */
  readonly options: EndpointOptions;

  /** Whether the listener is open. */
  readonly isRunning: boolean;

  /** Open the listener. */
  start(): Promise<void>;

  /** Close the listener and every open connection. */
  stop(): Promise<void>;

  /**
   * Perform one bounded pass over pending network work.
   *
   * Waits at most `budgetMs` for something to become ready, handles what is
   * ready, and returns. Never loops indefinitely.
   */
  runCycle(budgetMs: number): Promise<void>;
}

/**
 * Validate endpoint options against a schema.
 *
 * Schemas are expected to be strict objects, so unknown keys are rejected
 * along with invalid values. Returns a frozen copy with defaults applied.
 *
 * @throws ConfigurationError listing every issue
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): Readonly<z.output<S>> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new ConfigurationError(`Invalid endpoint options: ${issues.join("; ")}`, issues);
  }
  return Object.freeze(result.data);
}
