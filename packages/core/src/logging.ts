// Logging for devsim components.
//
// One root pino logger; components log through children carrying their
// component name (and protocol / peer where it applies). The level comes
// from LOG_LEVEL, so tests can run with `LOG_LEVEL=silent`.

import pino, { type Logger } from "pino";

export type { Logger } from "pino";

/** Root logger shared by every package. */
export const logger: Logger = pino({
  name: "devsim",
  level: process.env.LOG_LEVEL ?? "info",
});

/**
 * Create a child logger for a component.
 *
 * @example
 * ```typescript
 * const log = componentLogger("stream", { protocol: "stream" });
 * log.info({ peer }, "Client connected");
 * ```
 */
export function componentLogger(
  component: string,
  bindings: Record<string, unknown> = {},
  parent: Logger = logger,
): Logger {
  return parent.child({ component, ...bindings });
}

/** Format a duration measured with `performance.now()` for log records. */
export function formatDuration(startedAt: number): string {
  return `${(performance.now() - startedAt).toFixed(2)}ms`;
}
