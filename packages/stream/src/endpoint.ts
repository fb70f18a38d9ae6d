// TCP stream endpoint.
//
// Exposes a device through a line-oriented text protocol: each request is
// terminated by `inTerminator`, each reply by `outTerminator`. Commands are
// bound when the endpoint is constructed, before any socket is opened, so a
// misconfigured protocol never listens.

import type net from "node:net";
import {
  type BindingTable,
  type CommandDefinition,
  type CommandTarget,
  ConfigurationError,
  type Logger,
  type MatchMode,
  type ProtocolEndpoint,
  Readiness,
  bindCommands,
  checkBudget,
  componentLogger,
  parseOptions,
  toError,
} from "@devsim/core";
import { type ErrorHook, RequestDispatcher } from "./dispatcher.ts";
import { ConnectionListener } from "./listener.ts";
import { type StreamOptions, type StreamOptionsInput, StreamOptionsSchema } from "./options.ts";

/**
 * Protocol description for a stream endpoint.
 *
 * Member names in `commands` are looked up on `target` first (when given)
 * and on the device second.
 *
 * @example
 * ```typescript
 * const iface: StreamInterface = {
 *   commands: [
 *     cmd("set_speed", /^S=([0-9]+)$/, { argumentMappings: [Number] }),
 *     cmd("get_speed", /^S\?$/),
 *     prop("speed", { read: /^V\?$/, write: /^V=([0-9]+)$/, argumentMappings: [Number] }),
 *   ],
 *   handleError: (request, error) => `ERR ${error.message}`,
 * };
 * ```
 */
export interface StreamInterface {
  readonly commands: readonly CommandDefinition[];
  /** Members consulted before the device's. */
  readonly target?: CommandTarget;
  /** Request terminator. Default: "\r". */
  readonly inTerminator?: string;
  /** Reply terminator. Default: "\r". */
  readonly outTerminator?: string;
  /** Default: "full". */
  readonly match?: MatchMode;
  /** Default: no reply. */
  readonly handleError?: ErrorHook;
}

export interface StreamEndpointConfig {
  device: CommandTarget;
  interface: StreamInterface;
  options?: StreamOptionsInput;
  logger?: Logger;
}

/** Endpoint serving a StreamInterface over TCP. */
export class StreamEndpoint implements ProtocolEndpoint {
  readonly protocol = "stream";
  readonly options: StreamOptions;
  readonly table: BindingTable;
  readonly inTerminator: string;
  readonly outTerminator: string;

  private readonly handleError: ErrorHook;
  private readonly readiness = new Readiness();
  private readonly log: Logger;
  private listener: ConnectionListener | null = null;
  // In-flight transitions, shared by overlapping callers.
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(config: StreamEndpointConfig) {
    const iface = config.interface;

    this.options = parseOptions(StreamOptionsSchema, config.options);
    this.inTerminator = iface.inTerminator ?? "\r";
    this.outTerminator = iface.outTerminator ?? "\r";
    if (this.inTerminator.length === 0) {
      throw new ConfigurationError("Request terminator must not be empty");
    }

    this.table = bindCommands(
      iface.commands,
      iface.target === undefined
        ? { primary: config.device }
        : { primary: iface.target, fallback: config.device },
      { match: iface.match },
    );
    this.handleError = iface.handleError ?? (() => null);
    this.log = componentLogger("stream", { protocol: this.protocol }, config.logger);
  }

  get isRunning(): boolean {
    return this.listener !== null;
  }

  /** Address the listener is bound to, or null when stopped. */
  address(): net.AddressInfo | null {
    return this.listener?.address() ?? null;
  }

  /** Number of open client connections. */
  get connectionCount(): number {
    return this.listener?.connectionCount ?? 0;
  }

  /** Open the listener. Overlapping calls share one start. */
  start(): Promise<void> {
    if (this.listener !== null) return Promise.resolve();
    if (this.starting === null) {
      this.starting = this.open().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  /** Close the listener and every connection. Waits for a start in progress. */
  stop(): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.close().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  private async open(): Promise<void> {
    if (this.stopping !== null) await this.stopping;

    const listener = new ConnectionListener(
      (log) =>
        new RequestDispatcher({
          table: this.table,
          inTerminator: this.inTerminator,
          outTerminator: this.outTerminator,
          handleError: this.handleError,
          logger: log,
        }),
      this.readiness,
      this.log,
    );
    await listener.listen(this.options.bindAddress, this.options.port);
    this.listener = listener;

    this.log.info(
      { bindAddress: this.options.bindAddress, port: listener.address()?.port },
      "Listening",
    );
  }

  private async close(): Promise<void> {
    const starting = this.starting;
    if (starting !== null) {
      try {
        await starting;
      } catch (e) {
        // The start's own caller sees this failure; there is nothing to close.
        this.log.debug({ err: toError(e) }, "Start failed before stop");
      }
    }

    const listener = this.listener;
    if (listener === null) return;

    this.listener = null;
    await listener.close();
    // Wake a cycle that is still waiting on the closed listener.
    this.readiness.notify();
    this.readiness.reset();
    this.log.info("Stopped listening");
  }

  /**
   * Wait up to `budgetMs` for socket activity, then accept new clients,
   * process received requests and write replies. Does nothing while stopped.
   */
  async runCycle(budgetMs: number): Promise<void> {
    checkBudget(budgetMs);
    const listener = this.listener;
    if (listener === null) return;

    if (!listener.hasPendingWork) {
      await this.readiness.wait(budgetMs);
    }

    // Stopped while waiting.
    if (this.listener !== listener) return;

    listener.service();
    this.readiness.reset();
  }
}
