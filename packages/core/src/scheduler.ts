// Endpoint scheduler.
//
// Owns a named set of protocol endpoints and shares a per-tick time budget
// between the ones that are running. Everything happens on one logical
// thread: endpoints are served one after another in registration order.

import { setTimeout as sleep } from "node:timers/promises";
import type { EndpointOptions, ProtocolEndpoint } from "./endpoint.ts";
import { RegistryError } from "./errors.ts";
import { componentLogger, type Logger } from "./logging.ts";
import { checkBudget } from "./readiness.ts";

export interface SchedulerOptions {
  /** Idle wait used when no endpoint is running. Defaults to a timer sleep. */
  sleep?: (ms: number) => Promise<unknown>;
  /** Parent logger. */
  logger?: Logger;
}

/**
 * Round-robin time division across running endpoints.
 *
 * @example
 * ```typescript
 * const scheduler = new EndpointScheduler();
 * scheduler.addEndpoint("stream", new StreamEndpoint({ device, interface: iface }));
 * await scheduler.connect();
 * while (running) await scheduler.tick(100);
 * await scheduler.close();
 * ```
 */
export class EndpointScheduler {
  private endpoints = new Map<string, ProtocolEndpoint>();
  private sleep: (ms: number) => Promise<unknown>;
  private log: Logger;

  constructor(options: SchedulerOptions = {}) {
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.log = componentLogger("scheduler", {}, options.logger);
  }

  /** Registered protocol names, in registration order. */
  get protocols(): string[] {
    return [...this.endpoints.keys()];
  }

  addEndpoint(name: string, endpoint: ProtocolEndpoint): void {
    if (this.endpoints.has(name)) {
      throw RegistryError.duplicate(name);
    }
    this.endpoints.set(name, endpoint);
    this.log.debug({ protocol: name }, "Endpoint added");
  }

  /** Remove a stopped endpoint. */
  removeEndpoint(name: string): ProtocolEndpoint {
    const endpoint = this.get(name);
    if (endpoint.isRunning) {
      throw RegistryError.running(name);
    }
    this.endpoints.delete(name);
    this.log.debug({ protocol: name }, "Endpoint removed");
    return endpoint;
  }

  /** Start or stop one endpoint. Does nothing if it is already in that state. */
  async setRunning(name: string, running: boolean): Promise<void> {
    const endpoint = this.get(name);
    if (endpoint.isRunning === running) return;

    if (running) {
      await endpoint.start();
      this.log.info({ protocol: name }, "Endpoint started");
    } else {
      await endpoint.stop();
      this.log.info({ protocol: name }, "Endpoint stopped");
    }
  }

  /** Start the named endpoints, or all of them when no name is given. */
  async connect(...names: string[]): Promise<void> {
    for (const name of this.resolve(names)) {
      await this.setRunning(name, true);
    }
  }

  /** Stop the named endpoints, or all of them when no name is given. */
  async disconnect(...names: string[]): Promise<void> {
    for (const name of this.resolve(names)) {
      await this.setRunning(name, false);
    }
  }

  /** Running state of every endpoint, or of one. */
  isRunning(): Record<string, boolean>;
  isRunning(name: string): boolean;
  isRunning(name?: string): Record<string, boolean> | boolean {
    if (name !== undefined) {
      return this.get(name).isRunning;
    }
    const states: Record<string, boolean> = {};
    for (const [key, endpoint] of this.endpoints) {
      states[key] = endpoint.isRunning;
    }
    return states;
  }

  /** Resolved options of every endpoint, or of one, keyed by protocol name. */
  configuration(name?: string): Record<string, EndpointOptions> {
    const config: Record<string, EndpointOptions> = {};
    for (const key of name === undefined ? this.protocols : [name]) {
      config[key] = this.get(key).options;
    }
    return config;
  }

  /**
   * Spend `budgetMs` serving running endpoints.
   *
   * Each running endpoint gets an equal slice, whether or not it uses it.
   * With nothing running the whole budget is slept away.
   */
  async tick(budgetMs: number): Promise<void> {
    checkBudget(budgetMs);

    const running = [...this.endpoints.values()].filter((endpoint) => endpoint.isRunning);
    if (running.length === 0) {
      await this.sleep(budgetMs);
      return;
    }

    const slice = budgetMs / running.length;
    for (const endpoint of running) {
      await endpoint.runCycle(slice);
    }
  }

  /** Stop every running endpoint, releasing listeners and connections. */
  async close(): Promise<void> {
    await this.disconnect();
  }

  private get(name: string): ProtocolEndpoint {
    const endpoint = this.endpoints.get(name);
    if (endpoint === undefined) {
      throw RegistryError.unknown(name);
    }
    return endpoint;
  }

  private resolve(names: string[]): string[] {
    if (names.length === 0) return this.protocols;
    for (const name of names) {
      this.get(name);
    }
    return names;
  }
}
