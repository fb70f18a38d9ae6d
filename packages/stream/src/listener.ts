// TCP listener for stream endpoints.
//
// Accepts sockets as they arrive but only adopts them, in accept order, when
// the endpoint services the listener. Each adopted socket gets its own
// RequestDispatcher; connections share nothing but the binding table.

import net from "node:net";
import { type Logger, Readiness } from "@devsim/core";
import { StreamConnection } from "./connection.ts";
import type { RequestDispatcher } from "./dispatcher.ts";

/** Factory for the per-connection dispatcher. */
export type DispatcherFactory = (log: Logger) => RequestDispatcher;

export class ConnectionListener {
  private server: net.Server;
  private accepted: net.Socket[] = [];
  private connections: StreamConnection[] = [];

  constructor(
    private readonly createDispatcher: DispatcherFactory,
    private readonly readiness: Readiness,
    private readonly log: Logger,
  ) {
    this.server = net.createServer((socket) => {
      this.accepted.push(socket);
      readiness.notify();
    });

    this.server.on("error", (err: Error) => {
      this.log.error({ err }, "Listener error");
    });
  }

  /** Bind and start listening. Resolves once the socket is listening. */
  listen(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        resolve();
      });
    });
  }

  /** Bound address, or null when not listening. */
  address(): net.AddressInfo | null {
    const address = this.server.address();
    return address !== null && typeof address === "object" ? address : null;
  }

  /** Number of adopted, open connections. */
  get connectionCount(): number {
    return this.connections.length;
  }

  /** Whether an accept, inbound data or a close is waiting. */
  get hasPendingWork(): boolean {
    return this.accepted.length > 0 || this.connections.some((conn) => conn.hasPendingWork);
  }

  /**
   * Adopt accepted sockets, then let every connection process its queued
   * data in accept order. Finished connections are dropped.
   */
  service(): void {
    for (const socket of this.accepted.splice(0)) {
      const log = this.log.child({ peer: `${socket.remoteAddress}:${socket.remotePort}` });
      const conn = new StreamConnection(socket, this.createDispatcher(log), this.readiness, log);
      this.connections.push(conn);
      log.info("Client connected");
    }

    this.connections = this.connections.filter((conn) => {
      if (conn.service()) return true;
      conn.close();
      this.log.info({ peer: conn.peer }, "Client disconnected");
      return false;
    });
  }

  /** Close every connection and stop listening. */
  close(): Promise<void> {
    for (const socket of this.accepted.splice(0)) {
      socket.destroy();
    }
    for (const conn of this.connections) {
      conn.close();
    }
    this.connections = [];

    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
