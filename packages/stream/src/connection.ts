// A client connection to a stream endpoint.
//
// Socket events only queue data and raise readiness; requests are processed
// when the endpoint services its connections during a cycle.

import type net from "node:net";
import type { Logger, Readiness } from "@devsim/core";
import type { RequestDispatcher } from "./dispatcher.ts";

/** One accepted socket with its dispatcher and inbound queue. */
export class StreamConnection {
  readonly peer: string;
  private inbox: Buffer[] = [];
  private closed = false;

  constructor(
    private readonly socket: net.Socket,
    private readonly dispatcher: RequestDispatcher,
    readiness: Readiness,
    private readonly log: Logger,
  ) {
    this.peer = `${socket.remoteAddress}:${socket.remotePort}`;
    // The peer may have left between accept and adoption.
    this.closed = socket.destroyed;

    socket.on("data", (chunk: Buffer) => {
      this.inbox.push(chunk);
      readiness.notify();
    });

    socket.on("error", (err: Error) => {
      this.log.warn({ peer: this.peer, err }, "Socket error");
      this.closed = true;
      readiness.notify();
    });

    socket.on("close", () => {
      this.closed = true;
      readiness.notify();
    });
  }

  /** Whether queued data or a close is waiting to be serviced. */
  get hasPendingWork(): boolean {
    return this.inbox.length > 0 || this.closed;
  }

  /** True once the peer has gone away or the socket failed. */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Process every queued chunk in arrival order and write the replies.
   *
   * Returns false when the connection is finished and should be dropped.
   */
  service(): boolean {
    const chunks = this.inbox;
    this.inbox = [];

    for (const chunk of chunks) {
      for (const reply of this.dispatcher.receive(chunk)) {
        this.write(reply);
      }
    }

    return !this.closed;
  }

  /** Destroy the socket. */
  close(): void {
    this.closed = true;
    this.inbox = [];
    this.socket.destroy();
  }

  private write(reply: Buffer): void {
    if (!this.socket.writable) {
      this.log.debug({ peer: this.peer }, "Dropping reply for closed socket");
      return;
    }
    this.socket.write(reply, (err) => {
      if (err) {
        this.log.warn({ peer: this.peer, err }, "Write failed");
      }
    });
  }
}
