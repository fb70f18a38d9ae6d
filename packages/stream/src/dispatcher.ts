// Per-connection request dispatcher.
//
// Buffers bytes until the request terminator, picks the first bound command
// that accepts the request, invokes it and frames the reply. Failures never
// leave the dispatcher: they go to the error hook, whose return value is the
// reply.

import {
  type BindingTable,
  DispatchError,
  type Logger,
  formatDuration,
  toError,
} from "@devsim/core";
import { TerminatorFramer, frameReply } from "./framing.ts";

/**
 * Called with the request and the error when a request fails.
 *
 * The returned string is sent as the reply; null or undefined sends nothing.
 */
export type ErrorHook = (request: string, error: Error) => string | null | undefined;

export interface DispatcherConfig {
  table: BindingTable;
  inTerminator: string;
  outTerminator: string;
  handleError: ErrorHook;
  logger: Logger;
}

/** Request/reply state for one connection. */
export class RequestDispatcher {
  private framer: TerminatorFramer;
  private table: BindingTable;
  private outTerminator: string;
  private handleError: ErrorHook;
  private log: Logger;

  constructor(config: DispatcherConfig) {
    this.framer = new TerminatorFramer(config.inTerminator);
    this.table = config.table;
    this.outTerminator = config.outTerminator;
    this.handleError = config.handleError;
    this.log = config.logger;
  }

  /** Bytes received but not yet terminated. */
  get pending(): number {
    return this.framer.buffered;
  }

  /**
   * Feed received bytes.
   *
   * Returns the framed replies for every request the chunk completed, in
   * request order. Requests without a reply contribute nothing.
   */
  receive(chunk: Uint8Array): Buffer[] {
    const replies: Buffer[] = [];
    for (const frame of this.framer.push(chunk)) {
      const reply = this.handle(frame.toString("utf8"));
      if (reply !== null) {
        replies.push(frameReply(reply, this.outTerminator));
      }
    }
    return replies;
  }

  /** Dispatch one unframed request and return the reply text, if any. */
  handle(request: string): string | null {
    const started = performance.now();
    let reply: string | null;

    try {
      const command = this.table.find(request);
      if (command === undefined) {
        throw DispatchError.unmatched();
      }
      reply = command.process(request);
    } catch (e) {
      const error = toError(e);
      this.log.debug({ request, err: error }, "Dispatch error");
      reply = this.onError(request, error);
    }

    this.log.debug({ request, reply, duration: formatDuration(started) }, "Request handled");
    return reply;
  }

  private onError(request: string, error: Error): string | null {
    try {
      return this.handleError(request, error) ?? null;
    } catch (e) {
      this.log.warn({ request, err: toError(e) }, "Error hook failed; no reply sent");
      return null;
    }
  }
}
