// Terminator framing for byte streams.
//
// Requests are delimited by an exact byte sequence. No escaping is applied:
// a payload containing the terminator is cut at its first occurrence.

/**
 * Accumulates incoming chunks and splits them into terminated frames.
 *
 * The terminator itself is not part of any frame. Bytes after the last
 * terminator stay buffered until more data arrives.
 */
export class TerminatorFramer {
  private buf: Buffer = Buffer.alloc(0);
  private readonly terminator: Buffer;

  constructor(terminator: string) {
    this.terminator = Buffer.from(terminator);
    if (this.terminator.length === 0) {
      throw new Error("terminator must not be empty");
    }
  }

  /** Number of bytes waiting for a terminator. */
  get buffered(): number {
    return this.buf.length;
  }

  /** Append a chunk and return every frame it completes, in order. */
  push(chunk: Uint8Array): Buffer[] {
    this.buf = this.buf.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buf, chunk]);

    const frames: Buffer[] = [];
    while (true) {
      const end = this.buf.indexOf(this.terminator);
      if (end < 0) break;

      frames.push(Buffer.from(this.buf.subarray(0, end)));
      this.buf = this.buf.subarray(end + this.terminator.length);
    }
    return frames;
  }
}

/** Append the terminator to an outgoing payload. */
export function frameReply(payload: string, terminator: string): Buffer {
  return Buffer.from(payload + terminator);
}
