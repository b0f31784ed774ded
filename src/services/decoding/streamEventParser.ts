/**
 * Incremental parser for the streaming response body.
 *
 * The body is a sequence of frames, each a 4-byte big-endian length followed
 * by that many payload bytes. Chunks may split a frame anywhere, including
 * inside the length prefix. One parser serves one response.
 */

import type { StreamEvent } from "../../models/events";
import { decodeFrame, type Clock } from "./frameDecoder";

export const LENGTH_PREFIX_BYTES = 4;

export class StreamEventParser {
  private buffer: Buffer = Buffer.alloc(0);
  /** Length of the frame being waited on, once its prefix has been read. */
  private expectedLength: number | null = null;

  constructor(private readonly now?: Clock) {}

  /** Bytes held back waiting for the rest of a frame. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  /**
   * Append a chunk and return every event it completes, in arrival order.
   * A frame that fails to decode is consumed and skipped.
   */
  feedChunk(chunk: Uint8Array): StreamEvent[] {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    const events: StreamEvent[] = [];

    for (;;) {
      if (this.expectedLength === null) {
        if (this.buffer.length < LENGTH_PREFIX_BYTES) break;
        this.expectedLength = this.buffer.readUInt32BE(0);
        this.buffer = this.buffer.subarray(LENGTH_PREFIX_BYTES);
      }

      if (this.buffer.length < this.expectedLength) break;

      const payload = this.buffer.subarray(0, this.expectedLength);
      this.buffer = this.buffer.subarray(this.expectedLength);
      this.expectedLength = null;

      const event = decodeFrame(payload, this.now);
      if (event) events.push(event);
    }

    return events;
  }
}
