/**
 * Whole-buffer decoding of a fully received streaming response.
 */

import type { Image, StreamEvent } from "../../models/events";
import { FormatFailure } from "../errors";
import { decodeFrame, type Clock } from "./frameDecoder";
import { LENGTH_PREFIX_BYTES } from "./streamEventParser";

function asBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Decode every frame in `data`. A trailing frame shorter than its declared
 * length is still attempted, and dropped if it does not decode.
 */
export function parseEventBuffer(data: Uint8Array, now?: Clock): StreamEvent[] {
  const buffer = asBuffer(data);
  const events: StreamEvent[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    if (offset + LENGTH_PREFIX_BYTES > buffer.length) break;

    const length = buffer.readUInt32BE(offset);
    const start = offset + LENGTH_PREFIX_BYTES;
    if (start >= buffer.length) break;

    const end = Math.min(start + length, buffer.length);
    const event = decodeFrame(buffer.subarray(start, end), now);
    if (event) events.push(event);

    offset = start + length;
  }

  return events;
}

/**
 * Images of the final events, in arrival order.
 *
 * @throws FormatFailure when the body is empty or holds no final image
 */
export function extractFinalImages(data: Uint8Array, now?: Clock): Image[] {
  if (data.length === 0) {
    throw new FormatFailure("Received empty response from the image service");
  }

  const images: Image[] = [];
  for (const event of parseEventBuffer(data, now)) {
    if (event.kind === "final") images.push(event.image);
  }

  if (images.length === 0) {
    throw new FormatFailure("Response contained no final image");
  }
  return images;
}
