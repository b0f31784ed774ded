/**
 * Decodes the payload of one length-prefixed frame of the streaming
 * protocol into a typed event.
 *
 * A payload is a msgpack map:
 *
 *   event_type  "intermediate" | "final"
 *   samp_ix     sample index
 *   step_ix     denoising step (intermediate only, defaults to 0)
 *   gen_id      generation id, string or integer
 *   sigma       noise level (intermediate only, defaults to 0)
 *   image       JPEG or PNG bytes
 *
 * Anything else is logged at debug level and dropped; a bad frame never
 * stops the stream.
 */

import { decode } from "@msgpack/msgpack";
import { createLogger } from "../../config/logger";
import type { StreamEvent } from "../../models/events";
import { fileExtension, filenameTimestamp, sniffImageFormat } from "./imageFormat";

const log = createLogger("decoder");

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" ? value : fallback;
}

function reject(reason: string, payload: Uint8Array): null {
  log.debug("Skipping frame", { reason, bytes: payload.length });
  return null;
}

/**
 * @returns the decoded event, or `null` when the payload is not a usable frame
 */
export function decodeFrame(payload: Uint8Array, now: Clock = systemClock): StreamEvent | null {
  let record: unknown;
  try {
    record = decode(payload);
  } catch (err) {
    return reject(err instanceof Error ? err.message : String(err), payload);
  }

  if (!isRecord(record)) return reject("not a map", payload);

  const eventType = record.event_type;
  if (eventType !== "intermediate" && eventType !== "final") {
    return reject(`unknown event_type ${String(eventType)}`, payload);
  }

  const sampleIndex = record.samp_ix;
  if (typeof sampleIndex !== "number") return reject("missing samp_ix", payload);

  const genId = record.gen_id;
  if (typeof genId !== "string" && typeof genId !== "number" && typeof genId !== "bigint") {
    return reject("missing gen_id", payload);
  }

  const bytes = record.image;
  if (!(bytes instanceof Uint8Array)) return reject("missing image", payload);

  const format = sniffImageFormat(bytes);
  if (format === null) {
    return reject(`unsupported image signature ${Buffer.from(bytes.subarray(0, 16)).toString("hex")}`, payload);
  }

  const stamp = filenameTimestamp(now());
  const extension = fileExtension(format);
  const data = Buffer.from(bytes);
  const generationId = String(genId);

  if (eventType === "final") {
    return {
      kind: "final",
      sampleIndex,
      generationId,
      format,
      image: { filename: `${stamp}_final.${extension}`, data },
    };
  }

  const stepIndex = numberOr(record.step_ix, 0);
  return {
    kind: "intermediate",
    sampleIndex,
    stepIndex,
    generationId,
    sigma: numberOr(record.sigma, 0),
    format,
    image: { filename: `${stamp}_step_${String(stepIndex).padStart(2, "0")}.${extension}`, data },
  };
}
