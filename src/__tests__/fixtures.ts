/**
 * Shared builders for test data: image headers and encoded images, stream frames,
 * archives and an in-process stand-in for `fetch`.
 */

import AdmZip from "adm-zip";
import { encode } from "@msgpack/msgpack";
import sharp from "sharp";
import type { FetchLike } from "../services/client";

/** 2024-01-02 03:04:05 local time, i.e. filename prefix `20240102_030405`. */
export const FIXED_DATE = new Date(2024, 0, 2, 3, 4, 5);
export const FIXED_STAMP = "20240102_030405";
export const fixedClock = (): Date => FIXED_DATE;

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

/** PNG signature plus an IHDR chunk header. */
export function pngBytes(width: number, height: number): Buffer {
  const bytes = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(bytes, 0);
  bytes.writeUInt32BE(13, 8);
  bytes.write("IHDR", 12, "ascii");
  bytes.writeUInt32BE(width, 16);
  bytes.writeUInt32BE(height, 20);
  return bytes;
}

/** SOI, a 16-byte APP0 segment, then a baseline SOF0 segment. */
export function jpegBytes(width: number, height: number): Buffer {
  const app0 = Buffer.alloc(18);
  app0.writeUInt16BE(0xffe0, 0);
  app0.writeUInt16BE(16, 2);

  const sof = Buffer.alloc(19);
  sof.writeUInt16BE(0xffc0, 0);
  sof.writeUInt16BE(17, 2);
  sof.writeUInt8(8, 4);
  sof.writeUInt16BE(height, 5);
  sof.writeUInt16BE(width, 7);

  return Buffer.concat([Buffer.from([0xff, 0xd8]), app0, sof]);
}

/** A complete, decodable image of a single colour. */
export function encodedImage(format: "png" | "jpeg", width: number, height: number): Promise<Buffer> {
  const canvas = sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 120, b: 40 } },
  });
  return (format === "png" ? canvas.png() : canvas.jpeg()).toBuffer();
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

/** One length-prefixed msgpack frame. */
export function frame(event: Record<string, unknown>): Buffer {
  const payload = encode(event);
  const prefix = Buffer.alloc(4);
  prefix.writeUInt32BE(payload.length, 0);
  return Buffer.concat([prefix, payload]);
}

export function finalFrame(sampleIndex: number, image: Buffer, genId: string | number = "gen-1"): Buffer {
  return frame({ event_type: "final", samp_ix: sampleIndex, gen_id: genId, image });
}

export function intermediateFrame(stepIndex: number, image: Buffer, sigma = 1.5): Buffer {
  return frame({
    event_type: "intermediate",
    samp_ix: 0,
    step_ix: stepIndex,
    gen_id: "gen-1",
    sigma,
    image,
  });
}

/** ZIP archive; entries are listed sorted by name. */
export function zipOf(entries: Record<string, Buffer>): Buffer {
  const zip = new AdmZip();
  for (const [name, data] of Object.entries(entries)) {
    zip.addFile(name, data);
  }
  return zip.toBuffer();
}

/** Response whose body arrives as the given chunks. */
export function chunkedResponse(chunks: readonly Uint8Array[], status = 200): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(new Uint8Array(chunk));
      controller.close();
    },
  });
  return new Response(body, { status });
}

export function bytesResponse(data: Uint8Array, status = 200): Response {
  return new Response(new Uint8Array(data), { status });
}

// ---------------------------------------------------------------------------
// Fetch stand-in
// ---------------------------------------------------------------------------

export interface RecordedCall {
  url: string;
  headers: Headers;
  body: unknown;
}

export interface FakeFetch {
  fetch: FetchLike;
  calls: RecordedCall[];
}

/** Records every call and answers with `respond`. */
export function fakeFetch(respond: (url: string) => Response | Promise<Response>): FakeFetch {
  const calls: RecordedCall[] = [];

  const fetch: FetchLike = async (url, init) => {
    const raw = init.body;
    calls.push({
      url,
      headers: new Headers(init.headers),
      body: typeof raw === "string" ? JSON.parse(raw) : undefined,
    });
    return respond(url);
  };

  return { fetch, calls };
}

/** Field of a recorded JSON body, for assertions. */
export function bodyField(call: RecordedCall | undefined, field: string): unknown {
  const body = call?.body;
  return body !== null && typeof body === "object" ? Reflect.get(body, field) : undefined;
}
