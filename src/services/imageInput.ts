/**
 * Reads caller-supplied images for director tools and vibe transfer.
 *
 * Accepts raw bytes, a `data:image/...;base64,` URL, a bare base64 string or
 * a file path. Pixel sizes come from the image header via sharp.
 */

import * as fs from "fs";
import sharp from "sharp";
import { ValidationFailure } from "./errors";
import { sniffImageFormat } from "./decoding/imageFormat";

export type ImageSource = Uint8Array | string | { path: string };

export interface PreparedImage {
  width: number;
  height: number;
  /** Base64 of the original bytes. */
  base64: string;
}

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

function fail(message: string): never {
  throw new ValidationFailure("image", message);
}

export function readImageBytes(source: ImageSource): Buffer {
  if (source instanceof Uint8Array) {
    return Buffer.from(source);
  }

  if (typeof source !== "string") {
    try {
      return fs.readFileSync(source.path);
    } catch (err) {
      return fail(`Cannot read image file ${source.path}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (source.startsWith("data:image/")) {
    const comma = source.indexOf(",");
    if (comma === -1) fail("Malformed data URL");
    return Buffer.from(source.slice(comma + 1), "base64");
  }

  const compact = source.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_RE.test(compact)) {
    fail("Image must be bytes, a data URL, base64 or a file path");
  }
  return Buffer.from(compact, "base64");
}

// ---------------------------------------------------------------------------
// Dimensions
// ---------------------------------------------------------------------------

export async function imageDimensions(bytes: Buffer): Promise<{ width: number; height: number }> {
  const format = sniffImageFormat(bytes);
  if (format === null) {
    return fail("Unsupported or invalid image format");
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(bytes).metadata();
  } catch (err) {
    return fail(`Cannot read ${format.toUpperCase()} image: ${err instanceof Error ? err.message : String(err)}`);
  }

  const { width, height } = metadata;
  if (width === undefined || height === undefined) {
    return fail(`Could not find the size of the ${format.toUpperCase()} image`);
  }
  return { width, height };
}

export async function prepareImage(source: ImageSource): Promise<PreparedImage> {
  const bytes = readImageBytes(source);
  const { width, height } = await imageDimensions(bytes);
  return { width, height, base64: bytes.toString("base64") };
}
