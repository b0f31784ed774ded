/**
 * Legacy protocol responses: a ZIP archive with one PNG per sample.
 */

import AdmZip from "adm-zip";
import type { Image } from "../../models/events";
import { FormatFailure } from "../errors";
import { filenameTimestamp } from "./imageFormat";
import type { Clock } from "./frameDecoder";

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** File entries' bytes in the archive's listing order, directories skipped. */
function readEntries(data: Uint8Array): Buffer[] {
  if (data.length === 0) {
    throw new FormatFailure("Received empty response from the image service");
  }

  try {
    const zip = new AdmZip(Buffer.from(data));
    return zip
      .getEntries()
      .filter((entry) => !entry.isDirectory)
      .map((entry) => entry.getData());
  } catch (err) {
    throw new FormatFailure(`Unreadable image archive: ${describe(err)}`);
  }
}

/**
 * Unpack every image, named `YYYYMMDD_HHMMSS_p{i}.png`.
 *
 * @throws FormatFailure for an empty, corrupt or image-less archive
 */
export function extractArchive(data: Uint8Array, now: Clock = () => new Date()): Image[] {
  const entries = readEntries(data);
  if (entries.length === 0) {
    throw new FormatFailure("Image archive is empty");
  }

  const stamp = filenameTimestamp(now());
  return entries.map((bytes, i) => ({ filename: `${stamp}_p${i}.png`, data: bytes }));
}

/** The single file of a director tool response. */
export function extractFirstEntry(data: Uint8Array): Buffer {
  const [first] = readEntries(data);
  if (first === undefined) {
    throw new FormatFailure("Image archive is empty");
  }
  return first;
}
