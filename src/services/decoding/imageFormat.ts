import type { ImageFormat } from "../../models/events";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] as const;

/** Identify an image by its leading bytes; `null` when it is neither JPEG nor PNG. */
export function sniffImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xd8) {
    return "jpeg";
  }
  if (bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((b, i) => bytes[i] === b)) {
    return "png";
  }
  return null;
}

export function fileExtension(format: ImageFormat): string {
  return format === "jpeg" ? "jpg" : "png";
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYYMMDD_HHMMSS`, the prefix of every generated filename. */
export function filenameTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}
