export { decodeFrame } from "./frameDecoder";
export type { Clock } from "./frameDecoder";
export { StreamEventParser } from "./streamEventParser";
export { parseEventBuffer, extractFinalImages } from "./batchEventParser";
export { extractArchive, extractFirstEntry } from "./archiveExtractor";
export { sniffImageFormat, filenameTimestamp } from "./imageFormat";
