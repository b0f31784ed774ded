/**
 * Library entry point.
 */

export * from "./models/constants";
export type * from "./models/generation";
export type * from "./models/events";
export * from "./models/director";
export * from "./services/errors";
export * from "./services/generation";
export * from "./services/decoding";
export * from "./services/client";
export { emotionPrompt, buildDirectorRequest } from "./services/director";
export { prepareImage, readImageBytes, imageDimensions } from "./services/imageInput";
export type { ImageSource, PreparedImage } from "./services/imageInput";
export { saveImage, saveImages } from "./services/imageStorage";
export { createLogger, logger } from "./config/logger";
