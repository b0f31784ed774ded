export { ImageGenerationClient } from "./imageGenerationClient";
export { StaticTokenProvider } from "./tokenProvider";
export { buildHeaders, correlationId, failureForStatus } from "./http";
export type { AccessTokenProvider, ClientOptions, FetchLike } from "./types";
