/**
 * Collaborator interfaces of the image generation client.
 *
 * Transport and authentication are injected so the client can run against
 * an in-process stand-in, or a token source that refreshes itself.
 */

import type { Clock } from "../decoding/frameDecoder";

/** The subset of the global `fetch` the client calls. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface AccessTokenProvider {
  /** Bearer token sent with every request. */
  getAccessToken(): Promise<string>;
}

export interface ClientOptions {
  /** Static bearer token; ignored when `tokenProvider` is given. */
  token?: string;
  tokenProvider?: AccessTokenProvider;
  /** Base URL of the image service (default: https://image.novelai.net). */
  host?: string;
  /** Per-request timeout in milliseconds (default: 30000). */
  timeoutMs?: number;
  fetch?: FetchLike;
  /** Log the estimated cost and request summary of every generation. */
  verbose?: boolean;
  /** Account is on the tier with free generations; only affects the logged estimate. */
  isOpus?: boolean;
  /** Clock used for filenames and the x-initiated-at header. */
  now?: Clock;
  /** Seed source passed to the normalizer. */
  randomSeed?: () => number;
}
