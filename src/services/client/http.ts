/**
 * Request headers and error mapping for the image service.
 */

import { randomInt } from "crypto";
import { BASE_HEADERS } from "../../models/constants";
import {
  ApiFailure,
  AuthFailure,
  GatewayError,
  RateLimitFailure,
  TransportFailure,
} from "../errors";

const CORRELATION_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
const CORRELATION_ID_LENGTH = 6;
const MAX_DETAIL_LENGTH = 500;

export function correlationId(): string {
  let id = "";
  for (let i = 0; i < CORRELATION_ID_LENGTH; i++) {
    id += CORRELATION_ALPHABET[randomInt(CORRELATION_ALPHABET.length)];
  }
  return id;
}

export function buildHeaders(token: string, initiatedAt: Date): Record<string, string> {
  return {
    ...BASE_HEADERS,
    Authorization: `Bearer ${token}`,
    "x-correlation-id": correlationId(),
    "x-initiated-at": initiatedAt.toISOString(),
  };
}

/** Error body as compact JSON when it parses, else the raw text cut to 500 chars. */
export function formatErrorDetail(body: string): string {
  try {
    return JSON.stringify(JSON.parse(body));
  } catch {
    return body.slice(0, MAX_DETAIL_LENGTH);
  }
}

export function failureForStatus(status: number, detail: string): TransportFailure {
  switch (status) {
    case 400:
      return new ApiFailure(`A validation error occurred. Response: ${detail}`, status);
    case 401:
      return new AuthFailure(`Access token is incorrect. Response: ${detail}`, status);
    case 402:
      return new AuthFailure(`An active subscription is required. Response: ${detail}`, status);
    case 409:
      return new ApiFailure(`A conflict error occurred. Response: ${detail}`, status);
    case 429:
      return new RateLimitFailure(`Rate limit exceeded. Response: ${detail}`);
    default:
      return new TransportFailure(`Unknown error (status ${status}). Response: ${detail}`, status);
  }
}

/** Typed failures pass through; anything else becomes a TransportFailure. */
export function toTransportFailure(operation: string, err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransportFailure(`${operation} failed: ${message}`, null);
}
