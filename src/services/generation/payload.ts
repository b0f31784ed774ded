/**
 * Serializes a normalized request into the JSON body the image service
 * expects: `{ input, model, action, parameters }`.
 */

import { isV4Model } from "../../models/constants";
import type { NormalizedRequest, RequestPayload } from "../../models/generation";

/** Fields carried outside `parameters`, or not sent at all. */
const EXCLUDED_FROM_PARAMETERS = new Set([
  "prompt",
  "model",
  "action",
  "resPreset",
  "v4_prompt",
  "v4_negative_prompt",
]);

export function buildRequestPayload(request: NormalizedRequest): RequestPayload {
  const parameters: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(request)) {
    if (value === undefined || EXCLUDED_FROM_PARAMETERS.has(key)) continue;
    parameters[key] = value;
  }

  // Structured captions only mean something to the current protocol
  if (isV4Model(request.model)) {
    if (request.v4_prompt) parameters.v4_prompt = request.v4_prompt;
    if (request.v4_negative_prompt) parameters.v4_negative_prompt = request.v4_negative_prompt;
  }

  return {
    input: request.prompt,
    model: request.model,
    action: request.action,
    parameters,
  };
}
