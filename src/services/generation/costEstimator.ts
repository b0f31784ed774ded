/**
 * Anlas cost of a normalized request.
 *
 * Mirrors the service's pricing: a per-pixel and per-step linear term,
 * scaled by the SMEA factor and the img2img strength, floored at 2 per image.
 * Subscribers on the free-generation tier are not billed for one image when
 * the request stays within 28 steps and the normal square resolution.
 */

import { ACTIONS, RESOLUTION_PRESETS, isV4Model } from "../../models/constants";
import type { NormalizedRequest } from "../../models/generation";

const PIXEL_COST = 2951823174884865e-21;
const PIXEL_STEP_COST = 5.753298233447344e-7;

const MIN_BILLED_AREA = 65536;
const MIN_SAMPLE_COST = 2;
const FREE_STEPS = 28;

const PORTRAIT_AREA = RESOLUTION_PRESETS.NORMAL_PORTRAIT.width * RESOLUTION_PRESETS.NORMAL_PORTRAIT.height;
const SQUARE_AREA = RESOLUTION_PRESETS.NORMAL_SQUARE.width * RESOLUTION_PRESETS.NORMAL_SQUARE.height;

export type CostInput = Pick<
  NormalizedRequest,
  "model" | "action" | "width" | "height" | "steps" | "n_samples" | "strength" | "autoSmea" | "sm" | "sm_dyn"
>;

export interface CostOptions {
  /** Account is on the tier with free generations. */
  isOpus?: boolean;
}

function smeaFactor(request: CostInput): number {
  if (isV4Model(request.model)) {
    return request.autoSmea ? 1.2 : 1.0;
  }
  if (request.sm_dyn) return 1.4;
  if (request.sm) return 1.2;
  return 1.0;
}

/** Billed pixel count; sizes between normal portrait and normal square cost the same as portrait. */
function billedArea(width: number, height: number): number {
  const area = Math.max(width * height, MIN_BILLED_AREA);
  return area > PORTRAIT_AREA && area <= SQUARE_AREA ? PORTRAIT_AREA : area;
}

export function estimateCost(request: CostInput, options: CostOptions = {}): number {
  const { steps, n_samples } = request;
  const strength = request.action === ACTIONS.IMG2IMG && request.strength ? request.strength : 1.0;
  const area = billedArea(request.width, request.height);

  const base = Math.ceil(PIXEL_COST * area + PIXEL_STEP_COST * area * steps) * smeaFactor(request);
  const perSample = Math.max(Math.ceil(base * strength), MIN_SAMPLE_COST);

  const freeSample = Boolean(options.isOpus) && steps <= FREE_STEPS && area <= SQUARE_AREA;

  return perSample * (n_samples - (freeSample ? 1 : 0));
}
