/**
 * Generation routes.
 * POST /api/generate-image — generate and return the first image as PNG.
 * POST /api/estimate-cost  — normalize the same body and price it in Anlas.
 *
 * Bodies use short aliases for enumerated values:
 *   model           v3, v4, v4_cur, v4_5, v4_5_cur, furry (+ _inp variants)
 *   res             small_portrait ... wallpaper_landscape
 *   sampler         euler, euler_anc, dpm2s_anc, dpm2m, dpm2msde, dpmsde, ddim
 *   noise_schedule  native, karras, exponential, polyexponential
 * Full wire values are accepted as well.
 */

import { Router, Request, Response } from "express";
import {
  MODELS,
  MODEL_IDS,
  NOISE_SCHEDULE_VALUES,
  RESOLUTION_PRESET_NAMES,
  SAMPLERS,
  SAMPLER_VALUES,
  isOneOf,
  isResolutionPreset,
} from "../models/constants";
import type { ModelId, NoiseSchedule, ResolutionPreset, Sampler } from "../models/constants";
import type { GenerationParams } from "../models/generation";
import { estimateCost } from "../services/generation";
import { saveImages } from "../services/imageStorage";
import type { ApiDependencies } from "./index";
import {
  bodyOf,
  optionalNumber,
  optionalString,
  sendValidationErrors,
  type ValidationError,
} from "./validation";

// ---------------------------------------------------------------------------
// Aliases
// ---------------------------------------------------------------------------

const MODEL_ALIASES = new Map<string, ModelId>(
  Object.entries(MODELS).map(([key, id]) => [key.toLowerCase(), id])
);

const SAMPLER_ALIASES = new Map<string, Sampler>([
  ["euler", SAMPLERS.EULER],
  ["euler_anc", SAMPLERS.EULER_ANC],
  ["dpm2s_anc", SAMPLERS.DPM2S_ANC],
  ["dpm2m", SAMPLERS.DPM2M],
  ["dpm2msde", SAMPLERS.DPM2MSDE],
  ["dpmsde", SAMPLERS.DPMSDE],
  ["ddim", SAMPLERS.DDIM],
]);

/** `v4.5`, `V4-5` and `v4_5` all name the same model. */
export function resolveModel(alias: string): ModelId | undefined {
  if (isOneOf(MODEL_IDS, alias)) return alias;
  return MODEL_ALIASES.get(alias.toLowerCase().replace(/[.-]/g, "_"));
}

export function resolveResolution(alias: string): ResolutionPreset | undefined {
  const name = alias.toUpperCase();
  return isResolutionPreset(name) ? name : undefined;
}

export function resolveSampler(alias: string): Sampler | undefined {
  if (isOneOf(SAMPLER_VALUES, alias)) return alias;
  return SAMPLER_ALIASES.get(alias.toLowerCase());
}

export function resolveNoiseSchedule(alias: string): NoiseSchedule | undefined {
  const name = alias.toLowerCase();
  return isOneOf(NOISE_SCHEDULE_VALUES, name) ? name : undefined;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

interface GenerationInput {
  params: GenerationParams;
  errors: ValidationError[];
}

function aliasField<T>(
  body: Record<string, unknown>,
  field: string,
  fallback: string,
  resolve: (alias: string) => T | undefined,
  available: readonly string[],
  errors: ValidationError[]
): T | undefined {
  const alias = optionalString(body, field, errors) ?? fallback;
  const value = resolve(alias);
  if (value === undefined) {
    errors.push({
      field,
      message: `Invalid ${field}: ${alias}. Available: ${available.join(", ")}`,
    });
  }
  return value;
}

function validateGenerationInput(raw: unknown): GenerationInput {
  const body = bodyOf(raw);
  const errors: ValidationError[] = [];

  const prompt = optionalString(body, "prompt", errors);
  if (!prompt) {
    errors.push({ field: "prompt", message: "Prompt is required" });
  }

  const model = aliasField(body, "model", "v4", resolveModel, [...MODEL_ALIASES.keys()], errors);
  const resPreset = aliasField(
    body,
    "res",
    "normal_portrait",
    resolveResolution,
    RESOLUTION_PRESET_NAMES.map((name) => name.toLowerCase()),
    errors
  );
  const sampler = aliasField(body, "sampler", "euler_anc", resolveSampler, [...SAMPLER_ALIASES.keys()], errors);
  const noiseSchedule = aliasField(
    body,
    "noise_schedule",
    "karras",
    resolveNoiseSchedule,
    NOISE_SCHEDULE_VALUES,
    errors
  );

  const paramsVersion = optionalNumber(body, "params_version", errors) ?? 3;
  if (paramsVersion !== 1 && paramsVersion !== 2 && paramsVersion !== 3) {
    errors.push({ field: "params_version", message: "params_version must be 1, 2 or 3" });
  }

  const params: GenerationParams = {
    prompt: prompt ?? "",
    negative_prompt: optionalString(body, "negative_prompt", errors),
    model,
    resPreset,
    sampler,
    noise_schedule: noiseSchedule,
    steps: optionalNumber(body, "steps", errors) ?? 28,
    scale: optionalNumber(body, "scale", errors) ?? 6.0,
    ucPreset: optionalNumber(body, "uc_preset", errors) ?? 2,
    params_version: paramsVersion === 1 || paramsVersion === 2 ? paramsVersion : 3,
    seed: optionalNumber(body, "seed", errors),
    n_samples: optionalNumber(body, "n_samples", errors),
    width: optionalNumber(body, "width", errors),
    height: optionalNumber(body, "height", errors),
  };

  return { params, errors };
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function createGenerationRouter({ client, isOpus = false, outputDir }: ApiDependencies): Router {
  const generationRouter = Router();

  generationRouter.post("/generate-image", async (req: Request, res: Response): Promise<void> => {
    const { params, errors } = validateGenerationInput(req.body);
    if (errors.length > 0) {
      sendValidationErrors(res, errors);
      return;
    }

    const images = await client.generateImage(params);

    if (outputDir) {
      await saveImages(images, outputDir);
    }

    // Only the first image is returned; the rest are kept on disk when saving
    const [first] = images;

    res.setHeader("X-Image-Filename", first.filename);
    res.type("png").send(first.data);
  });

  generationRouter.post("/estimate-cost", (req: Request, res: Response): void => {
    const { params, errors } = validateGenerationInput(req.body);
    const body = bodyOf(req.body);

    const opus = body.is_opus ?? isOpus;
    if (typeof opus !== "boolean") {
      errors.push({ field: "is_opus", message: "is_opus must be a boolean" });
    }
    if (errors.length > 0) {
      sendValidationErrors(res, errors);
      return;
    }

    const request = client.normalize(params);

    res.json({
      cost: estimateCost(request, { isOpus: opus === true }),
      width: request.width,
      height: request.height,
      n_samples: request.n_samples,
    });
  });

  return generationRouter;
}
