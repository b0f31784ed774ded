/**
 * Metadata normalizer.
 *
 * Turns a sparse `GenerationParams` into a complete, frozen
 * `NormalizedRequest`. Field validation runs first; after that every step is
 * a small function that takes a frozen snapshot and returns a new one, applied
 * in a fixed order:
 *
 *   1. resolution (preset or round up to 64), then the n_samples cap
 *   2. quality tags
 *   3. undesired-content preset
 *   4. tag deduplication
 *   5. coordinate usage
 *   6. character prompt defaults
 *   7. streaming flag
 *   8. structured captions
 *   9. inpaint strength
 *  10. img2img / inpaint extras
 *  11. vibe transfer lists
 *  12. sampler flags
 *
 * Every step leaves an already-normalized request unchanged, so feeding the
 * output back in returns an equal request.
 */

import { randomInt } from "crypto";
import {
  ACTIONS,
  ACTION_VALUES,
  CONTROLNET_MODEL_VALUES,
  MODELS,
  MODEL_IDS,
  NOISE_SCHEDULES,
  NOISE_SCHEDULE_VALUES,
  RESOLUTION_PRESETS,
  RESOLUTION_PRESET_NAMES,
  SAMPLERS,
  SAMPLER_VALUES,
  isOneOf,
  isV4Model,
  modelFamily,
} from "../../models/constants";
import type {
  CharacterCaption,
  CharacterPrompt,
  CharacterPromptInput,
  GenerationParams,
  NormalizedRequest,
  UcPreset,
} from "../../models/generation";
import { ValidationFailure } from "../errors";
import { QUALITY_TAGS, ucPresetText } from "./promptPresets";
import { deduplicateTags } from "./tagDeduplicator";

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

export const MAX_SEED = 4294967288;

const MIN_AREA = 64 * 64;
const MAX_AREA = 3047424;

const DEFAULT_IMG2IMG_STRENGTH = 0.3;
const DEFAULT_IMG2IMG_NOISE = 0;
const DEFAULT_VIBE_EXTRACTION = 1.0;
const DEFAULT_VIBE_STRENGTH = 0.6;

const DEFAULT_CHARACTER_PROMPT = "1girl, cute";
const DEFAULT_CHARACTER_UC = "lowres, aliasing";
const DEFAULT_CENTER = 0.5;

interface Bounds {
  min: number;
  max: number;
  integer?: boolean;
  /** The minimum itself is not allowed. */
  exclusiveMin?: boolean;
}

const BOUNDS = {
  width: { min: 64, max: 49152, integer: true },
  height: { min: 64, max: 49152, integer: true },
  n_samples: { min: 1, max: 8, integer: true },
  steps: { min: 1, max: 50, integer: true },
  scale: { min: 0, max: 10 },
  cfg_rescale: { min: 0, max: 1 },
  seed: { min: 0, max: MAX_SEED, integer: true, exclusiveMin: true },
  extra_noise_seed: { min: 0, max: MAX_SEED, integer: true, exclusiveMin: true },
  strength: { min: 0.01, max: 0.99 },
  noise: { min: 0, max: 0.99 },
  controlnet_strength: { min: 0.1, max: 2 },
  vibe: { min: 0.01, max: 1 },
  center: { min: 0.1, max: 0.9 },
  inpaintImg2ImgStrength: { min: 0, max: 1 },
  skip_cfg_above_sigma: { min: 0, max: Number.MAX_SAFE_INTEGER },
} as const satisfies Record<string, Bounds>;

// ---------------------------------------------------------------------------
// Snapshot types
// ---------------------------------------------------------------------------

/** Validated and defaulted, before the resolution is settled. */
type Draft = Readonly<
  Omit<NormalizedRequest, "width" | "height" | "characterPrompts"> & {
    width?: number;
    height?: number;
    characterPrompts?: readonly CharacterPromptInput[];
  }
>;

type Sized = Draft & Readonly<{ width: number; height: number }>;

type Step = (request: NormalizedRequest) => NormalizedRequest;

export interface NormalizeOptions {
  /** Source for `seed` and `extra_noise_seed` when the caller leaves them out. */
  randomSeed?: () => number;
}

export function defaultRandomSeed(): number {
  return randomInt(1, MAX_SEED + 1);
}

// ---------------------------------------------------------------------------
// Field validation
// ---------------------------------------------------------------------------

function checkNumber(field: string, value: unknown, bounds: Bounds): number {
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ValidationFailure(field, `${field} must be a number`);
  }
  if (bounds.integer && !Number.isInteger(value)) {
    throw new ValidationFailure(field, `${field} must be an integer, got ${value}`);
  }
  const belowMin = bounds.exclusiveMin ? value <= bounds.min : value < bounds.min;
  if (belowMin || value > bounds.max) {
    const lower = bounds.exclusiveMin ? `(${bounds.min}` : `[${bounds.min}`;
    throw new ValidationFailure(field, `${field} must be within ${lower}, ${bounds.max}], got ${value}`);
  }
  return value;
}

function optionalNumber(field: string, value: unknown, bounds: Bounds): number | undefined {
  return value === undefined ? undefined : checkNumber(field, value, bounds);
}

function optionalText(field: string, value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ValidationFailure(field, `${field} must be a string`);
  }
  return value;
}

function optionalFlag(field: string, value: unknown): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ValidationFailure(field, `${field} must be a boolean`);
  }
  return value;
}

function choice<T extends string>(field: string, values: readonly T[], value: unknown): T | undefined {
  if (value === undefined) return undefined;
  if (!isOneOf(values, value)) {
    throw new ValidationFailure(field, `Unknown ${field} "${String(value)}". Expected one of: ${values.join(", ")}`);
  }
  return value;
}

function isUcPreset(value: number): value is UcPreset {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function checkUcPreset(value: unknown): UcPreset | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !isUcPreset(value)) {
    throw new ValidationFailure("ucPreset", `ucPreset must be 0, 1, 2 or 3, got ${String(value)}`);
  }
  return value;
}

function checkParamsVersion(value: unknown): 1 | 2 | 3 | undefined {
  if (value === undefined) return undefined;
  if (value !== 1 && value !== 2 && value !== 3) {
    throw new ValidationFailure("params_version", `params_version must be 1, 2 or 3, got ${String(value)}`);
  }
  return value;
}

function textList(field: string, value: unknown): readonly string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationFailure(field, `${field} must be an array`);
  }
  return value.map((entry: unknown, i) => {
    if (typeof entry !== "string") {
      throw new ValidationFailure(`${field}[${i}]`, `${field}[${i}] must be a string`);
    }
    return entry;
  });
}

function numberList(field: string, value: unknown, bounds: Bounds): readonly number[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationFailure(field, `${field} must be an array`);
  }
  return value.map((entry: unknown, i) => checkNumber(`${field}[${i}]`, entry, bounds));
}

function checkCharacterPrompts(value: unknown): readonly CharacterPromptInput[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationFailure("characterPrompts", "characterPrompts must be an array");
  }

  return value.map((entry: unknown, i): CharacterPromptInput => {
    const field = `characterPrompts[${i}]`;
    if (entry === null || typeof entry !== "object") {
      throw new ValidationFailure(field, `${field} must be an object`);
    }

    const prompt = optionalText(`${field}.prompt`, Reflect.get(entry, "prompt"));
    const uc = optionalText(`${field}.uc`, Reflect.get(entry, "uc"));
    const enabled = optionalFlag(`${field}.enabled`, Reflect.get(entry, "enabled"));

    const rawCenter: unknown = Reflect.get(entry, "center");
    let center: CharacterPromptInput["center"] = undefined;
    if (rawCenter !== undefined) {
      if (rawCenter === null || typeof rawCenter !== "object") {
        throw new ValidationFailure(`${field}.center`, `${field}.center must be an object`);
      }
      center = {
        x: optionalNumber(`${field}.center.x`, Reflect.get(rawCenter, "x"), BOUNDS.center),
        y: optionalNumber(`${field}.center.y`, Reflect.get(rawCenter, "y"), BOUNDS.center),
      };
    }

    return { prompt, uc, center, enabled };
  });
}

/**
 * Validates every supplied field and fills the plain defaults. Resolution and
 * everything derived from other fields is left to the steps below.
 */
function applyDefaults(params: GenerationParams, randomSeed: () => number): Draft {
  if (typeof params.prompt !== "string") {
    throw new ValidationFailure("prompt", "prompt must be a string");
  }

  const draft: Draft = {
    prompt: params.prompt,
    model: choice("model", MODEL_IDS, params.model) ?? MODELS.V4_5,
    action: choice("action", ACTION_VALUES, params.action) ?? ACTIONS.GENERATE,
    resPreset: choice("resPreset", RESOLUTION_PRESET_NAMES, params.resPreset) ?? "NORMAL_SQUARE",

    negative_prompt: optionalText("negative_prompt", params.negative_prompt) ?? "",
    qualityToggle: optionalFlag("qualityToggle", params.qualityToggle) ?? true,
    ucPreset: checkUcPreset(params.ucPreset) ?? 0,

    width: optionalNumber("width", params.width, BOUNDS.width),
    height: optionalNumber("height", params.height, BOUNDS.height),
    n_samples: optionalNumber("n_samples", params.n_samples, BOUNDS.n_samples) ?? 1,

    steps: optionalNumber("steps", params.steps, BOUNDS.steps) ?? 28,
    scale: optionalNumber("scale", params.scale, BOUNDS.scale) ?? 6,
    dynamic_thresholding: optionalFlag("dynamic_thresholding", params.dynamic_thresholding) ?? false,
    seed: checkNumber("seed", params.seed ?? randomSeed(), BOUNDS.seed),
    extra_noise_seed: optionalNumber("extra_noise_seed", params.extra_noise_seed, BOUNDS.extra_noise_seed),
    sampler: choice("sampler", SAMPLER_VALUES, params.sampler) ?? SAMPLERS.EULER_ANC,
    sm: optionalFlag("sm", params.sm),
    sm_dyn: optionalFlag("sm_dyn", params.sm_dyn),
    cfg_rescale: optionalNumber("cfg_rescale", params.cfg_rescale, BOUNDS.cfg_rescale) ?? 0,
    noise_schedule: choice("noise_schedule", NOISE_SCHEDULE_VALUES, params.noise_schedule) ?? NOISE_SCHEDULES.KARRAS,

    image: optionalText("image", params.image),
    strength: optionalNumber("strength", params.strength, BOUNDS.strength),
    noise: optionalNumber("noise", params.noise, BOUNDS.noise),
    controlnet_strength: optionalNumber("controlnet_strength", params.controlnet_strength, BOUNDS.controlnet_strength) ?? 1,
    controlnet_condition: optionalText("controlnet_condition", params.controlnet_condition),
    controlnet_model: choice("controlnet_model", CONTROLNET_MODEL_VALUES, params.controlnet_model),

    add_original_image: optionalFlag("add_original_image", params.add_original_image) ?? true,
    mask: optionalText("mask", params.mask),

    reference_image_multiple: textList("reference_image_multiple", params.reference_image_multiple),
    reference_information_extracted_multiple: numberList(
      "reference_information_extracted_multiple",
      params.reference_information_extracted_multiple,
      BOUNDS.vibe,
    ),
    reference_strength_multiple: numberList("reference_strength_multiple", params.reference_strength_multiple, BOUNDS.vibe),

    params_version: checkParamsVersion(params.params_version) ?? 3,
    autoSmea: optionalFlag("autoSmea", params.autoSmea) ?? false,
    characterPrompts: checkCharacterPrompts(params.characterPrompts) ?? [],
    v4_prompt: params.v4_prompt,
    v4_negative_prompt: params.v4_negative_prompt,
    skip_cfg_above_sigma: optionalNumber("skip_cfg_above_sigma", params.skip_cfg_above_sigma, BOUNDS.skip_cfg_above_sigma),
    use_coords: optionalFlag("use_coords", params.use_coords) ?? false,
    legacy_uc: optionalFlag("legacy_uc", params.legacy_uc) ?? false,
    normalize_reference_strength_multiple:
      optionalFlag("normalize_reference_strength_multiple", params.normalize_reference_strength_multiple) ?? true,
    deliberate_euler_ancestral_bug:
      optionalFlag("deliberate_euler_ancestral_bug", params.deliberate_euler_ancestral_bug) ?? false,
    prefer_brownian: optionalFlag("prefer_brownian", params.prefer_brownian) ?? false,
    inpaintImg2ImgStrength: optionalNumber(
      "inpaintImg2ImgStrength",
      params.inpaintImg2ImgStrength,
      BOUNDS.inpaintImg2ImgStrength,
    ),

    legacy: optionalFlag("legacy", params.legacy) ?? false,
    legacy_v3_extend: optionalFlag("legacy_v3_extend", params.legacy_v3_extend) ?? false,
  };

  return Object.freeze(draft);
}

// ---------------------------------------------------------------------------
// 1. Resolution and sample cap
// ---------------------------------------------------------------------------

function roundUpTo64(value: number): number {
  return Math.ceil(value / 64) * 64;
}

function resolveResolution(draft: Draft): Sized {
  let width: number;
  let height: number;

  if (draft.width === undefined || draft.height === undefined) {
    ({ width, height } = RESOLUTION_PRESETS[draft.resPreset]);
  } else {
    width = roundUpTo64(draft.width);
    height = roundUpTo64(draft.height);
  }

  const area = width * height;
  if (area < MIN_AREA || area > MAX_AREA) {
    throw new ValidationFailure(
      "width",
      `Total resolution must be within [${MIN_AREA}, ${MAX_AREA}] px, got ${width}x${height}=${area}`,
    );
  }

  return Object.freeze({ ...draft, width, height });
}

/** Largest n_samples the service accepts at this size; 0 means none. */
export function maxSamplesFor(width: number, height: number): number {
  const area = width * height;
  if (area <= 512 * 704) return 8;
  if (area <= 640 * 640) return 6;
  if (area <= 1024 * 3072) return 4;
  return 0;
}

function capSamples(request: Sized): Sized {
  const cap = maxSamplesFor(request.width, request.height);
  if (request.n_samples > cap) {
    throw new ValidationFailure(
      "n_samples",
      `Max value of n_samples is ${cap} under current resolution (${request.width}x${request.height}). Got ${request.n_samples}.`,
    );
  }
  return request;
}

// ---------------------------------------------------------------------------
// 2-5. Prompt text
// ---------------------------------------------------------------------------

function appendQualityTags(request: Sized): Sized {
  if (!request.qualityToggle) return request;
  return Object.freeze({ ...request, prompt: request.prompt + QUALITY_TAGS[modelFamily(request.model)] });
}

function prependUcPreset(request: Sized): Sized {
  const uc = ucPresetText(modelFamily(request.model), request.ucPreset);
  if (uc === null) return request;

  const negative = request.negative_prompt ? `${uc}, ${request.negative_prompt}` : uc;
  return Object.freeze({ ...request, negative_prompt: negative });
}

function deduplicatePrompts(request: Sized): Sized {
  return Object.freeze({
    ...request,
    prompt: deduplicateTags(request.prompt),
    negative_prompt: deduplicateTags(request.negative_prompt),
  });
}

function inferUseCoords(request: Sized): Sized {
  const moved = (request.characterPrompts ?? []).some(
    (cp) => (cp.center?.x ?? DEFAULT_CENTER) !== DEFAULT_CENTER || (cp.center?.y ?? DEFAULT_CENTER) !== DEFAULT_CENTER,
  );
  return moved ? Object.freeze({ ...request, use_coords: true }) : request;
}

// ---------------------------------------------------------------------------
// 6. Character prompts
// ---------------------------------------------------------------------------

function fillCharacterPrompt(cp: CharacterPromptInput): CharacterPrompt {
  return Object.freeze({
    prompt: deduplicateTags(cp.prompt ?? "") || DEFAULT_CHARACTER_PROMPT,
    uc: deduplicateTags(cp.uc ?? "") || DEFAULT_CHARACTER_UC,
    center: Object.freeze({
      x: cp.center?.x ?? DEFAULT_CENTER,
      y: cp.center?.y ?? DEFAULT_CENTER,
    }),
    enabled: true,
  });
}

function defaultCharacterPrompts(request: Sized): NormalizedRequest {
  const characterPrompts =
    request.action === ACTIONS.GENERATE
      ? Object.freeze((request.characterPrompts ?? []).map(fillCharacterPrompt))
      : undefined;

  return Object.freeze({ ...request, characterPrompts });
}

// ---------------------------------------------------------------------------
// 7-12. Protocol and action specific fields
// ---------------------------------------------------------------------------

const setStreamMode: Step = (request) => {
  const stream: NormalizedRequest["stream"] =
    isV4Model(request.model) && request.action === ACTIONS.GENERATE ? "msgpack" : undefined;
  return request.stream === stream ? request : Object.freeze({ ...request, stream });
};

function captionsFrom(
  characters: readonly CharacterPrompt[],
  text: (cp: CharacterPrompt) => string,
): CharacterCaption[] {
  return characters
    .filter((cp) => text(cp))
    .map((cp) => ({ char_caption: text(cp), centers: [{ x: cp.center.x, y: cp.center.y }] }));
}

const deriveV4Captions: Step = (request) => {
  if (!isV4Model(request.model) || request.action === ACTIONS.IMG2IMG) return request;

  const characters = request.characterPrompts ?? [];

  const v4_prompt = request.v4_prompt ?? {
    caption: {
      base_caption: request.prompt,
      char_captions: captionsFrom(characters, (cp) => cp.prompt),
    },
    use_coords: request.use_coords,
    use_order: true,
  };

  const v4_negative_prompt = request.v4_negative_prompt ?? {
    caption: {
      base_caption: request.negative_prompt,
      char_captions: captionsFrom(characters, (cp) => cp.uc),
    },
    legacy_uc: request.legacy_uc,
  };

  return Object.freeze({ ...request, v4_prompt, v4_negative_prompt });
};

const defaultInpaintStrength: Step = (request) => {
  if (request.model !== MODELS.V4_5 && request.model !== MODELS.V4_5_INP) return request;
  if (request.inpaintImg2ImgStrength !== undefined) return request;
  return Object.freeze({ ...request, inpaintImg2ImgStrength: 1 });
};

function defaultImageToImage(randomSeed: () => number): Step {
  return (request) => {
    if (request.action !== ACTIONS.IMG2IMG && request.action !== ACTIONS.INPAINT) return request;
    return Object.freeze({
      ...request,
      strength: request.strength ?? DEFAULT_IMG2IMG_STRENGTH,
      noise: request.noise ?? DEFAULT_IMG2IMG_NOISE,
      extra_noise_seed:
        request.extra_noise_seed ?? checkNumber("extra_noise_seed", randomSeed(), BOUNDS.extra_noise_seed),
    });
  };
}

function fitList(values: readonly number[] | undefined, length: number, fill: number): readonly number[] {
  const fitted = (values ?? []).slice(0, length);
  while (fitted.length < length) fitted.push(fill);
  return Object.freeze(fitted);
}

const alignVibeTransfer: Step = (request) => {
  const images = request.reference_image_multiple;

  if (!images || images.length === 0) {
    return Object.freeze({
      ...request,
      reference_image_multiple: undefined,
      reference_information_extracted_multiple: undefined,
      reference_strength_multiple: undefined,
    });
  }

  return Object.freeze({
    ...request,
    reference_image_multiple: Object.freeze([...images]),
    reference_information_extracted_multiple: fitList(
      request.reference_information_extracted_multiple,
      images.length,
      DEFAULT_VIBE_EXTRACTION,
    ),
    reference_strength_multiple: fitList(request.reference_strength_multiple, images.length, DEFAULT_VIBE_STRENGTH),
  });
};

const applySamplerFlags: Step = (request) => {
  if (request.sampler !== SAMPLERS.EULER_ANC || request.action !== ACTIONS.GENERATE) return request;
  return Object.freeze({ ...request, deliberate_euler_ancestral_bug: false, prefer_brownian: true });
};

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate and complete a generation request.
 *
 * @throws ValidationFailure naming the first field that breaks a constraint
 */
export function normalizeMetadata(params: GenerationParams, options: NormalizeOptions = {}): NormalizedRequest {
  const randomSeed = options.randomSeed ?? defaultRandomSeed;

  const sized = capSamples(resolveResolution(applyDefaults(params, randomSeed)));
  const prompted = inferUseCoords(deduplicatePrompts(prependUcPreset(appendQualityTags(sized))));

  const steps: readonly Step[] = [
    setStreamMode,
    deriveV4Captions,
    defaultInpaintStrength,
    defaultImageToImage(randomSeed),
    alignVibeTransfer,
    applySamplerFlags,
  ];

  return steps.reduce((request, step) => step(request), defaultCharacterPrompts(prompted));
}
