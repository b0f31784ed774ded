/**
 * Enumerations shared by the normalizer, the client and the web API.
 */

export const HOSTS = {
  WEB: "https://image.novelai.net",
} as const;

export const ENDPOINTS = {
  IMAGE: "/ai/generate-image",
  IMAGE_STREAM: "/ai/generate-image-stream",
  DIRECTOR: "/ai/augment-image",
  ENCODE_VIBE: "/ai/encode-vibe",
} as const;

export const BASE_HEADERS: Readonly<Record<string, string>> = {
  Accept: "*/*",
  "Accept-Language": "en-US,en;q=0.5",
  "Content-Type": "application/json",
  Origin: "https://novelai.net",
  Referer: "https://novelai.net",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:138.0) Gecko/20100101 Firefox/138.0",
};

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export const MODELS = {
  V3: "nai-diffusion-3",
  V3_INP: "nai-diffusion-3-inpainting",
  V4: "nai-diffusion-4-full",
  V4_INP: "nai-diffusion-4-full-inpainting",
  V4_CUR: "nai-diffusion-4-curated-preview",
  V4_CUR_INP: "nai-diffusion-4-curated-inpainting",
  V4_5: "nai-diffusion-4-5-full",
  V4_5_INP: "nai-diffusion-4-5-full-inpainting",
  V4_5_CUR: "nai-diffusion-4-5-curated",
  V4_5_CUR_INP: "nai-diffusion-4-5-curated-inpainting",
  FURRY: "nai-diffusion-furry-3",
  FURRY_INP: "nai-diffusion-furry-3-inpainting",
} as const;

export type ModelId = (typeof MODELS)[keyof typeof MODELS];

export const MODEL_IDS: readonly ModelId[] = Object.values(MODELS);

/** Model line a model id belongs to; inpainting variants share their base family. */
export type ModelFamily = "v3" | "furry" | "v4" | "v4-curated" | "v4.5" | "v4.5-curated";

export function modelFamily(model: ModelId): ModelFamily {
  switch (model) {
    case MODELS.V3:
    case MODELS.V3_INP:
      return "v3";
    case MODELS.FURRY:
    case MODELS.FURRY_INP:
      return "furry";
    case MODELS.V4:
    case MODELS.V4_INP:
      return "v4";
    case MODELS.V4_CUR:
    case MODELS.V4_CUR_INP:
      return "v4-curated";
    case MODELS.V4_5:
    case MODELS.V4_5_INP:
      return "v4.5";
    case MODELS.V4_5_CUR:
    case MODELS.V4_5_CUR_INP:
      return "v4.5-curated";
  }
}

/** Current-protocol models take structured captions and answer with msgpack frames. */
export function isV4Model(model: ModelId): boolean {
  const family = modelFamily(model);
  return family !== "v3" && family !== "furry";
}

// ---------------------------------------------------------------------------
// Actions, samplers, schedules
// ---------------------------------------------------------------------------

export const ACTIONS = {
  GENERATE: "generate",
  INPAINT: "infill",
  IMG2IMG: "img2img",
} as const;

export type Action = (typeof ACTIONS)[keyof typeof ACTIONS];

export const ACTION_VALUES: readonly Action[] = Object.values(ACTIONS);

export const SAMPLERS = {
  EULER: "k_euler",
  EULER_ANC: "k_euler_ancestral",
  DPM2S_ANC: "k_dpmpp_2s_ancestral",
  DPM2M: "k_dpmpp_2m",
  DPM2MSDE: "k_dpmpp_2m_sde",
  DPMSDE: "k_dpmpp_sde",
  DDIM: "ddim_v3",
} as const;

export type Sampler = (typeof SAMPLERS)[keyof typeof SAMPLERS];

export const SAMPLER_VALUES: readonly Sampler[] = Object.values(SAMPLERS);

// "native" is not accepted by v4-curated and later models
export const NOISE_SCHEDULES = {
  NATIVE: "native",
  KARRAS: "karras",
  EXPONENTIAL: "exponential",
  POLYEXPONENTIAL: "polyexponential",
} as const;

export type NoiseSchedule = (typeof NOISE_SCHEDULES)[keyof typeof NOISE_SCHEDULES];

export const NOISE_SCHEDULE_VALUES: readonly NoiseSchedule[] = Object.values(NOISE_SCHEDULES);

export const CONTROLNET_MODELS = {
  PALETTE_SWAP: "hed",
  FORM_LOCK: "midas",
  SCRIBBLER: "fake_scribble",
  BUILDING_CONTROL: "mlsd",
  LANDSCAPER: "uniformer",
} as const;

export type ControlnetModel = (typeof CONTROLNET_MODELS)[keyof typeof CONTROLNET_MODELS];

export const CONTROLNET_MODEL_VALUES: readonly ControlnetModel[] = Object.values(CONTROLNET_MODELS);

// ---------------------------------------------------------------------------
// Resolution presets
// ---------------------------------------------------------------------------

export const RESOLUTION_PRESETS = {
  SMALL_PORTRAIT: { width: 512, height: 768 },
  SMALL_LANDSCAPE: { width: 768, height: 512 },
  SMALL_SQUARE: { width: 640, height: 640 },
  NORMAL_PORTRAIT: { width: 832, height: 1216 },
  NORMAL_LANDSCAPE: { width: 1216, height: 832 },
  NORMAL_SQUARE: { width: 1024, height: 1024 },
  LARGE_PORTRAIT: { width: 1024, height: 1536 },
  LARGE_LANDSCAPE: { width: 1536, height: 1024 },
  LARGE_SQUARE: { width: 1472, height: 1472 },
  WALLPAPER_PORTRAIT: { width: 1088, height: 1920 },
  WALLPAPER_LANDSCAPE: { width: 1920, height: 1088 },
} as const;

export type ResolutionPreset = keyof typeof RESOLUTION_PRESETS;

export function isResolutionPreset(value: unknown): value is ResolutionPreset {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(RESOLUTION_PRESETS, value);
}

export const RESOLUTION_PRESET_NAMES: readonly ResolutionPreset[] =
  Object.keys(RESOLUTION_PRESETS).filter(isResolutionPreset);

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  const known: readonly string[] = values;
  return typeof value === "string" && known.includes(value);
}
