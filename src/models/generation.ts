/**
 * Generation request shapes.
 *
 * `GenerationParams` is what callers hand in: only `prompt` is required.
 * `NormalizedRequest` is what the normalizer hands back: every defaulted
 * field is present, and the object is frozen.
 *
 * Apart from the four general fields (prompt, model, action, resPreset) the
 * field names are the service's wire names, so serialization is a plain copy.
 */

import type {
  Action,
  ControlnetModel,
  ModelId,
  NoiseSchedule,
  ResolutionPreset,
  Sampler,
} from "./constants";

export type UcPreset = 0 | 1 | 2 | 3;

export interface PositionCoords {
  x: number;
  y: number;
}

export interface CharacterPromptInput {
  prompt?: string;
  uc?: string;
  center?: Partial<PositionCoords>;
  enabled?: boolean;
}

export interface CharacterPrompt {
  readonly prompt: string;
  readonly uc: string;
  readonly center: Readonly<PositionCoords>;
  readonly enabled: boolean;
}

export interface CharacterCaption {
  char_caption: string;
  centers: PositionCoords[];
}

export interface V4CaptionFormat {
  base_caption: string;
  char_captions: CharacterCaption[];
}

export interface V4PromptFormat {
  caption: V4CaptionFormat;
  use_coords: boolean;
  use_order: boolean;
}

export interface V4NegativePromptFormat {
  caption: V4CaptionFormat;
  legacy_uc: boolean;
}

/** Fields shared by the sparse input and the normalized request. */
interface ParameterFields {
  negative_prompt: string;
  qualityToggle: boolean;
  ucPreset: UcPreset;

  width: number;
  height: number;
  n_samples: number;

  steps: number;
  scale: number;
  dynamic_thresholding: boolean;
  seed: number;
  extra_noise_seed: number;
  sampler: Sampler;
  sm: boolean;
  sm_dyn: boolean;
  cfg_rescale: number;
  noise_schedule: NoiseSchedule;

  image: string;
  strength: number;
  noise: number;
  controlnet_strength: number;
  controlnet_condition: string;
  controlnet_model: ControlnetModel;

  add_original_image: boolean;
  mask: string;

  reference_image_multiple: readonly string[];
  reference_information_extracted_multiple: readonly number[];
  reference_strength_multiple: readonly number[];

  params_version: 1 | 2 | 3;
  autoSmea: boolean;
  v4_prompt: V4PromptFormat;
  v4_negative_prompt: V4NegativePromptFormat;
  skip_cfg_above_sigma: number;
  use_coords: boolean;
  legacy_uc: boolean;
  normalize_reference_strength_multiple: boolean;
  deliberate_euler_ancestral_bug: boolean;
  prefer_brownian: boolean;
  inpaintImg2ImgStrength: number;

  legacy: boolean;
  legacy_v3_extend: boolean;
}

/**
 * Sparse caller input. `model`, `action`, `sampler` and friends are typed as
 * plain strings here as well, since they often arrive from JSON; the
 * normalizer rejects values it does not know.
 */
export type GenerationParams = Partial<
  Omit<ParameterFields, "sampler" | "noise_schedule" | "controlnet_model" | "ucPreset">
> & {
  prompt: string;
  model?: ModelId | string;
  action?: Action | string;
  resPreset?: ResolutionPreset | string;
  sampler?: Sampler | string;
  noise_schedule?: NoiseSchedule | string;
  controlnet_model?: ControlnetModel | string;
  ucPreset?: number;
  characterPrompts?: readonly CharacterPromptInput[];
};

/** Fields that stay optional after normalization. */
type OptionalAfterNormalization =
  | "extra_noise_seed"
  | "sm"
  | "sm_dyn"
  | "image"
  | "strength"
  | "noise"
  | "controlnet_condition"
  | "controlnet_model"
  | "mask"
  | "reference_image_multiple"
  | "reference_information_extracted_multiple"
  | "reference_strength_multiple"
  | "v4_prompt"
  | "v4_negative_prompt"
  | "skip_cfg_above_sigma"
  | "inpaintImg2ImgStrength";

export type NormalizedRequest = Readonly<
  Omit<ParameterFields, OptionalAfterNormalization> &
    Partial<Pick<ParameterFields, OptionalAfterNormalization>> & {
      prompt: string;
      model: ModelId;
      action: Action;
      resPreset: ResolutionPreset;
      /** Absent for img2img and inpainting. */
      characterPrompts?: readonly CharacterPrompt[];
      /** "msgpack" for current-protocol plain generation. */
      stream?: "msgpack";
    }
>;

/** JSON body of /ai/generate-image and /ai/generate-image-stream. */
export interface RequestPayload {
  input: string;
  model: ModelId;
  action: Action;
  parameters: Record<string, unknown>;
}
