/**
 * Fixed prompt text keyed by model family.
 *
 * Both tables are total over `ModelFamily`, so adding a family fails to
 * compile until its quality suffix and undesired-content presets exist.
 */

import type { ModelFamily } from "../../models/constants";
import type { UcPreset } from "../../models/generation";

/** Appended to the prompt when `qualityToggle` is on. */
export const QUALITY_TAGS: Readonly<Record<ModelFamily, string>> = {
  "v4.5": ", very aesthetic, masterpiece, no text",
  "v4.5-curated": ", location, masterpiece, no text, -0.8::feet::, rating:general",
  v4: ", no text, best quality, very aesthetic, absurdres",
  "v4-curated": ", rating:general, amazing quality, very aesthetic, absurdres",
  v3: ", best quality, amazing quality, very aesthetic, absurdres",
  furry: ", {best quality}, {amazing quality}",
};

/**
 * Undesired-content blocks indexed by `ucPreset`. A `null` slot means the
 * family has no such preset and the negative prompt is left alone.
 */
type UcPresetRow = readonly [string | null, string | null, string | null, string | null];

export const UC_PRESETS: Readonly<Record<ModelFamily, UcPresetRow>> = {
  "v4.5": [
    // Heavy
    "nsfw, lowres, artistic error, film grain, scan artifacts, worst quality, bad quality, jpeg artifacts, very displeasing, chromatic aberration, dithering, halftone, screentone, multiple views, logo, too many watermarks, negative space, blank page",
    // Light
    "nsfw, lowres, artistic error, scan artifacts, worst quality, bad quality, jpeg artifacts, multiple views, very displeasing, too many watermarks, negative space, blank page",
    // Furry focus
    "nsfw, {worst quality}, distracting watermark, unfinished, bad quality, {widescreen}, upscale, {sequence}, {{grandfathered content}}, blurred foreground, chromatic aberration, sketch, everyone, [sketch background], simple, [flat colors], ych (character), outline, multiple scenes, [[horror (theme)]], comic",
    // Human focus
    "nsfw, lowres, artistic error, film grain, scan artifacts, worst quality, bad quality, jpeg artifacts, very displeasing, chromatic aberration, dithering, halftone, screentone, multiple views, logo, too many watermarks, negative space, blank page, @_@, mismatched pupils, glowing eyes, bad anatomy",
  ],
  "v4.5-curated": [
    "blurry, lowres, upscaled, artistic error, film grain, scan artifacts, worst quality, bad quality, jpeg artifacts, very displeasing, chromatic aberration, halftone, multiple views, logo, too many watermarks, negative space, blank page",
    "blurry, lowres, upscaled, artistic error, scan artifacts, jpeg artifacts, logo, too many watermarks, negative space, blank page",
    "blurry, lowres, upscaled, artistic error, film grain, scan artifacts, bad anatomy, bad hands, worst quality, bad quality, jpeg artifacts, very displeasing, chromatic aberration, halftone, multiple views, logo, too many watermarks, @_@, mismatched pupils, glowing eyes, negative space, blank page",
    null,
  ],
  v4: [
    "blurry, lowres, error, film grain, scan artifacts, worst quality, bad quality, jpeg artifacts, very displeasing, chromatic aberration, multiple views, logo, too many watermarks",
    "blurry, lowres, error, worst quality, bad quality, jpeg artifacts, very displeasing",
    null,
    null,
  ],
  "v4-curated": [
    "blurry, lowres, error, film grain, scan artifacts, worst quality, bad quality, jpeg artifacts, very displeasing, chromatic aberration, logo, dated, signature, multiple views, gigantic breasts",
    "blurry, lowres, error, worst quality, bad quality, jpeg artifacts, very displeasing, logo, dated, signature",
    null,
    null,
  ],
  v3: [
    "lowres, {bad}, error, fewer, extra, missing, worst quality, jpeg artifacts, bad quality, watermark, unfinished, displeasing, chromatic aberration, signature, extra digits, artistic error, username, scan, [abstract]",
    "lowres, jpeg artifacts, worst quality, watermark, blurry, very displeasing",
    "lowres, {bad}, error, fewer, extra, missing, worst quality, jpeg artifacts, bad quality, watermark, unfinished, displeasing, chromatic aberration, signature, extra digits, artistic error, username, scan, [abstract], bad anatomy, bad hands, @_@, mismatched pupils, heart-shaped pupils, glowing eyes",
    null,
  ],
  furry: [
    "{{worst quality}}, [displeasing], {unusual pupils}, guide lines, {{unfinished}}, {bad}, url, artist name, {{tall image}}, mosaic, {sketch page}, comic panel, impact (font), [dated], {logo}, ych, {what}, {where is your god now}, {distorted text}, repeated text, {floating head}, {1994}, {widescreen}, absolutely everyone, sequence, {compression artifacts}, hard translated, {cropped}, {commissioner name}, unknown text, high contrast",
    "{worst quality}, guide lines, unfinished, bad, url, tall image, widescreen, compression artifacts, unknown text",
    null,
    null,
  ],
};

export function ucPresetText(family: ModelFamily, preset: UcPreset): string | null {
  return UC_PRESETS[family][preset];
}
