/**
 * Builds /ai/augment-image requests from a director tool and a prepared image.
 */

import { EMOTIONS, type DirectorRequest, type DirectorTool, type Emotion } from "../models/director";
import { isOneOf } from "../models/constants";
import { ValidationFailure } from "./errors";
import type { PreparedImage } from "./imageInput";

const MAX_DEFRY = 5;

function checkDefry(field: string, value: number | undefined): number {
  if (value === undefined) return 0;
  if (!Number.isInteger(value) || value < 0 || value > MAX_DEFRY) {
    throw new ValidationFailure(field, `${field} must be an integer within [0, ${MAX_DEFRY}], got ${value}`);
  }
  return value;
}

/** `"{emotion};;"`, followed by `"{prompt},"` when there is extra prompt text. */
export function emotionPrompt(emotion: Emotion, prompt?: string): string {
  if (!isOneOf(EMOTIONS, emotion)) {
    throw new ValidationFailure("emotion", `Unknown emotion "${String(emotion)}". Expected one of: ${EMOTIONS.join(", ")}`);
  }
  return prompt ? `${emotion};;${prompt},` : `${emotion};;`;
}

export function buildDirectorRequest(tool: DirectorTool, image: PreparedImage): DirectorRequest {
  const base = { req_type: tool.kind, width: image.width, height: image.height, image: image.base64 };

  switch (tool.kind) {
    case "lineart":
    case "sketch":
    case "bg-removal":
    case "declutter":
      return { ...base, prompt: "", defry: 0 };
    case "colorize":
      return { ...base, prompt: tool.prompt ?? "", defry: checkDefry("defry", tool.defry) };
    case "emotion":
      return { ...base, prompt: emotionPrompt(tool.emotion, tool.prompt), defry: checkDefry("level", tool.level) };
  }
}
