/**
 * Director tools: image-to-image utilities served by /ai/augment-image.
 */

export const EMOTIONS = [
  "neutral",
  "happy",
  "sad",
  "angry",
  "scared",
  "surprised",
  "tired",
  "excited",
  "nervous",
  "thinking",
  "confused",
  "shy",
  "disgusted",
  "smug",
  "bored",
  "laughing",
  "irritated",
  "aroused",
  "embarrassed",
  "worried",
  "love",
  "determined",
  "hurt",
  "playful",
] as const;

export type Emotion = (typeof EMOTIONS)[number];

/** 0 is the full effect, 5 the weakest. */
export type EmotionLevel = 0 | 1 | 2 | 3 | 4 | 5;

export type DirectorTool =
  | { kind: "lineart" }
  | { kind: "sketch" }
  | { kind: "bg-removal" }
  | { kind: "declutter" }
  | { kind: "colorize"; prompt?: string; defry?: number }
  | { kind: "emotion"; emotion: Emotion; prompt?: string; level?: EmotionLevel };

export type DirectorToolKind = DirectorTool["kind"];

/** JSON body of /ai/augment-image. */
export interface DirectorRequest {
  req_type: DirectorToolKind;
  width: number;
  height: number;
  image: string;
  prompt: string;
  defry: number;
}
