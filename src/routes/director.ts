/**
 * Director tool routes.
 * POST /api/director/:tool — run a director tool on a base64 or data-URL image.
 *
 * Tools: lineart, sketch, background-removal, declutter,
 *        colorize { prompt?, defry? }, change-emotion { emotion, prompt?, emotion_level? }
 */

import { Router, Request, Response } from "express";
import { isOneOf } from "../models/constants";
import { EMOTIONS } from "../models/director";
import type { DirectorTool, EmotionLevel } from "../models/director";
import { saveImage } from "../services/imageStorage";
import type { ApiDependencies } from "./index";
import {
  bodyOf,
  optionalNumber,
  optionalString,
  sendValidationErrors,
  type ValidationError,
} from "./validation";

export const DIRECTOR_ROUTES = [
  "lineart",
  "sketch",
  "background-removal",
  "declutter",
  "colorize",
  "change-emotion",
] as const;

type DirectorRoute = (typeof DIRECTOR_ROUTES)[number];

function isEmotionLevel(value: number): value is EmotionLevel {
  return Number.isInteger(value) && value >= 0 && value <= 5;
}

/** Tool description for a route, or null when the body is invalid (errors recorded). */
function toolFromBody(
  route: DirectorRoute,
  body: Record<string, unknown>,
  errors: ValidationError[]
): DirectorTool | null {
  switch (route) {
    case "lineart":
      return { kind: "lineart" };
    case "sketch":
      return { kind: "sketch" };
    case "background-removal":
      return { kind: "bg-removal" };
    case "declutter":
      return { kind: "declutter" };
    case "colorize":
      return {
        kind: "colorize",
        prompt: optionalString(body, "prompt", errors),
        defry: optionalNumber(body, "defry", errors),
      };
    case "change-emotion": {
      const emotion = optionalString(body, "emotion", errors);
      const prompt = optionalString(body, "prompt", errors);
      const level = optionalNumber(body, "emotion_level", errors);

      if (level !== undefined && !isEmotionLevel(level)) {
        errors.push({ field: "emotion_level", message: "emotion_level must be an integer from 0 to 5" });
        return null;
      }
      if (!isOneOf(EMOTIONS, emotion)) {
        errors.push({
          field: "emotion",
          message: `emotion must be one of: ${EMOTIONS.join(", ")}`,
        });
        return null;
      }
      return { kind: "emotion", emotion, prompt, level };
    }
  }
}

export function createDirectorRouter({ client, outputDir }: ApiDependencies): Router {
  const directorRouter = Router();

  directorRouter.post("/:tool", async (req: Request, res: Response): Promise<void> => {
    const route = req.params.tool;
    if (!isOneOf(DIRECTOR_ROUTES, route)) {
      res.status(404).json({
        error: {
          message: `Unknown director tool: ${route}. Available: ${DIRECTOR_ROUTES.join(", ")}`,
          code: "NOT_FOUND",
        },
      });
      return;
    }

    const body = bodyOf(req.body);
    const errors: ValidationError[] = [];

    const image = optionalString(body, "image", errors);
    if (!image) {
      errors.push({ field: "image", message: "Image is required" });
    }

    const tool = toolFromBody(route, body, errors);
    if (errors.length > 0 || !tool || !image) {
      sendValidationErrors(res, errors);
      return;
    }

    const result = await client.useDirectorTool(tool, image);

    if (outputDir) {
      await saveImage(result, outputDir);
    }

    res.setHeader("X-Image-Filename", result.filename);
    res.type("png").send(result.data);
  });

  return directorRouter;
}
