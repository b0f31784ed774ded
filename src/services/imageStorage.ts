/**
 * Image storage service.
 *
 * Writes decoded images to a local directory, creating it on first use.
 * Returns the absolute path of each written file.
 */

import * as fs from "fs";
import * as path from "path";
import { logger } from "../config/logger";
import type { Image } from "../models/events";

/**
 * Save one image.
 *
 * @param dir - Target directory, relative paths resolve against the working directory
 * @param filename - Overrides `image.filename`; the image is renamed to match
 */
export async function saveImage(image: Image, dir: string, filename?: string): Promise<string> {
  const targetDir = path.resolve(dir);
  await fs.promises.mkdir(targetDir, { recursive: true });

  // Only the base name is used; writes stay inside `dir`
  image.filename = path.basename(filename ?? image.filename);

  const filepath = path.join(targetDir, image.filename);
  await fs.promises.writeFile(filepath, image.data);

  logger.info("imageStorage", `Saved image as ${image.filename}`, {
    filename: image.filename,
    bytes: image.data.length,
  });

  return filepath;
}

/** Save several images in order. */
export async function saveImages(images: readonly Image[], dir: string): Promise<string[]> {
  const paths: string[] = [];
  for (const image of images) {
    paths.push(await saveImage(image, dir));
  }
  return paths;
}
