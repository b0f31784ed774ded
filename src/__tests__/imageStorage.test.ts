import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { Image } from "../models/events";
import { saveImage, saveImages } from "../services/imageStorage";
import { pngBytes } from "./fixtures";

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "image-storage-"));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("saveImage", () => {
  it("creates the directory and writes under the image's filename", async () => {
    const image: Image = { filename: "20240102_030405_final.png", data: pngBytes(64, 64) };
    const dir = path.join(root, "nested", "output");

    const filepath = await saveImage(image, dir);

    expect(filepath).toBe(path.join(dir, "20240102_030405_final.png"));
    expect(fs.readFileSync(filepath)).toEqual(image.data);
  });

  it("renames the image when a filename is given", async () => {
    const image: Image = { filename: "original.png", data: pngBytes(8, 8) };

    const filepath = await saveImage(image, root, "renamed.png");

    expect(image.filename).toBe("renamed.png");
    expect(filepath).toBe(path.join(root, "renamed.png"));
  });

  it("keeps writes inside the directory", async () => {
    const image: Image = { filename: "x.png", data: pngBytes(8, 8) };

    const filepath = await saveImage(image, path.join(root, "out"), "../escape.png");

    expect(filepath).toBe(path.join(root, "out", "escape.png"));
    expect(fs.existsSync(path.join(root, "escape.png"))).toBe(false);
  });
});

describe("saveImages", () => {
  it("writes every image in order", async () => {
    const images: Image[] = [
      { filename: "a_p0.png", data: pngBytes(8, 8) },
      { filename: "a_p1.png", data: pngBytes(16, 16) },
    ];

    const paths = await saveImages(images, root);

    expect(paths).toEqual([path.join(root, "a_p0.png"), path.join(root, "a_p1.png")]);
  });
});
