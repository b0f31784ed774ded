import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { buildDirectorRequest, emotionPrompt } from "../services/director";
import { imageDimensions, prepareImage, readImageBytes } from "../services/imageInput";
import { ValidationFailure } from "../services/errors";
import { encodedImage, pngBytes } from "./fixtures";

// ---------------------------------------------------------------------------
// Image input
// ---------------------------------------------------------------------------

describe("imageDimensions", () => {
  it("reads PNG and JPEG sizes", async () => {
    expect(await imageDimensions(await encodedImage("png", 832, 1216))).toEqual({ width: 832, height: 1216 });
    expect(await imageDimensions(await encodedImage("jpeg", 640, 480))).toEqual({ width: 640, height: 480 });
  });

  it("reads a JPEG with fill bytes before a marker", async () => {
    const jpeg = await encodedImage("jpeg", 300, 200);
    const padded = Buffer.concat([jpeg.subarray(0, 2), Buffer.from([0xff]), jpeg.subarray(2)]);

    expect(await imageDimensions(padded)).toEqual({ width: 300, height: 200 });
  });

  it("rejects other formats", async () => {
    await expect(imageDimensions(Buffer.from("GIF89a......"))).rejects.toThrow("Unsupported or invalid image format");
  });

  it("reports an unreadable PNG as a validation failure on image", async () => {
    const truncated = (await encodedImage("png", 16, 16)).subarray(0, 20);

    const failure = await imageDimensions(truncated).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ValidationFailure);
    expect(failure).toMatchObject({ field: "image", statusCode: 400 });
    expect(failure instanceof Error ? failure.message : "").toMatch(/^Cannot read PNG image: /);
  });
});

describe("readImageBytes", () => {
  const png = pngBytes(64, 32);

  it("accepts bytes, base64 and data URLs", () => {
    expect(readImageBytes(new Uint8Array(png))).toEqual(png);
    expect(readImageBytes(png.toString("base64"))).toEqual(png);
    expect(readImageBytes(`data:image/png;base64,${png.toString("base64")}`)).toEqual(png);
  });

  it("reads files from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "image-input-"));
    try {
      const file = path.join(dir, "input.png");
      fs.writeFileSync(file, png);
      expect(readImageBytes({ path: file })).toEqual(png);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("does not treat strings as paths", () => {
    expect(() => readImageBytes("/etc/hostname")).toThrow(ValidationFailure);
  });

  it("reports missing files as validation failures on image", () => {
    let failure: unknown;
    try {
      readImageBytes({ path: path.join(os.tmpdir(), "no-such-image.png") });
    } catch (err) {
      failure = err;
    }
    expect(failure).toBeInstanceOf(ValidationFailure);
    expect(failure).toMatchObject({ field: "image", statusCode: 400 });
  });
});

describe("prepareImage", () => {
  it("returns the size and base64 of the original bytes", async () => {
    const jpeg = await encodedImage("jpeg", 300, 200);
    expect(await prepareImage(jpeg)).toEqual({ width: 300, height: 200, base64: jpeg.toString("base64") });
  });
});

// ---------------------------------------------------------------------------
// Director requests
// ---------------------------------------------------------------------------

describe("emotionPrompt", () => {
  it("joins emotion and prompt", () => {
    expect(emotionPrompt("happy")).toBe("happy;;");
    expect(emotionPrompt("smug", "closed eyes")).toBe("smug;;closed eyes,");
  });
});

describe("buildDirectorRequest", () => {
  const image = { width: 512, height: 768, base64: "aW1hZ2U=" };

  it("sends plain tools with an empty prompt", () => {
    expect(buildDirectorRequest({ kind: "bg-removal" }, image)).toEqual({
      req_type: "bg-removal",
      width: 512,
      height: 768,
      image: "aW1hZ2U=",
      prompt: "",
      defry: 0,
    });
  });

  it("passes colorize prompt and defry", () => {
    expect(buildDirectorRequest({ kind: "colorize", prompt: "red dress", defry: 3 }, image)).toMatchObject({
      req_type: "colorize",
      prompt: "red dress",
      defry: 3,
    });
  });

  it("encodes the emotion into the prompt and the level into defry", () => {
    expect(
      buildDirectorRequest({ kind: "emotion", emotion: "sad", prompt: "tears", level: 2 }, image)
    ).toMatchObject({ req_type: "emotion", prompt: "sad;;tears,", defry: 2 });
  });

  it("rejects defry outside 0-5", () => {
    expect(() => buildDirectorRequest({ kind: "colorize", defry: 6 }, image)).toThrow(
      "defry must be an integer within [0, 5], got 6"
    );
  });
});
