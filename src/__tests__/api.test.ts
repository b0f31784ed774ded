/**
 * API route tests.
 *
 * The app is built around a real client whose `fetch` is an in-process
 * stand-in, so requests go through normalization, serialization and
 * decoding without reaching the image service.
 */

import { beforeAll, describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import request from "supertest";
import { createApp } from "../app";
import { ENDPOINTS, MODELS } from "../models/constants";
import { ImageGenerationClient } from "../services/client";
import {
  FIXED_STAMP,
  bodyField,
  bytesResponse,
  encodedImage,
  fakeFetch,
  finalFrame,
  fixedClock,
  pngBytes,
  zipOf,
} from "./fixtures";

const png = pngBytes(64, 64);

function appWith(respond: (url: string) => Response | Promise<Response>, outputDir?: string) {
  const { fetch, calls } = fakeFetch(respond);
  const client = new ImageGenerationClient({
    token: "test-token",
    fetch,
    now: fixedClock,
    randomSeed: () => 42,
  });
  return { app: createApp({ client, outputDir }), calls };
}

function streamService() {
  return appWith(() => bytesResponse(finalFrame(0, png)));
}

// ---------------------------------------------------------------------------
// Health check and fallbacks
// ---------------------------------------------------------------------------

describe("GET /api/health", () => {
  it("responds with status ok", async () => {
    const { app } = streamService();
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/json/);
    expect(res.body.status).toBe("ok");
    expect(res.body).toHaveProperty("uptime");
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("unknown routes", () => {
  it("returns 404 NOT_FOUND", async () => {
    const { app } = streamService();
    const res = await request(app).get("/api/nonexistent");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { message: "Not found", code: "NOT_FOUND" } });
  });

  it("rejects malformed JSON", async () => {
    const { app } = streamService();
    const res = await request(app)
      .post("/api/generate-image")
      .set("Content-Type", "application/json")
      .send("{ not json");

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("BAD_REQUEST");
  });
});

// ---------------------------------------------------------------------------
// POST /api/generate-image
// ---------------------------------------------------------------------------

describe("POST /api/generate-image", () => {
  it("returns the first image as PNG", async () => {
    const { app, calls } = streamService();
    const res = await request(app).post("/api/generate-image").send({ prompt: "  1girl  ", model: "v4.5" });

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("image/png");
    expect(res.headers["x-image-filename"]).toBe(`${FIXED_STAMP}_final.png`);
    expect(Buffer.compare(res.body, png)).toBe(0);

    expect(calls[0]?.url).toBe(`https://image.novelai.net${ENDPOINTS.IMAGE_STREAM}`);
    expect(bodyField(calls[0], "input")).toBe("1girl, very aesthetic, masterpiece, no text");
    expect(bodyField(calls[0], "model")).toBe(MODELS.V4_5);
    expect(bodyField(calls[0], "parameters")).toMatchObject({
      width: 832,
      height: 1216,
      steps: 28,
      scale: 6,
      sampler: "k_euler_ancestral",
      noise_schedule: "karras",
      ucPreset: 2,
      seed: 42,
    });
  });

  it("maps short aliases to service values", async () => {
    const { app, calls } = appWith(() => bytesResponse(zipOf({ "image_0.png": png })));
    const res = await request(app).post("/api/generate-image").send({
      prompt: "cat",
      model: "furry",
      res: "small_landscape",
      sampler: "dpm2m",
      noise_schedule: "Exponential",
    });

    expect(res.status).toBe(200);
    expect(calls[0]?.url).toBe(`https://image.novelai.net${ENDPOINTS.IMAGE}`);
    expect(bodyField(calls[0], "model")).toBe(MODELS.FURRY);
    expect(bodyField(calls[0], "parameters")).toMatchObject({
      width: 768,
      height: 512,
      sampler: "k_dpmpp_2m",
      noise_schedule: "exponential",
    });
  });

  it("saves every image when an output directory is configured", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "api-output-"));
    try {
      const { app } = appWith(() => bytesResponse(finalFrame(0, png)), dir);
      const res = await request(app).post("/api/generate-image").send({ prompt: "x" });

      expect(res.status).toBe(200);
      expect(fs.readFileSync(path.join(dir, `${FIXED_STAMP}_final.png`))).toEqual(png);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("returns 400 with details for a missing prompt", async () => {
    const { app, calls } = streamService();
    const res = await request(app).post("/api/generate-image").send({});

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(res.body.error.details).toEqual([{ field: "prompt", message: "Prompt is required" }]);
    expect(calls).toHaveLength(0);
  });

  it("returns 400 for unknown aliases", async () => {
    const { app } = streamService();
    const res = await request(app)
      .post("/api/generate-image")
      .send({ prompt: "x", model: "v9", res: "huge", steps: "many" });

    expect(res.status).toBe(400);
    expect(res.body.error.details.map((d: { field: string }) => d.field)).toEqual(["model", "res", "steps"]);
    expect(res.body.error.details[0].message).toMatch(/^Invalid model: v9\. Available: v3, v3_inp, v4, /);
  });

  it("returns 400 for values the normalizer rejects", async () => {
    const { app } = streamService();
    const res = await request(app).post("/api/generate-image").send({ prompt: "x", steps: 60 });

    expect(res.status).toBe(400);
    expect(res.body.error).toMatchObject({
      message: "steps must be within [1, 50], got 60",
      code: "VALIDATION_ERROR",
      details: [{ field: "steps", message: "steps must be within [1, 50], got 60" }],
    });
  });

  it("passes upstream failures through with their status", async () => {
    const { app } = appWith(() => new Response("slow down", { status: 429 }));
    const res = await request(app).post("/api/generate-image").send({ prompt: "x" });

    expect(res.status).toBe(429);
    expect(res.body.error).toMatchObject({
      message: "Rate limit exceeded. Response: slow down",
      code: "UPSTREAM_RATE_LIMITED",
    });
  });

  it("answers 502 for an unreadable upstream body", async () => {
    const { app } = appWith(() => bytesResponse(Buffer.from("garbage")));
    const res = await request(app).post("/api/generate-image").send({ prompt: "x" });

    expect(res.status).toBe(502);
    expect(res.body.error.code).toBe("FORMAT_ERROR");
  });
});

// ---------------------------------------------------------------------------
// POST /api/estimate-cost
// ---------------------------------------------------------------------------

describe("POST /api/estimate-cost", () => {
  it("prices the normalized request without calling the service", async () => {
    const { app, calls } = streamService();
    const res = await request(app).post("/api/estimate-cost").send({ prompt: "x", model: "v4_5" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ cost: 20, width: 832, height: 1216, n_samples: 1 });
    expect(calls).toHaveLength(0);
  });

  it("applies the free-generation tier", async () => {
    const { app } = streamService();
    const res = await request(app)
      .post("/api/estimate-cost")
      .send({ prompt: "x", res: "large_square", n_samples: 2, is_opus: true });

    expect(res.body).toEqual({ cost: 84, width: 1472, height: 1472, n_samples: 2 });
  });

  it("rejects a non-boolean is_opus", async () => {
    const { app } = streamService();
    const res = await request(app).post("/api/estimate-cost").send({ prompt: "x", is_opus: "yes" });

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([{ field: "is_opus", message: "is_opus must be a boolean" }]);
  });
});

// ---------------------------------------------------------------------------
// POST /api/director/:tool
// ---------------------------------------------------------------------------

describe("POST /api/director/:tool", () => {
  let source: string;
  const directorService = () => appWith(() => bytesResponse(zipOf({ "image_0.png": png })));

  beforeAll(async () => {
    source = (await encodedImage("png", 128, 64)).toString("base64");
  });

  it("runs background removal", async () => {
    const { app, calls } = directorService();
    const res = await request(app).post("/api/director/background-removal").send({ image: source });

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("image/png");
    expect(res.headers["x-image-filename"]).toBe(`${FIXED_STAMP}_bg-removal.png`);
    expect(calls[0]?.body).toMatchObject({ req_type: "bg-removal", width: 128, height: 64 });
  });

  it("passes emotion and level", async () => {
    const { app, calls } = directorService();
    const res = await request(app)
      .post("/api/director/change-emotion")
      .send({ image: `data:image/png;base64,${source}`, emotion: "shy", prompt: "blush", emotion_level: 3 });

    expect(res.status).toBe(200);
    expect(calls[0]?.body).toMatchObject({ req_type: "emotion", prompt: "shy;;blush,", defry: 3 });
  });

  it("requires a known emotion", async () => {
    const { app } = directorService();
    const res = await request(app).post("/api/director/change-emotion").send({ image: source, emotion: "meh" });

    expect(res.status).toBe(400);
    expect(res.body.error.details[0].field).toBe("emotion");
  });

  it("requires an image", async () => {
    const { app } = directorService();
    const res = await request(app).post("/api/director/lineart").send({});

    expect(res.status).toBe(400);
    expect(res.body.error.details).toEqual([{ field: "image", message: "Image is required" }]);
  });

  it("reports an unreadable image as a validation error", async () => {
    const { app } = directorService();
    const res = await request(app).post("/api/director/sketch").send({ image: "bm90IGFuIGltYWdl" });

    expect(res.status).toBe(400);
    expect(res.body.error).toMatchObject({
      message: "Unsupported or invalid image format",
      details: [{ field: "image", message: "Unsupported or invalid image format" }],
    });
  });

  it("returns 404 for an unknown tool", async () => {
    const { app } = directorService();
    const res = await request(app).post("/api/director/upscale").send({ image: source });

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });
});
