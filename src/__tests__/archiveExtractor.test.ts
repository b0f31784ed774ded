import { describe, it, expect } from "vitest";
import { extractArchive, extractFirstEntry } from "../services/decoding";
import { FormatFailure } from "../services/errors";
import { FIXED_STAMP, fixedClock, pngBytes, zipOf } from "./fixtures";

describe("extractArchive", () => {
  it("names images by timestamp and position", () => {
    const first = pngBytes(64, 64);
    const second = pngBytes(128, 64);
    const images = extractArchive(zipOf({ "image_0.png": first, "image_1.png": second }), fixedClock);

    expect(images).toEqual([
      { filename: `${FIXED_STAMP}_p0.png`, data: first },
      { filename: `${FIXED_STAMP}_p1.png`, data: second },
    ]);
  });

  it("rejects an empty body", () => {
    expect(() => extractArchive(new Uint8Array(0))).toThrow("Received empty response from the image service");
  });

  it("rejects bytes that are not an archive", () => {
    expect(() => extractArchive(Buffer.from("definitely not a zip file"))).toThrow(FormatFailure);
  });

  it("rejects an archive without files", () => {
    expect(() => extractArchive(zipOf({}))).toThrow("Image archive is empty");
  });
});

describe("extractFirstEntry", () => {
  it("returns the bytes of the first file", () => {
    const data = pngBytes(32, 32);
    expect(extractFirstEntry(zipOf({ "image_0.png": data }))).toEqual(data);
  });
});
