import { describe, it, expect } from "vitest";
import { deduplicateTags } from "../services/generation";

describe("deduplicateTags", () => {
  it("drops repeated tags case-insensitively, keeping the first spelling", () => {
    expect(deduplicateTags("1girl, Blue Hair, smile, blue hair, 1GIRL")).toBe("1girl, Blue Hair, smile");
  });

  it("normalizes separators and skips empty tags", () => {
    expect(deduplicateTags(" a ,b,, c ,  ")).toBe("a, b, c");
  });

  it("treats weighted spellings as different tags", () => {
    expect(deduplicateTags("{best quality}, best quality, [best quality]")).toBe(
      "{best quality}, best quality, [best quality]"
    );
  });

  it("returns an empty prompt unchanged", () => {
    expect(deduplicateTags("")).toBe("");
  });

  it("is idempotent", () => {
    const once = deduplicateTags("x, y, X, z, y");
    expect(deduplicateTags(once)).toBe(once);
  });
});
