import { describe, it, expect } from "vitest";
import { ACTIONS, MODELS } from "../models/constants";
import { estimateCost, type CostInput } from "../services/generation";

function request(overrides: Partial<CostInput> = {}): CostInput {
  return {
    model: MODELS.V4_5,
    action: ACTIONS.GENERATE,
    width: 832,
    height: 1216,
    steps: 28,
    n_samples: 1,
    strength: undefined,
    autoSmea: false,
    sm: undefined,
    sm_dyn: undefined,
    ...overrides,
  };
}

describe("estimateCost", () => {
  it("prices a normal portrait image at 20", () => {
    expect(estimateCost(request())).toBe(20);
  });

  it("bills sizes up to the normal square as the normal portrait", () => {
    expect(estimateCost(request({ width: 1024, height: 1024 }))).toBe(20);
    expect(estimateCost(request({ width: 1216, height: 832 }))).toBe(20);
  });

  it("scales with area", () => {
    expect(estimateCost(request({ width: 512, height: 768 }))).toBe(8);
    expect(estimateCost(request({ width: 1024, height: 1536 }))).toBe(30);
    expect(estimateCost(request({ width: 1472, height: 1472 }))).toBe(42);
  });

  it("never charges less than 2 per image", () => {
    expect(estimateCost(request({ width: 64, height: 64 }))).toBe(2);
    expect(
      estimateCost(request({ width: 512, height: 768, steps: 1, action: ACTIONS.IMG2IMG, strength: 0.01 }))
    ).toBe(2);
  });

  it("multiplies by n_samples", () => {
    expect(estimateCost(request({ n_samples: 4 }))).toBe(80);
  });

  it("charges more steps", () => {
    expect(estimateCost(request({ steps: 50 }))).toBe(33);
  });

  it("applies SMEA factors to legacy models only", () => {
    expect(estimateCost(request({ model: MODELS.V3, sm: true }))).toBe(24);
    expect(estimateCost(request({ model: MODELS.V3, sm: true, sm_dyn: true }))).toBe(28);
    expect(estimateCost(request({ sm: true, sm_dyn: true }))).toBe(20);
  });

  it("applies autoSmea to current models", () => {
    expect(estimateCost(request({ autoSmea: true }))).toBe(24);
  });

  it("scales img2img by strength", () => {
    expect(estimateCost(request({ action: ACTIONS.IMG2IMG, strength: 0.3 }))).toBe(6);
    expect(estimateCost(request({ action: ACTIONS.GENERATE, strength: 0.3 }))).toBe(20);
  });

  describe("free-generation tier", () => {
    it("does not bill one image within 28 steps and the normal square", () => {
      expect(estimateCost(request(), { isOpus: true })).toBe(0);
      expect(estimateCost(request({ n_samples: 4 }), { isOpus: true })).toBe(60);
    });

    it("bills everything above the limits", () => {
      expect(estimateCost(request({ width: 1472, height: 1472 }), { isOpus: true })).toBe(42);
      expect(estimateCost(request({ steps: 50, n_samples: 2 }), { isOpus: true })).toBe(66);
    });

    it("makes the smallest image free", () => {
      expect(estimateCost(request({ width: 64, height: 64 }), { isOpus: true })).toBe(0);
    });
  });
});
