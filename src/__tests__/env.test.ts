import { afterEach, describe, it, expect, vi } from "vitest";

const original = { ...process.env };

async function loadEnv(overrides: Record<string, string>) {
  vi.resetModules();
  Object.assign(process.env, overrides);
  const { env } = await import("../config/env");
  return env;
}

describe("env", () => {
  afterEach(() => {
    process.env = { ...original };
  });

  it("leaves image saving off when IMAGE_OUTPUT_DIR is empty", async () => {
    const env = await loadEnv({ IMAGE_OUTPUT_DIR: "" });
    expect(env.IMAGE_OUTPUT_DIR).toBeUndefined();
  });

  it("saves under IMAGE_OUTPUT_DIR when it is set", async () => {
    const env = await loadEnv({ IMAGE_OUTPUT_DIR: "generated" });
    expect(env.IMAGE_OUTPUT_DIR).toBe("generated");
  });

  it("uses the default host and timeout", async () => {
    const env = await loadEnv({ NAI_IMAGE_HOST: "", REQUEST_TIMEOUT_MS: "" });
    expect(env.NAI_IMAGE_HOST).toBe("https://image.novelai.net");
    expect(env.REQUEST_TIMEOUT_MS).toBe(30000);
  });
});
