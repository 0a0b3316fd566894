import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readPaletteConfig } from "./config";

describe("readPaletteConfig", () => {
  it("falls back to defaults", () => {
    assert.deepEqual(readPaletteConfig({}), {
      maxImageBytes: 10 * 1024 * 1024,
      maxTrials: 100000,
      maxColors: 256,
      fetchTimeoutMs: 20000,
      maxDimension: 256,
      cacheTtlSeconds: 86400,
      defaultTrials: 10000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = readPaletteConfig({
      PALETTE_MAX_IMAGE_BYTES: "2048",
      PALETTE_MAX_DIMENSION: " 128 ",
      PALETTE_DEFAULT_TRIALS: "500",
      PALETTE_MAX_TRIALS: "2000",
      PALETTE_MAX_COLORS: "32",
    });
    assert.equal(config.maxTrials, 2000);
    assert.equal(config.maxColors, 32);
    assert.equal(config.maxImageBytes, 2048);
    assert.equal(config.maxDimension, 128);
    assert.equal(config.defaultTrials, 500);
    assert.equal(config.fetchTimeoutMs, 20000);
  });

  it("ignores values that are not positive integers", () => {
    const config = readPaletteConfig({
      PALETTE_FETCH_TIMEOUT_MS: "soon",
      PALETTE_CACHE_TTL_SECONDS: "0",
      PALETTE_MAX_DIMENSION: "-3",
    });
    assert.equal(config.fetchTimeoutMs, 20000);
    assert.equal(config.cacheTtlSeconds, 86400);
    assert.equal(config.maxDimension, 256);
  });
});
