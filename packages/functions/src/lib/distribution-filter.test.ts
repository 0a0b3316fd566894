import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { RGB } from "./color-utils";
import { filterColors, flattenPixels, NO_TRIM, quantile } from "./distribution-filter";
import { EmptyDistributionError } from "./errors";

const grey = (v: number): RGB => ({ r: v, g: v, b: v });

describe("quantile", () => {
  it("interpolates linearly between order statistics", () => {
    assert.equal(quantile([1, 2, 3, 4], 0.5), 2.5);
    assert.equal(quantile([1, 2, 3, 4], 0), 1);
    assert.equal(quantile([1, 2, 3, 4], 1), 4);
  });

  it("collapses to the only value of a single-element sample", () => {
    assert.equal(quantile([5], 0.3), 5);
  });
});

describe("flattenPixels", () => {
  it("reads rows in order", () => {
    const flat = flattenPixels([
      [grey(0), grey(0.5)],
      [grey(1), grey(0.25)],
    ]);
    assert.deepEqual(flat.map((p) => p.r), [0, 0.5, 1, 0.25]);
  });
});

describe("filterColors", () => {
  it("drops near-black and near-white pixels before converting to HSV", () => {
    const samples = filterColors([grey(0), grey(1), { r: 1, g: 0, b: 0 }, grey(0.5)], {
      ...NO_TRIM,
      bw: [0.1, 0.9],
    });

    assert.deepEqual(samples, [
      { r: 1, g: 0, b: 0, h: 0, s: 1, v: 1 },
      { r: 0.5, g: 0.5, b: 0.5, h: 0, s: 0, v: 0.5 },
    ]);
  });

  it("keeps pure black and white under the default bw range", () => {
    assert.equal(filterColors([grey(0), grey(1)], NO_TRIM).length, 2);
  });

  it("trims brightness to the requested quantiles, bounds inclusive", () => {
    const samples = filterColors([grey(0), grey(0.25), grey(0.5), grey(0.75), grey(1)], {
      ...NO_TRIM,
      brightness: [0.25, 0.75],
    });
    assert.deepEqual(samples.map((s) => s.v), [0.25, 0.5, 0.75]);
  });

  it("trims saturation to the requested quantiles", () => {
    const samples = filterColors(
      [grey(0.5), { r: 0.5, g: 0.25, b: 0.25 }, { r: 0.5, g: 0, b: 0 }],
      { ...NO_TRIM, saturation: [0.5, 1] }
    );
    // saturations are 0, 0.5 and 1; the median is 0.5
    assert.deepEqual(samples.map((s) => s.s), [0.5, 1]);
  });

  it("reports the bw stage when every pixel is trimmed there", () => {
    assert.throws(
      () => filterColors([grey(0), grey(0.05)], { ...NO_TRIM, bw: [0.2, 1] }),
      (error: unknown) => {
        assert.ok(error instanceof EmptyDistributionError);
        assert.equal(error.stage, "bw-trim");
        assert.deepEqual(error.thresholds, { bw: [0.2, 1] });
        return true;
      }
    );
  });

  it("reports the quantile stage when brightness and saturation ranges do not overlap", () => {
    assert.throws(
      () =>
        filterColors([grey(1), { r: 0.5, g: 0, b: 0 }], {
          bw: [0, 1],
          brightness: [1, 1],
          saturation: [1, 1],
        }),
      (error: unknown) => {
        assert.ok(error instanceof EmptyDistributionError);
        assert.equal(error.stage, "quantile-trim");
        assert.deepEqual(error.thresholds.valueBounds, [1, 1]);
        assert.deepEqual(error.thresholds.saturationBounds, [1, 1]);
        return true;
      }
    );
  });

  it("returns its own output unchanged when re-applied without trims", () => {
    const pixels = [
      grey(0.1),
      grey(0.9),
      { r: 0.8, g: 0.2, b: 0.1 },
      { r: 0.1, g: 0.6, b: 0.3 },
      { r: 0.3, g: 0.3, b: 0.9 },
      { r: 0.6, g: 0.5, b: 0.4 },
    ];
    const once = filterColors(pixels, {
      bw: [0.15, 0.85],
      brightness: [0.1, 0.9],
      saturation: [0, 0.95],
    });
    assert.deepEqual(filterColors(once, NO_TRIM), once);
  });
});
