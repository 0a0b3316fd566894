import type { TrimRange } from "imgpal-shared";
import { type HSV, type RGB, rgbToHsv } from "./color-utils";
import { EmptyDistributionError } from "./errors";

export type PixelGrid = ReadonlyArray<ReadonlyArray<RGB>>;

export interface PixelSample extends RGB, HSV {}

export interface DistributionTrim {
  /** Keep pixels with max(r,g,b) >= lo and min(r,g,b) <= hi. */
  bw: TrimRange;
  /** Quantile range of v to keep. */
  brightness: TrimRange;
  /** Quantile range of s to keep. */
  saturation: TrimRange;
}

export const NO_TRIM: DistributionTrim = {
  bw: [0, 1],
  brightness: [0, 1],
  saturation: [0, 1],
};

export function flattenPixels(grid: PixelGrid): RGB[] {
  const pixels: RGB[] = [];
  for (const row of grid) {
    for (const pixel of row) {
      pixels.push(pixel);
    }
  }
  return pixels;
}

/**
 * Sample quantile with linear interpolation between order statistics
 * (`h = (N - 1) * p`). `sorted` must be ascending and non-empty.
 */
export function quantile(sorted: readonly number[], p: number): number {
  const h = (sorted.length - 1) * p;
  const lo = Math.floor(h);
  if (lo >= sorted.length - 1) {
    return sorted[sorted.length - 1];
  }
  return sorted[lo] + (h - lo) * (sorted[lo + 1] - sorted[lo]);
}

function quantileBounds(values: number[], range: TrimRange): [number, number] {
  const sorted = [...values].sort((a, b) => a - b);
  return [quantile(sorted, range[0]), quantile(sorted, range[1])];
}

/**
 * Drops near-black/near-white pixels, then trims the brightness and
 * saturation tails. Accepts its own output, which passes through unchanged
 * under `NO_TRIM`.
 */
export function filterColors(pixels: Iterable<RGB>, trim: DistributionTrim): PixelSample[] {
  const [bwLo, bwHi] = trim.bw;
  const survivors: PixelSample[] = [];
  for (const { r, g, b } of pixels) {
    if (Math.max(r, g, b) >= bwLo && Math.min(r, g, b) <= bwHi) {
      survivors.push({ r, g, b, ...rgbToHsv({ r, g, b }) });
    }
  }

  if (survivors.length === 0) {
    throw new EmptyDistributionError("bw-trim", { bw: [bwLo, bwHi] });
  }

  const [vLo, vHi] = quantileBounds(survivors.map((p) => p.v), trim.brightness);
  const [sLo, sHi] = quantileBounds(survivors.map((p) => p.s), trim.saturation);

  const filtered = survivors.filter(
    (p) => p.v >= vLo && p.v <= vHi && p.s >= sLo && p.s <= sHi
  );

  if (filtered.length === 0) {
    throw new EmptyDistributionError("quantile-trim", {
      brightness: [...trim.brightness],
      saturation: [...trim.saturation],
      valueBounds: [vLo, vHi],
      saturationBounds: [sLo, sHi],
    });
  }

  return filtered;
}
