import type { PaletteType, SeqBy, TrimRange } from "imgpal-shared";
import { encodeHex, hexToRgb, isHexColor, type RGB } from "./color-utils";
import { type DistributionTrim, type PixelGrid, filterColors, flattenPixels } from "./distribution-filter";
import { InvalidParameterError } from "./errors";
import {
  DEFAULT_SEARCH_TRIALS,
  isSeqBy,
  toDivergentPalette,
  toQualitativePalette,
  toSequentialPalette,
} from "./palette-assembler";
import { type PaletteLogger, silentLogger } from "./palette-logger";
import { countDistinctColors, DEFAULT_MAX_ITERATIONS, quantizeColors } from "./quantizer";
import { createRandomSource, type RandomSource } from "./random";

export const DEFAULT_K = 100;
export const DEFAULT_SEQ_BY: SeqBy = "hsv";
export const DEFAULT_DIV_CENTER = "#FFFFFF";

const PALETTE_TYPES: ReadonlySet<string> = new Set<PaletteType>(["qual", "seq", "div"]);

export interface PaletteOptions {
  n: number;
  type: PaletteType;
  /** Number of k-means centers for qualitative and sequential palettes. */
  k?: number;
  bw?: TrimRange;
  brightness?: TrimRange;
  saturation?: TrimRange;
  seqBy?: SeqBy;
  /** Middle of a divergent palette, as RGB in 0-1 or a hex string. */
  divCenter?: RGB | string;
  /** Seeds the random source when `random` is not given. */
  seed?: number;
  random?: RandomSource;
  /** Draws per qualitative search stage. */
  trials?: number;
  maxIterations?: number;
  logger?: PaletteLogger;
}

interface ResolvedOptions {
  n: number;
  type: PaletteType;
  k: number;
  trim: DistributionTrim;
  seqBy: SeqBy;
  divCenter: string;
  random: RandomSource;
  trials: number;
  maxIterations: number;
  logger: PaletteLogger;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidParameterError(name, `expected a positive integer, got ${value}`);
  }
  return value;
}

function requireRange(name: string, value: TrimRange | undefined): TrimRange {
  if (value === undefined) return [0, 1];
  if (value.length !== 2) {
    throw new InvalidParameterError(name, "expected a [lo, hi] pair");
  }
  const [lo, hi] = value;
  if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo < 0 || hi > 1 || lo > hi) {
    throw new InvalidParameterError(name, `expected 0 <= lo <= hi <= 1, got [${lo}, ${hi}]`);
  }
  return [lo, hi];
}

function inUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function resolveDivCenter(value: RGB | string | undefined): string {
  if (value === undefined) return DEFAULT_DIV_CENTER;
  if (typeof value === "string") {
    if (!isHexColor(value)) {
      throw new InvalidParameterError("divCenter", `expected a #RRGGBB color, got "${value}"`);
    }
    return encodeHex(hexToRgb(value));
  }
  if (![value.r, value.g, value.b].every(inUnitInterval)) {
    throw new InvalidParameterError("divCenter", "RGB channels must be within [0, 1]");
  }
  return encodeHex(value);
}

function validatePixels(pixels: PixelGrid): void {
  if (pixels.length === 0 || pixels[0].length === 0) {
    throw new InvalidParameterError("pixels", "image has no pixels");
  }
  const width = pixels[0].length;
  pixels.forEach((row, y) => {
    if (row.length !== width) {
      throw new InvalidParameterError("pixels", `row ${y} has ${row.length} pixels, expected ${width}`);
    }
    for (const pixel of row) {
      if (!inUnitInterval(pixel.r) || !inUnitInterval(pixel.g) || !inUnitInterval(pixel.b)) {
        throw new InvalidParameterError("pixels", `row ${y} has a channel outside [0, 1]`);
      }
    }
  });
}

function resolveOptions(options: PaletteOptions): ResolvedOptions {
  if (!PALETTE_TYPES.has(options.type)) {
    throw new InvalidParameterError("type", `expected one of qual, seq, div, got "${options.type}"`);
  }
  const seqBy = options.seqBy ?? DEFAULT_SEQ_BY;
  if (!isSeqBy(seqBy)) {
    throw new InvalidParameterError("seqBy", `expected a permutation of "hsv", got "${seqBy}"`);
  }
  if (options.seed !== undefined && !Number.isFinite(options.seed)) {
    throw new InvalidParameterError("seed", "expected a finite number");
  }

  return {
    n: requirePositiveInteger("n", options.n),
    type: options.type,
    k: requirePositiveInteger("k", options.k ?? DEFAULT_K),
    trim: {
      bw: requireRange("bw", options.bw),
      brightness: requireRange("brightness", options.brightness),
      saturation: requireRange("saturation", options.saturation),
    },
    seqBy,
    divCenter: resolveDivCenter(options.divCenter),
    random: options.random ?? createRandomSource(options.seed),
    trials: requirePositiveInteger("trials", options.trials ?? DEFAULT_SEARCH_TRIALS),
    maxIterations: requirePositiveInteger("maxIterations", options.maxIterations ?? DEFAULT_MAX_ITERATIONS),
    logger: options.logger ?? silentLogger,
  };
}

/** Throws the InvalidParameterError `derivePalette` would raise for these options. */
export function validatePaletteOptions(options: PaletteOptions): void {
  resolveOptions(options);
}

/**
 * Derives an ordered palette of hex colors from decoded pixels.
 *
 * Random draws happen in a fixed order (quantizer initialization, then the
 * qualitative subset search, then the ordering search), so the same seed
 * and pixels always give the same palette. Qualitative palettes are capped
 * at the number of clusters available.
 *
 * @throws InvalidParameterError before any work when an option is out of range
 * @throws EmptyDistributionError when the trims leave no pixels
 */
export function derivePalette(pixels: PixelGrid, options: PaletteOptions): string[] {
  const resolved = resolveOptions(options);
  validatePixels(pixels);
  const { logger } = resolved;

  const input = flattenPixels(pixels);
  const samples = filterColors(input, resolved.trim);
  logger.info("Filtered color distribution", {
    pixels: input.length,
    kept: samples.length,
    trim: resolved.trim,
  });

  if (resolved.type === "div") {
    return toDivergentPalette(samples, resolved.n, resolved.divCenter, resolved.random, {
      maxIterations: resolved.maxIterations,
      logger,
    });
  }

  const distinct = countDistinctColors(samples);
  const k = Math.min(resolved.k, distinct);
  const clusters = quantizeColors(samples, k, resolved.random, {
    maxIterations: resolved.maxIterations,
  });
  logger.info("Quantized colors", { requestedK: resolved.k, distinct, k });

  if (resolved.type === "qual") {
    return toQualitativePalette(clusters, resolved.n, resolved.random, {
      trials: resolved.trials,
      logger,
    });
  }
  return toSequentialPalette(clusters, resolved.n, resolved.seqBy, logger);
}
