import type { SeqBy } from "imgpal-shared";
import { type HSV, hsvDistance, hsvToHex } from "./color-utils";
import { type PaletteLogger, silentLogger } from "./palette-logger";
import { type QuantizeOptions, quantizeColors } from "./quantizer";
import { type RandomSource, permutation, sampleIndices } from "./random";
import { colorRamp } from "./ramp";

export const DEFAULT_SEARCH_TRIALS = 10000;
export const MAX_SEQUENTIAL_CONTROLS = 10;

export interface SearchResult<T> {
  candidate: T;
  score: number;
}

/**
 * Best-of-N random search: draws `trials` candidates and keeps the highest
 * score, the earliest draw winning ties.
 */
export function searchBestOfTrials<T>(
  trials: number,
  draw: () => T,
  score: (candidate: T) => number
): SearchResult<T> {
  let best: SearchResult<T> | null = null;
  for (let i = 0; i < trials; i++) {
    const candidate = draw();
    const value = score(candidate);
    if (best === null || value > best.score) {
      best = { candidate, score: value };
    }
  }
  if (best === null) {
    throw new RangeError("searchBestOfTrials needs at least one trial");
  }
  return best;
}

/** Smallest pairwise HSV distance; `Infinity` for fewer than two colors. */
export function minPairwiseDistance(colors: readonly HSV[]): number {
  let min = Infinity;
  for (let i = 0; i < colors.length; i++) {
    for (let j = i + 1; j < colors.length; j++) {
      min = Math.min(min, hsvDistance(colors[i], colors[j]));
    }
  }
  return min;
}

/** Mean squared hue step between neighbours; 0 for fewer than two colors. */
export function meanSquaredHueStep(colors: readonly HSV[]): number {
  if (colors.length < 2) return 0;
  let total = 0;
  for (let i = 1; i < colors.length; i++) {
    total += (colors[i].h - colors[i - 1].h) ** 2;
  }
  return total / (colors.length - 1);
}

/** Indices of `size` colors chosen to maximize their minimum pairwise distance. */
export function selectDispersedSubset(
  colors: readonly HSV[],
  size: number,
  random: RandomSource,
  trials: number = DEFAULT_SEARCH_TRIALS
): SearchResult<number[]> {
  return searchBestOfTrials(
    trials,
    () => sampleIndices(random, colors.length, size),
    (indices) => minPairwiseDistance(indices.map((i) => colors[i]))
  );
}

/** Ordering of `colors` with the largest hue jumps between neighbours. */
export function selectHueContrastOrder(
  colors: readonly HSV[],
  random: RandomSource,
  trials: number = DEFAULT_SEARCH_TRIALS
): SearchResult<number[]> {
  return searchBestOfTrials(
    trials,
    () => permutation(random, colors.length),
    (order) => meanSquaredHueStep(order.map((i) => colors[i]))
  );
}

export interface QualitativeOptions {
  trials?: number;
  logger?: PaletteLogger;
}

export function toQualitativePalette(
  clusters: readonly HSV[],
  n: number,
  random: RandomSource,
  options: QualitativeOptions = {}
): string[] {
  const logger = options.logger ?? silentLogger;
  const trials = options.trials ?? DEFAULT_SEARCH_TRIALS;
  const size = Math.min(n, clusters.length);
  if (size < n) {
    logger.warn("Fewer colors available than requested; capping palette size", {
      requested: n,
      available: clusters.length,
    });
  }

  const dispersed = selectDispersedSubset(clusters, size, random, trials);
  const chosen = dispersed.candidate.map((i) => clusters[i]);
  const ordered = selectHueContrastOrder(chosen, random, trials);
  logger.debug("Qualitative search complete", {
    trials,
    minPairwiseDistance: dispersed.score,
    meanSquaredHueStep: ordered.score,
  });

  return ordered.candidate.map((i) => hsvToHex(chosen[i]));
}

const SEQ_CHANNELS: Record<SeqBy, ReadonlyArray<keyof HSV>> = {
  hsv: ["h", "s", "v"],
  hvs: ["h", "v", "s"],
  shv: ["s", "h", "v"],
  svh: ["s", "v", "h"],
  vhs: ["v", "h", "s"],
  vsh: ["v", "s", "h"],
};

export function isSeqBy(value: string): value is SeqBy {
  return Object.prototype.hasOwnProperty.call(SEQ_CHANNELS, value);
}

function compareBy(seqBy: SeqBy): (a: HSV, b: HSV) => number {
  const channels = SEQ_CHANNELS[seqBy];
  return (a, b) => {
    for (const channel of channels) {
      const diff = a[channel] - b[channel];
      if (diff !== 0) return diff;
    }
    return 0;
  };
}

/**
 * Segment of 1-based position `i` among `m` sorted items when the index
 * range is cut into `groups` equal-width, right-closed intervals.
 */
export function segmentIndex(i: number, m: number, groups: number): number {
  if (groups <= 1 || m <= 1) return 0;
  const segment = Math.ceil(((i - 1) * groups) / (m - 1)) - 1;
  return Math.max(0, Math.min(groups - 1, segment));
}

/**
 * Averages the sorted clusters into at most ten control colors, in
 * `seqBy` order, that the ramp runs through.
 */
export function sequentialControls(clusters: readonly HSV[], seqBy: SeqBy): string[] {
  const compare = compareBy(seqBy);
  const sorted = [...clusters].sort(compare);
  const groups = Math.min(MAX_SEQUENTIAL_CONTROLS, sorted.length);

  const sums = Array.from({ length: groups }, () => ({ h: 0, s: 0, v: 0, count: 0 }));
  sorted.forEach((color, index) => {
    const sum = sums[segmentIndex(index + 1, sorted.length, groups)];
    sum.h += color.h;
    sum.s += color.s;
    sum.v += color.v;
    sum.count++;
  });

  const averages: HSV[] = sums
    .filter((sum) => sum.count > 0)
    .map((sum) => ({ h: sum.h / sum.count, s: sum.s / sum.count, v: sum.v / sum.count }));

  return averages.sort(compare).map(hsvToHex);
}

export function toSequentialPalette(
  clusters: readonly HSV[],
  n: number,
  seqBy: SeqBy,
  logger: PaletteLogger = silentLogger
): string[] {
  const controls = sequentialControls(clusters, seqBy);
  logger.debug("Sequential controls", { seqBy, controls });
  return colorRamp(controls, n);
}

export interface DivergentOptions extends QuantizeOptions {
  logger?: PaletteLogger;
}

/**
 * Splits the filtered samples into two poles and ramps from the second pole
 * through `center` to the first.
 */
export function toDivergentPalette(
  samples: readonly HSV[],
  n: number,
  center: string,
  random: RandomSource,
  options: DivergentOptions = {}
): string[] {
  const logger = options.logger ?? silentLogger;
  const poles = quantizeColors(samples, 2, random, options).map(hsvToHex);

  if (poles.length < 2) {
    logger.warn("Only one distinct color left; divergent palette has no second pole", {
      color: poles[0],
    });
    return colorRamp(poles, n);
  }

  const [colorA, colorB] = poles;
  logger.debug("Divergent poles", { colorA, colorB, center });
  return colorRamp([colorB, center, colorA], n);
}
