import type { HSV } from "./color-utils";
import { type RandomSource, sampleIndices } from "./random";

export const DEFAULT_MAX_ITERATIONS = 30;

export interface ColorCluster extends HSV {
  /** Number of samples assigned to the centroid. */
  size: number;
}

export interface QuantizeOptions {
  maxIterations?: number;
}

interface WeightedColor extends HSV {
  weight: number;
}

function colorKey({ h, s, v }: HSV): string {
  return `${h},${s},${v}`;
}

function distinctColors(samples: readonly HSV[]): WeightedColor[] {
  const byKey = new Map<string, WeightedColor>();
  for (const sample of samples) {
    const key = colorKey(sample);
    const existing = byKey.get(key);
    if (existing) {
      existing.weight++;
    } else {
      byKey.set(key, { h: sample.h, s: sample.s, v: sample.v, weight: 1 });
    }
  }
  return [...byKey.values()];
}

export function countDistinctColors(samples: readonly HSV[]): number {
  return new Set(samples.map(colorKey)).size;
}

function squaredDistance(a: HSV, b: HSV): number {
  return (a.h - b.h) ** 2 + (a.s - b.s) ** 2 + (a.v - b.v) ** 2;
}

function nearestCenter(color: HSV, centers: readonly HSV[]): number {
  let best = 0;
  let bestDistance = Infinity;
  for (let i = 0; i < centers.length; i++) {
    const d = squaredDistance(color, centers[i]);
    if (d < bestDistance) {
      bestDistance = d;
      best = i;
    }
  }
  return best;
}

/**
 * Lloyd k-means in HSV space. Runs on the distinct colors weighted by how
 * often they occur, which gives the same centroids as clustering every
 * sample. Returns exactly `min(k, distinct colors)` clusters; the result is
 * accepted as-is when `maxIterations` runs out before the assignment
 * settles.
 */
export function quantizeColors(
  samples: readonly HSV[],
  k: number,
  random: RandomSource,
  options: QuantizeOptions = {}
): ColorCluster[] {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const colors = distinctColors(samples);
  const count = Math.min(k, colors.length);
  if (count === 0) {
    return [];
  }

  let centers: HSV[] = sampleIndices(random, colors.length, count).map((i) => ({
    h: colors[i].h,
    s: colors[i].s,
    v: colors[i].v,
  }));
  let assignment = new Array<number>(colors.length).fill(-1);

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const next = colors.map((color) => nearestCenter(color, centers));
    const changed = next.some((cluster, i) => cluster !== assignment[i]);
    assignment = next;
    if (!changed) {
      break;
    }
    centers = recomputeCenters(colors, assignment, centers);
  }

  const sizes = new Array<number>(count).fill(0);
  colors.forEach((color, i) => {
    sizes[assignment[i]] += color.weight;
  });

  return centers.map((center, i) => ({ ...center, size: sizes[i] }));
}

function recomputeCenters(
  colors: readonly WeightedColor[],
  assignment: readonly number[],
  previous: readonly HSV[]
): HSV[] {
  const sums = previous.map(() => ({ h: 0, s: 0, v: 0, weight: 0 }));
  colors.forEach((color, i) => {
    const sum = sums[assignment[i]];
    sum.h += color.h * color.weight;
    sum.s += color.s * color.weight;
    sum.v += color.v * color.weight;
    sum.weight += color.weight;
  });
  // An emptied cluster keeps its last center.
  return sums.map((sum, i) =>
    sum.weight === 0
      ? previous[i]
      : { h: sum.h / sum.weight, s: sum.s / sum.weight, v: sum.v / sum.weight }
  );
}
