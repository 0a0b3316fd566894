export interface PaletteServiceConfig {
  maxImageBytes: number;
  /** Upper bound on `trials` accepted over HTTP. */
  maxTrials: number;
  /** Upper bound on `n` and `k` accepted over HTTP. */
  maxColors: number;
  fetchTimeoutMs: number;
  /** Images are downscaled to fit inside a square of this size before analysis. */
  maxDimension: number;
  cacheTtlSeconds: number;
  defaultTrials: number;
}

const DEFAULTS: PaletteServiceConfig = {
  maxImageBytes: 10 * 1024 * 1024,
  maxTrials: 100000,
  maxColors: 256,
  fetchTimeoutMs: 20000,
  maxDimension: 256,
  cacheTtlSeconds: 86400,
  defaultTrials: 10000,
};

function positiveInt(raw: string | undefined, fallback: number): number {
  const trimmed = raw?.trim();
  if (!trimmed) return fallback;
  const value = Number.parseInt(trimmed, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

export function readPaletteConfig(env: NodeJS.ProcessEnv = process.env): PaletteServiceConfig {
  return {
    maxImageBytes: positiveInt(env.PALETTE_MAX_IMAGE_BYTES, DEFAULTS.maxImageBytes),
    maxTrials: positiveInt(env.PALETTE_MAX_TRIALS, DEFAULTS.maxTrials),
    maxColors: positiveInt(env.PALETTE_MAX_COLORS, DEFAULTS.maxColors),
    fetchTimeoutMs: positiveInt(env.PALETTE_FETCH_TIMEOUT_MS, DEFAULTS.fetchTimeoutMs),
    maxDimension: positiveInt(env.PALETTE_MAX_DIMENSION, DEFAULTS.maxDimension),
    cacheTtlSeconds: positiveInt(env.PALETTE_CACHE_TTL_SECONDS, DEFAULTS.cacheTtlSeconds),
    defaultTrials: positiveInt(env.PALETTE_DEFAULT_TRIALS, DEFAULTS.defaultTrials),
  };
}

export const paletteConfig = readPaletteConfig();
