export type PaletteType = "qual" | "seq" | "div";

/** Sort precedence for sequential palettes, e.g. "svh" sorts by saturation, then value, then hue. */
export type SeqBy = "hsv" | "hvs" | "shv" | "svh" | "vhs" | "vsh";

/** Lower and upper bound, both in [0, 1]. */
export type TrimRange = readonly [number, number];

export interface PaletteRequest {
  /** http(s) URL or base64 `data:` URL of the source image. */
  image: string;
  n: number;
  type: PaletteType | "qualitative" | "sequential" | "divergent";
  /** Maximum number of k-means centers; ignored by divergent palettes. */
  k?: number;
  /** Drops near-black and near-white pixels in RGB space. */
  bw?: TrimRange;
  /** Quantile range of HSV value to keep. */
  brightness?: TrimRange;
  /** Quantile range of HSV saturation to keep. */
  saturation?: TrimRange;
  seqBy?: SeqBy;
  /** Hex color at the middle of a divergent palette. */
  divCenter?: string;
  seed?: number;
  trials?: number;
  debug?: boolean;
}

export type PaletteLogLevel = "debug" | "info" | "warn" | "error";

export interface PaletteLogEntry {
  ts: string;
  level: PaletteLogLevel;
  msg: string;
  data?: Record<string, unknown>;
}

export interface PaletteResponse {
  palette: string[];
  type: PaletteType;
  n: number;
  seed: number | null;
  cached: boolean;
  logs?: PaletteLogEntry[];
}

export type PaletteErrorStage = "validation" | "bw-trim" | "quantile-trim";

export interface PaletteErrorBody {
  error: string;
  parameter?: string;
  stage?: PaletteErrorStage;
  thresholds?: Record<string, unknown>;
}
