// ── Types ────────────────────────────────────────────────────

/** Channels normalized to 0-1. */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface HSV {
  h: number; // 0-360
  s: number; // 0-1
  v: number; // 0-1
}

const HEX_PATTERN = /^#?([0-9a-fA-F]{6})$/;

// ── RGB ↔ HSV ────────────────────────────────────────────────

export function rgbToHsv({ r, g, b }: RGB): HSV {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const d = max - min;
  const s = max === 0 ? 0 : d / max;

  if (d === 0) return { h: 0, s, v: max };

  let h = 0;
  if (max === r) h = ((g - b) / d + (g < b ? 6 : 0)) * 60;
  else if (max === g) h = ((b - r) / d + 2) * 60;
  else h = ((r - g) / d + 4) * 60;

  return { h, s, v: max };
}

export function hsvToRgb({ h, s, v }: HSV): RGB {
  const hue = ((h % 360) + 360) % 360;
  const c = v * s;
  const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
  const m = v - c;

  let r1 = 0,
    g1 = 0,
    b1 = 0;
  if (hue < 60) [r1, g1, b1] = [c, x, 0];
  else if (hue < 120) [r1, g1, b1] = [x, c, 0];
  else if (hue < 180) [r1, g1, b1] = [0, c, x];
  else if (hue < 240) [r1, g1, b1] = [0, x, c];
  else if (hue < 300) [r1, g1, b1] = [x, 0, c];
  else [r1, g1, b1] = [c, 0, x];

  return { r: r1 + m, g: g1 + m, b: b1 + m };
}

// ── Hex ──────────────────────────────────────────────────────

function toByte(channel: number): number {
  return Math.max(0, Math.min(255, Math.round(channel * 255)));
}

export function encodeHex({ r, g, b }: RGB): string {
  const toHex = (n: number) => toByte(n).toString(16).padStart(2, "0");
  return `#${toHex(r)}${toHex(g)}${toHex(b)}`.toUpperCase();
}

export function hsvToHex(hsv: HSV): string {
  return encodeHex(hsvToRgb(hsv));
}

export function isHexColor(value: string): boolean {
  return HEX_PATTERN.test(value.trim());
}

/** Byte channels (0-255) of a hex color. */
export function hexToBytes(hex: string): [number, number, number] {
  const match = hex.trim().match(HEX_PATTERN);
  if (!match) {
    throw new Error(`Invalid hex color: ${hex}`);
  }
  const cleaned = match[1];
  return [
    parseInt(cleaned.substring(0, 2), 16),
    parseInt(cleaned.substring(2, 4), 16),
    parseInt(cleaned.substring(4, 6), 16),
  ];
}

export function hexToRgb(hex: string): RGB {
  const [r, g, b] = hexToBytes(hex);
  return { r: r / 255, g: g / 255, b: b / 255 };
}

/** Euclidean distance in (h, s, v) with hue in degrees, so hue dominates. */
export function hsvDistance(a: HSV, b: HSV): number {
  return Math.sqrt((a.h - b.h) ** 2 + (a.s - b.s) ** 2 + (a.v - b.v) ** 2);
}

export function rgbDistance(a: RGB, b: RGB): number {
  return Math.sqrt((a.r - b.r) ** 2 + (a.g - b.g) ** 2 + (a.b - b.b) ** 2);
}
