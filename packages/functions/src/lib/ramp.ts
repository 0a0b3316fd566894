import { hexToBytes } from "./color-utils";

function byteHex(value: number): string {
  return value.toString(16).padStart(2, "0").toUpperCase();
}

/**
 * Samples `n` colors from the piecewise-linear RGB gradient through
 * `controls`, which sit at equal steps along [0, 1]. The first and last
 * samples are the first and last controls exactly.
 */
export function colorRamp(controls: readonly string[], n: number): string[] {
  if (controls.length === 0) {
    throw new RangeError("colorRamp needs at least one control color");
  }

  const stops = controls.map(hexToBytes);
  if (stops.length === 1) {
    const only = `#${stops[0].map(byteHex).join("")}`;
    return Array.from({ length: n }, () => only);
  }

  const segments = stops.length - 1;
  return Array.from({ length: n }, (_, i) => {
    const t = n === 1 ? 0 : i / (n - 1);
    const position = t * segments;
    const segment = Math.min(Math.floor(position), segments - 1);
    const f = position - segment;
    const from = stops[segment];
    const to = stops[segment + 1];
    const channels = from.map((start, c) => Math.round(start + (to[c] - start) * f));
    return `#${channels.map(byteHex).join("")}`;
  });
}
