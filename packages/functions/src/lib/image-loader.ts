import { readFile } from "node:fs/promises";
import sharp from "sharp";
import type { RGB } from "./color-utils";
import { paletteConfig } from "./config";
import type { PixelGrid } from "./distribution-filter";

export class ImageLoadError extends Error {
  /** HTTP status to report for this failure. */
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ImageLoadError";
    this.status = status;
  }
}

export interface DecodeOptions {
  /** Fit inside a `maxDimension` square, never enlarging. */
  maxDimension?: number;
}

export interface LoadOptions extends DecodeOptions {
  maxBytes?: number;
  timeoutMs?: number;
}

/**
 * Decodes image bytes into rows of RGB in 0-1. EXIF orientation is applied
 * and alpha is dropped.
 */
export async function decodeImagePixels(bytes: Buffer, options: DecodeOptions = {}): Promise<PixelGrid> {
  let pipeline = sharp(bytes, { failOn: "none" }).rotate();
  if (options.maxDimension) {
    pipeline = pipeline.resize({
      width: options.maxDimension,
      height: options.maxDimension,
      fit: "inside",
      withoutEnlargement: true,
    });
  }

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await pipeline.toColourspace("srgb").raw().toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageLoadError(
      `Unable to decode image: ${error instanceof Error ? error.message : String(error)}`,
      400
    );
  }

  const { data, info } = decoded;
  const { width, height, channels } = info;
  const rows: RGB[][] = [];
  for (let y = 0; y < height; y++) {
    const row: RGB[] = [];
    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * channels;
      // Grey (and grey + alpha) images carry a single color band
      const r = data[offset];
      const g = channels >= 3 ? data[offset + 1] : r;
      const b = channels >= 3 ? data[offset + 2] : r;
      row.push({ r: r / 255, g: g / 255, b: b / 255 });
    }
    rows.push(row);
  }
  return rows;
}

export function parseImageDataUrl(dataUrl: string): Buffer {
  const commaIndex = dataUrl.indexOf(",");
  if (!dataUrl.startsWith("data:") || commaIndex <= 5) {
    throw new ImageLoadError("Invalid image data URL format", 400);
  }

  const metaParts = dataUrl.slice(5, commaIndex).split(";").filter(Boolean);
  const mimeType = (metaParts[0] || "").toLowerCase();
  if (!mimeType.startsWith("image/")) {
    throw new ImageLoadError("Data URL must include an image MIME type", 400);
  }
  if (!metaParts.includes("base64")) {
    throw new ImageLoadError("Data URL images must be base64 encoded", 400);
  }

  const payload = dataUrl.slice(commaIndex + 1).replace(/\s/g, "");
  if (payload.length === 0 || payload.length % 4 !== 0 || !/^[A-Za-z0-9+/]+={0,2}$/.test(payload)) {
    throw new ImageLoadError("Data URL image payload must be valid base64", 400);
  }
  return Buffer.from(payload, "base64");
}

export async function fetchImageBytes(
  url: string,
  options: { maxBytes?: number; timeoutMs?: number } = {}
): Promise<Buffer> {
  const maxBytes = options.maxBytes ?? paletteConfig.maxImageBytes;
  const timeoutMs = options.timeoutMs ?? paletteConfig.fetchTimeoutMs;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ImageLoadError(`Invalid image URL: ${url}`, 400);
  }
  if (!["http:", "https:"].includes(parsed.protocol)) {
    throw new ImageLoadError("Image URLs must use http or https", 400);
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(parsed, { signal: controller.signal });
    if (!response.ok) {
      throw new ImageLoadError(`Image request failed with status ${response.status}`, 502);
    }
    const declaredLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
    if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
      throw new ImageLoadError(`Image exceeds ${maxBytes} bytes`, 413);
    }
    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length > maxBytes) {
      throw new ImageLoadError(`Image exceeds ${maxBytes} bytes`, 413);
    }
    return bytes;
  } catch (error) {
    if (error instanceof ImageLoadError) throw error;
    const reason = controller.signal.aborted
      ? `timed out after ${timeoutMs}ms`
      : error instanceof Error
        ? `${error.name}: ${error.message}`
        : String(error);
    console.warn(`[image-loader] Fetch failed for ${parsed.host}: ${reason}`);
    throw new ImageLoadError(`Unable to fetch image: ${reason}`, 502);
  } finally {
    clearTimeout(timeout);
  }
}

/** Reads a `data:` URL, an http(s) URL or a local file path. */
export async function readImageSource(source: string, options: LoadOptions = {}): Promise<Buffer> {
  const trimmed = source.trim();
  const maxBytes = options.maxBytes ?? paletteConfig.maxImageBytes;

  if (trimmed.startsWith("data:")) {
    const bytes = parseImageDataUrl(trimmed);
    if (bytes.length > maxBytes) {
      throw new ImageLoadError(`Image exceeds ${maxBytes} bytes`, 413);
    }
    return bytes;
  }
  if (/^https?:\/\//i.test(trimmed)) {
    return fetchImageBytes(trimmed, { maxBytes, timeoutMs: options.timeoutMs });
  }

  try {
    return await readFile(trimmed);
  } catch (error) {
    throw new ImageLoadError(
      `Unable to read image file: ${error instanceof Error ? error.message : String(error)}`,
      400
    );
  }
}

export async function loadImagePixels(source: string, options: LoadOptions = {}): Promise<PixelGrid> {
  const bytes = await readImageSource(source, options);
  return decodeImagePixels(bytes, { maxDimension: options.maxDimension });
}
