import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import {
  decodeImagePixels,
  fetchImageBytes,
  ImageLoadError,
  loadImagePixels,
  parseImageDataUrl,
  readImageSource,
} from "./image-loader";

function png(width: number, height: number, channels: 3 | 4, bytes: number[]): Promise<Buffer> {
  return sharp(Buffer.from(bytes), { raw: { width, height, channels } }).png().toBuffer();
}

const rgbwPng = () => png(2, 2, 3, [255, 0, 0, 0, 255, 0, 0, 0, 255, 255, 255, 255]);

function hasStatus(status: number, pattern: RegExp) {
  return (error: unknown) => {
    assert.ok(error instanceof ImageLoadError);
    assert.equal(error.status, status);
    assert.match(error.message, pattern);
    return true;
  };
}

describe("decodeImagePixels", () => {
  it("returns rows of RGB in 0-1", async () => {
    const pixels = await decodeImagePixels(await rgbwPng());
    assert.deepEqual(pixels, [
      [
        { r: 1, g: 0, b: 0 },
        { r: 0, g: 1, b: 0 },
      ],
      [
        { r: 0, g: 0, b: 1 },
        { r: 1, g: 1, b: 1 },
      ],
    ]);
  });

  it("drops the alpha channel", async () => {
    const bytes = await png(1, 2, 4, [255, 0, 0, 128, 0, 0, 255, 255]);
    assert.deepEqual(await decodeImagePixels(bytes), [[{ r: 1, g: 0, b: 0 }], [{ r: 0, g: 0, b: 1 }]]);
  });

  it("downscales to fit maxDimension", async () => {
    const bytes = await png(8, 4, 3, Array.from({ length: 8 * 4 }, () => [0, 128, 255]).flat());
    const pixels = await decodeImagePixels(bytes, { maxDimension: 2 });
    assert.equal(pixels.length, 1);
    assert.equal(pixels[0].length, 2);
  });

  it("never enlarges small images", async () => {
    const pixels = await decodeImagePixels(await rgbwPng(), { maxDimension: 64 });
    assert.equal(pixels.length, 2);
    assert.equal(pixels[0].length, 2);
  });

  it("rejects bytes that are not an image", async () => {
    await assert.rejects(decodeImagePixels(Buffer.from("not an image")), hasStatus(400, /^Unable to decode image/));
  });
});

describe("parseImageDataUrl", () => {
  it("decodes base64 payloads", () => {
    assert.deepEqual([...parseImageDataUrl("data:image/png;base64,AQID")], [1, 2, 3]);
  });

  it("rejects malformed data URLs", () => {
    assert.throws(() => parseImageDataUrl("data:image/png;base64"), hasStatus(400, /^Invalid image data URL format$/));
    assert.throws(() => parseImageDataUrl("data:text/plain;base64,AQID"), hasStatus(400, /image MIME type/));
    assert.throws(() => parseImageDataUrl("data:image/png,AQID"), hasStatus(400, /base64 encoded/));
    assert.throws(() => parseImageDataUrl("data:image/png;base64,AQ*D"), hasStatus(400, /valid base64/));
  });
});

describe("readImageSource", () => {
  it("enforces the size limit on data URLs", async () => {
    await assert.rejects(
      readImageSource("data:image/png;base64,AQIDBA==", { maxBytes: 2 }),
      hasStatus(413, /^Image exceeds 2 bytes$/)
    );
  });

  it("reports unreadable files", async () => {
    await assert.rejects(
      readImageSource(join(tmpdir(), "imgpal-missing", "nothing.png")),
      hasStatus(400, /^Unable to read image file/)
    );
  });
});

describe("fetchImageBytes", () => {
  it("only fetches http(s) URLs", async () => {
    await assert.rejects(fetchImageBytes("ftp://example.com/a.png"), hasStatus(400, /http or https/));
    await assert.rejects(fetchImageBytes("not a url"), hasStatus(400, /^Invalid image URL/));
  });
});

describe("loadImagePixels", () => {
  it("loads data URLs", async () => {
    const dataUrl = `data:image/png;base64,${(await rgbwPng()).toString("base64")}`;
    const pixels = await loadImagePixels(dataUrl);
    assert.deepEqual(pixels[1][1], { r: 1, g: 1, b: 1 });
  });

  it("loads local files", async () => {
    const dir = await mkdtemp(join(tmpdir(), "imgpal-"));
    try {
      const file = join(dir, "rgbw.png");
      await writeFile(file, await rgbwPng());
      const pixels = await loadImagePixels(file);
      assert.deepEqual(pixels[0][0], { r: 1, g: 0, b: 0 });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
