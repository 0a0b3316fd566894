import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  encodeHex,
  hexToBytes,
  hexToRgb,
  hsvDistance,
  hsvToHex,
  hsvToRgb,
  isHexColor,
  rgbToHsv,
} from "./color-utils";

describe("rgbToHsv", () => {
  it("places the primaries at 0, 120 and 240 degrees", () => {
    assert.deepEqual(rgbToHsv({ r: 1, g: 0, b: 0 }), { h: 0, s: 1, v: 1 });
    assert.deepEqual(rgbToHsv({ r: 0, g: 1, b: 0 }), { h: 120, s: 1, v: 1 });
    assert.deepEqual(rgbToHsv({ r: 0, g: 0, b: 1 }), { h: 240, s: 1, v: 1 });
  });

  it("wraps hues below red into the upper range", () => {
    assert.deepEqual(rgbToHsv({ r: 1, g: 0, b: 0.5 }), { h: 330, s: 1, v: 1 });
  });

  it("gives achromatic colors hue 0 and saturation 0", () => {
    assert.deepEqual(rgbToHsv({ r: 1, g: 1, b: 1 }), { h: 0, s: 0, v: 1 });
    assert.deepEqual(rgbToHsv({ r: 0, g: 0, b: 0 }), { h: 0, s: 0, v: 0 });
  });
});

describe("hsvToRgb", () => {
  it("inverts rgbToHsv for a hue in the last sector", () => {
    assert.deepEqual(hsvToRgb({ h: 330, s: 1, v: 1 }), { r: 1, g: 0, b: 0.5 });
  });

  it("treats 360 degrees as red", () => {
    assert.deepEqual(hsvToRgb({ h: 360, s: 1, v: 1 }), { r: 1, g: 0, b: 0 });
  });
});

describe("encodeHex", () => {
  it("rounds channels to the nearest byte and upper-cases", () => {
    assert.equal(encodeHex({ r: 1, g: 0.5, b: 0 }), "#FF8000");
  });

  it("clamps out-of-range channels", () => {
    assert.equal(encodeHex({ r: 1.2, g: -0.1, b: 0 }), "#FF0000");
  });

  it("encodes HSV through RGB", () => {
    assert.equal(hsvToHex({ h: 120, s: 1, v: 1 }), "#00FF00");
    assert.equal(hsvToHex(rgbToHsv(hexToRgb("#336699"))), "#336699");
  });
});

describe("hex parsing", () => {
  it("accepts six digits with or without a leading #", () => {
    assert.deepEqual(hexToBytes("#ff8000"), [255, 128, 0]);
    assert.deepEqual(hexToBytes("FF8000"), [255, 128, 0]);
    assert.deepEqual(hexToRgb("#FFFFFF"), { r: 1, g: 1, b: 1 });
  });

  it("rejects short and malformed colors", () => {
    assert.throws(() => hexToBytes("#fff"), /Invalid hex color/);
    assert.equal(isHexColor(" #A1b2C3 "), true);
    assert.equal(isHexColor("#12345"), false);
    assert.equal(isHexColor("white"), false);
  });
});

describe("hsvDistance", () => {
  it("measures hue in degrees alongside saturation and value", () => {
    assert.equal(hsvDistance({ h: 0, s: 1, v: 1 }, { h: 120, s: 1, v: 1 }), 120);
    assert.equal(hsvDistance({ h: 0, s: 0, v: 1 }, { h: 0, s: 1, v: 1 }), 1);
  });
});
