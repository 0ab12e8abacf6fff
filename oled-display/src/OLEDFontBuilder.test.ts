import { describe, it, expect } from "vitest";
import { charInfo, fontInfo } from "./OLEDFont";
import {
  Font_12x16,
  Font_6x8,
  encodeFont,
  packGlyphRows,
  scaleFont,
} from "./OLEDFontBuilder";

describe("encodeFont", () => {
  it("writes header, jump table and bitmaps", () => {
    const font = encodeFont({
      height: 8,
      firstChar: 65,
      glyphs: [
        { advance: 3, columns: [1, 2, 3] },
        null,
        { advance: 2, columns: [4, 5] },
      ],
    });

    expect(Array.from(font.toBytes())).toEqual([
      3, 8, 65, 3,
      0x00, 0x00, 3, 3,
      0xff, 0xff, 0, 3,
      0x00, 0x03, 2, 2,
      1, 2, 3, 4, 5,
    ]);
  });

  it("round-trips through charInfo", () => {
    const font = encodeFont({
      height: 8,
      firstChar: 65,
      glyphs: [{ advance: 3, columns: [1, 2, 3] }, null, { advance: 2, columns: [4, 5] }],
    });
    expect(charInfo(font, 66).isDefined).toBe(false);
    const c = charInfo(font, 67);
    expect(c).toEqual({ advanceWidth: 2, byteCount: 2, bitmapOffset: 19, isDefined: true });
    expect(font.byteAt(c.bitmapOffset)).toBe(4);
  });

  it("rejects more than 255 glyphs", () => {
    const glyphs = new Array(256).fill(null);
    expect(() => encodeFont({ height: 8, firstChar: 0, glyphs })).toThrow(RangeError);
  });
});

describe("packGlyphRows", () => {
  it("packs rows into column bytes, LSB at the top", () => {
    expect(packGlyphRows(["#.", ".#", "##"])).toEqual([0b101, 0b110]);
  });

  it("uses two bytes per column past eight rows", () => {
    expect(packGlyphRows(new Array(10).fill("#"))).toEqual([0xff, 0x03]);
  });
});

describe("scaleFont", () => {
  it("doubles rows and columns", () => {
    const font = encodeFont({
      height: 8,
      firstChar: 65,
      glyphs: [{ advance: 1, columns: [0b00000001] }],
    });
    const big = scaleFont(font, 2);

    expect(fontInfo(big)).toEqual({ width: 2, height: 16, firstChar: 65, charCount: 1 });
    const glyph = charInfo(big, 65);
    expect(glyph.advanceWidth).toBe(2);
    expect(glyph.byteCount).toBe(4);
    const bitmap = [0, 1, 2, 3].map((i) => big.byteAt(glyph.bitmapOffset + i));
    expect(bitmap).toEqual([0x03, 0x00, 0x03, 0x00]);
  });
});

describe("built-in fonts", () => {
  it("covers printable ASCII", () => {
    expect(fontInfo(Font_6x8)).toEqual({ width: 5, height: 8, firstChar: 32, charCount: 95 });
    const a = charInfo(Font_6x8, 0x41);
    expect(a.advanceWidth).toBe(5);
    expect(a.byteCount).toBe(5);
    expect(Font_6x8.byteAt(a.bitmapOffset)).toBe(0x7c);
  });

  it("provides a doubled font", () => {
    expect(fontInfo(Font_12x16)).toEqual({ width: 10, height: 16, firstChar: 32, charCount: 95 });
    expect(charInfo(Font_12x16, 0x41).advanceWidth).toBe(10);
    expect(charInfo(Font_12x16, 0x41).byteCount).toBe(20);
  });
});
