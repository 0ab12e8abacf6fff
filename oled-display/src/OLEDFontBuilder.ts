/**
 * OLEDFontBuilder.ts - Encode glyph columns into the packed font format
 */

import {
  FONT_HEADER_SIZE,
  JUMPTABLE_BYTES_PER_CHAR,
  UNDEFINED_GLYPH_MARKER,
  FontAsset,
  bytesPerColumn,
  charInfo,
  fontInfo,
} from "./OLEDFont";
import font6x8 from "./fonts/font6x8.json";

export interface GlyphSource {
  advance: number;
  /** Column-major bytes, ceil(height / 8) per column */
  columns: readonly number[];
}

export interface FontSource {
  name?: string;
  height: number;
  firstChar: number;
  /** One entry per code from firstChar; null marks an undefined glyph */
  glyphs: readonly (GlyphSource | null)[];
  /** Defaults to the widest advance */
  width?: number;
}

const MAX_BITMAP_OFFSET = 0xfffe;

export function encodeFont(source: FontSource): FontAsset {
  const { height, firstChar, glyphs } = source;
  if (glyphs.length > 0xff) {
    throw new RangeError(`Font holds at most 255 glyphs, got ${glyphs.length}`);
  }
  const maxAdvance = glyphs.reduce(
    (max, glyph) => Math.max(max, glyph ? glyph.advance : 0),
    0,
  );
  const width = source.width ?? maxAdvance;

  const jumpTable: number[] = [];
  const bitmaps: number[] = [];
  for (const glyph of glyphs) {
    if (!glyph) {
      jumpTable.push(UNDEFINED_GLYPH_MARKER, UNDEFINED_GLYPH_MARKER, 0, width);
      continue;
    }
    const offset = bitmaps.length;
    if (offset > MAX_BITMAP_OFFSET) {
      throw new RangeError(`Glyph bitmap offset ${offset} does not fit 16 bits`);
    }
    if (glyph.columns.length > 0xff) {
      throw new RangeError(`Glyph bitmap of ${glyph.columns.length} bytes is too large`);
    }
    jumpTable.push(
      (offset >> 8) & 0xff,
      offset & 0xff,
      glyph.columns.length,
      glyph.advance,
    );
    for (const byte of glyph.columns) bitmaps.push(byte & 0xff);
  }

  const bytes = new Uint8Array(
    FONT_HEADER_SIZE + glyphs.length * JUMPTABLE_BYTES_PER_CHAR + bitmaps.length,
  );
  bytes.set([width, height, firstChar, glyphs.length], 0);
  bytes.set(jumpTable, FONT_HEADER_SIZE);
  bytes.set(bitmaps, FONT_HEADER_SIZE + jumpTable.length);
  return new FontAsset(bytes, source.name);
}

/**
 * Pack glyph rows ("#" = set) into column-major bytes.
 * All rows are padded to the longest one.
 */
export function packGlyphRows(rows: readonly string[]): number[] {
  const height = rows.length;
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const perColumn = bytesPerColumn(height);
  const columns: number[] = [];
  for (let x = 0; x < width; x++) {
    for (let k = 0; k < perColumn; k++) {
      let byte = 0;
      for (let bit = 0; bit < 8; bit++) {
        const y = k * 8 + bit;
        if (y < height && rows[y][x] === "#") byte |= 1 << bit;
      }
      columns.push(byte);
    }
  }
  return columns;
}

/**
 * Nearest-neighbour integer upscale of every glyph in a font
 */
export function scaleFont(font: FontAsset, factor: number, name?: string): FontAsset {
  const info = fontInfo(font);
  const srcPerColumn = bytesPerColumn(info.height);
  const height = info.height * factor;
  const dstPerColumn = bytesPerColumn(height);

  const glyphs: (GlyphSource | null)[] = [];
  for (let i = 0; i < info.charCount; i++) {
    const glyph = charInfo(font, info.firstChar + i);
    if (!glyph.isDefined) {
      glyphs.push(null);
      continue;
    }
    const columnCount = Math.floor(glyph.byteCount / srcPerColumn);
    const columns: number[] = [];
    for (let col = 0; col < columnCount; col++) {
      const scaled = new Array<number>(dstPerColumn).fill(0);
      for (let y = 0; y < info.height; y++) {
        const byte = font.byteAt(
          glyph.bitmapOffset + col * srcPerColumn + (y >> 3),
        );
        if ((byte & (1 << (y & 7))) === 0) continue;
        for (let dy = 0; dy < factor; dy++) {
          const ty = y * factor + dy;
          scaled[ty >> 3] |= 1 << (ty & 7);
        }
      }
      for (let dx = 0; dx < factor; dx++) columns.push(...scaled);
    }
    glyphs.push({ advance: glyph.advanceWidth * factor, columns });
  }

  return encodeFont({
    name: name ?? `${font.name}x${factor}`,
    height,
    firstChar: info.firstChar,
    glyphs,
    width: info.width * factor,
  });
}

interface FontFile {
  name: string;
  height: number;
  firstChar: number;
  advance: number;
  glyphs: number[][];
}

function loadFontFile(file: FontFile): FontAsset {
  return encodeFont({
    name: file.name,
    height: file.height,
    firstChar: file.firstChar,
    glyphs: file.glyphs.map((columns) => ({ advance: file.advance, columns })),
  });
}

// Built-in fonts: 5x7 glyphs on an 8 pixel cell, and the same glyphs doubled
export const Font_6x8: FontAsset = loadFontFile(font6x8);
export const Font_12x16: FontAsset = scaleFont(Font_6x8, 2, "Font_12x16");
