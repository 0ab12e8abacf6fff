/**
 * OLEDFont.ts - Reader for the packed bitmap font format
 *
 * Layout: [width][height][firstChar][charCount] header, then one 4-byte
 * jump table entry per character ([offsetHi, offsetLo, byteCount, advance]),
 * then column-major glyph bitmaps (ceil(height / 8) bytes per column).
 */

export const FONT_HEADER_SIZE = 4;
export const JUMPTABLE_BYTES_PER_CHAR = 4;

const JUMPTABLE_MSB_OFFSET = 0;
const JUMPTABLE_LSB_OFFSET = 1;
const JUMPTABLE_SIZE_OFFSET = 2;
const JUMPTABLE_WIDTH_OFFSET = 3;

export const UNDEFINED_GLYPH_MARKER = 0xff;

export interface FontInfo {
  /** Widest glyph in the font */
  width: number;
  height: number;
  firstChar: number;
  charCount: number;
}

export interface GlyphMetrics {
  advanceWidth: number;
  byteCount: number;
  /** Absolute offset of the glyph bitmap inside the font blob */
  bitmapOffset: number;
  isDefined: boolean;
}

const EMPTY_FONT_INFO: FontInfo = Object.freeze({
  width: 0,
  height: 0,
  firstChar: 0,
  charCount: 0,
});

/**
 * Immutable view over a font blob. Reads outside the blob return 0.
 */
export class FontAsset {
  private readonly bytes: Uint8Array;
  readonly name: string;

  constructor(bytes: Uint8Array | readonly number[], name = "font") {
    this.bytes = Uint8Array.from(bytes);
    this.name = name;
  }

  get length(): number {
    return this.bytes.length;
  }

  byteAt(offset: number): number {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.bytes.length) {
      return 0;
    }
    return this.bytes[offset];
  }

  /**
   * True when `count` bytes starting at `offset` are all inside the blob
   */
  contains(offset: number, count: number): boolean {
    return offset >= 0 && count >= 0 && offset + count <= this.bytes.length;
  }

  /**
   * Copy of the raw blob
   */
  toBytes(): Uint8Array {
    return this.bytes.slice();
  }
}

export function createFontFromBytes(
  bytes: Uint8Array | readonly number[],
  name?: string,
): FontAsset {
  return new FontAsset(bytes, name);
}

/**
 * Header fields of a font. A missing font yields an all-zero record.
 */
export function fontInfo(font: FontAsset | null | undefined): FontInfo {
  if (!font) return EMPTY_FONT_INFO;
  return {
    width: font.byteAt(0),
    height: font.byteAt(1),
    firstChar: font.byteAt(2),
    charCount: font.byteAt(3),
  };
}

export function bytesPerColumn(height: number): number {
  return Math.ceil(height / 8);
}

/**
 * Advance used for codes the font has no glyph for: half the widest glyph.
 */
export function fallbackAdvance(info: FontInfo): number {
  return Math.floor(info.width / 2);
}

/**
 * Look up the jump table entry for a character code
 */
export function charInfo(
  font: FontAsset | null | undefined,
  code: number,
): GlyphMetrics {
  const metrics: GlyphMetrics = {
    advanceWidth: 0,
    byteCount: 0,
    bitmapOffset: 0,
    isDefined: false,
  };
  if (!font) return metrics;

  const info = fontInfo(font);
  if (code < info.firstChar || code >= info.firstChar + info.charCount) {
    metrics.advanceWidth = fallbackAdvance(info);
    return metrics;
  }

  const entry =
    FONT_HEADER_SIZE + (code - info.firstChar) * JUMPTABLE_BYTES_PER_CHAR;
  if (!font.contains(entry, JUMPTABLE_BYTES_PER_CHAR)) {
    metrics.advanceWidth = fallbackAdvance(info);
    return metrics;
  }

  const msb = font.byteAt(entry + JUMPTABLE_MSB_OFFSET);
  const lsb = font.byteAt(entry + JUMPTABLE_LSB_OFFSET);
  metrics.byteCount = font.byteAt(entry + JUMPTABLE_SIZE_OFFSET);
  metrics.advanceWidth = font.byteAt(entry + JUMPTABLE_WIDTH_OFFSET);

  if (msb === UNDEFINED_GLYPH_MARKER && lsb === UNDEFINED_GLYPH_MARKER) {
    return metrics;
  }

  metrics.isDefined = true;
  metrics.bitmapOffset =
    FONT_HEADER_SIZE +
    info.charCount * JUMPTABLE_BYTES_PER_CHAR +
    ((msb << 8) | lsb);
  return metrics;
}
