/**
 * TextLayout.ts - Glyph drawing and string layout over folded codes
 *
 * Text arrives as single-byte codes (see Utf8Fold). Every glyph advance is
 * the jump table width plus `spacing`.
 */

import {
  type FontAsset,
  bytesPerColumn,
  charInfo,
  fontInfo,
} from "./OLEDFont";
import type { PageBuffer } from "./PageBuffer";

export const CHAR_SPACING = 1;
export const NEWLINE = 0x0a;
const SPACE = 0x20;

export type TextCodes = ArrayLike<number>;

export type TextAlignment =
  | "TEXT_ALIGN_LEFT"
  | "TEXT_ALIGN_CENTER"
  | "TEXT_ALIGN_RIGHT";

export const TEXT_ALIGN_LEFT: TextAlignment = "TEXT_ALIGN_LEFT";
export const TEXT_ALIGN_CENTER: TextAlignment = "TEXT_ALIGN_CENTER";
export const TEXT_ALIGN_RIGHT: TextAlignment = "TEXT_ALIGN_RIGHT";

/**
 * Width of the first line of `codes`, without trailing spacing
 */
export function stringWidth(
  codes: TextCodes | null | undefined,
  font: FontAsset | null | undefined,
  spacing = CHAR_SPACING,
): number {
  if (!codes || codes.length === 0 || !font) return 0;

  let total = 0;
  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];
    if (code === NEWLINE) break;
    total += charInfo(font, code).advanceWidth + spacing;
  }

  if (total > 0) total -= spacing;
  return total;
}

/**
 * Draw one glyph with its top-left corner at (x, y). Returns the advance.
 */
export function drawChar(
  canvas: PageBuffer,
  x: number,
  y: number,
  code: number,
  font: FontAsset | null | undefined,
  spacing = CHAR_SPACING,
): number {
  if (!font) return 0;

  const info = fontInfo(font);
  const glyph = charInfo(font, code);
  const advance = glyph.advanceWidth + spacing;
  if (!glyph.isDefined || glyph.byteCount === 0) return advance;

  const perColumn = bytesPerColumn(info.height);
  if (perColumn === 0) return advance;
  const columns = Math.floor(glyph.byteCount / perColumn);

  for (let col = 0; col < columns; col++) {
    for (let k = 0; k < perColumn; k++) {
      const columnByte = font.byteAt(glyph.bitmapOffset + col * perColumn + k);
      if (columnByte === 0) continue;

      for (let bit = 0; bit < 8; bit++) {
        const row = k * 8 + bit;
        if (row >= info.height) break;
        if ((columnByte & (1 << bit)) === 0) continue;

        const py = y + row;
        if (py >= 0 && py < canvas.height) {
          canvas.setPixel(x + col, py);
        }
      }
    }
  }

  return advance;
}

/**
 * Draw a run of codes. Newlines return to the start column; a glyph that
 * would cross the right edge wraps first, and drawing stops once the next
 * line no longer fits. Returns the cursor's net horizontal travel.
 */
export function drawString(
  canvas: PageBuffer,
  x: number,
  y: number,
  codes: TextCodes | null | undefined,
  font: FontAsset | null | undefined,
  spacing = CHAR_SPACING,
): number {
  if (!codes || !font) return 0;

  const info = fontInfo(font);
  const lineAdvance = info.height + spacing;
  let cursorX = x;
  let cursorY = y;

  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];

    if (code === NEWLINE) {
      cursorX = x;
      cursorY += lineAdvance;
      continue;
    }

    const glyph = charInfo(font, code);

    if (cursorX + glyph.advanceWidth > canvas.width) {
      cursorX = x;
      cursorY += lineAdvance;
      if (cursorY > canvas.height - info.height) break;
    }

    if (
      cursorX + glyph.advanceWidth < 0 ||
      cursorY + info.height < 0 ||
      cursorY >= canvas.height
    ) {
      cursorX += glyph.advanceWidth + spacing;
      continue;
    }

    cursorX += drawChar(canvas, cursorX, cursorY, code, font, spacing);
  }

  return cursorX - x;
}

function splitWords(codes: TextCodes): number[][] {
  const words: number[][] = [[]];
  for (let i = 0; i < codes.length; i++) {
    if (codes[i] === SPACE) {
      words.push([]);
    } else {
      words[words.length - 1].push(codes[i]);
    }
  }
  return words;
}

/**
 * Word-wrap into lines no wider than `maxWidth`. Returns the number of
 * lines drawn.
 */
export function drawStringMaxWidth(
  canvas: PageBuffer,
  x: number,
  y: number,
  maxWidth: number,
  codes: TextCodes | null | undefined,
  font: FontAsset | null | undefined,
  spacing = CHAR_SPACING,
): number {
  if (!codes || !font) return 0;

  const lineAdvance = fontInfo(font).height + spacing;
  let line: number[] = [];
  let lineY = y;
  let lines = 0;

  for (const word of splitWords(codes)) {
    const testLine = line.length > 0 ? [...line, SPACE, ...word] : word;

    if (stringWidth(testLine, font, spacing) > maxWidth && line.length > 0) {
      drawString(canvas, x, lineY, line, font, spacing);
      lines++;
      line = word;
      lineY += lineAdvance;
    } else {
      line = testLine;
    }
  }

  if (line.length > 0) {
    drawString(canvas, x, lineY, line, font, spacing);
    lines++;
  }
  return lines;
}
