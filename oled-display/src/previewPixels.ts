/**
 * previewPixels.ts - Helpers for rendering a page buffer on screen
 */

import type { RGB } from "./DisplayPresets";

export interface Point {
  x: number;
  y: number;
}

/**
 * Coordinates of every set pixel, row by row
 */
export function litPixels(
  buffer: Uint8Array,
  width: number,
  height: number,
): Point[] {
  const points: Point[] = [];
  for (let y = 0; y < height; y++) {
    const rowOffset = Math.floor(y / 8) * width;
    const mask = 1 << (y & 7);
    for (let x = 0; x < width; x++) {
      if ((buffer[rowOffset + x] ?? 0) & mask) points.push({ x, y });
    }
  }
  return points;
}

export function cssColor({ r, g, b }: RGB): string {
  return `rgb(${r}, ${g}, ${b})`;
}
