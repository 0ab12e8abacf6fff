/**
 * Raster.ts - Integer rasterizers for lines, rectangles, circles and images
 *
 * Everything goes through PageBuffer.setPixel, so clipping and the current
 * color are applied there.
 */

import type { PageBuffer } from "./PageBuffer";

/**
 * Draw a line using Bresenham's algorithm
 */
export function drawLine(
  canvas: PageBuffer,
  x0: number,
  y0: number,
  x1: number,
  y1: number,
): void {
  const dx = Math.abs(x1 - x0);
  const sx = x0 < x1 ? 1 : -1;
  const dy = -Math.abs(y1 - y0);
  const sy = y0 < y1 ? 1 : -1;
  let err = dx + dy;

  while (true) {
    canvas.setPixel(x0, y0);
    if (x0 === x1 && y0 === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) {
      if (x0 === x1) break;
      err += dy;
      x0 += sx;
    }
    if (e2 <= dx) {
      if (y0 === y1) break;
      err += dx;
      y0 += sy;
    }
  }
}

export function drawHorizontalLine(
  canvas: PageBuffer,
  x: number,
  y: number,
  length: number,
): void {
  if (y < 0 || y >= canvas.height) return;
  for (let i = 0; i < length; i++) {
    canvas.setPixel(x + i, y);
  }
}

export function drawVerticalLine(
  canvas: PageBuffer,
  x: number,
  y: number,
  length: number,
): void {
  if (x < 0 || x >= canvas.width) return;
  for (let i = 0; i < length; i++) {
    canvas.setPixel(x, y + i);
  }
}

/**
 * Draw a rectangle outline
 */
export function drawRect(
  canvas: PageBuffer,
  x: number,
  y: number,
  width: number,
  height: number,
): void {
  const right = x + width - 1;
  const bottom = y + height - 1;
  drawLine(canvas, x, y, right, y);
  drawLine(canvas, right, y, right, bottom);
  drawLine(canvas, right, bottom, x, bottom);
  drawLine(canvas, x, bottom, x, y);
}

/**
 * Fill a rectangle, clipped to the canvas
 */
export function fillRect(
  canvas: PageBuffer,
  x: number,
  y: number,
  width: number,
  height: number,
): void {
  if (x >= canvas.width || y >= canvas.height || width <= 0 || height <= 0) {
    return;
  }

  if (x < 0) {
    width += x;
    x = 0;
  }
  if (y < 0) {
    height += y;
    y = 0;
  }
  if (x + width > canvas.width) width = canvas.width - x;
  if (y + height > canvas.height) height = canvas.height - y;
  if (width <= 0 || height <= 0) return;

  for (let j = y; j < y + height; j++) {
    for (let i = x; i < x + width; i++) {
      canvas.setPixel(i, j);
    }
  }
}

/**
 * Draw a circle outline using the midpoint algorithm
 */
export function drawCircle(
  canvas: PageBuffer,
  x0: number,
  y0: number,
  radius: number,
): void {
  let x = radius;
  let y = 0;
  let err = 0;

  while (x >= y) {
    canvas.setPixel(x0 + x, y0 + y);
    canvas.setPixel(x0 + y, y0 + x);
    canvas.setPixel(x0 - y, y0 + x);
    canvas.setPixel(x0 - x, y0 + y);
    canvas.setPixel(x0 - x, y0 - y);
    canvas.setPixel(x0 - y, y0 - x);
    canvas.setPixel(x0 + y, y0 - x);
    canvas.setPixel(x0 + x, y0 - y);

    y++;
    if (err <= 0) {
      err += 2 * y + 1;
    }
    if (err > 0) {
      x--;
      err -= 2 * x + 1;
    }
  }
}

/**
 * Draw a filled circle as horizontal chords. Chords overlap, so under
 * INVERSE the overlapping rows cancel out and the fill has gaps.
 */
export function fillCircle(
  canvas: PageBuffer,
  x0: number,
  y0: number,
  radius: number,
): void {
  let x = radius;
  let y = 0;
  let err = 0;

  while (x >= y) {
    drawLine(canvas, x0 - x, y0 + y, x0 + x, y0 + y);
    drawLine(canvas, x0 - y, y0 + x, x0 + y, y0 + x);
    drawLine(canvas, x0 - x, y0 - y, x0 + x, y0 - y);
    drawLine(canvas, x0 - y, y0 - x, x0 + y, y0 - x);

    y++;
    if (err <= 0) {
      err += 2 * y + 1;
    }
    if (err > 0) {
      x--;
      err -= 2 * x + 1;
    }
  }
}

type BitmapBytes = Uint8Array | readonly number[];

/**
 * Draw a row-major, MSB-first 1bpp bitmap. Zero bits are transparent.
 */
export function drawBitmap(
  canvas: PageBuffer,
  x: number,
  y: number,
  width: number,
  height: number,
  data: BitmapBytes,
): void {
  const byteWidth = Math.ceil(width / 8);
  for (let j = 0; j < height; j++) {
    for (let i = 0; i < width; i++) {
      const byte = data[j * byteWidth + (i >> 3)] ?? 0;
      if (byte & (0x80 >> (i & 7))) {
        canvas.setPixel(x + i, y + j);
      }
    }
  }
}

/**
 * Draw an XBM image (row-major, LSB first)
 */
export function drawXbm(
  canvas: PageBuffer,
  x: number,
  y: number,
  width: number,
  height: number,
  xbm: BitmapBytes,
): void {
  const byteWidth = Math.ceil(width / 8);
  let byte = 0;
  for (let j = 0; j < height; j++) {
    for (let i = 0; i < width; i++) {
      if (i & 7) {
        byte >>= 1;
      } else {
        byte = xbm[j * byteWidth + (i >> 3)] ?? 0;
      }
      if (byte & 0x01) {
        canvas.setPixel(x + i, y + j);
      }
    }
  }
}

/**
 * Draw a page-format image (vertical bytes, like the display RAM)
 */
export function drawFastImage(
  canvas: PageBuffer,
  x: number,
  y: number,
  width: number,
  height: number,
  image: BitmapBytes,
): void {
  const heightInBytes = Math.ceil(height / 8);
  for (let i = 0; i < width; i++) {
    for (let j = 0; j < heightInBytes; j++) {
      const imageByte = image[i + j * width] ?? 0;
      if (imageByte === 0) continue;
      for (let bit = 0; bit < 8; bit++) {
        const row = j * 8 + bit;
        if (row < height && imageByte & (1 << bit)) {
          canvas.setPixel(x + i, y + row);
        }
      }
    }
  }
}

/**
 * Draw a progress bar: outline plus an inner fill for 0..100 percent
 */
export function drawProgressBar(
  canvas: PageBuffer,
  x: number,
  y: number,
  width: number,
  height: number,
  progress: number,
): void {
  progress = Math.max(0, Math.min(100, progress));

  drawRect(canvas, x, y, width, height);

  const fillWidth = Math.floor(((width - 4) * progress) / 100);
  fillRect(canvas, x + 2, y + 2, fillWidth, height - 4);
}
