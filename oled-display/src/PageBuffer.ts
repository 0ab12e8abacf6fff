/**
 * PageBuffer.ts - Monochrome pixel surface in controller page format
 *
 * Vertical byte packing: one byte holds 8 vertical pixels of a page,
 * byte index = page * width + x, bit = y % 8. `working` is what gets drawn
 * into, `shadow` mirrors what the device last acknowledged.
 */

export type DrawColor = "WHITE" | "BLACK" | "INVERSE";

export const WHITE: DrawColor = "WHITE";
export const BLACK: DrawColor = "BLACK";
export const INVERSE: DrawColor = "INVERSE";

export const PAGE_HEIGHT = 8;

export class PageBuffer {
  readonly width: number;
  readonly height: number;
  readonly pages: number;
  readonly working: Uint8Array;
  private readonly shadow: Uint8Array;
  private color: DrawColor = WHITE;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.pages = Math.ceil(height / PAGE_HEIGHT);
    this.working = new Uint8Array(width * this.pages);
    this.shadow = new Uint8Array(width * this.pages);
  }

  /**
   * Allocate a buffer pair, or null when the sizes cannot be allocated
   */
  static allocate(width: number, height: number): PageBuffer | null {
    try {
      return new PageBuffer(width, height);
    } catch (err) {
      if (err instanceof RangeError) return null;
      throw err;
    }
  }

  get size(): number {
    return this.working.length;
  }

  setColor(color: DrawColor): void {
    this.color = color;
  }

  getColor(): DrawColor {
    return this.color;
  }

  /**
   * Apply the current color to a single pixel. Out-of-range is a no-op.
   */
  setPixel(x: number, y: number): void {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;

    const byteIndex = x + Math.floor(y / PAGE_HEIGHT) * this.width;
    const bitMask = 1 << (y & 7);

    switch (this.color) {
      case "WHITE":
        this.working[byteIndex] |= bitMask;
        break;
      case "BLACK":
        this.working[byteIndex] &= ~bitMask;
        break;
      case "INVERSE":
        this.working[byteIndex] ^= bitMask;
        break;
    }
  }

  /**
   * Get a pixel value (true = on, false = off)
   */
  getPixel(x: number, y: number): boolean {
    if (x < 0 || x >= this.width || y < 0 || y >= this.height) return false;
    const byteIndex = x + Math.floor(y / PAGE_HEIGHT) * this.width;
    return (this.working[byteIndex] & (1 << (y & 7))) !== 0;
  }

  /**
   * Clear the working buffer. The shadow copy is left alone.
   */
  clear(): void {
    this.working.fill(0);
  }

  /**
   * Working bytes of one page (a view, not a copy)
   */
  page(index: number): Uint8Array {
    const start = index * this.width;
    return this.working.subarray(start, start + this.width);
  }

  isPageDirty(index: number): boolean {
    const start = index * this.width;
    for (let i = start; i < start + this.width; i++) {
      if (this.working[i] !== this.shadow[i]) return true;
    }
    return false;
  }

  /**
   * Record the working buffer as sent
   */
  commit(): void {
    this.shadow.set(this.working);
  }

  resetShadow(): void {
    this.shadow.fill(0);
  }
}
