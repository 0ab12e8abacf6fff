/**
 * OLEDDisplay.ts - Drawing API for a page-addressed monochrome display
 *
 * Owns the page buffer pair, the pen, the current font and the transport.
 * Drawing calls only touch the working buffer; refresh() pushes the pages
 * that changed.
 */

import {
  type DisplayConfig,
  type DisplayConfigInput,
  parseDisplayConfig,
} from "./DisplayConfig";
import {
  type DisplayTransport,
  type PageAddressing,
  clearAndSync,
  refresh,
} from "./FlushEngine";
import { type FontAsset, fontInfo } from "./OLEDFont";
import { Font_12x16, Font_6x8 } from "./OLEDFontBuilder";
import { BOOT_LOGO, type XbmImage } from "./OLEDImages";
import { BLACK, type DrawColor, PageBuffer } from "./PageBuffer";
import * as raster from "./Raster";
import { drawBootScreen } from "./ScreenRenderers";
import * as text from "./TextLayout";
import {
  TEXT_ALIGN_CENTER,
  TEXT_ALIGN_LEFT,
  TEXT_ALIGN_RIGHT,
  type TextAlignment,
} from "./TextLayout";
import { foldUtf8 } from "./Utf8Fold";

export type FontSize = "small" | "medium" | "big";

export type DisplayLogger = Pick<Console, "info" | "warn" | "debug">;

export interface OLEDDisplayOptions {
  fonts?: Partial<Record<FontSize, FontAsset>>;
  logger?: DisplayLogger;
  /** Shown centered inside a border by init() */
  logo?: XbmImage;
}

const DEFAULT_FONTS: Record<FontSize, FontAsset> = {
  small: Font_6x8,
  medium: Font_6x8,
  big: Font_12x16,
};

export class OLEDDisplay {
  readonly config: DisplayConfig;
  private readonly canvas: PageBuffer;
  private readonly transport: DisplayTransport;
  private readonly addressing: PageAddressing;
  private readonly fonts: Record<FontSize, FontAsset>;
  private readonly logger: DisplayLogger;
  private readonly logo: XbmImage;
  private font: FontAsset;
  private textAlignment: TextAlignment = TEXT_ALIGN_LEFT;
  private connected = false;

  private constructor(
    config: DisplayConfig,
    canvas: PageBuffer,
    transport: DisplayTransport,
    options: OLEDDisplayOptions,
  ) {
    this.config = config;
    this.canvas = canvas;
    this.transport = transport;
    this.addressing = {
      pageSelectBase: config.pageSelectBase,
      columnResetCommands: config.columnResetCommands,
    };
    this.fonts = { ...DEFAULT_FONTS, ...options.fonts };
    this.logger = options.logger ?? console;
    this.logo = options.logo ?? BOOT_LOGO;
    this.font = this.fonts.small;
  }

  /**
   * Validate the config and allocate the buffers. Returns null when the
   * buffers cannot be allocated; throws DisplayConfigError on a bad config.
   */
  static create(
    config: DisplayConfigInput,
    transport: DisplayTransport,
    options: OLEDDisplayOptions = {},
  ): OLEDDisplay | null {
    const parsed = parseDisplayConfig(config);
    const canvas = PageBuffer.allocate(parsed.width, parsed.height);
    if (!canvas) {
      (options.logger ?? console).warn("Failed to allocate display buffer");
      return null;
    }
    return new OLEDDisplay(parsed, canvas, transport, options);
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  getWidth(): number {
    return this.canvas.width;
  }

  getHeight(): number {
    return this.canvas.height;
  }

  /**
   * The working buffer (vertical byte packing)
   */
  getBuffer(): Uint8Array {
    return this.canvas.working;
  }

  getCanvas(): PageBuffer {
    return this.canvas;
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Probe the device, send the init sequence and show the boot screen
   */
  init(): boolean {
    this.setFont("small");

    if (this.transport.probe && !this.transport.probe()) {
      this.logger.warn("Display not connected");
      this.connected = false;
      return false;
    }

    for (const command of this.config.initSequence) {
      if (!this.transport.sendCommand(command)) {
        this.logger.warn("Failed to send display init command");
        this.connected = false;
        return false;
      }
    }

    this.connected = true;
    this.clear();
    this.logger.info(`Display initialized (${this.width}x${this.height})`);

    drawBootScreen(this, this.logo);
    // The device is up even if the boot screen did not go out; refresh()
    // has already warned and the next refresh resends it
    this.refresh();
    return true;
  }

  setColor(color: DrawColor): void {
    this.canvas.setColor(color);
  }

  getColor(): DrawColor {
    return this.canvas.getColor();
  }

  /**
   * Select one of the configured font sizes, or any font asset
   */
  setFont(font: FontSize | FontAsset): void {
    this.font = typeof font === "string" ? this.fonts[font] : font;
    this.logger.debug(`Font set to ${this.font.name}`);
  }

  getFont(): FontAsset {
    return this.font;
  }

  getFontHeight(): number {
    return fontInfo(this.font).height;
  }

  setTextAlignment(align: TextAlignment): void {
    this.textAlignment = align;
  }

  setPixel(x: number, y: number): void {
    this.canvas.setPixel(x, y);
  }

  getPixel(x: number, y: number): boolean {
    return this.canvas.getPixel(x, y);
  }

  drawLine(x0: number, y0: number, x1: number, y1: number): void {
    raster.drawLine(this.canvas, x0, y0, x1, y1);
  }

  drawHorizontalLine(x: number, y: number, length: number): void {
    raster.drawHorizontalLine(this.canvas, x, y, length);
  }

  drawVerticalLine(x: number, y: number, length: number): void {
    raster.drawVerticalLine(this.canvas, x, y, length);
  }

  drawRect(x: number, y: number, width: number, height: number): void {
    raster.drawRect(this.canvas, x, y, width, height);
  }

  fillRect(x: number, y: number, width: number, height: number): void {
    raster.fillRect(this.canvas, x, y, width, height);
  }

  drawCircle(x0: number, y0: number, radius: number): void {
    raster.drawCircle(this.canvas, x0, y0, radius);
  }

  fillCircle(x0: number, y0: number, radius: number): void {
    raster.fillCircle(this.canvas, x0, y0, radius);
  }

  drawBitmap(
    x: number,
    y: number,
    width: number,
    height: number,
    data: Uint8Array | readonly number[],
  ): void {
    raster.drawBitmap(this.canvas, x, y, width, height, data);
  }

  drawXbm(
    x: number,
    y: number,
    width: number,
    height: number,
    xbm: Uint8Array | readonly number[],
  ): void {
    raster.drawXbm(this.canvas, x, y, width, height, xbm);
  }

  drawFastImage(
    x: number,
    y: number,
    width: number,
    height: number,
    image: Uint8Array | readonly number[],
  ): void {
    raster.drawFastImage(this.canvas, x, y, width, height, image);
  }

  drawProgressBar(
    x: number,
    y: number,
    width: number,
    height: number,
    progress: number,
  ): void {
    raster.drawProgressBar(this.canvas, x, y, width, height, progress);
  }

  /**
   * Draw one already-folded character code with the current font
   */
  drawChar(x: number, y: number, code: number): number {
    return text.drawChar(
      this.canvas,
      x,
      y,
      code,
      this.font,
      this.config.charSpacing,
    );
  }

  /**
   * Width of the first line of `value` in the current font
   */
  getStringWidth(value: string): number {
    return text.stringWidth(foldUtf8(value), this.font, this.config.charSpacing);
  }

  /**
   * Draw a string over a cleared background box. Returns the distance the
   * cursor moved from the aligned start column.
   */
  drawString(x: number, y: number, value: string): number {
    const codes = foldUtf8(value);
    const spacing = this.config.charSpacing;
    const textWidth = text.stringWidth(codes, this.font, spacing);

    let startX = x;
    if (this.textAlignment === TEXT_ALIGN_CENTER) {
      startX = x - Math.floor(textWidth / 2);
    } else if (this.textAlignment === TEXT_ALIGN_RIGHT) {
      startX = x - textWidth;
    }

    const color = this.canvas.getColor();
    this.canvas.setColor(BLACK);
    raster.fillRect(this.canvas, startX, y, textWidth, this.getFontHeight());
    this.canvas.setColor(color);

    return text.drawString(this.canvas, startX, y, codes, this.font, spacing);
  }

  /**
   * Draw a string that word-wraps within maxWidth
   */
  drawStringMaxWidth(x: number, y: number, maxWidth: number, value: string): number {
    return text.drawStringMaxWidth(
      this.canvas,
      x,
      y,
      maxWidth,
      foldUtf8(value),
      this.font,
      this.config.charSpacing,
    );
  }

  /**
   * Send the pages that changed since the last successful refresh
   */
  refresh(): boolean {
    const success = refresh(this.canvas, this.transport, this.addressing);
    if (!success) {
      this.logger.warn("Display refresh failed");
    }
    return success;
  }

  /**
   * Clear the working buffer; the next refresh sends the change
   */
  clear(): boolean {
    this.canvas.clear();
    return true;
  }

  /**
   * Clear the buffers and the device right away
   */
  clearImmediate(): boolean {
    const success = clearAndSync(this.canvas, this.transport, this.addressing);
    if (!success) {
      this.logger.warn("Display clear failed");
    }
    return success;
  }
}
