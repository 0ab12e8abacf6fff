/**
 * oled-page-display
 *
 * Monochrome page-buffer renderer for SSD1306/SH1106 style displays:
 * bitmap fonts, vector primitives and a flush engine that only sends the
 * pages that changed.
 */

// Display facade
export {
  OLEDDisplay,
  type OLEDDisplayOptions,
  type FontSize,
  type DisplayLogger,
} from "./OLEDDisplay";

// Canvas
export { PageBuffer, WHITE, BLACK, INVERSE, type DrawColor } from "./PageBuffer";
export * as Raster from "./Raster";

// Text
export {
  stringWidth,
  drawChar,
  drawString,
  drawStringMaxWidth,
  CHAR_SPACING,
  TEXT_ALIGN_LEFT,
  TEXT_ALIGN_CENTER,
  TEXT_ALIGN_RIGHT,
  type TextAlignment,
  type TextCodes,
} from "./TextLayout";
export {
  foldUtf8,
  foldUtf8Byte,
  createUtf8FoldState,
  type Utf8FoldState,
} from "./Utf8Fold";

// Fonts
export {
  FontAsset,
  createFontFromBytes,
  fontInfo,
  charInfo,
  type FontInfo,
  type GlyphMetrics,
} from "./OLEDFont";
export {
  encodeFont,
  packGlyphRows,
  scaleFont,
  Font_6x8,
  Font_12x16,
  type FontSource,
  type GlyphSource,
} from "./OLEDFontBuilder";

// Flush
export {
  refresh,
  clearAndSync,
  dirtyPages,
  type DisplayTransport,
  type PageAddressing,
} from "./FlushEngine";
export {
  EmulatedController,
  type EmulatedControllerOptions,
  type TransportEvent,
} from "./EmulatedController";

// Configuration
export {
  DisplayConfigSchema,
  DisplayConfigError,
  parseDisplayConfig,
  type DisplayConfig,
  type DisplayConfigInput,
} from "./DisplayConfig";
export {
  DISPLAY_PRESETS,
  DEFAULT_PRESET,
  type DisplayPreset,
  type RGB,
} from "./DisplayPresets";

// Images and screens
export { BOOT_LOGO, type XbmImage } from "./OLEDImages";
export * as ScreenRenderers from "./ScreenRenderers";

// Vue component
export { default as DisplayPreview } from "./DisplayPreview.vue";
export { litPixels } from "./previewPixels";
