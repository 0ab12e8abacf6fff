/**
 * DisplayPresets.ts - Controller presets and preview colors
 */

import type { DisplayConfigInput } from "./DisplayConfig";

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface DisplayPreset {
  name: string;
  config: DisplayConfigInput;
  pixelOn: RGB;
  pixelOff: RGB;
}

function ssd1306InitSequence(multiplex: number, comPins: number): number[] {
  return [
    0xae, // Display off
    0xd5, 0x80, // Clock divide ratio / oscillator frequency
    0xa8, multiplex, // Multiplex ratio
    0xd3, 0x00, // No display offset
    0x40, // Start line 0
    0x8d, 0x14, // Enable charge pump
    0x20, 0x00, // Horizontal addressing mode
    0xa1, // Segment remap
    0xc8, // COM scan direction
    0xda, comPins, // COM pins hardware configuration
    0x81, 0xcf, // Contrast
    0xd9, 0xf1, // Pre-charge period
    0xdb, 0x40, // VCOMH deselect level
    0xa4, // Resume RAM content display
    0xa6, // Normal (not inverted)
    0x2e, // Deactivate scroll
    0xaf, // Display on
  ];
}

export const DISPLAY_PRESETS: Record<string, DisplayPreset> = {
  // Classic blue SSD1306
  "ssd1306-128x64": {
    name: "SSD1306 128x64",
    config: {
      width: 128,
      height: 64,
      pageSelectBase: 0xb0,
      columnResetCommands: [0x00, 0x10],
      initSequence: ssd1306InitSequence(0x3f, 0x12),
    },
    pixelOn: { r: 100, g: 180, b: 255 },
    pixelOff: { r: 2, g: 3, b: 8 },
  },
  "ssd1306-128x32": {
    name: "SSD1306 128x32",
    config: {
      width: 128,
      height: 32,
      pageSelectBase: 0xb0,
      columnResetCommands: [0x00, 0x10],
      initSequence: ssd1306InitSequence(0x1f, 0x02),
    },
    pixelOn: { r: 255, g: 255, b: 245 },
    pixelOff: { r: 5, g: 5, b: 5 },
  },
  // SH1106 has 132 columns of RAM; the visible 128 start at column 2
  "sh1106-128x64": {
    name: "SH1106 128x64",
    config: {
      width: 128,
      height: 64,
      pageSelectBase: 0xb0,
      columnResetCommands: [0x02, 0x10],
      initSequence: ssd1306InitSequence(0x3f, 0x12),
    },
    pixelOn: { r: 120, g: 200, b: 255 },
    pixelOff: { r: 2, g: 2, b: 6 },
  },
};

export const DEFAULT_PRESET = "ssd1306-128x64";
