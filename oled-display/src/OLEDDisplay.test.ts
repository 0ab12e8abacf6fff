import { describe, it, expect, vi } from "vitest";
import { DisplayConfigError } from "./DisplayConfig";
import { DISPLAY_PRESETS } from "./DisplayPresets";
import { EmulatedController } from "./EmulatedController";
import { OLEDDisplay } from "./OLEDDisplay";
import { encodeFont } from "./OLEDFontBuilder";
import { PageBuffer, WHITE } from "./PageBuffer";
import { TEXT_ALIGN_CENTER, TEXT_ALIGN_RIGHT } from "./TextLayout";

const SSD1306 = DISPLAY_PRESETS["ssd1306-128x64"].config;

// "A" is a 3 column box: rows 0-4 on the outer columns, rows 0 and 4 inside
const testFont = encodeFont({
  name: "test",
  height: 8,
  firstChar: 0x41,
  glyphs: [{ advance: 3, columns: [0x1f, 0x11, 0x1f] }],
});

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };
}

function createDisplay(device = new EmulatedController()) {
  const logger = createLogger();
  const display = OLEDDisplay.create(SSD1306, device, { logger });
  if (!display) throw new Error("display allocation failed");
  return { display, device, logger };
}

describe("OLEDDisplay.create", () => {
  it("throws on an invalid config", () => {
    expect(() =>
      OLEDDisplay.create({ width: 0, height: 64 }, new EmulatedController()),
    ).toThrow(DisplayConfigError);
  });

  it("returns null and warns when the buffers cannot be allocated", () => {
    const spy = vi.spyOn(PageBuffer, "allocate").mockReturnValue(null);
    const logger = createLogger();
    expect(OLEDDisplay.create(SSD1306, new EmulatedController(), { logger })).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("Failed to allocate display buffer");
    spy.mockRestore();
  });
});

describe("OLEDDisplay.init", () => {
  it("sends the init sequence and shows the boot screen", () => {
    const { display, device, logger } = createDisplay();

    expect(display.init()).toBe(true);
    expect(display.isConnected()).toBe(true);
    expect(device.displayOn).toBe(true);
    expect(logger.info).toHaveBeenCalledWith("Display initialized (128x64)");

    // Border
    expect(display.getPixel(0, 0)).toBe(true);
    expect(display.getPixel(127, 63)).toBe(true);
    // Logo row 1 starts at column 2, logo placed at (48, 24)
    expect(display.getPixel(50, 25)).toBe(true);
    expect(display.getPixel(50, 24)).toBe(false);

    expect(Array.from(device.ram)).toEqual(Array.from(display.getBuffer()));
  });

  it("fails when the device does not answer the probe", () => {
    const { display, device, logger } = createDisplay(
      new EmulatedController({ connected: false }),
    );
    expect(display.init()).toBe(false);
    expect(display.isConnected()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Display not connected");
    expect(device.log).toEqual([]);
  });

  it("fails when an init command is rejected", () => {
    const device = new EmulatedController();
    device.failCommands = true;
    const { display, logger } = createDisplay(device);
    expect(display.init()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Failed to send display init command");
  });

  it("reports success when only the boot screen refresh fails", () => {
    const device = new EmulatedController();
    device.failData = true;
    const { display, logger } = createDisplay(device);
    expect(display.init()).toBe(true);
    expect(display.isConnected()).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("Display refresh failed");
    expect(display.getCanvas().isPageDirty(0)).toBe(true);
  });
});

describe("OLEDDisplay text", () => {
  it("clears the text box before drawing", () => {
    const { display } = createDisplay();
    display.fillRect(0, 0, 128, 64);
    display.setFont(testFont);

    expect(display.drawString(0, 0, "A")).toBe(4);
    expect(display.getPixel(1, 0)).toBe(true);
    expect(display.getPixel(1, 1)).toBe(false);
    expect(display.getPixel(0, 5)).toBe(false);
    // Outside the 3 pixel wide box
    expect(display.getPixel(3, 0)).toBe(true);
    expect(display.getColor()).toBe(WHITE);
  });

  it("right-aligns to the given column", () => {
    const { display } = createDisplay();
    display.setFont(testFont);
    display.setTextAlignment(TEXT_ALIGN_RIGHT);
    display.drawString(20, 0, "A");
    expect(display.getPixel(17, 0)).toBe(true);
    expect(display.getPixel(16, 0)).toBe(false);
  });

  it("centers on the given column", () => {
    const { display } = createDisplay();
    display.setFont(testFont);
    display.setTextAlignment(TEXT_ALIGN_CENTER);
    display.drawString(10, 0, "A");
    expect(display.getPixel(9, 0)).toBe(true);
    expect(display.getPixel(8, 0)).toBe(false);
  });

  it("measures folded UTF-8 text", () => {
    const { display } = createDisplay();
    expect(display.getStringWidth("AB")).toBe(11);
    // é folds to 0xE9, outside the built-in font: half-width fallback
    expect(display.getStringWidth("é")).toBe(2);
  });

  it("switches between the built-in font sizes", () => {
    const { display, logger } = createDisplay();
    display.setFont("big");
    expect(display.getFontHeight()).toBe(16);
    expect(logger.debug).toHaveBeenLastCalledWith("Font set to Font_12x16");
    display.setFont("small");
    expect(display.getFontHeight()).toBe(8);
  });
});

describe("OLEDDisplay flush", () => {
  it("warns when a refresh fails and keeps the page dirty", () => {
    const { display, device, logger } = createDisplay();
    display.setPixel(3, 3);
    device.failData = true;

    expect(display.refresh()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Display refresh failed");
    expect(display.getCanvas().isPageDirty(0)).toBe(true);
  });

  it("clears the device immediately", () => {
    const { display, device } = createDisplay();
    display.init();
    expect(display.clearImmediate()).toBe(true);
    expect(device.ram.every((b) => b === 0)).toBe(true);
    expect(display.getPixel(0, 0)).toBe(false);
  });

  it("leaves the device untouched on clear() until refresh", () => {
    const { display, device } = createDisplay();
    display.init();
    device.clearLog();
    expect(display.clear()).toBe(true);
    expect(device.log).toEqual([]);
    expect(display.refresh()).toBe(true);
    expect(device.ram.every((b) => b === 0)).toBe(true);
  });
});
