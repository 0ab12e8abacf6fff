import { describe, it, expect } from "vitest";
import { DisplayConfigError, parseDisplayConfig } from "./DisplayConfig";
import { DISPLAY_PRESETS } from "./DisplayPresets";

function configError(input: unknown): DisplayConfigError {
  try {
    parseDisplayConfig(input);
  } catch (error) {
    if (error instanceof DisplayConfigError) return error;
    throw error;
  }
  throw new Error("expected parseDisplayConfig to throw");
}

describe("parseDisplayConfig", () => {
  it("fills in SSD1306 defaults", () => {
    expect(parseDisplayConfig({ width: 128, height: 64 })).toEqual({
      width: 128,
      height: 64,
      pageSelectBase: 0xb0,
      columnResetCommands: [0x00, 0x10],
      initSequence: [],
      charSpacing: 1,
    });
  });

  it("returns a frozen config", () => {
    const config = parseDisplayConfig({ width: 64, height: 48, initSequence: [0xaf] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.initSequence)).toBe(true);
    expect(Object.isFrozen(config.columnResetCommands)).toBe(true);
  });

  it("rejects a zero width", () => {
    const error = configError({ width: 0, height: 64 });
    expect(error.name).toBe("DisplayConfigError");
    expect(error.issues[0].path).toEqual(["width"]);
    expect(error.message.startsWith("Invalid display config: width ")).toBe(true);
  });

  it("rejects command bytes above 0xFF", () => {
    const error = configError({ width: 128, height: 64, initSequence: [0xae, 0x100] });
    expect(error.issues[0].path).toEqual(["initSequence", 1]);
    expect(error.message.startsWith("Invalid display config: initSequence.1 ")).toBe(true);
  });

  it("rejects a height with more pages than the page-select command addresses", () => {
    const error = configError({ width: 128, height: 256 });
    expect(error.issues[0].path).toEqual(["height"]);
    expect(error.message).toBe(
      "Invalid display config: height needs 32 pages, more than page-select base 0xb0 can address",
    );
  });

  it("accepts sixteen pages", () => {
    expect(parseDisplayConfig({ width: 128, height: 128 }).height).toBe(128);
  });

  it("rejects a page-select base whose low bits collide with page numbers", () => {
    const error = configError({ width: 128, height: 64, pageSelectBase: 0xb3 });
    expect(error.issues[0].path).toEqual(["height"]);
  });

  it("reports a non-object input at the root", () => {
    const error = configError(null);
    expect(error.issues[0].path).toEqual([]);
    expect(error.message).toBe(
      "Invalid display config: (root) Expected object, received null",
    );
  });

  it("accepts every preset", () => {
    for (const preset of Object.values(DISPLAY_PRESETS)) {
      const config = parseDisplayConfig(preset.config);
      expect(config.initSequence.length).toBe(26);
      expect(config.initSequence[config.initSequence.length - 1]).toBe(0xaf);
    }
  });

  it("offsets SH1106 writes by two columns", () => {
    const config = parseDisplayConfig(DISPLAY_PRESETS["sh1106-128x64"].config);
    expect(config.columnResetCommands).toEqual([0x02, 0x10]);
  });
});
