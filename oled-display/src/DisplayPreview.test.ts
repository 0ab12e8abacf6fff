import { describe, it, expect } from "vitest";
import { createSSRApp, h } from "vue";
import { renderToString } from "vue/server-renderer";
import DisplayPreview from "./DisplayPreview.vue";
import { DISPLAY_PRESETS } from "./DisplayPresets";
import { cssColor, litPixels } from "./previewPixels";

describe("litPixels", () => {
  it("lists set bits row by row", () => {
    const buffer = new Uint8Array([0x01, 0x00, 0x80, 0x00]);
    expect(litPixels(buffer, 4, 8)).toEqual([
      { x: 0, y: 0 },
      { x: 2, y: 7 },
    ]);
  });

  it("reads the second page", () => {
    const buffer = new Uint8Array([0x00, 0x00, 0x02, 0x00]);
    expect(litPixels(buffer, 2, 16)).toEqual([{ x: 0, y: 9 }]);
  });
});

describe("cssColor", () => {
  it("formats an rgb() color", () => {
    expect(cssColor({ r: 1, g: 2, b: 3 })).toBe("rgb(1, 2, 3)");
  });
});

describe("DisplayPreview", () => {
  async function render(props: Record<string, unknown>): Promise<string> {
    const app = createSSRApp({ render: () => h(DisplayPreview, props) });
    return renderToString(app);
  }

  it("draws one rect per lit pixel", async () => {
    const html = await render({
      buffer: new Uint8Array([0x01, 0x00, 0x80, 0x00]),
      width: 4,
      height: 8,
      scale: 2,
    });
    expect(html.match(/class="pixel"/g)?.length).toBe(2);
    expect(html).toContain('width="8"');
    expect(html).toContain('height="16"');
    expect(html).toContain('fill="rgb(100, 180, 255)"');
    expect(html).toContain('fill="rgb(2, 3, 8)"');
  });

  it("uses the preset colors", async () => {
    const html = await render({
      buffer: new Uint8Array([0x01]),
      width: 1,
      height: 8,
      preset: DISPLAY_PRESETS["ssd1306-128x32"],
    });
    expect(html).toContain('fill="rgb(255, 255, 245)"');
  });
});
