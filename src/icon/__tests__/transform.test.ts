/**
 * Icon Transform Tests
 *
 * Tests for icon factories and the pure SVG renderers.
 */
import { describe, expect, it } from "vitest";

import {
  colorIcon,
  gaugeIcon,
  markerIcon,
  textIcon,
} from "../schema.js";
import {
  escapeXml,
  gaugeFill,
  gaugeFillLength,
  markerGeometry,
  renderIconSvg,
  toHex,
} from "../transform.js";

const SVG_OPEN =
  '<svg xmlns="http://www.w3.org/2000/svg" width="72" height="72" viewBox="0 0 72 72" shape-rendering="crispEdges">';

describe("Icon Transform", () => {
  // ===========================================================================
  // Factories
  // ===========================================================================

  describe("factories", () => {
    it("fills text icon defaults", () => {
      const icon = textIcon({ text: "AC" });

      expect(icon).toEqual({
        kind: "text",
        bg: [0, 0, 0],
        fg: [255, 255, 255],
        text: "AC",
        lang: "ja",
        size: 16,
        x: 36,
        y: 36,
      });
    });

    it("fills marker defaults on top of text defaults", () => {
      const icon = markerIcon({ text: "LIGHT", position: "left" });

      expect(icon.markerColor).toEqual([255, 255, 255]);
      expect(icon.position).toBe("left");
      expect(icon.shape).toBe("square");
      expect(icon.width).toBe(4);
      expect(icon.size).toBe(16);
    });

    it("rejects color channels out of range", () => {
      expect(() => colorIcon({ bg: [256, 0, 0] })).toThrow();
    });
  });

  // ===========================================================================
  // Markup Helpers
  // ===========================================================================

  describe("escapeXml", () => {
    it("escapes markup characters", () => {
      expect(escapeXml(`<a & "b">`)).toBe("&lt;a &amp; &quot;b&quot;&gt;");
    });
  });

  describe("toHex", () => {
    it("formats colors as padded hex", () => {
      expect(toHex([255, 8, 0])).toBe("#ff0800");
    });
  });

  // ===========================================================================
  // Renderers
  // ===========================================================================

  describe("renderIconSvg", () => {
    it("renders a color icon as a single background rect", () => {
      const svg = renderIconSvg(colorIcon({ bg: [255, 0, 0] }));

      expect(svg).toBe(
        `${SVG_OPEN}<rect x="0" y="0" width="72" height="72" fill="#ff0000"/></svg>`,
      );
    });

    it("renders centered text with the default font", () => {
      const svg = renderIconSvg(textIcon({ text: "a<b", size: 24 }));

      expect(svg).toBe(
        `${SVG_OPEN}<rect x="0" y="0" width="72" height="72" fill="#000000"/>` +
          '<text x="36" y="36" fill="#ffffff" font-family="Noto Sans CJK JP, Noto Sans, sans-serif" ' +
          'font-size="24" text-anchor="middle" dominant-baseline="central" xml:lang="ja">a&lt;b</text></svg>',
      );
    });

    it("omits the text layer for empty text", () => {
      const svg = renderIconSvg(textIcon());

      expect(svg).not.toContain("<text");
    });

    it("draws the marker after the text layer", () => {
      const svg = renderIconSvg(markerIcon({ text: "AC", position: "left" }));

      const textAt = svg.indexOf("<text");
      const markerAt = svg.indexOf('<rect x="0" y="0" width="4" height="72" fill="#ffffff"/>');
      expect(textAt).toBeGreaterThan(0);
      expect(markerAt).toBeGreaterThan(textAt);
    });

    it("renders a triangular marker as a polygon", () => {
      const svg = renderIconSvg(
        markerIcon({ text: "STBY", position: "right", shape: "triangle" }),
      );

      expect(svg).toContain('<polygon points="72,0 64,36 72,72" fill="#ffffff"/>');
    });

    it("scales to the requested pixel size through the viewBox", () => {
      const svg = renderIconSvg(colorIcon(), 96);

      expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="96" height="96" viewBox="0 0 72 72"')).toBe(true);
    });

    it("outlines gauge labels with the background color", () => {
      const svg = renderIconSvg(
        gaugeIcon({ text: "50%", value: 0.5, bg: [0, 0, 128] }),
      );

      expect(svg).toContain('stroke="#000080" stroke-width="4"');
    });
  });

  // ===========================================================================
  // Marker Geometry
  // ===========================================================================

  describe("markerGeometry", () => {
    it("places square bands along each edge", () => {
      expect(markerGeometry("top", "square", 4)).toEqual({
        type: "rect",
        rect: { x: 0, y: 0, width: 72, height: 4 },
      });
      expect(markerGeometry("bottom", "square", 16)).toEqual({
        type: "rect",
        rect: { x: 0, y: 56, width: 72, height: 16 },
      });
      expect(markerGeometry("right", "square", 4)).toEqual({
        type: "rect",
        rect: { x: 68, y: 0, width: 4, height: 72 },
      });
    });

    it("makes triangle wedges twice the marker width deep", () => {
      expect(markerGeometry("left", "triangle", 4)).toEqual({
        type: "polygon",
        points: [[0, 0], [8, 36], [0, 72]],
      });
      expect(markerGeometry("bottom", "triangle", 4)).toEqual({
        type: "polygon",
        points: [[0, 72], [72, 72], [36, 64]],
      });
    });
  });

  // ===========================================================================
  // Gauge Geometry
  // ===========================================================================

  describe("gaugeFillLength", () => {
    it("covers nothing at 0 and the whole key at 1", () => {
      expect(gaugeFillLength(0, 1, 0)).toBe(0);
      expect(gaugeFillLength(1, 1, 0)).toBe(72);
    });

    it("slices a strip spanning several keys", () => {
      // 3 keys: 72 * 3 + 13 * 2 = 242, half = 121
      expect(gaugeFillLength(0.5, 3, 0)).toBe(121);
      expect(gaugeFillLength(0.5, 3, 1)).toBe(36);
      expect(gaugeFillLength(0.5, 3, 2)).toBe(0);
    });

    it("clamps values outside [0, 1]", () => {
      expect(gaugeFillLength(-0.5, 1, 0)).toBe(0);
      expect(gaugeFillLength(3, 1, 0)).toBe(72);
    });

    it("is monotonically non-decreasing in value", () => {
      let previous = -1;
      for (let step = 0; step <= 100; step++) {
        const length = gaugeFillLength(step / 100, 1, 0);
        expect(length).toBeGreaterThanOrEqual(previous);
        previous = length;
      }
    });
  });

  describe("gaugeFill", () => {
    it("draws no fill for an empty gauge", () => {
      const icon = gaugeIcon({ value: 0 });
      const length = gaugeFillLength(icon.value, icon.nKeys, icon.keyOffset);

      expect(gaugeFill(length, icon.width, icon.horizontal)).toEqual({
        bars: [],
        cursor: null,
      });
    });

    it("draws two full-height side bars for a full vertical gauge", () => {
      expect(gaugeFill(72, 12, false)).toEqual({
        bars: [
          { x: 0, y: 0, width: 12, height: 72 },
          { x: 60, y: 0, width: 12, height: 72 },
        ],
        cursor: null,
      });
    });

    it("draws proportional bars and a cursor for a partial vertical gauge", () => {
      expect(gaugeFill(36, 12, false)).toEqual({
        bars: [
          { x: 0, y: 36, width: 12, height: 36 },
          { x: 60, y: 36, width: 12, height: 36 },
        ],
        cursor: { x: 0, y: 36, width: 72, height: 1 },
      });
    });

    it("grows horizontal gauges from the left edge", () => {
      expect(gaugeFill(20, 12, true)).toEqual({
        bars: [
          { x: 0, y: 0, width: 20, height: 12 },
          { x: 0, y: 60, width: 20, height: 12 },
        ],
        cursor: { x: 20, y: 0, width: 1, height: 72 },
      });
    });

    it("renders both full bars into the svg at value 1", () => {
      const svg = renderIconSvg(gaugeIcon({ value: 1, gauge: [255, 0, 0] }));

      expect(svg).toContain('<rect x="0" y="0" width="12" height="72" fill="#ff0000"/>');
      expect(svg).toContain('<rect x="60" y="0" width="12" height="72" fill="#ff0000"/>');
    });
  });
});
