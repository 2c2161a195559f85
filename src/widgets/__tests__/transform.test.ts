/**
 * Widget Formatting Tests
 */
import { describe, expect, it } from "vitest";

import { blinkColor, formatClock, formatElapsed, splitMinutes } from "../transform.js";

describe("Widgets Transform", () => {
  describe("formatClock", () => {
    const date = new Date(2024, 0, 2, 3, 4, 5);

    it("formats date and time directives", () => {
      expect(formatClock(date, "%Y-%m-%d %H:%M:%S")).toBe("2024-01-02 03:04:05");
    });

    it("turns %% into a literal percent sign", () => {
      expect(formatClock(date, "%H%%")).toBe("03%");
    });

    it("keeps unknown directives as written", () => {
      expect(formatClock(date, "%H %x")).toBe("03 %x");
    });
  });

  describe("formatElapsed", () => {
    it("formats zero as 0:00:00", () => {
      expect(formatElapsed(0)).toBe("0:00:00");
    });

    it("pads minutes and seconds but not hours", () => {
      expect(formatElapsed(3661)).toBe("1:01:01");
      expect(formatElapsed(36000)).toBe("10:00:00");
    });

    it("truncates fractional seconds", () => {
      expect(formatElapsed(59.9)).toBe("0:00:59");
    });
  });

  describe("splitMinutes", () => {
    it("splits into whole minutes and seconds", () => {
      expect(splitMinutes(90.5)).toEqual({ minutes: 1, seconds: 30 });
      expect(splitMinutes(59)).toEqual({ minutes: 0, seconds: 59 });
    });

    it("clamps negative durations to zero", () => {
      expect(splitMinutes(-4)).toEqual({ minutes: 0, seconds: 0 });
    });
  });

  describe("blinkColor", () => {
    it("alternates between two reds each second", () => {
      expect(blinkColor(10)).toEqual([128, 0, 0]);
      expect(blinkColor(11.5)).toEqual([64, 0, 0]);
    });
  });
});
