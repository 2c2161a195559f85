/**
 * Long Press and Toggle Tests
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTestContext } from "../../context/__tests__/testContext.js";
import type { Context } from "../../context/index.js";
import type { KeyId } from "../../device/index.js";
import { textIcon } from "../../icon/index.js";
import { LongPressKey, ToggleKey } from "../service.js";
import { Visibility } from "../visibility.js";

class RecordingLongPress extends LongPressKey {
  readonly calls: string[] = [];

  protected override async onShortPress(_ctx: Context, _key: KeyId): Promise<void> {
    this.calls.push("short-press");
  }

  protected override async onLongPress(_ctx: Context, _key: KeyId): Promise<void> {
    this.calls.push("long-press");
  }

  protected override async onShortRelease(_ctx: Context, _key: KeyId): Promise<void> {
    this.calls.push("short-release");
  }

  protected override async onLongRelease(_ctx: Context, _key: KeyId): Promise<void> {
    this.calls.push("long-release");
  }
}

describe("Interaction", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // LongPressKey
  // ===========================================================================

  describe("LongPressKey", () => {
    it("reports a quick tap as short press and short release", async () => {
      const { ctx } = createTestContext();
      const key = new RecordingLongPress([0, 1], 500);

      const pressing = key.onPress(ctx, 0);
      await vi.advanceTimersByTimeAsync(200);
      await key.onRelease(ctx, 0);
      await vi.advanceTimersByTimeAsync(1000);
      await pressing;

      expect(key.calls).toEqual(["short-press", "short-release"]);
    });

    it("fires long press after the delay and long release after that", async () => {
      const { ctx } = createTestContext();
      const key = new RecordingLongPress(0, 500);

      const pressing = key.onPress(ctx, 0);
      await vi.advanceTimersByTimeAsync(499);
      expect(key.calls).toEqual(["short-press"]);

      await vi.advanceTimersByTimeAsync(1);
      await pressing;
      expect(key.calls).toEqual(["short-press", "long-press"]);

      await vi.advanceTimersByTimeAsync(300);
      await key.onRelease(ctx, 0);
      expect(key.calls).toEqual(["short-press", "long-press", "long-release"]);
    });

    it("cancels the pending long press of an earlier press", async () => {
      const { ctx } = createTestContext();
      const key = new RecordingLongPress([0, 1], 500);

      const first = key.onPress(ctx, 0);
      await vi.advanceTimersByTimeAsync(300);
      const second = key.onPress(ctx, 1);

      await vi.advanceTimersByTimeAsync(200);
      await first;
      expect(key.calls).toEqual(["short-press", "short-press"]);

      await vi.advanceTimersByTimeAsync(300);
      await second;
      expect(key.calls).toEqual(["short-press", "short-press", "long-press"]);
    });

    it("drops the pending long press when hidden", async () => {
      const { ctx } = createTestContext();
      const key = new RecordingLongPress(0, 500);

      const pressing = key.onPress(ctx, 0);
      await vi.advanceTimersByTimeAsync(200);
      await key.onHide(ctx);
      await vi.advanceTimersByTimeAsync(500);
      await pressing;

      expect(key.calls).toEqual(["short-press"]);
    });

    it("treats a release without a press as short", async () => {
      const { ctx } = createTestContext();
      const key = new RecordingLongPress(0, 500);

      const outcome = await key.onRelease(ctx, 0);

      expect(key.calls).toEqual(["short-release"]);
      expect(outcome).toEqual({ type: "HANDLED" });
    });
  });

  // ===========================================================================
  // ToggleKey
  // ===========================================================================

  describe("ToggleKey", () => {
    const icons = [
      textIcon({ text: "off" }),
      textIcon({ text: "low" }),
      textIcon({ text: "high" }),
    ] as const;

    it("draws the first state on display", async () => {
      const { ctx, device, driver } = createTestContext();
      const toggle = new ToggleKey(4, icons);

      await toggle.onDisplay(ctx);
      await device.flush();

      expect(toggle.state).toBe(0);
      expect(driver.lastIcon(4)).toEqual(icons[0]);
    });

    it("ends in state N mod M and reports every new state", async () => {
      const { ctx, device, driver } = createTestContext();
      const states: number[] = [];
      const toggle = new ToggleKey(4, icons, {
        onSwitch: async (_ctx, _key, state) => {
          states.push(state);
        },
      });

      for (let i = 0; i < 7; i++) {
        await toggle.onPress(ctx, 4);
      }
      await device.flush();

      expect(toggle.state).toBe(1);
      expect(states).toEqual([1, 2, 0, 1, 2, 0, 1]);
      expect(driver.lastIcon(4)).toEqual(icons[1]);
    });

    it("redraws before notifying", async () => {
      const { ctx, device, driver } = createTestContext();
      let drawnWhenNotified = 0;
      const toggle = new ToggleKey(4, icons, {
        onSwitch: async () => {
          await device.flush();
          drawnWhenNotified = driver.writesTo(4).length;
        },
      });

      await toggle.onPress(ctx, 4);

      expect(drawnWhenNotified).toBe(1);
    });
  });

  // ===========================================================================
  // Visibility
  // ===========================================================================

  describe("Visibility", () => {
    it("keeps the latest token current while shown", () => {
      const visibility = new Visibility();

      const token = visibility.show();

      expect(visibility.isShown).toBe(true);
      expect(visibility.isCurrent(token)).toBe(true);
    });

    it("invalidates tokens on hide", () => {
      const visibility = new Visibility();
      const token = visibility.show();

      visibility.hide();

      expect(visibility.isShown).toBe(false);
      expect(visibility.isCurrent(token)).toBe(false);
    });

    it("does not revive a token across hide and show", () => {
      const visibility = new Visibility();
      const stale = visibility.show();

      visibility.hide();
      const fresh = visibility.show();

      expect(visibility.isCurrent(stale)).toBe(false);
      expect(visibility.isCurrent(fresh)).toBe(true);
    });
  });
});
