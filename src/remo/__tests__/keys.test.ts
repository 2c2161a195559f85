/**
 * Remo Key Tests
 *
 * Keys drive the client against the in-process API fake on fake timers.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { createTestContext } from "../../context/__tests__/testContext.js";
import {
  BLACK,
  BLANK_ICON,
  GREY,
  WHITE,
  colorIcon,
  gaugeIcon,
  markerIcon,
  textIcon,
} from "../../icon/index.js";
import { ACModeKeySet, ACPowerKey, ACTempKeySet, RoomTempKey, SignalKey } from "../keys.js";
import { NatureRemoClient } from "../service.js";
import { BASE_URL, TOKEN, createFakeRemoApi } from "./fakeRemoApi.js";

function createClient() {
  return new NatureRemoClient({
    token: TOKEN,
    baseUrl: BASE_URL,
    cacheMaxAgeMs: 60_000,
    timeoutMs: 5_000,
  });
}

describe("Remo keys", () => {
  let api: ReturnType<typeof createFakeRemoApi>;

  beforeEach(() => {
    vi.useFakeTimers();
    api = createFakeRemoApi();
    vi.stubGlobal("fetch", vi.fn(api.fetch));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  const posts = () => api.state.requests.filter((request) => request.method === "POST");

  /** Holds every API response until the returned release is called. */
  function holdResponses(): () => void {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    vi.stubGlobal(
      "fetch",
      vi.fn(async (...args: Parameters<typeof api.fetch>) => {
        await gate;
        return api.fetch(...args);
      }),
    );
    return release;
  }

  // ===========================================================================
  // ACPowerKey
  // ===========================================================================

  describe("ACPowerKey", () => {
    it("shows a marker while the unit runs and toggles power", async () => {
      const { ctx, device, driver } = createTestContext();
      const key = new ACPowerKey(0, createClient(), "ac-1");

      await key.onDisplay(ctx);
      await device.flush();
      expect(driver.lastIcon(0)).toEqual(markerIcon({ text: "AC", width: 16 }));

      await key.onPress(ctx, 0);
      await device.flush();

      expect(posts()[0]?.form.button).toBe("power-off");
      expect(driver.lastIcon(0)).toEqual(textIcon({ text: "AC" }));
    });

    it("greys out when the state cannot be read", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => {
          throw new Error("offline");
        }),
      );
      const { ctx, device, driver } = createTestContext();
      const key = new ACPowerKey(0, createClient(), "ac-1", "Air");

      await key.onDisplay(ctx);
      await device.flush();

      expect(driver.lastIcon(0)).toEqual(textIcon({ text: "Air", bg: GREY }));
    });
  });

  // ===========================================================================
  // ACModeKeySet
  // ===========================================================================

  describe("ACModeKeySet", () => {
    const lit = (mode: string) => textIcon({ text: mode, bg: WHITE, fg: BLACK });
    const unlit = (mode: string) => textIcon({ text: mode, bg: BLACK, fg: WHITE });

    it("lights the running mode and switches on press", async () => {
      const { ctx, device, driver } = createTestContext();
      const keys = new ACModeKeySet(createClient(), "ac-1", [
        { key: 1, mode: "cool" },
        { key: 2, mode: "warm" },
      ]);

      await keys.onDisplay(ctx);
      await device.flush();
      expect(driver.lastIcon(1)).toEqual(lit("cool"));
      expect(driver.lastIcon(2)).toEqual(unlit("warm"));

      await keys.onPress(ctx, 2);
      await device.flush();

      expect(api.state.settings.mode).toBe("warm");
      expect(posts()[0]?.form.button).toBe("power-on");
      expect(driver.lastIcon(1)).toEqual(unlit("cool"));
      expect(driver.lastIcon(2)).toEqual(lit("warm"));
    });

    it("turns the unit off from the lit key", async () => {
      const { ctx, device, driver } = createTestContext();
      const keys = new ACModeKeySet(createClient(), "ac-1", [{ key: 1, mode: "cool" }]);

      await keys.onDisplay(ctx);
      await keys.onPress(ctx, 1);
      await device.flush();

      expect(api.state.settings.button).toBe("power-off");
      expect(driver.lastIcon(1)).toEqual(unlit("cool"));
    });

    it("ignores a mode the unit does not offer", async () => {
      const { ctx } = createTestContext();
      const keys = new ACModeKeySet(createClient(), "ac-1", [{ key: 3, mode: "dry" }]);

      await keys.onDisplay(ctx);
      await keys.onPress(ctx, 3);

      expect(posts()).toHaveLength(0);
      expect(api.state.settings.mode).toBe("cool");
    });

    it("draws nothing once hidden", async () => {
      const { ctx, device, driver } = createTestContext();
      const keys = new ACModeKeySet(createClient(), "ac-1", [{ key: 1, mode: "cool" }]);

      const displaying = keys.onDisplay(ctx);
      await keys.onHide(ctx);
      await displaying;
      await device.flush();

      expect(driver.writesTo(1)).toEqual([BLANK_ICON]);
    });
  });

  // ===========================================================================
  // ACTempKeySet
  // ===========================================================================

  describe("ACTempKeySet", () => {
    const layout = { up: 4, middle: 9, down: 14 };

    it("steps while held and sends the target once after release", async () => {
      const { ctx, device, driver } = createTestContext();
      const keys = new ACTempKeySet(createClient(), "ac-1", layout);
      await keys.onDisplay(ctx);

      const pressing = keys.onPress(ctx, layout.up);
      await vi.advanceTimersByTimeAsync(1200);
      const releasing = keys.onRelease(ctx, layout.up);
      await vi.advanceTimersByTimeAsync(1000);
      await releasing;
      await pressing;
      await device.flush();

      expect(posts()).toHaveLength(1);
      expect(posts()[0]?.form.temperature).toBe("27");
      expect(driver.lastIcon(layout.middle)).toEqual(
        gaugeIcon({ text: "27℃", value: 0.8, nKeys: 3, keyOffset: 1 }),
      );
    });

    it("restarts the quiet period on each release", async () => {
      const { ctx } = createTestContext();
      const keys = new ACTempKeySet(createClient(), "ac-1", layout);
      await keys.onDisplay(ctx);

      const first = keys.onPress(ctx, layout.down);
      const firstRelease = keys.onRelease(ctx, layout.down);
      await vi.advanceTimersByTimeAsync(600);
      const second = keys.onPress(ctx, layout.down);
      const secondRelease = keys.onRelease(ctx, layout.down);
      await vi.advanceTimersByTimeAsync(600);

      expect(posts()).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(600);
      await Promise.all([first, firstRelease, second, secondRelease]);

      expect(posts()).toHaveLength(1);
      expect(posts()[0]?.form.temperature).toBe("24");
    });

    it("sends a step whose state arrives after the quiet period", async () => {
      const respond = holdResponses();
      const { ctx } = createTestContext();
      const keys = new ACTempKeySet(createClient(), "ac-1", layout);

      const displaying = keys.onDisplay(ctx);
      const pressing = keys.onPress(ctx, layout.up);
      const releasing = keys.onRelease(ctx, layout.up);
      await vi.advanceTimersByTimeAsync(1500);

      expect(posts()).toHaveLength(0);

      respond();
      await Promise.all([displaying, pressing, releasing]);

      expect(posts()).toHaveLength(1);
      expect(posts()[0]?.form.temperature).toBe("26");
    });

    it("shows placeholders in a mode without temperature", async () => {
      api.state.settings = { ...api.state.settings, mode: "blow", temp: "" };
      const { ctx, device, driver } = createTestContext();
      const keys = new ACTempKeySet(createClient(), "ac-1", layout);

      await keys.onDisplay(ctx);
      await device.flush();

      expect(driver.lastIcon(layout.up)).toEqual(colorIcon({ bg: GREY }));
      expect(driver.lastIcon(layout.middle)).toEqual(textIcon({ bg: GREY, text: "--℃" }));
    });
  });

  // ===========================================================================
  // RoomTempKey
  // ===========================================================================

  describe("RoomTempKey", () => {
    it("polls every minute while shown", async () => {
      const { ctx, device, driver } = createTestContext();
      ctx.runner.start();
      const key = new RoomTempKey(3, createClient(), "dev-1");

      await key.onDisplay(ctx);
      await vi.advanceTimersByTimeAsync(0);
      await device.flush();
      expect(driver.lastIcon(3)).toEqual(textIcon({ text: "22.5℃" }));

      api.state.roomTemperature = 23;
      await vi.advanceTimersByTimeAsync(60_000);
      await device.flush();
      expect(driver.lastIcon(3)).toEqual(textIcon({ text: "23℃" }));

      await key.onHide(ctx);
      driver.clearWrites();
      await vi.advanceTimersByTimeAsync(120_000);
      await device.flush();

      expect(driver.writesTo(3)).toEqual([]);
      ctx.stop();
    });
  });

  // ===========================================================================
  // SignalKey
  // ===========================================================================

  describe("SignalKey", () => {
    const icon = textIcon({ text: "TV" });
    const sending = textIcon({ text: "…", bg: GREY });

    it("sends its signal and restores the icon", async () => {
      const { ctx, device, driver } = createTestContext();
      const key = new SignalKey(5, createClient(), "sig-1", icon);
      await key.onDisplay(ctx);

      await key.onPress(ctx, 5);
      await device.flush();

      expect(posts().map((request) => request.path)).toEqual(["/1/signals/sig-1/send"]);
      expect(driver.writesTo(5)).toEqual([icon, sending, icon]);
    });

    it("leaves its key alone once hidden during the send", async () => {
      const respond = holdResponses();
      const { ctx, device, driver } = createTestContext();
      const key = new SignalKey(5, createClient(), "sig-1", icon);
      await key.onDisplay(ctx);

      const pressing = key.onPress(ctx, 5);
      await key.onHide(ctx);
      respond();
      await pressing;
      await device.flush();

      expect(posts()).toHaveLength(1);
      expect(driver.writesTo(5)).toEqual([icon, sending]);
    });
  });
});
