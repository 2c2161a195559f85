/**
 * Hue Transform Tests
 */
import { describe, expect, it } from "vitest";

import { formatHueError } from "../errors.js";
import { checkCommandResponse, firstBridgeAddress } from "../transform.js";

describe("Hue transforms", () => {
  describe("firstBridgeAddress", () => {
    it("takes the first listed bridge", () => {
      const address = firstBridgeAddress([
        { id: "a", internalipaddress: "192.0.2.1" },
        { id: "b", internalipaddress: "192.0.2.2" },
      ]);

      expect(address._unsafeUnwrap()).toBe("192.0.2.1");
    });

    it("fails on an empty list", () => {
      expect(firstBridgeAddress([])._unsafeUnwrapErr().type).toBe("BRIDGE_NOT_FOUND");
    });
  });

  describe("checkCommandResponse", () => {
    it("accepts a list of successes", () => {
      const result = checkCommandResponse([{ success: { "/lights/1/state/on": true } }]);

      expect(result.isOk()).toBe(true);
    });

    it("returns the first listed error", () => {
      const error = checkCommandResponse([
        { success: { "/lights/1/state/on": true } },
        { error: { type: 201, address: "/lights/1/state/bri", description: "device is off" } },
      ])._unsafeUnwrapErr();

      expect(formatHueError(error)).toBe(
        "Hue bridge rejected /lights/1/state/bri (201): device is off",
      );
    });
  });
});
