/**
 * Hue Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";

import { type HueError, bridgeError, bridgeNotFound } from "./errors.js";
import type {
  DiscoveredBridge,
  GroupState,
  HueCommandResponse,
  HueGroup,
  HueLight,
  LightState,
} from "./schema.js";

/**
 * Address of the first bridge the discovery endpoint lists.
 */
export function firstBridgeAddress(
  bridges: readonly DiscoveredBridge[],
): Result<string, HueError> {
  const bridge = bridges[0];
  return bridge ? ok(bridge.internalipaddress) : err(bridgeNotFound());
}

export function toLightState(id: string, light: HueLight): LightState {
  return {
    id,
    name: light.name,
    on: light.state.on,
    reachable: light.state.reachable,
  };
}

export function toGroupState(id: string, group: HueGroup): GroupState {
  return {
    id,
    name: group.name,
    lights: group.lights,
    allOn: group.state.all_on,
    anyOn: group.state.any_on,
  };
}

/**
 * First error in a command response, if any entry reports one.
 */
export function checkCommandResponse(response: HueCommandResponse): Result<void, HueError> {
  for (const entry of response) {
    if ("error" in entry) {
      return err(bridgeError(entry.error.type, entry.error.address, entry.error.description));
    }
  }
  return ok(undefined);
}
