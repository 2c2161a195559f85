/**
 * Hue Module - Public API
 *
 * Lights and light groups on a Hue bridge.
 */

// Types
export type { GroupState, LightState } from "./schema.js";
export type { HueError } from "./errors.js";
export type { HueClientOptions } from "./service.js";
export type { LightGroupOptions } from "./keys.js";

// Error utilities
export { formatHueError } from "./errors.js";

// Pure transformations
export { checkCommandResponse, firstBridgeAddress } from "./transform.js";

// Service (side effects)
export { HueClient } from "./service.js";

// Keys
export { LightGroupKey, LightKey } from "./keys.js";
