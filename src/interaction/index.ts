/**
 * Interaction Module - Public API
 */

// Types
export type { SwitchHandler, ToggleOptions } from "./service.js";

// Primitives
export { LongPressKey, ToggleKey } from "./service.js";
export { Visibility } from "./visibility.js";
