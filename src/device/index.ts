/**
 * Device Module - Public API
 *
 * The USB driver lives in ./streamdeck.js and is imported by the entry
 * point only, so nothing else loads the HID bindings.
 */

// Types
export type {
  DeckDriver,
  DeckDriverHandle,
  DeckDriverManager,
  KeyHandler,
  KeyId,
  KeyLayout,
  Rasterizer,
} from "./schema.js";
export type { DeckError } from "./errors.js";
export type { DeviceOptions } from "./service.js";

// Error utilities
export { formatDeckError } from "./errors.js";

// Service (side effects)
export { Device } from "./service.js";
