/**
 * Widgets Module - Public API
 */

// Types
export type { ClockOptions, CounterOptions, KitchenTimerKeys } from "./service.js";

// Pure transformations
export { blinkColor, formatClock, formatElapsed, splitMinutes } from "./transform.js";

// Widgets
export { ClockKey, CounterKey, KitchenTimerKey, StopWatchKey } from "./service.js";
