/**
 * App Module - Public API
 *
 * Composition of key-bound applications: leaves, groups and pagers.
 */

// Types
export type { Application, KeySpec, NavigationOutcome } from "./schema.js";
export type { PagerError } from "./errors.js";

// Error utilities
export { formatPagerError } from "./errors.js";

// Transformations (pure functions)
export { findOwner, handled, staleKeys, switchTo, toKeySet, unionKeys } from "./transform.js";

// Applications
export { BaseApplication, Group, PagerKey, StaticKey } from "./service.js";
export { Pager } from "./pager.js";
