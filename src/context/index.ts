/**
 * Context Module - Public API
 */

// Types
export type { Context } from "./schema.js";

// Service
export { DeckContext } from "./service.js";
