/**
 * Runner Module - Public API
 */

// Types
export type { Task } from "./schema.js";

// Service
export { TaskRunner } from "./service.js";
