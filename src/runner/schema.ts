/**
 * Runner Module - Types
 */

/**
 * A unit of work for the runner. May suspend; other tasks run while it
 * waits.
 */
export type Task = () => void | Promise<void>;
