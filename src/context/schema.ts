/**
 * Context Module - Types
 */
import type { KeyId, KeyLayout } from "../device/index.js";
import type { Icon } from "../icon/index.js";
import type { Task } from "../runner/index.js";

/**
 * What application code may do: draw on keys and schedule work on the
 * runner. Applications never hold the device or the runner directly.
 */
export interface Context {
  /** Draw an icon on one key or broadcast it to a set of keys. */
  setImage(keys: KeyId | Iterable<KeyId>, icon: Icon): void;
  now(task: Task): void;
  after(delaySeconds: number, task: Task): void;
  /** Run at an absolute time in epoch seconds. */
  at(epochSeconds: number, task: Task): void;
  sleep(seconds: number): Promise<void>;
  keyCount(): number;
  keyLayout(): KeyLayout;
}
