/**
 * App Module - Types
 *
 * The Application capability and the outcome a release reports back to
 * its parent.
 */
import type { Context } from "../context/index.js";
import type { KeyId } from "../device/index.js";

/**
 * What a release asks of the enclosing pagers. Any leaf can request
 * navigation by name without holding a reference to a pager.
 */
export type NavigationOutcome =
  | { readonly type: "HANDLED" }
  | { readonly type: "SWITCH_TO"; readonly page: string };

/**
 * A unit of key-bound behavior.
 *
 * onDisplay must draw every owned key and may start background work;
 * onHide must stop it and be safe to call twice. onPress and onRelease
 * receive only keys the application owns.
 */
export interface Application {
  readonly keys: ReadonlySet<KeyId>;
  onDisplay(ctx: Context): Promise<void>;
  onHide(ctx: Context): Promise<void>;
  onPress(ctx: Context, key: KeyId): Promise<void>;
  onRelease(ctx: Context, key: KeyId): Promise<NavigationOutcome>;
}

/**
 * Keys an application binds to: one id or several.
 */
export type KeySpec = KeyId | Iterable<KeyId>;
