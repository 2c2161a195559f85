/**
 * App Module - Pure Transformations
 */
import type { KeyId } from "../device/index.js";
import type { Application, KeySpec, NavigationOutcome } from "./schema.js";

// =============================================================================
// Navigation outcomes
// =============================================================================

const HANDLED: NavigationOutcome = { type: "HANDLED" };

export function handled(): NavigationOutcome {
  return HANDLED;
}

export function switchTo(page: string): NavigationOutcome {
  return { type: "SWITCH_TO", page };
}

// =============================================================================
// Key sets
// =============================================================================

export function toKeySet(keys: KeySpec): ReadonlySet<KeyId> {
  return typeof keys === "number" ? new Set([keys]) : new Set(keys);
}

/**
 * Union of the key sets of `apps`, in first-seen order.
 */
export function unionKeys(apps: Iterable<Application>): ReadonlySet<KeyId> {
  const keys = new Set<KeyId>();
  for (const app of apps) {
    for (const key of app.keys) {
      keys.add(key);
    }
  }
  return keys;
}

/**
 * Keys owned by `previous` that `next` does not own.
 */
export function staleKeys(
  previous: ReadonlySet<KeyId>,
  next: ReadonlySet<KeyId>,
): ReadonlySet<KeyId> {
  return new Set([...previous].filter((key) => !next.has(key)));
}

/**
 * The first application owning `key`.
 */
export function findOwner<A extends Application>(
  apps: readonly A[],
  key: KeyId,
): A | undefined {
  return apps.find((app) => app.keys.has(key));
}
