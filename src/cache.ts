/**
 * Keyed cache for bridge state.
 *
 * Entries younger than `maxAgeMs` are served from memory; older ones, or
 * any lookup with `force`, are reloaded. Lookups are serialised, so one
 * stale entry is loaded once even when several keys ask at the same time.
 */
import type { Result } from "neverthrow";
import { ok } from "neverthrow";

import { Lock } from "./lock.js";

export type CacheOptions = Readonly<{
  /** Reload even if the entry is fresh. */
  force?: boolean;
}>;

type Entry<V> = Readonly<{ value: V; storedAt: number }>;

export class StateCache<K, V> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly lock = new Lock();

  constructor(readonly maxAgeMs: number) {}

  /**
   * Cached value for `key`, loading it when missing, stale or forced.
   * A failed load leaves the previous entry untouched.
   */
  get<E>(
    key: K,
    load: () => Promise<Result<V, E>>,
    options: CacheOptions = {},
  ): Promise<Result<V, E>> {
    return this.lock.run(async () => {
      const cached = this.peek(key);
      if (cached !== undefined && !options.force) {
        return ok(cached);
      }

      const result = await load();
      if (result.isOk()) {
        this.set(key, result.value);
      }
      return result;
    });
  }

  /**
   * Fresh value for `key`, if any.
   */
  peek(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry || Date.now() - entry.storedAt >= this.maxAgeMs) {
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.set(key, { value, storedAt: Date.now() });
  }

  invalidate(key: K): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
