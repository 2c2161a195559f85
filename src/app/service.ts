/**
 * App Module - Leaves and Groups
 */
import type { Context } from "../context/index.js";
import type { KeyId } from "../device/index.js";
import { type Icon, textIcon } from "../icon/index.js";
import type { Application, KeySpec, NavigationOutcome } from "./schema.js";
import { findOwner, handled, switchTo, toKeySet, unionKeys } from "./transform.js";

// =============================================================================
// Base
// =============================================================================

/**
 * Application with every capability a no-op. Subclasses override what
 * they need.
 */
export abstract class BaseApplication implements Application {
  readonly keys: ReadonlySet<KeyId>;

  constructor(keys: KeySpec) {
    this.keys = toKeySet(keys);
  }

  async onDisplay(_ctx: Context): Promise<void> {}

  async onHide(_ctx: Context): Promise<void> {}

  async onPress(_ctx: Context, _key: KeyId): Promise<void> {}

  async onRelease(_ctx: Context, _key: KeyId): Promise<NavigationOutcome> {
    return handled();
  }
}

// =============================================================================
// Leaves
// =============================================================================

/**
 * Draws a fixed icon on its keys.
 */
export class StaticKey extends BaseApplication {
  constructor(
    keys: KeySpec,
    readonly icon: Icon,
  ) {
    super(keys);
  }

  override async onDisplay(ctx: Context): Promise<void> {
    ctx.setImage(this.keys, this.icon);
  }
}

/**
 * Navigation leaf: every release requests a switch to `page`.
 */
export class PagerKey extends BaseApplication {
  readonly icon: Icon;

  constructor(
    keys: KeySpec,
    readonly page: string,
    icon?: Icon,
  ) {
    super(keys);
    this.icon = icon ?? textIcon({ text: page });
  }

  override async onDisplay(ctx: Context): Promise<void> {
    ctx.setImage(this.keys, this.icon);
  }

  override async onRelease(_ctx: Context, _key: KeyId): Promise<NavigationOutcome> {
    return switchTo(this.page);
  }
}

// =============================================================================
// Group
// =============================================================================

/**
 * Run `call` on every child concurrently. All calls settle before the
 * first failure, if any, is rethrown.
 */
async function fanOut(
  children: readonly Application[],
  call: (child: Application) => Promise<void>,
): Promise<void> {
  const results = await Promise.allSettled(children.map(async (child) => call(child)));
  const failure = results.find(
    (result): result is PromiseRejectedResult => result.status === "rejected",
  );
  if (failure) {
    throw failure.reason;
  }
}

/**
 * Union of child applications with disjoint key sets. Press and release
 * go to the first child owning the key.
 */
export class Group implements Application {
  readonly keys: ReadonlySet<KeyId>;

  constructor(readonly children: readonly Application[]) {
    this.keys = unionKeys(children);
  }

  async onDisplay(ctx: Context): Promise<void> {
    await fanOut(this.children, (child) => child.onDisplay(ctx));
  }

  async onHide(ctx: Context): Promise<void> {
    await fanOut(this.children, (child) => child.onHide(ctx));
  }

  async onPress(ctx: Context, key: KeyId): Promise<void> {
    await findOwner(this.children, key)?.onPress(ctx, key);
  }

  async onRelease(ctx: Context, key: KeyId): Promise<NavigationOutcome> {
    const owner = findOwner(this.children, key);
    return owner ? owner.onRelease(ctx, key) : handled();
  }
}
