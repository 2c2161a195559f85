/**
 * Interaction Module - Press Primitives
 *
 * Long-press detection and multi-state toggles, as base classes for
 * widgets.
 */
import {
  BaseApplication,
  type KeySpec,
  type NavigationOutcome,
  handled,
} from "../app/index.js";
import { config } from "../config.js";
import type { Context } from "../context/index.js";
import type { KeyId } from "../device/index.js";
import type { Icon } from "../icon/index.js";

// =============================================================================
// Long press
// =============================================================================

/**
 * Distinguishes short from long presses.
 *
 * Press: onShortPress immediately, then onLongPress once the delay has
 * passed unless the key was released or pressed again meanwhile.
 * Release: onLongRelease if held for at least the delay, otherwise
 * onShortRelease.
 */
export abstract class LongPressKey extends BaseApplication {
  private pressedAt: number | null = null;
  private pressGeneration = 0;

  constructor(
    keys: KeySpec,
    readonly longPressDelayMs: number = config.LONG_PRESS_DELAY_MS,
  ) {
    super(keys);
  }

  override async onPress(ctx: Context, key: KeyId): Promise<void> {
    this.pressGeneration += 1;
    const generation = this.pressGeneration;
    this.pressedAt = Date.now();

    await this.onShortPress(ctx, key);
    await ctx.sleep(this.longPressDelayMs / 1000);

    if (generation === this.pressGeneration) {
      await this.onLongPress(ctx, key);
    }
  }

  override async onRelease(ctx: Context, key: KeyId): Promise<NavigationOutcome> {
    const pressedAt = this.pressedAt;
    this.pressedAt = null;
    this.pressGeneration += 1;

    // A release with no recorded press counts as short
    const held = pressedAt !== null && Date.now() - pressedAt >= this.longPressDelayMs;
    if (held) {
      await this.onLongRelease(ctx, key);
    } else {
      await this.onShortRelease(ctx, key);
    }
    return handled();
  }

  /**
   * A hidden key never sees the release of a press in progress, so the
   * pending long press is dropped.
   */
  override async onHide(_ctx: Context): Promise<void> {
    this.pressedAt = null;
    this.pressGeneration += 1;
  }

  protected async onShortPress(_ctx: Context, _key: KeyId): Promise<void> {}

  protected async onLongPress(_ctx: Context, _key: KeyId): Promise<void> {}

  protected async onShortRelease(_ctx: Context, _key: KeyId): Promise<void> {}

  protected async onLongRelease(_ctx: Context, _key: KeyId): Promise<void> {}
}

// =============================================================================
// Toggle
// =============================================================================

export type SwitchHandler = (ctx: Context, key: KeyId, state: number) => Promise<void>;

export type ToggleOptions = Readonly<{
  onSwitch?: SwitchHandler;
}>;

/**
 * Cycles through a fixed list of icons, one step per press.
 */
export class ToggleKey extends BaseApplication {
  private current = 0;
  private readonly onSwitch: SwitchHandler | undefined;

  constructor(
    keys: KeySpec,
    readonly icons: readonly [Icon, ...Icon[]],
    options: ToggleOptions = {},
  ) {
    super(keys);
    this.onSwitch = options.onSwitch;
  }

  get state(): number {
    return this.current;
  }

  draw(ctx: Context): void {
    ctx.setImage(this.keys, this.icons[this.current] ?? this.icons[0]);
  }

  override async onDisplay(ctx: Context): Promise<void> {
    this.draw(ctx);
  }

  override async onPress(ctx: Context, key: KeyId): Promise<void> {
    this.current = (this.current + 1) % this.icons.length;
    const state = this.current;
    this.draw(ctx);
    await this.onSwitch?.(ctx, key, state);
  }
}
