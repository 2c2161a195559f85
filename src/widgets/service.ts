/**
 * Widgets Module - Stateful Keys
 *
 * Self-contained widgets built on the interaction primitives. Periodic
 * redraws run on the context's runner and end when the widget is hidden.
 */
import {
  BaseApplication,
  type NavigationOutcome,
  type KeySpec,
  handled,
} from "../app/index.js";
import type { Context } from "../context/index.js";
import type { KeyId } from "../device/index.js";
import { BLACK, GREY, type Rgb, WHITE, textIcon } from "../icon/index.js";
import { LongPressKey, ToggleKey, Visibility } from "../interaction/index.js";
import { blinkColor, formatClock, formatElapsed, splitMinutes } from "./transform.js";

const RED: Rgb = [255, 0, 0];

// =============================================================================
// CounterKey
// =============================================================================

export type CounterOptions = Readonly<{
  bg?: Rgb;
  fg?: Rgb;
  size?: number;
  longPressDelayMs?: number;
  /** Called after a press changed the count. */
  onChange?: (ctx: Context, count: number) => void;
}>;

/**
 * Short press counts up, long press resets to zero. The key is drawn grey
 * while held and not at all while hidden.
 */
export class CounterKey extends LongPressKey {
  private readonly visibility = new Visibility();
  private value = 0;
  private pressing = false;
  private readonly bg: Rgb;
  private readonly fg: Rgb;
  private readonly size: number;
  private readonly onChange: ((ctx: Context, count: number) => void) | undefined;

  constructor(keys: KeySpec, options: CounterOptions = {}) {
    super(keys, options.longPressDelayMs);
    this.bg = options.bg ?? BLACK;
    this.fg = options.fg ?? WHITE;
    this.size = options.size ?? 24;
    this.onChange = options.onChange;
  }

  get count(): number {
    return this.value;
  }

  set count(value: number) {
    this.value = value;
  }

  draw(ctx: Context): void {
    if (!this.visibility.isShown) {
      return;
    }
    ctx.setImage(
      this.keys,
      textIcon({
        text: String(this.value),
        bg: this.pressing ? GREY : this.bg,
        fg: this.fg,
        size: this.size,
      }),
    );
  }

  override async onDisplay(ctx: Context): Promise<void> {
    this.visibility.show();
    this.draw(ctx);
  }

  override async onHide(ctx: Context): Promise<void> {
    await super.onHide(ctx);
    this.visibility.hide();
    this.pressing = false;
  }

  override async onRelease(ctx: Context, key: KeyId): Promise<NavigationOutcome> {
    const outcome = await super.onRelease(ctx, key);
    this.pressing = false;
    this.draw(ctx);
    return outcome;
  }

  protected override async onShortPress(ctx: Context): Promise<void> {
    this.pressing = true;
    this.value += 1;
    this.onChange?.(ctx, this.value);
    this.draw(ctx);
  }

  protected override async onLongPress(ctx: Context): Promise<void> {
    this.value = 0;
    this.onChange?.(ctx, this.value);
    this.draw(ctx);
  }
}

// =============================================================================
// ClockKey
// =============================================================================

export type ClockOptions = Readonly<{
  format?: string;
  size?: number;
}>;

/**
 * Current local time, redrawn once a second while shown.
 */
export class ClockKey extends BaseApplication {
  readonly format: string;
  private readonly size: number;
  private readonly visibility = new Visibility();
  private lastText = "";

  constructor(keys: KeySpec, options: ClockOptions = {}) {
    super(keys);
    this.format = options.format ?? "%H:%M:%S";
    this.size = options.size ?? 16;
  }

  draw(ctx: Context, force = false): void {
    const text = formatClock(new Date(), this.format);
    if (text !== this.lastText || force) {
      ctx.setImage(this.keys, textIcon({ text, size: this.size }));
      this.lastText = text;
    }
  }

  override async onDisplay(ctx: Context): Promise<void> {
    const token = this.visibility.show();
    this.draw(ctx, true);

    ctx.now(async () => {
      while (this.visibility.isCurrent(token)) {
        this.draw(ctx);
        await ctx.sleep(1);
      }
    });
  }

  override async onHide(_ctx: Context): Promise<void> {
    this.visibility.hide();
  }
}

// =============================================================================
// StopWatchKey
// =============================================================================

/**
 * Press to start, press again to stop. Shows elapsed H:MM:SS, inverted
 * while running. Hiding the key stops it.
 */
export class StopWatchKey extends BaseApplication {
  private readonly shown = new Visibility();
  private readonly run = new Visibility();
  private startedAt: number | null = null;
  private stoppedAt: number | null = null;
  private pressed = false;

  get running(): boolean {
    return this.run.isShown;
  }

  /** Elapsed whole seconds of the current or last run. */
  get elapsedSeconds(): number {
    if (this.startedAt === null) {
      return 0;
    }
    return Math.floor(((this.stoppedAt ?? Date.now()) - this.startedAt) / 1000);
  }

  draw(ctx: Context): void {
    if (!this.shown.isShown) {
      return;
    }
    let bg = BLACK;
    let fg = WHITE;
    if (this.pressed) {
      bg = GREY;
    } else if (this.running) {
      [bg, fg] = [fg, bg];
    }
    ctx.setImage(this.keys, textIcon({ bg, fg, text: formatElapsed(this.elapsedSeconds) }));
  }

  override async onDisplay(ctx: Context): Promise<void> {
    this.shown.show();
    this.draw(ctx);
  }

  override async onHide(_ctx: Context): Promise<void> {
    this.stop();
    this.shown.hide();
    // The release of a held key goes to whatever page is shown next
    this.pressed = false;
  }

  override async onPress(ctx: Context, _key: KeyId): Promise<void> {
    this.pressed = true;

    if (this.running) {
      this.stop();
    } else {
      this.startedAt = Date.now();
      this.stoppedAt = null;
      const token = this.run.show();

      ctx.now(async () => {
        while (this.run.isCurrent(token)) {
          this.draw(ctx);
          await ctx.sleep(1);
        }
      });
    }

    this.draw(ctx);
  }

  override async onRelease(ctx: Context, _key: KeyId): Promise<NavigationOutcome> {
    this.pressed = false;
    this.draw(ctx);
    return handled();
  }

  private stop(): void {
    if (this.running) {
      this.stoppedAt = Date.now();
    }
    this.run.hide();
  }
}

// =============================================================================
// KitchenTimerKey
// =============================================================================

export type KitchenTimerKeys = Readonly<{
  minute: KeyId;
  second: KeyId;
  startStop: KeyId;
}>;

/**
 * Countdown timer over three keys: minutes and seconds counters plus a
 * Start/Stop toggle. While running the counters show the time left; past
 * the end they blink red and count up.
 */
export class KitchenTimerKey extends BaseApplication {
  readonly minute: CounterKey;
  readonly second: CounterKey;
  readonly startStop: ToggleKey;

  private readonly shown = new Visibility();
  private readonly ticking = new Visibility();
  private running = false;
  private endAt = 0;

  constructor(keys: KitchenTimerKeys, options: Readonly<{ longPressDelayMs?: number }> = {}) {
    super([keys.minute, keys.second, keys.startStop]);

    this.minute = new CounterKey(keys.minute, { size: 24, ...options });
    this.second = new CounterKey(keys.second, {
      size: 24,
      ...options,
      onChange: (ctx, count) => this.carrySeconds(ctx, count),
    });
    this.startStop = new ToggleKey(
      keys.startStop,
      [
        textIcon({ bg: BLACK, fg: WHITE, text: "Start" }),
        textIcon({ bg: RED, fg: WHITE, text: "Stop" }),
      ],
      { onSwitch: (ctx, _key, state) => this.onStartStop(ctx, state) },
    );
  }

  get isRunning(): boolean {
    return this.running;
  }

  override async onDisplay(ctx: Context): Promise<void> {
    this.shown.show();

    if (this.running) {
      await this.startStop.onDisplay(ctx);
      this.startTicking(ctx);
      return;
    }

    await Promise.all([
      this.minute.onDisplay(ctx),
      this.second.onDisplay(ctx),
      this.startStop.onDisplay(ctx),
    ]);
  }

  override async onHide(ctx: Context): Promise<void> {
    this.shown.hide();
    this.ticking.hide();

    await Promise.all([
      this.minute.onHide(ctx),
      this.second.onHide(ctx),
      this.startStop.onHide(ctx),
    ]);
  }

  override async onPress(ctx: Context, key: KeyId): Promise<void> {
    const target = this.childFor(key);
    if (target) {
      await target.onPress(ctx, key);
    }
  }

  override async onRelease(ctx: Context, key: KeyId): Promise<NavigationOutcome> {
    const target = this.childFor(key);
    return target ? target.onRelease(ctx, key) : handled();
  }

  /**
   * The child handling `key`; counters are locked while running.
   */
  private childFor(key: KeyId): CounterKey | ToggleKey | undefined {
    if (this.startStop.keys.has(key)) {
      return this.startStop;
    }
    if (this.running) {
      return undefined;
    }
    if (this.minute.keys.has(key)) {
      return this.minute;
    }
    if (this.second.keys.has(key)) {
      return this.second;
    }
    return undefined;
  }

  private carrySeconds(ctx: Context, count: number): void {
    if (count < 60) {
      return;
    }
    this.second.count = 0;
    this.minute.count += 1;
    this.minute.draw(ctx);
  }

  private async onStartStop(ctx: Context, state: number): Promise<void> {
    if (state === 0) {
      this.running = false;
      this.ticking.hide();
      await Promise.all([this.minute.onDisplay(ctx), this.second.onDisplay(ctx)]);
      return;
    }

    this.endAt = Date.now() + (this.minute.count * 60 + this.second.count) * 1000;
    this.running = true;
    if (this.shown.isShown) {
      this.startTicking(ctx);
    }
  }

  private startTicking(ctx: Context): void {
    const token = this.ticking.show();

    ctx.now(async () => {
      while (this.ticking.isCurrent(token)) {
        this.drawRemaining(ctx);
        await ctx.sleep(1);
      }
    });
  }

  private drawRemaining(ctx: Context): void {
    const now = Date.now();
    const overdue = now >= this.endAt;
    const { minutes, seconds } = splitMinutes(Math.abs(this.endAt - now) / 1000);
    const bg = overdue ? blinkColor(now / 1000) : BLACK;

    ctx.setImage(this.minute.keys, textIcon({ text: String(minutes), bg, size: 24 }));
    ctx.setImage(this.second.keys, textIcon({ text: String(seconds), bg, size: 24 }));
  }
}
