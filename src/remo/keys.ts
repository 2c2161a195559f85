/**
 * Remo Module - Keys
 *
 * Air conditioner, room temperature and infrared signal keys. Every key
 * reads through the shared client, so a page of AC keys costs one
 * request per cache period.
 */
import {
  BaseApplication,
  type KeySpec,
  type NavigationOutcome,
  handled,
} from "../app/index.js";
import type { Context } from "../context/index.js";
import type { KeyId } from "../device/index.js";
import {
  BLACK,
  BLANK_ICON,
  GREY,
  type Icon,
  WHITE,
  colorIcon,
  gaugeIcon,
  markerIcon,
  textIcon,
} from "../icon/index.js";
import { Visibility } from "../interaction/index.js";
import { createLogger } from "../logger.js";
import { formatRemoError } from "./errors.js";
import type { AcState } from "./schema.js";
import type { NatureRemoClient } from "./service.js";
import {
  formatPercent,
  formatTemperature,
  hasTemperatureControl,
  modeList,
  pressMode,
  stepIndex,
  temperatureLevel,
  temperatureList,
  volumeLevel,
  volumeList,
  withPower,
  withTemperature,
  withVolume,
} from "./transform.js";

const log = createLogger("remo");

/** Interval between steps while an adjust key is held. */
const HOLD_STEP_SECONDS = 0.5;

/** Quiet period after the last adjustment before it is sent. */
const COMMIT_DELAY_SECONDS = 1;

const ROOM_POLL_SECONDS = 60;

// =============================================================================
// AcKey
// =============================================================================

/**
 * Base for keys bound to one air conditioner. Shows `loadingIcon` until
 * the first state arrives and again while a change is being sent.
 */
export abstract class AcKey extends BaseApplication {
  protected readonly visibility = new Visibility();
  private sending = false;

  constructor(
    keys: KeySpec,
    protected readonly client: NatureRemoClient,
    protected readonly applianceId: string,
    protected readonly loadingIcon: Icon = BLANK_ICON,
  ) {
    super(keys);
  }

  get loading(): boolean {
    return this.sending;
  }

  /**
   * Draw every owned key from `state`, or a placeholder when it is null.
   */
  protected abstract render(ctx: Context, state: AcState | null): void;

  override async onDisplay(ctx: Context): Promise<void> {
    this.visibility.show();
    ctx.setImage(this.keys, this.loadingIcon);
    await this.draw(ctx);
  }

  override async onHide(_ctx: Context): Promise<void> {
    this.visibility.hide();
  }

  protected async getState(force = false): Promise<AcState | null> {
    const result = await this.client.getAcState(this.applianceId, { force });
    if (result.isErr()) {
      log.warn({ applianceId: this.applianceId }, formatRemoError(result.error));
      return null;
    }
    return result.value;
  }

  /**
   * Redraw from the cached state. Nothing is drawn once hidden, so a slow
   * response cannot paint over another page.
   */
  protected async draw(ctx: Context, force = false): Promise<void> {
    const state = await this.getState(force);
    if (this.visibility.isShown) {
      this.render(ctx, state);
    }
  }

  protected async setState(ctx: Context, state: AcState): Promise<void> {
    this.sending = true;
    await this.draw(ctx);

    const result = await this.client.setAcState(this.applianceId, state);
    this.sending = false;
    if (result.isErr()) {
      log.error({ applianceId: this.applianceId }, formatRemoError(result.error));
    }

    await this.draw(ctx, true);
  }
}

// =============================================================================
// Power
// =============================================================================

/**
 * Toggles the unit on and off, keeping its mode.
 */
export class ACPowerKey extends AcKey {
  constructor(
    keys: KeySpec,
    client: NatureRemoClient,
    applianceId: string,
    private readonly label = "AC",
  ) {
    super(keys, client, applianceId);
  }

  protected render(ctx: Context, state: AcState | null): void {
    if (!state) {
      ctx.setImage(this.keys, textIcon({ text: this.label, bg: GREY }));
      return;
    }
    const on = state.power && !this.loading;
    ctx.setImage(
      this.keys,
      on ? markerIcon({ text: this.label, width: 16 }) : textIcon({ text: this.label }),
    );
  }

  override async onPress(ctx: Context, _key: KeyId): Promise<void> {
    const state = await this.getState();
    if (state) {
      await this.setState(ctx, withPower(state, !state.power));
    }
  }
}

// =============================================================================
// Mode
// =============================================================================

export type ACModeSetting = Readonly<{
  key: KeyId;
  mode: string;
  onIcon?: Icon;
  offIcon?: Icon;
}>;

function modeIcon(setting: ACModeSetting, on: boolean): Icon {
  if (on) {
    return setting.onIcon ?? textIcon({ text: setting.mode, bg: WHITE, fg: BLACK });
  }
  return setting.offIcon ?? textIcon({ text: setting.mode, bg: BLACK, fg: WHITE });
}

/**
 * One key per operation mode. The key of the running mode is lit;
 * pressing it turns the unit off, pressing another switches mode.
 */
export class ACModeKeySet extends AcKey {
  constructor(
    client: NatureRemoClient,
    applianceId: string,
    readonly settings: readonly ACModeSetting[],
    loadingIcon: Icon = BLANK_ICON,
  ) {
    super(
      settings.map((setting) => setting.key),
      client,
      applianceId,
      loadingIcon,
    );
  }

  protected render(ctx: Context, state: AcState | null): void {
    for (const setting of this.settings) {
      const on =
        state !== null && !this.loading && state.power && state.mode === setting.mode;
      ctx.setImage(setting.key, modeIcon(setting, on));
    }
  }

  override async onPress(ctx: Context, key: KeyId): Promise<void> {
    const setting = this.settings.find((candidate) => candidate.key === key);
    if (!setting) {
      return;
    }

    const state = await this.getState();
    if (!state) {
      return;
    }
    if (!modeList(state).includes(setting.mode)) {
      log.warn({ applianceId: this.applianceId, mode: setting.mode }, "Mode not supported");
      return;
    }
    await this.setState(ctx, pressMode(state, setting.mode));
  }
}

// =============================================================================
// Temperature
// =============================================================================

export type ACTempKeys = Readonly<{
  up: KeyId;
  middle: KeyId;
  down: KeyId;
}>;

type Hold = { cancelled: boolean };

/**
 * Three-key temperature gauge. A press steps the target once, and again
 * every half second while held; the target is sent one second after the
 * last release.
 */
export class ACTempKeySet extends AcKey {
  private target: number | null = null;
  private hold: Hold = { cancelled: true };
  private adjusting: Promise<void> = Promise.resolve();
  private releaseGeneration = 0;

  constructor(
    client: NatureRemoClient,
    applianceId: string,
    readonly layout: ACTempKeys,
  ) {
    super([layout.up, layout.middle, layout.down], client, applianceId);
  }

  protected render(ctx: Context, state: AcState | null): void {
    const { up, middle, down } = this.layout;
    const temperatures = state ? temperatureList(state) : [];
    const temperature =
      this.target !== null ? (temperatures[this.target] ?? "") : (state?.temperature ?? "");
    const level =
      state && hasTemperatureControl(state) ? temperatureLevel(temperatures, temperature) : null;

    if (level === null) {
      ctx.setImage([up, down], colorIcon({ bg: GREY }));
      ctx.setImage(middle, textIcon({ bg: GREY, text: formatTemperature("--") }));
      return;
    }

    ctx.setImage(up, gaugeIcon({ text: "▲", value: level, nKeys: 3, keyOffset: 2 }));
    ctx.setImage(
      middle,
      gaugeIcon({ text: formatTemperature(temperature), value: level, nKeys: 3, keyOffset: 1 }),
    );
    ctx.setImage(down, gaugeIcon({ text: "▼", value: level, nKeys: 3, keyOffset: 0 }));
  }

  override async onPress(ctx: Context, key: KeyId): Promise<void> {
    const step = this.stepFor(key);
    if (step === null) {
      return;
    }

    this.hold.cancelled = true;
    const hold: Hold = { cancelled: false };
    this.hold = hold;
    this.releaseGeneration += 1;

    this.adjusting = this.adjust(ctx, step, hold);
    await this.adjusting;
  }

  private async adjust(ctx: Context, step: 1 | -1, hold: Hold): Promise<void> {
    const state = await this.getState();
    if (!state || !hasTemperatureControl(state)) {
      return;
    }

    const temperatures = temperatureList(state);
    let target = this.target ?? Math.max(temperatures.indexOf(state.temperature), 0);

    do {
      target = stepIndex(target, step, temperatures.length);
      this.target = target;
      await this.draw(ctx);
      if (!hold.cancelled) {
        await ctx.sleep(HOLD_STEP_SECONDS);
      }
    } while (!hold.cancelled);
  }

  override async onRelease(ctx: Context, key: KeyId): Promise<NavigationOutcome> {
    if (this.stepFor(key) === null) {
      return handled();
    }

    this.hold.cancelled = true;
    this.releaseGeneration += 1;
    const generation = this.releaseGeneration;

    await ctx.sleep(COMMIT_DELAY_SECONDS);
    // A press still waiting for the state sets its target once it arrives
    await this.adjusting;
    if (generation !== this.releaseGeneration || this.target === null) {
      return handled();
    }

    const target = this.target;
    this.target = null;

    const state = await this.getState();
    const temperature = state ? temperatureList(state)[target] : undefined;
    if (state && temperature !== undefined && temperature !== state.temperature) {
      await this.setState(ctx, withTemperature(state, temperature));
    } else {
      await this.draw(ctx);
    }
    return handled();
  }

  override async onHide(ctx: Context): Promise<void> {
    this.hold.cancelled = true;
    await super.onHide(ctx);
  }

  private stepFor(key: KeyId): 1 | -1 | null {
    if (key === this.layout.up) {
      return 1;
    }
    if (key === this.layout.down) {
      return -1;
    }
    return null;
  }
}

// =============================================================================
// Volume
// =============================================================================

/**
 * Cycles the fan volume on each press; sent one second after the last
 * press.
 */
export class ACVolumeKey extends AcKey {
  private target: number | null = null;
  private pressGeneration = 0;

  constructor(keys: KeySpec, client: NatureRemoClient, applianceId: string) {
    super(keys, client, applianceId);
  }

  protected render(ctx: Context, state: AcState | null): void {
    const volumes = state ? volumeList(state) : [];
    const volume =
      this.target !== null ? (volumes[this.target] ?? "") : (state?.volume ?? "");
    const level = volumeLevel(volumes, volume);

    if (volume === "auto" || level === null) {
      ctx.setImage(this.keys, textIcon({ text: volume === "" ? "--" : volume }));
      return;
    }
    ctx.setImage(this.keys, gaugeIcon({ text: formatPercent(level), value: level }));
  }

  override async onPress(ctx: Context, _key: KeyId): Promise<void> {
    this.pressGeneration += 1;
    const generation = this.pressGeneration;

    const state = await this.getState();
    const volumes = state ? volumeList(state) : [];
    if (!state || volumes.length === 0) {
      return;
    }

    const current = this.target ?? Math.max(volumes.indexOf(state.volume), 0);
    this.target = (current + 1) % volumes.length;
    await this.draw(ctx);

    await ctx.sleep(COMMIT_DELAY_SECONDS);
    if (generation !== this.pressGeneration || this.target === null) {
      return;
    }

    const volume = volumes[this.target];
    this.target = null;
    if (volume !== undefined && volume !== state.volume) {
      const latest = (await this.getState()) ?? state;
      await this.setState(ctx, withVolume(latest, volume));
    }
  }
}

// =============================================================================
// Room temperature
// =============================================================================

/**
 * Room temperature from a Remo sensor, refreshed every minute while
 * shown.
 */
export class RoomTempKey extends BaseApplication {
  private readonly visibility = new Visibility();

  constructor(
    keys: KeySpec,
    private readonly client: NatureRemoClient,
    readonly deviceId: string,
  ) {
    super(keys);
  }

  async draw(ctx: Context): Promise<void> {
    const result = await this.client.getRoomState(this.deviceId);
    if (result.isErr()) {
      log.warn({ deviceId: this.deviceId }, formatRemoError(result.error));
    }

    const text = result.isOk()
      ? formatTemperature(result.value.temperature)
      : formatTemperature("--");
    if (this.visibility.isShown) {
      ctx.setImage(this.keys, textIcon({ text }));
    }
  }

  override async onDisplay(ctx: Context): Promise<void> {
    const token = this.visibility.show();

    ctx.now(async () => {
      while (this.visibility.isCurrent(token)) {
        await this.draw(ctx);
        await ctx.sleep(ROOM_POLL_SECONDS);
      }
    });
  }

  override async onHide(_ctx: Context): Promise<void> {
    this.visibility.hide();
  }
}

// =============================================================================
// Signal
// =============================================================================

/**
 * Sends a learned infrared signal on press. A placeholder shows while the
 * signal is in flight.
 */
export class SignalKey extends BaseApplication {
  private readonly visibility = new Visibility();

  constructor(
    keys: KeySpec,
    private readonly client: NatureRemoClient,
    readonly signalId: string,
    readonly icon: Icon,
  ) {
    super(keys);
  }

  private draw(ctx: Context, icon: Icon): void {
    if (this.visibility.isShown) {
      ctx.setImage(this.keys, icon);
    }
  }

  override async onDisplay(ctx: Context): Promise<void> {
    this.visibility.show();
    this.draw(ctx, this.icon);
  }

  override async onHide(_ctx: Context): Promise<void> {
    this.visibility.hide();
  }

  override async onPress(ctx: Context, _key: KeyId): Promise<void> {
    this.draw(ctx, textIcon({ text: "…", bg: GREY }));
    const result = await this.client.sendSignal(this.signalId);
    if (result.isErr()) {
      log.error({ signalId: this.signalId }, formatRemoError(result.error));
    }
    this.draw(ctx, this.icon);
  }
}
