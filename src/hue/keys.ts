/**
 * Hue Module - Keys
 */
import { BaseApplication, type KeySpec } from "../app/index.js";
import type { Context } from "../context/index.js";
import type { KeyId } from "../device/index.js";
import { BLACK, GREY, type Rgb, WHITE, textIcon } from "../icon/index.js";
import { Visibility } from "../interaction/index.js";
import { createLogger } from "../logger.js";
import { formatHueError } from "./errors.js";
import type { HueClient } from "./service.js";

const log = createLogger("hue");

const LIT: Rgb = [255, 190, 90];

function switchIcon(label: string, on: boolean | null) {
  if (on === null) {
    return textIcon({ text: label, bg: GREY, fg: WHITE });
  }
  return on ? textIcon({ text: label, bg: LIT, fg: BLACK }) : textIcon({ text: label });
}

/**
 * Switches one light. Lit while the light is on, grey when it is
 * unreachable or the bridge cannot be read.
 */
export class LightKey extends BaseApplication {
  private readonly visibility = new Visibility();

  constructor(
    keys: KeySpec,
    private readonly client: HueClient,
    readonly lightId: string,
    readonly label: string,
  ) {
    super(keys);
  }

  /**
   * Reload the light and redraw, if shown.
   */
  async refresh(ctx: Context, force = true): Promise<void> {
    const result = await this.client.getLight(this.lightId, { force });
    if (result.isErr()) {
      log.warn({ lightId: this.lightId }, formatHueError(result.error));
    }

    const on = result.isOk() && result.value.reachable ? result.value.on : null;
    if (this.visibility.isShown) {
      ctx.setImage(this.keys, switchIcon(this.label, on));
    }
  }

  override async onDisplay(ctx: Context): Promise<void> {
    this.visibility.show();
    await this.refresh(ctx);
  }

  override async onHide(_ctx: Context): Promise<void> {
    this.visibility.hide();
  }

  override async onPress(ctx: Context, _key: KeyId): Promise<void> {
    const light = await this.client.getLight(this.lightId);
    if (light.isErr() || !light.value.reachable) {
      return;
    }

    const result = await this.client.setLightOn(this.lightId, !light.value.on);
    if (result.isErr()) {
      log.error({ lightId: this.lightId }, formatHueError(result.error));
    }
    await this.refresh(ctx, false);
  }
}

export type LightGroupOptions = Readonly<{
  label?: string;
  /** Light keys redrawn after the group is switched. */
  members?: readonly LightKey[];
}>;

/**
 * Switches a whole group: off if any light is on, on otherwise.
 */
export class LightGroupKey extends BaseApplication {
  private readonly visibility = new Visibility();
  private readonly label: string;
  private readonly members: readonly LightKey[];

  constructor(
    keys: KeySpec,
    private readonly client: HueClient,
    readonly groupId: string,
    options: LightGroupOptions = {},
  ) {
    super(keys);
    this.label = options.label ?? "All";
    this.members = options.members ?? [];
  }

  async refresh(ctx: Context, force = true): Promise<void> {
    const result = await this.client.getGroup(this.groupId, { force });
    if (result.isErr()) {
      log.warn({ groupId: this.groupId }, formatHueError(result.error));
    }

    if (this.visibility.isShown) {
      ctx.setImage(this.keys, switchIcon(this.label, result.isOk() ? result.value.anyOn : null));
    }
  }

  override async onDisplay(ctx: Context): Promise<void> {
    this.visibility.show();
    await this.refresh(ctx);
  }

  override async onHide(_ctx: Context): Promise<void> {
    this.visibility.hide();
  }

  override async onPress(ctx: Context, _key: KeyId): Promise<void> {
    const group = await this.client.getGroup(this.groupId);
    if (group.isErr()) {
      return;
    }

    const result = await this.client.setGroupOn(this.groupId, !group.value.anyOn);
    if (result.isErr()) {
      log.error({ groupId: this.groupId }, formatHueError(result.error));
    }

    await this.refresh(ctx, false);
    await Promise.all(this.members.map((member) => member.refresh(ctx)));
  }
}
