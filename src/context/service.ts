/**
 * Context Module - Service Layer
 *
 * Binds one Device to one TaskRunner and runs a root Application on them.
 * Key edges from the driver are handed to the runner and never call
 * application code directly.
 */
import type { Application } from "../app/index.js";
import type { Device, KeyId, KeyLayout } from "../device/index.js";
import type { Icon } from "../icon/index.js";
import { createLogger } from "../logger.js";
import { type Task, TaskRunner } from "../runner/index.js";
import type { Context } from "./schema.js";

const log = createLogger("context");

export class DeckContext implements Context {
  constructor(
    private readonly device: Device,
    readonly runner: TaskRunner = new TaskRunner(),
  ) {}

  // ===========================================================================
  // Context
  // ===========================================================================

  setImage(keys: KeyId | Iterable<KeyId>, icon: Icon): void {
    this.device.setImage(keys, icon);
  }

  now(task: Task): void {
    this.runner.now(task);
  }

  after(delaySeconds: number, task: Task): void {
    this.runner.after(delaySeconds, task);
  }

  at(epochSeconds: number, task: Task): void {
    this.runner.after(epochSeconds - Date.now() / 1000, task);
  }

  sleep(seconds: number): Promise<void> {
    return this.runner.sleep(seconds);
  }

  keyCount(): number {
    return this.device.keyCount();
  }

  keyLayout(): KeyLayout {
    return this.device.keyLayout();
  }

  // ===========================================================================
  // Application lifecycle
  // ===========================================================================

  /**
   * Display `app` and start delivering key events to it.
   *
   * The first frame is drawn before the runner starts, so no key event can
   * race it. Events arriving meanwhile wait in the runner's backlog.
   */
  async executeApplication(app: Application): Promise<void> {
    this.device.setKeyHandler((key, pressed) => {
      this.runner.now(() => this.dispatch(app, key, pressed));
    });

    try {
      await app.onDisplay(this);
    } catch (error) {
      log.error({ error }, "Initial display failed");
    }

    this.runner.start();
    log.info({ keys: app.keys.size }, "Application running");
  }

  /**
   * Stop delivering events and abandon all scheduled work.
   */
  stop(): void {
    this.device.setKeyHandler(() => {});
    this.runner.stop();
  }

  private async dispatch(app: Application, key: KeyId, pressed: boolean): Promise<void> {
    try {
      if (pressed) {
        await app.onPress(this, key);
        return;
      }

      const outcome = await app.onRelease(this, key);
      if (outcome.type === "SWITCH_TO") {
        log.error({ key, page: outcome.page }, "No pager handled page switch");
      }
    } catch (error) {
      log.error({ error, key, pressed }, "Key handler failed");
    }
  }
}
