/**
 * Device Module - Service Layer
 *
 * Owns the driver handle. Image pushes are queued on one ordered write
 * chain so callers never wait on USB transfers and writes to a key land
 * in the order they were requested.
 */
import { type Result, err, ok } from "neverthrow";

import { type Icon, rasterizeIcon } from "../icon/index.js";
import { createLogger } from "../logger.js";
import type { DeckError } from "./errors.js";
import { deviceNotFound, driverFailed, formatDeckError } from "./errors.js";
import type {
  DeckDriver,
  DeckDriverManager,
  KeyHandler,
  KeyId,
  KeyLayout,
  Rasterizer,
} from "./schema.js";

const log = createLogger("device");

export type DeviceOptions = Readonly<{
  rasterize?: Rasterizer;
}>;

export class Device {
  private keyHandler: KeyHandler = () => {};
  private writes: Promise<void> = Promise.resolve();
  private readonly rasterize: Rasterizer;

  private constructor(
    private readonly driver: DeckDriver,
    options: DeviceOptions,
  ) {
    this.rasterize = options.rasterize ?? rasterizeIcon;
    driver.setKeyCallback((key, pressed) => this.dispatchKey(key, pressed));
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Open and reset the device at `index` among the enumerated devices.
   */
  static async open(
    index: number,
    manager: DeckDriverManager,
    options: DeviceOptions = {},
  ): Promise<Result<Device, DeckError>> {
    try {
      const handles = await manager.enumerate();
      const handle = handles[index];

      if (!handle) {
        return err(deviceNotFound(index, handles.length));
      }

      const driver = await handle.open();
      await driver.reset();

      const device = new Device(driver, options);
      log.info(
        { index, path: handle.path, keyCount: device.keyCount(), layout: device.keyLayout() },
        "Device opened",
      );
      return ok(device);
    } catch (error) {
      return err(driverFailed("open", error));
    }
  }

  /**
   * Wrap an already opened driver.
   */
  static attach(driver: DeckDriver, options: DeviceOptions = {}): Device {
    return new Device(driver, options);
  }

  /**
   * Wait for queued writes, blank the panel and release the driver.
   */
  async close(): Promise<Result<void, DeckError>> {
    await this.flush();

    try {
      await this.driver.reset();
      await this.driver.close();
      log.info("Device closed");
      return ok(undefined);
    } catch (error) {
      return err(driverFailed("close", error));
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  keyCount(): number {
    return this.driver.keyCount();
  }

  keyLayout(): KeyLayout {
    return this.driver.keyLayout();
  }

  // ===========================================================================
  // Output
  // ===========================================================================

  /**
   * Set panel brightness, clamped to 0-100 percent.
   */
  async setBrightness(percent: number): Promise<Result<void, DeckError>> {
    const clamped = Math.round(Math.min(100, Math.max(0, percent)));

    try {
      await this.driver.setBrightness(clamped);
      return ok(undefined);
    } catch (error) {
      return err(driverFailed("setBrightness", error));
    }
  }

  /**
   * Queue an icon for one key or every key in a set.
   *
   * Ids outside `[0, keyCount)` are ignored.
   */
  setImage(keys: KeyId | Iterable<KeyId>, icon: Icon): void {
    const count = this.keyCount();
    const targets = [...(typeof keys === "number" ? [keys] : keys)].filter(
      (key) => Number.isInteger(key) && key >= 0 && key < count,
    );

    if (targets.length === 0) {
      return;
    }

    this.writes = this.writes
      .then(async () => {
        const rgb = await this.rasterize(icon, this.driver.iconSize());
        for (const key of targets) {
          await this.driver.setKeyImage(key, rgb);
        }
      })
      .catch((error: unknown) => {
        log.error(
          { keys: targets, error: formatDeckError(driverFailed("setKeyImage", error)) },
          "Key image write failed",
        );
      });
  }

  /**
   * Resolve once every write queued so far has reached the driver.
   */
  flush(): Promise<void> {
    return this.writes;
  }

  // ===========================================================================
  // Input
  // ===========================================================================

  /**
   * Install the single key handler, replacing any previous one.
   */
  setKeyHandler(handler: KeyHandler): void {
    this.keyHandler = handler;
  }

  private dispatchKey(key: KeyId, pressed: boolean): void {
    try {
      this.keyHandler(key, pressed);
    } catch (error) {
      log.error({ key, pressed, error }, "Key handler threw");
    }
  }
}
