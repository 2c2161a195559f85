/**
 * In-process stand-in for a physical deck.
 *
 * Icons are "rasterised" to their JSON encoding so tests can read back
 * exactly which icon reached each key.
 */
import type { Icon } from "../../icon/index.js";
import type { DeckDriver, KeyHandler, KeyId, KeyLayout, Rasterizer } from "../schema.js";
import { Device } from "../service.js";

export type KeyWrite = Readonly<{ key: KeyId; icon: Icon }>;

export const jsonRasterize: Rasterizer = async (icon) =>
  Buffer.from(JSON.stringify(icon));

export class FakeDriver implements DeckDriver {
  readonly writes: KeyWrite[] = [];
  brightness = -1;
  resets = 0;
  closed = false;
  private callback: KeyHandler = () => {};

  constructor(
    private readonly count = 15,
    private readonly layout: KeyLayout = { rows: 3, columns: 5 },
  ) {}

  keyCount(): number {
    return this.count;
  }

  keyLayout(): KeyLayout {
    return this.layout;
  }

  iconSize(): number {
    return 72;
  }

  async setBrightness(percent: number): Promise<void> {
    this.brightness = percent;
  }

  async setKeyImage(key: KeyId, rgb: Buffer): Promise<void> {
    const icon: Icon = JSON.parse(rgb.toString("utf8"));
    this.writes.push({ key, icon });
  }

  async reset(): Promise<void> {
    this.resets += 1;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  setKeyCallback(callback: KeyHandler): void {
    this.callback = callback;
  }

  // ===========================================================================
  // Test controls
  // ===========================================================================

  press(key: KeyId): void {
    this.callback(key, true);
  }

  release(key: KeyId): void {
    this.callback(key, false);
  }

  writesTo(key: KeyId): Icon[] {
    return this.writes.filter((write) => write.key === key).map((write) => write.icon);
  }

  lastIcon(key: KeyId): Icon | undefined {
    return this.writesTo(key).at(-1);
  }

  clearWrites(): void {
    this.writes.length = 0;
  }
}

/**
 * A Device wired to a fresh FakeDriver.
 */
export function createFakeDevice(count = 15): { device: Device; driver: FakeDriver } {
  const driver = new FakeDriver(count);
  const device = Device.attach(driver, { rasterize: jsonRasterize });
  return { device, driver };
}
