/**
 * Device Module - Schemas and Types
 *
 * The driver contract the runtime depends on. Any transport (USB HID,
 * a simulator, an in-process fake) can stand behind it.
 */
import type { Icon } from "../icon/index.js";

/** Physical key identifier, stable for the device lifetime. */
export type KeyId = number;

/** Grid shape of the device. */
export type KeyLayout = Readonly<{
  rows: number;
  columns: number;
}>;

/**
 * Invoked on every physical press (`pressed = true`) and release edge.
 * Runs on the driver's event path, never inside an application task.
 */
export type KeyHandler = (key: KeyId, pressed: boolean) => void;

/**
 * Low-level device driver.
 */
export interface DeckDriver {
  keyCount(): number;
  keyLayout(): KeyLayout;
  /** Native key image size in pixels (square). */
  iconSize(): number;
  setBrightness(percent: number): Promise<void>;
  /** Push a raw RGB buffer of `iconSize()² × 3` bytes to one key. */
  setKeyImage(key: KeyId, rgb: Buffer): Promise<void>;
  reset(): Promise<void>;
  close(): Promise<void>;
  setKeyCallback(callback: KeyHandler): void;
}

/**
 * One enumerated device, not yet opened.
 */
export type DeckDriverHandle = Readonly<{
  path: string;
  open(): Promise<DeckDriver>;
}>;

/**
 * Enumerates attached devices.
 */
export interface DeckDriverManager {
  enumerate(): Promise<readonly DeckDriverHandle[]>;
}

/**
 * Converts an icon into the native buffer pushed to the driver.
 */
export type Rasterizer = (icon: Icon, size: number) => Promise<Buffer>;
