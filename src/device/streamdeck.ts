/**
 * Device Module - Stream Deck Driver
 *
 * Adapts @elgato-stream-deck/node (USB HID) to the DeckDriver contract.
 */
import {
  type StreamDeck,
  listStreamDecks,
  openStreamDeck,
} from "@elgato-stream-deck/node";

import { createLogger } from "../logger.js";
import type {
  DeckDriver,
  DeckDriverHandle,
  DeckDriverManager,
  KeyHandler,
  KeyId,
  KeyLayout,
} from "./schema.js";

const log = createLogger("device");

class StreamDeckDriver implements DeckDriver {
  private callback: KeyHandler = () => {};

  constructor(private readonly deck: StreamDeck) {
    deck.on("down", (key: number) => this.callback(key, true));
    deck.on("up", (key: number) => this.callback(key, false));
    deck.on("error", (error: unknown) => {
      log.error({ error }, "Stream Deck reported an error");
    });
  }

  keyCount(): number {
    return this.deck.NUM_KEYS;
  }

  keyLayout(): KeyLayout {
    const columns = this.deck.KEY_COLUMNS;
    return { rows: Math.ceil(this.deck.NUM_KEYS / columns), columns };
  }

  iconSize(): number {
    return this.deck.ICON_SIZE;
  }

  setBrightness(percent: number): Promise<void> {
    return this.deck.setBrightness(percent);
  }

  setKeyImage(key: KeyId, rgb: Buffer): Promise<void> {
    return this.deck.fillKeyBuffer(key, rgb, { format: "rgb" });
  }

  reset(): Promise<void> {
    return this.deck.clearPanel();
  }

  close(): Promise<void> {
    return this.deck.close();
  }

  setKeyCallback(callback: KeyHandler): void {
    this.callback = callback;
  }
}

/**
 * Enumerates Stream Decks attached over USB.
 */
export const streamDeckManager: DeckDriverManager = {
  async enumerate(): Promise<readonly DeckDriverHandle[]> {
    const devices = await listStreamDecks();

    return devices.map((info) => ({
      path: info.path,
      open: async () => new StreamDeckDriver(await openStreamDeck(info.path)),
    }));
  },
};
