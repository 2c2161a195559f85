/**
 * Page layout for a 15-key (3 x 5) deck.
 *
 * The left and right columns carry page navigation; the page body sits in
 * the middle three columns. Pages whose bridge is not configured are left
 * out, together with their navigation keys.
 */
import type { Result } from "neverthrow";

import {
  type Application,
  Group,
  Pager,
  type PagerError,
  PagerKey,
  StaticKey,
} from "./app/index.js";
import type { KeyId } from "./device/index.js";
import { LightGroupKey, LightKey } from "./hue/index.js";
import type { HueClient } from "./hue/index.js";
import { type MarkerPosition, markerIcon, textIcon } from "./icon/index.js";
import {
  ACModeKeySet,
  ACPowerKey,
  ACTempKeySet,
  ACVolumeKey,
  RoomTempKey,
} from "./remo/index.js";
import type { NatureRemoClient } from "./remo/index.js";
import { ClockKey, CounterKey, KitchenTimerKey, StopWatchKey } from "./widgets/index.js";

export type PageName = "STBY" | "AC" | "LIGHT" | "DEMO";

export const HOME_PAGE: PageName = "STBY";

export type RemoTopology = Readonly<{
  client: NatureRemoClient;
  acApplianceId: string | undefined;
  roomDeviceId: string | undefined;
}>;

export type HueTopology = Readonly<{
  client: HueClient;
  lights: ReadonlyArray<Readonly<{ id: string; label: string }>>;
  groupId: string | undefined;
}>;

export type TopologyOptions = Readonly<{
  remo: RemoTopology | null;
  hue: HueTopology | null;
  longPressDelayMs?: number;
}>;

type NavSlot = Readonly<{ page: PageName; key: KeyId; position: MarkerPosition }>;

const NAV_SLOTS: readonly NavSlot[] = [
  { page: "AC", key: 0, position: "left" },
  { page: "LIGHT", key: 5, position: "left" },
  { page: "DEMO", key: 10, position: "left" },
  { page: "STBY", key: 14, position: "right" },
];

/** Body keys available to lights, in reading order. */
const LIGHT_SLOTS: readonly KeyId[] = [1, 2, 3, 6, 7, 8, 11, 13];
const LIGHT_GROUP_SLOT: KeyId = 12;

// =============================================================================
// Navigation
// =============================================================================

/**
 * Navigation column for `current`: a pager key per enabled page, and a
 * triangle marker on the slot of the page being shown.
 */
export function navigationKeys(
  current: PageName,
  enabled: ReadonlySet<PageName>,
): Application[] {
  return NAV_SLOTS.filter((slot) => enabled.has(slot.page)).map((slot) =>
    slot.page === current
      ? new StaticKey(
          slot.key,
          markerIcon({ text: slot.page, position: slot.position, shape: "triangle" }),
        )
      : new PagerKey(slot.key, slot.page, markerIcon({ text: slot.page, position: slot.position })),
  );
}

// =============================================================================
// Pages
// =============================================================================

function standbyBody(remo: RemoTopology | null): Application[] {
  const body: Application[] = [new ClockKey(7, { format: "%H:%M", size: 20 })];
  if (remo?.roomDeviceId) {
    body.push(new RoomTempKey(2, remo.client, remo.roomDeviceId));
  }
  return body;
}

function airconBody(client: NatureRemoClient, applianceId: string): Application[] {
  const mode = (key: KeyId, value: string, label: string) => ({
    key,
    mode: value,
    onIcon: markerIcon({ text: label, width: 16 }),
    offIcon: textIcon({ text: label }),
  });

  return [
    new ACModeKeySet(client, applianceId, [
      mode(1, "warm", "Warm"),
      mode(2, "cool", "Cool"),
      mode(6, "blow", "Fan"),
      mode(7, "dry", "Dry"),
    ]),
    new ACTempKeySet(client, applianceId, { up: 3, middle: 8, down: 13 }),
    new ACPowerKey(11, client, applianceId),
    new ACVolumeKey(12, client, applianceId),
  ];
}

function lightBody(hue: HueTopology): Application[] {
  const lights = hue.lights
    .slice(0, LIGHT_SLOTS.length)
    .flatMap((light, index) => {
      const key = LIGHT_SLOTS[index];
      return key === undefined ? [] : [new LightKey(key, hue.client, light.id, light.label)];
    });

  const body: Application[] = [...lights];
  if (hue.groupId) {
    body.push(new LightGroupKey(LIGHT_GROUP_SLOT, hue.client, hue.groupId, { members: lights }));
  }
  return body;
}

function demoBody(longPressDelayMs: number | undefined): Application[] {
  return [
    new CounterKey([1, 2], { longPressDelayMs }),
    new ClockKey(3),
    new StopWatchKey([6, 7]),
    new ClockKey(8, { format: "%Y-%m-%d", size: 12 }),
    new KitchenTimerKey({ minute: 11, second: 12, startStop: 13 }, { longPressDelayMs }),
  ];
}

// =============================================================================
// Topology
// =============================================================================

/**
 * Build the pager for the configured integrations, showing STBY first.
 */
export function buildTopology(options: TopologyOptions): Result<Pager, PagerError> {
  const bodies = new Map<PageName, Application[]>();

  bodies.set("STBY", standbyBody(options.remo));
  if (options.remo?.acApplianceId) {
    bodies.set("AC", airconBody(options.remo.client, options.remo.acApplianceId));
  }
  if (options.hue && options.hue.lights.length > 0) {
    bodies.set("LIGHT", lightBody(options.hue));
  }
  bodies.set("DEMO", demoBody(options.longPressDelayMs));

  const enabled = new Set(bodies.keys());
  const pages = [...bodies].map(
    ([name, body]) => [name, new Group([...body, ...navigationKeys(name, enabled)])] as const,
  );

  return Pager.create(pages, HOME_PAGE);
}
