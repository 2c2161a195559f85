/**
 * deckpilot - Application Entry Point
 *
 * Opens the configured deck, builds the pages for the configured bridges
 * and runs them until SIGINT or SIGTERM.
 */
import { formatPagerError } from "./app/index.js";
import { config, getHueConfig, getRemoConfig } from "./config.js";
import { DeckContext } from "./context/index.js";
import { Device, formatDeckError } from "./device/index.js";
import { streamDeckManager } from "./device/streamdeck.js";
import { HueClient } from "./hue/index.js";
import { createLogger } from "./logger.js";
import { NatureRemoClient } from "./remo/index.js";
import { buildTopology } from "./topology.js";

const log = createLogger("main");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  DECKPILOT");
console.log("========================================");
console.log("");

log.info(
  {
    env: config.NODE_ENV,
    deckIndex: config.DECK_INDEX,
    brightness: config.DECK_BRIGHTNESS,
    longPressDelayMs: config.LONG_PRESS_DELAY_MS,
  },
  "Configuration loaded",
);

const remoConfig = getRemoConfig();
if (remoConfig) {
  log.info(
    { acApplianceId: remoConfig.acApplianceId, roomDeviceId: remoConfig.roomDeviceId },
    "Climate bridge: ENABLED",
  );
} else {
  log.info("Climate bridge: DISABLED");
}

const hueConfig = getHueConfig();
if (hueConfig) {
  log.info(
    { bridge: hueConfig.bridgeAddress ?? "discover", lights: hueConfig.lights.length },
    "Lighting bridge: ENABLED",
  );
} else {
  log.info("Lighting bridge: DISABLED");
}

console.log("");

// =============================================================================
// DEVICE
// =============================================================================

const opened = await Device.open(config.DECK_INDEX, streamDeckManager);
if (opened.isErr()) {
  log.fatal(formatDeckError(opened.error));
  process.exit(1);
}
const device = opened.value;

const brightness = await device.setBrightness(config.DECK_BRIGHTNESS);
if (brightness.isErr()) {
  log.warn(formatDeckError(brightness.error));
}

// =============================================================================
// PAGES
// =============================================================================

const topology = buildTopology({
  remo: remoConfig && {
    client: new NatureRemoClient(remoConfig),
    acApplianceId: remoConfig.acApplianceId,
    roomDeviceId: remoConfig.roomDeviceId,
  },
  hue: hueConfig && {
    client: new HueClient(hueConfig),
    lights: hueConfig.lights,
    groupId: hueConfig.groupId,
  },
  longPressDelayMs: config.LONG_PRESS_DELAY_MS,
});

if (topology.isErr()) {
  log.fatal(formatPagerError(topology.error));
  await device.close();
  process.exit(1);
}

const ctx = new DeckContext(device);
await ctx.executeApplication(topology.value);

log.info(
  { pages: topology.value.pageNames, page: topology.value.currentName },
  `🚀 ${config.APP_NAME} running`,
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  ctx.stop();

  const closed = await device.close();
  if (closed.isErr()) {
    log.error(formatDeckError(closed.error));
  }

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string) => {
  shutdown(signal).catch((error: unknown) => {
    log.error({ error }, "Shutdown failed");
    process.exit(1);
  });
};

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

await ctx.runner.done();
