/**
 * Typed configuration - all config lives in the environment, parsed with Zod
 * at startup. The process exits immediately on invalid config.
 *
 * Covers:
 * - Runtime settings (environment, log level)
 * - Deck settings (device index, brightness, key geometry, fonts)
 * - Interaction timing
 * - Climate bridge (Nature Remo cloud API)
 * - Lighting bridge (Hue local API)
 */
import { z } from "zod";

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

/**
 * Parse a `id:label,id:label` list. Entries without a label reuse the id.
 */
const lightList = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? "")
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry !== "")
      .map((entry) => {
        const [id = "", label] = entry.split(":");
        return { id: id.trim(), label: (label ?? id).trim() };
      }),
  );

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("deckpilot").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Deck
  // ==========================================================================
  DECK_INDEX: z.coerce
    .number()
    .int()
    .min(0)
    .default(0)
    .describe("Index of the device to open among enumerated decks"),
  DECK_BRIGHTNESS: z.coerce
    .number()
    .int()
    .min(0)
    .max(100)
    .default(30)
    .describe("Initial panel brightness (percent)"),
  KEY_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(72)
    .describe("Logical key size in pixels used by icon geometry"),
  FONT_FAMILY: z
    .string()
    .default("Noto Sans CJK JP, Noto Sans, sans-serif")
    .describe("Default font family for key labels"),
  LONG_PRESS_DELAY_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(500)
    .describe("Hold duration that turns a press into a long press (ms)"),
  HTTP_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000)
    .describe("HTTP timeout for bridge requests (ms)"),

  // ==========================================================================
  // Climate Bridge (Nature Remo)
  // ==========================================================================
  NATURE_REMO_TOKEN: optionalString.describe("Nature Remo API access token"),
  NATURE_REMO_BASE_URL: z
    .string()
    .url()
    .default("https://api.nature.global")
    .describe("Nature Remo cloud API base URL"),
  REMO_CACHE_MAX_AGE_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(60_000)
    .describe("Age after which cached bridge state is refreshed (ms)"),
  REMO_AC_APPLIANCE_ID: optionalString.describe("Air conditioner appliance id"),
  REMO_ROOM_DEVICE_ID: optionalString.describe(
    "Remo device id reporting room temperature",
  ),

  // ==========================================================================
  // Lighting Bridge (Hue)
  // ==========================================================================
  HUE_BRIDGE_ADDRESS: optionalString.describe(
    "Hue bridge address (discovered when empty)",
  ),
  HUE_USERNAME: optionalString.describe("Hue bridge application username"),
  HUE_LIGHTS: lightList.describe("Lights shown on the LIGHT page (id:label,...)"),
  HUE_GROUP_ID: optionalString.describe("Hue group toggled by the All key"),
  HUE_CACHE_MAX_AGE_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000)
    .describe("Age after which cached light state is refreshed (ms)"),
});

// Parse at startup - exits immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Climate bridge configuration.
 * Returns null if no API token is configured.
 */
export function getRemoConfig(): Readonly<{
  token: string;
  baseUrl: string;
  cacheMaxAgeMs: number;
  timeoutMs: number;
  acApplianceId: string | undefined;
  roomDeviceId: string | undefined;
}> | null {
  if (!config.NATURE_REMO_TOKEN) {
    return null;
  }

  return {
    token: config.NATURE_REMO_TOKEN,
    baseUrl: config.NATURE_REMO_BASE_URL,
    cacheMaxAgeMs: config.REMO_CACHE_MAX_AGE_MS,
    timeoutMs: config.HTTP_TIMEOUT_MS,
    acApplianceId: config.REMO_AC_APPLIANCE_ID,
    roomDeviceId: config.REMO_ROOM_DEVICE_ID,
  };
}

/**
 * Lighting bridge configuration.
 * Returns null if no bridge username is configured.
 */
export function getHueConfig(): Readonly<{
  bridgeAddress: string | undefined;
  username: string;
  lights: ReadonlyArray<{ id: string; label: string }>;
  groupId: string | undefined;
  cacheMaxAgeMs: number;
  timeoutMs: number;
}> | null {
  if (!config.HUE_USERNAME) {
    return null;
  }

  return {
    bridgeAddress: config.HUE_BRIDGE_ADDRESS,
    username: config.HUE_USERNAME,
    lights: config.HUE_LIGHTS,
    groupId: config.HUE_GROUP_ID,
    cacheMaxAgeMs: config.HUE_CACHE_MAX_AGE_MS,
    timeoutMs: config.HTTP_TIMEOUT_MS,
  };
}
