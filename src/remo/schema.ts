/**
 * Remo Module - Schemas and Types
 *
 * Response shapes of the Nature Remo cloud API and the air conditioner
 * state derived from them. Schemas are the source of truth - types
 * derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// API Responses
// =============================================================================

const SensorEventSchema = z.object({
  val: z.number(),
  created_at: z.string().optional(),
});

/**
 * A Remo device with its latest sensor readings.
 */
export const RemoDeviceSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  newest_events: z
    .object({
      te: SensorEventSchema.optional(),
      hu: SensorEventSchema.optional(),
      il: SensorEventSchema.optional(),
    })
    .default({}),
});

export const RemoDevicesResponseSchema = z.array(RemoDeviceSchema);

export type RemoDevice = z.infer<typeof RemoDeviceSchema>;

/**
 * Current settings of an air conditioner as reported by the API.
 */
export const AirconSettingsSchema = z.object({
  temp: z.string().default(""),
  mode: z.string().default(""),
  vol: z.string().default(""),
  dir: z.string().default(""),
  button: z.string().default(""),
});

export type AirconSettings = z.infer<typeof AirconSettingsSchema>;

/**
 * Values each operation mode accepts.
 */
export const AirconModeRangeSchema = z.object({
  temp: z.array(z.string()).default([]),
  vol: z.array(z.string()).default([]),
  dir: z.array(z.string()).default([]),
});

export type AirconModeRange = z.infer<typeof AirconModeRangeSchema>;

export const RemoApplianceSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  nickname: z.string().optional(),
  settings: AirconSettingsSchema.nullish(),
  aircon: z
    .object({
      range: z.object({
        modes: z.record(z.string(), AirconModeRangeSchema),
      }),
    })
    .nullish(),
});

export const RemoAppliancesResponseSchema = z.array(RemoApplianceSchema);

export type RemoAppliance = z.infer<typeof RemoApplianceSchema>;

/**
 * Bodies the API returns for commands; only their arrival matters.
 */
export const CommandResponseSchema = z.unknown();

// =============================================================================
// Derived State
// =============================================================================

/**
 * Room temperature reported by a Remo device.
 */
export type RoomState = Readonly<{
  deviceId: string;
  temperature: number;
  measuredAt: string | undefined;
}>;

/**
 * Air conditioner state. The temperature and volume lists depend on the
 * mode and are looked up in `modes`.
 */
export type AcState = Readonly<{
  temperature: string;
  mode: string;
  volume: string;
  direction: string;
  power: boolean;
  modes: Readonly<Record<string, AirconModeRange>>;
}>;
