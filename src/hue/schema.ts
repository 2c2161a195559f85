/**
 * Hue Module - Schemas and Types
 *
 * Response shapes of the Hue bridge local API (v1) and the discovery
 * endpoint. Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Discovery
// =============================================================================

export const DiscoveredBridgeSchema = z.object({
  id: z.string(),
  internalipaddress: z.string(),
});

export const DiscoveryResponseSchema = z.array(DiscoveredBridgeSchema);

export type DiscoveredBridge = z.infer<typeof DiscoveredBridgeSchema>;

// =============================================================================
// Resources
// =============================================================================

export const HueLightSchema = z.object({
  name: z.string().default(""),
  state: z.object({
    on: z.boolean(),
    bri: z.number().optional(),
    reachable: z.boolean().default(true),
  }),
});

export type HueLight = z.infer<typeof HueLightSchema>;

export const HueGroupSchema = z.object({
  name: z.string().default(""),
  lights: z.array(z.string()).default([]),
  state: z.object({
    all_on: z.boolean(),
    any_on: z.boolean(),
  }),
});

export type HueGroup = z.infer<typeof HueGroupSchema>;

// =============================================================================
// Command Results
// =============================================================================

export const HueApiErrorSchema = z.object({
  error: z.object({
    type: z.number(),
    address: z.string().default(""),
    description: z.string(),
  }),
});

export const HueApiSuccessSchema = z.object({
  success: z.record(z.string(), z.unknown()),
});

/**
 * The bridge answers commands, and some failed reads, with a list of
 * per-attribute outcomes.
 */
export const HueCommandResponseSchema = z.array(
  z.union([HueApiSuccessSchema, HueApiErrorSchema]),
);

export type HueCommandResponse = z.infer<typeof HueCommandResponseSchema>;

// =============================================================================
// Derived State
// =============================================================================

export type LightState = Readonly<{
  id: string;
  name: string;
  on: boolean;
  reachable: boolean;
}>;

export type GroupState = Readonly<{
  id: string;
  name: string;
  lights: readonly string[];
  allOn: boolean;
  anyOn: boolean;
}>;
