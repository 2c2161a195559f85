/**
 * Icon Module - Schemas and Types
 *
 * Icons are immutable tagged values describing what a key shows.
 * Schemas are the source of truth - types derived with z.infer<>, and
 * the schema defaults fill every field a caller leaves out.
 */
import { z } from "zod";

import { config } from "../config.js";

// =============================================================================
// Geometry
// =============================================================================

/** Logical key size; all icon geometry is expressed in this space. */
export const KEY_SIZE = config.KEY_SIZE;

/** Gap between neighbouring keys, used by gauges spanning several keys. */
export const KEY_MARGIN = 13;

// =============================================================================
// Colors
// =============================================================================

const channel = z.number().int().min(0).max(255);

export const RgbSchema = z.tuple([channel, channel, channel]).readonly();

export type Rgb = z.infer<typeof RgbSchema>;

export const BLACK: Rgb = [0, 0, 0];
export const WHITE: Rgb = [255, 255, 255];
export const GREY: Rgb = [64, 64, 64];

// =============================================================================
// Icon Variants
// =============================================================================

export const ColorIconSchema = z
  .object({
    kind: z.literal("color"),
    bg: RgbSchema.default(BLACK),
  })
  .readonly();

const textFields = {
  bg: RgbSchema.default(BLACK),
  fg: RgbSchema.default(WHITE),
  text: z.string().default(""),
  font: z.string().optional().describe("Font family, configured default when absent"),
  lang: z.string().default("ja").describe("Language used for text shaping"),
  size: z.number().positive().default(16),
  x: z.number().default(KEY_SIZE / 2),
  y: z.number().default(KEY_SIZE / 2),
};

export const TextIconSchema = z
  .object({
    kind: z.literal("text"),
    ...textFields,
  })
  .readonly();

export const MarkerPositionSchema = z.enum(["top", "bottom", "left", "right"]);
export type MarkerPosition = z.infer<typeof MarkerPositionSchema>;

export const MarkerShapeSchema = z.enum(["square", "triangle"]);
export type MarkerShape = z.infer<typeof MarkerShapeSchema>;

export const MarkerIconSchema = z
  .object({
    kind: z.literal("marker"),
    ...textFields,
    markerColor: RgbSchema.default(WHITE),
    position: MarkerPositionSchema.default("bottom"),
    shape: MarkerShapeSchema.default("square"),
    width: z.number().int().positive().default(4),
  })
  .readonly();

export const GaugeIconSchema = z
  .object({
    kind: z.literal("gauge"),
    bg: RgbSchema.default(BLACK),
    gauge: RgbSchema.default(WHITE),
    fg: RgbSchema.default(WHITE),
    text: z.string().default(""),
    font: z.string().optional(),
    lang: z.string().default("ja"),
    size: z.number().positive().default(16),
    width: z.number().int().positive().default(12).describe("Bar thickness"),
    nKeys: z.number().int().positive().default(1).describe("Keys the gauge spans"),
    keyOffset: z
      .number()
      .int()
      .min(0)
      .default(0)
      .describe("Position of this key within the gauge, 0 = start"),
    horizontal: z.boolean().default(false),
    value: z.number().default(0).describe("Fill ratio between 0 and 1"),
  })
  .readonly();

export type ColorIcon = z.infer<typeof ColorIconSchema>;
export type TextIcon = z.infer<typeof TextIconSchema>;
export type MarkerIcon = z.infer<typeof MarkerIconSchema>;
export type GaugeIcon = z.infer<typeof GaugeIconSchema>;

export type Icon = ColorIcon | TextIcon | MarkerIcon | GaugeIcon;

// =============================================================================
// Factories
// =============================================================================

export function colorIcon(
  fields: Omit<z.input<typeof ColorIconSchema>, "kind"> = {},
): ColorIcon {
  return ColorIconSchema.parse({ ...fields, kind: "color" });
}

export function textIcon(
  fields: Omit<z.input<typeof TextIconSchema>, "kind"> = {},
): TextIcon {
  return TextIconSchema.parse({ ...fields, kind: "text" });
}

export function markerIcon(
  fields: Omit<z.input<typeof MarkerIconSchema>, "kind"> = {},
): MarkerIcon {
  return MarkerIconSchema.parse({ ...fields, kind: "marker" });
}

export function gaugeIcon(
  fields: Omit<z.input<typeof GaugeIconSchema>, "kind"> = {},
): GaugeIcon {
  return GaugeIconSchema.parse({ ...fields, kind: "gauge" });
}

/** Icon pushed to keys that no longer belong to the visible page. */
export const BLANK_ICON: ColorIcon = colorIcon();

// =============================================================================
// Drawing Primitives
// =============================================================================

export type Rect = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type GaugeFill = Readonly<{
  bars: readonly Rect[];
  /** One-pixel line at the fill boundary, only for partially covered keys */
  cursor: Rect | null;
}>;

export type MarkerShapeGeometry =
  | { readonly type: "rect"; readonly rect: Rect }
  | { readonly type: "polygon"; readonly points: ReadonlyArray<readonly [number, number]> };
