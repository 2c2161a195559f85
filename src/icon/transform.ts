/**
 * Icon Module - Pure Transformations
 *
 * One render function per icon variant, each producing an SVG document.
 * No side effects, no I/O - the same icon always yields the same markup.
 */
import { config } from "../config.js";
import type {
  GaugeFill,
  GaugeIcon,
  Icon,
  MarkerIcon,
  MarkerShapeGeometry,
  Rect,
  Rgb,
  TextIcon,
} from "./schema.js";
import { KEY_MARGIN, KEY_SIZE } from "./schema.js";

// =============================================================================
// Markup Helpers
// =============================================================================

/**
 * Escape text for use in SVG content and attribute values.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Format a color as `#rrggbb`.
 */
export function toHex(color: Rgb): string {
  return `#${color.map((c) => c.toString(16).padStart(2, "0")).join("")}`;
}

function rectMarkup(rect: Rect, color: Rgb): string {
  return `<rect x="${rect.x}" y="${rect.y}" width="${rect.width}" height="${rect.height}" fill="${toHex(color)}"/>`;
}

function backgroundMarkup(bg: Rgb): string {
  return rectMarkup({ x: 0, y: 0, width: KEY_SIZE, height: KEY_SIZE }, bg);
}

type TextLayer = Readonly<{
  text: string;
  fg: Rgb;
  font?: string | undefined;
  lang: string;
  size: number;
  x: number;
  y: number;
  outline?: Rgb;
}>;

function textMarkup(layer: TextLayer): string {
  if (layer.text === "") {
    return "";
  }

  const font = escapeXml(layer.font ?? config.FONT_FAMILY);
  const outline = layer.outline
    ? ` stroke="${toHex(layer.outline)}" stroke-width="4" stroke-linejoin="round" paint-order="stroke"`
    : "";

  return (
    `<text x="${layer.x}" y="${layer.y}" fill="${toHex(layer.fg)}" font-family="${font}" ` +
    `font-size="${layer.size}" text-anchor="middle" dominant-baseline="central" ` +
    `xml:lang="${escapeXml(layer.lang)}"${outline}>${escapeXml(layer.text)}</text>`
  );
}

// =============================================================================
// Marker Geometry
// =============================================================================

/**
 * Compute the band or wedge drawn along one edge of a marker icon.
 */
export function markerGeometry(
  position: MarkerIcon["position"],
  shape: MarkerIcon["shape"],
  width: number,
): MarkerShapeGeometry {
  const end = KEY_SIZE;
  const mid = Math.floor(KEY_SIZE / 2);
  const depth = width * 2;

  if (shape === "square") {
    switch (position) {
      case "top":
        return { type: "rect", rect: { x: 0, y: 0, width: end, height: width } };
      case "bottom":
        return { type: "rect", rect: { x: 0, y: end - width, width: end, height: width } };
      case "left":
        return { type: "rect", rect: { x: 0, y: 0, width, height: end } };
      case "right":
        return { type: "rect", rect: { x: end - width, y: 0, width, height: end } };
    }
  }

  switch (position) {
    case "top":
      return { type: "polygon", points: [[0, 0], [end, 0], [mid, depth]] };
    case "bottom":
      return { type: "polygon", points: [[0, end], [end, end], [mid, end - depth]] };
    case "left":
      return { type: "polygon", points: [[0, 0], [depth, mid], [0, end]] };
    case "right":
      return { type: "polygon", points: [[end, 0], [end - depth, mid], [end, end]] };
  }
}

// =============================================================================
// Gauge Geometry
// =============================================================================

/**
 * Length of the gauge fill that lands on one key of a multi-key gauge.
 *
 * The gauge is laid out along a virtual strip of `nKeys` keys separated by
 * the physical key margin; `keyOffset` selects this key's slice. The value
 * is clamped to [0, 1].
 *
 * @returns Covered length in pixels; >= KEY_SIZE means fully covered
 */
export function gaugeFillLength(
  value: number,
  nKeys: number,
  keyOffset: number,
): number {
  const clamped = Math.min(1, Math.max(0, value));
  const totalLength = KEY_SIZE * nKeys + KEY_MARGIN * (nKeys - 1);
  const virtualLength = Math.floor(totalLength * clamped);

  return Math.max(0, virtualLength - keyOffset * (KEY_SIZE + KEY_MARGIN));
}

/**
 * Compute the bars (and cursor) drawn for a covered length.
 *
 * Vertical gauges grow from the bottom edge along both side edges;
 * horizontal gauges grow from the left edge along top and bottom.
 */
export function gaugeFill(
  length: number,
  width: number,
  horizontal: boolean,
): GaugeFill {
  const end = KEY_SIZE;

  if (length <= 0) {
    return { bars: [], cursor: null };
  }

  if (length >= end) {
    return horizontal
      ? {
          bars: [
            { x: 0, y: 0, width: end, height: width },
            { x: 0, y: end - width, width: end, height: width },
          ],
          cursor: null,
        }
      : {
          bars: [
            { x: 0, y: 0, width, height: end },
            { x: end - width, y: 0, width, height: end },
          ],
          cursor: null,
        };
  }

  if (horizontal) {
    return {
      bars: [
        { x: 0, y: 0, width: length, height: width },
        { x: 0, y: end - width, width: length, height: width },
      ],
      cursor: { x: length, y: 0, width: 1, height: end },
    };
  }

  return {
    bars: [
      { x: 0, y: end - length, width, height: length },
      { x: end - width, y: end - length, width, height: length },
    ],
    cursor: { x: 0, y: end - length, width: end, height: 1 },
  };
}

// =============================================================================
// Variant Renderers
// =============================================================================

function renderColorLayers(bg: Rgb): string[] {
  return [backgroundMarkup(bg)];
}

function renderTextLayers(icon: TextIcon | MarkerIcon): string[] {
  return [...renderColorLayers(icon.bg), textMarkup(icon)];
}

function renderMarkerLayers(icon: MarkerIcon): string[] {
  const geometry = markerGeometry(icon.position, icon.shape, icon.width);
  const marker =
    geometry.type === "rect"
      ? rectMarkup(geometry.rect, icon.markerColor)
      : `<polygon points="${geometry.points.map(([x, y]) => `${x},${y}`).join(" ")}" fill="${toHex(icon.markerColor)}"/>`;

  return [...renderTextLayers(icon), marker];
}

function renderGaugeLayers(icon: GaugeIcon): string[] {
  const length = gaugeFillLength(icon.value, icon.nKeys, icon.keyOffset);
  const fill = gaugeFill(length, icon.width, icon.horizontal);

  return [
    backgroundMarkup(icon.bg),
    ...fill.bars.map((bar) => rectMarkup(bar, icon.gauge)),
    ...(fill.cursor ? [rectMarkup(fill.cursor, icon.fg)] : []),
    textMarkup({
      text: icon.text,
      fg: icon.fg,
      font: icon.font,
      lang: icon.lang,
      size: icon.size,
      x: KEY_SIZE / 2,
      y: KEY_SIZE / 2,
      outline: icon.bg,
    }),
  ];
}

function renderLayers(icon: Icon): string[] {
  switch (icon.kind) {
    case "color":
      return renderColorLayers(icon.bg);
    case "text":
      return renderTextLayers(icon);
    case "marker":
      return renderMarkerLayers(icon);
    case "gauge":
      return renderGaugeLayers(icon);
  }
}

/**
 * Render an icon as an SVG document of `pixelSize` × `pixelSize` pixels.
 *
 * Geometry is always expressed in KEY_SIZE units and scaled by the viewBox,
 * so the same icon serves devices with different key resolutions.
 */
export function renderIconSvg(icon: Icon, pixelSize: number = KEY_SIZE): string {
  const body = renderLayers(icon)
    .filter((layer) => layer !== "")
    .join("");

  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${pixelSize}" height="${pixelSize}" ` +
    `viewBox="0 0 ${KEY_SIZE} ${KEY_SIZE}" shape-rendering="crispEdges">${body}</svg>`
  );
}
