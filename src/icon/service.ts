/**
 * Icon Module - Service Layer
 *
 * Rasterises icons into raw RGB buffers with sharp. Rendering an icon is
 * deterministic, so finished buffers are cached by their SVG markup.
 */
import sharp from "sharp";

import type { Icon } from "./schema.js";
import { renderIconSvg } from "./transform.js";

const MAX_CACHED_ICONS = 512;

// =============================================================================
// Module State
// =============================================================================

const rasterCache = new Map<string, Promise<Buffer>>();

/**
 * Rasterise an icon to a `size` × `size` RGB buffer (3 bytes per pixel).
 */
export function rasterizeIcon(icon: Icon, size: number): Promise<Buffer> {
  const svg = renderIconSvg(icon, size);

  const cached = rasterCache.get(svg);
  if (cached) {
    return cached;
  }

  const pending = sharp(Buffer.from(svg))
    .flatten({ background: "#000000" })
    .raw()
    .toBuffer()
    .catch((error: unknown) => {
      rasterCache.delete(svg);
      throw error;
    });

  rasterCache.set(svg, pending);

  // Map iteration order is insertion order: evict the oldest entry
  if (rasterCache.size > MAX_CACHED_ICONS) {
    const oldest = rasterCache.keys().next();
    if (!oldest.done) {
      rasterCache.delete(oldest.value);
    }
  }

  return pending;
}

/**
 * Number of rasterised icons currently cached.
 */
export function getRasterCacheSize(): number {
  return rasterCache.size;
}

/**
 * Drop every cached raster.
 */
export function clearRasterCache(): void {
  rasterCache.clear();
}
