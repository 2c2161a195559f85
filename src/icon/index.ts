/**
 * Icon Module - Public API
 */

// Types
export type {
  ColorIcon,
  GaugeFill,
  GaugeIcon,
  Icon,
  MarkerIcon,
  MarkerPosition,
  MarkerShape,
  Rect,
  Rgb,
  TextIcon,
} from "./schema.js";

// Constants and factories
export {
  BLACK,
  BLANK_ICON,
  GREY,
  KEY_MARGIN,
  KEY_SIZE,
  WHITE,
  colorIcon,
  gaugeIcon,
  markerIcon,
  textIcon,
} from "./schema.js";

// Service functions (side effects)
export { clearRasterCache, getRasterCacheSize, rasterizeIcon } from "./service.js";

// Pure transformations
export {
  escapeXml,
  gaugeFill,
  gaugeFillLength,
  markerGeometry,
  renderIconSvg,
  toHex,
} from "./transform.js";
