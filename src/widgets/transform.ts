/**
 * Widgets Module - Pure Transformations
 *
 * Text formatting for time-based widgets.
 */
import type { Rgb } from "../icon/index.js";

const pad2 = (value: number): string => String(value).padStart(2, "0");

/**
 * Format a local time with strftime-style directives: %H %M %S %Y %m %d
 * and %%. Unknown directives are kept as written.
 */
export function formatClock(date: Date, format: string): string {
  return format.replace(/%([HMSYmd%])/g, (_match, directive: string) => {
    switch (directive) {
      case "H":
        return pad2(date.getHours());
      case "M":
        return pad2(date.getMinutes());
      case "S":
        return pad2(date.getSeconds());
      case "Y":
        return String(date.getFullYear());
      case "m":
        return pad2(date.getMonth() + 1);
      case "d":
        return pad2(date.getDate());
      default:
        return "%";
    }
  });
}

/**
 * Whole seconds as H:MM:SS, hours unpadded.
 */
export function formatElapsed(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${hours}:${pad2(minutes)}:${pad2(total % 60)}`;
}

/**
 * Split a duration in seconds into whole minutes and the remaining whole
 * seconds.
 */
export function splitMinutes(seconds: number): { minutes: number; seconds: number } {
  const total = Math.max(0, Math.floor(seconds));
  return { minutes: Math.floor(total / 60), seconds: total % 60 };
}

/**
 * Overdue blink colour for a given epoch second.
 */
export function blinkColor(epochSeconds: number): Rgb {
  return Math.floor(epochSeconds) % 2 === 0 ? [128, 0, 0] : [64, 0, 0];
}
