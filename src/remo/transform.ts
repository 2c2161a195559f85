/**
 * Remo Module - Pure Transformations
 *
 * API responses to state, state updates, and the form body the API takes
 * for new settings. No side effects.
 */
import { type Result, err, ok } from "neverthrow";

import { type RemoError, invalidResponse, notAircon, notFound } from "./errors.js";
import type { AcState, RemoAppliance, RemoDevice, RoomState } from "./schema.js";

// =============================================================================
// Parsing
// =============================================================================

/**
 * Room temperature of `deviceId` among the listed devices.
 */
export function parseRoomState(
  devices: readonly RemoDevice[],
  deviceId: string,
): Result<RoomState, RemoError> {
  const device = devices.find((candidate) => candidate.id === deviceId);
  if (!device) {
    return err(notFound("device", deviceId));
  }

  const reading = device.newest_events.te;
  if (!reading) {
    return err(invalidResponse(`Device ${deviceId} reports no temperature`));
  }

  return ok({ deviceId, temperature: reading.val, measuredAt: reading.created_at });
}

/**
 * Air conditioner state of `applianceId` among the listed appliances.
 */
export function parseAcState(
  appliances: readonly RemoAppliance[],
  applianceId: string,
): Result<AcState, RemoError> {
  const appliance = appliances.find((candidate) => candidate.id === applianceId);
  if (!appliance) {
    return err(notFound("appliance", applianceId));
  }

  const { settings, aircon } = appliance;
  if (!settings || !aircon) {
    return err(notAircon(applianceId));
  }

  return ok({
    temperature: settings.temp,
    mode: settings.mode,
    volume: settings.vol,
    direction: settings.dir,
    power: settings.button !== "power-off",
    modes: aircon.range.modes,
  });
}

// =============================================================================
// Ranges
// =============================================================================

export function modeList(state: AcState): readonly string[] {
  return Object.keys(state.modes);
}

/**
 * Temperatures the current mode accepts.
 */
export function temperatureList(state: AcState): readonly string[] {
  return state.modes[state.mode]?.temp ?? [];
}

/**
 * Fan volumes the current mode accepts.
 */
export function volumeList(state: AcState): readonly string[] {
  return state.modes[state.mode]?.vol ?? [];
}

/**
 * Whether the current mode has a settable temperature. Modes without one
 * report a single empty entry.
 */
export function hasTemperatureControl(state: AcState): boolean {
  const temperatures = temperatureList(state);
  return temperatures.some((temperature) => temperature !== "");
}

// =============================================================================
// Updates
// =============================================================================

export function withPower(state: AcState, power: boolean): AcState {
  return { ...state, power };
}

export function withTemperature(state: AcState, temperature: string): AcState {
  return { ...state, temperature };
}

export function withVolume(state: AcState, volume: string): AcState {
  return { ...state, volume };
}

/**
 * Pressing a mode key: turns the unit off if it is already running in
 * that mode, otherwise switches to the mode and powers on.
 */
export function pressMode(state: AcState, mode: string): AcState {
  if (state.power && state.mode === mode) {
    return withPower(state, false);
  }
  return { ...state, mode, power: true };
}

/**
 * Move `index` one step up or down, staying inside `length`.
 */
export function stepIndex(index: number, step: 1 | -1, length: number): number {
  return Math.min(Math.max(index + step, 0), Math.max(length - 1, 0));
}

// =============================================================================
// Display
// =============================================================================

/**
 * Gauge level of a temperature across three keys. The lowest entry is
 * above zero and the highest below one. Null if the list lacks it.
 */
export function temperatureLevel(temperatures: readonly string[], temperature: string): number | null {
  const index = temperatures.indexOf(temperature);
  if (index < 0) {
    return null;
  }
  return (index + 1) / (temperatures.length + 1);
}

/**
 * Gauge level of a fan volume. The list ends with "auto", which is not
 * part of the scale. Null if the list lacks it.
 */
export function volumeLevel(volumes: readonly string[], volume: string): number | null {
  const index = volumes.indexOf(volume);
  if (index < 0) {
    return null;
  }
  return Math.min(1, index / Math.max(1, volumes.length - 2));
}

export function formatPercent(level: number): string {
  return `${Math.round(level * 100)}%`;
}

export function formatTemperature(temperature: string | number): string {
  return `${temperature}℃`;
}

// =============================================================================
// Requests
// =============================================================================

/**
 * Form body for POST /1/appliances/{id}/aircon_settings.
 */
export function acStateToForm(state: AcState): Record<string, string> {
  return {
    air_direction: state.direction,
    air_volume: state.volume,
    button: state.power ? "power-on" : "power-off",
    operation_mode: state.mode,
    temperature: state.temperature,
    temperature_unit: "c",
  };
}
