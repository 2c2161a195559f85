/**
 * Remo Module - Public API
 *
 * Air conditioner and room sensor control through the Nature Remo cloud
 * API.
 */

// Types
export type { AcState, AirconModeRange, RoomState } from "./schema.js";
export type { RemoError } from "./errors.js";
export type { RemoClientOptions } from "./service.js";
export type { ACModeSetting, ACTempKeys } from "./keys.js";

// Error utilities
export { formatRemoError } from "./errors.js";

// Pure transformations
export {
  acStateToForm,
  modeList,
  parseAcState,
  parseRoomState,
  pressMode,
  temperatureLevel,
  temperatureList,
  volumeLevel,
  volumeList,
} from "./transform.js";

// Service (side effects)
export { NatureRemoClient } from "./service.js";

// Keys
export {
  ACModeKeySet,
  ACPowerKey,
  ACTempKeySet,
  ACVolumeKey,
  RoomTempKey,
  SignalKey,
} from "./keys.js";
