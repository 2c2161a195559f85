/**
 * Remo Module - Service Layer
 *
 * HTTP calls to the Nature Remo cloud API. One client per process; state
 * reads go through per-kind caches so many keys on one page share a
 * single request.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import type { CacheOptions } from "../cache.js";
import { StateCache } from "../cache.js";
import { createLogger } from "../logger.js";
import { type RemoError, httpError, invalidResponse, networkError } from "./errors.js";
import {
  type AcState,
  AirconSettingsSchema,
  CommandResponseSchema,
  RemoAppliancesResponseSchema,
  RemoDevicesResponseSchema,
  type RoomState,
} from "./schema.js";
import { acStateToForm, parseAcState, parseRoomState } from "./transform.js";

const log = createLogger("remo");

export type RemoClientOptions = Readonly<{
  token: string;
  baseUrl: string;
  cacheMaxAgeMs: number;
  timeoutMs: number;
}>;

type RequestInit = Readonly<{
  method?: "GET" | "POST";
  form?: Record<string, string>;
}>;

export class NatureRemoClient {
  private readonly rooms: StateCache<string, RoomState>;
  private readonly aircons: StateCache<string, AcState>;

  constructor(private readonly options: RemoClientOptions) {
    this.rooms = new StateCache(options.cacheMaxAgeMs);
    this.aircons = new StateCache(options.cacheMaxAgeMs);
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Room temperature measured by a Remo device.
   */
  getRoomState(
    deviceId: string,
    options: CacheOptions = {},
  ): Promise<Result<RoomState, RemoError>> {
    return this.rooms.get(
      deviceId,
      async () => {
        const devices = await this.request("/1/devices", RemoDevicesResponseSchema);
        return devices.andThen((list) => parseRoomState(list, deviceId));
      },
      options,
    );
  }

  /**
   * Current settings and ranges of an air conditioner.
   */
  getAcState(
    applianceId: string,
    options: CacheOptions = {},
  ): Promise<Result<AcState, RemoError>> {
    return this.aircons.get(
      applianceId,
      async () => {
        const appliances = await this.request("/1/appliances", RemoAppliancesResponseSchema);
        return appliances.andThen((list) => parseAcState(list, applianceId));
      },
      options,
    );
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Apply `state` to an air conditioner. The cache holds the state as sent
   * until the next refresh.
   */
  async setAcState(applianceId: string, state: AcState): Promise<Result<AcState, RemoError>> {
    log.info(
      { applianceId, mode: state.mode, power: state.power, temperature: state.temperature },
      "Updating air conditioner",
    );

    const result = await this.request(
      `/1/appliances/${encodeURIComponent(applianceId)}/aircon_settings`,
      AirconSettingsSchema,
      { method: "POST", form: acStateToForm(state) },
    );
    if (result.isErr()) {
      return err(result.error);
    }

    this.aircons.set(applianceId, state);
    return ok(state);
  }

  /**
   * Send a learned infrared signal.
   */
  async sendSignal(signalId: string): Promise<Result<void, RemoError>> {
    log.info({ signalId }, "Sending signal");

    const result = await this.request(
      `/1/signals/${encodeURIComponent(signalId)}/send`,
      CommandResponseSchema,
      { method: "POST" },
    );
    return result.map(() => undefined);
  }

  // ===========================================================================
  // HTTP
  // ===========================================================================

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: RequestInit = {},
  ): Promise<Result<T, RemoError>> {
    const url = `${this.options.baseUrl}${path}`;
    const method = init.method ?? "GET";

    log.debug({ method, path }, "Remo API request");

    try {
      const response = await fetch(url, {
        method,
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${this.options.token}`,
        },
        ...(init.form && { body: new URLSearchParams(init.form) }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => "Unknown error");
        log.error({ statusCode: response.status, path }, "Remo API request failed");
        return err(httpError(response.status, errorText));
      }

      const data: unknown = await response.json();
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        return err(invalidResponse(`Unexpected response from ${path}`, data));
      }

      return ok(parsed.data);
    } catch (error) {
      log.error({ error, path }, "Remo API unreachable");
      return err(networkError(`Request to ${path} failed`, error));
    }
  }
}
