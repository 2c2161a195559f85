/**
 * Hue Module - Service Layer
 *
 * HTTP calls to a Hue bridge on the local network. The bridge address is
 * taken from configuration or discovered once; light and group state is
 * cached so several keys on one page share a request.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import type { CacheOptions } from "../cache.js";
import { StateCache } from "../cache.js";
import { Lock } from "../lock.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type HueError,
  formatHueError,
  httpError,
  invalidResponse,
  networkError,
} from "./errors.js";
import {
  DiscoveryResponseSchema,
  type GroupState,
  HueCommandResponseSchema,
  HueGroupSchema,
  HueLightSchema,
  type LightState,
} from "./schema.js";
import {
  checkCommandResponse,
  firstBridgeAddress,
  toGroupState,
  toLightState,
} from "./transform.js";

const log = createLogger("hue");

const DISCOVERY_URL = "https://discovery.meethue.com/";

export type HueClientOptions = Readonly<{
  /** Fixed bridge address; discovered when omitted. */
  bridgeAddress?: string | undefined;
  username: string;
  cacheMaxAgeMs: number;
  timeoutMs: number;
  discoveryUrl?: string;
}>;

type RequestInit = Readonly<{
  method?: "GET" | "PUT";
  body?: Record<string, unknown>;
}>;

export class HueClient {
  private address: string | undefined;
  private readonly discovery = new Lock();
  private readonly lights: StateCache<string, LightState>;
  private readonly groups: StateCache<string, GroupState>;

  constructor(private readonly options: HueClientOptions) {
    this.address = options.bridgeAddress;
    this.lights = new StateCache(options.cacheMaxAgeMs);
    this.groups = new StateCache(options.cacheMaxAgeMs);
  }

  // ===========================================================================
  // Bridge
  // ===========================================================================

  /**
   * Address of the bridge, looked up once through the discovery endpoint
   * unless configured.
   */
  discoverBridge(): Promise<Result<string, HueError>> {
    return this.discovery.run(async () => {
      if (this.address !== undefined) {
        return ok(this.address);
      }

      const startTime = Date.now();
      logOperationStart(log, "discoverBridge");

      const discoveryUrl = this.options.discoveryUrl ?? DISCOVERY_URL;
      const bridges = await this.fetchJson(discoveryUrl, discoveryUrl, DiscoveryResponseSchema);
      const address = bridges.andThen(firstBridgeAddress);

      if (address.isErr()) {
        logOperationFailed(log, "discoverBridge", formatHueError(address.error));
        return err(address.error);
      }

      this.address = address.value;
      logOperationComplete(log, "discoverBridge", startTime, { address: address.value });
      return ok(address.value);
    });
  }

  // ===========================================================================
  // Lights
  // ===========================================================================

  getLight(lightId: string, options: CacheOptions = {}): Promise<Result<LightState, HueError>> {
    return this.lights.get(
      lightId,
      async () => {
        const light = await this.request(`/lights/${encodeURIComponent(lightId)}`, HueLightSchema);
        return light.map((raw) => toLightState(lightId, raw));
      },
      options,
    );
  }

  async setLightOn(lightId: string, on: boolean): Promise<Result<void, HueError>> {
    log.info({ lightId, on }, "Switching light");

    const result = await this.command(`/lights/${encodeURIComponent(lightId)}/state`, { on });
    if (result.isErr()) {
      return result;
    }

    const cached = this.lights.peek(lightId);
    if (cached) {
      this.lights.set(lightId, { ...cached, on });
    }
    this.groups.clear();
    return ok(undefined);
  }

  // ===========================================================================
  // Groups
  // ===========================================================================

  getGroup(groupId: string, options: CacheOptions = {}): Promise<Result<GroupState, HueError>> {
    return this.groups.get(
      groupId,
      async () => {
        const group = await this.request(`/groups/${encodeURIComponent(groupId)}`, HueGroupSchema);
        return group.map((raw) => toGroupState(groupId, raw));
      },
      options,
    );
  }

  /**
   * Switch every light of a group. Cached member lights are dropped.
   */
  async setGroupOn(groupId: string, on: boolean): Promise<Result<void, HueError>> {
    log.info({ groupId, on }, "Switching group");

    const result = await this.command(`/groups/${encodeURIComponent(groupId)}/action`, { on });
    if (result.isErr()) {
      return result;
    }

    const cached = this.groups.peek(groupId);
    if (cached) {
      this.groups.set(groupId, { ...cached, allOn: on, anyOn: on });
      for (const lightId of cached.lights) {
        this.lights.invalidate(lightId);
      }
    } else {
      this.lights.clear();
    }
    return ok(undefined);
  }

  // ===========================================================================
  // HTTP
  // ===========================================================================

  private async command(
    path: string,
    body: Record<string, unknown>,
  ): Promise<Result<void, HueError>> {
    const response = await this.request(path, HueCommandResponseSchema, { method: "PUT", body });
    return response.andThen(checkCommandResponse);
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: RequestInit = {},
  ): Promise<Result<T, HueError>> {
    const address = await this.discoverBridge();
    if (address.isErr()) {
      return err(address.error);
    }

    const url = `http://${address.value}/api/${encodeURIComponent(this.options.username)}${path}`;
    const result = await this.fetchJson(url, path, schema, init);

    return result.orElse((error) => {
      // Failed reads arrive as a 200 with an error list
      if (error.type === "INVALID_RESPONSE") {
        const listed = HueCommandResponseSchema.safeParse(error.responseData);
        if (listed.success) {
          const reported = checkCommandResponse(listed.data);
          if (reported.isErr()) {
            return err(reported.error);
          }
        }
      }
      return err(error);
    });
  }

  /**
   * `label` names the request in logs and errors; bridge URLs carry the
   * username and are not logged.
   */
  private async fetchJson<T>(
    url: string,
    label: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: RequestInit = {},
  ): Promise<Result<T, HueError>> {
    const method = init.method ?? "GET";

    log.debug({ method, path: label }, "Hue request");

    try {
      const response = await fetch(url, {
        method,
        headers: { "Content-Type": "application/json" },
        ...(init.body && { body: JSON.stringify(init.body) }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => "Unknown error");
        log.error({ statusCode: response.status, path: label }, "Hue request failed");
        return err(httpError(response.status, errorText));
      }

      const data: unknown = await response.json();
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        return err(invalidResponse(`Unexpected response from ${label}`, data));
      }

      return ok(parsed.data);
    } catch (error) {
      log.error({ error, path: label }, "Hue bridge unreachable");
      return err(networkError(`Request to ${label} failed`, error));
    }
  }
}
