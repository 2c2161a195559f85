/**
 * Remo Module - Error Types
 *
 * Typed error unions for climate bridge operations.
 * Errors are values, not exceptions.
 */

export type RemoError =
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "HTTP_ERROR";
      readonly status: number;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "NOT_FOUND";
      readonly resource: "device" | "appliance";
      readonly id: string;
      readonly message: string;
    }
  | {
      readonly type: "NOT_AIRCON";
      readonly id: string;
      readonly message: string;
    };

/**
 * Create a NETWORK_ERROR error.
 */
export function networkError(message: string, cause?: unknown): RemoError {
  if (cause === undefined) {
    return { type: "NETWORK_ERROR", message };
  }
  const error = cause instanceof Error ? cause : new Error(String(cause));
  return { type: "NETWORK_ERROR", message: `${message}: ${error.message}`, cause: error };
}

/**
 * Create an HTTP_ERROR error.
 */
export function httpError(status: number, body: string): RemoError {
  return { type: "HTTP_ERROR", status, message: `HTTP ${status}: ${body}` };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(message: string, responseData?: unknown): RemoError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

export function notFound(resource: "device" | "appliance", id: string): RemoError {
  return {
    type: "NOT_FOUND",
    resource,
    id,
    message: `${resource === "device" ? "Device" : "Appliance"} ${id} is not found`,
  };
}

export function notAircon(id: string): RemoError {
  return {
    type: "NOT_AIRCON",
    id,
    message: `Appliance ${id} has no air conditioner settings`,
  };
}

/**
 * Format a RemoError for logging.
 */
export function formatRemoError(error: RemoError): string {
  switch (error.type) {
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "HTTP_ERROR":
      return `Remo API error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "NOT_FOUND":
      return `Not found: ${error.message}`;
    case "NOT_AIRCON":
      return `Not an air conditioner: ${error.message}`;
  }
}
