/**
 * Hue Module - Error Types
 *
 * Typed error unions for lighting bridge operations.
 */

export type HueError =
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
      readonly type: "BRIDGE_NOT_FOUND";
      readonly message: string;
    }
  | {
      readonly type: "BRIDGE_ERROR";
      readonly code: number;
      readonly address: string;
      readonly message: string;
    };

export function networkError(message: string, cause?: unknown): HueError {
  if (cause === undefined) {
    return { type: "NETWORK_ERROR", message };
  }
  const error = cause instanceof Error ? cause : new Error(String(cause));
  return { type: "NETWORK_ERROR", message: `${message}: ${error.message}`, cause: error };
}

export function httpError(status: number, body: string): HueError {
  return { type: "HTTP_ERROR", status, message: `HTTP ${status}: ${body}` };
}

export function invalidResponse(message: string, responseData?: unknown): HueError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

export function bridgeNotFound(): HueError {
  return { type: "BRIDGE_NOT_FOUND", message: "No bridge found on the local network" };
}

/**
 * An error entry reported by the bridge itself.
 */
export function bridgeError(code: number, address: string, description: string): HueError {
  return { type: "BRIDGE_ERROR", code, address, message: description };
}

/**
 * Format a HueError for logging.
 */
export function formatHueError(error: HueError): string {
  switch (error.type) {
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "HTTP_ERROR":
      return `Hue bridge error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "BRIDGE_NOT_FOUND":
      return error.message;
    case "BRIDGE_ERROR":
      return `Hue bridge rejected ${error.address || "request"} (${error.code}): ${error.message}`;
  }
}
