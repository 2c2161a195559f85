/**
 * Device Module - Error Types
 *
 * Typed error unions for device operations.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while opening or driving a device.
 */
export type DeckError =
  | {
      readonly type: "DEVICE_NOT_FOUND";
      readonly index: number;
      readonly available: number;
      readonly message: string;
    }
  | {
      readonly type: "DRIVER_FAILED";
      readonly operation: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a DEVICE_NOT_FOUND error.
 */
export function deviceNotFound(index: number, available: number): DeckError {
  return {
    type: "DEVICE_NOT_FOUND",
    index,
    available,
    message: `No device at index ${index} (${available} attached)`,
  };
}

/**
 * Create a DRIVER_FAILED error.
 */
export function driverFailed(operation: string, cause: unknown): DeckError {
  const error = cause instanceof Error ? cause : new Error(String(cause));
  return { type: "DRIVER_FAILED", operation, message: error.message, cause: error };
}

/**
 * Format a DeckError for logging.
 */
export function formatDeckError(error: DeckError): string {
  switch (error.type) {
    case "DEVICE_NOT_FOUND":
      return `Device not found: ${error.message}`;
    case "DRIVER_FAILED":
      return `Driver ${error.operation} failed: ${error.message}`;
  }
}
