/**
 * Error taxonomy of the bridge. Everything that is not one of these is
 * treated as unexpected and propagates to the process boundary.
 */
export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid environment or register map. Fatal at startup. */
export class ConfigurationError extends BridgeError {}

/** A connection to the Modbus device or the broker could not be established. */
export class ConnectionError extends BridgeError {}

/** A register read failed; the metric is skipped for the cycle. */
export class ReadError extends BridgeError {}

/** Raw register bytes did not match the declared data type. */
export class DecodeError extends BridgeError {}

/** A value could not be handed to the broker. */
export class PublishError extends BridgeError {}

// jsmodbus rejects with plain objects carrying a message
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}
