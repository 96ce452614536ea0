// Error taxonomy for the bridge. Each class carries the process exit code the
// shutdown path uses when the error is fatal.

export class BridgeError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Missing or malformed configuration value. Fatal before any connection is made. */
export class ConfigError extends BridgeError {}

/** Initial broker connection failed. */
export class BusConnectionError extends BridgeError {}

/** A publish was not acknowledged. `exitCode` mirrors the MQTT reason code when the broker sent one. */
export class BusPublishError extends BridgeError {
  readonly topic: string;

  constructor(topic: string, message: string, exitCode = 1, options?: ErrorOptions) {
    super(message, exitCode, options);
    this.topic = topic;
  }
}

/** Recoverable device failure (storage query, single HTTP request). */
export class DeviceTransientError extends BridgeError {}

/** Device event stream gave up after its retry budget. */
export class DeviceProtocolError extends BridgeError {}

/** Device type missing from the profile table. */
export class UnsupportedModelError extends BridgeError {
  readonly deviceType: string;

  constructor(deviceType: string) {
    super(`Unsupported device model: ${deviceType || '(empty)'}. Set ALLOW_UNSUPPORTED_MODEL=true to run it with the generic camera profile`);
    this.deviceType = deviceType;
  }
}

/** Reason code carried by an mqtt.js error, or 1 when there is none. */
export function errorCode(err: unknown): number {
  if (err instanceof BridgeError) return err.exitCode;
  if (err instanceof Error && 'code' in err && typeof err.code === 'number' && err.code > 0) return err.code;
  return 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
