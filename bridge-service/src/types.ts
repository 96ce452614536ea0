export type QoS = 0 | 1 | 2;

/** Static descriptor of the camera, resolved once at startup. */
export interface DeviceIdentity {
  readonly deviceType: string;
  readonly serialNumber: string;
  readonly softwareVersion: string;
  readonly displayName: string;
  readonly host: string;
}

export interface StorageStats {
  usedBytes: number;
  totalBytes: number;
  usedPercent: number;
}

export type EventPayload = Record<string, unknown>;

/** One device notification: event code and its decoded payload. */
export type DeviceEvent = [code: string, payload: EventPayload];

export interface StreamEventsOptions {
  channel?: string;
  retries: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Camera-side collaborator. `getStorageStats` fails with DeviceTransientError,
 * `streamEvents` fails with DeviceProtocolError once its retry budget is spent.
 */
export interface DeviceClient {
  readonly host: string;
  getDeviceType(): Promise<string>;
  getSerialNumber(): Promise<string>;
  getSoftwareVersion(): Promise<string>;
  getDisplayName(): Promise<string>;
  getStorageStats(): Promise<StorageStats>;
  streamEvents(options: StreamEventsOptions): AsyncIterable<DeviceEvent>;
}

/** JSON document published to the config topic after connecting. */
export interface ConfigSnapshot {
  version: string;
  device_type: string;
  device_name: string;
  sw_version: string;
  serial_number: string;
  host: string;
}
