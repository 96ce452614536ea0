// In-process stand-ins shared by the test files
import { EventEmitter } from 'events';
import type { MqttClient } from 'mqtt';
import type { BridgeConfig } from './config.js';
import type { DeviceClient, DeviceEvent, DeviceIdentity, StorageStats, StreamEventsOptions } from './types.js';

export function makeIdentity(overrides: Partial<DeviceIdentity> = {}): DeviceIdentity {
  return {
    deviceType: 'AD410',
    serialNumber: 'SN0001',
    softwareVersion: '1.000.0000000.2.R',
    displayName: 'Front Door',
    host: '192.0.2.10',
    ...overrides,
  };
}

export function makeConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    amcrest: {
      host: '192.0.2.10',
      port: 80,
      username: 'admin',
      password: 'test-secret',
      timeoutMs: 1000,
      eventRetries: 2,
      allowUnsupportedModel: false,
    },
    mqtt: {
      host: 'localhost',
      port: 1883,
      username: 'bridge',
      password: 'test-secret',
      qos: 0,
      tls: { enabled: false, rejectUnauthorized: true },
    },
    storagePollIntervalMs: 3_600_000,
    homeAssistant: { enabled: true, prefix: 'homeassistant' },
    ...overrides,
  };
}

export type StreamEnd = 'end' | 'hang' | Error;

/** DeviceClient fake: fixed identity answers, scripted storage and events. */
export class FakeDevice implements DeviceClient {
  readonly host: string;
  events: DeviceEvent[] = [];
  streamEnd: StreamEnd = 'hang';
  storage: StorageStats | Error = { usedBytes: 0, totalBytes: 0, usedPercent: 0 };
  storageCalls = 0;
  lastStreamOptions: StreamEventsOptions | null = null;
  private readonly identity: DeviceIdentity;

  constructor(identity: DeviceIdentity = makeIdentity()) {
    this.identity = identity;
    this.host = identity.host;
  }

  async getDeviceType(): Promise<string> {
    return this.identity.deviceType;
  }

  async getSerialNumber(): Promise<string> {
    return this.identity.serialNumber;
  }

  async getSoftwareVersion(): Promise<string> {
    return this.identity.softwareVersion;
  }

  async getDisplayName(): Promise<string> {
    return this.identity.displayName;
  }

  async getStorageStats(): Promise<StorageStats> {
    this.storageCalls += 1;
    if (this.storage instanceof Error) throw this.storage;
    return this.storage;
  }

  async *streamEvents(options: StreamEventsOptions): AsyncGenerator<DeviceEvent> {
    this.lastStreamOptions = options;
    for (const event of this.events) yield event;
    if (this.streamEnd instanceof Error) throw this.streamEnd;
    if (this.streamEnd === 'end') return;
    const signal = options.signal;
    if (!signal || signal.aborted) return;
    await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
  }
}

export interface PublishedMessage {
  topic: string;
  payload: string;
}

/** Records publishes; `failOn` makes publishes to matching topics resolve false. */
export class FakeTransport {
  readonly published: PublishedMessage[] = [];
  failOn: (topic: string) => boolean = () => false;
  connectResult = true;
  connectCalls = 0;

  async connect(): Promise<boolean> {
    this.connectCalls += 1;
    return this.connectResult;
  }

  async publish(topic: string, payload: string): Promise<boolean> {
    if (this.failOn(topic)) return false;
    this.published.push({ topic, payload });
    return true;
  }

  async publishJson(topic: string, value: unknown): Promise<boolean> {
    return this.publish(topic, JSON.stringify(value));
  }

  topics(): string[] {
    return this.published.map((m) => m.topic);
  }
}

export type PublishCallback = (err?: Error) => void;

/**
 * Minimal mqtt.js client double. Publishes complete on the next microtask
 * with `publishError` (if set), or never while `holdAcks` is set. Like
 * mqtt.js, a graceful `end` on a lost link never calls back.
 */
export class FakeMqttClient extends EventEmitter {
  connected = false;
  publishError: Error | null = null;
  holdAcks = false;
  readonly publishes: PublishedMessage[] = [];
  endCalls: boolean[] = [];

  publish(topic: string, payload: string, _opts: unknown, cb: PublishCallback): this {
    this.publishes.push({ topic, payload });
    if (this.holdAcks) return this;
    const err = this.publishError;
    queueMicrotask(() => cb(err ?? undefined));
    return this;
  }

  end(force?: boolean, cb?: () => void): this {
    this.endCalls.push(force ?? false);
    const settles = force === true || this.connected;
    this.connected = false;
    if (cb && settles) queueMicrotask(cb);
    return this;
  }

  acceptConnection(): void {
    this.connected = true;
    this.emit('connect');
  }

  dropConnection(): void {
    this.connected = false;
    this.emit('close');
  }
}

export function asMqttClient(fake: FakeMqttClient): MqttClient {
  return fake as unknown as MqttClient;
}

/** Error shaped like the ones mqtt.js hands to publish callbacks. */
export function mqttError(message: string, code: number): Error {
  return Object.assign(new Error(message), { code });
}
