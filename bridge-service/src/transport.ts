import { EventEmitter } from 'events';
import { existsSync, readFileSync } from 'fs';
import { connect, IClientOptions, MqttClient } from 'mqtt';
import { SERVICE, MqttConfig } from './config.js';
import { BusConnectionError, BusPublishError, errorCode, errorMessage } from './errors.js';
import type { ConfigSnapshot } from './types.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'closing';

export type ConnectFn = (brokerUrl: string, options: IClientOptions) => MqttClient;

/** Escalation hook, wired to the shutdown coordinator. */
export type FatalHandler = (code: number, reason: string) => void;

export interface PublishOptions {
  /** Escalate to shutdown when the publish fails. Only the final offline announcement opts out. */
  exitOnError?: boolean;
}

export interface TransportOptions {
  mqtt: MqttConfig;
  clientId: string;
  statusTopic: string;
  configTopic: string;
  snapshot: ConfigSnapshot;
  onFatal: FatalHandler;
  connectFn?: ConnectFn;
  /** Limit for each step of close(); defaults to CLOSE_TIMEOUT_MS. */
  closeTimeoutMs?: number;
}

export const CLOSE_TIMEOUT_MS = 5_000;

// Resolves `fallback` when `work` has not settled within `ms`.
function settleWithin<T>(work: Promise<T>, ms: number, fallback: T): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => resolve(fallback), ms);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}

function endClient(client: MqttClient, force: boolean): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    client.end(force, () => resolve(true));
  });
}

function readPem(label: string, path: string | undefined): Buffer | undefined {
  if (!path) return undefined;
  try {
    if (existsSync(path)) return readFileSync(path);
    console.warn(`[${SERVICE}] WARNING: ${label} path set but file not found: ${path}`);
  } catch (e) {
    console.warn(`[${SERVICE}] WARNING: failed to read ${label} (${path}): ${errorMessage(e)}`);
  }
  return undefined;
}

export function brokerUrl(mqtt: MqttConfig): string {
  return `${mqtt.tls.enabled ? 'mqtts' : 'mqtt'}://${mqtt.host}:${mqtt.port}`;
}

/**
 * mqtt.js options for the bridge: last will on the status topic, persistent
 * session, no library-level reconnect (a dropped connection is fatal).
 */
export function buildClientOptions(mqtt: MqttConfig, clientId: string, statusTopic: string): IClientOptions {
  const usingTls = mqtt.tls.enabled;
  const options: IClientOptions = {
    clientId,
    clean: false,
    username: mqtt.username,
    password: mqtt.password,
    reconnectPeriod: 0,
    connectTimeout: 30_000,
    will: { topic: statusTopic, payload: Buffer.from('offline'), qos: mqtt.qos, retain: true },
  };
  // TLS material only for mqtts://
  if (usingTls) {
    options.ca = readPem('MQTT_TLS_CA', mqtt.tls.ca);
    options.cert = readPem('MQTT_TLS_CERT', mqtt.tls.cert);
    options.key = readPem('MQTT_TLS_KEY', mqtt.tls.key);
    options.rejectUnauthorized = mqtt.tls.rejectUnauthorized;
  }
  return options;
}

/**
 * Owns the broker connection.
 *
 * disconnected -> connecting -> connected -> closing -> disconnected
 *
 * Emits `state` on every transition.
 */
export class BridgeTransport extends EventEmitter {
  private client: MqttClient | null = null;
  private state: ConnectionState = 'disconnected';
  private readonly options: TransportOptions;
  private readonly connectFn: ConnectFn;

  constructor(options: TransportOptions) {
    super();
    this.options = options;
    this.connectFn = options.connectFn ?? connect;
  }

  getState(): ConnectionState {
    return this.state;
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) return;
    this.state = next;
    this.emit('state', next);
  }

  /**
   * Connect with the last will registered, then announce `online` and publish
   * the config snapshot. Rejects with BusConnectionError when the broker
   * cannot be reached or refuses the connection; resolves false when an
   * announcement failed and shutdown is already under way.
   */
  async connect(): Promise<boolean> {
    if (this.state !== 'disconnected') throw new BusConnectionError(`cannot connect while ${this.state}`);
    const { mqtt, clientId, statusTopic } = this.options;
    const url = brokerUrl(mqtt);
    const clientOptions = buildClientOptions(mqtt, clientId, statusTopic);
    // effective settings, no secrets
    console.log(
      `[${SERVICE}] MQTT config: url=${url} clientId=${clientId} qos=${mqtt.qos} ca=${mqtt.tls.ca || 'unset'} cert=${mqtt.tls.cert || 'unset'} key=${mqtt.tls.key || 'unset'} rejectUnauthorized=${mqtt.tls.rejectUnauthorized}`
    );

    this.setState('connecting');
    const client = this.connectFn(url, clientOptions);
    this.client = client;

    try {
      await new Promise<void>((resolve, reject) => {
        const cleanup = () => {
          client.removeListener('connect', onConnect);
          client.removeListener('error', onError);
          client.removeListener('close', onClose);
        };
        const onConnect = () => {
          cleanup();
          resolve();
        };
        const onError = (err: Error) => {
          cleanup();
          reject(new BusConnectionError(`Could not connect to MQTT server: ${err.message}`, errorCode(err), { cause: err }));
        };
        const onClose = () => {
          cleanup();
          reject(new BusConnectionError('Could not connect to MQTT server: connection closed before acknowledgement'));
        };
        client.on('connect', onConnect);
        client.on('error', onError);
        client.on('close', onClose);
      });
    } catch (err) {
      this.client = null;
      this.setState('disconnected');
      client.end(true);
      throw err;
    }

    client.on('error', (err) => console.error(`[${SERVICE}] mqtt error`, err.message));
    client.on('disconnect', (packet) => this.handleLost(packet.reasonCode || 1, `broker sent DISCONNECT (reason ${packet.reasonCode ?? 'unknown'})`));
    client.on('close', () => this.handleLost(1, 'connection closed'));

    this.setState('connected');
    console.log(`[${SERVICE}] connected to MQTT`);

    if (!(await this.publish(statusTopic, 'online'))) return false;
    return this.publishJson(this.options.configTopic, this.options.snapshot);
  }

  // Any drop not issued locally is fatal; the bridge never reconnects on its own.
  private handleLost(code: number, reason: string): void {
    if (this.state !== 'connected') return;
    this.setState('disconnected');
    console.error(`[${SERVICE}] Unexpected MQTT disconnection: ${reason}`);
    this.options.onFatal(code, 'unexpected MQTT disconnection');
  }

  /**
   * Publish a retained message at the configured QoS and wait for the
   * acknowledgement. Resolves false on failure, after escalating unless
   * `exitOnError` is false.
   */
  async publish(topic: string, payload: string, { exitOnError = true }: PublishOptions = {}): Promise<boolean> {
    const client = this.client;
    try {
      if (!client || (this.state !== 'connected' && this.state !== 'closing')) {
        throw new BusPublishError(topic, 'not connected');
      }
      await new Promise<void>((resolve, reject) => {
        client.publish(topic, payload, { qos: this.options.mqtt.qos, retain: true }, (err) => {
          if (err) reject(new BusPublishError(topic, err.message, errorCode(err), { cause: err }));
          else resolve();
        });
      });
      return true;
    } catch (err) {
      const code = errorCode(err);
      console.error(`[${SERVICE}] Error publishing MQTT message to ${topic}: ${errorMessage(err)}`);
      // only a live connection escalates
      if (exitOnError && this.state === 'connected') this.options.onFatal(code, `publish to ${topic} failed`);
      return false;
    }
  }

  publishJson(topic: string, value: unknown, options?: PublishOptions): Promise<boolean> {
    return this.publish(topic, JSON.stringify(value), options);
  }

  /**
   * Best-effort `offline`, then end the client. Safe to call in any state;
   * only the first call from `connected` announces offline. Each step is
   * bounded by `closeTimeoutMs`, so this resolves even on a dead link.
   */
  async close(): Promise<void> {
    const client = this.client;
    if (!client) {
      this.setState('disconnected');
      return;
    }
    if (this.state === 'closing') return;
    const wasConnected = this.state === 'connected';
    const limit = this.options.closeTimeoutMs ?? CLOSE_TIMEOUT_MS;
    this.setState('closing');

    let announced = false;
    if (wasConnected && client.connected) {
      announced = await settleWithin(this.publish(this.options.statusTopic, 'offline', { exitOnError: false }), limit, false);
      if (!announced) console.warn(`[${SERVICE}] offline announcement not acknowledged, forcing MQTT close`);
    }

    // A graceful end waits for pending acknowledgements and a socket close,
    // neither of which arrives once the link is gone.
    const ended = announced && client.connected && (await settleWithin(endClient(client, false), limit, false));
    if (!ended && !(await settleWithin(endClient(client, true), limit, false))) {
      console.warn(`[${SERVICE}] MQTT client did not confirm close`);
    }

    this.client = null;
    this.setState('disconnected');
    console.log(`[${SERVICE}] MQTT connection closed`);
  }
}
