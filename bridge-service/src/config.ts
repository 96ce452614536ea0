// Service configuration and typed environment access
import { readFileSync } from 'fs';
import { ConfigError, errorMessage } from './errors.js';
import type { QoS } from './types.js';

export const SERVICE = 'amcrest2mqtt';

// Namespace root for every state topic: amcrest2mqtt/{serial}/...
export const TOPIC_ROOT = 'amcrest2mqtt';

export const LIVENESS_INTERVAL_MS = 30_000;

export interface AmcrestConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  timeoutMs: number;
  eventRetries: number;
  displayName?: string;
  allowUnsupportedModel: boolean;
}

export interface MqttTlsConfig {
  enabled: boolean;
  ca?: string;
  cert?: string;
  key?: string;
  rejectUnauthorized: boolean;
}

export interface MqttConfig {
  host: string;
  port: number;
  username: string;
  password?: string;
  qos: QoS;
  tls: MqttTlsConfig;
}

export interface HomeAssistantConfig {
  enabled: boolean;
  prefix: string;
}

export interface BridgeConfig {
  amcrest: AmcrestConfig;
  mqtt: MqttConfig;
  /** 0 disables the storage poll and the storage discovery entities. */
  storagePollIntervalMs: number;
  homeAssistant: HomeAssistantConfig;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (value === undefined) throw new ConfigError(`Please set the ${name} environment variable`);
  return value;
}

function integer(env: Env, name: string, fallback: number, min = 0): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  return raw.toLowerCase() === 'true';
}

function qos(env: Env): QoS {
  const value = integer(env, 'MQTT_QOS', 0);
  if (value === 0 || value === 1 || value === 2) return value;
  throw new ConfigError(`MQTT_QOS must be 0, 1 or 2, got "${value}"`);
}

/** Resolve and validate the bridge configuration. Throws ConfigError on the first bad value. */
export function loadConfig(env: Env = process.env): BridgeConfig {
  const tlsEnabled = flag(env, 'MQTT_TLS_ENABLED', false);
  return {
    amcrest: {
      host: required(env, 'AMCREST_HOST'),
      port: integer(env, 'AMCREST_PORT', 80, 1),
      username: optional(env, 'AMCREST_USERNAME') ?? 'admin',
      password: required(env, 'AMCREST_PASSWORD'),
      timeoutMs: integer(env, 'AMCREST_TIMEOUT_MS', 10_000, 1),
      eventRetries: integer(env, 'AMCREST_EVENT_RETRIES', 5),
      displayName: optional(env, 'DEVICE_NAME'),
      allowUnsupportedModel: flag(env, 'ALLOW_UNSUPPORTED_MODEL', false),
    },
    mqtt: {
      host: optional(env, 'MQTT_HOST') ?? 'localhost',
      port: integer(env, 'MQTT_PORT', tlsEnabled ? 8883 : 1883, 1),
      username: required(env, 'MQTT_USERNAME'),
      password: optional(env, 'MQTT_PASSWORD'),
      qos: qos(env),
      tls: {
        enabled: tlsEnabled,
        ca: optional(env, 'MQTT_TLS_CA'),
        cert: optional(env, 'MQTT_TLS_CERT'),
        key: optional(env, 'MQTT_TLS_KEY'),
        rejectUnauthorized: flag(env, 'MQTT_TLS_REJECT_UNAUTHORIZED', true),
      },
    },
    storagePollIntervalMs: integer(env, 'STORAGE_POLL_INTERVAL', 3600) * 1000,
    homeAssistant: {
      enabled: flag(env, 'HOME_ASSISTANT', false),
      prefix: optional(env, 'HOME_ASSISTANT_PREFIX') ?? 'homeassistant',
    },
  };
}

/** Bridge version as declared in this package's manifest. npm sets it for `npm start`. */
export function readBridgeVersion(env: Env = process.env): string {
  const fromNpm = optional(env, 'npm_package_version');
  if (fromNpm) return fromNpm;
  try {
    const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (manifest && typeof manifest === 'object' && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (e) {
    console.warn(`[${SERVICE}] could not read package version: ${errorMessage(e)}`);
  }
  return 'unknown';
}
