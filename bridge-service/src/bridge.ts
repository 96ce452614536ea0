import { BridgeConfig, SERVICE, TOPIC_ROOT } from './config.js';
import { resolveDisplayName } from './device-names.js';
import { publishDiscovery } from './discovery.js';
import { DeviceProtocolError } from './errors.js';
import { runEventLoop } from './events.js';
import { DeviceProfile, resolveProfile } from './profiles.js';
import { startTelemetry, TelemetryScheduler } from './telemetry.js';
import { buildTopics, TopicSet } from './topics.js';
import type { BridgeTransport } from './transport.js';
import type { ConfigSnapshot, DeviceClient, DeviceIdentity } from './types.js';

/**
 * Everything resolved once at startup and shared read-only by the
 * components. Replaces module-level globals.
 */
export interface BridgeContext {
  readonly config: BridgeConfig;
  readonly identity: DeviceIdentity;
  readonly profile: DeviceProfile;
  readonly topics: TopicSet;
  readonly version: string;
}

/** Query the camera for its identity. Any failure here is fatal to startup. */
export async function resolveIdentity(device: DeviceClient, displayNameOverride?: string): Promise<DeviceIdentity> {
  const deviceType = await device.getDeviceType();
  const serialNumber = (await device.getSerialNumber()).trim();
  // the serial keys every topic and the client id
  if (!serialNumber) throw new DeviceProtocolError(`${device.host} reported an empty serial number`);
  const softwareVersion = await device.getSoftwareVersion();
  const machineName = await device.getDisplayName();
  return {
    deviceType,
    serialNumber,
    softwareVersion,
    displayName: resolveDisplayName(machineName, deviceType, displayNameOverride),
    host: device.host,
  };
}

export function createContext(config: BridgeConfig, identity: DeviceIdentity, version: string): BridgeContext {
  return {
    config,
    identity,
    profile: resolveProfile(identity.deviceType, config.amcrest.allowUnsupportedModel),
    topics: buildTopics(identity, { discoveryPrefix: config.homeAssistant.prefix }),
    version,
  };
}

export function buildConfigSnapshot(ctx: BridgeContext): ConfigSnapshot {
  const { identity } = ctx;
  return {
    version: ctx.version,
    device_type: identity.deviceType,
    device_name: identity.displayName,
    sw_version: identity.softwareVersion,
    serial_number: identity.serialNumber,
    host: identity.host,
  };
}

export function mqttClientId(identity: DeviceIdentity): string {
  return `${TOPIC_ROOT}_${identity.serialNumber}`;
}

export interface BridgeRuntime {
  device: DeviceClient;
  transport: Pick<BridgeTransport, 'connect' | 'publish' | 'publishJson'>;
  probe: (host: string) => Promise<boolean>;
  onFatal: (code: number, reason: string) => void;
  signal: AbortSignal;
  livenessIntervalMs?: number;
}

/**
 * connect -> discovery -> telemetry -> event loop.
 * Resolves when the event loop returns or an earlier step already escalated.
 * Returns the telemetry scheduler when it was started.
 */
export async function runBridge(ctx: BridgeContext, rt: BridgeRuntime): Promise<TelemetryScheduler | null> {
  const { config, identity, profile, topics } = ctx;
  const { signal } = rt;

  if (!profile.supported) {
    console.warn(`[${SERVICE}] ${identity.deviceType} is not a known model, running with the generic camera profile`);
  }
  console.log(`[${SERVICE}] Device: ${identity.displayName} (${identity.deviceType}) serial ${identity.serialNumber}, firmware ${identity.softwareVersion}`);

  let announced: boolean;
  try {
    announced = await rt.transport.connect();
  } catch (e) {
    // shutdown ended the client while the connect was pending
    if (signal.aborted) return null;
    throw e;
  }
  if (!announced || signal.aborted) return null;

  if (config.homeAssistant.enabled) {
    const published = await publishDiscovery(
      { identity, profile, topics, qos: config.mqtt.qos, storageEnabled: config.storagePollIntervalMs > 0 },
      rt.transport,
    );
    if (!published || signal.aborted) return null;
  }

  const telemetry = startTelemetry({
    device: rt.device,
    transport: rt.transport,
    topics,
    storagePollIntervalMs: config.storagePollIntervalMs,
    livenessIntervalMs: rt.livenessIntervalMs,
    probe: rt.probe,
    onFatal: rt.onFatal,
    signal,
  });

  await runEventLoop({
    device: rt.device,
    transport: rt.transport,
    topics,
    profile,
    retries: config.amcrest.eventRetries,
    timeoutMs: config.amcrest.timeoutMs,
    onFatal: rt.onFatal,
    signal,
  });
  return telemetry;
}
