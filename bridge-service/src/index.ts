// amcrest2mqtt entrypoint
// Bridges one Amcrest camera/doorbell to MQTT: events, storage telemetry and
// Home Assistant discovery under amcrest2mqtt/{serial}/

/**
 * Bridge Service (MVP)
 * ---------------------------------------------
 * Purpose
 * - Publish camera motion, human and doorbell states plus raw events to MQTT.
 *
 * Responsibilities
 * - Resolve the device identity and capability profile over the CGI API
 * - Connect with a retained `offline` last will, announce `online` and the config snapshot
 * - Publish Home Assistant discovery descriptors when HOME_ASSISTANT=true
 * - Poll storage usage and ping the device on a schedule
 * - Translate the device event stream until shutdown
 *
 * Environment & Dependencies
 * - AMCREST_HOST, AMCREST_USERNAME, AMCREST_PASSWORD: camera access (digest auth)
 * - MQTT_HOST, MQTT_PORT, MQTT_USERNAME, MQTT_PASSWORD, MQTT_QOS: broker connection
 * - MQTT_TLS_*: optional mqtts:// material
 * - STORAGE_POLL_INTERVAL: seconds between storage polls, 0 disables
 *
 * Operational Notes
 * - Every publish is retained; a failed publish or dropped connection ends the process
 * - A second SIGINT/SIGTERM exits immediately
 *
 * Security Notes
 * - Credentials are never logged
 */
import dotenv from 'dotenv';
import { AmcrestCamera } from './camera.js';
import { buildConfigSnapshot, createContext, mqttClientId, resolveIdentity, runBridge } from './bridge.js';
import { BridgeConfig, loadConfig, readBridgeVersion, SERVICE } from './config.js';
import { ConfigError, errorCode, errorMessage } from './errors.js';
import { pingHost } from './ping.js';
import { ShutdownCoordinator } from './shutdown.js';
import { BridgeTransport } from './transport.js';

dotenv.config();

const coordinator = new ShutdownCoordinator();

async function main(): Promise<void> {
  let config: BridgeConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`[${SERVICE}] ${e.message}`);
      process.exit(1);
    }
    throw e;
  }

  const version = readBridgeVersion();
  console.log(`[${SERVICE}] starting ${SERVICE} v${version}`);

  coordinator.registerSignals();
  const onFatal = (code: number, reason: string) => {
    coordinator.requestShutdown(code, reason).catch((e) => {
      console.error(`[${SERVICE}] shutdown failed:`, errorMessage(e));
      process.exit(1);
    });
  };

  const camera = new AmcrestCamera({
    host: config.amcrest.host,
    port: config.amcrest.port,
    username: config.amcrest.username,
    password: config.amcrest.password,
    timeoutMs: config.amcrest.timeoutMs,
  });

  const identity = await resolveIdentity(camera, config.amcrest.displayName);
  const ctx = createContext(config, identity, version);

  const transport = new BridgeTransport({
    mqtt: config.mqtt,
    clientId: mqttClientId(identity),
    statusTopic: ctx.topics.status,
    configTopic: ctx.topics.config,
    snapshot: buildConfigSnapshot(ctx),
    onFatal,
  });
  coordinator.onDrain(() => transport.close());

  await runBridge(ctx, {
    device: camera,
    transport,
    probe: (host) => pingHost(host),
    onFatal,
    signal: coordinator.signal,
  });
}

main().catch((e) => {
  // the coordinator owns the exit once shutdown has begun
  if (coordinator.isShuttingDown()) {
    console.warn(`[${SERVICE}] startup interrupted by shutdown: ${errorMessage(e)}`);
    return;
  }
  console.error(`[${SERVICE}] fatal:`, errorMessage(e));
  process.exit(errorCode(e));
});
