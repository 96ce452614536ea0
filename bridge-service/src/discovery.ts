/**
 * Home Assistant discovery descriptors.
 *
 * Each entity is published as a pair: an empty retained payload on the legacy
 * slug-keyed topic (deletes the old entity) followed by the descriptor on the
 * serial-keyed topic. Descriptors are built from one shared base plus
 * per-kind overrides so the payload shape stays typed.
 */
import { SERVICE, TOPIC_ROOT } from './config.js';
import type { DeviceProfile } from './profiles.js';
import type { DiscoveryEntity, TopicSet } from './topics.js';
import type { BridgeTransport } from './transport.js';
import type { DeviceIdentity, QoS } from './types.js';

export const MANUFACTURER = 'Amcrest';

export interface DeviceBlock {
  name: string;
  manufacturer: string;
  model: string;
  identifiers: string;
  sw_version: string;
  via_device: string;
}

export interface BaseDescriptor {
  availability_topic: string;
  qos: QoS;
  device: DeviceBlock;
  name: string;
  unique_id: string;
  state_topic: string;
}

export type BinarySensorClass = 'sound' | 'occupancy' | 'motion';

export interface BinarySensorDescriptor extends BaseDescriptor {
  payload_on: 'on';
  payload_off: 'off';
  device_class: BinarySensorClass;
}

export interface DiagnosticSensorDescriptor extends BaseDescriptor {
  icon: string;
  entity_category: 'diagnostic';
  enabled_by_default: false;
  value_template?: string;
  unit_of_measurement?: string;
}

export type DiscoveryDescriptor = BinarySensorDescriptor | DiagnosticSensorDescriptor;

export interface DiscoveryEntry {
  entity: DiscoveryEntity;
  legacyTopic: string;
  currentTopic: string;
  descriptor: DiscoveryDescriptor;
}

export interface DiscoveryInput {
  identity: DeviceIdentity;
  profile: DeviceProfile;
  topics: TopicSet;
  qos: QoS;
  storageEnabled: boolean;
}

function baseDescriptor(input: DiscoveryInput, entity: DiscoveryEntity, label: string, stateTopic: string): BaseDescriptor {
  const { identity, topics, qos } = input;
  return {
    availability_topic: topics.status,
    qos,
    device: {
      name: `${MANUFACTURER} ${identity.deviceType}`,
      manufacturer: MANUFACTURER,
      model: identity.deviceType,
      identifiers: identity.serialNumber,
      sw_version: identity.softwareVersion,
      via_device: TOPIC_ROOT,
    },
    name: `${identity.displayName} ${label}`,
    unique_id: `${identity.serialNumber}.${entity}`,
    state_topic: stateTopic,
  };
}

function binarySensor(input: DiscoveryInput, entity: 'doorbell' | 'human' | 'motion', label: string, deviceClass: BinarySensorClass): BinarySensorDescriptor {
  return {
    ...baseDescriptor(input, entity, label, input.topics[entity]),
    payload_on: 'on',
    payload_off: 'off',
    device_class: deviceClass,
  };
}

interface DiagnosticOptions {
  stateTopic: string;
  icon: string;
  valueTemplate?: string;
  unit?: string;
}

function diagnosticSensor(input: DiscoveryInput, entity: DiscoveryEntity, label: string, opts: DiagnosticOptions): DiagnosticSensorDescriptor {
  const descriptor: DiagnosticSensorDescriptor = {
    ...baseDescriptor(input, entity, label, opts.stateTopic),
    icon: opts.icon,
    entity_category: 'diagnostic',
    enabled_by_default: false,
  };
  if (opts.valueTemplate) descriptor.value_template = opts.valueTemplate;
  if (opts.unit) descriptor.unit_of_measurement = opts.unit;
  return descriptor;
}

/** Descriptors for every eligible entity, in publish order. Pure. */
export function buildDiscovery(input: DiscoveryInput): DiscoveryEntry[] {
  const { profile, topics, storageEnabled } = input;
  const descriptors: Array<[DiscoveryEntity, DiscoveryDescriptor]> = [];

  if (profile.isDoorbell) descriptors.push(['doorbell', binarySensor(input, 'doorbell', 'Doorbell', 'sound')]);
  if (profile.supportsHuman) descriptors.push(['human', binarySensor(input, 'human', 'Human', 'occupancy')]);
  descriptors.push(['motion', binarySensor(input, 'motion', 'Motion', 'motion')]);

  descriptors.push(
    ['version', diagnosticSensor(input, 'version', 'Version', { stateTopic: topics.config, valueTemplate: '{{ value_json.sw_version }}', icon: 'mdi:package-up' })],
    ['serial_number', diagnosticSensor(input, 'serial_number', 'Serial Number', { stateTopic: topics.config, valueTemplate: '{{ value_json.serial_number }}', icon: 'mdi:alphabetical-variant' })],
    ['host', diagnosticSensor(input, 'host', 'Host', { stateTopic: topics.config, valueTemplate: '{{ value_json.host }}', icon: 'mdi:ip-network' })],
  );

  if (storageEnabled) {
    descriptors.push(
      ['storage_used_percent', diagnosticSensor(input, 'storage_used_percent', 'Storage Used %', { stateTopic: topics.storage_used_percent, icon: 'mdi:micro-sd', unit: '%' })],
      ['storage_used', diagnosticSensor(input, 'storage_used', 'Storage Used', { stateTopic: topics.storage_used, icon: 'mdi:micro-sd', unit: 'GB' })],
      ['storage_total', diagnosticSensor(input, 'storage_total', 'Storage Total', { stateTopic: topics.storage_total, icon: 'mdi:micro-sd', unit: 'GB' })],
    );
  }

  return descriptors.map(([entity, descriptor]) => ({
    entity,
    legacyTopic: topics.discovery.legacy[entity],
    currentTopic: topics.discovery.current[entity],
    descriptor,
  }));
}

/**
 * Retract each legacy topic and publish each current descriptor. Stops at the
 * first failed publish (which has already escalated) and resolves false.
 */
export async function publishDiscovery(input: DiscoveryInput, transport: Pick<BridgeTransport, 'publish' | 'publishJson'>): Promise<boolean> {
  console.log(`[${SERVICE}] Writing Home Assistant discovery config...`);
  for (const entry of buildDiscovery(input)) {
    if (!(await transport.publish(entry.legacyTopic, ''))) return false;
    if (!(await transport.publishJson(entry.currentTopic, entry.descriptor))) return false;
  }
  return true;
}
