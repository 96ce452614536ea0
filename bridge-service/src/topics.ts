import { TOPIC_ROOT } from './config.js';
import { slugifyDeviceName } from './device-names.js';
import type { DeviceIdentity } from './types.js';

// Topic helpers and constants
export const DISCOVERY_ENTITIES = [
  'doorbell',
  'human',
  'motion',
  'version',
  'serial_number',
  'host',
  'storage_used_percent',
  'storage_used',
  'storage_total',
] as const;

export type DiscoveryEntity = (typeof DISCOVERY_ENTITIES)[number];

export type DiscoveryComponent = 'binary_sensor' | 'sensor';

export type DiscoveryTopics = Readonly<Record<DiscoveryEntity, string>>;

export interface TopicSet {
  readonly status: string;
  readonly config: string;
  readonly event: string;
  readonly motion: string;
  readonly doorbell: string;
  readonly human: string;
  readonly storage_used: string;
  readonly storage_used_percent: string;
  readonly storage_total: string;
  readonly discovery: {
    /** keyed by serial number only */
    readonly current: DiscoveryTopics;
    /** keyed by serial number and display-name slug; retracted on startup */
    readonly legacy: DiscoveryTopics;
  };
}

export interface TopicOptions {
  discoveryPrefix: string;
}

export function discoveryComponent(entity: DiscoveryEntity): DiscoveryComponent {
  return entity === 'doorbell' || entity === 'human' || entity === 'motion' ? 'binary_sensor' : 'sensor';
}

function discoveryTopics(topic: (entity: DiscoveryEntity) => string): DiscoveryTopics {
  return {
    doorbell: topic('doorbell'),
    human: topic('human'),
    motion: topic('motion'),
    version: topic('version'),
    serial_number: topic('serial_number'),
    host: topic('host'),
    storage_used_percent: topic('storage_used_percent'),
    storage_used: topic('storage_used'),
    storage_total: topic('storage_total'),
  };
}

/** Derive every bus topic the bridge publishes to for one device. */
export function buildTopics(identity: DeviceIdentity, { discoveryPrefix }: TopicOptions): TopicSet {
  const base = `${TOPIC_ROOT}/${identity.serialNumber}`;
  const node = `${TOPIC_ROOT}-${identity.serialNumber}`;
  const slug = slugifyDeviceName(identity.displayName);

  return {
    status: `${base}/status`,
    config: `${base}/config`,
    event: `${base}/event`,
    motion: `${base}/motion`,
    doorbell: `${base}/doorbell`,
    human: `${base}/human`,
    storage_used: `${base}/storage/used`,
    storage_used_percent: `${base}/storage/used_percent`,
    storage_total: `${base}/storage/total`,
    discovery: {
      current: discoveryTopics((entity) => `${discoveryPrefix}/${discoveryComponent(entity)}/${node}/${entity}/config`),
      legacy: discoveryTopics((entity) => `${discoveryPrefix}/${discoveryComponent(entity)}/${node}/${slug}_${entity}/config`),
    },
  };
}

/** Flat list of every topic in a set, discovery topics included. */
export function listTopics(topics: TopicSet): string[] {
  const { discovery, ...state } = topics;
  return [...Object.values(state), ...Object.values(discovery.current), ...Object.values(discovery.legacy)];
}
