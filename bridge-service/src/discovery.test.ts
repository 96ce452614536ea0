import { describe, it, expect } from 'vitest';
import { buildDiscovery, DiscoveryInput, publishDiscovery } from './discovery.js';
import { resolveProfile } from './profiles.js';
import { FakeTransport, makeIdentity } from './test-support.js';
import { buildTopics } from './topics.js';

function input(deviceType: string, storageEnabled = true): DiscoveryInput {
  const identity = makeIdentity({ deviceType, serialNumber: 'SN42', displayName: 'Front Door', softwareVersion: '2.0' });
  return {
    identity,
    profile: resolveProfile(deviceType, true),
    topics: buildTopics(identity, { discoveryPrefix: 'homeassistant' }),
    qos: 1,
    storageEnabled,
  };
}

describe('buildDiscovery', () => {
  it('covers every AD410 entity in publish order', () => {
    expect(buildDiscovery(input('AD410')).map((e) => e.entity)).toEqual([
      'doorbell',
      'human',
      'motion',
      'version',
      'serial_number',
      'host',
      'storage_used_percent',
      'storage_used',
      'storage_total',
    ]);
  });

  it('leaves out capabilities the model lacks and storage when polling is off', () => {
    expect(buildDiscovery(input('AD110', false)).map((e) => e.entity)).toEqual(['doorbell', 'motion', 'version', 'serial_number', 'host']);
    expect(buildDiscovery(input('IPC', false)).map((e) => e.entity)).toEqual(['motion', 'version', 'serial_number', 'host']);
  });

  it('describes a binary sensor', () => {
    const motion = buildDiscovery(input('AD410')).find((e) => e.entity === 'motion');
    expect(motion?.currentTopic).toBe('homeassistant/binary_sensor/amcrest2mqtt-SN42/motion/config');
    expect(motion?.legacyTopic).toBe('homeassistant/binary_sensor/amcrest2mqtt-SN42/front_door_motion/config');
    expect(motion?.descriptor).toEqual({
      availability_topic: 'amcrest2mqtt/SN42/status',
      qos: 1,
      device: {
        name: 'Amcrest AD410',
        manufacturer: 'Amcrest',
        model: 'AD410',
        identifiers: 'SN42',
        sw_version: '2.0',
        via_device: 'amcrest2mqtt',
      },
      name: 'Front Door Motion',
      unique_id: 'SN42.motion',
      state_topic: 'amcrest2mqtt/SN42/motion',
      payload_on: 'on',
      payload_off: 'off',
      device_class: 'motion',
    });
  });

  it('marks diagnostic sensors disabled by default', () => {
    const entries = buildDiscovery(input('AD410'));
    const version = entries.find((e) => e.entity === 'version');
    expect(version?.descriptor).toMatchObject({
      state_topic: 'amcrest2mqtt/SN42/config',
      value_template: '{{ value_json.sw_version }}',
      entity_category: 'diagnostic',
      enabled_by_default: false,
    });
    const used = entries.find((e) => e.entity === 'storage_used');
    expect(used?.descriptor).toMatchObject({
      state_topic: 'amcrest2mqtt/SN42/storage/used',
      unit_of_measurement: 'GB',
      icon: 'mdi:micro-sd',
    });
  });
});

describe('publishDiscovery', () => {
  it('retracts each legacy topic before publishing its descriptor', async () => {
    const transport = new FakeTransport();
    expect(await publishDiscovery(input('AD110', false), transport)).toBe(true);

    expect(transport.published).toHaveLength(10);
    expect(transport.published[0]).toEqual({
      topic: 'homeassistant/binary_sensor/amcrest2mqtt-SN42/front_door_doorbell/config',
      payload: '',
    });
    expect(transport.published[1].topic).toBe('homeassistant/binary_sensor/amcrest2mqtt-SN42/doorbell/config');
    expect(JSON.parse(transport.published[1].payload)).toMatchObject({ unique_id: 'SN42.doorbell', device_class: 'sound' });
  });

  it('republishes identical payloads when run twice', async () => {
    const first = new FakeTransport();
    const second = new FakeTransport();
    await publishDiscovery(input('AD410'), first);
    await publishDiscovery(input('AD410'), second);
    expect(second.published).toEqual(first.published);
  });

  it('stops at the first failed publish', async () => {
    const transport = new FakeTransport();
    transport.failOn = (topic) => topic.endsWith('/human/config');

    expect(await publishDiscovery(input('AD410'), transport)).toBe(false);
    expect(transport.published.map((m) => m.topic)).toEqual([
      'homeassistant/binary_sensor/amcrest2mqtt-SN42/front_door_doorbell/config',
      'homeassistant/binary_sensor/amcrest2mqtt-SN42/doorbell/config',
      'homeassistant/binary_sensor/amcrest2mqtt-SN42/front_door_human/config',
    ]);
  });
});
