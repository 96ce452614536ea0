import { describe, it, expect, vi } from 'vitest';
import { DeviceProtocolError } from './errors.js';
import { EventLoopDeps, mapEvent, runEventLoop } from './events.js';
import { resolveProfile } from './profiles.js';
import { FakeDevice, FakeTransport, makeIdentity } from './test-support.js';
import { buildTopics } from './topics.js';
import type { DeviceEvent } from './types.js';

const AD410 = resolveProfile('AD410');
const AD110 = resolveProfile('AD110');
const GENERIC = resolveProfile('IPC', true);

function setup(deviceType: string, events: DeviceEvent[]) {
  const identity = makeIdentity({ deviceType, serialNumber: 'SN9' });
  const device = new FakeDevice(identity);
  device.events = events;
  device.streamEnd = 'end';
  const transport = new FakeTransport();
  const onFatal = vi.fn();
  const controller = new AbortController();
  const deps: EventLoopDeps = {
    device,
    transport,
    topics: buildTopics(identity, { discoveryPrefix: 'homeassistant' }),
    profile: resolveProfile(deviceType, true),
    retries: 3,
    timeoutMs: 1000,
    onFatal,
    signal: controller.signal,
  };
  return { device, transport, onFatal, controller, deps };
}

describe('mapEvent', () => {
  it('maps motion by the profile motion code', () => {
    expect(mapEvent('VideoMotion', { action: 'Start' }, AD410)).toEqual({ channel: 'motion', state: 'on' });
    expect(mapEvent('VideoMotion', { action: 'Stop' }, AD410)).toEqual({ channel: 'motion', state: 'off' });
    expect(mapEvent('ProfileAlarmTransmit', { action: 'Start' }, AD110)).toEqual({ channel: 'motion', state: 'on' });
    expect(mapEvent('VideoMotion', { action: 'Start' }, AD110)).toBeNull();
  });

  it('maps human detection only for human-capable profiles', () => {
    const payload = { action: 'Start', data: { ObjectType: 'Human' } };
    expect(mapEvent('CrossRegionDetection', payload, AD410)).toEqual({ channel: 'human', state: 'on' });
    expect(mapEvent('CrossRegionDetection', { data: { ObjectType: 'Human' }, action: 'Stop' }, AD410)).toEqual({ channel: 'human', state: 'off' });
    expect(mapEvent('CrossRegionDetection', payload, AD110)).toBeNull();
    expect(mapEvent('CrossRegionDetection', { action: 'Start', data: { ObjectType: 'Vehicle' } }, AD410)).toBeNull();
  });

  it('maps the talk action to the doorbell for doorbells only', () => {
    expect(mapEvent('_DoTalkAction_', { data: { Action: 'Invite' } }, AD110)).toEqual({ channel: 'doorbell', state: 'on' });
    expect(mapEvent('_DoTalkAction_', { data: { Action: 'Hangup' } }, AD110)).toEqual({ channel: 'doorbell', state: 'off' });
    expect(mapEvent('_DoTalkAction_', { data: { Action: 'Invite' } }, GENERIC)).toBeNull();
  });

  it('is deterministic for the same input', () => {
    const payload = { action: 'Start', data: { ObjectType: 'Human' } };
    expect(mapEvent('CrossRegionDetection', payload, AD410)).toEqual(mapEvent('CrossRegionDetection', payload, AD410));
  });
});

describe('runEventLoop', () => {
  it('publishes AD410 sensor states followed by the raw event', async () => {
    const motion: DeviceEvent = ['VideoMotion', { action: 'Start', index: 0 }];
    const human: DeviceEvent = ['CrossRegionDetection', { action: 'Start', data: { ObjectType: 'Human' } }];
    const ring: DeviceEvent = ['_DoTalkAction_', { data: { Action: 'Invite' } }];
    const { transport, onFatal, deps } = setup('AD410', [motion, human, ring]);

    await runEventLoop(deps);

    expect(transport.published).toEqual([
      { topic: 'amcrest2mqtt/SN9/motion', payload: 'on' },
      { topic: 'amcrest2mqtt/SN9/event', payload: JSON.stringify({ code: 'VideoMotion', payload: { action: 'Start', index: 0 } }) },
      { topic: 'amcrest2mqtt/SN9/human', payload: 'on' },
      { topic: 'amcrest2mqtt/SN9/event', payload: JSON.stringify({ code: 'CrossRegionDetection', payload: human[1] }) },
      { topic: 'amcrest2mqtt/SN9/doorbell', payload: 'on' },
      { topic: 'amcrest2mqtt/SN9/event', payload: JSON.stringify({ code: '_DoTalkAction_', payload: ring[1] }) },
    ]);
    expect(onFatal).toHaveBeenCalledTimes(1);
    expect(onFatal).toHaveBeenCalledWith(1, 'device event stream ended');
  });

  it('only passes unmapped AD110 events through', async () => {
    const { transport, deps } = setup('AD110', [
      ['VideoMotion', { action: 'Start' }],
      ['ProfileAlarmTransmit', { action: 'Stop' }],
      ['CrossRegionDetection', { action: 'Start', data: { ObjectType: 'Human' } }],
    ]);

    await runEventLoop(deps);

    expect(transport.topics()).toEqual([
      'amcrest2mqtt/SN9/event',
      'amcrest2mqtt/SN9/motion',
      'amcrest2mqtt/SN9/event',
      'amcrest2mqtt/SN9/event',
    ]);
    expect(transport.published[1].payload).toBe('off');
  });

  it('skips the raw event when the sensor publish failed', async () => {
    const { transport, deps } = setup('AD410', [['VideoMotion', { action: 'Start' }]]);
    transport.failOn = (topic) => topic.endsWith('/motion');

    await runEventLoop(deps);

    expect(transport.published).toEqual([]);
  });

  it('escalates with status 1 when the stream gives up', async () => {
    const { device, onFatal, deps } = setup('AD410', []);
    device.streamEnd = new DeviceProtocolError('retries exhausted');

    await runEventLoop(deps);

    expect(onFatal).toHaveBeenCalledWith(1, 'device event stream failed');
    expect(device.lastStreamOptions?.channel).toBe('All');
    expect(device.lastStreamOptions?.retries).toBe(3);
  });

  it('returns quietly once shutdown aborts the stream', async () => {
    const { device, onFatal, controller, deps } = setup('AD410', [['VideoMotion', { action: 'Start' }]]);
    device.streamEnd = 'hang';

    const loop = runEventLoop(deps);
    await new Promise((resolve) => setTimeout(resolve, 0));
    controller.abort();
    await loop;

    expect(onFatal).not.toHaveBeenCalled();
  });
});
