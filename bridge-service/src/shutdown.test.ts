import { EventEmitter } from 'events';
import { describe, it, expect, vi } from 'vitest';
import { ShutdownCoordinator } from './shutdown.js';
import { asMqttClient, FakeMqttClient, makeConfig } from './test-support.js';
import { BridgeTransport } from './transport.js';

describe('ShutdownCoordinator', () => {
  it('aborts, drains and exits with the requested code', async () => {
    const exit = vi.fn();
    const coordinator = new ShutdownCoordinator(exit);
    const drain = vi.fn(async () => {
      expect(coordinator.signal.aborted).toBe(true);
    });
    coordinator.onDrain(drain);

    await coordinator.requestShutdown(0, 'received SIGTERM');

    expect(coordinator.isShuttingDown()).toBe(true);
    expect(drain).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('exits even when a drain fails', async () => {
    const exit = vi.fn();
    const coordinator = new ShutdownCoordinator(exit);
    coordinator.onDrain(async () => {
      throw new Error('broker gone');
    });

    await coordinator.requestShutdown(3, 'device unreachable');

    expect(exit).toHaveBeenCalledWith(3);
  });

  it('exits immediately on a repeated request', async () => {
    const exit = vi.fn();
    const coordinator = new ShutdownCoordinator(exit);
    let release: () => void = () => {};
    coordinator.onDrain(
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );

    const first = coordinator.requestShutdown(0, 'received SIGINT');
    await coordinator.requestShutdown(0, 'received SIGINT');
    await coordinator.requestShutdown(135, 'publish failed');
    expect(exit.mock.calls).toEqual([[1], [135]]);

    release();
    await first;
    expect(exit.mock.calls).toEqual([[1], [135], [0]]);
  });

  it('forces exit on a second interrupt without further publishes', async () => {
    const exit = vi.fn();
    const coordinator = new ShutdownCoordinator(exit);
    const signals = new EventEmitter();
    coordinator.registerSignals(signals);

    const fake = new FakeMqttClient();
    const transport = new BridgeTransport({
      mqtt: makeConfig().mqtt,
      clientId: 'amcrest2mqtt_SN1',
      statusTopic: 'amcrest2mqtt/SN1/status',
      configTopic: 'amcrest2mqtt/SN1/config',
      snapshot: { version: '1.0.0', device_type: 'AD410', device_name: 'Front Door', sw_version: '2.0', serial_number: 'SN1', host: '192.0.2.10' },
      onFatal: vi.fn(),
      connectFn: () => asMqttClient(fake),
    });
    const connecting = transport.connect();
    fake.acceptConnection();
    await connecting;
    fake.publishes.length = 0;
    coordinator.onDrain(() => transport.close());

    signals.emit('SIGINT');
    signals.emit('SIGINT');

    expect(exit.mock.calls[0]).toEqual([1]);
    expect(fake.publishes).toEqual([{ topic: 'amcrest2mqtt/SN1/status', payload: 'offline' }]);
  });

  it('removes its signal handlers on request', () => {
    const coordinator = new ShutdownCoordinator(vi.fn());
    const signals = new EventEmitter();
    const unregister = coordinator.registerSignals(signals);
    expect(signals.listenerCount('SIGINT')).toBe(1);
    expect(signals.listenerCount('SIGTERM')).toBe(1);

    unregister();

    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });
});
