import { SERVICE } from './config.js';
import { DeviceProtocolError, errorCode, errorMessage } from './errors.js';
import type { DeviceProfile } from './profiles.js';
import type { TopicSet } from './topics.js';
import type { BridgeTransport } from './transport.js';
import type { DeviceClient, EventPayload } from './types.js';

export type SensorChannel = 'motion' | 'human' | 'doorbell';

export type SensorState = 'on' | 'off';

export interface MappedEvent {
  channel: SensorChannel;
  state: SensorState;
}

export const HUMAN_DETECTION_CODE = 'CrossRegionDetection';
export const TALK_ACTION_CODE = '_DoTalkAction_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function dataField(payload: EventPayload, key: string): unknown {
  const data = payload.data;
  return isRecord(data) ? data[key] : undefined;
}

function startState(payload: EventPayload): SensorState {
  return payload.action === 'Start' ? 'on' : 'off';
}

/**
 * Map a device event to a binary-sensor state. Depends only on the code, the
 * device profile and the payload fields named below; null when unmapped.
 */
export function mapEvent(code: string, payload: EventPayload, profile: DeviceProfile): MappedEvent | null {
  if (code === profile.motionCode) {
    return { channel: 'motion', state: startState(payload) };
  }
  if (profile.supportsHuman && code === HUMAN_DETECTION_CODE && dataField(payload, 'ObjectType') === 'Human') {
    return { channel: 'human', state: startState(payload) };
  }
  if (profile.isDoorbell && code === TALK_ACTION_CODE) {
    return { channel: 'doorbell', state: dataField(payload, 'Action') === 'Invite' ? 'on' : 'off' };
  }
  return null;
}

export interface EventLoopDeps {
  device: DeviceClient;
  transport: Pick<BridgeTransport, 'publish' | 'publishJson'>;
  topics: TopicSet;
  profile: DeviceProfile;
  retries: number;
  timeoutMs: number;
  onFatal: (code: number, reason: string) => void;
  signal: AbortSignal;
}

/** Translate one event: mapped sensor state first, then the raw passthrough. */
export async function translateEvent(deps: EventLoopDeps, code: string, payload: EventPayload): Promise<void> {
  const mapped = mapEvent(code, payload, deps.profile);
  if (mapped) {
    if (!(await deps.transport.publish(deps.topics[mapped.channel], mapped.state))) return;
  }
  await deps.transport.publishJson(deps.topics.event, { code, payload });
  console.log(`[${SERVICE}] event ${code}: ${JSON.stringify(payload)}`);
}

/**
 * Main blocking loop. Returns when the shutdown signal aborts the stream; a
 * terminal stream error escalates with status 1.
 */
export async function runEventLoop(deps: EventLoopDeps): Promise<void> {
  const { device, signal } = deps;
  console.log(`[${SERVICE}] Listening for events...`);
  try {
    for await (const [code, payload] of device.streamEvents({ channel: 'All', retries: deps.retries, timeoutMs: deps.timeoutMs, signal })) {
      if (signal.aborted) break;
      await translateEvent(deps, code, payload);
    }
  } catch (e) {
    if (signal.aborted) return;
    if (e instanceof DeviceProtocolError) {
      console.error(`[${SERVICE}] Amcrest error: ${e.message}`);
    } else {
      console.error(`[${SERVICE}] event loop failed: ${errorMessage(e)}`);
    }
    deps.onFatal(e instanceof DeviceProtocolError ? 1 : errorCode(e), 'device event stream failed');
    return;
  }
  if (!signal.aborted) {
    console.error(`[${SERVICE}] device event stream ended`);
    deps.onFatal(1, 'device event stream ended');
  }
}
