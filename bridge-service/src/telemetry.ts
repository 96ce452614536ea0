import { LIVENESS_INTERVAL_MS, SERVICE } from './config.js';
import { DeviceTransientError, errorCode, errorMessage } from './errors.js';
import type { TopicSet } from './topics.js';
import type { BridgeTransport } from './transport.js';
import type { DeviceClient, StorageStats } from './types.js';

export type RunOutcome = 'success' | 'failure';

const BYTES_PER_GB = 1024 * 1024 * 1024;

/** Bytes to gigabytes, rounded to two decimals. */
export function bytesToGigabytes(bytes: number): number {
  return Math.round((bytes / BYTES_PER_GB) * 100) / 100;
}

/**
 * A recurring job. Each run arms exactly one single-shot timer for the next
 * run once it has finished, so a task never overlaps itself. Aborting the
 * signal clears the pending timer; an interval of 0 never arms the task.
 */
export class PeriodicTask {
  readonly name: string;
  readonly intervalMs: number;
  lastRunOutcome: RunOutcome | null = null;
  nextDeadline: number | null = null;
  private readonly run: () => Promise<void>;
  private readonly signal: AbortSignal;
  private timer: NodeJS.Timeout | null = null;
  private armed = false;

  constructor(name: string, intervalMs: number, run: () => Promise<void>, signal: AbortSignal) {
    this.name = name;
    this.intervalMs = intervalMs;
    this.run = run;
    this.signal = signal;
  }

  isArmed(): boolean {
    return this.armed;
  }

  /** Run now, then every `intervalMs`. Returns false when the task is disabled. */
  start(): boolean {
    if (this.intervalMs <= 0) {
      console.log(`[${SERVICE}] ${this.name} disabled`);
      return false;
    }
    if (this.armed || this.signal.aborted) return false;
    this.armed = true;
    this.signal.addEventListener('abort', () => this.stop(), { once: true });
    this.tick().catch((e) => console.error(`[${SERVICE}] ${this.name} scheduler error:`, errorMessage(e)));
    return true;
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.nextDeadline = null;
    this.armed = false;
  }

  private async tick(): Promise<void> {
    this.timer = null;
    try {
      await this.run();
      this.lastRunOutcome = 'success';
    } catch (e) {
      this.lastRunOutcome = 'failure';
      console.warn(`[${SERVICE}] ${this.name} failed: ${errorMessage(e)}`);
    }
    if (!this.armed || this.signal.aborted) return;
    this.nextDeadline = Date.now() + this.intervalMs;
    this.timer = setTimeout(() => {
      this.tick().catch((e) => console.error(`[${SERVICE}] ${this.name} scheduler error:`, errorMessage(e)));
    }, this.intervalMs);
  }
}

export interface TelemetryDeps {
  device: DeviceClient;
  transport: Pick<BridgeTransport, 'publish'>;
  topics: TopicSet;
  storagePollIntervalMs: number;
  livenessIntervalMs?: number;
  probe: (host: string) => Promise<boolean>;
  onFatal: (code: number, reason: string) => void;
  signal: AbortSignal;
}

/** Fetch storage totals and publish them; transient device errors skip the tick. */
export async function refreshStorageSensors(deps: Pick<TelemetryDeps, 'device' | 'transport' | 'topics'>): Promise<void> {
  const { device, transport, topics } = deps;
  console.log(`[${SERVICE}] Fetching storage sensors...`);
  let stats: StorageStats;
  try {
    stats = await device.getStorageStats();
  } catch (e) {
    if (!(e instanceof DeviceTransientError)) throw e;
    console.warn(`[${SERVICE}] Error fetching storage information: ${e.message}`);
    return;
  }
  if (!(await transport.publish(topics.storage_used_percent, String(stats.usedPercent)))) return;
  if (!(await transport.publish(topics.storage_used, String(bytesToGigabytes(stats.usedBytes))))) return;
  await transport.publish(topics.storage_total, String(bytesToGigabytes(stats.totalBytes)));
}

/** Reachability check; an unreachable device means the event stream is dead upstream. */
export async function checkLiveness(deps: Pick<TelemetryDeps, 'device' | 'probe' | 'onFatal'>): Promise<void> {
  let reachable = false;
  try {
    reachable = await deps.probe(deps.device.host);
  } catch (e) {
    console.error(`[${SERVICE}] liveness probe error: ${errorMessage(e)}`);
    deps.onFatal(errorCode(e), `liveness probe for ${deps.device.host} failed`);
    return;
  }
  if (!reachable) {
    console.error(`[${SERVICE}] Device ${deps.device.host} is not reachable`);
    deps.onFatal(1, `device ${deps.device.host} unreachable`);
  }
}

export interface TelemetryScheduler {
  storage: PeriodicTask;
  liveness: PeriodicTask;
}

/** Arm the storage poll (unless disabled) and the liveness probe. */
export function startTelemetry(deps: TelemetryDeps): TelemetryScheduler {
  const storage = new PeriodicTask('storage poll', deps.storagePollIntervalMs, () => refreshStorageSensors(deps), deps.signal);
  const liveness = new PeriodicTask('liveness probe', deps.livenessIntervalMs ?? LIVENESS_INTERVAL_MS, () => checkLiveness(deps), deps.signal);
  storage.start();
  liveness.start();
  return { storage, liveness };
}
