import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { Readable } from 'stream';
import { SERVICE } from './config.js';
import { stripValuePrefix } from './device-names.js';
import { buildDigestAuthorization, DigestChallenge, parseDigestChallenge } from './digest.js';
import { DeviceProtocolError, DeviceTransientError, errorMessage } from './errors.js';
import { MultipartEventParser, parseEventBody } from './event-stream.js';
import type { DeviceClient, DeviceEvent, StorageStats, StreamEventsOptions } from './types.js';

/**
 * Camera connection configuration
 */
export interface AmcrestCameraOptions {
  host: string;
  port?: number;
  username: string;
  password: string;
  timeoutMs?: number;
  /** Pause between event stream reconnects. */
  retryDelayMs?: number;
}

export const CGI = {
  deviceType: '/cgi-bin/magicBox.cgi?action=getDeviceType',
  serialNumber: '/cgi-bin/magicBox.cgi?action=getSerialNo',
  softwareVersion: '/cgi-bin/magicBox.cgi?action=getSoftwareVersion',
  machineName: '/cgi-bin/magicBox.cgi?action=getMachineName',
  storage: '/cgi-bin/storageDevice.cgi?action=getDeviceAllInfo',
  events: (channel: string, heartbeatSeconds: number) => `/cgi-bin/eventManager.cgi?action=attach&codes=[${channel}]&heartbeat=${heartbeatSeconds}`,
};

const EVENT_HEARTBEAT_SECONDS = 5;
const RETRY_DELAY_MS = 1000;

function pause(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/** Parse `key=value` lines into a map; lines without `=` are ignored. */
export function parseKeyValueBody(body: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of body.split(/\r?\n/)) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    out[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return out;
}

/** `version=2.420.AC00.18.R,build:2020-08-17` -> `2.420.AC00.18.R` */
export function parseSoftwareVersion(body: string): string {
  return stripValuePrefix(body, 'version').split(',')[0].trim();
}

/** Sum every storage detail entry of a getDeviceAllInfo answer. */
export function parseStorageInfo(body: string): StorageStats {
  let totalBytes = 0;
  let usedBytes = 0;
  let entries = 0;
  for (const [key, value] of Object.entries(parseKeyValueBody(body))) {
    const amount = Number(value);
    if (!Number.isFinite(amount)) continue;
    if (key.endsWith('.TotalBytes')) {
      totalBytes += amount;
      entries += 1;
    } else if (key.endsWith('.UsedBytes')) {
      usedBytes += amount;
    }
  }
  if (entries === 0) throw new DeviceTransientError('no storage device reported');
  const usedPercent = totalBytes > 0 ? Math.round((usedBytes / totalBytes) * 10000) / 100 : 0;
  return { usedBytes, totalBytes, usedPercent };
}

/**
 * Amcrest CGI API client
 *
 * Answers the first 401 of a session by learning the digest challenge, then
 * signs every later request with an incrementing nonce count.
 */
export class AmcrestCamera implements DeviceClient {
  readonly host: string;
  private readonly options: AmcrestCameraOptions;
  private readonly http: AxiosInstance;
  private challenge: DigestChallenge | null = null;
  private nonceCount = 0;

  constructor(options: AmcrestCameraOptions, http?: AxiosInstance) {
    this.options = options;
    this.host = options.host;
    this.http = http ?? axios.create({
      baseURL: `http://${options.host}:${options.port ?? 80}`,
      timeout: options.timeoutMs ?? 10_000,
      validateStatus: () => true,
    });
  }

  private authorization(uri: string): Record<string, string> {
    if (!this.challenge) return {};
    this.nonceCount += 1;
    return {
      Authorization: buildDigestAuthorization(this.challenge, this.options, { method: 'GET', uri, nonceCount: this.nonceCount }),
    };
  }

  private async request<T>(uri: string, config: AxiosRequestConfig = {}): Promise<AxiosResponse<T>> {
    const send = () => this.http.request<T>({ ...config, method: 'GET', url: uri, headers: this.authorization(uri) });
    let res = await send();
    if (res.status === 401) {
      const data: unknown = res.data;
      if (data instanceof Readable) data.destroy();
      const header = res.headers['www-authenticate'];
      const challenge = typeof header === 'string' ? parseDigestChallenge(header) : null;
      if (!challenge) throw new DeviceTransientError(`${this.host} rejected the credentials`);
      this.challenge = challenge;
      this.nonceCount = 0;
      res = await send();
    }
    return res;
  }

  /** GET a CGI command and return its text body. */
  async command(uri: string): Promise<string> {
    let res: AxiosResponse<string>;
    try {
      res = await this.request<string>(uri, { responseType: 'text' });
    } catch (e) {
      if (e instanceof DeviceTransientError) throw e;
      throw new DeviceTransientError(`request ${uri} to ${this.host} failed: ${errorMessage(e)}`, 1, { cause: e });
    }
    if (res.status !== 200) throw new DeviceTransientError(`request ${uri} to ${this.host} returned HTTP ${res.status}`);
    return String(res.data);
  }

  async getDeviceType(): Promise<string> {
    return stripValuePrefix(await this.command(CGI.deviceType), 'type');
  }

  async getSerialNumber(): Promise<string> {
    return stripValuePrefix(await this.command(CGI.serialNumber), 'sn');
  }

  async getSoftwareVersion(): Promise<string> {
    return parseSoftwareVersion(await this.command(CGI.softwareVersion));
  }

  async getDisplayName(): Promise<string> {
    return stripValuePrefix(await this.command(CGI.machineName), 'name');
  }

  async getStorageStats(): Promise<StorageStats> {
    return parseStorageInfo(await this.command(CGI.storage));
  }

  private async openEventStream(uri: string, options: StreamEventsOptions): Promise<Readable> {
    const res = await this.request<unknown>(uri, { responseType: 'stream', timeout: options.timeoutMs, signal: options.signal });
    const data = res.data;
    if (res.status !== 200) {
      if (data instanceof Readable) data.destroy();
      throw new DeviceTransientError(`event stream returned HTTP ${res.status}`);
    }
    if (!(data instanceof Readable)) throw new DeviceTransientError('event stream is not readable');
    return data;
  }

  /**
   * Attach to the event manager and yield decoded events until aborted.
   * Consecutive failures beyond `retries` raise DeviceProtocolError; any
   * part received from the device, heartbeats included, resets the count.
   */
  async *streamEvents(options: StreamEventsOptions): AsyncGenerator<DeviceEvent> {
    const uri = CGI.events(options.channel ?? 'All', EVENT_HEARTBEAT_SECONDS);
    let failures = 0;
    while (!options.signal?.aborted) {
      try {
        const stream = await this.openEventStream(uri, options);
        const parser = new MultipartEventParser();
        for await (const chunk of stream) {
          const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
          for (const body of parser.push(bytes)) {
            failures = 0;
            const event = parseEventBody(body);
            if (event) yield event;
          }
        }
        throw new DeviceTransientError('event stream closed by device');
      } catch (e) {
        if (options.signal?.aborted) return;
        failures += 1;
        if (failures > options.retries) {
          throw new DeviceProtocolError(`event stream failed after ${options.retries} retries: ${errorMessage(e)}`, 1, { cause: e });
        }
        console.warn(`[${SERVICE}] event stream error (attempt ${failures}/${options.retries}): ${errorMessage(e)}`);
        await pause(this.options.retryDelayMs ?? RETRY_DELAY_MS, options.signal);
      }
    }
  }
}
