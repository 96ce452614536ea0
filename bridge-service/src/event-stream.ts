import type { DeviceEvent, EventPayload } from './types.js';

const HEADER_END = Buffer.from('\r\n\r\n');
const CONTENT_LENGTH_REGEX = /content-length:\s*(\d+)/i;

/**
 * Incremental parser for the camera's `multipart/x-mixed-replace` event
 * stream. Each part carries a Content-Length header; `push` returns the bodies
 * of every part completed by the chunk.
 */
export class MultipartEventParser {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): string[] {
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, chunk]) : chunk;
    const bodies: string[] = [];
    for (;;) {
      const headerEnd = this.buffer.indexOf(HEADER_END);
      if (headerEnd < 0) break;
      const headers = this.buffer.subarray(0, headerEnd).toString('utf8');
      const start = headerEnd + HEADER_END.length;
      const match = CONTENT_LENGTH_REGEX.exec(headers);
      if (!match) {
        // no framing information; skip this header block
        this.buffer = this.buffer.subarray(start);
        continue;
      }
      const end = start + Number(match[1]);
      if (this.buffer.length < end) break;
      bodies.push(this.buffer.subarray(start, end).toString('utf8').trim());
      this.buffer = this.buffer.subarray(end);
    }
    return bodies;
  }
}

function parseScalar(value: string): unknown {
  return /^-?\d+$/.test(value) ? Number(value) : value;
}

/**
 * Decode `Code=VideoMotion;action=Start;index=0;data={...}` into
 * `['VideoMotion', { action: 'Start', index: 0, data: {...} }]`.
 * Heartbeats and anything without a code return null.
 */
export function parseEventBody(body: string): DeviceEvent | null {
  const text = body.trim();
  if (!text.startsWith('Code=')) return null;

  // data= is always last and its JSON may contain ';'
  const dataAt = text.indexOf(';data=');
  const head = dataAt >= 0 ? text.slice(0, dataAt) : text;
  const payload: EventPayload = {};
  let code = '';
  for (const pair of head.split(';')) {
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    const key = pair.slice(0, eq).trim();
    const value = pair.slice(eq + 1).trim();
    if (key === 'Code') code = value;
    else payload[key] = parseScalar(value);
  }
  if (!code) return null;

  if (dataAt >= 0) {
    const raw = text.slice(dataAt + ';data='.length).trim();
    try {
      payload.data = JSON.parse(raw);
    } catch {
      payload.data = raw;
    }
  }
  return [code, payload];
}
