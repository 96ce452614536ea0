import { spawn } from 'child_process';
import { SERVICE } from './config.js';

async function runCmd(cmd: string, args: string[]): Promise<{ code: number | null; out: string; err: string }> {
  return new Promise((resolve) => {
    const p = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const out: string[] = [];
    const err: string[] = [];
    p.stdout.on('data', (c: Buffer) => out.push(c.toString()));
    p.stderr.on('data', (c: Buffer) => err.push(c.toString()));
    p.on('error', (e) => resolve({ code: null, out: out.join(''), err: e.message }));
    p.on('close', (code) => resolve({ code, out: out.join(''), err: err.join('') }));
  });
}

/** Single ICMP echo through the system `ping`. Resolves true when the host answered. */
export async function pingHost(host: string, timeoutSeconds = 5): Promise<boolean> {
  const res = await runCmd('ping', ['-c', '1', '-W', String(timeoutSeconds), host]);
  if (res.code !== 0) {
    console.warn(`[${SERVICE}] ping ${host} failed (code ${res.code ?? 'n/a'}): ${(res.err || res.out).trim()}`);
  }
  return res.code === 0;
}
