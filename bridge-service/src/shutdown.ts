import { SERVICE } from './config.js';
import { errorMessage } from './errors.js';

export type ExitFn = (code: number) => void;

export type DrainFn = () => Promise<void>;

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

/** Anything signals can be registered on; `process` in production. */
export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
  removeListener(event: ShutdownSignal, listener: () => void): unknown;
}

/**
 * Single termination entry point for the bridge.
 *
 * The first request aborts `signal`, runs the registered drains (transport
 * close) and exits with the requested code. Any later request exits at once
 * without further I/O.
 */
export class ShutdownCoordinator {
  private readonly controller = new AbortController();
  private readonly drains: DrainFn[] = [];
  private readonly exit: ExitFn;
  private exiting = false;

  constructor(exit: ExitFn = (code) => process.exit(code)) {
    this.exit = exit;
  }

  /** Observed by the telemetry tasks and the event loop. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  isShuttingDown(): boolean {
    return this.exiting;
  }

  onDrain(drain: DrainFn): void {
    this.drains.push(drain);
  }

  async requestShutdown(code: number, reason: string): Promise<void> {
    // check-and-set: a repeated request never waits on the graceful path
    if (this.exiting) {
      const forced = code === 0 ? 1 : code;
      console.error(`[${SERVICE}] ${reason} received during shutdown, exiting immediately (code ${forced})`);
      this.exit(forced);
      return;
    }
    this.exiting = true;

    if (code === 0) console.log(`[${SERVICE}] ${reason}, shutting down...`);
    else console.error(`[${SERVICE}] ${reason}, shutting down with code ${code}`);

    this.controller.abort();
    for (const drain of this.drains) {
      try {
        await drain();
      } catch (error) {
        console.warn(`[${SERVICE}] Error during shutdown:`, errorMessage(error));
      }
    }
    this.exit(code);
  }

  /** Install SIGINT/SIGTERM handlers; returns a function that removes them. */
  registerSignals(source: SignalSource = process): () => void {
    const handlers = (['SIGINT', 'SIGTERM'] as const).map((sig) => {
      const handler = () => {
        this.requestShutdown(0, `received ${sig}`).catch((error) => {
          console.error(`[${SERVICE}] shutdown failed:`, errorMessage(error));
          this.exit(1);
        });
      };
      source.on(sig, handler);
      return { sig, handler };
    });
    return () => {
      for (const { sig, handler } of handlers) source.removeListener(sig, handler);
    };
  }
}
