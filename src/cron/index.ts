/**
 * Tick Loop - fixed-interval background task runner
 *
 * - The next tick is scheduled only after the current one settles, so a
 *   slow tick delays the next instead of overlapping it.
 * - stop() stops scheduling and resolves once the in-flight tick finishes.
 * - start() during an in-flight tick leaves scheduling to that tick, so at
 *   most one timer or tick exists at any time.
 * - An external AbortSignal stops the loop the same way and is handed to
 *   each tick so in-flight work can be cancelled.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('tick-loop');

export type TickHandler = (signal: AbortSignal) => Promise<unknown>;

export interface TickLoopOptions {
  name: string;
  intervalMs: number;
  tick: TickHandler;
  /** Cancels in-flight work and stops the loop */
  signal?: AbortSignal;
}

export interface TickLoop {
  start(): void;
  /** Stop scheduling; resolves after the in-flight tick, if any, completes. */
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Number of ticks completed since creation */
  tickCount(): number;
}

const NEVER_ABORTED = new AbortController().signal;

export function createTickLoop(options: TickLoopOptions): TickLoop {
  const { name, intervalMs, tick } = options;
  const signal = options.signal ?? NEVER_ABORTED;

  let running = false;
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;
  let completed = 0;

  function schedule(): void {
    if (!running || timer !== null || inFlight !== null) return;
    timer = setTimeout(() => {
      timer = null;
      inFlight = fire().finally(() => {
        inFlight = null;
        schedule();
      });
    }, intervalMs);
  }

  async function fire(): Promise<void> {
    const started = Date.now();
    try {
      await tick(signal);
      logger.debug({ loop: name, durationMs: Date.now() - started }, 'Tick complete');
    } catch (err) {
      logger.error({ err, loop: name }, 'Tick failed');
    } finally {
      completed++;
    }
  }

  function onAbort(): void {
    if (!running) return;
    logger.info({ loop: name }, 'Loop cancelled');
    running = false;
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  }

  return {
    start() {
      if (running) return;
      if (signal.aborted) {
        logger.warn({ loop: name }, 'Not starting loop: signal already aborted');
        return;
      }
      running = true;
      signal.addEventListener('abort', onAbort, { once: true });
      logger.info({ loop: name, intervalMs }, 'Loop started');
      schedule();
    },

    async stop() {
      if (running) {
        running = false;
        signal.removeEventListener('abort', onAbort);
        if (timer) {
          clearTimeout(timer);
          timer = null;
        }
      }
      if (inFlight) {
        await inFlight;
      }
      logger.info({ loop: name }, 'Loop stopped');
    },

    isRunning() {
      return running;
    },

    tickCount() {
      return completed;
    },
  };
}
