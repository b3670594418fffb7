import { CancelledError } from "./errors";

export interface Clock {
  /** Monotonic milliseconds. Only differences are meaningful. */
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function abortReason(signal: AbortSignal): CancelledError {
  if (signal.reason instanceof CancelledError) {
    return signal.reason;
  }
  return new CancelledError("Wait cancelled", { cause: signal.reason });
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      const onAbort = (): void => {
        clearTimeout(handle);
        if (signal) {
          reject(abortReason(signal));
        }
      };
      const handle = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  },
};

type PendingTimer = {
  wakeAt: number;
  seq: number;
  resolve: () => void;
};

/**
 * Discrete-event clock for tests. Time only moves when every pending
 * promise chain has settled: the earliest sleeper is then woken and the
 * clock jumps to its wake-up time.
 */
export class VirtualClock implements Clock {
  private current: number;
  private timers: PendingTimer[] = [];
  private seq = 0;
  private scheduled = false;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  /** Moves time forward without sleeping, e.g. to model a slow engine call. */
  advance(ms: number): void {
    this.current += ms;
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      const timer: PendingTimer = {
        wakeAt: this.current + Math.max(0, ms),
        seq: this.seq,
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      this.seq += 1;
      const onAbort = (): void => {
        this.timers = this.timers.filter((entry) => entry !== timer);
        if (signal) {
          reject(abortReason(signal));
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.timers.push(timer);
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.scheduled) {
      return;
    }
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.fireNext();
    });
  }

  private fireNext(): void {
    if (this.timers.length === 0) {
      return;
    }
    let next = this.timers[0];
    for (const timer of this.timers) {
      if (timer.wakeAt < next.wakeAt || (timer.wakeAt === next.wakeAt && timer.seq < next.seq)) {
        next = timer;
      }
    }
    this.timers = this.timers.filter((timer) => timer !== next);
    this.current = Math.max(this.current, next.wakeAt);
    next.resolve();
    if (this.timers.length > 0) {
      this.schedule();
    }
  }
}
