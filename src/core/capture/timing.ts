// src/core/capture/timing.ts
import { CaptureError, ErrorCode } from '../errors.js';
import type { CapturePhase } from '../types/index.js';

// setTimeout fires at once for anything above 2^31-1 ms
const MAX_TIMER_MS = 2147483647;

/** Time source for the driver; tests swap in a fake so waits cost nothing. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
};

/**
 * Race `operation` against a timer. The timer is always cleared, so a
 * finished run leaves nothing scheduled.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  ms: number,
  label: string,
  phase: CapturePhase = 'navigation'
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new CaptureError(ErrorCode.TIMEOUT, phase, `${label} timed out after ${ms}ms`, true));
    }, Math.min(ms, MAX_TIMER_MS));
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** 1×, 2×, 4×… of `base` for attempt 1, 2, 3…, never above `cap`. */
export function exponentialBackoff(base: number, attempt: number, cap: number): number {
  return Math.min(cap, base * Math.pow(2, Math.max(0, attempt - 1)));
}

export function linearBackoff(base: number, attempt: number, cap: number): number {
  return Math.min(cap, base * Math.max(1, attempt));
}
