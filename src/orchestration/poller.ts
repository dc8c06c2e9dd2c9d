export enum PollStatus {
  Pending = 'PENDING',
  Complete = 'COMPLETE',
  Failed = 'FAILED',
  TimedOut = 'TIMED_OUT'
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms))
};

export interface PollObservation<T> {
  status: PollStatus;
  value?: T;
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
}

export interface PollOutcome<T> {
  status: PollStatus;
  value?: T;
  attempts: number;
  elapsedMs: number;
}

/**
 * Observe `check` until it reports something other than Pending, or until the
 * elapsed time reaches the timeout. Errors thrown by `check` propagate.
 */
export async function pollUntil<T>(
  check: () => Promise<PollObservation<T>>,
  options: PollOptions
): Promise<PollOutcome<T>> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  let attempts = 0;

  for (;;) {
    attempts++;
    const observation = await check();
    const elapsedMs = clock.now() - startedAt;

    if (observation.status !== PollStatus.Pending) {
      return { status: observation.status, value: observation.value, attempts, elapsedMs };
    }

    if (elapsedMs >= options.timeoutMs) {
      return { status: PollStatus.TimedOut, value: observation.value, attempts, elapsedMs };
    }

    await clock.sleep(options.intervalMs);
  }
}
