import type { Clock } from "./clock.ts";

export interface PollBounds {
  timeoutMs: number;
  intervalMs: number;
}

/**
 * Checks `ready` every `intervalMs` until it passes or `timeoutMs` worth of
 * intervals have been slept. Returns whether the condition was met.
 */
export async function pollUntil(
  ready: () => Promise<boolean>,
  bounds: PollBounds,
  clock: Clock,
): Promise<boolean> {
  let waited = 0;
  while (waited < bounds.timeoutMs) {
    if (await ready()) return true;
    await clock.sleep(bounds.intervalMs);
    waited += bounds.intervalMs;
  }
  return false;
}

/** Attempt-counted variant: `attempts` checks with a sleep between each. */
export async function pollAttempts(
  ready: () => Promise<boolean>,
  attempts: number,
  intervalMs: number,
  clock: Clock,
): Promise<boolean> {
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (await ready()) return true;
    if (attempt < attempts) {
      await clock.sleep(intervalMs);
    }
  }
  return false;
}
