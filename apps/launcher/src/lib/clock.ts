/**
 * Time source for the wait loop. Tests substitute a fake that advances
 * instantly instead of sleeping.
 */
export interface Clock {
  /** Milliseconds since an arbitrary origin */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};
