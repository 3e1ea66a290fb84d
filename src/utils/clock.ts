import { setTimeout as delay } from 'timers/promises';

/**
 * Time source used by throttles and the watcher loop, swappable in tests
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await delay(Math.max(0, ms));
  },
};
