/**
 * Injectable time and randomness
 *
 * The retry loop sleeps and draws random headers through these seams so tests
 * can drive it deterministically.
 */

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolve after `ms`, or reject with the signal's reason once aborted */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Uniform float in [min, max]
 */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/**
 * Uniform integer in [min, max]
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

/**
 * Pick one element uniformly
 */
export function pick<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  const index = randomInt(random, 0, items.length - 1);
  return items[index] ?? items[0];
}
