/**
 * Every time comparison in the verifier goes through a `Clock` so expiry can
 * be tested with simulated time.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function fixedClock(at: Date | string): Clock {
  const instant = new Date(at);
  return { now: () => new Date(instant.getTime()) };
}
