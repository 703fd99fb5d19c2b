export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface TestClock {
  now: Clock;
  set(date: Date): void;
  advance(ms: number): void;
}

// Controllable clock for tests; starts at the given instant and only moves when told to
export function createTestClock(start: Date): TestClock {
  let current = start.getTime();

  return {
    now: () => new Date(current),
    set(date: Date) {
      current = date.getTime();
    },
    advance(ms: number) {
      current += ms;
    },
  };
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
