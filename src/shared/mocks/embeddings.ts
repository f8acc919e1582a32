import type { Clock } from "@/shared/lib/datetime";

/** Deterministic pseudo-embedding for fixtures, components in [0.25, 0.75]. */
export const buildVector = (seed: number, dimension = 128): number[] =>
  Array.from({ length: dimension }, (_, idx) => {
    const value = Math.sin(seed * (idx + 1)) + Math.cos((seed + 1) * (idx + 1));
    return Number(((value + 2) / 8 + 0.25).toFixed(4));
  });

/** `base` with `delta` added to its first component. */
export const offsetVector = (base: number[], delta: number): number[] =>
  base.map((value, idx) => (idx === 0 ? value + delta : value));

export const zeroVector = (dimension = 128): number[] => new Array<number>(dimension).fill(0);

/** A clock the test moves by hand. */
export const createManualClock = (start: Date) => {
  let current = new Date(start.getTime());
  const clock: Clock = () => new Date(current.getTime());
  return {
    clock,
    set(date: Date) {
      current = new Date(date.getTime());
    },
    advanceMinutes(minutes: number) {
      current = new Date(current.getTime() + minutes * 60_000);
    },
  };
};
