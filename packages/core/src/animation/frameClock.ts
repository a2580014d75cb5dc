/**
 * packages/core/src/animation/frameClock.ts — Time source and timer seam for the tick loop.
 */

/** Cancels a timer scheduled through a FrameClock. Calling it twice is a no-op. */
export type CancelTimer = () => void;

export type FrameClock = Readonly<{
  /** Monotonic time in milliseconds. */
  now: () => number;
  /** Run `callback` once after `delayMs`. */
  setTimer: (callback: () => void, delayMs: number) => CancelTimer;
}>;

function nowMs(): number {
  const perf = (globalThis as { performance?: { now?: () => number } }).performance;
  const perfNow = perf?.now;
  if (typeof perfNow === "function") return perfNow.call(perf);
  return Date.now();
}

export const systemFrameClock: FrameClock = Object.freeze({
  now: nowMs,
  setTimer: (callback: () => void, delayMs: number): CancelTimer => {
    let handle: ReturnType<typeof setTimeout> | null = setTimeout(() => {
      handle = null;
      callback();
    }, Math.max(0, delayMs));
    return () => {
      if (handle !== null) {
        clearTimeout(handle);
        handle = null;
      }
    };
  },
});
