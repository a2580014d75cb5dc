/**
 * Deterministic clock for timer-driven code under test.
 *
 * Structurally a `FrameClock`: `now()` reads a counter that only moves when the
 * test calls `advance`, and `setTimer` queues callbacks that fire in due-time
 * order (ties in scheduling order) with `now()` set to each timer's due time.
 */

type PendingTimer = {
  readonly seq: number;
  readonly dueMs: number;
  readonly callback: () => void;
};

export type ManualClock = Readonly<{
  now: () => number;
  setTimer: (callback: () => void, delayMs: number) => () => void;
  /** Move time forward by `ms`, firing every timer that falls due on the way. */
  advance: (ms: number) => void;
  /** Timers scheduled and not yet fired or cancelled. */
  pendingCount: () => number;
}>;

export function createManualClock(startMs = 0): ManualClock {
  let nowMs = startMs;
  let nextSeq = 0;
  const timers: PendingTimer[] = [];

  function takeNextDue(limitMs: number): PendingTimer | undefined {
    let best = -1;
    for (let i = 0; i < timers.length; i++) {
      const t = timers[i];
      if (t === undefined || t.dueMs > limitMs) continue;
      const current = best >= 0 ? timers[best] : undefined;
      if (
        current === undefined ||
        t.dueMs < current.dueMs ||
        (t.dueMs === current.dueMs && t.seq < current.seq)
      ) {
        best = i;
      }
    }
    if (best < 0) return undefined;
    return timers.splice(best, 1)[0];
  }

  return Object.freeze({
    now: () => nowMs,
    setTimer: (callback: () => void, delayMs: number) => {
      const timer: PendingTimer = {
        seq: nextSeq++,
        dueMs: nowMs + Math.max(0, delayMs),
        callback,
      };
      timers.push(timer);
      return () => {
        const index = timers.indexOf(timer);
        if (index >= 0) timers.splice(index, 1);
      };
    },
    advance: (ms: number) => {
      if (!Number.isFinite(ms) || ms < 0) {
        throw new Error(`advance: ms must be a non-negative number, got ${ms}`);
      }
      const targetMs = nowMs + ms;
      for (;;) {
        const timer = takeNextDue(targetMs);
        if (timer === undefined) break;
        nowMs = timer.dueMs;
        timer.callback();
      }
      nowMs = targetMs;
    },
    pendingCount: () => timers.length,
  });
}
