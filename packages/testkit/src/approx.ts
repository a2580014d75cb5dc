import { AssertionError } from "node:assert";

const DEFAULT_EPSILON = 1e-9;

/** Fail unless `actual` is within `epsilon` of `expected`. */
export function assertApprox(
  actual: number,
  expected: number,
  epsilon = DEFAULT_EPSILON,
  message?: string,
): void {
  if (Number.isFinite(actual) && Math.abs(actual - expected) <= epsilon) return;
  throw new AssertionError({
    message: message ?? `expected ${actual} to be within ${epsilon} of ${expected}`,
    actual,
    expected,
    operator: "approx",
  });
}
