/**
 * packages/core/src/errors.ts — Error taxonomy for tween-ui.
 *
 * Parameter errors are thrown synchronously from `animate`/`render`.
 * Callback failures are created inside the tick loop and delivered through the
 * manager's logger and `onError` hook instead.
 */

/**
 * Deterministic error codes for every failure tween-ui raises.
 */
export type TweenErrorCode =
  | "TWEEN_INVALID_EASING"
  | "TWEEN_INVALID_VALUE"
  | "TWEEN_INVALID_CONFIG"
  | "TWEEN_UNSUPPORTED_FRAMEWORK"
  | "TWEEN_CALLBACK_FAILURE"
  | "TWEEN_INVALID_STATE";

export type TweenErrorOptions = Readonly<{
  cause?: unknown;
}>;

/**
 * Error class for all tween-ui failures.
 * The `code` property identifies the specific violation.
 */
export class TweenError extends Error {
  override readonly name = "TweenError";
  readonly code: TweenErrorCode;

  constructor(code: TweenErrorCode, message?: string, options?: TweenErrorOptions) {
    super(message ?? code, options?.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TweenError);
    }
  }
}

export function isTweenError(value: unknown, code?: TweenErrorCode): value is TweenError {
  if (!(value instanceof TweenError)) return false;
  return code === undefined || value.code === code;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
