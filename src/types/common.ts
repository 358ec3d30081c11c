/**
 * Shared result types for calls that can partially succeed.
 */

/** Classification of a failed call against the video platform. */
export type ApiErrorKind =
  | 'QuotaExceeded'
  | 'InvalidRequest'
  | 'AuthFailure'
  | 'Transient'
  | 'Cancelled';

export interface ApiError {
  kind: ApiErrorKind;
  /** Technical detail for logs. */
  message: string;
  /** HTTP status when the platform answered. */
  status?: number;
}

/**
 * Outcome of a single client operation. `partial` is set when some of the
 * work failed but the data gathered before it is still usable.
 */
export type ApiResult<T> =
  | { ok: true; data: T; partial?: ApiError }
  | { ok: false; error: ApiError };

export interface BulkFailure<I> {
  input: I;
  error: ApiError;
}

/**
 * Outcome of a loop over many inputs. `completed` lists the inputs whose
 * request succeeded; `halted` is set when the loop stopped early.
 */
export interface BulkOutcome<T, I> {
  succeeded: T[];
  completed: I[];
  failed: BulkFailure<I>[];
  halted: ApiErrorKind | null;
}

export interface PaginationOptions {
  limit?: number;
  offset?: number;
}
