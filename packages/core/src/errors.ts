/**
 * Restore error taxonomy
 *
 * Every failure the workflows raise is a RestoreError with a `kind`
 * discriminant, so callers can branch without inspecting messages.
 */

export type RestoreErrorKind = 'remote' | 'precondition' | 'timeout' | 'user-abort' | 'incomplete';

export type RemoteErrorReason =
  | 'attachment-conflict'
  | 'not-attached'
  | 'not-found'
  | 'error-state'
  | 'rejected';

export abstract class RestoreError extends Error {
  abstract readonly kind: RestoreErrorKind;
  public override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.cause = cause;
  }
}

/**
 * The resource manager rejected a request, or a waited-on resource entered
 * an error state. `reason` is decided by the resource client adapter.
 */
export class RemoteError extends RestoreError {
  override readonly kind = 'remote' as const;

  constructor(
    message: string,
    public readonly reason: RemoteErrorReason = 'rejected',
    public readonly code?: string,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'RemoteError';
  }
}

export class PreconditionError extends RestoreError {
  override readonly kind = 'precondition' as const;

  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class WaitTimeoutError extends RestoreError {
  override readonly kind = 'timeout' as const;

  constructor(
    public readonly resourceId: string,
    public readonly target: string,
    public readonly timeoutMs: number,
    public readonly lastObserved?: string
  ) {
    super(
      `Timed out after ${timeoutMs / 1000}s waiting for ${resourceId} to become ${target}` +
        (lastObserved ? ` (last observed: ${lastObserved})` : '')
    );
    this.name = 'WaitTimeoutError';
  }
}

export class UserAbortError extends RestoreError {
  override readonly kind = 'user-abort' as const;

  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserAbortError';
  }
}

/**
 * A full-instance restore failed after the source instance was terminated.
 * The source cannot be brought back; the backup is the only record of it.
 */
export class IncompleteRestoreError extends RestoreError {
  override readonly kind = 'incomplete' as const;

  constructor(
    public readonly phase: string,
    public readonly sourceInstanceId: string,
    public readonly backupLocation: string,
    cause: unknown
  ) {
    super(
      `Full restore of ${sourceInstanceId} failed after ${phase}: ${describeError(cause)}. ` +
        `The source instance is gone; its configuration is saved at ${backupLocation}`,
      cause
    );
    this.name = 'IncompleteRestoreError';
  }
}

export interface RestoreFailure {
  kind: RestoreErrorKind;
  detail: string;
  /** The value that was thrown, unchanged */
  error: unknown;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify any thrown value. Errors from outside the taxonomy count as
 * rejected remote requests.
 */
export function toRestoreFailure(error: unknown): RestoreFailure {
  return {
    kind: error instanceof RestoreError ? error.kind : 'remote',
    detail: describeError(error),
    error,
  };
}
