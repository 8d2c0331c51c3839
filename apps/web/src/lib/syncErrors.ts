export type SyncErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'AUTH_EXPIRED'
  | 'REMOTE_API_ERROR'
  | 'GENERATION_FAILURE'
  | 'NOT_FOUND';

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SyncErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.context = context;
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

export function toSyncError(
  error: unknown,
  fallbackMessage: string,
  context?: Record<string, unknown>,
): SyncError {
  if (isSyncError(error)) return error;
  const message = error instanceof Error ? error.message : fallbackMessage;
  return new SyncError('TRANSPORT_ERROR', message, context);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Configuration and missing-row failures do not heal by waiting.
export function isRetryableSyncErrorCode(code: SyncErrorCode): boolean {
  return code !== 'CONFIGURATION_ERROR' && code !== 'NOT_FOUND';
}
