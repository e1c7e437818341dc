// ============================================================================
// Error Taxonomy: every failure that crosses a component boundary
// ============================================================================

export type CallSyncErrorKind =
  | 'transport'
  | 'auth_expired'
  | 'validation'
  | 'crm_transient'
  | 'crm_permanent'
  | 'recording_unavailable';

/**
 * Base class for the typed errors exchanged between components.
 * Messages never include phone numbers or tokens.
 */
export abstract class CallSyncError extends Error {
  abstract readonly kind: CallSyncErrorKind;
}

/**
 * PBX manager connection dropped, refused, or rejected the login.
 * Triggers reconnect-with-backoff in the listener; never fatal.
 */
export class TransportError extends CallSyncError {
  readonly kind = 'transport' as const;

  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

/**
 * The CRM token pair is unusable without a human re-authorization
 * (refresh grant rejected, or a second 401 right after a refresh).
 */
export class AuthExpiredError extends CallSyncError {
  readonly kind = 'auth_expired' as const;

  constructor(message = 'CRM authorization expired. Re-authorize via GET /oauth.') {
    super(message);
    this.name = 'AuthExpiredError';
  }
}

/** Malformed input: unparseable phone number, missing webhook fields. Never retried. */
export class ValidationError extends CallSyncError {
  readonly kind = 'validation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Thrown on 429, 5xx, network failures and request timeouts.
 * The orchestrator retries these with backoff, then dead-letters.
 */
export class CrmTransientError extends CallSyncError {
  readonly kind = 'crm_transient' as const;
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode = 0, responseBody = '') {
    super(message);
    this.name = 'CrmTransientError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Thrown on 4xx business rejections and unreadable CRM responses. Not retried. */
export class CrmPermanentError extends CallSyncError {
  readonly kind = 'crm_permanent' as const;
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode = 0, responseBody = '') {
    super(message);
    this.name = 'CrmPermanentError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Recording missing, unreadable, or rejected by the CRM. A warning; the sync still succeeds. */
export class RecordingUnavailableError extends CallSyncError {
  readonly kind = 'recording_unavailable' as const;

  constructor(message: string) {
    super(message);
    this.name = 'RecordingUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
