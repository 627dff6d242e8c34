/**
 * Typed error model.
 *
 * Failures are carried as plain `TypedError` values: they are stored on
 * transfer outcomes, returned in API responses and written to logs. Code
 * that has to throw across an async boundary wraps one in `TransferError`.
 */

/** Typed suggested fix an operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and outcomes. */
export interface TypedError {
  /** Namespaced error code (e.g., "SINK.AUTH"). */
  code: string;
  message: string;
  /** Workflow run (`namespace/name`) the error belongs to, if any. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error wrapper used where a TypedError has to be thrown. */
export class TransferError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'TransferError';
  }
}

export function isTransferError(err: unknown): err is TransferError {
  return err instanceof TransferError;
}

/** Normalize anything caught into a TypedError. */
export function toTypedError(err: unknown, runId?: string): TypedError {
  if (isTransferError(err)) return err.typedError;
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: err instanceof Error ? err.message : 'Unknown error',
    runId,
  });
}

// --- Source (workflow engine) errors ---

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'SOURCE.RUN_NOT_FOUND',
    message: `Workflow run not found: ${runId}`,
    runId,
    retryable: false,
    suggestedFixes: [
      { type: 'CHECK_RUN_IDENTIFIER', params: { runId }, description: 'Verify the namespace and workflow name.' },
    ],
  });
}

export function sourceUnavailableError(message: string, details?: Record<string, unknown>, runId?: string): TypedError {
  return createTypedError({
    code: 'SOURCE.UNAVAILABLE',
    message,
    runId,
    retryable: true,
    details,
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } }],
  });
}

export function emptyArtifactError(artifact: string, runId?: string): TypedError {
  return createTypedError({
    code: 'SOURCE.EMPTY_ARTIFACT',
    message: `Artifact ${artifact} contains no files`,
    runId,
    retryable: false,
    suggestedFixes: [
      { type: 'CHECK_WORKFLOW_OUTPUTS', params: { artifact }, description: 'Check that the step wrote its output path.' },
    ],
  });
}

export function listingAbortedError(message: string, runId?: string): TypedError {
  return createTypedError({
    code: 'SOURCE.LISTING_ABORTED',
    message: `Artifact listing stopped early: ${message}`,
    runId,
    retryable: true,
  });
}

// --- Sink (object repository) errors ---

export function sinkAuthError(message: string, statusCode: number): TypedError {
  return createTypedError({
    code: 'SINK.AUTH',
    message,
    retryable: false,
    details: { statusCode },
    suggestedFixes: [
      { type: 'CHECK_CREDENTIALS', params: { statusCode }, description: 'Verify CORDRA_USER and CORDRA_PASSWORD.' },
    ],
  });
}

export function sinkUnavailableError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'SINK.UNAVAILABLE',
    message,
    retryable: true,
    details,
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 } }],
  });
}

export function sinkRejectedError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'SINK.REJECTED',
    message,
    retryable: false,
    details,
  });
}

// --- API errors ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function unauthenticatedError(message: string): TypedError {
  return createTypedError({
    code: 'AUTH.UNAUTHENTICATED',
    message,
    retryable: false,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with their
 * masked form. Client error messages pass through here before they become
 * part of a TypedError.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
