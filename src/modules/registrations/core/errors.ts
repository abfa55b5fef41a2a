/**
 * Registrations Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * Values that cannot be derived (missing or zero baselines) are not errors;
 * they are reported as `not_computable` metrics.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Malformed input: unparsable period, inverted filter bounds, unknown category,
 * negative count, or a series missing a field the calculation needs.
 * Aborts the whole call.
 */
export interface InvalidInputError {
  readonly type: 'InvalidInputError';
  readonly message: string;
  readonly field: string;
  readonly value?: unknown;
}

/**
 * The record source could not be read.
 */
export interface SourceReadError {
  readonly type: 'SourceReadError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export type RegistrationAnalyticsError = InvalidInputError | SourceReadError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createInvalidInputError = (
  field: string,
  message: string,
  value?: unknown
): InvalidInputError => ({
  type: 'InvalidInputError',
  message,
  field,
  ...(value !== undefined && { value }),
});

export const createSourceReadError = (message: string, cause?: unknown): SourceReadError => ({
  type: 'SourceReadError',
  message,
  retryable: false,
  ...(cause !== undefined && { cause }),
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

export const REGISTRATION_ERROR_HTTP_STATUS: Record<RegistrationAnalyticsError['type'], number> =
  {
    InvalidInputError: 400,
    SourceReadError: 500,
  };

export const getHttpStatusForError = (error: RegistrationAnalyticsError): number => {
  return REGISTRATION_ERROR_HTTP_STATUS[error.type];
};
