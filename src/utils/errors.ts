/**
 * @fileoverview Standardized error handling utilities.
 *
 * - AppError: base class carrying a stable error code
 * - RemoteCallError: transport, status or body failures talking to a service
 * - Result: success/failure value for callers that must not throw
 */

/**
 * Error codes used across discovery, resolution and fulfillment.
 */
export type ErrorCode =
  | 'DISCOVERY_FAILED'
  | 'CAPABILITY_NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'REMOTE_CALL_FAILED'
  | 'BOOKING_REJECTED'
  | 'INTENT_EXTRACTION_FAILED'
  | 'CONFIGURATION_ERROR';

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Failure of a single outbound call to a specialist service.
 * `status` is set when the service answered with a non-2xx code.
 */
export class RemoteCallError extends AppError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message, 'REMOTE_CALL_FAILED', false, { url, status });
    this.name = 'RemoteCallError';
  }
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/**
 * Render any thrown value as a single-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
