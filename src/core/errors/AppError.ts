/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service (expected outcome, returned not thrown)
 * return fail(new HoldExpiredError(holdId));
 *
 * // Infrastructure fault (thrown, rendered as 503)
 * throw new UnavailableError('Hold store unreachable', ErrorCode.STORE_UNAVAILABLE);
 * ```
 *
 * Validation, conflict, not-found and state errors are expected outcomes of
 * the hold and booking flows. Services hand them back inside an `Outcome`.
 * Only `UnavailableError` and programming errors travel as exceptions.
 *
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp,
        ...(process.env.NODE_ENV === 'development' && { stack: this.stack })
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    stack?: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 400 Validation Error - malformed or inconsistent input
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { ...details, errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Validation failed', errors);
  }
}

/**
 * 404 Not Found - identifier unresolvable (includes naturally expired holds)
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = ErrorCode.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 409 Conflict - seat contention (held or booked by someone else)
 */
export class ConflictError extends AppError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode | string = ErrorCode.ALREADY_HELD,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.CONFLICT, code, true, details);
  }
}

/**
 * 409 State Error - operation invalid for the entity's lifecycle state
 */
export class StateError extends AppError {
  constructor(
    message: string = 'Operation not allowed in current state',
    code: ErrorCode | string = ErrorCode.BOOKING_INVALID_STATUS,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.CONFLICT, code, true, details);
  }
}

/**
 * 503 Unavailable - the expiring store or booking store could not be reached.
 * Never interpreted as "seat not held".
 */
export class UnavailableError extends AppError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode | string = ErrorCode.STORE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, code, true, details);
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(
    message: string = 'Internal server error',
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, code, false, details);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

/**
 * Seat contention
 */
export class SeatAlreadyHeldError extends ConflictError {
  constructor(tripId: string, seatId: string) {
    super(`Seat ${seatId} is currently held by another traveller`, ErrorCode.ALREADY_HELD, { tripId, seatId });
  }
}

export class SeatAlreadyBookedError extends ConflictError {
  constructor(tripId: string, seatId: string) {
    super(`Seat ${seatId} is already booked`, ErrorCode.ALREADY_BOOKED, { tripId, seatId });
  }
}

/**
 * Hold lifecycle
 */
export class HoldNotFoundError extends NotFoundError {
  constructor(holdId: string) {
    super(`Seat hold not found: ${holdId}`, ErrorCode.HOLD_NOT_FOUND, { holdId });
  }
}

export class HoldExpiredError extends NotFoundError {
  constructor(holdId: string) {
    super('Your seat hold expired, please reselect your seats', ErrorCode.HOLD_EXPIRED, { holdId });
  }
}

export class HoldAlreadyBookedError extends StateError {
  constructor(holdId: string) {
    super(`Hold ${holdId} already has a booking`, ErrorCode.HOLD_ALREADY_BOOKED, { holdId });
  }
}

/**
 * Trip catalog
 */
export class TripNotFoundError extends NotFoundError {
  constructor(tripId: string) {
    super(`Trip not found: ${tripId}`, ErrorCode.TRIP_NOT_FOUND, { tripId });
  }
}

/**
 * Booking-specific errors
 */
export class BookingNotFoundError extends NotFoundError {
  constructor(bookingId: string) {
    super(`Booking not found: ${bookingId}`, ErrorCode.BOOKING_NOT_FOUND, { bookingId });
  }
}

export class InvalidBookingStatusError extends StateError {
  constructor(currentStatus: string, attemptedAction: string) {
    super(
      `Cannot ${attemptedAction} booking in status: ${currentStatus}`,
      ErrorCode.BOOKING_INVALID_STATUS,
      { currentStatus, attemptedAction }
    );
  }
}

// =============================================================================
// OUTCOME - typed success / rejection
// =============================================================================

export type Outcome<T, E extends AppError = AppError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends AppError>(error: E): { success: false; error: E } {
  return { success: false, error };
}
