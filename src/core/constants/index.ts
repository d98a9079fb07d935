/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 * Import from '../core/constants' in other modules.
 *
 * =============================================================================
 */

// =============================================================================
// BOOKING STATUS
// =============================================================================

/**
 * Booking lifecycle states
 *
 *   (hold active) -> PENDING -> CONFIRMED
 *                            -> FAILED
 *                            -> CANCELLED
 *   CONFIRMED -> CANCELLED (refund path, seats no longer held)
 */
export enum BookingStatus {
  PENDING = 'pending',       // Booking row written, hold still active
  CONFIRMED = 'confirmed',   // Payment succeeded, hold released
  CANCELLED = 'cancelled',   // Cancelled by the holder
  FAILED = 'failed'          // Payment failed, hold released
}

/**
 * Allowed status transitions
 */
export const BOOKING_STATUS_TRANSITIONS: Record<BookingStatus, BookingStatus[]> = {
  [BookingStatus.PENDING]: [BookingStatus.CONFIRMED, BookingStatus.FAILED, BookingStatus.CANCELLED],
  [BookingStatus.CONFIRMED]: [BookingStatus.CANCELLED],
  [BookingStatus.CANCELLED]: [],
  [BookingStatus.FAILED]: []
};

// =============================================================================
// SEAT STATUS
// =============================================================================

/**
 * Derived per-seat classification (never stored).
 * Precedence: BOOKED > HELD > AVAILABLE
 */
export enum SeatStatus {
  AVAILABLE = 'available',
  HELD = 'held',
  BOOKED = 'booked'
}

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API versioning
 */
export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

/**
 * Header carrying the anonymous session / user id of the seat holder
 */
export const HOLDER_ID_HEADER = 'x-holder-id';

// =============================================================================
// HOLD STORE KEYS
// =============================================================================

/**
 * Key builders for the expiring store.
 * Holds and seat index entries always carry the same TTL.
 */
export const HOLD_KEYS = {
  /** Full hold record: hold:{holdId} -> JSON */
  HOLD: (holdId: string) => `hold:${holdId}`,

  /** Seat-to-hold index: seatlock:{tripId}:{seatId} -> holdId */
  SEAT_LOCK: (tripId: string, seatId: string) => `seatlock:${tripId}:${seatId}`,

  /** Scan pattern for index entries (all trips or one trip) */
  SEAT_LOCK_PATTERN: (tripId?: string) => (tripId ? `seatlock:${tripId}:*` : 'seatlock:*'),
} as const;

/**
 * PNR alphabet and length
 */
export const PNR = {
  ALPHABET: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789',
  LENGTH: 10,
  MAX_ATTEMPTS: 5
} as const;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================
/**
 * Machine-readable error codes returned in every error body.
 * The hold codes are shown to riders, so they stay plain words.
 */
export enum ErrorCode {
  // =============================================================================
  // VALIDATION
  // =============================================================================
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_REQUEST = 'INVALID_REQUEST',
  HOLD_MISMATCH = 'HOLD_MISMATCH',
  PASSENGER_COUNT_MISMATCH = 'PASSENGER_COUNT_MISMATCH',
  PASSENGER_DETAILS_REQUIRED = 'PASSENGER_DETAILS_REQUIRED',
  SEAT_NOT_IN_LAYOUT = 'SEAT_NOT_IN_LAYOUT',
  TRIP_CLOSED = 'TRIP_CLOSED',
  BOOKING_NOT_OWNED = 'BOOKING_NOT_OWNED',

  // =============================================================================
  // SEAT CONTENTION
  // =============================================================================
  ALREADY_HELD = 'ALREADY_HELD',
  ALREADY_BOOKED = 'ALREADY_BOOKED',

  // =============================================================================
  // NOT FOUND
  // =============================================================================
  NOT_FOUND = 'NOT_FOUND',
  HOLD_NOT_FOUND = 'HOLD_NOT_FOUND',
  HOLD_EXPIRED = 'HOLD_EXPIRED',
  TRIP_NOT_FOUND = 'TRIP_NOT_FOUND',
  SEAT_LAYOUT_NOT_FOUND = 'SEAT_LAYOUT_NOT_FOUND',
  BOOKING_NOT_FOUND = 'BOOKING_NOT_FOUND',

  // =============================================================================
  // LIFECYCLE STATE
  // =============================================================================
  BOOKING_INVALID_STATUS = 'BOOKING_INVALID_STATUS',
  HOLD_ALREADY_BOOKED = 'HOLD_ALREADY_BOOKED',

  // =============================================================================
  // SYSTEM & INFRASTRUCTURE
  // =============================================================================
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  DATABASE_UNAVAILABLE = 'DATABASE_UNAVAILABLE'
}

// =============================================================================
// TIMEOUTS
// =============================================================================

export const TIMEOUTS = {
  /** Debounce for JSON database writes */
  DB_SAVE_DEBOUNCE_MS: 100,
  /** Lock held by the sweep job so only one instance sweeps at a time */
  SWEEP_LOCK_TTL_SECONDS: 60,
  /** Graceful shutdown grace period */
  SHUTDOWN_GRACE_MS: 10_000
} as const;
