/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * Contracts the seat hold and booking services consume. The JSON
 * DatabaseService implements them today; a relational implementation can
 * replace it without touching business logic.
 *
 * All methods are async: every call is an I/O round trip from the caller's
 * point of view, and a failure here is a store outage, not "no data".
 * =============================================================================
 */

import { BookingStatus } from '../../core/constants';
import {
  BookingRecord,
  SeatLayoutConfig,
  TripRecord
} from './db';

/**
 * Fields written alongside a status change
 */
export type BookingStatusUpdates = Partial<Pick<BookingRecord,
  'paymentReference' | 'cancellationReason' | 'failureReason' | 'confirmedAt' | 'cancelledAt' | 'failedAt'>>;

/**
 * Result of a conditional confirm
 * - confirmed: the booking is now CONFIRMED
 * - seats_taken: another confirmed booking already lists some of its seats
 * - stale: missing, or no longer in one of the expected statuses
 */
export type ConfirmWrite =
  | { status: 'confirmed'; booking: BookingRecord }
  | { status: 'seats_taken'; seatIds: string[] }
  | { status: 'stale' };

/**
 * Trip / bus read API
 */
export interface TripCatalog {
  getTrip(tripId: string): Promise<TripRecord | null>;
  getSeatConfig(busId: string): Promise<SeatLayoutConfig | null>;
}

/**
 * Confirmed-booking read API (what makes a seat "booked")
 */
export interface ConfirmedBookingReader {
  /** Confirmed bookings for the trip; each lists its seats */
  findConfirmedBookingsByTrip(tripId: string): Promise<Array<Pick<BookingRecord, 'id' | 'seatIds'>>>;

  /** Batch form: every seat of every confirmed booking for the trip */
  getBookedSeatIds(tripId: string): Promise<Set<string>>;
}

/**
 * Booking read/write API
 */
export interface BookingStore extends ConfirmedBookingReader {
  /** Null when a pending or confirmed booking already came from the same hold */
  insertBooking(booking: Omit<BookingRecord, 'createdAt' | 'updatedAt'>): Promise<BookingRecord | null>;

  /** Conditional status change; null when missing or not currently in `from` */
  transitionStatus(
    id: string,
    from: BookingStatus[],
    status: BookingStatus,
    updates?: BookingStatusUpdates
  ): Promise<BookingRecord | null>;

  /** CONFIRMED only while no other confirmed booking on the trip lists any of its seats */
  confirmIfSeatsFree(id: string, from: BookingStatus[], updates: BookingStatusUpdates): Promise<ConfirmWrite>;

  getBookingById(id: string): Promise<BookingRecord | null>;
  getBookingByPnr(pnr: string): Promise<BookingRecord | null>;
  getBookingsByHolder(holderId: string): Promise<BookingRecord[]>;
  pnrExists(pnr: string): Promise<boolean>;
}
