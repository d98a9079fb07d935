/**
 * =============================================================================
 * BOOKING MODULE - SERVICE
 * =============================================================================
 *
 * Converts a live seat hold into a durable booking, and releases the hold
 * when the purchase resolves.
 *
 * STATE MACHINE:
 * ──────────────
 *   HOLD ACTIVE ──createBooking──> PENDING ──confirm──> CONFIRMED  (hold released)
 *                                          ──fail─────> FAILED     (hold released)
 *                                          ──confirm──> FAILED     (seats sold after the hold lapsed)
 *                                          ──cancel───> CANCELLED  (hold released)
 *   CONFIRMED ──cancel──> CANCELLED  (no hold left; seats freed by the refund path)
 *
 * RULES:
 * ──────
 * - createBooking never releases the hold. It must stay active while
 *   payment is in flight, or someone else could take the seats.
 * - A hold backs at most one pending or confirmed booking.
 * - confirm writes CONFIRMED first and releases second. A crash in
 *   between leaves the seats over-held until the TTL, never double-sold.
 * - confirm refuses seats another booking confirmed after this booking's
 *   hold lapsed; the booking moves to FAILED instead.
 * - Every transition is a conditional write on the current status, so a
 *   duplicate confirm is rejected with a StateError.
 * - A rejection never creates a booking and never touches the hold.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import {
  BOOKING_STATUS_TRANSITIONS,
  BookingStatus,
  ErrorCode,
  PNR
} from '../../core/constants';
import {
  BookingNotFoundError,
  HoldAlreadyBookedError,
  HoldExpiredError,
  InternalError,
  InvalidBookingStatusError,
  Outcome,
  SeatAlreadyBookedError,
  TripNotFoundError,
  UnavailableError,
  ValidationError,
  ValidationErrorDetail,
  fail,
  ok
} from '../../core/errors/AppError';
import { BookingRecord, PassengerRecord } from '../../shared/database/db';
import {
  BookingStatusUpdates,
  BookingStore,
  TripCatalog
} from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { generatePnr, maskForLogging } from '../../shared/utils/crypto.utils';
import { PricingPolicy, calculateFare, defaultPricingPolicy } from '../../shared/utils/pricing.utils';
import { guardIo } from '../../shared/utils/unavailable.utils';
import { SeatLockManager } from '../seat-hold/seat-lock.manager';
import {
  CancelResult,
  ConfirmRejection,
  CreateBookingRejection,
  CreateBookingRequest,
  PassengerInput,
  TransitionRejection
} from './booking.types';

/**
 * Statuses from which `to` may be reached
 */
function allowedFrom(to: BookingStatus): BookingStatus[] {
  return Object.values(BookingStatus).filter(status => BOOKING_STATUS_TRANSITIONS[status].includes(to));
}

function mismatch(message: string, field: string): ValidationError {
  return new ValidationError(message, [{ field, message }], ErrorCode.HOLD_MISMATCH);
}

export class BookingService {
  constructor(
    private readonly lockManager: SeatLockManager,
    private readonly catalog: TripCatalog,
    private readonly bookings: BookingStore,
    private readonly pricing: PricingPolicy = defaultPricingPolicy
  ) { }

  // ===========================================================================
  // CREATE (hold -> pending booking)
  // ===========================================================================

  async createBooking(request: CreateBookingRequest): Promise<Outcome<BookingRecord, CreateBookingRejection>> {
    const { holdId, tripId, seatIds, passengers, holderId } = request;

    if (seatIds.length === 0 || new Set(seatIds).size !== seatIds.length) {
      return fail(new ValidationError(
        'Seat ids must be a non-empty list of distinct seats',
        [{ field: 'seatIds', message: 'Seat ids must be a non-empty list of distinct seats' }],
        ErrorCode.INVALID_REQUEST
      ));
    }

    // 1. Hold must be live and match what the client thinks it holds
    const hold = await this.lockManager.getHold(holdId);
    if (!hold) {
      logger.info(`[Booking] Hold ${holdId} expired or unknown, booking rejected`);
      return fail(new HoldExpiredError(holdId));
    }
    if (hold.tripId !== tripId) {
      return fail(mismatch(`Hold ${holdId} is for a different trip`, 'tripId'));
    }
    const uncovered = seatIds.filter(seatId => !hold.seatIds.includes(seatId));
    if (uncovered.length > 0) {
      return fail(mismatch(`Seats not covered by hold: ${uncovered.join(', ')}`, 'seatIds'));
    }
    if (holderId !== undefined && hold.holderId !== holderId) {
      return fail(mismatch(`Hold ${holdId} belongs to another holder`, 'holderId'));
    }

    // 2. One complete passenger per seat
    if (passengers.length !== seatIds.length) {
      const message = `Passenger count (${passengers.length}) must equal seat count (${seatIds.length})`;
      return fail(new ValidationError(message, [{ field: 'passengers', message }], ErrorCode.PASSENGER_COUNT_MISMATCH));
    }
    const missing = this.missingPassengerDetails(passengers);
    if (missing.length > 0) {
      return fail(new ValidationError(
        'Every passenger needs a name, phone and email',
        missing,
        ErrorCode.PASSENGER_DETAILS_REQUIRED
      ));
    }

    // 3. Price
    const trip = await guardIo('database', 'getTrip', () => this.catalog.getTrip(tripId));
    if (!trip) {
      return fail(new TripNotFoundError(tripId));
    }
    const fare = calculateFare(trip.price, seatIds.length, this.pricing);

    // 4. Persist PENDING, recording the hold it came from
    const pnr = await this.generateUniquePnr();
    const passengerRecords: PassengerRecord[] = passengers.map((passenger, index) => ({
      seatId: seatIds[index],
      name: passenger.name.trim(),
      phone: passenger.phone.trim(),
      email: passenger.email.trim(),
      ...(passenger.age !== undefined && { age: passenger.age }),
      ...(passenger.gender !== undefined && { gender: passenger.gender })
    }));

    const booking = await guardIo('database', 'insertBooking', () => this.bookings.insertBooking({
      id: uuidv4(),
      pnr,
      tripId,
      holderId: hold.holderId,
      holdId,
      seatIds: [...seatIds],
      passengers: passengerRecords,
      baseFare: fare.baseFare,
      taxes: fare.taxes,
      serviceFee: fare.serviceFee,
      totalAmount: fare.totalAmount,
      status: BookingStatus.PENDING
    }));
    if (!booking) {
      logger.warn(`[Booking] Hold ${holdId} already has a live booking, second booking rejected`);
      return fail(new HoldAlreadyBookedError(holdId));
    }

    logger.info(`[Booking] 📝 ${booking.id} (${pnr}) pending on ${tripId} [${seatIds.join(', ')}], total ${fare.totalAmount}`);
    return ok(booking);
  }

  private missingPassengerDetails(passengers: PassengerInput[]): ValidationErrorDetail[] {
    const details: ValidationErrorDetail[] = [];
    passengers.forEach((passenger, index) => {
      for (const field of ['name', 'phone', 'email'] as const) {
        if (passenger[field].trim() === '') {
          details.push({ field: `passengers.${index}.${field}`, message: `Passenger ${field} is required` });
        }
      }
    });
    return details;
  }

  private async generateUniquePnr(): Promise<string> {
    for (let attempt = 0; attempt < PNR.MAX_ATTEMPTS; attempt++) {
      const pnr = generatePnr();
      if (!(await guardIo('database', 'pnrExists', () => this.bookings.pnrExists(pnr)))) {
        return pnr;
      }
    }
    throw new InternalError(`Could not generate a unique PNR after ${PNR.MAX_ATTEMPTS} attempts`);
  }

  // ===========================================================================
  // TRANSITIONS
  // ===========================================================================

  /**
   * Payment succeeded. Status is written before the hold is released.
   */
  async confirm(bookingId: string, paymentReference: string): Promise<Outcome<BookingRecord, ConfirmRejection>> {
    if (paymentReference.trim() === '') {
      return fail(new ValidationError(
        'Payment reference is required',
        [{ field: 'paymentReference', message: 'Payment reference is required' }]
      ));
    }

    const loaded = await this.loadForTransition(bookingId, BookingStatus.CONFIRMED, 'confirm');
    if (!loaded.success) return loaded;
    const existing = loaded.data;

    const write = await guardIo('database', 'confirmIfSeatsFree', () =>
      this.bookings.confirmIfSeatsFree(bookingId, [existing.status], {
        paymentReference: paymentReference.trim(),
        confirmedAt: new Date().toISOString()
      })
    );
    if (write.status === 'stale') {
      return this.lostRace(bookingId, existing.status, 'confirm');
    }
    if (write.status === 'seats_taken') {
      return this.rejectOversold(existing, write.seatIds);
    }

    const booking = write.booking;
    await this.releaseHoldOf(booking);

    logger.info(`[Booking] ✅ ${booking.id} confirmed (payment ${maskForLogging(paymentReference)})`);
    return ok(booking);
  }

  /**
   * The hold lapsed while payment was in flight and another booking was
   * confirmed on some of the seats. This booking fails rather than double-sell.
   */
  private async rejectOversold(
    booking: BookingRecord,
    takenSeatIds: string[]
  ): Promise<{ success: false; error: SeatAlreadyBookedError }> {
    logger.warn(`[Booking] ⚠️ ${booking.id} not confirmed, seats already sold: [${takenSeatIds.join(', ')}]`);

    const failed = await this.transition(booking.id, BookingStatus.FAILED, 'fail', {
      failureReason: `Seats already sold: ${takenSeatIds.join(', ')}`,
      failedAt: new Date().toISOString()
    });
    if (failed.success) {
      await this.releaseHoldOf(failed.data.booking);
    } else {
      logger.warn(`[Booking] Could not mark ${booking.id} as failed: ${failed.error.message}`);
    }

    return fail(new SeatAlreadyBookedError(booking.tripId, takenSeatIds[0]));
  }

  /**
   * Payment failed. The seats go back to the pool.
   */
  async fail(bookingId: string, reason?: string): Promise<Outcome<BookingRecord, TransitionRejection>> {
    const result = await this.transition(bookingId, BookingStatus.FAILED, 'fail', {
      failureReason: reason ?? 'Payment failed',
      failedAt: new Date().toISOString()
    });
    if (!result.success) return result;

    const booking = result.data.booking;
    await this.releaseHoldOf(booking);

    logger.info(`[Booking] ❌ ${booking.id} failed: ${booking.failureReason}`);
    return ok(booking);
  }

  /**
   * Holder cancels. The hold is released only when the booking was still
   * pending; a confirmed booking has no hold left.
   */
  async cancel(bookingId: string, holderId?: string, reason?: string): Promise<Outcome<CancelResult, TransitionRejection>> {
    const result = await this.transition(bookingId, BookingStatus.CANCELLED, 'cancel', {
      cancellationReason: reason ?? 'Cancelled by holder',
      cancelledAt: new Date().toISOString()
    }, holderId);
    if (!result.success) return result;

    const { booking, previousStatus } = result.data;
    const holdReleased = previousStatus === BookingStatus.PENDING
      ? await this.releaseHoldOf(booking)
      : false;

    logger.info(`[Booking] 🚫 ${booking.id} cancelled (was ${previousStatus})`);
    return ok({ booking, holdReleased });
  }

  /**
   * Conditional status change from the booking's current status
   */
  private async transition(
    bookingId: string,
    to: BookingStatus,
    action: string,
    updates: BookingStatusUpdates,
    holderId?: string
  ): Promise<Outcome<{ booking: BookingRecord; previousStatus: BookingStatus }, TransitionRejection>> {
    const loaded = await this.loadForTransition(bookingId, to, action, holderId);
    if (!loaded.success) return loaded;
    const existing = loaded.data;

    const updated = await guardIo('database', 'transitionStatus', () =>
      this.bookings.transitionStatus(bookingId, [existing.status], to, updates)
    );
    if (!updated) {
      return this.lostRace(bookingId, existing.status, action);
    }

    return ok({ booking: updated, previousStatus: existing.status });
  }

  /**
   * Booking exists, belongs to `holderId` when given, and may move to `to`
   */
  private async loadForTransition(
    bookingId: string,
    to: BookingStatus,
    action: string,
    holderId?: string
  ): Promise<Outcome<BookingRecord, TransitionRejection>> {
    const existing = await guardIo('database', 'getBookingById', () => this.bookings.getBookingById(bookingId));
    if (!existing) {
      return fail(new BookingNotFoundError(bookingId));
    }
    if (holderId !== undefined && existing.holderId !== holderId) {
      return fail(new ValidationError(
        'Booking belongs to another holder',
        [{ field: 'holderId', message: 'Booking belongs to another holder' }],
        ErrorCode.BOOKING_NOT_OWNED
      ));
    }
    if (!allowedFrom(to).includes(existing.status)) {
      return fail(new InvalidBookingStatusError(existing.status, action));
    }
    return ok(existing);
  }

  /**
   * Another transition of the same booking won the conditional write
   */
  private async lostRace(
    bookingId: string,
    lastSeen: BookingStatus,
    action: string
  ): Promise<{ success: false; error: InvalidBookingStatusError }> {
    const current = await guardIo('database', 'getBookingById', () => this.bookings.getBookingById(bookingId));
    return fail(new InvalidBookingStatusError(current?.status ?? lastSeen, action));
  }

  /**
   * Release the booking's hold. The booking is already durable at this
   * point, so a missing hold or a store outage is logged, not returned:
   * the hold lapses by TTL either way.
   */
  private async releaseHoldOf(booking: BookingRecord): Promise<boolean> {
    try {
      const released = await this.lockManager.release(booking.holdId);
      if (!released.success) {
        logger.info(`[Booking] Hold ${booking.holdId} of ${booking.id} already gone`);
        return false;
      }
      return true;
    } catch (error: unknown) {
      if (error instanceof UnavailableError) {
        logger.error(`[Booking] Could not release hold ${booking.holdId} of ${booking.id}, it will expire by TTL`, {
          code: error.code
        });
        return false;
      }
      throw error;
    }
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  async getBooking(bookingId: string): Promise<Outcome<BookingRecord, BookingNotFoundError>> {
    const booking = await guardIo('database', 'getBookingById', () => this.bookings.getBookingById(bookingId));
    return booking ? ok(booking) : fail(new BookingNotFoundError(bookingId));
  }

  async getBookingByPnr(pnr: string): Promise<Outcome<BookingRecord, BookingNotFoundError>> {
    const normalized = pnr.trim().toUpperCase();
    const booking = await guardIo('database', 'getBookingByPnr', () => this.bookings.getBookingByPnr(normalized));
    return booking ? ok(booking) : fail(new BookingNotFoundError(normalized));
  }

  /**
   * All bookings of a holder, newest first
   */
  async getHolderBookings(holderId: string): Promise<BookingRecord[]> {
    return guardIo('database', 'getBookingsByHolder', () => this.bookings.getBookingsByHolder(holderId));
  }
}
