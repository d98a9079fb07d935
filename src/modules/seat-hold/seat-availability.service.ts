/**
 * =============================================================================
 * SEAT AVAILABILITY SERVICE
 * =============================================================================
 *
 * Seat map for a trip: one classification per configured seat, combining
 * confirmed bookings (booking store) with live holds (SeatLockManager).
 *
 *   booked    - a confirmed booking on the trip lists the seat   (wins)
 *   held      - a live seat lock exists
 *   available - neither
 *
 * Also the entry point for seat selection: validates the request against the
 * trip and its layout before asking the lock manager for a hold.
 * =============================================================================
 */

import { ErrorCode, SeatStatus } from '../../core/constants';
import {
  NotFoundError,
  Outcome,
  TripNotFoundError,
  ValidationError,
  fail,
  ok
} from '../../core/errors/AppError';
import { SeatLayoutConfig, TripRecord } from '../../shared/database/db';
import { ConfirmedBookingReader, TripCatalog } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { FareBreakdown, PricingPolicy, calculateFare, defaultPricingPolicy } from '../../shared/utils/pricing.utils';
import { guardIo } from '../../shared/utils/unavailable.utils';
import { SeatLockManager } from './seat-lock.manager';
import { AcquireRejection, SeatHold, SeatLayoutView, SeatView } from './seat-hold.types';

type TripLookupRejection = TripNotFoundError | NotFoundError;

export class SeatAvailabilityService {
  constructor(
    private readonly lockManager: SeatLockManager,
    private readonly catalog: TripCatalog,
    private readonly bookings: ConfirmedBookingReader,
    private readonly pricing: PricingPolicy = defaultPricingPolicy
  ) { }

  /**
   * booked > held > available
   */
  async classify(tripId: string, seatId: string): Promise<SeatStatus> {
    if (await this.lockManager.isBooked(tripId, seatId)) return SeatStatus.BOOKED;
    if (await this.lockManager.isHeld(tripId, seatId)) return SeatStatus.HELD;
    return SeatStatus.AVAILABLE;
  }

  /**
   * Full seat map in seat-configuration order
   */
  async buildLayout(tripId: string): Promise<Outcome<SeatLayoutView, TripLookupRejection>> {
    const resolved = await this.resolveTrip(tripId);
    if (!resolved.success) return resolved;
    const { trip, layout } = resolved.data;

    const seatIds = layout.seats.map(seat => seat.id);
    const booked = await guardIo('database', 'getBookedSeatIds', () => this.bookings.getBookedSeatIds(tripId));
    const held = await this.lockManager.getHeldSeats(tripId, seatIds.filter(id => !booked.has(id)));

    const counts: Record<SeatStatus, number> = {
      [SeatStatus.AVAILABLE]: 0,
      [SeatStatus.HELD]: 0,
      [SeatStatus.BOOKED]: 0
    };

    const seats: SeatView[] = layout.seats.map(seat => {
      const status = booked.has(seat.id)
        ? SeatStatus.BOOKED
        : held.has(seat.id) ? SeatStatus.HELD : SeatStatus.AVAILABLE;
      counts[status]++;
      return { seatId: seat.id, row: seat.row, column: seat.column, status, price: trip.price };
    });

    return ok({
      tripId,
      busId: trip.busId,
      rows: layout.rows,
      columns: layout.columns,
      price: trip.price,
      seats,
      counts
    });
  }

  /**
   * Price preview for a seat selection (same policy as booking)
   */
  async getFareSummary(tripId: string, seatIds: string[]): Promise<Outcome<FareBreakdown, TripNotFoundError | ValidationError>> {
    if (seatIds.length === 0) {
      return fail(new ValidationError('Select at least one seat', [{ field: 'seatIds', message: 'Select at least one seat' }]));
    }
    if (new Set(seatIds).size !== seatIds.length) {
      return fail(new ValidationError('Seat ids must be unique', [{ field: 'seatIds', message: 'Seat ids must be unique' }]));
    }

    const trip = await guardIo('database', 'getTrip', () => this.catalog.getTrip(tripId));
    if (!trip) return fail(new TripNotFoundError(tripId));

    return ok(calculateFare(trip.price, seatIds.length, this.pricing));
  }

  /**
   * Check the selection against the trip, then hold the seats
   */
  async selectSeats(
    tripId: string,
    seatIds: string[],
    holderId: string
  ): Promise<Outcome<SeatHold, AcquireRejection | TripLookupRejection>> {
    const resolved = await this.resolveTrip(tripId);
    if (!resolved.success) return resolved;
    const { trip, layout } = resolved.data;

    if (!trip.isOpen) {
      return fail(new ValidationError(
        'This trip is no longer accepting bookings',
        [{ field: 'tripId', message: 'Trip is closed' }],
        ErrorCode.TRIP_CLOSED
      ));
    }

    const known = new Set(layout.seats.map(seat => seat.id));
    const unknown = seatIds.filter(seatId => !known.has(seatId));
    if (unknown.length > 0) {
      return fail(new ValidationError(
        `Seats not on this bus: ${unknown.join(', ')}`,
        unknown.map(seatId => ({ field: 'seatIds', message: `Unknown seat ${seatId}` })),
        ErrorCode.SEAT_NOT_IN_LAYOUT
      ));
    }

    return this.lockManager.acquire(tripId, seatIds, holderId);
  }

  private async resolveTrip(
    tripId: string
  ): Promise<Outcome<{ trip: TripRecord; layout: SeatLayoutConfig }, TripLookupRejection>> {
    const trip = await guardIo('database', 'getTrip', () => this.catalog.getTrip(tripId));
    if (!trip) return fail(new TripNotFoundError(tripId));

    const layout = await guardIo('database', 'getSeatConfig', () => this.catalog.getSeatConfig(trip.busId));
    if (!layout || layout.seats.length === 0) {
      logger.warn(`[SeatAvailability] Bus ${trip.busId} of trip ${tripId} has no seat layout`);
      return fail(new NotFoundError(
        `Seat layout not configured for trip ${tripId}`,
        ErrorCode.SEAT_LAYOUT_NOT_FOUND,
        { tripId, busId: trip.busId }
      ));
    }

    return ok({ trip, layout });
  }
}
