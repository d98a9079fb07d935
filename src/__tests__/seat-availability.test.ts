/**
 * Seat map, fare preview and seat selection
 */

import { ErrorCode, SeatStatus } from '../core/constants';
import { TripNotFoundError } from '../core/errors/AppError';
import { BARE_TRIP_ID, CLOSED_TRIP_ID, TRIP_ID, TestContext, confirmedBooking, createTestContext } from './fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('SeatAvailabilityService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext({ bookings: [confirmedBooking('booking-1', TRIP_ID, ['B1'])] });
  });

  afterEach(async () => {
    await ctx.client.disconnect();
  });

  describe('buildLayout', () => {
    it('classifies every configured seat in layout order', async () => {
      await ctx.lockManager.acquire(TRIP_ID, ['A1', 'A2'], 'holder-1');

      const result = await ctx.availability.buildLayout(TRIP_ID);

      expect(result.success).toBe(true);
      if (!result.success) return;
      const layout = result.data;
      expect(layout.tripId).toBe(TRIP_ID);
      expect(layout.busId).toBe('bus-test-1');
      expect(layout.rows).toBe(2);
      expect(layout.columns).toBe(4);
      expect(layout.price).toBe(850);
      expect(layout.seats.map(seat => `${seat.seatId}:${seat.status}`)).toEqual([
        'A1:held', 'A2:held', 'A3:available', 'A4:available',
        'B1:booked', 'B2:available', 'B3:available', 'B4:available'
      ]);
      expect(layout.seats[0]).toEqual({ seatId: 'A1', row: 1, column: 1, status: SeatStatus.HELD, price: 850 });
      expect(layout.counts).toEqual({ available: 5, held: 2, booked: 1 });
    });

    it('shows a booked seat as booked even while an index entry exists', async () => {
      await ctx.client.set('seatlock:trip-test-1:B1', 'stale-hold', 600);

      const result = await ctx.availability.buildLayout(TRIP_ID);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.seats.find(seat => seat.seatId === 'B1')?.status).toBe(SeatStatus.BOOKED);
      expect(result.data.counts.held).toBe(0);
    });

    it('returns TripNotFoundError for an unknown trip', async () => {
      const result = await ctx.availability.buildLayout('trip-missing');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(TripNotFoundError);
      expect(result.error.code).toBe(ErrorCode.TRIP_NOT_FOUND);
    });

    it('returns SEAT_LAYOUT_NOT_FOUND when the bus has no layout', async () => {
      const result = await ctx.availability.buildLayout(BARE_TRIP_ID);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.SEAT_LAYOUT_NOT_FOUND);
      expect(result.error.statusCode).toBe(404);
    });
  });

  describe('classify', () => {
    it('orders booked over held over available', async () => {
      await ctx.lockManager.acquire(TRIP_ID, ['A3'], 'holder-1');

      expect(await ctx.availability.classify(TRIP_ID, 'B1')).toBe(SeatStatus.BOOKED);
      expect(await ctx.availability.classify(TRIP_ID, 'A3')).toBe(SeatStatus.HELD);
      expect(await ctx.availability.classify(TRIP_ID, 'A4')).toBe(SeatStatus.AVAILABLE);
    });
  });

  describe('getFareSummary', () => {
    it('prices two seats with taxes and service fee', async () => {
      const result = await ctx.availability.getFareSummary(TRIP_ID, ['A1', 'A2']);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toEqual({
        seatCount: 2,
        pricePerSeat: 850,
        baseFare: 1700,
        taxes: 306,
        serviceFee: 85,
        totalAmount: 2091
      });
    });

    it('rejects duplicate seats', async () => {
      const result = await ctx.availability.getFareSummary(TRIP_ID, ['A1', 'A1']);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(result.error.message).toBe('Seat ids must be unique');
    });

    it('rejects an unknown trip', async () => {
      const result = await ctx.availability.getFareSummary('trip-missing', ['A1']);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(TripNotFoundError);
    });
  });

  describe('selectSeats', () => {
    it('holds seats on an open trip', async () => {
      const result = await ctx.availability.selectSeats(TRIP_ID, ['A1', 'A2'], 'holder-1');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.seatIds).toEqual(['A1', 'A2']);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(true);
    });

    it('rejects a closed trip with TRIP_CLOSED', async () => {
      const result = await ctx.availability.selectSeats(CLOSED_TRIP_ID, ['A1'], 'holder-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.TRIP_CLOSED);
      expect(result.error.message).toBe('This trip is no longer accepting bookings');
    });

    it('rejects seats that are not on the bus', async () => {
      const result = await ctx.availability.selectSeats(TRIP_ID, ['A1', 'Z9'], 'holder-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.SEAT_NOT_IN_LAYOUT);
      expect(result.error.message).toBe('Seats not on this bus: Z9');
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(false);
    });

    it('passes lock rejections through', async () => {
      const result = await ctx.availability.selectSeats(TRIP_ID, ['B1'], 'holder-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.ALREADY_BOOKED);
    });
  });
});
