/**
 * =============================================================================
 * SEAT LOCK MANAGER - Tests
 * =============================================================================
 *
 * Exclusivity, expiry, release, extend and store failures, against the
 * in-memory store with a frozen clock.
 * =============================================================================
 */

import { BookingStatus, ErrorCode } from '../core/constants';
import {
  HoldNotFoundError,
  SeatAlreadyBookedError,
  SeatAlreadyHeldError,
  UnavailableError,
  ValidationError
} from '../core/errors/AppError';
import { SeatHold } from '../modules/seat-hold/seat-hold.types';
import { TRIP_ID, TestContext, confirmedBooking, createTestContext } from './fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const T0 = new Date('2026-03-01T10:00:00.000Z');
const MINUTE = 60 * 1000;

function advanceTo(msFromStart: number): void {
  jest.setSystemTime(new Date(T0.getTime() + msFromStart));
}

function seatKey(seatId: string, tripId: string = TRIP_ID): string {
  return `seatlock:${tripId}:${seatId}`;
}

async function mustAcquire(ctx: TestContext, seatIds: string[], holderId = 'holder-1'): Promise<SeatHold> {
  const result = await ctx.lockManager.acquire(TRIP_ID, seatIds, holderId);
  if (!result.success) {
    throw new Error(`acquire failed: ${result.error.code}`);
  }
  return result.data;
}

describe('SeatLockManager', () => {
  let ctx: TestContext;

  beforeEach(() => {
    jest.useFakeTimers({ now: T0, doNotFake: ['nextTick', 'queueMicrotask', 'setImmediate'] });
    ctx = createTestContext();
  });

  afterEach(async () => {
    await ctx.client.disconnect();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  // ===========================================================================
  // ACQUIRE
  // ===========================================================================

  describe('acquire', () => {
    it('creates a hold expiring after the configured TTL', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);

      expect(hold.tripId).toBe(TRIP_ID);
      expect(hold.seatIds).toEqual(['A1', 'A2']);
      expect(hold.holderId).toBe('holder-1');
      expect(hold.createdAt.toISOString()).toBe('2026-03-01T10:00:00.000Z');
      expect(hold.expiresAt.toISOString()).toBe('2026-03-01T10:10:00.000Z');
    });

    it('writes the hold record and one index entry per seat with the same TTL', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);

      expect(await ctx.client.get(seatKey('A1'))).toBe(hold.holdId);
      expect(await ctx.client.get(seatKey('A2'))).toBe(hold.holdId);
      expect(await ctx.client.ttl(`hold:${hold.holdId}`)).toBe(600);
      expect(await ctx.client.ttl(seatKey('A1'))).toBe(600);
      expect(await ctx.client.ttl(seatKey('A2'))).toBe(600);
    });

    it('rejects an overlapping selection with ALREADY_HELD and takes none of its seats', async () => {
      await mustAcquire(ctx, ['A1', 'A2'], 'holder-1');

      const result = await ctx.lockManager.acquire(TRIP_ID, ['A3', 'A2'], 'holder-2');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(SeatAlreadyHeldError);
      expect(result.error.code).toBe(ErrorCode.ALREADY_HELD);
      expect(result.error.statusCode).toBe(409);
      expect(result.error.details).toEqual({ tripId: TRIP_ID, seatId: 'A2' });
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A3')).toBe(false);
    });

    it('rejects a confirmed-booked seat with ALREADY_BOOKED', async () => {
      ctx = createTestContext({ bookings: [confirmedBooking('booking-1', TRIP_ID, ['B1'])] });

      const result = await ctx.lockManager.acquire(TRIP_ID, ['B2', 'B1'], 'holder-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(SeatAlreadyBookedError);
      expect(result.error.code).toBe(ErrorCode.ALREADY_BOOKED);
      expect(result.error.details).toEqual({ tripId: TRIP_ID, seatId: 'B1' });
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'B2')).toBe(false);
    });

    it('reports ALREADY_BOOKED when a seat is both booked and held', async () => {
      ctx = createTestContext({ bookings: [confirmedBooking('booking-1', TRIP_ID, ['B1'])] });
      await ctx.client.set(seatKey('B1'), 'stale-hold', 600);

      const result = await ctx.lockManager.acquire(TRIP_ID, ['B1'], 'holder-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.ALREADY_BOOKED);
    });

    it('holds the same seat number on different trips independently', async () => {
      await mustAcquire(ctx, ['A1']);
      const other = await ctx.lockManager.acquire('trip-other', ['A1'], 'holder-2');

      expect(other.success).toBe(true);
    });

    it.each([
      [{ tripId: TRIP_ID, seatIds: [], holderId: 'holder-1' }, 'At least one seat must be selected'],
      [{ tripId: TRIP_ID, seatIds: ['A1', 'A1'], holderId: 'holder-1' }, 'Seat ids must be unique'],
      [{ tripId: TRIP_ID, seatIds: ['A1', ' '], holderId: 'holder-1' }, 'Seat ids must not be empty'],
      [{ tripId: TRIP_ID, seatIds: ['A1'], holderId: '' }, 'Holder id is required'],
      [{ tripId: '', seatIds: ['A1'], holderId: 'holder-1' }, 'Trip id is required'],
      [
        { tripId: TRIP_ID, seatIds: ['A1', 'A2', 'A3', 'A4', 'B1', 'B2', 'B3'], holderId: 'holder-1' },
        'At most 6 seats can be held at once'
      ]
    ])('rejects invalid input %#', async (input, message) => {
      const result = await ctx.lockManager.acquire(input.tripId, input.seatIds, input.holderId);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.code).toBe(ErrorCode.INVALID_REQUEST);
      expect(result.error.message).toBe(message);
    });

    it('rolls back when a seat is taken between the read and write phases', async () => {
      // Read phase sees nothing held; the write phase then loses A2
      jest.spyOn(ctx.lockManager, 'isHeld').mockResolvedValue(false);
      await ctx.client.set(seatKey('A2'), 'concurrent-hold', 600);

      const result = await ctx.lockManager.acquire(TRIP_ID, ['A1', 'A2', 'A3'], 'holder-1');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.ALREADY_HELD);
      expect(result.error.details).toEqual({ tripId: TRIP_ID, seatId: 'A2' });
      expect(await ctx.client.get(seatKey('A1'))).toBeNull();
      expect(await ctx.client.get(seatKey('A2'))).toBe('concurrent-hold');
      expect(await ctx.client.get(seatKey('A3'))).toBeNull();

      const holdKeys: string[] = [];
      for await (const key of ctx.client.scanIterator('hold:*')) holdKeys.push(key);
      expect(holdKeys).toEqual([]);
    });

    it('never lets concurrent acquires share a seat', async () => {
      const results = await Promise.all([
        ctx.lockManager.acquire(TRIP_ID, ['A1', 'A2'], 'holder-1'),
        ctx.lockManager.acquire(TRIP_ID, ['A2', 'A3'], 'holder-2'),
        ctx.lockManager.acquire(TRIP_ID, ['A3', 'A1'], 'holder-3')
      ]);

      const winners: SeatHold[] = [];
      for (const result of results) {
        if (result.success) winners.push(result.data);
      }
      const claimed = winners.flatMap(hold => hold.seatIds);
      expect(new Set(claimed).size).toBe(claimed.length);

      for (const seatId of ['A1', 'A2', 'A3']) {
        const owner = await ctx.client.get(seatKey(seatId));
        const winner = winners.find(hold => hold.seatIds.includes(seatId));
        expect(owner).toBe(winner ? winner.holdId : null);
      }
    });
  });

  // ===========================================================================
  // EXPIRY
  // ===========================================================================

  describe('expiry', () => {
    it('keeps the hold until its expiry instant and frees the seats at it', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);

      advanceTo(10 * MINUTE - 1);
      expect(await ctx.lockManager.isValid(hold.holdId)).toBe(true);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(true);

      advanceTo(10 * MINUTE);
      expect(await ctx.lockManager.getHold(hold.holdId)).toBeNull();
      expect(await ctx.lockManager.isValid(hold.holdId)).toBe(false);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(false);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A2')).toBe(false);
    });

    it('lets another holder take expired seats', async () => {
      await mustAcquire(ctx, ['A1', 'A2'], 'holder-1');

      advanceTo(10 * MINUTE);
      const second = await ctx.lockManager.acquire(TRIP_ID, ['A2', 'A3'], 'holder-2');

      expect(second.success).toBe(true);
    });

    it('treats a record past its stored expiry as absent', async () => {
      await ctx.client.set('hold:hold-late', JSON.stringify({
        holdId: 'hold-late',
        tripId: TRIP_ID,
        seatIds: ['B1'],
        holderId: 'holder-1',
        createdAt: '2026-03-01T09:40:00.000Z',
        expiresAt: '2026-03-01T09:50:00.000Z'
      }), 60);

      expect(await ctx.lockManager.getHold('hold-late')).toBeNull();
    });

    it('treats an unreadable record as absent', async () => {
      await ctx.client.set('hold:hold-bad', 'not json', 60);
      await ctx.client.set('hold:hold-shape', JSON.stringify({ holdId: 'hold-shape' }), 60);

      expect(await ctx.lockManager.getHold('hold-bad')).toBeNull();
      expect(await ctx.lockManager.getHold('hold-shape')).toBeNull();
    });
  });

  // ===========================================================================
  // RELEASE
  // ===========================================================================

  describe('release', () => {
    it('frees every seat of the hold immediately', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);

      const result = await ctx.lockManager.release(hold.holdId);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.seatIds).toEqual(['A1', 'A2']);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(false);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A2')).toBe(false);
      expect(await ctx.lockManager.getHold(hold.holdId)).toBeNull();
    });

    it('returns HoldNotFoundError on a second release', async () => {
      const hold = await mustAcquire(ctx, ['A1']);
      await ctx.lockManager.release(hold.holdId);

      const again = await ctx.lockManager.release(hold.holdId);

      expect(again.success).toBe(false);
      if (again.success) return;
      expect(again.error).toBeInstanceOf(HoldNotFoundError);
      expect(again.error.code).toBe(ErrorCode.HOLD_NOT_FOUND);
    });

    it('returns HoldNotFoundError for an expired hold', async () => {
      const hold = await mustAcquire(ctx, ['A1']);
      advanceTo(11 * MINUTE);

      const result = await ctx.lockManager.release(hold.holdId);

      expect(result.success).toBe(false);
    });

    it('leaves index entries that now point at another hold', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);
      await ctx.client.set(seatKey('A2'), 'newer-hold', 600);

      await ctx.lockManager.release(hold.holdId);

      expect(await ctx.client.get(seatKey('A1'))).toBeNull();
      expect(await ctx.client.get(seatKey('A2'))).toBe('newer-hold');
    });
  });

  // ===========================================================================
  // EXTEND
  // ===========================================================================

  describe('extend', () => {
    it('moves expiry forward and re-arms every key from now', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);
      advanceTo(5 * MINUTE);

      const result = await ctx.lockManager.extend(hold.holdId, 5);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.expiresAt.toISOString()).toBe('2026-03-01T10:15:00.000Z');
      expect(await ctx.client.ttl(`hold:${hold.holdId}`)).toBe(600);
      expect(await ctx.client.ttl(seatKey('A1'))).toBe(600);
      expect(await ctx.client.ttl(seatKey('A2'))).toBe(600);

      advanceTo(14 * MINUTE);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(true);
      expect((await ctx.lockManager.getHold(hold.holdId))?.expiresAt.toISOString()).toBe('2026-03-01T10:15:00.000Z');

      advanceTo(15 * MINUTE);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(false);
      expect(await ctx.lockManager.isValid(hold.holdId)).toBe(false);
    });

    it('restores a missing index entry', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);
      await ctx.client.del(seatKey('A2'));

      await ctx.lockManager.extend(hold.holdId, 2);

      expect(await ctx.client.get(seatKey('A2'))).toBe(hold.holdId);
      expect(await ctx.client.ttl(seatKey('A2'))).toBe(720);
    });

    it('does not take over an entry owned by another hold', async () => {
      const hold = await mustAcquire(ctx, ['A1', 'A2']);
      await ctx.client.set(seatKey('A2'), 'other-hold', 30);

      const result = await ctx.lockManager.extend(hold.holdId, 2);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.seatIds).toEqual(['A1']);
      expect((await ctx.lockManager.getHold(hold.holdId))?.seatIds).toEqual(['A1']);
      expect(await ctx.client.get(seatKey('A2'))).toBe('other-hold');
      expect(await ctx.client.ttl(seatKey('A2'))).toBe(30);
    });

    it('returns HoldNotFoundError when every entry is owned by another hold', async () => {
      const hold = await mustAcquire(ctx, ['A1']);
      await ctx.client.set(seatKey('A1'), 'other-hold', 30);

      const result = await ctx.lockManager.extend(hold.holdId, 2);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(HoldNotFoundError);
      expect(await ctx.client.get(`hold:${hold.holdId}`)).toBeNull();
      expect(await ctx.client.get(seatKey('A1'))).toBe('other-hold');
    });

    it('returns HoldNotFoundError for an expired hold', async () => {
      const hold = await mustAcquire(ctx, ['A1']);
      advanceTo(10 * MINUTE);

      const result = await ctx.lockManager.extend(hold.holdId, 5);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(HoldNotFoundError);
      expect(await ctx.lockManager.isHeld(TRIP_ID, 'A1')).toBe(false);
    });

    it.each([
      [0, 'Extension must be a positive whole number of minutes'],
      [-3, 'Extension must be a positive whole number of minutes'],
      [1.5, 'Extension must be a positive whole number of minutes'],
      [11, 'Extension cannot exceed 10 minutes']
    ])('rejects an extension of %p minutes', async (minutes, message) => {
      const hold = await mustAcquire(ctx, ['A1']);

      const result = await ctx.lockManager.extend(hold.holdId, minutes);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe(message);
      expect((await ctx.lockManager.getHold(hold.holdId))?.expiresAt.toISOString()).toBe('2026-03-01T10:10:00.000Z');
    });
  });

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  describe('queries', () => {
    it('getHeldSeats returns only the seats with live entries', async () => {
      await mustAcquire(ctx, ['A1', 'B3']);

      const held = await ctx.lockManager.getHeldSeats(TRIP_ID, ['A1', 'A2', 'B3', 'B4']);

      expect([...held].sort()).toEqual(['A1', 'B3']);
    });

    it('isBooked reads confirmed bookings only', async () => {
      ctx = createTestContext({
        bookings: [
          confirmedBooking('booking-1', TRIP_ID, ['B1']),
          { ...confirmedBooking('booking-2', TRIP_ID, ['B2'], 'SEEDPNR002'), status: BookingStatus.PENDING }
        ]
      });

      expect(await ctx.lockManager.isBooked(TRIP_ID, 'B1')).toBe(true);
      expect(await ctx.lockManager.isBooked(TRIP_ID, 'B2')).toBe(false);
    });
  });

  // ===========================================================================
  // STORE FAILURES
  // ===========================================================================

  describe('store failures', () => {
    it('surfaces an unreachable store as UnavailableError, not as "not held"', async () => {
      jest.spyOn(ctx.client, 'exists').mockRejectedValue(new Error('connect ECONNREFUSED'));

      const error = await ctx.lockManager.isHeld(TRIP_ID, 'A1').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(UnavailableError);
      if (!(error instanceof UnavailableError)) return;
      expect(error.code).toBe(ErrorCode.STORE_UNAVAILABLE);
      expect(error.statusCode).toBe(503);
    });

    it('fails acquire with UnavailableError when the store is down', async () => {
      jest.spyOn(ctx.client, 'exists').mockRejectedValue(new Error('connect ECONNREFUSED'));

      await expect(ctx.lockManager.acquire(TRIP_ID, ['A1'], 'holder-1')).rejects.toBeInstanceOf(UnavailableError);
    });

    it('fails getHold with UnavailableError when the store is down', async () => {
      jest.spyOn(ctx.client, 'get').mockRejectedValue(new Error('socket closed'));

      await expect(ctx.lockManager.getHold('hold-1')).rejects.toBeInstanceOf(UnavailableError);
    });

    it('rolls back the written entries when a write fails mid-acquire', async () => {
      const realSetIfAbsent = ctx.client.setIfAbsent.bind(ctx.client);
      jest.spyOn(ctx.client, 'setIfAbsent').mockImplementation(async (key, value, ttl) => {
        if (key === seatKey('A2')) throw new Error('socket closed');
        return realSetIfAbsent(key, value, ttl);
      });

      await expect(ctx.lockManager.acquire(TRIP_ID, ['A1', 'A2'], 'holder-1')).rejects.toBeInstanceOf(UnavailableError);
      expect(await ctx.client.get(seatKey('A1'))).toBeNull();
    });
  });

  // ===========================================================================
  // SWEEP
  // ===========================================================================

  describe('sweepOrphanedIndexEntries', () => {
    it('removes entries whose hold is gone or does not list the seat', async () => {
      const hold = await mustAcquire(ctx, ['A1']);
      await ctx.client.set(seatKey('A4'), 'ghost-hold', 600);
      await ctx.client.set(seatKey('A3'), hold.holdId, 600);

      const removed = await ctx.lockManager.sweepOrphanedIndexEntries();

      expect(removed).toBe(2);
      expect(await ctx.client.get(seatKey('A1'))).toBe(hold.holdId);
      expect(await ctx.client.get(seatKey('A3'))).toBeNull();
      expect(await ctx.client.get(seatKey('A4'))).toBeNull();
    });

    it('limits the sweep to one trip when asked', async () => {
      await ctx.client.set(seatKey('A4'), 'ghost-hold', 600);
      await ctx.client.set(seatKey('A4', 'trip-other'), 'ghost-hold', 600);

      const removed = await ctx.lockManager.sweepOrphanedIndexEntries(TRIP_ID);

      expect(removed).toBe(1);
      expect(await ctx.client.get(seatKey('A4', 'trip-other'))).toBe('ghost-hold');
    });
  });
});
