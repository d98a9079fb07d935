/**
 * =============================================================================
 * SEAT LOCK MANAGER - Time-bounded exclusive holds on seats
 * =============================================================================
 *
 * Hands out and revokes holds on seat sets. All state lives in the expiring
 * store, so any number of service instances can run side by side.
 *
 * STORE LAYOUT:
 * ─────────────
 *   hold:{holdId}               -> JSON { holdId, tripId, seatIds, holderId, createdAt, expiresAt }
 *   seatlock:{tripId}:{seatId}  -> holdId
 *
 * Both carry TTL = time remaining to expiresAt, and are re-armed together on
 * extend. Expiry is enforced by the store; nothing here has to run for a
 * hold to lapse.
 *
 * ACQUIRE:
 * ────────
 * 1. Read phase: any seat confirmed-booked -> ALREADY_BOOKED,
 *    any seat with a live index entry     -> ALREADY_HELD.
 * 2. Write phase: hold record, then one index entry per seat with
 *    SET NX EX. Losing any seat here (a concurrent acquire got it between
 *    our read and our write) rolls back every entry we wrote and the hold
 *    record, and the call rejects with ALREADY_HELD.
 *
 * No multi-key transaction is used. Two acquires on overlapping seats can
 * each win some seats in the write phase and then both roll back; neither
 * ever ends up sharing a seat.
 *
 * Store failures surface as UnavailableError, never as "not held".
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config/environment';
import { ErrorCode, HOLD_KEYS } from '../../core/constants';
import {
  HoldNotFoundError,
  Outcome,
  SeatAlreadyBookedError,
  SeatAlreadyHeldError,
  ValidationError,
  fail,
  ok
} from '../../core/errors/AppError';
import { ConfirmedBookingReader } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { RedisService } from '../../shared/services/redis.service';
import { guardIo } from '../../shared/utils/unavailable.utils';
import {
  AcquireRejection,
  ExtendRejection,
  SeatHold,
  SeatHoldRecordSchema,
  fromRecord,
  toRecord
} from './seat-hold.types';

export interface SeatLockOptions {
  ttlMinutes: number;
  maxExtensionMinutes: number;
  maxSeatsPerHold: number;
}

const DEFAULT_OPTIONS: SeatLockOptions = {
  ttlMinutes: config.hold.ttlMinutes,
  maxExtensionMinutes: config.hold.maxExtensionMinutes,
  maxSeatsPerHold: config.hold.maxSeatsPerHold
};

/**
 * Whole seconds from now until `expiresAt`, rounded up
 */
function secondsUntil(expiresAt: Date): number {
  return Math.ceil((expiresAt.getTime() - Date.now()) / 1000);
}

function invalid(message: string, field: string): ValidationError {
  return new ValidationError(message, [{ field, message }], ErrorCode.INVALID_REQUEST);
}

export class SeatLockManager {
  private readonly options: SeatLockOptions;

  constructor(
    private readonly store: RedisService,
    private readonly bookings: ConfirmedBookingReader,
    options: Partial<SeatLockOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get holdTtlMinutes(): number {
    return this.options.ttlMinutes;
  }

  // ===========================================================================
  // ACQUIRE
  // ===========================================================================

  async acquire(tripId: string, seatIds: string[], holderId: string): Promise<Outcome<SeatHold, AcquireRejection>> {
    const rejection = this.validateAcquire(tripId, seatIds, holderId);
    if (rejection) {
      return fail(rejection);
    }

    // 1. Read phase - booked wins over held
    const booked = await guardIo('database', 'getBookedSeatIds', () => this.bookings.getBookedSeatIds(tripId));
    const bookedSeat = seatIds.find(seatId => booked.has(seatId));
    if (bookedSeat) {
      logger.info(`[SeatLock] Rejected ${holderId} on ${tripId}/${bookedSeat}: already booked`);
      return fail(new SeatAlreadyBookedError(tripId, bookedSeat));
    }

    for (const seatId of seatIds) {
      if (await this.isHeld(tripId, seatId)) {
        logger.info(`[SeatLock] Rejected ${holderId} on ${tripId}/${seatId}: already held`);
        return fail(new SeatAlreadyHeldError(tripId, seatId));
      }
    }

    // 2. Write phase
    const now = Date.now();
    const hold: SeatHold = {
      holdId: uuidv4(),
      tripId,
      seatIds: [...seatIds],
      holderId,
      createdAt: new Date(now),
      expiresAt: new Date(now + this.options.ttlMinutes * 60 * 1000)
    };
    const ttlSeconds = this.options.ttlMinutes * 60;

    await guardIo('store', 'acquire', () =>
      this.store.setJSON(HOLD_KEYS.HOLD(hold.holdId), toRecord(hold), ttlSeconds)
    );

    const written: string[] = [];
    try {
      for (const seatId of seatIds) {
        const won = await guardIo('store', 'acquire', () =>
          this.store.setIfAbsent(HOLD_KEYS.SEAT_LOCK(tripId, seatId), hold.holdId, ttlSeconds)
        );
        if (!won) {
          logger.warn(`[SeatLock] Lost ${tripId}/${seatId} to a concurrent hold, rolling back ${hold.holdId}`);
          await this.rollback(hold, written);
          return fail(new SeatAlreadyHeldError(tripId, seatId));
        }
        written.push(seatId);
      }
    } catch (error: unknown) {
      await this.rollback(hold, written).catch((rollbackError: unknown) => {
        logger.error(`[SeatLock] Rollback of ${hold.holdId} failed, entries will lapse by TTL`, {
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
        });
      });
      throw error;
    }

    logger.info(`[SeatLock] ✅ Hold ${hold.holdId} on ${tripId} [${seatIds.join(', ')}] for ${holderId}, expires ${hold.expiresAt.toISOString()}`);
    return ok(hold);
  }

  private validateAcquire(tripId: string, seatIds: string[], holderId: string): ValidationError | null {
    if (!tripId || tripId.trim() === '') {
      return invalid('Trip id is required', 'tripId');
    }
    if (!holderId || holderId.trim() === '') {
      return invalid('Holder id is required', 'holderId');
    }
    if (seatIds.length === 0) {
      return invalid('At least one seat must be selected', 'seatIds');
    }
    if (seatIds.some(seatId => seatId.trim() === '')) {
      return invalid('Seat ids must not be empty', 'seatIds');
    }
    if (new Set(seatIds).size !== seatIds.length) {
      return invalid('Seat ids must be unique', 'seatIds');
    }
    if (seatIds.length > this.options.maxSeatsPerHold) {
      return invalid(`At most ${this.options.maxSeatsPerHold} seats can be held at once`, 'seatIds');
    }
    return null;
  }

  /**
   * Undo a partial write phase. Only entries still pointing at this hold are removed.
   */
  private async rollback(hold: SeatHold, writtenSeatIds: string[]): Promise<void> {
    for (const seatId of writtenSeatIds) {
      await guardIo('store', 'rollback', () =>
        this.store.compareAndDelete(HOLD_KEYS.SEAT_LOCK(hold.tripId, seatId), hold.holdId)
      );
    }
    await guardIo('store', 'rollback', () => this.store.del(HOLD_KEYS.HOLD(hold.holdId)));
  }

  // ===========================================================================
  // RELEASE
  // ===========================================================================

  /**
   * Release a hold early. An unknown or already-expired hold is NotFound,
   * which callers treat as a normal outcome.
   */
  async release(holdId: string): Promise<Outcome<SeatHold, HoldNotFoundError>> {
    const hold = await this.readHold(holdId);
    if (!hold) {
      logger.debug(`[SeatLock] Release of ${holdId}: not found (expired or released)`);
      return fail(new HoldNotFoundError(holdId));
    }

    await this.removeHold(hold);

    if (hold.expiresAt.getTime() <= Date.now()) {
      // Record outlived its expiry by less than the TTL rounding
      return fail(new HoldNotFoundError(holdId));
    }

    logger.info(`[SeatLock] 🔓 Released ${holdId} on ${hold.tripId} [${hold.seatIds.join(', ')}]`);
    return ok(hold);
  }

  private async removeHold(hold: SeatHold): Promise<void> {
    for (const seatId of hold.seatIds) {
      await guardIo('store', 'release', () =>
        this.store.compareAndDelete(HOLD_KEYS.SEAT_LOCK(hold.tripId, seatId), hold.holdId)
      );
    }
    await guardIo('store', 'release', () => this.store.del(HOLD_KEYS.HOLD(hold.holdId)));
  }

  // ===========================================================================
  // EXTEND
  // ===========================================================================

  /**
   * Push expiry forward by `additionalMinutes`. Hold record and every index
   * entry are re-written with one TTL computed from now to the new expiry.
   */
  async extend(holdId: string, additionalMinutes: number): Promise<Outcome<SeatHold, ExtendRejection>> {
    if (!Number.isInteger(additionalMinutes) || additionalMinutes <= 0) {
      return fail(invalid('Extension must be a positive whole number of minutes', 'minutes'));
    }
    if (additionalMinutes > this.options.maxExtensionMinutes) {
      return fail(invalid(`Extension cannot exceed ${this.options.maxExtensionMinutes} minutes`, 'minutes'));
    }

    const current = await this.getHold(holdId);
    if (!current) {
      return fail(new HoldNotFoundError(holdId));
    }

    const extended: SeatHold = {
      ...current,
      expiresAt: new Date(current.expiresAt.getTime() + additionalMinutes * 60 * 1000)
    };
    const ttlSeconds = secondsUntil(extended.expiresAt);

    await guardIo('store', 'extend', () =>
      this.store.setJSON(HOLD_KEYS.HOLD(holdId), toRecord(extended), ttlSeconds)
    );

    const lost: string[] = [];
    for (const seatId of extended.seatIds) {
      const key = HOLD_KEYS.SEAT_LOCK(extended.tripId, seatId);
      const owner = await guardIo('store', 'extend', () => this.store.get(key));

      if (owner === holdId) {
        await guardIo('store', 'extend', () => this.store.set(key, holdId, ttlSeconds));
      } else if (owner === null) {
        const restored = await guardIo('store', 'extend', () => this.store.setIfAbsent(key, holdId, ttlSeconds));
        if (!restored) lost.push(seatId);
      } else {
        lost.push(seatId);
      }
    }

    if (lost.length > 0) {
      // The hold no longer covers seats another hold now indexes
      logger.warn(`[SeatLock] Extend of ${holdId}: index entries owned elsewhere for [${lost.join(', ')}], dropping them`);
      const narrowed: SeatHold = { ...extended, seatIds: extended.seatIds.filter(seatId => !lost.includes(seatId)) };

      if (narrowed.seatIds.length === 0) {
        await guardIo('store', 'extend', () => this.store.del(HOLD_KEYS.HOLD(holdId)));
        return fail(new HoldNotFoundError(holdId));
      }
      await guardIo('store', 'extend', () =>
        this.store.setJSON(HOLD_KEYS.HOLD(holdId), toRecord(narrowed), ttlSeconds)
      );
      logger.info(`[SeatLock] ⏱️ Extended ${holdId} by ${additionalMinutes}m on [${narrowed.seatIds.join(', ')}]`);
      return ok(narrowed);
    }

    logger.info(`[SeatLock] ⏱️ Extended ${holdId} by ${additionalMinutes}m, expires ${extended.expiresAt.toISOString()}`);
    return ok(extended);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * True iff a live seat-to-hold index entry exists
   */
  async isHeld(tripId: string, seatId: string): Promise<boolean> {
    return guardIo('store', 'isHeld', () => this.store.exists(HOLD_KEYS.SEAT_LOCK(tripId, seatId)));
  }

  /**
   * True iff a confirmed booking on the trip lists the seat
   */
  async isBooked(tripId: string, seatId: string): Promise<boolean> {
    const confirmed = await guardIo('database', 'findConfirmedBookingsByTrip', () =>
      this.bookings.findConfirmedBookingsByTrip(tripId)
    );
    return confirmed.some(booking => booking.seatIds.includes(seatId));
  }

  /**
   * Hold record exists and its stored expiry is still in the future
   */
  async isValid(holdId: string): Promise<boolean> {
    return (await this.getHold(holdId)) !== null;
  }

  /**
   * Active hold, or null when unknown, released or expired
   */
  async getHold(holdId: string): Promise<SeatHold | null> {
    const hold = await this.readHold(holdId);
    if (!hold || hold.expiresAt.getTime() <= Date.now()) {
      return null;
    }
    return hold;
  }

  /**
   * Seats among `seatIds` that currently have a live index entry
   */
  async getHeldSeats(tripId: string, seatIds: string[]): Promise<Set<string>> {
    const flags = await Promise.all(seatIds.map(seatId => this.isHeld(tripId, seatId)));
    return new Set(seatIds.filter((_, index) => flags[index]));
  }

  /**
   * Raw stored record (may be past expiresAt within the TTL rounding window)
   */
  private async readHold(holdId: string): Promise<SeatHold | null> {
    const raw = await guardIo('store', 'getHold', () => this.store.get(HOLD_KEYS.HOLD(holdId)));
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      logger.warn(`[SeatLock] Hold ${holdId} is not valid JSON, treating as absent`);
      return null;
    }

    const parsed = SeatHoldRecordSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(`[SeatLock] Hold ${holdId} has an unexpected shape, treating as absent`);
      return null;
    }
    return fromRecord(parsed.data);
  }

  // ===========================================================================
  // SWEEP (tidiness only)
  // ===========================================================================

  /**
   * Delete index entries whose hold record is gone or no longer lists the
   * seat. Expiry never depends on this; it only shortens the life of
   * entries orphaned by a crash between writes.
   *
   * @returns number of entries removed
   */
  async sweepOrphanedIndexEntries(tripId?: string): Promise<number> {
    const keys: string[] = [];
    await guardIo('store', 'sweep', async () => {
      for await (const key of this.store.scanIterator(HOLD_KEYS.SEAT_LOCK_PATTERN(tripId))) {
        keys.push(key);
      }
    });

    let removed = 0;
    for (const key of keys) {
      const parts = key.split(':');
      if (parts.length !== 3) continue;
      const [, entryTripId, seatId] = parts;

      const holdId = await guardIo('store', 'sweep', () => this.store.get(key));
      if (holdId === null) continue;

      const hold = await this.readHold(holdId);
      const orphaned = !hold || hold.tripId !== entryTripId || !hold.seatIds.includes(seatId);
      if (orphaned && await guardIo('store', 'sweep', () => this.store.compareAndDelete(key, holdId))) {
        removed++;
      }
    }

    if (removed > 0) {
      logger.info(`[SeatLock] 🧹 Swept ${removed} orphaned seat lock(s)${tripId ? ` on ${tripId}` : ''}`);
    }
    return removed;
  }
}
