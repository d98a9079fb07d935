/**
 * =============================================================================
 * SEAT HOLD MODULE
 * =============================================================================
 *
 * Time-bounded exclusive seat holds and the seat map built on them.
 *
 * EXPORTS:
 * - seatLockManager: acquire / release / extend / queries on holds
 * - seatAvailabilityService: seat map, fare preview, seat selection
 * - createSeatHoldRouter: REST API routes
 *
 * USAGE:
 *   import { createSeatHoldRouter, seatAvailabilityService, seatLockManager } from './modules/seat-hold';
 *   app.use('/api/v1', createSeatHoldRouter(seatAvailabilityService, seatLockManager));
 *
 * =============================================================================
 */

import { db } from '../../shared/database/db';
import { redisService } from '../../shared/services/redis.service';
import { SeatAvailabilityService } from './seat-availability.service';
import { SeatLockManager } from './seat-lock.manager';

export const seatLockManager = new SeatLockManager(redisService, db);
export const seatAvailabilityService = new SeatAvailabilityService(seatLockManager, db, db);

export { SeatLockManager } from './seat-lock.manager';
export { SeatAvailabilityService } from './seat-availability.service';
export { createSeatHoldRouter } from './seat-hold.routes';
export * from './seat-hold.types';
