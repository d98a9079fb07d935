/**
 * =============================================================================
 * BOOKING MODULE
 * =============================================================================
 *
 * Hold-to-booking handoff: pending bookings created from live holds,
 * resolved by payment confirm / fail or a holder cancel.
 *
 * USAGE:
 *   import { bookingService, createBookingRouter } from './modules/booking';
 *   app.use('/api/v1/bookings', createBookingRouter(bookingService));
 * =============================================================================
 */

import { db } from '../../shared/database/db';
import { seatLockManager } from '../seat-hold';
import { BookingService } from './booking.service';

export const bookingService = new BookingService(seatLockManager, db, db);

export { BookingService } from './booking.service';
export { createBookingRouter } from './booking.routes';
export * from './booking.types';
