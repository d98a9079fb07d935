/**
 * =============================================================================
 * BOOKING MODULE - VALIDATION SCHEMAS
 * =============================================================================
 *
 * Shapes only. Passenger completeness and the hold checks are business rules
 * enforced by BookingService, so they come back with their own error codes.
 * =============================================================================
 */

import { z } from 'zod';
import {
  holderIdSchema,
  idSchema,
  seatIdListSchema
} from '../../shared/utils/validation.utils';

export const passengerSchema = z.object({
  name: z.string().max(100),
  phone: z.string().max(20),
  email: z.string().max(254),
  age: z.number().int().min(0).max(120).optional(),
  gender: z.enum(['male', 'female', 'other']).optional()
});

/**
 * POST /bookings
 */
export const createBookingSchema = z.object({
  holdId: idSchema,
  tripId: idSchema,
  seatIds: seatIdListSchema,
  passengers: z.array(passengerSchema),
  holderId: holderIdSchema.optional()
});

/**
 * POST /bookings/:bookingId/confirm
 */
export const confirmBookingSchema = z.object({
  paymentReference: z.string().trim().min(1, 'Payment reference is required').max(100)
});

/**
 * POST /bookings/:bookingId/fail
 */
export const failBookingSchema = z.object({
  reason: z.string().trim().max(500).optional()
});

/**
 * POST /bookings/:bookingId/cancel
 */
export const cancelBookingSchema = z.object({
  holderId: holderIdSchema.optional(),
  reason: z.string().trim().max(500).optional()
});

export type CreateBookingInput = z.infer<typeof createBookingSchema>;
export type ConfirmBookingInput = z.infer<typeof confirmBookingSchema>;
export type FailBookingInput = z.infer<typeof failBookingSchema>;
export type CancelBookingInput = z.infer<typeof cancelBookingSchema>;
