/**
 * =============================================================================
 * SEAT HOLD - Request Schemas
 * =============================================================================
 */

import { z } from 'zod';
import { config } from '../../config/environment';
import { holderIdSchema, idSchema, seatIdListSchema } from '../../shared/utils/validation.utils';

/**
 * POST /seat-holds
 */
export const selectSeatsSchema = z.object({
  tripId: idSchema,
  seatIds: seatIdListSchema,
  holderId: holderIdSchema.optional()
});

/**
 * POST /trips/:tripId/fare-summary
 */
export const fareSummarySchema = z.object({
  seatIds: seatIdListSchema
});

/**
 * POST /seat-holds/:holdId/extend
 */
export const extendHoldSchema = z.object({
  minutes: z.number()
    .int('Minutes must be a whole number')
    .positive('Minutes must be positive')
    .max(config.hold.maxExtensionMinutes, `At most ${config.hold.maxExtensionMinutes} minutes per extension`)
});

export type SelectSeatsInput = z.infer<typeof selectSeatsSchema>;
export type FareSummaryInput = z.infer<typeof fareSummarySchema>;
export type ExtendHoldInput = z.infer<typeof extendHoldSchema>;
