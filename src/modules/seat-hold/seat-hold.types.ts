/**
 * =============================================================================
 * SEAT HOLD - Types
 * =============================================================================
 */

import { z } from 'zod';
import { SeatStatus } from '../../core/constants';
import {
  SeatAlreadyBookedError,
  SeatAlreadyHeldError,
  HoldNotFoundError,
  ValidationError
} from '../../core/errors/AppError';

/**
 * A time-bounded, exclusive claim on one or more seats of one trip
 */
export interface SeatHold {
  holdId: string;
  tripId: string;
  seatIds: string[];       // request order, unique
  holderId: string;
  createdAt: Date;
  expiresAt: Date;
}

/**
 * Stored form of a hold (dates serialized as ISO strings).
 * Parsed on every read; anything else at hold:{id} counts as absent.
 */
export const SeatHoldRecordSchema = z.object({
  holdId: z.string().min(1),
  tripId: z.string().min(1),
  seatIds: z.array(z.string().min(1)).min(1),
  holderId: z.string().min(1),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime()
});

export type SeatHoldRecord = z.infer<typeof SeatHoldRecordSchema>;

export function toRecord(hold: SeatHold): SeatHoldRecord {
  return {
    ...hold,
    createdAt: hold.createdAt.toISOString(),
    expiresAt: hold.expiresAt.toISOString()
  };
}

export function fromRecord(record: SeatHoldRecord): SeatHold {
  return {
    ...record,
    createdAt: new Date(record.createdAt),
    expiresAt: new Date(record.expiresAt)
  };
}

// =============================================================================
// RESULTS
// =============================================================================

export type AcquireRejection = SeatAlreadyHeldError | SeatAlreadyBookedError | ValidationError;
export type ExtendRejection = HoldNotFoundError | ValidationError;

// =============================================================================
// SEAT MAP
// =============================================================================

export interface SeatView {
  seatId: string;
  row: number;
  column: number;
  status: SeatStatus;
  price: number;
}

export interface SeatLayoutView {
  tripId: string;
  busId: string;
  rows: number;
  columns: number;
  price: number;
  seats: SeatView[];
  counts: Record<SeatStatus, number>;
}
