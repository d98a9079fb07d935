/**
 * Store / database round-trip guard.
 *
 * Any failure talking to the expiring store or the booking store becomes an
 * UnavailableError (503). Callers never see a store outage as "not held" or
 * "not found".
 */

import { ErrorCode } from '../../core/constants';
import { AppError, UnavailableError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';

export type Dependency = 'store' | 'database';

const CODES: Record<Dependency, ErrorCode> = {
  store: ErrorCode.STORE_UNAVAILABLE,
  database: ErrorCode.DATABASE_UNAVAILABLE
};

export async function guardIo<T>(dependency: Dependency, operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (error instanceof AppError) throw error;

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`[${dependency === 'store' ? 'HoldStore' : 'Database'}] ${operation} failed: ${message}`);
    throw new UnavailableError(
      dependency === 'store'
        ? 'Seat hold store is temporarily unavailable, please retry'
        : 'Booking store is temporarily unavailable, please retry',
      CODES[dependency],
      { operation }
    );
  }
}
