/**
 * Periodic sweep of orphaned seat lock entries (runs every 2 minutes by default)
 *
 * A seat lock entry whose hold record is gone, or whose hold no longer lists
 * the seat, would block that seat until its own TTL. Normal release and
 * rollback never leave one behind; a crash between writes can.
 *
 * One instance sweeps at a time: the run is guarded by a distributed lock
 * whose TTL is shorter than the interval.
 */

import { v4 as uuidv4 } from 'uuid';
import { TIMEOUTS } from '../../core/constants';
import { SeatLockManager } from '../../modules/seat-hold/seat-lock.manager';
import { logger } from '../services/logger.service';
import { RedisService } from '../services/redis.service';

const SWEEP_LOCK_KEY = 'seat-lock-sweep';
const instanceId = `sweeper-${process.pid}-${uuidv4().slice(0, 8)}`;

let sweepTimer: NodeJS.Timeout | null = null;

/**
 * Run one sweep. Returns the number of entries removed, or null when
 * another instance holds the sweep lock.
 */
export async function sweepOrphanSeatLocks(
  lockManager: SeatLockManager,
  store: RedisService,
  owner: string = instanceId
): Promise<number | null> {
  const lock = await store.acquireLock(SWEEP_LOCK_KEY, owner, TIMEOUTS.SWEEP_LOCK_TTL_SECONDS);
  if (!lock.acquired) {
    logger.debug('[SweepJob] Another instance is sweeping, skipping');
    return null;
  }

  try {
    return await lockManager.sweepOrphanedIndexEntries();
  } finally {
    await store.releaseLock(SWEEP_LOCK_KEY, owner);
  }
}

export function startSweepJob(lockManager: SeatLockManager, store: RedisService, intervalMs: number): void {
  if (sweepTimer) return;

  sweepTimer = setInterval(() => {
    sweepOrphanSeatLocks(lockManager, store).catch((error: unknown) => {
      logger.error('[SweepJob] Sweep failed', {
        error: error instanceof Error ? error.message : String(error)
      });
    });
  }, intervalMs);
  sweepTimer.unref();

  logger.info(`[SweepJob] Orphaned seat lock sweep every ${Math.round(intervalMs / 1000)}s`);
}

export function stopSweepJob(): void {
  if (sweepTimer) {
    clearInterval(sweepTimer);
    sweepTimer = null;
    logger.info('[SweepJob] Stopped');
  }
}
