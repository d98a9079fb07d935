/**
 * =============================================================================
 * BUS SEAT HOLD SERVICE - MAIN SERVER
 * =============================================================================
 *
 * Starts the HTTP server on the process-wide singletons:
 *   - redisService  (seat locks; Redis, or in-memory outside production)
 *   - db            (trips, buses, bookings in a JSON file)
 *
 * BACKGROUND:
 *   - Orphaned seat lock sweep (SEAT_LOCK_SWEEP_ENABLED, SEAT_LOCK_SWEEP_INTERVAL_MS)
 * =============================================================================
 */

import { createServer } from 'http';
import { createApp } from './app';
import { config } from './config/environment';
import { TIMEOUTS } from './core/constants';
import { bookingService } from './modules/booking';
import { seatAvailabilityService, seatLockManager } from './modules/seat-hold';
import { db } from './shared/database/db';
import { startSweepJob, stopSweepJob } from './shared/jobs/sweep-orphan-seat-locks.job';
import { logger } from './shared/services/logger.service';
import { redisService } from './shared/services/redis.service';

async function main(): Promise<void> {
  // Seat locks must be reachable before the first request
  await redisService.initialize();

  const app = createApp({
    redis: redisService,
    database: db,
    lockManager: seatLockManager,
    availability: seatAvailabilityService,
    bookings: bookingService
  });

  const server = createServer(app);
  server.timeout = 30000;

  server.listen(config.port, config.host, () => {
    const stats = db.getStats();
    logger.info(`🚌 Bus seat hold service listening on http://${config.host}:${config.port}`);
    logger.info(`   Environment: ${config.nodeEnv}, hold TTL ${config.hold.ttlMinutes} min`);
    logger.info(`   Buses: ${stats.buses}, Trips: ${stats.trips}, Bookings: ${stats.bookings}`);
  });

  if (config.sweep.enabled) {
    startSweepJob(seatLockManager, redisService, config.sweep.intervalMs);
  }

  // ===========================================================================
  // GRACEFUL SHUTDOWN
  // ===========================================================================

  let shuttingDown = false;
  const gracefulShutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Starting graceful shutdown...`);

    stopSweepJob();

    server.close(() => {
      logger.info('HTTP server closed');
      db.flush();
      redisService.shutdown()
        .then(() => {
          logger.info('Graceful shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error closing seat lock store', {
            error: error instanceof Error ? error.message : String(error)
          });
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      db.flush();
      process.exit(1);
    }, TIMEOUTS.SHUTDOWN_GRACE_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
