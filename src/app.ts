/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the HTTP app from its services. server.ts passes the process-wide
 * singletons; tests pass services built on in-memory stores.
 *
 * ROUTES:
 * ┌───────────────────────────────────────────────────────────────────────┐
 * │ /health, /health/live     │ Readiness and liveness                    │
 * │ /api/v1/trips/...         │ Seat map, fare preview                    │
 * │ /api/v1/seat-holds/...    │ Hold, inspect, release, extend            │
 * │ /api/v1/bookings/...      │ Hold-to-booking handoff, confirm, cancel  │
 * └───────────────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import express, { Express } from 'express';
import { API_PREFIX } from './core/constants';
import { createBookingRouter } from './modules/booking/booking.routes';
import { BookingService } from './modules/booking/booking.service';
import { SeatAvailabilityService } from './modules/seat-hold/seat-availability.service';
import { createSeatHoldRouter } from './modules/seat-hold/seat-hold.routes';
import { SeatLockManager } from './modules/seat-hold/seat-lock.manager';
import { DatabaseService } from './shared/database/db';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { createHealthRouter } from './shared/routes/health.routes';
import { RedisService } from './shared/services/redis.service';

export interface AppDependencies {
  redis: RedisService;
  database: DatabaseService;
  lockManager: SeatLockManager;
  availability: SeatAvailabilityService;
  bookings: BookingService;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Client IP from the first proxy, for request logs
  app.set('trust proxy', 1);

  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogger);

  app.use('/', createHealthRouter(deps.redis, deps.database));
  app.use(API_PREFIX, createSeatHoldRouter(deps.availability, deps.lockManager));
  app.use(`${API_PREFIX}/bookings`, createBookingRouter(deps.bookings));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
