/**
 * Shared test context: every service built on in-memory stores.
 */

import { BookingStatus } from '../core/constants';
import { BookingService } from '../modules/booking/booking.service';
import { SeatAvailabilityService } from '../modules/seat-hold/seat-availability.service';
import { SeatLockManager, SeatLockOptions } from '../modules/seat-hold/seat-lock.manager';
import { BookingRecord, DatabaseSeed, DatabaseService, SeatLayoutConfig } from '../shared/database/db';
import { IRedisClient, InMemoryRedisClient, RedisService } from '../shared/services/redis.service';

export const TRIP_ID = 'trip-test-1';
export const CLOSED_TRIP_ID = 'trip-test-closed';
export const BARE_TRIP_ID = 'trip-test-bare';
export const PRICE = 850;

/**
 * 2 rows x 4 columns: A1..A4, B1..B4
 */
export function smallLayout(): SeatLayoutConfig {
  const seats: SeatLayoutConfig['seats'] = [];
  for (let row = 1; row <= 2; row++) {
    for (let column = 1; column <= 4; column++) {
      seats.push({ id: `${String.fromCharCode(64 + row)}${column}`, row, column });
    }
  }
  return { rows: 2, columns: 4, seats };
}

export function confirmedBooking(id: string, tripId: string, seatIds: string[], pnr = 'SEEDPNR001'): BookingRecord {
  return {
    id,
    pnr,
    tripId,
    holderId: 'holder-seed',
    holdId: `hold-${id}`,
    seatIds,
    passengers: seatIds.map(seatId => ({ seatId, name: 'Seed Rider', phone: '9000000000', email: 'seed@example.com' })),
    baseFare: PRICE * seatIds.length,
    taxes: 0,
    serviceFee: 0,
    totalAmount: PRICE * seatIds.length,
    status: BookingStatus.CONFIRMED,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    confirmedAt: '2026-01-01T00:00:00.000Z'
  };
}

export function testSeed(bookings: BookingRecord[] = []): DatabaseSeed {
  return {
    buses: [
      { id: 'bus-test-1', companyName: 'Test Lines', busNumber: 'TS-01', busType: 'AC Seater', totalSeats: 8, seatLayout: smallLayout() },
      { id: 'bus-test-bare', companyName: 'Test Lines', busNumber: 'TS-02', busType: 'AC Seater', totalSeats: 0 }
    ],
    trips: [
      {
        id: TRIP_ID, busId: 'bus-test-1', routeId: 'route-a', departureCity: 'Pune', destinationCity: 'Mumbai',
        departureTime: '2026-12-01T06:30:00.000Z', arrivalTime: '2026-12-01T10:00:00.000Z', price: PRICE, isOpen: true
      },
      {
        id: CLOSED_TRIP_ID, busId: 'bus-test-1', routeId: 'route-a', departureCity: 'Pune', destinationCity: 'Mumbai',
        departureTime: '2026-11-01T06:30:00.000Z', arrivalTime: '2026-11-01T10:00:00.000Z', price: PRICE, isOpen: false
      },
      {
        id: BARE_TRIP_ID, busId: 'bus-test-bare', routeId: 'route-b', departureCity: 'Pune', destinationCity: 'Nashik',
        departureTime: '2026-12-02T06:30:00.000Z', arrivalTime: '2026-12-02T10:00:00.000Z', price: 500, isOpen: true
      }
    ],
    bookings
  };
}

export interface TestContext {
  client: IRedisClient;
  redis: RedisService;
  database: DatabaseService;
  lockManager: SeatLockManager;
  availability: SeatAvailabilityService;
  bookings: BookingService;
}

export function createTestContext(
  options: { bookings?: BookingRecord[]; lock?: Partial<SeatLockOptions>; client?: IRedisClient } = {}
): TestContext {
  const client = options.client ?? new InMemoryRedisClient();
  const redis = new RedisService(client);
  const database = new DatabaseService({ seed: testSeed(options.bookings) });
  const lockManager = new SeatLockManager(redis, database, {
    ttlMinutes: 10,
    maxExtensionMinutes: 10,
    maxSeatsPerHold: 6,
    ...options.lock
  });
  const pricing = { taxRate: 0.18, serviceFeeRate: 0.05 };
  return {
    client,
    redis,
    database,
    lockManager,
    availability: new SeatAvailabilityService(lockManager, database, database, pricing),
    bookings: new BookingService(lockManager, database, database, pricing)
  };
}
