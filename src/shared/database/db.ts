/**
 * =============================================================================
 * DATABASE SERVICE - Persistent JSON File Storage
 * =============================================================================
 *
 * File-based store for the trip catalog (buses, trips, seat layouts) and
 * bookings. Data persists across server restarts when DATABASE_FILE is set;
 * with an empty path everything stays in memory (tests).
 *
 * First start: the file is created from DATABASE_SEED_FILE (data/seed.json).
 *
 * Seat holds never live here - they belong to the expiring store.
 * =============================================================================
 */

import * as fs from 'fs';
import * as path from 'path';
import { config } from '../../config/environment';
import { BookingStatus, TIMEOUTS } from '../../core/constants';
import { logger } from '../services/logger.service';
import { BookingStatusUpdates, BookingStore, ConfirmWrite, TripCatalog } from './repository.interface';

// =============================================================================
// RECORDS
// =============================================================================

// Seat geometry, as configured on the bus
export interface SeatConfig {
  id: string;      // e.g. "A1"
  row: number;
  column: number;
}

export interface SeatLayoutConfig {
  rows: number;
  columns: number;
  seats: SeatConfig[];
}

export interface BusRecord {
  id: string;
  companyName: string;
  busNumber: string;
  busType: string;           // e.g. "AC Sleeper", "Non-AC Seater"
  totalSeats: number;
  seatLayout?: SeatLayoutConfig;
}

export interface TripRecord {
  id: string;
  busId: string;
  routeId: string;
  departureCity: string;
  destinationCity: string;
  departureTime: string;     // ISO
  arrivalTime: string;       // ISO
  price: number;             // flat per-seat fare
  isOpen: boolean;           // accepting new holds
}

export interface PassengerRecord {
  seatId: string;
  name: string;
  phone: string;
  email: string;
  age?: number;
  gender?: string;
}

export interface BookingRecord {
  id: string;
  pnr: string;
  tripId: string;
  holderId: string;
  holdId: string;            // hold this booking was created from
  seatIds: string[];
  passengers: PassengerRecord[];

  // Pricing
  baseFare: number;
  taxes: number;
  serviceFee: number;
  totalAmount: number;

  status: BookingStatus;
  paymentReference?: string;
  cancellationReason?: string;
  failureReason?: string;

  createdAt: string;
  updatedAt: string;
  confirmedAt?: string;
  cancelledAt?: string;
  failedAt?: string;
}

// Database schema
export interface Database {
  buses: BusRecord[];
  trips: TripRecord[];
  bookings: BookingRecord[];
  _meta: {
    version: string;
    lastUpdated: string;
  };
}

export interface DatabaseSeed {
  buses?: BusRecord[];
  trips?: TripRecord[];
  bookings?: BookingRecord[];
}

export interface DatabaseOptions {
  /** JSON file backing the database; empty = memory only */
  filePath?: string;
  /** Seed file read when filePath does not exist yet */
  seedFile?: string;
  /** Inline seed (tests) */
  seed?: DatabaseSeed;
}

function emptyDatabase(): Database {
  return {
    buses: [],
    trips: [],
    bookings: [],
    _meta: {
      version: '1.0.0',
      lastUpdated: new Date().toISOString()
    }
  };
}

function copy<T>(value: T): T {
  return structuredClone(value);
}

// =============================================================================
// DATABASE SERVICE
// =============================================================================

export class DatabaseService implements TripCatalog, BookingStore {
  private data: Database;
  private readonly filePath: string;
  private saveTimeout: NodeJS.Timeout | null = null;

  constructor(options: DatabaseOptions = {}) {
    this.filePath = options.filePath ? path.resolve(options.filePath) : '';
    this.data = this.load(options);
    logger.info(`[Database] Loaded ${this.filePath || '(in-memory)'}`);
    logger.info(`[Database] Buses: ${this.data.buses.length}, Trips: ${this.data.trips.length}, Bookings: ${this.data.bookings.length}`);
  }

  private load(options: DatabaseOptions): Database {
    if (this.filePath && fs.existsSync(this.filePath)) {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      return { ...emptyDatabase(), ...JSON.parse(raw) };
    }

    const seed = options.seed ?? this.readSeedFile(options.seedFile);
    const db: Database = {
      ...emptyDatabase(),
      buses: copy(seed.buses ?? []),
      trips: copy(seed.trips ?? []),
      bookings: copy(seed.bookings ?? [])
    };

    if (this.filePath) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.saveSync(db);
      logger.info(`[Database] Created ${this.filePath}`);
    }
    return db;
  }

  private readSeedFile(seedFile?: string): DatabaseSeed {
    if (!seedFile) return {};
    const resolved = path.resolve(seedFile);
    if (!fs.existsSync(resolved)) {
      logger.warn(`[Database] Seed file not found: ${resolved}`);
      return {};
    }
    return JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  }

  private save(): void {
    if (!this.filePath) return;

    // Debounce saves to avoid too many writes
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.saveSync(this.data);
    }, TIMEOUTS.DB_SAVE_DEBOUNCE_MS);
  }

  private saveSync(data: Database): void {
    try {
      data._meta.lastUpdated = new Date().toISOString();
      fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2));
    } catch (error) {
      logger.error('[Database] Failed to save database', error);
    }
  }

  /**
   * Write any pending change now (shutdown)
   */
  flush(): void {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
      this.saveSync(this.data);
    }
  }

  // ==========================================================================
  // TRIP CATALOG
  // ==========================================================================

  async getTrip(tripId: string): Promise<TripRecord | null> {
    const trip = this.data.trips.find(t => t.id === tripId);
    return trip ? copy(trip) : null;
  }

  async getSeatConfig(busId: string): Promise<SeatLayoutConfig | null> {
    const bus = this.data.buses.find(b => b.id === busId);
    return bus?.seatLayout ? copy(bus.seatLayout) : null;
  }

  // ==========================================================================
  // BOOKINGS - reads
  // ==========================================================================

  async findConfirmedBookingsByTrip(tripId: string): Promise<Array<Pick<BookingRecord, 'id' | 'seatIds'>>> {
    return this.data.bookings
      .filter(b => b.tripId === tripId && b.status === BookingStatus.CONFIRMED)
      .map(b => ({ id: b.id, seatIds: [...b.seatIds] }));
  }

  async getBookedSeatIds(tripId: string): Promise<Set<string>> {
    const booked = new Set<string>();
    for (const booking of await this.findConfirmedBookingsByTrip(tripId)) {
      booking.seatIds.forEach(seatId => booked.add(seatId));
    }
    return booked;
  }

  async getBookingById(id: string): Promise<BookingRecord | null> {
    const booking = this.data.bookings.find(b => b.id === id);
    return booking ? copy(booking) : null;
  }

  async getBookingByPnr(pnr: string): Promise<BookingRecord | null> {
    const booking = this.data.bookings.find(b => b.pnr === pnr);
    return booking ? copy(booking) : null;
  }

  async getBookingsByHolder(holderId: string): Promise<BookingRecord[]> {
    return this.data.bookings
      .filter(b => b.holderId === holderId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map(copy);
  }

  async pnrExists(pnr: string): Promise<boolean> {
    return this.data.bookings.some(b => b.pnr === pnr);
  }

  // ==========================================================================
  // BOOKINGS - writes
  // ==========================================================================

  /**
   * A hold backs at most one live booking. Check and push happen in one
   * step, so two concurrent inserts from the same hold cannot both land.
   *
   * @returns inserted booking, or null when the hold already has one
   */
  async insertBooking(booking: Omit<BookingRecord, 'createdAt' | 'updatedAt'>): Promise<BookingRecord | null> {
    const taken = this.data.bookings.some(b =>
      b.holdId === booking.holdId &&
      (b.status === BookingStatus.PENDING || b.status === BookingStatus.CONFIRMED)
    );
    if (taken) return null;

    const now = new Date().toISOString();
    const record: BookingRecord = {
      ...copy(booking),
      createdAt: now,
      updatedAt: now
    };
    this.data.bookings.push(record);
    this.save();
    return copy(record);
  }

  /**
   * Move a booking to `status` only if it is currently in one of `from`.
   * Check and write happen in one step, so two concurrent transitions of
   * the same booking cannot both succeed.
   *
   * @returns updated booking, or null when missing or not in `from`
   */
  async transitionStatus(
    id: string,
    from: BookingStatus[],
    status: BookingStatus,
    updates: BookingStatusUpdates = {}
  ): Promise<BookingRecord | null> {
    const index = this.data.bookings.findIndex(b => b.id === id);
    if (index === -1 || !from.includes(this.data.bookings[index].status)) return null;

    this.data.bookings[index] = {
      ...this.data.bookings[index],
      ...updates,
      status,
      updatedAt: new Date().toISOString()
    };
    this.save();
    return copy(this.data.bookings[index]);
  }

  /**
   * Confirm unless another confirmed booking on the trip already lists one
   * of this booking's seats. Overlap check and write happen in one step.
   */
  async confirmIfSeatsFree(
    id: string,
    from: BookingStatus[],
    updates: BookingStatusUpdates
  ): Promise<ConfirmWrite> {
    const target = this.data.bookings.find(b => b.id === id);
    if (!target || !from.includes(target.status)) return { status: 'stale' };

    const sold = new Set<string>();
    for (const other of this.data.bookings) {
      if (other.id !== id && other.tripId === target.tripId && other.status === BookingStatus.CONFIRMED) {
        other.seatIds.forEach(seatId => sold.add(seatId));
      }
    }
    const taken = target.seatIds.filter(seatId => sold.has(seatId));
    if (taken.length > 0) return { status: 'seats_taken', seatIds: taken };

    const booking = await this.transitionStatus(id, from, BookingStatus.CONFIRMED, updates);
    return booking ? { status: 'confirmed', booking } : { status: 'stale' };
  }

  // ==========================================================================
  // STATS
  // ==========================================================================

  getStats(): { buses: number; trips: number; bookings: number; byStatus: Record<string, number> } {
    const byStatus: Record<string, number> = {};
    for (const booking of this.data.bookings) {
      byStatus[booking.status] = (byStatus[booking.status] ?? 0) + 1;
    }
    return {
      buses: this.data.buses.length,
      trips: this.data.trips.length,
      bookings: this.data.bookings.length,
      byStatus
    };
  }
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

export const db = new DatabaseService({
  filePath: config.database.file,
  seedFile: config.database.seedFile
});
