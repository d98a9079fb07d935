/**
 * =============================================================================
 * BOOKING MODULE - Types
 * =============================================================================
 */

import {
  BookingNotFoundError,
  HoldAlreadyBookedError,
  HoldExpiredError,
  InvalidBookingStatusError,
  SeatAlreadyBookedError,
  TripNotFoundError,
  ValidationError
} from '../../core/errors/AppError';
import { BookingRecord } from '../../shared/database/db';

export interface PassengerInput {
  name: string;
  phone: string;
  email: string;
  age?: number;
  gender?: string;
}

export interface CreateBookingRequest {
  holdId: string;
  tripId: string;
  seatIds: string[];
  passengers: PassengerInput[];
  /** When given, the hold must belong to this holder */
  holderId?: string;
}

export type CreateBookingRejection =
  | HoldExpiredError
  | HoldAlreadyBookedError
  | ValidationError
  | TripNotFoundError;

export type TransitionRejection =
  | BookingNotFoundError
  | InvalidBookingStatusError
  | ValidationError;

/** Confirm also fails when the seats were sold after the hold lapsed */
export type ConfirmRejection = TransitionRejection | SeatAlreadyBookedError;

export interface CancelResult {
  booking: BookingRecord;
  /** True when the booking was pending and its hold was released */
  holdReleased: boolean;
}
