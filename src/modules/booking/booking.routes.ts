/**
 * =============================================================================
 * BOOKING MODULE - ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - POST /bookings                     - Turn a live hold into a pending booking
 * - GET  /bookings                     - Holder's bookings (holderId query or header)
 * - GET  /bookings/pnr/:pnr            - Lookup by PNR
 * - GET  /bookings/:bookingId          - Lookup by id
 * - POST /bookings/:bookingId/confirm  - Payment succeeded
 * - POST /bookings/:bookingId/fail     - Payment failed
 * - POST /bookings/:bookingId/cancel   - Holder cancels
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { requireHolder, resolveHolder } from '../../shared/middleware/holder.middleware';
import {
  holderIdSchema,
  idSchema,
  pnrSchema,
  validateRequest,
  validateSchema
} from '../../shared/utils/validation.utils';
import { BookingService } from './booking.service';
import {
  CancelBookingInput,
  ConfirmBookingInput,
  CreateBookingInput,
  FailBookingInput,
  cancelBookingSchema,
  confirmBookingSchema,
  createBookingSchema,
  failBookingSchema
} from './booking.schema';

export function createBookingRouter(bookingService: BookingService): Router {
  const router = Router();

  /**
   * @route   POST /bookings
   * @desc    Create a pending booking from an active hold. The hold stays
   *          active until the booking is confirmed, failed or cancelled.
   * @access  Public (holderId optional; checked against the hold when sent)
   *
   * @body    { holdId, tripId, seatIds, passengers[], holderId? }
   * @returns 201 booking | 404 HOLD_EXPIRED | 400 HOLD_MISMATCH
   */
  router.post(
    '/',
    validateRequest(createBookingSchema),
    resolveHolder,
    asyncHandler(async (req: Request, res: Response) => {
      const input: CreateBookingInput = req.body;

      const result = await bookingService.createBooking({
        holdId: input.holdId,
        tripId: input.tripId,
        seatIds: input.seatIds,
        passengers: input.passengers,
        holderId: req.holderId
      });
      if (!result.success) {
        return ApiResponse.rejected(res, result.error);
      }
      return ApiResponse.created(res, result.data, 'Booking created, awaiting payment');
    })
  );

  /**
   * @route   GET /bookings
   * @desc    Holder's bookings, newest first
   * @access  Holder
   */
  router.get('/', requireHolder, asyncHandler(async (req: Request, res: Response) => {
    const holderId = validateSchema(holderIdSchema, req.holderId);

    const bookings = await bookingService.getHolderBookings(holderId);
    return ApiResponse.success(res, bookings, undefined, { total: bookings.length });
  }));

  /**
   * @route   GET /bookings/pnr/:pnr
   * @access  Public
   */
  router.get('/pnr/:pnr', asyncHandler(async (req: Request, res: Response) => {
    const pnr = validateSchema(pnrSchema, req.params.pnr);

    const result = await bookingService.getBookingByPnr(pnr);
    if (!result.success) {
      return ApiResponse.rejected(res, result.error);
    }
    return ApiResponse.success(res, result.data);
  }));

  /**
   * @route   GET /bookings/:bookingId
   * @access  Public
   */
  router.get('/:bookingId', asyncHandler(async (req: Request, res: Response) => {
    const bookingId = validateSchema(idSchema, req.params.bookingId);

    const result = await bookingService.getBooking(bookingId);
    if (!result.success) {
      return ApiResponse.rejected(res, result.error);
    }
    return ApiResponse.success(res, result.data);
  }));

  /**
   * @route   POST /bookings/:bookingId/confirm
   * @desc    Payment succeeded: booking CONFIRMED, hold released
   * @access  Payment callback
   *
   * @body    { paymentReference }
   */
  router.post(
    '/:bookingId/confirm',
    validateRequest(confirmBookingSchema),
    asyncHandler(async (req: Request, res: Response) => {
      const bookingId = validateSchema(idSchema, req.params.bookingId);
      const { paymentReference }: ConfirmBookingInput = req.body;

      const result = await bookingService.confirm(bookingId, paymentReference);
      if (!result.success) {
        return ApiResponse.rejected(res, result.error);
      }
      return ApiResponse.success(res, result.data, 'Booking confirmed');
    })
  );

  /**
   * @route   POST /bookings/:bookingId/fail
   * @desc    Payment failed: booking FAILED, hold released
   * @access  Payment callback
   */
  router.post(
    '/:bookingId/fail',
    validateRequest(failBookingSchema),
    asyncHandler(async (req: Request, res: Response) => {
      const bookingId = validateSchema(idSchema, req.params.bookingId);
      const { reason }: FailBookingInput = req.body;

      const result = await bookingService.fail(bookingId, reason);
      if (!result.success) {
        return ApiResponse.rejected(res, result.error);
      }
      return ApiResponse.success(res, result.data, 'Booking marked as failed');
    })
  );

  /**
   * @route   POST /bookings/:bookingId/cancel
   * @desc    Cancel a pending or confirmed booking
   * @access  Holder (holderId checked against the booking when sent)
   */
  router.post(
    '/:bookingId/cancel',
    validateRequest(cancelBookingSchema),
    resolveHolder,
    asyncHandler(async (req: Request, res: Response) => {
      const bookingId = validateSchema(idSchema, req.params.bookingId);
      const { reason }: CancelBookingInput = req.body;

      const result = await bookingService.cancel(bookingId, req.holderId, reason);
      if (!result.success) {
        return ApiResponse.rejected(res, result.error);
      }
      return ApiResponse.success(res, {
        cancelled: true,
        holdReleased: result.data.holdReleased,
        booking: result.data.booking
      }, 'Booking cancelled');
    })
  );

  return router;
}
