/**
 * =============================================================================
 * SEAT HOLD ROUTES
 * =============================================================================
 *
 * REST API endpoints for seat maps and seat holds.
 *
 * ENDPOINTS:
 * - GET  /trips/:tripId/seats          - Seat map with classifications
 * - POST /trips/:tripId/fare-summary   - Price preview for a selection
 * - POST /seat-holds                   - Hold seats (select)
 * - GET  /seat-holds/:holdId           - Active hold details
 * - POST /seat-holds/:holdId/release   - Give the seats back early
 * - POST /seat-holds/:holdId/extend    - Push the hold's expiry forward
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { HoldNotFoundError } from '../../core/errors/AppError';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { requireHolder } from '../../shared/middleware/holder.middleware';
import { holderIdSchema, idSchema, validateRequest, validateSchema } from '../../shared/utils/validation.utils';
import { SeatAvailabilityService } from './seat-availability.service';
import { SeatLockManager } from './seat-lock.manager';
import { SeatHold } from './seat-hold.types';
import {
  ExtendHoldInput,
  FareSummaryInput,
  SelectSeatsInput,
  extendHoldSchema,
  fareSummarySchema,
  selectSeatsSchema
} from './seat-hold.schema';

/**
 * Response shape of a hold
 */
function holdView(hold: SeatHold) {
  return {
    holdId: hold.holdId,
    tripId: hold.tripId,
    seatIds: hold.seatIds,
    holderId: hold.holderId,
    createdAt: hold.createdAt.toISOString(),
    expiresAt: hold.expiresAt.toISOString(),
    remainingSeconds: Math.max(0, Math.ceil((hold.expiresAt.getTime() - Date.now()) / 1000))
  };
}

export function createSeatHoldRouter(
  availability: SeatAvailabilityService,
  lockManager: SeatLockManager
): Router {
  const router = Router();

  // ===========================================================================
  // SEAT MAP
  // ===========================================================================

  /**
   * @route   GET /trips/:tripId/seats
   * @desc    Seat layout of the trip's bus, each seat available / held / booked
   * @access  Public
   */
  router.get('/trips/:tripId/seats', asyncHandler(async (req: Request, res: Response) => {
    const tripId = validateSchema(idSchema, req.params.tripId);

    const result = await availability.buildLayout(tripId);
    if (!result.success) {
      return ApiResponse.rejected(res, result.error);
    }
    return ApiResponse.success(res, result.data);
  }));

  /**
   * @route   POST /trips/:tripId/fare-summary
   * @desc    Base fare, taxes, service fee and total for the selected seats
   * @access  Public
   *
   * @body    { seatIds }
   */
  router.post(
    '/trips/:tripId/fare-summary',
    validateRequest(fareSummarySchema),
    asyncHandler(async (req: Request, res: Response) => {
      const tripId = validateSchema(idSchema, req.params.tripId);
      const { seatIds }: FareSummaryInput = req.body;

      const result = await availability.getFareSummary(tripId, seatIds);
      if (!result.success) {
        return ApiResponse.rejected(res, result.error);
      }
      return ApiResponse.success(res, result.data);
    })
  );

  // ===========================================================================
  // HOLDS
  // ===========================================================================

  /**
   * @route   POST /seat-holds
   * @desc    Hold seats for the caller (10 minutes by default)
   * @access  Holder (body holderId or x-holder-id header)
   *
   * @body    { tripId, seatIds, holderId? }
   * @returns 201 hold | 409 ALREADY_HELD | 409 ALREADY_BOOKED
   */
  router.post(
    '/seat-holds',
    validateRequest(selectSeatsSchema),
    requireHolder,
    asyncHandler(async (req: Request, res: Response) => {
      const { tripId, seatIds }: SelectSeatsInput = req.body;
      const holderId = validateSchema(holderIdSchema, req.holderId);

      const result = await availability.selectSeats(tripId, seatIds, holderId);
      if (!result.success) {
        return ApiResponse.rejected(res, result.error);
      }
      return ApiResponse.created(res, holdView(result.data), 'Seats held');
    })
  );

  /**
   * @route   GET /seat-holds/:holdId
   * @desc    Active hold details (404 once released or expired)
   * @access  Public
   */
  router.get('/seat-holds/:holdId', asyncHandler(async (req: Request, res: Response) => {
    const holdId = validateSchema(idSchema, req.params.holdId);

    const hold = await lockManager.getHold(holdId);
    if (!hold) {
      return ApiResponse.rejected(res, new HoldNotFoundError(holdId));
    }
    return ApiResponse.success(res, holdView(hold));
  }));

  /**
   * @route   POST /seat-holds/:holdId/release
   * @desc    Release a hold early. Releasing an expired hold is not an error.
   * @access  Public
   *
   * @returns { released }
   */
  router.post('/seat-holds/:holdId/release', asyncHandler(async (req: Request, res: Response) => {
    const holdId = validateSchema(idSchema, req.params.holdId);

    const result = await lockManager.release(holdId);
    if (!result.success) {
      return ApiResponse.success(res, { released: false, holdId }, 'Hold already expired or released');
    }
    return ApiResponse.success(res, { released: true, holdId, seatIds: result.data.seatIds }, 'Seats released');
  }));

  /**
   * @route   POST /seat-holds/:holdId/extend
   * @desc    Push expiry forward by `minutes`
   * @access  Public
   *
   * @body    { minutes }
   * @returns { extended, expiresAt? }
   */
  router.post(
    '/seat-holds/:holdId/extend',
    validateRequest(extendHoldSchema),
    asyncHandler(async (req: Request, res: Response) => {
      const holdId = validateSchema(idSchema, req.params.holdId);
      const { minutes }: ExtendHoldInput = req.body;

      const result = await lockManager.extend(holdId, minutes);
      if (result.success) {
        return ApiResponse.success(res, { extended: true, ...holdView(result.data) }, 'Hold extended');
      }
      if (result.error instanceof HoldNotFoundError) {
        return ApiResponse.success(res, { extended: false, holdId }, 'Hold already expired or released');
      }
      return ApiResponse.rejected(res, result.error);
    })
  );

  return router;
}
