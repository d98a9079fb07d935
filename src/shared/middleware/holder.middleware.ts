/**
 * =============================================================================
 * HOLDER MIDDLEWARE
 * =============================================================================
 *
 * Resolves who is holding seats for this request. Identity comes from the
 * surrounding application (logged-in user id or an anonymous session id);
 * no credentials are checked here.
 *
 * Resolution order:
 *   1. `holderId` in the (already validated) JSON body
 *   2. `holderId` query parameter
 *   3. `x-holder-id` header
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { HOLDER_ID_HEADER, ErrorCode } from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';
import { holderIdSchema } from '../utils/validation.utils';

declare global {
  namespace Express {
    interface Request {
      holderId?: string;
    }
  }
}

function readHolderId(req: Request): string | undefined {
  const fromBody: unknown = typeof req.body === 'object' && req.body !== null ? req.body.holderId : undefined;
  const fromQuery = typeof req.query.holderId === 'string' ? req.query.holderId : undefined;
  const candidate = fromBody ?? fromQuery ?? req.get(HOLDER_ID_HEADER);
  const parsed = holderIdSchema.safeParse(candidate);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Attach req.holderId when one is present. Never rejects.
 */
export function resolveHolder(req: Request, _res: Response, next: NextFunction): void {
  req.holderId = readHolderId(req);
  next();
}

/**
 * Attach req.holderId, rejecting the request when none is present.
 */
export function requireHolder(req: Request, _res: Response, next: NextFunction): void {
  const holderId = readHolderId(req);
  if (!holderId) {
    next(new ValidationError(
      'Holder id is required',
      [{ field: 'holderId', message: `Provide holderId in the body or the ${HOLDER_ID_HEADER} header` }],
      ErrorCode.INVALID_REQUEST
    ));
    return;
  }
  req.holderId = holderId;
  next();
}
