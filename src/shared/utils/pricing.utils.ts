/**
 * =============================================================================
 * PRICING UTILITIES
 * =============================================================================
 *
 * Fare breakdown for a set of seats on one trip:
 *   baseFare   = pricePerSeat × seatCount
 *   taxes      = baseFare × taxRate
 *   serviceFee = baseFare × serviceFeeRate
 *   total      = baseFare + taxes + serviceFee
 *
 * Every amount is rounded half-up to 2 decimals.
 * =============================================================================
 */

import { config } from '../../config/environment';

export interface PricingPolicy {
  taxRate: number;
  serviceFeeRate: number;
}

export interface FareBreakdown {
  seatCount: number;
  pricePerSeat: number;
  baseFare: number;
  taxes: number;
  serviceFee: number;
  totalAmount: number;
}

export const defaultPricingPolicy: PricingPolicy = {
  taxRate: config.pricing.taxRate,
  serviceFeeRate: config.pricing.serviceFeeRate
};

/**
 * Round half-up to cents (2.345 -> 2.35)
 */
export function roundCurrency(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

export function calculateFare(
  pricePerSeat: number,
  seatCount: number,
  policy: PricingPolicy = defaultPricingPolicy
): FareBreakdown {
  const baseFare = roundCurrency(pricePerSeat * seatCount);
  const taxes = roundCurrency(baseFare * policy.taxRate);
  const serviceFee = roundCurrency(baseFare * policy.serviceFeeRate);

  return {
    seatCount,
    pricePerSeat,
    baseFare,
    taxes,
    serviceFee,
    totalAmount: roundCurrency(baseFare + taxes + serviceFee)
  };
}
