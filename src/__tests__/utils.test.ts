/**
 * Pricing, PNR generation and log redaction
 */

import { calculateFare, roundCurrency } from '../shared/utils/pricing.utils';
import { generatePnr, generateSecureString, maskForLogging } from '../shared/utils/crypto.utils';
import { sanitizeLogData } from '../shared/services/logger.service';
import { pnrSchema } from '../shared/utils/validation.utils';

const POLICY = { taxRate: 0.18, serviceFeeRate: 0.05 };

describe('pricing', () => {
  it('rounds half up to cents', () => {
    expect(roundCurrency(1.005)).toBe(1.01);
    expect(roundCurrency(2.004)).toBe(2);
  });

  it('breaks down the fare for two seats', () => {
    expect(calculateFare(850, 2, POLICY)).toEqual({
      seatCount: 2,
      pricePerSeat: 850,
      baseFare: 1700,
      taxes: 306,
      serviceFee: 85,
      totalAmount: 2091
    });
  });

  it('rounds every component of a fractional fare', () => {
    const fare = calculateFare(333.33, 3, POLICY);

    expect(fare.baseFare).toBe(999.99);
    expect(fare.taxes).toBe(180);
    expect(fare.serviceFee).toBe(50);
    expect(fare.totalAmount).toBe(1229.99);
  });

  it('applies a zero-rate policy as the plain base fare', () => {
    expect(calculateFare(500, 1, { taxRate: 0, serviceFeeRate: 0 }).totalAmount).toBe(500);
  });
});

describe('PNR', () => {
  it('is 10 upper-case letters or digits', () => {
    for (let i = 0; i < 20; i++) {
      expect(generatePnr()).toMatch(/^[A-Z0-9]{10}$/);
    }
  });

  it('draws only from the given charset', () => {
    expect(generateSecureString(8, 'ab')).toMatch(/^[ab]{8}$/);
    expect(() => generateSecureString(0, 'ab')).toThrow();
  });

  it('normalizes a lower-case lookup', () => {
    expect(pnrSchema.parse(' k7q2zp0m4d ')).toBe('K7Q2ZP0M4D');
    expect(pnrSchema.safeParse('SHORT').success).toBe(false);
  });
});

describe('log redaction', () => {
  it('masks payment references', () => {
    expect(maskForLogging('PAY-TEST-123')).toBe('PA******23');
    expect(maskForLogging('abc')).toBe('****');
  });

  it('redacts contact and payment fields at any depth', () => {
    expect(sanitizeLogData({
      bookingId: 'booking-1',
      paymentReference: 'PAY-TEST-1',
      passengers: [{ seatId: 'A1', phone: '9000000001', email: 'asha@example.com' }],
      holder: { id: 'holder-1', password: 'test-secret' }
    })).toEqual({
      bookingId: 'booking-1',
      paymentReference: '[REDACTED]',
      passengers: [{ seatId: 'A1', phone: '[REDACTED]', email: '[REDACTED]' }],
      holder: { id: 'holder-1', password: '[REDACTED]' }
    });
  });
});
