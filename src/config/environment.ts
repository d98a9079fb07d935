/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * HOLDS:
 * - HOLD_TTL_MINUTES is the lifetime of a fresh seat hold (default 10)
 * - HOLD_MAX_EXTENSION_MINUTES caps a single extend call
 *
 * STORES:
 * - REDIS_ENABLED=false keeps holds in an in-process TTL map (dev/test only)
 * - DATABASE_FILE empty keeps trips and bookings in memory (tests)
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined ? defaultValue : value;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get integer environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get decimal environment variable (rates)
 */
function getFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

const nodeEnv = getOptional('NODE_ENV', 'development');

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Expiring store for seat holds
  redis: {
    enabled: getBoolean('REDIS_ENABLED', false),
    url: getOptional('REDIS_URL', 'redis://localhost:6379'),
  },

  // Trip catalog + booking store (JSON file, empty path = memory only)
  database: {
    file: getOptional('DATABASE_FILE', nodeEnv === 'test' ? '' : 'data/database.json'),
    seedFile: getOptional('DATABASE_SEED_FILE', nodeEnv === 'test' ? '' : 'data/seed.json'),
  },

  // Seat holds
  hold: {
    ttlMinutes: getNumber('HOLD_TTL_MINUTES', 10),
    maxExtensionMinutes: getNumber('HOLD_MAX_EXTENSION_MINUTES', 10),
    maxSeatsPerHold: getNumber('HOLD_MAX_SEATS', 6),
  },

  // Pricing policy (fractions of base fare)
  pricing: {
    taxRate: getFloat('PRICING_TAX_RATE', 0.18),
    serviceFeeRate: getFloat('PRICING_SERVICE_FEE_RATE', 0.05),
  },

  // Orphaned seat-lock sweep (tidiness only)
  sweep: {
    enabled: getBoolean('SEAT_LOCK_SWEEP_ENABLED', true),
    intervalMs: getNumber('SEAT_LOCK_SWEEP_INTERVAL_MS', 2 * 60 * 1000),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast on values the hold and pricing logic cannot work with
 */
export function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.hold.ttlMinutes <= 0) {
    errors.push('HOLD_TTL_MINUTES must be a positive number of minutes');
  }
  if (config.hold.maxExtensionMinutes <= 0) {
    errors.push('HOLD_MAX_EXTENSION_MINUTES must be a positive number of minutes');
  }
  if (config.hold.maxSeatsPerHold <= 0) {
    errors.push('HOLD_MAX_SEATS must be at least 1');
  }
  for (const [key, rate] of [
    ['PRICING_TAX_RATE', config.pricing.taxRate],
    ['PRICING_SERVICE_FEE_RATE', config.pricing.serviceFeeRate],
  ] as const) {
    if (rate < 0 || rate > 1) {
      errors.push(`${key} must be between 0 and 1 (got ${rate})`);
    }
  }

  if (config.isProduction) {
    // Redis must back holds when more than one instance is running
    if (!config.redis.enabled) {
      warnings.push('REDIS_ENABLED is false - seat holds will not be shared across instances');
    }
    if (!config.database.file) {
      warnings.push('DATABASE_FILE is empty - bookings will be lost on restart');
    }
  }

  // Log warnings
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  // Throw on errors
  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
