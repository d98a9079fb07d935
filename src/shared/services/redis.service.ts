/**
 * =============================================================================
 * REDIS SERVICE - Expiring Key-Value Store
 * =============================================================================
 *
 * WHAT THIS DOES:
 * - Provides a unified Redis interface for the seat hold layer
 * - Handles connection, reconnection and fail-fast command errors
 * - Falls back to an in-process TTL map when Redis is disabled (dev/test)
 *
 * FEATURES:
 * 1. BASIC OPERATIONS     - get, set, del, exists (with TTL)
 * 2. SET IF ABSENT        - setIfAbsent (SET NX EX) for seat index entries
 * 3. COMPARE AND DELETE   - only remove a key that still holds a given value
 * 4. SCAN                 - non-blocking key iteration for the sweep job
 * 5. DISTRIBUTED LOCKS    - acquireLock, releaseLock (job coordination)
 *
 * Every command is a single-key operation. Nothing here spans keys
 * atomically, and callers must not assume it does.
 *
 * USAGE:
 * ```typescript
 * import { redisService } from './redis.service';
 *
 * await redisService.set('key', 'value', 600); // 10 min TTL
 * const won = await redisService.setIfAbsent('seatlock:T1:A1', holdId, 600);
 * ```
 * =============================================================================
 */

import Redis from 'ioredis';
import { config } from '../../config/environment';
import { logger } from './logger.service';

// =============================================================================
// TYPES
// =============================================================================

interface RedisConfig {
  url: string;
  maxRetries: number;
  retryDelayMs: number;
  connectionTimeoutMs: number;
}

export interface LockResult {
  acquired: boolean;
  ttl?: number;
}

/**
 * Operations the store must support.
 * ttl/pttl follow Redis: -2 = key missing, -1 = key without expiry.
 */
export interface IRedisClient {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  del(key: string): Promise<boolean>;
  compareAndDelete(key: string, expected: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  ttl(key: string): Promise<number>;
  pttl(key: string): Promise<number>;
  scanIterator(pattern: string, count?: number): AsyncIterableIterator<string>;
}

// =============================================================================
// IN-MEMORY CLIENT (development / tests)
// =============================================================================

interface MemoryEntry {
  value: string;
  expiresAt?: number;
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  return new RegExp('^' + escaped.replace(/\*/g, '.*').replace(/\?/g, '.') + '$');
}

export class InMemoryRedisClient implements IRedisClient {
  private store = new Map<string, MemoryEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor() {
    // Cleanup expired keys every 10 seconds
    this.cleanupInterval = setInterval(() => this.cleanup(), 10000);
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.expiresAt !== undefined && now >= entry.expiresAt) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`[Redis] Cleanup: removed ${cleaned} expired keys`);
    }
  }

  /**
   * Live entry or undefined. Expired entries are dropped on access.
   */
  private live(key: string): MemoryEntry | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && Date.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }

  async connect(): Promise<void> {
    logger.info('📦 [Redis] In-memory mode - no connection needed');
  }

  async disconnect(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
  }

  isConnected(): boolean {
    return true;
  }

  // =========== Basic Operations ===========

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const entry: MemoryEntry = { value };
    if (ttlSeconds && ttlSeconds > 0) {
      entry.expiresAt = Date.now() + (ttlSeconds * 1000);
    }
    this.store.set(key, entry);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) return false;
    await this.set(key, value, ttlSeconds);
    return true;
  }

  async del(key: string): Promise<boolean> {
    return this.live(key) !== undefined && this.store.delete(key);
  }

  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== expected) return false;
    return this.store.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = Date.now() + (ttlSeconds * 1000);
    return true;
  }

  async ttl(key: string): Promise<number> {
    const remaining = await this.pttl(key);
    return remaining < 0 ? remaining : Math.ceil(remaining / 1000);
  }

  async pttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === undefined) return -1;
    return entry.expiresAt - Date.now();
  }

  async *scanIterator(pattern: string): AsyncIterableIterator<string> {
    const regex = globToRegExp(pattern);
    for (const key of Array.from(this.store.keys())) {
      if (regex.test(key) && this.live(key)) {
        yield key;
      }
    }
  }
}

// =============================================================================
// REAL REDIS CLIENT (production)
// =============================================================================

const COMPARE_AND_DELETE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
else
  return 0
end
`;

export class RealRedisClient implements IRedisClient {
  private client: Redis | null = null;
  private connected = false;
  private reconnecting = false;

  constructor(private readonly redisConfig: RedisConfig) { }

  private get redis(): Redis {
    if (!this.client) {
      throw new Error('Redis client used before connect()');
    }
    return this.client;
  }

  async connect(): Promise<void> {
    const useTls = this.redisConfig.url.startsWith('rediss://');
    const client = new Redis(this.redisConfig.url, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > this.redisConfig.maxRetries) {
          logger.error(`[Redis] Max retries (${this.redisConfig.maxRetries}) exceeded`);
          return null; // Stop retrying
        }
        const delay = Math.min(times * this.redisConfig.retryDelayMs, 10000);
        logger.warn(`[Redis] Retry ${times}/${this.redisConfig.maxRetries} in ${delay}ms`);
        return delay;
      },
      connectTimeout: this.redisConfig.connectionTimeoutMs,
      // Reject commands while disconnected instead of queueing them, so a
      // store outage surfaces as an error rather than a hang.
      enableOfflineQueue: false,
      enableReadyCheck: true,
      tls: useTls ? {} : undefined,
    });
    this.client = client;

    // Event handlers
    client.on('connect', () => {
      logger.info('🔴 [Redis] Connected to Redis server');
      this.connected = true;
      this.reconnecting = false;
    });

    client.on('error', (err: Error) => {
      logger.error(`[Redis] Error: ${err.message}`);
    });

    client.on('close', () => {
      logger.warn('[Redis] Connection closed');
      this.connected = false;
    });

    client.on('reconnecting', () => {
      logger.info('[Redis] Reconnecting...');
      this.reconnecting = true;
    });

    // Wait for connection
    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error('Redis connection timeout'));
      }, this.redisConfig.connectionTimeoutMs);

      client.once('ready', () => {
        clearTimeout(timeout);
        resolve();
      });

      client.once('error', (err: Error) => {
        clearTimeout(timeout);
        reject(err);
      });
    });

    logger.info('🔴 [Redis] Successfully connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
    this.connected = false;
    logger.info('[Redis] Disconnected');
  }

  isConnected(): boolean {
    return this.connected && !this.reconnecting;
  }

  // =========== Basic Operations ===========

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.redis.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.redis.set(key, value);
    }
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.redis.set(key, value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async del(key: string): Promise<boolean> {
    const result = await this.redis.del(key);
    return result > 0;
  }

  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    const result = await this.redis.eval(COMPARE_AND_DELETE_SCRIPT, 1, key, expected);
    return result === 1;
  }

  async exists(key: string): Promise<boolean> {
    const result = await this.redis.exists(key);
    return result > 0;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.redis.expire(key, ttlSeconds);
    return result > 0;
  }

  async ttl(key: string): Promise<number> {
    return this.redis.ttl(key);
  }

  async pttl(key: string): Promise<number> {
    return this.redis.pttl(key);
  }

  async *scanIterator(pattern: string, count = 100): AsyncIterableIterator<string> {
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', count);
      cursor = next;
      for (const key of keys) {
        yield key;
      }
    } while (cursor !== '0');
  }
}

// =============================================================================
// REDIS SERVICE
// =============================================================================

export class RedisService {
  private client: IRedisClient;
  private initialized = false;
  private useRedis = false;

  /**
   * @param client - inject a client (tests); otherwise in-memory until initialize()
   */
  constructor(client?: IRedisClient) {
    this.client = client ?? new InMemoryRedisClient();
    this.initialized = client !== undefined;
  }

  /**
   * Initialize Redis connection
   * Call this at server startup
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (config.redis.enabled) {
      const redisConfig: RedisConfig = {
        url: config.redis.url,
        maxRetries: 5,
        retryDelayMs: 1000,
        connectionTimeoutMs: 10000,
      };

      logger.info(`[Redis] Initializing connection (timeout: ${redisConfig.connectionTimeoutMs}ms, retries: ${redisConfig.maxRetries})`);

      try {
        const realClient = new RealRedisClient(redisConfig);
        await realClient.connect();
        await this.client.disconnect();
        this.client = realClient;
        this.useRedis = true;
        logger.info('✅ [Redis] Redis connected successfully');
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`[Redis] Failed to connect to Redis: ${message}`);

        // Holds kept in one process's memory are invisible to other instances
        if (config.isProduction) {
          throw error;
        }
        logger.warn('⚠️  [Redis] Connection failed, falling back to in-memory mode');
      }
    } else {
      logger.info('📦 [Redis] Using in-memory storage (set REDIS_ENABLED=true for production)');
    }

    this.initialized = true;
  }

  isConnected(): boolean {
    return this.client.isConnected();
  }

  // ===========================================================================
  // BASIC OPERATIONS
  // ===========================================================================

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    return this.client.set(key, value, ttlSeconds);
  }

  /**
   * SET key value NX EX ttl
   * @returns true when this call created the key
   */
  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    return this.client.setIfAbsent(key, value, ttlSeconds);
  }

  async del(key: string): Promise<boolean> {
    return this.client.del(key);
  }

  /**
   * Delete key only while it still holds `expected`
   */
  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    return this.client.compareAndDelete(key, expected);
  }

  async exists(key: string): Promise<boolean> {
    return this.client.exists(key);
  }

  /**
   * Scan keys using an async iterator (non-blocking)
   *
   * @example
   * for await (const key of redisService.scanIterator('seatlock:*')) {
   *   // process key
   * }
   */
  async *scanIterator(pattern: string, count = 100): AsyncIterableIterator<string> {
    for await (const key of this.client.scanIterator(pattern, count)) {
      yield key;
    }
  }

  // ===========================================================================
  // JSON HELPERS
  // ===========================================================================

  async setJSON<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    await this.client.set(key, JSON.stringify(value), ttlSeconds);
  }

  // ===========================================================================
  // DISTRIBUTED LOCKS
  // ===========================================================================

  /**
   * Acquire a lock (SET NX EX). Re-entrant for the same holder.
   *
   * @param lockKey - Unique key for the lock (e.g., 'seat-lock-sweep')
   * @param holderId - ID of the lock holder (e.g., instance id)
   * @param ttlSeconds - Lock expiry time in seconds
   */
  async acquireLock(lockKey: string, holderId: string, ttlSeconds: number): Promise<LockResult> {
    const key = `lock:${lockKey}`;

    if (await this.client.setIfAbsent(key, holderId, ttlSeconds)) {
      return { acquired: true, ttl: ttlSeconds };
    }

    const existing = await this.client.get(key);
    if (existing === holderId) {
      await this.client.expire(key, ttlSeconds);
      return { acquired: true, ttl: ttlSeconds };
    }
    return { acquired: false };
  }

  /**
   * Release a distributed lock
   * Only releases if the holder matches
   */
  async releaseLock(lockKey: string, holderId: string): Promise<boolean> {
    return this.client.compareAndDelete(`lock:${lockKey}`, holderId);
  }

  // ===========================================================================
  // HEALTH CHECK
  // ===========================================================================

  async healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; mode: string; latencyMs?: number }> {
    const start = Date.now();
    const mode = this.useRedis ? 'redis' : 'memory';

    try {
      await this.client.set('health:check', 'ok', 10);
      const value = await this.client.get('health:check');

      if (value !== 'ok') {
        return { status: 'unhealthy', mode };
      }

      return { status: 'healthy', mode, latencyMs: Date.now() - start };
    } catch (error: unknown) {
      logger.warn(`[Redis] Health check failed: ${error instanceof Error ? error.message : String(error)}`);
      return { status: 'unhealthy', mode };
    }
  }

  // ===========================================================================
  // CLEANUP / SHUTDOWN
  // ===========================================================================

  async shutdown(): Promise<void> {
    logger.info('[Redis] Shutting down...');
    await this.client.disconnect();
  }
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

export const redisService = new RedisService();
