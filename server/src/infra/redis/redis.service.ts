/**
 * Redis Service - Singleton Manager for the Shared Redis Client
 *
 * Usage:
 * ```typescript
 * // Server startup (before listen):
 * const client = await RedisService.start({ url: REDIS_URL });
 *
 * // Shutdown:
 * await RedisService.close();
 * ```
 */

import { Redis, type Redis as RedisClient } from 'ioredis';
import { logger } from '../../lib/logger/structured-logger.js';

export interface RedisServiceOptions {
  url: string;
  maxRetriesPerRequest?: number;
  connectTimeout?: number;
  commandTimeout?: number;
  /** Total startup timeout (default: 8000ms) */
  startupTimeout?: number;
}

/** host:port only, never credentials */
export function redactRedisUrl(url: string): string {
  const match = url.match(/:\/\/([^@]+@)?([^/]+)/);
  return match ? match[2] : 'unknown';
}

class RedisServiceSingleton {
  private client: RedisClient | null = null;
  private startPromise: Promise<RedisClient> | null = null;

  /**
   * Connect and verify with PING. Rejects when Redis is unreachable;
   * the order store cannot run degraded, so callers treat this as fatal.
   */
  start(options: RedisServiceOptions): Promise<RedisClient> {
    if (!this.startPromise) {
      this.startPromise = this.connect(options).catch((err: unknown) => {
        this.startPromise = null;
        throw err;
      });
    }
    return this.startPromise;
  }

  private async connect(options: RedisServiceOptions): Promise<RedisClient> {
    const {
      url,
      maxRetriesPerRequest = 2,
      connectTimeout = 2000,
      commandTimeout = 2000,
      startupTimeout = 8000
    } = options;

    const hostPort = redactRedisUrl(url);
    const startTime = Date.now();

    logger.info({
      event: 'redis_connect_start',
      redisUrl: hostPort,
      connectTimeout,
      startupTimeout
    }, '[RedisService] Starting Redis connection');

    const redis = new Redis(url, {
      maxRetriesPerRequest,
      connectTimeout,
      commandTimeout,
      retryStrategy: (times: number) => Math.min(times * 100, 2000),
      lazyConnect: true,
      enableOfflineQueue: false,
      enableReadyCheck: true
    });

    redis.on('error', (err: Error) => {
      logger.warn({ event: 'redis_error', error: err.message }, '[RedisService] Redis error');
    });

    let timer: NodeJS.Timeout | undefined;
    try {
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Startup timeout after ${startupTimeout}ms`)), startupTimeout);
      });
      await Promise.race([redis.connect(), timeout]);

      const pong = await redis.ping();
      if (pong !== 'PONG') {
        throw new Error('PING test failed');
      }
    } catch (err) {
      logger.error({
        event: 'redis_connect_fail',
        error: err instanceof Error ? err.message : String(err),
        durationMs: Date.now() - startTime,
        redisUrl: hostPort
      }, '[RedisService] Redis connection failed');
      redis.disconnect();
      throw err;
    } finally {
      clearTimeout(timer);
    }

    logger.info({
      event: 'redis_connect_ok',
      redisUrl: hostPort,
      durationMs: Date.now() - startTime
    }, '[RedisService] Redis connected');

    this.client = redis;
    return redis;
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      logger.info({ event: 'redis_closed' }, '[RedisService] Connection closed');
      this.client = null;
      this.startPromise = null;
    }
  }
}

export const RedisService = new RedisServiceSingleton();
