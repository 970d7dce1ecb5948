import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import cacheConfig from '../../../config/cache.config';
import { RedisService } from '../redis.service';

/**
 * Read-through cache of display projections, stored as JSON strings.
 *
 * Reads are best-effort: a Redis failure on `get` degrades to a miss.
 * Evictions are not: a failed `evict` propagates so that a mutation never
 * reports success while a stale entry survives.
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);

  constructor(
    private readonly redisService: RedisService,
    @Inject(cacheConfig.KEY)
    private readonly config: ConfigType<typeof cacheConfig>,
  ) {}

  async get<T>(key: string): Promise<T | undefined> {
    let raw: string | null;
    try {
      raw = await this.redisService.getClient().get(key);
    } catch (error) {
      this.logger.warn(
        `[CACHE] Read failed for ${key}, falling back to store: ${String(error)}`,
      );
      return undefined;
    }

    if (raw === null) {
      this.logger.debug(`[CACHE] Miss: ${key}`);
      return undefined;
    }

    this.logger.debug(`[CACHE] Hit: ${key}`);
    const value: T = JSON.parse(raw);
    return value;
  }

  async put<T>(
    key: string,
    value: T,
    ttlSeconds: number = this.config.ttlSeconds,
  ): Promise<void> {
    try {
      await this.redisService
        .getClient()
        .set(key, JSON.stringify(value), 'EX', ttlSeconds);
    } catch (error) {
      // The value is already computed; a failed write only costs a later miss
      this.logger.warn(`[CACHE] Write failed for ${key}: ${String(error)}`);
    }
  }

  /**
   * Remove every given key in one round trip.
   */
  async evict(...keys: string[]): Promise<void> {
    const unique = [...new Set(keys)];
    if (unique.length === 0) return;

    try {
      const removed = await this.redisService.getClient().del(...unique);
      this.logger.debug(
        `[CACHE] Invalidated ${unique.length} keys (removed: ${removed})`,
      );
    } catch (error) {
      this.logger.error(
        `[CACHE] Failed to invalidate keys ${unique.join(', ')}:`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  /**
   * Cache-first read: returns the cached value, or loads, stores and
   * returns a fresh one.
   */
  async getOrLoad<T>(
    key: string,
    loader: () => Promise<T>,
    ttlSeconds: number = this.config.ttlSeconds,
  ): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== undefined) return cached;

    const value = await loader();
    await this.put(key, value, ttlSeconds);
    return value;
  }
}
