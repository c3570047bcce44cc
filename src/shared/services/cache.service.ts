/**
 * =============================================================================
 * CACHE SERVICE - In-memory TTL cache
 * =============================================================================
 *
 * Holds geocoding lookups (address query → coordinates) so repeated addresses
 * do not hit Nominatim / Google again. Route state is never cached: every
 * optimization builds its own matrix.
 *
 * FOR BACKEND DEVELOPERS:
 * - Import { cacheService } from './cache.service'
 * - set() stores JSON, get() returns the parsed value as `unknown`;
 *   validate it before use (see geocoding.service.ts)
 * - The CacheStore interface is the seam for a shared store later on
 *
 * @module cache.service
 * =============================================================================
 */

import { logger } from './logger.service';

// =============================================================================
// CACHE INTERFACE
// =============================================================================

export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  size(): number;
}

// =============================================================================
// IN-MEMORY CACHE
// =============================================================================

export class InMemoryCache implements CacheStore {
  private store = new Map<string, { value: string; expiresAt?: number }>();
  private cleanupTimer: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = 60000) {
    this.cleanupTimer = setInterval(() => this.cleanup(), cleanupIntervalMs);
    // Never keep the process (or a test run) alive just for cleanup
    this.cleanupTimer.unref();
  }

  async get(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const entry: { value: string; expiresAt?: number } = { value };

    if (ttlSeconds && ttlSeconds > 0) {
      entry.expiresAt = Date.now() + ttlSeconds * 1000;
    }

    this.store.set(key, entry);
  }

  async delete(key: string): Promise<boolean> {
    return this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.expiresAt && now > entry.expiresAt) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`Cache cleanup: removed ${cleaned} expired entries`);
    }
  }
}

// =============================================================================
// CACHE SERVICE (Unified Interface)
// =============================================================================

export class CacheService {
  private readonly prefix = 'route-optimizer:';

  constructor(private readonly cache: CacheStore = new InMemoryCache()) {}

  /**
   * Parsed JSON value, or null when absent/expired/unparseable
   */
  async get(key: string): Promise<unknown> {
    const value = await this.cache.get(this.prefix + key);
    if (value === null) return null;

    try {
      const parsed: unknown = JSON.parse(value);
      return parsed;
    } catch (error) {
      logger.warn('Discarding unparseable cache entry', {
        key,
        error: error instanceof Error ? error.message : String(error)
      });
      await this.cache.delete(this.prefix + key);
      return null;
    }
  }

  /**
   * @param ttlSeconds - Time to live (optional, no expiry when omitted)
   */
  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    await this.cache.set(this.prefix + key, JSON.stringify(value), ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(this.prefix + key);
  }

  async clear(): Promise<void> {
    await this.cache.clear();
  }

  getStats(): { size: number } {
    return { size: this.cache.size() };
  }
}

export const cacheService = new CacheService();
