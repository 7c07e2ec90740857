import NodeCache from 'node-cache';

interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  /** Resolves to the number of keys removed */
  del(key: string): Promise<number>;
  quit?(): Promise<void>;
}

/** Entries never expire in the backend; expiry is checked when read. */
class InMemoryBackend implements CacheBackend {
  private readonly store = new NodeCache({ stdTTL: 0, checkperiod: 0, useClones: false });

  async get(key: string): Promise<string | null> {
    const val = this.store.get<string>(key);
    return Promise.resolve(val ?? null);
  }

  async set(key: string, value: string): Promise<void> {
    this.store.set(key, value);
    return Promise.resolve();
  }

  async del(key: string): Promise<number> {
    return Promise.resolve(this.store.del(key));
  }
}

class RedisBackend implements CacheBackend {
  private client: import('ioredis').Redis | null = null;
  private ready = false;

  async connect(url: string): Promise<void> {
    const { default: Redis } = await import('ioredis');
    this.client = new Redis(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      connectTimeout: 3000,
      maxRetriesPerRequest: 1,
    });

    this.client.on('ready', () => {
      this.ready = true;
    });
    this.client.on('error', (err: Error) => {
      this.ready = false;
      console.warn('RecommendationCache: Redis error:', err.message);
    });

    try {
      await this.client.connect();
    } catch (err) {
      this.ready = false;
      console.warn('RecommendationCache: Redis connect failed:', err instanceof Error ? err.message : err);
    }
  }

  get isReady(): boolean {
    return this.ready;
  }

  async get(key: string): Promise<string | null> {
    if (!this.client || !this.ready) return null;
    return this.client.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    if (!this.client || !this.ready) return;
    await this.client.set(key, value);
  }

  async del(key: string): Promise<number> {
    if (!this.client || !this.ready) return 0;
    return this.client.del(key);
  }

  async quit(): Promise<void> {
    if (this.client) {
      await this.client.quit();
    }
  }

  /** Drop a client that never became ready so it stops reconnecting. */
  abandon(): void {
    this.client?.disconnect();
    this.client = null;
  }
}

export interface CachedRecommendationSet<T> {
  farmerId: string;
  payload: T;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601 */
  expiresAt: string;
}

export interface RecommendationCacheOptions {
  ttlSeconds: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

/**
 * One live recommendation set per farmer.
 *
 * `put` always replaces the previous entry. Expired entries stay stored until
 * overwritten or invalidated, but `get` never returns them.
 */
export class RecommendationCache<T> {
  private backend: CacheBackend;
  private readonly fallback = new InMemoryBackend();
  private readonly ttl: number;
  private readonly now: () => number;
  private usingRedis = false;

  constructor({ ttlSeconds, now = Date.now }: RecommendationCacheOptions) {
    this.ttl = ttlSeconds;
    this.now = now;
    this.backend = this.fallback;
  }

  async connect(redisUrl: string): Promise<void> {
    const redisBackend = new RedisBackend();
    await redisBackend.connect(redisUrl);

    if (redisBackend.isReady) {
      this.backend = redisBackend;
      this.usingRedis = true;
      console.info('✅ RecommendationCache: connected to Redis');
    } else {
      redisBackend.abandon();
      console.warn('⚠️  RecommendationCache: Redis unavailable, falling back to in-memory cache');
    }
  }

  get isRedis(): boolean {
    return this.usingRedis;
  }

  get ttlSeconds(): number {
    return this.ttl;
  }

  /** The live entry for a farmer, or null when absent or expired. */
  async get(farmerId: string): Promise<CachedRecommendationSet<T> | null> {
    const record = await this.peek(farmerId);
    if (!record) return null;
    return this.now() < Date.parse(record.expiresAt) ? record : null;
  }

  /** The stored entry regardless of expiry. */
  async peek(farmerId: string): Promise<CachedRecommendationSet<T> | null> {
    try {
      const raw = await this.backend.get(RecommendationCache.buildKey(farmerId));
      if (raw === null) return null;
      return JSON.parse(raw) as CachedRecommendationSet<T>;
    } catch (err) {
      console.warn('RecommendationCache.get failed:', err);
      return null;
    }
  }

  async put(farmerId: string, payload: T, ttlSeconds = this.ttl): Promise<CachedRecommendationSet<T>> {
    const createdAt = this.now();
    const record: CachedRecommendationSet<T> = {
      farmerId,
      payload,
      createdAt: new Date(createdAt).toISOString(),
      expiresAt: new Date(createdAt + ttlSeconds * 1000).toISOString(),
    };

    try {
      await this.backend.set(RecommendationCache.buildKey(farmerId), JSON.stringify(record));
    } catch (err) {
      console.warn('RecommendationCache.put failed:', err);
    }
    return record;
  }

  /** Idempotent. Resolves to whether an entry was removed. */
  async invalidate(farmerId: string): Promise<boolean> {
    try {
      return (await this.backend.del(RecommendationCache.buildKey(farmerId))) > 0;
    } catch (err) {
      console.warn('RecommendationCache.invalidate failed:', err);
      return false;
    }
  }

  async quit(): Promise<void> {
    if (this.backend.quit) {
      await this.backend.quit();
    }
  }

  static buildKey(farmerId: string): string {
    return `recommendations:${farmerId}`;
  }
}
