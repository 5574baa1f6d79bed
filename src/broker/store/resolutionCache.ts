import Redis from 'ioredis';
import { Logger, createLogger } from '../../shared/logger';

/**
 * Numeric dashboard id -> canonical id. Entries are never evicted: upstream
 * ids do not change, so concurrent first writes always converge.
 */
export interface ResolutionCache {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  get(numericId: string): Promise<string | null>;
  set(numericId: string, canonicalId: string): Promise<void>;
}

export class InMemoryResolutionCache implements ResolutionCache {
  private entries: Map<string, string> = new Map();

  async connect(): Promise<void> {
    // No-op for in-memory cache
  }

  async disconnect(): Promise<void> {
    this.entries.clear();
  }

  async get(numericId: string): Promise<string | null> {
    return this.entries.get(numericId) ?? null;
  }

  async set(numericId: string, canonicalId: string): Promise<void> {
    this.entries.set(numericId, canonicalId);
  }
}

const KEY_PREFIX = 'dashboard:';

/**
 * Shares resolutions between broker replicas. Keys carry no TTL.
 */
export class RedisResolutionCache implements ResolutionCache {
  private client: Redis | null = null;
  private readonly log: Logger;

  constructor(private readonly redisUrl: string, logger?: Logger) {
    this.log = logger ?? createLogger('ResolutionCache');
  }

  async connect(): Promise<void> {
    this.client = new Redis(this.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) return null;
        return Math.min(times * 100, 1000);
      },
    });

    await this.client.ping();
    this.log.info('Connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  async get(numericId: string): Promise<string | null> {
    if (!this.client) throw new Error('Redis not connected');
    return this.client.get(`${KEY_PREFIX}${numericId}`);
  }

  async set(numericId: string, canonicalId: string): Promise<void> {
    if (!this.client) throw new Error('Redis not connected');
    await this.client.set(`${KEY_PREFIX}${numericId}`, canonicalId);
  }
}

export function createResolutionCache(redisUrl?: string, logger?: Logger): ResolutionCache {
  if (redisUrl) {
    return new RedisResolutionCache(redisUrl, logger);
  }
  return new InMemoryResolutionCache();
}
