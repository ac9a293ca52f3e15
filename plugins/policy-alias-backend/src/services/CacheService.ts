import NodeCache from 'node-cache';

export interface CacheService {
  get<T>(key: string): T | undefined;
  set<T>(key: string, value: T, ttlSeconds?: number): boolean;
  close(): void;
}

export class InMemoryCacheService implements CacheService {
  private cache: NodeCache;

  // defaultTtlSeconds 0 keeps entries until they are replaced
  constructor(options: { defaultTtlSeconds?: number; checkPeriodSeconds?: number } = {}) {
    this.cache = new NodeCache({
      stdTTL: options.defaultTtlSeconds ?? 0,
      checkperiod: options.checkPeriodSeconds ?? 0,
      useClones: false, // snapshots are frozen and handed out by reference
    });
  }

  get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set<T>(key: string, value: T, ttlSeconds?: number): boolean {
    if (ttlSeconds !== undefined) {
      return this.cache.set(key, value, ttlSeconds);
    }
    return this.cache.set(key, value);
  }

  close(): void {
    this.cache.close();
  }
}
