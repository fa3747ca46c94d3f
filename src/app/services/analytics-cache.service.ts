import { Observable, of } from 'rxjs';
import { map, tap } from 'rxjs/operators';

import { createLogger } from '../logging/logger';
import { deepFreeze } from '../utils/deep-freeze';

const logger = createLogger('CACHE');

interface CacheEntry<T> {
  readonly data: T;
  readonly expires_at: number;  // clock value at which the entry goes stale
}

/**
 * Keeps query results for a while so dashboards can poll without hitting the store.
 *
 * Results are deep-frozen when cached: every subscriber shares one value, so a
 * caller that wants to edit a result copies it first.
 */
export class AnalyticsCacheService<T> {
  static readonly DEFAULT_TTL = 5 * 60 * 1000;

  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly defaultTtl: number = AnalyticsCacheService.DEFAULT_TTL,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Serve `key` while it is fresh, otherwise subscribe to `load` and cache what it emits
   */
  get(key: string, load: () => Observable<T>, ttl: number = this.defaultTtl): Observable<T> {
    const requestedAt = this.now();
    const entry = this.entries.get(key);
    if (entry && !this.isStale(entry, requestedAt)) {
      logger.debug(`HIT ${key}`);
      return of(entry.data);
    }

    logger.debug(`MISS ${key}`);
    return load().pipe(
      map(data => deepFreeze(data)),
      tap(data => this.entries.set(key, { data, expires_at: requestedAt + ttl }))
    );
  }

  invalidate(key: string): void {
    if (this.entries.delete(key)) {
      logger.debug(`INVALIDATE ${key}`);
    }
  }

  /** Drop every key the pattern matches, e.g. all ranges cached for one camera */
  invalidatePattern(pattern: RegExp): void {
    this.evictWhere(key => pattern.test(key), 'INVALIDATE');
  }

  clear(): void {
    this.entries.clear();
    logger.debug('CLEAR all entries');
  }

  getStats(): { size: number; keys: string[] } {
    return { size: this.entries.size, keys: [...this.entries.keys()] };
  }

  cleanup(): void {
    const at = this.now();
    const removed = this.evictWhere((_, entry) => this.isStale(entry, at));
    if (removed > 0) {
      logger.debug(`CLEANUP removed ${removed} expired entries`);
    }
  }

  private isStale(entry: CacheEntry<T>, at: number): boolean {
    return at >= entry.expires_at;
  }

  private evictWhere(matches: (key: string, entry: CacheEntry<T>) => boolean, tag?: string): number {
    // collected first so the map is not modified while it is iterated
    const doomed = [...this.entries].filter(([key, entry]) => matches(key, entry)).map(([key]) => key);
    for (const key of doomed) {
      this.entries.delete(key);
      if (tag) logger.debug(`${tag} ${key}`);
    }
    return doomed.length;
  }
}
