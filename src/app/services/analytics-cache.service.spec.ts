import { lastValueFrom, of } from 'rxjs';
import { describe, expect, it, vi } from 'vitest';

import { AnalyticsCacheService } from './analytics-cache.service';

function clock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    }
  };
}

describe('AnalyticsCacheService', () => {
  it('fetches once and serves the cached value until it expires', async () => {
    const time = clock();
    const cache = new AnalyticsCacheService<number>(1000, time.now);
    const fetch = vi.fn(() => of(42));

    expect(await lastValueFrom(cache.get('answer', fetch))).toBe(42);
    expect(await lastValueFrom(cache.get('answer', fetch))).toBe(42);
    expect(fetch).toHaveBeenCalledTimes(1);

    time.advance(1000);
    await lastValueFrom(cache.get('answer', fetch));
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('honours a per-call ttl', async () => {
    const time = clock();
    const cache = new AnalyticsCacheService<string>(60_000, time.now);
    const fetch = vi.fn(() => of('fresh'));

    await lastValueFrom(cache.get('k', fetch, 10));
    time.advance(10);
    await lastValueFrom(cache.get('k', fetch, 10));
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('invalidates single keys and patterns', async () => {
    const cache = new AnalyticsCacheService<number>();
    for (const key of ['series:cam-1::', 'summary:cam-1::', 'series:cam-2::']) {
      await lastValueFrom(cache.get(key, () => of(1)));
    }

    cache.invalidate('series:cam-2::');
    expect(cache.getStats()).toEqual({ size: 2, keys: ['series:cam-1::', 'summary:cam-1::'] });

    cache.invalidatePattern(/^summary:/);
    expect(cache.getStats().keys).toEqual(['series:cam-1::']);

    cache.clear();
    expect(cache.getStats().size).toBe(0);
  });

  it('removes expired entries on cleanup', async () => {
    const time = clock();
    const cache = new AnalyticsCacheService<number>(100, time.now);
    await lastValueFrom(cache.get('short', () => of(1)));
    await lastValueFrom(cache.get('long', () => of(2), 500));

    time.advance(200);
    cache.cleanup();
    expect(cache.getStats().keys).toEqual(['long']);
  });

  it('hands out frozen results so one caller cannot change what the next one sees', async () => {
    const cache = new AnalyticsCacheService<{ camera_id: string; counts: Record<string, number> }[]>();
    const load = () => of([{ camera_id: 'cam-1', counts: { car: 2 } }]);

    const first = await lastValueFrom(cache.get('series:cam-1::', load));
    expect(Object.isFrozen(first)).toBe(true);
    expect(() => first.push({ camera_id: 'cam-2', counts: {} })).toThrow(TypeError);
    expect(() => {
      const row = first[0];
      if (row) row.counts['car'] = 99;
    }).toThrow(TypeError);

    const second = await lastValueFrom(cache.get('series:cam-1::', load));
    expect(second).toEqual([{ camera_id: 'cam-1', counts: { car: 2 } }]);
  });
});
