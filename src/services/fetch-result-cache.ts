import { MemoCache } from '../util/cache';
import { EnergyFetchResult, IsoDate, TimeUnit } from '../types';

export function fetchCacheKey(timeUnit: TimeUnit, start: IsoDate, end: IsoDate): string {
  return `${timeUnit}:${start}:${end}`;
}

// The dataset is frozen; everything around it is copied
function copyResult(result: EnergyFetchResult): EnergyFetchResult {
  return {
    ...result,
    range: { ...result.range },
    chunks: result.chunks.map(chunk => ({ ...chunk })),
    warnings: result.warnings.map(warning => ({ ...warning, range: { ...warning.range } }))
  };
}

/**
 * Session memo of completed fetches keyed by (time unit, start, end).
 * Unbounded, no eviction: closed past intervals do not change.
 * Results go in and come out as copies, so callers never share state with
 * the memo.
 */
export class FetchResultCache {
  private readonly cache: MemoCache<EnergyFetchResult>;

  constructor(cache: MemoCache<EnergyFetchResult> = new MemoCache<EnergyFetchResult>()) {
    this.cache = cache;
  }

  get(timeUnit: TimeUnit, start: IsoDate, end: IsoDate): EnergyFetchResult | undefined {
    const cached = this.cache.get(fetchCacheKey(timeUnit, start, end));
    return cached ? copyResult(cached) : undefined;
  }

  set(result: EnergyFetchResult): void {
    this.cache.set(fetchCacheKey(result.timeUnit, result.range.start, result.range.end), copyResult(result));
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
