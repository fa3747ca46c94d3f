import { Observable, defer, from, throwError } from 'rxjs';
import { catchError, map } from 'rxjs/operators';

import { createLogger } from '../logging/logger';
import type { DensityLevel } from '../models/metrics.model';
import type { MetricsQueryStore, StoredBucketMetrics } from '../models/store.model';
import { AnalyticsCacheService } from './analytics-cache.service';

const logger = createLogger('ANALYTICS-SERVICE');

export interface TimeRange {
  from?: string;  // inclusive ISO bucket_ts
  to?: string;    // inclusive ISO bucket_ts
}

export interface MetricsSummary {
  camera_id: string;
  bucket_count: number;
  first_bucket_ts: string | null;
  last_bucket_ts: string | null;
  total_vehicles: number;
  vehicles_by_class: Record<string, number>;
  peak_density_score: number;
  level_distribution: Record<DensityLevel, number>;
  total_co2_kg: number;
  total_co2_kg_min: number;
  total_co2_kg_max: number;
}

export type ExportFormat = 'csv' | 'json';

export function summarize(camera_id: string, rows: readonly StoredBucketMetrics[]): MetricsSummary {
  const summary: MetricsSummary = {
    camera_id,
    bucket_count: rows.length,
    first_bucket_ts: rows[0]?.bucket_ts ?? null,
    last_bucket_ts: rows[rows.length - 1]?.bucket_ts ?? null,
    total_vehicles: 0,
    vehicles_by_class: {},
    peak_density_score: 0,
    level_distribution: { low: 0, medium: 0, high: 0 },
    total_co2_kg: 0,
    total_co2_kg_min: 0,
    total_co2_kg_max: 0
  };

  for (const row of rows) {
    summary.total_vehicles += row.total_vehicles;
    for (const [cls, count] of Object.entries(row.counts)) {
      summary.vehicles_by_class[cls] = (summary.vehicles_by_class[cls] ?? 0) + count;
    }
    summary.peak_density_score = Math.max(summary.peak_density_score, row.density_score);
    summary.level_distribution[row.density_level]++;
    summary.total_co2_kg += row.estimated_co2_kg;
    summary.total_co2_kg_min += row.co2_kg_min;
    summary.total_co2_kg_max += row.co2_kg_max;
  }
  return summary;
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly StoredBucketMetrics[]): string {
  const classes = [...new Set(rows.flatMap(row => Object.keys(row.counts)))].sort();
  const header = [
    'camera_id', 'bucket_ts', 'bucket_index', ...classes, 'total_vehicles',
    'density_score', 'density_level', 'reference_max', 'estimated_co2_kg', 'co2_kg_min', 'co2_kg_max'
  ];
  const lines = rows.map(row => [
    row.camera_id,
    row.bucket_ts,
    row.bucket_index,
    ...classes.map(cls => row.counts[cls] ?? 0),
    row.total_vehicles,
    row.density_score,
    row.density_level,
    row.reference_max,
    row.estimated_co2_kg,
    row.co2_kg_min,
    row.co2_kg_max
  ].map(csvField).join(','));
  return [header.map(csvField).join(','), ...lines].join('\n') + '\n';
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Dashboard queries over persisted bucket metrics, cached per camera and range
 */
export class AnalyticsService {
  private readonly seriesCache: AnalyticsCacheService<StoredBucketMetrics[]>;
  private readonly summaryCache: AnalyticsCacheService<MetricsSummary>;

  constructor(
    private readonly store: MetricsQueryStore,
    cacheTtl: number = AnalyticsCacheService.DEFAULT_TTL,
    now: () => number = Date.now
  ) {
    this.seriesCache = new AnalyticsCacheService(cacheTtl, now);
    this.summaryCache = new AnalyticsCacheService(cacheTtl, now);
  }

  /**
   * Bucket rows for a camera ordered by bucket_ts
   */
  getTimeSeries(camera_id: string, range: TimeRange = {}): Observable<StoredBucketMetrics[]> {
    return this.seriesCache.get(
      this.cacheKey('series', camera_id, range),
      () => defer(() => from(this.store.listBucketMetrics({ camera_id, ...range }))).pipe(
        catchError(this.handleError('getTimeSeries'))
      )
    );
  }

  getSummary(camera_id: string, range: TimeRange = {}): Observable<MetricsSummary> {
    return this.summaryCache.get(
      this.cacheKey('summary', camera_id, range),
      () => this.getTimeSeries(camera_id, range).pipe(map(rows => summarize(camera_id, rows)))
    );
  }

  exportTimeSeries(camera_id: string, format: ExportFormat, range: TimeRange = {}): Observable<string> {
    logger.info(`Exporting ${camera_id} as ${format}`);
    return this.getTimeSeries(camera_id, range).pipe(
      map(rows => (format === 'csv' ? toCsv(rows) : JSON.stringify(rows, null, 2)))
    );
  }

  /**
   * Drop cached results for a camera, e.g. after a run wrote new buckets
   */
  invalidateCamera(camera_id: string): void {
    const pattern = new RegExp(`^(series|summary):${escapeRegExp(camera_id)}:`);
    this.seriesCache.invalidatePattern(pattern);
    this.summaryCache.invalidatePattern(pattern);
  }

  private cacheKey(kind: 'series' | 'summary', camera_id: string, range: TimeRange): string {
    return `${kind}:${camera_id}:${range.from ?? ''}:${range.to ?? ''}`;
  }

  private handleError(operation: string) {
    return (error: unknown): Observable<never> => {
      logger.error(`${operation} failed:`, error);
      return throwError(() => error);
    };
  }
}
