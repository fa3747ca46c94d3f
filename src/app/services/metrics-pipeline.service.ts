import { Observable, defer, lastValueFrom, throwError } from 'rxjs';
import { catchError, concatMap, map, tap, toArray } from 'rxjs/operators';

import type { MetricsConfig } from '../config/metrics-config';
import { createLogger } from '../logging/logger';
import type { StreamItem } from '../models/detection.model';
import type { BucketMetrics, ClosedBucket, PipelineSummary } from '../models/metrics.model';
import type { MetricsSink } from '../models/store.model';
import { Bucketer, bucketEvents } from './bucketer.service';
import { VehicleClassResolver, countBucket } from './counter.service';
import { DensityScorer, RollingMaxState } from './density-scorer.service';
import { EmissionEstimator, emissionOptionsFrom } from './emission-estimator.service';

const logger = createLogger('METRICS-PIPELINE');

export interface MetricsPipelineOptions {
  camera_id: string;
  config: MetricsConfig;
  anchor: Date;
  rolling?: RollingMaxState;  // required in rolling density mode
}

export interface PersistOptions {
  /** Buckets with an index <= this were persisted by an earlier attempt; derive but do not write them */
  skipThrough?: number | null;
  /** Called after each successful upsert, before the next bucket is derived */
  afterWrite?: (metrics: BucketMetrics) => Promise<void>;
}

function freezeMetrics(metrics: BucketMetrics): BucketMetrics {
  Object.freeze(metrics.bucket);
  Object.freeze(metrics.counts.counts);
  Object.freeze(metrics.counts);
  Object.freeze(metrics.density);
  Object.freeze(metrics.emission);
  return Object.freeze(metrics);
}

/**
 * One camera, one run: bucketing, counting, density scoring and emission estimation
 * as a single strictly ordered pipeline. Instances are single-use.
 */
export class MetricsPipelineService {
  readonly camera_id: string;
  private readonly bucketer: Bucketer;
  private readonly resolver: VehicleClassResolver;
  private readonly scorer: DensityScorer;
  private readonly estimator: EmissionEstimator;
  private consumed = false;

  constructor(options: MetricsPipelineOptions) {
    const { camera_id, config } = options;
    this.camera_id = camera_id;
    this.bucketer = new Bucketer({ camera_id, bucket_seconds: config.bucket_seconds, anchor: options.anchor });
    this.resolver = new VehicleClassResolver(config);
    this.scorer = new DensityScorer(camera_id, config.density, options.rolling);
    this.estimator = new EmissionEstimator(emissionOptionsFrom(config), this.resolver.classes);
  }

  get anchor(): Date {
    return this.bucketer.anchor;
  }

  get referenceMax(): number {
    return this.scorer.referenceMax;
  }

  /**
   * Derive every record for a closed bucket. Nothing is emitted if any step fails.
   */
  derive(closed: ClosedBucket): BucketMetrics {
    const counts = countBucket(closed, this.resolver);
    const density = this.scorer.score(counts);
    const emission = this.estimator.estimate(counts);
    return freezeMetrics({ bucket: closed.bucket, counts, density, emission });
  }

  /**
   * Closed buckets as they finalize, not yet derived
   */
  buckets$(items$: Observable<StreamItem>): Observable<ClosedBucket> {
    return defer(() => {
      if (this.consumed) {
        return throwError(() => new Error(`Pipeline for camera ${this.camera_id} has already been run`));
      }
      this.consumed = true;
      return items$.pipe(bucketEvents(this.bucketer));
    });
  }

  metrics$(items$: Observable<StreamItem>): Observable<BucketMetrics> {
    return this.buckets$(items$).pipe(
      map(closed => this.derive(closed)),
      tap(metrics => logger.debug(
        `Bucket ${metrics.bucket.bucket_index} for ${this.camera_id}:`,
        metrics.counts.total, metrics.density.level
      )),
      catchError(this.handleError('metrics'))
    );
  }

  collect(items$: Observable<StreamItem>): Promise<BucketMetrics[]> {
    return lastValueFrom(this.metrics$(items$).pipe(toArray()));
  }

  /**
   * Derive and persist bucket by bucket. Bucket N+1 is derived only after bucket N is written.
   */
  async run(items$: Observable<StreamItem>, sink: MetricsSink, options: PersistOptions = {}): Promise<PipelineSummary> {
    const skipThrough = options.skipThrough ?? null;
    const summary: PipelineSummary = {
      camera_id: this.camera_id,
      buckets_emitted: 0,
      buckets_written: 0,
      total_vehicles: 0,
      total_co2_kg: 0,
      final_reference_max: null
    };

    const written$ = this.buckets$(items$).pipe(
      concatMap(closed => defer(async () => {
        const metrics = this.derive(closed);
        summary.buckets_emitted++;
        summary.total_vehicles += metrics.counts.total;
        summary.total_co2_kg += metrics.emission.estimated_co2_kg;

        if (skipThrough !== null && metrics.bucket.bucket_index <= skipThrough) {
          logger.debug(`Skipping persisted bucket ${metrics.bucket.bucket_index} for ${this.camera_id}`);
          return metrics;
        }
        await sink.upsert(metrics);
        summary.buckets_written++;
        if (options.afterWrite) {
          await options.afterWrite(metrics);
        }
        return metrics;
      })),
      catchError(this.handleError('run'))
    );

    await lastValueFrom(written$, { defaultValue: null });
    summary.final_reference_max = this.scorer.referenceMax;
    logger.info(
      `Camera ${this.camera_id}: ${summary.buckets_emitted} buckets derived, ${summary.buckets_written} written`
    );
    return summary;
  }

  private handleError(operation: string) {
    return (error: unknown): Observable<never> => {
      logger.error(`${operation} failed for camera ${this.camera_id}:`, error);
      return throwError(() => error);
    };
  }
}
