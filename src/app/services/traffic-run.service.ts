import { randomUUID } from 'node:crypto';

import { defer, forkJoin, lastValueFrom, of } from 'rxjs';
import { catchError, map } from 'rxjs/operators';

import { configHash } from '../config/metrics-config';
import type { MetricsConfig } from '../config/metrics-config';
import { fromEventSource } from '../detection/detection-source';
import type { DetectionEventSource } from '../detection/detection-source';
import { createLogger } from '../logging/logger';
import type { PipelineSummary } from '../models/metrics.model';
import type { MetricsStore, PipelineRun } from '../models/store.model';
import { floorToBucket } from './bucketer.service';
import { seedRollingMax } from './density-scorer.service';
import { MetricsPipelineService } from './metrics-pipeline.service';

const logger = createLogger('TRAFFIC-RUN');

export interface CameraJob {
  camera_id: string;
  source_id: string;               // identifies the input, e.g. the video path
  source: DetectionEventSource;
  started_at?: Date;               // run start; defaults to now
}

export type CameraRunResult =
  | { status: 'skipped'; camera_id: string; run_id: string }
  | { status: 'completed'; camera_id: string; run_id: string; resumed: boolean; summary: PipelineSummary }
  | { status: 'failed'; camera_id: string; error: unknown };

type PreparedRun =
  | { kind: 'skipped'; run_id: string }
  | { kind: 'started'; run: PipelineRun; pipeline: MetricsPipelineService; resumed: boolean };

export interface TrafficRunOptions {
  now?: () => Date;
  newRunId?: () => string;
  onRunCompleted?: (camera_id: string) => void;
}

/**
 * Runs the per-camera pipeline against a store, tracking each run in the ledger.
 *
 * A completed run for the same camera, source and config is not repeated. A failed
 * or interrupted one is resumed: buckets are recomputed and only those after the
 * checkpoint are written again.
 */
export class TrafficRunService {
  readonly config_hash: string;
  private readonly now: () => Date;
  private readonly newRunId: () => string;

  constructor(
    private readonly config: MetricsConfig,
    private readonly store: MetricsStore,
    private readonly options: TrafficRunOptions = {}
  ) {
    this.config_hash = configHash(config);
    this.now = options.now ?? (() => new Date());
    this.newRunId = options.newRunId ?? (() => randomUUID());
  }

  async runCamera(job: CameraJob): Promise<CameraRunResult> {
    const { camera_id } = job;
    let prepared: PreparedRun;
    try {
      prepared = await this.prepare(job);
    } catch (error) {
      // the pipeline never subscribed, so nothing else will close the source
      await this.closeSource(job);
      throw error;
    }

    if (prepared.kind === 'skipped') {
      await this.closeSource(job);
      return { status: 'skipped', camera_id, run_id: prepared.run_id };
    }

    const { run, pipeline, resumed } = prepared;
    try {
      const summary = await pipeline.run(fromEventSource(job.source), this.store, {
        skipThrough: run.last_bucket_index,
        afterWrite: metrics => this.store.recordCheckpoint(run.run_id, metrics.bucket.bucket_index)
      });
      await this.store.updateRunStatus(run.run_id, 'completed', this.now().toISOString());
      this.options.onRunCompleted?.(camera_id);
      return { status: 'completed', camera_id, run_id: run.run_id, resumed, summary };
    } catch (error) {
      await this.markFailed(run.run_id, error);
      throw error;
    }
  }

  /**
   * Cameras are independent: each gets its own pipeline and rolling state, and
   * one camera failing does not stop the others.
   */
  runCameras(jobs: CameraJob[]): Promise<CameraRunResult[]> {
    const runs = jobs.map(job => defer(() => this.runCamera(job)).pipe(
      catchError(error => of<CameraRunResult>({ status: 'failed', camera_id: job.camera_id, error }))
    ));
    return lastValueFrom(forkJoin(runs).pipe(map(results => [...results])), { defaultValue: [] });
  }

  /** Finds or records the ledger row and builds the pipeline, without reading the source */
  private async prepare(job: CameraJob): Promise<PreparedRun> {
    const { camera_id, source_id } = job;
    const existing = await this.store.findRun(camera_id, source_id, this.config_hash);

    if (existing?.status === 'completed') {
      logger.info(`Run already completed for camera ${camera_id} source ${source_id}`);
      return { kind: 'skipped', run_id: existing.run_id };
    }

    const anchor = existing
      ? new Date(existing.bucket_anchor)
      : floorToBucket(job.started_at ?? this.now(), this.config.bucket_seconds);
    const rolling = this.config.density.mode === 'rolling'
      ? seedRollingMax(camera_id, this.config.density, await this.store.getRollingMax(camera_id))
      : undefined;
    // Configuration problems surface here, before the run is recorded
    const pipeline = new MetricsPipelineService({ camera_id, config: this.config, anchor, rolling });

    const run = existing ?? this.newRun(job, anchor);
    if (existing) {
      logger.info(
        `Resuming run ${run.run_id} for camera ${camera_id} after bucket ${run.last_bucket_index ?? 'none'}`
      );
      await this.store.updateRunStatus(run.run_id, 'running', null, null);
    } else {
      logger.info(`Starting run ${run.run_id} for camera ${camera_id}`);
      await this.store.createRun(run);
    }
    return { kind: 'started', run, pipeline, resumed: existing !== undefined };
  }

  private async closeSource(job: CameraJob): Promise<void> {
    if (!job.source.close) return;
    try {
      await job.source.close();
    } catch (error) {
      logger.error(`Failed to close the source of camera ${job.camera_id}:`, error);
    }
  }

  private newRun(job: CameraJob, anchor: Date): PipelineRun {
    return {
      run_id: this.newRunId(),
      camera_id: job.camera_id,
      source_id: job.source_id,
      config_hash: this.config_hash,
      bucket_anchor: anchor.toISOString(),
      started_at: this.now().toISOString(),
      ended_at: null,
      status: 'running',
      error_message: null,
      last_bucket_index: null
    };
  }

  private async markFailed(run_id: string, error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    try {
      await this.store.updateRunStatus(run_id, 'failed', this.now().toISOString(), message);
    } catch (statusError) {
      logger.error(`Failed to update run status for run ${run_id}:`, statusError);
    }
  }
}
