import type { BucketMetrics, DensityLevel } from './metrics.model';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface PipelineRun {
  run_id: string;
  camera_id: string;
  source_id: string;
  config_hash: string;
  bucket_anchor: string;            // ISO instant of bucket 0
  started_at: string;
  ended_at: string | null;
  status: RunStatus;
  error_message: string | null;
  last_bucket_index: number | null; // checkpoint
}

/**
 * Flattened row as stored for dashboard queries
 */
export interface StoredBucketMetrics {
  camera_id: string;
  bucket_ts: string;
  bucket_index: number;
  counts: Record<string, number>;
  total_vehicles: number;
  density_score: number;
  density_level: DensityLevel;
  reference_max: number;
  estimated_co2_kg: number;
  co2_kg_min: number;
  co2_kg_max: number;
}

export interface MetricsQuery {
  camera_id: string;
  from?: string;  // inclusive bucket_ts bound
  to?: string;    // inclusive bucket_ts bound
}

export interface RollingMaxHistory {
  /** Highest per-bucket total ever persisted for the camera, 0 when none */
  getRollingMax(camera_id: string): Promise<number>;
}

export interface MetricsSink {
  /** Idempotent on (camera_id, bucket_ts) */
  upsert(metrics: BucketMetrics): Promise<void>;
}

export interface RunLedger {
  findRun(camera_id: string, source_id: string, config_hash: string): Promise<PipelineRun | undefined>;
  createRun(run: PipelineRun): Promise<void>;
  updateRunStatus(run_id: string, status: RunStatus, ended_at: string | null, error_message?: string | null): Promise<void>;
  recordCheckpoint(run_id: string, bucket_index: number): Promise<void>;
}

export interface MetricsQueryStore {
  listBucketMetrics(query: MetricsQuery): Promise<StoredBucketMetrics[]>;
}

export type MetricsStore = RollingMaxHistory & MetricsSink & RunLedger & MetricsQueryStore;

export function toStoredMetrics(metrics: BucketMetrics): StoredBucketMetrics {
  return {
    camera_id: metrics.bucket.camera_id,
    bucket_ts: metrics.bucket.bucket_ts,
    bucket_index: metrics.bucket.bucket_index,
    counts: { ...metrics.counts.counts },
    total_vehicles: metrics.counts.total,
    density_score: metrics.density.density_score,
    density_level: metrics.density.level,
    reference_max: metrics.density.reference_max,
    estimated_co2_kg: metrics.emission.estimated_co2_kg,
    co2_kg_min: metrics.emission.co2_kg_min,
    co2_kg_max: metrics.emission.co2_kg_max
  };
}
