import type { DetectionEvent } from './detection.model';

export type DensityLevel = 'low' | 'medium' | 'high';

export interface Bucket {
  camera_id: string;
  bucket_index: number;
  start_time: number;   // seconds from run start
  end_time: number;     // start_time + bucket_seconds
  bucket_ts: string;    // ISO-8601 UTC instant of start_time
}

/**
 * A finalized bucket together with the events that fell into it
 */
export interface ClosedBucket {
  bucket: Bucket;
  events: DetectionEvent[];
}

export interface CountRecord {
  camera_id: string;
  bucket_index: number;
  counts: Record<string, number>;
  total: number;
}

export interface DensityRecord {
  camera_id: string;
  bucket_index: number;
  density_score: number;
  level: DensityLevel;
  reference_max: number;
}

export interface EmissionRecord {
  camera_id: string;
  bucket_index: number;
  estimated_co2_kg: number;
  co2_kg_min: number;
  co2_kg_max: number;
}

/**
 * Everything derived for one closed bucket. Records share (camera_id, bucket_index).
 */
export interface BucketMetrics {
  bucket: Bucket;
  counts: CountRecord;
  density: DensityRecord;
  emission: EmissionRecord;
}

export interface PipelineSummary {
  camera_id: string;
  buckets_emitted: number;
  buckets_written: number;
  total_vehicles: number;
  total_co2_kg: number;
  final_reference_max: number | null;
}
