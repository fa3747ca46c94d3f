import type { MetricsConfig } from '../config/metrics-config';
import { ConfigurationError } from '../errors/metrics.errors';
import type { CountRecord, DensityLevel, DensityRecord } from '../models/metrics.model';

export type DensityOptions = MetricsConfig['density'];

// Level thresholds are fixed: low [0, 0.33], medium (0.33, 0.66], high (0.66, 1]
export const LOW_MAX = 0.33;
export const MEDIUM_MAX = 0.66;

function assertReferenceMax(camera_id: string, reference_max: number): void {
  if (!Number.isInteger(reference_max) || reference_max < 1) {
    throw new ConfigurationError(`reference max for camera ${camera_id} must be an integer >= 1, got ${reference_max}`);
  }
}

export function densityLevel(score: number): DensityLevel {
  if (score <= LOW_MAX) return 'low';
  if (score <= MEDIUM_MAX) return 'medium';
  return 'high';
}

export function fixedReferenceMax(camera_id: string, options: DensityOptions): number {
  return options.reference_max_by_camera[camera_id] ?? options.default_reference_max;
}

/**
 * Per-camera running maximum of bucket totals, seeded from persisted history.
 * Only grows; owned by exactly one pipeline.
 */
export class RollingMaxState {
  private value: number;

  constructor(readonly camera_id: string, seed: number) {
    assertReferenceMax(camera_id, seed);
    this.value = seed;
  }

  get current(): number {
    return this.value;
  }

  observe(total: number): void {
    if (total > this.value) {
      this.value = total;
    }
  }
}

/**
 * Seed for a run: the persisted maximum, or the camera's fixed reference when there is no history yet
 */
export function seedRollingMax(camera_id: string, options: DensityOptions, historyMax: number): RollingMaxState {
  if (!Number.isInteger(historyMax) || historyMax < 0) {
    throw new RangeError(`rolling max history for camera ${camera_id} must be an integer >= 0, got ${historyMax}`);
  }
  const seed = historyMax > 0 ? historyMax : fixedReferenceMax(camera_id, options);
  return new RollingMaxState(camera_id, seed);
}

export class DensityScorer {
  private lastIndex = -1;
  private readonly fixedReference: number | null;

  constructor(
    private readonly camera_id: string,
    private readonly options: DensityOptions,
    private readonly rolling?: RollingMaxState
  ) {
    if (options.mode === 'rolling') {
      if (!rolling) {
        throw new ConfigurationError(`rolling density mode for camera ${camera_id} needs a rolling max state`);
      }
      if (rolling.camera_id !== camera_id) {
        throw new ConfigurationError(`rolling max state of camera ${rolling.camera_id} given to camera ${camera_id}`);
      }
      this.fixedReference = null;
    } else {
      if (rolling) {
        throw new ConfigurationError(`fixed density mode for camera ${camera_id} takes no rolling max state`);
      }
      this.fixedReference = fixedReferenceMax(camera_id, options);
      assertReferenceMax(camera_id, this.fixedReference);
    }
  }

  /** Reference the next bucket will be scored against */
  get referenceMax(): number {
    return this.rolling ? this.rolling.current : (this.fixedReference ?? this.options.default_reference_max);
  }

  /**
   * Score one bucket. Buckets must arrive in increasing index order: in rolling mode
   * a bucket is scored against the maximum through the previous bucket, then folded in.
   */
  score(record: CountRecord): DensityRecord {
    if (record.camera_id !== this.camera_id) {
      throw new RangeError(`count record of camera ${record.camera_id} given to scorer of camera ${this.camera_id}`);
    }
    if (record.bucket_index <= this.lastIndex) {
      throw new RangeError(
        `bucket ${record.bucket_index} for camera ${this.camera_id} scored after bucket ${this.lastIndex}`
      );
    }

    const reference_max = this.referenceMax;
    const density_score = Math.min(1, Math.max(0, record.total / reference_max));

    this.lastIndex = record.bucket_index;
    this.rolling?.observe(record.total);

    return {
      camera_id: record.camera_id,
      bucket_index: record.bucket_index,
      density_score,
      level: densityLevel(density_score),
      reference_max
    };
  }
}
