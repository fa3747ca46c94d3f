import type { MetricsConfig } from '../config/metrics-config';
import { ConfigurationError } from '../errors/metrics.errors';
import type { CountRecord, EmissionRecord } from '../models/metrics.model';

export interface EmissionOptions {
  bucket_seconds: number;
  factors: Readonly<Record<string, number>>;  // kg CO2 per vehicle per minute
  sensitivity: number;                         // fraction in [0, 1)
}

export function emissionOptionsFrom(config: MetricsConfig): EmissionOptions {
  return {
    bucket_seconds: config.bucket_seconds,
    factors: config.emissions.factors,
    sensitivity: config.emissions.sensitivity
  };
}

/**
 * Converts per-class counts into a CO2 mass for the bucket with a symmetric sensitivity interval.
 * Stateless; a counted class without a factor fails closed.
 */
export class EmissionEstimator {
  private readonly minutesPerBucket: number;

  constructor(private readonly options: EmissionOptions, countedClasses: readonly string[] = []) {
    const issues: string[] = [];
    if (!Number.isInteger(options.bucket_seconds) || options.bucket_seconds <= 0) {
      issues.push(`bucket_seconds must be a positive integer, got ${options.bucket_seconds}`);
    }
    if (!(options.sensitivity >= 0 && options.sensitivity < 1)) {
      issues.push(`sensitivity must be in [0, 1), got ${options.sensitivity}`);
    }
    for (const [cls, factor] of Object.entries(options.factors)) {
      if (!Number.isFinite(factor) || factor < 0) {
        issues.push(`emission factor for "${cls}" must be >= 0, got ${factor}`);
      }
    }
    for (const cls of countedClasses) {
      if (options.factors[cls] === undefined) {
        issues.push(`missing emission factor for counted class "${cls}"`);
      }
    }
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }
    this.minutesPerBucket = options.bucket_seconds / 60;
  }

  estimate(record: CountRecord): EmissionRecord {
    let perMinute = 0;
    for (const cls of Object.keys(record.counts).sort()) {
      const count = record.counts[cls] ?? 0;
      if (count === 0) continue;
      const factor = this.options.factors[cls];
      if (factor === undefined) {
        throw new ConfigurationError(`missing emission factor for counted class "${cls}"`);
      }
      perMinute += count * factor;
    }

    const estimated_co2_kg = perMinute * this.minutesPerBucket;
    const { sensitivity } = this.options;
    return {
      camera_id: record.camera_id,
      bucket_index: record.bucket_index,
      estimated_co2_kg,
      co2_kg_min: estimated_co2_kg * (1 - sensitivity),
      co2_kg_max: estimated_co2_kg * (1 + sensitivity)
    };
  }
}
