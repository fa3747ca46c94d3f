import { countedClasses } from '../config/metrics-config';
import type { ClassMappingOptions } from '../config/metrics-config';
import { ConfigurationError, UnknownVehicleClassError } from '../errors/metrics.errors';
import type { DetectionEvent } from '../models/detection.model';
import type { ClosedBucket, CountRecord } from '../models/metrics.model';

/**
 * Resolves raw detector labels to the configured closed set of vehicle classes
 */
export class VehicleClassResolver {
  readonly classes: readonly string[];
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(private readonly options: ClassMappingOptions) {
    this.classes = countedClasses(options);
    if (this.classes.length === 0) {
      throw new ConfigurationError('vehicle_class_map must map at least one label');
    }

    const aliases = new Map<string, string>();
    for (const cls of this.classes) {
      aliases.set(cls, cls);
    }
    for (const [label, cls] of Object.entries(options.vehicle_class_map)) {
      aliases.set(label.trim().toLowerCase(), cls.trim().toLowerCase());
    }
    this.aliases = aliases;
  }

  resolve(event: DetectionEvent): string {
    const mapped = this.aliases.get(event.vehicle_class.trim().toLowerCase());
    if (mapped !== undefined) {
      return mapped;
    }
    if (this.options.unknown_class_policy === 'other') {
      return this.options.other_class.trim().toLowerCase();
    }
    throw new UnknownVehicleClassError(event.camera_id, event.vehicle_class, event.frame_timestamp);
  }
}

/**
 * Tally a finalized bucket's events per class. Every configured class is present, zero when unseen.
 */
export function countBucket(closed: ClosedBucket, resolver: VehicleClassResolver): CountRecord {
  const counts: Record<string, number> = {};
  for (const cls of resolver.classes) {
    counts[cls] = 0;
  }

  for (const event of closed.events) {
    const cls = resolver.resolve(event);
    counts[cls] = (counts[cls] ?? 0) + 1;
  }

  return {
    camera_id: closed.bucket.camera_id,
    bucket_index: closed.bucket.bucket_index,
    counts,
    total: closed.events.length
  };
}
