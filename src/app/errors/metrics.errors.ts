/**
 * Error taxonomy for the metrics engine.
 * Every failure either aborts the run with one of these or is resolved by a configured policy.
 */

/**
 * Invalid configuration. Raised before any event is processed.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[] | string) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(`Invalid configuration: ${list.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = list;
  }
}

export class OutOfOrderEventError extends Error {
  constructor(
    readonly camera_id: string,
    readonly timestamp: number,
    readonly bucket_index: number
  ) {
    super(
      `Out-of-order event for camera ${camera_id}: timestamp ${timestamp}s ` +
      `arrived while bucket ${bucket_index} is open`
    );
    this.name = 'OutOfOrderEventError';
  }
}

export class UnknownVehicleClassError extends Error {
  constructor(
    readonly camera_id: string,
    readonly vehicle_class: string,
    readonly timestamp: number
  ) {
    super(`Unknown vehicle class "${vehicle_class}" for camera ${camera_id} at ${timestamp}s`);
    this.name = 'UnknownVehicleClassError';
  }
}

/**
 * Malformed event, or an event that belongs to another camera's stream.
 */
export class InvalidDetectionEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDetectionEventError';
  }
}

/**
 * Raised by a sink when a bucket could not be persisted.
 * The engine propagates it unmodified; retry policy belongs to the caller.
 */
export class SinkWriteError extends Error {
  constructor(
    readonly camera_id: string,
    readonly bucket_index: number,
    cause: unknown
  ) {
    super(`Failed to persist bucket ${bucket_index} for camera ${camera_id}`, { cause });
    this.name = 'SinkWriteError';
  }
}
