import { Observable } from 'rxjs';
import type { OperatorFunction } from 'rxjs';

import { ConfigurationError, InvalidDetectionEventError, OutOfOrderEventError } from '../errors/metrics.errors';
import { isEndOfStream } from '../models/detection.model';
import type { DetectionEvent, StreamItem } from '../models/detection.model';
import type { Bucket, ClosedBucket } from '../models/metrics.model';

export interface BucketerOptions {
  camera_id: string;
  bucket_seconds: number;
  anchor: Date;  // run start; floored to a bucket boundary
}

/** Receives one finalized bucket; returning false stops the bucketer */
export type BucketEmitter = (closed: ClosedBucket) => boolean;

function collector(): { closed: ClosedBucket[]; emit: BucketEmitter } {
  const closed: ClosedBucket[] = [];
  return {
    closed,
    emit: bucket => {
      closed.push(bucket);
      return true;
    }
  };
}

/**
 * Floor an instant to a multiple of bucket_seconds in epoch seconds
 */
export function floorToBucket(value: Date, bucket_seconds: number): Date {
  const seconds = Math.floor(value.getTime() / 1000);
  const remainder = ((seconds % bucket_seconds) + bucket_seconds) % bucket_seconds;
  return new Date((seconds - remainder) * 1000);
}

/**
 * Partitions one camera's chronological events into contiguous fixed windows.
 *
 * Bucket 0 is open from the start. An event for a later bucket closes the open
 * bucket and every empty bucket in between, so the emitted series has no gaps.
 */
export class Bucketer {
  private openIndex = 0;
  private openEvents: DetectionEvent[] = [];
  private lastTimestamp: number | null = null;
  private finished = false;
  private readonly anchorMs: number;

  constructor(private readonly options: BucketerOptions) {
    if (!Number.isInteger(options.bucket_seconds) || options.bucket_seconds <= 0) {
      throw new ConfigurationError(`bucket_seconds must be a positive integer, got ${options.bucket_seconds}`);
    }
    this.anchorMs = floorToBucket(options.anchor, options.bucket_seconds).getTime();
  }

  get currentBucketIndex(): number {
    return this.openIndex;
  }

  get anchor(): Date {
    return new Date(this.anchorMs);
  }

  bucketIndexOf(timestamp: number): number {
    return Math.floor(timestamp / this.options.bucket_seconds);
  }

  /**
   * Accept the next event; returns the buckets it finalized (possibly none)
   */
  push(event: DetectionEvent): ClosedBucket[] {
    const { closed, emit } = collector();
    this.pushEach(event, emit);
    return closed;
  }

  /**
   * Like push, but hands each finalized bucket to emit as soon as it is built.
   * A long gap therefore never sits in memory at once. When emit returns false
   * the bucketer stops and accepts nothing more.
   */
  pushEach(event: DetectionEvent, emit: BucketEmitter): void {
    const { camera_id } = this.options;
    if (this.finished) {
      throw new InvalidDetectionEventError(`Event for camera ${camera_id} arrived after end of stream`);
    }
    if (event.camera_id !== camera_id) {
      throw new InvalidDetectionEventError(
        `Event for camera ${event.camera_id} in the stream of camera ${camera_id}`
      );
    }
    if (!Number.isFinite(event.frame_timestamp) || event.frame_timestamp < 0) {
      throw new InvalidDetectionEventError(
        `Invalid timestamp ${event.frame_timestamp} for camera ${camera_id}`
      );
    }
    if (this.lastTimestamp !== null && event.frame_timestamp < this.lastTimestamp) {
      throw new OutOfOrderEventError(camera_id, event.frame_timestamp, this.openIndex);
    }

    if (!this.closeThrough(this.bucketIndexOf(event.frame_timestamp), emit)) {
      this.finished = true;
      return;
    }
    this.openEvents.push(event);
    this.lastTimestamp = event.frame_timestamp;
  }

  /**
   * Close the stream. The last open bucket is always emitted; with end_timestamp,
   * empty buckets are emitted through the one containing it.
   */
  finish(end_timestamp?: number): ClosedBucket[] {
    const { closed, emit } = collector();
    this.finishEach(end_timestamp, emit);
    return closed;
  }

  finishEach(end_timestamp: number | undefined, emit: BucketEmitter): void {
    if (this.finished) {
      return;
    }
    let endIndex = this.openIndex;
    if (end_timestamp !== undefined) {
      if (!Number.isFinite(end_timestamp) || end_timestamp < 0) {
        throw new InvalidDetectionEventError(
          `Invalid end-of-stream timestamp ${end_timestamp} for camera ${this.options.camera_id}`
        );
      }
      if (this.lastTimestamp !== null && end_timestamp < this.lastTimestamp) {
        throw new OutOfOrderEventError(this.options.camera_id, end_timestamp, this.openIndex);
      }
      endIndex = Math.max(endIndex, this.bucketIndexOf(end_timestamp));
    }

    this.finished = true;
    if (this.closeThrough(endIndex, emit)) {
      emit(this.closeOpenBucket());
    }
  }

  /** Emits every bucket before index, starting with the open one; false if emit asked to stop */
  private closeThrough(index: number, emit: BucketEmitter): boolean {
    while (this.openIndex < index) {
      const keepGoing = emit(this.closeOpenBucket());
      this.openIndex++;
      if (!keepGoing) return false;
    }
    return true;
  }

  private closeOpenBucket(): ClosedBucket {
    const events = this.openEvents;
    this.openEvents = [];
    return { bucket: this.describe(this.openIndex), events };
  }

  private describe(bucket_index: number): Bucket {
    const { camera_id, bucket_seconds } = this.options;
    const start_time = bucket_index * bucket_seconds;
    return {
      camera_id,
      bucket_index,
      start_time,
      end_time: start_time + bucket_seconds,
      bucket_ts: new Date(this.anchorMs + start_time * 1000).toISOString()
    };
  }
}

/**
 * rxjs operator over a stream item sequence. An EndOfStream item (or completion) finishes the bucketer.
 */
export function bucketEvents(bucketer: Bucketer): OperatorFunction<StreamItem, ClosedBucket> {
  return source => new Observable<ClosedBucket>(subscriber => {
    // stops gap filling once the consumer has gone away
    const emit: BucketEmitter = bucket => {
      subscriber.next(bucket);
      return !subscriber.closed;
    };

    return source.subscribe({
      next: item => {
        try {
          if (isEndOfStream(item)) {
            bucketer.finishEach(item.end_timestamp, emit);
          } else {
            bucketer.pushEach(item, emit);
          }
        } catch (error) {
          subscriber.error(error);
        }
      },
      error: error => subscriber.error(error),
      complete: () => {
        try {
          bucketer.finishEach(undefined, emit);
          subscriber.complete();
        } catch (error) {
          subscriber.error(error);
        }
      }
    });
  });
}
