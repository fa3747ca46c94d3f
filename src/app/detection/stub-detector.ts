import { endOfStream } from '../models/detection.model';
import type { DetectionEvent, EndOfStream } from '../models/detection.model';
import type { DetectionEventSource } from './detection-source';

export interface StubDetectorOptions {
  mode: 'none' | 'random';
  seed: number;
  max_detections_per_frame: number;
  duration_seconds: number;
  frame_sampling_fps: number;
  classes: readonly string[];
}

/**
 * Small seeded PRNG (mulberry32); the same seed always yields the same sequence
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Deterministic stand-in for a real detector. Samples frames at frame_sampling_fps
 * and reports 0..max_detections_per_frame random vehicles per frame.
 */
export class StubDetectorSource implements DetectionEventSource {
  private readonly random: () => number;
  private frame = 0;
  private pending: DetectionEvent[] = [];

  constructor(private readonly camera_id: string, private readonly options: StubDetectorOptions) {
    if (options.classes.length === 0) {
      throw new RangeError('stub detector needs at least one class to report');
    }
    this.random = seededRandom(options.seed);
  }

  async nextEvent(): Promise<DetectionEvent | EndOfStream> {
    for (;;) {
      const next = this.pending.shift();
      if (next) {
        return next;
      }
      if (this.options.mode === 'none') {
        return endOfStream(this.options.duration_seconds);
      }
      const timestamp = this.frame / this.options.frame_sampling_fps;
      if (timestamp >= this.options.duration_seconds) {
        return endOfStream(this.options.duration_seconds);
      }
      this.pending = this.detectFrame(timestamp);
      this.frame++;
    }
  }

  private detectFrame(frame_timestamp: number): DetectionEvent[] {
    const count = Math.floor(this.random() * (this.options.max_detections_per_frame + 1));
    const detections: DetectionEvent[] = [];
    for (let i = 0; i < count; i++) {
      const classIndex = Math.floor(this.random() * this.options.classes.length);
      detections.push({
        camera_id: this.camera_id,
        frame_timestamp,
        vehicle_class: this.options.classes[classIndex] ?? 'car',
        confidence: 0.3 + this.random() * 0.65
      });
    }
    return detections;
  }
}
