import { Observable } from 'rxjs';

import { endOfStream, isEndOfStream } from '../models/detection.model';
import type { DetectionEvent, EndOfStream, StreamItem } from '../models/detection.model';

/**
 * Capability every detector variant offers: a chronological sequence of detection events.
 * The engine depends only on this, never on a concrete detector.
 */
export interface DetectionEventSource {
  nextEvent(): Promise<DetectionEvent | EndOfStream>;
  close?(): Promise<void>;
}

/**
 * Pull events from a source until EndOfStream. The EndOfStream item is forwarded
 * so the bucketer can see the stream duration. The source is closed however the
 * pull ends: end of stream, a failed read, or unsubscription.
 */
export function fromEventSource(source: DetectionEventSource): Observable<StreamItem> {
  return new Observable<StreamItem>(subscriber => {
    let cancelled = false;

    const pump = async () => {
      try {
        while (!cancelled) {
          const item = await source.nextEvent();
          if (cancelled) break;
          subscriber.next(item);
          if (isEndOfStream(item)) break;
        }
      } finally {
        if (source.close) {
          await source.close();
        }
      }
    };

    pump().then(
      () => subscriber.complete(),
      error => subscriber.error(error)
    );

    return () => {
      cancelled = true;
    };
  });
}

/**
 * In-memory events, mostly for tests and replays already loaded elsewhere
 */
export class ArrayEventSource implements DetectionEventSource {
  private position = 0;

  constructor(
    private readonly events: readonly DetectionEvent[],
    private readonly end_timestamp?: number
  ) {}

  async nextEvent(): Promise<DetectionEvent | EndOfStream> {
    const event = this.events[this.position];
    if (event === undefined) {
      return endOfStream(this.end_timestamp);
    }
    this.position++;
    return event;
  }
}
