import { createReadStream } from 'node:fs';
import type { ReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import { z } from 'zod';

import { InvalidDetectionEventError } from '../errors/metrics.errors';
import { detectionEventSchema, endOfStream } from '../models/detection.model';
import type { DetectionEvent, EndOfStream } from '../models/detection.model';
import type { DetectionEventSource } from './detection-source';

const endMarkerSchema = z.object({
  type: z.literal('end_of_stream'),
  camera_id: z.string().optional(),
  end_timestamp: z.number().finite().nonnegative().optional()
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Replays detections recorded by an external detector, one JSON object per line.
 * Lines for other cameras are skipped; `{"type":"end_of_stream","end_timestamp":N}` ends the stream early.
 */
export class JsonLinesEventSource implements DetectionEventSource {
  private readonly input: ReadStream;
  private readonly reader: Interface;
  private readonly lines: AsyncIterator<string>;
  private failure: Error | null = null;
  private failPending: ((error: Error) => void) | null = null;
  private lineNumber = 0;
  private done = false;

  constructor(readonly path: string, private readonly camera_id: string) {
    this.input = createReadStream(path, { encoding: 'utf-8' });
    // stays attached after close so a late open error is never unhandled
    this.input.on('error', error => {
      this.failure = error;
      this.failPending?.(error);
    });
    this.reader = createInterface({ input: this.input, crlfDelay: Infinity });
    this.lines = this.reader[Symbol.asyncIterator]();
  }

  async nextEvent(): Promise<DetectionEvent | EndOfStream> {
    while (!this.done) {
      const next = await this.readLine();
      if (next.done) {
        this.done = true;
        break;
      }
      this.lineNumber++;
      const text = next.value.trim();
      if (text === '') continue;

      const parsed = this.parseLine(text);
      if (typeof parsed === 'object' && parsed !== null && 'type' in parsed) {
        const marker = endMarkerSchema.safeParse(parsed);
        if (!marker.success) {
          throw new InvalidDetectionEventError(`${this.path}:${this.lineNumber}: ${describeIssues(marker.error)}`);
        }
        if (marker.data.camera_id !== undefined && marker.data.camera_id !== this.camera_id) continue;
        this.done = true;
        return endOfStream(marker.data.end_timestamp);
      }

      const result = detectionEventSchema.safeParse(parsed);
      if (!result.success) {
        throw new InvalidDetectionEventError(`${this.path}:${this.lineNumber}: ${describeIssues(result.error)}`);
      }
      if (result.data.camera_id === this.camera_id) {
        return result.data;
      }
    }
    return endOfStream();
  }

  async close(): Promise<void> {
    this.done = true;
    this.reader.close();
    this.input.destroy();
  }

  /** Next raw line, rejecting as soon as the file itself cannot be read */
  private readLine(): Promise<IteratorResult<string>> {
    if (this.failure) {
      return Promise.reject(this.readError(this.failure));
    }
    return new Promise<IteratorResult<string>>((resolve, reject) => {
      this.failPending = error => reject(this.readError(error));
      this.lines
        .next()
        .then(resolve, (error: unknown) => reject(this.readError(error)))
        .finally(() => {
          this.failPending = null;
        });
    });
  }

  private readError(cause: unknown): Error {
    return new Error(`cannot read events from ${this.path}`, { cause });
  }

  private parseLine(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new InvalidDetectionEventError(
        `${this.path}:${this.lineNumber}: not valid JSON (${error instanceof Error ? error.message : String(error)})`
      );
    }
  }
}
