import { z } from 'zod';

export const detectionEventSchema = z.object({
  camera_id: z.string().min(1),
  frame_timestamp: z.number().finite().nonnegative(),  // seconds from run start
  vehicle_class: z.string().min(1),
  confidence: z.number().min(0).max(1)                 // informational only
});

export type DetectionEvent = z.infer<typeof detectionEventSchema>;

export interface EndOfStream {
  type: 'end_of_stream';
  end_timestamp?: number;  // stream duration in seconds, when the source knows it
}

export type StreamItem = DetectionEvent | EndOfStream;

export function endOfStream(end_timestamp?: number): EndOfStream {
  return end_timestamp === undefined
    ? { type: 'end_of_stream' }
    : { type: 'end_of_stream', end_timestamp };
}

export function isEndOfStream(item: StreamItem): item is EndOfStream {
  return 'type' in item && item.type === 'end_of_stream';
}
