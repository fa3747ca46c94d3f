import { countedClasses } from '../config/metrics-config';
import type { MetricsConfig } from '../config/metrics-config';
import { createLogger } from '../logging/logger';
import type { DetectionEventSource } from './detection-source';
import { JsonLinesEventSource } from './json-lines-source';
import { StubDetectorSource } from './stub-detector';

const logger = createLogger('DETECTOR-FACTORY');

/**
 * Pick the detector variant named in the configuration.
 * `eventsPath` overrides detector.replay.events_path and forces a replay.
 */
export function createEventSource(camera_id: string, config: MetricsConfig, eventsPath?: string): DetectionEventSource {
  const { detector } = config;
  const replayPath = eventsPath ?? (detector.name === 'replay' ? detector.replay.events_path : null);

  if (replayPath) {
    logger.info(`Replaying detections for ${camera_id} from`, replayPath);
    return new JsonLinesEventSource(replayPath, camera_id);
  }

  logger.info(`Using stub detector for ${camera_id} (mode: ${detector.stub.mode}, seed: ${detector.stub.seed})`);
  return new StubDetectorSource(camera_id, {
    ...detector.stub,
    frame_sampling_fps: detector.frame_sampling_fps,
    // the stub reports canonical classes only; "other" is never a detector label
    classes: countedClasses({ ...config, unknown_class_policy: 'reject' })
  });
}
