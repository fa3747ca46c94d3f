import { existsSync } from 'node:fs';
import { parseArgs } from 'node:util';

import { lastValueFrom } from 'rxjs';

import { loadConfig } from './app/config/metrics-config';
import { SqliteMetricsStore } from './app/db/sqlite-metrics-store';
import { createEventSource } from './app/detection/detector.factory';
import { createLogger } from './app/logging/logger';
import { AnalyticsService } from './app/services/analytics.service';
import { TrafficRunService } from './app/services/traffic-run.service';
import type { CameraJob } from './app/services/traffic-run.service';
import { environment } from './environments/environment';

const logger = createLogger('MAIN');

const USAGE = `Usage: traffic-metrics --camera-id <id> [--camera-id <id> ...] [options]

  --config <path>       YAML configuration (default: ${environment.configPath})
  --source-id <id>      identifies the input for run tracking (default: the events path or "stub")
  --events <path>       replay detections from a JSON Lines file
  --start-time <iso>    run start, anchors bucket timestamps (default: now)
  --db <path>           SQLite database (default: storage.db_path)
  --help                show this message`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      'camera-id': { type: 'string', multiple: true },
      config: { type: 'string', default: environment.configPath },
      'source-id': { type: 'string' },
      events: { type: 'string' },
      'start-time': { type: 'string' },
      db: { type: 'string' },
      help: { type: 'boolean', default: false }
    }
  });

  const cameraIds = values['camera-id'] ?? [];
  if (values.help || cameraIds.length === 0) {
    console.log(USAGE);
    return values.help ? 0 : 2;
  }

  const configPath = values.config ?? environment.configPath;
  if (!existsSync(configPath)) {
    logger.error('Config not found:', configPath);
    return 1;
  }
  const config = loadConfig(configPath);

  let startedAt: Date | undefined;
  if (values['start-time'] !== undefined) {
    startedAt = new Date(values['start-time']);
    if (Number.isNaN(startedAt.getTime())) {
      logger.error('Invalid --start-time:', values['start-time']);
      return 2;
    }
  }

  const store = new SqliteMetricsStore(values.db ?? environment.dbPath ?? config.storage.db_path);
  const analytics = new AnalyticsService(store);
  const runner = new TrafficRunService(config, store, {
    onRunCompleted: camera_id => analytics.invalidateCamera(camera_id)
  });

  try {
    const sourceId = values['source-id'] ?? values.events ?? config.detector.replay.events_path ?? 'stub';
    const jobs: CameraJob[] = cameraIds.map(camera_id => ({
      camera_id,
      source_id: sourceId,
      source: createEventSource(camera_id, config, values.events),
      started_at: startedAt
    }));

    const results = await runner.runCameras(jobs);
    let failures = 0;
    for (const result of results) {
      if (result.status === 'failed') {
        failures++;
        logger.error(`Camera ${result.camera_id} failed:`, result.error);
        continue;
      }
      if (result.status === 'skipped') {
        logger.info(`Camera ${result.camera_id}: run ${result.run_id} already completed`);
      }
      const summary = await lastValueFrom(analytics.getSummary(result.camera_id));
      console.log(JSON.stringify(summary, null, 2));
    }
    return failures === 0 ? 0 : 1;
  } finally {
    store.close();
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  error => {
    logger.error('Pipeline failed:', error);
    process.exitCode = 1;
  }
);
