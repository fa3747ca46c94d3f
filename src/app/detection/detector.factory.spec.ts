import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterAll, describe, expect, it } from 'vitest';

import { parseConfig } from '../config/metrics-config';
import { isEndOfStream } from '../models/detection.model';
import { createEventSource } from './detector.factory';
import { JsonLinesEventSource } from './json-lines-source';
import { StubDetectorSource } from './stub-detector';

const dir = mkdtempSync(join(tmpdir(), 'traffic-factory-'));
const eventsPath = join(dir, 'events.jsonl');
writeFileSync(eventsPath, '{"camera_id":"cam-1","frame_timestamp":1,"vehicle_class":"Other","confidence":0.4}\n');

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('createEventSource', () => {
  it('uses the stub detector by default', () => {
    expect(createEventSource('cam-1', parseConfig({}))).toBeInstanceOf(StubDetectorSource);
  });

  it('never reports the other class from the stub', async () => {
    const config = parseConfig({ detector: { stub: { seed: 3, duration_seconds: 30 } } });
    const source = createEventSource('cam-1', config);
    const seen = new Set<string>();
    let item = await source.nextEvent();
    while (!isEndOfStream(item)) {
      seen.add(item.vehicle_class);
      item = await source.nextEvent();
    }
    expect(seen.has('other')).toBe(false);
    expect([...seen].every(cls => ['bus', 'car', 'motorcycle', 'truck'].includes(cls))).toBe(true);
  });

  it('replays the configured events file', async () => {
    const source = createEventSource('cam-1', parseConfig({ detector: { name: 'replay', replay: { events_path: eventsPath } } }));
    expect(source).toBeInstanceOf(JsonLinesEventSource);
    expect(await source.nextEvent()).toMatchObject({ vehicle_class: 'Other' });
    await source.close?.();
  });

  it('prefers an explicit events path over the stub', async () => {
    const source = createEventSource('cam-1', parseConfig({}), eventsPath);
    expect(source).toBeInstanceOf(JsonLinesEventSource);
    await source.close?.();
  });
});
