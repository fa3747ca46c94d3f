import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterAll, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../errors/metrics.errors';
import { configHash, countedClasses, loadConfig, parseConfig } from './metrics-config';

function issuesOf(raw: unknown): string[] {
  try {
    parseConfig(raw);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('parseConfig', () => {
  it('fills every section with defaults', () => {
    const config = parseConfig({});
    expect(config.bucket_seconds).toBe(60);
    expect(config.unknown_class_policy).toBe('other');
    expect(config.other_class).toBe('other');
    expect(config.vehicle_class_map['motorbike']).toBe('motorcycle');
    expect(config.emissions.factors['bus']).toBe(1.2);
    expect(config.emissions.sensitivity).toBe(0.1);
    expect(config.density).toEqual({ mode: 'rolling', default_reference_max: 30, reference_max_by_camera: {} });
    expect(config.detector.name).toBe('stub');
    expect(config.detector.stub).toEqual({ mode: 'random', seed: 42, max_detections_per_frame: 5, duration_seconds: 300 });
    expect(config.storage.db_path).toBe('data/db/traffic.db');
  });

  it('treats an empty document as all defaults', () => {
    expect(parseConfig(null)).toEqual(parseConfig({}));
  });

  it('returns an immutable config', () => {
    const config = parseConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.emissions.factors)).toBe(true);
  });

  it('normalizes class names to lower case', () => {
    const config = parseConfig({
      vehicle_class_map: { Car: 'CAR', Lorry: 'Truck' },
      emissions: { factors: { CAR: 0.2, truck: 0.9, Other: 0.2 } }
    });
    expect(config.vehicle_class_map).toEqual({ car: 'car', lorry: 'truck' });
    expect(config.emissions.factors).toEqual({ car: 0.2, truck: 0.9, other: 0.2 });
  });

  it('reports field paths for invalid values', () => {
    const issues = issuesOf({ bucket_seconds: 0, emissions: { sensitivity: 1 } });
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^bucket_seconds: /);
    expect(issues[1]).toBe('emissions.sensitivity: must be in [0, 1)');
  });

  it('rejects unknown keys', () => {
    expect(issuesOf({ bucket_size: 60 })).toEqual(["(root): Unrecognized key(s) in object: 'bucket_size'"]);
  });

  it('requires a factor for every counted class', () => {
    expect(issuesOf({
      vehicle_class_map: { car: 'car', van: 'van' },
      emissions: { factors: { car: 0.2, other: 0.2 } }
    })).toEqual([
      'emissions.factors.van: missing emission factor for counted class "van" (configure 0 explicitly to ignore it)'
    ]);
  });

  it('rejects class labels that differ only in case', () => {
    expect(issuesOf({ vehicle_class_map: { Car: 'car', car: 'truck' } })).toEqual([
      'vehicle_class_map.car: collides with "Car" once lower-cased'
    ]);
  });

  it('rejects emission factors that differ only in case', () => {
    expect(issuesOf({
      vehicle_class_map: { car: 'car' },
      emissions: { factors: { car: 0.2, CAR: 0.3, other: 0.2 } }
    })).toEqual(['emissions.factors.CAR: collides with "car" once lower-cased']);
  });

  it('requires events_path for the replay detector', () => {
    expect(issuesOf({ detector: { name: 'replay' } })).toEqual([
      'detector.replay.events_path: required when detector.name is "replay"'
    ]);
  });
});

describe('countedClasses', () => {
  it('adds the other class only under the other policy', () => {
    const mapping = { vehicle_class_map: { car: 'car', motorbike: 'motorcycle' }, other_class: 'misc' };
    expect(countedClasses({ ...mapping, unknown_class_policy: 'other' })).toEqual(['car', 'misc', 'motorcycle']);
    expect(countedClasses({ ...mapping, unknown_class_policy: 'reject' })).toEqual(['car', 'motorcycle']);
  });
});

describe('configHash', () => {
  it('is stable for equal settings regardless of key order', () => {
    const a = parseConfig({ bucket_seconds: 30, density: { mode: 'fixed', default_reference_max: 5 } });
    const b = parseConfig({ density: { default_reference_max: 5, mode: 'fixed' }, bucket_seconds: 30 });
    expect(configHash(a)).toBe(configHash(b));
    expect(configHash(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('changes when a setting changes', () => {
    expect(configHash(parseConfig({ bucket_seconds: 30 }))).not.toBe(configHash(parseConfig({ bucket_seconds: 60 })));
  });
});

describe('loadConfig', () => {
  const dir = mkdtempSync(join(tmpdir(), 'traffic-config-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the example configuration shipped with the project', () => {
    const config = loadConfig(fileURLToPath(new URL('../../../config.yaml', import.meta.url)));
    expect(config).toEqual(parseConfig({}));
  });

  it('parses YAML files', () => {
    const path = join(dir, 'fixed.yaml');
    writeFileSync(path, 'bucket_seconds: 300\ndensity:\n  mode: fixed\n  reference_max_by_camera:\n    cam-1: 12\n');
    const config = loadConfig(path);
    expect(config.bucket_seconds).toBe(300);
    expect(config.density.mode).toBe('fixed');
    expect(config.density.reference_max_by_camera['cam-1']).toBe(12);
  });

  it('wraps malformed YAML in a configuration error', () => {
    const path = join(dir, 'broken.yaml');
    writeFileSync(path, 'bucket_seconds: [60\n');
    expect(() => loadConfig(path)).toThrow(ConfigurationError);
    expect(() => loadConfig(path)).toThrow(/malformed YAML/);
  });

  it('wraps a missing file in a configuration error', () => {
    expect(() => loadConfig(join(dir, 'missing.yaml'))).toThrow(/cannot read config file/);
  });
});
