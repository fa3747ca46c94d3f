import { afterEach, describe, expect, it } from 'vitest';

import { SinkWriteError } from '../errors/metrics.errors';
import type { MetricsStore } from '../models/store.model';
import { bucketMetrics, pipelineRun } from '../testing/metrics.fixtures';
import { InMemoryMetricsStore } from './in-memory-metrics-store';
import { SqliteMetricsStore } from './sqlite-metrics-store';

interface StoreHandle {
  store: MetricsStore;
  close(): void;
}

const stores: Array<[string, () => StoreHandle]> = [
  ['SqliteMetricsStore', () => {
    const store = new SqliteMetricsStore(':memory:');
    return { store, close: () => store.close() };
  }],
  ['InMemoryMetricsStore', () => ({ store: new InMemoryMetricsStore(), close: () => undefined })]
];

describe.each(stores)('%s', (_name, open) => {
  let handle: StoreHandle | undefined;

  function store(): MetricsStore {
    handle = open();
    return handle.store;
  }

  afterEach(() => {
    handle?.close();
    handle = undefined;
  });

  it('round-trips a bucket as a flattened row', async () => {
    const s = store();
    await s.upsert(bucketMetrics({
      bucket_index: 0,
      counts: { car: 2, truck: 0 },
      density_score: 0.2,
      reference_max: 10,
      co2: 0.5
    }));

    const rows = await s.listBucketMetrics({ camera_id: 'cam-1' });
    expect(rows).toHaveLength(1);
    expect(rows[0]).toEqual({
      camera_id: 'cam-1',
      bucket_ts: '2024-01-01T00:00:00.000Z',
      bucket_index: 0,
      counts: { car: 2, truck: 0 },
      total_vehicles: 2,
      density_score: 0.2,
      density_level: 'low',
      reference_max: 10,
      estimated_co2_kg: 0.5,
      co2_kg_min: 0.45,
      co2_kg_max: 0.55
    });
  });

  it('replaces a bucket written twice instead of duplicating it', async () => {
    const s = store();
    await s.upsert(bucketMetrics({ bucket_index: 3, counts: { car: 1, truck: 1 } }));
    await s.upsert(bucketMetrics({ bucket_index: 3, counts: { car: 4, truck: 0 }, level: 'medium' }));

    const rows = await s.listBucketMetrics({ camera_id: 'cam-1' });
    expect(rows).toHaveLength(1);
    expect(rows[0]?.counts).toEqual({ car: 4, truck: 0 });
    expect(rows[0]?.total_vehicles).toBe(4);
    expect(rows[0]?.density_level).toBe('medium');
  });

  it('lists rows per camera in bucket order within an inclusive range', async () => {
    const s = store();
    for (const bucket_index of [2, 0, 1, 3]) {
      await s.upsert(bucketMetrics({ bucket_index, counts: { car: bucket_index } }));
    }
    await s.upsert(bucketMetrics({ camera_id: 'cam-2', bucket_index: 1, counts: { car: 9 } }));

    const all = await s.listBucketMetrics({ camera_id: 'cam-1' });
    expect(all.map(r => r.bucket_index)).toEqual([0, 1, 2, 3]);

    const ranged = await s.listBucketMetrics({
      camera_id: 'cam-1',
      from: '2024-01-01T00:01:00.000Z',
      to: '2024-01-01T00:02:00.000Z'
    });
    expect(ranged.map(r => r.bucket_index)).toEqual([1, 2]);
  });

  it('reports the highest persisted total per camera', async () => {
    const s = store();
    expect(await s.getRollingMax('cam-1')).toBe(0);
    await s.upsert(bucketMetrics({ bucket_index: 0, counts: { car: 7 } }));
    await s.upsert(bucketMetrics({ bucket_index: 1, counts: { car: 3, bus: 2 } }));
    await s.upsert(bucketMetrics({ camera_id: 'cam-2', bucket_index: 0, counts: { car: 20 } }));
    expect(await s.getRollingMax('cam-1')).toBe(7);
  });

  it('tracks a run through checkpoints to completion', async () => {
    const s = store();
    expect(await s.findRun('cam-1', 'video-a.mp4', 'hash-1')).toBeUndefined();

    await s.createRun(pipelineRun());
    await s.recordCheckpoint('run-1', 4);
    await s.updateRunStatus('run-1', 'completed', '2024-01-01T00:10:00.000Z');

    expect(await s.findRun('cam-1', 'video-a.mp4', 'hash-1')).toEqual(pipelineRun({
      status: 'completed',
      ended_at: '2024-01-01T00:10:00.000Z',
      last_bucket_index: 4
    }));
    expect(await s.findRun('cam-1', 'video-a.mp4', 'hash-2')).toBeUndefined();
  });

  it('keeps a failure message on the run', async () => {
    const s = store();
    await s.createRun(pipelineRun());
    await s.updateRunStatus('run-1', 'failed', '2024-01-01T00:03:00.000Z', 'disk full');
    const run = await s.findRun('cam-1', 'video-a.mp4', 'hash-1');
    expect(run?.status).toBe('failed');
    expect(run?.error_message).toBe('disk full');
  });

  it('allows one run per camera, source and config', async () => {
    const s = store();
    await s.createRun(pipelineRun());
    await expect(s.createRun(pipelineRun({ run_id: 'run-2' }))).rejects.toThrow();
  });

  it('fails to update a run that does not exist', async () => {
    const s = store();
    await expect(s.recordCheckpoint('missing', 0)).rejects.toThrow('pipeline_runs row missing for run_id=missing');
    await expect(s.updateRunStatus('missing', 'completed', null)).rejects.toThrow('pipeline_runs row missing');
  });
});

describe('SqliteMetricsStore', () => {
  it('wraps write failures in SinkWriteError', async () => {
    const store = new SqliteMetricsStore(':memory:');
    store.close();
    await expect(store.upsert(bucketMetrics({ bucket_index: 5, counts: { car: 1 } })))
      .rejects.toBeInstanceOf(SinkWriteError);
  });
});
