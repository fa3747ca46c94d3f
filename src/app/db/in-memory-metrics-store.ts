import type { BucketMetrics } from '../models/metrics.model';
import { toStoredMetrics } from '../models/store.model';
import type {
  MetricsQuery,
  MetricsStore,
  PipelineRun,
  RunStatus,
  StoredBucketMetrics
} from '../models/store.model';

/**
 * Process-local store with the same upsert semantics as the SQLite store.
 * Used for dry runs and tests.
 */
export class InMemoryMetricsStore implements MetricsStore {
  private readonly rows = new Map<string, StoredBucketMetrics>();
  private readonly runs = new Map<string, PipelineRun>();
  private writeCount = 0;

  get writes(): number {
    return this.writeCount;
  }

  get size(): number {
    return this.rows.size;
  }

  async getRollingMax(camera_id: string): Promise<number> {
    let highest = 0;
    for (const row of this.rows.values()) {
      if (row.camera_id === camera_id && row.total_vehicles > highest) {
        highest = row.total_vehicles;
      }
    }
    return highest;
  }

  async upsert(metrics: BucketMetrics): Promise<void> {
    const row = toStoredMetrics(metrics);
    this.rows.set(`${row.camera_id}|${row.bucket_ts}`, row);
    this.writeCount++;
  }

  async listBucketMetrics(query: MetricsQuery): Promise<StoredBucketMetrics[]> {
    return [...this.rows.values()]
      .filter(row => row.camera_id === query.camera_id)
      .filter(row => query.from === undefined || row.bucket_ts >= query.from)
      .filter(row => query.to === undefined || row.bucket_ts <= query.to)
      .sort((a, b) => (a.bucket_ts < b.bucket_ts ? -1 : a.bucket_ts > b.bucket_ts ? 1 : 0))
      .map(row => ({ ...row, counts: { ...row.counts } }));
  }

  async findRun(camera_id: string, source_id: string, config_hash: string): Promise<PipelineRun | undefined> {
    for (const run of this.runs.values()) {
      if (run.camera_id === camera_id && run.source_id === source_id && run.config_hash === config_hash) {
        return { ...run };
      }
    }
    return undefined;
  }

  async createRun(run: PipelineRun): Promise<void> {
    const existing = await this.findRun(run.camera_id, run.source_id, run.config_hash);
    if (this.runs.has(run.run_id) || existing) {
      throw new Error(`pipeline run already exists for run_id=${run.run_id}`);
    }
    this.runs.set(run.run_id, { ...run });
  }

  async updateRunStatus(
    run_id: string,
    status: RunStatus,
    ended_at: string | null,
    error_message: string | null = null
  ): Promise<void> {
    const run = this.requireRun(run_id);
    this.runs.set(run_id, { ...run, status, ended_at, error_message });
  }

  async recordCheckpoint(run_id: string, bucket_index: number): Promise<void> {
    const run = this.requireRun(run_id);
    this.runs.set(run_id, { ...run, last_bucket_index: bucket_index });
  }

  private requireRun(run_id: string): PipelineRun {
    const run = this.runs.get(run_id);
    if (!run) {
      throw new Error(`pipeline_runs row missing for run_id=${run_id}`);
    }
    return run;
  }
}
