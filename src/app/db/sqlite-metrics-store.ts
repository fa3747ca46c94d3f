import { mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';
import { and, asc, eq, gte, lte, max } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

import { SinkWriteError } from '../errors/metrics.errors';
import { createLogger } from '../logging/logger';
import type { BucketMetrics } from '../models/metrics.model';
import type {
  MetricsQuery,
  MetricsStore,
  PipelineRun,
  RunStatus,
  StoredBucketMetrics
} from '../models/store.model';
import * as schema from './schema';
import { emissionEstimates, pipelineRuns, trafficDensity, vehicleCounts } from './schema';
import type { PipelineRunRow } from './schema';

const logger = createLogger('SQLITE-STORE');

const SCHEMA_SQL = readFileSync(new URL('./schema.sql', import.meta.url), 'utf-8');

function toPipelineRun(row: PipelineRunRow): PipelineRun {
  return {
    run_id: row.runId,
    camera_id: row.cameraId,
    source_id: row.sourceId,
    config_hash: row.configHash,
    bucket_anchor: row.bucketAnchor,
    started_at: row.startedAt,
    ended_at: row.endedAt,
    status: row.status,
    error_message: row.errorMessage,
    last_bucket_index: row.lastBucketIndex
  };
}

/**
 * SQLite persistence for bucket metrics and the run ledger.
 * One bucket's rows are written in a single transaction; every write is an upsert.
 */
export class SqliteMetricsStore implements MetricsStore {
  private readonly sqlite: Database.Database;
  private readonly db: BetterSQLite3Database<typeof schema>;

  constructor(readonly path: string) {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.sqlite = new Database(path);
    this.sqlite.pragma('journal_mode = WAL');
    this.sqlite.exec(SCHEMA_SQL);
    this.db = drizzle(this.sqlite, { schema });
    logger.debug('Opened', path);
  }

  close(): void {
    this.sqlite.close();
  }

  async getRollingMax(camera_id: string): Promise<number> {
    const row = this.db
      .select({ value: max(trafficDensity.totalVehicles) })
      .from(trafficDensity)
      .where(eq(trafficDensity.cameraId, camera_id))
      .get();
    return row?.value ?? 0;
  }

  async upsert(metrics: BucketMetrics): Promise<void> {
    const { camera_id, bucket_ts: bucketTs, bucket_index: bucketIndex } = metrics.bucket;
    const key = { cameraId: camera_id, bucketTs, bucketIndex };

    try {
      this.db.transaction(tx => {
        // a rewrite replaces the whole class breakdown of the bucket
        tx.delete(vehicleCounts)
          .where(and(eq(vehicleCounts.cameraId, camera_id), eq(vehicleCounts.bucketTs, bucketTs)))
          .run();
        const countRows = Object.entries(metrics.counts.counts)
          .map(([vehicleType, count]) => ({ ...key, vehicleType, count }));
        if (countRows.length > 0) {
          tx.insert(vehicleCounts).values(countRows).run();
        }

        const density = {
          totalVehicles: metrics.counts.total,
          densityScore: metrics.density.density_score,
          densityLevel: metrics.density.level,
          referenceMax: metrics.density.reference_max,
          bucketIndex
        };
        tx.insert(trafficDensity)
          .values({ ...key, ...density })
          .onConflictDoUpdate({ target: [trafficDensity.cameraId, trafficDensity.bucketTs], set: density })
          .run();

        const emission = {
          estimatedCo2Kg: metrics.emission.estimated_co2_kg,
          co2KgMin: metrics.emission.co2_kg_min,
          co2KgMax: metrics.emission.co2_kg_max,
          bucketIndex
        };
        tx.insert(emissionEstimates)
          .values({ ...key, ...emission })
          .onConflictDoUpdate({ target: [emissionEstimates.cameraId, emissionEstimates.bucketTs], set: emission })
          .run();
      });
    } catch (error) {
      throw new SinkWriteError(camera_id, bucketIndex, error);
    }
  }

  async listBucketMetrics(query: MetricsQuery): Promise<StoredBucketMetrics[]> {
    const densityFilter: SQL[] = [eq(trafficDensity.cameraId, query.camera_id)];
    const countFilter: SQL[] = [eq(vehicleCounts.cameraId, query.camera_id)];
    if (query.from !== undefined) {
      densityFilter.push(gte(trafficDensity.bucketTs, query.from));
      countFilter.push(gte(vehicleCounts.bucketTs, query.from));
    }
    if (query.to !== undefined) {
      densityFilter.push(lte(trafficDensity.bucketTs, query.to));
      countFilter.push(lte(vehicleCounts.bucketTs, query.to));
    }

    const rows = this.db
      .select({ density: trafficDensity, emission: emissionEstimates })
      .from(trafficDensity)
      .innerJoin(emissionEstimates, and(
        eq(emissionEstimates.cameraId, trafficDensity.cameraId),
        eq(emissionEstimates.bucketTs, trafficDensity.bucketTs)
      ))
      .where(and(...densityFilter))
      .orderBy(asc(trafficDensity.bucketTs))
      .all();

    const countsByBucket = new Map<string, Record<string, number>>();
    const countRows = this.db
      .select()
      .from(vehicleCounts)
      .where(and(...countFilter))
      .orderBy(asc(vehicleCounts.bucketTs), asc(vehicleCounts.vehicleType))
      .all();
    for (const row of countRows) {
      const counts = countsByBucket.get(row.bucketTs) ?? {};
      counts[row.vehicleType] = row.count;
      countsByBucket.set(row.bucketTs, counts);
    }

    return rows.map(({ density, emission }) => ({
      camera_id: density.cameraId,
      bucket_ts: density.bucketTs,
      bucket_index: density.bucketIndex,
      counts: countsByBucket.get(density.bucketTs) ?? {},
      total_vehicles: density.totalVehicles,
      density_score: density.densityScore,
      density_level: density.densityLevel,
      reference_max: density.referenceMax,
      estimated_co2_kg: emission.estimatedCo2Kg,
      co2_kg_min: emission.co2KgMin,
      co2_kg_max: emission.co2KgMax
    }));
  }

  async findRun(camera_id: string, source_id: string, config_hash: string): Promise<PipelineRun | undefined> {
    const row = this.db
      .select()
      .from(pipelineRuns)
      .where(and(
        eq(pipelineRuns.cameraId, camera_id),
        eq(pipelineRuns.sourceId, source_id),
        eq(pipelineRuns.configHash, config_hash)
      ))
      .get();
    return row ? toPipelineRun(row) : undefined;
  }

  async createRun(run: PipelineRun): Promise<void> {
    this.db.insert(pipelineRuns).values({
      runId: run.run_id,
      cameraId: run.camera_id,
      sourceId: run.source_id,
      configHash: run.config_hash,
      bucketAnchor: run.bucket_anchor,
      startedAt: run.started_at,
      endedAt: run.ended_at,
      status: run.status,
      errorMessage: run.error_message,
      lastBucketIndex: run.last_bucket_index
    }).run();
  }

  async updateRunStatus(
    run_id: string,
    status: RunStatus,
    ended_at: string | null,
    error_message: string | null = null
  ): Promise<void> {
    const result = this.db
      .update(pipelineRuns)
      .set({ status, endedAt: ended_at, errorMessage: error_message })
      .where(eq(pipelineRuns.runId, run_id))
      .run();
    if (result.changes === 0) {
      throw new Error(`pipeline_runs row missing for run_id=${run_id}`);
    }
  }

  async recordCheckpoint(run_id: string, bucket_index: number): Promise<void> {
    const result = this.db
      .update(pipelineRuns)
      .set({ lastBucketIndex: bucket_index })
      .where(eq(pipelineRuns.runId, run_id))
      .run();
    if (result.changes === 0) {
      throw new Error(`pipeline_runs row missing for run_id=${run_id}`);
    }
  }
}
