import { integer, primaryKey, real, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

// Tables mirror schema.sql, which creates them on open.

export const vehicleCounts = sqliteTable('vehicle_counts', {
  cameraId: text('camera_id').notNull(),
  bucketTs: text('bucket_ts').notNull(),
  bucketIndex: integer('bucket_index').notNull(),
  vehicleType: text('vehicle_type').notNull(),
  count: integer('count').notNull()
}, table => ({
  pk: primaryKey({ columns: [table.cameraId, table.bucketTs, table.vehicleType] })
}));

export const trafficDensity = sqliteTable('traffic_density', {
  cameraId: text('camera_id').notNull(),
  bucketTs: text('bucket_ts').notNull(),
  bucketIndex: integer('bucket_index').notNull(),
  totalVehicles: integer('total_vehicles').notNull(),
  densityScore: real('density_score').notNull(),
  densityLevel: text('density_level', { enum: ['low', 'medium', 'high'] }).notNull(),
  referenceMax: integer('reference_max').notNull()
}, table => ({
  pk: primaryKey({ columns: [table.cameraId, table.bucketTs] })
}));

export const emissionEstimates = sqliteTable('emission_estimates', {
  cameraId: text('camera_id').notNull(),
  bucketTs: text('bucket_ts').notNull(),
  bucketIndex: integer('bucket_index').notNull(),
  estimatedCo2Kg: real('estimated_co2_kg').notNull(),
  co2KgMin: real('co2_kg_min').notNull(),
  co2KgMax: real('co2_kg_max').notNull()
}, table => ({
  pk: primaryKey({ columns: [table.cameraId, table.bucketTs] })
}));

export const pipelineRuns = sqliteTable('pipeline_runs', {
  runId: text('run_id').primaryKey(),
  cameraId: text('camera_id').notNull(),
  sourceId: text('source_id').notNull(),
  configHash: text('config_hash').notNull(),
  bucketAnchor: text('bucket_anchor').notNull(),
  startedAt: text('started_at').notNull(),
  endedAt: text('ended_at'),
  status: text('status', { enum: ['running', 'completed', 'failed'] }).notNull(),
  errorMessage: text('error_message'),
  lastBucketIndex: integer('last_bucket_index')
}, table => ({
  runKey: uniqueIndex('pipeline_runs_run_key').on(table.cameraId, table.sourceId, table.configHash)
}));

export type PipelineRunRow = typeof pipelineRuns.$inferSelect;
