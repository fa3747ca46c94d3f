import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from '../errors/metrics.errors';
import { deepFreeze } from '../utils/deep-freeze';

const DEFAULT_VEHICLE_CLASS_MAP: Record<string, string> = {
  car: 'car',
  bus: 'bus',
  truck: 'truck',
  motorcycle: 'motorcycle',
  motorbike: 'motorcycle'
};

// kg CO2 per vehicle per minute
const DEFAULT_EMISSION_FACTORS: Record<string, number> = {
  car: 0.25,
  bus: 1.2,
  truck: 1.0,
  motorcycle: 0.1,
  other: 0.25
};

const nameSchema = z.string().trim().min(1);

function reportCaseCollisions(keys: string[], path: string[], ctx: z.RefinementCtx): void {
  const seen = new Map<string, string>();
  for (const key of keys) {
    const first = seen.get(key.toLowerCase());
    if (first === undefined) {
      seen.set(key.toLowerCase(), key);
      continue;
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [...path, key],
      message: `collides with "${first}" once lower-cased`
    });
  }
}

const emissionsSchema = z.object({
  factors: z.record(nameSchema, z.number().finite().nonnegative()).default(DEFAULT_EMISSION_FACTORS),
  sensitivity: z.number().min(0).lt(1, 'must be in [0, 1)').default(0.1)
}).strict();

const densitySchema = z.object({
  mode: z.enum(['fixed', 'rolling']).default('rolling'),
  default_reference_max: z.number().int().min(1, 'must be >= 1').default(30),
  reference_max_by_camera: z.record(nameSchema, z.number().int().min(1, 'must be >= 1')).default({})
}).strict();

const detectorSchema = z.object({
  name: z.enum(['stub', 'replay']).default('stub'),
  frame_sampling_fps: z.number().positive().default(2),
  stub: z.object({
    mode: z.enum(['none', 'random']).default('random'),
    seed: z.number().int().default(42),
    max_detections_per_frame: z.number().int().nonnegative().default(5),
    duration_seconds: z.number().positive().default(300)
  }).strict().default({}),
  replay: z.object({
    events_path: nameSchema.nullable().default(null)
  }).strict().default({})
}).strict();

const storageSchema = z.object({
  db_path: nameSchema.default('data/db/traffic.db')
}).strict();

export const metricsConfigSchema = z.object({
  bucket_seconds: z.number().int().positive().default(60),
  vehicle_class_map: z.record(nameSchema, nameSchema).default(DEFAULT_VEHICLE_CLASS_MAP),
  unknown_class_policy: z.enum(['other', 'reject']).default('other'),
  other_class: nameSchema.default('other'),
  emissions: emissionsSchema.default({}),
  density: densitySchema.default({}),
  detector: detectorSchema.default({}),
  storage: storageSchema.default({})
}).strict()
  .superRefine((config, ctx) => {
    // keys are lower-cased below, so two spellings of one label would silently merge
    reportCaseCollisions(Object.keys(config.vehicle_class_map), ['vehicle_class_map'], ctx);
    reportCaseCollisions(Object.keys(config.emissions.factors), ['emissions', 'factors'], ctx);
  })
  .transform(config => ({
    ...config,
    vehicle_class_map: Object.fromEntries(
      Object.entries(config.vehicle_class_map).map(([label, cls]) => [label.toLowerCase(), cls.toLowerCase()])
    ),
    other_class: config.other_class.toLowerCase(),
    emissions: {
      ...config.emissions,
      factors: Object.fromEntries(
        Object.entries(config.emissions.factors).map(([cls, factor]) => [cls.toLowerCase(), factor])
      )
    }
  }))
  .superRefine((config, ctx) => {
    if (config.detector.name === 'replay' && config.detector.replay.events_path === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['detector', 'replay', 'events_path'],
        message: 'required when detector.name is "replay"'
      });
    }
    for (const cls of countedClasses(config)) {
      if (config.emissions.factors[cls] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['emissions', 'factors', cls],
          message: `missing emission factor for counted class "${cls}" (configure 0 explicitly to ignore it)`
        });
      }
    }
  });

export type MetricsConfig = z.output<typeof metricsConfigSchema>;

export type ClassMappingOptions = Pick<MetricsConfig, 'vehicle_class_map' | 'unknown_class_policy' | 'other_class'>;

/**
 * Every class a CountRecord can carry under this mapping, sorted
 */
export function countedClasses(config: ClassMappingOptions): string[] {
  const classes = new Set(Object.values(config.vehicle_class_map).map(cls => cls.trim().toLowerCase()));
  if (config.unknown_class_policy === 'other') {
    classes.add(config.other_class.trim().toLowerCase());
  }
  return [...classes].sort();
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw options (as parsed from YAML) into an immutable config.
 * Sections and fields fall back to defaults; maps given explicitly replace the default maps.
 */
export function parseConfig(raw: unknown): MetricsConfig {
  const result = metricsConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error));
  }
  return deepFreeze(result.data);
}

export function loadConfig(path: string): MetricsConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`malformed YAML in ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(raw);
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, child]) => [key, canonicalize(child)])
    );
  }
  return value;
}

/**
 * SHA-256 of the config's canonical JSON. Identifies runs with identical settings.
 */
export function configHash(config: MetricsConfig): string {
  return createHash('sha256').update(JSON.stringify(canonicalize(config))).digest('hex');
}
