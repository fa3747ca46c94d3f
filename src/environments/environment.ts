export const environment = {
  production: process.env['NODE_ENV'] === 'production',
  configPath: process.env['TRAFFIC_METRICS_CONFIG'] ?? 'config.yaml',
  dbPath: process.env['TRAFFIC_METRICS_DB'] ?? null,  // overrides storage.db_path
  logLevel: process.env['LOG_LEVEL'] ?? 'info'
};
