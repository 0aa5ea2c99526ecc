import env from './env';

// Application configuration
export const appConfig = {
  env: env.NODE_ENV,
  port: env.PORT,
  name: env.APP_NAME,
  version: env.APP_VERSION,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',
  runWorkersInApi: env.RUN_WORKERS_IN_API,
};

// Database configuration
export const dbConfig = {
  uri: env.MONGODB_URI,
  options: {
    maxPoolSize: 10,
    minPoolSize: 1,
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 30000,
    connectTimeoutMS: 10000,
  },
};

// Redis configuration
export const redisConfig = {
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
  password: env.REDIS_PASSWORD || undefined,
  keyPrefix: 'etl_tracker',
};

// API configuration
export const apiConfig = {
  prefix: env.API_PREFIX,
  rateLimit: {
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX,
  },
  cors: {
    origin: env.CORS_ORIGIN === '*' ? '*' : env.CORS_ORIGIN.split(','),
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
  },
};

// Logging configuration
export const logConfig = {
  level: env.LOG_LEVEL,
  toFile: env.LOG_TO_FILE && env.NODE_ENV !== 'test',
  directory: env.LOG_DIRECTORY,
  maxSize: '20m',
  maxFiles: '14d',
};

// Job lifecycle configuration
export const etlConfig = {
  maxRetries: env.ETL_MAX_RETRIES,
  retryBaseDelayMs: env.ETL_RETRY_BASE_DELAY_MS,
  workerConcurrency: env.ETL_WORKER_CONCURRENCY,
  simulationScale: env.ETL_SIMULATION_SCALE,
  maxAutoRecoveries: env.ETL_MAX_AUTO_RECOVERIES,
  stuckJobThresholdHours: env.STUCK_JOB_THRESHOLD_HOURS,
  metricRetentionDays: env.METRIC_RETENTION_DAYS,
};

// Queue names and maintenance cadence
export const queueConfig = {
  etlQueue: 'etl-jobs',
  maintenanceQueue: 'maintenance',
  pipelineQueue: 'asset-pipeline',
  reaperIntervalMs: 60 * 1000,
  retentionIntervalMs: 60 * 60 * 1000,
  dailyReportCron: '30 0 * * *',
};

export const healthConfig = {
  timeoutMs: env.HEALTH_CHECK_TIMEOUT_MS,
};

// Per-schedule on/off switches; schedules not listed keep their default
const scheduleOverrides: Partial<Record<string, boolean>> = {
  frequent_extract_schedule: env.PIPELINE_FREQUENT_SCHEDULE_ENABLED,
};

export const pipelineConfig = {
  sensorIntervalMs: env.PIPELINE_SENSOR_INTERVAL_MS,
  scheduleOverrides,
};

// Export all configurations
export default {
  app: appConfig,
  db: dbConfig,
  redis: redisConfig,
  api: apiConfig,
  log: logConfig,
  etl: etlConfig,
  queues: queueConfig,
  health: healthConfig,
  pipeline: pipelineConfig,
};
