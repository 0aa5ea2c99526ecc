import dotenv from 'dotenv';
import path from 'path';
import Joi from 'joi';

// Load environment variables from .env file
dotenv.config({
  path: path.resolve(process.cwd(), '.env'),
});

export interface EnvVars {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  APP_NAME: string;
  APP_VERSION: string;
  API_PREFIX: string;

  MONGODB_URI: string;

  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;

  LOG_LEVEL: string;
  LOG_TO_FILE: boolean;
  LOG_DIRECTORY: string;

  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
  CORS_ORIGIN: string;

  ETL_MAX_RETRIES: number;
  ETL_RETRY_BASE_DELAY_MS: number;
  ETL_WORKER_CONCURRENCY: number;
  ETL_SIMULATION_SCALE: number;
  ETL_MAX_AUTO_RECOVERIES: number;
  STUCK_JOB_THRESHOLD_HOURS: number;
  METRIC_RETENTION_DAYS: number;

  HEALTH_CHECK_TIMEOUT_MS: number;

  PIPELINE_SENSOR_INTERVAL_MS: number;
  PIPELINE_FREQUENT_SCHEDULE_ENABLED: boolean;

  RUN_WORKERS_IN_API: boolean;
}

// Define the schema for environment variables
const envVarsSchema = Joi.object<EnvVars>()
  .keys({
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    PORT: Joi.number().default(5000),
    APP_NAME: Joi.string().default('etl-tracker'),
    APP_VERSION: Joi.string().default('1.0.0'),
    API_PREFIX: Joi.string().default('/api/v1').description('Mount point of the REST API'),

    // MongoDB
    MONGODB_URI: Joi.string()
      .default('mongodb://localhost:27017/etl_tracker')
      .description('MongoDB connection URL'),

    // Redis (queues and cache)
    REDIS_HOST: Joi.string().default('localhost'),
    REDIS_PORT: Joi.number().port().default(6379),
    REDIS_PASSWORD: Joi.string().allow('').description('Redis password'),

    // Logging
    LOG_LEVEL: Joi.string()
      .valid('error', 'warn', 'info', 'http', 'debug')
      .default('info')
      .description('Log level (error, warn, info, http, debug)'),
    LOG_TO_FILE: Joi.boolean().default(true),
    LOG_DIRECTORY: Joi.string().default('logs'),

    // Rate limiting
    RATE_LIMIT_WINDOW_MS: Joi.number().default(15 * 60 * 1000).description('Rate limit window in milliseconds'),
    RATE_LIMIT_MAX: Joi.number().default(1000).description('Max requests per window per IP'),

    // CORS
    CORS_ORIGIN: Joi.string().default('*').description('CORS allowed origins, comma separated'),

    // Job lifecycle
    ETL_MAX_RETRIES: Joi.number().integer().min(0).default(3),
    ETL_RETRY_BASE_DELAY_MS: Joi.number().integer().min(0).default(60 * 1000),
    ETL_WORKER_CONCURRENCY: Joi.number().integer().min(1).default(5),
    ETL_SIMULATION_SCALE: Joi.number().min(0).default(1).description('Multiplier applied to simulated work'),
    ETL_MAX_AUTO_RECOVERIES: Joi.number().integer().min(0).default(1).description('Automatic recoveries per failed job'),
    STUCK_JOB_THRESHOLD_HOURS: Joi.number().positive().default(2),
    METRIC_RETENTION_DAYS: Joi.number().integer().positive().default(30),

    // Health probe
    HEALTH_CHECK_TIMEOUT_MS: Joi.number().integer().positive().default(2000),

    // Offline pipeline
    PIPELINE_SENSOR_INTERVAL_MS: Joi.number().integer().positive().default(30 * 1000),
    PIPELINE_FREQUENT_SCHEDULE_ENABLED: Joi.boolean().default(false),

    // Run the queue workers inside the API process (single-process development setups)
    RUN_WORKERS_IN_API: Joi.boolean().default(false),
  })
  .unknown();

// Validate environment variables
const result = envVarsSchema
  .prefs({ errors: { label: 'key' } })
  .validate(process.env);

// Throw an error if validation fails
if (result.error || result.value === undefined) {
  throw new Error(`Config validation error: ${result.error?.message ?? 'no value'}`);
}

const envVars: EnvVars = result.value;

export default envVars;
