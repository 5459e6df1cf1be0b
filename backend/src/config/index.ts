import dotenv from 'dotenv';
import Joi from 'joi';

dotenv.config();

export type EncryptionMode = 'strict' | 'dev-insecure';

export interface EncryptionConfig {
  mode: EncryptionMode;
  secret?: string;
  salt?: string;
}

export interface RateLimitConfig {
  callLimit: number;
  windowMinutes: number;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  databaseUrl: string;
  redisUrl: string;
  redisTls: boolean;
  jwtSecret: string;
  frontendUrl: string;
  webhookBaseUrl: string;
  encryption: EncryptionConfig;
  graphApi: {
    baseUrl: string;
    version: string;
    timeoutMs: number;
  };
  rateLimit: RateLimitConfig;
  healthCheckIntervalMinutes: number;
  messageRetry: {
    delayMs: number;
    maxRetries: number;
  };
  mailboxPolling: {
    intervalSeconds: number;
    batchSize: number;
  };
}

/**
 * Raised when the process cannot start with the configuration it was given
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

interface RawEnv {
  NODE_ENV: AppConfig['nodeEnv'];
  PORT: number;
  DATABASE_URL: string;
  REDIS_URL: string;
  REDIS_TLS: boolean;
  JWT_SECRET: string;
  FRONTEND_URL: string;
  WEBHOOK_BASE_URL: string;
  ENCRYPTION_MODE?: EncryptionMode;
  ENCRYPTION_KEY?: string;
  ENCRYPTION_SALT?: string;
  GRAPH_API_BASE_URL: string;
  GRAPH_API_VERSION: string;
  HTTP_TIMEOUT_MS: number;
  RATE_LIMIT_CALLS: number;
  RATE_LIMIT_WINDOW_MINUTES: number;
  HEALTH_CHECK_INTERVAL_MINUTES: number;
  MESSAGE_RETRY_DELAY_MS: number;
  MESSAGE_MAX_RETRIES: number;
  MAILBOX_POLL_INTERVAL_SECONDS: number;
  MAILBOX_POLL_BATCH_SIZE: number;
}

const envSchema = Joi.object<RawEnv>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(3000),
  DATABASE_URL: Joi.string().uri({ scheme: ['postgres', 'postgresql'] }).required(),
  REDIS_URL: Joi.string().uri({ scheme: ['redis', 'rediss'] }).required(),
  REDIS_TLS: Joi.boolean().default(false),
  JWT_SECRET: Joi.string().min(16).required(),
  FRONTEND_URL: Joi.string().uri().default('http://localhost:5173'),
  WEBHOOK_BASE_URL: Joi.string().uri().default('http://localhost:3000'),
  ENCRYPTION_MODE: Joi.string().valid('strict', 'dev-insecure'),
  ENCRYPTION_KEY: Joi.string().empty(''),
  ENCRYPTION_SALT: Joi.string().base64().empty(''),
  GRAPH_API_BASE_URL: Joi.string().uri().default('https://graph.facebook.com'),
  GRAPH_API_VERSION: Joi.string().pattern(/^v\d+\.\d+$/).default('v21.0'),
  HTTP_TIMEOUT_MS: Joi.number().integer().min(1000).default(30000),
  RATE_LIMIT_CALLS: Joi.number().integer().min(1).default(100),
  RATE_LIMIT_WINDOW_MINUTES: Joi.number().integer().min(1).default(60),
  HEALTH_CHECK_INTERVAL_MINUTES: Joi.number().integer().min(1).default(15),
  MESSAGE_RETRY_DELAY_MS: Joi.number().integer().min(0).default(60000),
  MESSAGE_MAX_RETRIES: Joi.number().integer().min(0).default(3),
  MAILBOX_POLL_INTERVAL_SECONDS: Joi.number().integer().min(10).default(60),
  MAILBOX_POLL_BATCH_SIZE: Joi.number().integer().min(1).max(500).default(50),
}).unknown(true);

/**
 * Build the typed configuration from an environment map.
 * Production defaults to strict encryption; everything else to dev-insecure.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });

  if (error) {
    throw new ConfigurationError(`Invalid configuration: ${error.message}`);
  }

  const mode: EncryptionMode =
    value.ENCRYPTION_MODE ?? (value.NODE_ENV === 'production' ? 'strict' : 'dev-insecure');

  return Object.freeze({
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    databaseUrl: value.DATABASE_URL,
    redisUrl: value.REDIS_URL,
    redisTls: value.REDIS_TLS,
    jwtSecret: value.JWT_SECRET,
    frontendUrl: value.FRONTEND_URL,
    webhookBaseUrl: value.WEBHOOK_BASE_URL,
    encryption: {
      mode,
      secret: value.ENCRYPTION_KEY,
      salt: value.ENCRYPTION_SALT,
    },
    graphApi: {
      baseUrl: value.GRAPH_API_BASE_URL,
      version: value.GRAPH_API_VERSION,
      timeoutMs: value.HTTP_TIMEOUT_MS,
    },
    rateLimit: {
      callLimit: value.RATE_LIMIT_CALLS,
      windowMinutes: value.RATE_LIMIT_WINDOW_MINUTES,
    },
    healthCheckIntervalMinutes: value.HEALTH_CHECK_INTERVAL_MINUTES,
    messageRetry: {
      delayMs: value.MESSAGE_RETRY_DELAY_MS,
      maxRetries: value.MESSAGE_MAX_RETRIES,
    },
    mailboxPolling: {
      intervalSeconds: value.MAILBOX_POLL_INTERVAL_SECONDS,
      batchSize: value.MAILBOX_POLL_BATCH_SIZE,
    },
  });
};

let cachedConfig: AppConfig | null = null;

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
};
