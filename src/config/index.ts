import dotenv from 'dotenv';
import Joi from 'joi';

dotenv.config();

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  logLevel: string;
  corsOrigin: string;
  rateLimit: {
    windowMs: number;
    max: number;
  };
  docsEnabled: boolean;
  seedDemoData: boolean;
  version: string;
}

interface EnvVars {
  NODE_ENV: AppConfig['env'];
  PORT: number;
  LOG_LEVEL: string;
  CORS_ORIGIN: string;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  DOCS_ENABLED: boolean;
  SEED_DEMO_DATA: boolean;
  APP_VERSION: string;
}

const envSchema = Joi.object<EnvVars>({
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  PORT: Joi.number().port().default(8000),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly')
    .default('info'),
  CORS_ORIGIN: Joi.string().default('*'),
  RATE_LIMIT_WINDOW_MS: Joi.number().integer().min(1000).default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: Joi.number().integer().min(1).default(100),
  DOCS_ENABLED: Joi.boolean().default(true),
  SEED_DEMO_DATA: Joi.boolean().default(true),
  APP_VERSION: Joi.string().default('1.0.0')
}).unknown(true);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    errors: { wrap: { label: false } }
  });

  if (error) {
    const details = error.details.map(detail => detail.message).join(', ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return {
    env: value.NODE_ENV,
    port: value.PORT,
    logLevel: value.LOG_LEVEL,
    corsOrigin: value.CORS_ORIGIN,
    rateLimit: {
      windowMs: value.RATE_LIMIT_WINDOW_MS,
      max: value.RATE_LIMIT_MAX_REQUESTS
    },
    docsEnabled: value.DOCS_ENABLED,
    seedDemoData: value.SEED_DEMO_DATA,
    version: value.APP_VERSION
  };
};
