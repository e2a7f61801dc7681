import dotenv from 'dotenv';
import Joi from 'joi';

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  database: {
    host: string;
    port: number;
    name: string;
    user: string;
    password: string;
    ssl: boolean;
    poolMax: number;
  };
  jwt: {
    secret: string;
    expiresInSeconds: number;
  };
  allowedOrigins: string[];
  log: {
    level: string;
    file?: string;
  };
}

const DURATION = /^(\d+)([smhd]?)$/;
const DURATION_UNITS: Record<string, number> = { '': 1, s: 1, m: 60, h: 3600, d: 86400 };

/** `90`, `45m`, `8h`, `7d` to seconds. */
export function parseDuration(value: string): number {
  const match = DURATION.exec(value);
  if (!match) {
    throw new Error(`Invalid duration: ${value}`);
  }
  return Number(match[1]) * DURATION_UNITS[match[2]];
}

const PLACEHOLDER_SECRETS = ['change-me', 'your-secret-key'];

const envSchema = Joi.object({
  PORT: Joi.number().port().default(3000),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  DB_HOST: Joi.string().default('localhost'),
  DB_PORT: Joi.number().port().default(5432),
  DB_NAME: Joi.string().default('workforce_hr'),
  DB_USER: Joi.string().default('postgres'),
  DB_PASSWORD: Joi.string().allow('').default('postgres'),
  DB_SSL: Joi.boolean().truthy('true').falsy('false').default(false),
  DB_POOL_MAX: Joi.number().integer().min(1).default(20),
  JWT_SECRET: Joi.string().default('change-me').when('NODE_ENV', {
    is: 'production',
    then: Joi.string().invalid(...PLACEHOLDER_SECRETS).min(16).required()
  }),
  JWT_EXPIRES_IN: Joi.string().pattern(DURATION).default('8h'),
  ALLOWED_ORIGINS: Joi.string().allow('').default('http://localhost:3000'),
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'debug').optional(),
  LOG_FILE: Joi.string().allow('').optional()
}).unknown(true);

interface ValidatedEnv {
  PORT: number;
  NODE_ENV: AppConfig['nodeEnv'];
  DB_HOST: string;
  DB_PORT: number;
  DB_NAME: string;
  DB_USER: string;
  DB_PASSWORD: string;
  DB_SSL: boolean;
  DB_POOL_MAX: number;
  JWT_SECRET: string;
  JWT_EXPIRES_IN: string;
  ALLOWED_ORIGINS: string;
  LOG_LEVEL?: string;
  LOG_FILE?: string;
}

/**
 * Reads settings from the given environment. Throws when a value is
 * malformed, or when production runs with a placeholder JWT secret.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });
  if (error) {
    throw new Error(`Invalid configuration: ${error.details.map(d => d.message).join('; ')}`);
  }
  const settings: ValidatedEnv = value;

  return {
    port: settings.PORT,
    nodeEnv: settings.NODE_ENV,
    database: {
      host: settings.DB_HOST,
      port: settings.DB_PORT,
      name: settings.DB_NAME,
      user: settings.DB_USER,
      password: settings.DB_PASSWORD,
      ssl: settings.DB_SSL,
      poolMax: settings.DB_POOL_MAX
    },
    jwt: {
      secret: settings.JWT_SECRET,
      expiresInSeconds: parseDuration(settings.JWT_EXPIRES_IN)
    },
    allowedOrigins: settings.ALLOWED_ORIGINS.split(',').map(o => o.trim()).filter(Boolean),
    log: {
      level: settings.LOG_LEVEL || (settings.NODE_ENV === 'development' ? 'debug' : 'info'),
      file: settings.LOG_FILE || undefined
    }
  };
}

dotenv.config();

export const config = loadConfig();
