import { z } from 'zod';
import { resolveSecret } from './secrets';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyAsUndefined, z.string().min(1).optional());

const flag = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['true', 'false', '1', '0', 'yes', 'no']),
  )
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
    PORT: z.coerce.number().int().min(1).max(65_535).default(8000),

    // OpenWeatherMap
    OPENWEATHER_API_KEY: z.string().min(1),
    OPENWEATHER_BASE_URL: z
      .string()
      .url()
      .default('https://api.openweathermap.org/data/2.5/weather'),
    WEATHER_API_TIMEOUT_MS: positiveInt.default(10_000),

    // AWS
    AWS_ACCESS_KEY_ID: optionalString,
    AWS_SECRET_ACCESS_KEY: optionalString,
    AWS_REGION: z.string().min(1).default('us-east-1'),
    AWS_REQUEST_TIMEOUT_MS: positiveInt.default(5_000),
    S3_BUCKET: z.string().min(1).default('weather-data-bucket'),
    DYNAMODB_TABLE: z.string().min(1).default('weather-logs'),

    // Cache / audit
    CACHE_EXPIRY_MINUTES: positiveInt.default(5),
    CACHE_ENABLED: flag.default('true'),
    AUDIT_ENABLED: flag.default('true'),
  })
  .refine(
    (env) => (env.AWS_ACCESS_KEY_ID === undefined) === (env.AWS_SECRET_ACCESS_KEY === undefined),
    {
      message: 'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together',
      path: ['AWS_SECRET_ACCESS_KEY'],
    },
  );

export type Env = z.infer<typeof envSchema>;

export interface WeatherApiSettings {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface AwsSettings {
  region: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  requestTimeoutMs: number;
}

export interface StorageSettings {
  enabled: boolean;
  bucket: string;
  cacheExpiryMinutes: number;
}

export interface AuditSettings {
  enabled: boolean;
  table: string;
}

export interface AppConfig {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  weatherApi: WeatherApiSettings;
  aws: AwsSettings;
  storage: StorageSettings;
  audit: AuditSettings;
}

/**
 * Validates the environment once and returns the settings every component
 * receives through its constructor. Throws a ZodError on invalid input.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);

  const credentials =
    env.AWS_ACCESS_KEY_ID !== undefined && env.AWS_SECRET_ACCESS_KEY !== undefined
      ? {
          accessKeyId: env.AWS_ACCESS_KEY_ID,
          secretAccessKey: resolveSecret('AWS_SECRET_ACCESS_KEY', env.AWS_SECRET_ACCESS_KEY),
        }
      : undefined;

  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    weatherApi: {
      apiKey: resolveSecret('OPENWEATHER_API_KEY', env.OPENWEATHER_API_KEY),
      baseUrl: env.OPENWEATHER_BASE_URL,
      timeoutMs: env.WEATHER_API_TIMEOUT_MS,
    },
    aws: {
      region: env.AWS_REGION,
      credentials,
      requestTimeoutMs: env.AWS_REQUEST_TIMEOUT_MS,
    },
    storage: {
      enabled: env.CACHE_ENABLED,
      bucket: env.S3_BUCKET,
      cacheExpiryMinutes: env.CACHE_EXPIRY_MINUTES,
    },
    audit: {
      enabled: env.AUDIT_ENABLED,
      table: env.DYNAMODB_TABLE,
    },
  });
}
