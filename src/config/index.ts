import dotenv from 'dotenv';
import { ZodError } from 'zod';
import { ConfigError } from '../core/errors';
import { DEFAULT_DOWNLOAD_BASE_URL } from '../core/services/ManifestRenderer';
import { configSchema, Config } from './validation';

export type EnvSource = Record<string, string | undefined>;

/** Builds the validated configuration from environment variables. */
export function loadConfig(env: EnvSource = process.env): Config {
  try {
    return configSchema.parse({
      server: {
        port: parseInt(env.PORT || '8080'),
        host: env.HOST || '0.0.0.0',
      },
      updates: {
        directory: env.UPDATE_DIRECTORY || process.cwd(),
        channel: env.UPDATE_CHANNEL || 'default',
        path: env.UPDATE_PATH || undefined,
        downloadBaseUrl: env.UPDATE_BASE_URL || DEFAULT_DOWNLOAD_BASE_URL,
      },
      logging: {
        level: env.LOG_LEVEL || 'info',
        filePath: env.LOG_FILE || undefined,
        rotate: env.LOG_ROTATE || 'none',
        maxSizeMB: parseInt(env.LOG_MAX_SIZE_MB || '10'),
        maxFiles: parseInt(env.LOG_MAX_FILES || '5'),
      },
      nodeEnv: env.NODE_ENV || 'development',
    });
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { cause: error });
    }
    throw error;
  }
}

/** Loads `.env.production` or `.env.dev` (depending on NODE_ENV), then validates. */
export function loadEnvConfig(): Config {
  const envFile = process.env.NODE_ENV === 'production' ? '.env.production' : '.env.dev';
  dotenv.config({ path: envFile });
  return loadConfig();
}
