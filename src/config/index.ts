import { join } from 'path';
import { config as dotenvConfig, DotenvPopulateInput } from 'dotenv';
import { z } from 'zod';
import { MAPBOX_TOKEN_PATH } from '../environment/profile';

/**
 * Launcher settings. These configure the launcher itself and never change
 * what the launch profile assigns.
 */
export interface Config {
  logLevel: LogLevel;
  tokenPath: string;    // overridden by --token-path
}

export interface LoadConfigOptions {
  cwd?: string;               // directory holding .env
  env?: NodeJS.ProcessEnv;    // takes precedence over .env
}

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Build the launcher settings from the environment and `.env`.
 *
 * `.env` is read into a local object, never into process.env: the launch
 * profile must only see what the calling shell passed in.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const fileSettings: DotenvPopulateInput = {};
  dotenvConfig({ path: join(options.cwd ?? process.cwd(), '.env'), processEnv: fileSettings });

  const getEnvVar = (key: string, defaultValue?: string): string => {
    const value = env[key] ?? fileSettings[key];
    if (value === undefined && defaultValue === undefined) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
    return value || defaultValue || '';
  };

  const getEnvLogLevel = (key: string, defaultValue: LogLevel): LogLevel => {
    const parsed = LogLevelSchema.safeParse(getEnvVar(key, defaultValue));
    if (!parsed.success) {
      throw new Error(
        `Environment variable ${key} must be one of: ${LogLevelSchema.options.join(', ')}`
      );
    }
    return parsed.data;
  };

  return {
    logLevel: getEnvLogLevel('LOG_LEVEL', 'info'),
    tokenPath: getEnvVar('LAUNCH_ENV_TOKEN_PATH', MAPBOX_TOKEN_PATH),
  };
}

export const config: Config = loadConfig();

export default config;
