import * as fs from 'fs';
import * as path from 'path';

import { Logger } from '@nestjs/common';
import { z } from 'zod';

import { createDefaultEzanConfig, EzanConfig, validateEzanConfig } from './ezan-config.schema';

/**
 * Environment configuration schema with zod validation.
 * The app will fail fast on startup if a variable is malformed.
 */
const envSchema = z.object({
  // Files
  EZAN_CONFIG_FILE: z.string().default('./ezan.config.json'),
  LOG_FILE: z.string().default('./logs/ezan-player.log'),
  CACHE_DIR: z.string().default('./data/cache'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Side effects: "shell" runs the real OS commands, "fake" only records them
  ACTION_PROVIDER: z.enum(['shell', 'fake']).default('shell'),

  // App
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type LogLevelName = EnvConfig['LOG_LEVEL'];

/**
 * Validate and parse environment variables.
 * Throws a descriptive error if validation fails.
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

export interface LoadEzanConfigOptions {
  /** Write a default file when none exists (default true); otherwise a missing file is an error */
  createIfMissing?: boolean;
}

/**
 * Load the ezan config file, writing a default one first if it doesn't exist.
 * Runs synchronously inside the config factory so a bad file stops startup
 * before any module initializes.
 */
export function loadEzanConfig(
  filePath: string,
  { createIfMissing = true }: LoadEzanConfigOptions = {},
): EzanConfig {
  const logger = new Logger('Configuration');
  const resolvedPath = path.resolve(filePath);

  if (!fs.existsSync(resolvedPath)) {
    if (!createIfMissing) {
      throw new Error(`Config file not found: ${resolvedPath}`);
    }

    fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
    fs.writeFileSync(resolvedPath, `${JSON.stringify(createDefaultEzanConfig(), null, 2)}\n`, 'utf-8');
    logger.warn(`Config file not found. Created default config at ${resolvedPath}`);
    logger.warn('Please replace the placeholder video URLs in the config file!');
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Could not read config file ${resolvedPath}: ${message}`);
  }

  return validateEzanConfig(data, `config file ${resolvedPath}`);
}

/**
 * Build a NestJS configuration factory for ConfigModule.forRoot({ load: [...] }).
 */
export function createConfiguration(options: LoadEzanConfigOptions = {}) {
  return () => {
    const env = validateEnv();
    const ezan = loadEzanConfig(env.EZAN_CONFIG_FILE, options);

    return {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      actionProvider: env.ACTION_PROVIDER,

      paths: {
        config: env.EZAN_CONFIG_FILE,
        logFile: env.LOG_FILE,
        cache: env.CACHE_DIR,
      },

      ezan,
    };
  };
}

/** Factory of the long-running player; creates a default config file when missing */
export default createConfiguration();

/** Factory of read-only commands; never writes the config file */
export const readOnlyConfiguration = createConfiguration({ createIfMissing: false });
