/**
 * Configuration
 * Environment-driven settings, validated once at startup
 */

import { z } from 'zod';
import { parseLogLevel, type LevelWithSilent } from './logger.js';

export interface AppConfig {
  databasePath: string;
  host: string;
  port: number;
  logLevel: LevelWithSilent;
  corsOrigins: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .trim()
    .min(1, 'DATABASE_URL is required'),
  HOST: z.string().trim().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.string().optional(),
  CORS_ORIGINS: z.string().default(''),
});

/**
 * Turn DATABASE_URL into a file path better-sqlite3 can open.
 * Accepts a bare path, `:memory:`, `sqlite://<path>` or `file:<path>`.
 */
export function resolveDatabasePath(url: string): string {
  return url.replace(/^(sqlite|file):(\/\/)?/, '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => {
      const key = issue.path.join('.');
      return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  return {
    databasePath: resolveDatabasePath(values.DATABASE_URL),
    host: values.HOST,
    port: values.PORT,
    logLevel: parseLogLevel(values.LOG_LEVEL),
    corsOrigins: values.CORS_ORIGINS.split(',').map(o => o.trim()).filter(o => o.length > 0),
  };
}
