#!/usr/bin/env node
/**
 * Laundry API - Main Entry Point
 * Provides CLI for starting the API server and migrating the database
 */

import 'dotenv/config';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { ApiServer } from './server/index.js';
import { DatabaseManager } from './storage/index.js';
import { parseArgs, type CliArgs } from './cli.js';

// ============================================
// Help
// ============================================

function printHelp(): void {
  console.log(`
Laundry API - rooms, machines, users and fault reports

Usage: laundry-api [command] [options]

Commands:
  serve     Start the API server (default)
  migrate   Apply pending database migrations and exit
  help      Show this help message

Options:
  --host <host>       Bind address (default: HOST or 127.0.0.1)
  -p, --port <port>   Server port (default: PORT or 8080)
  -h, --help          Show help

Environment:
  DATABASE_URL   SQLite database path or sqlite:// URL (required)
  LOG_LEVEL      ERROR | WARNING | INFO | DEBUG | TRACE | OFF (default: WARNING)
  CORS_ORIGINS   Comma-separated allowed origins
`);
}

// ============================================
// Commands
// ============================================

function runMigrate(config: AppConfig): void {
  const logger = createLogger(config.logLevel);
  const database = new DatabaseManager({ path: config.databasePath, logger });
  database.initialize();

  for (const migration of database.getMigrations()) {
    console.log(`  ${migration.version}: ${migration.description}`);
  }
  database.close();
}

async function runServe(config: AppConfig, args: CliArgs): Promise<void> {
  const logger = createLogger(config.logLevel);

  const database = new DatabaseManager({ path: config.databasePath, logger });
  database.initialize();
  logger.info({ path: database.getPath() }, 'Connected to the database');

  const server = new ApiServer({
    host: args.host ?? config.host,
    port: args.port ?? config.port,
    corsOrigins: config.corsOrigins,
    database,
    logger,
  });
  await server.start();

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    server.stop()
      .then(() => {
        database.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to stop server');
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.command === 'help') {
    printHelp();
    return;
  }

  const config = loadConfig();

  switch (args.command) {
    case 'migrate':
      runMigrate(config);
      break;

    case 'serve':
      await runServe(config, args);
      break;
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
