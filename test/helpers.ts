/**
 * Shared test setup: an API server over a fresh in-memory database
 */

import type { Express } from 'express';
import { ApiServer } from '../src/server/express.js';
import { DatabaseManager } from '../src/storage/sqlite.js';
import { createLogger } from '../src/logger.js';

export const FIXED_TIME = '2023-01-01T12:00:00.000Z';

export interface TestContext {
  app: Express;
  server: ApiServer;
  database: DatabaseManager;
}

export function createTestContext(): TestContext {
  const database = new DatabaseManager({ path: ':memory:' });
  database.initialize();

  const server = new ApiServer({
    database,
    logger: createLogger('silent'),
    clock: () => new Date(FIXED_TIME),
  });

  return { app: server.getApp(), server, database };
}
