/**
 * Database connection manager
 * Keeps one SQLite connection per process, opened lazily from config
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { getConfig } from '../../config/index.js';
import { createDatabase } from './sqlite.js';
import { logger } from '../../utils/logger.js';

let connection: Database.Database | null = null;

/**
 * Get or open the database connection
 */
export function getDatabase(): Database.Database {
  if (connection?.open) {
    return connection;
  }

  const { dbPath } = getConfig();
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  connection = createDatabase(dbPath);
  return connection;
}

/**
 * Close the connection, if any
 */
export function resetDatabase(): void {
  if (connection?.open) {
    try {
      connection.close();
    } catch (error) {
      logger.error('Error closing database', error);
    }
  }
  connection = null;
}
