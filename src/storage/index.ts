/**
 * Storage layer interface and factory
 */

import { resolve } from 'path';
import { StorageError, type Storage } from '../types.js';
import { logger } from '../util/logger.js';

export const DEFAULT_DATABASE_URL = 'sqlite://./data/poultry-leads.db';

/**
 * Create storage instance based on DATABASE_URL
 */
export async function createStorage(
  databaseUrl: string = process.env.DATABASE_URL || DEFAULT_DATABASE_URL
): Promise<Storage> {
  logger.info('Creating storage instance', { databaseUrl: sanitizeUrl(databaseUrl) });

  if (databaseUrl.startsWith('sqlite://')) {
    const { SqliteStorage } = await import('./sqlite.js');
    const dbPath = databaseUrl.replace('sqlite://', '');
    return new SqliteStorage(dbPath === ':memory:' ? dbPath : resolve(process.cwd(), dbPath));
  }

  if (databaseUrl.startsWith('postgres://') || databaseUrl.startsWith('postgresql://')) {
    const { PostgresStorage } = await import('./postgres.js');
    return new PostgresStorage(databaseUrl);
  }

  throw new StorageError(`Unsupported database URL format: ${sanitizeUrl(databaseUrl)}`);
}

/**
 * Sanitize database URL for logging (remove credentials)
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      return `${parsed.protocol}//${parsed.hostname}:${parsed.port}${parsed.pathname}`;
    }
    return url;
  } catch {
    // Unparseable: hide everything after ://
    const parts = url.split('://');
    if (parts.length > 1) {
      return `${parts[0]}://***`;
    }
    return url;
  }
}

/**
 * Run database migrations
 */
export async function runMigrations(storage: Storage): Promise<void> {
  logger.info('Running database migrations');
  await storage.runMigrations();
  logger.info('Database migrations completed');
}

/**
 * Test database connection
 */
export async function testConnection(storage: Storage): Promise<boolean> {
  const connected = await storage.testConnection();
  if (!connected) {
    logger.error('Database connection test failed');
  }
  return connected;
}

/**
 * Export types
 */
export type { Storage } from '../types.js';
