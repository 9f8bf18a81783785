import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import { HARDCODED_CONFIG, type EnvConfig } from '@candlesync/schemas';
import { createLogger } from '@candlesync/utils';

const logger = createLogger('database');

/**
 * Create a database client instance
 *
 * @param config - Validated environment configuration
 * @returns Drizzle instance plus the underlying pool, which owns the connections
 */
export function createDbClient(config: EnvConfig) {
  logger.info(
    { host: config.DATABASE_HOST, port: config.DATABASE_PORT, database: config.DATABASE_NAME },
    'Connecting to PostgreSQL database...'
  );

  const user = encodeURIComponent(config.DATABASE_USERNAME);
  const password = encodeURIComponent(config.DATABASE_PASSWORD);
  const connectionString = `postgresql://${user}:${password}@${config.DATABASE_HOST}:${config.DATABASE_PORT}/${config.DATABASE_NAME}`;

  const queryClient = postgres(connectionString, {
    max: HARDCODED_CONFIG.database.poolMax,
    connect_timeout: HARDCODED_CONFIG.database.connectionTimeoutMs / 1000,
    ssl: config.DATABASE_SSL ? 'require' : false,
    onnotice: () => {}, // Suppress notices (CREATE TABLE IF NOT EXISTS emits one per call)
  });

  const db = drizzle(queryClient);

  return { db, queryClient };
}

/**
 * Helper type for database client
 */
export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];

/**
 * Test database connection with a simple query
 * Throws an error if connection fails
 */
export async function testDatabaseConnection(db: Database): Promise<void> {
  try {
    await db.execute(sql`SELECT 1`);
    logger.debug('Database connection test passed');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Database connection test FAILED');
    throw error;
  }
}
