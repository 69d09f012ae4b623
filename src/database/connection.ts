import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { Database } from '../types/database.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger(import.meta.url);

let db: Kysely<Database> | null = null;

export function getDatabase(databaseUrl: string | undefined = process.env.DATABASE_URL): Kysely<Database> {
  if (!db) {
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is required');
    }

    const pool = new pg.Pool({
      connectionString: databaseUrl,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    db = new Kysely<Database>({
      dialect: new PostgresDialect({
        pool,
      }),
      log: (event) => {
        if (event.level === 'error') {
          logger.error(event.error, 'Database error');
        }
      },
    });

    logger.info('Database connection established');
  }

  return db;
}

export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    logger.info('Database connection closed');
  }
}
