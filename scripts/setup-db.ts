#!/usr/bin/env tsx
/**
 * Database setup script
 * Creates the trades and wallet_checkpoints tables and verifies them
 */

import * as dotenv from 'dotenv';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { sql } from 'drizzle-orm';
import * as schema from '../src/database/schema/index.js';
import { CREATE_TABLES_SQL } from '../src/database/index.js';
import { logger } from '../src/utils/logger.js';

dotenv.config();

const log = logger('SetupDB');

async function setupDatabase(): Promise<void> {
  const databaseUrl = process.env['DATABASE_URL'];
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  log.info('Connecting to database...');
  const client = postgres(databaseUrl, { max: 1, onnotice: () => {} });
  const db = drizzle(client, { schema });

  try {
    log.info('Creating tables...');
    await client.unsafe(CREATE_TABLES_SQL);

    // Verify schema by querying tables
    log.info('Verifying schema...');
    for (const table of ['trades', 'wallet_checkpoints']) {
      await db.execute(sql.raw(`SELECT 1 FROM ${table} LIMIT 1`));
      log.info(`Table ${table} exists`);
    }

    log.info('Database setup completed successfully');
  } catch (error) {
    log.error('Database setup failed', { error: error instanceof Error ? error.message : String(error) });
    throw error;
  } finally {
    await client.end();
  }
}

// Run setup
setupDatabase()
  .then(() => {
    log.info('Setup complete');
    process.exit(0);
  })
  .catch(() => {
    process.exit(1);
  });
