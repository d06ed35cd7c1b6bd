#!/usr/bin/env node

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { getSupabaseClient } from '../database/client.js';
import { logger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const REQUIRED_TABLES = ['daily_inventory', 'detected_sales', 'scrape_logs', 'scheduler_state'];

/**
 * Split a schema file into statements, dropping comment-only chunks
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map(statement =>
      statement
        .split('\n')
        .filter(line => !line.trim().startsWith('--'))
        .join('\n')
        .trim()
    )
    .filter(statement => statement.length > 0);
}

/**
 * Apply schema.sql through the `exec_sql` RPC. Projects without that function
 * need the file pasted into the Supabase SQL editor instead.
 */
async function runMigrations(): Promise<void> {
  const supabase = getSupabaseClient();
  logger.info('Running database migrations');

  const schemaPath = join(__dirname, '../database/schema.sql');
  const statements = splitStatements(readFileSync(schemaPath, 'utf-8'));
  logger.info(`Executing ${statements.length} SQL statements`);

  let failed = 0;
  for (let i = 0; i < statements.length; i++) {
    const { error } = await supabase.rpc('exec_sql', { sql: statements[i] });

    if (error) {
      failed++;
      logger.warn(`Statement ${i + 1} failed via RPC`, {
        error: error.message,
        statement: statements[i].substring(0, 100),
      });
    } else {
      logger.debug(`Statement ${i + 1} executed successfully`);
    }
  }

  const missing: string[] = [];
  for (const table of REQUIRED_TABLES) {
    const { error } = await supabase.from(table).select('id').limit(1);
    if (error) {
      missing.push(table);
    }
  }

  if (missing.length > 0) {
    logger.error('Table verification failed', { missing, failedStatements: failed });
    logger.warn('Run src/database/schema.sql manually in the Supabase SQL editor');
    throw new Error(`Missing tables: ${missing.join(', ')}`);
  }

  logger.info('Database tables verified', { tables: REQUIRED_TABLES });
}

if (process.argv[1] === __filename) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
}
