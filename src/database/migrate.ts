/**
 * Lending Ledger - Database Migration Runner
 * Executes schema.sql against PostgreSQL
 */

import { Pool } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';

dotenv.config();

async function migrate(): Promise<void> {
  if (!process.env.DATABASE_URL) {
    console.error('[Migrate] DATABASE_URL is not set');
    process.exit(1);
  }

  const pool = new Pool({
    connectionString: process.env.DATABASE_URL,
  });

  console.log('[Migrate] Connecting to database...');

  try {
    // schema.sql is not copied by tsc; read it from the source tree
    const schemaPath = path.join(process.cwd(), 'src', 'database', 'schema.sql');
    const schema = fs.readFileSync(schemaPath, 'utf-8');

    console.log('[Migrate] Executing schema...');
    await pool.query(schema);
    console.log('[Migrate] Schema applied successfully');

    const result = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);

    console.log('[Migrate] Tables:');
    for (const row of result.rows) {
      console.log(`  - ${row.table_name}`);
    }
  } catch (error) {
    console.error('[Migrate] Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }

  console.log('[Migrate] Migration complete');
}

migrate().catch((error) => {
  console.error('[Migrate] Fatal error:', error);
  process.exit(1);
});
