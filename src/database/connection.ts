/**
 * Lending Ledger - PostgreSQL Pool
 *
 * No DATABASE_URL means mock mode: the ledger lives in memory only and
 * getPool() answers null from then on.
 */

import { Pool } from 'pg';

let pool: Pool | null = null;
let mockMode = false;

export function isMockMode(): boolean {
  return mockMode;
}

export function getPool(databaseUrl: string | null): Pool | null {
  if (pool || mockMode) return pool;

  if (!databaseUrl) {
    console.warn('[Database] No DATABASE_URL: persistence disabled (mock mode)');
    mockMode = true;
    return null;
  }

  pool = new Pool({ connectionString: databaseUrl, max: 10, connectionTimeoutMillis: 2_000 });
  pool.on('error', (err) => {
    console.error('[Database] Idle client error:', err);
  });
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  console.log('[Database] Pool closed');
}

/**
 * True when the database answers, or when there is none to ask
 */
export async function testConnection(databaseUrl: string | null): Promise<boolean> {
  const db = getPool(databaseUrl);
  if (!db) return true;

  try {
    await db.query('SELECT 1');
    console.log('[Database] Connected');
    return true;
  } catch (error) {
    console.error('[Database] Connection check failed:', error);
    return false;
  }
}
