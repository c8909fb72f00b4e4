/**
 * Lending Ledger - Database Module Export
 */

export { getPool, closePool, testConnection, isMockMode } from './connection';
export { LedgerRepository, LedgerState, SqlDatabase, SqlSession, pgDatabase } from './ledger.repository';
export { LedgerPersistence } from './ledger.persistence';
