/**
 * Lending Ledger - Shared Types Export
 */

export * from './asset.types';
export * from './loan.types';
export * from './stats.types';
