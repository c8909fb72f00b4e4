/**
 * Lending Ledger - Ledger Module Export
 */

export { LendingLedger, LedgerOptions, LedgerSnapshot } from './ledger';
