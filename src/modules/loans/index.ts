/**
 * Lending Ledger - Loans Module Export
 */

export { LoanBook } from './loan-book';
export {
  LoanRegistry,
  LoanRegistryDeps,
  LoanTermsInput,
  PlatformAccounts,
  DynamicRateQuote,
  quoteRepayment,
} from './loan-registry.service';
