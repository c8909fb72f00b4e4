/**
 * Lending Ledger - Error Taxonomy
 *
 * There is no recovery or retry inside the ledger. Every failure aborts the
 * whole operation and reaches the caller as a LendingError with one of the
 * codes below; the ledger is unchanged when it does.
 */

export type LendingErrorCode =
  // Lookups & identity
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  // Input bounds
  | 'INVALID_AMOUNT'
  | 'INVALID_DURATION'
  | 'INVALID_INTEREST'
  | 'INVALID_RISK_SCORE'
  | 'INSUFFICIENT_COLLATERAL'
  | 'RATE_REJECTED'
  // State machine guards
  | 'LOAN_NOT_ACTIVE'
  | 'LOAN_NOT_FUNDED'
  | 'ALREADY_FUNDED'
  | 'LOAN_NOT_OVERDUE'
  // Asset guards
  | 'UNSUPPORTED_ASSET'
  | 'INVALID_COLLATERAL_TYPE'
  | 'INVALID_TOKEN_CONTRACT'
  // Value movement
  | 'TRANSFER_FAILED';

export class LendingError extends Error {
  constructor(
    public readonly code: LendingErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'LendingError';
  }
}

const STATE_GUARD_CODES: ReadonlySet<LendingErrorCode> = new Set<LendingErrorCode>([
  'LOAN_NOT_ACTIVE',
  'LOAN_NOT_FUNDED',
  'ALREADY_FUNDED',
  'LOAN_NOT_OVERDUE',
]);

/**
 * True for codes raised because the loan is in the wrong lifecycle state
 */
export function isStateGuardError(error: LendingError): boolean {
  return STATE_GUARD_CODES.has(error.code);
}

export function isLendingError(error: unknown): error is LendingError {
  return error instanceof LendingError;
}
