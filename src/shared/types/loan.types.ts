/**
 * Lending Ledger - Loan Types
 *
 * LIFECYCLE (MONOTONIC):
 *   PENDING --fund--> ACTIVE --repay--> REPAID
 *                      ACTIVE --liquidate (overdue)--> LIQUIDATED
 *
 * Terminal records are never deleted. The status union makes the fields a
 * transition sets (lender, fundedAt, ...) present exactly where they exist.
 */

import { CollateralPosition, CollateralSpec, LoanAsset, Principal } from './asset.types';

export type LoanStatus = 'PENDING' | 'ACTIVE' | 'REPAID' | 'LIQUIDATED';

/**
 * Risk tiers, ordinal. The numeric value feeds the rate engine directly.
 */
export enum RiskTier {
  SAFE = 1,
  LOW = 2,
  MEDIUM = 3,
  HIGH = 4,
  VERY_HIGH = 5,
}

interface LoanTerms {
  readonly id: number;
  readonly borrower: Principal;
  readonly principal: bigint;
  readonly loanAsset: LoanAsset;
  readonly collateral: CollateralPosition;
  /** Applied rate in basis points */
  readonly interestRateBps: number;
  /** Loan period in blocks */
  readonly duration: number;
  readonly createdAt: number;
  /** Audit snapshot: borrower tier when the loan was created */
  readonly riskTier: RiskTier;
  /** Audit snapshot: dynamic rate quoted at creation, whether or not applied */
  readonly dynamicRateBps: number;
}

export interface PendingLoan extends LoanTerms {
  readonly status: 'PENDING';
  readonly lender: null;
  readonly fundedAt: null;
}

export interface ActiveLoan extends LoanTerms {
  readonly status: 'ACTIVE';
  readonly lender: Principal;
  readonly fundedAt: number;
}

export interface RepaidLoan extends LoanTerms {
  readonly status: 'REPAID';
  readonly lender: Principal;
  readonly fundedAt: number;
  readonly repaidAt: number;
  readonly totalRepaid: bigint;
}

export interface LiquidatedLoan extends LoanTerms {
  readonly status: 'LIQUIDATED';
  readonly lender: Principal;
  readonly fundedAt: number;
  readonly liquidatedAt: number;
}

export type Loan = PendingLoan | ActiveLoan | RepaidLoan | LiquidatedLoan;

// ============================================================================
// REQUESTS & RESULTS
// ============================================================================

export interface CreateLoanRequest {
  readonly principal: bigint;
  readonly loanAsset: LoanAsset;
  readonly collateral: CollateralSpec;
  /** Blocks */
  readonly duration: number;
  /** Fixed rate chosen by the borrower. Absent or 0 means "use the dynamic rate". */
  readonly interestRateBps?: number;
  /** Ceiling on the dynamic rate the borrower will accept */
  readonly maxAcceptableRateBps?: number;
}

export interface LoanFilter {
  readonly borrower?: Principal;
  readonly lender?: Principal;
  readonly status?: LoanStatus;
}

export interface RepaymentQuote {
  readonly loanId: number;
  readonly elapsed: number;
  readonly principal: bigint;
  readonly interest: bigint;
  readonly platformFee: bigint;
  readonly lenderPayout: bigint;
  readonly total: bigint;
}

/**
 * Block height at which an active loan becomes liquidatable
 */
export function dueAt(loan: ActiveLoan): number {
  return loan.fundedAt + loan.duration;
}
