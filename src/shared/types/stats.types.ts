/**
 * Lending Ledger - Accounting Types
 */

import { LoanAsset } from './asset.types';
import { LoanStatus } from './loan.types';

export interface UserStats {
  readonly loansCreated: number;
  readonly loansFunded: number;
  readonly totalBorrowed: bigint;
  readonly totalLent: bigint;
  /** Never decreases: +1 per loan created or funded */
  readonly reputation: number;
  /** +1 per liquidation suffered */
  readonly defaultCount: number;
}

export const EMPTY_USER_STATS: UserStats = {
  loansCreated: 0,
  loansFunded: 0,
  totalBorrowed: 0n,
  totalLent: 0n,
  reputation: 0,
  defaultCount: 0,
};

export interface AssetUtilization {
  readonly asset: LoanAsset;
  readonly totalSupplied: bigint;
  readonly totalBorrowed: bigint;
  readonly activeLoanCount: number;
}

/**
 * Scalar platform configuration. Rates and ratios in basis points,
 * durations in blocks.
 */
export interface PlatformParams {
  readonly platformFeeBps: number;
  readonly maxDuration: number;
  readonly minCollateralRatioBps: number;
  readonly baseRateBps: number;
  readonly utilizationMultiplierBps: number;
  readonly riskMultiplierBps: number;
  readonly maxDynamicRateBps: number;
  readonly minDynamicRateBps: number;
}

export interface DynamicRateParams {
  readonly baseRateBps: number;
  readonly utilizationMultiplierBps: number;
  readonly riskMultiplierBps: number;
  readonly maxDynamicRateBps: number;
  readonly minDynamicRateBps: number;
}

export interface PlatformStats {
  readonly totalLoans: number;
  readonly loansByStatus: Readonly<Record<LoanStatus, number>>;
  readonly params: PlatformParams;
  readonly owner: string;
  readonly height: number;
}
