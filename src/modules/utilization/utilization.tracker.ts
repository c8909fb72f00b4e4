/**
 * Lending Ledger - Utilization Tracker
 *
 * Per loan asset: total supplied by lenders, total borrowed (requested and
 * outstanding), open loan count. Counters never go below zero: a subtraction
 * larger than the counter clamps to 0 instead of failing, so accounting drift
 * cannot block repayments or liquidations.
 */

import { AssetUtilization, LoanAsset, loanAssetKey } from '../../shared/types';

export const UTILIZATION_SCALE = 10_000n;

export interface UtilizationDelta {
  supplied?: bigint;
  borrowed?: bigint;
  loanCount?: number;
}

export class UtilizationTracker {
  private readonly entries = new Map<string, AssetUtilization>();

  constructor(initial: Iterable<AssetUtilization> = []) {
    for (const entry of initial) {
      this.entries.set(loanAssetKey(entry.asset), entry);
    }
  }

  get(asset: LoanAsset): AssetUtilization {
    return this.entries.get(loanAssetKey(asset)) ?? {
      asset,
      totalSupplied: 0n,
      totalBorrowed: 0n,
      activeLoanCount: 0,
    };
  }

  /**
   * borrowed × 10000 / supplied, truncated. 0 while nothing is supplied.
   */
  utilizationRate(asset: LoanAsset): number {
    const { totalSupplied, totalBorrowed } = this.get(asset);
    if (totalSupplied === 0n) return 0;
    return Number((totalBorrowed * UTILIZATION_SCALE) / totalSupplied);
  }

  /**
   * Apply deltas. Additions apply directly; subtractions clamp at zero.
   * Negative deltas are rejected: direction is carried by `isAddition`.
   */
  update(asset: LoanAsset, delta: UtilizationDelta, isAddition: boolean): AssetUtilization {
    const supplied = delta.supplied ?? 0n;
    const borrowed = delta.borrowed ?? 0n;
    const loanCount = delta.loanCount ?? 0;
    if (supplied < 0n || borrowed < 0n || loanCount < 0) {
      throw new Error(`Utilization deltas must be non-negative: ${supplied}/${borrowed}/${loanCount}`);
    }

    const current = this.get(asset);
    const next: AssetUtilization = isAddition
      ? {
          asset,
          totalSupplied: current.totalSupplied + supplied,
          totalBorrowed: current.totalBorrowed + borrowed,
          activeLoanCount: current.activeLoanCount + loanCount,
        }
      : {
          asset,
          totalSupplied: floorSub(current.totalSupplied, supplied),
          totalBorrowed: floorSub(current.totalBorrowed, borrowed),
          activeLoanCount: Math.max(0, current.activeLoanCount - loanCount),
        };

    this.entries.set(loanAssetKey(asset), next);
    return next;
  }

  list(): AssetUtilization[] {
    return Array.from(this.entries.values());
  }
}

function floorSub(value: bigint, amount: bigint): bigint {
  return amount >= value ? 0n : value - amount;
}
