/**
 * Lending Ledger - User Stats Store
 *
 * Per-principal history. Unknown principals read as all-zero; a record is
 * created on the first write and never removed. Reputation only grows.
 */

import { EMPTY_USER_STATS, Principal, UserStats } from '../../shared/types';

export class UserStatsStore {
  private readonly stats = new Map<Principal, UserStats>();

  constructor(initial: Iterable<[Principal, UserStats]> = []) {
    for (const [principal, entry] of initial) {
      this.stats.set(principal, entry);
    }
  }

  get(principal: Principal): UserStats {
    return this.stats.get(principal) ?? EMPTY_USER_STATS;
  }

  has(principal: Principal): boolean {
    return this.stats.has(principal);
  }

  recordLoanCreated(borrower: Principal): UserStats {
    const current = this.get(borrower);
    return this.put(borrower, {
      ...current,
      loansCreated: current.loansCreated + 1,
      reputation: current.reputation + 1,
    });
  }

  /**
   * `lentAmount` is 0n for loans whose principal moved outside native custody
   */
  recordLoanFunded(lender: Principal, lentAmount: bigint): UserStats {
    const current = this.get(lender);
    return this.put(lender, {
      ...current,
      loansFunded: current.loansFunded + 1,
      totalLent: current.totalLent + lentAmount,
      reputation: current.reputation + 1,
    });
  }

  recordRepayment(borrower: Principal, principal: bigint): UserStats {
    const current = this.get(borrower);
    return this.put(borrower, {
      ...current,
      totalBorrowed: current.totalBorrowed + principal,
    });
  }

  recordDefault(borrower: Principal): UserStats {
    const current = this.get(borrower);
    return this.put(borrower, {
      ...current,
      defaultCount: current.defaultCount + 1,
    });
  }

  entries(): Array<[Principal, UserStats]> {
    return Array.from(this.stats.entries());
  }

  private put(principal: Principal, entry: UserStats): UserStats {
    this.stats.set(principal, entry);
    return entry;
  }
}
