/**
 * Lending Ledger - Loan Book
 *
 * Storage for loan records, keyed by id. Ids start at 1 and are assigned in
 * order; records are replaced on each transition and never removed.
 * Only LoanRegistry writes here.
 */

import { Loan, LoanFilter } from '../../shared/types';

export class LoanBook {
  private readonly loans = new Map<number, Loan>();
  private lastId: number;

  constructor(initial: Iterable<Loan> = [], counter: number = 0) {
    let highest = 0;
    for (const loan of initial) {
      this.loans.set(loan.id, loan);
      highest = Math.max(highest, loan.id);
    }
    if (counter < highest) {
      throw new Error(`Loan counter ${counter} is behind stored loan #${highest}`);
    }
    this.lastId = counter;
  }

  /** Number of loans ever created; also the highest valid id */
  get counter(): number {
    return this.lastId;
  }

  get nextId(): number {
    return this.lastId + 1;
  }

  get(id: number): Loan | null {
    return this.loans.get(id) ?? null;
  }

  insert(loan: Loan): void {
    if (loan.id !== this.nextId) {
      throw new Error(`Loan id ${loan.id} out of sequence, expected ${this.nextId}`);
    }
    this.loans.set(loan.id, loan);
    this.lastId = loan.id;
  }

  replace(loan: Loan): void {
    if (!this.loans.has(loan.id)) {
      throw new Error(`Cannot replace unknown loan #${loan.id}`);
    }
    this.loans.set(loan.id, loan);
  }

  list(filter: LoanFilter = {}): Loan[] {
    const result: Loan[] = [];
    for (const loan of this.loans.values()) {
      if (filter.borrower !== undefined && loan.borrower !== filter.borrower) continue;
      if (filter.lender !== undefined && loan.lender !== filter.lender) continue;
      if (filter.status !== undefined && loan.status !== filter.status) continue;
      result.push(loan);
    }
    return result.sort((a, b) => a.id - b.id);
  }
}
