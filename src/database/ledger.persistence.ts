/**
 * Lending Ledger - Write-Through Persistence
 *
 * Saves run one at a time, and each one captures the state when it starts,
 * never when it was requested. A save that commits later therefore never
 * carries older state than one that committed before it.
 */

import { Mutex } from '../shared/mutex';
import { LedgerRepository, LedgerState } from './ledger.repository';

export class LedgerPersistence {
  private readonly lock = new Mutex();

  constructor(
    private readonly repository: LedgerRepository,
    private readonly capture: () => LedgerState
  ) {}

  /**
   * Persist the current state. A failed save is logged; the in-memory ledger
   * stays authoritative and the next save writes the rows this one missed.
   */
  async persist(): Promise<void> {
    await this.lock.runExclusive(async () => {
      try {
        await this.repository.save(this.capture());
      } catch (error) {
        console.error('[Persistence] CRITICAL: snapshot save failed:', error);
      }
    });
  }
}
