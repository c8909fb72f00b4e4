/**
 * Shared test wiring: a ledger on a manual clock and in-memory custody
 */

import { LendingLedger } from '../src/core/ledger';
import { ManualClock } from '../src/core/clock/clock';
import { InMemoryCustody, ValueTransferService } from '../src/core/custody';
import { PlatformParams, Principal } from '../src/shared/types';

export const OWNER = 'platform-owner';
export const CUSTODY = 'ledger-custody';
export const ALICE = 'borrower-alice';
export const BOB = 'lender-bob';
export const CAROL = 'lender-carol';

export const STARTING_BALANCE = 10_000_000_000n;

export interface TestLedgerOptions {
  params?: PlatformParams;
  balances?: Array<[Principal, bigint]>;
  /** Wrap the custody adapter, e.g. to inject failures */
  wrapTransfers?: (custody: InMemoryCustody) => ValueTransferService;
  height?: number;
}

export function createTestLedger(options: TestLedgerOptions = {}) {
  const custody = new InMemoryCustody(
    options.balances ?? [
      [ALICE, STARTING_BALANCE],
      [BOB, STARTING_BALANCE],
      [CAROL, STARTING_BALANCE],
    ]
  );
  const clock = new ManualClock(options.height ?? 0);
  const ledger = new LendingLedger({
    accounts: { owner: OWNER, custody: CUSTODY },
    clock,
    transfers: options.wrapTransfers ? options.wrapTransfers(custody) : custody,
    params: options.params,
  });

  return { ledger, registry: ledger.registry, admin: ledger.admin, custody, clock };
}
