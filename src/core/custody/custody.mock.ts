/**
 * Lending Ledger - In-Memory Custody Adapters
 *
 * DESIGN:
 * - InMemoryCustody keeps native balances per principal and refuses overdrafts
 * - FailingTransferService wraps another adapter and fails chosen transfers
 * - DeferredExternalAssetHook accepts token/collectible movements without
 *   performing them (no token integration ships with the ledger)
 */

import { v4 as uuidv4 } from 'uuid';
import { Principal } from '../../shared/types';
import {
  ExternalAssetHook,
  TransferInstruction,
  TransferReceipt,
  TransferResult,
  ValueTransferService,
} from './transfer.port';

export class InMemoryCustody implements ValueTransferService {
  readonly name = 'IN_MEMORY_CUSTODY';

  private readonly balances = new Map<Principal, bigint>();
  private readonly history: TransferReceipt[] = [];

  constructor(initialBalances: Iterable<[Principal, bigint]> = []) {
    for (const [principal, amount] of initialBalances) {
      this.credit(principal, amount);
    }
  }

  async transfer(instruction: TransferInstruction): Promise<TransferResult<TransferReceipt>> {
    const { amount, from, to } = instruction;

    if (amount <= 0n) {
      return { success: false, error: `Transfer amount must be positive, got ${amount}` };
    }
    if (from === to) {
      return { success: false, error: `Transfer to self (${from}) rejected` };
    }

    const available = this.balanceOf(from);
    if (available < amount) {
      console.warn(`[Custody] REJECTED: ${from} holds ${available}, needs ${amount} (ref ${instruction.reference})`);
      return { success: false, error: `Insufficient balance: ${from} holds ${available}, needs ${amount}` };
    }

    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    const receipt: TransferReceipt = {
      txId: uuidv4(),
      adapter: this.name,
      amount,
      from,
      to,
      processedAt: new Date(),
      status: 'SETTLED',
    };
    this.history.push(receipt);

    return { success: true, value: receipt };
  }

  balanceOf(principal: Principal): bigint {
    return this.balances.get(principal) ?? 0n;
  }

  /**
   * Mint into an account (faucet for development and tests)
   */
  credit(principal: Principal, amount: bigint): void {
    if (amount < 0n) {
      throw new Error(`Cannot credit a negative amount: ${amount}`);
    }
    this.balances.set(principal, this.balanceOf(principal) + amount);
  }

  /** Every account ever credited, for persistence */
  entries(): Array<[Principal, bigint]> {
    return Array.from(this.balances.entries());
  }

  getTransferHistory(): TransferReceipt[] {
    return [...this.history];
  }
}

/**
 * FailingTransferService - For testing failure scenarios
 *
 * Delegates to `inner` and fails every transfer `shouldFail` matches.
 */
export class FailingTransferService implements ValueTransferService {
  readonly name = 'FAILING_TRANSFER';

  constructor(
    private readonly inner: ValueTransferService,
    private readonly shouldFail: (instruction: TransferInstruction) => boolean,
    private readonly failureMessage: string = 'Simulated transfer failure'
  ) {}

  async transfer(instruction: TransferInstruction): Promise<TransferResult<TransferReceipt>> {
    if (this.shouldFail(instruction)) {
      console.error(`[Custody] Transfer failed: ${this.failureMessage}`);
      return { success: false, error: this.failureMessage };
    }
    return this.inner.transfer(instruction);
  }
}

/**
 * DeferredExternalAssetHook - accepts and logs token/collectible movements
 *
 * LIMITATION: nothing moves. The ledger records the loan as if the transfer
 * happened; settlement of non-native assets is left to an integration that
 * implements ExternalAssetHook for real.
 */
export class DeferredExternalAssetHook implements ExternalAssetHook {
  readonly name = 'DEFERRED_EXTERNAL_ASSETS';

  async transferToken(
    contract: string,
    instruction: TransferInstruction
  ): Promise<TransferResult<TransferReceipt>> {
    console.warn(
      `[Custody] DEFERRED token transfer: ${instruction.amount} of ${contract} ` +
      `${instruction.from} -> ${instruction.to} (ref ${instruction.reference})`
    );
    return { success: true, value: this.deferred(instruction.amount, instruction.from, instruction.to) };
  }

  async transferCollectible(
    collection: string,
    itemId: string,
    from: Principal,
    to: Principal,
    reference: string
  ): Promise<TransferResult<TransferReceipt>> {
    console.warn(`[Custody] DEFERRED collectible transfer: ${collection}#${itemId} ${from} -> ${to} (ref ${reference})`);
    return { success: true, value: this.deferred(1n, from, to) };
  }

  private deferred(amount: bigint, from: Principal, to: Principal): TransferReceipt {
    return {
      txId: uuidv4(),
      adapter: this.name,
      amount,
      from,
      to,
      processedAt: new Date(),
      status: 'DEFERRED',
    };
  }
}
