/**
 * Lending Ledger - Settlement
 *
 * Runs every value movement of one ledger operation as a unit. Legs execute
 * in order; when one fails, the legs already executed are compensated in
 * reverse order and the operation aborts with TRANSFER_FAILED. The ledger
 * commits its own state only after execute() resolves.
 */

import { LendingError } from '../../shared/errors';
import { CollateralPosition, LoanAsset, Principal } from '../../shared/types';
import {
  ExternalAssetHook,
  TransferInstruction,
  TransferReceipt,
  TransferResult,
  ValueTransferService,
} from './transfer.port';

export interface SettlementLeg {
  readonly description: string;
  execute(): Promise<TransferResult<TransferReceipt>>;
  compensate(): Promise<TransferResult<TransferReceipt>>;
}

/**
 * SettlementError - a leg failed. `unreconciled` lists compensations that
 * failed too; non-empty means custody and ledger disagree and an operator
 * has to step in.
 */
export class SettlementError extends LendingError {
  constructor(
    message: string,
    public readonly failedLeg: string,
    public readonly unreconciled: readonly string[]
  ) {
    super('TRANSFER_FAILED', message);
    this.name = 'SettlementError';
  }
}

export class Settlement {
  constructor(
    private readonly transfers: ValueTransferService,
    private readonly externalAssets: ExternalAssetHook
  ) {}

  // ============================================
  // LEG BUILDERS
  // ============================================

  /**
   * Movement of a loan asset (principal, repayment, fee). Zero amounts
   * and movements to oneself produce no leg.
   */
  moveLoanAsset(
    asset: LoanAsset,
    amount: bigint,
    from: Principal,
    to: Principal,
    reference: string,
    memo: string
  ): SettlementLeg[] {
    if (amount === 0n || from === to) return [];
    const instruction: TransferInstruction = { amount, from, to, reference, memo };

    switch (asset.kind) {
      case 'NATIVE':
        return [this.nativeLeg(instruction)];
      case 'TOKEN':
        return [this.tokenLeg(asset.contract, instruction)];
    }
  }

  /**
   * Movement of a collateral position, whatever its kind
   */
  moveCollateral(
    position: CollateralPosition,
    from: Principal,
    to: Principal,
    reference: string,
    memo: string
  ): SettlementLeg[] {
    const { asset, amount } = position;
    if (from === to) return [];

    switch (asset.kind) {
      case 'NATIVE':
        return amount === 0n ? [] : [this.nativeLeg({ amount, from, to, reference, memo })];
      case 'TOKEN':
        return amount === 0n ? [] : [this.tokenLeg(asset.contract, { amount, from, to, reference, memo })];
      case 'COLLECTIBLE':
        return [this.collectibleLeg(asset.collection, asset.itemId, from, to, reference)];
    }
  }

  // ============================================
  // EXECUTION
  // ============================================

  /**
   * Execute legs in order. Resolves with every receipt, or throws
   * SettlementError after compensating what had already moved.
   */
  async execute(reference: string, legs: readonly SettlementLeg[]): Promise<TransferReceipt[]> {
    const receipts: TransferReceipt[] = [];
    const executed: SettlementLeg[] = [];

    for (const leg of legs) {
      const result = await leg.execute();
      if (result.success) {
        receipts.push(result.value);
        executed.push(leg);
        continue;
      }

      console.error(`[Settlement] ${reference}: leg failed (${leg.description}): ${result.error}`);
      const unreconciled = await this.compensate(reference, executed);
      throw new SettlementError(
        `Settlement ${reference} failed at "${leg.description}": ${result.error}`,
        leg.description,
        unreconciled
      );
    }

    return receipts;
  }

  private async compensate(reference: string, executed: readonly SettlementLeg[]): Promise<string[]> {
    const unreconciled: string[] = [];

    for (const leg of [...executed].reverse()) {
      const result = await leg.compensate();
      if (result.success) {
        console.log(`[Settlement] ${reference}: reversed ${leg.description}`);
      } else {
        console.error(`[Settlement] CRITICAL ${reference}: could not reverse ${leg.description}: ${result.error}`);
        unreconciled.push(leg.description);
      }
    }

    return unreconciled;
  }

  // ============================================
  // LEGS
  // ============================================

  private nativeLeg(instruction: TransferInstruction): SettlementLeg {
    return {
      description: `native ${instruction.amount} ${instruction.from} -> ${instruction.to}`,
      execute: () => this.transfers.transfer(instruction),
      compensate: () => this.transfers.transfer(reverse(instruction)),
    };
  }

  private tokenLeg(contract: string, instruction: TransferInstruction): SettlementLeg {
    return {
      description: `token ${contract} ${instruction.amount} ${instruction.from} -> ${instruction.to}`,
      execute: () => this.externalAssets.transferToken(contract, instruction),
      compensate: () => this.externalAssets.transferToken(contract, reverse(instruction)),
    };
  }

  private collectibleLeg(
    collection: string,
    itemId: string,
    from: Principal,
    to: Principal,
    reference: string
  ): SettlementLeg {
    return {
      description: `collectible ${collection}#${itemId} ${from} -> ${to}`,
      execute: () => this.externalAssets.transferCollectible(collection, itemId, from, to, reference),
      compensate: () => this.externalAssets.transferCollectible(collection, itemId, to, from, `${reference}:reversal`),
    };
  }
}

function reverse(instruction: TransferInstruction): TransferInstruction {
  return {
    amount: instruction.amount,
    from: instruction.to,
    to: instruction.from,
    reference: `${instruction.reference}:reversal`,
    memo: `REVERSAL: ${instruction.memo ?? ''}`.trim(),
  };
}
