/**
 * Lending Ledger - Value Transfer Port
 *
 * The ledger never moves value itself. Native-currency movement goes through
 * a ValueTransferService; token and collectible movement goes through an
 * ExternalAssetHook. Both are adapters injected at boot.
 *
 * Input: TransferInstruction (who, how much, why)
 * Output: TransferReceipt (proof of movement)
 */

import { Principal } from '../../shared/types';

/**
 * Result type for transfer operations
 */
export type TransferResult<T> =
  | { success: true; value: T }
  | { success: false; error: string };

export interface TransferInstruction {
  readonly amount: bigint;
  readonly from: Principal;
  readonly to: Principal;
  /** Loan id or admin reference, for reconciliation */
  readonly reference: string;
  readonly memo?: string;
}

/**
 * TransferReceipt - Proof of movement
 *
 * DEFERRED marks a movement the adapter accepted but did not perform
 * (external assets without an integration).
 */
export interface TransferReceipt {
  readonly txId: string;
  readonly adapter: string;
  readonly amount: bigint;
  readonly from: Principal;
  readonly to: Principal;
  readonly processedAt: Date;
  readonly status: 'SETTLED' | 'DEFERRED';
}

/**
 * ValueTransferService - native-currency movement
 */
export interface ValueTransferService {
  readonly name: string;

  /**
   * Move `amount` from one principal to another. All-or-nothing per call.
   */
  transfer(instruction: TransferInstruction): Promise<TransferResult<TransferReceipt>>;
}

/**
 * ExternalAssetHook - token and collectible movement
 */
export interface ExternalAssetHook {
  readonly name: string;

  transferToken(
    contract: string,
    instruction: TransferInstruction
  ): Promise<TransferResult<TransferReceipt>>;

  transferCollectible(
    collection: string,
    itemId: string,
    from: Principal,
    to: Principal,
    reference: string
  ): Promise<TransferResult<TransferReceipt>>;
}
