/**
 * Lending Ledger - Custody Module Export
 */

export {
  ValueTransferService,
  ExternalAssetHook,
  TransferInstruction,
  TransferReceipt,
  TransferResult,
} from './transfer.port';
export { InMemoryCustody, FailingTransferService, DeferredExternalAssetHook } from './custody.mock';
export { Settlement, SettlementLeg, SettlementError } from './settlement';
