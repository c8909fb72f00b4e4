/**
 * Lending Ledger - Asset Types
 *
 * Every asset the ledger touches is either the chain's native currency or a
 * reference into one of the two registries (fungible tokens, collectible
 * collections). Kinds are tagged unions so that a new kind breaks every
 * switch that forgot it.
 */

/** Identity of a caller, borrower, lender or system account */
export type Principal = string;

// ============================================================================
// LOAN ASSETS (what is borrowed)
// ============================================================================

export type LoanAsset =
  | { readonly kind: 'NATIVE' }
  | { readonly kind: 'TOKEN'; readonly contract: string };

// ============================================================================
// COLLATERAL
// ============================================================================

export type CollateralAsset =
  | { readonly kind: 'NATIVE' }
  | { readonly kind: 'TOKEN'; readonly contract: string }
  | { readonly kind: 'COLLECTIBLE'; readonly collection: string; readonly itemId: string };

/**
 * What the borrower offers. Collectibles carry no amount: their value is the
 * collection's registered floor price.
 */
export type CollateralSpec =
  | { readonly kind: 'NATIVE'; readonly amount: bigint }
  | { readonly kind: 'TOKEN'; readonly contract: string; readonly amount: bigint }
  | { readonly kind: 'COLLECTIBLE'; readonly collection: string; readonly itemId: string };

/** Collateral as held by a loan: the asset plus the value it was booked at */
export interface CollateralPosition {
  readonly asset: CollateralAsset;
  readonly amount: bigint;
}

// ============================================================================
// REGISTRY ENTRIES
// ============================================================================

export interface SupportedToken {
  readonly contract: string;
  readonly decimals: number;
  readonly riskScore: number;
  readonly enabled: boolean;
}

export interface SupportedCollection {
  readonly collection: string;
  readonly floorPrice: bigint;
  readonly riskScore: number;
  readonly enabled: boolean;
}

// ============================================================================
// HELPERS
// ============================================================================

export const NATIVE_ASSET: LoanAsset = { kind: 'NATIVE' };

/**
 * Stable map key for a loan asset: `NATIVE` or `TOKEN:<contract>`
 */
export function loanAssetKey(asset: LoanAsset): string {
  switch (asset.kind) {
    case 'NATIVE':
      return 'NATIVE';
    case 'TOKEN':
      return `TOKEN:${asset.contract}`;
  }
}

/**
 * Inverse of loanAssetKey. Returns null for keys it did not produce.
 */
export function parseLoanAssetKey(key: string): LoanAsset | null {
  if (key === 'NATIVE') return NATIVE_ASSET;
  if (key.startsWith('TOKEN:') && key.length > 'TOKEN:'.length) {
    return { kind: 'TOKEN', contract: key.slice('TOKEN:'.length) };
  }
  return null;
}

export function describeCollateral(asset: CollateralAsset): string {
  switch (asset.kind) {
    case 'NATIVE':
      return 'native';
    case 'TOKEN':
      return `token ${asset.contract}`;
    case 'COLLECTIBLE':
      return `collectible ${asset.collection}#${asset.itemId}`;
  }
}
