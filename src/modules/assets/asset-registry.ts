/**
 * Lending Ledger - Asset Registry
 *
 * Whitelist of non-native assets: fungible tokens that can be lent or pledged,
 * and collectible collections that can be pledged. Entries are disabled,
 * never deleted, so loans booked against them keep a readable history.
 */

import { LendingError } from '../../shared/errors';
import { SupportedCollection, SupportedToken } from '../../shared/types';

export const MAX_TOKEN_DECIMALS = 18;
export const ASSET_RISK_SCORE = { min: 1, max: 5 } as const;

export interface CollectionUpdate {
  floorPrice?: bigint;
  riskScore?: number;
  enabled?: boolean;
}

export class AssetRegistry {
  private readonly tokens = new Map<string, SupportedToken>();
  private readonly collections = new Map<string, SupportedCollection>();

  constructor(
    tokens: Iterable<SupportedToken> = [],
    collections: Iterable<SupportedCollection> = []
  ) {
    for (const token of tokens) this.tokens.set(token.contract, token);
    for (const collection of collections) this.collections.set(collection.collection, collection);
  }

  // ==========================================================================
  // TOKENS
  // ==========================================================================

  /**
   * Register or re-enable a token. Re-registering overwrites its metadata.
   */
  addToken(contract: string, decimals: number, riskScore: number): SupportedToken {
    assertReference(contract, 'INVALID_TOKEN_CONTRACT', 'Token contract');
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_TOKEN_DECIMALS) {
      throw new LendingError('INVALID_AMOUNT', `Token decimals must be 0..${MAX_TOKEN_DECIMALS}, got ${decimals}`);
    }
    assertRiskScore(riskScore);

    const token: SupportedToken = { contract, decimals, riskScore, enabled: true };
    this.tokens.set(contract, token);
    return token;
  }

  disableToken(contract: string): SupportedToken {
    const existing = this.tokens.get(contract);
    if (!existing) {
      throw new LendingError('NOT_FOUND', `Token ${contract} is not registered`);
    }
    const disabled: SupportedToken = { ...existing, enabled: false };
    this.tokens.set(contract, disabled);
    return disabled;
  }

  getToken(contract: string): SupportedToken | null {
    return this.tokens.get(contract) ?? null;
  }

  /**
   * Registered and enabled, or throws NOT_FOUND / UNSUPPORTED_ASSET
   */
  requireEnabledToken(contract: string): SupportedToken {
    const token = this.tokens.get(contract);
    if (!token) {
      throw new LendingError('NOT_FOUND', `Token ${contract} is not registered`);
    }
    if (!token.enabled) {
      throw new LendingError('UNSUPPORTED_ASSET', `Token ${contract} is disabled`);
    }
    return token;
  }

  listTokens(): SupportedToken[] {
    return Array.from(this.tokens.values());
  }

  // ==========================================================================
  // COLLECTIONS
  // ==========================================================================

  addCollection(collection: string, floorPrice: bigint, riskScore: number): SupportedCollection {
    assertReference(collection, 'INVALID_COLLATERAL_TYPE', 'Collection');
    assertFloorPrice(floorPrice);
    assertRiskScore(riskScore);

    const entry: SupportedCollection = { collection, floorPrice, riskScore, enabled: true };
    this.collections.set(collection, entry);
    return entry;
  }

  updateCollection(collection: string, update: CollectionUpdate): SupportedCollection {
    const existing = this.collections.get(collection);
    if (!existing) {
      throw new LendingError('NOT_FOUND', `Collection ${collection} is not registered`);
    }
    if (update.floorPrice !== undefined) assertFloorPrice(update.floorPrice);
    if (update.riskScore !== undefined) assertRiskScore(update.riskScore);

    const updated: SupportedCollection = {
      collection,
      floorPrice: update.floorPrice ?? existing.floorPrice,
      riskScore: update.riskScore ?? existing.riskScore,
      enabled: update.enabled ?? existing.enabled,
    };
    this.collections.set(collection, updated);
    return updated;
  }

  getCollection(collection: string): SupportedCollection | null {
    return this.collections.get(collection) ?? null;
  }

  requireEnabledCollection(collection: string): SupportedCollection {
    const entry = this.collections.get(collection);
    if (!entry) {
      throw new LendingError('NOT_FOUND', `Collection ${collection} is not registered`);
    }
    if (!entry.enabled) {
      throw new LendingError('UNSUPPORTED_ASSET', `Collection ${collection} is disabled`);
    }
    return entry;
  }

  listCollections(): SupportedCollection[] {
    return Array.from(this.collections.values());
  }
}

function assertReference(
  reference: string,
  code: 'INVALID_TOKEN_CONTRACT' | 'INVALID_COLLATERAL_TYPE',
  label: string
): void {
  if (reference.trim().length === 0) {
    throw new LendingError(code, `${label} reference must not be empty`);
  }
}

function assertRiskScore(riskScore: number): void {
  if (!Number.isInteger(riskScore) || riskScore < ASSET_RISK_SCORE.min || riskScore > ASSET_RISK_SCORE.max) {
    throw new LendingError(
      'INVALID_RISK_SCORE',
      `Risk score must be ${ASSET_RISK_SCORE.min}..${ASSET_RISK_SCORE.max}, got ${riskScore}`
    );
  }
}

function assertFloorPrice(floorPrice: bigint): void {
  if (floorPrice <= 0n) {
    throw new LendingError('INVALID_AMOUNT', `Floor price must be positive, got ${floorPrice}`);
  }
}
