/**
 * Lending Ledger - Platform Admin Service
 *
 * Owner-only operations over the asset whitelist and platform settings.
 * Runs under the ledger mutex so no settings change lands halfway through a
 * loan operation.
 */

import { LendingError } from '../../shared/errors';
import { Mutex } from '../../shared/mutex';
import {
  DynamicRateParams,
  PlatformParams,
  Principal,
  SupportedCollection,
  SupportedToken,
} from '../../shared/types';
import { AssetRegistry, CollectionUpdate } from '../assets/asset-registry';
import { PlatformSettings } from '../platform/platform-settings';

export class PlatformAdminService {
  constructor(
    private readonly owner: Principal,
    private readonly settings: PlatformSettings,
    private readonly assets: AssetRegistry,
    private readonly lock: Mutex
  ) {}

  // ============================================
  // ASSET WHITELIST
  // ============================================

  async addSupportedToken(caller: Principal, contract: string, decimals: number, riskScore: number): Promise<SupportedToken> {
    return this.asOwner(caller, 'addSupportedToken', () => {
      const token = this.assets.addToken(contract, decimals, riskScore);
      console.log(`[Admin] Token ${contract} enabled (decimals=${decimals}, risk=${riskScore})`);
      return token;
    });
  }

  async removeSupportedToken(caller: Principal, contract: string): Promise<SupportedToken> {
    return this.asOwner(caller, 'removeSupportedToken', () => {
      const token = this.assets.disableToken(contract);
      console.log(`[Admin] Token ${contract} disabled`);
      return token;
    });
  }

  async addSupportedCollection(
    caller: Principal,
    collection: string,
    floorPrice: bigint,
    riskScore: number
  ): Promise<SupportedCollection> {
    return this.asOwner(caller, 'addSupportedCollection', () => {
      const entry = this.assets.addCollection(collection, floorPrice, riskScore);
      console.log(`[Admin] Collection ${collection} enabled (floor=${floorPrice}, risk=${riskScore})`);
      return entry;
    });
  }

  async updateCollection(caller: Principal, collection: string, update: CollectionUpdate): Promise<SupportedCollection> {
    return this.asOwner(caller, 'updateCollection', () => {
      const entry = this.assets.updateCollection(collection, update);
      console.log(
        `[Admin] Collection ${collection} updated: floor=${entry.floorPrice} risk=${entry.riskScore} enabled=${entry.enabled}`
      );
      return entry;
    });
  }

  // ============================================
  // PLATFORM SETTINGS
  // ============================================

  async setPlatformFee(caller: Principal, feeBps: number): Promise<PlatformParams> {
    return this.asOwner(caller, 'setPlatformFee', () => {
      this.settings.setPlatformFee(feeBps);
      console.log(`[Admin] Platform fee set to ${feeBps} bps`);
      return this.settings.current;
    });
  }

  async setMinCollateralRatio(caller: Principal, ratioBps: number): Promise<PlatformParams> {
    return this.asOwner(caller, 'setMinCollateralRatio', () => {
      this.settings.setMinCollateralRatio(ratioBps);
      console.log(`[Admin] Minimum collateral ratio set to ${ratioBps} bps`);
      return this.settings.current;
    });
  }

  async setDynamicRateParams(caller: Principal, rates: DynamicRateParams): Promise<PlatformParams> {
    return this.asOwner(caller, 'setDynamicRateParams', () => {
      this.settings.setDynamicRateParams(rates);
      console.log(
        `[Admin] Rate params: base=${rates.baseRateBps} util=${rates.utilizationMultiplierBps} ` +
        `risk=${rates.riskMultiplierBps} range=[${rates.minDynamicRateBps}, ${rates.maxDynamicRateBps}]`
      );
      return this.settings.current;
    });
  }

  private async asOwner<T>(caller: Principal, operation: string, fn: () => T): Promise<T> {
    return this.lock.runExclusive(() => {
      if (caller !== this.owner) {
        console.warn(`[Admin] ${operation} refused for ${caller}`);
        throw new LendingError('UNAUTHORIZED', `${operation} is restricted to the platform owner`);
      }
      return fn();
    });
  }
}
