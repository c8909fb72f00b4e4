/**
 * Lending Ledger - Composition
 *
 * Wires the stores, engines and adapters into one ledger instance, and
 * captures/restores the full state as a LedgerSnapshot for persistence.
 * Restored platform params take precedence over configured defaults: admin
 * changes survive restarts.
 */

import { Mutex } from '../../shared/mutex';
import {
  AssetUtilization,
  Loan,
  PlatformParams,
  Principal,
  SupportedCollection,
  SupportedToken,
  UserStats,
} from '../../shared/types';
import { Clock } from '../clock/clock';
import { DeferredExternalAssetHook, ExternalAssetHook, Settlement, ValueTransferService } from '../custody';
import { AssetRegistry } from '../../modules/assets/asset-registry';
import { UtilizationTracker } from '../../modules/utilization/utilization.tracker';
import { UserStatsStore } from '../../modules/users/user-stats.store';
import { RiskScorer } from '../../modules/risk/risk-scorer';
import { InterestRateEngine } from '../../modules/rates/interest-rate.engine';
import { DEFAULT_PLATFORM_PARAMS, PlatformSettings } from '../../modules/platform/platform-settings';
import { LoanBook, LoanRegistry, PlatformAccounts } from '../../modules/loans';
import { PlatformAdminService } from '../../modules/admin/admin.service';

export interface LedgerSnapshot {
  readonly loans: Loan[];
  readonly loanCounter: number;
  readonly users: Array<[Principal, UserStats]>;
  readonly utilization: AssetUtilization[];
  readonly tokens: SupportedToken[];
  readonly collections: SupportedCollection[];
  readonly params: PlatformParams;
}

export interface LedgerOptions {
  readonly accounts: PlatformAccounts;
  readonly clock: Clock;
  readonly transfers: ValueTransferService;
  readonly externalAssets?: ExternalAssetHook;
  readonly params?: PlatformParams;
  readonly snapshot?: LedgerSnapshot | null;
}

export class LendingLedger {
  readonly registry: LoanRegistry;
  readonly admin: PlatformAdminService;

  private readonly book: LoanBook;
  private readonly assets: AssetRegistry;
  private readonly utilization: UtilizationTracker;
  private readonly users: UserStatsStore;
  private readonly settings: PlatformSettings;

  constructor(options: LedgerOptions) {
    const snapshot = options.snapshot ?? null;
    const lock = new Mutex();

    this.book = new LoanBook(snapshot?.loans ?? [], snapshot?.loanCounter ?? 0);
    this.assets = new AssetRegistry(snapshot?.tokens ?? [], snapshot?.collections ?? []);
    this.utilization = new UtilizationTracker(snapshot?.utilization ?? []);
    this.users = new UserStatsStore(snapshot?.users ?? []);
    this.settings = new PlatformSettings(snapshot?.params ?? options.params ?? DEFAULT_PLATFORM_PARAMS);

    this.registry = new LoanRegistry({
      book: this.book,
      assets: this.assets,
      utilization: this.utilization,
      users: this.users,
      risk: new RiskScorer(this.users),
      rates: new InterestRateEngine(this.utilization, this.settings),
      settings: this.settings,
      settlement: new Settlement(options.transfers, options.externalAssets ?? new DeferredExternalAssetHook()),
      clock: options.clock,
      lock,
      accounts: options.accounts,
    });
    this.admin = new PlatformAdminService(options.accounts.owner, this.settings, this.assets, lock);
  }

  listTokens(): SupportedToken[] {
    return this.assets.listTokens();
  }

  listCollections(): SupportedCollection[] {
    return this.assets.listCollections();
  }

  snapshot(): LedgerSnapshot {
    return {
      loans: this.book.list(),
      loanCounter: this.book.counter,
      users: this.users.entries(),
      utilization: this.utilization.list(),
      tokens: this.assets.listTokens(),
      collections: this.assets.listCollections(),
      params: this.settings.current,
    };
  }
}
