/**
 * Lending Ledger - Loan Registry
 * The lifecycle state machine.
 *
 * EVERY OPERATION, IN THIS ORDER:
 * 1. VALIDATE: read stores, check every precondition. Nothing written yet.
 * 2. SETTLE: move value through the Settlement (all legs or none).
 * 3. COMMIT: write loan, utilization and user stats synchronously.
 *
 * A failure in 1 or 2 leaves the ledger exactly as it was. Mutating
 * operations run under the ledger mutex, so no two interleave.
 */

import { LendingError } from '../../shared/errors';
import { Mutex } from '../../shared/mutex';
import {
  ActiveLoan,
  AssetUtilization,
  CollateralPosition,
  CollateralSpec,
  CreateLoanRequest,
  describeCollateral,
  dueAt,
  LiquidatedLoan,
  Loan,
  LoanAsset,
  LoanFilter,
  LoanStatus,
  NATIVE_ASSET,
  PendingLoan,
  PlatformParams,
  PlatformStats,
  Principal,
  RepaidLoan,
  RepaymentQuote,
  RiskTier,
  UserStats,
} from '../../shared/types';
import { Clock } from '../../core/clock/clock';
import { Settlement } from '../../core/custody/settlement';
import { AssetRegistry } from '../assets/asset-registry';
import { UtilizationTracker } from '../utilization/utilization.tracker';
import { UserStatsStore } from '../users/user-stats.store';
import { RiskScorer } from '../risk/risk-scorer';
import {
  collateralRatioBps,
  INTEREST_RATE_CEILING_BPS,
  INTEREST_RATE_FLOOR_BPS,
  InterestRateEngine,
  platformFee,
  proportionalInterest,
  RateBreakdown,
} from '../rates/interest-rate.engine';
import { PlatformSettings } from '../platform/platform-settings';
import { LoanBook } from './loan-book';

// ============================================================================
// TYPES
// ============================================================================

export interface PlatformAccounts {
  /** Receives platform fees; the only principal allowed to administer */
  readonly owner: Principal;
  /** Holds native collateral while loans are open */
  readonly custody: Principal;
}

export interface LoanRegistryDeps {
  readonly book: LoanBook;
  readonly assets: AssetRegistry;
  readonly utilization: UtilizationTracker;
  readonly users: UserStatsStore;
  readonly risk: RiskScorer;
  readonly rates: InterestRateEngine;
  readonly settings: PlatformSettings;
  readonly settlement: Settlement;
  readonly clock: Clock;
  readonly lock: Mutex;
  readonly accounts: PlatformAccounts;
}

/** Terms shared by the single-purpose create entry points */
export interface LoanTermsInput {
  readonly principal: bigint;
  readonly duration: number;
  readonly interestRateBps?: number;
  readonly maxAcceptableRateBps?: number;
}

export interface DynamicRateQuote extends RateBreakdown {
  readonly riskTier: RiskTier;
}

// ============================================================================
// LOAN REGISTRY
// ============================================================================

export class LoanRegistry {
  constructor(private readonly deps: LoanRegistryDeps) {}

  // ==========================================================================
  // CREATE
  // ==========================================================================

  /**
   * Open a loan request. Returns the new loan id.
   */
  async createLoan(caller: Principal, request: CreateLoanRequest): Promise<number> {
    return this.deps.lock.runExclusive(async () => {
      const { book, utilization, users, risk, rates, settlement, accounts } = this.deps;
      const params = this.deps.settings.current;
      const now = this.deps.clock.now();

      // 1. VALIDATE
      this.assertNotCustody(caller, 'borrow');
      if (request.principal <= 0n) {
        throw new LendingError('INVALID_AMOUNT', `Principal must be positive, got ${request.principal}`);
      }
      assertDuration(request.duration, params);
      this.assertLendableAsset(request.loanAsset);
      const collateral = this.resolveCollateral(request.collateral);
      if (collateral.amount <= 0n) {
        throw new LendingError('INVALID_AMOUNT', `Collateral must be positive, got ${collateral.amount}`);
      }

      const ratioBps = collateralRatioBps(collateral.amount, request.principal);
      if (ratioBps < BigInt(params.minCollateralRatioBps)) {
        throw new LendingError(
          'INSUFFICIENT_COLLATERAL',
          `Collateral ratio ${ratioBps} bps is below the minimum ${params.minCollateralRatioBps} bps`
        );
      }

      const riskTier = risk.score(caller, collateral.asset);
      const dynamicRateBps = rates.currentRate(request.loanAsset, riskTier, Number(ratioBps));
      const interestRateBps = selectRate(request, dynamicRateBps, params);

      const id = book.nextId;
      const reference = `loan-${id}`;

      // 2. SETTLE
      await settlement.execute(
        `${reference}:create`,
        settlement.moveCollateral(collateral, caller, accounts.custody, reference, `Collateral for loan #${id}`)
      );

      // 3. COMMIT
      const loan: PendingLoan = {
        id,
        borrower: caller,
        lender: null,
        principal: request.principal,
        loanAsset: request.loanAsset,
        collateral,
        interestRateBps,
        duration: request.duration,
        createdAt: now,
        fundedAt: null,
        status: 'PENDING',
        riskTier,
        dynamicRateBps,
      };
      book.insert(loan);
      utilization.update(request.loanAsset, { borrowed: request.principal, loanCount: 1 }, true);
      users.recordLoanCreated(caller);

      console.log(
        `[LoanRegistry] Loan #${id} created by ${caller}: principal=${request.principal} ` +
        `collateral=${collateral.amount} (${describeCollateral(collateral.asset)}) rate=${interestRateBps}bps ` +
        `tier=${RiskTier[riskTier]} duration=${request.duration}`
      );
      return id;
    });
  }

  /** Native collateral, native principal */
  async createNativeLoan(caller: Principal, collateralAmount: bigint, terms: LoanTermsInput): Promise<number> {
    return this.createLoan(caller, {
      ...terms,
      loanAsset: NATIVE_ASSET,
      collateral: { kind: 'NATIVE', amount: collateralAmount },
    });
  }

  /** Token collateral, native principal */
  async createLoanWithTokenCollateral(
    caller: Principal,
    contract: string,
    collateralAmount: bigint,
    terms: LoanTermsInput
  ): Promise<number> {
    return this.createLoan(caller, {
      ...terms,
      loanAsset: NATIVE_ASSET,
      collateral: { kind: 'TOKEN', contract, amount: collateralAmount },
    });
  }

  /** Collectible collateral valued at its collection floor, native principal */
  async createLoanWithNftCollateral(
    caller: Principal,
    collection: string,
    itemId: string,
    terms: LoanTermsInput
  ): Promise<number> {
    return this.createLoan(caller, {
      ...terms,
      loanAsset: NATIVE_ASSET,
      collateral: { kind: 'COLLECTIBLE', collection, itemId },
    });
  }

  /** Token principal, native collateral */
  async createTokenLoan(
    caller: Principal,
    contract: string,
    collateralAmount: bigint,
    terms: LoanTermsInput
  ): Promise<number> {
    return this.createLoan(caller, {
      ...terms,
      loanAsset: { kind: 'TOKEN', contract },
      collateral: { kind: 'NATIVE', amount: collateralAmount },
    });
  }

  // ==========================================================================
  // FUND
  // ==========================================================================

  /**
   * Fund a native-currency loan. The caller becomes the lender.
   */
  async fundLoan(caller: Principal, loanId: number): Promise<ActiveLoan> {
    return this.fund(caller, loanId, NATIVE_ASSET);
  }

  /**
   * Fund a token loan. `contract` must be the loan's token.
   */
  async fundTokenLoan(caller: Principal, loanId: number, contract: string): Promise<ActiveLoan> {
    return this.fund(caller, loanId, { kind: 'TOKEN', contract });
  }

  private async fund(caller: Principal, loanId: number, entryPoint: LoanAsset): Promise<ActiveLoan> {
    return this.deps.lock.runExclusive(async () => {
      const { book, utilization, users, settlement } = this.deps;
      const now = this.deps.clock.now();

      // 1. VALIDATE
      const loan = this.requireLoan(loanId);
      if (loan.status !== 'PENDING') {
        throw new LendingError('ALREADY_FUNDED', `Loan #${loanId} is already funded (${loan.status})`);
      }
      if (caller === loan.borrower) {
        throw new LendingError('UNAUTHORIZED', `Borrower cannot fund their own loan #${loanId}`);
      }
      this.assertNotCustody(caller, 'lend');
      assertEntryPoint(loan, entryPoint);

      // 2. SETTLE
      const reference = `loan-${loanId}`;
      await settlement.execute(
        `${reference}:fund`,
        settlement.moveLoanAsset(loan.loanAsset, loan.principal, caller, loan.borrower, reference, `Principal for loan #${loanId}`)
      );

      // 3. COMMIT
      const active: ActiveLoan = {
        ...loan,
        status: 'ACTIVE',
        lender: caller,
        fundedAt: now,
      };
      book.replace(active);
      utilization.update(loan.loanAsset, { supplied: loan.principal }, true);
      users.recordLoanFunded(caller, loan.loanAsset.kind === 'NATIVE' ? loan.principal : 0n);

      console.log(`[LoanRegistry] Loan #${loanId} funded by ${caller} at height ${now}, due ${dueAt(active)}`);
      return active;
    });
  }

  // ==========================================================================
  // REPAY
  // ==========================================================================

  /**
   * Repay principal plus accrued interest. Returns the total repaid.
   */
  async repayLoan(caller: Principal, loanId: number): Promise<bigint> {
    return this.deps.lock.runExclusive(async () => {
      const { book, utilization, users, settlement, accounts } = this.deps;
      const now = this.deps.clock.now();

      // 1. VALIDATE
      const loan = this.requireLoan(loanId);
      if (caller !== loan.borrower) {
        throw new LendingError('UNAUTHORIZED', `Only the borrower can repay loan #${loanId}`);
      }
      const active = requireActive(loan);
      const quote = quoteRepayment(active, now, this.deps.settings.current.platformFeeBps);

      // 2. SETTLE
      const reference = `loan-${loanId}`;
      await settlement.execute(`${reference}:repay`, [
        ...settlement.moveLoanAsset(active.loanAsset, quote.lenderPayout, caller, active.lender, reference, `Repayment of loan #${loanId}`),
        ...settlement.moveLoanAsset(active.loanAsset, quote.platformFee, caller, accounts.owner, reference, `Platform fee on loan #${loanId}`),
        ...settlement.moveCollateral(active.collateral, accounts.custody, caller, reference, `Collateral release for loan #${loanId}`),
      ]);

      // 3. COMMIT
      const repaid: RepaidLoan = {
        ...active,
        status: 'REPAID',
        repaidAt: now,
        totalRepaid: quote.total,
      };
      book.replace(repaid);
      utilization.update(active.loanAsset, { borrowed: active.principal, loanCount: 1 }, false);
      users.recordRepayment(caller, active.principal);

      console.log(
        `[LoanRegistry] Loan #${loanId} repaid: principal=${quote.principal} interest=${quote.interest} ` +
        `fee=${quote.platformFee} elapsed=${quote.elapsed}`
      );
      return quote.total;
    });
  }

  // ==========================================================================
  // LIQUIDATE
  // ==========================================================================

  /**
   * Seize the collateral of an overdue loan for its lender
   */
  async liquidateLoan(caller: Principal, loanId: number): Promise<LiquidatedLoan> {
    return this.deps.lock.runExclusive(async () => {
      const { book, utilization, users, settlement, accounts } = this.deps;
      const now = this.deps.clock.now();

      // 1. VALIDATE
      const active = requireActive(this.requireLoan(loanId));
      if (caller !== active.lender) {
        throw new LendingError('UNAUTHORIZED', `Only the lender can liquidate loan #${loanId}`);
      }
      if (now < dueAt(active)) {
        throw new LendingError(
          'LOAN_NOT_OVERDUE',
          `Loan #${loanId} is not overdue: due at ${dueAt(active)}, now ${now}`
        );
      }

      // 2. SETTLE
      const reference = `loan-${loanId}`;
      await settlement.execute(
        `${reference}:liquidate`,
        settlement.moveCollateral(active.collateral, accounts.custody, caller, reference, `Collateral seized for loan #${loanId}`)
      );

      // 3. COMMIT
      const liquidated: LiquidatedLoan = {
        ...active,
        status: 'LIQUIDATED',
        liquidatedAt: now,
      };
      book.replace(liquidated);
      utilization.update(active.loanAsset, { borrowed: active.principal, loanCount: 1 }, false);
      users.recordDefault(active.borrower);

      console.warn(`[LoanRegistry] Loan #${loanId} LIQUIDATED by ${caller}; default recorded for ${active.borrower}`);
      return liquidated;
    });
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  getLoan(loanId: number): Loan {
    return this.requireLoan(loanId);
  }

  listLoans(filter: LoanFilter = {}): Loan[] {
    return this.deps.book.list(filter);
  }

  getUserStats(user: Principal): UserStats {
    return this.deps.users.get(user);
  }

  getAssetUtilization(asset: LoanAsset): AssetUtilization {
    return this.deps.utilization.get(asset);
  }

  /** borrowed x 10000 / supplied */
  getUtilizationRate(asset: LoanAsset): number {
    return this.deps.utilization.utilizationRate(asset);
  }

  /**
   * Never throws: false for unknown ids, unfunded and closed loans
   */
  isLoanOverdue(loanId: number): boolean {
    const loan = this.deps.book.get(loanId);
    if (!loan || loan.status !== 'ACTIVE') return false;
    return this.deps.clock.now() >= dueAt(loan);
  }

  /**
   * What repaying now would settle
   */
  getRepaymentQuote(loanId: number): RepaymentQuote {
    const active = requireActive(this.requireLoan(loanId));
    return quoteRepayment(active, this.deps.clock.now(), this.deps.settings.current.platformFeeBps);
  }

  /**
   * Rate `user` would be quoted today for a loan of `asset` at the given
   * collateral ratio
   */
  getDynamicRate(user: Principal, asset: LoanAsset, collateralRatio: number): DynamicRateQuote {
    const riskTier = this.deps.risk.score(user);
    const breakdown = this.deps.rates.explainRate(
      this.deps.settings.current.baseRateBps,
      asset,
      riskTier,
      collateralRatio
    );
    return { ...breakdown, riskTier };
  }

  getPlatformStats(): PlatformStats {
    const loansByStatus: Record<LoanStatus, number> = { PENDING: 0, ACTIVE: 0, REPAID: 0, LIQUIDATED: 0 };
    for (const loan of this.deps.book.list()) {
      loansByStatus[loan.status] += 1;
    }

    return {
      totalLoans: this.deps.book.counter,
      loansByStatus,
      params: this.deps.settings.current,
      owner: this.deps.accounts.owner,
      height: this.deps.clock.now(),
    };
  }

  // ==========================================================================
  // PRIVATE HELPERS
  // ==========================================================================

  private requireLoan(loanId: number): Loan {
    if (!Number.isInteger(loanId) || loanId < 1 || loanId > this.deps.book.counter) {
      throw new LendingError('NOT_FOUND', `Loan #${loanId} not found`);
    }
    const loan = this.deps.book.get(loanId);
    if (!loan) {
      throw new LendingError('NOT_FOUND', `Loan #${loanId} not found`);
    }
    return loan;
  }

  /**
   * The custody account holds pooled collateral; as a party its transfers
   * would be no-ops or paid out of other borrowers' collateral
   */
  private assertNotCustody(caller: Principal, action: 'borrow' | 'lend'): void {
    if (caller === this.deps.accounts.custody) {
      throw new LendingError('UNAUTHORIZED', `The custody account cannot ${action}`);
    }
  }

  private assertLendableAsset(asset: LoanAsset): void {
    switch (asset.kind) {
      case 'NATIVE':
        return;
      case 'TOKEN':
        this.deps.assets.requireEnabledToken(asset.contract);
        return;
      default: {
        const unknown: never = asset;
        throw new LendingError('UNSUPPORTED_ASSET', `Unsupported loan asset: ${JSON.stringify(unknown)}`);
      }
    }
  }

  /**
   * Validate the offered collateral against the registries and book it at
   * its amount (fungible) or its collection floor price (collectible)
   */
  private resolveCollateral(spec: CollateralSpec): CollateralPosition {
    switch (spec.kind) {
      case 'NATIVE':
        return { asset: { kind: 'NATIVE' }, amount: spec.amount };
      case 'TOKEN':
        this.deps.assets.requireEnabledToken(spec.contract);
        return { asset: { kind: 'TOKEN', contract: spec.contract }, amount: spec.amount };
      case 'COLLECTIBLE': {
        const collection = this.deps.assets.requireEnabledCollection(spec.collection);
        return {
          asset: { kind: 'COLLECTIBLE', collection: spec.collection, itemId: spec.itemId },
          amount: collection.floorPrice,
        };
      }
      default: {
        const unknown: never = spec;
        throw new LendingError('INVALID_COLLATERAL_TYPE', `Unsupported collateral: ${JSON.stringify(unknown)}`);
      }
    }
  }
}

// ============================================================================
// PURE HELPERS
// ============================================================================

function assertDuration(duration: number, params: PlatformParams): void {
  if (!Number.isInteger(duration) || duration <= 0 || duration > params.maxDuration) {
    throw new LendingError(
      'INVALID_DURATION',
      `Duration must be 1..${params.maxDuration} blocks, got ${duration}`
    );
  }
}

/**
 * An explicit rate wins (bounds-checked); otherwise the dynamic rate,
 * provided the borrower accepts it. Either way the applied rate must accrue
 * interest: the band is the dynamic bounds narrowed to [100, 10000].
 */
function selectRate(request: CreateLoanRequest, dynamicRateBps: number, params: PlatformParams): number {
  const explicit = request.interestRateBps ?? 0;
  const floor = Math.max(params.minDynamicRateBps, INTEREST_RATE_FLOOR_BPS);
  const ceiling = Math.min(params.maxDynamicRateBps, INTEREST_RATE_CEILING_BPS);

  if (explicit > 0) {
    if (!Number.isInteger(explicit) || explicit < floor || explicit > ceiling) {
      throw new LendingError('INVALID_INTEREST', `Interest rate must be ${floor}..${ceiling} bps, got ${explicit}`);
    }
    return explicit;
  }

  if (request.maxAcceptableRateBps !== undefined && dynamicRateBps > request.maxAcceptableRateBps) {
    throw new LendingError(
      'RATE_REJECTED',
      `Dynamic rate ${dynamicRateBps} bps exceeds the accepted maximum ${request.maxAcceptableRateBps} bps`
    );
  }
  if (dynamicRateBps < floor || dynamicRateBps > ceiling) {
    throw new LendingError(
      'INVALID_INTEREST',
      `Dynamic rate ${dynamicRateBps} bps is outside the accruing band ${floor}..${ceiling} bps`
    );
  }
  return dynamicRateBps;
}

function requireActive(loan: Loan): ActiveLoan {
  switch (loan.status) {
    case 'ACTIVE':
      return loan;
    case 'PENDING':
      throw new LendingError('LOAN_NOT_FUNDED', `Loan #${loan.id} has not been funded`);
    case 'REPAID':
    case 'LIQUIDATED':
      throw new LendingError('LOAN_NOT_ACTIVE', `Loan #${loan.id} is ${loan.status}`);
  }
}

/**
 * Funding entry points are per asset kind so each one's transfer semantics
 * stay explicit
 */
function assertEntryPoint(loan: PendingLoan, entryPoint: LoanAsset): void {
  const asset = loan.loanAsset;
  switch (asset.kind) {
    case 'NATIVE':
      if (entryPoint.kind !== 'NATIVE') {
        throw new LendingError('UNSUPPORTED_ASSET', `Loan #${loan.id} is a native loan; fund it with fundLoan`);
      }
      return;
    case 'TOKEN':
      if (entryPoint.kind !== 'TOKEN') {
        throw new LendingError('UNSUPPORTED_ASSET', `Loan #${loan.id} is a token loan; fund it with fundTokenLoan`);
      }
      if (entryPoint.contract !== asset.contract) {
        throw new LendingError(
          'INVALID_TOKEN_CONTRACT',
          `Loan #${loan.id} lends ${asset.contract}, not ${entryPoint.contract}`
        );
      }
      return;
  }
}

export function quoteRepayment(loan: ActiveLoan, now: number, platformFeeBps: number): RepaymentQuote {
  const elapsed = now - loan.fundedAt;
  const interest = proportionalInterest(loan.principal, loan.interestRateBps, elapsed, loan.duration);
  const total = loan.principal + interest;
  const fee = platformFee(total, platformFeeBps);

  return {
    loanId: loan.id,
    elapsed,
    principal: loan.principal,
    interest,
    platformFee: fee,
    lenderPayout: total - fee,
    total,
  };
}
