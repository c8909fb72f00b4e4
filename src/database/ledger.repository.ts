/**
 * Lending Ledger - Ledger Repository
 * PostgreSQL persistence for the ledger snapshot
 *
 * The ledger runs in memory; this repository loads its state at boot and
 * writes it back after each mutating request. A save is one transaction:
 * either every changed row lands or none of it does.
 *
 * Only rows that changed since the last committed save are written. Ledger
 * records are immutable, so an unchanged record is the very object that was
 * last persisted.
 */

import { Pool } from 'pg';
import { z } from 'zod';
import {
  AssetUtilization,
  CollateralAsset,
  Loan,
  loanAssetKey,
  parseLoanAssetKey,
  PlatformParams,
  Principal,
  RiskTier,
  SupportedCollection,
  SupportedToken,
  UserStats,
} from '../shared/types';
import { LedgerSnapshot } from '../core/ledger';

// ============================================================================
// SQL PORT
// ============================================================================

export interface SqlSession {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlDatabase extends SqlSession {
  /** Run `fn` inside BEGIN/COMMIT, rolling back if it throws */
  transaction<T>(fn: (session: SqlSession) => Promise<T>): Promise<T>;
}

export function pgDatabase(pool: Pool): SqlDatabase {
  return {
    query: (text, values) => pool.query(text, values),
    async transaction<T>(fn: (session: SqlSession) => Promise<T>): Promise<T> {
      const client = await pool.connect();

      try {
        await client.query('BEGIN');
        const result = await fn({ query: (text, values) => client.query(text, values) });
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    },
  };
}

// ============================================================================
// ROW SCHEMAS
// NUMERIC and BIGINT columns arrive as strings.
// ============================================================================

const height = z.coerce.number().int().nonnegative();
const amount = z.coerce.bigint();

const SettingsRowSchema = z.object({
  loan_counter: height,
  platform_fee_bps: z.number().int(),
  max_duration: height,
  min_collateral_ratio_bps: z.number().int(),
  base_rate_bps: z.number().int(),
  utilization_multiplier_bps: z.number().int(),
  risk_multiplier_bps: z.number().int(),
  max_dynamic_rate_bps: z.number().int(),
  min_dynamic_rate_bps: z.number().int(),
});

const LoanRowSchema = z.object({
  id: z.coerce.number().int().positive(),
  borrower: z.string(),
  lender: z.string().nullable(),
  principal: amount,
  loan_asset: z.string(),
  collateral_kind: z.enum(['NATIVE', 'TOKEN', 'COLLECTIBLE']),
  collateral_ref: z.string().nullable(),
  collateral_item_id: z.string().nullable(),
  collateral_amount: amount,
  interest_rate_bps: z.number().int(),
  duration: height,
  created_at: height,
  funded_at: height.nullable(),
  repaid_at: height.nullable(),
  liquidated_at: height.nullable(),
  total_repaid: amount.nullable(),
  status: z.enum(['PENDING', 'ACTIVE', 'REPAID', 'LIQUIDATED']),
  risk_tier: z.nativeEnum(RiskTier),
  dynamic_rate_bps: z.number().int(),
});

type LoanRow = z.infer<typeof LoanRowSchema>;

const UserStatsRowSchema = z.object({
  principal: z.string(),
  loans_created: z.number().int(),
  loans_funded: z.number().int(),
  total_borrowed: amount,
  total_lent: amount,
  reputation: z.number().int(),
  default_count: z.number().int(),
});

const UtilizationRowSchema = z.object({
  asset: z.string(),
  total_supplied: amount,
  total_borrowed: amount,
  active_loan_count: z.number().int(),
});

const TokenRowSchema = z.object({
  contract: z.string(),
  decimals: z.number().int(),
  risk_score: z.number().int(),
  enabled: z.boolean(),
});

const BalanceRowSchema = z.object({
  principal: z.string(),
  balance: amount,
});

const CollectionRowSchema = z.object({
  collection: z.string(),
  floor_price: amount,
  risk_score: z.number().int(),
  enabled: z.boolean(),
});

// ============================================================================
// REPOSITORY
// ============================================================================

export interface LedgerState {
  readonly snapshot: LedgerSnapshot;
  /** Native balances held by the custody adapter */
  readonly balances: Array<[Principal, bigint]>;
}

interface LedgerRows {
  readonly loans: readonly Loan[];
  readonly users: ReadonlyArray<[Principal, UserStats]>;
  readonly utilization: readonly AssetUtilization[];
  readonly tokens: readonly SupportedToken[];
  readonly collections: readonly SupportedCollection[];
  readonly balances: ReadonlyArray<[Principal, bigint]>;
}

export class LedgerRepository {
  // Rows as last committed
  private readonly persistedLoans = new Map<number, Loan>();
  private readonly persistedUsers = new Map<Principal, UserStats>();
  private readonly persistedUtilization = new Map<string, AssetUtilization>();
  private readonly persistedTokens = new Map<string, SupportedToken>();
  private readonly persistedCollections = new Map<string, SupportedCollection>();
  private readonly persistedBalances = new Map<Principal, bigint>();

  constructor(private readonly db: SqlDatabase) {}

  /**
   * Full ledger state, or null for a database that has never been saved to
   */
  async load(): Promise<LedgerState | null> {
    const settings = await this.db.query('SELECT * FROM platform_settings WHERE id = 1');
    if (settings.rows.length === 0) return null;
    const s = SettingsRowSchema.parse(settings.rows[0]);

    const [loans, users, utilization, tokens, collections, balances] = await Promise.all([
      this.db.query('SELECT * FROM loans ORDER BY id'),
      this.db.query('SELECT * FROM user_stats ORDER BY principal'),
      this.db.query('SELECT * FROM asset_utilization ORDER BY asset'),
      this.db.query('SELECT * FROM supported_tokens ORDER BY contract'),
      this.db.query('SELECT * FROM supported_collections ORDER BY collection'),
      this.db.query('SELECT * FROM custody_balances ORDER BY principal'),
    ]);

    const params: PlatformParams = {
      platformFeeBps: s.platform_fee_bps,
      maxDuration: s.max_duration,
      minCollateralRatioBps: s.min_collateral_ratio_bps,
      baseRateBps: s.base_rate_bps,
      utilizationMultiplierBps: s.utilization_multiplier_bps,
      riskMultiplierBps: s.risk_multiplier_bps,
      maxDynamicRateBps: s.max_dynamic_rate_bps,
      minDynamicRateBps: s.min_dynamic_rate_bps,
    };

    const snapshot: LedgerSnapshot = {
      loans: loans.rows.map((row) => rowToLoan(LoanRowSchema.parse(row))),
      loanCounter: s.loan_counter,
      users: users.rows.map((row) => rowToUserStats(UserStatsRowSchema.parse(row))),
      utilization: utilization.rows.map((row) => rowToUtilization(UtilizationRowSchema.parse(row))),
      tokens: tokens.rows.map((row) => {
        const t = TokenRowSchema.parse(row);
        const token: SupportedToken = { contract: t.contract, decimals: t.decimals, riskScore: t.risk_score, enabled: t.enabled };
        return token;
      }),
      collections: collections.rows.map((row) => {
        const c = CollectionRowSchema.parse(row);
        const entry: SupportedCollection = {
          collection: c.collection,
          floorPrice: c.floor_price,
          riskScore: c.risk_score,
          enabled: c.enabled,
        };
        return entry;
      }),
      params,
    };
    const state: LedgerState = {
      snapshot,
      balances: balances.rows.map((row): [Principal, bigint] => {
        const b = BalanceRowSchema.parse(row);
        return [b.principal, b.balance];
      }),
    };

    this.remember({
      loans: snapshot.loans,
      users: snapshot.users,
      utilization: snapshot.utilization,
      tokens: snapshot.tokens,
      collections: snapshot.collections,
      balances: state.balances,
    });
    return state;
  }

  /**
   * Upsert the settings row and every row changed since the last save, in
   * one transaction. Nothing is remembered when the transaction fails, so
   * the next save retries those rows.
   */
  async save(state: LedgerState): Promise<void> {
    const { snapshot } = state;
    const changed: LedgerRows = {
      loans: snapshot.loans.filter((loan) => this.persistedLoans.get(loan.id) !== loan),
      users: snapshot.users.filter(([principal, stats]) => this.persistedUsers.get(principal) !== stats),
      utilization: snapshot.utilization.filter(
        (entry) => this.persistedUtilization.get(loanAssetKey(entry.asset)) !== entry
      ),
      tokens: snapshot.tokens.filter((token) => this.persistedTokens.get(token.contract) !== token),
      collections: snapshot.collections.filter(
        (entry) => this.persistedCollections.get(entry.collection) !== entry
      ),
      balances: state.balances.filter(([principal, balance]) => this.persistedBalances.get(principal) !== balance),
    };

    await this.db.transaction(async (tx) => {
      const p = snapshot.params;
      await tx.query(
        `INSERT INTO platform_settings
         (id, loan_counter, platform_fee_bps, max_duration, min_collateral_ratio_bps, base_rate_bps,
          utilization_multiplier_bps, risk_multiplier_bps, max_dynamic_rate_bps, min_dynamic_rate_bps, updated_at)
         VALUES (1, $1, $2, $3, $4, $5, $6, $7, $8, $9, NOW())
         ON CONFLICT (id) DO UPDATE SET
           loan_counter = EXCLUDED.loan_counter,
           platform_fee_bps = EXCLUDED.platform_fee_bps,
           max_duration = EXCLUDED.max_duration,
           min_collateral_ratio_bps = EXCLUDED.min_collateral_ratio_bps,
           base_rate_bps = EXCLUDED.base_rate_bps,
           utilization_multiplier_bps = EXCLUDED.utilization_multiplier_bps,
           risk_multiplier_bps = EXCLUDED.risk_multiplier_bps,
           max_dynamic_rate_bps = EXCLUDED.max_dynamic_rate_bps,
           min_dynamic_rate_bps = EXCLUDED.min_dynamic_rate_bps,
           updated_at = NOW()`,
        [
          snapshot.loanCounter,
          p.platformFeeBps,
          p.maxDuration,
          p.minCollateralRatioBps,
          p.baseRateBps,
          p.utilizationMultiplierBps,
          p.riskMultiplierBps,
          p.maxDynamicRateBps,
          p.minDynamicRateBps,
        ]
      );

      for (const loan of changed.loans) {
        await tx.query(
          `INSERT INTO loans
           (id, borrower, lender, principal, loan_asset, collateral_kind, collateral_ref, collateral_item_id,
            collateral_amount, interest_rate_bps, duration, created_at, funded_at, repaid_at, liquidated_at,
            total_repaid, status, risk_tier, dynamic_rate_bps)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
           ON CONFLICT (id) DO UPDATE SET
             lender = EXCLUDED.lender,
             funded_at = EXCLUDED.funded_at,
             repaid_at = EXCLUDED.repaid_at,
             liquidated_at = EXCLUDED.liquidated_at,
             total_repaid = EXCLUDED.total_repaid,
             status = EXCLUDED.status`,
          loanToValues(loan)
        );
      }

      for (const [principal, stats] of changed.users) {
        await tx.query(
          `INSERT INTO user_stats
           (principal, loans_created, loans_funded, total_borrowed, total_lent, reputation, default_count)
           VALUES ($1, $2, $3, $4, $5, $6, $7)
           ON CONFLICT (principal) DO UPDATE SET
             loans_created = EXCLUDED.loans_created,
             loans_funded = EXCLUDED.loans_funded,
             total_borrowed = EXCLUDED.total_borrowed,
             total_lent = EXCLUDED.total_lent,
             reputation = EXCLUDED.reputation,
             default_count = EXCLUDED.default_count`,
          [
            principal,
            stats.loansCreated,
            stats.loansFunded,
            stats.totalBorrowed.toString(),
            stats.totalLent.toString(),
            stats.reputation,
            stats.defaultCount,
          ]
        );
      }

      for (const entry of changed.utilization) {
        await tx.query(
          `INSERT INTO asset_utilization (asset, total_supplied, total_borrowed, active_loan_count)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (asset) DO UPDATE SET
             total_supplied = EXCLUDED.total_supplied,
             total_borrowed = EXCLUDED.total_borrowed,
             active_loan_count = EXCLUDED.active_loan_count`,
          [loanAssetKey(entry.asset), entry.totalSupplied.toString(), entry.totalBorrowed.toString(), entry.activeLoanCount]
        );
      }

      for (const token of changed.tokens) {
        await tx.query(
          `INSERT INTO supported_tokens (contract, decimals, risk_score, enabled)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (contract) DO UPDATE SET
             decimals = EXCLUDED.decimals,
             risk_score = EXCLUDED.risk_score,
             enabled = EXCLUDED.enabled`,
          [token.contract, token.decimals, token.riskScore, token.enabled]
        );
      }

      for (const entry of changed.collections) {
        await tx.query(
          `INSERT INTO supported_collections (collection, floor_price, risk_score, enabled)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (collection) DO UPDATE SET
             floor_price = EXCLUDED.floor_price,
             risk_score = EXCLUDED.risk_score,
             enabled = EXCLUDED.enabled`,
          [entry.collection, entry.floorPrice.toString(), entry.riskScore, entry.enabled]
        );
      }

      for (const [principal, balance] of changed.balances) {
        await tx.query(
          `INSERT INTO custody_balances (principal, balance)
           VALUES ($1, $2)
           ON CONFLICT (principal) DO UPDATE SET balance = EXCLUDED.balance`,
          [principal, balance.toString()]
        );
      }
    });

    this.remember(changed);
  }

  private remember(rows: LedgerRows): void {
    for (const loan of rows.loans) this.persistedLoans.set(loan.id, loan);
    for (const [principal, stats] of rows.users) this.persistedUsers.set(principal, stats);
    for (const entry of rows.utilization) this.persistedUtilization.set(loanAssetKey(entry.asset), entry);
    for (const token of rows.tokens) this.persistedTokens.set(token.contract, token);
    for (const entry of rows.collections) this.persistedCollections.set(entry.collection, entry);
    for (const [principal, balance] of rows.balances) this.persistedBalances.set(principal, balance);
  }
}

// ============================================================================
// MAPPING
// ============================================================================

function loanToValues(loan: Loan): unknown[] {
  const collateral = loan.collateral.asset;
  let collateralRef: string | null = null;
  let collateralItemId: string | null = null;
  switch (collateral.kind) {
    case 'NATIVE':
      break;
    case 'TOKEN':
      collateralRef = collateral.contract;
      break;
    case 'COLLECTIBLE':
      collateralRef = collateral.collection;
      collateralItemId = collateral.itemId;
      break;
  }

  return [
    loan.id,
    loan.borrower,
    loan.lender,
    loan.principal.toString(),
    loanAssetKey(loan.loanAsset),
    collateral.kind,
    collateralRef,
    collateralItemId,
    loan.collateral.amount.toString(),
    loan.interestRateBps,
    loan.duration,
    loan.createdAt,
    loan.fundedAt,
    loan.status === 'REPAID' ? loan.repaidAt : null,
    loan.status === 'LIQUIDATED' ? loan.liquidatedAt : null,
    loan.status === 'REPAID' ? loan.totalRepaid.toString() : null,
    loan.status,
    loan.riskTier,
    loan.dynamicRateBps,
  ];
}

function rowToCollateral(row: LoanRow): CollateralAsset {
  switch (row.collateral_kind) {
    case 'NATIVE':
      return { kind: 'NATIVE' };
    case 'TOKEN':
      if (row.collateral_ref === null) throw corrupt(row, 'token collateral without contract');
      return { kind: 'TOKEN', contract: row.collateral_ref };
    case 'COLLECTIBLE':
      if (row.collateral_ref === null || row.collateral_item_id === null) {
        throw corrupt(row, 'collectible collateral without collection or item');
      }
      return { kind: 'COLLECTIBLE', collection: row.collateral_ref, itemId: row.collateral_item_id };
  }
}

function rowToLoan(row: LoanRow): Loan {
  const loanAsset = parseLoanAssetKey(row.loan_asset);
  if (!loanAsset) throw corrupt(row, `unknown loan asset ${row.loan_asset}`);

  const terms = {
    id: row.id,
    borrower: row.borrower,
    principal: row.principal,
    loanAsset,
    collateral: { asset: rowToCollateral(row), amount: row.collateral_amount },
    interestRateBps: row.interest_rate_bps,
    duration: row.duration,
    createdAt: row.created_at,
    riskTier: row.risk_tier,
    dynamicRateBps: row.dynamic_rate_bps,
  };

  if (row.status === 'PENDING') {
    return { ...terms, status: 'PENDING', lender: null, fundedAt: null };
  }

  const { lender, funded_at: fundedAt } = row;
  if (lender === null || fundedAt === null) throw corrupt(row, `${row.status} loan without lender`);

  switch (row.status) {
    case 'ACTIVE':
      return { ...terms, status: 'ACTIVE', lender, fundedAt };
    case 'REPAID':
      if (row.repaid_at === null || row.total_repaid === null) throw corrupt(row, 'repaid loan without repayment');
      return { ...terms, status: 'REPAID', lender, fundedAt, repaidAt: row.repaid_at, totalRepaid: row.total_repaid };
    case 'LIQUIDATED':
      if (row.liquidated_at === null) throw corrupt(row, 'liquidated loan without liquidation height');
      return { ...terms, status: 'LIQUIDATED', lender, fundedAt, liquidatedAt: row.liquidated_at };
  }
}

function rowToUserStats(row: z.infer<typeof UserStatsRowSchema>): [Principal, UserStats] {
  return [
    row.principal,
    {
      loansCreated: row.loans_created,
      loansFunded: row.loans_funded,
      totalBorrowed: row.total_borrowed,
      totalLent: row.total_lent,
      reputation: row.reputation,
      defaultCount: row.default_count,
    },
  ];
}

function rowToUtilization(row: z.infer<typeof UtilizationRowSchema>): AssetUtilization {
  const asset = parseLoanAssetKey(row.asset);
  if (!asset) {
    throw new Error(`[LedgerRepository] Corrupt utilization row: unknown asset ${row.asset}`);
  }
  return {
    asset,
    totalSupplied: row.total_supplied,
    totalBorrowed: row.total_borrowed,
    activeLoanCount: row.active_loan_count,
  };
}

function corrupt(row: LoanRow, reason: string): Error {
  return new Error(`[LedgerRepository] Corrupt loan row #${row.id}: ${reason}`);
}
