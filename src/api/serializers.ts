/**
 * Lending Ledger - Response Serializers
 * bigint -> decimal string, everything else as is
 */

import {
  AssetUtilization,
  CollateralAsset,
  Loan,
  LoanAsset,
  loanAssetKey,
  PlatformStats,
  RepaymentQuote,
  RiskTier,
  SupportedCollection,
  SupportedToken,
  UserStats,
} from '../shared/types';
import { DynamicRateQuote } from '../modules/loans';

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

function assetJson(asset: LoanAsset | CollateralAsset): Json {
  switch (asset.kind) {
    case 'NATIVE':
      return { kind: 'NATIVE' };
    case 'TOKEN':
      return { kind: 'TOKEN', contract: asset.contract };
    case 'COLLECTIBLE':
      return { kind: 'COLLECTIBLE', collection: asset.collection, itemId: asset.itemId };
  }
}

export function loanJson(loan: Loan): Json {
  return {
    id: loan.id,
    status: loan.status,
    borrower: loan.borrower,
    lender: loan.lender,
    principal: loan.principal.toString(),
    loanAsset: assetJson(loan.loanAsset),
    collateral: {
      asset: assetJson(loan.collateral.asset),
      amount: loan.collateral.amount.toString(),
    },
    interestRateBps: loan.interestRateBps,
    duration: loan.duration,
    createdAt: loan.createdAt,
    fundedAt: loan.fundedAt,
    repaidAt: loan.status === 'REPAID' ? loan.repaidAt : null,
    liquidatedAt: loan.status === 'LIQUIDATED' ? loan.liquidatedAt : null,
    totalRepaid: loan.status === 'REPAID' ? loan.totalRepaid.toString() : null,
    riskTier: RiskTier[loan.riskTier],
    dynamicRateBps: loan.dynamicRateBps,
  };
}

export function quoteJson(quote: RepaymentQuote): Json {
  return {
    loanId: quote.loanId,
    elapsed: quote.elapsed,
    principal: quote.principal.toString(),
    interest: quote.interest.toString(),
    platformFee: quote.platformFee.toString(),
    lenderPayout: quote.lenderPayout.toString(),
    total: quote.total.toString(),
  };
}

export function userStatsJson(principal: string, stats: UserStats): Json {
  return {
    principal,
    loansCreated: stats.loansCreated,
    loansFunded: stats.loansFunded,
    totalBorrowed: stats.totalBorrowed.toString(),
    totalLent: stats.totalLent.toString(),
    reputation: stats.reputation,
    defaultCount: stats.defaultCount,
  };
}

export function utilizationJson(entry: AssetUtilization, utilizationBps: number): Json {
  return {
    asset: loanAssetKey(entry.asset),
    totalSupplied: entry.totalSupplied.toString(),
    totalBorrowed: entry.totalBorrowed.toString(),
    activeLoanCount: entry.activeLoanCount,
    utilizationBps,
  };
}

export function rateJson(quote: DynamicRateQuote): Json {
  return {
    rateBps: quote.rateBps,
    riskTier: RiskTier[quote.riskTier],
    breakdown: {
      baseRateBps: quote.baseRateBps,
      utilizationBps: quote.utilizationBps,
      utilizationAdjBps: quote.utilizationAdjBps,
      riskAdjBps: quote.riskAdjBps,
      collateralAdjBps: quote.collateralAdjBps,
      rawRateBps: quote.rawRateBps,
    },
  };
}

export function platformStatsJson(stats: PlatformStats): Json {
  return {
    totalLoans: stats.totalLoans,
    loansByStatus: { ...stats.loansByStatus },
    params: { ...stats.params },
    owner: stats.owner,
    height: stats.height,
  };
}

export function tokenJson(token: SupportedToken): Json {
  return { ...token };
}

export function collectionJson(entry: SupportedCollection): Json {
  return {
    collection: entry.collection,
    floorPrice: entry.floorPrice.toString(),
    riskScore: entry.riskScore,
    enabled: entry.enabled,
  };
}
