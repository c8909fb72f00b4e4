/**
 * @file modules/rates/interest-rate.engine.ts
 * @description Dynamic interest rates and proportional interest
 *
 * RATE (basis points):
 *   utilizationAdj = utilization x utilizationMultiplier / 10000
 *   riskAdj        = riskTier x riskMultiplier
 *   collateralAdj  = -50 when collateral ratio >= 200%
 *   rate           = clamp(base + utilizationAdj + riskAdj + collateralAdj, min, max)
 *
 * INTEREST: linear in elapsed blocks, the full rate applied once per loan
 * duration. Every division truncates; there is no rounding correction.
 */

import { LoanAsset, RiskTier } from '../../shared/types';
import { UtilizationTracker } from '../utilization/utilization.tracker';
import { PlatformSettings } from '../platform/platform-settings';

const BPS = 10_000;
const BPS_BIG = 10_000n;

/** Collateral ratio at which the over-collateralization discount applies */
export const COLLATERAL_DISCOUNT_RATIO_BPS = 20_000;
export const COLLATERAL_DISCOUNT_BPS = 50;

/** Rates outside this band accrue nothing (see proportionalInterest) */
export const INTEREST_RATE_FLOOR_BPS = 100;
export const INTEREST_RATE_CEILING_BPS = 10_000;

export interface RateBreakdown {
  readonly baseRateBps: number;
  readonly utilizationBps: number;
  readonly utilizationAdjBps: number;
  readonly riskAdjBps: number;
  readonly collateralAdjBps: number;
  readonly rawRateBps: number;
  readonly rateBps: number;
}

export class InterestRateEngine {
  constructor(
    private readonly utilization: UtilizationTracker,
    private readonly settings: PlatformSettings
  ) {}

  /**
   * Per-loan rate, clamped to the platform's dynamic bounds
   */
  computeRate(baseRateBps: number, asset: LoanAsset, riskTier: RiskTier, collateralRatioBps: number): number {
    return this.explainRate(baseRateBps, asset, riskTier, collateralRatioBps).rateBps;
  }

  /**
   * Same as computeRate, with every adjustment exposed
   */
  explainRate(baseRateBps: number, asset: LoanAsset, riskTier: RiskTier, collateralRatioBps: number): RateBreakdown {
    const params = this.settings.rateParams;

    const utilizationBps = this.utilization.utilizationRate(asset);
    const utilizationAdjBps = Math.trunc((utilizationBps * params.utilizationMultiplierBps) / BPS);
    const riskAdjBps = riskTier * params.riskMultiplierBps;
    const collateralAdjBps = collateralRatioBps >= COLLATERAL_DISCOUNT_RATIO_BPS ? -COLLATERAL_DISCOUNT_BPS : 0;

    const rawRateBps = baseRateBps + utilizationAdjBps + riskAdjBps + collateralAdjBps;
    const rateBps = clamp(rawRateBps, params.minDynamicRateBps, params.maxDynamicRateBps);

    return {
      baseRateBps,
      utilizationBps,
      utilizationAdjBps,
      riskAdjBps,
      collateralAdjBps,
      rawRateBps,
      rateBps,
    };
  }

  /**
   * Rate from the platform's configured base rate
   */
  currentRate(asset: LoanAsset, riskTier: RiskTier, collateralRatioBps: number): number {
    return this.computeRate(this.settings.rateParams.baseRateBps, asset, riskTier, collateralRatioBps);
  }
}

/**
 * Interest owed after `elapsed` blocks of a `duration`-block loan.
 *
 * Fails closed: returns 0n for a zero principal, a zero duration, or a rate
 * outside [100, 10000] bps. Callers validate those inputs themselves before
 * trusting a non-zero result. Elapsed time past the duration keeps accruing
 * linearly.
 */
export function proportionalInterest(
  principal: bigint,
  rateBps: number,
  elapsed: number,
  duration: number
): bigint {
  if (principal === 0n || duration === 0) return 0n;
  if (rateBps < INTEREST_RATE_FLOOR_BPS || rateBps > INTEREST_RATE_CEILING_BPS) return 0n;

  const annualInterest = (principal * BigInt(rateBps)) / BPS_BIG;
  const timeFactor = (BigInt(elapsed) * BPS_BIG) / BigInt(duration);
  return (annualInterest * timeFactor) / BPS_BIG;
}

/**
 * collateral x 10000 / principal, truncated. Principal must be positive.
 */
export function collateralRatioBps(collateral: bigint, principal: bigint): bigint {
  return (collateral * BPS_BIG) / principal;
}

/**
 * fee = total x feeBps / 10000, truncated
 */
export function platformFee(total: bigint, feeBps: number): bigint {
  return (total * BigInt(feeBps)) / BPS_BIG;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
