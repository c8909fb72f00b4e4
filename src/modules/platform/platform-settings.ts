/**
 * Lending Ledger - Platform Settings
 *
 * Scalar configuration read by the registry and the rate engine. Setters
 * enforce the admin bounds; callers check ownership before calling them.
 */

import { LendingError } from '../../shared/errors';
import { DynamicRateParams, PlatformParams } from '../../shared/types';

export const DEFAULT_PLATFORM_PARAMS: PlatformParams = {
  platformFeeBps: 100,           // 1.00%
  maxDuration: 52_560,           // ~1 year of 10-minute blocks
  minCollateralRatioBps: 15_000, // 150%
  baseRateBps: 500,              // 5.00%
  utilizationMultiplierBps: 200,
  riskMultiplierBps: 100,
  maxDynamicRateBps: 2_000,      // 20.00%
  minDynamicRateBps: 100,        // 1.00%
};

export const SETTINGS_BOUNDS = {
  maxPlatformFeeBps: 1_000,
  minCollateralRatioBps: { min: 10_000, max: 50_000 },
  baseRateBps: { min: 50, max: 1_000 },
  maxUtilizationMultiplierBps: 500,
  maxRiskMultiplierBps: 300,
  maxDynamicRateBps: { min: 500, max: 5_000 },
  minDynamicRateBps: { min: 50, max: 200 },
} as const;

export class PlatformSettings {
  private params: PlatformParams;

  constructor(initial: PlatformParams = DEFAULT_PLATFORM_PARAMS) {
    validateDynamicRateParams(initial);
    assertPlatformFee(initial.platformFeeBps);
    assertMinCollateralRatio(initial.minCollateralRatioBps);
    if (!Number.isInteger(initial.maxDuration) || initial.maxDuration <= 0) {
      throw new LendingError('INVALID_DURATION', `Max duration must be a positive integer, got ${initial.maxDuration}`);
    }
    this.params = { ...initial };
  }

  get current(): PlatformParams {
    return this.params;
  }

  get rateParams(): DynamicRateParams {
    const { baseRateBps, utilizationMultiplierBps, riskMultiplierBps, maxDynamicRateBps, minDynamicRateBps } = this.params;
    return { baseRateBps, utilizationMultiplierBps, riskMultiplierBps, maxDynamicRateBps, minDynamicRateBps };
  }

  setPlatformFee(feeBps: number): void {
    assertPlatformFee(feeBps);
    this.params = { ...this.params, platformFeeBps: feeBps };
  }

  setMinCollateralRatio(ratioBps: number): void {
    assertMinCollateralRatio(ratioBps);
    this.params = { ...this.params, minCollateralRatioBps: ratioBps };
  }

  setDynamicRateParams(rates: DynamicRateParams): void {
    validateDynamicRateParams(rates);
    this.params = { ...this.params, ...rates };
  }
}

function assertPlatformFee(feeBps: number): void {
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > SETTINGS_BOUNDS.maxPlatformFeeBps) {
    throw new LendingError(
      'INVALID_AMOUNT',
      `Platform fee must be 0..${SETTINGS_BOUNDS.maxPlatformFeeBps} bps, got ${feeBps}`
    );
  }
}

function assertMinCollateralRatio(ratioBps: number): void {
  const { min, max } = SETTINGS_BOUNDS.minCollateralRatioBps;
  if (!Number.isInteger(ratioBps) || ratioBps < min || ratioBps > max) {
    throw new LendingError('INVALID_AMOUNT', `Minimum collateral ratio must be ${min}..${max} bps, got ${ratioBps}`);
  }
}

/**
 * Throws INVALID_INTEREST naming every parameter out of bounds
 */
export function validateDynamicRateParams(rates: DynamicRateParams): void {
  const b = SETTINGS_BOUNDS;
  const errors: string[] = [];

  const within = (value: number, min: number, max: number) =>
    Number.isInteger(value) && value >= min && value <= max;

  if (!within(rates.baseRateBps, b.baseRateBps.min, b.baseRateBps.max)) {
    errors.push(`base rate ${rates.baseRateBps} outside [${b.baseRateBps.min}, ${b.baseRateBps.max}]`);
  }
  if (!within(rates.utilizationMultiplierBps, 0, b.maxUtilizationMultiplierBps)) {
    errors.push(`utilization multiplier ${rates.utilizationMultiplierBps} above ${b.maxUtilizationMultiplierBps}`);
  }
  if (!within(rates.riskMultiplierBps, 0, b.maxRiskMultiplierBps)) {
    errors.push(`risk multiplier ${rates.riskMultiplierBps} above ${b.maxRiskMultiplierBps}`);
  }
  if (!within(rates.maxDynamicRateBps, b.maxDynamicRateBps.min, b.maxDynamicRateBps.max)) {
    errors.push(`max rate ${rates.maxDynamicRateBps} outside [${b.maxDynamicRateBps.min}, ${b.maxDynamicRateBps.max}]`);
  }
  if (!within(rates.minDynamicRateBps, b.minDynamicRateBps.min, b.minDynamicRateBps.max)) {
    errors.push(`min rate ${rates.minDynamicRateBps} outside [${b.minDynamicRateBps.min}, ${b.minDynamicRateBps.max}]`);
  }
  if (rates.maxDynamicRateBps <= rates.minDynamicRateBps) {
    errors.push('max rate must exceed min rate');
  }

  if (errors.length > 0) {
    throw new LendingError('INVALID_INTEREST', `Invalid dynamic rate parameters: ${errors.join('; ')}`);
  }
}
