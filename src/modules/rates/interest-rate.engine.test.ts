/**
 * @file modules/rates/interest-rate.engine.test.ts
 * @description Dynamic rate composition and proportional interest
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { NATIVE_ASSET, RiskTier } from '../../shared/types';
import { UtilizationTracker } from '../utilization/utilization.tracker';
import { PlatformSettings } from '../platform/platform-settings';
import { collateralRatioBps, InterestRateEngine, platformFee, proportionalInterest } from './interest-rate.engine';

describe('InterestRateEngine', () => {
  let utilization: UtilizationTracker;
  let settings: PlatformSettings;
  let engine: InterestRateEngine;

  beforeEach(() => {
    utilization = new UtilizationTracker();
    settings = new PlatformSettings();
    engine = new InterestRateEngine(utilization, settings);
  });

  it('adds risk on top of the base rate for a fresh market', () => {
    expect(engine.computeRate(500, NATIVE_ASSET, RiskTier.MEDIUM, 15_000)).toBe(800);
    expect(engine.computeRate(500, NATIVE_ASSET, RiskTier.SAFE, 15_000)).toBe(600);
  });

  it('discounts at 200% collateral and above', () => {
    expect(engine.computeRate(500, NATIVE_ASSET, RiskTier.MEDIUM, 19_999)).toBe(800);
    expect(engine.computeRate(500, NATIVE_ASSET, RiskTier.MEDIUM, 20_000)).toBe(750);
  });

  it('scales the utilization adjustment by the multiplier', () => {
    utilization.update(NATIVE_ASSET, { supplied: 4_000n, borrowed: 1_000n }, true);

    // utilization 2500 bps x 200 / 10000 = 50
    expect(engine.explainRate(500, NATIVE_ASSET, RiskTier.LOW, 15_000)).toEqual({
      baseRateBps: 500,
      utilizationBps: 2_500,
      utilizationAdjBps: 50,
      riskAdjBps: 200,
      collateralAdjBps: 0,
      rawRateBps: 750,
      rateBps: 750,
    });
  });

  it('clamps to the configured bounds', () => {
    utilization.update(NATIVE_ASSET, { supplied: 1n, borrowed: 1_000n }, true);
    expect(engine.computeRate(1_000, NATIVE_ASSET, RiskTier.VERY_HIGH, 15_000)).toBe(2_000);

    settings.setDynamicRateParams({
      baseRateBps: 50,
      utilizationMultiplierBps: 0,
      riskMultiplierBps: 0,
      maxDynamicRateBps: 500,
      minDynamicRateBps: 150,
    });
    expect(engine.currentRate(NATIVE_ASSET, RiskTier.SAFE, 30_000)).toBe(150);
  });

  it('prices each asset from its own utilization', () => {
    const token = { kind: 'TOKEN', contract: 'usd-token' } as const;
    utilization.update(token, { supplied: 100n, borrowed: 100n }, true);

    expect(engine.currentRate(NATIVE_ASSET, RiskTier.MEDIUM, 15_000)).toBe(800);
    expect(engine.currentRate(token, RiskTier.MEDIUM, 15_000)).toBe(1_000);
  });
});

describe('proportionalInterest', () => {
  it('is zero at time zero', () => {
    expect(proportionalInterest(1_000_000_000n, 800, 0, 5_256)).toBe(0n);
  });

  it('is the full rate after one duration', () => {
    expect(proportionalInterest(1_000_000_000n, 800, 5_256, 5_256)).toBe(80_000_000n);
  });

  it('keeps accruing linearly past the duration', () => {
    expect(proportionalInterest(1_000_000_000n, 800, 10_512, 5_256)).toBe(160_000_000n);
  });

  it('truncates at every step', () => {
    // annual 8, time factor 3333
    expect(proportionalInterest(100n, 800, 1, 3)).toBe(2n);
  });

  it.each([
    ['zero principal', 0n, 800, 10, 10],
    ['zero duration', 1_000n, 800, 10, 0],
    ['rate below 100 bps', 1_000n, 99, 10, 10],
    ['rate above 10000 bps', 1_000n, 10_001, 10, 10],
  ])('is zero for %s', (_name, principal, rate, elapsed, duration) => {
    expect(proportionalInterest(principal, rate, elapsed, duration)).toBe(0n);
  });
});

describe('collateralRatioBps and platformFee', () => {
  it('computes the ratio in basis points', () => {
    expect(collateralRatioBps(1_500_000_000n, 1_000_000_000n)).toBe(15_000n);
    expect(collateralRatioBps(1_400_000_000n, 1_000_000_000n)).toBe(14_000n);
    expect(collateralRatioBps(2n, 3n)).toBe(6_666n);
  });

  it('takes the fee off the total, truncated', () => {
    expect(platformFee(1_080_000_000n, 100)).toBe(10_800_000n);
    expect(platformFee(99n, 100)).toBe(0n);
    expect(platformFee(1_000n, 0)).toBe(0n);
  });
});
