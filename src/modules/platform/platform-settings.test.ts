import { describe, it, expect } from '@jest/globals';
import { DynamicRateParams } from '../../shared/types';
import { DEFAULT_PLATFORM_PARAMS, PlatformSettings } from './platform-settings';

const VALID_RATES: DynamicRateParams = {
  baseRateBps: 400,
  utilizationMultiplierBps: 300,
  riskMultiplierBps: 150,
  maxDynamicRateBps: 3_000,
  minDynamicRateBps: 200,
};

describe('PlatformSettings', () => {
  it('starts from the defaults', () => {
    expect(new PlatformSettings().current).toEqual({
      platformFeeBps: 100,
      maxDuration: 52_560,
      minCollateralRatioBps: 15_000,
      baseRateBps: 500,
      utilizationMultiplierBps: 200,
      riskMultiplierBps: 100,
      maxDynamicRateBps: 2_000,
      minDynamicRateBps: 100,
    });
  });

  it('bounds the platform fee to 0..1000', () => {
    const settings = new PlatformSettings();
    settings.setPlatformFee(0);
    settings.setPlatformFee(1_000);

    expect(() => settings.setPlatformFee(1_001)).toThrow(expect.objectContaining({ code: 'INVALID_AMOUNT' }));
    expect(settings.current.platformFeeBps).toBe(1_000);
  });

  it('bounds the minimum collateral ratio to 10000..50000', () => {
    const settings = new PlatformSettings();

    expect(() => settings.setMinCollateralRatio(9_999)).toThrow(expect.objectContaining({ code: 'INVALID_AMOUNT' }));
    expect(() => settings.setMinCollateralRatio(50_001)).toThrow(expect.objectContaining({ code: 'INVALID_AMOUNT' }));
    settings.setMinCollateralRatio(20_000);
    expect(settings.current.minCollateralRatioBps).toBe(20_000);
  });

  it('replaces all rate parameters at once', () => {
    const settings = new PlatformSettings();
    settings.setDynamicRateParams(VALID_RATES);

    expect(settings.rateParams).toEqual(VALID_RATES);
    expect(settings.current.platformFeeBps).toBe(DEFAULT_PLATFORM_PARAMS.platformFeeBps);
  });

  it.each([
    ['base rate 49', { baseRateBps: 49 }],
    ['base rate 1001', { baseRateBps: 1_001 }],
    ['utilization multiplier 501', { utilizationMultiplierBps: 501 }],
    ['risk multiplier 301', { riskMultiplierBps: 301 }],
    ['max rate 499', { maxDynamicRateBps: 499 }],
    ['max rate 5001', { maxDynamicRateBps: 5_001 }],
    ['min rate 49', { minDynamicRateBps: 49 }],
    ['min rate 201', { minDynamicRateBps: 201 }],
  ])('rejects %s and keeps the previous parameters', (_name, override) => {
    const settings = new PlatformSettings();

    expect(() => settings.setDynamicRateParams({ ...VALID_RATES, ...override })).toThrow(
      expect.objectContaining({ code: 'INVALID_INTEREST' })
    );
    expect(settings.current).toEqual(DEFAULT_PLATFORM_PARAMS);
  });

  it('refuses invalid initial parameters', () => {
    expect(() => new PlatformSettings({ ...DEFAULT_PLATFORM_PARAMS, maxDuration: 0 })).toThrow('Max duration');
  });
});
