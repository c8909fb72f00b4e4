/**
 * @file modules/risk/risk-scorer.test.ts
 * @description Risk tiers from borrower history
 */

import { describe, it, expect } from '@jest/globals';
import { EMPTY_USER_STATS, RiskTier, UserStats } from '../../shared/types';
import { UserStatsStore } from '../users/user-stats.store';
import { RiskScorer, tierFor } from './risk-scorer';

function history(overrides: Partial<UserStats>): UserStats {
  return { ...EMPTY_USER_STATS, loansCreated: 1, ...overrides };
}

describe('tierFor', () => {
  it.each([
    ['new user', { loansCreated: 0, reputation: 50 }, RiskTier.MEDIUM],
    ['three defaults', { defaultCount: 3, reputation: 20 }, RiskTier.VERY_HIGH],
    ['two defaults', { defaultCount: 2, reputation: 20 }, RiskTier.HIGH],
    ['one default', { defaultCount: 1 }, RiskTier.HIGH],
    ['reputation 10', { reputation: 10 }, RiskTier.SAFE],
    ['reputation 9', { reputation: 9 }, RiskTier.LOW],
    ['reputation 5', { reputation: 5 }, RiskTier.LOW],
    ['reputation 4', { reputation: 4 }, RiskTier.MEDIUM],
  ])('%s', (_name, overrides, expected) => {
    expect(tierFor(history(overrides))).toBe(expected);
  });
});

describe('RiskScorer', () => {
  it('scores from the live user stats and ignores collateral', () => {
    const users = new UserStatsStore();
    const scorer = new RiskScorer(users);

    expect(scorer.score('borrower-alice')).toBe(RiskTier.MEDIUM);

    for (let i = 0; i < 5; i++) users.recordLoanCreated('borrower-alice');
    expect(scorer.score('borrower-alice')).toBe(RiskTier.LOW);
    expect(scorer.score('borrower-alice', { kind: 'COLLECTIBLE', collection: 'pixel-cats', itemId: '1' })).toBe(RiskTier.LOW);

    users.recordDefault('borrower-alice');
    expect(scorer.score('borrower-alice')).toBe(RiskTier.HIGH);
  });
});
