/**
 * @file modules/risk/risk-scorer.ts
 * @description Borrower risk tier from lending history
 *
 * - No loans yet       -> MEDIUM (new-user default)
 * - More than 2 defaults -> VERY_HIGH
 * - Any default        -> HIGH
 * - Reputation >= 10   -> SAFE
 * - Reputation >= 5    -> LOW
 * - Otherwise          -> MEDIUM
 */

import { CollateralAsset, Principal, RiskTier, UserStats } from '../../shared/types';
import { UserStatsStore } from '../users/user-stats.store';

const REPUTATION_SAFE = 10;
const REPUTATION_LOW = 5;
const DEFAULTS_VERY_HIGH = 2;

export class RiskScorer {
  constructor(private readonly users: UserStatsStore) {}

  /**
   * Collateral is accepted so that collateral-aware scoring can be added
   * without changing callers; it does not affect the tier today.
   */
  score(user: Principal, _collateral?: CollateralAsset): RiskTier {
    return tierFor(this.users.get(user));
  }
}

export function tierFor(stats: UserStats): RiskTier {
  if (stats.loansCreated === 0) return RiskTier.MEDIUM;
  if (stats.defaultCount > DEFAULTS_VERY_HIGH) return RiskTier.VERY_HIGH;
  if (stats.defaultCount > 0) return RiskTier.HIGH;
  if (stats.reputation >= REPUTATION_SAFE) return RiskTier.SAFE;
  if (stats.reputation >= REPUTATION_LOW) return RiskTier.LOW;
  return RiskTier.MEDIUM;
}
