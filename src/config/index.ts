/**
 * Lending Ledger - Configuration
 *
 * Environment -> typed AppConfig. Everything has a development default
 * except the admin API key, which stays empty (admin routes then refuse
 * every request).
 */

import { z } from 'zod';
import { PlatformParams } from '../shared/types';
import { DEFAULT_PLATFORM_PARAMS } from '../modules/platform/platform-settings';

const bps = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  ADMIN_API_KEY: z.string().default(''),
  DATABASE_URL: z.string().url().optional(),

  PLATFORM_OWNER: z.string().min(1).default('platform-owner'),
  CUSTODY_PRINCIPAL: z.string().min(1).default('ledger-custody'),

  BLOCK_INTERVAL_MS: z.coerce.number().int().positive().default(600_000),
  GENESIS_TIME: z.coerce.date().default(new Date('2024-01-01T00:00:00Z')),

  PLATFORM_FEE_BPS: bps(DEFAULT_PLATFORM_PARAMS.platformFeeBps),
  MAX_LOAN_DURATION: z.coerce.number().int().positive().default(DEFAULT_PLATFORM_PARAMS.maxDuration),
  MIN_COLLATERAL_RATIO_BPS: bps(DEFAULT_PLATFORM_PARAMS.minCollateralRatioBps),
  BASE_RATE_BPS: bps(DEFAULT_PLATFORM_PARAMS.baseRateBps),
  UTILIZATION_MULTIPLIER_BPS: bps(DEFAULT_PLATFORM_PARAMS.utilizationMultiplierBps),
  RISK_MULTIPLIER_BPS: bps(DEFAULT_PLATFORM_PARAMS.riskMultiplierBps),
  MAX_DYNAMIC_RATE_BPS: bps(DEFAULT_PLATFORM_PARAMS.maxDynamicRateBps),
  MIN_DYNAMIC_RATE_BPS: bps(DEFAULT_PLATFORM_PARAMS.minDynamicRateBps),
});

export interface AppConfig {
  readonly port: number;
  readonly adminApiKey: string;
  readonly databaseUrl: string | null;
  readonly platformOwner: string;
  readonly custodyPrincipal: string;
  readonly blockIntervalMs: number;
  readonly genesis: Date;
  readonly platform: PlatformParams;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate the environment. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  if (e.PLATFORM_OWNER === e.CUSTODY_PRINCIPAL) {
    throw new ConfigError(['PLATFORM_OWNER and CUSTODY_PRINCIPAL must differ']);
  }

  return {
    port: e.PORT,
    adminApiKey: e.ADMIN_API_KEY,
    databaseUrl: e.DATABASE_URL ?? null,
    platformOwner: e.PLATFORM_OWNER,
    custodyPrincipal: e.CUSTODY_PRINCIPAL,
    blockIntervalMs: e.BLOCK_INTERVAL_MS,
    genesis: e.GENESIS_TIME,
    platform: {
      platformFeeBps: e.PLATFORM_FEE_BPS,
      maxDuration: e.MAX_LOAN_DURATION,
      minCollateralRatioBps: e.MIN_COLLATERAL_RATIO_BPS,
      baseRateBps: e.BASE_RATE_BPS,
      utilizationMultiplierBps: e.UTILIZATION_MULTIPLIER_BPS,
      riskMultiplierBps: e.RISK_MULTIPLIER_BPS,
      maxDynamicRateBps: e.MAX_DYNAMIC_RATE_BPS,
      minDynamicRateBps: e.MIN_DYNAMIC_RATE_BPS,
    },
  };
}
