/**
 * Lending Ledger - Request Schemas
 *
 * Amounts travel as decimal strings and are parsed to bigint here. Range
 * checks (positive principal, fee bounds...) are the ledger's job; these
 * schemas only check shape.
 */

import { z } from 'zod';
import { RequestError } from './errors';

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer string')
  .transform((value) => BigInt(value));

const Bps = z.number().int();
const Reference = z.string().min(1);

export const LoanAssetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('NATIVE') }),
  z.object({ kind: z.literal('TOKEN'), contract: Reference }),
]);

export const CollateralSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('NATIVE'), amount: AmountSchema }),
  z.object({ kind: z.literal('TOKEN'), contract: Reference, amount: AmountSchema }),
  z.object({ kind: z.literal('COLLECTIBLE'), collection: Reference, itemId: Reference }),
]);

export const CreateLoanBodySchema = z.object({
  principal: AmountSchema,
  duration: z.number().int(),
  loanAsset: LoanAssetSchema.default({ kind: 'NATIVE' }),
  collateral: CollateralSpecSchema,
  interestRateBps: Bps.optional(),
  maxAcceptableRateBps: Bps.optional(),
});

export const FundLoanBodySchema = z.object({
  tokenContract: Reference.optional(),
});

export const ListLoansQuerySchema = z.object({
  borrower: Reference.optional(),
  lender: Reference.optional(),
  status: z.enum(['PENDING', 'ACTIVE', 'REPAID', 'LIQUIDATED']).optional(),
});

export const AssetQuerySchema = z.object({
  token: Reference.optional(),
});

export const DynamicRateQuerySchema = z.object({
  user: Reference,
  token: Reference.optional(),
  collateralRatioBps: z.coerce.number().int().nonnegative(),
});

// ============================================
// ADMIN
// ============================================

export const AddTokenBodySchema = z.object({
  contract: z.string(),
  decimals: z.number().int(),
  riskScore: z.number().int(),
});

export const AddCollectionBodySchema = z.object({
  collection: z.string(),
  floorPrice: AmountSchema,
  riskScore: z.number().int(),
});

export const UpdateCollectionBodySchema = z
  .object({
    floorPrice: AmountSchema.optional(),
    riskScore: z.number().int().optional(),
    enabled: z.boolean().optional(),
  })
  .refine(
    (body) => body.floorPrice !== undefined || body.riskScore !== undefined || body.enabled !== undefined,
    'at least one field is required'
  );

export const PlatformFeeBodySchema = z.object({ feeBps: Bps });

export const MinCollateralRatioBodySchema = z.object({ ratioBps: Bps });

export const DynamicRateParamsBodySchema = z.object({
  baseRateBps: Bps,
  utilizationMultiplierBps: Bps,
  riskMultiplierBps: Bps,
  maxDynamicRateBps: Bps,
  minDynamicRateBps: Bps,
});

export const FaucetBodySchema = z.object({
  principal: Reference,
  amount: AmountSchema,
});

/** Decimal path id, or null when `raw` is not one */
export function loanIdOrNull(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

/**
 * Path ids must be decimal integers; whether the loan exists is the ledger's
 * call (NOT_FOUND)
 */
export function parseLoanId(raw: string): number {
  const loanId = loanIdOrNull(raw);
  if (loanId === null) {
    throw new RequestError(400, `Invalid loan id: ${raw}`);
  }
  return loanId;
}
