/**
 * @file modules/loans/loan-registry.service.test.ts
 * @description Loan lifecycle: creation, funding, repayment, liquidation
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { isLendingError } from '../../shared/errors';
import { NATIVE_ASSET, RiskTier } from '../../shared/types';
import { FailingTransferService } from '../../core/custody';
import { LoanTermsInput } from './loan-registry.service';
import { ALICE, BOB, CAROL, CUSTODY, OWNER, STARTING_BALANCE, createTestLedger } from '../../../test/fixtures';

const PRINCIPAL = 1_000_000_000n;
const COLLATERAL = 1_500_000_000n;
const YEAR = 5256;

function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isLendingError(error) ? error.code : 'NOT_A_LENDING_ERROR';
  }
  return undefined;
}

describe('LoanRegistry', () => {
  let t: ReturnType<typeof createTestLedger>;

  beforeEach(() => {
    t = createTestLedger();
  });

  const openNativeLoan = (duration = YEAR) =>
    t.registry.createNativeLoan(ALICE, COLLATERAL, { principal: PRINCIPAL, duration });

  // ============================================
  // CREATE
  // ============================================

  describe('createLoan', () => {
    it('opens a pending loan at the dynamic rate and takes the collateral into custody', async () => {
      t.clock.set(10);
      const id = await openNativeLoan();

      expect(id).toBe(1);
      const loan = t.registry.getLoan(1);
      expect(loan.status).toBe('PENDING');
      expect(loan.lender).toBeNull();
      expect(loan.interestRateBps).toBe(800);
      expect(loan.dynamicRateBps).toBe(800);
      expect(loan.riskTier).toBe(RiskTier.MEDIUM);
      expect(loan.createdAt).toBe(10);
      expect(loan.collateral).toEqual({ asset: { kind: 'NATIVE' }, amount: COLLATERAL });

      expect(t.custody.balanceOf(ALICE)).toBe(STARTING_BALANCE - COLLATERAL);
      expect(t.custody.balanceOf(CUSTODY)).toBe(COLLATERAL);
      expect(t.registry.getAssetUtilization(NATIVE_ASSET)).toEqual({
        asset: NATIVE_ASSET,
        totalSupplied: 0n,
        totalBorrowed: PRINCIPAL,
        activeLoanCount: 1,
      });
      expect(t.registry.getUserStats(ALICE)).toMatchObject({ loansCreated: 1, reputation: 1 });
    });

    it('rejects collateral below the minimum ratio and leaves the ledger untouched', async () => {
      await expect(
        t.registry.createNativeLoan(ALICE, 1_400_000_000n, { principal: PRINCIPAL, duration: YEAR })
      ).rejects.toMatchObject({ code: 'INSUFFICIENT_COLLATERAL' });

      expect(t.registry.getPlatformStats().totalLoans).toBe(0);
      expect(t.custody.balanceOf(ALICE)).toBe(STARTING_BALANCE);
      expect(t.registry.getUserStats(ALICE).loansCreated).toBe(0);
      expect(t.registry.getAssetUtilization(NATIVE_ASSET).totalBorrowed).toBe(0n);
    });

    const invalidRequests: Array<[string, LoanTermsInput, bigint, string]> = [
      ['zero principal', { principal: 0n, duration: YEAR }, COLLATERAL, 'INVALID_AMOUNT'],
      ['zero duration', { principal: PRINCIPAL, duration: 0 }, COLLATERAL, 'INVALID_DURATION'],
      ['duration past the maximum', { principal: PRINCIPAL, duration: 52_561 }, COLLATERAL, 'INVALID_DURATION'],
      ['zero collateral', { principal: PRINCIPAL, duration: YEAR }, 0n, 'INVALID_AMOUNT'],
      ['explicit rate below the floor', { principal: PRINCIPAL, duration: YEAR, interestRateBps: 50 }, COLLATERAL, 'INVALID_INTEREST'],
      ['explicit rate above the ceiling', { principal: PRINCIPAL, duration: YEAR, interestRateBps: 2_500 }, COLLATERAL, 'INVALID_INTEREST'],
      ['dynamic rate above the accepted maximum', { principal: PRINCIPAL, duration: YEAR, maxAcceptableRateBps: 700 }, COLLATERAL, 'RATE_REJECTED'],
    ];

    it.each(invalidRequests)('rejects %s', async (_name, terms, collateral, code) => {
      await expect(t.registry.createNativeLoan(ALICE, collateral, terms)).rejects.toMatchObject({ code });
      expect(t.registry.getPlatformStats().totalLoans).toBe(0);
    });

    it('accepts the maximum duration', async () => {
      await expect(
        t.registry.createNativeLoan(ALICE, COLLATERAL, { principal: PRINCIPAL, duration: 52_560 })
      ).resolves.toBe(1);
    });

    it('uses an explicit rate as given and keeps the dynamic quote for audit', async () => {
      await t.registry.createNativeLoan(ALICE, COLLATERAL, { principal: PRINCIPAL, duration: YEAR, interestRateBps: 1_200 });

      const loan = t.registry.getLoan(1);
      expect(loan.interestRateBps).toBe(1_200);
      expect(loan.dynamicRateBps).toBe(800);
    });

    it('accepts a dynamic rate equal to the accepted maximum', async () => {
      await t.registry.createNativeLoan(ALICE, COLLATERAL, { principal: PRINCIPAL, duration: YEAR, maxAcceptableRateBps: 800 });
      expect(t.registry.getLoan(1).interestRateBps).toBe(800);
    });

    it('discounts over-collateralized loans', async () => {
      await t.registry.createNativeLoan(ALICE, 2_000_000_000n, { principal: PRINCIPAL, duration: YEAR });
      expect(t.registry.getLoan(1).interestRateBps).toBe(750);
    });

    it('prices utilization into later loans', async () => {
      await openNativeLoan();
      await t.registry.fundLoan(BOB, 1);

      await openNativeLoan();
      // utilization 10000 bps -> +200
      expect(t.registry.getLoan(2).interestRateBps).toBe(1_000);
    });

    it('fails with TRANSFER_FAILED when the borrower cannot post collateral', async () => {
      t = createTestLedger({ balances: [[BOB, STARTING_BALANCE]] });

      await expect(openNativeLoan()).rejects.toMatchObject({ code: 'TRANSFER_FAILED' });
      expect(t.registry.getPlatformStats().totalLoans).toBe(0);
      expect(t.registry.getUserStats(ALICE).loansCreated).toBe(0);
    });

    it('assigns consecutive ids', async () => {
      await expect(openNativeLoan()).resolves.toBe(1);
      await expect(openNativeLoan()).resolves.toBe(2);
      await expect(openNativeLoan()).resolves.toBe(3);
    });

    it('only books rates that accrue interest when the admin floor is below 100 bps', async () => {
      await t.admin.setDynamicRateParams(OWNER, {
        baseRateBps: 50,
        utilizationMultiplierBps: 0,
        riskMultiplierBps: 0,
        maxDynamicRateBps: 2_000,
        minDynamicRateBps: 50,
      });
      const terms = { principal: PRINCIPAL, duration: YEAR };

      await expect(t.registry.createNativeLoan(ALICE, COLLATERAL, { ...terms, interestRateBps: 50 })).rejects.toMatchObject({
        code: 'INVALID_INTEREST',
      });
      await expect(t.registry.createNativeLoan(ALICE, COLLATERAL, { ...terms, interestRateBps: 99 })).rejects.toMatchObject({
        code: 'INVALID_INTEREST',
      });
      // dynamic: 50 base, no adjustments
      await expect(t.registry.createNativeLoan(ALICE, COLLATERAL, terms)).rejects.toMatchObject({
        code: 'INVALID_INTEREST',
      });
      expect(t.registry.getPlatformStats().totalLoans).toBe(0);

      const id = await t.registry.createNativeLoan(ALICE, COLLATERAL, { ...terms, interestRateBps: 100 });
      await t.registry.fundLoan(BOB, id);
      t.clock.advance(YEAR);
      await expect(t.registry.repayLoan(ALICE, id)).resolves.toBe(1_010_000_000n);
    });

    it('refuses the custody account as borrower', async () => {
      await expect(
        t.registry.createNativeLoan(CUSTODY, COLLATERAL, { principal: PRINCIPAL, duration: YEAR })
      ).rejects.toMatchObject({ code: 'UNAUTHORIZED' });

      expect(t.registry.getPlatformStats().totalLoans).toBe(0);
      expect(t.custody.balanceOf(CUSTODY)).toBe(0n);
    });
  });

  // ============================================
  // FUND
  // ============================================

  describe('fundLoan', () => {
    it('activates the loan and pays the principal to the borrower', async () => {
      await openNativeLoan();
      t.clock.set(1_000);

      const active = await t.registry.fundLoan(BOB, 1);

      expect(active).toMatchObject({ status: 'ACTIVE', lender: BOB, fundedAt: 1_000 });
      expect(t.custody.balanceOf(BOB)).toBe(STARTING_BALANCE - PRINCIPAL);
      expect(t.custody.balanceOf(ALICE)).toBe(STARTING_BALANCE - COLLATERAL + PRINCIPAL);
      expect(t.registry.getAssetUtilization(NATIVE_ASSET).totalSupplied).toBe(PRINCIPAL);
      expect(t.registry.getUserStats(BOB)).toMatchObject({ loansFunded: 1, reputation: 1, totalLent: PRINCIPAL });
    });

    it('refuses to fund twice', async () => {
      await openNativeLoan();
      await t.registry.fundLoan(BOB, 1);

      await expect(t.registry.fundLoan(CAROL, 1)).rejects.toMatchObject({ code: 'ALREADY_FUNDED' });
      expect(t.registry.getLoan(1).lender).toBe(BOB);
    });

    it('refuses the borrower as lender', async () => {
      await openNativeLoan();
      await expect(t.registry.fundLoan(ALICE, 1)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });

    it('refuses the custody account as lender', async () => {
      await openNativeLoan();

      await expect(t.registry.fundLoan(CUSTODY, 1)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
      expect(t.registry.getLoan(1).status).toBe('PENDING');
      expect(t.custody.balanceOf(CUSTODY)).toBe(COLLATERAL);
    });

    it('refuses unknown loans', async () => {
      await expect(t.registry.fundLoan(BOB, 99)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('refuses the token entry point for a native loan', async () => {
      await openNativeLoan();
      await expect(t.registry.fundTokenLoan(BOB, 1, 'usd-token')).rejects.toMatchObject({ code: 'UNSUPPORTED_ASSET' });
    });

    it('serializes concurrent funding: one lender wins', async () => {
      await openNativeLoan();

      const results = await Promise.allSettled([t.registry.fundLoan(BOB, 1), t.registry.fundLoan(CAROL, 1)]);

      expect(results[0].status).toBe('fulfilled');
      expect(results[1]).toMatchObject({ status: 'rejected', reason: { code: 'ALREADY_FUNDED' } });
      expect(t.custody.balanceOf(CAROL)).toBe(STARTING_BALANCE);
    });
  });

  // ============================================
  // REPAY
  // ============================================

  describe('repayLoan', () => {
    beforeEach(async () => {
      await openNativeLoan();
      t.clock.set(1_000);
      await t.registry.fundLoan(BOB, 1);
    });

    it('charges a full period of interest after exactly one duration', async () => {
      t.clock.set(1_000 + YEAR);

      const total = await t.registry.repayLoan(ALICE, 1);

      // 80_000_000 interest, fee 1% of 1_080_000_000
      expect(total).toBe(1_080_000_000n);
      expect(t.custody.balanceOf(BOB)).toBe(STARTING_BALANCE - PRINCIPAL + 1_069_200_000n);
      expect(t.custody.balanceOf(OWNER)).toBe(10_800_000n);
      expect(t.custody.balanceOf(ALICE)).toBe(STARTING_BALANCE + PRINCIPAL - 1_080_000_000n);
      expect(t.custody.balanceOf(CUSTODY)).toBe(0n);

      expect(t.registry.getLoan(1)).toMatchObject({ status: 'REPAID', repaidAt: 6_256, totalRepaid: 1_080_000_000n });
      expect(t.registry.getAssetUtilization(NATIVE_ASSET)).toMatchObject({
        totalSupplied: PRINCIPAL,
        totalBorrowed: 0n,
        activeLoanCount: 0,
      });
      expect(t.registry.getUserStats(ALICE).totalBorrowed).toBe(PRINCIPAL);
    });

    it('charges half the interest at mid-period', async () => {
      t.clock.set(1_000 + YEAR / 2);
      await expect(t.registry.repayLoan(ALICE, 1)).resolves.toBe(1_040_000_000n);
    });

    it('charges no interest when repaid in the funding block', async () => {
      await expect(t.registry.repayLoan(ALICE, 1)).resolves.toBe(PRINCIPAL);
    });

    it('quotes what a repayment would settle', () => {
      t.clock.set(1_000 + YEAR / 2);

      expect(t.registry.getRepaymentQuote(1)).toEqual({
        loanId: 1,
        elapsed: 2_628,
        principal: PRINCIPAL,
        interest: 40_000_000n,
        platformFee: 10_400_000n,
        lenderPayout: 1_029_600_000n,
        total: 1_040_000_000n,
      });
    });

    it('refuses a second repayment', async () => {
      await t.registry.repayLoan(ALICE, 1);
      await expect(t.registry.repayLoan(ALICE, 1)).rejects.toMatchObject({ code: 'LOAN_NOT_ACTIVE' });
      await expect(t.registry.fundLoan(CAROL, 1)).rejects.toMatchObject({ code: 'ALREADY_FUNDED' });
    });

    it('refuses anyone but the borrower', async () => {
      await expect(t.registry.repayLoan(BOB, 1)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });

    it('rolls back every leg when the fee transfer fails', async () => {
      t = createTestLedger({
        wrapTransfers: (custody) => new FailingTransferService(custody, (instruction) => instruction.to === OWNER),
      });
      await openNativeLoan();
      t.clock.set(1_000);
      await t.registry.fundLoan(BOB, 1);
      t.clock.set(1_000 + YEAR);

      await expect(t.registry.repayLoan(ALICE, 1)).rejects.toMatchObject({ code: 'TRANSFER_FAILED' });

      expect(t.registry.getLoan(1).status).toBe('ACTIVE');
      expect(t.custody.balanceOf(ALICE)).toBe(STARTING_BALANCE - COLLATERAL + PRINCIPAL);
      expect(t.custody.balanceOf(BOB)).toBe(STARTING_BALANCE - PRINCIPAL);
      expect(t.custody.balanceOf(CUSTODY)).toBe(COLLATERAL);
      expect(t.registry.getAssetUtilization(NATIVE_ASSET).activeLoanCount).toBe(1);
      expect(t.registry.getUserStats(ALICE).totalBorrowed).toBe(0n);
    });
  });

  it('refuses to repay or liquidate an unfunded loan', async () => {
    await openNativeLoan();
    await expect(t.registry.repayLoan(ALICE, 1)).rejects.toMatchObject({ code: 'LOAN_NOT_FUNDED' });
    await expect(t.registry.liquidateLoan(BOB, 1)).rejects.toMatchObject({ code: 'LOAN_NOT_FUNDED' });
  });

  // ============================================
  // LIQUIDATE
  // ============================================

  describe('liquidateLoan', () => {
    beforeEach(async () => {
      await openNativeLoan(100);
      t.clock.set(1_000);
      await t.registry.fundLoan(BOB, 1);
    });

    it('is refused one block before the due height', async () => {
      t.clock.set(1_099);

      expect(t.registry.isLoanOverdue(1)).toBe(false);
      await expect(t.registry.liquidateLoan(BOB, 1)).rejects.toMatchObject({ code: 'LOAN_NOT_OVERDUE' });
    });

    it('hands the collateral to the lender at the due height, once', async () => {
      t.clock.set(1_100);
      expect(t.registry.isLoanOverdue(1)).toBe(true);

      const liquidated = await t.registry.liquidateLoan(BOB, 1);

      expect(liquidated).toMatchObject({ status: 'LIQUIDATED', liquidatedAt: 1_100 });
      expect(t.custody.balanceOf(BOB)).toBe(STARTING_BALANCE - PRINCIPAL + COLLATERAL);
      expect(t.custody.balanceOf(CUSTODY)).toBe(0n);
      expect(t.registry.getUserStats(ALICE).defaultCount).toBe(1);
      expect(t.registry.getAssetUtilization(NATIVE_ASSET)).toMatchObject({ totalBorrowed: 0n, activeLoanCount: 0 });
      expect(t.registry.isLoanOverdue(1)).toBe(false);

      await expect(t.registry.liquidateLoan(BOB, 1)).rejects.toMatchObject({ code: 'LOAN_NOT_ACTIVE' });
      await expect(t.registry.repayLoan(ALICE, 1)).rejects.toMatchObject({ code: 'LOAN_NOT_ACTIVE' });
    });

    it('is reserved to the lender', async () => {
      t.clock.set(2_000);
      await expect(t.registry.liquidateLoan(CAROL, 1)).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    });

    it('raises the borrower to HIGH risk after a default', async () => {
      t.clock.set(1_100);
      await t.registry.liquidateLoan(BOB, 1);

      // base 500 + HIGH 4 x 100
      expect(t.registry.getDynamicRate(ALICE, NATIVE_ASSET, 15_000)).toMatchObject({ riskTier: RiskTier.HIGH, rateBps: 900 });
    });
  });

  // ============================================
  // TOKEN & COLLECTIBLE ASSETS
  // ============================================

  describe('token and collectible loans', () => {
    beforeEach(async () => {
      await t.admin.addSupportedToken(OWNER, 'usd-token', 6, 2);
      await t.admin.addSupportedCollection(OWNER, 'pixel-cats', 3_000_000_000n, 3);
    });

    it('lends a token against native collateral through the token entry point', async () => {
      await t.registry.createTokenLoan(ALICE, 'usd-token', COLLATERAL, { principal: PRINCIPAL, duration: YEAR });

      await expect(t.registry.fundLoan(BOB, 1)).rejects.toMatchObject({ code: 'UNSUPPORTED_ASSET' });
      await expect(t.registry.fundTokenLoan(BOB, 1, 'other-token')).rejects.toMatchObject({ code: 'INVALID_TOKEN_CONTRACT' });

      const active = await t.registry.fundTokenLoan(BOB, 1, 'usd-token');

      expect(active.loanAsset).toEqual({ kind: 'TOKEN', contract: 'usd-token' });
      // Token principal moves outside native custody
      expect(t.custody.balanceOf(BOB)).toBe(STARTING_BALANCE);
      expect(t.registry.getUserStats(BOB)).toMatchObject({ loansFunded: 1, totalLent: 0n });
      expect(t.registry.getAssetUtilization({ kind: 'TOKEN', contract: 'usd-token' }).totalSupplied).toBe(PRINCIPAL);
      expect(t.registry.getAssetUtilization(NATIVE_ASSET).totalSupplied).toBe(0n);
    });

    it('accepts token collateral', async () => {
      await t.registry.createLoanWithTokenCollateral(ALICE, 'usd-token', COLLATERAL, { principal: PRINCIPAL, duration: YEAR });

      expect(t.registry.getLoan(1).collateral).toEqual({ asset: { kind: 'TOKEN', contract: 'usd-token' }, amount: COLLATERAL });
      expect(t.custody.balanceOf(ALICE)).toBe(STARTING_BALANCE);
    });

    it('values collectible collateral at the collection floor', async () => {
      await t.registry.createLoanWithNftCollateral(ALICE, 'pixel-cats', '42', { principal: PRINCIPAL, duration: YEAR });

      const loan = t.registry.getLoan(1);
      expect(loan.collateral).toEqual({
        asset: { kind: 'COLLECTIBLE', collection: 'pixel-cats', itemId: '42' },
        amount: 3_000_000_000n,
      });
      // ratio 30000 earns the discount
      expect(loan.interestRateBps).toBe(750);
    });

    it('rejects unregistered and disabled assets', async () => {
      await expect(
        t.registry.createTokenLoan(ALICE, 'unknown-token', COLLATERAL, { principal: PRINCIPAL, duration: YEAR })
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
      await expect(
        t.registry.createLoanWithNftCollateral(ALICE, 'unknown-cats', '1', { principal: PRINCIPAL, duration: YEAR })
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });

      await t.admin.removeSupportedToken(OWNER, 'usd-token');
      await t.admin.updateCollection(OWNER, 'pixel-cats', { enabled: false });

      await expect(
        t.registry.createLoanWithTokenCollateral(ALICE, 'usd-token', COLLATERAL, { principal: PRINCIPAL, duration: YEAR })
      ).rejects.toMatchObject({ code: 'UNSUPPORTED_ASSET' });
      await expect(
        t.registry.createLoanWithNftCollateral(ALICE, 'pixel-cats', '42', { principal: PRINCIPAL, duration: YEAR })
      ).rejects.toMatchObject({ code: 'UNSUPPORTED_ASSET' });
    });
  });

  // ============================================
  // READS
  // ============================================

  describe('reads', () => {
    it('reports NOT_FOUND outside the issued id range', async () => {
      await openNativeLoan();

      expect(thrownCode(() => t.registry.getLoan(0))).toBe('NOT_FOUND');
      expect(thrownCode(() => t.registry.getLoan(2))).toBe('NOT_FOUND');
      expect(thrownCode(() => t.registry.getLoan(1))).toBeUndefined();
    });

    it('never reports unknown or unfunded loans as overdue', async () => {
      await openNativeLoan(1);
      t.clock.set(500);

      expect(t.registry.isLoanOverdue(0)).toBe(false);
      expect(t.registry.isLoanOverdue(7)).toBe(false);
      expect(t.registry.isLoanOverdue(1)).toBe(false);
    });

    it('returns zeroed stats for unknown users', () => {
      expect(t.registry.getUserStats('nobody')).toEqual({
        loansCreated: 0,
        loansFunded: 0,
        totalBorrowed: 0n,
        totalLent: 0n,
        reputation: 0,
        defaultCount: 0,
      });
    });

    it('explains the dynamic rate', () => {
      expect(t.registry.getDynamicRate(ALICE, NATIVE_ASSET, 20_000)).toEqual({
        baseRateBps: 500,
        utilizationBps: 0,
        utilizationAdjBps: 0,
        riskAdjBps: 300,
        collateralAdjBps: -50,
        rawRateBps: 750,
        rateBps: 750,
        riskTier: RiskTier.MEDIUM,
      });
    });

    it('lists and counts loans', async () => {
      await openNativeLoan();
      await openNativeLoan();
      await t.registry.createNativeLoan(CAROL, COLLATERAL, { principal: PRINCIPAL, duration: YEAR });
      await t.registry.fundLoan(BOB, 2);

      expect(t.registry.listLoans({ borrower: ALICE }).map((loan) => loan.id)).toEqual([1, 2]);
      expect(t.registry.listLoans({ lender: BOB }).map((loan) => loan.id)).toEqual([2]);
      expect(t.registry.listLoans({ status: 'PENDING' }).map((loan) => loan.id)).toEqual([1, 3]);

      expect(t.registry.getPlatformStats()).toMatchObject({
        totalLoans: 3,
        loansByStatus: { PENDING: 2, ACTIVE: 1, REPAID: 0, LIQUIDATED: 0 },
        owner: OWNER,
      });
    });
  });
});
