/**
 * Lending Ledger - Loan API Routes
 * Lifecycle operations and loan reads
 */

import { Router, Request, Response } from 'express';
import { LoanRegistry } from '../../modules/loans';
import { callerOf } from '../middleware/auth.middleware';
import { sendError } from '../errors';
import { CreateLoanBodySchema, FundLoanBodySchema, ListLoansQuerySchema, loanIdOrNull, parseLoanId } from '../schemas';
import { loanJson, quoteJson } from '../serializers';

/** Runs after every committed mutation (persistence write-through) */
export type CommitHook = () => Promise<void>;

export function createLoanRoutes(registry: LoanRegistry, afterCommit: CommitHook): Router {
  const router = Router();

  /**
   * POST /loans
   * Open a loan request. Any loan asset / collateral combination.
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const caller = callerOf(req);
      const body = CreateLoanBodySchema.parse(req.body);

      const loanId = await registry.createLoan(caller, body);
      await afterCommit();

      res.status(201).json({ loanId, loan: loanJson(registry.getLoan(loanId)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /loans?borrower=&lender=&status=
   */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const filter = ListLoansQuerySchema.parse(req.query);
      const loans = registry.listLoans(filter);
      res.json({ count: loans.length, loans: loans.map(loanJson) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /loans/:id/fund
   * Body `tokenContract` selects the token entry point
   */
  router.post('/:id/fund', async (req: Request, res: Response) => {
    try {
      const caller = callerOf(req);
      const loanId = parseLoanId(req.params.id);
      const { tokenContract } = FundLoanBodySchema.parse(req.body ?? {});

      const loan = tokenContract === undefined
        ? await registry.fundLoan(caller, loanId)
        : await registry.fundTokenLoan(caller, loanId, tokenContract);
      await afterCommit();

      res.json({ loan: loanJson(loan) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /loans/:id/repay
   */
  router.post('/:id/repay', async (req: Request, res: Response) => {
    try {
      const caller = callerOf(req);
      const loanId = parseLoanId(req.params.id);

      const total = await registry.repayLoan(caller, loanId);
      await afterCommit();

      res.json({ totalRepaid: total.toString(), loan: loanJson(registry.getLoan(loanId)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /loans/:id/liquidate
   */
  router.post('/:id/liquidate', async (req: Request, res: Response) => {
    try {
      const caller = callerOf(req);
      const loanId = parseLoanId(req.params.id);

      const loan = await registry.liquidateLoan(caller, loanId);
      await afterCommit();

      res.json({ loan: loanJson(loan) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      res.json(loanJson(registry.getLoan(parseLoanId(req.params.id))));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /loans/:id/overdue
   * Never fails: any id that is not an active loan is simply not overdue
   */
  router.get('/:id/overdue', async (req: Request, res: Response) => {
    const loanId = loanIdOrNull(req.params.id);
    res.json({ loanId, overdue: loanId !== null && registry.isLoanOverdue(loanId) });
  });

  /**
   * GET /loans/:id/quote
   * What repaying at the current height would settle
   */
  router.get('/:id/quote', async (req: Request, res: Response) => {
    try {
      res.json(quoteJson(registry.getRepaymentQuote(parseLoanId(req.params.id))));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
