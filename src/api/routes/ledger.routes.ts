/**
 * Lending Ledger - Ledger Read Routes
 * User stats, asset utilization, dynamic rates, platform stats
 */

import { Router, Request, Response } from 'express';
import { LoanAsset, NATIVE_ASSET } from '../../shared/types';
import { LoanRegistry } from '../../modules/loans';
import { LendingLedger } from '../../core/ledger';
import { sendError } from '../errors';
import { AssetQuerySchema, DynamicRateQuerySchema } from '../schemas';
import {
  collectionJson,
  platformStatsJson,
  rateJson,
  tokenJson,
  userStatsJson,
  utilizationJson,
} from '../serializers';

function loanAssetOf(token: string | undefined): LoanAsset {
  return token === undefined ? NATIVE_ASSET : { kind: 'TOKEN', contract: token };
}

export function createLedgerRoutes(ledger: LendingLedger): Router {
  const router = Router();
  const registry: LoanRegistry = ledger.registry;

  router.get('/users/:principal/stats', async (req: Request, res: Response) => {
    try {
      const { principal } = req.params;
      res.json(userStatsJson(principal, registry.getUserStats(principal)));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /assets/utilization?token=
   * Native currency when no token is given
   */
  router.get('/assets/utilization', async (req: Request, res: Response) => {
    try {
      const asset = loanAssetOf(AssetQuerySchema.parse(req.query).token);
      res.json(utilizationJson(registry.getAssetUtilization(asset), registry.getUtilizationRate(asset)));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/assets/tokens', async (_req: Request, res: Response) => {
    res.json({ tokens: ledger.listTokens().map(tokenJson) });
  });

  router.get('/assets/collections', async (_req: Request, res: Response) => {
    res.json({ collections: ledger.listCollections().map(collectionJson) });
  });

  /**
   * GET /rates/dynamic?user=&token=&collateralRatioBps=
   */
  router.get('/rates/dynamic', async (req: Request, res: Response) => {
    try {
      const query = DynamicRateQuerySchema.parse(req.query);
      res.json(rateJson(registry.getDynamicRate(query.user, loanAssetOf(query.token), query.collateralRatioBps)));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/platform/stats', async (_req: Request, res: Response) => {
    try {
      res.json(platformStatsJson(registry.getPlatformStats()));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
