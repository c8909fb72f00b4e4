/**
 * Lending Ledger - Admin API Routes
 *
 * Mounted behind the API key. The admin service additionally requires the
 * caller (x-principal-id) to be the platform owner.
 */

import { Router, Request, Response } from 'express';
import { Principal } from '../../shared/types';
import { PlatformAdminService } from '../../modules/admin/admin.service';
import { callerOf } from '../middleware/auth.middleware';
import { sendError } from '../errors';
import {
  AddCollectionBodySchema,
  AddTokenBodySchema,
  FaucetBodySchema,
  DynamicRateParamsBodySchema,
  MinCollateralRatioBodySchema,
  PlatformFeeBodySchema,
  UpdateCollectionBodySchema,
} from '../schemas';
import { collectionJson, tokenJson } from '../serializers';
import { CommitHook } from './loans.routes';

/** Mints native balance in a development custody adapter */
export type Faucet = (principal: Principal, amount: bigint) => void;

export function createAdminRoutes(admin: PlatformAdminService, afterCommit: CommitHook, faucet?: Faucet): Router {
  const router = Router();

  /**
   * POST /admin/tokens
   * Register (or re-enable) a token
   */
  router.post('/tokens', async (req: Request, res: Response) => {
    try {
      const { contract, decimals, riskScore } = AddTokenBodySchema.parse(req.body);
      const token = await admin.addSupportedToken(callerOf(req), contract, decimals, riskScore);
      await afterCommit();
      res.status(201).json(tokenJson(token));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * DELETE /admin/tokens/:contract
   * Disables; the record is kept
   */
  router.delete('/tokens/:contract', async (req: Request, res: Response) => {
    try {
      const token = await admin.removeSupportedToken(callerOf(req), req.params.contract);
      await afterCommit();
      res.json(tokenJson(token));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/collections', async (req: Request, res: Response) => {
    try {
      const { collection, floorPrice, riskScore } = AddCollectionBodySchema.parse(req.body);
      const entry = await admin.addSupportedCollection(callerOf(req), collection, floorPrice, riskScore);
      await afterCommit();
      res.status(201).json(collectionJson(entry));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.patch('/collections/:collection', async (req: Request, res: Response) => {
    try {
      const update = UpdateCollectionBodySchema.parse(req.body);
      const entry = await admin.updateCollection(callerOf(req), req.params.collection, update);
      await afterCommit();
      res.json(collectionJson(entry));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.put('/settings/fee', async (req: Request, res: Response) => {
    try {
      const { feeBps } = PlatformFeeBodySchema.parse(req.body);
      const params = await admin.setPlatformFee(callerOf(req), feeBps);
      await afterCommit();
      res.json({ params });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.put('/settings/min-collateral-ratio', async (req: Request, res: Response) => {
    try {
      const { ratioBps } = MinCollateralRatioBodySchema.parse(req.body);
      const params = await admin.setMinCollateralRatio(callerOf(req), ratioBps);
      await afterCommit();
      res.json({ params });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.put('/settings/rates', async (req: Request, res: Response) => {
    try {
      const rates = DynamicRateParamsBodySchema.parse(req.body);
      const params = await admin.setDynamicRateParams(callerOf(req), rates);
      await afterCommit();
      res.json({ params });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /admin/faucet
   * Credit native balance; only when the custody adapter supports it
   */
  router.post('/faucet', async (req: Request, res: Response) => {
    try {
      if (!faucet) {
        res.status(404).json({ error: 'Faucet not available' });
        return;
      }
      const { principal, amount } = FaucetBodySchema.parse(req.body);
      faucet(principal, amount);
      await afterCommit();
      console.log(`[Admin] Faucet credited ${amount} to ${principal}`);
      res.json({ principal, credited: amount.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
