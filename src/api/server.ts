/**
 * ============================================
 * LENDING LEDGER - API SERVER
 * ============================================
 *
 * API SURFACE:
 * - GET  /health
 * - /loans/*          lifecycle + loan reads (caller: x-principal-id)
 * - /users, /assets, /rates, /platform   ledger reads
 * - /admin/*          owner operations (x-api-key + x-principal-id)
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { LendingLedger } from '../core/ledger';
import { createAdminAuthMiddleware } from './middleware/auth.middleware';
import { CommitHook, createLoanRoutes } from './routes/loans.routes';
import { createLedgerRoutes } from './routes/ledger.routes';
import { createAdminRoutes, Faucet } from './routes/admin.routes';

export interface AppDependencies {
  ledger: LendingLedger;
  adminApiKey: string;
  afterCommit: CommitHook;
  faucet?: Faucet;
  rateLimit?: { windowMs: number; max: number };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(rateLimit({
    windowMs: deps.rateLimit?.windowMs ?? 60 * 1000, // 1 minute
    max: deps.rateLimit?.max ?? 120,                   // per IP per window
    standardHeaders: true,
    legacyHeaders: false,
  }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'OK', service: 'lending-ledger', timestamp: new Date().toISOString() });
  });

  app.use('/loans', createLoanRoutes(deps.ledger.registry, deps.afterCommit));
  app.use('/', createLedgerRoutes(deps.ledger));
  app.use('/admin', createAdminAuthMiddleware(deps.adminApiKey), createAdminRoutes(deps.ledger.admin, deps.afterCommit, deps.faucet));

  // Error handler: body parser failures and anything a route let through
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error('[Error]', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
