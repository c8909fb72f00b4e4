/**
 * Lending Ledger - Authentication Middleware
 *
 * Admin routes need the API key. Every route that acts for someone reads the
 * caller from x-principal-id; authenticating that identity is left to the
 * gateway in front of this service.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Principal } from '../../shared/types';
import { RequestError } from '../errors';

export const PRINCIPAL_HEADER = 'x-principal-id';

export function createAdminAuthMiddleware(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = req.header('x-api-key');

    if (!expectedKey) {
      console.error('[Auth] ADMIN_API_KEY not configured');
      res.status(500).json({ error: 'Server misconfiguration' });
      return;
    }

    if (!apiKey) {
      res.status(401).json({ error: 'Missing API key' });
      return;
    }

    if (apiKey !== expectedKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}

/**
 * Caller principal, or a 401
 */
export function callerOf(req: Request): Principal {
  const principal = req.header(PRINCIPAL_HEADER)?.trim();
  if (!principal) {
    throw new RequestError(401, `Missing ${PRINCIPAL_HEADER} header`);
  }
  return principal;
}
