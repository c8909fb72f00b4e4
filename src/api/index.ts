/**
 * Lending Ledger - API Module Export
 */

export { createLoanRoutes, CommitHook } from './routes/loans.routes';
export { createLedgerRoutes } from './routes/ledger.routes';
export { createAdminRoutes, Faucet } from './routes/admin.routes';
export { createAdminAuthMiddleware, callerOf, PRINCIPAL_HEADER } from './middleware/auth.middleware';
export { toHttpError, sendError, RequestError, HttpError } from './errors';
export { createApp, AppDependencies } from './server';
