/**
 * Lending Ledger - Main Entry Point
 * Peer-to-peer loans against native, token and collectible collateral
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadConfig } from './config';
import {
  closePool,
  getPool,
  isMockMode,
  LedgerPersistence,
  LedgerRepository,
  pgDatabase,
  testConnection,
} from './database';
import { LendingLedger } from './core/ledger';
import { BlockClock } from './core/clock/clock';
import { DeferredExternalAssetHook, InMemoryCustody } from './core/custody';
import { createApp } from './api';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  LENDING LEDGER');
  console.log('  Peer-to-peer loans, collateralized');
  console.log('='.repeat(60));

  const config = loadConfig();

  // Test database connection
  console.log('\n[Boot] Testing database connection...');
  const dbConnected = await testConnection(config.databaseUrl);
  if (!dbConnected) {
    console.error('[Boot] FATAL: Database connection failed');
    process.exit(1);
  }

  const pool = getPool(config.databaseUrl);
  const repository = pool ? new LedgerRepository(pgDatabase(pool)) : null;
  if (isMockMode()) {
    console.warn('[Boot] No database: ledger state is lost on restart');
  }

  // Restore state
  const restored = repository ? await repository.load() : null;
  const snapshot = restored?.snapshot ?? null;
  console.log(
    snapshot
      ? `[Boot] Restored ${snapshot.loans.length} loans (counter ${snapshot.loanCounter})`
      : '[Boot] Starting with an empty ledger'
  );

  // Custody adapters: balances come back with the ledger so restored loans
  // can still release their collateral
  console.log('[Boot] Initializing custody adapters...');
  const custody = new InMemoryCustody(restored?.balances ?? []);
  const clock = new BlockClock(config.genesis, config.blockIntervalMs);

  const ledger = new LendingLedger({
    accounts: { owner: config.platformOwner, custody: config.custodyPrincipal },
    clock,
    transfers: custody,
    externalAssets: new DeferredExternalAssetHook(),
    params: config.platform,
    snapshot,
  });

  const persistence = repository
    ? new LedgerPersistence(repository, () => ({ snapshot: ledger.snapshot(), balances: custody.entries() }))
    : null;
  const afterCommit = async (): Promise<void> => {
    if (persistence) await persistence.persist();
  };

  console.log('[Boot] Configuring Express server...');
  const app = createApp({
    ledger,
    adminApiKey: config.adminApiKey,
    afterCommit,
    // Development only: the in-memory custody starts empty
    faucet: (principal, amount) => custody.credit(principal, amount),
  });

  const server = app.listen(config.port, () => {
    console.log(`\n[Boot] Server listening on port ${config.port}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${config.port}/health`);
    console.log(`  - Loans: http://localhost:${config.port}/loans`);
    console.log(`  - Admin: http://localhost:${config.port}/admin/*`);
    console.log(`[Boot] Block height ${clock.now()}, owner ${config.platformOwner}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
    });

    await closePool();

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  console.log('\n[Boot] LENDING LEDGER ONLINE');
}

bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
