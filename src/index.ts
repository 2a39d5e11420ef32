import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { LedgerStore } from '@shared/blockchain.js';
import { loadConfig, type AppConfig } from '@config/app.config.js';
import { loadLedgerSettings, resolveWalletKeys, type LedgerSettings } from '@config/ledger.config.js';
import { createLogger, logger } from '@config/logger.js';
import { MemoryLedgerStore } from '@database/memory-ledger-store.js';
import { PostgresLedgerStore } from '@database/postgres-ledger-store.js';
import { addressOf } from '@ledger/keys.js';
import { concurrencyManager } from '@services/concurrency-manager.js';
import { DatabaseManager } from '@services/database-manager.js';
import { errorHandler } from '@services/error-handler.js';
import { LedgerService } from '@services/ledger-service.js';
import { buildApp } from './app.js';

interface LedgerBackend {
  store: LedgerStore;
  dbManager: DatabaseManager | null;
}

// Database manager tuning from environment
function databaseManagerConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    maxReconnectAttempts: parseInt(env.DB_MAX_RECONNECT_ATTEMPTS || '-1', 10),
    reconnectBaseDelayMs: parseInt(env.DB_RECONNECT_BASE_DELAY_MS || '1000', 10),
    reconnectMaxDelayMs: parseInt(env.DB_RECONNECT_MAX_DELAY_MS || '30000', 10),
    reconnectBackoffMultiplier: parseFloat(env.DB_RECONNECT_BACKOFF_MULTIPLIER || '1.5'),
    healthCheckIntervalMs: parseInt(env.DB_HEALTH_CHECK_INTERVAL_MS || '30000', 10),
    connectionTimeoutMs: parseInt(env.DB_CONNECTION_TIMEOUT_MS || '10000', 10)
  };
}

function createBackend(config: AppConfig, settings: LedgerSettings, walletAddress: string, log: Logger): LedgerBackend {
  if (config.storeBackend === 'memory') {
    log.warn('Using the in-memory ledger store; the ledger is lost on restart');
    return {
      store: new MemoryLedgerStore({ walletAddress, versions: settings.versions, log }),
      dbManager: null
    };
  }

  // Connection attempts continue in the background
  const dbManager = new DatabaseManager(config, settings, { log, managerConfig: databaseManagerConfig() });
  dbManager.initialize();
  return { store: new PostgresLedgerStore(dbManager, walletAddress, log), dbManager };
}

function setupGracefulShutdown(
  fastify: FastifyInstance,
  ledgerService: LedgerService,
  dbManager: DatabaseManager | null,
  log: Logger
) {
  let shuttingDown = false;

  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Starting graceful shutdown');

    try {
      ledgerService.cancelMining();

      // Stop accepting new requests
      await fastify.close();

      // Clear any pending operations
      concurrencyManager.clearQueue();

      if (dbManager) {
        await dbManager.shutdown();
      }

      log.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      log.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    log.fatal({ err: error }, 'Uncaught exception');
    void gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    log.fatal({ reason }, 'Unhandled rejection');
    void gracefulShutdown('unhandledRejection');
  });
}

function setupHealthMonitoring(log: Logger, environment: string) {
  // Periodic error log cleanup
  setInterval(() => {
    errorHandler.clearOldErrors();
  }, 60 * 60 * 1000).unref();

  if (environment === 'development') {
    setInterval(() => {
      const errorStats = errorHandler.getErrorStatistics();
      log.info({
        concurrency: concurrencyManager.getStatus(),
        errors: {
          total: errorStats.totalErrors,
          recent: errorStats.recentErrors,
          lastError: errorStats.lastError?.message
        }
      }, 'System status');
    }, 5 * 60 * 1000).unref();
  }
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const log = createLogger({ level: config.logLevel, environment: config.environment });
  log.info({ environment: config.environment, store: config.storeBackend }, 'Starting ledger node');

  const settings = loadLedgerSettings(config.ledgerConfigPath);
  const keys = resolveWalletKeys(config, log);
  const walletAddress = addressOf(keys.publicKey);

  const { store, dbManager } = createBackend(config, settings, walletAddress, log);
  const ledgerService = new LedgerService({
    store,
    keys,
    currentVersion: settings.currentVersion,
    mining: config.mining,
    log,
    concurrency: concurrencyManager
  });

  const fastify = await buildApp({
    config,
    ledgerService,
    ledgerStore: store,
    concurrencyManager,
    errorHandler
  });

  setupGracefulShutdown(fastify, ledgerService, dbManager, log);
  setupHealthMonitoring(log, config.environment);

  await fastify.listen({ port: config.port, host: config.host });
  log.info(
    { address: walletAddress, docs: `http://${config.host}:${config.port}/docs` },
    'Ledger node started'
  );
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during bootstrap');
  process.exit(1);
});
