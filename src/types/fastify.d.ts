import type { LedgerStore } from '@shared/blockchain.js';
import type { ConcurrencyManager } from '@services/concurrency-manager.js';
import type { ErrorHandler } from '@services/error-handler.js';
import type { LedgerService } from '@services/ledger-service.js';

export interface NodeServices {
  concurrencyManager: ConcurrencyManager;
  errorHandler: ErrorHandler;
}

declare module 'fastify' {
  interface FastifyInstance {
    ledgerService: LedgerService;
    ledgerStore: LedgerStore;
    services: NodeServices;
  }
}
