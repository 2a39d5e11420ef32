import Fastify, { type FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { LedgerStore } from '@shared/blockchain.js';
import type { AppConfig } from '@config/app.config.js';
import { loggerOptions } from '@config/logger.js';
import { swaggerOptions, swaggerUiOptions } from '@config/swagger.config.js';
import { registerRoutes } from '@routes/index.js';
import type { ConcurrencyManager } from '@services/concurrency-manager.js';
import type { ErrorHandler } from '@services/error-handler.js';
import type { LedgerService } from '@services/ledger-service.js';

export interface AppDependencies {
  config: AppConfig;
  ledgerService: LedgerService;
  ledgerStore: LedgerStore;
  concurrencyManager: ConcurrencyManager;
  errorHandler: ErrorHandler;
  // Serve the OpenAPI document and UI under /docs
  documentation?: boolean;
}

/**
 * Build the HTTP surface of the node: register its services and routes on a
 * new Fastify instance. Listening is left to the caller.
 */
export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: loggerOptions({ level: deps.config.logLevel, environment: deps.config.environment })
  });

  fastify.decorate('ledgerService', deps.ledgerService);
  fastify.decorate('ledgerStore', deps.ledgerStore);
  fastify.decorate('services', {
    concurrencyManager: deps.concurrencyManager,
    errorHandler: deps.errorHandler
  });

  // Register Swagger documentation first
  if (deps.documentation ?? true) {
    await fastify.register(swagger, swaggerOptions);
    await fastify.register(swaggerUi, swaggerUiOptions);
  }

  await registerRoutes(fastify);
  return fastify;
}
