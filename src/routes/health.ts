import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { StoreStatus } from '@shared/blockchain.js';
import type { ConcurrencyStatus } from '@services/concurrency-manager.js';
import type { ErrorStatistics } from '@services/error-handler.js';

type HealthState = 'healthy' | 'degraded' | 'unhealthy';

interface HealthResponse {
  status: HealthState;
  timestamp: string;
  uptime: number;
  store: StoreStatus;
  concurrency: ConcurrencyStatus & { mining: boolean; pendingTransactions: number };
  errors: Omit<ErrorStatistics, 'lastError'> & { lastError: string | null };
}

export function determineHealth(store: StoreStatus, queueLength: number, recentErrors: number): HealthState {
  if (!store.connected) {
    return 'unhealthy';
  }
  if (recentErrors > 5 || queueLength > 20) {
    return 'degraded';
  }
  return 'healthy';
}

export async function healthRoutes(fastify: FastifyInstance) {
  // GET /health - System health and monitoring endpoint
  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'System health check',
      description: 'Ledger store status, mutation queue, mining state and error statistics',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy'] },
            timestamp: { type: 'string' },
            uptime: { type: 'number' },
            store: {
              type: 'object',
              properties: {
                backend: { type: 'string' },
                connected: { type: 'boolean' },
                lastError: { type: 'string', nullable: true }
              }
            },
            concurrency: {
              type: 'object',
              properties: {
                queueLength: { type: 'integer' },
                isProcessing: { type: 'boolean' },
                mining: { type: 'boolean' },
                pendingTransactions: { type: 'integer' }
              }
            },
            errors: {
              type: 'object',
              properties: {
                totalErrors: { type: 'integer' },
                recentErrors: { type: 'integer' },
                dailyErrors: { type: 'integer' },
                errorsByType: { type: 'object', additionalProperties: { type: 'integer' } },
                errorsBySeverity: { type: 'object', additionalProperties: { type: 'integer' } },
                lastError: { type: 'string', nullable: true }
              }
            }
          }
        }
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const { errorHandler, concurrencyManager } = fastify.services;

    // Clean up old errors periodically
    errorHandler.clearOldErrors();

    const store = fastify.ledgerStore.getStatus();
    const concurrencyStatus = concurrencyManager.getStatus();
    const { lastError, ...errorStats } = errorHandler.getErrorStatistics();

    const healthResponse: HealthResponse = {
      status: determineHealth(store, concurrencyStatus.queueLength, errorStats.recentErrors),
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      store,
      concurrency: {
        ...concurrencyStatus,
        mining: fastify.ledgerService.isMining(),
        pendingTransactions: fastify.ledgerService.listPending().length
      },
      errors: { ...errorStats, lastError: lastError?.message ?? null }
    };

    return reply.status(200).send(healthResponse);
  });
}
