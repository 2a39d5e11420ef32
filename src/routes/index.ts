import type { FastifyInstance } from 'fastify';
import { blockRoutes } from './blocks.js';
import { transactionRoutes } from './transactions.js';
import { walletRoutes } from './wallet.js';
import { healthRoutes } from './health.js';

export async function registerRoutes(fastify: FastifyInstance) {
  // Service status endpoint
  fastify.get('/', {
    schema: {
      tags: ['Health'],
      summary: 'Service status check',
      description: 'Returns basic service status information',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            service: { type: 'string' },
            address: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' }
          }
        }
      }
    }
  }, async () => {
    return {
      status: 'ok',
      service: 'pow-utxo-ledger',
      address: fastify.ledgerService.address,
      timestamp: new Date().toISOString()
    };
  });

  // Register all API routes
  await fastify.register(blockRoutes);
  await fastify.register(transactionRoutes);
  await fastify.register(walletRoutes);
  await fastify.register(healthRoutes);
}
