import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { sendError } from './error-response.js';
import { errorResponseSchema, transactionInputSchema } from './schemas.js';

export async function walletRoutes(fastify: FastifyInstance) {
  const ledgerService = fastify.ledgerService;

  // GET /wallet - Node address and spendable funds
  fastify.get('/wallet', {
    schema: {
      tags: ['Wallet'],
      summary: 'Node wallet',
      description: 'Address of the node wallet, its spendable balance and the outputs that make it up. Outputs reserved by pending payments are not spendable.',
      response: {
        200: {
          type: 'object',
          properties: {
            address: { type: 'string' },
            balance: { type: 'number' },
            unspentOutputs: { type: 'array', items: transactionInputSchema }
          }
        },
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      return reply.send(await ledgerService.getWallet());
    } catch (error) {
      return sendError(fastify, reply, error, { operation: 'get_wallet' });
    }
  });
}
