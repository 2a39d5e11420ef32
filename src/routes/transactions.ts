import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { TransactionRecord } from '@shared/blockchain.js';
import { sendError } from './error-response.js';
import { errorResponseSchema, transactionInputSchema, transactionRecordSchema } from './schemas.js';

interface SubmitTransactionRequest {
  Body: TransactionRecord;
}

interface SendRequest {
  Body: {
    receiverAddress: string;
    amount: number;
  };
}

const submissionResponseSchema = {
  type: 'object',
  properties: {
    accepted: { type: 'boolean' },
    transactionId: { type: 'string' },
    offender: { ...transactionInputSchema, nullable: true },
    error: { type: 'string' }
  }
} as const;

export async function transactionRoutes(fastify: FastifyInstance) {
  const ledgerService = fastify.ledgerService;

  // POST /transactions - Admit a transaction received from another node
  fastify.post<SubmitTransactionRequest>('/transactions', {
    schema: {
      tags: ['Transactions'],
      summary: 'Submit a signed transaction',
      description: 'Verify a transaction record (signature and inputs) and add it to the pending pool',
      body: transactionRecordSchema,
      response: {
        202: submissionResponseSchema,
        400: errorResponseSchema,
        409: submissionResponseSchema,
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<SubmitTransactionRequest>, reply: FastifyReply) => {
    try {
      const result = await ledgerService.submitTransaction(request.body);
      return reply.status(result.accepted ? 202 : 409).send(result);
    } catch (error) {
      return sendError(fastify, reply, error, {
        operation: 'submit_transaction',
        transactionId: request.body.transaction_id,
        additionalData: { endpoint: 'POST /transactions' }
      });
    }
  });

  // POST /transactions/send - Pay from the node wallet
  fastify.post<SendRequest>('/transactions/send', {
    schema: {
      tags: ['Transactions'],
      summary: 'Send coins from the node wallet',
      description: 'Build, sign and pool a payment funded by the wallet\'s unspent outputs; surplus returns as change',
      body: {
        type: 'object',
        required: ['receiverAddress', 'amount'],
        properties: {
          receiverAddress: { type: 'string', minLength: 1 },
          amount: { type: 'number', exclusiveMinimum: 0 }
        }
      },
      response: {
        201: {
          type: 'object',
          properties: {
            transactionId: { type: 'string' },
            transaction: transactionRecordSchema
          }
        },
        400: errorResponseSchema,
        409: errorResponseSchema,
        422: errorResponseSchema,
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<SendRequest>, reply: FastifyReply) => {
    try {
      const transaction = await ledgerService.send(request.body.receiverAddress, request.body.amount);
      return reply.status(201).send({
        transactionId: transaction.transactionId,
        transaction: transaction.toRecord()
      });
    } catch (error) {
      return sendError(fastify, reply, error, {
        operation: 'send_payment',
        additionalData: { endpoint: 'POST /transactions/send', amount: request.body.amount }
      });
    }
  });

  // POST /transactions/genesis - Fund the node wallet in the genesis block
  fastify.post<{ Body: { amount: number } }>('/transactions/genesis', {
    schema: {
      tags: ['Transactions'],
      summary: 'Allocate genesis funds',
      description: 'Pool an input-less transaction paying the node wallet; accepted only before the first block',
      body: {
        type: 'object',
        required: ['amount'],
        properties: {
          amount: { type: 'number', exclusiveMinimum: 0 }
        }
      },
      response: {
        201: {
          type: 'object',
          properties: {
            transactionId: { type: 'string' },
            transaction: transactionRecordSchema
          }
        },
        400: errorResponseSchema,
        409: errorResponseSchema,
        503: errorResponseSchema
      }
    }
  }, async (request, reply) => {
    try {
      const transaction = await ledgerService.allocateGenesis(request.body.amount);
      return reply.status(201).send({
        transactionId: transaction.transactionId,
        transaction: transaction.toRecord()
      });
    } catch (error) {
      return sendError(fastify, reply, error, {
        operation: 'allocate_genesis',
        additionalData: { endpoint: 'POST /transactions/genesis', amount: request.body.amount }
      });
    }
  });

  // GET /transactions/pending - Transactions waiting for a block
  fastify.get('/transactions/pending', {
    schema: {
      tags: ['Transactions'],
      summary: 'List pending transactions',
      response: {
        200: {
          type: 'object',
          properties: {
            count: { type: 'integer' },
            transactions: { type: 'array', items: transactionRecordSchema }
          }
        }
      }
    }
  }, async () => {
    const transactions = ledgerService.listPending();
    return { count: transactions.length, transactions };
  });
}
