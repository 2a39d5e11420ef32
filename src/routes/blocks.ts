import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { BlockRecord } from '@shared/blockchain.js';
import { sendError } from './error-response.js';
import { blockRecordSchema, errorResponseSchema } from './schemas.js';

interface ReceiveBlockRequest {
  Body: BlockRecord;
}

interface BlockByIdRequest {
  Params: { blockId: string };
}

const acceptanceResponseSchema = {
  type: 'object',
  properties: {
    accepted: { type: 'boolean' },
    blockId: { type: 'string' },
    reason: { type: 'string' },
    error: { type: 'string' }
  }
} as const;

const rejectionResponseSchema = {
  type: 'object',
  properties: { ...acceptanceResponseSchema.properties, ...errorResponseSchema.properties }
} as const;

const miningResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['mined', 'stale', 'cancelled', 'exhausted'] },
    attempts: { type: 'integer' },
    blockId: { type: 'string' },
    block: blockRecordSchema
  }
} as const;

// HTTP status per mining outcome
const MINING_STATUS_CODES = {
  mined: 201,
  stale: 409,
  cancelled: 409,
  exhausted: 422
} as const;

export async function blockRoutes(fastify: FastifyInstance) {
  const ledgerService = fastify.ledgerService;

  // POST /blocks/mine - Mine the pending pool onto the current tip
  fastify.post('/blocks/mine', {
    schema: {
      tags: ['Blocks'],
      summary: 'Mine pending transactions',
      description: 'Run the proof-of-work search over every pending transaction and accept the block on success',
      response: {
        201: miningResponseSchema,
        409: {
          type: 'object',
          properties: { ...miningResponseSchema.properties, ...errorResponseSchema.properties }
        },
        422: miningResponseSchema,
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const outcome = await ledgerService.minePending();
      const statusCode = MINING_STATUS_CODES[outcome.status];

      if (outcome.status === 'mined' || outcome.status === 'stale') {
        return reply.status(statusCode).send({
          status: outcome.status,
          attempts: outcome.attempts,
          blockId: outcome.block.blockId,
          block: outcome.block.toRecord()
        });
      }
      return reply.status(statusCode).send({ status: outcome.status, attempts: outcome.attempts });
    } catch (error) {
      return sendError(fastify, reply, error, {
        operation: 'mine_block',
        additionalData: { endpoint: 'POST /blocks/mine' }
      });
    }
  });

  // POST /blocks - Accept a block mined elsewhere
  fastify.post<ReceiveBlockRequest>('/blocks', {
    schema: {
      tags: ['Blocks'],
      summary: 'Submit a mined block',
      description: 'Verify a block (tip linkage, transactions, proof of work) and make it the new chain tip',
      body: blockRecordSchema,
      response: {
        201: acceptanceResponseSchema,
        400: rejectionResponseSchema,
        409: rejectionResponseSchema,
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<ReceiveBlockRequest>, reply: FastifyReply) => {
    try {
      const result = await ledgerService.receiveBlock(request.body);
      if (result.accepted) {
        return reply.status(201).send(result);
      }

      const conflict = result.reason === 'stale_previous_block' || result.reason === 'invalid_transaction';
      return reply.status(conflict ? 409 : 400).send(result);
    } catch (error) {
      return sendError(fastify, reply, error, {
        operation: 'receive_block',
        blockId: request.body.block_id,
        additionalData: { endpoint: 'POST /blocks' }
      });
    }
  });

  // GET /blocks/tip - Current chain tip
  fastify.get('/blocks/tip', {
    schema: {
      tags: ['Blocks'],
      summary: 'Current chain tip',
      description: 'Id of the last accepted block; empty before the genesis block',
      response: {
        200: {
          type: 'object',
          properties: { tip: { type: 'string' } }
        },
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      return reply.send({ tip: await ledgerService.getTip() });
    } catch (error) {
      return sendError(fastify, reply, error, { operation: 'get_tip' });
    }
  });

  // GET /blocks/:blockId - Archived block
  fastify.get<BlockByIdRequest>('/blocks/:blockId', {
    schema: {
      tags: ['Blocks'],
      summary: 'Fetch an archived block',
      params: {
        type: 'object',
        required: ['blockId'],
        properties: { blockId: { type: 'string', minLength: 1 } }
      },
      response: {
        200: blockRecordSchema,
        404: errorResponseSchema,
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<BlockByIdRequest>, reply: FastifyReply) => {
    try {
      const block = await ledgerService.getBlock(request.params.blockId);
      if (!block) {
        return reply.status(404).send({
          success: false,
          error: `Block ${request.params.blockId} not found`
        });
      }
      return reply.send(block);
    } catch (error) {
      return sendError(fastify, reply, error, {
        operation: 'get_block',
        blockId: request.params.blockId
      });
    }
  });
}
