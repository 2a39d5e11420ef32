// JSON schemas shared by the route definitions. Request schemas only check
// the outline of a record; record validation and verification happen in the
// ledger service.

export const transactionInputSchema = {
  type: 'object',
  required: ['transaction_id', 'block_id', 'output_index', 'amount'],
  properties: {
    transaction_id: { type: 'string' },
    block_id: { type: 'string' },
    output_index: { type: 'integer', minimum: 0 },
    amount: { type: 'number' }
  }
} as const;

export const transactionOutputSchema = {
  type: 'object',
  required: ['receiver_address', 'amount'],
  properties: {
    receiver_address: { type: 'string' },
    amount: { type: 'number' },
    spent_transaction_id: { type: 'string' }
  }
} as const;

export const transactionRecordSchema = {
  type: 'object',
  required: ['transaction_id', 'unlock', 'input_count', 'inputs', 'output_count', 'outputs'],
  properties: {
    transaction_id: { type: 'string' },
    unlock: {
      type: 'object',
      required: ['sender_public_key', 'signature'],
      properties: {
        sender_public_key: { type: 'string' },
        signature: { type: 'string' }
      }
    },
    input_count: { type: 'integer', minimum: 0 },
    inputs: { type: 'array', items: transactionInputSchema },
    output_count: { type: 'integer', minimum: 0 },
    outputs: { type: 'array', items: transactionOutputSchema }
  }
} as const;

export const blockRecordSchema = {
  type: 'object',
  required: ['block_id', 'previous_block_id', 'timestamp', 'data', 'version', 'mining_proof'],
  properties: {
    block_id: { type: 'string' },
    previous_block_id: { type: 'string' },
    timestamp: { type: 'string' },
    data: { type: 'object', additionalProperties: transactionRecordSchema },
    version: { type: ['string', 'number'] },
    mining_proof: { type: 'integer', minimum: 0 }
  }
} as const;

export const errorResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    error: { type: 'string' },
    type: { type: 'string' }
  }
} as const;
