import type { OutputLocator, TransactionInput } from '@shared/blockchain.js';

export enum ErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_BLOCK = 'INVALID_BLOCK',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  CONCURRENCY_ERROR = 'CONCURRENCY_ERROR',
  SYSTEM_ERROR = 'SYSTEM_ERROR'
}

export abstract class LedgerError extends Error {
  abstract readonly type: ErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidAmountError extends LedgerError {
  readonly type = ErrorType.VALIDATION_ERROR;

  constructor(readonly amount: number) {
    super(`Amount must be a positive number with at most 8 decimals, got ${amount}`);
  }
}

export class RecordValidationError extends LedgerError {
  readonly type = ErrorType.VALIDATION_ERROR;

  constructor(readonly errors: string[]) {
    super(`Record validation failed: ${errors.join(', ')}`);
  }
}

export class TransactionFinalizedError extends LedgerError {
  readonly type = ErrorType.VALIDATION_ERROR;

  constructor(readonly transactionId: string) {
    super(`Transaction ${transactionId} is finalized and can no longer be modified`);
  }
}

export class InsufficientFundsError extends LedgerError {
  readonly type = ErrorType.INSUFFICIENT_FUNDS;

  constructor(readonly requested: number, readonly available: number) {
    super(`Insufficient funds: ${available} available < ${requested} requested`);
  }
}

export class InvalidSignatureError extends LedgerError {
  readonly type = ErrorType.INVALID_SIGNATURE;

  constructor(readonly transactionId: string) {
    super(`Transaction ${transactionId} has an invalid signature`);
  }
}

export class InvalidInputError extends LedgerError {
  readonly type = ErrorType.INVALID_INPUT;

  constructor(readonly transactionId: string, readonly offender: TransactionInput) {
    super(
      `Transaction ${transactionId} uses an invalid input: ` +
      `${offender.transaction_id}/${offender.block_id}/${offender.output_index}`
    );
  }
}

export class TransactionRuleError extends LedgerError {
  readonly type = ErrorType.VALIDATION_ERROR;

  constructor(readonly transactionId: string, readonly problem: string) {
    super(`Transaction ${transactionId} rejected: ${problem}`);
  }
}

export class DuplicateTransactionError extends LedgerError {
  readonly type = ErrorType.CONCURRENCY_ERROR;

  constructor(readonly transactionId: string) {
    super(`Transaction ${transactionId} is already pending`);
  }
}

export class InvalidBlockError extends LedgerError {
  readonly type = ErrorType.INVALID_BLOCK;
}

export class UnknownVersionError extends LedgerError {
  readonly type = ErrorType.VALIDATION_ERROR;

  constructor(readonly version: string | number) {
    super(`Unknown ledger version: ${version}`);
  }
}

export class StoreUnavailableError extends LedgerError {
  readonly type = ErrorType.STORE_UNAVAILABLE;
}

export class MiningInProgressError extends LedgerError {
  readonly type = ErrorType.CONCURRENCY_ERROR;

  constructor() {
    super('A mining attempt is already in progress');
  }
}

export class OutputUnavailableError extends LedgerError {
  readonly type = ErrorType.INVALID_INPUT;

  constructor(readonly locator: OutputLocator) {
    super(
      `Output ${locator.transactionId}/${locator.blockId}/${locator.outputIndex} ` +
      'does not exist or is already spent'
    );
  }
}
