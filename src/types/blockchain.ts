// Core ledger data models (wire/record form)

export type BlockVersion = string | number;

export interface TransactionInput {
  transaction_id: string;
  block_id: string;
  output_index: number;
  amount: number;
}

export interface TransactionOutput {
  receiver_address: string;
  amount: number;
  spent_transaction_id: string;
}

export interface TransactionUnlock {
  sender_public_key: string;
  signature: string;
}

export interface TransactionRecord {
  transaction_id: string;
  unlock: TransactionUnlock;
  input_count: number;
  inputs: TransactionInput[];
  output_count: number;
  outputs: TransactionOutput[];
}

export interface BlockRecord {
  block_id: string;
  previous_block_id: string;
  timestamp: string;
  data: Record<string, TransactionRecord>;
  version: BlockVersion;
  mining_proof: number;
}

// An unspent output is referenced by the same fields a transaction input carries
export type UnspentOutput = TransactionInput;

export interface OutputLocator {
  transactionId: string;
  blockId: string;
  outputIndex: number;
}

export interface UnspentSelection {
  total: number;
  outputs: UnspentOutput[];
}

// Verification results
export interface TransactionVerification {
  authentic: boolean;
  offender: TransactionInput | null;
}

export type BlockRejectionReason =
  | 'difficulty_not_met'
  | 'block_id_mismatch'
  | 'unknown_version'
  | 'stale_previous_block'
  | 'invalid_transaction';

export interface BlockVerification {
  valid: boolean;
  reason?: BlockRejectionReason;
  hash: string;
}

export interface StoreStatus {
  backend: 'postgres' | 'memory';
  connected: boolean;
  lastError: string | null;
}

/**
 * Persistent registry of archived blocks and of the node wallet's unspent outputs.
 *
 * Selection and spend marking must be atomic with respect to each other: an
 * output handed out by `getUnspentCovering` is reserved and will not be
 * handed out again until it is released.
 */
export interface LedgerStore {
  /**
   * Select and reserve spendable outputs, in store order, until their total covers `amount`.
   * Throws `InsufficientFundsError` without reserving anything when the spendable total is short.
   */
  getUnspentCovering(amount: number): Promise<UnspentSelection>;
  /** Return reserved outputs to the spendable set. */
  releaseOutputs(outputs: UnspentOutput[]): Promise<void>;
  /** Mark an archived output as consumed by `spendingTransactionId`. */
  markSpent(locator: OutputLocator, spendingTransactionId: string): Promise<void>;
  findOutput(locator: OutputLocator): Promise<TransactionOutput | null>;
  appendBlock(block: BlockRecord): Promise<string>;
  getBlock(blockId: string): Promise<BlockRecord | null>;
  getTip(): Promise<string>;
  setTip(blockId: string): Promise<void>;
  getDifficulty(version: BlockVersion): Promise<number>;
  /**
   * Append the block, mark every input it spends, record outputs addressed to
   * the wallet and advance the tip, all or nothing.
   */
  acceptBlock(block: BlockRecord): Promise<string>;
  getBalance(): Promise<number>;
  listUnspent(): Promise<UnspentOutput[]>;
  getStatus(): StoreStatus;
}

// Processing result types
export interface SubmissionResult {
  accepted: boolean;
  transactionId: string;
  offender?: TransactionInput | null;
  error?: string;
}

export interface BlockAcceptanceResult {
  accepted: boolean;
  blockId: string;
  reason?: BlockRejectionReason;
  error?: string;
}
