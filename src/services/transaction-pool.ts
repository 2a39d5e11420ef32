import type { TransactionInput } from '@shared/blockchain.js';
import type { FinalizedTransaction } from '@ledger/transaction.js';

export type PoolAdmission =
  | { admitted: true }
  | { admitted: false; reason: 'duplicate' }
  | { admitted: false; reason: 'conflict'; offender: TransactionInput; claimedBy: string };

export function inputKey(input: TransactionInput): string {
  return `${input.transaction_id}:${input.block_id}:${input.output_index}`;
}

/**
 * Verified transactions waiting for a block, in arrival order. Each archived
 * output may be claimed by at most one pooled transaction.
 */
export class TransactionPool {
  private readonly pending = new Map<string, FinalizedTransaction>();
  private readonly claims = new Map<string, string>();

  add(transaction: FinalizedTransaction): PoolAdmission {
    if (this.pending.has(transaction.transactionId)) {
      return { admitted: false, reason: 'duplicate' };
    }

    for (const input of transaction.inputs) {
      const claimedBy = this.claims.get(inputKey(input));
      if (claimedBy) {
        return { admitted: false, reason: 'conflict', offender: input, claimedBy };
      }
    }

    this.pending.set(transaction.transactionId, transaction);
    for (const input of transaction.inputs) {
      this.claims.set(inputKey(input), transaction.transactionId);
    }
    return { admitted: true };
  }

  remove(transactionIds: Iterable<string>): void {
    for (const transactionId of transactionIds) {
      const transaction = this.pending.get(transactionId);
      if (!transaction) {
        continue;
      }
      for (const input of transaction.inputs) {
        this.claims.delete(inputKey(input));
      }
      this.pending.delete(transactionId);
    }
  }

  list(): FinalizedTransaction[] {
    return Array.from(this.pending.values());
  }
}
