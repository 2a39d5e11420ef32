import type { Logger } from 'pino';
import type { LedgerStore, TransactionVerification } from '@shared/blockchain.js';
import { logger as rootLogger } from '@config/logger.js';
import { decodeBase64, verifyMessage } from '@ledger/keys.js';
import type { FinalizedTransaction } from '@ledger/transaction.js';

export class TransactionVerifier {
  private readonly log: Logger;

  constructor(private readonly store: LedgerStore, log: Logger = rootLogger) {
    this.log = log.child({ module: 'transaction-verifier' });
  }

  /**
   * Verify a transaction's signature and the right to spend each of its inputs.
   *
   * A bad signature never names an input. With a valid signature the inputs
   * are checked in order (the referenced output exists, is addressed to the
   * signer and is unspent, and the input claims the amount it holds) and the
   * first failure is returned as `offender`.
   */
  async verify(transaction: FinalizedTransaction): Promise<TransactionVerification> {
    if (!this.hasValidSignature(transaction)) {
      this.log.warn({ transactionId: transaction.transactionId }, 'Transaction signature rejected');
      return { authentic: false, offender: null };
    }

    const senderAddress = transaction.senderAddress;
    for (const input of transaction.inputs) {
      const referenced = await this.store.findOutput({
        transactionId: input.transaction_id,
        blockId: input.block_id,
        outputIndex: input.output_index
      });

      const problem = !referenced
        ? 'missing'
        : referenced.receiver_address !== senderAddress
          ? 'foreign'
          : referenced.spent_transaction_id
            ? 'spent'
            : referenced.amount !== input.amount
              ? 'amount_mismatch'
              : null;

      if (problem) {
        this.log.warn(
          { transactionId: transaction.transactionId, input, problem },
          'Transaction input rejected'
        );
        return { authentic: false, offender: input };
      }
    }

    return { authentic: true, offender: null };
  }

  hasValidSignature(transaction: FinalizedTransaction): boolean {
    const { sender_public_key: publicKey, signature } = transaction.unlock;
    let publicKeyBytes: Uint8Array;
    let signatureBytes: Uint8Array;
    try {
      publicKeyBytes = decodeBase64(publicKey);
      signatureBytes = decodeBase64(signature);
    } catch (error) {
      this.log.debug({ transactionId: transaction.transactionId, err: error }, 'Undecodable unlock portion');
      return false;
    }

    return verifyMessage(transaction.signingMessage(), signatureBytes, publicKeyBytes);
  }
}
