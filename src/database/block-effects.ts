import type { BlockRecord, OutputLocator, UnspentOutput } from '@shared/blockchain.js';

export interface SpendEffect {
  locator: OutputLocator;
  spendingTransactionId: string;
}

/**
 * What accepting a block changes in a ledger store: the archived outputs its
 * inputs consume and the outputs it pays to the node wallet.
 */
export interface BlockEffects {
  spends: SpendEffect[];
  walletOutputs: UnspentOutput[];
}

export function blockEffects(block: BlockRecord, walletAddress: string): BlockEffects {
  const spends: SpendEffect[] = [];
  const walletOutputs: UnspentOutput[] = [];

  for (const transaction of Object.values(block.data)) {
    for (const input of transaction.inputs) {
      spends.push({
        locator: {
          transactionId: input.transaction_id,
          blockId: input.block_id,
          outputIndex: input.output_index
        },
        spendingTransactionId: transaction.transaction_id
      });
    }

    transaction.outputs.forEach((output, outputIndex) => {
      if (output.receiver_address === walletAddress) {
        walletOutputs.push({
          transaction_id: transaction.transaction_id,
          block_id: block.block_id,
          output_index: outputIndex,
          amount: output.amount
        });
      }
    });
  }

  return { spends, walletOutputs };
}

export function locatorKey(locator: OutputLocator): string {
  return `${locator.transactionId}:${locator.blockId}:${locator.outputIndex}`;
}

export function locatorOf(output: UnspentOutput): OutputLocator {
  return { transactionId: output.transaction_id, blockId: output.block_id, outputIndex: output.output_index };
}
