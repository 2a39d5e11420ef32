import type { SqlExecutor } from '@database/connection.js';
import type { BlockRecord, OutputLocator, TransactionOutput } from '@shared/blockchain.js';
import { OutputUnavailableError } from '@services/errors.js';
import { readNumber, readText } from './row-mapping.js';

export interface SpentMarker {
    transactionId: string;
    outputIndex: number;
    spentTransactionId: string;
}

/**
 * Every output of every archived transaction. Inputs reference these rows by
 * (transaction id, block id, output index).
 */
export class OutputRepository {
    constructor(private readonly db: SqlExecutor) { }

    /**
     * Record the outputs of every transaction in a block
     * @param block Archived block
     * @param tx Optional database transaction for atomic operations
     */
    async saveBlockOutputs(block: BlockRecord, tx: SqlExecutor = this.db): Promise<void> {
        const query = `
            INSERT INTO transaction_outputs (
                transaction_id,
                block_id,
                output_index,
                receiver_address,
                amount
            ) VALUES ($1, $2, $3, $4, $5)
        `;

        for (const transaction of Object.values(block.data)) {
            for (let i = 0; i < transaction.outputs.length; i++) {
                const output = transaction.outputs[i];
                await tx.query(query, [
                    transaction.transaction_id,
                    block.block_id,
                    i,
                    output.receiver_address,
                    output.amount
                ]);
            }
        }
    }

    async find(locator: OutputLocator, tx: SqlExecutor = this.db): Promise<TransactionOutput | null> {
        const result = await tx.query(
            `SELECT receiver_address, amount, spent_transaction_id
             FROM transaction_outputs
             WHERE transaction_id = $1 AND block_id = $2 AND output_index = $3`,
            [locator.transactionId, locator.blockId, locator.outputIndex]
        );

        const row = result.rows[0];
        if (!row) {
            return null;
        }
        return {
            receiver_address: readText(row, 'receiver_address'),
            amount: readNumber(row, 'amount'),
            spent_transaction_id: readText(row, 'spent_transaction_id')
        };
    }

    /**
     * Mark an output as consumed. Fails when the output does not exist or was
     * already spent.
     */
    async markSpent(locator: OutputLocator, spendingTransactionId: string, tx: SqlExecutor = this.db): Promise<void> {
        const result = await tx.query(
            `UPDATE transaction_outputs
             SET spent_transaction_id = $1
             WHERE transaction_id = $2
               AND block_id = $3
               AND output_index = $4
               AND spent_transaction_id = ''`,
            [spendingTransactionId, locator.transactionId, locator.blockId, locator.outputIndex]
        );

        // Verify that exactly one row was updated
        if (result.rowCount === 0) {
            throw new OutputUnavailableError(locator);
        }
    }

    async findSpentInBlock(blockId: string, tx: SqlExecutor = this.db): Promise<SpentMarker[]> {
        const result = await tx.query(
            `SELECT transaction_id, output_index, spent_transaction_id
             FROM transaction_outputs
             WHERE block_id = $1 AND spent_transaction_id <> ''`,
            [blockId]
        );

        return result.rows.map(row => ({
            transactionId: readText(row, 'transaction_id'),
            outputIndex: readNumber(row, 'output_index'),
            spentTransactionId: readText(row, 'spent_transaction_id')
        }));
    }
}
