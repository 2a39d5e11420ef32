import type { SqlExecutor } from '@database/connection.js';
import type { OutputLocator, UnspentOutput, UnspentSelection } from '@shared/blockchain.js';
import { takeCovering } from '@ledger/amounts.js';
import { InsufficientFundsError } from '@services/errors.js';
import { readNumber, readText } from './row-mapping.js';

function toUnspentOutput(row: Record<string, unknown>): UnspentOutput {
    return {
        transaction_id: readText(row, 'transaction_id'),
        block_id: readText(row, 'block_id'),
        output_index: readNumber(row, 'output_index'),
        amount: readNumber(row, 'amount')
    };
}

/**
 * Outputs the node wallet can spend. A reserved output has been handed to a
 * transaction that is not yet in a block.
 */
export class UnspentOutputRepository {
    constructor(private readonly db: SqlExecutor) { }

    /**
     * Lock the spendable outputs, take them in insertion order until they
     * cover `amount` and reserve the ones taken. Must run inside a database
     * transaction for the row locks to hold.
     * @throws InsufficientFundsError when the spendable total is short; nothing is reserved
     */
    async reserveCovering(amount: number, tx: SqlExecutor): Promise<UnspentSelection> {
        const result = await tx.query(
            `SELECT id, transaction_id, block_id, output_index, amount
             FROM unspent_outputs
             WHERE reserved = false
             ORDER BY id
             FOR UPDATE`
        );

        const rows = result.rows.map(row => ({ id: readNumber(row, 'id'), output: toUnspentOutput(row) }));
        const { taken, total, covered } = takeCovering(rows, amount, row => row.output.amount);
        if (!covered) {
            throw new InsufficientFundsError(amount, total);
        }

        await tx.query('UPDATE unspent_outputs SET reserved = true WHERE id = ANY($1::int[])', [taken.map(row => row.id)]);
        return { total, outputs: taken.map(row => row.output) };
    }

    async release(outputs: UnspentOutput[], tx: SqlExecutor = this.db): Promise<void> {
        for (const output of outputs) {
            await tx.query(
                `UPDATE unspent_outputs SET reserved = false
                 WHERE transaction_id = $1 AND block_id = $2 AND output_index = $3`,
                [output.transaction_id, output.block_id, output.output_index]
            );
        }
    }

    async add(output: UnspentOutput, tx: SqlExecutor = this.db): Promise<void> {
        await tx.query(
            `INSERT INTO unspent_outputs (transaction_id, block_id, output_index, amount)
             VALUES ($1, $2, $3, $4)
             ON CONFLICT (transaction_id, block_id, output_index) DO NOTHING`,
            [output.transaction_id, output.block_id, output.output_index, output.amount]
        );
    }

    async remove(locator: OutputLocator, tx: SqlExecutor = this.db): Promise<void> {
        await tx.query(
            `DELETE FROM unspent_outputs
             WHERE transaction_id = $1 AND block_id = $2 AND output_index = $3`,
            [locator.transactionId, locator.blockId, locator.outputIndex]
        );
    }

    async listSpendable(tx: SqlExecutor = this.db): Promise<UnspentOutput[]> {
        const result = await tx.query(
            `SELECT transaction_id, block_id, output_index, amount
             FROM unspent_outputs
             WHERE reserved = false
             ORDER BY id`
        );
        return result.rows.map(toUnspentOutput);
    }

    async getSpendableBalance(tx: SqlExecutor = this.db): Promise<number> {
        const result = await tx.query(
            'SELECT COALESCE(SUM(amount), 0) AS balance FROM unspent_outputs WHERE reserved = false'
        );
        const row = result.rows[0];
        return row ? readNumber(row, 'balance') : 0;
    }
}
