import type { SqlExecutor } from '@database/connection.js';
import type { BlockRecord } from '@shared/blockchain.js';
import { InvalidBlockError, RecordValidationError, StoreUnavailableError } from '@services/errors.js';
import { parseBlockRecord } from '@validation/record-validation.js';

export class BlockRepository {
    constructor(private readonly db: SqlExecutor) { }

    /**
     * Archive a block record as it was mined or received
     * @param block Block record to store
     * @param tx Optional database transaction for atomic operations
     */
    async save(block: BlockRecord, tx: SqlExecutor = this.db): Promise<void> {
        const result = await tx.query(
            `INSERT INTO blocks (block_id, previous_block_id, record)
             VALUES ($1, $2, $3)
             ON CONFLICT (block_id) DO NOTHING`,
            [block.block_id, block.previous_block_id, JSON.stringify(block)]
        );

        if (result.rowCount === 0) {
            throw new InvalidBlockError(`Block ${block.block_id} is already archived`);
        }
    }

    async findById(blockId: string, tx: SqlExecutor = this.db): Promise<BlockRecord | null> {
        const result = await tx.query('SELECT record FROM blocks WHERE block_id = $1', [blockId]);
        const row = result.rows[0];
        if (!row) {
            return null;
        }

        try {
            return parseBlockRecord(row.record);
        } catch (error) {
            if (error instanceof RecordValidationError) {
                throw new StoreUnavailableError(`Archived block ${blockId} is corrupt`, { cause: error });
            }
            throw error;
        }
    }
}
