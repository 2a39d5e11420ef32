import type { SqlExecutor } from '@database/connection.js';
import { readNumber, readText } from './row-mapping.js';

const TIP_KEY = 'tip';

export class ChainStateRepository {
    constructor(private readonly db: SqlExecutor) { }

    // Empty until the genesis block is accepted
    async getTip(tx: SqlExecutor = this.db): Promise<string> {
        const result = await tx.query('SELECT value FROM chain_state WHERE key = $1', [TIP_KEY]);
        const row = result.rows[0];
        return row ? readText(row, 'value') : '';
    }

    async setTip(blockId: string, tx: SqlExecutor = this.db): Promise<void> {
        await tx.query(
            `INSERT INTO chain_state (key, value) VALUES ($1, $2)
             ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
            [TIP_KEY, blockId]
        );
    }

    async getDifficulty(version: string, tx: SqlExecutor = this.db): Promise<number | null> {
        const result = await tx.query('SELECT difficulty FROM ledger_versions WHERE version = $1', [version]);
        const row = result.rows[0];
        return row ? readNumber(row, 'difficulty') : null;
    }
}
