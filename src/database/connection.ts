import pg from 'pg';
import type { Pool, PoolClient, PoolConfig } from 'pg';
import type { Logger } from 'pino';
import { logger as rootLogger } from '@config/logger.js';

export interface SqlResult {
    rows: Record<string, unknown>[];
    rowCount: number | null;
}

// Anything that runs a parameterised statement: the pool or an open transaction
export interface SqlExecutor {
    query(text: string, params?: unknown[]): Promise<SqlResult>;
}

export class DatabaseConnection implements SqlExecutor {
    private pool: Pool;

    constructor(config: PoolConfig, log: Logger = rootLogger) {
        this.pool = new pg.Pool(config);

        // An idle client dropping must not take the process down
        this.pool.on('error', (err: Error) => {
            log.error({ err }, 'Unexpected error on idle database client');
        });
    }

    public getPool(): Pool {
        return this.pool;
    }

    public async getClient(): Promise<PoolClient> {
        return await this.pool.connect();
    }

    public async query(text: string, params?: unknown[]): Promise<SqlResult> {
        return await this.pool.query(text, params);
    }

    public async close(): Promise<void> {
        await this.pool.end();
    }
}

// Database transaction wrapper for atomic operations
export class DatabaseTransaction implements SqlExecutor {
    private client: PoolClient;
    private isCommitted: boolean = false;
    private isRolledBack: boolean = false;

    constructor(client: PoolClient) {
        this.client = client;
    }

    public static async begin(db: DatabaseConnection): Promise<DatabaseTransaction> {
        const client = await db.getClient();
        try {
            await client.query('BEGIN');
        } catch (error) {
            client.release();
            throw error;
        }
        return new DatabaseTransaction(client);
    }

    public async query(text: string, params?: unknown[]): Promise<SqlResult> {
        if (this.isCommitted || this.isRolledBack) {
            throw new Error('Cannot execute query on completed transaction');
        }
        return await this.client.query(text, params);
    }

    public async commit(): Promise<void> {
        if (this.isCommitted || this.isRolledBack) {
            throw new Error('Transaction already completed');
        }

        try {
            await this.client.query('COMMIT');
            this.isCommitted = true;
        } finally {
            this.client.release();
        }
    }

    public async rollback(): Promise<void> {
        if (this.isCommitted || this.isRolledBack) {
            throw new Error('Transaction already completed');
        }

        try {
            await this.client.query('ROLLBACK');
            this.isRolledBack = true;
        } finally {
            this.client.release();
        }
    }
}

// Utility function for running operations within a transaction
export async function withTransaction<T>(
    db: DatabaseConnection,
    operation: (tx: DatabaseTransaction) => Promise<T>
): Promise<T> {
    const tx = await DatabaseTransaction.begin(db);

    try {
        const result = await operation(tx);
        await tx.commit();
        return result;
    } catch (error) {
        await tx.rollback();
        throw error;
    }
}

/**
 * What the PostgreSQL ledger store needs from its database: plain queries,
 * atomic units of work and a connection status for health reporting.
 */
export interface LedgerDatabase extends SqlExecutor {
    transaction<T>(operation: (tx: SqlExecutor) => Promise<T>): Promise<T>;
    getStatus(): { connected: boolean; lastError: string | null };
}
