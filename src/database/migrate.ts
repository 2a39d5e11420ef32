import type { LedgerSettings } from '@config/ledger.config.js';
import type { SqlExecutor } from './connection.js';

const SCHEMA_SQL = `
-- Archived blocks, stored whole as received or mined
CREATE TABLE IF NOT EXISTS blocks (
  block_id TEXT PRIMARY KEY,
  previous_block_id TEXT NOT NULL,
  record JSONB NOT NULL,
  created_at TIMESTAMP DEFAULT NOW()
);

-- Every output of every archived transaction, with its spend marker
CREATE TABLE IF NOT EXISTS transaction_outputs (
  transaction_id TEXT NOT NULL,
  block_id TEXT NOT NULL REFERENCES blocks(block_id) ON DELETE CASCADE,
  output_index INTEGER NOT NULL,
  receiver_address TEXT NOT NULL,
  amount NUMERIC(20, 8) NOT NULL,
  spent_transaction_id TEXT NOT NULL DEFAULT '',
  PRIMARY KEY (transaction_id, block_id, output_index)
);

-- Outputs the node wallet may spend; selection order is insertion order
CREATE TABLE IF NOT EXISTS unspent_outputs (
  id SERIAL PRIMARY KEY,
  transaction_id TEXT NOT NULL,
  block_id TEXT NOT NULL,
  output_index INTEGER NOT NULL,
  amount NUMERIC(20, 8) NOT NULL,
  reserved BOOLEAN NOT NULL DEFAULT FALSE,
  UNIQUE (transaction_id, block_id, output_index)
);

CREATE TABLE IF NOT EXISTS chain_state (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS ledger_versions (
  version TEXT PRIMARY KEY,
  difficulty INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_blocks_previous ON blocks(previous_block_id);
CREATE INDEX IF NOT EXISTS idx_transaction_outputs_block ON transaction_outputs(block_id);
CREATE INDEX IF NOT EXISTS idx_unspent_outputs_reserved ON unspent_outputs(reserved);
`;

/**
 * Create the ledger schema and sync the version table with the ledger file.
 */
export async function runMigrations(db: SqlExecutor, settings: LedgerSettings): Promise<void> {
  await db.query(SCHEMA_SQL);

  for (const [version, difficulty] of Object.entries(settings.versions)) {
    await db.query(
      `INSERT INTO ledger_versions (version, difficulty) VALUES ($1, $2)
       ON CONFLICT (version) DO UPDATE SET difficulty = EXCLUDED.difficulty`,
      [version, difficulty]
    );
  }
}
