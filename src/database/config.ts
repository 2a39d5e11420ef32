import type { PoolConfig } from 'pg';

export interface DatabaseConfig {
  url?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

export function createDatabaseConfig(config: DatabaseConfig): PoolConfig {
  const pooling = {
    max: config.maxConnections || 20,
    idleTimeoutMillis: config.idleTimeoutMs || 30000,
    connectionTimeoutMillis: config.connectionTimeoutMs || 2000,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
  };

  if (config.url) {
    return { connectionString: config.url, ...pooling };
  }

  return {
    host: config.host || 'localhost',
    port: config.port || 5432,
    database: config.database || 'pow_ledger',
    user: config.user || 'postgres',
    password: config.password || 'postgres',
    ...pooling,
  };
}

function optionalInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export function getDatabaseConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  return {
    url: env.DATABASE_URL,
    host: env.DB_HOST,
    port: optionalInt(env.DB_PORT),
    database: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    ssl: env.DB_SSL === 'true',
    maxConnections: optionalInt(env.DB_MAX_CONNECTIONS),
    idleTimeoutMs: optionalInt(env.DB_IDLE_TIMEOUT_MS),
    connectionTimeoutMs: optionalInt(env.DB_CONNECTION_TIMEOUT_MS),
  };
}
