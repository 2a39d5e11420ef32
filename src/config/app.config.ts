/**
 * Application Configuration
 * Centralized configuration management for the ledger node
 */

export type StoreBackend = 'postgres' | 'memory';

export interface MiningConfig {
  // Highest nonce tried before giving up; null searches without a ceiling
  maxNonce: number | null;
  // Nonces hashed between cancellation checks
  checkInterval: number;
}

export interface AppConfig {
  port: number;
  host: string;
  storeBackend: StoreBackend;
  databaseUrl: string;
  logLevel: string;
  environment: string;
  ledgerConfigPath: string;
  walletPrivateKey: string;
  walletPublicKey: string;
  mining: MiningConfig;
}

const VALID_LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
const VALID_ENVIRONMENTS = ['development', 'test', 'production'];

function parseOptionalInteger(value: string | undefined, name: string): number | null {
  if (value === undefined || value === '') {
    return null;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got ${value}`);
  }
  return parsed;
}

/**
 * Load configuration from environment variables with validation
 * @returns AppConfig object with validated configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const storeBackend = env.LEDGER_STORE || 'postgres';
  if (storeBackend !== 'postgres' && storeBackend !== 'memory') {
    throw new Error(`LEDGER_STORE must be one of: postgres, memory`);
  }

  const config: AppConfig = {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || '0.0.0.0',
    storeBackend,
    databaseUrl: env.DATABASE_URL || '',
    logLevel: env.LOG_LEVEL || 'info',
    environment: env.NODE_ENV || 'development',
    ledgerConfigPath: env.LEDGER_CONFIG_PATH || 'config/ledger.json',
    walletPrivateKey: env.WALLET_PRIVATE_KEY || '',
    walletPublicKey: env.WALLET_PUBLIC_KEY || '',
    mining: {
      maxNonce: parseOptionalInteger(env.MINING_MAX_NONCE, 'MINING_MAX_NONCE'),
      checkInterval: parseOptionalInteger(env.MINING_CHECK_INTERVAL, 'MINING_CHECK_INTERVAL') ?? 10000
    }
  };

  if (config.storeBackend === 'postgres' && !config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required when LEDGER_STORE is postgres');
  }

  if (isNaN(config.port) || config.port < 1 || config.port > 65535) {
    throw new Error('PORT must be a valid port number between 1 and 65535');
  }

  if (!VALID_LOG_LEVELS.includes(config.logLevel)) {
    throw new Error(`LOG_LEVEL must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
  }

  if (config.mining.checkInterval < 1) {
    throw new Error('MINING_CHECK_INTERVAL must be at least 1');
  }

  if (!VALID_ENVIRONMENTS.includes(config.environment)) {
    throw new Error(`NODE_ENV must be one of: ${VALID_ENVIRONMENTS.join(', ')}`);
  }

  return config;
}

/**
 * Get default configuration for testing
 * @returns AppConfig object with test defaults
 */
export function getTestConfig(): AppConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    storeBackend: 'memory',
    databaseUrl: '',
    logLevel: 'silent',
    environment: 'test',
    ledgerConfigPath: 'config/ledger.json',
    walletPrivateKey: '',
    walletPublicKey: '',
    mining: {
      maxNonce: null,
      checkInterval: 1000
    }
  };
}
