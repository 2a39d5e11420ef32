import type { Logger } from 'pino';
import type { AppConfig } from '@config/app.config.js';
import type { LedgerSettings } from '@config/ledger.config.js';
import { logger as rootLogger } from '@config/logger.js';
import {
  DatabaseConnection,
  withTransaction,
  type LedgerDatabase,
  type SqlExecutor,
  type SqlResult
} from '@database/connection.js';
import { createDatabaseConfig, getDatabaseConfigFromEnv } from '@database/config.js';
import { runMigrations } from '@database/migrate.js';
import { errorHandler } from './error-handler.js';
import { StoreUnavailableError } from './errors.js';

export interface DatabaseStatus {
  connected: boolean;
  lastAttempt: Date | null;
  lastSuccess: Date | null;
  lastError: string | null;
  connectionAttempts: number;
  migrationStatus: 'pending' | 'running' | 'completed' | 'failed';
}

export interface DatabaseManagerConfig {
  maxReconnectAttempts: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  reconnectBackoffMultiplier: number;
  healthCheckIntervalMs: number;
  connectionTimeoutMs: number;
}

const DEFAULT_DB_MANAGER_CONFIG: DatabaseManagerConfig = {
  maxReconnectAttempts: -1, // Infinite retries
  reconnectBaseDelayMs: 1000,
  reconnectMaxDelayMs: 30000,
  reconnectBackoffMultiplier: 1.5,
  healthCheckIntervalMs: 30000,
  connectionTimeoutMs: 10000
};

const MAX_IMMEDIATE_RETRIES = 3;

export type ConnectionFactory = (databaseUrl: string) => DatabaseConnection;

/**
 * Owns the PostgreSQL pool: connects (and migrates) in the background,
 * reconnects with exponential backoff when the pool reports errors and
 * answers queries for the ledger store. Queries made while the database is
 * unreachable fail with `StoreUnavailableError`.
 */
export class DatabaseManager implements LedgerDatabase {
  private db: DatabaseConnection | null = null;
  private managerConfig: DatabaseManagerConfig;
  private status: DatabaseStatus;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private isShuttingDown = false;
  private connectionPromise: Promise<DatabaseConnection> | null = null;
  private reconnectAttempts = 0;
  private readonly log: Logger;
  private readonly connect: ConnectionFactory;

  constructor(
    private readonly config: AppConfig,
    private readonly settings: LedgerSettings,
    options: { log?: Logger; managerConfig?: Partial<DatabaseManagerConfig>; connect?: ConnectionFactory } = {}
  ) {
    this.managerConfig = { ...DEFAULT_DB_MANAGER_CONFIG, ...options.managerConfig };
    this.log = (options.log ?? rootLogger).child({ module: 'database-manager' });
    this.connect = options.connect ?? (url => new DatabaseConnection(
      createDatabaseConfig({ ...getDatabaseConfigFromEnv(), url }),
      this.log
    ));
    this.status = {
      connected: false,
      lastAttempt: null,
      lastSuccess: null,
      lastError: null,
      connectionAttempts: 0,
      migrationStatus: 'pending'
    };
  }

  getStatus(): DatabaseStatus {
    return { ...this.status };
  }

  isConnected(): boolean {
    return this.status.connected && this.db !== null;
  }

  async query(text: string, params?: unknown[]): Promise<SqlResult> {
    const db = await this.getConnectionWithRetry();
    return db.query(text, params);
  }

  async transaction<T>(operation: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const db = await this.getConnectionWithRetry();
    return withTransaction(db, operation);
  }

  // Resolves once connected; concurrent callers share one attempt
  async getConnectionWithRetry(): Promise<DatabaseConnection> {
    if (this.isConnected() && this.db) {
      return this.db;
    }

    if (!this.connectionPromise) {
      this.connectionPromise = this.connectWithRetry();
    }

    try {
      const connection = await this.connectionPromise;
      this.connectionPromise = null;
      return connection;
    } catch (error) {
      this.connectionPromise = null;
      if (!this.isShuttingDown) {
        this.scheduleReconnect();
      }
      throw new StoreUnavailableError('Database connection not available. Please try again later.', { cause: error });
    }
  }

  // Initialize database manager (non-blocking)
  initialize(): void {
    this.log.info('Initializing database manager (connection will be established in background)');
    this.startConnectionAttempt();
    this.startHealthCheck();
  }

  private startConnectionAttempt(): void {
    if (this.isShuttingDown || this.connectionPromise) return;

    const attempt = this.connectWithRetry();
    this.connectionPromise = attempt;
    void attempt.then(
      () => {
        this.connectionPromise = null;
      },
      (error: unknown) => {
        this.connectionPromise = null;
        this.log.warn({ err: error }, 'Connection attempt failed, scheduling retry');
        if (!this.isShuttingDown) {
          this.scheduleReconnect();
        }
      }
    );
  }

  private async connectWithRetry(): Promise<DatabaseConnection> {
    let attempt = 0;

    while (!this.isShuttingDown && attempt < MAX_IMMEDIATE_RETRIES) {
      attempt++;
      this.status.connectionAttempts++;
      this.status.lastAttempt = new Date();

      try {
        const db = await this.createConnection();
        await this.migrate(db);

        this.db = db;
        this.status.connected = true;
        this.status.lastSuccess = new Date();
        this.status.lastError = null;
        this.reconnectAttempts = 0;

        this.log.info({ attempt: this.status.connectionAttempts }, 'Database connected');
        this.setupConnectionMonitoring(db);
        return db;
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.status.lastError = errorMessage;
        this.status.connected = false;

        errorHandler.createStructuredError(error, {
          operation: 'database_connection',
          additionalData: {
            attempt: this.status.connectionAttempts,
            databaseUrl: this.config.databaseUrl.replace(/:[^:@]*@/, ':***@') // Hide password
          }
        });

        if (attempt < MAX_IMMEDIATE_RETRIES && !this.isShuttingDown) {
          await this.sleep(Math.min(1000 * attempt, 5000));
        }
      }
    }

    if (this.isShuttingDown) {
      throw new Error('Database connection aborted due to shutdown');
    }
    throw new Error(`Failed to connect to database after ${MAX_IMMEDIATE_RETRIES} immediate attempts. Last error: ${this.status.lastError}`);
  }

  private async createConnection(): Promise<DatabaseConnection> {
    const db = this.connect(this.config.databaseUrl);
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Database connection timeout')), this.managerConfig.connectionTimeoutMs);
    });

    try {
      await Promise.race([db.query('SELECT 1'), timeout]);
      return db;
    } catch (error) {
      await db.close().catch((closeError: unknown) => {
        this.log.debug({ err: closeError }, 'Connection cleanup failed');
      });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async migrate(db: DatabaseConnection): Promise<void> {
    this.status.migrationStatus = 'running';
    try {
      await runMigrations(db, this.settings);
      this.status.migrationStatus = 'completed';
    } catch (error) {
      this.status.migrationStatus = 'failed';
      throw new Error(`Database migration failed: ${error instanceof Error ? error.message : 'Unknown error'}`, { cause: error });
    }
  }

  private setupConnectionMonitoring(db: DatabaseConnection): void {
    db.getPool().on('error', (error: Error) => {
      this.handleConnectionLoss(error);
    });
  }

  private handleConnectionLoss(error: Error): void {
    this.log.warn({ err: error }, 'Database connection lost');
    this.status.connected = false;
    this.status.lastError = error.message;

    errorHandler.createStructuredError(error, {
      operation: 'database_connection_lost',
      additionalData: {
        databaseUrl: this.config.databaseUrl.replace(/:[^:@]*@/, ':***@')
      }
    });

    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown || this.reconnectTimer || this.connectionPromise) {
      return;
    }

    if (this.managerConfig.maxReconnectAttempts > 0 &&
      this.reconnectAttempts >= this.managerConfig.maxReconnectAttempts) {
      this.log.error({ maxReconnectAttempts: this.managerConfig.maxReconnectAttempts }, 'Giving up on database reconnection');
      return;
    }

    this.reconnectAttempts++;
    const delay = this.calculateReconnectDelay(this.reconnectAttempts);
    this.log.info({ attempt: this.reconnectAttempts, delay }, 'Scheduling database reconnection');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.startConnectionAttempt();
    }, delay);
  }

  private startHealthCheck(): void {
    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
    }

    this.healthCheckTimer = setInterval(() => {
      void this.performHealthCheck();
    }, this.managerConfig.healthCheckIntervalMs);
  }

  private async performHealthCheck(): Promise<void> {
    if (this.isShuttingDown || !this.db) {
      return;
    }

    try {
      await this.db.query('SELECT 1');
      if (!this.status.connected) {
        this.status.connected = true;
        this.status.lastSuccess = new Date();
        this.status.lastError = null;
        this.log.info('Database connection restored');
      }
    } catch (error) {
      if (this.status.connected) {
        this.handleConnectionLoss(error instanceof Error ? error : new Error(String(error)));
      }
    }
  }

  // Exponential backoff capped at reconnectMaxDelayMs
  calculateReconnectDelay(attempt: number): number {
    const delay = this.managerConfig.reconnectBaseDelayMs *
      Math.pow(this.managerConfig.reconnectBackoffMultiplier, attempt - 1);
    return Math.min(delay, this.managerConfig.reconnectMaxDelayMs);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  async shutdown(): Promise<void> {
    this.isShuttingDown = true;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
      this.healthCheckTimer = null;
    }

    if (this.db) {
      try {
        await this.db.close();
        this.log.info('Database connection closed');
      } catch (error) {
        this.log.error({ err: error }, 'Error closing database connection');
      }
      this.db = null;
    }

    this.status.connected = false;
  }
}
