import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExtractTablesWithRelations, sql } from 'drizzle-orm';
import { PgDatabase } from 'drizzle-orm/pg-core';
import {
  drizzle,
  PostgresJsDatabase,
  PostgresJsQueryResultHKT,
} from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';
import { errorMessage } from '../common/utils/error-message';

export type Schema = typeof schema;
export type Database = PostgresJsDatabase<Schema>;
export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

/** Anything queries can run on: the pooled database or an open transaction. */
export type DatabaseExecutor = PgDatabase<
  PostgresJsQueryResultHKT,
  Schema,
  ExtractTablesWithRelations<Schema>
>;

export interface DatabaseHealthStatus {
  isHealthy: boolean;
  connectionCount?: number;
  lastChecked: Date;
  error?: string;
}

export type IsolationLevel = 'read uncommitted' | 'read committed' | 'repeatable read' | 'serializable';

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  accessMode?: 'read write' | 'read only';
  deferrable?: boolean;
  /** Applied with SET LOCAL, so it only bounds lock waits inside this transaction. */
  lockTimeoutMs?: number;
}

interface ConnectionStatsRow {
  total_connections: string;
  active_connections: string;
  idle_connections: string;
}

const HEALTH_CHECK_TIMEOUT_MS = 5000;

/** Bounds lock waits for the rest of the current transaction (SET LOCAL lock_timeout). */
export async function applyLockTimeout(executor: DatabaseExecutor, lockTimeoutMs: number): Promise<void> {
  await executor.execute(sql`select set_config('lock_timeout', ${`${lockTimeoutMs}ms`}, true)`);
}

export async function runInTransaction<T>(
  db: Database,
  callback: (tx: Transaction) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> {
  const { lockTimeoutMs, ...config } = options;

  return db.transaction(async (tx) => {
    if (lockTimeoutMs !== undefined) {
      await applyLockTimeout(tx, lockTimeoutMs);
    }
    return callback(tx);
  }, config);
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private client: postgres.Sql | null = null;
  private database: Database | null = null;
  private isConnected = false;
  private connectionAttempts = 0;
  private readonly maxRetries = 5;
  private readonly retryDelay = 2000; // 2 seconds

  constructor(private configService: ConfigService) {}

  async onModuleInit() {
    await this.connect();
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  get db(): Database {
    if (!this.database) {
      throw new Error('Database is not connected');
    }
    return this.database;
  }

  private async connect(): Promise<void> {
    const connectionString = this.configService.get<string>('DATABASE_URL');

    if (!connectionString) {
      throw new Error('DATABASE_URL is not configured');
    }

    const isDevelopment = this.configService.get<string>('NODE_ENV') === 'development';

    const client = postgres(connectionString, {
      max: this.configService.get<number>('DB_POOL_SIZE', 10),
      idle_timeout: this.configService.get<number>('DB_IDLE_TIMEOUT', 20), // seconds
      connect_timeout: this.configService.get<number>('DB_CONNECT_TIMEOUT', 10), // seconds
      onnotice: isDevelopment ? (notice) => this.logger.debug(notice.message) : undefined,
    });

    this.client = client;
    this.database = drizzle(client, {
      schema,
      logger: isDevelopment,
    });

    await this.testConnection(client);
  }

  private async testConnection(client: postgres.Sql): Promise<void> {
    while (this.connectionAttempts < this.maxRetries) {
      try {
        await client`SELECT 1 as test`;
        this.isConnected = true;
        this.connectionAttempts = 0;
        this.logger.log('Database connected successfully');
        return;
      } catch (error) {
        this.connectionAttempts++;
        this.logger.error(
          `Database connection attempt ${this.connectionAttempts}/${this.maxRetries} failed: ${errorMessage(error)}`,
        );

        if (this.connectionAttempts >= this.maxRetries) {
          throw new Error(`Failed to connect to database after ${this.maxRetries} attempts: ${errorMessage(error)}`);
        }

        await new Promise((resolve) => setTimeout(resolve, this.retryDelay));
      }
    }
  }

  private async disconnect(): Promise<void> {
    if (this.client && this.isConnected) {
      try {
        await this.client.end();
        this.isConnected = false;
        this.logger.log('Database disconnected successfully');
      } catch (error) {
        this.logger.error(`Error disconnecting from database: ${errorMessage(error)}`);
      }
    }
  }

  async healthCheck(): Promise<DatabaseHealthStatus> {
    const lastChecked = new Date();
    const client = this.client;

    if (!client || !this.isConnected) {
      return {
        isHealthy: false,
        lastChecked,
        error: 'Database not connected',
      };
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        client`SELECT 1 as health_check`,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Health check timeout')), HEALTH_CHECK_TIMEOUT_MS);
        }),
      ]);

      return {
        isHealthy: true,
        lastChecked,
        connectionCount: client.options.max,
      };
    } catch (error) {
      this.logger.error(`Database health check failed: ${errorMessage(error)}`);
      return {
        isHealthy: false,
        lastChecked,
        error: errorMessage(error),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  async getConnectionInfo(): Promise<{
    totalConnections: number;
    activeConnections: number;
    idleConnections: number;
  }> {
    if (!this.client) {
      throw new Error('Database is not connected');
    }

    try {
      const [row] = await this.client<ConnectionStatsRow[]>`
        SELECT
          count(*) as total_connections,
          count(*) FILTER (WHERE state = 'active') as active_connections,
          count(*) FILTER (WHERE state = 'idle') as idle_connections
        FROM pg_stat_activity
        WHERE datname = current_database()
      `;

      return {
        totalConnections: parseInt(row.total_connections, 10),
        activeConnections: parseInt(row.active_connections, 10),
        idleConnections: parseInt(row.idle_connections, 10),
      };
    } catch (error) {
      this.logger.error(`Failed to get connection info: ${errorMessage(error)}`);
      throw error;
    }
  }

  async transaction<T>(
    callback: (tx: Transaction) => Promise<T>,
    options: TransactionOptions = {},
  ): Promise<T> {
    try {
      return await runInTransaction(this.db, callback, options);
    } catch (error) {
      this.logger.error(`Transaction failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  isHealthy(): boolean {
    return this.isConnected;
  }
}
