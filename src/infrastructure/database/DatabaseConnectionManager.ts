import mysql, { type Pool, type PoolConnection, type ResultSetHeader, type RowDataPacket } from 'mysql2/promise';
import { DatabaseSettings } from '../../config/Configuration.js';
import { PersistenceError } from '../errors/InfrastructureError.js';
import { AppLogger, Logger } from '../logging/Logger.js';

export type SqlValue = string | number | boolean | Date | null;

/**
 * Statement runner, either pooled or bound to one transaction
 */
export interface SqlExecutor {
  query<T extends RowDataPacket>(sql: string, params?: SqlValue[]): Promise<T[]>;
  execute(sql: string, params?: SqlValue[]): Promise<ResultSetHeader>;
}

export interface SqlDatabase extends SqlExecutor {
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  healthCheck(): Promise<boolean>;
}

const SLOW_QUERY_MS = 1000;

/**
 * Database Connection Manager
 * Owns the MySQL connection pool and tracks query metrics
 */
export class DatabaseConnectionManager implements SqlDatabase {
  private pool: Pool | null = null;
  private metrics = {
    totalQueries: 0,
    slowQueries: 0,
    errors: 0,
    activeConnections: 0
  };

  constructor(
    private readonly config: DatabaseSettings,
    private readonly logger: AppLogger = new Logger().child('DB')
  ) {}

  /**
   * Initialize connection pool
   */
  async connect(): Promise<void> {
    this.pool = mysql.createPool({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      connectionLimit: this.config.connectionLimit,
      waitForConnections: true,
      enableKeepAlive: true,
      keepAliveInitialDelay: 0,
      connectTimeout: 10000,
      namedPlaceholders: false
    });

    this.logger.info(`MySQL connection pool created for ${this.config.host}:${this.config.port}/${this.config.database}`);

    if (!(await this.healthCheck())) {
      throw new PersistenceError(`Database ${this.config.database} is not reachable`);
    }
  }

  async query<T extends RowDataPacket>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    return this.withConnection(sql, async connection => {
      const [rows] = await connection.execute<T[]>(sql, params);
      return rows;
    });
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<ResultSetHeader> {
    return this.withConnection(sql, async connection => {
      const [result] = await connection.execute<ResultSetHeader>(sql, params);
      return result;
    });
  }

  /**
   * Run `work` inside BEGIN/COMMIT on a single pooled connection; rolls back on any error
   */
  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const connection = await this.acquire();

    try {
      await connection.beginTransaction();
      const result = await work(this.bind(connection));
      await connection.commit();
      return result;
    } catch (error) {
      await connection.rollback().catch((rollbackError: unknown) => {
        this.logger.error('Rollback failed', rollbackError);
      });
      throw error;
    } finally {
      this.release(connection);
    }
  }

  /**
   * Health check - verify database is accessible
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.query('SELECT 1 AS health');
      return true;
    } catch (error) {
      this.logger.error('Health check failed', error);
      return false;
    }
  }

  getStats(): DatabaseStats {
    return { ...this.metrics };
  }

  /**
   * Disconnect and cleanup
   */
  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.info('MySQL connection pool closed');
    }
  }

  private bind(connection: PoolConnection): SqlExecutor {
    return {
      query: async <T extends RowDataPacket>(sql: string, params: SqlValue[] = []) =>
        this.track(sql, async () => {
          const [rows] = await connection.execute<T[]>(sql, params);
          return rows;
        }),
      execute: async (sql: string, params: SqlValue[] = []) =>
        this.track(sql, async () => {
          const [result] = await connection.execute<ResultSetHeader>(sql, params);
          return result;
        })
    };
  }

  private async withConnection<T>(sql: string, work: (connection: PoolConnection) => Promise<T>): Promise<T> {
    const connection = await this.acquire();
    try {
      return await this.track(sql, () => work(connection));
    } finally {
      this.release(connection);
    }
  }

  private async acquire(): Promise<PoolConnection> {
    if (!this.pool) {
      throw new PersistenceError('Database not connected. Call connect() first.');
    }
    const connection = await this.pool.getConnection();
    this.metrics.activeConnections++;
    return connection;
  }

  private release(connection: PoolConnection): void {
    connection.release();
    this.metrics.activeConnections--;
  }

  private async track<T>(sql: string, run: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    try {
      return await run();
    } catch (error) {
      this.metrics.errors++;
      this.logger.error('Query error', { error, sql: sql.substring(0, 100) });
      throw error;
    } finally {
      const duration = Date.now() - startTime;
      this.metrics.totalQueries++;
      if (duration > SLOW_QUERY_MS) {
        this.metrics.slowQueries++;
        this.logger.warn(`Slow query detected (${duration}ms): ${sql.substring(0, 100)}`);
      }
    }
  }
}

export interface DatabaseStats {
  totalQueries: number;
  slowQueries: number;
  errors: number;
  activeConnections: number;
}
