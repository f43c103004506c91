/**
 * DuckDB Client
 *
 * Thin wrapper over an in-process DuckDB instance. The native module is
 * loaded on first use so callers can fall back when it is unavailable.
 */

import { createLogger, errorMessage } from '@racelab/utils';
import type { DuckDBConnection, DuckDBInstance } from '@duckdb/node-api';

const logger = createLogger('@racelab/storage');

/**
 * DuckDB query result type
 */
export interface DuckDBQueryResult {
  columns: string[];
  rows: Record<string, unknown>[];
}

/**
 * Quote a value as a SQL string literal
 */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * DuckDB Client
 * Provides repository-like interface for DuckDB operations
 */
export class DuckDBClient {
  private readonly dbPath: string;
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection | null = null;

  constructor(dbPath: string = ':memory:') {
    this.dbPath = dbPath;
  }

  private async connect(): Promise<DuckDBConnection> {
    if (this.connection) return this.connection;
    const duckdb = await import('@duckdb/node-api');
    const instance = await duckdb.DuckDBInstance.create(this.dbPath);
    this.instance = instance;
    const connection = await instance.connect();
    this.connection = connection;
    return connection;
  }

  /**
   * Execute SQL without reading results
   */
  async execute(sql: string): Promise<void> {
    const trimmedSql = sql.trim();
    if (trimmedSql.length === 0) {
      throw new Error('SQL query is empty');
    }
    const connection = await this.connect();
    try {
      await connection.run(trimmedSql);
    } catch (error) {
      logger.debug('DuckDB SQL execution failed', {
        sql: trimmedSql.substring(0, 200),
        dbPath: this.dbPath,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Run a query and return rows as JSON-compatible objects
   */
  async query(sql: string): Promise<DuckDBQueryResult> {
    const connection = await this.connect();
    const reader = await connection.runAndReadAll(sql);
    return {
      columns: reader.columnNames(),
      rows: reader.getRowObjectsJson(),
    };
  }

  /**
   * Close the connection and the database instance
   */
  close(): void {
    const { connection, instance } = this;
    this.connection = null;
    this.instance = null;
    try {
      connection?.closeSync();
      instance?.closeSync();
    } catch (error) {
      logger.warn('Failed to close DuckDB connection', {
        error: errorMessage(error),
        dbPath: this.dbPath,
      });
    }
  }
}
