import { Inject, Injectable, Logger } from '@nestjs/common';
import { PoolConfig } from 'pg';

import { QUERIES } from '../constants/query-templates';
import {
  CircularDependencyError,
  DatabaseConnectionError,
  StatementExecutionError,
  describeError,
} from '../ddl-architect.errors';
import { ConnectionConfig } from '../interfaces/config.interface';
import { OrderedResult } from '../types/ddl-architect.types';
import { STATEMENT_TERMINATOR } from './ddl-parser.service';

export const POOL_FACTORY = 'POOL_FACTORY';

// The slice of pg's Pool and PoolClient this service relies on.
export interface PooledClient {
  query(text: string): Promise<unknown>;
  release(): void;
}

export interface ConnectionPool {
  connect(): Promise<PooledClient>;
  end(): Promise<void>;
}

export type PoolFactory = (config: PoolConfig) => ConnectionPool;

@Injectable()
export class DatabaseService {
  private readonly logger = new Logger(DatabaseService.name);
  private pool?: ConnectionPool;
  private dbName = 'unknown_db';

  constructor(@Inject(POOL_FACTORY) private readonly createPool: PoolFactory) {}

  async connect(config: ConnectionConfig): Promise<string> {
    if ('uri' in config) {
      this.pool = this.createPool({
        connectionString: config.uri,
        ssl: config.ssl,
      });
      this.dbName = this.databaseNameFromUri(config.uri);
    } else {
      this.pool = this.createPool({ ...config });
      this.dbName = config.database;
    }

    const client = await this.connectClient();
    try {
      await client.query(QUERIES.TEST_CONNECTION);
      this.logger.debug(`Connected to database ${this.dbName}`);
    } finally {
      client.release();
    }

    return this.dbName;
  }

  /**
   * Statements to run for a resolved batch: ordered tables first, then the
   * fragments that had no CREATE TABLE header, in their original order.
   */
  plan(result: OrderedResult): string[] {
    switch (result.kind) {
      case 'cycle':
        throw new CircularDependencyError(result.unresolved);
      case 'passthrough':
        return result.fragments.map((fragment) => fragment + STATEMENT_TERMINATOR);
      case 'ordered':
        return [
          ...result.statements.map((statement) => statement.rawText),
          ...result.unparsed.map((fragment) => fragment + STATEMENT_TERMINATOR),
        ];
    }
  }

  /**
   * Runs every statement in one transaction. Any failure rolls the whole
   * batch back.
   */
  async execute(statements: string[]): Promise<number> {
    const client = await this.connectClient();
    try {
      await client.query(QUERIES.BEGIN);
      for (const [index, statement] of statements.entries()) {
        this.logger.debug(`Executing statement ${index + 1}/${statements.length}`);
        try {
          await client.query(statement);
        } catch (error) {
          throw new StatementExecutionError(index, statement, error);
        }
      }
      await client.query(QUERIES.COMMIT);
      return statements.length;
    } catch (error) {
      this.logger.warn(`Rolling back: ${describeError(error)}`);
      try {
        await client.query(QUERIES.ROLLBACK);
      } catch (rollbackError) {
        this.logger.error(`Rollback failed: ${describeError(rollbackError)}`);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
  }

  private async connectClient(): Promise<PooledClient> {
    if (!this.pool) {
      throw new DatabaseConnectionError('Not connected, call connect() first');
    }
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new DatabaseConnectionError(
        `Could not connect to database ${this.dbName}: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  private databaseNameFromUri(uri: string): string {
    try {
      const url = new URL(uri.replace(/^postgres(ql)?:\/\//, 'http://'));
      return decodeURIComponent(url.pathname.split('/')[1] || '') || 'unknown_db';
    } catch (error) {
      this.logger.warn(`Could not parse database name from URI (${describeError(error)}), using fallback`);
      return 'unknown_db';
    }
  }
}
