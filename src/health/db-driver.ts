/**
 * Postgres connectivity check for the agent's database.
 *
 * Opens a short-lived client per check so a poll never reuses a broken
 * connection.
 */

import pg, { type ClientConfig } from 'pg';
import type { ConnectivityCheck } from '../resiliency/probes.js';
import { createLogger, type Logger } from '../resiliency/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface PgClientLike {
  connect(): Promise<unknown>;
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
}

export type PgClientFactory = (config: ClientConfig) => PgClientLike;

export interface PostgresCheckOptions {
  connectionString?: string;
  connectTimeoutMs?: number;
  logger?: Logger;
  createClient?: PgClientFactory;
}

export class PostgresConnectivityCheck implements ConnectivityCheck {
  private readonly connectionString?: string;
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;
  private readonly createClient: PgClientFactory;

  constructor(options: PostgresCheckOptions = {}) {
    this.connectionString = options.connectionString;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 3000;
    this.logger = options.logger ?? createLogger('database');
    this.createClient = options.createClient ?? ((config) => new pg.Client(config));
  }

  async testConnection(): Promise<boolean> {
    if (!this.connectionString) {
      this.logger.warn('No database connection string configured');
      return false;
    }

    const client = this.createClient({
      connectionString: this.connectionString,
      connectionTimeoutMillis: this.connectTimeoutMs,
      query_timeout: this.connectTimeoutMs,
    });

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } finally {
      try {
        await client.end();
      } catch (err) {
        this.logger.debug('Failed to close database client', { error: errorMessage(err) });
      }
    }
  }
}
