import { Pool, PoolConfig } from 'pg';
import { parseIntoClientConfig } from 'pg-connection-string';
import { z } from 'zod';
import { AppConfig } from './config';
import { errorMessage, StoreQueryError, StoreUnavailableError, StoreWriteError } from './errors';

export const COLLECTIONS = ['user', 'product', 'lead'] as const;
export type CollectionName = (typeof COLLECTIONS)[number];

export type DocumentFilter = Record<string, string | number | boolean>;

export interface StoredDocument {
  _id: string;
  [field: string]: unknown;
}

/*
  Document access used by the route handlers.
  Every method is a single store round trip; failures are never retried.
*/
export interface DocumentStore {
  listDocuments(
    collection: CollectionName,
    filter: DocumentFilter,
    limit: number
  ): Promise<StoredDocument[]>;
  createDocument(collection: CollectionName, record: object): Promise<string>;
  listCollectionNames(): Promise<string[]>;
}

// ===== POSTGRESQL =====

// The slice of pg's PoolClient the store needs
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(err?: Error): void;
}

export interface SqlConnector {
  connect(): Promise<SqlClient>;
}

/*
  pg lets settings parsed from connectionString win over the explicit ones,
  so the URL is parsed here and DATABASE_NAME applied on top of it.
*/
export function poolConfig(config: AppConfig): PoolConfig {
  const fromUrl: PoolConfig = config.databaseUrl ? parseIntoClientConfig(config.databaseUrl) : {};
  return {
    ...fromUrl,
    database: config.databaseName ?? fromUrl.database,
    ssl: config.databaseSsl ? { rejectUnauthorized: true } : fromUrl.ssl
  };
}

export function createPool(config: AppConfig): Pool {
  return new Pool(poolConfig(config));
}

export function poolConnector(pool: Pool): SqlConnector {
  return {
    async connect() {
      const client = await pool.connect();
      return {
        async query(text: string, values?: unknown[]) {
          const result = await client.query(text, values);
          return { rows: result.rows };
        },
        release(err?: Error) {
          client.release(err);
        }
      };
    }
  };
}

const documentRowSchema = z.object({
  _id: z.union([z.string(), z.number()]).transform(String),
  doc: z.record(z.unknown())
});

const idRowSchema = z.object({
  _id: z.union([z.string(), z.number()]).transform(String)
});

const tableRowSchema = z.object({
  table_name: z.string()
});

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/*
  Each collection is a table of JSONB documents:
    _id uuid primary key default gen_random_uuid(), doc jsonb not null
  See db/schema.sql.
*/
export class PgDocumentStore implements DocumentStore {
  constructor(private readonly connector: SqlConnector) {}

  async listDocuments(
    collection: CollectionName,
    filter: DocumentFilter,
    limit: number
  ): Promise<StoredDocument[]> {
    const rows = await this.withClient(
      (client) =>
        client.query(
          `SELECT _id::text AS _id, doc FROM ${quoteIdentifier(collection)} WHERE doc @> $1::jsonb LIMIT $2`,
          // LIMIT NULL means no limit
          [JSON.stringify(filter), limit > 0 ? limit : null]
        ),
      (error) => new StoreQueryError(`Failed to query collection "${collection}"`, { cause: error })
    );

    return rows.map((row) => {
      const parsed = documentRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new StoreQueryError(`Unexpected row shape in collection "${collection}"`, {
          cause: parsed.error
        });
      }
      const { _id, doc } = parsed.data;
      return { ...doc, _id };
    });
  }

  async createDocument(collection: CollectionName, record: object): Promise<string> {
    const rows = await this.withClient(
      (client) =>
        client.query(
          `INSERT INTO ${quoteIdentifier(collection)} (doc) VALUES ($1::jsonb) RETURNING _id::text AS _id`,
          [JSON.stringify(record)]
        ),
      (error) => new StoreWriteError(`Failed to insert into collection "${collection}"`, { cause: error })
    );

    const [row] = rows;
    if (row === undefined) {
      throw new StoreWriteError(`Insert into collection "${collection}" returned no identifier`);
    }
    return idRowSchema.parse(row)._id;
  }

  async listCollectionNames(): Promise<string[]> {
    const rows = await this.withClient(
      (client) =>
        client.query(
          'SELECT table_name FROM information_schema.tables WHERE table_schema = current_schema() ORDER BY table_name'
        ),
      (error) => new StoreQueryError('Failed to list collections', { cause: error })
    );
    return rows.map((row) => tableRowSchema.parse(row).table_name);
  }

  /*
    Checks out one client, runs a single statement and always releases it.
    A failed checkout is reported as StoreUnavailableError, a failed statement through toError.
  */
  private async withClient(
    run: (client: SqlClient) => Promise<{ rows: unknown[] }>,
    toError: (error: unknown) => Error
  ): Promise<unknown[]> {
    let client: SqlClient;
    try {
      client = await this.connector.connect();
    } catch (error) {
      throw new StoreUnavailableError(
        `Database connection failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    try {
      const result = await run(client);
      client.release();
      return result.rows;
    } catch (error) {
      client.release(error instanceof Error ? error : undefined);
      throw toError(error);
    }
  }
}
