import postgres from "postgres";
import kleur from "kleur";
import { TransactionRollbackError } from "./errors.js";
import type { MigrationRunnerTLSOptions } from "./types.js";

export type SqlParameter = string | number | boolean | Date | null;

export type SqlRow = Record<string, unknown>;

/**
 * Anything statements can be sent to: the pool, or one dedicated connection.
 */
export interface SqlSession {
  query(text: string, params?: SqlParameter[]): Promise<SqlRow[]>;
}

export interface SqlConnection extends SqlSession {
  release(): Promise<void>;
}

export interface SqlClient extends SqlSession {
  /** Reserves one connection for exclusive use until it is released. */
  acquire(): Promise<SqlConnection>;
  close(): Promise<void>;
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated connection. Any failure rolls
 * the transaction back and is rethrown unchanged.
 */
export const withTransaction = async <T>(
  client: SqlClient,
  fn: (session: SqlSession) => Promise<T>,
  identifier?: string,
): Promise<T> => {
  const connection = await client.acquire();

  try {
    await connection.query("BEGIN");

    let result: T;

    try {
      result = await fn(connection);
    } catch (error) {
      try {
        await connection.query("ROLLBACK");
      } catch (rollbackError) {
        throw new TransactionRollbackError(error, rollbackError, identifier);
      }

      throw error;
    }

    await connection.query("COMMIT");

    return result;
  } finally {
    await connection.release();
  }
};

type PostgresClientOptions = {
  tls?: MigrationRunnerTLSOptions;
  quiet?: boolean;
};

const runQuery = async (
  handle: postgres.Sql,
  text: string,
  params: SqlParameter[] = [],
): Promise<SqlRow[]> => {
  const rows = await handle.unsafe(text, params);

  return Array.from(rows);
};

export const createPostgresClient = (
  connectionString: string,
  options: PostgresClientOptions = {},
): SqlClient => {
  const url = new URL(connectionString);

  if (url.protocol !== "postgres:" && url.protocol !== "postgresql:") {
    throw new Error(
      "Connection string must use the postgres:// or postgresql:// scheme",
    );
  }

  if (!url.pathname.replace("/", "")) {
    throw new Error("Connection string must include database name");
  }

  const { tls } = options;
  const ssl = tls
    ? {
        ca: tls.caCert,
        ...(tls.cert && tls.key ? { cert: tls.cert, key: tls.key } : {}),
      }
    : undefined;

  const sql = postgres(connectionString, {
    max: 1,
    connect_timeout: 10,
    ssl,
    onnotice: (notice) => {
      if (!options.quiet) {
        console.log(kleur.dim(`NOTICE: ${notice.message}`));
      }
    },
  });

  return {
    query: (text, params) => runQuery(sql, text, params),
    acquire: async () => {
      const reserved = await sql.reserve();

      return {
        query: (text, params) => runQuery(reserved, text, params),
        release: async () => {
          reserved.release();
        },
      };
    },
    close: () => sql.end(),
  };
};
