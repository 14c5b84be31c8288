import type { SqlRow, SqlSession } from "./client.js";
import {
  DuplicateEntryError,
  LedgerWriteError,
  NotFoundError,
} from "./errors.js";
import { qualifyTableName, quoteIdentifier } from "./sql.js";
import type { LedgerEntry } from "./types.js";

export const DEFAULT_TABLE_NAME = "schema_migrations";

const UNIQUE_VIOLATION = "23505";

type MigrationLedgerOptions = {
  tableName?: string;
  schema?: string;
};

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  error.code === UNIQUE_VIOLATION;

const readString = (row: SqlRow, column: string): string => {
  const value = row[column];

  if (typeof value !== "string") {
    throw new Error(`Ledger column ${column} is not text`);
  }

  return value;
};

const readTimestamp = (row: SqlRow, column: string): Date => {
  const value = row[column];
  const date =
    value instanceof Date
      ? value
      : typeof value === "string"
        ? new Date(value)
        : null;

  if (!date || Number.isNaN(date.getTime())) {
    throw new Error(`Ledger column ${column} is not a timestamp`);
  }

  return date;
};

const toLedgerEntry = (row: SqlRow): LedgerEntry => ({
  identifier: readString(row, "identifier"),
  name: readString(row, "name"),
  checksum: readString(row, "checksum"),
  appliedAt: readTimestamp(row, "applied_at"),
  appliedBy: readString(row, "applied_by"),
  hostname: readString(row, "hostname"),
  cliVersion: readString(row, "cli_version"),
});

/**
 * The table recording which migrations have been applied. Every method takes
 * the session to run on, so writes can share the caller's transaction.
 */
export class MigrationLedger {
  #tableName: string;
  #schema?: string;
  #qualifiedName: string;

  constructor(options: MigrationLedgerOptions = {}) {
    this.#tableName = options.tableName || DEFAULT_TABLE_NAME;
    this.#schema = options.schema;
    this.#qualifiedName = qualifyTableName(this.#tableName, this.#schema);
  }

  get tableName(): string {
    return this.#schema ? `${this.#schema}.${this.#tableName}` : this.#tableName;
  }

  async exists(session: SqlSession): Promise<boolean> {
    const rows = await session.query(
      "SELECT to_regclass($1) IS NOT NULL AS exists",
      [this.#qualifiedName],
    );

    return rows[0]?.exists === true;
  }

  /**
   * Creates the ledger table if it is missing. Returns true when it did.
   */
  async ensureTable(session: SqlSession): Promise<boolean> {
    if (await this.exists(session)) {
      return false;
    }

    if (this.#schema) {
      await session.query(
        `CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(this.#schema)}`,
      );
    }

    await session.query(`
      CREATE TABLE IF NOT EXISTS ${this.#qualifiedName} (
        identifier TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        checksum TEXT NOT NULL,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        applied_by TEXT NOT NULL DEFAULT '',
        hostname TEXT NOT NULL DEFAULT '',
        cli_version TEXT NOT NULL DEFAULT ''
      )
    `);

    return true;
  }

  async load(session: SqlSession): Promise<Map<string, LedgerEntry>> {
    const rows = await session.query(`
      SELECT identifier, name, checksum, applied_at, applied_by, hostname, cli_version
      FROM ${this.#qualifiedName}
      ORDER BY identifier
    `);

    return new Map(
      rows.map((row) => {
        const entry = toLedgerEntry(row);

        return [entry.identifier, entry];
      }),
    );
  }

  async record(session: SqlSession, entry: LedgerEntry): Promise<void> {
    try {
      await session.query(
        `
        INSERT INTO ${this.#qualifiedName}
          (identifier, name, checksum, applied_at, applied_by, hostname, cli_version)
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        `,
        [
          entry.identifier,
          entry.name,
          entry.checksum,
          entry.appliedAt,
          entry.appliedBy,
          entry.hostname,
          entry.cliVersion,
        ],
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEntryError(entry.identifier, error);
      }

      throw new LedgerWriteError(entry.identifier, error);
    }
  }

  async remove(session: SqlSession, identifier: string): Promise<void> {
    const rows = await session.query(
      `DELETE FROM ${this.#qualifiedName} WHERE identifier = $1 RETURNING identifier`,
      [identifier],
    );

    if (rows.length === 0) {
      throw new NotFoundError(identifier);
    }
  }
}
