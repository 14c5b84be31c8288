import os from "node:os";
import { withTransaction, type SqlClient, type SqlSession } from "./client.js";
import { IrreversibleMigrationError, StatementError } from "./errors.js";
import type { MigrationLedger } from "./ledger.js";
import { calculateChecksum } from "./sql.js";
import type { LedgerEntry, MigrationUnit } from "./types.js";

export const resolveAppliedBy = (): string => {
  try {
    return os.userInfo().username || process.env.USER || "";
  } catch {
    return process.env.USER || "";
  }
};

type MigrationExecutorOptions = {
  client: SqlClient;
  ledger: MigrationLedger;
  cliVersion?: string;
  appliedBy?: string;
  hostname?: string;
  now?: () => Date;
};

const runStatements = async (
  session: SqlSession,
  identifier: string,
  statements: readonly string[],
): Promise<void> => {
  for (const [index, statement] of statements.entries()) {
    try {
      await session.query(statement);
    } catch (error) {
      throw new StatementError(identifier, index, statement, error);
    }
  }
};

/**
 * Applies or reverts one migration at a time, each inside its own
 * transaction together with the matching ledger write.
 */
export class MigrationExecutor {
  #client: SqlClient;
  #ledger: MigrationLedger;
  #cliVersion: string;
  #appliedBy: string;
  #hostname: string;
  #now: () => Date;

  constructor(options: MigrationExecutorOptions) {
    this.#client = options.client;
    this.#ledger = options.ledger;
    this.#cliVersion = options.cliVersion || "";
    this.#appliedBy = options.appliedBy ?? resolveAppliedBy();
    this.#hostname = options.hostname ?? os.hostname();
    this.#now = options.now || (() => new Date());
  }

  async apply(unit: MigrationUnit): Promise<LedgerEntry> {
    return withTransaction(
      this.#client,
      async (tx) => {
        await runStatements(tx, unit.identifier, unit.forward.statements);

        const entry: LedgerEntry = {
          identifier: unit.identifier,
          name: unit.name,
          checksum: calculateChecksum(unit.forward.content),
          appliedAt: this.#now(),
          appliedBy: this.#appliedBy,
          hostname: this.#hostname,
          cliVersion: this.#cliVersion,
        };

        await this.#ledger.record(tx, entry);

        return entry;
      },
      unit.identifier,
    );
  }

  async revert(unit: MigrationUnit): Promise<void> {
    const { reverse } = unit;

    if (!reverse) {
      throw new IrreversibleMigrationError(unit.identifier);
    }

    await withTransaction(
      this.#client,
      async (tx) => {
        await runStatements(tx, unit.identifier, reverse.statements);
        await this.#ledger.remove(tx, unit.identifier);
      },
      unit.identifier,
    );
  }
}
