export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

type MigrationErrorOptions = {
  identifier?: string;
  cause?: unknown;
};

/**
 * Base class for every failure the migration core reports. `identifier` names
 * the migration the failure belongs to, when there is one.
 */
export class MigrationError extends Error {
  readonly identifier: string | null;

  constructor(message: string, options: MigrationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.identifier = options.identifier ?? null;
  }
}

/**
 * Malformed or duplicate migration units. Raised before anything runs.
 */
export class DiscoveryError extends MigrationError {
  readonly file: string | null;

  constructor(
    message: string,
    options: MigrationErrorOptions & { file?: string } = {},
  ) {
    super(message, options);
    this.file = options.file ?? null;
  }
}

export type DriftKind = "missing" | "modified";

/**
 * The ledger disagrees with the migrations on disk: either it references
 * migrations that no longer exist, or an applied migration has changed.
 */
export class DriftError extends MigrationError {
  readonly kind: DriftKind;
  readonly identifiers: readonly string[];

  constructor(kind: DriftKind, identifiers: string[], message: string) {
    super(message, { identifier: identifiers[0] });
    this.kind = kind;
    this.identifiers = identifiers;
  }
}

export class StatementError extends MigrationError {
  readonly statementIndex: number;
  readonly statement: string;
  readonly databaseMessage: string;

  constructor(
    identifier: string,
    statementIndex: number,
    statement: string,
    cause: unknown,
  ) {
    const databaseMessage = errorMessage(cause);

    super(
      `Statement ${statementIndex + 1} of ${identifier} failed: ${databaseMessage}`,
      { identifier, cause },
    );
    this.statementIndex = statementIndex;
    this.statement = statement;
    this.databaseMessage = databaseMessage;
  }
}

export class LedgerWriteError extends MigrationError {
  constructor(identifier: string, cause: unknown) {
    super(
      `Failed to record ${identifier} in the migrations ledger: ${errorMessage(cause)}`,
      { identifier, cause },
    );
  }
}

export class DuplicateEntryError extends MigrationError {
  constructor(identifier: string, cause?: unknown) {
    super(
      `Migration ${identifier} is already recorded in the ledger. ` +
        "Another runner may have applied it concurrently.",
      { identifier, cause },
    );
  }
}

export class NotFoundError extends MigrationError {
  constructor(identifier: string) {
    super(`Migration ${identifier} is not recorded in the ledger`, {
      identifier,
    });
  }
}

export class IrreversibleMigrationError extends MigrationError {
  constructor(identifier: string) {
    super(`Migration ${identifier} has no down script`, { identifier });
  }
}

/**
 * ROLLBACK itself failed. `cause` is the error that triggered the rollback.
 */
export class TransactionRollbackError extends MigrationError {
  readonly rollbackError: unknown;

  constructor(cause: unknown, rollbackError: unknown, identifier?: string) {
    super(
      `Rollback failed (${errorMessage(rollbackError)}) after: ${errorMessage(cause)}`,
      { identifier, cause },
    );
    this.rollbackError = rollbackError;
  }
}
