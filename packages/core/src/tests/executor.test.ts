import test from "node:test";
import assert from "node:assert/strict";
import { MigrationExecutor } from "../migrations/executor.js";
import { MigrationLedger } from "../migrations/ledger.js";
import { buildMigrationUnits } from "../migrations/source.js";
import {
  DuplicateEntryError,
  IrreversibleMigrationError,
  LedgerWriteError,
  NotFoundError,
  StatementError,
  TransactionRollbackError,
} from "../migrations/errors.js";
import { calculateChecksum } from "../migrations/sql.js";
import { FakeDatabase } from "./fake-database.js";

const APPLIED_AT = new Date("2025-07-01T10:00:00.000Z");

const FORWARD =
  "ALTER TABLE builds ADD COLUMN finished_at TIMESTAMPTZ;\n" +
  "ALTER TABLE builds ALTER COLUMN missing_column SET NOT NULL;\n";

const [addColumn, brokenUnit] = buildMigrationUnits([
  {
    identifier: "20240101_add_col",
    forward: "ALTER TABLE builds ADD COLUMN finished_at TIMESTAMPTZ;",
    reverse: "ALTER TABLE builds DROP COLUMN finished_at;",
  },
  { identifier: "20240102_set_not_null", forward: FORWARD },
]);

const setup = async (
  db: FakeDatabase,
): Promise<{ executor: MigrationExecutor; ledger: MigrationLedger }> => {
  const ledger = new MigrationLedger();
  await ledger.ensureTable(db);
  db.log.length = 0;

  const executor = new MigrationExecutor({
    client: db,
    ledger,
    cliVersion: "0.3.0",
    appliedBy: "tester",
    hostname: "test-host",
    now: () => APPLIED_AT,
  });

  return { executor, ledger };
};

test("apply runs statements and the ledger write in one transaction", async () => {
  const db = new FakeDatabase();
  const { executor } = await setup(db);

  const entry = await executor.apply(addColumn);

  assert.deepEqual(entry, {
    identifier: "20240101_add_col",
    name: "add_col",
    checksum: calculateChecksum(
      "ALTER TABLE builds ADD COLUMN finished_at TIMESTAMPTZ;",
    ),
    appliedAt: APPLIED_AT,
    appliedBy: "tester",
    hostname: "test-host",
    cliVersion: "0.3.0",
  });
  assert.equal(db.log[0], "BEGIN");
  assert.equal(db.log[1], "ALTER TABLE builds ADD COLUMN finished_at TIMESTAMPTZ");
  assert.ok(db.log[2].startsWith('INSERT INTO "schema_migrations"'));
  assert.deepEqual(db.log.slice(3), ["COMMIT", "RELEASE"]);
  assert.deepEqual(db.ledgerIdentifiers, ["20240101_add_col"]);
  assert.equal(db.inTransaction, false);
});

test("a failing second statement rolls back the first", async () => {
  const db = new FakeDatabase({
    failures: {
      missing_column: 'column "missing_column" does not exist',
    },
  });
  const { executor } = await setup(db);

  await assert.rejects(
    () => executor.apply(brokenUnit),
    (error: unknown) => {
      assert.ok(error instanceof StatementError);
      assert.equal(error.identifier, "20240102_set_not_null");
      assert.equal(error.statementIndex, 1);
      assert.equal(
        error.databaseMessage,
        'column "missing_column" does not exist',
      );
      assert.equal(
        error.message,
        'Statement 2 of 20240102_set_not_null failed: column "missing_column" does not exist',
      );
      return true;
    },
  );

  assert.deepEqual(db.state.statements, []);
  assert.deepEqual(db.ledgerIdentifiers, []);
  assert.deepEqual(db.log.slice(-2), ["ROLLBACK", "RELEASE"]);
});

test("a failed ledger insert rolls back the schema change", async () => {
  const db = new FakeDatabase({ failLedgerInsert: "out of memory" });
  const { executor } = await setup(db);

  await assert.rejects(() => executor.apply(addColumn), LedgerWriteError);

  assert.deepEqual(db.state.statements, []);
  assert.deepEqual(db.ledgerIdentifiers, []);
});

test("a concurrent insert of the same identifier surfaces as DuplicateEntryError", async () => {
  const db = new FakeDatabase({
    onBegin: (fake) =>
      fake.seedLedger(
        "20240101_add_col",
        addColumn.forward.checksum,
        "add_col",
      ),
  });
  const { executor } = await setup(db);

  await assert.rejects(() => executor.apply(addColumn), DuplicateEntryError);

  assert.deepEqual(db.state.statements, []);
});

test("a failed rollback keeps the original failure as its cause", async () => {
  const db = new FakeDatabase({
    failures: { missing_column: "boom" },
    failRollback: "connection lost",
  });
  const { executor } = await setup(db);

  await assert.rejects(
    () => executor.apply(brokenUnit),
    (error: unknown) => {
      assert.ok(error instanceof TransactionRollbackError);
      assert.ok(error.cause instanceof StatementError);
      assert.equal(error.identifier, "20240102_set_not_null");
      return true;
    },
  );
  assert.equal(db.log.at(-1), "RELEASE");
});

test("revert runs the down script and removes the ledger entry", async () => {
  const db = new FakeDatabase();
  const { executor } = await setup(db);
  await executor.apply(addColumn);

  await executor.revert(addColumn);

  assert.deepEqual(db.ledgerIdentifiers, []);
  assert.deepEqual(db.state.statements, [
    "ALTER TABLE builds ADD COLUMN finished_at TIMESTAMPTZ",
    "ALTER TABLE builds DROP COLUMN finished_at",
  ]);
});

test("revert of an unrecorded migration rolls back its down script", async () => {
  const db = new FakeDatabase();
  const { executor } = await setup(db);

  await assert.rejects(() => executor.revert(addColumn), NotFoundError);

  assert.deepEqual(db.state.statements, []);
});

test("revert without a down script opens no transaction", async () => {
  const db = new FakeDatabase();
  const { executor } = await setup(db);

  await assert.rejects(
    () => executor.revert(brokenUnit),
    IrreversibleMigrationError,
  );
  assert.deepEqual(db.log, []);
});
