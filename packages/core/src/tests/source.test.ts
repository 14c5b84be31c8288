import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  DirectoryMigrationSource,
  StaticMigrationSource,
} from "../migrations/source.js";
import { DiscoveryError } from "../migrations/errors.js";
import { calculateChecksum } from "../migrations/sql.js";

const withMigrationsDir = async (
  files: Record<string, string>,
): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "pgshift-source-"));

  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, "utf8");
  }

  return dir;
};

test("DirectoryMigrationSource orders units by identifier", async () => {
  const dir = await withMigrationsDir({
    "20240102_set_not_null.sql":
      "ALTER TABLE users ALTER COLUMN email SET NOT NULL;",
    "20240101_add_col.sql": "ALTER TABLE users ADD COLUMN email TEXT;",
    "20240101_add_col.down.sql": "ALTER TABLE users DROP COLUMN email;",
    "README.md": "not a migration",
  });
  const source = new DirectoryMigrationSource(dir, { quiet: true });

  const units = await source.discover();

  assert.deepEqual(
    units.map((unit) => unit.identifier),
    ["20240101_add_col", "20240102_set_not_null"],
  );
  assert.equal(units[0].version, "20240101");
  assert.equal(units[0].name, "add_col");
  assert.equal(units[0].file, "20240101_add_col.sql");
  assert.deepEqual(units[0].forward.statements, [
    "ALTER TABLE users ADD COLUMN email TEXT",
  ]);
  assert.deepEqual(units[0].reverse?.statements, [
    "ALTER TABLE users DROP COLUMN email",
  ]);
  assert.equal(units[1].reverse, null);
});

test("DirectoryMigrationSource checksums the raw file text", async () => {
  const content = "-- owner: {{owner}}\nALTER TABLE t OWNER TO {{owner}};\n";
  const dir = await withMigrationsDir({ "1_owner.up.sql": content });
  const source = new DirectoryMigrationSource(dir, {
    templateVars: { owner: "app" },
  });

  const [unit] = await source.discover();

  assert.equal(unit.identifier, "1_owner");
  assert.equal(unit.forward.checksum, calculateChecksum(content));
  assert.deepEqual(unit.forward.statements, [
    "-- owner: app\nALTER TABLE t OWNER TO app",
  ]);
});

test("DirectoryMigrationSource is stable across rediscovery", async () => {
  const dir = await withMigrationsDir({
    "20240101_add_col.sql": "ALTER TABLE users ADD COLUMN email TEXT;",
  });
  const source = new DirectoryMigrationSource(dir);

  const [first] = await source.discover();
  const [second] = await source.discover();

  assert.equal(first.forward.checksum, second.forward.checksum);
  assert.equal(
    first.forward.checksum,
    calculateChecksum("ALTER TABLE users ADD COLUMN email TEXT;"),
  );
});

test("DirectoryMigrationSource skips files with invalid names", async () => {
  const dir = await withMigrationsDir({
    "20240101_add_col.sql": "SELECT 1;",
    "seed.sql": "SELECT 2;",
  });
  const source = new DirectoryMigrationSource(dir, { quiet: true });

  const units = await source.discover();

  assert.deepEqual(
    units.map((unit) => unit.identifier),
    ["20240101_add_col"],
  );
});

test("DirectoryMigrationSource rejects an identifier defined twice", async () => {
  const dir = await withMigrationsDir({
    "20240101_add_col.sql": "SELECT 1;",
    "20240101_add_col.up.sql": "SELECT 1;",
  });
  const source = new DirectoryMigrationSource(dir);

  await assert.rejects(() => source.discover(), (error: unknown) => {
    assert.ok(error instanceof DiscoveryError);
    assert.equal(error.identifier, "20240101_add_col");
    assert.equal(
      error.message,
      "Duplicate migration identifier 20240101_add_col (20240101_add_col.sql, 20240101_add_col.up.sql)",
    );
    return true;
  });
});

test("DirectoryMigrationSource rejects two units with the same version", async () => {
  const dir = await withMigrationsDir({
    "20240101_add_col.sql": "SELECT 1;",
    "20240101_add_index.sql": "SELECT 2;",
  });
  const source = new DirectoryMigrationSource(dir);

  await assert.rejects(
    () => source.discover(),
    (error: unknown) =>
      error instanceof DiscoveryError &&
      error.message ===
        "Migrations 20240101_add_col and 20240101_add_index share version 20240101",
  );
});

test("DirectoryMigrationSource rejects a down script without an up script", async () => {
  const dir = await withMigrationsDir({
    "20240101_add_col.down.sql": "SELECT 1;",
  });
  const source = new DirectoryMigrationSource(dir);

  await assert.rejects(
    () => source.discover(),
    /Down script 20240101_add_col\.down\.sql has no matching up script/,
  );
});

test("DirectoryMigrationSource rejects a script with only comments", async () => {
  const dir = await withMigrationsDir({
    "20240101_empty.sql": "-- Write your migration here\n",
  });
  const source = new DirectoryMigrationSource(dir);

  await assert.rejects(
    () => source.discover(),
    (error: unknown) =>
      error instanceof DiscoveryError &&
      error.message === "Migration 20240101_empty has no statements",
  );
});

test("DirectoryMigrationSource treats a comment-only down script as absent", async () => {
  const dir = await withMigrationsDir({
    "20240101_add_col.sql": "ALTER TABLE users ADD COLUMN email TEXT;",
    "20240101_add_col.down.sql": "-- Undo 20240101_add_col here\n",
  });
  const source = new DirectoryMigrationSource(dir);

  const [unit] = await source.discover();

  assert.equal(unit.reverse, null);
});

test("DirectoryMigrationSource fails on a missing directory", async () => {
  const source = new DirectoryMigrationSource(
    path.join(os.tmpdir(), "pgshift-does-not-exist", "migrations"),
  );

  await assert.rejects(() => source.discover(), DiscoveryError);
});

test("StaticMigrationSource validates identifiers", async () => {
  const source = new StaticMigrationSource([
    { identifier: "add_col", forward: "SELECT 1;" },
  ]);

  await assert.rejects(
    () => source.discover(),
    /Invalid migration identifier "add_col"/,
  );
});

test("StaticMigrationSource rejects duplicate identifiers", async () => {
  const source = new StaticMigrationSource([
    { identifier: "20240101_add_col", forward: "SELECT 1;" },
    { identifier: "20240101_add_col", forward: "SELECT 2;" },
  ]);

  await assert.rejects(
    () => source.discover(),
    /Duplicate migration identifier 20240101_add_col/,
  );
});

test("StaticMigrationSource reports templates that cannot render", async () => {
  const source = new StaticMigrationSource([
    { identifier: "20240101_broken", forward: "SELECT {{#if}};" },
  ]);

  await assert.rejects(
    () => source.discover(),
    (error: unknown) =>
      error instanceof DiscoveryError &&
      error.identifier === "20240101_broken" &&
      error.message.startsWith("Migration 20240101_broken could not be rendered"),
  );
});

test("the bundled UTC conversion migration splits into five statements", async () => {
  const migrationsDir = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    "../../../../examples/migrations",
  );
  const source = new DirectoryMigrationSource(migrationsDir);

  const [unit] = await source.discover();

  assert.equal(unit.identifier, "20250701100000_general_db_type_fix");
  assert.equal(unit.forward.statements.length, 5);
  assert.equal(unit.reverse?.statements.length, 5);
  assert.ok(
    unit.forward.statements[4].endsWith(
      "ALTER COLUMN submission_time TYPE TIMESTAMPTZ USING submission_time AT TIME ZONE 'UTC'",
    ),
  );
});
