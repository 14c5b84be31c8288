import ora, { type Ora } from "ora";
import kleur from "kleur";
import { createPostgresClient, type SqlClient } from "./client.js";
import { errorMessage, MigrationError } from "./errors.js";
import { MigrationExecutor } from "./executor.js";
import { MigrationLedger } from "./ledger.js";
import { planMigrations } from "./planner.js";
import {
  compareIdentifiers,
  DirectoryMigrationSource,
  type MigrationSource,
} from "./source.js";
import type {
  LedgerEntry,
  MigrationCommand,
  MigrationRunnerOptions,
  MigrationStatus,
  MigrationUnit,
  RollbackResult,
  RunResult,
  RunnerState,
  RunStatus,
} from "./types.js";
import { resolvePackageVersion } from "../utils.js";

export const resolveCliVersion = (): Promise<string> =>
  resolvePackageVersion(import.meta.url, "../../package.json");

export type MigrationRunnerDependencies = {
  client: SqlClient;
  source: MigrationSource;
  ledger?: MigrationLedger;
  executor?: MigrationExecutor;
  quiet?: boolean;
};

type RunOptions = {
  signal?: AbortSignal;
};

type RollbackOptions = RunOptions & {
  steps?: number;
};

const label = (unit: MigrationUnit): string =>
  `${kleur.bold(unit.version)}_${unit.name}`;

export const resolveExitCode = (result: { status: RunStatus }): number => {
  switch (result.status) {
    case "done":
      return 0;
    case "cancelled":
      return 130;
    default:
      return 1;
  }
};

export class MigrationRunner {
  #client: SqlClient;
  #source: MigrationSource;
  #ledger: MigrationLedger;
  #executor: MigrationExecutor | null;
  #quiet: boolean;
  #state: RunnerState = { kind: "idle" };

  constructor(dependencies: MigrationRunnerDependencies) {
    this.#client = dependencies.client;
    this.#source = dependencies.source;
    this.#ledger = dependencies.ledger || new MigrationLedger();
    this.#executor = dependencies.executor || null;
    this.#quiet = dependencies.quiet || false;
  }

  get state(): RunnerState {
    return this.#state;
  }

  #log(message = ""): void {
    if (!this.#quiet) {
      console.log(message);
    }
  }

  #spinner(text: string): Ora {
    return ora({ text, isSilent: this.#quiet }).start();
  }

  #begin(): void {
    const { kind } = this.#state;
    const isBusy =
      kind === "bootstrapping" ||
      kind === "planning" ||
      kind === "applying" ||
      kind === "reverting";

    if (isBusy) {
      throw new Error("A migration run is already in progress");
    }

    this.#state = { kind: "bootstrapping" };
  }

  async #getExecutor(): Promise<MigrationExecutor> {
    if (!this.#executor) {
      this.#executor = new MigrationExecutor({
        client: this.#client,
        ledger: this.#ledger,
        cliVersion: await resolveCliVersion(),
      });
    }

    return this.#executor;
  }

  #fail<T extends RunResult | RollbackResult>(
    result: T,
    error: unknown,
    identifier: string | null,
  ): T {
    const failure = error instanceof Error ? error : new Error(String(error));
    const failed =
      identifier ??
      (failure instanceof MigrationError ? failure.identifier : null);

    this.#state = { kind: "failed", identifier: failed };

    return { ...result, status: "failed", failed, error: failure };
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    this.#begin();

    const result: RunResult = {
      status: "done",
      applied: [],
      failed: null,
      error: null,
    };

    let pending: readonly MigrationUnit[];

    try {
      const created = await this.#ledger.ensureTable(this.#client);

      if (created) {
        this.#log(
          kleur.green(
            `Created migrations table ${kleur.bold(this.#ledger.tableName)}`,
          ),
        );
      }

      this.#state = { kind: "planning" };

      const applied = await this.#ledger.load(this.#client);
      const units = await this.#source.discover();

      pending = planMigrations(units, applied.values());
    } catch (error) {
      this.#log(kleur.red(errorMessage(error)));
      return this.#fail(result, error, null);
    }

    if (pending.length === 0) {
      this.#log("✓ No pending migrations");
      this.#state = { kind: "done" };
      return result;
    }

    this.#log(
      kleur.bold(
        `\nFound ${kleur.yellow(pending.length)} pending migration(s):`,
      ),
    );
    pending.forEach((unit) =>
      this.#log(kleur.dim(`  • ${unit.version}_${unit.name}`)),
    );
    this.#log();

    const executor = await this.#getExecutor();

    for (const [index, unit] of pending.entries()) {
      if (options.signal?.aborted) {
        this.#log(
          kleur.yellow(
            `Cancelled before ${unit.identifier}; ${pending.length - index} migration(s) left pending`,
          ),
        );
        this.#state = { kind: "cancelled" };
        return { ...result, status: "cancelled" };
      }

      this.#state = { kind: "applying", index, identifier: unit.identifier };

      const spinner = this.#spinner(`Applying ${label(unit)}`);

      try {
        await executor.apply(unit);
        result.applied.push(unit.identifier);
        spinner.succeed(kleur.green(`Applied ${label(unit)}`));
      } catch (error) {
        spinner.fail(kleur.red(`Failed to apply ${unit.identifier}:`));
        this.#log(kleur.red(errorMessage(error)));
        return this.#fail(result, error, unit.identifier);
      }
    }

    this.#log(
      kleur.bold(kleur.green("\n✓ All migrations applied successfully")),
    );
    this.#state = { kind: "done" };

    return result;
  }

  /**
   * Reverts the newest applied migrations, one transaction each.
   */
  async rollback(options: RollbackOptions = {}): Promise<RollbackResult> {
    this.#begin();

    const steps = options.steps ?? 1;
    const result: RollbackResult = {
      status: "done",
      reverted: [],
      failed: null,
      error: null,
    };

    if (!Number.isInteger(steps) || steps < 1) {
      return this.#fail(
        result,
        new Error(`Rollback steps must be a positive integer, got ${steps}`),
        null,
      );
    }

    let targets: MigrationUnit[];

    try {
      this.#state = { kind: "planning" };

      const applied = (await this.#ledger.exists(this.#client))
        ? await this.#ledger.load(this.#client)
        : new Map<string, LedgerEntry>();
      const units = await this.#source.discover();

      planMigrations(units, applied.values());

      targets = units
        .filter((unit) => applied.has(unit.identifier))
        .sort((a, b) => compareIdentifiers(b.identifier, a.identifier))
        .slice(0, steps);
    } catch (error) {
      this.#log(kleur.red(errorMessage(error)));
      return this.#fail(result, error, null);
    }

    if (targets.length === 0) {
      this.#log("✓ No applied migrations to roll back");
      this.#state = { kind: "done" };
      return result;
    }

    const executor = await this.#getExecutor();

    for (const [index, unit] of targets.entries()) {
      if (options.signal?.aborted) {
        this.#log(
          kleur.yellow(`Cancelled before reverting ${unit.identifier}`),
        );
        this.#state = { kind: "cancelled" };
        return { ...result, status: "cancelled" };
      }

      this.#state = { kind: "reverting", index, identifier: unit.identifier };

      const spinner = this.#spinner(`Reverting ${label(unit)}`);

      try {
        await executor.revert(unit);
        result.reverted.push(unit.identifier);
        spinner.succeed(kleur.green(`Reverted ${label(unit)}`));
      } catch (error) {
        spinner.fail(kleur.red(`Failed to revert ${unit.identifier}:`));
        this.#log(kleur.red(errorMessage(error)));
        return this.#fail(result, error, unit.identifier);
      }
    }

    this.#state = { kind: "done" };

    return result;
  }

  /**
   * Reports applied and pending migrations. Never writes to the database,
   * so a missing ledger table reads as an empty ledger.
   */
  async status(): Promise<MigrationStatus> {
    const appliedMap = (await this.#ledger.exists(this.#client))
      ? await this.#ledger.load(this.#client)
      : new Map<string, LedgerEntry>();
    const units = await this.#source.discover();
    const pending = [...planMigrations(units, appliedMap.values())];
    const applied = Array.from(appliedMap.values()).sort((a, b) =>
      compareIdentifiers(a.identifier, b.identifier),
    );

    this.#log();
    this.#log(kleur.bold("Migration Status"));
    this.#log(
      `  ${kleur.green("Applied:")} ${kleur.bold(applied.length.toString())}`,
    );
    this.#log(
      `  ${kleur.yellow("Pending:")} ${kleur.bold(pending.length.toString())}`,
    );
    this.#log();

    if (applied.length > 0) {
      this.#log(kleur.bold("Applied migrations:"));
      applied.forEach((entry) =>
        this.#log(
          kleur.dim(`  ✓ ${entry.identifier}`) +
            kleur.gray(` (${entry.appliedAt.toISOString()})`),
        ),
      );
      this.#log();
    }

    if (pending.length > 0) {
      this.#log(kleur.bold("Pending migrations:"));
      pending.forEach((unit) =>
        this.#log(kleur.yellow(`  ⏳ ${unit.identifier}`)),
      );
      this.#log();
    }

    return { applied, pending };
  }
}

/**
 * Runs one command against a fresh connection and returns the exit code.
 */
export const runMigrations = async (
  options: MigrationRunnerOptions,
  command: MigrationCommand,
  runOptions: RollbackOptions = {},
): Promise<number> => {
  const client = createPostgresClient(options.connectionString, {
    tls: options.tls,
    quiet: options.quiet,
  });
  const runner = new MigrationRunner({
    client,
    source: new DirectoryMigrationSource(options.migrationsDir, {
      templateVars: options.templateVars,
      quiet: options.quiet,
    }),
    ledger: new MigrationLedger({
      tableName: options.tableName,
      schema: options.schema,
    }),
    quiet: options.quiet,
  });

  try {
    if (command === "status") {
      await runner.status();
      return 0;
    }

    if (command === "down") {
      return resolveExitCode(await runner.rollback(runOptions));
    }

    return resolveExitCode(await runner.run(runOptions));
  } finally {
    await client.close();
  }
};
