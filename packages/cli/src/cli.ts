#!/usr/bin/env -S node --import tsx
import path from "node:path";
import fs from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { input } from "@inquirer/prompts";
import kleur from "kleur";
import {
  calculateChecksum,
  generateSchema,
  resolveCliVersion,
  runMigrations,
  type MigrationCommand,
} from "@pgshift/core";
import { createMigrationFiles, validateMigrationName } from "./create.js";
import {
  collectVar,
  printEnvironment,
  resolveBaseCwd,
  resolveEnvironment,
  toRunnerOptions,
  type CliOptions,
} from "./options.js";

type DownOptions = CliOptions & { steps: number };

const program = new Command();

const withCommonOptions = (command: Command): Command =>
  command
    .option("--config <path>", "Path to config file (default: pgshift.hcl)")
    .option("--env <name>", "Environment name from config file")
    .option("--env-file <path>", "Load environment variables from file")
    .option(
      "--var <key=value>",
      "Set a variable value (can be used multiple times)",
      collectVar,
    )
    .option("--quiet", "Only print errors");

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }

  return parsed;
};

/**
 * Aborts between migrations on the first SIGINT/SIGTERM. The migration in
 * flight still commits or rolls back before the process exits.
 */
const createCancellation = (): { signal: AbortSignal; dispose: () => void } => {
  const controller = new AbortController();
  const onSignal = (): void => {
    console.error(
      kleur.yellow("\nCancelling after the current migration finishes..."),
    );
    controller.abort();
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
};

const runCommand = async (
  command: MigrationCommand,
  options: CliOptions,
  steps?: number,
): Promise<void> => {
  const resolved = await resolveEnvironment(options);

  if (!options.quiet) {
    printEnvironment(resolved);
  }

  const runnerOptions = await toRunnerOptions(resolved, options.quiet);
  const cancellation = createCancellation();

  try {
    process.exitCode = await runMigrations(runnerOptions, command, {
      signal: cancellation.signal,
      steps,
    });
  } finally {
    cancellation.dispose();
  }
};

program
  .name("pgshift")
  .description("PostgreSQL migrations CLI")
  .version(await resolveCliVersion());

withCommonOptions(
  program
    .command("up")
    .alias("run")
    .description("Apply pending migrations")
    .action((options: CliOptions) => runCommand("up", options)),
);

withCommonOptions(
  program
    .command("status")
    .description("Show migration status")
    .action((options: CliOptions) => runCommand("status", options)),
);

withCommonOptions(
  program
    .command("down")
    .description("Roll back the most recently applied migrations")
    .option(
      "--steps <n>",
      "Number of migrations to roll back",
      parsePositiveInt,
      1,
    )
    .action((options: DownOptions) =>
      runCommand("down", options, options.steps),
    ),
);

program
  .command("create")
  .description("Create a new migration file")
  .option("--config <path>", "Path to config file (default: pgshift.hcl)")
  .option("--env <name>", "Environment name from config file")
  .option("--env-file <path>", "Load environment variables from file")
  .option("--name <name>", "Migration name")
  .option("--reversible", "Also create a .down.sql file")
  .action(
    async (options: CliOptions & { name?: string; reversible?: boolean }) => {
      const { config, configPath } = await resolveEnvironment(options);
      const migrationsDir = path.resolve(
        path.dirname(configPath),
        config.migrations.dir,
      );

      const name =
        options.name ||
        (await input({
          message: "Enter migration name:",
          validate: validateMigrationName,
        }));

      const created = await createMigrationFiles({
        migrationsDir,
        name,
        reversible: options.reversible,
      });

      for (const file of created.files) {
        console.log(
          kleur.green(`Created migration: ${kleur.bold(path.basename(file))}`),
        );
      }
      console.log(kleur.dim(`Location: ${migrationsDir}`));
      console.log("");
    },
  );

program
  .command("checksum")
  .description("Print checksum for a migration file")
  .argument("<path>", "Path to migration file")
  .action(async (filePath: string) => {
    const absolutePath = path.resolve(resolveBaseCwd(), filePath);
    const content = await fs.readFile(absolutePath, "utf8");

    console.log(`Checksum: ${kleur.bold(calculateChecksum(content))}`);
  });

program
  .command("schema")
  .description("Print the JSON schema of pgshift.hcl")
  .action(() => {
    console.log(JSON.stringify(generateSchema(), null, 2));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(
    kleur.red(error instanceof Error ? error.message : String(error)),
  );

  process.exit(1);
});
