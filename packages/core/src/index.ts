export {
  MigrationRunner,
  resolveCliVersion,
  resolveExitCode,
  runMigrations,
} from "./migrations/runner.js";
export type { MigrationRunnerDependencies } from "./migrations/runner.js";
export {
  DirectoryMigrationSource,
  StaticMigrationSource,
  buildMigrationUnits,
  compareIdentifiers,
} from "./migrations/source.js";
export type { MigrationSource } from "./migrations/source.js";
export { DEFAULT_TABLE_NAME, MigrationLedger } from "./migrations/ledger.js";
export { planMigrations } from "./migrations/planner.js";
export { MigrationExecutor } from "./migrations/executor.js";
export { createPostgresClient, withTransaction } from "./migrations/client.js";
export type {
  SqlClient,
  SqlConnection,
  SqlParameter,
  SqlRow,
  SqlSession,
} from "./migrations/client.js";
export { calculateChecksum, splitStatements } from "./migrations/sql.js";
export { renderTemplate } from "./migrations/template.js";
export {
  DiscoveryError,
  DriftError,
  DuplicateEntryError,
  IrreversibleMigrationError,
  LedgerWriteError,
  MigrationError,
  NotFoundError,
  StatementError,
  TransactionRollbackError,
  errorMessage,
} from "./migrations/errors.js";
export { resolvePackageVersion } from "./utils.js";
export type {
  LedgerEntry,
  MigrationCommand,
  MigrationDefinition,
  MigrationRunnerOptions,
  MigrationRunnerTLSOptions,
  MigrationScript,
  MigrationStatus,
  MigrationUnit,
  Plan,
  RollbackResult,
  RunResult,
  RunnerState,
} from "./migrations/types.js";
export {
  findConfigFile,
  generateSchema,
  listEnvironmentsFile,
  parseConfig,
  parseConfigFile,
} from "@pgshift/config";
export type {
  EnvConfig,
  MigrationConfig,
  PgshiftConfig,
  TlsConfig,
  VariableConfig,
} from "@pgshift/config";
