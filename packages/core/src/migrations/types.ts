export type MigrationRunnerTLSOptions = {
  caCert: string;
  cert?: string;
  key?: string;
};

export type MigrationRunnerOptions = {
  migrationsDir: string;
  connectionString: string;
  tableName?: string;
  schema?: string;
  templateVars?: Record<string, unknown>;
  tls?: MigrationRunnerTLSOptions;
  quiet?: boolean;
};

export type MigrationCommand = "up" | "status" | "down";

export type MigrationScript = {
  readonly content: string;
  readonly statements: readonly string[];
  readonly checksum: string;
};

export type MigrationUnit = {
  readonly identifier: string;
  readonly version: string;
  readonly name: string;
  readonly file: string | null;
  readonly forward: MigrationScript;
  readonly reverse: MigrationScript | null;
};

/**
 * A migration handed to the core as text rather than read from a directory.
 */
export type MigrationDefinition = {
  identifier: string;
  forward: string;
  reverse?: string;
};

export type LedgerEntry = {
  identifier: string;
  name: string;
  checksum: string;
  appliedAt: Date;
  appliedBy: string;
  hostname: string;
  cliVersion: string;
};

export type Plan = readonly MigrationUnit[];

export type RunStatus = "done" | "failed" | "cancelled";

export type RunResult = {
  status: RunStatus;
  applied: string[];
  failed: string | null;
  error: Error | null;
};

export type RollbackResult = {
  status: RunStatus;
  reverted: string[];
  failed: string | null;
  error: Error | null;
};

export type MigrationStatus = {
  applied: LedgerEntry[];
  pending: MigrationUnit[];
};

export type RunnerState =
  | { kind: "idle" }
  | { kind: "bootstrapping" }
  | { kind: "planning" }
  | { kind: "applying"; index: number; identifier: string }
  | { kind: "reverting"; index: number; identifier: string }
  | { kind: "done" }
  | { kind: "failed"; identifier: string | null }
  | { kind: "cancelled" };
