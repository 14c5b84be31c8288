import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "@cdktf/hcl2json";
import { extractObject, extractValue, resolveValue } from "./utils.js";

export const CONFIG_FILE_NAME = "pgshift.hcl";

export type MigrationConfig = {
  dir: string;
  table: {
    name: string;
    schema?: string;
  };
  vars?: Record<string, unknown>;
};

export type TlsConfig = {
  ca_file: string;
  cert_file?: string;
  key_file?: string;
};

export type EnvConfig = {
  url: string;
  tls?: TlsConfig;
  migrations: MigrationConfig;
};

export type VariableConfig = {
  type: string;
  default?: unknown;
  description?: string;
};

export type PgshiftConfig = {
  env: Record<string, EnvConfig>;
  variable?: Record<string, VariableConfig>;
};

type HCLEnvBlock = {
  url?: string[] | string;
  tls?: Array<{
    ca_file?: string[] | string;
    cert_file?: string[] | string;
    key_file?: string[] | string;
  }>;
  migrations?: Array<{
    dir?: string[] | string;
    table?: Array<{
      name?: string[] | string;
      schema?: string[] | string;
    }>;
    vars?: Record<string, unknown>[] | Record<string, unknown>;
  }>;
};

type HCLVariableBlock = {
  type?: string[] | string;
  default?: unknown;
  description?: string[] | string;
};

type ParsedHCL = {
  env?: Record<string, HCLEnvBlock[]>;
  variable?: Record<string, HCLVariableBlock[]>;
};

const parseHCL = async (
  sourceName: string,
  content: string,
): Promise<ParsedHCL> => (await parse(sourceName, content)) as ParsedHCL;

type HCLString = string[] | string | undefined;

type ResolveString = (value: HCLString) => string;

// Variable blocks only supply defaults; values passed with --var win.
const collectVariables = (
  blocks: ParsedHCL["variable"],
  overrides: Record<string, string>,
): Record<string, string> => {
  const variables: Record<string, string> = { ...overrides };

  for (const [name, [block]] of Object.entries(blocks ?? {})) {
    if (block?.default === undefined || Object.hasOwn(variables, name)) {
      continue;
    }

    variables[name] = String(extractValue<unknown>(block.default, ""));
  }

  return variables;
};

const resolveTls = (
  block: NonNullable<HCLEnvBlock["tls"]>[number] | undefined,
  targetEnv: string,
  resolve: ResolveString,
): TlsConfig | undefined => {
  if (!block) {
    return undefined;
  }

  const caFile = resolve(block.ca_file);
  const certFile = resolve(block.cert_file);
  const keyFile = resolve(block.key_file);

  if (!caFile) {
    throw new Error(`TLS block in environment "${targetEnv}" requires ca_file`);
  }

  if (Boolean(certFile) !== Boolean(keyFile)) {
    throw new Error(
      `TLS block in environment "${targetEnv}" requires both cert_file and key_file for mTLS`,
    );
  }

  return {
    ca_file: caFile,
    cert_file: certFile || undefined,
    key_file: keyFile || undefined,
  };
};

/**
 * Parses an HCL config file and returns the normalized configuration of one
 * environment (the first one when `envName` is omitted).
 */
export const parseConfig = async (
  content: string,
  env: Record<string, string | undefined> = {},
  vars: Record<string, string> = {},
  envName?: string,
  sourceName: string = CONFIG_FILE_NAME,
): Promise<EnvConfig> => {
  const parsed = await parseHCL(sourceName, content);

  if (!parsed.env) {
    throw new Error("No environments defined in config file");
  }

  const variables = collectVariables(parsed.variable, vars);
  const resolve: ResolveString = (value) =>
    resolveValue(extractValue(value, ""), env, variables);

  const targetEnv = envName || Object.keys(parsed.env)[0];

  if (!targetEnv) {
    throw new Error(
      "No environment specified and no default environment found",
    );
  }

  const envBlock = parsed.env[targetEnv]?.[0];

  if (!envBlock) {
    throw new Error(`Environment "${targetEnv}" not found in config file`);
  }

  const url = resolve(envBlock.url);

  if (!url) {
    throw new Error(
      `Database URL not specified for environment "${targetEnv}"`,
    );
  }

  const migrationBlock = envBlock.migrations?.[0];

  if (!migrationBlock) {
    throw new Error(
      `No migrations configuration found for environment "${targetEnv}"`,
    );
  }

  const dir = resolve(migrationBlock.dir);

  if (!dir) {
    throw new Error(
      `Migrations directory not specified for environment "${targetEnv}"`,
    );
  }

  const templateVars: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(
    extractObject(migrationBlock.vars, {}),
  )) {
    templateVars[key] =
      typeof value === "string" ? resolveValue(value, env, variables) : value;
  }

  const tableBlock = migrationBlock.table?.[0];

  return {
    url,
    tls: resolveTls(envBlock.tls?.[0], targetEnv, resolve),
    migrations: {
      dir,
      table: {
        name: resolve(tableBlock?.name) || "schema_migrations",
        schema: resolve(tableBlock?.schema) || undefined,
      },
      vars: templateVars,
    },
  };
};

export const parseConfigFile = async (
  configPath: string,
  envName?: string,
  vars: Record<string, string> = {},
  env: Record<string, string | undefined> = process.env,
): Promise<EnvConfig> => {
  const content = await fs.readFile(configPath, "utf8");

  return parseConfig(content, env, vars, envName, configPath);
};

export const listEnvironments = async (
  content: string,
  sourceName: string = CONFIG_FILE_NAME,
): Promise<string[]> => {
  const parsed = await parseHCL(sourceName, content);

  return parsed.env ? Object.keys(parsed.env) : [];
};

export const listEnvironmentsFile = async (
  configPath: string,
): Promise<string[]> => {
  const content = await fs.readFile(configPath, "utf8");
  return listEnvironments(content, configPath);
};

/**
 * Finds config file in current directory or parent directories
 */
export const findConfigFile = async (
  startDir: string = process.cwd(),
  fileName: string = CONFIG_FILE_NAME,
): Promise<string | null> => {
  let currentDir = startDir;

  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    const configPath = path.join(currentDir, fileName);

    try {
      await fs.access(configPath);

      return configPath;
    } catch {
      currentDir = path.dirname(currentDir);
    }
  }

  return null;
};
