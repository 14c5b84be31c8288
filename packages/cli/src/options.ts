import path from "node:path";
import fs from "node:fs/promises";
import kleur from "kleur";
import { parse as parseDotenv } from "@dotenvx/dotenvx";
import type { MigrationRunnerOptions } from "@pgshift/core";
import {
  CONFIG_FILE_NAME,
  findConfigFile,
  listEnvironmentsFile,
  parseConfigFile,
  type EnvConfig,
} from "@pgshift/config";

export type CliOptions = {
  config?: string;
  env?: string;
  envFile?: string;
  var?: string[];
  quiet?: boolean;
};

export type ResolvedEnvironment = {
  configPath: string;
  envName: string;
  config: EnvConfig;
};

export const resolveBaseCwd = (): string =>
  process.env.INIT_CWD || process.cwd();

export const collectVar = (
  value: string,
  previous: string[] = [],
): string[] => [...previous, value];

export const parseVars = (varArgs: string[] = []): Record<string, string> => {
  const vars: Record<string, string> = {};

  for (const arg of varArgs) {
    const [key, ...valueParts] = arg.split("=");

    if (key && valueParts.length > 0) {
      vars[key] = valueParts.join("=");
    }
  }

  return vars;
};

export const parseEnvFile = async (
  filePath: string,
): Promise<Record<string, string | undefined>> => {
  const contents = await fs.readFile(filePath, "utf8");
  return parseDotenv(contents);
};

export const resolveEnvName = async (
  configPath: string,
  envName?: string,
): Promise<string> => {
  if (envName) {
    return envName;
  }

  const environments = await listEnvironmentsFile(configPath);
  if (environments.length === 1) {
    return environments[0];
  }

  if (environments.length === 0) {
    throw new Error("No environments defined in config file");
  }

  throw new Error(
    `Multiple environments found (${environments.join(", ")}). ` +
      "Specify one with --env.",
  );
};

export const resolveEnvironment = async (
  options: CliOptions,
  baseCwd: string = resolveBaseCwd(),
): Promise<ResolvedEnvironment> => {
  const envOverrides = options.envFile
    ? await parseEnvFile(path.resolve(baseCwd, options.envFile))
    : undefined;

  const configPath = options.config
    ? path.resolve(baseCwd, options.config)
    : await findConfigFile(baseCwd);

  if (!configPath) {
    throw new Error(
      `Config file is required. Use --config or place ${CONFIG_FILE_NAME} in the current directory.`,
    );
  }

  const envName = await resolveEnvName(configPath, options.env);
  const config = await parseConfigFile(
    configPath,
    envName,
    parseVars(options.var),
    envOverrides,
  );

  return { configPath, envName, config };
};

/**
 * Turns a resolved environment into runner options. Paths in the config are
 * relative to the config file.
 */
export const toRunnerOptions = async (
  resolved: ResolvedEnvironment,
  quiet = false,
): Promise<MigrationRunnerOptions> => {
  const baseDir = path.dirname(resolved.configPath);
  const { config } = resolved;
  const readPem = (file: string): Promise<string> =>
    fs.readFile(path.resolve(baseDir, file), "utf8");

  const tls = config.tls
    ? {
        caCert: await readPem(config.tls.ca_file),
        cert: config.tls.cert_file
          ? await readPem(config.tls.cert_file)
          : undefined,
        key: config.tls.key_file
          ? await readPem(config.tls.key_file)
          : undefined,
      }
    : undefined;

  return {
    migrationsDir: path.resolve(baseDir, config.migrations.dir),
    connectionString: config.url,
    tableName: config.migrations.table.name,
    schema: config.migrations.table.schema,
    templateVars: config.migrations.vars || {},
    tls,
    quiet,
  };
};

export const printEnvironment = (resolved: ResolvedEnvironment): void => {
  console.log(`Using config file: ${kleur.bold(resolved.configPath)}`);
  console.log(`Environment: ${kleur.bold(resolved.envName)}`);
  console.log("");
};
