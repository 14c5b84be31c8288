export {
  CONFIG_FILE_NAME,
  findConfigFile,
  listEnvironments,
  listEnvironmentsFile,
  parseConfig,
  parseConfigFile,
} from "./config.js";
export type {
  EnvConfig,
  MigrationConfig,
  PgshiftConfig,
  TlsConfig,
  VariableConfig,
} from "./config.js";
export { generateSchema, pgshiftSchema } from "./hcl-schema.js";
