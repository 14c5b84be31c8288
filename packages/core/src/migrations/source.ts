import fs from "node:fs/promises";
import path from "node:path";
import kleur from "kleur";
import { DiscoveryError, errorMessage } from "./errors.js";
import { calculateChecksum, splitStatements } from "./sql.js";
import { renderTemplate, type TemplateVars } from "./template.js";
import type {
  MigrationDefinition,
  MigrationScript,
  MigrationUnit,
} from "./types.js";

export interface MigrationSource {
  discover(): Promise<MigrationUnit[]>;
}

type MigrationSourceOptions = {
  templateVars?: TemplateVars;
  quiet?: boolean;
};

const IDENTIFIER_PATTERN = /^(\d+)_(.+)$/;
const FILE_PATTERN = /^(\d+_.+?)(\.up|\.down)?\.sql$/;

export const compareIdentifiers = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const buildScript = (
  identifier: string,
  content: string,
  templateVars: TemplateVars,
  file?: string,
): MigrationScript => {
  let rendered: string;

  try {
    rendered = renderTemplate(content, templateVars);
  } catch (error) {
    throw new DiscoveryError(
      `Migration ${identifier} could not be rendered: ${errorMessage(error)}`,
      { identifier, file, cause: error },
    );
  }

  return Object.freeze({
    content,
    statements: Object.freeze(splitStatements(rendered)),
    checksum: calculateChecksum(content),
  });
};

type UnitInput = MigrationDefinition & { file?: string };

/**
 * Validates and freezes migration definitions, sorted by identifier.
 */
export const buildMigrationUnits = (
  inputs: UnitInput[],
  templateVars: TemplateVars = {},
): MigrationUnit[] => {
  const identifiers = new Set<string>();
  const versions = new Map<string, string>();
  const units: MigrationUnit[] = [];

  for (const input of inputs) {
    const { identifier, file } = input;
    const match = identifier.match(IDENTIFIER_PATTERN);

    if (!match) {
      throw new DiscoveryError(
        `Invalid migration identifier "${identifier}". ` +
          "Expected <version>_<name>, e.g. 20240101120000_create_users.",
        { identifier, file },
      );
    }

    const [, version, name] = match;

    if (identifiers.has(identifier)) {
      throw new DiscoveryError(`Duplicate migration identifier ${identifier}`, {
        identifier,
        file,
      });
    }

    const sameVersion = versions.get(version);

    if (sameVersion) {
      throw new DiscoveryError(
        `Migrations ${sameVersion} and ${identifier} share version ${version}`,
        { identifier, file },
      );
    }

    const forward = buildScript(identifier, input.forward, templateVars, file);

    if (forward.statements.length === 0) {
      throw new DiscoveryError(`Migration ${identifier} has no statements`, {
        identifier,
        file,
      });
    }

    const reverseScript =
      input.reverse === undefined
        ? null
        : buildScript(identifier, input.reverse, templateVars, file);
    // An unfilled down placeholder makes the unit irreversible.
    const reverse =
      reverseScript && reverseScript.statements.length > 0
        ? reverseScript
        : null;

    identifiers.add(identifier);
    versions.set(version, identifier);
    units.push(
      Object.freeze({
        identifier,
        version,
        name,
        file: file ?? null,
        forward,
        reverse,
      }),
    );
  }

  return units.sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
};

/**
 * Migrations embedded in the program rather than read from disk.
 */
export class StaticMigrationSource implements MigrationSource {
  #definitions: MigrationDefinition[];
  #templateVars: TemplateVars;

  constructor(
    definitions: MigrationDefinition[],
    options: MigrationSourceOptions = {},
  ) {
    this.#definitions = [...definitions];
    this.#templateVars = options.templateVars || {};
  }

  async discover(): Promise<MigrationUnit[]> {
    return buildMigrationUnits(this.#definitions, this.#templateVars);
  }
}

/**
 * Reads `<version>_<name>.sql` (or `.up.sql`) forward scripts and their
 * optional `<version>_<name>.down.sql` counterparts from one directory.
 */
export class DirectoryMigrationSource implements MigrationSource {
  #migrationsDir: string;
  #templateVars: TemplateVars;
  #quiet: boolean;

  constructor(migrationsDir: string, options: MigrationSourceOptions = {}) {
    this.#migrationsDir = migrationsDir;
    this.#templateVars = options.templateVars || {};
    this.#quiet = options.quiet || false;
  }

  async discover(): Promise<MigrationUnit[]> {
    const files = (await this.#listFiles())
      .filter((file) => file.endsWith(".sql"))
      .sort(compareIdentifiers);
    const forwards = new Map<string, { file: string; content: string }>();
    const reverses = new Map<string, { file: string; content: string }>();

    for (const file of files) {
      const match = file.match(FILE_PATTERN);

      if (!match) {
        if (!this.#quiet) {
          console.warn(kleur.yellow(`Skipping invalid filename: ${file}`));
        }
        continue;
      }

      const [, identifier, suffix] = match;
      const target = suffix === ".down" ? reverses : forwards;
      const existing = target.get(identifier);

      if (existing) {
        throw new DiscoveryError(
          `Duplicate migration identifier ${identifier} (${existing.file}, ${file})`,
          { identifier, file },
        );
      }

      const content = await fs.readFile(
        path.join(this.#migrationsDir, file),
        "utf8",
      );

      target.set(identifier, { file, content });
    }

    for (const [identifier, reverse] of reverses) {
      if (!forwards.has(identifier)) {
        throw new DiscoveryError(
          `Down script ${reverse.file} has no matching up script`,
          { identifier, file: reverse.file },
        );
      }
    }

    return buildMigrationUnits(
      Array.from(forwards, ([identifier, forward]) => ({
        identifier,
        file: forward.file,
        forward: forward.content,
        reverse: reverses.get(identifier)?.content,
      })),
      this.#templateVars,
    );
  }

  async #listFiles(): Promise<string[]> {
    try {
      return await fs.readdir(this.#migrationsDir);
    } catch (error) {
      throw new DiscoveryError(
        `Cannot read migrations directory ${this.#migrationsDir}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
