import path from "node:path";
import fs from "node:fs/promises";

export const MIGRATION_NAME_PATTERN = /^[a-z0-9_]+$/;

export const validateMigrationName = (value: string): true | string => {
  if (!value || value.trim().length === 0) {
    return "Migration name is required";
  }

  if (!MIGRATION_NAME_PATTERN.test(value.trim())) {
    return "Migration name must contain only lowercase letters, numbers, and underscores";
  }

  return true;
};

export const sanitizeMigrationName = (name: string): string =>
  name.trim().toLowerCase().replace(/\s+/g, "_");

// YYYYMMDDhhmmss in UTC, so identifiers sort chronologically across machines.
export const formatVersion = (date: Date): string => {
  const pad2 = (value: number): string => String(value).padStart(2, "0");

  return (
    `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}` +
    `${pad2(date.getUTCDate())}${pad2(date.getUTCHours())}` +
    `${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}`
  );
};

type CreateMigrationOptions = {
  migrationsDir: string;
  name: string;
  reversible?: boolean;
  now?: Date;
};

export type CreatedMigration = {
  identifier: string;
  files: string[];
};

export const createMigrationFiles = async (
  options: CreateMigrationOptions,
): Promise<CreatedMigration> => {
  const now = options.now || new Date();
  const name = sanitizeMigrationName(options.name);
  const validation = validateMigrationName(name);

  if (validation !== true) {
    throw new Error(validation);
  }

  const identifier = `${formatVersion(now)}_${name}`;
  const header = `-- Migration: ${name}\n-- Created: ${now.toISOString()}\n\n`;
  const scripts: Array<[string, string]> = [
    [`${identifier}.sql`, `${header}-- Write your migration here\n`],
  ];

  if (options.reversible) {
    scripts.push([
      `${identifier}.down.sql`,
      `${header}-- Undo ${identifier} here\n`,
    ]);
  }

  await fs.mkdir(options.migrationsDir, { recursive: true });

  const files: string[] = [];

  for (const [fileName, content] of scripts) {
    const filePath = path.join(options.migrationsDir, fileName);

    // "wx" refuses to overwrite an existing migration.
    await fs.writeFile(filePath, content, { encoding: "utf8", flag: "wx" });
    files.push(filePath);
  }

  return { identifier, files };
};
