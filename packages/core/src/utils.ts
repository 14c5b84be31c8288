import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const readVersionField = (manifest: unknown): string => {
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }

  return "";
};

/**
 * Reads `version` from a package.json located relative to a module. Resolves
 * to an empty string when the manifest is missing or unreadable, since the
 * version is only recorded as ledger metadata.
 */
export const resolvePackageVersion = async (
  moduleUrl: string,
  packagePathRelativeToModule: string,
): Promise<string> => {
  const currentDir = path.dirname(fileURLToPath(moduleUrl));
  const packagePath = path.resolve(currentDir, packagePathRelativeToModule);
  let contents: string;

  try {
    contents = await fs.readFile(packagePath, "utf8");
  } catch {
    return "";
  }

  try {
    return readVersionField(JSON.parse(contents));
  } catch {
    return "";
  }
};
