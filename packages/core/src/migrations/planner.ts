import { DiscoveryError, DriftError } from "./errors.js";
import { compareIdentifiers } from "./source.js";
import type { LedgerEntry, MigrationUnit, Plan } from "./types.js";

/**
 * Returns the units missing from the ledger, oldest first. Fails without
 * planning anything when the ledger and the units disagree.
 */
export const planMigrations = (
  units: readonly MigrationUnit[],
  entries: Iterable<LedgerEntry>,
): Plan => {
  const byIdentifier = new Map<string, MigrationUnit>();

  for (const unit of units) {
    if (byIdentifier.has(unit.identifier)) {
      throw new DiscoveryError(
        `Duplicate migration identifier ${unit.identifier}`,
        { identifier: unit.identifier },
      );
    }

    byIdentifier.set(unit.identifier, unit);
  }

  const applied = new Set<string>();
  const missing: string[] = [];
  const modified: string[] = [];

  for (const entry of entries) {
    applied.add(entry.identifier);

    const unit = byIdentifier.get(entry.identifier);

    if (!unit) {
      missing.push(entry.identifier);
    } else if (unit.forward.checksum !== entry.checksum) {
      modified.push(entry.identifier);
    }
  }

  if (missing.length > 0) {
    missing.sort(compareIdentifiers);

    throw new DriftError(
      "missing",
      missing,
      `Applied migration(s) not found among migration files: ${missing.join(", ")}`,
    );
  }

  if (modified.length > 0) {
    modified.sort(compareIdentifiers);

    throw new DriftError(
      "modified",
      modified,
      `Applied migration(s) have been modified since they ran: ${modified.join(", ")}`,
    );
  }

  return Array.from(byIdentifier.values())
    .filter((unit) => !applied.has(unit.identifier))
    .sort((a, b) => compareIdentifiers(a.identifier, b.identifier));
};
