import * as fs from 'fs';
import * as path from 'path';
import { OsCatalogFileSchema, OsEntry, OsFilter } from './types.js';
import { createCatalogError } from './errors.js';
import { logger } from './logging.js';

/**
 * Read-only catalog of known operating systems
 */
export interface OsCatalog {
  lookup(id: string): OsEntry | undefined;
  /** Entries in catalog order, newest release of each distro first */
  listAll(filter?: OsFilter): OsEntry[];
  /** Highest `<distro><N>` id, e.g. fedora40 */
  latestVersionIdentifier(distro: string): string;
}

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '..', 'data', 'os-catalog.json');

/**
 * Catalog over an in-memory entry list
 */
export class InMemoryOsCatalog implements OsCatalog {
  private readonly entries: OsEntry[];
  private readonly byId: Map<string, OsEntry>;

  constructor(entries: OsEntry[]) {
    this.entries = [...entries];
    this.byId = new Map(entries.map((entry) => [entry.id, entry]));
  }

  lookup(id: string): OsEntry | undefined {
    return this.byId.get(id);
  }

  listAll(filter: OsFilter = {}): OsEntry[] {
    return this.entries.filter((entry) => {
      if (filter.prefix !== undefined && !entry.id.startsWith(filter.prefix)) {
        return false;
      }
      if (filter.distro !== undefined && entry.distro !== filter.distro) {
        return false;
      }
      return true;
    });
  }

  latestVersionIdentifier(distro: string): string {
    const pattern = new RegExp(`^${distro}(\\d+)$`);
    let latest: { id: string; version: number } | undefined;

    for (const entry of this.entries) {
      const match = entry.id.match(pattern);
      if (!match) {
        continue;
      }
      const version = Number.parseInt(match[1], 10);
      if (!latest || version > latest.version) {
        latest = { id: entry.id, version };
      }
    }

    if (!latest) {
      throw createCatalogError(
        `No versioned ${distro} entry in the OS catalog`,
        'Update the OS catalog or point TREE_OS_CATALOG at a newer one'
      );
    }
    return latest.id;
  }
}

/**
 * Loads a catalog from a JSON file shaped like data/os-catalog.json
 */
export function loadOsCatalog(filePath: string = DEFAULT_CATALOG_PATH): InMemoryOsCatalog {
  logger.debug('Loading OS catalog', { path: filePath });

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw createCatalogError(
      `Failed to read OS catalog ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'Check that the file exists and contains valid JSON'
    );
  }

  const parsed = OsCatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw createCatalogError(
      `Invalid OS catalog ${filePath}: ${parsed.error.issues[0].message}`,
      'Each entry needs at least an id and a label'
    );
  }

  logger.debug('OS catalog loaded', { entries: parsed.data.os.length });
  return new InMemoryOsCatalog(parsed.data.os);
}
