import * as fs from 'fs';
import * as path from 'path';
import { TreeConfig } from './config.js';
import { createFetchError, createNotFoundError } from './errors.js';
import { TreeFetcher, makeScratchDir } from './fetch-base.js';
import { logger } from './logging.js';

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Fetcher for a tree on the local filesystem, e.g. a mounted install ISO
 */
export class LocalTreeFetcher implements TreeFetcher {
  readonly location: string;
  private readonly config: TreeConfig;

  constructor(location: string, config: TreeConfig) {
    this.location = location;
    this.config = config;
  }

  private resolve(filePath: string): string {
    return path.join(this.location, filePath);
  }

  async hasFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(this.resolve(filePath));
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async fetchContent(filePath: string): Promise<string> {
    const fullPath = this.resolve(filePath);
    logger.debug('Reading local tree file', { path: fullPath });

    try {
      return await fs.promises.readFile(fullPath, 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        throw createNotFoundError(`File not found: ${fullPath}`);
      }
      throw createFetchError(
        `Failed to read ${fullPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  async fetchAsLocalFile(filePath: string): Promise<string> {
    const fullPath = this.resolve(filePath);
    if (!(await this.hasFile(filePath))) {
      throw createNotFoundError(`File not found: ${fullPath}`);
    }

    // Callers may delete what they get back, so never hand out the tree's own file
    const target = path.join(await makeScratchDir(this.config), path.basename(filePath));
    await fs.promises.copyFile(fullPath, target);
    logger.debug('Copied local tree file', { from: fullPath, to: target });
    return target;
  }

  async canAccess(): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(this.location);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  async cleanup(): Promise<void> {
    // nothing held open
  }
}
