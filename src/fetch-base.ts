import * as fs from 'fs';
import * as path from 'path';
import { TreeConfig } from './config.js';

/**
 * Read access to an install tree
 */
export interface TreeFetcher {
  /** Root URL or path of the tree */
  readonly location: string;
  hasFile(filePath: string): Promise<boolean>;
  /** Throws ENOTFOUND when the file is missing */
  fetchContent(filePath: string): Promise<string>;
  /** Copies the file into a scratch directory of its own and returns the local path */
  fetchAsLocalFile(filePath: string): Promise<string>;
  canAccess(): Promise<boolean>;
  cleanup(): Promise<void>;
}

/**
 * Joins a tree-relative path onto a root, keeping a single slash between them
 */
export function joinTreePath(root: string, filePath: string): string {
  return root.replace(/\/+$/, '') + '/' + filePath.replace(/^\/+/, '');
}

/**
 * Creates a private scratch directory for files pulled from a tree
 */
export async function makeScratchDir(config: TreeConfig): Promise<string> {
  await fs.promises.mkdir(config.scratchDir, { recursive: true });
  return fs.promises.mkdtemp(path.join(config.scratchDir, 'install-tree-'));
}
