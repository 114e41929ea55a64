import { GuestType } from './types.js';
import { TreeConfig, loadConfig } from './config.js';
import { OsCatalog, loadOsCatalog } from './catalog.js';
import { Distro } from './distro.js';
import { TreeFetcher, createFetcher } from './fetcher.js';
import { distroHintFor, getDistroStore } from './store.js';
import { logger } from './logging.js';

export interface DetectTreeOptions {
  arch?: string;
  guestType?: GuestType;
  /** urlDistroId to try first */
  distro?: string;
  /** Catalog OS id whose distro is tried first */
  osVariant?: string;
  config?: TreeConfig;
  catalog?: OsCatalog;
  fetcherFactory?: (location: string, config: TreeConfig) => TreeFetcher;
}

/**
 * Detects the install tree at `location` and hands the result to `action`.
 * The fetcher is released once `action` settles.
 *
 * @example
 * const kernel = await withDetectedTree('https://mirror.example/fedora/40/Everything/x86_64/os/', {},
 *   (distro) => distro.acquireKernel());
 */
export async function withDetectedTree<T>(
  location: string,
  options: DetectTreeOptions,
  action: (distro: Distro) => Promise<T>
): Promise<T> {
  const config = options.config ?? loadConfig();
  const catalog = options.catalog ?? loadOsCatalog(config.catalogPath);
  const fetcher = (options.fetcherFactory ?? createFetcher)(location, config);

  const distroHint = options.distro
    ?? (options.osVariant ? distroHintFor(catalog, options.osVariant) : undefined);

  try {
    const distro = await getDistroStore({
      fetcher,
      catalog,
      arch: options.arch,
      guestType: options.guestType,
      distroHint
    });
    return await action(distro);
  } finally {
    await fetcher.cleanup();
    logger.debug('Released tree fetcher', { location });
  }
}

/**
 * Detects the install tree at `location` and returns its plain description
 */
export async function detectTree(location: string, options: DetectTreeOptions = {}) {
  return withDetectedTree(location, options, async (distro) => distro.toDescriptor());
}
