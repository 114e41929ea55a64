import { GuestType } from './types.js';
import { Distro, DistroContext, DistroVariant } from './distro.js';
import { DistroCache } from './cache.js';
import { OsCatalog } from './catalog.js';
import { TreeFetcher } from './fetch-base.js';
import { createNoDistroError } from './errors.js';
import { logger, createTimer } from './logging.js';
import { centosVariant, fedoraVariant, genericTreeinfoVariant, rhelVariant } from './distro-treeinfo.js';
import { opensuseVariant, sledVariant, slesVariant } from './distro-suse.js';
import { debianVariant, ubuntuVariant } from './distro-debian.js';
import { altLinuxVariant, mandrivaVariant } from './distro-misc.js';

/**
 * Ordered distro variants plus the catch-all tried after all of them
 */
export interface DistroRegistry {
  readonly variants: readonly DistroVariant[];
  readonly fallback: DistroVariant;
}

/**
 * Builds a registry, rejecting two variants with the same urlDistroId
 */
export function createRegistry(variants: DistroVariant[], fallback: DistroVariant): DistroRegistry {
  const seen = new Set<string>();
  for (const variant of [...variants, fallback]) {
    if (!variant.urlDistroId) {
      continue;
    }
    if (seen.has(variant.urlDistroId)) {
      throw new Error(`Duplicate urlDistroId registered: ${variant.urlDistroId}`);
    }
    seen.add(variant.urlDistroId);
  }

  return { variants: [...variants], fallback };
}

export const defaultRegistry = createRegistry(
  [
    fedoraVariant,
    rhelVariant,
    centosVariant,
    slesVariant,
    sledVariant,
    opensuseVariant,
    debianVariant,
    ubuntuVariant,
    altLinuxVariant,
    mandrivaVariant
  ],
  genericTreeinfoVariant
);

/**
 * Evaluation order: the hinted variant first, the rest as registered,
 * the fallback always last
 */
export function orderVariants(registry: DistroRegistry, distroHint?: string): DistroVariant[] {
  const ordered = [...registry.variants];

  if (distroHint) {
    const index = ordered.findIndex((variant) => variant.urlDistroId === distroHint);
    if (index === -1) {
      logger.debug('No distro variant matches the hint, not prioritizing anything', { distroHint });
    } else {
      const [hinted] = ordered.splice(index, 1);
      ordered.unshift(hinted);
      logger.debug('Prioritizing distro variant', { distro: hinted.prettyName });
    }
  }

  ordered.push(registry.fallback);
  return ordered;
}

/**
 * The url distro id of a catalog OS id, for use as a hint
 */
export function distroHintFor(catalog: OsCatalog, osVariant: string): string | undefined {
  return catalog.lookup(osVariant)?.distro;
}

export interface DistroStoreOptions {
  fetcher: TreeFetcher;
  catalog: OsCatalog;
  arch?: string;
  guestType?: GuestType;
  distroHint?: string;
  registry?: DistroRegistry;
}

/**
 * Detects which distro the tree behind `fetcher` holds
 */
export async function getDistroStore(options: DistroStoreOptions): Promise<Distro> {
  const { fetcher, catalog, distroHint } = options;
  const registry = options.registry ?? defaultRegistry;
  const timer = createTimer();

  logger.debug('Finding distro store', { location: fetcher.location, distroHint });

  const cache = new DistroCache(fetcher);
  const context: DistroContext = {
    fetcher,
    cache,
    catalog,
    arch: options.arch ?? 'x86_64',
    guestType: options.guestType ?? 'hvm'
  };

  for (const variant of orderVariants(registry, distroHint)) {
    if (!(await variant.isValid(cache))) {
      continue;
    }

    const distro = variant.create(context);
    await distro.detect();
    logger.info('Detected distro', {
      distro: distro.prettyName,
      osVariant: distro.osVariant,
      elapsedMs: timer.elapsed()
    });
    return distro;
  }

  // Servers that refuse directory listings fail this check too
  let extra = '';
  if (!(await fetcher.canAccess())) {
    extra = ': The URL could not be accessed, maybe you mistyped?';
  }

  throw createNoDistroError(
    `Could not find an installable distribution at '${fetcher.location}'${extra}`,
    'The location must be the root directory of an install tree.'
  );
}
