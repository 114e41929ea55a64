import * as fs from 'fs';
import * as path from 'path';
import { AcquiredKernel, DistroDescriptor, GuestType, KernelPair } from './types.js';
import { DistroCache } from './cache.js';
import { OsCatalog } from './catalog.js';
import { TreeFetcher } from './fetch-base.js';
import { createNoBootIsoError, createNoKernelError } from './errors.js';
import { logger } from './logging.js';

/** Schemes the booted installer can fetch its repository from */
const INSTALLER_SOURCE = /^(https?|ftp|nfs):\/\//i;

function installerCanReach(location: string): boolean {
  return INSTALLER_SOURCE.test(location);
}

/**
 * Everything a distro needs once its variant has been selected
 */
export interface DistroContext {
  fetcher: TreeFetcher;
  cache: DistroCache;
  catalog: OsCatalog;
  arch: string;
  guestType: GuestType;
}

/**
 * One recognizable distro family. Registered in store.ts.
 */
export interface DistroVariant {
  readonly prettyName: string;
  /** Short id used for hints, unique across variants */
  readonly urlDistroId?: string;
  isValid(cache: DistroCache): Promise<boolean>;
  create(context: DistroContext): Distro;
}

/**
 * A detected install tree: its OS identity and the boot artifacts to try
 */
export abstract class Distro {
  readonly prettyName: string;
  readonly urlDistroId?: string;
  readonly guestType: GuestType;
  arch: string;
  osVariant?: string;
  kernelPaths: KernelPair[] = [];
  bootIsoPaths: string[] = [];

  protected readonly context: DistroContext;

  constructor(context: DistroContext, variant: DistroVariant) {
    this.context = context;
    this.prettyName = variant.prettyName;
    this.urlDistroId = variant.urlDistroId;
    this.arch = context.arch;
    this.guestType = context.guestType;
  }

  get location(): string {
    return this.context.fetcher.location;
  }

  protected get cache(): DistroCache {
    return this.context.cache;
  }

  protected get catalog(): OsCatalog {
    return this.context.catalog;
  }

  /**
   * Infers the OS variant and fills in the candidate paths
   */
  abstract detect(): Promise<void>;

  /**
   * Installer kernel argument naming the network install source
   */
  get kernelUrlArg(): string | undefined {
    return undefined;
  }

  protected isKnownVariant(osVariant: string): boolean {
    return this.catalog.lookup(osVariant) !== undefined;
  }

  /**
   * The detected OS variant if the catalog knows it
   */
  getOsVariant(): string | undefined {
    if (!this.osVariant) {
      return undefined;
    }

    if (!this.isKnownVariant(this.osVariant)) {
      logger.debug('Detected os variant is not in the catalog', {
        distro: this.prettyName,
        osVariant: this.osVariant
      });
      return undefined;
    }
    return this.osVariant;
  }

  toDescriptor(): DistroDescriptor {
    return {
      prettyName: this.prettyName,
      urlDistroId: this.urlDistroId,
      osVariant: this.getOsVariant(),
      arch: this.arch,
      guestType: this.guestType,
      kernelPaths: this.kernelPaths.map(([kernel, initrd]): KernelPair => [kernel, initrd]),
      bootIsoPaths: [...this.bootIsoPaths],
      kernelUrlArg: this.kernelUrlArg
    };
  }

  /**
   * Fetches the first kernel/initrd pair present in the tree
   */
  async acquireKernel(): Promise<AcquiredKernel> {
    const { fetcher } = this.context;

    let found: KernelPair | undefined;
    for (const [kernelPath, initrdPath] of this.kernelPaths) {
      if ((await fetcher.hasFile(kernelPath)) && (await fetcher.hasFile(initrdPath))) {
        found = [kernelPath, initrdPath];
        break;
      }
    }

    if (!found) {
      throw createNoKernelError(
        `Couldn't find kernel for ${this.prettyName} tree.`,
        'Check that the location is the root directory of an install tree'
      );
    }

    let args = '';
    const urlArg = this.kernelUrlArg;
    if (urlArg && installerCanReach(this.location)) {
      args = `${urlArg}=${this.location}`;
    }

    logger.debug('Fetching kernel and initrd', { kernel: found[0], initrd: found[1] });
    const kernel = await fetcher.fetchAsLocalFile(found[0]);
    try {
      const initrd = await fetcher.fetchAsLocalFile(found[1]);
      return { kernel, initrd, args };
    } catch (error) {
      await fs.promises.rm(path.dirname(kernel), { recursive: true, force: true });
      throw error;
    }
  }

  /**
   * Fetches the first boot ISO present in the tree
   */
  async acquireBootIso(): Promise<string> {
    const { fetcher } = this.context;

    for (const isoPath of this.bootIsoPaths) {
      if (await fetcher.hasFile(isoPath)) {
        return fetcher.fetchAsLocalFile(isoPath);
      }
    }

    throw createNoBootIsoError(
      `Could not find boot.iso in ${this.prettyName} tree.`,
      'Try booting from a kernel/initrd pair instead'
    );
  }
}
