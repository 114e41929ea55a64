import { DebianMediaType, KernelPair } from './types.js';
import { Distro, DistroVariant } from './distro.js';
import { DistroCache } from './cache.js';
import { logger } from './logging.js';

const TREE_ARCH_PATTERNS = [/^.*\/installer-(\w+)\/?$/, /^.*\/daily-images\/(\w+)\/?$/];
const TREE_ARCH_TOKENS = ['i386', 'amd64', 'x86_64', 'arm64'];

/**
 * Debian arch name of a tree, taken from its URL.
 *
 *   http://ftp.debian.org/debian/dists/bookworm/main/installer-amd64/
 *   http://d-i.debian.org/daily-images/arm64/
 *   /mnt/debian-12-x86_64/  (mounted media)
 */
export function findTreeArch(location: string): string {
  for (const pattern of TREE_ARCH_PATTERNS) {
    const match = location.match(pattern);
    if (match) {
      logger.debug('Found tree arch in URL', { pattern: pattern.source, arch: match[1] });
      return match[1];
    }
  }

  for (const arch of TREE_ARCH_TOKENS) {
    if (location.includes(arch)) {
      logger.debug('Found tree arch in URL', { arch });
      return arch === 'x86_64' ? 'amd64' : arch;
    }
  }

  logger.debug('No tree arch in URL, defaulting to i386');
  return 'i386';
}

/**
 * Kernel pair on an install CD, by guest arch
 */
export function installCdKernel(debname: string, arch: string): KernelPair {
  if (debname === 'ubuntu') {
    return arch === 's390x'
      ? ['boot/kernel.ubuntu', 'boot/initrd.ubuntu']
      : ['install/vmlinuz', 'install/initrd.gz'];
  }

  switch (arch) {
    case 'x86_64':
      return ['install.amd/vmlinuz', 'install.amd/initrd.gz'];
    case 'i686':
      return ['install.386/vmlinuz', 'install.386/initrd.gz'];
    case 'aarch64':
      return ['install.a64/vmlinuz', 'install.a64/initrd.gz'];
    case 'ppc64le':
      return ['install/vmlinux', 'install/initrd.gz'];
    case 's390x':
      return ['boot/linux_vm', 'boot/root.bin'];
    default:
      return ['install/vmlinuz', 'install/initrd.gz'];
  }
}

/**
 * Debian and Ubuntu netboot trees, daily builds and install media
 */
export class DebianDistro extends Distro {
  private get debname(): string {
    return this.urlDistroId ?? 'debian';
  }

  async detect(): Promise<void> {
    const mediaType = this.cache.debianMediaType;
    this.kernelPaths = [];

    if (mediaType === 'url' || mediaType === 'daily') {
      const prefix = mediaType === 'daily' ? 'daily' : 'current/images';
      this.setUrlPaths(prefix);
      this.osVariant = this.detectOsVariantFromUrl(mediaType);
    } else if (mediaType === 'disk') {
      this.kernelPaths.push(installCdKernel(this.debname, this.arch));
    }
  }

  private setUrlPaths(prefix: string): void {
    this.bootIsoPaths = [`${prefix}/netboot/mini.iso`];

    const treeArch = findTreeArch(this.location);
    let hvmRoot = `${prefix}/netboot/${this.debname}-installer/${treeArch}/`;
    let kernelName = treeArch === 'ppc64el' ? 'vmlinux' : 'linux';
    let initrdName = 'initrd.gz';

    if (treeArch === 's390x') {
      hvmRoot = `${prefix}/generic/`;
      kernelName = `kernel.${this.debname}`;
      initrdName = `initrd.${this.debname}`;
    }

    if (this.guestType === 'xen') {
      const xenRoot = `${prefix}/netboot/xen/`;
      this.kernelPaths.push([`${xenRoot}vmlinuz`, `${xenRoot}initrd.gz`]);
    }
    this.kernelPaths.push([hvmRoot + kernelName, hvmRoot + initrdName]);
  }

  private detectOsVariantFromUrl(mediaType: DebianMediaType): string | undefined {
    const entries = this.catalog.listAll({ prefix: this.debname });

    if (mediaType === 'daily') {
      logger.debug('Daily build tree, using the latest catalog entry', { distro: this.debname });
      return entries[0]?.id;
    }

    for (const entry of entries) {
      let codename: string;
      if (entry.codename) {
        // Ubuntu codenames look like 'Noble Numbat'
        codename = entry.codename.trim().split(/\s+/)[0].toLowerCase();
      } else {
        // Old Debian labels look like 'Debian Sarge'
        const words = entry.label.trim().split(/\s+/);
        if (words.length < 2) {
          continue;
        }
        codename = words[1].toLowerCase();
      }
      if (!codename) {
        continue;
      }

      if (this.location.includes(`/${codename}/`)) {
        logger.debug('Found codename in the URL', { codename });
        return entry.id;
      }
    }

    logger.debug('No known codename in the URL');
    return undefined;
  }
}

/**
 * Validity test shared by Debian and Ubuntu; records the media type in the cache
 */
function debianMediaMatcher(debname: string): (cache: DistroCache) => Promise<boolean> {
  const isUbuntu = debname === 'ubuntu';
  const capitalized = debname.charAt(0).toUpperCase() + debname.slice(1);

  const checkManifest = async (cache: DistroCache, manifest: string): Promise<boolean> => {
    const mentionsUbuntu = await cache.contentMatches(manifest, /.*[Uu]buntu.*/);
    if (isUbuntu || mentionsUbuntu) {
      return isUbuntu && mentionsUbuntu;
    }
    return cache.contentMatches(manifest, /.*[Dd]ebian.*/);
  };

  return async (cache) => {
    let mediaType: DebianMediaType | undefined;
    if (await checkManifest(cache, 'current/images/MANIFEST')) {
      mediaType = 'url';
    } else if (await checkManifest(cache, 'daily/MANIFEST')) {
      mediaType = 'daily';
    } else if (await cache.contentMatches('.disk/info', new RegExp(`${capitalized}.*`))) {
      mediaType = 'disk';
    }

    if (mediaType) {
      cache.debianMediaType = mediaType;
    }
    return mediaType !== undefined;
  };
}

export const debianVariant: DistroVariant = {
  prettyName: 'Debian',
  urlDistroId: 'debian',
  isValid: debianMediaMatcher('debian'),
  create: (context) => new DebianDistro(context, debianVariant)
};

export const ubuntuVariant: DistroVariant = {
  prettyName: 'Ubuntu',
  urlDistroId: 'ubuntu',
  isValid: debianMediaMatcher('ubuntu'),
  create: (context) => new DebianDistro(context, ubuntuVariant)
};
