import { Distro, DistroVariant } from './distro.js';
import { DistroCache, matchesAtStart } from './cache.js';
import { logger } from './logging.js';

/**
 * Builds the os variant from a SUSE product version like "11.4" or "15.2".
 * SLE products encode the service pack as the minor version.
 */
export function suseVariantFromVersion(base: string, version: string | undefined): string | undefined {
  if (!version) {
    return undefined;
  }

  const dot = version.indexOf('.');
  const major = (dot === -1 ? version : version.slice(0, dot)).trim();
  const minor = dot === -1 ? undefined : version.slice(dot + 1).trim();

  if (!/^\d+$/.test(major)) {
    logger.debug('Non-numeric SUSE version', { version });
    return undefined;
  }

  if (Number.parseInt(major, 10) < 10) {
    // SLES 9 era numbering is ambiguous
    return `${base}9`;
  }

  if (base.startsWith('sles') || base.startsWith('sled')) {
    return minor === undefined ? `${base}${major}` : `${base}${major}sp${minor}`;
  }

  // Tumbleweed versions are an 8 digit date
  if (major.length === 8) {
    return `${base}tumbleweed`;
  }
  return `${base}${version}`;
}

/**
 * SLES, SLED and openSUSE trees, recognized by their `content` file
 */
export class SuseDistro extends Distro {
  async detect(): Promise<void> {
    const content = await this.cache.suseContent();
    if (content?.treeArch) {
      this.arch = content.treeArch;
    }
    if (/^i[4-9]86/.test(this.arch)) {
      this.arch = 'i386';
    }

    this.osVariant = suseVariantFromVersion(this.urlDistroId ?? '', content?.productVersion);
    this.osVariant = this.detectOsVariantFromUrl() ?? this.osVariant;

    this.bootIsoPaths = ['boot/boot.iso'];
    this.kernelPaths = [];

    const arch = this.arch;
    if (this.guestType === 'xen') {
      // openSUSE > 10.2 and SLES 10
      this.kernelPaths.push([`boot/${arch}/vmlinuz-xen`, `boot/${arch}/initrd-xen`]);
    }

    if (arch === 's390x' && (this.osVariant === 'sles11' || this.osVariant === 'sled11')) {
      this.kernelPaths.push(['boot/s390x/vmrdr.ikr', 'boot/s390x/initrd']);
    }

    // SLES 12 on ppc64le, all s390x
    this.kernelPaths.push([`boot/${arch}/linux`, `boot/${arch}/initrd`]);

    // openSUSE 10.0
    const suffix = arch === 'x86_64' ? '64' : '';
    this.kernelPaths.push([`boot/loader/linux${suffix}`, `boot/loader/initrd${suffix}`]);

    // openSUSE >= 10.2, 11 and SLES 10
    this.kernelPaths.push([`boot/${arch}/loader/linux`, `boot/${arch}/loader/initrd`]);
  }

  /**
   * openSUSE trees are often published under /<release>/, e.g. /tumbleweed/
   */
  private detectOsVariantFromUrl(): string | undefined {
    const root = 'opensuse';
    for (const entry of this.catalog.listAll({ prefix: root })) {
      const codename = entry.id.slice(root.length);
      if (codename && this.location.includes(`/${codename}/`)) {
        logger.debug('Found openSUSE release in the URL', { codename });
        return entry.id;
      }
    }
    return undefined;
  }

  get kernelUrlArg(): string | undefined {
    return 'install';
  }
}

function productMatcher(patterns: RegExp[]): (cache: DistroCache) => Promise<boolean> {
  return async (cache) => {
    const productName = (await cache.suseContent())?.productName;
    if (!productName) {
      return false;
    }
    return patterns.some((pattern) => matchesAtStart(pattern, productName));
  };
}

export const slesVariant: DistroVariant = {
  prettyName: 'SUSE Linux Enterprise Server',
  urlDistroId: 'sles',
  isValid: productMatcher([/.*SUSE Linux Enterprise Server/, /.*SUSE SLES/]),
  create: (context) => new SuseDistro(context, slesVariant)
};

export const sledVariant: DistroVariant = {
  prettyName: 'SUSE Linux Enterprise Desktop',
  urlDistroId: 'sled',
  isValid: productMatcher([/.*SUSE Linux Enterprise Desktop/]),
  create: (context) => new SuseDistro(context, sledVariant)
};

export const opensuseVariant: DistroVariant = {
  prettyName: 'openSUSE',
  urlDistroId: 'opensuse',
  isValid: productMatcher([/.*openSUSE.*/]),
  create: (context) => new SuseDistro(context, opensuseVariant)
};
