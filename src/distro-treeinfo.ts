import { Distro, DistroVariant } from './distro.js';
import { Treeinfo } from './treeinfo.js';
import { logger } from './logging.js';

/**
 * Tree described by a .treeinfo file: kernel, initrd and boot.iso
 * come from its images-<arch> section
 */
export class TreeinfoDistro extends Distro {
  protected versionNumber?: number;

  async detect(): Promise<void> {
    await this.detectVersion();

    const treeinfo = await this.cache.treeinfo();
    if (!treeinfo) {
      return;
    }

    this.kernelPaths = [];
    this.bootIsoPaths = [];

    try {
      this.kernelPaths.push([this.media(treeinfo, 'kernel'), this.media(treeinfo, 'initrd')]);
    } catch (error) {
      logger.debug('Failed to parse treeinfo kernel/initrd', { error });
    }

    try {
      this.bootIsoPaths.push(this.media(treeinfo, 'boot.iso'));
    } catch (error) {
      logger.debug('Failed to parse treeinfo boot.iso', { error });
    }
  }

  protected async detectVersion(): Promise<void> {
    // generic trees carry no version heuristics
  }

  private media(treeinfo: Treeinfo, name: string): string {
    const group = this.guestType === 'xen' ? 'xen' : treeinfo.arch;
    if (group === undefined) {
      throw new Error('treeinfo has no arch in its [general] section');
    }
    return treeinfo.getImage(group, name);
  }

  get kernelUrlArg(): string | undefined {
    return this.isOldRedHatDistro() ? 'method' : 'inst.repo';
  }

  private isOldRedHatDistro(): boolean {
    if (!this.versionNumber) {
      return false;
    }
    if (this.urlDistroId === 'fedora' && this.versionNumber < 19) {
      return true;
    }
    // rhel, centos, scientific linux
    return this.versionNumber < 7;
  }
}

/**
 * Maps a Fedora treeinfo version onto a catalog id.
 * Rawhide and versions newer than the catalog map to `latestVariant`.
 */
export function parseFedoraVersion(
  version: string | undefined,
  latestVariant: string
): { versionNumber: number; osVariant: string } {
  const latestNumber = Number.parseInt(latestVariant.slice('fedora'.length), 10);

  let verstr = version;
  if (!verstr) {
    logger.debug('No treeinfo version, assuming rawhide');
    verstr = 'rawhide';
  }

  // rawhide trees use version=Rawhide since Apr 2016
  if (['development', 'rawhide', 'Rawhide'].includes(verstr)) {
    return { versionNumber: latestNumber, osVariant: latestVariant };
  }

  let versionNumber = latestNumber;
  if (/^\d+$/.test(verstr)) {
    versionNumber = Number.parseInt(verstr, 10);
  } else {
    logger.debug('Failed to parse treeinfo version, using latest', { version: verstr, latest: latestNumber });
  }

  if (versionNumber > latestNumber) {
    return { versionNumber, osVariant: latestVariant };
  }
  return { versionNumber, osVariant: `fedora${versionNumber}` };
}

export class FedoraDistro extends TreeinfoDistro {
  protected async detectVersion(): Promise<void> {
    const treeinfo = await this.cache.treeinfo();
    const latest = this.catalog.latestVersionIdentifier('fedora');
    const { versionNumber, osVariant } = parseFedoraVersion(treeinfo?.version, latest);

    this.versionNumber = versionNumber;
    this.osVariant = osVariant;
  }
}

function safeInt(value: string): number {
  return /^\s*[+-]?\d+\s*$/.test(value) ? Number.parseInt(value, 10) : 0;
}

/**
 * Splits "7.4" into [7, 4]. Trees with a bare major ("7") get update 0.
 */
export function splitRhelVersion(version: string): [major: number, update: number] {
  const dot = version.indexOf('.');
  if (dot === -1) {
    return [safeInt(version), 0];
  }
  return [safeInt(version.slice(0, dot)), safeInt(version.slice(dot + 1))];
}

/**
 * RHEL and rebuilds. The os variant is `<prefix><major>.<update>`, walking
 * the update back until the catalog knows it, so rhel7.6 trees still map to
 * rhel7.5 on a catalog that stops there.
 */
export class RhelDistro extends TreeinfoDistro {
  protected async detectVersion(): Promise<void> {
    const version = (await this.cache.treeinfo())?.version;
    if (!version) {
      return;
    }

    const [major, update] = splitRhelVersion(version);
    logger.debug('Split RHEL version', { version, major, update });
    this.versionNumber = major;

    const prefix = this.urlDistroId ?? 'rhel';
    for (let candidate = update; candidate >= 0; candidate--) {
      const osVariant = `${prefix}${major}.${candidate}`;
      if (this.isKnownVariant(osVariant)) {
        this.osVariant = osVariant;
        return;
      }
    }
  }
}

export const genericTreeinfoVariant: DistroVariant = {
  prettyName: 'Generic Treeinfo',
  isValid: async (cache) => (await cache.treeinfo()) !== undefined,
  create: (context) => new TreeinfoDistro(context, genericTreeinfoVariant)
};

export const fedoraVariant: DistroVariant = {
  prettyName: 'Fedora',
  urlDistroId: 'fedora',
  isValid: (cache) => cache.familyMatches(/.*Fedora.*/),
  create: (context) => new FedoraDistro(context, fedoraVariant)
};

export const rhelVariant: DistroVariant = {
  prettyName: 'Red Hat Enterprise Linux',
  urlDistroId: 'rhel',
  // Also matches "RHEL Atomic Host"
  isValid: (cache) => cache.familyMatches(/.*(Red Hat Enterprise Linux|RHEL).*/),
  create: (context) => new RhelDistro(context, rhelVariant)
};

export const centosVariant: DistroVariant = {
  prettyName: 'CentOS',
  urlDistroId: 'centos',
  isValid: (cache) => cache.familyMatches(/.*(CentOS|Scientific).*/),
  create: (context) => new RhelDistro(context, centosVariant)
};
