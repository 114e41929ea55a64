import { createMetadataError } from './errors.js';
import { logger } from './logging.js';

const CONTENT_KEYS = ['LABEL', 'DISTRO', 'VERSION', 'BASEARCHS', 'DEFAULTBASE', 'REPOID'] as const;

type ContentKey = (typeof CONTENT_KEYS)[number];

/**
 * Product identity parsed from a SUSE `content` file.
 *
 * Field examples seen in the wild:
 *   LABEL SUSE Linux Enterprise Server 11 SP4
 *   DISTRO cpe:/o:opensuse:opensuse:13.2,openSUSE
 *   VERSION 10.4-0
 *   BASEARCHS i586 x86_64
 *   REPOID obsproduct://build.suse.de/SUSE:SLE-12-SP3:GA/SLES/12.3/DVD/aarch64
 */
export class SuseContent {
  readonly fields: Partial<Record<ContentKey, string>> = {};
  readonly treeArch?: string;
  readonly productName?: string;
  readonly productVersion?: string;

  constructor(text: string) {
    for (const line of text.split(/\r?\n/)) {
      for (const key of CONTENT_KEYS) {
        if (line.startsWith(key + ' ')) {
          this.fields[key] = line.slice(key.length + 1);
        }
      }
    }

    this.treeArch = this.parseTreeArch();
    this.productName = this.parseProductName();
    this.productVersion = this.parseProductVersion();

    logger.debug('SUSE content parsed', {
      productName: this.productName,
      productVersion: this.productVersion,
      treeArch: this.treeArch
    });
  }

  private parseTreeArch(): string | undefined {
    let arch = this.fields.BASEARCHS || this.fields.DEFAULTBASE;
    if (!arch && this.fields.REPOID !== undefined) {
      arch = this.fields.REPOID.slice(this.fields.REPOID.lastIndexOf('/') + 1);
    }
    if (!arch) {
      return undefined;
    }

    arch = arch.trim();
    // 13.2 oss repo
    if (arch.includes('i586-x86_64')) {
      arch = 'x86_64';
    }
    return arch;
  }

  private parseProductName(): string | undefined {
    if (this.fields.LABEL !== undefined) {
      return this.fields.LABEL;
    }

    const distro = this.fields.DISTRO ?? '';
    if (distro.includes(',')) {
      return distro.slice(distro.lastIndexOf(',') + 1);
    }
    return undefined;
  }

  private parseProductVersion(): string | undefined {
    const name = this.productName;
    if (!name) {
      return undefined;
    }

    let version = this.fields.VERSION ?? '';
    if (version.includes('-')) {
      version = version.slice(0, version.indexOf('-'));
    }

    const distro = this.fields.DISTRO;
    if (!version && distro !== undefined && /^.*:.*,openSUSE$/.test(distro)) {
      const cpe = distro.slice(0, distro.lastIndexOf(',')).trim().split(':');
      version = requireToken(cpe, 4, `DISTRO ${distro}`);
    }

    if (name.includes('Enterprise') || name.includes('SLES')) {
      const tokens = name.trim().split(' ');
      version = requireToken(tokens, 4, `product name ${name}`);
      if (tokens.length > 5) {
        // "SP4" -> ".4"
        version += '.' + requireToken(tokens[5].split(''), 2, `product name ${name}`);
      }
    }

    return version;
  }
}

function requireToken(tokens: string[], index: number, what: string): string {
  if (index >= tokens.length) {
    throw createMetadataError(`Cannot read a version out of SUSE ${what}`);
  }
  return tokens[index];
}
