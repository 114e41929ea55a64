import * as os from 'os';
import { TreeConfig } from '../../src/config.js';
import { InMemoryOsCatalog } from '../../src/catalog.js';
import { TreeFetcher } from '../../src/fetch-base.js';
import { createNotFoundError } from '../../src/errors.js';
import { LogLevel } from '../../src/logging.js';
import { OsEntry } from '../../src/types.js';

/**
 * In-memory tree: a map of tree-relative paths to file contents
 */
export class FakeTreeFetcher implements TreeFetcher {
  readonly location: string;
  readonly fetchCalls: string[] = [];
  cleanups = 0;
  accessible = true;
  private readonly files: Map<string, string>;

  constructor(location: string, files: Record<string, string> = {}) {
    this.location = location;
    this.files = new Map(Object.entries(files));
  }

  async hasFile(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async fetchContent(filePath: string): Promise<string> {
    this.fetchCalls.push(filePath);
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw createNotFoundError(`File not found: ${filePath}`);
    }
    return content;
  }

  async fetchAsLocalFile(filePath: string): Promise<string> {
    if (!this.files.has(filePath)) {
      throw createNotFoundError(`File not found: ${filePath}`);
    }
    return `/scratch/${filePath}`;
  }

  async canAccess(): Promise<boolean> {
    return this.accessible;
  }

  async cleanup(): Promise<void> {
    this.cleanups++;
  }

  fetchCount(filePath: string): number {
    return this.fetchCalls.filter((call) => call === filePath).length;
  }
}

const TEST_OS_ENTRIES: OsEntry[] = [
  { id: 'fedora-rawhide', label: 'Fedora Rawhide', distro: 'fedora' },
  { id: 'fedora40', label: 'Fedora Linux 40', distro: 'fedora' },
  { id: 'fedora21', label: 'Fedora 21', distro: 'fedora' },
  { id: 'fedora18', label: 'Fedora 18', distro: 'fedora' },
  { id: 'rhel7.5', label: 'Red Hat Enterprise Linux 7.5', distro: 'rhel' },
  { id: 'rhel7.0', label: 'Red Hat Enterprise Linux 7.0', distro: 'rhel' },
  { id: 'rhel6.9', label: 'Red Hat Enterprise Linux 6.9', distro: 'rhel' },
  { id: 'centos7.0', label: 'CentOS 7', distro: 'centos' },
  { id: 'opensusetumbleweed', label: 'openSUSE Tumbleweed', distro: 'opensuse' },
  { id: 'opensuse15.5', label: 'openSUSE Leap 15.5', distro: 'opensuse' },
  { id: 'opensuse42.3', label: 'openSUSE Leap 42.3', distro: 'opensuse' },
  { id: 'sles12sp3', label: 'SUSE Linux Enterprise Server 12 SP3', distro: 'sles' },
  { id: 'sles11sp4', label: 'SUSE Linux Enterprise Server 11 SP4', distro: 'sles' },
  { id: 'sles11', label: 'SUSE Linux Enterprise Server 11', distro: 'sles' },
  { id: 'sles9', label: 'SUSE Linux Enterprise Server 9', distro: 'sles' },
  { id: 'sled12sp3', label: 'SUSE Linux Enterprise Desktop 12 SP3', distro: 'sled' },
  { id: 'debian12', label: 'Debian 12', codename: 'Bookworm', distro: 'debian' },
  { id: 'debian11', label: 'Debian 11', codename: 'Bullseye', distro: 'debian' },
  { id: 'debian3.1', label: 'Debian Sarge', distro: 'debian' },
  { id: 'ubuntu24.04', label: 'Ubuntu 24.04 LTS', codename: 'Noble Numbat', distro: 'ubuntu' },
  { id: 'ubuntu22.04', label: 'Ubuntu 22.04 LTS', codename: 'Jammy Jellyfish', distro: 'ubuntu' },
  { id: 'generic', label: 'Generic OS', type: 'generic' }
];

export function testCatalog(): InMemoryOsCatalog {
  return new InMemoryOsCatalog(TEST_OS_ENTRIES);
}

export function testConfig(overrides: Partial<TreeConfig> = {}): TreeConfig {
  return {
    logLevel: LogLevel.ERROR,
    fetchTimeoutMs: 5000,
    scratchDir: os.tmpdir(),
    ...overrides
  };
}

export const FEDORA_21_TREEINFO = [
  '[general]',
  'family = Fedora',
  'version = 21',
  'arch = x86_64',
  '',
  '[images-x86_64]',
  'kernel = images/pxeboot/vmlinuz',
  'initrd = images/pxeboot/initrd.img',
  'boot.iso = images/boot.iso',
  '',
  '[images-xen]',
  'kernel = images/xen/vmlinuz',
  'initrd = images/xen/initrd.img',
  ''
].join('\n');

/**
 * A minimal .treeinfo with the given [general] values and an x86_64 image section
 */
export function treeinfoText(family: string, version?: string): string {
  const lines = ['[general]', `family = ${family}`];
  if (version !== undefined) {
    lines.push(`version = ${version}`);
  }
  lines.push(
    'arch = x86_64',
    '',
    '[images-x86_64]',
    'kernel = images/pxeboot/vmlinuz',
    'initrd = images/pxeboot/initrd.img',
    'boot.iso = images/boot.iso'
  );
  return lines.join('\n');
}

/**
 * The error `fn` throws, undefined when it returns
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
