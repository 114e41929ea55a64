import { Distro, DistroVariant } from './distro.js';

/**
 * ALT Linux install media. There are no installable ALT URLs, only ISOs.
 */
export class AltLinuxDistro extends Distro {
  async detect(): Promise<void> {
    this.kernelPaths = [['syslinux/alt0/vmlinuz', 'syslinux/alt0/full.cz']];
    this.bootIsoPaths = [];
  }
}

/**
 * Mandriva and Mageia trees
 */
export class MandrivaDistro extends Distro {
  async detect(): Promise<void> {
    this.bootIsoPaths = ['install/images/boot.iso'];
    this.kernelPaths = [
      // Mageia 5 and later put the arch in the path
      [`isolinux/${this.arch}/vmlinuz`, `isolinux/${this.arch}/all.rdz`],
      // 2007.1 to 2009.0
      ['isolinux/alt0/vmlinuz', 'isolinux/alt0/all.rdz']
    ];
  }
}

export const altLinuxVariant: DistroVariant = {
  prettyName: 'ALT Linux',
  urlDistroId: 'altlinux',
  isValid: (cache) => cache.contentMatches('.disk/info', /.*ALT .*/),
  create: (context) => new AltLinuxDistro(context, altLinuxVariant)
};

export const mandrivaVariant: DistroVariant = {
  prettyName: 'Mandriva/Mageia',
  urlDistroId: 'mandriva',
  isValid: (cache) => cache.contentMatches('VERSION', /.*(Mandriva|Mageia).*/),
  create: (context) => new MandrivaDistro(context, mandrivaVariant)
};
