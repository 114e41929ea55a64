import { describe, test, expect } from '@jest/globals';
import { getDistroStore } from '../../src/store.js';
import { parseFedoraVersion, splitRhelVersion } from '../../src/distro-treeinfo.js';
import { GuestType } from '../../src/types.js';
import { FEDORA_21_TREEINFO, FakeTreeFetcher, testCatalog, treeinfoText } from './helpers.js';

const MIRROR = 'http://mirror.example.test/tree/';

function detect(treeinfo: string, guestType: GuestType = 'hvm') {
  return getDistroStore({
    fetcher: new FakeTreeFetcher(MIRROR, { '.treeinfo': treeinfo }),
    catalog: testCatalog(),
    guestType
  });
}

describe('Treeinfo distros', () => {
  describe('Fedora', () => {
    test('should detect a Fedora tree', async () => {
      const distro = await detect(FEDORA_21_TREEINFO);

      expect(distro.toDescriptor()).toEqual({
        prettyName: 'Fedora',
        urlDistroId: 'fedora',
        osVariant: 'fedora21',
        arch: 'x86_64',
        guestType: 'hvm',
        kernelPaths: [['images/pxeboot/vmlinuz', 'images/pxeboot/initrd.img']],
        bootIsoPaths: ['images/boot.iso'],
        kernelUrlArg: 'inst.repo'
      });
    });

    test('should use the xen image group for xen guests', async () => {
      const distro = await detect(FEDORA_21_TREEINFO, 'xen');

      expect(distro.kernelPaths).toEqual([['images/xen/vmlinuz', 'images/xen/initrd.img']]);
      expect(distro.bootIsoPaths).toEqual([]);
    });

    test('should map a tree without version to the latest release', async () => {
      const distro = await detect(treeinfoText('Fedora'));

      expect(distro.osVariant).toBe('fedora40');
    });

    test('should map rawhide and unknown future releases to the latest release', async () => {
      expect((await detect(treeinfoText('Fedora', 'Rawhide'))).osVariant).toBe('fedora40');
      expect((await detect(treeinfoText('Fedora', '99'))).osVariant).toBe('fedora40');
    });

    test('should use the method= argument before Fedora 19', async () => {
      const distro = await detect(treeinfoText('Fedora', '18'));

      expect(distro.osVariant).toBe('fedora18');
      expect(distro.kernelUrlArg).toBe('method');
    });

    test('should match families that merely contain Fedora', async () => {
      const distro = await detect(treeinfoText('Fedora-Server', '21'));

      expect(distro.prettyName).toBe('Fedora');
    });
  });

  describe('parseFedoraVersion', () => {
    test('should parse plain numbers', () => {
      expect(parseFedoraVersion('21', 'fedora40')).toEqual({ versionNumber: 21, osVariant: 'fedora21' });
    });

    test('should treat development builds as the latest release', () => {
      expect(parseFedoraVersion('development', 'fedora40')).toEqual({ versionNumber: 40, osVariant: 'fedora40' });
      expect(parseFedoraVersion(undefined, 'fedora40')).toEqual({ versionNumber: 40, osVariant: 'fedora40' });
    });

    test('should clamp newer releases but keep their number', () => {
      expect(parseFedoraVersion('45', 'fedora40')).toEqual({ versionNumber: 45, osVariant: 'fedora40' });
    });

    test('should fall back to the latest release on garbage', () => {
      expect(parseFedoraVersion('21-beta', 'fedora40')).toEqual({ versionNumber: 40, osVariant: 'fedora40' });
    });
  });

  describe('RHEL and rebuilds', () => {
    test('should walk the update back to a known release', async () => {
      const distro = await detect(treeinfoText('Red Hat Enterprise Linux', '7.6'));

      expect(distro.prettyName).toBe('Red Hat Enterprise Linux');
      expect(distro.osVariant).toBe('rhel7.5');
      expect(distro.kernelUrlArg).toBe('inst.repo');
    });

    test('should leave the variant unset when no update is known', async () => {
      const distro = await detect(treeinfoText('Red Hat Enterprise Linux', '8.1'));

      expect(distro.osVariant).toBeUndefined();
      expect(distro.kernelPaths).toEqual([['images/pxeboot/vmlinuz', 'images/pxeboot/initrd.img']]);
    });

    test('should use the method= argument before RHEL 7', async () => {
      const distro = await detect(treeinfoText('Red Hat Enterprise Linux', '6.9'));

      expect(distro.osVariant).toBe('rhel6.9');
      expect(distro.kernelUrlArg).toBe('method');
    });

    test('should recognize RHEL Atomic Host as RHEL', async () => {
      const distro = await detect(treeinfoText('RHEL Atomic Host', '7.0'));

      expect(distro.urlDistroId).toBe('rhel');
      expect(distro.osVariant).toBe('rhel7.0');
    });

    test('should detect CentOS with its own prefix', async () => {
      const distro = await detect(treeinfoText('CentOS', '7'));

      expect(distro.prettyName).toBe('CentOS');
      expect(distro.osVariant).toBe('centos7.0');
    });

    test('should detect Scientific Linux as a CentOS-style tree', async () => {
      const distro = await detect(treeinfoText('Scientific Linux', '6.4'));

      expect(distro.urlDistroId).toBe('centos');
      expect(distro.osVariant).toBeUndefined();
      expect(distro.kernelUrlArg).toBe('method');
    });
  });

  describe('splitRhelVersion', () => {
    test('should split major and update', () => {
      expect(splitRhelVersion('7.6')).toEqual([7, 6]);
      expect(splitRhelVersion('7')).toEqual([7, 0]);
    });

    test('should read non-numeric parts as 0', () => {
      expect(splitRhelVersion('abc.4')).toEqual([0, 4]);
      expect(splitRhelVersion('8.2.1')).toEqual([8, 0]);
    });
  });

  describe('Generic treeinfo', () => {
    test('should accept any treeinfo family', async () => {
      const distro = await detect(treeinfoText('Foobar Linux', '3'));

      expect(distro.toDescriptor()).toEqual({
        prettyName: 'Generic Treeinfo',
        urlDistroId: undefined,
        osVariant: undefined,
        arch: 'x86_64',
        guestType: 'hvm',
        kernelPaths: [['images/pxeboot/vmlinuz', 'images/pxeboot/initrd.img']],
        bootIsoPaths: ['images/boot.iso'],
        kernelUrlArg: 'inst.repo'
      });
    });

    test('should tolerate a treeinfo without image sections', async () => {
      const distro = await detect('[general]\nfamily = Foobar Linux\narch = aarch64\n');

      expect(distro.kernelPaths).toEqual([]);
      expect(distro.bootIsoPaths).toEqual([]);
    });

    test('should read xen images without a general arch', async () => {
      const distro = await detect(
        '[general]\nfamily = Foobar Linux\n[images-xen]\nkernel = xen/vmlinuz\ninitrd = xen/initrd.img\n',
        'xen'
      );

      expect(distro.kernelPaths).toEqual([['xen/vmlinuz', 'xen/initrd.img']]);
    });
  });
});
