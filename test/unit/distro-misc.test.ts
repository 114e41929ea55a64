import { describe, test, expect } from '@jest/globals';
import { getDistroStore } from '../../src/store.js';
import { ErrorCode } from '../../src/types.js';
import { FakeTreeFetcher, testCatalog } from './helpers.js';

describe('ALT Linux and Mandriva', () => {
  test('should detect ALT Linux media', async () => {
    const distro = await getDistroStore({
      fetcher: new FakeTreeFetcher('/mnt/alt', { '.disk/info': 'ALT Workstation 10.1 x86_64 build 2023-06-01' }),
      catalog: testCatalog()
    });

    expect(distro.urlDistroId).toBe('altlinux');
    expect(distro.kernelPaths).toEqual([['syslinux/alt0/vmlinuz', 'syslinux/alt0/full.cz']]);
    await expect(distro.acquireBootIso()).rejects.toMatchObject({
      code: ErrorCode.ENOBOOTISO,
      message: 'Could not find boot.iso in ALT Linux tree.'
    });
  });

  test('should detect Mageia trees with arch-specific kernels', async () => {
    const distro = await getDistroStore({
      fetcher: new FakeTreeFetcher('http://mirror.example.test/mageia/9/x86_64/', { VERSION: 'Mageia 9 x86_64' }),
      catalog: testCatalog(),
      arch: 'x86_64'
    });

    expect(distro.prettyName).toBe('Mandriva/Mageia');
    expect(distro.kernelPaths).toEqual([
      ['isolinux/x86_64/vmlinuz', 'isolinux/x86_64/all.rdz'],
      ['isolinux/alt0/vmlinuz', 'isolinux/alt0/all.rdz']
    ]);
    expect(distro.bootIsoPaths).toEqual(['install/images/boot.iso']);
  });
});
