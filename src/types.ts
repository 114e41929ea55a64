import { z } from 'zod';

/**
 * Hypervisor personality the guest boots under
 */
export type GuestType = 'hvm' | 'xen';

/**
 * Kernel and initrd paths, relative to the tree root
 */
export type KernelPair = [kernel: string, initrd: string];

/**
 * How a Debian-style tree was recognized
 */
export type DebianMediaType = 'url' | 'daily' | 'disk';

/**
 * Plain view of a detected distro, safe to serialize
 */
export interface DistroDescriptor {
  prettyName: string;
  urlDistroId?: string;
  osVariant?: string;
  arch: string;
  guestType: GuestType;
  kernelPaths: KernelPair[];
  bootIsoPaths: string[];
  kernelUrlArg?: string;
}

/**
 * Result of fetching a kernel/initrd pair to local storage
 */
export interface AcquiredKernel {
  kernel: string;
  initrd: string;
  args: string;
}

/**
 * OS catalog entry
 */
export interface OsEntry {
  id: string;
  label: string;
  codename?: string;
  distro?: string;
  type?: string;
}

/**
 * Catalog listing filter
 */
export interface OsFilter {
  prefix?: string;
  distro?: string;
}

/**
 * Custom error codes for tree detection operations
 */
export enum ErrorCode {
  ENOTFOUND = 'ENOTFOUND',
  EFETCH = 'EFETCH',
  EMETADATA = 'EMETADATA',
  ENODISTRO = 'ENODISTRO',
  ENOKERNEL = 'ENOKERNEL',
  ENOBOOTISO = 'ENOBOOTISO',
  ECATALOG = 'ECATALOG',
  EBADREQ = 'EBADREQ',
  ECONFIG = 'ECONFIG'
}

/**
 * Structured error class for tree detection operations
 */
export class TreeDetectError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public hint?: string
  ) {
    super(message);
    this.name = 'TreeDetectError';
  }
}

// Zod schemas for tool input validation
export const OsEntrySchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  codename: z.string().optional(),
  distro: z.string().optional(),
  type: z.string().optional()
});

export const OsCatalogFileSchema = z.object({
  os: z.array(OsEntrySchema)
});

export const TreeLocationSchema = z.object({
  location: z.string().min(1),
  arch: z.string().min(1).optional().default('x86_64'),
  guestType: z.enum(['hvm', 'xen']).optional().default('hvm'),
  distro: z.string().min(1).optional().describe('Distro id to try first, e.g. "fedora"'),
  osVariant: z.string().min(1).optional().describe('OS id whose distro is tried first')
});

export const OsListSchema = z.object({
  prefix: z.string().optional(),
  distro: z.string().optional()
});

export type TreeLocationParams = z.infer<typeof TreeLocationSchema>;
