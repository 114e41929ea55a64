import { ErrorCode, TreeDetectError } from './types.js';

/**
 * Creates a file-not-found error
 */
export function createNotFoundError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.ENOTFOUND, message, hint);
}

/**
 * Creates a transport error
 */
export function createFetchError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.EFETCH, message, hint);
}

/**
 * Creates a malformed metadata error
 */
export function createMetadataError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.EMETADATA, message, hint);
}

/**
 * Creates a no-distro-detected error
 */
export function createNoDistroError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.ENODISTRO, message, hint);
}

/**
 * Creates a kernel-not-found error
 */
export function createNoKernelError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.ENOKERNEL, message, hint);
}

/**
 * Creates a boot-image-not-found error
 */
export function createNoBootIsoError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.ENOBOOTISO, message, hint);
}

/**
 * Creates an OS catalog error
 */
export function createCatalogError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.ECATALOG, message, hint);
}

/**
 * Creates a bad request error
 */
export function createBadRequestError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.EBADREQ, message, hint);
}

/**
 * Creates a configuration error
 */
export function createConfigError(message: string, hint?: string): TreeDetectError {
  return new TreeDetectError(ErrorCode.ECONFIG, message, hint);
}

/**
 * Wraps an unknown error into a tree detection error
 */
export function wrapError(error: unknown, code: ErrorCode, hint?: string): TreeDetectError {
  if (error instanceof TreeDetectError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TreeDetectError(code, message, hint);
}

/**
 * True when the error is a transport miss
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof TreeDetectError && error.code === ErrorCode.ENOTFOUND;
}
