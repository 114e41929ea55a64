import { TreeConfig } from './config.js';
import { createBadRequestError } from './errors.js';
import { logger } from './logging.js';
import { LocalTreeFetcher } from './fetch-local.js';
import { HttpTreeFetcher } from './fetch-http.js';
import { SftpTreeFetcher } from './fetch-sftp.js';
import { TreeFetcher } from './fetch-base.js';

export type { TreeFetcher } from './fetch-base.js';

/**
 * Builds the fetcher matching the location's scheme
 */
export function createFetcher(location: string, config: TreeConfig): TreeFetcher {
  const scheme = location.match(/^([a-z][a-z0-9+.-]*):\/\//i)?.[1]?.toLowerCase();
  logger.debug('Creating tree fetcher', { location, scheme: scheme ?? 'local' });

  switch (scheme) {
    case undefined:
      return new LocalTreeFetcher(location, config);
    case 'file':
      return new LocalTreeFetcher(decodeURIComponent(new URL(location).pathname), config);
    case 'http':
    case 'https':
      return new HttpTreeFetcher(location, config);
    case 'sftp':
      return new SftpTreeFetcher(location, config);
    default:
      throw createBadRequestError(
        `Unsupported location scheme: ${scheme}`,
        'Use a local directory, file://, http(s):// or sftp:// location'
      );
  }
}
