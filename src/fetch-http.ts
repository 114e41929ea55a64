import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { TreeConfig } from './config.js';
import { createFetchError, createNotFoundError } from './errors.js';
import { TreeFetcher, joinTreePath, makeScratchDir } from './fetch-base.js';
import { logger } from './logging.js';

/**
 * Options for fetch with timeout
 */
export interface FetchWithTimeoutOptions {
  /** Timeout in milliseconds (default: 30000) */
  readonly timeout?: number;
  readonly method?: 'GET' | 'HEAD';
}

/**
 * Fetch that aborts once the timeout passes
 */
export async function fetchWithTimeout(
  url: string,
  options: FetchWithTimeoutOptions = {}
): Promise<Response> {
  const { timeout = 30000, method = 'GET' } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, { method, signal: controller.signal, redirect: 'follow' });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetcher for trees served over HTTP or HTTPS
 */
export class HttpTreeFetcher implements TreeFetcher {
  readonly location: string;
  private readonly config: TreeConfig;

  constructor(location: string, config: TreeConfig) {
    this.location = location;
    this.config = config;
  }

  private url(filePath: string): string {
    return joinTreePath(this.location, filePath);
  }

  private async request(url: string, method: 'GET' | 'HEAD'): Promise<Response> {
    try {
      return await fetchWithTimeout(url, { method, timeout: this.config.fetchTimeoutMs });
    } catch (error) {
      throw createFetchError(
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        'Check the network connection and the install tree URL'
      );
    }
  }

  private async get(filePath: string): Promise<Response> {
    const url = this.url(filePath);
    const response = await this.request(url, 'GET');

    if (response.status === 404 || response.status === 410) {
      await response.body?.cancel();
      throw createNotFoundError(`File not found: ${url}`);
    }
    if (!response.ok || !response.body) {
      await response.body?.cancel();
      throw createFetchError(`Failed to fetch ${url}: HTTP ${response.status}`);
    }
    return response;
  }

  async hasFile(filePath: string): Promise<boolean> {
    const url = this.url(filePath);
    try {
      const response = await this.request(url, 'HEAD');
      logger.debug('HTTP HEAD', { url, status: response.status });
      return response.ok;
    } catch (error) {
      logger.debug('HTTP HEAD failed', { url, error });
      return false;
    }
  }

  async fetchContent(filePath: string): Promise<string> {
    logger.debug('Fetching tree file', { url: this.url(filePath) });
    const response = await this.get(filePath);
    return response.text();
  }

  async fetchAsLocalFile(filePath: string): Promise<string> {
    const response = await this.get(filePath);
    const target = path.join(await makeScratchDir(this.config), path.basename(filePath));

    if (!response.body) {
      throw createFetchError(`Empty response for ${this.url(filePath)}`);
    }
    await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(target));

    logger.debug('Downloaded tree file', { url: this.url(filePath), to: target });
    return target;
  }

  async canAccess(): Promise<boolean> {
    try {
      const response = await this.request(this.location, 'HEAD');
      return response.ok;
    } catch {
      return false;
    }
  }

  async cleanup(): Promise<void> {
    // fetch keeps no per-tree connection
  }
}
