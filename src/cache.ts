import { DebianMediaType } from './types.js';
import { TreeFetcher } from './fetch-base.js';
import { Treeinfo } from './treeinfo.js';
import { SuseContent } from './suse-content.js';
import { isNotFound } from './errors.js';
import { logger } from './logging.js';

/** Marks a SUSE content file that failed to parse; never retried */
const PARSE_FAILED = Symbol('parse-failed');

/**
 * Per-detection memo of fetched tree files and their parsed forms.
 * Distro variants probing the same file share a single fetch.
 */
export class DistroCache {
  private readonly fetcher: TreeFetcher;
  private readonly files = new Map<string, Promise<string | undefined>>();
  private treeinfoResult?: Treeinfo;
  private suseResult?: SuseContent | typeof PARSE_FAILED;

  /** Set by the Debian-style validity test that matched */
  debianMediaType?: DebianMediaType;

  constructor(fetcher: TreeFetcher) {
    this.fetcher = fetcher;
  }

  get location(): string {
    return this.fetcher.location;
  }

  /**
   * Content of a tree file, or undefined when it could not be fetched
   */
  fetchContent(filePath: string): Promise<string | undefined> {
    let pending = this.files.get(filePath);
    if (!pending) {
      pending = this.fetcher.fetchContent(filePath).catch((error: unknown) => {
        if (isNotFound(error)) {
          logger.debug('Tree file not found', { path: filePath });
        } else {
          logger.debug('Failed to acquire tree file', { path: filePath, error });
        }
        return undefined;
      });
      this.files.set(filePath, pending);
    }
    return pending;
  }

  /**
   * Parsed .treeinfo, undefined when the tree has none.
   * Throws EMETADATA when the file exists but lacks a family.
   */
  async treeinfo(): Promise<Treeinfo | undefined> {
    if (this.treeinfoResult) {
      return this.treeinfoResult;
    }

    const text = await this.fetchContent('.treeinfo');
    if (text === undefined) {
      return undefined;
    }

    this.treeinfoResult = new Treeinfo(text);
    logger.debug('treeinfo parsed', {
      family: this.treeinfoResult.family,
      version: this.treeinfoResult.version
    });
    return this.treeinfoResult;
  }

  async familyMatches(pattern: RegExp): Promise<boolean> {
    const treeinfo = await this.treeinfo();
    if (!treeinfo) {
      return false;
    }

    const matched = matchesAtStart(pattern, treeinfo.family);
    if (!matched) {
      logger.debug('treeinfo family did not match', { pattern: pattern.source });
    }
    return matched;
  }

  /**
   * True when some line of the file matches `pattern` at its start
   */
  async contentMatches(filePath: string, pattern: RegExp): Promise<boolean> {
    const text = await this.fetchContent(filePath);
    if (text === undefined) {
      return false;
    }

    if (text.split(/\r?\n/).some((line) => matchesAtStart(pattern, line))) {
      return true;
    }

    logger.debug('Tree file found but pattern did not match', { path: filePath, pattern: pattern.source });
    return false;
  }

  /**
   * Parsed SUSE `content` file, undefined when missing or unparseable
   */
  async suseContent(): Promise<SuseContent | undefined> {
    if (this.suseResult === undefined) {
      // A missing file leaves the sentinel too
      this.suseResult = PARSE_FAILED;
      const text = await this.fetchContent('content');
      if (text !== undefined) {
        try {
          this.suseResult = new SuseContent(text);
        } catch (error) {
          logger.debug('Error parsing SUSE content file', { error });
        }
      }
    }

    return this.suseResult === PARSE_FAILED ? undefined : this.suseResult;
  }
}

/**
 * Regex match anchored at the start of `text`, like a `^`-prefixed pattern
 */
export function matchesAtStart(pattern: RegExp, text: string): boolean {
  const sticky = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '') + 'y');
  return sticky.test(text);
}
