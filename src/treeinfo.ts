import { createMetadataError } from './errors.js';

type Sections = Map<string, Map<string, string>>;

/**
 * Parses INI-style text into sections of lowercased option names.
 * Supports `key = value`, `key: value`, `#`/`;` comments and indented
 * continuation lines.
 */
export function parseIni(text: string): Sections {
  const sections: Sections = new Map();
  let current: Map<string, string> | undefined;
  let lastKey: string | undefined;

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const raw = lines[index];
    const trimmed = raw.trim();

    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      lastKey = undefined;
      continue;
    }

    if (/^\s/.test(raw) && current && lastKey !== undefined) {
      const previous = current.get(lastKey) ?? '';
      current.set(lastKey, previous ? `${previous}\n${trimmed}` : trimmed);
      continue;
    }

    const header = trimmed.match(/^\[([^\]]+)\]$/);
    if (header) {
      const name = header[1].trim();
      current = sections.get(name) ?? new Map<string, string>();
      sections.set(name, current);
      lastKey = undefined;
      continue;
    }

    if (!current) {
      throw createMetadataError(`treeinfo line ${index + 1}: option outside of any section`);
    }

    const option = trimmed.match(/^([^=:]+?)\s*[=:]\s*(.*)$/);
    if (!option) {
      throw createMetadataError(`treeinfo line ${index + 1}: cannot parse "${trimmed}"`);
    }

    lastKey = option[1].toLowerCase();
    current.set(lastKey, option[2]);
  }

  return sections;
}

/**
 * Parsed .treeinfo file describing an install tree
 */
export class Treeinfo {
  readonly family: string;
  readonly version?: string;
  readonly arch?: string;
  private readonly sections: Sections;

  constructor(text: string) {
    this.sections = parseIni(text);

    const family = this.get('general', 'family');
    if (family === undefined) {
      throw createMetadataError(
        'treeinfo has no family in its [general] section',
        'The tree root must hold a valid .treeinfo file'
      );
    }

    this.family = family;
    this.version = this.get('general', 'version');
    this.arch = this.get('general', 'arch');
  }

  get(section: string, option: string): string | undefined {
    return this.sections.get(section)?.get(option.toLowerCase());
  }

  /**
   * Path of `media` (kernel, initrd, boot.iso) in the `images-<group>` section.
   * Throws when the section or option is missing.
   */
  getImage(group: string, media: string): string {
    const value = this.get(`images-${group}`, media);
    if (value === undefined) {
      throw createMetadataError(`treeinfo has no ${media} in [images-${group}]`);
    }
    return value;
  }
}
