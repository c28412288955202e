import { ConfigError } from '../errors';
import type { ISuffixSource } from './SuffixSource';
import { isRecord } from '../utils/guards';

/**
 * Suffix Resolver - loads the enabled suffix list from a configuration source
 *
 * Accepted documents:
 * 1. `["com", "io"]`
 * 2. `[{ "suffix": "com", "enabled": true }]`
 * 3. either of the above under a `suffixes` key
 *
 * Each suffix is trimmed, stripped of leading dots and lower-cased.
 * Duplicates are kept: repeating a suffix repeats its candidates.
 */
export class SuffixResolver {
  /**
   * Read the source and return the enabled suffixes in source order
   * @param source - Configuration source, read once per call
   * @throws ConfigError when the document is unusable or nothing is enabled
   */
  async resolve(source: ISuffixSource): Promise<string[]> {
    const document = await source.read();
    const suffixes = this.resolveEntries(document);

    if (suffixes.length === 0) {
      throw new ConfigError(`No enabled domain suffixes in ${source.describe()}`);
    }

    return suffixes;
  }

  /**
   * Extract enabled suffixes from an already parsed document.
   * Entries that are neither strings nor objects are skipped.
   * @param document - Parsed configuration
   * @returns Enabled suffixes, possibly empty
   */
  resolveEntries(document: unknown): string[] {
    const rawList = isRecord(document) ? document['suffixes'] : document;
    if (!Array.isArray(rawList)) {
      throw new ConfigError('Suffix configuration must be an array, or an object with a "suffixes" array');
    }

    const entries: readonly unknown[] = rawList;
    const suffixes: string[] = [];

    for (const entry of entries) {
      let rawSuffix: string;
      let enabled: boolean;

      if (typeof entry === 'string') {
        rawSuffix = entry;
        enabled = true;
      } else if (isRecord(entry)) {
        rawSuffix = stringifySuffix(entry['suffix']);
        enabled = entry['enabled'] === undefined ? true : Boolean(entry['enabled']);
      } else {
        continue;
      }

      const suffix = this.cleanSuffix(rawSuffix);
      if (!suffix || !enabled) {
        continue;
      }
      suffixes.push(suffix);
    }

    return suffixes;
  }

  /**
   * Normalize a single suffix value
   * @param suffix - Raw suffix such as " .COM "
   * @returns Lower-case suffix without leading dots, e.g. "com"
   */
  cleanSuffix(suffix: string): string {
    return suffix.trim().replace(/^\.+/, '').toLowerCase();
  }
}

function stringifySuffix(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}
