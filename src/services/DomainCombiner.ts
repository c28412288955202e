import { ValidationError } from '../errors';

/**
 * Domain Combiner - qualifies base fragments with suffixes
 */
export class DomainCombiner {
  /**
   * Join one base fragment and one suffix into a domain
   * @param base - Base fragment; surrounding whitespace and dots are removed
   * @param suffix - Suffix; surrounding whitespace and leading dots are removed
   * @returns `base.suffix`
   * @throws ValidationError when either operand is empty after cleaning
   */
  public combine(base: string, suffix: string): string {
    const cleanBase = base.trim().replace(/^\.+|\.+$/g, '');
    const cleanSuffix = suffix.trim().replace(/^\.+/, '');

    if (!cleanBase || !cleanSuffix) {
      throw new ValidationError(`Cannot combine domain from base "${base}" and suffix "${suffix}": operand is empty`);
    }

    return `${cleanBase}.${cleanSuffix}`;
  }

  /**
   * Build the full candidate sequence, fragment-major then suffix-minor
   * @param fragments - Base fragments in request order
   * @param suffixes - Enabled suffixes in configuration order
   * @returns Candidate domains
   */
  public combineAll(fragments: readonly string[], suffixes: readonly string[]): string[] {
    const candidates: string[] = [];
    for (const fragment of fragments) {
      for (const suffix of suffixes) {
        candidates.push(this.combine(fragment, suffix));
      }
    }
    return candidates;
  }
}
