import type { ILookupResult, IPolicyOverrides, QueryInput } from '../models';
import type { ILookupClient } from '../patterns/strategy/ILookupClient';
import { LineNormalizer } from './LineNormalizer';
import { SuffixResolver } from './SuffixResolver';
import { DomainCombiner } from './DomainCombiner';
import type { ISuffixSource } from './SuffixSource';

/**
 * Domain Query Engine - turns text into candidate domains and checks them in order
 *
 * Lookups run strictly one after another. The upstream service enforces a
 * request-rate ceiling, so fanning out would only trade speed for throttling.
 */
export class DomainQueryEngine {
  private readonly normalizer = new LineNormalizer();
  private readonly resolver = new SuffixResolver();
  private readonly combiner = new DomainCombiner();

  /**
   * @param suffixSource - Suffix configuration, re-read for every operation
   * @param client - Lookup client used for every candidate
   */
  constructor(
    private readonly suffixSource: ISuffixSource,
    private readonly client: ILookupClient
  ) {}

  /**
   * Build the candidate sequence for an input
   * Suffixes are only loaded when the input has at least one fragment.
   * @param input - Text blob or blobs
   * @returns Candidates, fragment-major then suffix-minor; empty when the input is blank
   * @throws ConfigError when the suffix configuration is unusable
   * @throws ValidationError when a candidate cannot be built
   */
  async prepareCandidates(input: QueryInput): Promise<string[]> {
    const fragments = this.normalizer.normalize(input);
    if (fragments.length === 0) {
      return [];
    }

    const suffixes = await this.resolver.resolve(this.suffixSource);
    return this.combiner.combineAll(fragments, suffixes);
  }

  /**
   * Run a whole batch and return every result at once
   * The first failed lookup aborts the batch; no partial results are returned.
   * @param input - Text blob or blobs
   * @param overrides - Policy changes for this batch only
   * @returns Results in candidate order
   */
  async runBatch(input: QueryInput, overrides?: IPolicyOverrides): Promise<ILookupResult[]> {
    const candidates = await this.prepareCandidates(input);
    if (candidates.length === 0) {
      return [];
    }

    const client = this.clientFor(overrides);
    const results: ILookupResult[] = [];
    for (const domain of candidates) {
      results.push(await client.lookup(domain));
    }
    return results;
  }

  /**
   * Lookup client for one operation, with overrides applied when the client allows it
   */
  clientFor(overrides?: IPolicyOverrides): ILookupClient {
    if (overrides && this.client.withPolicy) {
      return this.client.withPolicy(overrides);
    }
    return this.client;
  }
}
