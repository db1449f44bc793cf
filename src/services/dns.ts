import { Resolver } from 'dns/promises';
import { match, P } from 'ts-pattern';
import type { MxLookupResult, MxResolver } from '../types/collaborators.js';
import { DEFAULT_LOOKUP_TIMEOUT_MS } from '../constants/validation.js';

export interface DnsMxResolverOptions {
  timeoutMs?: number;
  servers?: string[];
}

/**
 * MX lookups through the system resolver. A single try per query, bounded by
 * `timeoutMs`.
 */
export class DnsMxResolver implements MxResolver {
  private readonly resolver: Resolver;

  constructor({ timeoutMs = DEFAULT_LOOKUP_TIMEOUT_MS, servers }: DnsMxResolverOptions = {}) {
    this.resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
    if (servers && servers.length > 0) {
      this.resolver.setServers(servers);
    }
  }

  public resolveMx = async (domain: string): Promise<MxLookupResult> => {
    try {
      const records = await this.resolver.resolveMx(domain);
      return records.length > 0 ? 'found' : 'not_found';
    } catch (error) {
      // No mail exchanger for the domain, as opposed to a failed lookup
      return match(error)
        .with({ code: P.union('ENODATA', 'ENOTFOUND', 'ENONAME') }, (): MxLookupResult => 'not_found')
        .otherwise(() => {
          throw error;
        });
    }
  };
}
