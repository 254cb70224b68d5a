import { Inject, Injectable, Logger } from '@nestjs/common';
import { DNS_LOOKUP, LookupAll } from './probe.tokens';
import type { IpVersion } from './types';

export type ResolvedAddress = {
  domain: string;
  address: string | null;
  family: IpVersion | null;
};

@Injectable()
export class ResolverService {
  private readonly logger = new Logger(ResolverService.name);

  constructor(@Inject(DNS_LOOKUP) private readonly lookup: LookupAll) {}

  /**
   * First address the OS resolver returns within the allowed families.
   * A name that does not resolve is a normal result, never an exception.
   */
  async resolve(
    domain: string,
    families: readonly IpVersion[] = [4, 6],
  ): Promise<ResolvedAddress> {
    try {
      const all = await this.lookup(domain, { all: true });
      const hit = all.find((a) => families.some((f) => f === a.family));
      if (hit && (hit.family === 4 || hit.family === 6)) {
        return { domain, address: hit.address, family: hit.family };
      }
      const wanted = families.map((f) => `IPv${f}`).join('/');
      this.logger.debug(`${domain}: no ${wanted} address`);
    } catch (e) {
      const code =
        e instanceof Error && 'code' in e ? String(e.code) : String(e);
      this.logger.debug(`${domain}: lookup failed (${code})`);
    }
    return { domain, address: null, family: null };
  }
}
