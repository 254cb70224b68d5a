import { Module } from '@nestjs/common';
import dns from 'node:dns/promises';
import { HttpProbeService } from './http-probe.service';
import { DNS_LOOKUP, LookupAll, RETRY_BACKOFF_MS } from './probe.tokens';
import { ReachabilityService } from './reachability.service';
import { ResolverService } from './resolver.service';

const lookupAll: LookupAll = (hostname, options) =>
  dns.lookup(hostname, options);

@Module({
  providers: [
    { provide: DNS_LOOKUP, useValue: lookupAll },
    { provide: RETRY_BACKOFF_MS, useValue: 1000 },
    ResolverService,
    ReachabilityService,
    HttpProbeService,
  ],
  exports: [ResolverService, ReachabilityService, HttpProbeService],
})
export class ProbeModule {}
