import { Injectable, Logger } from '@nestjs/common';
import type { ProbeConfig } from '../config/probe-config';
import { classify } from '../probe/classifier';
import { HttpProbeService } from '../probe/http-probe.service';
import {
  REACHABILITY_PORT,
  ReachabilityService,
} from '../probe/reachability.service';
import { ResolverService } from '../probe/resolver.service';
import {
  ipSlot,
  IpVersion,
  IP_VERSIONS,
  ProbeOutcome,
  ProbeSlots,
  Protocol,
  PROTOCOLS,
} from '../probe/types';
import { DomainResult, errorResult } from './domain-result';

export type CheckStep =
  | { phase: 'resolving' }
  | { phase: 'reachability'; address: string; family: IpVersion }
  | { phase: 'probing'; address: string; family: IpVersion }
  | { phase: 'done'; result: DomainResult };

type PendingStep = Exclude<CheckStep, { phase: 'done' }>;

export type ProbePair = { protocol: Protocol; ipVersion: IpVersion };

/** HTTP answers are reported as-is; HTTPS is chased to its final hop. */
export const followsRedirects = (p: Protocol) => p === 'https';

/** Protocol x IP version pairs the config enables and this host can use. */
export function enabledPairs(config: ProbeConfig): ProbePair[] {
  const pairs: ProbePair[] = [];
  for (const protocol of PROTOCOLS) {
    if (!config.protocols.includes(protocol)) continue;
    for (const ipVersion of IP_VERSIONS) {
      if (!config.ipVersions.includes(ipVersion)) continue;
      if (ipVersion === 6 && !config.ipv6Available) continue;
      pairs.push({ protocol, ipVersion });
    }
  }
  return pairs;
}

@Injectable()
export class DomainCheckService {
  private readonly logger = new Logger(DomainCheckService.name);

  constructor(
    private readonly resolver: ResolverService,
    private readonly reachability: ReachabilityService,
    private readonly executor: HttpProbeService,
  ) {}

  async check(domain: string, config: ProbeConfig): Promise<DomainResult> {
    let step: PendingStep = { phase: 'resolving' };
    for (;;) {
      const next = await this.advance(domain, step, config);
      this.logger.debug(`${domain}: ${step.phase} -> ${stepLabel(next)}`);
      if (next.phase === 'done') return next.result;
      step = next;
    }
  }

  /** One transition of the per-domain machine. */
  async advance(
    domain: string,
    step: PendingStep,
    config: ProbeConfig,
  ): Promise<CheckStep> {
    switch (step.phase) {
      case 'resolving': {
        const r = await this.resolver.resolve(domain, config.ipVersions);
        if (!r.address || !r.family) {
          return { phase: 'done', result: errorResult(domain, 'nxdomain') };
        }
        return { phase: 'reachability', address: r.address, family: r.family };
      }
      case 'reachability': {
        const ok = await this.reachability.isReachable(
          step.address,
          REACHABILITY_PORT,
          config.timeoutSeconds * 1000,
          config.proxy,
        );
        if (!ok) {
          return {
            phase: 'done',
            result: errorResult(domain, 'blocked_by_ip', step.address),
          };
        }
        return { phase: 'probing', address: step.address, family: step.family };
      }
      case 'probing':
        return {
          phase: 'done',
          result: {
            domain,
            kind: 'probed',
            address: step.address,
            family: step.family,
            reachable: true,
            probes: await this.probeAll(domain, config),
          },
        };
    }
  }

  private async probeAll(
    domain: string,
    config: ProbeConfig,
  ): Promise<ProbeSlots> {
    const outcomes = await Promise.all(
      enabledPairs(config).map(async (pair) => ({
        ...pair,
        outcome: await this.probeOne(domain, pair, config),
      })),
    );
    const slots: ProbeSlots = {};
    for (const { protocol, ipVersion, outcome } of outcomes) {
      const bucket = (slots[protocol] ??= {});
      bucket[ipSlot(ipVersion)] = outcome;
    }
    return slots;
  }

  private async probeOne(
    domain: string,
    { protocol, ipVersion }: ProbePair,
    config: ProbeConfig,
  ): Promise<ProbeOutcome> {
    try {
      const res = await this.executor.probe(
        domain,
        protocol,
        followsRedirects(protocol),
        ipVersion,
        config,
      );
      return classify(
        res.status,
        res.redirectTarget,
        config.timeoutSeconds,
        res.failure,
      );
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      this.logger.error(
        `${domain} ${protocol} IPv${ipVersion}: probe crashed: ${reason}`,
      );
      return classify(0, null, config.timeoutSeconds, 'transport_error');
    }
  }
}

function stepLabel(step: CheckStep): string {
  if (step.phase !== 'done') return step.phase;
  return step.result.kind === 'error' ? step.result.error.code : 'done';
}
